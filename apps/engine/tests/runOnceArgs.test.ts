/**
 * Tests for the run-once command-line options
 */

import { parseRunOnceArgs } from '../src/cli/runOnceArgs';

describe('parseRunOnceArgs', () => {
    it('should build the full request from the options', async () => {
        const request = await parseRunOnceArgs([
            '--topic', 'best budget laptops',
            '--communities', 'r/laptops, college',
            '--industry', 'Consumer electronics retail',
            '--targetAudience', 'College students',
            '--businessType', 'Independent computer store',
            '--contentGoal', 'Drive in-store consultations',
            '--uniqueValueProp', 'We repair the laptops we sell',
            '--brandVoice', 'Plain-spoken',
            '--painPoints', 'Battery life',
            '--questions', 'How much RAM do I need?',
            '--successStory', 'A student saved $300',
        ]);

        expect(request).toEqual({
            topic: 'best budget laptops',
            targetCommunities: ['laptops', 'college'],
            businessContext: {
                industry: 'Consumer electronics retail',
                targetAudience: 'College students',
                businessType: 'Independent computer store',
                contentGoal: 'Drive in-store consultations',
                uniqueValueProp: 'We repair the laptops we sell',
                brandVoice: 'Plain-spoken',
            },
            humanInputs: {
                customerPainPoints: 'Battery life',
                frequentQuestions: 'How much RAM do I need?',
                successStory: 'A student saved $300',
            },
        });
    });

    it('should default the business and human fields to empty', async () => {
        const request = await parseRunOnceArgs(['-t', 'home composting', '-c', 'gardening']);

        expect(request.topic).toBe('home composting');
        expect(request.targetCommunities).toEqual(['gardening']);
        expect(request.businessContext).toEqual({
            industry: '',
            targetAudience: '',
            businessType: '',
            contentGoal: '',
            uniqueValueProp: '',
            brandVoice: '',
        });
        expect(request.humanInputs).toEqual({
            customerPainPoints: '',
            frequentQuestions: '',
            successStory: '',
        });
    });
});
