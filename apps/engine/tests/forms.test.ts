/**
 * Tests for form parsing
 */

import { InvalidRequestError } from '../src/errors';
import { parseCommunities, parseGenerateForm } from '../src/http/forms';

const FORM = {
    topic: ' best budget laptops ',
    target_communities: 'r/laptops, college',
    industry: 'Retail',
    target_audience: 'Students',
    business_type: 'Computer store',
    content_goal: 'Consultations',
    unique_value_prop: 'We repair what we sell',
    brand_voice: 'Friendly',
    customer_pain_points: 'Battery life',
    frequent_questions: 'How much RAM?',
};

describe('parseCommunities', () => {
    it('should split, trim and strip subreddit prefixes', () => {
        expect(parseCommunities('r/laptops, buildapc ,, /r/college')).toEqual(['laptops', 'buildapc', 'college']);
    });
});

describe('parseGenerateForm', () => {
    it('should build a request context', () => {
        expect(parseGenerateForm(FORM)).toEqual({
            topic: 'best budget laptops',
            targetCommunities: ['laptops', 'college'],
            businessContext: {
                industry: 'Retail',
                targetAudience: 'Students',
                businessType: 'Computer store',
                contentGoal: 'Consultations',
                uniqueValueProp: 'We repair what we sell',
                brandVoice: 'Friendly',
            },
            humanInputs: {
                customerPainPoints: 'Battery life',
                frequentQuestions: 'How much RAM?',
                successStory: '',
            },
        });
    });

    it('should name the missing field', () => {
        const { industry, ...withoutIndustry } = FORM;

        expect(industry).toBe('Retail');
        expect(() => parseGenerateForm(withoutIndustry)).toThrow(new InvalidRequestError('industry'));
    });

    it('should treat whitespace as missing', () => {
        expect(() => parseGenerateForm({ ...FORM, brand_voice: '   ' })).toThrow('Missing required field: brand_voice');
    });

    it('should reject a community list with no names', () => {
        expect(() => parseGenerateForm({ ...FORM, target_communities: ' , ' }))
            .toThrow('Missing required field: target_communities');
    });

    it('should reject a missing body', () => {
        expect(() => parseGenerateForm(undefined)).toThrow('Missing required field: topic');
    });
});
