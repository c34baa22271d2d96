/**
 * Command-line options for a single pipeline run
 */

import yargs from 'yargs';
import { parseCommunities } from '../http/forms';
import { RequestContext } from '../pipeline/types';

/**
 * Build the request from already-split arguments (no node or script path)
 */
export async function parseRunOnceArgs(args: string[]): Promise<RequestContext> {
    const argv = await yargs(args)
        .scriptName('run:once')
        .option('topic', {
            alias: 't',
            type: 'string',
            description: 'Topic to write about',
            demandOption: true,
        })
        .option('communities', {
            alias: 'c',
            type: 'string',
            description: 'Comma-separated communities to research',
            demandOption: true,
        })
        .option('industry', { type: 'string', default: '', description: 'Your industry' })
        .option('targetAudience', { type: 'string', default: '', description: 'Who the content is for' })
        .option('businessType', { type: 'string', default: '', description: 'What kind of business you are' })
        .option('contentGoal', { type: 'string', default: '', description: 'What the content should achieve' })
        .option('uniqueValueProp', { type: 'string', default: '', description: 'What sets you apart' })
        .option('brandVoice', { type: 'string', default: '', description: 'How you sound' })
        .option('painPoints', { type: 'string', default: '', description: 'Customer pain points, one per line' })
        .option('questions', { type: 'string', default: '', description: 'Questions customers ask, one per line' })
        .option('successStory', { type: 'string', default: '', description: 'A customer success story' })
        .help()
        .parse();

    return {
        topic: argv.topic,
        targetCommunities: parseCommunities(argv.communities),
        businessContext: {
            industry: argv.industry,
            targetAudience: argv.targetAudience,
            businessType: argv.businessType,
            contentGoal: argv.contentGoal,
            uniqueValueProp: argv.uniqueValueProp,
            brandVoice: argv.brandVoice,
        },
        humanInputs: {
            customerPainPoints: argv.painPoints,
            frequentQuestions: argv.questions,
            successStory: argv.successStory,
        },
    };
}
