/**
 * Run Once CLI
 *
 * Run a single pipeline pass for one topic and print the document.
 *
 * Usage: npm run run:once -- --topic "<topic>" --communities "<community,community>" [--industry ...]
 */

import { hideBin } from 'yargs/helpers';
import config, { validateConfig } from '../config';
import { InvalidRequestError } from '../errors';
import { createLogger } from '../logger';
import { ContentOrchestrator } from '../pipeline/orchestrator';
import { buildRegistry } from '../pipeline/registry';
import { parseRunOnceArgs } from './runOnceArgs';

const logger = createLogger('run-once');

async function main(): Promise<void> {
    const request = await parseRunOnceArgs(hideBin(process.argv));

    logger.info('Starting single pipeline run', { topic: request.topic });

    for (const warning of validateConfig()) {
        logger.warn(warning);
    }

    try {
        const orchestrator = new ContentOrchestrator(buildRegistry(config));
        const result = await orchestrator.run(request);

        process.stdout.write(result.document.bodyText);

        logger.info('Pipeline run completed', {
            contentType: result.document.contentType,
            strategy: result.document.strategy,
            wordCount: result.document.wordCount,
            eeatScore: result.eeat.overallScore,
            qualityScore: result.quality.overallScore,
            requiredInputs: result.humanInputPlan.requiredInputs.length,
            systemStatus: result.systemStatus,
        });
    } catch (error) {
        if (error instanceof InvalidRequestError) {
            logger.error('Invalid request', { field: error.field, error: error.message });
        } else {
            logger.error('Pipeline run failed', {
                error: error instanceof Error ? error.message : 'Unknown error',
            });
        }
        process.exit(1);
    }
}

main()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
