import { z } from 'zod';
import { StageError } from '../errors';
import { createLogger } from '../logger';
import { INTENT_PROMPT, LlmGateway } from '../providers/ai';
import { Result } from '../pipeline/result';
import { normalizeContentTypeName } from '../pipeline/topicScore';
import {
    CONTENT_TYPES,
    IntentRecord,
    PRIMARY_INTENTS,
    SEARCH_STAGES,
} from '../pipeline/types';
import { requestStructured } from './structured';

const logger = createLogger('intent-classifier');

export const contentTypeField = z.string()
    .transform(normalizeContentTypeName)
    .pipe(z.enum(CONTENT_TYPES));

const intentSchema = z.object({
    primary_intent: z.string()
        .transform(value => value.trim().toLowerCase())
        .pipe(z.enum(PRIMARY_INTENTS)),
    search_stage: z.string()
        .transform(value => value.trim().toLowerCase())
        .pipe(z.enum(SEARCH_STAGES)),
    target_audience: z.string().min(1),
    user_goals: z.array(z.string()).default([]),
    content_type_recommendation: contentTypeField,
}).transform((record): IntentRecord => ({
    primaryIntent: record.primary_intent,
    searchStage: record.search_stage,
    targetAudience: record.target_audience,
    recommendedContentType: record.content_type_recommendation,
    userGoals: record.user_goals,
}));

/**
 * Classifies the search intent behind a topic
 */
export class IntentClassifier {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(topic: string): Promise<Result<IntentRecord, StageError>> {
        const result = await requestStructured(this.gateway, 'intent', INTENT_PROMPT(topic), intentSchema);
        if (result.ok) {
            logger.debug('Intent classified', {
                primaryIntent: result.value.primaryIntent,
                searchStage: result.value.searchStage,
            });
        }
        return result;
    }

    /**
     * Default used whenever classification fails
     */
    fallback(): IntentRecord {
        return {
            primaryIntent: 'informational',
            searchStage: 'awareness',
            targetAudience: 'general users',
            recommendedContentType: 'blog_post',
            userGoals: ['learn about topic'],
        };
    }

    /**
     * Live classification or the default; never throws
     */
    async classify(topic: string): Promise<IntentRecord> {
        const result = await this.run(topic);
        return result.ok ? result.value : this.fallback();
    }
}
