import { z } from 'zod';
import { StageError } from '../errors';
import { CONTENT_TYPE_PROMPT, LlmGateway } from '../providers/ai';
import { Result } from '../pipeline/result';
import { normalizeContentTypeName, recommendContentType } from '../pipeline/topicScore';
import {
    BusinessContext,
    CONTENT_TYPES,
    ContentType,
    ContentTypeRecord,
    IntentRecord,
    ResearchInsights,
} from '../pipeline/types';
import { contentTypeField } from './IntentClassifier';
import { requestStructured } from './structured';

const knownTypes = new Set<string>(CONTENT_TYPES);

function isContentType(value: string): value is ContentType {
    return knownTypes.has(value);
}

const contentTypeSchema = z.object({
    content_type: contentTypeField,
    reasoning: z.string().default(''),
    // Unknown alternatives are dropped rather than failing the record
    alternatives: z.array(z.string()).default([]),
}).transform((record): ContentTypeRecord => ({
    contentType: record.content_type,
    reasoning: record.reasoning,
    alternatives: [...new Set(record.alternatives.map(normalizeContentTypeName))]
        .filter(isContentType)
        .filter(contentType => contentType !== record.content_type),
}));

export interface ContentTypeContext {
    topic: string;
    intent: IntentRecord;
    research: ResearchInsights;
    businessContext: BusinessContext;
}

/**
 * Chooses the content format to generate
 */
export class ContentTypeClassifier {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(context: ContentTypeContext): Promise<Result<ContentTypeRecord, StageError>> {
        const prompt = CONTENT_TYPE_PROMPT(
            context.topic,
            context.intent,
            context.research,
            context.businessContext
        );
        return requestStructured(this.gateway, 'content type', prompt, contentTypeSchema);
    }

    /**
     * Keyword scoring of the topic, with the intent's recommendation as tie-breaker
     */
    fallback(context: ContentTypeContext): ContentTypeRecord {
        return recommendContentType(context.topic, context.intent.recommendedContentType);
    }

    async classify(context: ContentTypeContext): Promise<ContentTypeRecord> {
        const result = await this.run(context);
        return result.ok ? result.value : this.fallback(context);
    }
}
