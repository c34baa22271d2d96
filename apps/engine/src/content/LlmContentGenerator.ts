import { createLogger } from '../logger';
import { CONTENT_MAX_TOKENS, CONTENT_PROMPT, LlmGateway } from '../providers/ai';
import { GeneratedDocument } from '../pipeline/types';
import { ContentGenerator, createDocument, GenerationInput } from './ContentGenerator';

const logger = createLogger('llm-generator');

/**
 * LLM-backed generator. The completion is kept verbatim as the body.
 * Gateway failures propagate to the caller.
 */
export class LlmContentGenerator implements ContentGenerator {
    readonly strategy = 'llm';
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async generate(input: GenerationInput): Promise<GeneratedDocument> {
        logger.info('Generating content', {
            topic: input.topic,
            contentType: input.contentType,
        });

        const bodyText = await this.gateway.generateText(
            CONTENT_PROMPT(input),
            CONTENT_MAX_TOKENS[input.contentType]
        );

        const document = createDocument(input.contentType, bodyText, this.strategy);
        logger.info('Content generated', { wordCount: document.wordCount });
        return document;
    }
}
