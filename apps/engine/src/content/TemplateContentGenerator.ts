import { createLogger } from '../logger';
import { GeneratedDocument } from '../pipeline/types';
import { ContentGenerator, createDocument, GenerationInput } from './ContentGenerator';
import { renderTemplate } from './templates';

const logger = createLogger('template-generator');

/**
 * Deterministic markdown generator; needs no upstream service
 */
export class TemplateContentGenerator implements ContentGenerator {
    readonly strategy = 'template';

    async generate(input: GenerationInput): Promise<GeneratedDocument> {
        return this.render(input);
    }

    render(input: GenerationInput): GeneratedDocument {
        const document = createDocument(input.contentType, renderTemplate(input), this.strategy);
        logger.debug('Template document rendered', {
            contentType: document.contentType,
            wordCount: document.wordCount,
        });
        return document;
    }
}
