/**
 * Content Generator Interface
 *
 * Two interchangeable strategies produce a document for a content type:
 * a deterministic template renderer and an LLM-backed writer.
 */

import {
    BusinessContext,
    BusinessStrategy,
    ContentType,
    EEATAssessment,
    GeneratedDocument,
    GenerationStrategy,
    HumanInputPlan,
    HumanInputs,
    IntentRecord,
    JourneyRecord,
    KnowledgeGraphInsights,
    ResearchInsights,
} from '../pipeline/types';

/**
 * Everything a generator may draw on
 */
export interface GenerationInput {
    topic: string;
    contentType: ContentType;
    businessContext: BusinessContext;
    humanInputs: HumanInputs;
    research: ResearchInsights;
    knowledgeGraph: KnowledgeGraphInsights;
    intent: IntentRecord;
    journey: JourneyRecord;
    businessStrategy: BusinessStrategy;
    humanInputPlan: HumanInputPlan;
    eeat: EEATAssessment;
}

export interface ContentGenerator {
    readonly strategy: GenerationStrategy;

    generate(input: GenerationInput): Promise<GeneratedDocument>;
}

/**
 * Whitespace-delimited token count
 */
export function countWords(text: string): number {
    return text.split(/\s+/).filter(token => token.length > 0).length;
}

export function createDocument(
    contentType: ContentType,
    bodyText: string,
    strategy: GenerationStrategy
): GeneratedDocument {
    return {
        contentType,
        bodyText,
        wordCount: countWords(bodyText),
        strategy,
    };
}
