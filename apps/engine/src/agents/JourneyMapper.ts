import { z } from 'zod';
import { StageError } from '../errors';
import { JOURNEY_PROMPT, LlmGateway } from '../providers/ai';
import { Result } from '../pipeline/result';
import { IntentRecord, JourneyRecord, SEARCH_STAGES } from '../pipeline/types';
import { requestStructured } from './structured';

const nonEmptyStrings = z.array(z.string().trim().min(1)).min(1);

function journeySchema(intent: IntentRecord) {
    return z.object({
        // Stages outside the funnel fall back to the intent's stage
        primary_stage: z.string()
            .transform(value => value.trim().toLowerCase())
            .pipe(z.enum(SEARCH_STAGES))
            .catch(intent.searchStage),
        key_pain_points: nonEmptyStrings,
        emotional_triggers: nonEmptyStrings,
        content_opportunities: z.array(z.string()).default([]),
    }).transform((record): JourneyRecord => ({
        primaryStage: record.primary_stage,
        keyPainPoints: record.key_pain_points,
        emotionalTriggers: record.emotional_triggers,
        contentOpportunities: record.content_opportunities,
    }));
}

/**
 * Maps the customer journey for a topic
 */
export class JourneyMapper {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(topic: string, intent: IntentRecord): Promise<Result<JourneyRecord, StageError>> {
        return requestStructured(
            this.gateway,
            'journey',
            JOURNEY_PROMPT(topic, intent),
            journeySchema(intent)
        );
    }

    fallback(intent: IntentRecord): JourneyRecord {
        return {
            primaryStage: intent.searchStage,
            keyPainPoints: ['Information gaps'],
            emotionalTriggers: ['Curiosity'],
            contentOpportunities: ['Educational content'],
        };
    }

    async map(topic: string, intent: IntentRecord): Promise<JourneyRecord> {
        const result = await this.run(topic, intent);
        return result.ok ? result.value : this.fallback(intent);
    }
}
