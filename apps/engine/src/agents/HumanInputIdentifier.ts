import { z } from 'zod';
import { StageError } from '../errors';
import { HUMAN_INPUT_PROMPT, LlmGateway } from '../providers/ai';
import { Result } from '../pipeline/result';
import {
    BusinessContext,
    ContentType,
    HumanInputPlan,
    HumanInputs,
    INPUT_PRIORITIES,
} from '../pipeline/types';
import { requestStructured } from './structured';

const requiredInputSchema = z.object({
    category: z.string().trim().min(1),
    reasoning: z.string().default(''),
    questions: z.array(z.string()).default([]),
    // Unknown priorities are treated as the middle tier
    priority: z.string()
        .transform(value => value.trim().toLowerCase())
        .pipe(z.enum(INPUT_PRIORITIES))
        .catch('important'),
    impact: z.string().default(''),
});

const planSchema = z.object({
    required_inputs: z.array(requiredInputSchema),
    ai_can_handle: z.array(z.string()).default([]),
    collaboration_points: z.array(z.string()).default([]),
}).transform((record): HumanInputPlan => ({
    requiredInputs: record.required_inputs,
    aiCanHandle: record.ai_can_handle,
    collaborationPoints: record.collaboration_points,
}));

export interface InputPlanContext {
    topic: string;
    contentType: ContentType;
    businessContext: BusinessContext;
    humanInputs: HumanInputs;
}

/**
 * Finds the parts of a piece that need a person at the business
 */
export class HumanInputIdentifier {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(context: InputPlanContext): Promise<Result<HumanInputPlan, StageError>> {
        return requestStructured(
            this.gateway,
            'human input plan',
            HUMAN_INPUT_PROMPT(context.topic, context.contentType, context.businessContext, context.humanInputs),
            planSchema
        );
    }

    fallback(): HumanInputPlan {
        return { requiredInputs: [], aiCanHandle: [], collaborationPoints: [] };
    }
}
