import { z } from 'zod';
import { StageError } from '../errors';
import { BUSINESS_STRATEGY_PROMPT, LlmGateway } from '../providers/ai';
import { Result } from '../pipeline/result';
import { BusinessContext, BusinessStrategy, ResearchInsights } from '../pipeline/types';
import { requestStructured } from './structured';

const strings = z.array(z.string().trim().min(1)).default([]);

const strategySchema = z.object({
    content_angle: z.string().trim().min(1),
    key_differentiators: strings,
    audience_insights: z.object({
        primary_motivations: strings,
        preferred_communication_style: z.string().trim().default(''),
        decision_factors: strings,
    }).default({}),
    competitive_advantages: strings,
    content_hooks: strings,
    trust_signals: strings,
    customization_opportunities: strings,
}).transform((record): BusinessStrategy => ({
    contentAngle: record.content_angle,
    keyDifferentiators: record.key_differentiators,
    audienceInsights: {
        primaryMotivations: record.audience_insights.primary_motivations,
        preferredCommunicationStyle: record.audience_insights.preferred_communication_style,
        decisionFactors: record.audience_insights.decision_factors,
    },
    competitiveAdvantages: record.competitive_advantages,
    contentHooks: record.content_hooks,
    trustSignals: record.trust_signals,
    customizationOpportunities: record.customization_opportunities,
}));

export interface StrategyContext {
    topic: string;
    businessContext: BusinessContext;
    research: ResearchInsights;
}

/**
 * Turns the business context into an angle, hooks and trust signals for the topic
 */
export class BusinessStrategist {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(context: StrategyContext): Promise<Result<BusinessStrategy, StageError>> {
        return requestStructured(
            this.gateway,
            'business strategy',
            BUSINESS_STRATEGY_PROMPT(context.topic, context.businessContext, context.research),
            strategySchema
        );
    }

    fallback(): BusinessStrategy {
        return {
            contentAngle: 'Educational approach based on business context',
            keyDifferentiators: ['Focus on business strengths'],
            audienceInsights: {
                primaryMotivations: ['Learning and problem-solving'],
                preferredCommunicationStyle: 'Clear and helpful',
                decisionFactors: ['Quality and trustworthiness'],
            },
            competitiveAdvantages: ['Unique market positioning'],
            contentHooks: [],
            trustSignals: [],
            customizationOpportunities: [],
        };
    }
}
