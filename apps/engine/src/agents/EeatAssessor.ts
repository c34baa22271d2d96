/**
 * E-E-A-T Assessor
 *
 * Scores Experience, Expertise, Authoritativeness and Trustworthiness of
 * the inputs a piece of content will be built from. The overall score is
 * always the weighted mean of the components, with heavier expertise and
 * trust weighting for YMYL topics.
 */

import { z } from 'zod';
import { StageError } from '../errors';
import { createLogger } from '../logger';
import { EEAT_PROMPT, LlmGateway } from '../providers/ai';
import { err, ok, Result } from '../pipeline/result';
import {
    BusinessContext,
    ContentType,
    EEAT_COMPONENTS,
    EEATAssessment,
    EeatComponentScores,
    HumanInputs,
    ResearchInsights,
} from '../pipeline/types';
import { classifyYmyl, YmylClassification } from '../pipeline/ymyl';
import { clampScore, requestStructured } from './structured';

const logger = createLogger('eeat-assessor');

export const EEAT_WEIGHTS: Record<'standard' | 'ymyl', EeatComponentScores> = {
    standard: {
        experience: 0.20,
        expertise: 0.20,
        authoritativeness: 0.25,
        trustworthiness: 0.35,
    },
    ymyl: {
        experience: 0.15,
        expertise: 0.30,
        authoritativeness: 0.15,
        trustworthiness: 0.40,
    },
};

export interface EeatContext {
    topic: string;
    contentType: ContentType;
    businessContext: BusinessContext;
    humanInputs: HumanInputs;
    research: ResearchInsights;
}

const componentScore = z.coerce.number().finite().transform(value => clampScore(value));

const eeatSchema = z.object({
    component_scores: z.object({
        experience: componentScore,
        expertise: componentScore,
        authoritativeness: componentScore,
        trustworthiness: componentScore,
    }),
    improvement_recommendations: z.array(z.string()).default([]),
});

/**
 * Weighted mean of component scores, rounded to one decimal
 */
export function weightedEeatScore(scores: EeatComponentScores, isYmyl: boolean): number {
    const weights = isYmyl ? EEAT_WEIGHTS.ymyl : EEAT_WEIGHTS.standard;
    const total = EEAT_COMPONENTS.reduce(
        (sum, component) => sum + scores[component] * weights[component],
        0
    );
    return clampScore(total);
}

function present(value: string): boolean {
    return value.trim().length > 0;
}

/**
 * Component scores from the presence and length of the business inputs
 */
export function heuristicEeatScores(
    business: BusinessContext,
    inputs: HumanInputs,
    isYmyl: boolean
): EeatComponentScores {
    const base = isYmyl ? 5.0 : 6.0;
    let experience = base;
    let expertise = base;
    let authoritativeness = base;
    let trustworthiness = base;

    if (present(business.uniqueValueProp)) {
        expertise += 1.0;
        if (business.uniqueValueProp.trim().length > 100) expertise += 0.5;
    }
    if (present(business.industry)) expertise += 1.0;

    if (present(inputs.successStory)) {
        experience += 1.5;
        if (inputs.successStory.trim().length > 200) experience += 0.5;
    }

    if (present(business.businessType)) authoritativeness += 1.0;

    if (present(inputs.frequentQuestions)) trustworthiness += 1.0;
    if (present(inputs.customerPainPoints)) trustworthiness += 0.5;

    return {
        experience: clampScore(experience),
        expertise: clampScore(expertise),
        authoritativeness: clampScore(authoritativeness),
        trustworthiness: clampScore(trustworthiness),
    };
}

function heuristicRecommendations(context: EeatContext, ymyl: YmylClassification): string[] {
    const recommendations: string[] = [];

    if (!present(context.humanInputs.successStory)) {
        recommendations.push('Add a first-hand customer success story to demonstrate experience');
    }
    if (!present(context.businessContext.uniqueValueProp)) {
        recommendations.push('State the unique expertise your business brings to this topic');
    }
    if (ymyl.isYmyl) {
        recommendations.push(`Add author credentials and cite authoritative sources for this ${ymyl.ymylCategory} topic`);
    }
    recommendations.push('Verify every factual claim before publishing');

    return recommendations;
}

export class EeatAssessor {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(context: EeatContext): Promise<Result<EEATAssessment, StageError>> {
        const ymyl = classifyYmyl(context.topic, context.businessContext.industry);
        const prompt = EEAT_PROMPT(
            context.topic,
            context.contentType,
            context.businessContext,
            context.humanInputs,
            context.research,
            ymyl.isYmyl
        );

        const result = await requestStructured(this.gateway, 'eeat', prompt, eeatSchema);
        if (!result.ok) {
            return err(result.error);
        }

        const componentScores = result.value.component_scores;
        const assessment: EEATAssessment = {
            overallScore: weightedEeatScore(componentScores, ymyl.isYmyl),
            componentScores,
            isYMYL: ymyl.isYmyl,
            ymylCategory: ymyl.ymylCategory,
            improvementRecommendations: result.value.improvement_recommendations,
        };

        logger.debug('E-E-A-T assessed', {
            overallScore: assessment.overallScore,
            isYMYL: assessment.isYMYL,
        });

        return ok(assessment);
    }

    /**
     * Heuristic assessment from the inputs alone
     */
    fallback(context: EeatContext): EEATAssessment {
        const ymyl = classifyYmyl(context.topic, context.businessContext.industry);
        const componentScores = heuristicEeatScores(
            context.businessContext,
            context.humanInputs,
            ymyl.isYmyl
        );

        return {
            overallScore: weightedEeatScore(componentScores, ymyl.isYmyl),
            componentScores,
            isYMYL: ymyl.isYmyl,
            ymylCategory: ymyl.ymylCategory,
            improvementRecommendations: heuristicRecommendations(context, ymyl),
        };
    }

    async assess(context: EeatContext): Promise<EEATAssessment> {
        const result = await this.run(context);
        return result.ok ? result.value : this.fallback(context);
    }
}
