/**
 * Quality Scorer
 *
 * Rates a generated document against a six-factor rubric, or estimates
 * the score from structure and human inputs when the LLM is unavailable.
 */

import { z } from 'zod';
import { StageError } from '../errors';
import { LlmGateway, QUALITY_PROMPT } from '../providers/ai';
import { err, ok, Result } from '../pipeline/result';
import {
    BusinessContext,
    ContentAudit,
    EEATAssessment,
    GeneratedDocument,
    HumanInputs,
    QUALITY_FACTORS,
    QualityAssessment,
    QualityFactor,
} from '../pipeline/types';
import { clampScore, requestStructured } from './structured';

export const QUALITY_FACTOR_WEIGHTS: Record<QualityFactor, number> = {
    authenticity: 0.25,
    emotional_connection: 0.20,
    industry_insight: 0.20,
    accuracy: 0.15,
    originality: 0.10,
    contextual_relevance: 0.10,
};

const DEFAULT_IMPROVEMENTS = [
    'Add human experience and insights',
    'Include real customer stories',
    'Verify all factual claims',
];

export interface QualityContext {
    document: GeneratedDocument;
    audit: ContentAudit;
    topic: string;
    businessContext: BusinessContext;
    humanInputs: HumanInputs;
    eeat: EEATAssessment;
}

// Accepts either a bare number or { "score": n }
const factorScore = z.union([
    z.coerce.number().finite(),
    z.object({ score: z.coerce.number().finite() }).transform(value => value.score),
]).transform(value => clampScore(value));

const qualitySchema = z.object({
    quality_scores: z.object({
        authenticity: factorScore,
        emotional_connection: factorScore,
        industry_insight: factorScore,
        accuracy: factorScore,
        originality: factorScore,
        contextual_relevance: factorScore,
    }),
    performance_prediction: z.string().default('Not estimated'),
    traffic_multiplier_estimate: z.string().default('Not estimated'),
    critical_improvements: z.array(z.string()).default([]),
});

export function hasHumanInputs(inputs: HumanInputs): boolean {
    return [inputs.customerPainPoints, inputs.frequentQuestions, inputs.successStory]
        .some(value => value.trim().length > 0);
}

/**
 * Weighted mean of the factor scores, clamped to [0, 10]
 */
export function weightedQualityScore(scores: Record<QualityFactor, number>): number {
    const total = QUALITY_FACTORS.reduce(
        (sum, factor) => sum + scores[factor] * QUALITY_FACTOR_WEIGHTS[factor],
        0
    );
    return clampScore(total);
}

/**
 * Base 7 with human inputs, else 4; bonuses for length and structure; cap 10
 */
export function heuristicQualityScore(document: GeneratedDocument, audit: ContentAudit, withHumanInputs: boolean): number {
    let score = withHumanInputs ? 7 : 4;

    if (document.wordCount > 1500) score += 1;
    if (document.wordCount > 2500) score += 0.7;
    if (audit.headingCount >= 5) score += 0.5;
    if (audit.headingCount >= 10) score += 0.3;

    return clampScore(score);
}

export class QualityScorer {
    private readonly gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async run(context: QualityContext): Promise<Result<QualityAssessment, StageError>> {
        const prompt = QUALITY_PROMPT(
            context.document,
            context.topic,
            context.businessContext,
            context.humanInputs,
            context.eeat
        );

        const result = await requestStructured(this.gateway, 'quality', prompt, qualitySchema);
        if (!result.ok) {
            return err(result.error);
        }

        const factorScores = result.value.quality_scores;
        return ok({
            overallScore: weightedQualityScore(factorScores),
            factorScores,
            performancePrediction: result.value.performance_prediction,
            trafficMultiplierEstimate: result.value.traffic_multiplier_estimate,
            criticalImprovements: result.value.critical_improvements,
        });
    }

    fallback(context: QualityContext): QualityAssessment {
        const withHumanInputs = hasHumanInputs(context.humanInputs);
        const overallScore = heuristicQualityScore(context.document, context.audit, withHumanInputs);

        return {
            overallScore,
            factorScores: {
                authenticity: overallScore,
                emotional_connection: overallScore,
                industry_insight: overallScore,
                accuracy: overallScore,
                originality: overallScore,
                contextual_relevance: overallScore,
            },
            performancePrediction: withHumanInputs ? 'Above average' : 'Below average',
            trafficMultiplierEstimate: withHumanInputs ? '3-5x improvement' : 'Baseline AI performance',
            criticalImprovements: [...context.audit.issues, ...DEFAULT_IMPROVEMENTS].slice(0, 3),
        };
    }

    async score(context: QualityContext): Promise<QualityAssessment> {
        const result = await this.run(context);
        return result.ok ? result.value : this.fallback(context);
    }
}
