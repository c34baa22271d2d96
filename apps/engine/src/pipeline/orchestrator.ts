/**
 * Pipeline Orchestrator
 *
 * Runs one request through research, classification, business strategy,
 * E-E-A-T assessment, generation and scoring. Every stage resolves to a Result; a failed stage
 * is replaced by its deterministic default and recorded in systemStatus.
 * After validation, run() never throws.
 */

import { v4 as uuid } from 'uuid';
import { InvalidRequestError, StageError, toStageError } from '../errors';
import { createLogger } from '../logger';
import { GenerationInput } from '../content';
import { buildFallbackKnowledgeGraph } from '../providers/knowledge';
import { buildFallbackInsights } from '../providers/research/fallback';
import { auditContent } from './contentAudit';
import { PluginRegistry } from './registry';
import { err, ok, Result } from './result';
import {
    GeneratedDocument,
    PipelineResult,
    RequestContext,
    StageName,
    SystemStatus,
} from './types';

const logger = createLogger('orchestrator');

/**
 * Run a throwing step and capture the outcome as a Result
 */
async function attempt<T>(step: () => Promise<T>): Promise<Result<T, StageError>> {
    try {
        return ok(await step());
    } catch (error) {
        return err(toStageError(error));
    }
}

/**
 * Run a stage that reports its own Result; a throw folds into the same shape
 */
async function attemptStage<T>(step: () => Promise<Result<T, StageError>>): Promise<Result<T, StageError>> {
    const outcome = await attempt(step);
    return outcome.ok ? outcome.value : outcome;
}

/**
 * Log without letting a logging failure abort the pipeline
 */
function safeLog(level: 'info' | 'warn', message: string, meta: Record<string, unknown>): void {
    try {
        logger.log(level, message, meta);
    } catch (error) {
        process.stderr.write(`${message} ${JSON.stringify(meta)}\n`);
    }
}

/**
 * Reject a request that cannot enter the pipeline
 */
export function validateRequest(request: RequestContext): void {
    if (!request.topic.trim()) {
        throw new InvalidRequestError('topic');
    }
    if (request.targetCommunities.filter(community => community.trim()).length === 0) {
        throw new InvalidRequestError('target_communities');
    }
}

function initialStatus(): SystemStatus {
    return {
        research: { mode: 'live' },
        knowledgeGraph: { mode: 'live' },
        intent: { mode: 'live' },
        journey: { mode: 'live' },
        contentType: { mode: 'live' },
        businessStrategy: { mode: 'live' },
        humanInputPlan: { mode: 'live' },
        eeat: { mode: 'live' },
        generation: { mode: 'live' },
        quality: { mode: 'live' },
    };
}

export class ContentOrchestrator {
    private readonly registry: PluginRegistry;

    constructor(registry: PluginRegistry) {
        this.registry = registry;
    }

    async run(request: RequestContext): Promise<PipelineResult> {
        validateRequest(request);

        const runId = uuid();
        const status = initialStatus();
        const { topic, businessContext, humanInputs } = request;
        const communities = request.targetCommunities.map(community => community.trim()).filter(Boolean);
        const registry = this.registry;

        const fallback = (stage: StageName, error: StageError): void => {
            status[stage] = { mode: 'fallback', reason: error.message };
            safeLog('warn', 'Stage fell back to default', { runId, stage, kind: error.kind, reason: error.message });
        };

        safeLog('info', 'Pipeline started', { runId, topic, communities });

        // Research
        const researchResult = await attempt(() =>
            registry.researchCollector.researchTopic(topic, communities, registry.maxPostsPerCommunity));
        if (!researchResult.ok) fallback('research', researchResult.error);
        const research = researchResult.ok ? researchResult.value : buildFallbackInsights(topic);
        if (researchResult.ok && research.sourceTag === 'fallback') {
            status.research = { mode: 'fallback', reason: `${registry.researchCollector.name} returned fallback insights` };
        }

        const graphResult = await attempt(() => registry.knowledgeGraph.getInsights(topic));
        if (!graphResult.ok) fallback('knowledgeGraph', graphResult.error);
        const knowledgeGraph = graphResult.ok ? graphResult.value : buildFallbackKnowledgeGraph(topic);
        if (graphResult.ok && knowledgeGraph.sourceTag === 'fallback') {
            status.knowledgeGraph = { mode: 'fallback', reason: `${registry.knowledgeGraph.name} returned fallback insights` };
        }

        // Classification
        const intentResult = await attemptStage(() => registry.intentClassifier.run(topic));
        if (!intentResult.ok) fallback('intent', intentResult.error);
        const intent = intentResult.ok ? intentResult.value : registry.intentClassifier.fallback();

        const journeyResult = await attemptStage(() => registry.journeyMapper.run(topic, intent));
        if (!journeyResult.ok) fallback('journey', journeyResult.error);
        const journey = journeyResult.ok ? journeyResult.value : registry.journeyMapper.fallback(intent);

        const typeContext = { topic, intent, research, businessContext };
        const typeResult = await attemptStage(() => registry.contentTypeClassifier.run(typeContext));
        if (!typeResult.ok) fallback('contentType', typeResult.error);
        const contentType = typeResult.ok ? typeResult.value : registry.contentTypeClassifier.fallback(typeContext);

        // Business strategy and the inputs only the business can supply
        const strategyContext = { topic, businessContext, research };
        const strategyResult = await attemptStage(() => registry.businessStrategist.run(strategyContext));
        if (!strategyResult.ok) fallback('businessStrategy', strategyResult.error);
        const businessStrategy = strategyResult.ok ? strategyResult.value : registry.businessStrategist.fallback();

        const planContext = { topic, contentType: contentType.contentType, businessContext, humanInputs };
        const planResult = await attemptStage(() => registry.humanInputIdentifier.run(planContext));
        if (!planResult.ok) fallback('humanInputPlan', planResult.error);
        const humanInputPlan = planResult.ok ? planResult.value : registry.humanInputIdentifier.fallback();

        // E-E-A-T
        const eeatContext = {
            topic,
            contentType: contentType.contentType,
            businessContext,
            humanInputs,
            research,
        };
        const eeatResult = await attemptStage(() => registry.eeatAssessor.run(eeatContext));
        if (!eeatResult.ok) fallback('eeat', eeatResult.error);
        const eeat = eeatResult.ok ? eeatResult.value : registry.eeatAssessor.fallback(eeatContext);

        // Generation
        const input: GenerationInput = {
            topic,
            contentType: contentType.contentType,
            businessContext,
            humanInputs,
            research,
            knowledgeGraph,
            intent,
            journey,
            businessStrategy,
            humanInputPlan,
            eeat,
        };
        const document = await this.generate(input, status, fallback);

        // Scoring
        const audit = auditContent(document.bodyText);
        const qualityContext = { document, audit, topic, businessContext, humanInputs, eeat };
        const qualityResult = await attemptStage(() => registry.qualityScorer.run(qualityContext));
        if (!qualityResult.ok) fallback('quality', qualityResult.error);
        const quality = qualityResult.ok ? qualityResult.value : registry.qualityScorer.fallback(qualityContext);

        safeLog('info', 'Pipeline complete', {
            runId,
            contentType: document.contentType,
            strategy: document.strategy,
            wordCount: document.wordCount,
            eeatScore: eeat.overallScore,
            qualityScore: quality.overallScore,
        });

        return {
            request,
            research,
            knowledgeGraph,
            intent,
            journey,
            contentType,
            businessStrategy,
            humanInputPlan,
            eeat,
            document,
            audit,
            quality,
            systemStatus: status,
        };
    }

    /**
     * Preferred generator first; the template writer for the same type on
     * failure or when no LLM is configured.
     */
    private async generate(
        input: GenerationInput,
        status: SystemStatus,
        fallback: (stage: StageName, error: StageError) => void
    ): Promise<GeneratedDocument> {
        const preferred = this.registry.contentGenerator;

        if (preferred.strategy === 'template') {
            status.generation = { mode: 'fallback', reason: 'No LLM configured; template writer used' };
            return this.registry.templateGenerator.render(input);
        }

        const result = await attempt(() => preferred.generate(input));
        if (result.ok && result.value.bodyText.trim()) {
            return result.value;
        }

        fallback('generation', result.ok
            ? { kind: 'malformed_response', message: 'LLM returned empty content' }
            : result.error);
        return this.registry.templateGenerator.render(input);
    }
}
