/**
 * Plugin Registry
 *
 * Built once at startup. Chooses live or fallback implementations by
 * credential presence and records which one each component got.
 */

import config, { AppConfig } from '../config';
import { createLogger } from '../logger';
import {
    BusinessStrategist,
    ContentTypeClassifier,
    EeatAssessor,
    HumanInputIdentifier,
    IntentClassifier,
    JourneyMapper,
    QualityScorer,
} from '../agents';
import { ContentGenerator, LlmContentGenerator, TemplateContentGenerator } from '../content';
import { AiProvider, createAiProvider, LlmGateway } from '../providers/ai';
import {
    FallbackKnowledgeGraphProvider,
    HttpKnowledgeGraphProvider,
    KnowledgeGraphProvider,
} from '../providers/knowledge';
import {
    FallbackResearchCollector,
    RedditClient,
    RedditResearchCollector,
    SocialResearchCollector,
} from '../providers/research';

const logger = createLogger('registry');

export type ComponentName = 'llm' | 'research' | 'knowledgeGraph' | 'contentGenerator';

export interface ComponentStatus {
    mode: 'enhanced' | 'fallback';
    reason: string;
}

export interface PluginRegistry {
    readonly gateway: LlmGateway;
    readonly researchCollector: SocialResearchCollector;
    readonly knowledgeGraph: KnowledgeGraphProvider;
    readonly intentClassifier: IntentClassifier;
    readonly journeyMapper: JourneyMapper;
    readonly contentTypeClassifier: ContentTypeClassifier;
    readonly businessStrategist: BusinessStrategist;
    readonly humanInputIdentifier: HumanInputIdentifier;
    readonly eeatAssessor: EeatAssessor;
    readonly qualityScorer: QualityScorer;
    /** Preferred generator: the LLM writer when configured, else the template */
    readonly contentGenerator: ContentGenerator;
    readonly templateGenerator: TemplateContentGenerator;
    readonly maxPostsPerCommunity: number;
    readonly components: Record<ComponentName, ComponentStatus>;
}

/**
 * Already-constructed upstream components
 */
export interface RegistryParts {
    aiProvider: AiProvider;
    researchCollector: SocialResearchCollector;
    knowledgeGraph: KnowledgeGraphProvider;
    maxPostsPerCommunity: number;
}

/**
 * Wire agents and generators around the given upstream components
 */
export function assembleRegistry(parts: RegistryParts): PluginRegistry {
    const gateway = new LlmGateway(parts.aiProvider);
    const llmReady = gateway.isConfigured();
    const templateGenerator = new TemplateContentGenerator();

    const components: Record<ComponentName, ComponentStatus> = {
        llm: llmReady
            ? { mode: 'enhanced', reason: `${gateway.providerName} configured` }
            : { mode: 'fallback', reason: `${gateway.providerName} API key missing` },
        research: parts.researchCollector.mode === 'live'
            ? { mode: 'enhanced', reason: `${parts.researchCollector.name} active` }
            : { mode: 'fallback', reason: 'Reddit credentials missing' },
        knowledgeGraph: parts.knowledgeGraph.mode === 'live'
            ? { mode: 'enhanced', reason: `${parts.knowledgeGraph.name} active` }
            : { mode: 'fallback', reason: 'Knowledge graph URL not set' },
        contentGenerator: llmReady
            ? { mode: 'enhanced', reason: 'LLM writer with template fallback' }
            : { mode: 'fallback', reason: 'Template writer only' },
    };

    return {
        gateway,
        researchCollector: parts.researchCollector,
        knowledgeGraph: parts.knowledgeGraph,
        intentClassifier: new IntentClassifier(gateway),
        journeyMapper: new JourneyMapper(gateway),
        contentTypeClassifier: new ContentTypeClassifier(gateway),
        businessStrategist: new BusinessStrategist(gateway),
        humanInputIdentifier: new HumanInputIdentifier(gateway),
        eeatAssessor: new EeatAssessor(gateway),
        qualityScorer: new QualityScorer(gateway),
        contentGenerator: llmReady ? new LlmContentGenerator(gateway) : templateGenerator,
        templateGenerator,
        maxPostsPerCommunity: parts.maxPostsPerCommunity,
        components,
    };
}

/**
 * Build the registry from application configuration
 */
export function buildRegistry(cfg: AppConfig = config): PluginRegistry {
    const redditClient = new RedditClient({
        clientId: cfg.reddit.clientId,
        clientSecret: cfg.reddit.clientSecret,
        userAgent: cfg.reddit.userAgent,
        timeoutMs: cfg.reddit.timeoutMs,
    });

    const researchCollector: SocialResearchCollector = redditClient.isConfigured()
        ? new RedditResearchCollector(redditClient, { requestDelayMs: cfg.reddit.requestDelayMs })
        : new FallbackResearchCollector();

    const knowledgeGraph: KnowledgeGraphProvider = cfg.knowledgeGraph.url
        ? new HttpKnowledgeGraphProvider({ ...cfg.knowledgeGraph })
        : new FallbackKnowledgeGraphProvider();

    const registry = assembleRegistry({
        aiProvider: createAiProvider(cfg),
        researchCollector,
        knowledgeGraph,
        maxPostsPerCommunity: cfg.reddit.maxPostsPerCommunity,
    });

    const { loaded, failed } = pluginCounts(registry);
    logger.info('Plugin registry built', { loaded, failed });

    return registry;
}

/**
 * Enhanced components count as loaded, fallbacks as failed
 */
export function pluginCounts(registry: PluginRegistry): { loaded: number; failed: number } {
    const statuses = Object.values(registry.components);
    const loaded = statuses.filter(status => status.mode === 'enhanced').length;
    return { loaded, failed: statuses.length - loaded };
}
