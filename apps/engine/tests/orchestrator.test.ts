/**
 * Tests for the plugin registry and pipeline orchestrator
 */

import config, { AppConfig } from '../src/config';
import { IntentClassifier } from '../src/agents';
import { InvalidRequestError, StageError } from '../src/errors';
import { JSON_SYSTEM_PROMPT, UnconfiguredAiProvider } from '../src/providers/ai';
import { buildFallbackInsights } from '../src/providers/research/fallback';
import { SocialResearchCollector } from '../src/providers/research/SocialResearchCollector';
import { ContentOrchestrator, validateRequest } from '../src/pipeline/orchestrator';
import { buildRegistry, pluginCounts } from '../src/pipeline/registry';
import { Result } from '../src/pipeline/result';
import { IntentRecord } from '../src/pipeline/types';
import {
    emptyRequest,
    FailingAiProvider,
    healthyResponder,
    LLM_ARTICLE,
    registryWith,
    sampleRequest,
    ScriptedAiProvider,
} from './helpers';

class ThrowingIntentClassifier extends IntentClassifier {
    async run(): Promise<Result<IntentRecord, StageError>> {
        throw new TypeError('intent stage blew up');
    }
}

function offlineConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        ...config,
        ai: { ...config.ai, provider: 'anthropic' },
        anthropic: { ...config.anthropic, apiKey: '' },
        reddit: { ...config.reddit, clientId: '', clientSecret: '' },
        knowledgeGraph: { ...config.knowledgeGraph, url: '' },
        ...overrides,
    };
}

describe('registry', () => {
    it('should mark every component as fallback without credentials', () => {
        const registry = buildRegistry(offlineConfig());

        expect(registry.components).toEqual({
            llm: { mode: 'fallback', reason: 'Anthropic API key missing' },
            research: { mode: 'fallback', reason: 'Reddit credentials missing' },
            knowledgeGraph: { mode: 'fallback', reason: 'Knowledge graph URL not set' },
            contentGenerator: { mode: 'fallback', reason: 'Template writer only' },
        });
        expect(pluginCounts(registry)).toEqual({ loaded: 0, failed: 4 });
        expect(registry.contentGenerator.strategy).toBe('template');
    });

    it('should enable live components when credentials are present', () => {
        const registry = buildRegistry(offlineConfig({
            reddit: { ...config.reddit, clientId: 'test-client', clientSecret: 'test-secret' },
            knowledgeGraph: { ...config.knowledgeGraph, url: 'https://graph.test/insights' },
        }));

        expect(registry.components.research).toEqual({ mode: 'enhanced', reason: 'RedditResearch active' });
        expect(registry.components.knowledgeGraph).toEqual({ mode: 'enhanced', reason: 'KnowledgeGraphApi active' });
        expect(pluginCounts(registry)).toEqual({ loaded: 2, failed: 2 });
    });

    it('should prefer the LLM writer when a provider is configured', () => {
        const registry = registryWith(new ScriptedAiProvider(healthyResponder));

        expect(registry.contentGenerator.strategy).toBe('llm');
        expect(registry.components.llm).toEqual({ mode: 'enhanced', reason: 'Scripted configured' });
        expect(registry.components.contentGenerator.mode).toBe('enhanced');
    });
});

describe('validateRequest', () => {
    it('should reject a blank topic', () => {
        expect(() => validateRequest(emptyRequest('   '))).toThrow(new InvalidRequestError('topic'));
    });

    it('should reject a request without communities', () => {
        const request = { ...emptyRequest('laptops'), targetCommunities: ['', '  '] };

        expect(() => validateRequest(request)).toThrow('Missing required field: target_communities');
    });
});

describe('ContentOrchestrator', () => {
    it('should complete with every stage on its fallback when nothing is configured', async () => {
        const orchestrator = new ContentOrchestrator(registryWith(new UnconfiguredAiProvider('Anthropic')));
        const request = sampleRequest();

        const result = await orchestrator.run(request);

        expect(result.request).toEqual(request);
        expect(result.research).toEqual(buildFallbackInsights(request.topic));
        expect(result.intent.primaryIntent).toBe('informational');
        expect(result.contentType.contentType).toBe('listicle');
        expect(result.document.strategy).toBe('template');
        expect(result.document.contentType).toBe('listicle');
        expect(result.document.bodyText.startsWith('# 7 Things to Know About best budget laptops for college students')).toBe(true);
        expect(result.eeat.isYMYL).toBe(false);
        expect(result.quality.performancePrediction).toBe('Above average');
        expect(result.quality.overallScore).toBeGreaterThanOrEqual(0);
        expect(result.quality.overallScore).toBeLessThanOrEqual(10);
        expect(result.systemStatus).toEqual({
            research: { mode: 'fallback', reason: 'FallbackResearch returned fallback insights' },
            knowledgeGraph: { mode: 'fallback', reason: 'FallbackKnowledgeGraph returned fallback insights' },
            intent: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
            journey: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
            contentType: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
            businessStrategy: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
            humanInputPlan: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
            eeat: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
            generation: { mode: 'fallback', reason: 'No LLM configured; template writer used' },
            quality: { mode: 'fallback', reason: 'Anthropic unavailable: no API key configured' },
        });
    });

    it('should produce identical results for identical offline runs', async () => {
        const orchestrator = new ContentOrchestrator(registryWith(new UnconfiguredAiProvider('Anthropic')));

        const first = await orchestrator.run(sampleRequest());
        const second = await orchestrator.run(sampleRequest());

        expect(second).toEqual(first);
    });

    it('should use live agent output when the LLM answers', async () => {
        const provider = new ScriptedAiProvider(healthyResponder);
        const orchestrator = new ContentOrchestrator(registryWith(provider));

        const result = await orchestrator.run(sampleRequest());

        expect(result.intent.recommendedContentType).toBe('listicle');
        expect(result.journey.keyPainPoints).toEqual(['Too many models']);
        expect(result.contentType).toEqual({
            contentType: 'listicle',
            reasoning: 'Readers want a ranked shortlist.',
            alternatives: ['comparison'],
        });
        expect(result.eeat.overallScore).toBe(8);
        expect(result.document).toEqual({
            contentType: 'listicle',
            bodyText: LLM_ARTICLE,
            wordCount: 7,
            strategy: 'llm',
        });
        expect(result.audit.headingCount).toBe(1);
        expect(result.quality.overallScore).toBe(7.4);
        expect(result.systemStatus.intent).toEqual({ mode: 'live' });
        expect(result.systemStatus.generation).toEqual({ mode: 'live' });
        expect(result.systemStatus.quality).toEqual({ mode: 'live' });
        expect(result.systemStatus.research.mode).toBe('fallback');
        expect(result.businessStrategy.contentAngle).toBe('Repair technicians ranking laptops by how long they last');
        expect(result.humanInputPlan.requiredInputs).toEqual([{
            category: 'current_data',
            reasoning: 'Prices change weekly',
            questions: ['What are this week\'s prices?'],
            priority: 'critical',
            impact: 'Keeps recommendations accurate',
        }]);
        expect(result.systemStatus.businessStrategy).toEqual({ mode: 'live' });
        expect(result.systemStatus.humanInputPlan).toEqual({ mode: 'live' });
        expect(provider.calls).toHaveLength(8);
    });

    it('should fall back to the template when the LLM writer fails', async () => {
        const orchestrator = new ContentOrchestrator(registryWith(new FailingAiProvider()));

        const result = await orchestrator.run(sampleRequest());

        expect(result.document.strategy).toBe('template');
        expect(result.systemStatus.generation).toEqual({
            mode: 'fallback',
            reason: 'Failing unavailable: connection refused',
        });
        expect(result.systemStatus.eeat.mode).toBe('fallback');
    });

    it('should return the documented defaults for empty inputs and a failing LLM', async () => {
        const registry = registryWith(new FailingAiProvider());
        const orchestrator = new ContentOrchestrator(registry);

        const result = await orchestrator.run(emptyRequest('home composting'));

        expect(result.intent).toEqual(registry.intentClassifier.fallback());
        expect(result.journey).toEqual(registry.journeyMapper.fallback(result.intent));
        expect(result.document.strategy).toBe('template');
        expect(result.document.wordCount).toBeGreaterThan(0);
        expect(result.eeat.overallScore).toBeGreaterThanOrEqual(0);
        expect(result.eeat.overallScore).toBeLessThanOrEqual(10);
    });

    it('should fall back to the template on an empty article', async () => {
        const provider = new ScriptedAiProvider((prompt, options) =>
            options.systemPrompt === JSON_SYSTEM_PROMPT ? healthyResponder(prompt, options) : '  ');
        const orchestrator = new ContentOrchestrator(registryWith(provider));

        const result = await orchestrator.run(sampleRequest());

        expect(result.document.strategy).toBe('template');
        expect(result.document.contentType).toBe('listicle');
        expect(result.systemStatus.generation).toEqual({
            mode: 'fallback',
            reason: 'Scripted unavailable: empty completion',
        });
        expect(result.systemStatus.contentType).toEqual({ mode: 'live' });
        expect(result.document.bodyText).toContain('## Why You Can Trust This Guide\n\n- Ten years of repair records');
    });

    it('should survive a research collector that throws', async () => {
        const broken: SocialResearchCollector = {
            name: 'Broken',
            mode: 'live',
            researchTopic: async () => {
                throw new Error('socket hang up');
            },
        };
        const orchestrator = new ContentOrchestrator(registryWith(new UnconfiguredAiProvider('Anthropic'), broken));

        const result = await orchestrator.run(emptyRequest('gardening'));

        expect(result.systemStatus.research).toEqual({ mode: 'fallback', reason: 'socket hang up' });
        expect(result.research).toEqual(buildFallbackInsights('gardening'));
    });

    it('should fall back when an agent throws instead of returning a result', async () => {
        const registry = registryWith(new ScriptedAiProvider(healthyResponder));
        const orchestrator = new ContentOrchestrator({
            ...registry,
            intentClassifier: new ThrowingIntentClassifier(registry.gateway),
        });

        const result = await orchestrator.run(sampleRequest());

        expect(result.systemStatus.intent).toEqual({ mode: 'fallback', reason: 'intent stage blew up' });
        expect(result.intent).toEqual(registry.intentClassifier.fallback());
        expect(result.systemStatus.journey).toEqual({ mode: 'live' });
        expect(result.document.strategy).toBe('llm');
    });

    it('should trim communities before research', async () => {
        const seen: string[][] = [];
        const recording: SocialResearchCollector = {
            name: 'Recording',
            mode: 'live',
            researchTopic: async (topic, communities) => {
                seen.push(communities);
                return buildFallbackInsights(topic);
            },
        };
        const orchestrator = new ContentOrchestrator(registryWith(new UnconfiguredAiProvider('Anthropic'), recording));

        await orchestrator.run({ ...emptyRequest('gardening'), targetCommunities: [' gardening ', '', 'plants'] });

        expect(seen).toEqual([['gardening', 'plants']]);
    });

    it('should reject invalid requests before any stage runs', async () => {
        const provider = new ScriptedAiProvider(healthyResponder);
        const orchestrator = new ContentOrchestrator(registryWith(provider));

        await expect(orchestrator.run(emptyRequest(''))).rejects.toBeInstanceOf(InvalidRequestError);
        expect(provider.calls).toHaveLength(0);
    });
});
