/**
 * Shared test fixtures: scripted AI providers, an in-process axios
 * adapter and sample requests.
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { GenerationInput } from '../src/content';
import {
    AiProvider,
    GenerationOptions,
    JSON_SYSTEM_PROMPT,
    LlmGateway,
    UnconfiguredAiProvider,
} from '../src/providers/ai';
import { BusinessStrategist, HumanInputIdentifier } from '../src/agents';
import { buildFallbackKnowledgeGraph, FallbackKnowledgeGraphProvider } from '../src/providers/knowledge';
import { buildFallbackInsights } from '../src/providers/research/fallback';
import { FallbackResearchCollector, SocialResearchCollector } from '../src/providers/research/SocialResearchCollector';
import { assembleRegistry, PluginRegistry } from '../src/pipeline/registry';
import { RequestContext } from '../src/pipeline/types';

export interface ProviderCall {
    prompt: string;
    options: GenerationOptions;
}

/**
 * Provider whose completions come from a function of the prompt
 */
export class ScriptedAiProvider implements AiProvider {
    readonly name = 'Scripted';
    readonly calls: ProviderCall[] = [];
    private readonly respond: (prompt: string, options: GenerationOptions) => string;

    constructor(respond: (prompt: string, options: GenerationOptions) => string) {
        this.respond = respond;
    }

    isConfigured(): boolean {
        return true;
    }

    async complete(prompt: string, options?: GenerationOptions): Promise<string> {
        const resolved = options || {};
        this.calls.push({ prompt, options: resolved });
        return this.respond(prompt, resolved);
    }
}

/**
 * Configured provider whose every call fails at the transport level
 */
export class FailingAiProvider implements AiProvider {
    readonly name = 'Failing';
    calls = 0;

    isConfigured(): boolean {
        return true;
    }

    async complete(): Promise<string> {
        this.calls += 1;
        throw new Error('connection refused');
    }
}

export const INTENT_JSON = JSON.stringify({
    primary_intent: 'commercial',
    search_stage: 'consideration',
    target_audience: 'college students',
    user_goals: ['find a reliable laptop'],
    content_type_recommendation: 'listicle',
});

export const JOURNEY_JSON = JSON.stringify({
    primary_stage: 'consideration',
    key_pain_points: ['Too many models'],
    emotional_triggers: ['Fear of overspending'],
    content_opportunities: ['Budget tiers'],
});

export const CONTENT_TYPE_JSON = JSON.stringify({
    content_type: 'listicle',
    reasoning: 'Readers want a ranked shortlist.',
    alternatives: ['comparison'],
});

export const STRATEGY_JSON = JSON.stringify({
    content_angle: 'Repair technicians ranking laptops by how long they last',
    key_differentiators: ['In-house repair bench'],
    audience_insights: {
        primary_motivations: ['Avoid a mid-semester breakdown'],
        preferred_communication_style: 'Direct and practical',
        decision_factors: ['Price', 'Battery life'],
    },
    competitive_advantages: ['Sees failure rates first-hand'],
    content_hooks: ['What breaks first'],
    trust_signals: ['Ten years of repair records'],
    customization_opportunities: ['Local student discount'],
});

export const INPUT_PLAN_JSON = JSON.stringify({
    required_inputs: [{
        category: 'current_data',
        reasoning: 'Prices change weekly',
        questions: ['What are this week\'s prices?'],
        priority: 'Critical',
        impact: 'Keeps recommendations accurate',
    }],
    ai_can_handle: ['General hardware explanations'],
    collaboration_points: ['Review pricing before publishing'],
});

export const EEAT_JSON = JSON.stringify({
    component_scores: {
        experience: 8,
        expertise: 7,
        authoritativeness: 6,
        trustworthiness: 10,
    },
    improvement_recommendations: ['Add technician credentials'],
});

export const QUALITY_JSON = JSON.stringify({
    quality_scores: {
        authenticity: 8,
        emotional_connection: 7,
        industry_insight: 7,
        accuracy: 8,
        originality: 6,
        contextual_relevance: 8,
    },
    performance_prediction: 'Strong',
    traffic_multiplier_estimate: '2-3x',
    critical_improvements: ['Add pricing table'],
});

export const LLM_ARTICLE = '# Best Budget Laptops\n\nShort article body.\n';

/**
 * Answer each structured prompt with a valid record and free text with an article
 */
export function healthyResponder(prompt: string, options: GenerationOptions): string {
    if (options.systemPrompt !== JSON_SYSTEM_PROMPT) return LLM_ARTICLE;
    if (prompt.includes('Analyze the search intent')) return INTENT_JSON;
    if (prompt.includes('Map the customer journey')) return JOURNEY_JSON;
    if (prompt.includes('Choose the best content format')) return CONTENT_TYPE_JSON;
    if (prompt.includes('Analyze this business context')) return STRATEGY_JSON;
    if (prompt.includes('Identify where human input is essential')) return INPUT_PLAN_JSON;
    if (prompt.includes('Assess how well')) return EEAT_JSON;
    if (prompt.includes('Score this')) return QUALITY_JSON;
    return '{}';
}

/**
 * Registry over the given provider with offline research and knowledge graph
 */
export function registryWith(
    aiProvider: AiProvider = new UnconfiguredAiProvider('Anthropic'),
    researchCollector: SocialResearchCollector = new FallbackResearchCollector()
): PluginRegistry {
    return assembleRegistry({
        aiProvider,
        researchCollector,
        knowledgeGraph: new FallbackKnowledgeGraphProvider(),
        maxPostsPerCommunity: 10,
    });
}

export interface RecordedRequest {
    method: string;
    url: string;
    params: Record<string, unknown>;
    data: unknown;
    headers: Record<string, unknown>;
    auth?: { username: string; password: string };
}

export interface FakeReply {
    status: number;
    data: unknown;
}

/**
 * axios instance served by an in-process route function instead of the network.
 * Replies with status >= 400 reject the way axios does.
 */
export function fakeHttp(route: (request: RecordedRequest) => FakeReply): {
    http: AxiosInstance;
    requests: RecordedRequest[];
} {
    const requests: RecordedRequest[] = [];

    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            const request: RecordedRequest = {
                method: (config.method || 'get').toUpperCase(),
                url: config.url || '',
                params: config.params || {},
                // JSON bodies arrive serialized; form bodies stay as strings
                data: typeof config.data === 'string' && config.data.startsWith('{')
                    ? JSON.parse(config.data)
                    : config.data,
                headers: config.headers.toJSON(),
                auth: config.auth,
            };
            requests.push(request);

            const reply = route(request);
            const response: AxiosResponse = {
                data: reply.data,
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
            };

            if (reply.status >= 400) {
                throw new AxiosError(
                    `Request failed with status code ${reply.status}`,
                    AxiosError.ERR_BAD_RESPONSE,
                    config,
                    null,
                    response
                );
            }
            return response;
        },
    });

    return { http, requests };
}

export function sampleRequest(overrides: Partial<RequestContext> = {}): RequestContext {
    return {
        topic: 'best budget laptops for college students',
        targetCommunities: ['laptops', 'college'],
        businessContext: {
            industry: 'Consumer electronics retail',
            targetAudience: 'College students on a budget',
            businessType: 'Independent computer store',
            contentGoal: 'Drive in-store consultations',
            uniqueValueProp: 'We repair the laptops we sell, so we know which ones last.',
            brandVoice: 'Friendly and plain-spoken',
        },
        humanInputs: {
            customerPainPoints: 'Battery life\nToo many specs',
            frequentQuestions: 'How much RAM do I need?\nIs a Chromebook enough?',
            successStory: 'A nursing student saved $300 by picking last year\'s model.',
        },
        ...overrides,
    };
}

export function emptyRequest(topic: string): RequestContext {
    return {
        topic,
        targetCommunities: ['general'],
        businessContext: {
            industry: '',
            targetAudience: '',
            businessType: '',
            contentGoal: '',
            uniqueValueProp: '',
            brandVoice: '',
        },
        humanInputs: {
            customerPainPoints: '',
            frequentQuestions: '',
            successStory: '',
        },
    };
}

/**
 * Generation input assembled from the deterministic fallbacks
 */
export function sampleGenerationInput(overrides: Partial<GenerationInput> = {}): GenerationInput {
    const request = sampleRequest();
    const gateway = new LlmGateway(new UnconfiguredAiProvider('Anthropic'));
    return {
        topic: request.topic,
        contentType: 'comprehensive_guide',
        businessContext: request.businessContext,
        humanInputs: request.humanInputs,
        research: buildFallbackInsights(request.topic),
        knowledgeGraph: buildFallbackKnowledgeGraph(request.topic),
        intent: {
            primaryIntent: 'commercial',
            searchStage: 'consideration',
            targetAudience: 'college students',
            recommendedContentType: 'listicle',
            userGoals: [],
        },
        journey: {
            primaryStage: 'consideration',
            keyPainPoints: ['Too many models'],
            emotionalTriggers: ['Fear of overspending'],
            contentOpportunities: [],
        },
        businessStrategy: new BusinessStrategist(gateway).fallback(),
        humanInputPlan: new HumanInputIdentifier(gateway).fallback(),
        eeat: {
            overallScore: 7,
            componentScores: { experience: 7, expertise: 7, authoritativeness: 7, trustworthiness: 7 },
            isYMYL: false,
            ymylCategory: 'none',
            improvementRecommendations: [],
        },
        ...overrides,
    };
}
