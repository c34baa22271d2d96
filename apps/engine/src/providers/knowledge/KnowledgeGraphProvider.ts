/**
 * Knowledge Graph Provider
 *
 * Supplies entities, related topics and content gaps for a topic.
 * Implementations never throw.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { errorMessage } from '../../errors';
import { createLogger } from '../../logger';
import { KnowledgeGraphInsights, SourceTag } from '../../pipeline/types';

const logger = createLogger('knowledge-graph');

export interface KnowledgeGraphProvider {
    readonly name: string;
    readonly mode: SourceTag;

    getInsights(topic: string): Promise<KnowledgeGraphInsights>;
}

export interface KnowledgeGraphSettings {
    url: string;
    apiKey: string;
    timeoutMs: number;
}

const insightsSchema = z.object({
    entities: z.array(z.string()).default([]),
    related_topics: z.array(z.string()).default([]),
    content_gaps: z.array(z.string()).default([]),
});

/**
 * Canned insights derived from the topic
 */
export function buildFallbackKnowledgeGraph(topic: string): KnowledgeGraphInsights {
    return {
        entities: [
            `${topic} basics`,
            `${topic} best practices`,
            `${topic} tools and resources`,
            `${topic} common challenges`,
            `${topic} success strategies`,
        ],
        relatedTopics: [
            `Advanced ${topic}`,
            `${topic} for beginners`,
            `${topic} case studies`,
            `${topic} trends`,
        ],
        contentGaps: [
            `Complete ${topic} guide`,
            `${topic} comparison analysis`,
            `${topic} implementation steps`,
        ],
        sourceTag: 'fallback',
    };
}

/**
 * Knowledge graph backed by an external HTTP API
 */
export class HttpKnowledgeGraphProvider implements KnowledgeGraphProvider {
    readonly name = 'KnowledgeGraphApi';
    readonly mode = 'live';

    private readonly settings: KnowledgeGraphSettings;
    private readonly http: AxiosInstance;

    constructor(settings: KnowledgeGraphSettings, http: AxiosInstance = axios.create()) {
        this.settings = settings;
        this.http = http;
    }

    async getInsights(topic: string): Promise<KnowledgeGraphInsights> {
        try {
            const response = await this.http.post<unknown>(
                this.settings.url,
                {
                    topic,
                    depth: 3,
                    include_related: true,
                    include_gaps: true,
                },
                {
                    headers: this.settings.apiKey
                        ? { Authorization: `Bearer ${this.settings.apiKey}` }
                        : {},
                    timeout: this.settings.timeoutMs,
                }
            );

            const parsed = insightsSchema.safeParse(response.data);
            if (!parsed.success) {
                logger.warn('Knowledge graph returned an unexpected shape, using fallback', { topic });
                return buildFallbackKnowledgeGraph(topic);
            }

            return {
                entities: parsed.data.entities,
                relatedTopics: parsed.data.related_topics,
                contentGaps: parsed.data.content_gaps,
                sourceTag: 'live',
            };
        } catch (error) {
            logger.warn('Knowledge graph request failed, using fallback', {
                topic,
                error: errorMessage(error),
            });
            return buildFallbackKnowledgeGraph(topic);
        }
    }
}

/**
 * Used when no knowledge graph URL is configured
 */
export class FallbackKnowledgeGraphProvider implements KnowledgeGraphProvider {
    readonly name = 'FallbackKnowledgeGraph';
    readonly mode = 'fallback';

    async getInsights(topic: string): Promise<KnowledgeGraphInsights> {
        return buildFallbackKnowledgeGraph(topic);
    }
}
