/**
 * Social Research Collector Interface
 *
 * Defines the contract for community research providers.
 * Implementations never throw: any failure yields fallback insights.
 */

import { ResearchInsights, SourceTag } from '../../pipeline/types';
import { buildFallbackInsights } from './fallback';

export interface SocialResearchCollector {
    /**
     * Collector name for logging
     */
    readonly name: string;

    /**
     * Whether this collector talks to a live upstream
     */
    readonly mode: SourceTag;

    /**
     * Research how people talk about a topic in the given communities
     */
    researchTopic(
        topic: string,
        communities: string[],
        maxPostsPerCommunity: number
    ): Promise<ResearchInsights>;
}

/**
 * Collector used when no Reddit credentials are configured
 */
export class FallbackResearchCollector implements SocialResearchCollector {
    readonly name = 'FallbackResearch';
    readonly mode = 'fallback';

    async researchTopic(topic: string): Promise<ResearchInsights> {
        return buildFallbackInsights(topic);
    }
}
