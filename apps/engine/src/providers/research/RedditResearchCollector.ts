import { errorMessage } from '../../errors';
import { createLogger } from '../../logger';
import { ResearchInsights } from '../../pipeline/types';
import { analyzeCollectedPosts, CollectedPost } from './analysis';
import { buildFallbackInsights } from './fallback';
import { hasPainIndicator, significantWords } from './lexicon';
import { RedditClient, RedditComment, RedditPost } from './RedditClient';
import { SocialResearchCollector } from './SocialResearchCollector';

const logger = createLogger('reddit-research');

const SEARCH_SUFFIXES = ['', ' problem', ' help', ' advice', ' beginner'];
const LISTING_LIMIT = 25;
const COMMENTS_PER_POST = 10;
const RELEVANCE_COVERAGE = 0.6;

export interface RedditResearchOptions {
    /** Courtesy delay between communities */
    requestDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * A post is relevant when enough of the topic's significant words appear
 * in it, or when it carries any pain indicator.
 */
export function isRelevantPost(topicWords: string[], post: RedditPost): boolean {
    const text = `${post.title} ${post.body}`.toLowerCase();

    if (topicWords.length > 0) {
        const covered = topicWords.filter(word => text.includes(word)).length;
        if (covered / topicWords.length >= RELEVANCE_COVERAGE) {
            return true;
        }
    }

    return hasPainIndicator(text);
}

/**
 * Keep genuine user comments: no deleted or removed bodies, no moderator
 * or stickied comments. Highest score first.
 */
export function selectComments(comments: RedditComment[], limit = COMMENTS_PER_POST): RedditComment[] {
    return comments
        .filter(comment => {
            const body = comment.body.trim();
            return body !== ''
                && body !== '[deleted]'
                && body !== '[removed]'
                && comment.distinguished !== 'moderator'
                && !comment.stickied;
        })
        .sort((a, b) => b.score - a.score)
        .slice(0, limit);
}

/**
 * Reddit-backed research collector
 *
 * Tries several search strategies per community until enough relevant
 * posts are found. Any API error, or finding nothing relevant at all,
 * yields the deterministic fallback insights.
 */
export class RedditResearchCollector implements SocialResearchCollector {
    readonly name = 'RedditResearch';
    readonly mode = 'live';

    private readonly client: RedditClient;
    private readonly requestDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(client: RedditClient, options: RedditResearchOptions) {
        this.client = client;
        this.requestDelayMs = options.requestDelayMs;
        this.sleep = options.sleep || (ms => new Promise<void>(resolve => setTimeout(resolve, ms)));
    }

    async researchTopic(
        topic: string,
        communities: string[],
        maxPostsPerCommunity: number
    ): Promise<ResearchInsights> {
        logger.info('Researching topic', { topic, communities });

        try {
            const collected: CollectedPost[] = [];

            for (const [index, community] of communities.entries()) {
                if (index > 0 && this.requestDelayMs > 0) {
                    await this.sleep(this.requestDelayMs);
                }
                const posts = await this.collectCommunity(topic, community, maxPostsPerCommunity);
                collected.push(...posts);
            }

            if (collected.length === 0) {
                logger.warn('No relevant posts found, using fallback insights', { topic });
                return buildFallbackInsights(topic);
            }

            const insights = analyzeCollectedPosts(collected);
            logger.info('Research complete', {
                topic,
                posts: insights.postsAnalyzed,
                comments: insights.commentsAnalyzed,
                qualityScore: insights.researchQualityScore,
            });

            return insights;
        } catch (error) {
            logger.warn('Reddit research failed, using fallback insights', {
                topic,
                error: errorMessage(error),
            });
            return buildFallbackInsights(topic);
        }
    }

    private async collectCommunity(
        topic: string,
        community: string,
        maxPosts: number
    ): Promise<CollectedPost[]> {
        const topicWords = significantWords(topic);
        const selected: RedditPost[] = [];
        const seen = new Set<string>();

        const strategies: Array<() => Promise<RedditPost[]>> = [
            ...SEARCH_SUFFIXES.map(suffix =>
                () => this.client.searchPosts(community, `${topic}${suffix}`, 'relevance', LISTING_LIMIT)),
            () => this.client.searchPosts(community, topic, 'new', LISTING_LIMIT),
            () => this.client.hotPosts(community, LISTING_LIMIT),
        ];

        for (const fetchPosts of strategies) {
            if (selected.length >= maxPosts) break;

            const posts = await fetchPosts();
            for (const post of posts) {
                if (selected.length >= maxPosts) break;
                if (seen.has(post.id)) continue;
                seen.add(post.id);

                if (isRelevantPost(topicWords, post)) {
                    selected.push(post);
                }
            }
        }

        const collected: CollectedPost[] = [];
        for (const post of selected) {
            const comments = await this.client.comments(community, post.id, 50);
            collected.push({ post, comments: selectComments(comments) });
        }

        logger.debug('Community collected', { community, posts: collected.length });
        return collected;
    }
}
