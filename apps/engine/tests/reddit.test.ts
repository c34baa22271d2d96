/**
 * Tests for the Reddit client and research collector
 */

import { MalformedUpstreamResponseError, UpstreamUnavailableError } from '../src/errors';
import { RedditClient, RedditComment, RedditPost } from '../src/providers/research/RedditClient';
import {
    isRelevantPost,
    RedditResearchCollector,
    selectComments,
} from '../src/providers/research/RedditResearchCollector';
import { FakeReply, fakeHttp, RecordedRequest } from './helpers';

const CREDENTIALS = {
    clientId: 'test-client',
    clientSecret: 'test-secret',
    userAgent: 'TestAgent/1.0',
    timeoutMs: 1000,
};

const TOKEN_REPLY: FakeReply = { status: 200, data: { access_token: 'test-token', expires_in: 3600 } };

function postChild(id: string, title: string, selftext: string, score = 1) {
    return { kind: 't3', data: { id, title, selftext, score, num_comments: 2, permalink: `/r/laptops/${id}`, subreddit: 'laptops' } };
}

function listing(children: unknown[]) {
    return { data: { children } };
}

function commentThread(comments: Array<Partial<RedditComment>>) {
    return [
        listing([]),
        listing([
            ...comments.map(comment => ({ kind: 't1', data: comment })),
            { kind: 'more', data: { count: 4 } },
        ]),
    ];
}

interface RouteTable {
    posts: unknown;
    comments?: unknown;
    commentsStatus?: number;
}

function redditRoute(table: RouteTable): (request: RecordedRequest) => FakeReply {
    return request => {
        if (request.url === 'https://www.reddit.com/api/v1/access_token') return TOKEN_REPLY;
        if (request.url.includes('/comments/')) {
            return { status: table.commentsStatus || 200, data: table.comments || commentThread([]) };
        }
        return { status: 200, data: table.posts };
    };
}

function post(overrides: Partial<RedditPost>): RedditPost {
    return {
        id: 'p',
        title: '',
        body: '',
        score: 0,
        numComments: 0,
        permalink: '',
        subreddit: 'laptops',
        ...overrides,
    };
}

function comment(overrides: Partial<RedditComment>): RedditComment {
    return {
        body: 'A perfectly ordinary comment',
        score: 1,
        author: 'someone',
        distinguished: null,
        stickied: false,
        ...overrides,
    };
}

describe('RedditClient', () => {
    it('should authenticate once and search within the community', async () => {
        const { http, requests } = fakeHttp(redditRoute({
            posts: listing([postChild('a1', 'Budget laptop?', 'Body text', 12)]),
        }));
        const client = new RedditClient(CREDENTIALS, http);

        const posts = await client.searchPosts('laptops', 'budget laptop', 'relevance', 25);
        await client.hotPosts('laptops', 25);

        expect(posts).toEqual([{
            id: 'a1',
            title: 'Budget laptop?',
            body: 'Body text',
            score: 12,
            numComments: 2,
            permalink: '/r/laptops/a1',
            subreddit: 'laptops',
        }]);
        expect(requests.map(request => request.url)).toEqual([
            'https://www.reddit.com/api/v1/access_token',
            'https://oauth.reddit.com/r/laptops/search',
            'https://oauth.reddit.com/r/laptops/hot',
        ]);
        expect(requests[0].auth).toEqual({ username: 'test-client', password: 'test-secret' });
        expect(requests[1].params).toEqual({
            q: 'budget laptop',
            restrict_sr: 1,
            sort: 'relevance',
            t: 'year',
            limit: 25,
            raw_json: 1,
        });
        expect(requests[1].headers.Authorization).toBe('Bearer test-token');
    });

    it('should escape the community in request paths', async () => {
        const { http, requests } = fakeHttp(redditRoute({ posts: listing([]) }));
        const client = new RedditClient(CREDENTIALS, http);

        await client.searchPosts('ask/../mod', 'budget laptop', 'new', 5);
        await client.hotPosts('a b', 5);

        expect(requests.map(request => request.url)).toEqual([
            'https://www.reddit.com/api/v1/access_token',
            'https://oauth.reddit.com/r/ask%2F..%2Fmod/search',
            'https://oauth.reddit.com/r/a%20b/hot',
        ]);
    });

    it('should keep only top-level comments from a thread', async () => {
        const { http } = fakeHttp(redditRoute({
            posts: listing([]),
            comments: commentThread([{ body: 'First', score: 3, author: 'u1' }]),
        }));

        const comments = await new RedditClient(CREDENTIALS, http).comments('laptops', 'a1', 50);

        expect(comments).toEqual([{ body: 'First', score: 3, author: 'u1', distinguished: null, stickied: false }]);
    });

    it('should report HTTP failures as unavailable', async () => {
        const { http } = fakeHttp(request =>
            request.url.includes('access_token') ? TOKEN_REPLY : { status: 503, data: 'busy' });

        const search = new RedditClient(CREDENTIALS, http).hotPosts('laptops', 25);
        await expect(search).rejects.toBeInstanceOf(UpstreamUnavailableError);
        await expect(search).rejects.toThrow('Reddit unavailable: HTTP 503');
    });

    it('should reject a malformed listing', async () => {
        const { http } = fakeHttp(redditRoute({ posts: { unexpected: true } }));

        await expect(new RedditClient(CREDENTIALS, http).hotPosts('laptops', 25))
            .rejects.toBeInstanceOf(MalformedUpstreamResponseError);
    });

    it('should refuse to call the API without credentials', async () => {
        const { http, requests } = fakeHttp(redditRoute({ posts: listing([]) }));
        const client = new RedditClient({ ...CREDENTIALS, clientSecret: '' }, http);

        expect(client.isConfigured()).toBe(false);
        await expect(client.hotPosts('laptops', 25))
            .rejects.toThrow('Reddit unavailable: client credentials are not configured');
        expect(requests).toHaveLength(0);
    });
});

describe('isRelevantPost', () => {
    const topicWords = ['budget', 'laptop'];

    it('should accept posts covering the topic words', () => {
        expect(isRelevantPost(topicWords, post({ title: 'Budget laptop picks' }))).toBe(true);
    });

    it('should accept posts with a pain indicator', () => {
        expect(isRelevantPost(topicWords, post({ title: 'Laptop', body: 'I am stuck' }))).toBe(true);
    });

    it('should reject unrelated posts', () => {
        expect(isRelevantPost(topicWords, post({ title: 'Look at my desk', body: 'Nice lamp' }))).toBe(false);
    });
});

describe('selectComments', () => {
    it('should drop deleted, removed, moderator and stickied comments', () => {
        const selected = selectComments([
            comment({ body: 'Keep me', score: 2 }),
            comment({ body: '[deleted]', score: 50 }),
            comment({ body: '[removed]', score: 40 }),
            comment({ body: 'Rules', distinguished: 'moderator', score: 30 }),
            comment({ body: 'Pinned', stickied: true, score: 20 }),
            comment({ body: '   ', score: 10 }),
            comment({ body: 'Keep me too', score: 5 }),
        ]);

        expect(selected.map(entry => entry.body)).toEqual(['Keep me too', 'Keep me']);
    });

    it('should apply the limit after sorting', () => {
        const selected = selectComments([
            comment({ body: 'low', score: 1 }),
            comment({ body: 'high', score: 9 }),
        ], 1);

        expect(selected.map(entry => entry.body)).toEqual(['high']);
    });
});

describe('RedditResearchCollector', () => {
    const relevant = postChild(
        'p1',
        'Budget laptop for school?',
        'I am confused about which budget laptop to buy. Is 8GB of RAM enough for college?',
        10
    );
    const unrelated = postChild('p2', 'Look at my setup', 'Nice desk');
    const thread = commentThread([
        { body: 'Honestly the price is what matters most, do not overspend on a budget laptop.', score: 5 },
        { body: '[deleted]', score: 100 },
        { body: 'Mod note: read the rules', score: 50, distinguished: 'moderator' },
        { body: 'Too short', score: 3 },
    ]);

    it('should analyze relevant posts and their comments', async () => {
        const { http } = fakeHttp(redditRoute({ posts: listing([relevant, unrelated]), comments: thread }));
        const collector = new RedditResearchCollector(new RedditClient(CREDENTIALS, http), { requestDelayMs: 0 });

        const insights = await collector.researchTopic('budget laptop', ['laptops'], 2);

        expect(insights).toEqual({
            painPoints: {
                confusion: 1,
                overwhelm: 0,
                cost_concerns: 3,
                complexity: 0,
                trust_issues: 0,
                support_needed: 0,
                quality_concerns: 0,
                time_constraints: 0,
            },
            customerQuotes: ['Honestly the price is what matters most, do not overspend on a budget laptop.'],
            frequentQuestions: ['Budget laptop for school?', 'Is 8GB of RAM enough for college?'],
            emotionalIndicators: ['confused'],
            postsAnalyzed: 1,
            commentsAnalyzed: 2,
            researchQualityScore: 17,
            sourceTag: 'live',
        });
    });

    it('should stop searching once enough posts are collected', async () => {
        const { http, requests } = fakeHttp(redditRoute({
            posts: listing([relevant, postChild('p3', 'Another budget laptop thread', '')]),
            comments: thread,
        }));
        const collector = new RedditResearchCollector(new RedditClient(CREDENTIALS, http), { requestDelayMs: 0 });

        const insights = await collector.researchTopic('budget laptop', ['laptops'], 1);

        expect(insights.postsAnalyzed).toBe(1);
        expect(requests.map(request => request.url)).toEqual([
            'https://www.reddit.com/api/v1/access_token',
            'https://oauth.reddit.com/r/laptops/search',
            'https://oauth.reddit.com/r/laptops/comments/p1',
        ]);
    });

    it('should pause between communities', async () => {
        const { http } = fakeHttp(redditRoute({ posts: listing([relevant]), comments: thread }));
        const pauses: number[] = [];
        const collector = new RedditResearchCollector(new RedditClient(CREDENTIALS, http), {
            requestDelayMs: 250,
            sleep: async ms => {
                pauses.push(ms);
            },
        });

        await collector.researchTopic('budget laptop', ['laptops', 'college'], 1);

        expect(pauses).toEqual([250]);
    });

    it('should fall back when nothing relevant is found', async () => {
        const { http } = fakeHttp(redditRoute({ posts: listing([unrelated]) }));
        const collector = new RedditResearchCollector(new RedditClient(CREDENTIALS, http), { requestDelayMs: 0 });

        const insights = await collector.researchTopic('budget laptop', ['laptops'], 5);

        expect(insights.sourceTag).toBe('fallback');
        expect(insights.painPoints.cost_concerns).toBe(9);
    });

    it('should fall back when the API fails part way', async () => {
        const { http } = fakeHttp(redditRoute({ posts: listing([relevant]), commentsStatus: 500 }));
        const collector = new RedditResearchCollector(new RedditClient(CREDENTIALS, http), { requestDelayMs: 0 });

        const insights = await collector.researchTopic('budget laptop', ['laptops'], 5);

        expect(insights.sourceTag).toBe('fallback');
        expect(insights.postsAnalyzed).toBe(0);
    });
});
