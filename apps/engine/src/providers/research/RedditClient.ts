import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { MalformedUpstreamResponseError, UpstreamUnavailableError } from '../../errors';
import { createLogger } from '../../logger';

const logger = createLogger('reddit-client');

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const API_BASE = 'https://oauth.reddit.com';

export interface RedditCredentials {
    clientId: string;
    clientSecret: string;
    userAgent: string;
    timeoutMs: number;
}

export interface RedditPost {
    id: string;
    title: string;
    body: string;
    score: number;
    numComments: number;
    permalink: string;
    subreddit: string;
}

export interface RedditComment {
    body: string;
    score: number;
    author: string;
    distinguished: string | null;
    stickied: boolean;
}

export type SearchSort = 'relevance' | 'new';

const tokenSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().default(3600),
});

const postSchema = z.object({
    id: z.string(),
    title: z.string().default(''),
    selftext: z.string().default(''),
    score: z.number().default(0),
    num_comments: z.number().default(0),
    permalink: z.string().default(''),
    subreddit: z.string().default(''),
});

const postListingSchema = z.object({
    data: z.object({
        children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
    }),
});

const commentSchema = z.object({
    body: z.string().default(''),
    score: z.number().default(0),
    author: z.string().default('[deleted]'),
    distinguished: z.string().nullable().default(null),
    stickied: z.boolean().default(false),
});

const commentThreadSchema = z.array(postListingSchema).min(2);

/**
 * Minimal Reddit API client
 *
 * Authenticates with the client-credentials grant and caches the token
 * until it expires. Every transport failure surfaces as
 * UpstreamUnavailableError.
 */
export class RedditClient {
    readonly name = 'Reddit';
    private readonly credentials: RedditCredentials;
    private readonly http: AxiosInstance;
    private accessToken: string | null = null;
    private tokenExpiresAt = 0;

    constructor(credentials: RedditCredentials, http: AxiosInstance = axios.create()) {
        this.credentials = credentials;
        this.http = http;
    }

    isConfigured(): boolean {
        return !!this.credentials.clientId && !!this.credentials.clientSecret;
    }

    async searchPosts(community: string, query: string, sort: SearchSort, limit: number): Promise<RedditPost[]> {
        const data = await this.get(`/r/${encodeURIComponent(community)}/search`, {
            q: query,
            restrict_sr: 1,
            sort,
            t: 'year',
            limit,
        });
        return this.parsePosts(data);
    }

    async hotPosts(community: string, limit: number): Promise<RedditPost[]> {
        const data = await this.get(`/r/${encodeURIComponent(community)}/hot`, { limit });
        return this.parsePosts(data);
    }

    /**
     * Top-level comments of a post, in the order Reddit returns them
     */
    async comments(community: string, postId: string, limit: number): Promise<RedditComment[]> {
        const data = await this.get(`/r/${encodeURIComponent(community)}/comments/${encodeURIComponent(postId)}`, {
            sort: 'top',
            depth: 1,
            limit,
        });

        const parsed = commentThreadSchema.safeParse(data);
        if (!parsed.success) {
            throw new MalformedUpstreamResponseError(this.name, 'unexpected comment thread shape');
        }

        const comments: RedditComment[] = [];
        for (const child of parsed.data[1].data.children) {
            if (child.kind !== 't1') continue;
            const comment = commentSchema.safeParse(child.data);
            if (comment.success) {
                comments.push(comment.data);
            }
        }
        return comments;
    }

    private parsePosts(data: unknown): RedditPost[] {
        const listing = postListingSchema.safeParse(data);
        if (!listing.success) {
            throw new MalformedUpstreamResponseError(this.name, 'unexpected listing shape');
        }

        const posts: RedditPost[] = [];
        for (const child of listing.data.data.children) {
            if (child.kind !== 't3') continue;
            const post = postSchema.safeParse(child.data);
            if (post.success) {
                posts.push({
                    id: post.data.id,
                    title: post.data.title,
                    body: post.data.selftext,
                    score: post.data.score,
                    numComments: post.data.num_comments,
                    permalink: post.data.permalink,
                    subreddit: post.data.subreddit,
                });
            }
        }
        return posts;
    }

    private async get(path: string, params: Record<string, string | number>): Promise<unknown> {
        const token = await this.authenticate();

        try {
            const response = await this.http.get<unknown>(`${API_BASE}${path}`, {
                params: { ...params, raw_json: 1 },
                headers: {
                    'Authorization': `Bearer ${token}`,
                    'User-Agent': this.credentials.userAgent,
                },
                timeout: this.credentials.timeoutMs,
            });
            return response.data;
        } catch (error) {
            throw this.unavailable(error, path);
        }
    }

    private async authenticate(): Promise<string> {
        if (!this.isConfigured()) {
            throw new UpstreamUnavailableError(this.name, 'client credentials are not configured');
        }

        if (this.accessToken && Date.now() < this.tokenExpiresAt) {
            return this.accessToken;
        }

        let data: unknown;
        try {
            const response = await this.http.post<unknown>(
                TOKEN_URL,
                'grant_type=client_credentials',
                {
                    auth: {
                        username: this.credentials.clientId,
                        password: this.credentials.clientSecret,
                    },
                    headers: {
                        'Content-Type': 'application/x-www-form-urlencoded',
                        'User-Agent': this.credentials.userAgent,
                    },
                    timeout: this.credentials.timeoutMs,
                }
            );
            data = response.data;
        } catch (error) {
            throw this.unavailable(error, 'access_token');
        }

        const token = tokenSchema.safeParse(data);
        if (!token.success) {
            throw new UpstreamUnavailableError(this.name, 'authentication failed');
        }

        this.accessToken = token.data.access_token;
        // Refresh a minute early
        this.tokenExpiresAt = Date.now() + Math.max(0, token.data.expires_in - 60) * 1000;
        logger.debug('Reddit access token acquired');

        return this.accessToken;
    }

    private unavailable(error: unknown, path: string): UpstreamUnavailableError {
        const message = axios.isAxiosError(error)
            ? error.response ? `HTTP ${error.response.status}` : error.message
            : error instanceof Error ? error.message : 'Unknown error';

        logger.warn('Reddit request failed', { path, error: message });
        return new UpstreamUnavailableError(this.name, message);
    }
}
