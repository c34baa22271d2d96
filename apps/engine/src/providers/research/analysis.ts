/**
 * Research analysis
 *
 * Turns collected posts and comments into ResearchInsights using the
 * keyword lexicon. Pure and deterministic.
 */

import {
    PAIN_POINT_CATEGORIES,
    PainPointCounts,
    ResearchInsights,
} from '../../pipeline/types';
import { countKeywordHits, lexicon } from './lexicon';
import { RedditComment, RedditPost } from './RedditClient';

export interface CollectedPost {
    post: RedditPost;
    comments: RedditComment[];
}

const MAX_QUOTES = 5;
const MAX_QUESTIONS = 5;
const MIN_QUOTE_LENGTH = 30;
const MAX_QUOTE_LENGTH = 200;

export function emptyPainPoints(): PainPointCounts {
    return {
        confusion: 0,
        overwhelm: 0,
        cost_concerns: 0,
        complexity: 0,
        trust_issues: 0,
        support_needed: 0,
        quality_concerns: 0,
        time_constraints: 0,
    };
}

/**
 * 4 points per post (max 40), 1.5 per comment (max 30),
 * 5 per pain category with any hits (max 30)
 */
export function researchQualityScore(
    postsAnalyzed: number,
    commentsAnalyzed: number,
    painPoints: PainPointCounts
): number {
    const categoriesHit = PAIN_POINT_CATEGORIES.filter(category => painPoints[category] > 0).length;
    const score = Math.min(40, postsAnalyzed * 4)
        + Math.min(30, commentsAnalyzed * 1.5)
        + Math.min(30, categoriesHit * 5);
    return Math.min(100, score);
}

export function analyzeCollectedPosts(collected: CollectedPost[]): ResearchInsights {
    const painPoints = emptyPainPoints();
    const emotionCounts = new Map<string, number>();
    const texts: string[] = [];

    for (const { post, comments } of collected) {
        texts.push(`${post.title}\n${post.body}`);
        for (const comment of comments) {
            texts.push(comment.body);
        }
    }

    for (const text of texts) {
        const lower = text.toLowerCase();
        for (const category of PAIN_POINT_CATEGORIES) {
            painPoints[category] += countKeywordHits(lower, lexicon.painCategories[category]);
        }
        for (const [emotion, keywords] of Object.entries(lexicon.emotions)) {
            const hits = countKeywordHits(lower, keywords);
            if (hits > 0) {
                emotionCounts.set(emotion, (emotionCounts.get(emotion) || 0) + hits);
            }
        }
    }

    const postsAnalyzed = collected.length;
    const commentsAnalyzed = collected.reduce((sum, entry) => sum + entry.comments.length, 0);

    return {
        painPoints,
        customerQuotes: extractQuotes(collected),
        frequentQuestions: extractQuestions(collected),
        emotionalIndicators: [...emotionCounts.entries()]
            .sort((a, b) => b[1] - a[1])
            .map(([emotion]) => emotion),
        postsAnalyzed,
        commentsAnalyzed,
        researchQualityScore: researchQualityScore(postsAnalyzed, commentsAnalyzed, painPoints),
        sourceTag: 'live',
    };
}

/**
 * Highest-scoring comments, whitespace-collapsed and truncated
 */
function extractQuotes(collected: CollectedPost[]): string[] {
    const comments = collected
        .flatMap(entry => entry.comments)
        .map(comment => ({ text: collapse(comment.body), score: comment.score }))
        .filter(comment => comment.text.length >= MIN_QUOTE_LENGTH)
        .sort((a, b) => b.score - a.score);

    const quotes: string[] = [];
    for (const { text } of comments) {
        const quote = text.length > MAX_QUOTE_LENGTH
            ? `${text.slice(0, MAX_QUOTE_LENGTH - 3)}...`
            : text;
        if (!quotes.includes(quote)) {
            quotes.push(quote);
        }
        if (quotes.length === MAX_QUOTES) break;
    }
    return quotes;
}

/**
 * Question-form titles first, then question sentences from post bodies
 */
function extractQuestions(collected: CollectedPost[]): string[] {
    const candidates: string[] = [];

    for (const { post } of collected) {
        const title = collapse(post.title);
        if (title.includes('?')) {
            candidates.push(title);
        }
    }

    for (const { post } of collected) {
        const sentences = collapse(post.body).match(/[^.!?]{10,200}\?/g) || [];
        candidates.push(...sentences.map(sentence => sentence.trim()));
    }

    return [...new Set(candidates)].slice(0, MAX_QUESTIONS);
}

function collapse(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
