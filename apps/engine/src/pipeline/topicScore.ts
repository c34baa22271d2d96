/**
 * Topic Scoring
 *
 * Score a topic's wording against each content format and pick the
 * best fit. Used whenever the LLM recommendation is unavailable.
 */

import { CONTENT_TYPES, ContentType, ContentTypeRecord } from './types';

/**
 * Wording patterns per content type
 */
const CONTENT_TYPE_PATTERNS: Record<ContentType, { patterns: RegExp[]; score: number; label: string }> = {
    comprehensive_guide: {
        patterns: [
            /\b(complete|ultimate|comprehensive|definitive)\b/i,
            /\bguide\b/i,
            /\beverything (you|about)\b/i,
        ],
        score: 0.9,
        label: 'guide',
    },
    blog_post: {
        patterns: [
            /^why\b/i,
            /\bwhat (is|are)\b/i,
            /\bmistakes?\b/i,
            /\b(thoughts|lessons|story)\b/i,
        ],
        score: 0.7,
        label: 'blog post',
    },
    how_to: {
        patterns: [
            /\bhow to\b/i,
            /\bstep.by.step\b/i,
            /\btutorial\b/i,
            /\bset ?up\b/i,
        ],
        score: 0.8,
        label: 'how-to',
    },
    listicle: {
        patterns: [
            /^(best|top)\b/i,
            /\b(best|top) \d+\b/i,
            /\b\d+ (ways|tips|reasons|ideas|things|tools)\b/i,
        ],
        score: 0.85,
        label: 'list',
    },
    comparison: {
        patterns: [
            /\bvs\.?\b|\bversus\b/i,
            /\bdifference between\b/i,
            /\bcompar(e|ed|ing|ison)\b/i,
            /\b(better|cheaper) than\b/i,
        ],
        score: 0.9,
        label: 'comparison',
    },
};

/**
 * Normalize a topic string
 */
export function normalizeTopic(topic: string): string {
    return topic
        .toLowerCase()
        .trim()
        .replace(/[^\w\s.']/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Score of each content type for a topic; 0 when no pattern matches
 */
export function scoreContentTypes(topic: string): Record<ContentType, number> {
    const normalized = normalizeTopic(topic);
    const score = (contentType: ContentType): number => {
        const category = CONTENT_TYPE_PATTERNS[contentType];
        return category.patterns.some(pattern => pattern.test(normalized)) ? category.score : 0;
    };

    return {
        comprehensive_guide: score('comprehensive_guide'),
        blog_post: score('blog_post'),
        how_to: score('how_to'),
        listicle: score('listicle'),
        comparison: score('comparison'),
    };
}

/**
 * Pick the content type whose wording patterns score highest.
 * `preferred` breaks ties; nothing matching means a comprehensive guide.
 */
export function recommendContentType(topic: string, preferred?: ContentType): ContentTypeRecord {
    const scores = scoreContentTypes(topic);
    const matched = CONTENT_TYPES
        .filter(contentType => scores[contentType] > 0)
        .sort((a, b) => scores[b] - scores[a]);

    if (matched.length === 0) {
        return {
            contentType: 'comprehensive_guide',
            reasoning: 'No format signal in the topic wording; a comprehensive guide covers the most ground.',
            alternatives: [],
        };
    }

    const topScore = scores[matched[0]];
    const best = preferred && scores[preferred] === topScore ? preferred : matched[0];

    return {
        contentType: best,
        reasoning: `Topic wording matches ${CONTENT_TYPE_PATTERNS[best].label} patterns.`,
        alternatives: matched.filter(contentType => contentType !== best),
    };
}

/**
 * Map common LLM spellings onto a known content type
 */
const CONTENT_TYPE_ALIASES: Record<string, ContentType> = {
    guide: 'comprehensive_guide',
    ultimate_guide: 'comprehensive_guide',
    complete_guide: 'comprehensive_guide',
    blog: 'blog_post',
    article: 'blog_post',
    tutorial: 'how_to',
    howto: 'how_to',
    step_by_step: 'how_to',
    list: 'listicle',
    review: 'comparison',
    versus: 'comparison',
};

export function normalizeContentTypeName(value: string): string {
    const key = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
    return CONTENT_TYPE_ALIASES[key] || key;
}
