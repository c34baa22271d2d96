/**
 * Research lexicon
 *
 * Keyword lists live in lexicon.json; this module validates them once at
 * load and exposes typed accessors.
 */

import { z } from 'zod';
import rawLexicon from './lexicon.json';

const keywordList = z.array(z.string().min(1));

const lexiconSchema = z.object({
    stopwords: keywordList,
    painIndicators: keywordList,
    painCategories: z.object({
        confusion: keywordList,
        overwhelm: keywordList,
        cost_concerns: keywordList,
        complexity: keywordList,
        trust_issues: keywordList,
        support_needed: keywordList,
        quality_concerns: keywordList,
        time_constraints: keywordList,
    }).strict(),
    emotions: z.record(keywordList),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export const lexicon: Lexicon = lexiconSchema.parse(rawLexicon);

const stopwords = new Set(lexicon.stopwords);

/**
 * Lowercased topic words worth matching against post text
 */
export function significantWords(topic: string): string[] {
    const words = topic.toLowerCase().match(/[a-z0-9']+/g) || [];
    return [...new Set(words.filter(word => word.length > 2 && !stopwords.has(word)))];
}

/**
 * Number of keywords present in already-lowercased text
 */
export function countKeywordHits(text: string, keywords: readonly string[]): number {
    return keywords.filter(keyword => text.includes(keyword)).length;
}

export function hasPainIndicator(text: string): boolean {
    return countKeywordHits(text, lexicon.painIndicators) > 0;
}
