/**
 * YMYL Detection
 *
 * Flags "Your Money or Your Life" topics, which are held to stricter
 * E-E-A-T weighting. Keywords are regex fragments matched as whole words;
 * inflections are listed explicitly so "tax" never matches "taxi".
 */

import { YmylCategory } from './types';

/**
 * Health-related keywords
 */
const HEALTH_KEYWORDS = [
    'health', 'medical', 'symptoms?', 'treatments?', 'diagnos(?:is|es|ed)', 'medications?',
    'diseases?', 'illness(?:es)?', 'cancers?', 'diabet(?:es|ic)', 'heart', 'blood pressure',
    'cholesterol', 'depression', 'anxiety', 'prescriptions?', 'doctors?', 'hospitals?',
    'surger(?:y|ies)', 'vaccines?', 'dosages?', 'side effects', 'pregnan(?:cy|t)', 'fertility',
    'mental health', 'diets?', 'weight loss', 'nutrition', 'supplements?', 'cures?',
];

/**
 * Finance-related keywords
 */
const FINANCE_KEYWORDS = [
    'finance', 'financial', 'banking', 'invest(?:ing|ment|ments|or|ors)?', 'stocks?',
    'crypto(?:currency|currencies)?', 'bitcoin', 'retirement', '401k', 'ira', 'mortgages?',
    'loans?', 'credit scores?', 'debts?', 'bankruptcy', 'tax(?:es|ed|ation)?', 'insurance',
    'social security', 'pensions?', 'dividends?', 'trading', 'forex', 'savings',
    'interest rates?',
];

/**
 * Legal-related keywords
 */
const LEGAL_KEYWORDS = [
    'legal', 'law firms?', 'lawsuits?', 'su(?:e|es|ed|ing)', 'attorneys?', 'lawyers?',
    'courts?', 'custody', 'divorce', 'estate planning', 'contracts?', 'liability',
    'discrimination', 'harassment', 'criminal', 'arrests?', 'bail', 'immigration', 'visas?',
    'deportation', 'asylum', 'copyrights?', 'patents?',
];

/**
 * Safety-related keywords
 */
const SAFETY_KEYWORDS = [
    'emergenc(?:y|ies)', 'poison(?:ing|ous)?', 'overdoses?', 'suicide', 'self-harm', 'abuse',
    'violence', 'assault', 'weapons?', 'dangerous', 'hazards?', 'toxic', 'explosions?',
    'fire safety', 'evacuation', 'first aid',
];

function compile(keywords: string[]): RegExp[] {
    return keywords.map(keyword => new RegExp(`\\b(?:${keyword})\\b`));
}

const HEALTH_PATTERNS = compile(HEALTH_KEYWORDS);
const FINANCE_PATTERNS = compile(FINANCE_KEYWORDS);
const LEGAL_PATTERNS = compile(LEGAL_KEYWORDS);
const SAFETY_PATTERNS = compile(SAFETY_KEYWORDS);

/**
 * Classification result
 */
export interface YmylClassification {
    isYmyl: boolean;
    ymylCategory: YmylCategory;
}

/**
 * Classify a topic (and optionally the business industry) for YMYL concerns
 */
export function classifyYmyl(topic: string, industry = ''): YmylClassification {
    const text = `${topic} ${industry}`.toLowerCase();

    const healthScore = countMatches(text, HEALTH_PATTERNS);
    const financeScore = countMatches(text, FINANCE_PATTERNS);
    const legalScore = countMatches(text, LEGAL_PATTERNS);
    const safetyScore = countMatches(text, SAFETY_PATTERNS);

    const maxScore = Math.max(healthScore, financeScore, legalScore, safetyScore);

    let ymylCategory: YmylCategory = 'none';
    if (maxScore === healthScore && healthScore > 0) ymylCategory = 'health';
    else if (maxScore === financeScore && financeScore > 0) ymylCategory = 'finance';
    else if (maxScore === legalScore && legalScore > 0) ymylCategory = 'legal';
    else if (maxScore === safetyScore && safetyScore > 0) ymylCategory = 'safety';

    return { isYmyl: maxScore > 0, ymylCategory };
}

function countMatches(text: string, patterns: RegExp[]): number {
    return patterns.filter(pattern => pattern.test(text)).length;
}
