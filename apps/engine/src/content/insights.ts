/**
 * Helpers for turning research insights into prose fragments
 */

import {
    PAIN_POINT_CATEGORIES,
    PainPointCategory,
    ResearchInsights,
} from '../pipeline/types';

/**
 * "cost_concerns" -> "cost concerns"
 */
export function humanizeCategory(category: PainPointCategory): string {
    return category.replace(/_/g, ' ');
}

/**
 * Categories with a non-zero intensity, strongest first.
 * Ties keep the canonical category order.
 */
export function topPainPoints(research: ResearchInsights, limit = 3): PainPointCategory[] {
    return PAIN_POINT_CATEGORIES
        .filter(category => research.painPoints[category] > 0)
        .sort((a, b) => research.painPoints[b] - research.painPoints[a])
        .slice(0, limit);
}

/**
 * Split a free-text answer into separate lines, dropping blanks
 */
export function splitLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.replace(/^\s*(?:[-*]|\d+[.)])\s*/, '').trim())
        .filter(line => line.length > 0);
}
