/**
 * Content Audit
 *
 * Structural checks over a generated markdown document.
 */

import config from '../config';
import { countWords } from '../content/ContentGenerator';
import { createLogger } from '../logger';
import { GENERIC_AI_PHRASES } from '../providers/ai/prompts';
import { ContentAudit } from './types';

const logger = createLogger('content-audit');

export interface AuditThresholds {
    minHeadings: number;
    minWordCount: number;
}

const CALL_TO_ACTION = /\b(get started|contact us|sign up|reach out|book a|next steps?|get in touch|try it)\b/i;

/**
 * Run structural checks on a document body
 */
export function auditContent(
    bodyText: string,
    thresholds: AuditThresholds = config.quality
): ContentAudit {
    const issues: string[] = [];
    const content = bodyText.toLowerCase();

    // Markdown headings
    const headingCount = (bodyText.match(/^#{1,6}\s+\S/gm) || []).length;
    if (headingCount < thresholds.minHeadings) {
        issues.push(`Too few headings: ${headingCount} (minimum: ${thresholds.minHeadings})`);
    }

    // FAQ section
    const hasFaq = content.includes('frequently asked questions') || /\bfaq/.test(content);
    if (!hasFaq) {
        issues.push('Missing FAQ section');
    }

    // Call to action
    const hasCallToAction = CALL_TO_ACTION.test(bodyText);
    if (!hasCallToAction) {
        issues.push('Missing call to action');
    }

    // Word count
    const wordCount = countWords(bodyText);
    if (wordCount < thresholds.minWordCount) {
        issues.push(`Low word count: ${wordCount} (minimum: ${thresholds.minWordCount})`);
    }

    // Generic phrases
    const genericPhrasesFound: string[] = [];
    for (const phrase of GENERIC_AI_PHRASES) {
        if (content.includes(phrase)) {
            genericPhrasesFound.push(phrase);
            issues.push(`Generic phrase found: "${phrase}"`);
        }
    }

    if (issues.length > 0) {
        logger.debug('Content audit found issues', { issues: issues.length });
    }

    return {
        headingCount,
        wordCount,
        hasFaq,
        hasCallToAction,
        genericPhrasesFound,
        issues,
    };
}
