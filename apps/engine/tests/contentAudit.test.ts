/**
 * Tests for contentAudit.ts
 */

import { auditContent } from '../src/pipeline/contentAudit';

const WELL_FORMED = [
    '# Title',
    '## Section one',
    'Some text here.',
    '## Frequently Asked Questions',
    '### Q?',
    'Answer.',
    '## Next Steps',
    'Reach out today.',
].join('\n');

describe('auditContent', () => {
    it('should pass a well-formed document', () => {
        const audit = auditContent(WELL_FORMED, { minHeadings: 3, minWordCount: 10 });

        expect(audit).toEqual({
            headingCount: 5,
            wordCount: 21,
            hasFaq: true,
            hasCallToAction: true,
            genericPhrasesFound: [],
            issues: [],
        });
    });

    it('should use the configured thresholds by default', () => {
        const audit = auditContent(WELL_FORMED);

        expect(audit.issues).toEqual(['Low word count: 21 (minimum: 500)']);
    });

    it('should report every structural problem in order', () => {
        const audit = auditContent('Just a sentence that will dive into things.', {
            minHeadings: 3,
            minWordCount: 5,
        });

        expect(audit.issues).toEqual([
            'Too few headings: 0 (minimum: 3)',
            'Missing FAQ section',
            'Missing call to action',
            'Generic phrase found: "dive into"',
        ]);
        expect(audit.genericPhrasesFound).toEqual(['dive into']);
    });

    it('should accept an FAQ heading', () => {
        const audit = auditContent('## FAQ\n\nContact us any time.', { minHeadings: 1, minWordCount: 1 });

        expect(audit.hasFaq).toBe(true);
        expect(audit.hasCallToAction).toBe(true);
        expect(audit.issues).toHaveLength(0);
    });

    it('should not count hashtags as headings', () => {
        expect(auditContent('#nospace\n####### seven', { minHeadings: 0, minWordCount: 0 }).headingCount).toBe(0);
    });
});
