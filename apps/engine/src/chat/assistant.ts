/**
 * Chat Assistant
 *
 * Rule-based follow-up advice over a finished pipeline result. The
 * analysis arrives as the JSON the results page embedded, so every field
 * is optional and defaults when absent.
 */

import { z } from 'zod';
import { countWords } from '../content';
import { createLogger } from '../logger';

const logger = createLogger('chat');

export const CHAT_ERROR_RESPONSE = "I'm having trouble processing your request. Please try again.";

const score = z.number().catch(0);
const strings = z.array(z.string()).catch([]);

const analysisSchema = z.object({
    request: z.object({ topic: z.string().catch('') }).catch({ topic: '' }),
    quality: z.object({ overallScore: score }).catch({ overallScore: 0 }),
    eeat: z.object({ overallScore: score }).catch({ overallScore: 0 }),
    document: z.object({ bodyText: z.string().catch('') }).catch({ bodyText: '' }),
    knowledgeGraph: z.object({
        entities: strings,
        contentGaps: strings,
    }).catch({ entities: [], contentGaps: [] }),
    research: z.object({
        customerQuotes: strings,
        frequentQuestions: strings,
        emotionalIndicators: strings,
    }).catch({ customerQuotes: [], frequentQuestions: [], emotionalIndicators: [] }),
});

export type ChatAnalysis = z.infer<typeof analysisSchema>;

/**
 * Parse the embedded analysis JSON; null when it is not a JSON object
 */
export function parseAnalysis(raw: string): ChatAnalysis | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        logger.warn('Chat analysis is not valid JSON', {
            error: error instanceof Error ? error.message : 'Unknown error',
        });
        return null;
    }

    const parsed = analysisSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
}

/**
 * Whole-word match, so "cover" does not fire on "discover"
 */
function mentions(message: string, words: string[]): boolean {
    const tokens = new Set(message.match(/[a-z0-9]+/g) || []);
    return words.some(word => tokens.has(word));
}

function list(items: string[]): string {
    return items.map(item => `- ${item}`).join('\n');
}

function knowledgeGapReply(analysis: ChatAnalysis): string {
    const { entities, contentGaps } = analysis.knowledgeGraph;
    return [
        `**Knowledge Gap Analysis for ${analysis.request.topic}**`,
        '',
        '**Key entities to cover:**',
        list(entities.slice(0, 5)),
        '',
        '**Content gaps identified:**',
        list(contentGaps.slice(0, 3)),
        '',
        "**Recommendation:** Give the top three entities their own sections and write a dedicated section for each gap.",
    ].join('\n');
}

function trustReply(analysis: ChatAnalysis): string {
    const trust = analysis.eeat.overallScore;

    if (trust < 6.0) {
        return [
            `**Trust Score Improvement (current: ${trust.toFixed(1)}/10)**`,
            '',
            '**Critical areas to address:**',
            list([
                'Add author credentials and relevant experience',
                'Include customer testimonials and case studies',
                'Back claims with verifiable data',
                'Make contact information easy to find',
            ]),
            '',
            '**Quick win:** a short author bio with relevant experience.',
        ].join('\n');
    }

    return [
        `**Trust Score Optimization (current: ${trust.toFixed(1)}/10)**`,
        '',
        'Your trust score is solid. To push it further:',
        list([
            'Add authority signals such as certifications or awards',
            'Refresh statistics with recent data',
            'Reference other recognized experts',
            'Expand customer success stories with specifics',
        ]),
    ].join('\n');
}

function improvementReply(analysis: ChatAnalysis): string {
    const { customerQuotes, emotionalIndicators } = analysis.research;
    const lines = [
        '**Content Enhancement Strategy**',
        '',
        `**Current quality score:** ${analysis.quality.overallScore.toFixed(1)}/10`,
        '',
        '**Improvement areas:**',
        list([
            'Structure: add subheadings and bullet points',
            'Depth: include specific examples and case studies',
            'Engagement: answer the questions your customers actually ask',
        ]),
    ];

    if (emotionalIndicators.length > 0) {
        lines.push('', `**Speak to how readers feel:** ${emotionalIndicators.slice(0, 3).join(', ')}`);
    }
    if (customerQuotes.length > 0) {
        lines.push('', `**Customer voice to weave in:** "${customerQuotes[0]}"`);
    }

    return lines.join('\n');
}

function seoReply(analysis: ChatAnalysis): string {
    const entityCount = analysis.knowledgeGraph.entities.length;
    const questions = analysis.research.frequentQuestions;

    const lines = [
        '**SEO Optimization Strategy**',
        '',
        `- **Trust score:** ${analysis.eeat.overallScore.toFixed(1)}/10`,
        `- **Content depth:** ${countWords(analysis.document.bodyText)} words`,
        `- **Topic coverage:** ${entityCount} key entities`,
        '',
        '**Improvements:**',
        list([
            'Use the entities as semantic keywords',
            'Link to related topics on your site',
            'Write a title and meta description around the main question',
        ]),
    ];

    if (questions.length > 0) {
        lines.push('', '**Questions to target in your FAQ:**', list(questions.slice(0, 3)));
    }

    return lines.join('\n');
}

function socialReply(analysis: ChatAnalysis): string {
    const quote = analysis.research.customerQuotes[0];
    return [
        '**Social Media Strategy**',
        '',
        list([
            'Facebook: storytelling and longer posts',
            'Instagram: visual summaries and carousels',
            'LinkedIn: professional insights and industry data',
            'Twitter: quick tips in thread format',
        ]),
        '',
        quote
            ? `**Hook idea:** open with a real customer voice: "${quote}"`
            : '**Hook idea:** open with the most common customer frustration.',
    ].join('\n');
}

function helpReply(analysis: ChatAnalysis): string {
    return [
        "**I'm here to help optimize your content.**",
        '',
        `- **Quality score:** ${analysis.quality.overallScore.toFixed(1)}/10`,
        `- **Trust score:** ${analysis.eeat.overallScore.toFixed(1)}/10`,
        `- **Content length:** ${countWords(analysis.document.bodyText)} words`,
        '',
        'Try asking about knowledge gaps, trust, improvements, SEO or social media.',
    ].join('\n');
}

/**
 * Route a chat message to the matching advice
 */
export function respondToChat(message: string, rawAnalysis: string): string {
    const analysis = parseAnalysis(rawAnalysis);
    if (!analysis) {
        return CHAT_ERROR_RESPONSE;
    }

    const text = message.toLowerCase();

    if (mentions(text, ['knowledge', 'gap', 'gaps', 'missing', 'cover'])) {
        return knowledgeGapReply(analysis);
    }
    if (mentions(text, ['trust', 'authority', 'credibility', 'eeat'])) {
        return trustReply(analysis);
    }
    if (mentions(text, ['improve', 'better', 'enhance', 'optimize'])) {
        return improvementReply(analysis);
    }
    if (mentions(text, ['seo', 'search', 'ranking', 'keywords'])) {
        return seoReply(analysis);
    }
    if (mentions(text, ['social', 'facebook', 'instagram', 'linkedin', 'twitter'])) {
        return socialReply(analysis);
    }
    return helpReply(analysis);
}
