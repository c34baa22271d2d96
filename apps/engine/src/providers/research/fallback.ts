/**
 * Deterministic research insights used when live research is unavailable
 */

import { PainPointCounts, ResearchInsights } from '../../pipeline/types';

export const FALLBACK_RESEARCH_QUALITY_SCORE = 35;

const TECH_TOPIC = /\b(laptop|tech|computer|software|phone|gadget)/;

const TECH_PAIN_POINTS: PainPointCounts = {
    confusion: 8,
    overwhelm: 7,
    cost_concerns: 9,
    complexity: 6,
    trust_issues: 4,
    support_needed: 7,
    quality_concerns: 6,
    time_constraints: 3,
};

const GENERIC_PAIN_POINTS: PainPointCounts = {
    confusion: 6,
    overwhelm: 5,
    cost_concerns: 5,
    complexity: 5,
    trust_issues: 4,
    support_needed: 6,
    quality_concerns: 3,
    time_constraints: 4,
};

export function buildFallbackInsights(topic: string): ResearchInsights {
    const isTech = TECH_TOPIC.test(topic.toLowerCase());

    if (isTech) {
        return {
            painPoints: { ...TECH_PAIN_POINTS },
            customerQuotes: [
                'I have no idea which specs actually matter for what I need',
                "Every review says something different and I'm overwhelmed",
                `Looking for honest advice on ${topic}`,
            ],
            frequentQuestions: [
                `What should I look for in ${topic}?`,
                'Is it worth paying more for better specs?',
                'Which brands are the most reliable?',
            ],
            emotionalIndicators: ['confused', 'anxious', 'frustrated'],
            postsAnalyzed: 0,
            commentsAnalyzed: 0,
            researchQualityScore: FALLBACK_RESEARCH_QUALITY_SCORE,
            sourceTag: 'fallback',
        };
    }

    return {
        painPoints: { ...GENERIC_PAIN_POINTS },
        customerQuotes: [
            `I need help with ${topic}`,
            `Looking for ${topic} advice`,
            'There is so much conflicting information out there',
        ],
        frequentQuestions: [
            `What is the best way to approach ${topic}?`,
            `How do I get started with ${topic}?`,
            `What mistakes should I avoid with ${topic}?`,
        ],
        emotionalIndicators: ['curious', 'confused'],
        postsAnalyzed: 0,
        commentsAnalyzed: 0,
        researchQualityScore: FALLBACK_RESEARCH_QUALITY_SCORE,
        sourceTag: 'fallback',
    };
}
