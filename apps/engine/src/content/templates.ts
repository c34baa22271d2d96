/**
 * Markdown templates, one per content type
 *
 * Pure functions of their input: the same brief always renders the same
 * document.
 */

import { ContentType } from '../pipeline/types';
import { GenerationInput } from './ContentGenerator';
import { humanizeCategory, splitLines, topPainPoints } from './insights';

interface TemplateBrief {
    topic: string;
    audience: string;
    industry: string;
    businessType: string;
    uniqueValueProp: string;
    painPoints: string[];
    quotes: string[];
    questions: string[];
    successStory: string;
    entities: string[];
    gaps: string[];
    trustSignals: string[];
    disclaimer: string;
}

function buildBrief(input: GenerationInput): TemplateBrief {
    const researchPainPoints = topPainPoints(input.research, 3).map(humanizeCategory);
    const questions = [
        ...splitLines(input.humanInputs.frequentQuestions),
        ...input.research.frequentQuestions,
    ];

    return {
        topic: input.topic,
        audience: input.businessContext.targetAudience || input.intent.targetAudience,
        industry: input.businessContext.industry,
        businessType: input.businessContext.businessType,
        uniqueValueProp: input.businessContext.uniqueValueProp.trim(),
        painPoints: researchPainPoints.length > 0 ? researchPainPoints : input.journey.keyPainPoints,
        quotes: input.research.customerQuotes.slice(0, 2),
        questions: [...new Set(questions)].slice(0, 5),
        successStory: input.humanInputs.successStory.trim(),
        entities: input.knowledgeGraph.entities.slice(0, 5),
        gaps: input.knowledgeGraph.contentGaps.slice(0, 3),
        trustSignals: input.businessStrategy.trustSignals.slice(0, 4),
        disclaimer: input.eeat.isYMYL
            ? '> **Disclaimer:** This article is for general information only. Consult a qualified professional before making decisions about your health, finances or legal situation.'
            : '',
    };
}

function bullets(items: string[]): string {
    return items.map(item => `- ${item}`).join('\n');
}

function quoteBlock(brief: TemplateBrief): string {
    if (brief.quotes.length === 0) {
        return `People researching ${brief.topic} keep running into the same walls.`;
    }
    return brief.quotes.map(quote => `> "${quote}"`).join('\n>\n');
}

function storySection(brief: TemplateBrief): string {
    if (!brief.successStory) {
        return `Every ${brief.audience} who gets ${brief.topic} right starts by naming the real problem. Write down yours before reading on.`;
    }
    return brief.successStory;
}

function expertiseLine(brief: TemplateBrief): string {
    const who = brief.businessType || 'our team';
    return brief.uniqueValueProp
        ? `As a ${who}${brief.industry ? ` in ${brief.industry}` : ''}, ${brief.uniqueValueProp}`
        : `This guide draws on what ${brief.audience} actually ask about ${brief.topic}.`;
}

function faqSection(brief: TemplateBrief): string {
    const questions = brief.questions.length > 0
        ? brief.questions
        : [`Where should I start with ${brief.topic}?`];

    return [
        '## Frequently Asked Questions',
        '',
        ...questions.flatMap(question => [
            `### ${question}`,
            '',
            `The short answer depends on your situation, but the sections above on ${brief.painPoints[0] || brief.topic} cover the deciding factors.`,
            '',
        ]),
    ].join('\n');
}

/**
 * Empty when the strategy named no trust signals
 */
function trustSection(brief: TemplateBrief): string[] {
    if (brief.trustSignals.length === 0) return [];
    return ['## Why You Can Trust This Guide', bullets(brief.trustSignals)];
}

function nextSteps(brief: TemplateBrief): string {
    return [
        '## Next Steps',
        '',
        `Ready to get started with ${brief.topic}? Reach out with your questions and we will help you choose with confidence.`,
    ].join('\n');
}

function compose(sections: string[], brief: TemplateBrief): string {
    const parts = brief.disclaimer ? [...sections, brief.disclaimer] : sections;
    return `${parts.join('\n\n').trim()}\n`;
}

function comprehensiveGuide(brief: TemplateBrief): string {
    return compose([
        `# The Complete Guide to ${brief.topic}`,
        `${expertiseLine(brief)}`,
        '## Why This Is Harder Than It Looks',
        quoteBlock(brief),
        `The most common sticking points are:\n\n${bullets(brief.painPoints)}`,
        '## The Fundamentals',
        brief.entities.length > 0
            ? `Before making any decision, get comfortable with these ideas:\n\n${bullets(brief.entities)}`
            : `Before making any decision, be clear on what you need ${brief.topic} to do for you.`,
        '## Step-by-Step Approach',
        [
            '### 1. Define what matters to you',
            `List the outcomes you want and rank them. This cuts through most of the ${brief.painPoints[0] || 'confusion'}.`,
            '### 2. Set a realistic budget',
            'Decide your ceiling before you compare options, and leave room for extras.',
            '### 3. Compare a short list',
            'Narrow the field to three candidates and evaluate them against your ranked outcomes.',
        ].join('\n\n'),
        '## What Most Guides Leave Out',
        brief.gaps.length > 0
            ? bullets(brief.gaps)
            : `Most guides skip the trade-offs. We cover them here so you can decide about ${brief.topic} without second-guessing.`,
        '## A Real Example',
        storySection(brief),
        '## Common Mistakes to Avoid',
        bullets([
            'Deciding on price alone',
            'Trusting a single review',
            'Ignoring long-term costs',
        ]),
        ...trustSection(brief),
        faqSection(brief),
        nextSteps(brief),
    ], brief);
}

function blogPost(brief: TemplateBrief): string {
    return compose([
        `# What Nobody Tells You About ${brief.topic}`,
        quoteBlock(brief),
        `If that sounds familiar, you are not alone. ${expertiseLine(brief)}`,
        '## The Real Problem',
        `When people talk about ${brief.topic}, the same frustrations come up again and again:\n\n${bullets(brief.painPoints)}`,
        '## What Actually Works',
        `Focus on the one or two factors that matter for your situation and ignore the noise around ${brief.topic}.`,
        '## A Story Worth Hearing',
        storySection(brief),
        ...trustSection(brief),
        faqSection(brief),
        nextSteps(brief),
    ], brief);
}

function howTo(brief: TemplateBrief): string {
    return compose([
        `# How to Approach ${brief.topic}: A Step-by-Step Guide`,
        `${expertiseLine(brief)}`,
        '## What You Will Achieve',
        `By the end of this guide you will have a clear plan for ${brief.topic} without the usual ${brief.painPoints[0] || 'guesswork'}.`,
        '## Before You Start',
        bullets(['A clear goal', 'A budget ceiling', 'Thirty minutes of focused time']),
        '## Step 1: Clarify Your Needs',
        'Write down the three outcomes that matter most.',
        '## Step 2: Research Your Options',
        brief.entities.length > 0
            ? `Look into these areas first:\n\n${bullets(brief.entities)}`
            : 'Gather a short list of options from trusted sources.',
        '## Step 3: Compare and Decide',
        'Score each option against your outcomes and pick the strongest fit.',
        '## Troubleshooting',
        quoteBlock(brief),
        `If you hit ${brief.painPoints.join(', ')}, go back to Step 1 and tighten your criteria.`,
        '## Real-World Example',
        storySection(brief),
        ...trustSection(brief),
        faqSection(brief),
        nextSteps(brief),
    ], brief);
}

function listicle(brief: TemplateBrief): string {
    const items: Array<[string, string]> = [
        ['Start with your actual needs', `Most regret around ${brief.topic} comes from buying for someone else's use case.`],
        ['Set a firm budget', 'Decide the ceiling first and compare within it.'],
        ['Read real user experiences', quoteBlock(brief)],
        ['Check long-term costs', 'Upkeep, upgrades and support often outweigh the sticker price.'],
        ['Look for honest trade-offs', 'Every option gives something up. Know what you are willing to lose.'],
        ['Ask the right questions', brief.questions.length > 0 ? bullets(brief.questions.slice(0, 3)) : 'Write down your questions before you compare.'],
        ['Learn from others', storySection(brief)],
    ];

    return compose([
        `# ${items.length} Things to Know About ${brief.topic}`,
        `${expertiseLine(brief)}`,
        ...items.flatMap(([heading, body], index) => [`## ${index + 1}. ${heading}`, body]),
        '## How to Choose',
        `Weigh each point against the problems you care about most:\n\n${bullets(brief.painPoints)}`,
        ...trustSection(brief),
        faqSection(brief),
        nextSteps(brief),
    ], brief);
}

function comparison(brief: TemplateBrief): string {
    return compose([
        `# ${brief.topic}: An Honest Comparison`,
        `${expertiseLine(brief)}`,
        '## Why This Comparison Matters',
        quoteBlock(brief),
        '## How We Compared',
        bullets(['Total cost of ownership', 'Ease of use', 'Reliability', 'Support and trust']),
        '## Option A: The Budget Pick',
        'Best when cost is the deciding factor and needs are simple.',
        '## Option B: The Balanced Pick',
        'Best for most people: fair price, few compromises.',
        '## Option C: The Premium Pick',
        'Best when reliability and support matter more than price.',
        '## Side-by-Side Summary',
        [
            '| Criterion | Budget | Balanced | Premium |',
            '| --- | --- | --- | --- |',
            '| Cost | Low | Medium | High |',
            '| Ease of use | Medium | High | High |',
            '| Reliability | Medium | High | Very high |',
        ].join('\n'),
        '## Who Should Choose What',
        `If your biggest concerns are ${brief.painPoints.join(', ')}, start with the balanced pick and adjust from there.`,
        '## A Real Example',
        storySection(brief),
        ...trustSection(brief),
        faqSection(brief),
        nextSteps(brief),
    ], brief);
}

const TEMPLATES: Record<ContentType, (brief: TemplateBrief) => string> = {
    comprehensive_guide: comprehensiveGuide,
    blog_post: blogPost,
    how_to: howTo,
    listicle,
    comparison,
};

export function renderTemplate(input: GenerationInput): string {
    const render = TEMPLATES[input.contentType] || comprehensiveGuide;
    return render(buildBrief(input));
}
