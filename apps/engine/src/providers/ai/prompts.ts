/**
 * Prompt Templates
 *
 * All prompts are centralized here for easy modification.
 * Structured prompts spell out the exact JSON shape the agents parse.
 */

import { GenerationInput } from '../../content/ContentGenerator';
import { humanizeCategory, topPainPoints } from '../../content/insights';
import {
    BusinessContext,
    BusinessStrategy,
    ContentType,
    EEATAssessment,
    GeneratedDocument,
    HumanInputPlan,
    HumanInputs,
    IntentRecord,
    ResearchInsights,
} from '../../pipeline/types';

export const STRATEGIST_SYSTEM_PROMPT = `You are an expert content strategist with deep knowledge of SEO, E-E-A-T and customer psychology.

You write content that:
1. Speaks in the customer's own words, drawn from real community discussions.
2. Demonstrates first-hand experience and genuine expertise.
3. Stays accurate and avoids unverifiable claims.
4. Serves the reader's actual goal before any business goal.`;

export const JSON_SYSTEM_PROMPT = 'You are a precise analyst. Always respond in valid JSON format only, with no commentary before or after the JSON object.';

/**
 * Phrases that mark text as generic machine output
 */
export const GENERIC_AI_PHRASES = [
    "in today's fast-paced world",
    "in today's digital age",
    "it's important to note",
    'unlock the power',
    'game-changer',
    'dive into',
    'delve into',
    'ever-evolving landscape',
    'look no further',
    'navigate the complexities',
    'a testament to',
    'in the realm of',
];

function describeBusiness(context: BusinessContext): string {
    return [
        `Industry: ${context.industry || 'not specified'}`,
        `Target audience: ${context.targetAudience || 'not specified'}`,
        `Business type: ${context.businessType || 'not specified'}`,
        `Content goal: ${context.contentGoal || 'not specified'}`,
        `Unique value proposition: ${context.uniqueValueProp || 'not specified'}`,
        `Brand voice: ${context.brandVoice || 'not specified'}`,
    ].join('\n');
}

function describeResearch(research: ResearchInsights): string {
    const painPoints = topPainPoints(research, 5)
        .map(category => `${humanizeCategory(category)} (${research.painPoints[category]})`);

    return [
        `Top customer pain points: ${painPoints.join(', ') || 'none detected'}`,
        `Customer questions: ${research.frequentQuestions.slice(0, 5).join(' | ') || 'none collected'}`,
        `Customer quotes: ${research.customerQuotes.slice(0, 3).map(q => `"${q}"`).join(' | ') || 'none collected'}`,
        `Emotional indicators: ${research.emotionalIndicators.join(', ') || 'none detected'}`,
    ].join('\n');
}

function describeHumanInputs(inputs: HumanInputs): string {
    return [
        `Customer pain points (from the business): ${inputs.customerPainPoints || 'not provided'}`,
        `Questions customers ask: ${inputs.frequentQuestions || 'not provided'}`,
        `Customer success story: ${inputs.successStory || 'not provided'}`,
    ].join('\n');
}

export const INTENT_PROMPT = (topic: string): string => `
Analyze the search intent behind this topic: "${topic}"

Respond with a JSON object of exactly this shape:
{
  "primary_intent": "commercial" | "informational" | "navigational" | "commercial_informational",
  "search_stage": "awareness" | "consideration" | "decision",
  "target_audience": "short description of who searches this",
  "user_goals": ["goal 1", "goal 2"],
  "content_type_recommendation": "comprehensive_guide" | "blog_post" | "how_to" | "listicle" | "comparison"
}
`;

export const JOURNEY_PROMPT = (topic: string, intent: IntentRecord): string => `
Map the customer journey for someone researching: "${topic}"

Known intent: ${intent.primaryIntent}, stage: ${intent.searchStage}, audience: ${intent.targetAudience}

Respond with a JSON object of exactly this shape:
{
  "primary_stage": "awareness" | "consideration" | "decision",
  "key_pain_points": ["pain point 1", "pain point 2"],
  "emotional_triggers": ["trigger 1", "trigger 2"],
  "content_opportunities": ["opportunity 1", "opportunity 2"]
}
`;

export const CONTENT_TYPE_PROMPT = (
    topic: string,
    intent: IntentRecord,
    research: ResearchInsights,
    business: BusinessContext
): string => `
Choose the best content format for the topic "${topic}".

Search intent: ${intent.primaryIntent} (${intent.searchStage})
${describeResearch(research)}

Business context:
${describeBusiness(business)}

Respond with a JSON object of exactly this shape:
{
  "content_type": "comprehensive_guide" | "blog_post" | "how_to" | "listicle" | "comparison",
  "reasoning": "one or two sentences",
  "alternatives": ["other suitable content types"]
}
`;

export const BUSINESS_STRATEGY_PROMPT = (
    topic: string,
    business: BusinessContext,
    research: ResearchInsights
): string => `
Analyze this business context to decide how it should approach "${topic}".

Business context:
${describeBusiness(business)}

Community research:
${describeResearch(research)}

Respond with a JSON object of exactly this shape:
{
  "content_angle": "best angle for this business to approach the topic",
  "key_differentiators": ["unique points this business should emphasize"],
  "audience_insights": {
    "primary_motivations": ["what drives their audience"],
    "preferred_communication_style": "how to communicate with them",
    "decision_factors": ["what influences their decisions"]
  },
  "competitive_advantages": ["how to position against competitors"],
  "content_hooks": ["compelling angles based on business strengths"],
  "trust_signals": ["credibility elements to include"],
  "customization_opportunities": ["where to add business-specific details"]
}
`;

/**
 * Kinds of knowledge a writer cannot invent
 */
export const HUMAN_INPUT_CATEGORIES: Record<string, string> = {
    business_specific: 'Company policies, procedures, unique value props',
    experiential: 'Personal experiences, case studies, testimonials',
    technical_expertise: 'Industry-specific technical knowledge',
    current_data: 'Real-time pricing, availability, specifications',
    brand_voice: 'Company tone, messaging, brand personality',
    legal_compliance: 'Industry regulations, disclaimers, legal requirements',
    competitive_advantage: 'What makes you different from competitors',
    customer_insights: 'Specific customer feedback, success stories',
};

export const HUMAN_INPUT_PROMPT = (
    topic: string,
    contentType: ContentType,
    business: BusinessContext,
    inputs: HumanInputs
): string => `
Identify where human input is essential for a ${contentType.replace(/_/g, ' ')} about "${topic}".

Business context:
${describeBusiness(business)}

Already provided by the business:
${describeHumanInputs(inputs)}

Categories:
${Object.entries(HUMAN_INPUT_CATEGORIES).map(([name, description]) => `- ${name}: ${description}`).join('\n')}

For each category that applies, say why a person is needed, what to ask them and how critical it is.

Respond with a JSON object of exactly this shape:
{
  "required_inputs": [
    {
      "category": "category_name",
      "reasoning": "why needed",
      "questions": ["specific question 1", "specific question 2"],
      "priority": "critical" | "important" | "nice-to-have",
      "impact": "how this affects content quality"
    }
  ],
  "ai_can_handle": ["aspects the writer can cover without human input"],
  "collaboration_points": ["moments where a person should review the draft"]
}
`;

export const EEAT_PROMPT = (
    topic: string,
    contentType: ContentType,
    business: BusinessContext,
    inputs: HumanInputs,
    research: ResearchInsights,
    isYmyl: boolean
): string => `
Assess how well the following inputs support E-E-A-T (Experience, Expertise, Authoritativeness, Trustworthiness) for a ${contentType.replace(/_/g, ' ')} about "${topic}".
${isYmyl ? '\nThis is a YMYL (Your Money or Your Life) topic. Apply strict standards.\n' : ''}
Business context:
${describeBusiness(business)}

${describeHumanInputs(inputs)}

Research: ${research.postsAnalyzed} posts and ${research.commentsAnalyzed} comments analyzed.

Score each component from 1 to 10 and respond with a JSON object of exactly this shape:
{
  "component_scores": {
    "experience": 0,
    "expertise": 0,
    "authoritativeness": 0,
    "trustworthiness": 0
  },
  "improvement_recommendations": ["recommendation 1", "recommendation 2"]
}
`;

export const QUALITY_PROMPT = (
    document: GeneratedDocument,
    topic: string,
    business: BusinessContext,
    inputs: HumanInputs,
    eeat: EEATAssessment
): string => `
Score this ${document.contentType.replace(/_/g, ' ')} about "${topic}" against the quality rubric.

Business context:
${describeBusiness(business)}

${describeHumanInputs(inputs)}

E-E-A-T score of the inputs: ${eeat.overallScore}/10

Rubric factors, each scored 1-10:
- authenticity: sounds like real people with real experience
- emotional_connection: speaks to the reader's feelings and frustrations
- industry_insight: shows knowledge beyond the obvious
- accuracy: claims are correct and verifiable
- originality: offers something competing pages do not
- contextual_relevance: fits the audience and business goal

Content (${document.wordCount} words):
${document.bodyText.slice(0, 6000)}

Respond with a JSON object of exactly this shape:
{
  "quality_scores": {
    "authenticity": 0,
    "emotional_connection": 0,
    "industry_insight": 0,
    "accuracy": 0,
    "originality": 0,
    "contextual_relevance": 0
  },
  "performance_prediction": "short prediction",
  "traffic_multiplier_estimate": "for example 2-3x",
  "critical_improvements": ["improvement 1", "improvement 2"]
}
`;

/**
 * Per-type writing instructions
 */
const CONTENT_TYPE_INSTRUCTIONS: Record<ContentType, string> = {
    comprehensive_guide: `Write a comprehensive guide of 2500-3500 words.
Structure: introduction, background, at least six in-depth sections with H2 and H3 headings, common mistakes, a Frequently Asked Questions section, and a conclusion with next steps.`,
    blog_post: `Write an engaging blog post of 1200-1800 words.
Structure: a hook that names the reader's frustration, four to six H2 sections, a short Frequently Asked Questions section, and a closing call to action.`,
    how_to: `Write a step-by-step how-to guide of 1500-2500 words.
Structure: what the reader will achieve, what they need before starting, numbered steps under H2 headings, troubleshooting, a Frequently Asked Questions section, and next steps.`,
    listicle: `Write a listicle of 1500-2200 words.
Structure: a short introduction, seven to ten numbered items each under an H2 heading with a concrete explanation, how to choose, a Frequently Asked Questions section, and a call to action.`,
    comparison: `Write a comparison article of 1800-2500 words.
Structure: what is being compared and why it matters, comparison criteria, a section per option under H2 headings, a side-by-side summary table, who should choose what, a Frequently Asked Questions section, and a recommendation.`,
};

function describeStrategyExtras(strategy: BusinessStrategy): string {
    return [
        `Trust signals to include: ${strategy.trustSignals.join(', ') || 'none'}`,
        `Hooks: ${strategy.contentHooks.join(', ') || 'none'}`,
        `Reader decision factors: ${strategy.audienceInsights.decisionFactors.join(', ') || 'none'}`,
    ].join('\n');
}

/**
 * Critical inputs nobody supplied become marked placeholders in the draft
 */
function describeMissingInputs(plan: HumanInputPlan): string {
    const critical = plan.requiredInputs.filter(input => input.priority === 'critical');
    if (critical.length === 0) return '';
    return `5. Where these still-missing details belong, insert a [NEEDS INPUT: ...] placeholder instead of inventing them: ${critical.map(input => input.category).join(', ')}.\n`;
}

export const CONTENT_PROMPT = (input: GenerationInput): string => `
${CONTENT_TYPE_INSTRUCTIONS[input.contentType]}

Topic: "${input.topic}"

Business context:
${describeBusiness(input.businessContext)}

${describeHumanInputs(input.humanInputs)}

Community research:
${describeResearch(input.research)}

Customer journey: ${input.journey.primaryStage} stage
Key pain points: ${input.journey.keyPainPoints.join(', ')}
Emotional triggers: ${input.journey.emotionalTriggers.join(', ')}

Business angle: ${input.businessStrategy.contentAngle}
Differentiators to emphasize: ${input.businessStrategy.keyDifferentiators.join(', ') || 'none'}
${describeStrategyExtras(input.businessStrategy)}
Entities to cover: ${input.knowledgeGraph.entities.join(', ') || 'none'}
Content gaps competitors miss: ${input.knowledgeGraph.contentGaps.join(', ') || 'none'}
${input.eeat.isYMYL ? '\nThis is a YMYL topic: cite authoritative sources and add an appropriate disclaimer.\n' : ''}
REQUIREMENTS:
1. Use markdown headings (#, ##, ###).
2. Quote or paraphrase the customer language above where it fits.
3. Include the success story as a concrete example when one is provided.
4. Write in the brand voice given above.
${describeMissingInputs(input.humanInputPlan)}
AVOID these phrases: ${GENERIC_AI_PHRASES.map(p => `"${p}"`).join(', ')}
`;

/**
 * Token budget per content type
 */
export const CONTENT_MAX_TOKENS: Record<ContentType, number> = {
    comprehensive_guide: 4000,
    blog_post: 2500,
    how_to: 3000,
    listicle: 3000,
    comparison: 3500,
};
