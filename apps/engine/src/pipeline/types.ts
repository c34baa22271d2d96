/**
 * Pipeline Types
 *
 * Shared type definitions for the content pipeline.
 */

/**
 * Content types the generators know how to produce
 */
export const CONTENT_TYPES = [
    'comprehensive_guide',
    'blog_post',
    'how_to',
    'listicle',
    'comparison',
] as const;

export type ContentType = typeof CONTENT_TYPES[number];

export const PRIMARY_INTENTS = [
    'commercial',
    'informational',
    'navigational',
    'commercial_informational',
] as const;

export type PrimaryIntent = typeof PRIMARY_INTENTS[number];

export const SEARCH_STAGES = ['awareness', 'consideration', 'decision'] as const;

export type SearchStage = typeof SEARCH_STAGES[number];

export const PAIN_POINT_CATEGORIES = [
    'confusion',
    'overwhelm',
    'cost_concerns',
    'complexity',
    'trust_issues',
    'support_needed',
    'quality_concerns',
    'time_constraints',
] as const;

export type PainPointCategory = typeof PAIN_POINT_CATEGORIES[number];

export type PainPointCounts = Record<PainPointCategory, number>;

/**
 * Whether a record came from the live upstream or a deterministic substitute
 */
export type SourceTag = 'live' | 'fallback';

/**
 * YMYL (Your Money Your Life) category
 */
export type YmylCategory = 'health' | 'finance' | 'legal' | 'safety' | 'none';

export interface BusinessContext {
    industry: string;
    targetAudience: string;
    businessType: string;
    contentGoal: string;
    uniqueValueProp: string;
    brandVoice: string;
}

export interface HumanInputs {
    customerPainPoints: string;
    frequentQuestions: string;
    successStory: string;
}

/**
 * Everything one pipeline run needs, created once per inbound request
 */
export interface RequestContext {
    topic: string;
    targetCommunities: string[];
    businessContext: BusinessContext;
    humanInputs: HumanInputs;
}

export interface IntentRecord {
    primaryIntent: PrimaryIntent;
    searchStage: SearchStage;
    targetAudience: string;
    recommendedContentType: ContentType;
    userGoals: string[];
}

export interface JourneyRecord {
    primaryStage: SearchStage;
    keyPainPoints: string[];
    emotionalTriggers: string[];
    contentOpportunities: string[];
}

export interface ContentTypeRecord {
    contentType: ContentType;
    reasoning: string;
    alternatives: ContentType[];
}

export interface ResearchInsights {
    painPoints: PainPointCounts;
    customerQuotes: string[];
    frequentQuestions: string[];
    emotionalIndicators: string[];
    postsAnalyzed: number;
    commentsAnalyzed: number;
    /** 0-100 */
    researchQualityScore: number;
    sourceTag: SourceTag;
}

export interface KnowledgeGraphInsights {
    entities: string[];
    relatedTopics: string[];
    contentGaps: string[];
    sourceTag: SourceTag;
}

export interface AudienceInsights {
    primaryMotivations: string[];
    preferredCommunicationStyle: string;
    decisionFactors: string[];
}

/**
 * How this business should approach the topic
 */
export interface BusinessStrategy {
    contentAngle: string;
    keyDifferentiators: string[];
    audienceInsights: AudienceInsights;
    competitiveAdvantages: string[];
    contentHooks: string[];
    trustSignals: string[];
    customizationOpportunities: string[];
}

export const INPUT_PRIORITIES = ['critical', 'important', 'nice-to-have'] as const;

export type InputPriority = typeof INPUT_PRIORITIES[number];

/**
 * Information only a person at the business can supply
 */
export interface RequiredInput {
    category: string;
    reasoning: string;
    questions: string[];
    priority: InputPriority;
    impact: string;
}

export interface HumanInputPlan {
    requiredInputs: RequiredInput[];
    aiCanHandle: string[];
    collaborationPoints: string[];
}

export const EEAT_COMPONENTS = [
    'experience',
    'expertise',
    'authoritativeness',
    'trustworthiness',
] as const;

export type EeatComponent = typeof EEAT_COMPONENTS[number];

export type EeatComponentScores = Record<EeatComponent, number>;

export interface EEATAssessment {
    /** 0-10 */
    overallScore: number;
    componentScores: EeatComponentScores;
    isYMYL: boolean;
    ymylCategory: YmylCategory;
    improvementRecommendations: string[];
}

export type GenerationStrategy = 'template' | 'llm';

export interface GeneratedDocument {
    contentType: ContentType;
    bodyText: string;
    wordCount: number;
    strategy: GenerationStrategy;
}

/**
 * Structural checks over a generated document
 */
export interface ContentAudit {
    headingCount: number;
    wordCount: number;
    hasFaq: boolean;
    hasCallToAction: boolean;
    genericPhrasesFound: string[];
    issues: string[];
}

export const QUALITY_FACTORS = [
    'authenticity',
    'emotional_connection',
    'industry_insight',
    'accuracy',
    'originality',
    'contextual_relevance',
] as const;

export type QualityFactor = typeof QUALITY_FACTORS[number];

export interface QualityAssessment {
    /** 0-10 */
    overallScore: number;
    factorScores: Record<QualityFactor, number>;
    performancePrediction: string;
    trafficMultiplierEstimate: string;
    criticalImprovements: string[];
}

export type StageName =
    | 'research'
    | 'knowledgeGraph'
    | 'intent'
    | 'journey'
    | 'contentType'
    | 'businessStrategy'
    | 'humanInputPlan'
    | 'eeat'
    | 'generation'
    | 'quality';

export interface StageStatus {
    mode: SourceTag;
    reason?: string;
}

export type SystemStatus = Record<StageName, StageStatus>;

/**
 * Aggregate of one pipeline run, handed to the presentation layer
 */
export interface PipelineResult {
    request: RequestContext;
    research: ResearchInsights;
    knowledgeGraph: KnowledgeGraphInsights;
    intent: IntentRecord;
    journey: JourneyRecord;
    contentType: ContentTypeRecord;
    businessStrategy: BusinessStrategy;
    humanInputPlan: HumanInputPlan;
    eeat: EEATAssessment;
    document: GeneratedDocument;
    audit: ContentAudit;
    quality: QualityAssessment;
    systemStatus: SystemStatus;
}
