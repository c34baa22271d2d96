export { SocialResearchCollector, FallbackResearchCollector } from './SocialResearchCollector';
export { RedditResearchCollector, isRelevantPost, selectComments } from './RedditResearchCollector';
export { RedditClient, RedditCredentials, RedditPost, RedditComment } from './RedditClient';
export { analyzeCollectedPosts, researchQualityScore, CollectedPost } from './analysis';
export { buildFallbackInsights, FALLBACK_RESEARCH_QUALITY_SCORE } from './fallback';
