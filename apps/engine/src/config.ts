import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type AiProviderName = 'openai' | 'gemini' | 'anthropic';

function parseProvider(value: string | undefined): AiProviderName {
    if (value === 'openai' || value === 'gemini' || value === 'anthropic') {
        return value;
    }
    return 'anthropic';
}

/**
 * Application configuration loaded from environment variables
 */
export const config = {
    // Node environment
    nodeEnv: process.env.NODE_ENV || 'development',
    isDev: process.env.NODE_ENV !== 'production',

    // HTTP server
    server: {
        port: parseInt(process.env.PORT || '8002', 10),
    },

    // AI Provider selection: 'openai', 'gemini' or 'anthropic'
    ai: {
        provider: parseProvider(process.env.AI_PROVIDER),
        timeoutMs: parseInt(process.env.AI_TIMEOUT_MS || '30000', 10),
    },

    // OpenAI
    openai: {
        apiKey: process.env.OPENAI_API_KEY || '',
        model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    },

    // Gemini
    gemini: {
        apiKey: process.env.GEMINI_API_KEY || '',
        model: process.env.GEMINI_MODEL || 'gemini-1.5-flash',
    },

    // Anthropic
    anthropic: {
        apiKey: process.env.ANTHROPIC_API_KEY || '',
        model: process.env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-20241022',
    },

    // Reddit research
    reddit: {
        clientId: process.env.REDDIT_CLIENT_ID || '',
        clientSecret: process.env.REDDIT_CLIENT_SECRET || '',
        userAgent: process.env.REDDIT_USER_AGENT || 'CustomerVoiceContent/1.0',
        requestDelayMs: parseInt(process.env.REDDIT_REQUEST_DELAY_MS || '1000', 10),
        maxPostsPerCommunity: parseInt(process.env.REDDIT_MAX_POSTS_PER_COMMUNITY || '10', 10),
        timeoutMs: parseInt(process.env.REDDIT_TIMEOUT_MS || '30000', 10),
    },

    // Optional knowledge graph API
    knowledgeGraph: {
        url: process.env.KNOWLEDGE_GRAPH_URL || '',
        apiKey: process.env.KNOWLEDGE_GRAPH_API_KEY || '',
        timeoutMs: parseInt(process.env.KNOWLEDGE_GRAPH_TIMEOUT_MS || '30000', 10),
    },

    // Content audit thresholds
    quality: {
        minHeadings: parseInt(process.env.MIN_HEADINGS || '3', 10),
        minWordCount: parseInt(process.env.MIN_WORD_COUNT || '500', 10),
    },

    // Logging
    logging: {
        level: process.env.LOG_LEVEL || 'info',
    },
} as const;

export type AppConfig = typeof config;

/**
 * Check configuration for missing credentials.
 *
 * Nothing here is fatal: every missing credential routes the matching
 * component to its fallback implementation.
 */
export function validateConfig(cfg: AppConfig = config): string[] {
    const warnings: string[] = [];

    const aiProvider = cfg.ai.provider;
    if (aiProvider === 'openai' && !cfg.openai.apiKey) {
        warnings.push('OPENAI_API_KEY is missing - LLM stages will use fallbacks');
    }
    if (aiProvider === 'gemini' && !cfg.gemini.apiKey) {
        warnings.push('GEMINI_API_KEY is missing - LLM stages will use fallbacks');
    }
    if (aiProvider === 'anthropic' && !cfg.anthropic.apiKey) {
        warnings.push('ANTHROPIC_API_KEY is missing - LLM stages will use fallbacks');
    }

    if (!cfg.reddit.clientId || !cfg.reddit.clientSecret) {
        warnings.push('REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET are missing - research will use fallback insights');
    }

    if (!cfg.knowledgeGraph.url) {
        warnings.push('KNOWLEDGE_GRAPH_URL is not set - knowledge graph insights will be generated locally');
    }

    return warnings;
}

export default config;
