/**
 * AI Provider Factory
 *
 * Returns the configured AI provider based on environment settings.
 * A provider without credentials is replaced by one that always fails,
 * which routes every LLM stage to its fallback.
 */

import { AppConfig } from '../../config';
import { UpstreamUnavailableError } from '../../errors';
import { createLogger } from '../../logger';
import { AiProvider } from './AiProvider';
import { AnthropicProvider } from './AnthropicProvider';
import { GeminiProvider } from './GeminiProvider';
import { OpenAiProvider } from './OpenAiProvider';

const logger = createLogger('ai-provider');

/**
 * Stand-in used when no API key is configured
 */
export class UnconfiguredAiProvider implements AiProvider {
    readonly name: string;

    constructor(name: string) {
        this.name = name;
    }

    isConfigured(): boolean {
        return false;
    }

    async complete(): Promise<string> {
        throw new UpstreamUnavailableError(this.name, 'no API key configured');
    }
}

/**
 * Build the provider selected by AI_PROVIDER
 */
export function createAiProvider(cfg: AppConfig): AiProvider {
    const timeoutMs = cfg.ai.timeoutMs;
    let provider: AiProvider;

    switch (cfg.ai.provider) {
        case 'gemini':
            provider = new GeminiProvider({ ...cfg.gemini, timeoutMs });
            break;

        case 'openai':
            provider = new OpenAiProvider({ ...cfg.openai, timeoutMs });
            break;

        case 'anthropic':
        default:
            provider = new AnthropicProvider({ ...cfg.anthropic, timeoutMs });
            break;
    }

    if (!provider.isConfigured()) {
        logger.warn('AI provider not configured, LLM stages will use fallbacks', {
            provider: provider.name,
        });
        return new UnconfiguredAiProvider(provider.name);
    }

    logger.info(`Using ${provider.name} AI provider`);
    return provider;
}
