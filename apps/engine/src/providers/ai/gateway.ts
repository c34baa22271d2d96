/**
 * LLM Gateway
 *
 * Single entry point for every language-model call in the pipeline.
 * Any provider failure, including an empty completion, surfaces as
 * UpstreamUnavailableError. There are no retries.
 */

import { UpstreamUnavailableError, errorMessage } from '../../errors';
import { createLogger } from '../../logger';
import { AiProvider, GenerationOptions } from './AiProvider';
import { JSON_SYSTEM_PROMPT, STRATEGIST_SYSTEM_PROMPT } from './prompts';

const logger = createLogger('llm-gateway');

export class LlmGateway {
    private readonly provider: AiProvider;

    constructor(provider: AiProvider) {
        this.provider = provider;
    }

    get providerName(): string {
        return this.provider.name;
    }

    isConfigured(): boolean {
        return this.provider.isConfigured();
    }

    /**
     * Free-form generation with the strategist persona
     */
    async generateText(prompt: string, maxTokens = 1500): Promise<string> {
        return this.call(prompt, {
            systemPrompt: STRATEGIST_SYSTEM_PROMPT,
            temperature: 0.7,
            maxTokens,
        });
    }

    /**
     * Lower-temperature generation that asks for a JSON object.
     * The caller is responsible for parsing the text.
     */
    async generateJson(prompt: string): Promise<string> {
        return this.call(prompt, {
            systemPrompt: JSON_SYSTEM_PROMPT,
            temperature: 0.5,
            maxTokens: 1000,
        });
    }

    private async call(prompt: string, options: GenerationOptions): Promise<string> {
        let text: string;
        try {
            text = await this.provider.complete(prompt, options);
        } catch (error) {
            if (error instanceof UpstreamUnavailableError) {
                throw error;
            }
            logger.warn('LLM call failed', {
                provider: this.provider.name,
                error: errorMessage(error),
            });
            throw new UpstreamUnavailableError(this.provider.name, errorMessage(error));
        }

        if (!text.trim()) {
            throw new UpstreamUnavailableError(this.provider.name, 'empty completion');
        }

        return text;
    }
}
