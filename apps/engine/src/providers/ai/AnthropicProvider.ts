import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../../logger';
import { AiProvider, GenerationOptions, ProviderSettings } from './AiProvider';
import { STRATEGIST_SYSTEM_PROMPT } from './prompts';

const logger = createLogger('anthropic-provider');

/**
 * Anthropic Messages API provider implementation
 */
export class AnthropicProvider implements AiProvider {
    readonly name = 'Anthropic';
    private client: Anthropic;
    private model: string;
    private apiKey: string;

    constructor(settings: ProviderSettings) {
        this.apiKey = settings.apiKey;
        this.model = settings.model;
        this.client = new Anthropic({
            apiKey: settings.apiKey,
            timeout: settings.timeoutMs,
            maxRetries: 0,
        });
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async complete(prompt: string, options?: GenerationOptions): Promise<string> {
        logger.debug('Generating completion', { promptLength: prompt.length });

        try {
            const response = await this.client.messages.create({
                model: this.model,
                max_tokens: options?.maxTokens ?? 1500,
                temperature: options?.temperature ?? 0.7,
                system: options?.systemPrompt || STRATEGIST_SYSTEM_PROMPT,
                messages: [{ role: 'user', content: prompt }],
            });

            const textBlock = response.content.find(block => block.type === 'text');
            const content = textBlock && textBlock.type === 'text' ? textBlock.text : '';

            logger.debug('Completion generated', {
                inputTokens: response.usage.input_tokens,
                outputTokens: response.usage.output_tokens,
            });

            return content;
        } catch (error) {
            logger.error('Anthropic API error', {
                error: error instanceof Error ? error.message : 'Unknown error',
            });
            throw error;
        }
    }
}
