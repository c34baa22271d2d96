import OpenAI from 'openai';
import { createLogger } from '../../logger';
import { AiProvider, GenerationOptions, ProviderSettings } from './AiProvider';
import { STRATEGIST_SYSTEM_PROMPT } from './prompts';

const logger = createLogger('openai-provider');

/**
 * OpenAI-based AI Provider implementation
 */
export class OpenAiProvider implements AiProvider {
    readonly name = 'OpenAI';
    private client: OpenAI;
    private model: string;
    private apiKey: string;

    constructor(settings: ProviderSettings) {
        this.apiKey = settings.apiKey;
        this.model = settings.model;
        this.client = new OpenAI({
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
            const response = await this.client.chat.completions.create({
                model: this.model,
                messages: [
                    { role: 'system', content: options?.systemPrompt || STRATEGIST_SYSTEM_PROMPT },
                    { role: 'user', content: prompt },
                ],
                temperature: options?.temperature ?? 0.7,
                max_tokens: options?.maxTokens ?? 1500,
            });

            const content = response.choices[0]?.message?.content || '';
            logger.debug('Completion generated', {
                tokens: response.usage?.total_tokens
            });

            return content;
        } catch (error) {
            logger.error('OpenAI API error', {
                error: error instanceof Error ? error.message : 'Unknown error',
            });
            throw error;
        }
    }
}
