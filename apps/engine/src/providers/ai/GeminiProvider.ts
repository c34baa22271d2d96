import axios, { AxiosInstance } from 'axios';
import { createLogger } from '../../logger';
import { AiProvider, GenerationOptions, ProviderSettings } from './AiProvider';
import { STRATEGIST_SYSTEM_PROMPT } from './prompts';

const logger = createLogger('gemini-provider');

interface GeminiResponse {
    candidates?: Array<{
        content?: {
            parts?: Array<{ text?: string }>;
        };
    }>;
}

interface GeminiErrorBody {
    error?: { message?: string };
}

/**
 * Google Gemini AI Provider implementation
 */
export class GeminiProvider implements AiProvider {
    readonly name = 'Gemini';
    private apiKey: string;
    private model: string;
    private timeoutMs: number;
    private http: AxiosInstance;
    private baseUrl = 'https://generativelanguage.googleapis.com/v1';

    constructor(settings: ProviderSettings, http: AxiosInstance = axios.create()) {
        this.apiKey = settings.apiKey;
        this.model = settings.model;
        this.timeoutMs = settings.timeoutMs;
        this.http = http;
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async complete(prompt: string, options?: GenerationOptions): Promise<string> {
        logger.debug('Generating completion with Gemini', { promptLength: prompt.length });

        try {
            const systemPrompt = options?.systemPrompt || STRATEGIST_SYSTEM_PROMPT;
            const fullPrompt = `${systemPrompt}\n\n${prompt}`;

            const response = await this.http.post<GeminiResponse>(
                `${this.baseUrl}/models/${this.model}:generateContent`,
                {
                    contents: [
                        {
                            parts: [{ text: fullPrompt }]
                        }
                    ],
                    generationConfig: {
                        temperature: options?.temperature ?? 0.7,
                        maxOutputTokens: options?.maxTokens ?? 1500,
                    }
                },
                {
                    params: { key: this.apiKey },
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    timeout: this.timeoutMs,
                }
            );

            const content = response.data.candidates?.[0]?.content?.parts?.[0]?.text || '';
            logger.debug('Gemini completion generated', {
                responseLength: content.length
            });

            return content;
        } catch (error) {
            const errorMessage = axios.isAxiosError<GeminiErrorBody>(error)
                ? error.response?.data?.error?.message || error.message
                : error instanceof Error ? error.message : 'Unknown error';

            logger.error('Gemini API error', { error: errorMessage });
            throw new Error(`Gemini API error: ${errorMessage}`);
        }
    }
}
