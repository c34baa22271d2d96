/**
 * AI Provider Interface
 *
 * Defines the contract for text completion providers.
 * Implementations can use Anthropic, OpenAI, Gemini or other providers.
 */

export interface GenerationOptions {
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
}

/**
 * Connection settings shared by every provider
 */
export interface ProviderSettings {
    apiKey: string;
    model: string;
    timeoutMs: number;
}

export interface AiProvider {
    /**
     * Provider name for logging
     */
    readonly name: string;

    /**
     * Generate text completion
     */
    complete(prompt: string, options?: GenerationOptions): Promise<string>;

    /**
     * Check if the provider is properly configured
     */
    isConfigured(): boolean;
}
