export { AiProvider, GenerationOptions, ProviderSettings } from './AiProvider';
export { AnthropicProvider } from './AnthropicProvider';
export { OpenAiProvider } from './OpenAiProvider';
export { GeminiProvider } from './GeminiProvider';
export { createAiProvider, UnconfiguredAiProvider } from './factory';
export { LlmGateway } from './gateway';
export * from './prompts';
