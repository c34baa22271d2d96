export { ContentGenerator, GenerationInput, countWords, createDocument } from './ContentGenerator';
export { TemplateContentGenerator } from './TemplateContentGenerator';
export { LlmContentGenerator } from './LlmContentGenerator';
export { renderTemplate } from './templates';
