export * from './types.js';
export * from './constants.js';
export { OpenAICompatibleClient } from './openai.js';
