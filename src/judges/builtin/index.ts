export { AnthropicJudgeClient, DEFAULT_ANTHROPIC_MODEL } from './anthropic-judge.js';
export type { AnthropicJudgeOptions } from './anthropic-judge.js';
export { OpenAIJudgeClient, DEFAULT_OPENAI_MODEL } from './openai-judge.js';
export type { OpenAIJudgeOptions } from './openai-judge.js';
