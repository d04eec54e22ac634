export { BaseJudgeClient, buildJudgePrompt, JUDGE_SYSTEM_PROMPT } from './judge-interface.js';
export type {
  JudgeClient,
  JudgeProvider,
  JudgeRequest,
  JudgeCallOptions,
} from './judge-interface.js';

export { JudgeRegistry, getJudgeRegistry, resetJudgeRegistry } from './judge-registry.js';
export type { JudgeClientOptions, JudgeClientFactory } from './judge-registry.js';

export { parseVerdict } from './verdict-parser.js';
export type { Verdict } from './verdict-parser.js';

export {
  AnthropicJudgeClient,
  OpenAIJudgeClient,
  DEFAULT_ANTHROPIC_MODEL,
  DEFAULT_OPENAI_MODEL,
} from './builtin/index.js';
export type { AnthropicJudgeOptions, OpenAIJudgeOptions } from './builtin/index.js';
