import type { Category } from '../config/schemas.js';

export interface JudgeRequest {
  exampleId: string;
  category: Category;
  prompt: string;
  reference: string;
  generation: string;
}

export interface JudgeCallOptions {
  signal?: AbortSignal;
}

export type JudgeProvider = 'anthropic' | 'openai';

/**
 * A judge model backend. `judge` resolves to the model's raw reply; turning
 * that reply into a verdict is the caller's job.
 *
 * Implementations throw AuthenticationError for credential failures and
 * JudgeRequestError for transport failures.
 */
export interface JudgeClient {
  readonly provider: JudgeProvider;
  readonly model: string;
  judge(request: JudgeRequest, options?: JudgeCallOptions): Promise<string>;
}

export const JUDGE_SYSTEM_PROMPT = [
  'You are an evaluator. Compare the model response to the reference answer and decide whether it is correct.',
  'Return a strict JSON object: {"score": 0 or 1, "explanation": "..."}.',
  'Score 1 if the response satisfies the reference; otherwise 0. Keep the explanation concise.',
].join('\n');

export function buildJudgePrompt(request: JudgeRequest): string {
  return `Category: ${request.category}
Prompt: ${request.prompt}

Reference answer (ground truth or requirements): ${request.reference}

Model response:
${request.generation}

Decide 0 or 1 and explain briefly.`;
}

export abstract class BaseJudgeClient implements JudgeClient {
  abstract readonly provider: JudgeProvider;
  readonly model: string;
  protected readonly systemPrompt: string;

  constructor(model: string, systemPrompt: string = JUDGE_SYSTEM_PROMPT) {
    this.model = model;
    this.systemPrompt = systemPrompt;
  }

  async judge(request: JudgeRequest, options: JudgeCallOptions = {}): Promise<string> {
    return this.complete(this.systemPrompt, buildJudgePrompt(request), options);
  }

  protected abstract complete(
    system: string,
    user: string,
    options: JudgeCallOptions
  ): Promise<string>;
}
