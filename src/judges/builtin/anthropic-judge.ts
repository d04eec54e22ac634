import Anthropic from '@anthropic-ai/sdk';
import { BaseJudgeClient } from '../judge-interface.js';
import type { JudgeCallOptions, JudgeProvider } from '../judge-interface.js';
import { AuthenticationError, JudgeRequestError, requestErrorFromStatus } from '../../errors.js';

export interface AnthropicJudgeOptions {
  model?: string;
  apiKey?: string;
  baseURL?: string;
  systemPrompt?: string;
  maxTokens?: number;
}

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

export class AnthropicJudgeClient extends BaseJudgeClient {
  readonly provider: JudgeProvider = 'anthropic';

  private anthropic: Anthropic;
  private maxTokens: number;

  constructor(options: AnthropicJudgeOptions = {}) {
    super(options.model || DEFAULT_ANTHROPIC_MODEL, options.systemPrompt);
    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new AuthenticationError('No Anthropic API key. Set ANTHROPIC_API_KEY or pass --api_key');
    }
    this.maxTokens = options.maxTokens ?? 1024;
    // Retries and timeouts are owned by the judge runner
    this.anthropic = new Anthropic({ apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  protected async complete(system: string, user: string, options: JudgeCallOptions): Promise<string> {
    try {
      const response = await this.anthropic.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: 0,
          system,
          messages: [{ role: 'user', content: user }],
        },
        { signal: options.signal }
      );

      const content = response.content[0];
      if (!content || content.type !== 'text') {
        throw new JudgeRequestError('Unexpected response type from judge model', false);
      }
      return content.text;
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw requestErrorFromStatus(error.status, error.message, error);
      }
      throw error;
    }
  }
}
