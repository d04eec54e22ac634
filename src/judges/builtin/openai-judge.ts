import OpenAI from 'openai';
import { BaseJudgeClient } from '../judge-interface.js';
import type { JudgeCallOptions, JudgeProvider } from '../judge-interface.js';
import { AuthenticationError, JudgeRequestError, requestErrorFromStatus } from '../../errors.js';

export interface OpenAIJudgeOptions {
  model?: string;
  apiKey?: string;
  /** Any OpenAI-compatible endpoint, e.g. https://api.poe.com/v1 */
  baseURL?: string;
  systemPrompt?: string;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

export class OpenAIJudgeClient extends BaseJudgeClient {
  readonly provider: JudgeProvider = 'openai';

  private openai: OpenAI;

  constructor(options: OpenAIJudgeOptions = {}) {
    super(options.model || DEFAULT_OPENAI_MODEL, options.systemPrompt);
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new AuthenticationError('No API key for the OpenAI-compatible judge. Set OPENAI_API_KEY or pass --api_key');
    }
    this.openai = new OpenAI({ apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  protected async complete(system: string, user: string, options: JudgeCallOptions): Promise<string> {
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          temperature: 0,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
        },
        { signal: options.signal }
      );

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new JudgeRequestError('Empty response from judge model', false);
      }
      return content;
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw requestErrorFromStatus(error.status, error.message, error);
      }
      throw error;
    }
  }
}
