import { describe, expect, test, beforeEach, afterEach, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { AnthropicJudgeClient } from '../../judges/builtin/anthropic-judge.js';
import { OpenAIJudgeClient } from '../../judges/builtin/openai-judge.js';
import { AuthenticationError, JudgeRequestError } from '../../errors.js';
import { createExample } from '../fixtures.js';

const sdk = vi.hoisted(() => ({
  anthropicCreate: vi.fn(),
  openaiCreate: vi.fn(),
  clientOptions: new Array<unknown>(),
}));

vi.mock('@anthropic-ai/sdk', () => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      _error: unknown,
      message: string | undefined,
      _headers: unknown
    ) {
      super(message);
    }
  }
  class Anthropic {
    static APIError = APIError;
    messages = { create: sdk.anthropicCreate };
    constructor(options: unknown) {
      sdk.clientOptions.push(options);
    }
  }
  return { default: Anthropic };
});

vi.mock('openai', () => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      _error: unknown,
      message: string | undefined,
      _headers: unknown
    ) {
      super(message);
    }
  }
  class OpenAI {
    static APIError = APIError;
    chat = { completions: { create: sdk.openaiCreate } };
    constructor(options: unknown) {
      sdk.clientOptions.push(options);
    }
  }
  return { default: OpenAI };
});

const { prompt, reference } = createExample('e1');
const request = { exampleId: 'e1', category: 'normal' as const, prompt, reference, generation: 'Two birds' };

describe('AnthropicJudgeClient', () => {
  const savedKey = process.env.ANTHROPIC_API_KEY;

  beforeEach(() => {
    sdk.anthropicCreate.mockReset();
    sdk.clientOptions.length = 0;
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.ANTHROPIC_API_KEY;
    } else {
      process.env.ANTHROPIC_API_KEY = savedKey;
    }
  });

  test('requires an API key', () => {
    delete process.env.ANTHROPIC_API_KEY;

    expect(() => new AnthropicJudgeClient()).toThrow(AuthenticationError);
  });

  test('disables SDK retries and sends a deterministic request', async () => {
    sdk.anthropicCreate.mockResolvedValue({ content: [{ type: 'text', text: '{"score":1}' }] });
    const client = new AnthropicJudgeClient({ apiKey: 'test-secret', model: 'judge-model' });

    const reply = await client.judge(request);

    expect(reply).toBe('{"score":1}');
    expect(sdk.clientOptions).toEqual([{ apiKey: 'test-secret', baseURL: undefined, maxRetries: 0 }]);
    expect(sdk.anthropicCreate).toHaveBeenCalledTimes(1);
    const [body] = sdk.anthropicCreate.mock.calls[0];
    expect(body).toMatchObject({ model: 'judge-model', temperature: 0, max_tokens: 1024 });
    expect(body.messages[0].content).toContain('Model response:\nTwo birds');
  });

  test('maps credential failures to AuthenticationError', async () => {
    sdk.anthropicCreate.mockRejectedValue(new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined));
    const client = new AnthropicJudgeClient({ apiKey: 'test-secret' });

    await expect(client.judge(request)).rejects.toBeInstanceOf(AuthenticationError);
  });

  test('marks rate limits retryable and bad requests not', async () => {
    const client = new AnthropicJudgeClient({ apiKey: 'test-secret' });

    sdk.anthropicCreate.mockRejectedValueOnce(new Anthropic.APIError(429, undefined, 'slow down', undefined));
    await expect(client.judge(request)).rejects.toMatchObject({ retryable: true, status: 429 });

    sdk.anthropicCreate.mockRejectedValueOnce(new Anthropic.APIError(400, undefined, 'bad request', undefined));
    await expect(client.judge(request)).rejects.toMatchObject({ retryable: false, status: 400 });
  });

  test('rejects a reply without text content', async () => {
    sdk.anthropicCreate.mockResolvedValue({ content: [] });
    const client = new AnthropicJudgeClient({ apiKey: 'test-secret' });

    await expect(client.judge(request)).rejects.toBeInstanceOf(JudgeRequestError);
  });
});

describe('OpenAIJudgeClient', () => {
  beforeEach(() => {
    sdk.openaiCreate.mockReset();
    sdk.clientOptions.length = 0;
  });

  test('targets a compatible endpoint and returns the message content', async () => {
    sdk.openaiCreate.mockResolvedValue({ choices: [{ message: { content: '{"score":0}' } }] });
    const client = new OpenAIJudgeClient({
      apiKey: 'test-secret',
      baseURL: 'https://judge.example.com/v1',
    });

    const reply = await client.judge(request);

    expect(reply).toBe('{"score":0}');
    expect(client.model).toBe('gpt-4o');
    expect(sdk.clientOptions).toEqual([
      { apiKey: 'test-secret', baseURL: 'https://judge.example.com/v1', maxRetries: 0 },
    ]);
    const [body] = sdk.openaiCreate.mock.calls[0];
    expect(body.messages.map((message: { role: string }) => message.role)).toEqual(['system', 'user']);
  });

  test('treats an empty reply as a failed request', async () => {
    sdk.openaiCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const client = new OpenAIJudgeClient({ apiKey: 'test-secret' });

    await expect(client.judge(request)).rejects.toMatchObject({ retryable: false });
  });

  test('maps server errors to retryable failures', async () => {
    sdk.openaiCreate.mockRejectedValue(new OpenAI.APIError(503, undefined, 'overloaded', undefined));
    const client = new OpenAIJudgeClient({ apiKey: 'test-secret' });

    await expect(client.judge(request)).rejects.toMatchObject({ retryable: true, status: 503 });
  });
});
