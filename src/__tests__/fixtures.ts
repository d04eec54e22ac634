import type { Category, Example, Generation } from '../config/schemas.js';
import type { JudgeCallOptions, JudgeClient, JudgeProvider, JudgeRequest } from '../judges/judge-interface.js';

export function createExample(id: string, category: Category = 'normal'): Example {
  return {
    example_id: id,
    category,
    prompt: `What is shown in image ${id}?`,
    reference: `Reference answer for ${id}`,
    media_filename: `${id}.jpg`,
    media_url: `https://example.com/media/${id}.jpg`,
  };
}

export function createGeneration(id: string): Generation {
  return { example_id: id, generation: `Model answer for ${id}` };
}

export function verdictJson(score: 0 | 1, explanation = 'looks right'): string {
  return JSON.stringify({ score, explanation });
}

export type Responder = (request: JudgeRequest, options: JudgeCallOptions) => Promise<string> | string;

/** In-process judge backend; records every call it receives. */
export class FakeJudgeClient implements JudgeClient {
  readonly provider: JudgeProvider = 'anthropic';
  readonly model = 'fake-judge';
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responder: Responder = () => verdictJson(1)) {}

  async judge(request: JudgeRequest, options: JudgeCallOptions = {}): Promise<string> {
    this.calls.push(request.exampleId);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.responder(request, options);
    } finally {
      this.inFlight--;
    }
  }

  callsFor(id: string): number {
    return this.calls.filter((call) => call === id).length;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function toJsonl(records: readonly object[]): string {
  return records.map((record) => JSON.stringify(record)).join('\n') + '\n';
}
