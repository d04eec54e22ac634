import type { JudgeClient, JudgeProvider } from './judge-interface.js';
import { AnthropicJudgeClient } from './builtin/anthropic-judge.js';
import { OpenAIJudgeClient } from './builtin/openai-judge.js';

export interface JudgeClientOptions {
  model?: string;
  apiKey?: string;
  baseURL?: string;
  systemPrompt?: string;
}

export type JudgeClientFactory = (options: JudgeClientOptions) => JudgeClient;

export class JudgeRegistry {
  private factories: Map<string, JudgeClientFactory> = new Map();

  constructor() {
    this.registerBuiltInClients();
  }

  private registerBuiltInClients(): void {
    this.register('anthropic', (options) => new AnthropicJudgeClient(options));
    this.register('openai', (options) => new OpenAIJudgeClient(options));
  }

  register(provider: JudgeProvider | string, factory: JudgeClientFactory): void {
    this.factories.set(provider, factory);
  }

  /** @internal Used for testing only */
  unregister(provider: string): boolean {
    return this.factories.delete(provider);
  }

  has(provider: string): boolean {
    return this.factories.has(provider);
  }

  list(): string[] {
    return Array.from(this.factories.keys());
  }

  create(provider: string, options: JudgeClientOptions = {}): JudgeClient {
    const factory = this.factories.get(provider);
    if (!factory) {
      throw new Error(`Unknown judge provider "${provider}". Available: ${this.list().join(', ')}`);
    }
    return factory(options);
  }
}

let defaultRegistry: JudgeRegistry | null = null;

export function getJudgeRegistry(): JudgeRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new JudgeRegistry();
  }
  return defaultRegistry;
}

/** @internal Used for testing only */
export function resetJudgeRegistry(): void {
  defaultRegistry = null;
}
