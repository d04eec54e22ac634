import { z } from 'zod';

/** Largest delay setTimeout honours; larger values fire immediately */
export const MAX_TIMER_MS = 2_147_483_647;

export const JudgeProviderSchema = z.enum(['anthropic', 'openai']);

/**
 * Shape of a `vlm-judge.config.*` module's default export. Every field is
 * optional; unset fields fall back to the environment and then to defaults.
 */
export const JudgeConfigSchema = z
  .object({
    judgeProvider: JudgeProviderSchema,
    judgeModel: z.string().min(1),
    apiKey: z.string().min(1),
    baseURL: z.string().url(),
    datasetPath: z.string().min(1),
    maxRetries: z.number().int().min(0).max(10),
    retryDelayMs: z.number().int().min(0).max(MAX_TIMER_MS),
    retryBackoffMultiplier: z.number().min(1),
    maxRetryDelayMs: z.number().int().min(0).max(MAX_TIMER_MS),
    timeout: z.number().int().positive().max(MAX_TIMER_MS),
    concurrency: z.number().int().min(1).max(64),
    streamWrite: z.boolean(),
    progressEvery: z.number().int().min(1),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;

export interface ResolvedConfig
  extends Required<Omit<JudgeConfig, 'apiKey' | 'baseURL' | 'judgeModel'>> {
  /** Unset means the provider's own default model */
  judgeModel?: string;
  apiKey?: string;
  baseURL?: string;
}

export function defineConfig(config: JudgeConfig): JudgeConfig {
  return config;
}

export const defaultConfig: ResolvedConfig = {
  judgeProvider: 'anthropic',
  datasetPath: './data/dataset.jsonl',
  maxRetries: 3,
  retryDelayMs: 1500,
  retryBackoffMultiplier: 2,
  maxRetryDelayMs: 30000,
  timeout: 120000,
  concurrency: 1,
  streamWrite: true,
  progressEvery: 10,
  verbose: false,
};
