import * as path from 'path';
import * as fs from 'fs/promises';
import { pathToFileURL } from 'url';
import type { JudgeConfig, ResolvedConfig } from './types.js';
import { JudgeConfigSchema, defaultConfig } from './types.js';
import { isRecord } from './schemas.js';

const CONFIG_FILE_NAMES = [
  'vlm-judge.config.ts',
  'vlm-judge.config.js',
  'vlm-judge.config.mjs',
];

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, typically CLI flags */
  overrides?: JudgeConfig;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const cwd = options.cwd ?? process.cwd();

  let configFile: string | undefined;

  if (options.configPath) {
    configFile = path.isAbsolute(options.configPath)
      ? options.configPath
      : path.join(cwd, options.configPath);
  } else {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(cwd, name);
      try {
        await fs.access(candidate);
        configFile = candidate;
        break;
      } catch {
        // Continue to next candidate
      }
    }
  }

  const fileConfig = configFile ? await importConfig(configFile) : {};

  return resolveConfig(fileConfig, getConfigFromEnv(options.env ?? process.env), options.overrides ?? {});
}

async function importConfig(configPath: string): Promise<JudgeConfig> {
  const fileUrl = pathToFileURL(configPath).href;

  let module: unknown;
  try {
    module = await import(fileUrl);
  } catch (error) {
    if (configPath.endsWith('.ts')) {
      throw new Error(`Failed to import TypeScript config. Run with tsx: npx tsx vlm-judge\n${error}`);
    }
    throw error;
  }

  const exported = isRecord(module) && 'default' in module ? module.default : module;
  const result = JudgeConfigSchema.safeParse(exported);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid config in ${configPath}: ${issues.join('; ')}`);
  }
  return result.data;
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Environment variable overrides
 */
export function getConfigFromEnv(env: NodeJS.ProcessEnv): JudgeConfig {
  const overrides: JudgeConfig = {};

  if (env.JUDGE_PROVIDER === 'anthropic' || env.JUDGE_PROVIDER === 'openai') {
    overrides.judgeProvider = env.JUDGE_PROVIDER;
  }

  if (env.JUDGE_MODEL) {
    overrides.judgeModel = env.JUDGE_MODEL;
  }

  if (env.JUDGE_API_KEY) {
    overrides.apiKey = env.JUDGE_API_KEY;
  }

  if (env.JUDGE_BASE_URL) {
    overrides.baseURL = env.JUDGE_BASE_URL;
  }

  const maxRetries = parseIntEnv(env.JUDGE_MAX_RETRIES);
  if (maxRetries !== undefined) {
    overrides.maxRetries = maxRetries;
  }

  const timeout = parseIntEnv(env.JUDGE_TIMEOUT_MS);
  if (timeout !== undefined) {
    overrides.timeout = timeout;
  }

  const concurrency = parseIntEnv(env.JUDGE_CONCURRENCY);
  if (concurrency !== undefined) {
    overrides.concurrency = concurrency;
  }

  return overrides;
}

export function resolveConfig(...layers: JudgeConfig[]): ResolvedConfig {
  const merged: JudgeConfig = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  const validated = JudgeConfigSchema.parse(merged);

  return {
    judgeProvider: validated.judgeProvider ?? defaultConfig.judgeProvider,
    judgeModel: validated.judgeModel,
    apiKey: validated.apiKey,
    baseURL: validated.baseURL,
    datasetPath: validated.datasetPath ?? defaultConfig.datasetPath,
    maxRetries: validated.maxRetries ?? defaultConfig.maxRetries,
    retryDelayMs: validated.retryDelayMs ?? defaultConfig.retryDelayMs,
    retryBackoffMultiplier: validated.retryBackoffMultiplier ?? defaultConfig.retryBackoffMultiplier,
    maxRetryDelayMs: validated.maxRetryDelayMs ?? defaultConfig.maxRetryDelayMs,
    timeout: validated.timeout ?? defaultConfig.timeout,
    concurrency: validated.concurrency ?? defaultConfig.concurrency,
    streamWrite: validated.streamWrite ?? defaultConfig.streamWrite,
    progressEvery: validated.progressEvery ?? defaultConfig.progressEvery,
    verbose: validated.verbose ?? defaultConfig.verbose,
  };
}
