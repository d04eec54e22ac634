export {
  CATEGORIES,
  CategorySchema,
  ScoreSchema,
  ExampleSchema,
  GenerationSchema,
  JudgedRecordSchema,
  IdentifiedRowSchema,
  ScoredRowSchema,
  JoinOutcomeSchema,
  ScoreStatsSchema,
  AggregationSummarySchema,
  parseExample,
  parseGeneration,
  coerceScore,
  normalizeFields,
  isRecord,
} from './schemas.js';

export type {
  Category,
  Score,
  Example,
  Generation,
  JudgedRecord,
  IdentifiedRow,
  ScoredRow,
  JoinOutcome,
  DetailedRecord,
  ScoreStats,
  AggregationSummary,
} from './schemas.js';

export { defineConfig, defaultConfig, JudgeConfigSchema, JudgeProviderSchema } from './types.js';
export type { JudgeConfig, ResolvedConfig } from './types.js';

export { loadConfig, getConfigFromEnv, resolveConfig } from './config-loader.js';
export type { LoadConfigOptions } from './config-loader.js';
