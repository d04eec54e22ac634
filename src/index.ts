// Config
export { defineConfig, defaultConfig } from './config/types.js';
export type { JudgeConfig, ResolvedConfig } from './config/types.js';
export { loadConfig, getConfigFromEnv, resolveConfig } from './config/config-loader.js';
export type { LoadConfigOptions } from './config/config-loader.js';

export {
  CATEGORIES,
  ExampleSchema,
  GenerationSchema,
  JudgedRecordSchema,
  ScoredRowSchema,
  AggregationSummarySchema,
  parseExample,
  parseGeneration,
  coerceScore,
} from './config/schemas.js';
export type {
  Category,
  Score,
  Example,
  Generation,
  JudgedRecord,
  ScoredRow,
  JoinOutcome,
  DetailedRecord,
  ScoreStats,
  AggregationSummary,
} from './config/schemas.js';

// Errors
export {
  PipelineError,
  SchemaError,
  InputFileError,
  MissingGenerationError,
  JudgeError,
  JudgeParseError,
  AggregationJoinError,
  AuthenticationError,
  CancelledError,
  JudgeRequestError,
  isRetryable,
  requestErrorFromStatus,
} from './errors.js';
export type { ErrorType, RunError, JoinFailure } from './errors.js';

// Store
export {
  readAll,
  readUnique,
  appendRecord,
  writeAll,
  loadExistingIds,
  repairTail,
  JsonlRecordSink,
  BufferedRecordSink,
  InMemoryRecordSink,
  prepareOutput,
} from './store/index.js';
export type { RecordSink, OutputMode } from './store/index.js';

// Judges
export {
  BaseJudgeClient,
  buildJudgePrompt,
  JUDGE_SYSTEM_PROMPT,
  JudgeRegistry,
  getJudgeRegistry,
  resetJudgeRegistry,
  parseVerdict,
  AnthropicJudgeClient,
  OpenAIJudgeClient,
} from './judges/index.js';
export type {
  JudgeClient,
  JudgeProvider,
  JudgeRequest,
  JudgeCallOptions,
  JudgeClientOptions,
  Verdict,
} from './judges/index.js';

// Runner
export { JudgeRunner } from './runner/judge-runner.js';
export type { JudgeRunnerOptions, JudgeRunResult, JudgeProgress } from './runner/judge-runner.js';
export { judgeFiles } from './runner/judge-files.js';
export type { JudgeFilesOptions, JudgeFilesResult } from './runner/judge-files.js';

// Aggregation and reporting
export {
  aggregateScores,
  aggregateFiles,
  toSummary,
  percentage,
  defaultSummaryPath,
} from './utils/result-aggregator.js';
export type {
  AggregationResult,
  CategoryStats,
  AggregateFilesOptions,
  AggregateFilesResult,
} from './utils/result-aggregator.js';

export {
  formatTable,
  formatPercentage,
  formatDuration,
  generateJsonReport,
  summarizeErrors,
  printRunSummary,
} from './utils/reporter.js';
export type { ReportRow, ErrorSummary } from './utils/reporter.js';

export { ProgressPrinter } from './utils/progress.js';
