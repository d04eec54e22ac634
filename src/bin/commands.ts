import * as fs from 'fs/promises';
import chalk from 'chalk';
import { z } from 'zod';
import { loadConfig } from '../config/config-loader.js';
import { AggregationSummarySchema } from '../config/schemas.js';
import type { JudgeConfig } from '../config/types.js';
import { JudgeProviderSchema, MAX_TIMER_MS } from '../config/types.js';
import { errorMessage } from '../errors.js';
import { getJudgeRegistry } from '../judges/judge-registry.js';
import { judgeFiles } from '../runner/judge-files.js';
import { aggregateFiles } from '../utils/result-aggregator.js';
import {
  formatTable,
  generateJsonReport,
  labelForFile,
  printAggregationWarnings,
  printRunSummary,
  type ReportRow,
} from '../utils/reporter.js';
import { ProgressPrinter } from '../utils/progress.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CANCELLED = 130;

const JudgeCommandOptionsSchema = z.object({
  config: z.string().optional(),
  dataset: z.string(),
  generations_in: z.string(),
  generations_out: z.string(),
  judge_model: z.string().optional(),
  judge_provider: JudgeProviderSchema.optional(),
  api_key: z.string().optional(),
  base_url: z.string().optional(),
  append: z.boolean().optional(),
  stream_write: z.boolean().optional(),
  progress: z.boolean().optional(),
  progress_every: z.coerce.number().int().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
  max_retries: z.coerce.number().int().min(0).optional(),
  timeout: z.coerce.number().int().positive().max(MAX_TIMER_MS).optional(),
  verbose: z.boolean().optional(),
});

const AggregateCommandOptionsSchema = z.object({
  config: z.string().optional(),
  dataset: z.string().optional(),
  output: z.string(),
  output_summary: z.string().optional(),
});

const ReportCommandOptionsSchema = z.object({
  json: z.boolean().optional(),
});

export function reportFatal(error: unknown): number {
  console.error(chalk.red('Error:'), errorMessage(error));
  return EXIT_FATAL;
}

/**
 * `judge` command. 0 when the run finished, even with per-example failures;
 * 1 on a fatal error; 130 when `signal` cancelled the run.
 */
export async function runJudgeCommand(rawOptions: unknown, signal?: AbortSignal): Promise<number> {
  try {
    const options = JudgeCommandOptionsSchema.parse(rawOptions);
    const overrides: JudgeConfig = {
      judgeProvider: options.judge_provider,
      judgeModel: options.judge_model,
      apiKey: options.api_key,
      baseURL: options.base_url,
      streamWrite: options.stream_write,
      progressEvery: options.progress_every,
      concurrency: options.concurrency,
      maxRetries: options.max_retries,
      timeout: options.timeout,
      verbose: options.verbose,
    };
    const config = await loadConfig({ configPath: options.config, overrides });

    const client = getJudgeRegistry().create(config.judgeProvider, {
      model: config.judgeModel,
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });

    console.log(chalk.blue(`Judging with ${client.provider}/${client.model}...\n`));

    const progress = options.progress ? new ProgressPrinter(process.stdout, config.progressEvery) : null;

    const result = await judgeFiles({
      datasetPath: options.dataset,
      generationsPath: options.generations_in,
      outputPath: options.generations_out,
      client,
      resume: options.append ?? false,
      streamWrite: config.streamWrite,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      retryBackoffMultiplier: config.retryBackoffMultiplier,
      maxRetryDelayMs: config.maxRetryDelayMs,
      timeout: config.timeout,
      concurrency: config.concurrency,
      verbose: config.verbose,
      signal,
      onProgress: progress ? (p) => progress.update(p) : undefined,
    });
    progress?.done();

    if (result.droppedIncompleteLine) {
      console.warn(chalk.yellow(`Warning: removed a partial last line from ${result.outputPath}`));
    }
    if (result.resumedFrom > 0) {
      console.log(`Resumed: ${result.resumedFrom} records already in ${result.outputPath}`);
    }
    console.log();
    printRunSummary(result);

    return result.cancelled ? EXIT_CANCELLED : EXIT_OK;
  } catch (error) {
    return reportFatal(error);
  }
}

export async function runAggregateCommand(generations: string, rawOptions: unknown): Promise<number> {
  try {
    const options = AggregateCommandOptionsSchema.parse(rawOptions);
    const config = await loadConfig({ configPath: options.config });

    const { summary, outputPath, summaryPath } = await aggregateFiles({
      datasetPath: options.dataset ?? config.datasetPath,
      scoredPath: generations,
      outputPath: options.output,
      summaryPath: options.output_summary,
    });

    printAggregationWarnings(summary, generations);
    console.log(`Output ${summary.matched + summary.missing + summary.malformed} examples to ${outputPath}.\n`);
    console.log(formatTable([{ label: labelForFile(generations), summary }]));
    console.log(`\nWrote summary to ${summaryPath}.`);
    return EXIT_OK;
  } catch (error) {
    return reportFatal(error);
  }
}

export async function runReportCommand(summaries: readonly string[], rawOptions: unknown): Promise<number> {
  try {
    const options = ReportCommandOptionsSchema.parse(rawOptions);
    const rows: ReportRow[] = [];
    for (const summaryPath of summaries) {
      const content = await fs.readFile(summaryPath, 'utf-8');
      const summary = AggregationSummarySchema.parse(JSON.parse(content));
      rows.push({ label: labelForFile(summaryPath).replace(/_summary$/, ''), summary });
    }

    if (options.json) {
      console.log(JSON.stringify(generateJsonReport(rows), null, 2));
    } else {
      console.log(formatTable(rows));
    }
    return EXIT_OK;
  } catch (error) {
    return reportFatal(error);
  }
}
