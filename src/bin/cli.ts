#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import {
  EXIT_CANCELLED,
  reportFatal,
  runAggregateCommand,
  runJudgeCommand,
  runReportCommand,
} from './commands.js';

dotenv.config();

const program = new Command();

program.name('vlm-judge').description('Resumable judging and scoring for multimodal benchmark generations').version('0.1.0');

program
  .command('judge')
  .description('Judge generations against the dataset, appending one record per example')
  .requiredOption('--dataset <path>', 'Dataset JSONL')
  .requiredOption('--generations_in <path>', 'Generations JSONL to judge')
  .requiredOption('--generations_out <path>', 'Judged output JSONL')
  .option('--judge_model <name>', 'Judge model name')
  .option('--judge_provider <provider>', 'Judge backend (anthropic, openai)')
  .option('--api_key <key>', 'API key for the judge backend')
  .option('--base_url <url>', 'Base URL of an OpenAI-compatible endpoint')
  .option('--append', 'Resume: keep existing output and skip ids already judged')
  .option('--stream_write', 'Flush each record as soon as it is judged (default)')
  .option('--no-stream_write', 'Write all records when the run ends')
  .option('--progress', 'Show progress updates while judging')
  .option('--progress_every <n>', 'When not on a TTY, print progress every N examples')
  .option('--concurrency <n>', 'Judge calls in flight at once')
  .option('--max_retries <n>', 'Retries per example for transient failures')
  .option('--timeout <ms>', 'Timeout per judge call')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Verbose output')
  .action(async (rawOptions: unknown) => {
    const controller = new AbortController();
    const handleShutdown = (signal: string) => {
      if (controller.signal.aborted) {
        process.exit(EXIT_CANCELLED);
      }
      console.log(`\n${chalk.yellow(`Received ${signal}, stopping. Re-run with --append to resume.`)}`);
      controller.abort();
    };
    process.on('SIGTERM', () => handleShutdown('SIGTERM'));
    process.on('SIGINT', () => handleShutdown('SIGINT'));

    process.exit(await runJudgeCommand(rawOptions, controller.signal));
  });

program
  .command('aggregate')
  .description('Join judged records with the dataset and compute per-category scores')
  .argument('<generations>', 'Judged generations JSONL (example_id, score, ...)')
  .requiredOption('-o, --output <path>', 'Detailed results JSONL')
  .option('--dataset <path>', 'Dataset JSONL')
  .option('--output_summary <path>', 'Summary JSON (defaults to <output>_summary.json)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (generations: string, rawOptions: unknown) => {
    process.exit(await runAggregateCommand(generations, rawOptions));
  });

program
  .command('report')
  .description('Render summaries from one or more aggregate runs as a table')
  .argument('<summaries...>', 'Summary JSON files')
  .option('--json', 'Output as JSON')
  .action(async (summaries: string[], rawOptions: unknown) => {
    process.exit(await runReportCommand(summaries, rawOptions));
  });

program.parseAsync().catch((error: unknown) => process.exit(reportFatal(error)));
