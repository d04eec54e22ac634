import path from 'path';
import chalk from 'chalk';
import { CATEGORIES, type AggregationSummary, type Category } from '../config/schemas.js';
import type { ErrorType, RunError } from '../errors.js';
import type { JudgeRunResult } from '../runner/judge-runner.js';

export interface ReportRow {
  label: string;
  summary: AggregationSummary;
}

export interface ErrorSummary {
  type: ErrorType;
  count: number;
  /** Every example id with an error of this type, in run order */
  exampleIds: string[];
  /** The first few messages */
  examples: string[];
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

export function formatPercentage(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(1);
}

export function labelForFile(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function reportCategories(rows: readonly ReportRow[]): Category[] {
  return CATEGORIES.filter((category) => rows.some((row) => row.summary.categories[category] !== undefined));
}

/**
 * Markdown table with one row per evaluated file, one column per category and
 * an overall column. Numbers come straight from the summaries.
 */
export function formatTable(rows: readonly ReportRow[]): string {
  const categories = reportCategories(rows);
  const header = ['File', ...categories, 'overall'];
  const body = rows.map((row) => [
    row.label,
    ...categories.map((category) => formatPercentage(row.summary.categories[category]?.percentage ?? null)),
    formatPercentage(row.summary.overall.percentage),
  ]);

  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...body.map((cells) => cells[column].length))
  );
  const formatLine = (cells: string[]) =>
    `| ${cells.map((cell, column) => cell.padEnd(widths[column])).join(' | ')} |`;
  const separator = `|${widths.map((width) => '-'.repeat(width + 2)).join('|')}|`;

  return [formatLine(header), separator, ...body.map(formatLine)].join('\n');
}

export function generateJsonReport(rows: readonly ReportRow[]): Record<string, AggregationSummary> {
  const report: Record<string, AggregationSummary> = {};
  for (const row of rows) {
    report[row.label] = row.summary;
  }
  return report;
}

export function summarizeErrors(errors: readonly RunError[]): ErrorSummary[] {
  const errorMap = new Map<ErrorType, { count: number; exampleIds: string[]; examples: string[] }>();

  for (const error of errors) {
    let entry = errorMap.get(error.type);
    if (!entry) {
      entry = { count: 0, exampleIds: [], examples: [] };
      errorMap.set(error.type, entry);
    }
    entry.count++;
    if (error.exampleId !== undefined) {
      entry.exampleIds.push(error.exampleId);
    }
    if (entry.examples.length < 3) {
      entry.examples.push(error.message.substring(0, 100));
    }
  }

  return Array.from(errorMap.entries()).map(([type, data]) => ({
    type,
    count: data.count,
    exampleIds: data.exampleIds,
    examples: data.examples,
  }));
}

export function printRunSummary(result: JudgeRunResult): void {
  const { total, judged, skipped, failed, missing, duration } = result;

  console.log(chalk.bold('Results:'));
  console.log(`  Total:   ${total}`);
  console.log(`  ${chalk.green('Judged:')}  ${judged}`);
  console.log(`  Skipped: ${skipped}`);

  if (failed > 0) {
    console.log(`  ${chalk.red('Failed:')}  ${failed}`);
  }

  if (missing > 0) {
    console.log(`  ${chalk.yellow('Missing generations:')} ${missing}`);
  }

  if (result.unmatchedGenerations.length > 0) {
    console.log(`  ${chalk.yellow('Generations not in dataset:')} ${result.unmatchedGenerations.length}`);
  }

  console.log(`  Duration: ${formatDuration(duration)}`);

  if (result.cancelled) {
    console.log(chalk.yellow(`\nRun cancelled after ${judged + skipped + failed + missing}/${total} examples`));
  }

  const errorSummaries = summarizeErrors(result.errors);
  if (errorSummaries.length > 0) {
    console.log();
    console.log(chalk.bold('Errors by type:'));
    for (const summary of errorSummaries) {
      const ids = summary.exampleIds.length > 0 ? ` (${summary.exampleIds.join(', ')})` : '';
      console.log(`  ${summary.type}: ${summary.count}${ids}`);
      for (const example of summary.examples) {
        console.log(`    ${chalk.gray(`- ${example}`)}`);
      }
    }
  }
}

export function printAggregationWarnings(summary: AggregationSummary, scoredPath: string): void {
  if (summary.missing > 0) {
    console.warn(chalk.yellow(`Warning: ${summary.missing} dataset examples have no record in ${scoredPath}`));
  }
  if (summary.malformed > 0) {
    console.warn(chalk.yellow(`Warning: ${summary.malformed} records in ${scoredPath} have no usable score`));
  }
  if (summary.unknown > 0) {
    console.warn(chalk.yellow(`Warning: ${summary.unknown} records in ${scoredPath} are not in the dataset`));
  }
}
