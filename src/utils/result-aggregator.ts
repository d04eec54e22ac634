import path from 'path';
import {
  CATEGORIES,
  ExampleSchema,
  ScoredRowSchema,
  coerceScore,
  type AggregationSummary,
  type Category,
  type DetailedRecord,
  type Example,
  type ScoreStats,
  type ScoredRow,
} from '../config/schemas.js';
import { AggregationJoinError } from '../errors.js';
import { readUnique, writeAll, writeJson } from '../store/record-store.js';

export interface CategoryStats extends ScoreStats {
  category: Category;
}

export interface AggregationResult {
  /** Categories present in the dataset, in canonical order */
  categories: CategoryStats[];
  overall: ScoreStats;
  detailed: DetailedRecord[];
  matched: number;
  missing: number;
  malformed: number;
  /** Ids in the scored file that are not in the dataset */
  unknownIds: string[];
  joinErrors: AggregationJoinError[];
}

/**
 * `100 * correct / count` rounded half-up to one decimal, or null when there
 * is nothing to divide by. Integer arithmetic keeps x.x5 from drifting.
 */
export function percentage(correct: number, count: number): number | null {
  if (count === 0) return null;
  const tenths = Math.floor((2000 * correct + count) / (2 * count));
  return tenths / 10;
}

function emptyStats(): ScoreStats {
  return { total: 0, count: 0, correct: 0, missing: 0, malformed: 0, percentage: null };
}

function joinExample(example: Example, row: ScoredRow | undefined): DetailedRecord {
  const base = {
    example_id: example.example_id,
    category: example.category,
    prompt: example.prompt,
    reference: example.reference,
    media_filename: example.media_filename,
    media_url: example.media_url,
  };

  if (!row) {
    return { ...base, generation: null, score: null, explanation: null, outcome: 'missing' };
  }

  const score = coerceScore(row.score);
  return {
    ...base,
    generation: row.generation ?? null,
    score,
    explanation: row.explanation ?? null,
    outcome: score === null ? 'malformed' : 'matched',
  };
}

function tally(stats: ScoreStats, record: DetailedRecord): void {
  stats.total++;
  if (record.outcome === 'missing') {
    stats.missing++;
  } else if (record.outcome === 'malformed') {
    stats.malformed++;
  } else {
    stats.count++;
    if (record.score === 1) stats.correct++;
  }
}

/**
 * Joins scored rows against the dataset by example_id. Every dataset example
 * appears once in `detailed`; only matched examples count towards percentages.
 * The overall figure is pooled over all matched examples.
 */
export function aggregateScores(dataset: readonly Example[], rows: readonly ScoredRow[]): AggregationResult {
  const rowById = new Map<string, ScoredRow>();
  for (const row of rows) {
    rowById.set(row.example_id, row);
  }

  const datasetIds = new Set(dataset.map((example) => example.example_id));
  const unknownIds = rows.map((row) => row.example_id).filter((id) => !datasetIds.has(id));

  const byCategory = new Map<Category, ScoreStats>();
  const overall = emptyStats();
  const detailed: DetailedRecord[] = [];
  const joinErrors: AggregationJoinError[] = [];

  for (const example of dataset) {
    const record = joinExample(example, rowById.get(example.example_id));
    detailed.push(record);

    if (record.outcome !== 'matched') {
      joinErrors.push(new AggregationJoinError(example.example_id, record.outcome));
    }

    let stats = byCategory.get(example.category);
    if (!stats) {
      stats = emptyStats();
      byCategory.set(example.category, stats);
    }
    tally(stats, record);
    tally(overall, record);
  }

  const categories: CategoryStats[] = [];
  for (const category of CATEGORIES) {
    const stats = byCategory.get(category);
    if (!stats) continue;
    categories.push({ category, ...stats, percentage: percentage(stats.correct, stats.count) });
  }

  return {
    categories,
    overall: { ...overall, percentage: percentage(overall.correct, overall.count) },
    detailed,
    matched: overall.count,
    missing: overall.missing,
    malformed: overall.malformed,
    unknownIds,
    joinErrors,
  };
}

export function toSummary(result: AggregationResult): AggregationSummary {
  const categories: AggregationSummary['categories'] = {};
  for (const { category, ...stats } of result.categories) {
    categories[category] = stats;
  }

  return {
    categories,
    overall: result.overall,
    matched: result.matched,
    missing: result.missing,
    malformed: result.malformed,
    unknown: result.unknownIds.length,
  };
}

export function defaultSummaryPath(outputPath: string): string {
  const ext = path.extname(outputPath);
  const base = ext ? outputPath.slice(0, -ext.length) : outputPath;
  return `${base}_summary.json`;
}

export interface AggregateFilesOptions {
  datasetPath: string;
  scoredPath: string;
  outputPath: string;
  summaryPath?: string;
}

export interface AggregateFilesResult {
  result: AggregationResult;
  summary: AggregationSummary;
  outputPath: string;
  summaryPath: string;
}

/**
 * Reads the dataset and a judged (or scored generation) file, writes the
 * detailed JSONL and the summary JSON.
 */
export async function aggregateFiles(options: AggregateFilesOptions): Promise<AggregateFilesResult> {
  const dataset = await readUnique(options.datasetPath, ExampleSchema);
  const rows = await readUnique(options.scoredPath, ScoredRowSchema);

  const result = aggregateScores(dataset, rows);
  const summary = toSummary(result);
  const summaryPath = options.summaryPath ?? defaultSummaryPath(options.outputPath);

  await writeAll(options.outputPath, result.detailed);
  await writeJson(summaryPath, summary);

  return { result, summary, outputPath: options.outputPath, summaryPath };
}
