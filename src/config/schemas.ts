import { z } from 'zod';

export const CATEGORIES = ['normal', 'hard'] as const;

export const CategorySchema = z.enum(CATEGORIES);
export type Category = z.infer<typeof CategorySchema>;

export const ScoreSchema = z.union([z.literal(0), z.literal(1)]);
export type Score = z.infer<typeof ScoreSchema>;

const FIELD_ALIASES: Record<string, string[]> = {
  example_id: ['id', 'exampleId'],
  reference: ['rubric'],
  generation: ['response'],
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps alternate field names onto the canonical ones. The canonical name
 * wins when both are present.
 */
export function normalizeFields(value: unknown): unknown {
  if (!isRecord(value)) return value;

  const normalized: Record<string, unknown> = { ...value };
  for (const [canonical, aliases] of Object.entries(FIELD_ALIASES)) {
    for (const alias of aliases) {
      if (!(alias in normalized)) continue;
      if (normalized[canonical] === undefined || normalized[canonical] === null) {
        normalized[canonical] = normalized[alias];
      }
      delete normalized[alias];
    }
  }
  return normalized;
}

const ExampleIdSchema = z.string().min(1, 'example_id must not be empty');

export const ExampleSchema = z.preprocess(
  normalizeFields,
  z.object({
    example_id: ExampleIdSchema,
    category: CategorySchema,
    prompt: z.string(),
    reference: z.string(),
    media_filename: z.string(),
    media_url: z.string(),
  })
);
export type Example = z.infer<typeof ExampleSchema>;

export const GenerationSchema = z.preprocess(
  normalizeFields,
  z.object({
    example_id: ExampleIdSchema,
    generation: z.string(),
  })
);
export type Generation = z.infer<typeof GenerationSchema>;

export const JudgedRecordSchema = z.object({
  example_id: ExampleIdSchema,
  category: CategorySchema,
  prompt: z.string(),
  reference: z.string(),
  generation: z.string(),
  score: ScoreSchema,
  explanation: z.string(),
});
export type JudgedRecord = z.infer<typeof JudgedRecordSchema>;

/** Any line that carries an id; used to seed resume. */
export const IdentifiedRowSchema = z.preprocess(
  normalizeFields,
  z.object({ example_id: ExampleIdSchema }).passthrough()
);
export type IdentifiedRow = z.infer<typeof IdentifiedRowSchema>;

/**
 * A line of a judged-or-generation file as the aggregator sees it. The score
 * is validated during the join so that a bad score is reported as malformed
 * instead of failing the whole read.
 */
export const ScoredRowSchema = z.preprocess(
  normalizeFields,
  z
    .object({
      example_id: ExampleIdSchema,
      generation: z.string().nullish(),
      score: z.unknown(),
      explanation: z.string().nullish(),
    })
    .passthrough()
);
export type ScoredRow = z.infer<typeof ScoredRowSchema>;

export const JoinOutcomeSchema = z.enum(['matched', 'missing', 'malformed']);
export type JoinOutcome = z.infer<typeof JoinOutcomeSchema>;

export interface DetailedRecord {
  example_id: string;
  category: Category;
  prompt: string;
  reference: string;
  media_filename: string;
  media_url: string;
  generation: string | null;
  score: Score | null;
  explanation: string | null;
  outcome: JoinOutcome;
}

export const ScoreStatsSchema = z.object({
  total: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  correct: z.number().int().nonnegative(),
  missing: z.number().int().nonnegative(),
  malformed: z.number().int().nonnegative(),
  percentage: z.number().nullable(),
});
export type ScoreStats = z.infer<typeof ScoreStatsSchema>;

export const AggregationSummarySchema = z.object({
  categories: z.record(CategorySchema, ScoreStatsSchema),
  overall: ScoreStatsSchema,
  matched: z.number().int().nonnegative(),
  missing: z.number().int().nonnegative(),
  malformed: z.number().int().nonnegative(),
  unknown: z.number().int().nonnegative(),
});
export type AggregationSummary = z.infer<typeof AggregationSummarySchema>;

export function parseExample(data: unknown): Example {
  return ExampleSchema.parse(data);
}

export function parseGeneration(data: unknown): Generation {
  return GenerationSchema.parse(data);
}

/**
 * Reads a binary score from a loosely typed value. Returns null for
 * anything that is not an unambiguous 0 or 1.
 */
export function coerceScore(value: unknown): Score | null {
  if (value === 0 || value === 1) return value;
  if (value === true) return 1;
  if (value === false) return 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '1' || trimmed === '1.0') return 1;
    if (trimmed === '0' || trimmed === '0.0') return 0;
  }
  return null;
}
