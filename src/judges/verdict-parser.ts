import { coerceScore, isRecord, type Score } from '../config/schemas.js';
import { JudgeParseError } from '../errors.js';

export interface Verdict {
  score: Score;
  explanation: string;
}

function candidateJson(text: string): string[] {
  const candidates: string[] = [];

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    candidates.push(fenced[1]);
  }

  candidates.push(text.trim());

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  return candidates;
}

function parseObject(text: string): Record<string, unknown> | null {
  for (const candidate of candidateJson(text)) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isRecord(parsed)) return parsed;
    } catch {
      // next candidate
    }
  }
  return null;
}

function readScore(data: Record<string, unknown>): Score | null {
  if ('score' in data) {
    return coerceScore(data.score);
  }
  for (const key of ['passed', 'correct']) {
    const value = data[key];
    if (typeof value === 'boolean') return value ? 1 : 0;
  }
  return null;
}

/**
 * Extracts a binary verdict from a judge reply. Never falls back to a
 * default score: a reply without an explicit 0/1 signal is a JudgeParseError.
 */
export function parseVerdict(text: string): Verdict {
  const data = parseObject(text);
  if (!data) {
    throw new JudgeParseError(`No JSON object in judge reply: ${text.substring(0, 200)}`, text);
  }

  const score = readScore(data);
  if (score === null) {
    throw new JudgeParseError(
      `Judge reply has no binary score: ${JSON.stringify(data).substring(0, 200)}`,
      text
    );
  }

  const rawExplanation = data.explanation ?? data.reasoning;
  const explanation = typeof rawExplanation === 'string' ? rawExplanation.trim() : '';

  return { score, explanation };
}
