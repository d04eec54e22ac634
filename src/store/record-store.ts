/**
 * Line-oriented JSON record persistence.
 * One JSON object per line; every write is flushed to disk before it resolves.
 */

import fs from 'fs/promises';
import path from 'path';
import type { z } from 'zod';
import { IdentifiedRowSchema } from '../config/schemas.js';
import { InputFileError, SchemaError, errorMessage } from '../errors.js';

const NEWLINE = 0x0a;

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function serializeRecord(record: object): string {
  return `${JSON.stringify(record)}\n`;
}

async function readLines(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new InputFileError('file does not exist', filePath, { cause: error });
    }
    throw new InputFileError(`cannot read file: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }
  return content.split('\n');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseLines<Schema extends z.ZodTypeAny>(
  filePath: string,
  lines: readonly string[],
  schema: Schema
): z.infer<Schema>[] {
  const records: z.infer<Schema>[] = [];

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].trim();
    if (!line) continue;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      throw new SchemaError(`invalid JSON (${errorMessage(error)})`, filePath, index + 1);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new SchemaError(formatIssues(result.error), filePath, index + 1);
    }
    records.push(result.data);
  }

  return records;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parses every non-blank line of a JSONL file with the given schema.
 * Throws SchemaError on the first line that does not fit.
 */
export async function readAll<Schema extends z.ZodTypeAny>(
  filePath: string,
  schema: Schema
): Promise<z.infer<Schema>[]> {
  return parseLines(filePath, await readLines(filePath), schema);
}

/**
 * Reads a file whose records must have unique `example_id`s.
 */
export async function readUnique<Schema extends z.ZodType<{ example_id: string }, z.ZodTypeDef, unknown>>(
  filePath: string,
  schema: Schema
): Promise<z.infer<Schema>[]> {
  const records = await readAll(filePath, schema);
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.example_id)) {
      throw new SchemaError(`duplicate example_id "${record.example_id}"`, filePath);
    }
    seen.add(record.example_id);
  }
  return records;
}

/**
 * Appends one record as one line and fsyncs before returning. The line is
 * written with a single call so a reader never sees half of it.
 */
export async function appendRecord(filePath: string, record: object): Promise<void> {
  const handle = await fs.open(filePath, 'a');
  try {
    await handle.appendFile(serializeRecord(record), 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Replaces the file with the given records. Written to a sibling temp file
 * and renamed into place.
 */
export async function writeAll(filePath: string, records: readonly object[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  const handle = await fs.open(tempPath, 'w');
  try {
    await handle.writeFile(records.map(serializeRecord).join(''), 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fs.rename(tempPath, filePath);
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  await fs.rename(tempPath, filePath);
}

/**
 * Ids already present in an output file. Empty when the file does not exist yet.
 *
 * A last line with no newline that is not valid JSON is an append cut short
 * by a crash and is left out; any other bad line is a SchemaError.
 */
export async function loadExistingIds(filePath: string): Promise<Set<string>> {
  let lines: string[];
  try {
    lines = await readLines(filePath);
  } catch (error) {
    if (error instanceof InputFileError && isNotFound(error.cause)) return new Set();
    throw error;
  }

  const last = lines[lines.length - 1];
  if (last.trim() && !isJson(last)) {
    lines.pop();
  }

  const rows = parseLines(filePath, lines, IdentifiedRowSchema);
  return new Set(rows.map((row) => row.example_id));
}

/**
 * Makes the file safe to append to. An unterminated last line is cut back to
 * the previous newline when it is not valid JSON, or terminated when it is.
 * Returns true when a partial line was removed.
 */
export async function repairTail(filePath: string): Promise<boolean> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }

  if (buffer.length === 0 || buffer[buffer.length - 1] === NEWLINE) return false;

  const start = buffer.lastIndexOf(NEWLINE) + 1;
  const tail = buffer.subarray(start).toString('utf-8');
  if (!tail.trim()) return false;

  if (isJson(tail)) {
    await fs.appendFile(filePath, '\n', 'utf-8');
    return false;
  }

  await fs.truncate(filePath, start);
  return true;
}
