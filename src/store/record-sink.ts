import fs from 'fs/promises';
import path from 'path';
import type { JudgedRecord } from '../config/schemas.js';
import { InputFileError, errorMessage } from '../errors.js';
import { appendRecord, repairTail, writeAll } from './record-store.js';

/**
 * The single append point of a judging run. Implementations serialise
 * concurrent appends so records never interleave.
 */
export interface RecordSink {
  append(record: JudgedRecord): Promise<void>;
  close(): Promise<void>;
}

export type OutputMode = 'append' | 'truncate';

/**
 * Checks that the output path is writable and, in truncate mode, empties it.
 * In append mode a partial last line left by a crash is cut off first.
 * Runs before any judging so an unwritable path fails the run up front.
 * Returns true when a partial line was removed.
 */
export async function prepareOutput(filePath: string, mode: OutputMode): Promise<boolean> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const repaired = mode === 'append' ? await repairTail(filePath) : false;
    const handle = await fs.open(filePath, mode === 'append' ? 'a' : 'w');
    await handle.close();
    return repaired;
  } catch (error) {
    throw new InputFileError(`cannot write output: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }
}

/** Streams each record to disk as soon as it is produced. */
export class JsonlRecordSink implements RecordSink {
  private queue: Promise<void> = Promise.resolve();
  private written = 0;

  constructor(private readonly filePath: string) {}

  append(record: JudgedRecord): Promise<void> {
    const write = this.queue.then(async () => {
      await appendRecord(this.filePath, record);
      this.written++;
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.queue = write.catch(() => undefined);
    return write;
  }

  get count(): number {
    return this.written;
  }

  async close(): Promise<void> {
    await this.queue;
  }
}

/**
 * Holds records in memory and writes them when the run closes. A crash loses
 * everything judged in this run.
 */
export class BufferedRecordSink implements RecordSink {
  private records: JudgedRecord[] = [];

  constructor(
    private readonly filePath: string,
    private readonly mode: OutputMode
  ) {}

  async append(record: JudgedRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    const records = this.records;
    this.records = [];
    if (this.mode === 'truncate') {
      await writeAll(this.filePath, records);
      return;
    }
    for (const record of records) {
      await appendRecord(this.filePath, record);
    }
  }
}

export class InMemoryRecordSink implements RecordSink {
  readonly records: JudgedRecord[] = [];
  closed = false;

  async append(record: JudgedRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  ids(): Set<string> {
    return new Set(this.records.map((record) => record.example_id));
  }
}
