import { ExampleSchema, GenerationSchema } from '../config/schemas.js';
import type { JudgeClient } from '../judges/judge-interface.js';
import { loadExistingIds, readUnique } from '../store/record-store.js';
import { BufferedRecordSink, JsonlRecordSink, prepareOutput } from '../store/record-sink.js';
import type { RecordSink } from '../store/record-sink.js';
import { JudgeRunner } from './judge-runner.js';
import type { JudgeRunResult, JudgeRunnerOptions } from './judge-runner.js';

export interface JudgeFilesOptions
  extends Omit<JudgeRunnerOptions, 'client' | 'sink' | 'existingIds'> {
  datasetPath: string;
  generationsPath: string;
  outputPath: string;
  client: JudgeClient;
  /** Skip ids already in the output and append to it, instead of truncating */
  resume?: boolean;
  /** Flush each record as it is judged; when false, write everything at the end */
  streamWrite?: boolean;
}

export interface JudgeFilesResult extends JudgeRunResult {
  outputPath: string;
  /** Ids found in the output before this run started */
  resumedFrom: number;
  /** A partial last line from an interrupted write was removed before appending */
  droppedIncompleteLine: boolean;
}

/**
 * Reads and validates every input before the output file is touched, so a
 * bad dataset or generation file never leaves partial output behind.
 */
export async function judgeFiles(options: JudgeFilesOptions): Promise<JudgeFilesResult> {
  const { datasetPath, generationsPath, outputPath, client, resume = false, streamWrite = true, ...runnerOptions } =
    options;

  const dataset = await readUnique(datasetPath, ExampleSchema);
  const generations = await readUnique(generationsPath, GenerationSchema);
  const existingIds = resume ? await loadExistingIds(outputPath) : new Set<string>();

  const mode = resume ? 'append' : 'truncate';
  const droppedIncompleteLine = await prepareOutput(outputPath, mode);

  const sink: RecordSink = streamWrite
    ? new JsonlRecordSink(outputPath)
    : new BufferedRecordSink(outputPath, mode);

  const runner = new JudgeRunner({ ...runnerOptions, client, sink, existingIds });

  let result: JudgeRunResult;
  try {
    result = await runner.run(dataset, generations);
  } finally {
    await sink.close();
  }

  return { ...result, outputPath, resumedFrom: existingIds.size, droppedIncompleteLine };
}
