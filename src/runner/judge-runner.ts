import type { Example, Generation, JudgedRecord } from '../config/schemas.js';
import type { JudgeClient, JudgeRequest } from '../judges/judge-interface.js';
import { parseVerdict, type Verdict } from '../judges/verdict-parser.js';
import type { RecordSink } from '../store/record-sink.js';
import {
  AuthenticationError,
  CancelledError,
  JudgeError,
  JudgeParseError,
  JudgeRequestError,
  MissingGenerationError,
  isRetryable,
  type RunError,
} from '../errors.js';

export interface JudgeProgress {
  processed: number;
  total: number;
  judged: number;
  skipped: number;
  failed: number;
  missing: number;
}

export interface JudgeRunnerOptions {
  client: JudgeClient;
  sink: RecordSink;
  /** Ids already judged in the output; computed once before the run */
  existingIds?: ReadonlySet<string>;
  maxRetries?: number;
  retryDelayMs?: number;
  retryBackoffMultiplier?: number;
  maxRetryDelayMs?: number;
  /** Per judge call, in ms */
  timeout?: number;
  concurrency?: number;
  /** Stop signal; aborts in-flight calls and backoff waits, and no new example starts */
  signal?: AbortSignal;
  verbose?: boolean;
  onProgress?: (progress: JudgeProgress) => void;
  onRecord?: (record: JudgedRecord) => void;
  onError?: (error: RunError) => void;
}

export interface JudgeRunResult {
  runId: string;
  total: number;
  judged: number;
  skipped: number;
  /** JudgeError and JudgeParseError */
  failed: number;
  missing: number;
  errors: RunError[];
  /** Generation ids with no dataset example */
  unmatchedGenerations: string[];
  cancelled: boolean;
  duration: number;
  timestamp: string;
}

type Outcome = 'judged' | 'skipped' | 'failed' | 'missing';

export class JudgeRunner {
  private client: JudgeClient;
  private sink: RecordSink;
  private existingIds: ReadonlySet<string>;
  private maxRetries: number;
  private retryDelayMs: number;
  private retryBackoffMultiplier: number;
  private maxRetryDelayMs: number;
  private timeout: number;
  private concurrency: number;
  private options: JudgeRunnerOptions;

  constructor(options: JudgeRunnerOptions) {
    this.options = options;
    this.client = options.client;
    this.sink = options.sink;
    this.existingIds = options.existingIds ?? new Set();
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1500;
    this.retryBackoffMultiplier = options.retryBackoffMultiplier ?? 2;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 30000;
    this.timeout = options.timeout ?? 120000;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
  }

  async run(dataset: readonly Example[], generations: readonly Generation[]): Promise<JudgeRunResult> {
    const startTime = Date.now();
    const runId = `run-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;

    const generationById = new Map<string, Generation>();
    for (const generation of generations) {
      generationById.set(generation.example_id, generation);
    }
    const datasetIds = new Set(dataset.map((example) => example.example_id));
    const unmatchedGenerations = generations
      .map((generation) => generation.example_id)
      .filter((id) => !datasetIds.has(id));

    const progress: JudgeProgress = {
      processed: 0,
      total: dataset.length,
      judged: 0,
      skipped: 0,
      failed: 0,
      missing: 0,
    };
    const errors: { index: number; error: RunError }[] = [];

    // Claims guard against dispatching an id twice within this run, whatever the worker count
    const claimed = new Set<string>();
    let cursor = 0;
    // Authentication failures and sink write failures end the run
    const fatalErrors: unknown[] = [];

    const stopRequested = () => fatalErrors.length > 0 || this.aborted();

    const nextExample = (): { index: number; example: Example } | undefined => {
      while (cursor < dataset.length) {
        const index = cursor++;
        const example = dataset[index];
        if (claimed.has(example.example_id)) continue;
        claimed.add(example.example_id);
        return { index, example };
      }
      return undefined;
    };

    const worker = async (): Promise<void> => {
      while (!stopRequested()) {
        const next = nextExample();
        if (!next) return;

        let outcome: Outcome;
        try {
          outcome = await this.processExample(next.example, generationById.get(next.example.example_id));
        } catch (error) {
          // Interrupted examples stay unjudged for the next resume
          if (error instanceof CancelledError) return;
          if (error instanceof MissingGenerationError || error instanceof JudgeError || error instanceof JudgeParseError) {
            errors.push({ index: next.index, error });
            this.options.onError?.(error);
            outcome = error instanceof MissingGenerationError ? 'missing' : 'failed';
          } else {
            fatalErrors.push(error);
            return;
          }
        }

        progress[outcome]++;
        progress.processed++;
        this.options.onProgress?.({ ...progress });
      }
    };

    const workerCount = Math.min(this.concurrency, Math.max(1, dataset.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (fatalErrors.length > 0) {
      throw fatalErrors[0];
    }

    errors.sort((a, b) => a.index - b.index);

    return {
      runId,
      total: dataset.length,
      judged: progress.judged,
      skipped: progress.skipped,
      failed: progress.failed,
      missing: progress.missing,
      errors: errors.map((entry) => entry.error),
      unmatchedGenerations,
      cancelled: this.aborted() && progress.processed < dataset.length,
      duration: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Judges one example. Returns the outcome for counting, or throws the
   * per-example error to be recorded.
   */
  private async processExample(example: Example, generation: Generation | undefined): Promise<Outcome> {
    if (this.existingIds.has(example.example_id)) {
      return 'skipped';
    }

    if (!generation) {
      throw new MissingGenerationError(example.example_id);
    }

    const request: JudgeRequest = {
      exampleId: example.example_id,
      category: example.category,
      prompt: example.prompt,
      reference: example.reference,
      generation: generation.generation,
    };

    const reply = await this.judgeWithRetries(request);

    let verdict: Verdict;
    try {
      verdict = parseVerdict(reply);
    } catch (error) {
      if (error instanceof JudgeParseError) {
        throw error.withExampleId(example.example_id);
      }
      throw error;
    }

    const record: JudgedRecord = {
      example_id: example.example_id,
      category: example.category,
      prompt: example.prompt,
      reference: example.reference,
      generation: generation.generation,
      score: verdict.score,
      explanation: verdict.explanation,
    };

    await this.sink.append(record);
    this.options.onRecord?.(record);

    if (this.options.verbose) {
      console.log(`${verdict.score === 1 ? '✓' : '✗'} ${example.example_id}`);
    }

    return 'judged';
  }

  private async judgeWithRetries(request: JudgeRequest): Promise<string> {
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      attempts++;
      try {
        return await this.judgeWithTimeout(request);
      } catch (error) {
        if (error instanceof AuthenticationError) {
          throw error;
        }
        if (this.aborted()) {
          throw new CancelledError(request.exampleId, { cause: error });
        }
        lastError = error;

        if (!isRetryable(error) || attempt === this.maxRetries) {
          break;
        }

        if (this.options.verbose) {
          console.warn(`Retrying ${request.exampleId} after attempt ${attempts}: ${error instanceof Error ? error.message : String(error)}`);
        }
        await this.sleep(this.retryDelay(attempt));
        if (this.aborted()) {
          throw new CancelledError(request.exampleId, { cause: error });
        }
      }
    }

    throw new JudgeError(request.exampleId, attempts, lastError);
  }

  retryDelay(attempt: number): number {
    const delay = this.retryDelayMs * Math.pow(this.retryBackoffMultiplier, attempt);
    return Math.min(delay, this.maxRetryDelayMs);
  }

  private aborted(): boolean {
    return this.options.signal?.aborted === true;
  }

  private async judgeWithTimeout(request: JudgeRequest): Promise<string> {
    const controller = new AbortController();
    const runSignal = this.options.signal;
    const onRunAbort = () => controller.abort();
    runSignal?.addEventListener('abort', onRunAbort, { once: true });
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first: the race settles with the timeout, not the abort it triggers
        reject(new JudgeRequestError(`Judge call timed out after ${this.timeout}ms`, true));
        controller.abort();
      }, this.timeout);
    });

    try {
      return await Promise.race([this.client.judge(request, { signal: controller.signal }), timeoutPromise]);
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener('abort', onRunAbort);
    }
  }

  /** Resolves after `ms`, or as soon as the run is cancelled. */
  private sleep(ms: number): Promise<void> {
    const signal = this.options.signal;
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
