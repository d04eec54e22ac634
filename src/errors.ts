export type ErrorType =
  | 'schema'
  | 'input-file'
  | 'missing-generation'
  | 'judge'
  | 'judge-parse'
  | 'aggregation-join'
  | 'authentication'
  | 'cancelled';

export abstract class PipelineError extends Error {
  abstract readonly type: ErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A line of an input file did not parse into its record shape.
 * Fatal for the run that reads the file.
 */
export class SchemaError extends PipelineError {
  readonly type = 'schema';

  constructor(
    message: string,
    readonly filePath: string,
    readonly line?: number
  ) {
    super(line === undefined ? `${filePath}: ${message}` : `${filePath}:${line}: ${message}`);
  }
}

export class InputFileError extends PipelineError {
  readonly type = 'input-file';

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`${filePath}: ${message}`, options);
  }
}

export class MissingGenerationError extends PipelineError {
  readonly type = 'missing-generation';

  constructor(readonly exampleId: string) {
    super(`No generation for example ${exampleId}`);
  }
}

export class JudgeError extends PipelineError {
  readonly type = 'judge';

  constructor(
    readonly exampleId: string,
    readonly attempts: number,
    cause: unknown
  ) {
    super(
      `Judging ${exampleId} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(cause)}`,
      { cause }
    );
  }
}

export class JudgeParseError extends PipelineError {
  readonly type = 'judge-parse';

  constructor(
    message: string,
    readonly rawResponse: string,
    readonly exampleId?: string
  ) {
    super(exampleId ? `${exampleId}: ${message}` : message);
  }

  withExampleId(exampleId: string): JudgeParseError {
    return new JudgeParseError(this.message, this.rawResponse, exampleId);
  }
}

export type JoinFailure = 'missing' | 'malformed';

export class AggregationJoinError extends PipelineError {
  readonly type = 'aggregation-join';

  constructor(
    readonly exampleId: string,
    readonly reason: JoinFailure
  ) {
    super(
      reason === 'missing'
        ? `No scored record for example ${exampleId}`
        : `Scored record for example ${exampleId} has no usable score`
    );
  }
}

export class AuthenticationError extends PipelineError {
  readonly type = 'authentication';
}

/** The run was cancelled while this example was in flight; it stays unjudged. */
export class CancelledError extends PipelineError {
  readonly type = 'cancelled';

  constructor(
    readonly exampleId: string,
    options?: { cause?: unknown }
  ) {
    super(`Judging ${exampleId} was cancelled`, options);
  }
}

/**
 * Transport-level failure raised by a judge client. `retryable` marks
 * failures worth another attempt (network, rate limit, server errors, timeouts).
 */
export class JudgeRequestError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'JudgeRequestError';
  }
}

/** Errors collected per example during a judging run. */
export type RunError = MissingGenerationError | JudgeError | JudgeParseError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof AuthenticationError) return false;
  if (error instanceof JudgeRequestError) return error.retryable;
  // Anything a client did not classify is treated like a dropped connection
  return true;
}

export function requestErrorFromStatus(
  status: number | undefined,
  message: string,
  cause?: unknown
): AuthenticationError | JudgeRequestError {
  if (status === 401 || status === 403) {
    return new AuthenticationError(message, { cause });
  }
  const retryable =
    status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
  return new JudgeRequestError(message, retryable, status, { cause });
}
