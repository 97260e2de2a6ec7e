/**
 * Pipeline error taxonomy
 *
 * Every error carries the HTTP status the API answers with and the exit code the
 * import job terminates with, so callers can tell "no puzzle today" apart from
 * "store unreachable".
 */

export const ExitCode = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  CONFIG: 2,
  SOURCE_UNAVAILABLE: 3,
  MALFORMED_GAME_RECORD: 4,
  STORE_UNAVAILABLE: 5,
  INVALID_PAYLOAD: 6,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export class PipelineError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly exitCode: ExitCodeValue;
  readonly details?: unknown;

  constructor(
    message: string,
    options: { code: string; statusCode: number; exitCode: ExitCodeValue; details?: unknown; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.exitCode = options.exitCode;
    this.details = options.details;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'CONFIG_ERROR', statusCode: 500, exitCode: ExitCode.CONFIG, details });
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, {
      code: 'SOURCE_UNAVAILABLE',
      statusCode: 502,
      exitCode: ExitCode.SOURCE_UNAVAILABLE,
      details: options.status === undefined ? undefined : { status: options.status },
      cause: options.cause,
    });
  }
}

export class InvalidPayloadError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, { code: 'INVALID_PAYLOAD', statusCode: 422, exitCode: ExitCode.INVALID_PAYLOAD, details });
  }
}

export class MalformedGameRecordError extends PipelineError {
  constructor(message: string, details?: unknown) {
    super(message, {
      code: 'MALFORMED_GAME_RECORD',
      statusCode: 422,
      exitCode: ExitCode.MALFORMED_GAME_RECORD,
      details,
    });
  }
}

export class IllegalSolutionMoveError extends PipelineError {
  readonly index: number;
  readonly move: string;

  constructor(index: number, move: string, reason: string) {
    super(`Solution move ${index} (${move}) is ${reason}`, {
      code: 'ILLEGAL_SOLUTION_MOVE',
      statusCode: 422,
      exitCode: ExitCode.SUCCESS,
      details: { index, move, reason },
    });
    this.index = index;
    this.move = move;
  }
}

export class SolutionTooLongError extends PipelineError {
  constructor(halfMoves: number, maxFullMoves: number) {
    super(`Solution has ${halfMoves} half-moves, more than ${maxFullMoves} full moves`, {
      code: 'SOLUTION_TOO_LONG',
      statusCode: 422,
      exitCode: ExitCode.SUCCESS,
      details: { halfMoves, maxFullMoves },
    });
  }
}

export class StoreUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'STORE_UNAVAILABLE', statusCode: 503, exitCode: ExitCode.STORE_UNAVAILABLE, cause });
  }
}

export class RetentionPassError extends PipelineError {
  readonly puzzleId: string;
  readonly collection: string;

  constructor(puzzleId: string, collection: string, cause?: unknown) {
    super(`Failed to delete ${collection}/${puzzleId}`, {
      code: 'RETENTION_PASS_ERROR',
      statusCode: 500,
      exitCode: ExitCode.SUCCESS,
      details: { puzzleId, collection },
      cause,
    });
    this.puzzleId = puzzleId;
    this.collection = collection;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): ExitCodeValue {
  return error instanceof PipelineError ? error.exitCode : ExitCode.UNEXPECTED;
}
