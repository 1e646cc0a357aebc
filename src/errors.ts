/**
 * Error taxonomy shared by the optimizer pipeline. Layer-local failures (solver invocation, tour
 * validation) degrade a single layer to its original order, while configuration, input and
 * operating-system resource failures abort the whole run.
 */

export type OptimizerErrorKind =
  | 'parse'
  | 'config'
  | 'input'
  | 'solver-invocation'
  | 'tour-validation'
  | 'resource-exhaustion'
  | 'output';

export abstract class OptimizerError extends Error {
  abstract readonly kind: OptimizerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised for an instruction line the dialect table cannot classify. Never fatal. */
export class ParseError extends OptimizerError {
  readonly kind = 'parse' as const;

  constructor(
    message: string,
    readonly lineNumber: number,
    readonly raw: string,
  ) {
    super(message);
  }
}

export class ConfigError extends OptimizerError {
  readonly kind = 'config' as const;
}

/** Unreadable, empty or misnamed instruction file. */
export class InputError extends OptimizerError {
  readonly kind = 'input' as const;
}

export type SolverFailureReason = 'spawn' | 'exit' | 'timeout' | 'missing-output' | 'aborted';

export class SolverInvocationError extends OptimizerError {
  readonly kind = 'solver-invocation' as const;

  constructor(
    message: string,
    readonly reason: SolverFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TourValidationError extends OptimizerError {
  readonly kind = 'tour-validation' as const;
}

export class ResourceExhaustionError extends OptimizerError {
  readonly kind = 'resource-exhaustion' as const;

  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** An output file (program, report, run log or unsupported-line list) could not be written. */
export class OutputError extends OptimizerError {
  readonly kind = 'output' as const;
}

const RESOURCE_ERROR_CODES = new Set(['EMFILE', 'ENFILE', 'EAGAIN', 'ENOMEM', 'ENOSPC']);

const readErrorCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
};

/**
 * Wraps operating-system resource errors (file handle, process or memory exhaustion) into a
 * {@link ResourceExhaustionError}. Returns `null` for anything else so callers can rethrow or
 * classify it themselves.
 */
export const toResourceExhaustionError = (error: unknown, context: string): ResourceExhaustionError | null => {
  const code = readErrorCode(error);
  if (!code || !RESOURCE_ERROR_CODES.has(code)) {
    return null;
  }
  const detail = error instanceof Error ? error.message : code;
  return new ResourceExhaustionError(`${context}: ${detail}`, code, { cause: error });
};

/** Whether the error must abort the whole run rather than a single layer. */
export const isFatal = (error: unknown): boolean =>
  error instanceof ConfigError ||
  error instanceof InputError ||
  error instanceof OutputError ||
  error instanceof ResourceExhaustionError;

export const isMissingFileError = (error: unknown): boolean => readErrorCode(error) === 'ENOENT';

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

/** Classifies a failed write of `filePath` as resource exhaustion or as an {@link OutputError}. */
export const toOutputError = (error: unknown, filePath: string): OptimizerError =>
  toResourceExhaustionError(error, `Unable to write ${filePath}`) ??
  new OutputError(`Unable to write ${filePath}: ${describeError(error)}`, { cause: error });
