// Error types raised by the cleaning pipeline

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Base class for every failure the pipeline surfaces to its caller.
 * Per-record problems never end up here; they are recorded in statistics.
 */
export class CleaningPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input file missing, unparseable, or of an unrecognized shape */
export class LoadError extends CleaningPipelineError {
  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load ${path}: ${message}`, options);
  }
}

/** Cleaned output or report could not be written */
export class WriteError extends CleaningPipelineError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write ${path}: ${getErrorMessage(options?.cause)}`, options);
  }
}

/** Funnel counts do not add up; always a bug in a stage */
export class PipelineInvariantError extends CleaningPipelineError {}

/** An environment variable or CLI option could not be parsed */
export class ConfigurationError extends CleaningPipelineError {}
