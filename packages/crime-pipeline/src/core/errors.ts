/**
 * Crime Pipeline Error Types
 *
 * A single error class carries a `kind` tag so that stage boundaries can
 * return failures as values and the orchestrator can tell a missing input
 * from a broken transform.
 */

/**
 * Failure kinds, from least to most severe
 */
export type PipelineErrorKind =
  | 'NotFound'
  | 'ParseError'
  | 'TransformError'
  | 'WriteError'
  | 'CriticalFailure';

/**
 * Context attached to a pipeline failure
 */
export interface PipelineErrorDetails {
  /** File the failure relates to, if any */
  readonly path?: string;
  /** Stage that raised the failure */
  readonly stage?: string;
  /** Underlying error */
  readonly cause?: unknown;
}

export class PipelineError extends Error {
  public override readonly name = 'PipelineError' as const;

  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly details: PipelineErrorDetails = {}
  ) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, PipelineError.prototype);
  }

  get path(): string | undefined {
    return this.details.path;
  }

  get stage(): string | undefined {
    return this.details.stage;
  }

  /**
   * Plain object form for structured log metadata
   */
  toLogMetadata(): Record<string, unknown> {
    return {
      kind: this.kind,
      error: this.message,
      ...(this.details.path !== undefined && { path: this.details.path }),
      ...(this.details.stage !== undefined && { stage: this.details.stage }),
    };
  }
}

export function notFound(path: string, cause?: unknown): PipelineError {
  return new PipelineError('NotFound', `File not found: ${path}`, { path, cause });
}

export function parseError(message: string, path?: string, cause?: unknown): PipelineError {
  return new PipelineError('ParseError', message, { path, cause });
}

export function transformError(message: string, stage?: string, cause?: unknown): PipelineError {
  return new PipelineError('TransformError', message, { stage, cause });
}

export function writeError(path: string, cause?: unknown): PipelineError {
  return new PipelineError(
    'WriteError',
    `Failed to write ${path}: ${errorMessage(cause)}`,
    { path, cause }
  );
}

export function criticalFailure(cause: unknown): PipelineError {
  return new PipelineError('CriticalFailure', `Pipeline execution failed: ${errorMessage(cause)}`, {
    cause,
  });
}

/**
 * Wrap an unknown throwable raised inside a stage
 *
 * PipelineErrors pass through with the stage filled in; anything else
 * becomes a TransformError.
 */
export function toPipelineError(error: unknown, stage: string): PipelineError {
  if (error instanceof PipelineError) {
    if (error.stage !== undefined) return error;
    return new PipelineError(error.kind, error.message, { ...error.details, stage });
  }
  return transformError(errorMessage(error), stage, error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
