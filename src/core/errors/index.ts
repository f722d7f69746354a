/**
 * Error taxonomy for the pipeline.
 *
 *   CallError       – gateway level (transient faults are retried internally)
 *   SchemaError     – constraint / record validation, never auto-corrected
 *   FittingError    – fitting could not produce acceptable content
 *   EvaluationError – a verdict could not be obtained
 *
 * Every error carries a `kind` so the driver can record it on a failed row.
 */
export abstract class PipelineError<K extends string = string> extends Error {
  abstract readonly kind: K;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── Gateway ───────────────────────────────────────────────────────────

export type CallErrorKind = "transient" | "exhausted" | "invalid";

export class CallError extends PipelineError<CallErrorKind> {
  readonly kind: CallErrorKind;
  /** Attempts made before giving up (1 for an immediate failure). */
  readonly attempts: number;
  readonly lastCause: unknown;

  constructor(kind: CallErrorKind, message: string, options: { attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.attempts = options.attempts;
    this.lastCause = options.cause;
  }
}

// ── Constraint schema ─────────────────────────────────────────────────

export type SchemaErrorKind = "wrongCount" | "malformedEntry";

export class SchemaError extends PipelineError<SchemaErrorKind> {
  readonly kind: SchemaErrorKind;
  readonly expected?: number;
  readonly actual?: number;
  /** 1-based position of the offending entry, for malformedEntry. */
  readonly position?: number;

  constructor(
    kind: SchemaErrorKind,
    message: string,
    details: { expected?: number; actual?: number; position?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.kind = kind;
    this.expected = details.expected;
    this.actual = details.actual;
    this.position = details.position;
  }
}

// ── Fitting ───────────────────────────────────────────────────────────

export type FittingErrorKind = "generationFailed" | "budgetExceeded";

export class FittingError extends PipelineError<FittingErrorKind> {
  readonly kind: FittingErrorKind;
  readonly passes: number;

  constructor(kind: FittingErrorKind, message: string, options: { passes: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.passes = options.passes;
  }
}

// ── Evaluation ────────────────────────────────────────────────────────

export type EvaluationErrorKind = "judgementUnavailable";

export class EvaluationError extends PipelineError<EvaluationErrorKind> {
  readonly kind: EvaluationErrorKind = "judgementUnavailable";
  readonly constraintIndex: number;

  constructor(constraintIndex: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.constraintIndex = constraintIndex;
  }
}

// ── Configuration ─────────────────────────────────────────────────────

export class ConfigError extends PipelineError<"invalidConfig"> {
  readonly kind = "invalidConfig" as const;
}

/** Readable one-line message for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : "Unknown error";
}
