/**
 * Custom error hierarchy for featwise.
 *
 * Provides programmatic error discrimination without parsing message strings.
 * Each subclass carries a `code` string for structured error handling.
 */

/** Base error for all featwise errors. Carries a `code` and optional `context`. */
export class FeatwiseError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string = 'FEATWISE_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = 'FeatwiseError';
    this.code = code;
    this.context = context;
  }
}

/** Configuration errors: missing design template, standard image or dataset directories. */
export class ConfigError extends FeatwiseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Validation errors: bad input, precondition failures, argument checks. */
export class ValidationError extends FeatwiseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/** Nothing to work on: no analyses, sessions or subjects were discovered. */
export class NotFoundError extends FeatwiseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

/** Selection input rejected as a whole. `invalid` lists every offending token with its reason. */
export class SelectionError extends FeatwiseError {
  readonly invalid: string[];

  constructor(invalid: string[]) {
    super(`The following selections are invalid:\n${invalid.map((i) => `  - ${i}`).join('\n')}`, 'SELECTION_ERROR', {
      invalid,
    });
    this.name = 'SelectionError';
    this.invalid = invalid;
  }
}

/** No contrast is shared by every selected directory. */
export class IntersectionError extends FeatwiseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INTERSECTION_ERROR', context);
    this.name = 'IntersectionError';
  }
}

/** On-disk state disagrees with what discovery reported (e.g. a cope file vanished). */
export class ConsistencyError extends FeatwiseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONSISTENCY_ERROR', context);
    this.name = 'ConsistencyError';
  }
}

/** External engine failures: spawn errors and non-zero exits. */
export class EngineError extends FeatwiseError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, context?: Record<string, unknown>) {
    super(message, 'ENGINE_ERROR', context);
    this.name = 'EngineError';
    this.exitCode = exitCode;
  }
}

/** The user cancelled (Ctrl+C, declined confirmation). */
export class CancelledError extends FeatwiseError {
  constructor(message: string = 'Cancelled by user') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/** Type guard: check if an error is a FeatwiseError or subclass. */
export function isFeatwiseError(error: unknown): error is FeatwiseError {
  return error instanceof FeatwiseError;
}

/** True for the rejection @inquirer/prompts raises when a prompt is closed with Ctrl+C. */
export function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}
