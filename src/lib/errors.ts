/**
 * Error types raised by design-judge
 *
 * Every failure the library reports on its own is a `DesignJudgeError`, so
 * callers can tell library errors apart from errors thrown by the imaging
 * library, which are passed through untouched.
 */
import type { ZodIssue } from 'zod';

/**
 * Base class for all errors raised by the library
 */
export class DesignJudgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A design principle tag that is not in the catalog
 */
export class UnknownPrincipleError extends DesignJudgeError {
  readonly principle: string;

  constructor(principle: string, known: readonly string[]) {
    super(`Unknown design principle "${principle}" (expected one of: ${known.join(', ')})`);
    this.principle = principle;
  }
}

/**
 * A system-prompt template that cannot be parsed or rendered
 */
export class PromptTemplateError extends DesignJudgeError {}

/**
 * Invalid configuration read from the environment or passed on the command line
 */
export class ConfigurationError extends DesignJudgeError {}

/**
 * The model replied, but the reply does not match the requested schema
 */
export class ResponseValidationError extends DesignJudgeError {
  /** The reply text exactly as the model returned it */
  readonly raw: string;
  /** Field-level problems; empty when the reply was not JSON at all */
  readonly issues: ZodIssue[];

  constructor(message: string, raw: string, issues: ZodIssue[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.raw = raw;
    this.issues = issues;
  }
}

/**
 * The request to the model provider failed before a reply came back
 */
export class ModelRequestError extends DesignJudgeError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`${provider} request failed: ${message}`, options);
    this.provider = provider;
  }
}

/**
 * A single model request ran past its deadline
 */
export class ModelTimeoutError extends DesignJudgeError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`Model request timed out after ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Outcome of one request in a multi-sample evaluation
 */
export type EvaluationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * One or more requests of a multi-sample evaluation failed.
 * `outcomes` keeps every request, in issue order, successful or not.
 */
export class BatchEvaluationError<T = unknown> extends DesignJudgeError {
  readonly outcomes: EvaluationOutcome<T>[];

  constructor(outcomes: EvaluationOutcome<T>[]) {
    const failed = outcomes.filter(o => !o.ok).length;
    const first = outcomes.find((o): o is { ok: false; error: unknown } => !o.ok);
    super(`${failed} of ${outcomes.length} evaluation requests failed`, { cause: first?.error });
    this.outcomes = outcomes;
  }

  /** Values of the requests that succeeded */
  get results(): T[] {
    return this.outcomes.flatMap(o => (o.ok ? [o.value] : []));
  }

  /** Errors of the requests that failed */
  get errors(): unknown[] {
    return this.outcomes.flatMap(o => (o.ok ? [] : [o.error]));
  }
}
