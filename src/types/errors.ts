/**
 * Custom error classes for the Lucidata services.
 *
 * Only failures without a safe fallback are modelled as errors. A missing
 * schema or an incomplete model response is recovered in place and shows up
 * as a `fallback` outcome instead (see `Recoverable` in ./utils.ts).
 */

import type { QueryError, QueryErrorKind } from './models.js';

/**
 * Error thrown when the language-model provider call fails.
 *
 * Covers network failures, authentication errors, exhausted quota and a
 * missing API key. The call is never retried.
 */
export class ProviderError extends Error {
  public readonly provider: string;
  public readonly model: string;

  constructor(message: string, provider: string, model: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
    this.provider = provider;
    this.model = model;
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

/**
 * Error thrown when a SQL statement cannot be executed.
 */
export class QueryExecutionError extends Error {
  public readonly kind: QueryErrorKind;

  constructor(error: QueryError) {
    super(error.message);
    this.name = 'QueryExecutionError';
    this.kind = error.kind;
    Object.setPrototypeOf(this, QueryExecutionError.prototype);
  }

  /**
   * HTTP status for this failure: statement-level problems are the caller's
   * (400), configuration and connectivity problems are ours (500).
   */
  get statusCode(): number {
    return statusForQueryError(this.kind);
  }
}

/**
 * Error thrown when result rows cannot be rendered.
 */
export class FormattingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FormattingError';
    Object.setPrototypeOf(this, FormattingError.prototype);
  }
}

/**
 * Error thrown when the environment does not describe a usable configuration.
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function statusForQueryError(kind: QueryErrorKind): number {
  switch (kind) {
    case 'SyntaxError':
    case 'ConstraintViolation':
      return 400;
    case 'ConnectionError':
    case 'Other':
      return 500;
  }
}
