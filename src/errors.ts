/**
 * Error types
 * Transport, lookup, conversion and form errors raised across the sync pipeline.
 */

// =============================================================================
// Transport
// =============================================================================

/**
 * Non-2xx HTTP response. `status` is read by the retry predicate and the
 * circuit breaker.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly method: string,
    public readonly url: string,
    public readonly status: number,
    public readonly body: string = '',
  ) {
    super(`${method} ${url} returned HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

export class CircuitOpenError extends Error {
  constructor(public readonly circuit: string, public readonly retryInMs: number) {
    super(`Circuit breaker OPEN for ${circuit} (retry in ${Math.ceil(retryInMs / 1000)}s)`);
    this.name = 'CircuitOpenError';
  }
}

export class HtmlParseError extends Error {
  constructor(public readonly context: string, message: string) {
    super(`${context}: ${message}`);
    this.name = 'HtmlParseError';
  }
}

// =============================================================================
// Lookups and conversions
// =============================================================================

/**
 * A required lookup found nothing (`matches === 0`) or more than one
 * candidate.
 */
export class LookupError extends Error {
  constructor(
    public readonly what: string,
    public readonly key: string,
    public readonly matches: number = 0,
  ) {
    super(
      matches === 0
        ? `No ${what} found for "${key}"`
        : `Ambiguous ${what} for "${key}": ${matches} matches`,
    );
    this.name = 'LookupError';
  }

  get ambiguous(): boolean {
    return this.matches > 1;
  }
}

export class PartialConversionError extends Error {
  constructor(
    public readonly category: string,
    public readonly successes: readonly number[],
    public readonly failures: readonly string[],
  ) {
    super(`Failed to convert ${category}: ${failures.join(', ')}`);
    this.name = 'PartialConversionError';
  }
}

// =============================================================================
// Guide writes
// =============================================================================

export class GuideFormError extends Error {
  constructor(
    public readonly form: string,
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Form ${form}, field "${field}": ${reason}`);
    this.name = 'GuideFormError';
  }
}

/** The guide rendered the form again with error notes instead of redirecting. */
export class GuidePostError extends Error {
  constructor(
    public readonly url: string,
    public readonly note: string,
    public readonly fieldErrors: readonly string[],
  ) {
    super(`POST ${url} rejected: ${note}${fieldErrors.length ? ` (${fieldErrors.join('; ')})` : ''}`);
    this.name = 'GuidePostError';
  }
}

export class FixNotConfirmedError extends Error {
  constructor(public readonly entity: string, public readonly field: string) {
    super(`Fix of ${entity}.${field} did not persist on the guide`);
    this.name = 'FixNotConfirmedError';
  }
}

// =============================================================================
// Misc
// =============================================================================

export class RefreshCancelledError extends Error {
  constructor(public readonly done: number, public readonly total: number) {
    super(`Refresh cancelled after ${done}/${total} entities`);
    this.name = 'RefreshCancelledError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
