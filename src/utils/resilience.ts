/**
 * Resilience Utilities
 * Request timeouts, retries, and the process signal handlers that let a
 * long refresh stop cleanly.
 */

import { HttpStatusError } from '../errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Timeouts
// =============================================================================

/** fetch() that aborts after `timeout` ms (default 15s). */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number } = {}
): Promise<Response> {
  const { timeout = 15000, ...init } = options;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Retry
// =============================================================================

const TRANSIENT_MESSAGES = [
  'econnrefused',
  'econnreset',
  'etimedout',
  'enotfound',
  'enetunreach',
  'epipe',
  'fetch failed',
  'aborted',
  'socket hang up',
];

/** Rate limits, server errors and dropped connections. A 404 or a rejected form is not transient. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpStatusError) return error.status === 429 || error.status >= 500;
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some(fragment => message.includes(fragment));
}

export interface RetryOptions {
  /** Retries after the first attempt. Default 3. */
  maxRetries?: number;
  /** Delay before the first retry, doubled each time. Default 1s. */
  baseDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown, attempt: number) => boolean;
  label?: string;
}

/**
 * Exponential backoff with up to 10% jitter. The last error is rethrown
 * once retries run out or `retryOn` declines.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    backoffMultiplier = 2,
    retryOn = isRetryableError,
    label,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !retryOn(error, attempt)) throw error;

      const delay = Math.min(baseDelay * backoffMultiplier ** attempt, maxDelay);
      const waitMs = Math.round(delay * (1 + 0.1 * Math.random()));
      const reason = error instanceof Error ? error.message : String(error);
      console.log(`[Retry]${label ? ` ${label}` : ''} attempt ${attempt + 1}/${maxRetries} failed (${reason}), retrying in ${waitMs}ms`);
      await sleep(waitMs);
    }
  }
}

/**
 * One immediate retry on any failure. Only for idempotent reads: a write
 * that failed halfway must not be replayed.
 */
export function retryOnce<T>(fn: () => Promise<T>, label?: string): Promise<T> {
  return withRetry(fn, { maxRetries: 1, baseDelay: 0, retryOn: () => true, label });
}

// =============================================================================
// Signals
// =============================================================================

const cleanups: (() => void)[] = [];
let installed = false;
let interrupt: AbortController | null = null;

function runCleanups(reason: string): void {
  console.log(`\n[Sync] Shutting down (${reason})`);
  for (const cleanup of cleanups) {
    try {
      cleanup();
    } catch (error) {
      console.error('[Sync] Cleanup failed:', error);
    }
  }
}

function installHandlers(): void {
  if (installed) return;
  installed = true;

  process.on('SIGTERM', () => {
    runCleanups('SIGTERM');
    process.exit(0);
  });

  // The first Ctrl-C lets a refresh finish its current entity; the second exits.
  process.on('SIGINT', () => {
    if (interrupt && !interrupt.signal.aborted) {
      console.log('\n[Sync] Interrupted, stopping after the current entity (Ctrl-C again to exit)');
      interrupt.abort();
      return;
    }
    runCleanups('SIGINT');
    process.exit(130);
  });

  process.on('uncaughtException', (error) => {
    console.error('\n[Sync] Uncaught exception:', error);
    runCleanups('uncaughtException');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('\n[Sync] Unhandled rejection:', reason);
    runCleanups('unhandledRejection');
    process.exit(1);
  });
}

/** Run `fn` when the process is stopped by a signal or a crash. */
export function registerCleanup(fn: () => void): void {
  cleanups.push(fn);
  installHandlers();
}

/** Aborted by the first SIGINT. */
export function interruptSignal(): AbortSignal {
  interrupt ??= new AbortController();
  installHandlers();
  return interrupt.signal;
}
