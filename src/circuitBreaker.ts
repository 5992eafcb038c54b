/**
 * Circuit breakers for the codex and the guide
 *
 * A run of transient failures (5xx, 429, dropped connections) opens the
 * circuit and every request fails fast with CircuitOpenError until the
 * cooldown has passed. The next request is then a probe: success closes the
 * circuit, failure reopens it with a longer cooldown.
 *
 * A 404, a rejected form or an unparsable page means the site is up, so those
 * reset the failure count instead.
 */

import { CircuitOpenError } from './errors.js';
import { isRetryableError } from './utils/resilience.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive transient failures before the circuit opens. Default 5. */
  failureThreshold?: number;
  /** First cooldown. Default 30s. */
  cooldownMs?: number;
  /** Cap on the cooldown after repeated failed probes. Default 5 min. */
  maxCooldownMs?: number;
  /** Default 2. */
  cooldownMultiplier?: number;
}

export interface CircuitStatus {
  state: CircuitState;
  consecutiveFailures: number;
  cooldownMs: number;
  cooldownRemainingMs: number;
  totalTrips: number;
}

export class CircuitBreaker {
  readonly name: string;
  private readonly threshold: number;
  private readonly baseCooldownMs: number;
  private readonly maxCooldownMs: number;
  private readonly multiplier: number;

  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private openedAt = 0;
  private cooldownMs: number;
  private trips = 0;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.threshold = options.failureThreshold ?? 5;
    this.baseCooldownMs = options.cooldownMs ?? 30_000;
    this.maxCooldownMs = options.maxCooldownMs ?? 300_000;
    this.multiplier = options.cooldownMultiplier ?? 2;
    this.cooldownMs = this.baseCooldownMs;
  }

  private moveTo(state: CircuitState, reason: string): void {
    this.state = state;
    console.log(`[CircuitBreaker:${this.name}] → ${state} (${reason})`);
  }

  private remainingMs(): number {
    return Math.max(0, this.cooldownMs - (Date.now() - this.openedAt));
  }

  /** Runs `fn` unless the circuit is open. Only transient failures count against it. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.remainingMs() > 0) throw new CircuitOpenError(this.name, this.remainingMs());
      this.moveTo('HALF_OPEN', `probing after ${Math.round(this.cooldownMs / 1000)}s`);
    }

    try {
      const result = await fn();
      this.succeeded();
      return result;
    } catch (error) {
      if (CircuitBreaker.isInfraFailure(error)) this.failed();
      else this.succeeded();
      throw error;
    }
  }

  private succeeded(): void {
    if (this.state === 'HALF_OPEN') {
      this.cooldownMs = this.baseCooldownMs;
      this.moveTo('CLOSED', 'probe succeeded');
    }
    this.state = 'CLOSED';
    this.failures = 0;
  }

  private failed(): void {
    this.failures++;
    this.openedAt = Date.now();

    if (this.state === 'HALF_OPEN') {
      this.cooldownMs = Math.min(this.cooldownMs * this.multiplier, this.maxCooldownMs);
      this.moveTo('OPEN', `probe failed, cooldown ${Math.round(this.cooldownMs / 1000)}s`);
    } else if (this.state === 'CLOSED' && this.failures >= this.threshold) {
      this.trips++;
      this.moveTo('OPEN', `${this.failures} failures in a row, trip #${this.trips}`);
    }
  }

  getStatus(): CircuitStatus {
    return {
      state: this.state,
      consecutiveFailures: this.failures,
      cooldownMs: this.cooldownMs,
      cooldownRemainingMs: this.state === 'OPEN' ? this.remainingMs() : 0,
      totalTrips: this.trips,
    };
  }

  static isInfraFailure(error: unknown): boolean {
    return isRetryableError(error);
  }
}

export const guideCircuitBreaker = new CircuitBreaker({ name: 'guide' });
export const codexCircuitBreaker = new CircuitBreaker({ name: 'codex' });
