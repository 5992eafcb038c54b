/**
 * HTML over HTTP
 * GET/POST with a timeout, a per-client rate limit and a circuit breaker.
 * Non-2xx answers become HttpStatusError.
 */

import type { CircuitBreaker } from '../circuitBreaker.js';
import { HttpStatusError } from '../errors.js';
import { fetchWithTimeout } from '../utils/resilience.js';

export interface HtmlClientOptions {
  host: string;
  timeout: number;
  /** Minimum delay between two requests. */
  sleepSeconds: number;
  breaker: CircuitBreaker;
  headers?: Record<string, string>;
}

export class HtmlClient {
  private lastRequest = 0;

  constructor(private readonly options: HtmlClientOptions) {}

  url(path: string): string {
    return `${this.options.host}${path}`;
  }

  private async rateLimit(): Promise<void> {
    const interval = this.options.sleepSeconds * 1000;
    const elapsed = Date.now() - this.lastRequest;
    if (elapsed < interval) {
      await new Promise(resolve => setTimeout(resolve, interval - elapsed));
    }
    this.lastRequest = Date.now();
  }

  private async request(method: 'GET' | 'POST', url: string, body?: string, headers: Record<string, string> = {}): Promise<string> {
    await this.rateLimit();
    return this.options.breaker.run(async () => {
      const response = await fetchWithTimeout(url, {
        method,
        body,
        timeout: this.options.timeout,
        headers: { ...this.options.headers, ...headers },
      });
      const text = await response.text();
      if (!response.ok) throw new HttpStatusError(method, url, response.status, text);
      return text;
    });
  }

  get(path: string): Promise<string> {
    return this.request('GET', this.url(path));
  }

  /** urlencoded POST; the Referer is the form's own URL. */
  post(path: string, pairs: readonly [string, string][]): Promise<string> {
    const url = this.url(path);
    return this.request('POST', url, new URLSearchParams([...pairs]).toString(), {
      'Content-Type': 'application/x-www-form-urlencoded',
      Referer: url,
      Origin: this.options.host,
    });
  }
}
