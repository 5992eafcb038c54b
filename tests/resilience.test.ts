import { afterEach, describe, it, expect, vi } from 'vitest';
import { CircuitBreaker } from '../src/circuitBreaker.js';
import { CircuitOpenError, HttpStatusError } from '../src/errors.js';
import { HtmlClient } from '../src/sources/http.js';
import { retryOnce, withRetry } from '../src/utils/resilience.js';

const unavailable = () => Promise.reject(new HttpStatusError('GET', '/x', 503));

describe('CircuitBreaker', () => {
  it('opens after consecutive infrastructure failures', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 2, cooldownMs: 60_000 });
    await expect(breaker.run(unavailable)).rejects.toThrow('GET /x returned HTTP 503');
    await expect(breaker.run(unavailable)).rejects.toThrow('GET /x returned HTTP 503');
    expect(breaker.getStatus()).toMatchObject({ state: 'OPEN', consecutiveFailures: 2, totalTrips: 1 });

    const fn = vi.fn(async () => 'ok');
    await expect(breaker.run(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('does not count missing pages', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1 });
    await expect(breaker.run(() => Promise.reject(new HttpStatusError('GET', '/x', 404)))).rejects.toThrow();
    expect(breaker.getStatus()).toMatchObject({ state: 'CLOSED', consecutiveFailures: 0 });
  });

  it('closes again after a successful probe', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1, cooldownMs: 0 });
    await expect(breaker.run(unavailable)).rejects.toThrow();
    expect(await breaker.run(async () => 'back')).toBe('back');
    expect(breaker.getStatus().state).toBe('CLOSED');
  });
});

describe('withRetry', () => {
  it('retries transient failures up to the limit', async () => {
    const fn = vi.fn(unavailable);
    await expect(withRetry(fn, { maxRetries: 2, baseDelay: 0 })).rejects.toThrow('GET /x returned HTTP 503');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('gives up at once on other errors', async () => {
    const fn = vi.fn(() => Promise.reject(new Error('bad form')));
    await expect(withRetry(fn, { baseDelay: 0 })).rejects.toThrow('bad form');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retryOnce retries any error a single time', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('bad form'))
      .mockResolvedValueOnce('second');
    expect(await retryOnce(fn)).toBe('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('HtmlClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = () => new HtmlClient({
    host: 'http://guide.test',
    timeout: 1000,
    sleepSeconds: 0,
    breaker: new CircuitBreaker({ name: 'test' }),
    headers: { Cookie: 'sessionid=test-secret' },
  });

  it('posts urlencoded pairs with the form as referer', async () => {
    const fetchMock = vi.fn(async () => new Response('<p>Saved</p>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    expect(await client().post('/admin/items/item/1/change/', [['name', 'Iron Sword'], ['causes', '3']])).toBe('<p>Saved</p>');
    expect(fetchMock).toHaveBeenCalledWith('http://guide.test/admin/items/item/1/change/', expect.objectContaining({
      method: 'POST',
      body: 'name=Iron+Sword&causes=3',
      headers: {
        Cookie: 'sessionid=test-secret',
        'Content-Type': 'application/x-www-form-urlencoded',
        Referer: 'http://guide.test/admin/items/item/1/change/',
        Origin: 'http://guide.test',
      },
    }));
  });

  it('turns error statuses into HttpStatusError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));
    await expect(client().get('/codex/items/x/')).rejects.toMatchObject({
      name: 'HttpStatusError',
      status: 404,
      url: 'http://guide.test/codex/items/x/',
      body: 'gone',
    });
  });
});
