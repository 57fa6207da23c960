import type { z } from 'zod';

type CircuitState = 'closed' | 'open' | 'half-open';

export type CircuitBreakerOptions = {
  failureThreshold: number;
  resetTimeoutMs: number;
};

export class CircuitBreaker {
  private failures = 0;
  private state: CircuitState = 'closed';
  private openedAt = 0;

  constructor(private options: CircuitBreakerOptions, private now: () => number = Date.now) {}

  /**
   * Runs `fn` through the breaker. A resolved result for which `isFailure`
   * holds (an HTTP 503, say) is returned but still counts against the circuit.
   */
  async execute<T>(fn: () => Promise<T>, isFailure: (result: T) => boolean = () => false): Promise<T> {
    if (this.state === 'open') {
      const elapsed = this.now() - this.openedAt;
      if (elapsed < this.options.resetTimeoutMs) {
        throw new Error('CIRCUIT_OPEN');
      }
      this.state = 'half-open';
    }

    let result: T;
    try {
      result = await fn();
    } catch (err) {
      this.onFailure();
      throw err;
    }

    if (isFailure(result)) {
      this.onFailure();
    } else {
      this.onSuccess();
    }
    return result;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  private onSuccess() {
    this.failures = 0;
    this.state = 'closed';
  }

  private onFailure() {
    this.failures += 1;
    if (this.state === 'half-open' || this.failures >= this.options.failureThreshold) {
      this.state = 'open';
      this.openedAt = this.now();
    }
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum delay between consecutive calls to the same upstream.
 * Callers are served in arrival order.
 */
export class RateLimiter {
  private nextSlotAt = 0;

  constructor(
    private minIntervalMs: number,
    private now: () => number = Date.now,
    private wait: Sleep = sleep
  ) {}

  async acquire(): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;
    const delay = slot - current;
    if (delay > 0) {
      await this.wait(delay);
    }
  }
}

export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type ResilientFetchOptions = {
  timeoutMs: number;
  retry: RetryOptions;
  circuitBreaker?: CircuitBreaker;
  rateLimiter?: RateLimiter;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
};

const DEFAULT_RETRY: RetryOptions = {
  retries: 2,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterMs: 250
};

export function computeBackoffDelay(attempt: number, retry: RetryOptions, random: () => number = Math.random) {
  const exponential = Math.min(retry.baseDelayMs * 2 ** attempt, retry.maxDelayMs);
  const jitter = random() * retry.jitterMs;
  return exponential + jitter;
}

function isRetryableStatus(status: number) {
  return status >= 500 || status === 429;
}

const isRetryableResponse = (response: Response) => isRetryableStatus(response.status);

export async function resilientFetch(
  url: string,
  init: RequestInit,
  options: Partial<ResilientFetchOptions> = {}
): Promise<Response> {
  const retry = options.retry ?? DEFAULT_RETRY;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const breaker = options.circuitBreaker;
  const limiter = options.rateLimiter;
  const doFetch = options.fetchImpl ?? fetch;
  const wait = options.sleep ?? sleep;

  const attemptRequest = async () => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await doFetch(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  };

  const execute = async () => {
    if (limiter) {
      await limiter.acquire();
    }
    if (breaker) {
      return breaker.execute(attemptRequest, isRetryableResponse);
    }
    return attemptRequest();
  };

  for (let attempt = 0; attempt <= retry.retries; attempt += 1) {
    try {
      const response = await execute();
      if (isRetryableResponse(response) && attempt < retry.retries) {
        await response.body?.cancel();
        await wait(computeBackoffDelay(attempt, retry));
        continue;
      }
      return response;
    } catch (err) {
      if (attempt >= retry.retries) {
        throw err;
      }
      await wait(computeBackoffDelay(attempt, retry));
    }
  }

  throw new Error('RESILIENT_FETCH_FAILED');
}

/**
 * GETs a JSON document and validates it. Any transport, status or schema
 * failure after retries is reported as `null` (source unavailable).
 */
export async function fetchJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  label: string,
  options: Partial<ResilientFetchOptions> = {}
): Promise<z.infer<S> | null> {
  try {
    const response = await resilientFetch(url, { method: 'GET', headers: { accept: 'application/json' } }, options);
    if (!response.ok) {
      console.warn(`⚠️  ${label} responded with status ${response.status}`);
      return null;
    }
    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      console.warn(`⚠️  ${label} returned an unexpected payload:`, parsed.error.issues[0]?.message);
      return null;
    }
    return parsed.data;
  } catch (error) {
    console.error(`❌ ${label} unavailable:`, error instanceof Error ? error.message : error);
    return null;
  }
}
