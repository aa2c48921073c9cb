/**
 * Circuit breaker for a run of calls against one external API.
 *
 * States:
 *   CLOSED    → calls pass through
 *   OPEN      → calls are refused without reaching the API
 *   HALF_OPEN → one probe call is allowed after resetTimeoutMs
 *
 * Usage:
 *   const breaker = new CircuitBreaker('linkedin:engagement', { failureThreshold: 3 });
 *   if (!breaker.allowRequest()) return breaker.getRejectionReason();
 *   try { ...; breaker.recordSuccess(); } catch (error) { breaker.recordFailure(error); }
 */

import { logger, type Logger } from './logger';

export interface CircuitBreakerOptions {
  /** Consecutive failures before the circuit opens (default: 3) */
  failureThreshold?: number;
  /** Time the circuit stays open before a probe is allowed (default: 15 min) */
  resetTimeoutMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export type CircuitStateName = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

interface CircuitState {
  state: CircuitStateName;
  failureCount: number;
  openedAt: number;
  lastError?: string;
}

const DEFAULT_OPTIONS: Required<Omit<CircuitBreakerOptions, 'now'>> = {
  failureThreshold: 3,
  resetTimeoutMs: 15 * 60 * 1000,
};

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private s: CircuitState = { state: 'CLOSED', failureCount: 0, openedAt: 0 };

  constructor(readonly key: string, options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_OPTIONS.failureThreshold;
    this.resetTimeoutMs = options.resetTimeoutMs ?? DEFAULT_OPTIONS.resetTimeoutMs;
    this.now = options.now ?? Date.now;
    this.log = logger.child('circuit-breaker', { key });
  }

  get state(): CircuitStateName {
    return this.s.state;
  }

  allowRequest(): boolean {
    switch (this.s.state) {
      case 'CLOSED':
      case 'HALF_OPEN':
        return true;
      case 'OPEN':
        if (this.now() - this.s.openedAt >= this.resetTimeoutMs) {
          this.s.state = 'HALF_OPEN';
          this.log.info('Allowing probe request');
          return true;
        }
        return false;
    }
  }

  getRejectionReason(): string {
    const waitSec = Math.max(0, Math.ceil((this.resetTimeoutMs - (this.now() - this.s.openedAt)) / 1000));
    return `Circuit breaker OPEN for "${this.key}": ${this.s.lastError || 'too many failures'}. ` +
      `Retry in ~${waitSec}s. (${this.s.failureCount} failures)`;
  }

  recordSuccess(): void {
    if (this.s.state === 'HALF_OPEN') {
      this.log.info('Probe succeeded, closing circuit');
    }
    this.s = { state: 'CLOSED', failureCount: 0, openedAt: 0 };
  }

  recordFailure(error: unknown): void {
    this.s.failureCount++;
    this.s.lastError = error instanceof Error ? error.message : String(error);

    if (this.s.state === 'HALF_OPEN' || this.s.failureCount >= this.failureThreshold) {
      this.s.state = 'OPEN';
      this.s.openedAt = this.now();
      this.log.warn('Circuit OPEN', { failures: this.s.failureCount, lastError: this.s.lastError });
    }
  }
}

/**
 * fetch with a deadline that covers the body as well as the headers: the
 * signal stays armed after the response arrives, so a stalled `text()` or
 * `json()` rejects too. A timeout surfaces as an Error named 'TimeoutError'.
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: RequestInit & { timeoutMs?: number } = {}
): Promise<Response> {
  const { timeoutMs = 15_000, ...fetchOptions } = options;
  const signal = AbortSignal.timeout(timeoutMs);

  try {
    return await fetch(url, {
      ...fetchOptions,
      signal,
    });
  } catch (error: unknown) {
    if (signal.aborted) {
      throw timeoutError(url, timeoutMs);
    }
    throw error;
  }
}

export function timeoutError(url: string | URL, timeoutMs: number): Error {
  const timeout = new Error(`Request to ${url.toString()} timed out after ${timeoutMs}ms`);
  timeout.name = 'TimeoutError';
  return timeout;
}
