/**
 * Sliding-window rate limiter.
 *
 * Each window is a log of admission timestamps. A request is admitted
 * when fewer than `maxRequests` timestamps fall inside the last
 * `windowMs`. Check and consume happen in one synchronous step, so two
 * concurrent requests can never both take the last unit.
 */

import type { Logger } from 'pino';
import type { Capability, RateLimitInfo, RateLimitPolicy } from '../types/auth.js';
import { rateLimitExceeded } from '../api/errors.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * `key`: one window per key, shared by every capability.
 * `capability`: one window per (key, capability) pair.
 */
export type RateLimitScope = 'key' | 'capability';

export interface RateLimiterOptions {
  scope?: RateLimitScope;
  /** Idle window sweep period; 0 disables the background sweep */
  cleanupIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

interface RateWindow {
  /** Ascending admission timestamps */
  timestamps: number[];
  windowMs: number;
}

export class RateLimiter {
  private readonly scope: RateLimitScope;
  private readonly cleanupIntervalMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly windows = new Map<string, RateWindow>();
  private readonly sweepTimer = new TimerGuard();

  constructor(options: RateLimiterOptions = {}) {
    this.scope = options.scope ?? 'key';
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60_000;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.cleanupIntervalMs > 0) {
      this.sweepTimer.setInterval(() => this.sweep(), this.cleanupIntervalMs);
    }
  }

  stop(): void {
    this.sweepTimer.clear();
  }

  /**
   * Take one unit of quota or throw RateLimitExceeded with the time
   * until the oldest admission leaves the window.
   */
  checkAndConsume(keyId: string, policy: RateLimitPolicy, capability?: Capability): RateLimitInfo {
    const now = this.now();
    const windowKey = this.windowKey(keyId, capability);
    const window = this.getWindow(windowKey, policy);
    this.prune(window, now);

    if (window.timestamps.length >= policy.maxRequests) {
      const oldest = window.timestamps[window.timestamps.length - policy.maxRequests];
      const retryAfterMs = Math.max(1, oldest + policy.windowMs - now);
      lazyLog(this.logger, 'debug', () => ({ windowKey, retryAfterMs }), 'Rate limit exceeded');
      throw rateLimitExceeded(retryAfterMs, policy.maxRequests, policy.windowMs);
    }

    window.timestamps.push(now);
    return this.describe(window, policy, now);
  }

  /**
   * Remaining quota without consuming any.
   */
  peek(keyId: string, policy: RateLimitPolicy, capability?: Capability): RateLimitInfo {
    const now = this.now();
    const window = this.windows.get(this.windowKey(keyId, capability));
    if (!window) {
      return { limit: policy.maxRequests, remaining: policy.maxRequests, resetAt: now, windowMs: policy.windowMs };
    }
    const cutoff = now - policy.windowMs;
    const inWindow = window.timestamps.filter((timestamp) => timestamp > cutoff);
    return {
      limit: policy.maxRequests,
      remaining: Math.max(0, policy.maxRequests - inWindow.length),
      resetAt: inWindow.length > 0 ? inWindow[0] + policy.windowMs : now,
      windowMs: policy.windowMs,
    };
  }

  /**
   * Drop windows with no admission inside their own length.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [windowKey, window] of this.windows) {
      const newest = window.timestamps[window.timestamps.length - 1];
      if (newest === undefined || newest <= now - window.windowMs) {
        this.windows.delete(windowKey);
        removed += 1;
      }
    }
    if (removed > 0) {
      lazyLog(this.logger, 'debug', () => ({ removed, remaining: this.windows.size }), 'Swept idle rate windows');
    }
    return removed;
  }

  /**
   * Forget all windows of one key (every capability).
   */
  reset(keyId: string): void {
    for (const windowKey of [...this.windows.keys()]) {
      if (windowKey === keyId || windowKey.startsWith(`${keyId}:`)) {
        this.windows.delete(windowKey);
      }
    }
  }

  get windowCount(): number {
    return this.windows.size;
  }

  private windowKey(keyId: string, capability?: Capability): string {
    return this.scope === 'capability' && capability !== undefined ? `${keyId}:${capability}` : keyId;
  }

  private getWindow(windowKey: string, policy: RateLimitPolicy): RateWindow {
    let window = this.windows.get(windowKey);
    if (!window) {
      window = { timestamps: [], windowMs: policy.windowMs };
      this.windows.set(windowKey, window);
    }
    // Policy may have been updated by an admin since the window was created
    window.windowMs = policy.windowMs;
    return window;
  }

  private prune(window: RateWindow, now: number): void {
    const cutoff = now - window.windowMs;
    let expired = 0;
    while (expired < window.timestamps.length && window.timestamps[expired] <= cutoff) {
      expired += 1;
    }
    if (expired > 0) {
      window.timestamps.splice(0, expired);
    }
  }

  private describe(window: RateWindow, policy: RateLimitPolicy, now: number): RateLimitInfo {
    return {
      limit: policy.maxRequests,
      remaining: Math.max(0, policy.maxRequests - window.timestamps.length),
      resetAt: window.timestamps.length > 0 ? window.timestamps[0] + policy.windowMs : now,
      windowMs: policy.windowMs,
    };
  }
}
