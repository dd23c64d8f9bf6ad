/**
 * Owns at most one interval timer: every setInterval() clears the
 * previous one, and clear() is idempotent. Background timers are unref'd
 * by default so a forgotten sweep never keeps the process alive.
 *
 * ```typescript
 * const sweep = new TimerGuard();
 * sweep.setInterval(() => limiter.sweep(), 60_000);
 * // Later...
 * sweep.clear();
 * ```
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;

  setInterval(callback: () => void, intervalMs: number, options: { unref?: boolean } = { unref: true }): void {
    this.clear();
    this.timer = setInterval(callback, intervalMs);
    if (options.unref) {
      this.timer.unref();
    }
  }

  clear(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
