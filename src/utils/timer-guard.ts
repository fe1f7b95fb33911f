/**
 * Timer Lifecycle Guard
 *
 * Holds at most one pending timeout; setting a new one clears the previous.
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('grace:0');
 * guard.set(() => forceInterrupt(), 10_000);
 * // batch finished first
 * guard.clear();
 * ```
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;

  constructor(private readonly name = 'anonymous') {}

  /**
   * Set a new timer (clears the existing one first)
   */
  set(callback: () => void, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
  }

  /**
   * Clear the timer if set. Idempotent.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }
}
