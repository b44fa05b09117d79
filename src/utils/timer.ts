// Path: src/utils/timer.ts
// Timer management utilities - prevent memory leaks from orphaned timers

import { performance } from 'node:perf_hooks';
import { TimeoutError } from './error.js';

/**
 * Managed timer that tracks a single setTimeout.
 * Provides safe clear/replace semantics to prevent memory leaks.
 */
export class ManagedTimer {
  private timer: NodeJS.Timeout | null = null;

  /**
   * Set a timeout (replaces any existing timer).
   *
   * @param callback - Function to call after delay
   * @param delay - Delay in milliseconds
   */
  setTimeout(callback: () => void, delay: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = null;
      callback();
    }, delay);
  }

  /**
   * Clear the current timer.
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Check if a timer is currently pending.
   */
  isActive(): boolean {
    return this.timer !== null;
  }
}

/**
 * Group of named managed timers.
 * Useful for components that need one timer per item.
 */
export class TimerGroup {
  private readonly timers = new Map<string, ManagedTimer>();

  /**
   * Get or create a timer by name.
   */
  get(name: string): ManagedTimer {
    let timer = this.timers.get(name);
    if (!timer) {
      timer = new ManagedTimer();
      this.timers.set(name, timer);
    }
    return timer;
  }

  /**
   * Clear and forget a timer by name.
   */
  clear(name: string): void {
    const timer = this.timers.get(name);
    if (timer) {
      timer.clear();
      this.timers.delete(name);
    }
  }

  /**
   * Clear all timers in the group.
   */
  clearAll(): void {
    for (const timer of this.timers.values()) {
      timer.clear();
    }
    this.timers.clear();
  }
}

/**
 * Race a promise against a timeout. The timer is cleared as soon as
 * the promise settles, so nothing is left pending.
 *
 * @param promise - Promise to race
 * @param ms - Timeout in milliseconds
 * @param message - Timeout error message
 * @returns Promise result, or a TimeoutError rejection
 */
export function withTimeout<T>(
  promise: PromiseLike<T>,
  ms: number,
  message = 'Operation timed out'
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => { reject(new TimeoutError(message, ms)); }, ms);
    Promise.resolve(promise).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * Monotonic clock in seconds, unaffected by wall-clock adjustments.
 */
export function monotonicSeconds(): number {
  return performance.now() / 1000;
}
