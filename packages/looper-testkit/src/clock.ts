/**
 * Clock sources for the loop
 *
 * The loop never advances time itself: it only reads uptimeMillis(). Virtual
 * time is simulated by pulling scheduled deadlines closer to "now"
 * (see TestLooper.moveTimeForward), so the real monotonic clock is the
 * default.
 */

import { InvalidTimeError, isValidTime } from './types.js';

/**
 * Monotonic time source, in whole milliseconds
 */
export interface Clock {
  uptimeMillis(): number;
}

/**
 * Monotonic clock backed by performance.now()
 */
export const SystemClock: Clock = {
  uptimeMillis: () => Math.floor(performance.now()),
};

/**
 * Clock that only moves when told to.
 *
 * @example
 * ```ts
 * const clock = new ManualClock(1000);
 * clock.uptimeMillis(); // 1000
 * clock.advance(500);
 * clock.uptimeMillis(); // 1500
 * ```
 */
export class ManualClock implements Clock {
  private currentTime: number;

  constructor(initialTime = 0) {
    if (!isValidTime(initialTime)) {
      throw new InvalidTimeError('Initial time', initialTime);
    }
    this.currentTime = initialTime;
  }

  uptimeMillis(): number {
    return this.currentTime;
  }

  /**
   * Moves the clock forward by ms (non-negative)
   */
  advance(ms: number): void {
    if (!isValidTime(ms)) {
      throw new InvalidTimeError('Advance amount', ms);
    }
    this.currentTime += ms;
  }

  /**
   * Sets the absolute time; may go backwards
   */
  set(time: number): void {
    if (!isValidTime(time)) {
      throw new InvalidTimeError('Time', time);
    }
    this.currentTime = time;
  }
}
