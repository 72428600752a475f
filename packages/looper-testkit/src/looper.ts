/**
 * Looper - owner of a message queue and the clock it is scheduled against
 *
 * A Looper is created unbound. Binding it makes it the current loop of the
 * process, which is what Looper.myLooper() returns to code that does not get
 * a loop handle passed in. Node runs tests on one thread, so the binding slot
 * is a single process-wide value.
 */

import { SystemClock, type Clock } from './clock.js';
import { MessageQueue } from './message-queue.js';
import type { LooperOptions } from './types.js';

let currentLooper: Looper | null = null;

export class Looper {
  private readonly queue = new MessageQueue();
  private readonly clock: Clock;

  private constructor(options: LooperOptions) {
    this.clock = options.clock ?? SystemClock;
  }

  /**
   * Create a loop that is not bound to the binding slot yet
   */
  static create(options: LooperOptions = {}): Looper {
    return new Looper(options);
  }

  /**
   * The loop currently bound, or null
   */
  static myLooper(): Looper | null {
    return currentLooper;
  }

  /**
   * Make `looper` the current loop, replacing any previous binding
   */
  static bind(looper: Looper): void {
    currentLooper = looper;
  }

  /**
   * Empty the binding slot (test teardown)
   */
  static clearCurrent(): void {
    currentLooper = null;
  }

  getQueue(): MessageQueue {
    return this.queue;
  }

  getClock(): Clock {
    return this.clock;
  }

  /**
   * Current time according to this loop's clock
   */
  uptimeMillis(): number {
    return this.clock.uptimeMillis();
  }

  isCurrent(): boolean {
    return currentLooper === this;
  }

  /**
   * Drop all pending messages
   */
  quit(): void {
    this.queue.quit();
  }
}
