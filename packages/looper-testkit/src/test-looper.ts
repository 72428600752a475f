/**
 * TestLooper - deterministic driver for a Looper's message queue
 *
 * Constructing a TestLooper creates a Looper and binds it as the current
 * loop. Tests then let code under test schedule work on it and drive
 * execution explicitly:
 * - moveTimeForward() pulls every pending deadline closer to "now"
 * - isIdle() reports whether the head of the queue is due
 * - nextMessage() / dispatchNext() take the next eligible message, skipping
 *   past a sync barrier to the first asynchronous message
 * - dispatchAll() drains everything currently due
 *
 * Nothing here sleeps or schedules timers; handlers run synchronously on the
 * caller's stack.
 */

import { SystemClock } from './clock.js';
import { Looper } from './looper.js';
import type { Message } from './message.js';
import type { MessageQueue } from './message-queue.js';
import {
  InvalidTimeError,
  LooperNotIdleError,
  isValidTime,
  type TestLooperOptions,
} from './types.js';

export class TestLooper {
  private readonly looper: Looper;
  private options: Required<TestLooperOptions>;

  constructor(options: TestLooperOptions = {}) {
    this.options = {
      clock: options.clock ?? SystemClock,
      debug: options.debug ?? false,
      errorBoundary: options.errorBoundary ?? false,
      onError: options.onError ?? ((error: Error) => {
        console.error('TestLooper error:', error);
      }),
    };

    this.looper = Looper.create({ clock: this.options.clock });
    Looper.bind(this.looper);

    if (this.options.debug) {
      console.debug('[TestLooper] Looper installed', {
        now: this.now(),
        errorBoundary: this.options.errorBoundary,
      });
    }
  }

  /**
   * The loop driven by this instance, to hand to code under test
   */
  getLooper(): Looper {
    return this.looper;
  }

  /**
   * Shift every pending message's scheduled time `deltaMillis` earlier,
   * clamped at 0. The clock itself is not touched.
   */
  moveTimeForward(deltaMillis: number): void {
    if (!isValidTime(deltaMillis)) {
      throw new InvalidTimeError('Time delta', deltaMillis);
    }

    let shifted = 0;
    let message = this.queue.peek();
    while (message !== null) {
      message.when = Math.max(0, message.when - deltaMillis);
      message = message.next;
      shifted++;
    }

    if (this.options.debug) {
      console.debug('[TestLooper] Time moved forward', {
        deltaMillis,
        shifted,
      });
    }
  }

  /**
   * True when the queue is non-empty and its head is due.
   *
   * Only the literal head is inspected: a due barrier reports idle even if
   * nothing behind it can run.
   */
  isIdle(): boolean {
    const head = this.queue.peek();
    return head !== null && this.now() >= head.when;
  }

  /**
   * Detach and return the next eligible message, or null
   */
  nextMessage(): Message | null {
    if (!this.isIdle()) {
      return null;
    }
    return this.takeNext();
  }

  /**
   * Dispatch the next eligible message to its target
   * @throws LooperNotIdleError if the queue is not idle
   */
  dispatchNext(): void {
    if (!this.isIdle()) {
      const head = this.queue.peek();
      throw new LooperNotIdleError(this.queue.size, head?.when, this.now());
    }
    this.dispatchOne();
  }

  /**
   * Dispatch until the queue is no longer idle
   * A barrier with nothing dispatchable behind it ends the drain.
   * @returns number of messages dispatched
   */
  dispatchAll(): number {
    let count = 0;
    while (this.isIdle()) {
      if (!this.dispatchOne()) {
        break;
      }
      ++count;
    }

    if (this.options.debug) {
      console.debug('[TestLooper] Drain completed', {
        dispatched: count,
        pending: this.queue.size,
      });
    }

    return count;
  }

  /**
   * Enable/disable debug mode
   */
  debug(enabled: boolean): void {
    this.options.debug = enabled;
    if (enabled) {
      console.debug('[TestLooper] Debug mode enabled');
    } else {
      console.debug('[TestLooper] Debug mode disabled');
    }
  }

  private get queue(): MessageQueue {
    return this.looper.getQueue();
  }

  private now(): number {
    return this.options.clock.uptimeMillis();
  }

  /**
   * Take the next eligible message and run its target
   * @returns false when nothing could be taken
   */
  private dispatchOne(): boolean {
    const message = this.takeNext();
    if (message === null) {
      return false;
    }

    if (this.options.debug) {
      console.debug('[TestLooper] Dispatching', {
        message: message.toString(),
      });
    }

    try {
      message.target?.dispatchMessage(message);
    } catch (error) {
      if (!this.options.errorBoundary) {
        throw error;
      }
      this.options.onError(error instanceof Error ? error : new Error(String(error)), message);
    }

    return true;
  }

  /**
   * Find, unlink and return the message that should run next.
   *
   * When the head is a barrier, synchronous messages are stalled: scan past
   * them, without unlinking, to the first asynchronous message. The due check
   * applies to the message found, not the head.
   */
  private takeNext(): Message | null {
    const now = this.now();
    let prev: Message | null = null;
    let message = this.queue.peek();

    if (message !== null && message.isBarrier()) {
      prev = message;
      message = message.next;
      while (message !== null && !message.isAsynchronous()) {
        prev = message;
        message = message.next;
      }

      if (this.options.debug) {
        console.debug('[TestLooper] Stalled by barrier', {
          barrier: this.queue.peek()?.toString(),
          found: message?.toString() ?? null,
        });
      }
    }

    if (message === null || now < message.when) {
      return null;
    }

    this.queue.unlink(prev, message);
    message.markInUse();
    return message;
  }
}

/**
 * Factory function to create a TestLooper instance
 */
export const createTestLooper = (options?: TestLooperOptions): TestLooper => {
  return new TestLooper(options);
};
