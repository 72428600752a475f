/**
 * Message - one unit of pending work in a MessageQueue
 *
 * Messages form a singly linked chain through `next`. The chain owns the
 * link; once a message is detached for dispatch its `next` is cleared and
 * ownership passes to the caller.
 */

import type { MessageTarget, Runnable } from './types.js';

/**
 * Fields accepted by Message.obtain()
 */
export interface MessageInit {
  what?: number;
  arg1?: number;
  arg2?: number;
  obj?: unknown;
  target?: MessageTarget | null;
  callback?: Runnable | null;
  async?: boolean;
}

export class Message {
  /** User-defined message code */
  what = 0;

  /** Integer payloads; arg1 carries the token on barrier messages */
  arg1 = 0;
  arg2 = 0;

  /** Arbitrary payload */
  obj: unknown = undefined;

  /**
   * Scheduled virtual time (ms, same unit as the clock)
   * @internal Written by MessageQueue and TestLooper.moveTimeForward()
   */
  when = 0;

  /** Dispatch target; null marks a sync barrier */
  target: MessageTarget | null = null;

  /** Runnable posted with Handler.post(), run instead of handleMessage() */
  callback: Runnable | null = null;

  /**
   * Following message in the chain
   * @internal Owned by MessageQueue
   */
  next: Message | null = null;

  private asynchronous = false;
  private inUse = false;

  /**
   * Create a message from a partial description
   */
  static obtain(init: MessageInit = {}): Message {
    const message = new Message();
    message.what = init.what ?? 0;
    message.arg1 = init.arg1 ?? 0;
    message.arg2 = init.arg2 ?? 0;
    message.obj = init.obj;
    message.target = init.target ?? null;
    message.callback = init.callback ?? null;
    message.setAsynchronous(init.async ?? false);
    return message;
  }

  /**
   * Scheduled time of this message
   */
  getWhen(): number {
    return this.when;
  }

  /**
   * Whether this message may run past a sync barrier
   */
  isAsynchronous(): boolean {
    return this.asynchronous;
  }

  setAsynchronous(async: boolean): void {
    this.asynchronous = async;
  }

  /**
   * Barriers have no target
   */
  isBarrier(): boolean {
    return this.target === null;
  }

  /**
   * Flag the message as owned by a queue or a dispatcher.
   * A message in use cannot be enqueued again.
   */
  markInUse(): void {
    this.inUse = true;
  }

  isInUse(): boolean {
    return this.inUse;
  }

  toString(): string {
    const parts = [`when=${this.when}`];
    if (this.isBarrier()) {
      parts.push('barrier', `token=${this.arg1}`);
    } else if (this.callback) {
      parts.push('callback');
    } else {
      parts.push(`what=${this.what}`);
    }
    if (this.asynchronous) {
      parts.push('async');
    }
    return `{ ${parts.join(' ')} }`;
  }
}
