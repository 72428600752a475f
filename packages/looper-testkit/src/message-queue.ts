/**
 * MessageQueue - time-ordered chain of pending messages
 *
 * The chain is ascending by `when`; messages with equal times keep insertion
 * order. Only this class and TestLooper re-point `next` links.
 */

import { Message } from './message.js';
import {
  BarrierNotFoundError,
  InvalidTimeError,
  MessageInUseError,
  MissingTargetError,
  isValidTime,
  type MessagePredicate,
} from './types.js';

export class MessageQueue implements Iterable<Message> {
  private head: Message | null = null;
  private count = 0;
  private nextBarrierToken = 0;

  /**
   * First message of the chain, or null when empty
   */
  peek(): Message | null {
    return this.head;
  }

  /**
   * Number of linked messages, barriers included
   */
  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.head === null;
  }

  /**
   * Insert a message to run at `when`
   * Throws if the message has no target, is already in use, or `when` is invalid.
   */
  enqueueMessage(message: Message, when: number): void {
    if (message.target === null) {
      throw new MissingTargetError();
    }
    if (message.isInUse()) {
      throw new MessageInUseError(message);
    }
    if (!isValidTime(when)) {
      throw new InvalidTimeError('Scheduled time', when);
    }

    message.markInUse();
    message.when = when;
    this.insertOrdered(message);
  }

  /**
   * Insert a message at the head with time 0, ahead of everything pending
   */
  enqueueAtFront(message: Message): void {
    if (message.target === null) {
      throw new MissingTargetError();
    }
    if (message.isInUse()) {
      throw new MessageInUseError(message);
    }

    message.markInUse();
    message.when = 0;
    message.next = this.head;
    this.head = message;
    this.count++;
  }

  /**
   * Post a sync barrier at `when`; returns the token for removeSyncBarrier()
   *
   * While the barrier is due and at the head, only asynchronous messages
   * behind it can be dispatched.
   */
  postSyncBarrier(when: number): number {
    if (!isValidTime(when)) {
      throw new InvalidTimeError('Barrier time', when);
    }

    const token = this.nextBarrierToken++;
    const barrier = new Message();
    barrier.markInUse();
    barrier.when = when;
    barrier.arg1 = token;
    this.insertOrdered(barrier);
    return token;
  }

  /**
   * Remove the barrier posted with `token`
   * @throws BarrierNotFoundError if no such barrier is linked
   */
  removeSyncBarrier(token: number): void {
    let prev: Message | null = null;
    let current = this.head;
    while (current !== null && !(current.isBarrier() && current.arg1 === token)) {
      prev = current;
      current = current.next;
    }
    if (current === null) {
      throw new BarrierNotFoundError(token);
    }
    this.unlink(prev, current);
  }

  /**
   * Unlink every non-barrier message matching the predicate
   * @returns number of messages removed
   */
  removeMessages(predicate: MessagePredicate): number {
    let removed = 0;
    let prev: Message | null = null;
    let current = this.head;

    while (current !== null) {
      const following: Message | null = current.next;
      if (!current.isBarrier() && predicate(current)) {
        this.unlink(prev, current);
        removed++;
      } else {
        prev = current;
      }
      current = following;
    }

    return removed;
  }

  /**
   * Whether any non-barrier message matches the predicate
   */
  hasMessages(predicate: MessagePredicate): boolean {
    for (const message of this) {
      if (!message.isBarrier() && predicate(message)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Detach `message`, which must directly follow `prev` (or be the head when
   * `prev` is null). The detached message's `next` is cleared.
   */
  unlink(prev: Message | null, message: Message): void {
    const linked = prev === null ? this.head : prev.next;
    if (linked !== message) {
      throw new Error(`Message ${message.toString()} is not linked at the given position`);
    }

    if (prev === null) {
      this.head = message.next;
    } else {
      prev.next = message.next;
    }
    message.next = null;
    this.count--;
  }

  /**
   * Drop every pending message
   */
  quit(): void {
    let current = this.head;
    while (current !== null) {
      const following: Message | null = current.next;
      current.next = null;
      current = following;
    }
    this.head = null;
    this.count = 0;
  }

  /**
   * Snapshot of the chain, head first
   */
  toArray(): Message[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<Message> {
    let current = this.head;
    while (current !== null) {
      const following: Message | null = current.next;
      yield current;
      current = following;
    }
  }

  /**
   * Link after every message whose time is <= message.when
   */
  private insertOrdered(message: Message): void {
    let prev: Message | null = null;
    let current = this.head;
    while (current !== null && current.when <= message.when) {
      prev = current;
      current = current.next;
    }

    message.next = current;
    if (prev === null) {
      this.head = message;
    } else {
      prev.next = message;
    }
    this.count++;
  }
}
