/**
 * Handler - application-facing API for scheduling work on a Looper
 *
 * Messages sent through a handler target it; when the loop dispatches one,
 * dispatchMessage() routes it to the posted runnable, the handler callback or
 * handleMessage(), in that order.
 */

import { Looper } from './looper.js';
import { Message } from './message.js';
import {
  InvalidTimeError,
  MessageInUseError,
  NoLooperError,
  isValidTime,
  type HandlerCallback,
  type HandlerOptions,
  type MessageTarget,
  type Runnable,
} from './types.js';

export class Handler implements MessageTarget {
  private readonly looper: Looper;
  private readonly callback?: HandlerCallback;
  private readonly asynchronous: boolean;

  /**
   * @param looper - Loop to schedule on; defaults to Looper.myLooper()
   * @throws NoLooperError if no looper is given and none is bound
   */
  constructor(looper?: Looper | null, options: HandlerOptions = {}) {
    const resolved = looper ?? Looper.myLooper();
    if (resolved === null) {
      throw new NoLooperError();
    }
    this.looper = resolved;
    this.callback = options.callback;
    this.asynchronous = options.async ?? false;
  }

  getLooper(): Looper {
    return this.looper;
  }

  /**
   * Create a message targeting this handler
   */
  obtainMessage(what = 0, obj?: unknown): Message {
    return Message.obtain({ what, obj, target: this });
  }

  sendMessage(message: Message): void {
    this.sendMessageDelayed(message, 0);
  }

  sendEmptyMessage(what: number): void {
    this.sendMessageDelayed(this.obtainMessage(what), 0);
  }

  sendEmptyMessageDelayed(what: number, delayMillis: number): void {
    this.sendMessageDelayed(this.obtainMessage(what), delayMillis);
  }

  sendMessageDelayed(message: Message, delayMillis: number): void {
    if (!isValidTime(delayMillis)) {
      throw new InvalidTimeError('Delay', delayMillis);
    }
    this.sendMessageAtTime(message, this.looper.uptimeMillis() + delayMillis);
  }

  /**
   * Schedule a message at an absolute uptime
   */
  sendMessageAtTime(message: Message, uptimeMillis: number): void {
    this.prepare(message);
    this.looper.getQueue().enqueueMessage(message, uptimeMillis);
  }

  /**
   * Schedule a message ahead of everything pending (time 0)
   */
  sendMessageAtFrontOfQueue(message: Message): void {
    this.prepare(message);
    this.looper.getQueue().enqueueAtFront(message);
  }

  post(runnable: Runnable): void {
    this.sendMessage(this.wrap(runnable));
  }

  postDelayed(runnable: Runnable, delayMillis: number): void {
    this.sendMessageDelayed(this.wrap(runnable), delayMillis);
  }

  postAtTime(runnable: Runnable, uptimeMillis: number): void {
    this.sendMessageAtTime(this.wrap(runnable), uptimeMillis);
  }

  /**
   * Remove pending messages with code `what` (and payload `obj`, if given)
   */
  removeMessages(what: number, obj?: unknown): void {
    this.looper.getQueue().removeMessages(
      (message) =>
        message.target === this &&
        message.callback === null &&
        message.what === what &&
        (obj === undefined || message.obj === obj)
    );
  }

  removeCallbacks(runnable: Runnable): void {
    this.looper.getQueue().removeMessages(
      (message) => message.target === this && message.callback === runnable
    );
  }

  /**
   * Remove every pending message and runnable of this handler
   */
  removeCallbacksAndMessages(): void {
    this.looper.getQueue().removeMessages((message) => message.target === this);
  }

  hasMessages(what: number, obj?: unknown): boolean {
    return this.looper.getQueue().hasMessages(
      (message) =>
        message.target === this &&
        message.callback === null &&
        message.what === what &&
        (obj === undefined || message.obj === obj)
    );
  }

  hasCallbacks(runnable: Runnable): boolean {
    return this.looper.getQueue().hasMessages(
      (message) => message.target === this && message.callback === runnable
    );
  }

  /**
   * Route a dispatched message: posted runnable first, then the handler
   * callback, then handleMessage() unless the callback returned true.
   */
  dispatchMessage(message: Message): void {
    if (message.callback !== null) {
      message.callback();
      return;
    }
    if (this.callback && this.callback(message) === true) {
      return;
    }
    this.handleMessage(message);
  }

  /**
   * Override to receive messages
   */
  handleMessage(_message: Message): void {}

  private prepare(message: Message): void {
    if (message.isInUse()) {
      throw new MessageInUseError(message);
    }
    message.target = this;
    if (this.asynchronous) {
      message.setAsynchronous(true);
    }
  }

  private wrap(runnable: Runnable): Message {
    return Message.obtain({ target: this, callback: runnable });
  }
}
