/**
 * Type definitions for looper-testkit
 *
 * Shared option records, callback signatures, type guards and the error
 * classes thrown by the queue, the host loop and the test driver.
 */

import type { Clock } from './clock.js';
import type { Message } from './message.js';

// ============================================================================
// Callback Types
// ============================================================================

/**
 * Runnable posted to a handler with post()/postDelayed()
 */
export type Runnable = () => void;

/**
 * Handler-level callback consulted before handleMessage()
 * Return true to mark the message as handled.
 */
export type HandlerCallback = (message: Message) => boolean | void;

/**
 * Predicate used by removeMessages()/hasMessages() on the queue
 */
export type MessagePredicate = (message: Message) => boolean;

/**
 * Anything that can receive a dispatched message
 */
export interface MessageTarget {
  dispatchMessage(message: Message): void;
}

// ============================================================================
// Options
// ============================================================================

/**
 * Options for creating a Looper
 */
export interface LooperOptions {
  /** Clock used for scheduling and eligibility (default: SystemClock) */
  clock?: Clock;
}

/**
 * Options for creating a Handler
 */
export interface HandlerOptions {
  /** Consulted before handleMessage(); returning true stops dispatch */
  callback?: HandlerCallback;

  /** Mark every message sent through this handler as asynchronous */
  async?: boolean;
}

/**
 * Options for creating a TestLooper
 */
export interface TestLooperOptions {
  /** Clock read by isIdle() and nextMessage() (default: SystemClock) */
  clock?: Clock;

  /** Debug mode - logs every dispatch decision through console.debug */
  debug?: boolean;

  /**
   * Error boundary - report handler errors to onError instead of throwing
   * them out of dispatchNext()/dispatchAll()
   */
  errorBoundary?: boolean;

  /** Error handler used when errorBoundary is enabled */
  onError?: (error: Error, message: Message) => void;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard for a valid scheduled time or delay (finite, non-negative)
 */
export function isValidTime(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown by dispatchNext() when the head of the queue is not yet due
 */
export class LooperNotIdleError extends Error {
  constructor(pending: number, headWhen?: number, now?: number) {
    super(
      headWhen === undefined
        ? `dispatchNext() called on an empty queue`
        : `dispatchNext() called before the head message is due (when: ${headWhen}, now: ${now}, pending: ${pending})`
    );
    this.name = 'LooperNotIdleError';
  }
}

/**
 * Thrown when a delay, delta or scheduled time is negative or not finite
 */
export class InvalidTimeError extends Error {
  constructor(label: string, value: number) {
    super(`${label} must be a non-negative finite number, got ${value}`);
    this.name = 'InvalidTimeError';
  }
}

/**
 * Thrown when a message without target is enqueued
 */
export class MissingTargetError extends Error {
  constructor() {
    super('Message must have a target');
    this.name = 'MissingTargetError';
  }
}

/**
 * Thrown when a message that is already queued or consumed is enqueued again
 */
export class MessageInUseError extends Error {
  constructor(message: Message) {
    super(`Message is already in use: ${message.toString()}`);
    this.name = 'MessageInUseError';
  }
}

/**
 * Thrown when removing a sync barrier that is not posted
 */
export class BarrierNotFoundError extends Error {
  constructor(token: number) {
    super(`Sync barrier ${token} is not posted or was already removed`);
    this.name = 'BarrierNotFoundError';
  }
}

/**
 * Thrown when a Handler is created without looper and none is installed
 */
export class NoLooperError extends Error {
  constructor() {
    super('No looper is installed; pass one explicitly or construct a TestLooper first');
    this.name = 'NoLooperError';
  }
}
