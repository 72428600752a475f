/**
 * looper-testkit - deterministic message loop for tests
 *
 * A time-ordered message queue with a controllable driver:
 * - Virtual time by shifting pending deadlines
 * - Step-by-step or drain-to-empty dispatch
 * - Sync barriers with asynchronous bypass
 * - Explicit loop handles, with an optional current-loop binding
 */

export const VERSION = '0.1.0';

// Core exports
export { TestLooper, createTestLooper } from './test-looper.js';
export { Looper } from './looper.js';
export { Handler } from './handler.js';
export { Message, type MessageInit } from './message.js';
export { MessageQueue } from './message-queue.js';
export { SystemClock, ManualClock, type Clock } from './clock.js';

// Export all types and interfaces
export type {
  Runnable,
  HandlerCallback,
  MessagePredicate,
  MessageTarget,
  LooperOptions,
  HandlerOptions,
  TestLooperOptions,
} from './types.js';

// Export type guards
export { isValidTime } from './types.js';

// Export error classes
export {
  LooperNotIdleError,
  InvalidTimeError,
  MissingTargetError,
  MessageInUseError,
  BarrierNotFoundError,
  NoLooperError,
} from './types.js';
