import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Message } from './message.js';
import { MessageQueue } from './message-queue.js';
import {
  BarrierNotFoundError,
  InvalidTimeError,
  MessageInUseError,
  MissingTargetError,
  type MessageTarget,
} from './types.js';

const target: MessageTarget = { dispatchMessage: vi.fn() };
const other: MessageTarget = { dispatchMessage: vi.fn() };

const msg = (what: number, to: MessageTarget = target): Message => Message.obtain({ what, target: to });
const whats = (queue: MessageQueue): number[] => queue.toArray().map((m) => m.what);
const times = (queue: MessageQueue): number[] => queue.toArray().map((m) => m.when);

describe('MessageQueue', () => {
  let queue: MessageQueue;

  beforeEach(() => {
    queue = new MessageQueue();
  });

  describe('enqueueMessage', () => {
    it('starts empty', () => {
      expect(queue.isEmpty()).toBe(true);
      expect(queue.peek()).toBeNull();
      expect(queue.size).toBe(0);
    });

    it('keeps the chain ascending by time', () => {
      queue.enqueueMessage(msg(1), 100);
      queue.enqueueMessage(msg(2), 50);
      queue.enqueueMessage(msg(3), 200);

      expect(whats(queue)).toEqual([2, 1, 3]);
      expect(times(queue)).toEqual([50, 100, 200]);
      expect(queue.size).toBe(3);
    });

    it('keeps insertion order for equal times', () => {
      queue.enqueueMessage(msg(1), 10);
      queue.enqueueMessage(msg(2), 10);
      queue.enqueueMessage(msg(3), 10);

      expect(whats(queue)).toEqual([1, 2, 3]);
    });

    it('links messages through next', () => {
      const first = msg(1);
      const second = msg(2);
      queue.enqueueMessage(second, 20);
      queue.enqueueMessage(first, 10);

      expect(queue.peek()).toBe(first);
      expect(first.next).toBe(second);
      expect(second.next).toBeNull();
    });

    it('marks the message in use', () => {
      const message = msg(1);
      queue.enqueueMessage(message, 0);

      expect(message.isInUse()).toBe(true);
    });

    it('rejects a message without target', () => {
      expect(() => queue.enqueueMessage(Message.obtain(), 0)).toThrow(MissingTargetError);
    });

    it('rejects a message already in use', () => {
      const message = msg(1);
      queue.enqueueMessage(message, 0);

      expect(() => queue.enqueueMessage(message, 5)).toThrow(MessageInUseError);
      expect(queue.size).toBe(1);
    });

    it('rejects invalid times', () => {
      expect(() => queue.enqueueMessage(msg(1), -1)).toThrow(InvalidTimeError);
      expect(() => queue.enqueueMessage(msg(1), Number.POSITIVE_INFINITY)).toThrow(InvalidTimeError);
      expect(queue.isEmpty()).toBe(true);
    });
  });

  describe('enqueueAtFront', () => {
    it('links the message at the head with time 0', () => {
      queue.enqueueMessage(msg(1), 0);
      queue.enqueueMessage(msg(2), 30);
      queue.enqueueAtFront(msg(3));

      expect(whats(queue)).toEqual([3, 1, 2]);
      expect(times(queue)).toEqual([0, 0, 30]);
    });

    it('rejects a message without target', () => {
      expect(() => queue.enqueueAtFront(Message.obtain())).toThrow(MissingTargetError);
    });
  });

  describe('sync barriers', () => {
    it('returns increasing tokens', () => {
      expect(queue.postSyncBarrier(0)).toBe(0);
      expect(queue.postSyncBarrier(0)).toBe(1);
    });

    it('inserts the barrier after messages due at or before it', () => {
      queue.enqueueMessage(msg(1), 10);
      queue.enqueueMessage(msg(2), 30);
      const token = queue.postSyncBarrier(10);

      const chain = queue.toArray();
      expect(chain.map((m) => m.isBarrier())).toEqual([false, true, false]);
      expect(chain[1]?.arg1).toBe(token);
      expect(chain[1]?.when).toBe(10);
    });

    it('removes a barrier by token', () => {
      queue.enqueueMessage(msg(1), 10);
      const token = queue.postSyncBarrier(5);

      queue.removeSyncBarrier(token);

      expect(whats(queue)).toEqual([1]);
      expect(queue.size).toBe(1);
    });

    it('throws for an unknown token', () => {
      queue.postSyncBarrier(0);

      expect(() => queue.removeSyncBarrier(42)).toThrow(BarrierNotFoundError);
      expect(queue.size).toBe(1);
    });

    it('rejects an invalid barrier time', () => {
      expect(() => queue.postSyncBarrier(-3)).toThrow(InvalidTimeError);
    });
  });

  describe('removeMessages / hasMessages', () => {
    it('removes matching messages and reports the count', () => {
      queue.enqueueMessage(msg(1), 0);
      queue.enqueueMessage(msg(2, other), 0);
      queue.enqueueMessage(msg(1), 5);

      const removed = queue.removeMessages((m) => m.target === target);

      expect(removed).toBe(2);
      expect(whats(queue)).toEqual([2]);
      expect(queue.size).toBe(1);
    });

    it('never removes barriers', () => {
      queue.postSyncBarrier(0);
      queue.enqueueMessage(msg(1), 0);

      expect(queue.removeMessages(() => true)).toBe(1);
      expect(queue.peek()?.isBarrier()).toBe(true);
    });

    it('finds non-barrier messages only', () => {
      queue.postSyncBarrier(0);

      expect(queue.hasMessages(() => true)).toBe(false);

      queue.enqueueMessage(msg(9), 1);

      expect(queue.hasMessages((m) => m.what === 9)).toBe(true);
      expect(queue.hasMessages((m) => m.what === 8)).toBe(false);
    });
  });

  describe('unlink', () => {
    it('detaches the head', () => {
      const first = msg(1);
      queue.enqueueMessage(first, 0);
      queue.enqueueMessage(msg(2), 1);

      queue.unlink(null, first);

      expect(whats(queue)).toEqual([2]);
      expect(first.next).toBeNull();
    });

    it('detaches a message after its predecessor', () => {
      const first = msg(1);
      const second = msg(2);
      queue.enqueueMessage(first, 0);
      queue.enqueueMessage(second, 1);
      queue.enqueueMessage(msg(3), 2);

      queue.unlink(first, second);

      expect(whats(queue)).toEqual([1, 3]);
      expect(second.next).toBeNull();
      expect(queue.size).toBe(2);
    });

    it('throws when the message is not at the given position', () => {
      const first = msg(1);
      const second = msg(2);
      queue.enqueueMessage(first, 0);
      queue.enqueueMessage(second, 1);

      expect(() => queue.unlink(null, second)).toThrow('is not linked at the given position');
      expect(queue.size).toBe(2);
    });
  });

  describe('quit', () => {
    it('drops every message and clears links', () => {
      const first = msg(1);
      queue.enqueueMessage(first, 0);
      queue.enqueueMessage(msg(2), 1);
      queue.postSyncBarrier(0);

      queue.quit();

      expect(queue.isEmpty()).toBe(true);
      expect(queue.size).toBe(0);
      expect(first.next).toBeNull();
    });
  });

  describe('iteration', () => {
    it('iterates head first', () => {
      queue.enqueueMessage(msg(2), 20);
      queue.enqueueMessage(msg(1), 10);

      const seen: number[] = [];
      for (const message of queue) {
        seen.push(message.what);
      }

      expect(seen).toEqual([1, 2]);
    });
  });
});
