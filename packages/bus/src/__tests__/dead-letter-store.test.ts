import { describe, it, expect, beforeEach } from 'vitest';
import { DeadLetterStore } from '../dead-letter-store.js';
import { DeadLetterNotFoundError } from '../errors.js';
import type { BusMessage } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ORDER_PLACED = 42;
const START = Date.parse('2026-03-01T12:00:00.000Z');

let now: number;
let store: DeadLetterStore;

function makeMessage(id: string, typeCode = ORDER_PLACED): BusMessage {
  return Object.freeze({
    id,
    createdAt: new Date(START).toISOString(),
    typeCode,
    source: 'checkout',
    priority: 'normal',
    payload: { orderId: id },
  });
}

beforeEach(() => {
  now = START;
  store = new DeadLetterStore({ capacityPerType: 3, now: () => now });
});

describe('DeadLetterStore', () => {
  describe('add', () => {
    it('records the failure with its error and attempt count', () => {
      const message = makeMessage('msg-1');

      const entry = store.add(ORDER_PLACED, message, new TypeError('bad payload'), 3, 'sub-1');

      expect(entry).toMatchObject({
        typeCode: ORDER_PLACED,
        message,
        subscriptionId: 'sub-1',
        error: 'bad payload',
        errorName: 'TypeError',
        attemptCount: 3,
        failedAt: '2026-03-01T12:00:00.000Z',
      });
      expect(entry.id).not.toBe('msg-1');
      expect(store.size(ORDER_PLACED)).toBe(1);
    });

    it('describes non-Error throwables', () => {
      const entry = store.add(ORDER_PLACED, makeMessage('msg-1'), 'timeout', 1);

      expect(entry.error).toBe('timeout');
      expect(entry.errorName).toBe('string');
      expect(entry.subscriptionId).toBeNull();
    });

    it('evicts the oldest entry once a type is at capacity', () => {
      for (const id of ['m1', 'm2', 'm3', 'm4']) {
        store.add(ORDER_PLACED, makeMessage(id), new Error('boom'), 1);
      }

      expect(store.size(ORDER_PLACED)).toBe(3);
      expect(store.list(ORDER_PLACED).map((e) => e.message.id)).toEqual(['m4', 'm3', 'm2']);
      expect(store.getStatistics().totalEvicted).toBe(1);
    });

    it('bounds each type separately', () => {
      for (const id of ['m1', 'm2', 'm3']) {
        store.add(ORDER_PLACED, makeMessage(id), new Error('boom'), 1);
      }
      store.add(7, makeMessage('h1', 7), new Error('boom'), 1);

      expect(store.size(ORDER_PLACED)).toBe(3);
      expect(store.size(7)).toBe(1);
      expect(store.totalSize).toBe(4);
    });
  });

  describe('list', () => {
    it('returns newest first up to the limit', () => {
      for (const id of ['m1', 'm2', 'm3']) {
        store.add(ORDER_PLACED, makeMessage(id), new Error('boom'), 1);
      }

      expect(store.list(ORDER_PLACED, 2).map((e) => e.message.id)).toEqual(['m3', 'm2']);
      expect(store.list(ORDER_PLACED, 0)).toEqual([]);
      expect(store.list(99)).toEqual([]);
    });

    it('lists across types newest first', () => {
      store.add(ORDER_PLACED, makeMessage('a'), new Error('boom'), 1);
      store.add(7, makeMessage('b', 7), new Error('boom'), 1);
      store.add(ORDER_PLACED, makeMessage('c'), new Error('boom'), 1);

      expect(store.listAll().map((e) => e.message.id)).toEqual(['c', 'b', 'a']);
    });

    it('returns nothing across types for a zero or negative limit', () => {
      store.add(ORDER_PLACED, makeMessage('a'), new Error('boom'), 1);
      store.add(7, makeMessage('b', 7), new Error('boom'), 1);

      expect(store.listAll(0)).toEqual([]);
      expect(store.listAll(-1)).toEqual([]);
      expect(store.listAll(1).map((e) => e.message.id)).toEqual(['b']);
    });
  });

  describe('replay', () => {
    it('removes every entry for the message and returns it', () => {
      const message = makeMessage('msg-1');
      store.add(ORDER_PLACED, message, new Error('boom'), 3, 'sub-a');
      store.add(ORDER_PLACED, message, new Error('boom'), 3, 'sub-b');
      store.add(ORDER_PLACED, makeMessage('msg-2'), new Error('boom'), 3);

      const result = store.replay(ORDER_PLACED, 'msg-1');

      expect(result).toEqual({ ok: true, message, removed: 2 });
      expect(store.list(ORDER_PLACED).map((e) => e.message.id)).toEqual(['msg-2']);
      expect(store.getStatistics().totalReplayed).toBe(2);
    });

    it('reports not-found on a second replay of the same message', () => {
      store.add(ORDER_PLACED, makeMessage('msg-1'), new Error('boom'), 3);
      store.replay(ORDER_PLACED, 'msg-1');

      const second = store.replay(ORDER_PLACED, 'msg-1');

      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error).toBeInstanceOf(DeadLetterNotFoundError);
        expect(second.error.message).toBe('No dead letter for message msg-1 of type 42');
      }
    });

    it('only looks within the given type', () => {
      store.add(7, makeMessage('msg-1', 7), new Error('boom'), 1);

      expect(store.replay(ORDER_PLACED, 'msg-1').ok).toBe(false);
      expect(store.size(7)).toBe(1);
    });
  });

  describe('clear and purge', () => {
    it('clears one type or all of them', () => {
      store.add(ORDER_PLACED, makeMessage('a'), new Error('boom'), 1);
      store.add(ORDER_PLACED, makeMessage('b'), new Error('boom'), 1);
      store.add(7, makeMessage('c', 7), new Error('boom'), 1);

      expect(store.clear(ORDER_PLACED)).toBe(2);
      expect(store.totalSize).toBe(1);
      expect(store.clear()).toBe(1);
      expect(store.totalSize).toBe(0);
      expect(store.getStatistics().totalCleared).toBe(3);
    });

    it('purges entries older than the given age', () => {
      store.add(ORDER_PLACED, makeMessage('old'), new Error('boom'), 1);
      now = START + 10_000;
      store.add(ORDER_PLACED, makeMessage('new'), new Error('boom'), 1);
      now = START + 15_000;

      expect(store.purgeOlderThan(10_000)).toBe(1);
      expect(store.list(ORDER_PLACED).map((e) => e.message.id)).toEqual(['new']);
      expect(store.getStatistics().totalPurged).toBe(1);
    });
  });

  describe('getStatistics', () => {
    it('summarises sizes, totals and the most frequent failure reasons', () => {
      store.add(ORDER_PLACED, makeMessage('a'), new Error('timeout'), 1);
      store.add(ORDER_PLACED, makeMessage('b'), new Error('timeout'), 1);
      store.add(7, makeMessage('c', 7), new Error('bad payload'), 1);

      expect(store.getStatistics()).toEqual({
        currentSize: 3,
        capacityPerType: 3,
        totalAdded: 3,
        totalReplayed: 0,
        totalEvicted: 0,
        totalCleared: 0,
        totalPurged: 0,
        topFailureReasons: [
          { reason: 'timeout', count: 2 },
          { reason: 'bad payload', count: 1 },
        ],
      });
    });
  });

  describe('setCapacity', () => {
    it('evicts the oldest entries beyond the new capacity', () => {
      for (const id of ['m1', 'm2', 'm3']) {
        store.add(ORDER_PLACED, makeMessage(id), new Error('boom'), 1);
      }

      store.setCapacity(1);

      expect(store.list(ORDER_PLACED).map((e) => e.message.id)).toEqual(['m3']);
      expect(store.getStatistics().totalEvicted).toBe(2);
    });
  });
});
