import { describe, it, expect } from 'vitest';

import { SessionRegistry } from '../registry';
import { UnknownSessionError } from '@/lib/errors';

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe('SessionRegistry', () => {
  it('creates sessions with generated ids when none is given', () => {
    const registry = new SessionRegistry();

    const first = registry.create();
    const second = registry.create();

    expect(first.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(first.id).not.toBe(second.id);
    expect(registry.size).toBe(2);
  });

  it('returns the existing session instead of replacing it', () => {
    const registry = new SessionRegistry();
    const session = registry.create('s-1', 1000);

    expect(registry.create('s-1', 5000)).toBe(session);
    expect(registry.getOrCreate('s-1')).toEqual({ session, created: false });
  });

  it('reports whether getOrCreate made a new session', () => {
    const registry = new SessionRegistry();

    const { created } = registry.getOrCreate('fresh');

    expect(created).toBe(true);
    expect(registry.has('fresh')).toBe(true);
  });

  it('throws a not-found error with an optional hint', () => {
    const registry = new SessionRegistry();

    expect(() => registry.require('missing')).toThrow(UnknownSessionError);
    expect(() => registry.require('missing', 'Please start a session first.')).toThrow(
      'Session missing not found. Please start a session first.',
    );
  });

  it('removes a session exactly once', () => {
    const registry = new SessionRegistry();
    registry.create('s-1');

    expect(registry.remove('s-1')).toBe(true);
    expect(registry.remove('s-1')).toBe(false);
    expect(registry.get('s-1')).toBeUndefined();
  });

  it('counts stream connections per session', () => {
    const registry = new SessionRegistry();
    const session = registry.create('s-1');

    registry.attachConnection(session);
    registry.attachConnection(session);
    registry.detachConnection(session);
    expect(registry.hasConnection(session)).toBe(true);

    registry.detachConnection(session);
    expect(registry.hasConnection(session)).toBe(false);
  });

  it('does not carry connections over to a new session under the same id', () => {
    const registry = new SessionRegistry();
    const first = registry.create('s-1');
    registry.attachConnection(first);
    registry.remove('s-1');

    const second = registry.create('s-1');

    expect(registry.hasConnection(second)).toBe(false);
    expect(registry.hasConnection(first)).toBe(true);
  });

  describe('runExclusive', () => {
    it('runs tasks for one id in submission order', async () => {
      const registry = new SessionRegistry();
      const gate = deferred();
      const order: string[] = [];

      const first = registry.runExclusive('s-1', async () => {
        await gate.promise;
        order.push('first');
      });
      const second = registry.runExclusive('s-1', () => {
        order.push('second');
      });

      await Promise.resolve();
      expect(order).toEqual([]);

      gate.resolve();
      await Promise.all([first, second]);
      expect(order).toEqual(['first', 'second']);
    });

    it('does not hold other ids behind a slow task', async () => {
      const registry = new SessionRegistry();
      const gate = deferred();
      const order: string[] = [];

      const slow = registry.runExclusive('s-1', async () => {
        await gate.promise;
        order.push('slow');
      });
      await registry.runExclusive('s-2', () => {
        order.push('other');
      });

      expect(order).toEqual(['other']);
      gate.resolve();
      await slow;
      expect(order).toEqual(['other', 'slow']);
    });

    it('keeps the queue going after a task fails', async () => {
      const registry = new SessionRegistry();

      const failing = registry.runExclusive('s-1', () => {
        throw new Error('boom');
      });
      const next = registry.runExclusive('s-1', () => 'ok');

      await expect(failing).rejects.toThrow('boom');
      await expect(next).resolves.toBe('ok');
    });
  });
});
