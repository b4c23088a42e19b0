import { describe, it, expect } from 'vitest';
import { KeyedQueue } from './keyedQueue';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedQueue', () => {
  it('runs tasks for one key in submission order', async () => {
    const queue = new KeyedQueue();
    const gate = deferred();
    const log: string[] = [];

    const first = queue.run('u1', async () => {
      await gate.promise;
      log.push('first');
    });
    const second = queue.run('u1', () => {
      log.push('second');
    });

    await Promise.resolve();
    expect(log).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first', 'second']);
  });

  it('does not block other keys', async () => {
    const queue = new KeyedQueue();
    const gate = deferred();
    const log: string[] = [];

    const slow = queue.run('u1', async () => {
      await gate.promise;
      log.push('u1');
    });
    await queue.run('u2', () => {
      log.push('u2');
    });

    expect(log).toEqual(['u2']);
    gate.resolve();
    await slow;
    expect(log).toEqual(['u2', 'u1']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new KeyedQueue();
    const failed = queue.run('u1', () => Promise.reject(new Error('boom')));
    const next = queue.run('u1', () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
