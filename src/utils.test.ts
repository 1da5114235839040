import { describe, it, expect } from 'vitest';
import { clearTimeout, setTimeout } from 'node:timers';
import { createKeyedMutex, unrefTimer } from './utils';

describe('createKeyedMutex', () => {
  it('runs tasks for one key one after another', async () => {
    const mutex = createKeyedMutex();
    const log: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = mutex.run('k', async () => {
      log.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      log.push('first:end');
    });
    const second = mutex.run('k', async () => {
      log.push('second');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not hold other keys back', async () => {
    const mutex = createKeyedMutex();
    void mutex.run('a', () => new Promise<void>(() => undefined));

    await expect(mutex.run('b', async () => 'done')).resolves.toBe('done');
  });

  it('keeps going after a rejected task', async () => {
    const mutex = createKeyedMutex();
    const failed = mutex.run('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('k', async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('forgets a key once its queue is empty', async () => {
    const mutex = createKeyedMutex();
    await mutex.run('k', async () => undefined);
    await Promise.resolve();
    await Promise.resolve();
    expect(mutex.size).toBe(0);
  });
});


describe('unrefTimer', () => {
  it('stops a pending timer from holding the process open', () => {
    const timer = setTimeout(() => undefined, 60_000);
    expect(timer.hasRef()).toBe(true);

    unrefTimer(timer);
    expect(timer.hasRef()).toBe(false);
    clearTimeout(timer);
  });

  it('ignores numeric timer ids', () => {
    expect(() => unrefTimer(42)).not.toThrow();
  });
});
