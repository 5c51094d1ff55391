import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../../../src/lib/keyedLock';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('KeyedLock', () => {
  it('runs tasks with the same key one after another', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run('acct-1', task('a', 15)),
      lock.run('acct-1', task('b', 1)),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('runs tasks with different keys concurrently', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('acct-1', async () => {
        events.push('a:start');
        await delay(15);
        events.push('a:end');
      }),
      lock.run('acct-2', async () => {
        events.push('b:start');
        await delay(1);
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('keeps the queue going after a task rejects', async () => {
    const lock = new KeyedLock();

    const failing = lock.run('acct-1', async () => {
      throw new Error('boom');
    });
    const next = lock.run('acct-1', async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('accepts new work for a key after its queue drains', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await lock.run('acct-1', async () => {
      events.push('first');
    });
    await lock.run('acct-1', async () => {
      events.push('second');
    });

    expect(events).toEqual(['first', 'second']);
  });
});
