import { describe, it, expect } from 'vitest';
import { KeyedLock } from './lock.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('runs tasks on the same key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run('chess', task('first', 20)),
      lock.run('chess', task('second', 1)),
    ]);

    expect(results).toEqual(['first', 'second']);
    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('does not make different keys wait on each other', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('chess', async () => {
        events.push('chess:start');
        await delay(20);
        events.push('chess:end');
      }),
      lock.run('tennis', async () => {
        events.push('tennis:start');
        await delay(1);
        events.push('tennis:end');
      }),
    ]);

    expect(events).toEqual(['chess:start', 'tennis:start', 'tennis:end', 'chess:end']);
  });

  it('keeps going after a task rejects', async () => {
    const lock = new KeyedLock();
    const failing = lock.run('chess', () => {
      throw new Error('boom');
    });
    const next = lock.run('chess', () => 'recovered');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
  });

  it('forgets keys once their queue drains', async () => {
    const lock = new KeyedLock();
    await lock.run('chess', () => 1);
    await delay(0);
    expect(lock.activeKeys).toBe(0);
  });
});
