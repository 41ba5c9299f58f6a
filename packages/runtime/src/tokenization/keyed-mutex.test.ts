import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('KeyedMutex', () => {
  it('serializes work on the same key', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.runExclusive(['k'], async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
      });

    await Promise.all([task('a'), task('b')]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.size).toBe(0);
  });

  it('lets different keys proceed in parallel', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (key: string) =>
      mutex.runExclusive([key], async () => {
        events.push(`${key}:start`);
        await tick();
        events.push(`${key}:end`);
      });

    await Promise.all([task('a'), task('b')]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('does not deadlock on overlapping key sets given in different orders', async () => {
    const mutex = new KeyedMutex();

    const results = await Promise.all([
      mutex.runExclusive(['x', 'y'], async () => 1),
      mutex.runExclusive(['y', 'x'], async () => 2),
    ]);

    expect(results).toEqual([1, 2]);
  });

  it('releases keys when the work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive(['k'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(['k'], async () => 'ok')).resolves.toBe('ok');
  });
});
