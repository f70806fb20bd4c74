import { describe, it, expect } from 'vitest';
import { Mutex } from '../../src/utils/mutex.js';

describe('Mutex', () => {
  it('runs callers one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const run = (name: string, delayMs: number) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([run('a', 20), run('b', 1), run('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when the holder throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('holder failed');
      }),
    ).rejects.toThrow('holder failed');

    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
    expect(mutex.queued).toBe(0);
  });

  it('counts waiting callers', async () => {
    const mutex = new Mutex();
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const held = mutex.runExclusive(() => gate);
    const waiting = mutex.runExclusive(() => undefined);

    expect(mutex.queued).toBe(2);
    open();
    await Promise.all([held, waiting]);
    expect(mutex.queued).toBe(0);
  });
});
