import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../src/keyedLock';

describe('keyed lock', () => {
  it('serializes tasks under one key and lets other keys through', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = lock.run('a', async () => {
      events.push('a1:start');
      await gate;
      events.push('a1:end');
      return 1;
    });
    const second = lock.run('a', async () => {
      events.push('a2');
      return 2;
    });
    const other = lock.run('b', async () => {
      events.push('b');
      return 3;
    });

    expect(await other).toBe(3);
    expect(events).toEqual(['a1:start', 'b']);

    release();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['a1:start', 'b', 'a1:end', 'a2']);
    expect(lock.size).toBe(0);
  });

  it('keeps running queued tasks after one fails', async () => {
    const lock = new KeyedLock();
    const failing = lock.run('a', async () => {
      throw new Error('boom');
    });
    const next = lock.run('a', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    expect(lock.size).toBe(0);
  });
});
