import { describe, expect, it } from 'vitest';
import { BoundedQueue } from './BoundedQueue';

const nextTick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('BoundedQueue', () => {
  it('should hand items out in order', async () => {
    const queue = new BoundedQueue<number>(3, 'block');

    await queue.put(1);
    await queue.put(2);

    expect(queue.size).toBe(2);
    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBe(2);
  });

  it('should suspend put on a full queue under block', async () => {
    const queue = new BoundedQueue<number>(1, 'block');
    await queue.put(1);

    let settled = false;
    const pending = queue.put(2).then((outcome) => {
      settled = true;
      return outcome;
    });
    await nextTick();

    expect(settled).toBe(false);
    expect(await queue.take()).toBe(1);
    expect(await pending).toEqual({ kind: 'queued' });
    expect(await queue.take()).toBe(2);
  });

  it('should drop the oldest item under drop-oldest', async () => {
    const queue = new BoundedQueue<string>(2, 'drop-oldest');

    await queue.put('a');
    await queue.put('b');
    const outcome = await queue.put('c');

    expect(outcome).toEqual({ kind: 'dropped-oldest', dropped: 'a' });
    expect(await queue.take()).toBe('b');
    expect(await queue.take()).toBe('c');
  });

  it('should wake a waiting consumer when an item arrives', async () => {
    const queue = new BoundedQueue<number>(1, 'block');

    const taken = queue.take();
    await queue.put(7);

    expect(await taken).toBe(7);
  });

  it('should end takes and refuse puts once closed', async () => {
    const queue = new BoundedQueue<number>(1, 'block');
    const waiting = queue.take();

    queue.close();

    expect(await waiting).toBeUndefined();
    expect(await queue.put(1)).toEqual({ kind: 'closed' });
    expect(queue.isClosed()).toBe(true);
  });

  it('should release a blocked producer when closed', async () => {
    const queue = new BoundedQueue<number>(1, 'block');
    await queue.put(1);
    const blocked = queue.put(2);

    queue.close();

    expect(await blocked).toEqual({ kind: 'closed' });
  });

  it('should still drain items queued before close', async () => {
    const queue = new BoundedQueue<number>(2, 'block');
    await queue.put(1);
    queue.close();

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBeUndefined();
  });

  it('should return and remove every pending item on clear', async () => {
    const queue = new BoundedQueue<number>(3, 'block');
    await queue.put(1);
    await queue.put(2);

    expect(queue.clear()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });

  it('should reject a capacity below one', () => {
    expect(() => new BoundedQueue<number>(0, 'block')).toThrow(
      'BoundedQueue capacity must be a positive integer'
    );
  });
});
