import { describe, it, expect, jest } from '@jest/globals';
import { IngestionQueue } from '../src/capture/queue';

describe('IngestionQueue', () => {
  it('drains everything pending in push order', () => {
    const q = new IngestionQueue<string>();
    q.push('a');
    q.push('b');
    q.push('c');
    expect(q.size).toBe(3);
    expect(q.drain()).toEqual(['a', 'b', 'c']);
    expect(q.size).toBe(0);
  });

  it('returns an empty batch when nothing is pending', () => {
    const q = new IngestionQueue<number>();
    expect(q.drain()).toEqual([]);
  });

  it('keeps items pushed after a drain for the next drain', () => {
    const q = new IngestionQueue<number>();
    q.push(1);
    const first = q.drain();
    q.push(2);
    expect(first).toEqual([1]);
    expect(q.drain()).toEqual([2]);
  });

  it('clear discards pending items and bumps the epoch', () => {
    const q = new IngestionQueue<number>();
    q.push(1);
    q.push(2);
    const before = q.epoch;
    expect(q.clear()).toBe(2);
    expect(q.epoch).toBe(before + 1);
    expect(q.drain()).toEqual([]);
  });

  it('notifies push listeners until unsubscribed', () => {
    const q = new IngestionQueue<number>();
    const listener = jest.fn();
    const off = q.onPush(listener);
    q.push(1);
    off();
    q.push(2);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
