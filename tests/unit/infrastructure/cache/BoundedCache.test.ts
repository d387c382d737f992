import { describe, expect, it, vi } from 'vitest';

import { BoundedCache } from '@/infrastructure/cache/BoundedCache';

interface Box {
  value: string;
}

const box = (value: string): Box => ({ value });

describe('BoundedCache', () => {
  it('rejects capacities below one', () => {
    expect(() => new BoundedCache<number, Box>(0)).toThrow(RangeError);
    expect(() => new BoundedCache<number, Box>(1.5)).toThrow(RangeError);
  });

  it('evicts the least recently touched entry once over capacity', () => {
    const onEvict = vi.fn();
    const cache = new BoundedCache<number, Box>(3, onEvict);

    cache.set(1, box('a'));
    cache.set(2, box('b'));
    cache.set(3, box('c'));
    cache.get(1);
    cache.set(4, box('d'));

    expect(cache.size).toBe(3);
    expect(cache.has(2)).toBe(false);
    expect(onEvict).toHaveBeenCalledTimes(1);
    expect(onEvict).toHaveBeenCalledWith(2, { value: 'b' });
    expect(cache.entriesSnapshot().map(([key]) => key)).toEqual([3, 1, 4]);
  });

  it('peek reads without changing the eviction order', () => {
    const onEvict = vi.fn();
    const cache = new BoundedCache<number, Box>(2, onEvict);

    cache.set(1, box('a'));
    cache.set(2, box('b'));
    expect(cache.peek(1)).toEqual({ value: 'a' });
    cache.set(3, box('c'));

    expect(onEvict).toHaveBeenCalledWith(1, { value: 'a' });
    expect(cache.has(1)).toBe(false);
  });

  it('replacing an existing key never evicts', () => {
    const onEvict = vi.fn();
    const cache = new BoundedCache<number, Box>(2, onEvict);

    cache.set(1, box('a'));
    cache.set(2, box('b'));
    cache.set(1, box('a2'));

    expect(onEvict).not.toHaveBeenCalled();
    expect(cache.get(1)).toEqual({ value: 'a2' });
    expect(cache.entriesSnapshot().map(([key]) => key)).toEqual([2, 1]);
  });

  it('delete and clear do not notify the eviction listener', () => {
    const onEvict = vi.fn();
    const cache = new BoundedCache<string, Box>(5, onEvict);

    cache.set('x', box('1'));
    cache.set('y', box('2'));
    cache.set('z', box('3'));
    cache.get('x');

    expect(cache.delete('y')).toEqual({ value: '2' });
    expect(cache.delete('missing')).toBeUndefined();
    expect(cache.clear()).toEqual([
      ['z', { value: '3' }],
      ['x', { value: '1' }],
    ]);
    expect(cache.size).toBe(0);
    expect(onEvict).not.toHaveBeenCalled();
  });
});
