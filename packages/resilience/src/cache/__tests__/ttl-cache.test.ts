import { afterEach, describe, expect, it, vi } from 'vitest';

import { TtlCache } from '../ttl-cache.js';

describe('TtlCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns undefined for missing key', () => {
    const cache = new TtlCache<string>();
    expect(cache.get('missing')).toBeUndefined();
    expect(cache.has('missing')).toBe(false);
  });

  it('stores and retrieves value', () => {
    const cache = new TtlCache<string>();
    cache.set('key', 'value');
    expect(cache.get('key')).toBe('value');
    expect(cache.size).toBe(1);
    cache.clear();
  });

  it('evicts expired entry on read', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));

    const cache = new TtlCache<string>(10);
    try {
      cache.set('key', 'value');

      vi.setSystemTime(new Date('2024-01-01T00:00:00.011Z'));
      expect(cache.get('key')).toBeUndefined();
      expect(cache.size).toBe(0);
    } finally {
      cache.clear();
    }
  });

  it('cleanup removes expired entries', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));

    const cache = new TtlCache<number>(10);
    try {
      cache.set('a', 1);
      vi.setSystemTime(new Date('2024-01-01T00:00:00.005Z'));
      cache.set('b', 2);

      vi.setSystemTime(new Date('2024-01-01T00:00:00.011Z'));
      cache.cleanup();

      expect(cache.size).toBe(1);
      expect(cache.get('b')).toBe(2);
    } finally {
      cache.clear();
    }
  });

  it('auto-cleanup evicts on its interval', () => {
    vi.useFakeTimers();
    const cache = new TtlCache<number>(100);
    try {
      cache.set('a', 1);
      cache.startAutoCleanup();
      vi.advanceTimersByTime(100);
      expect(cache.size).toBe(0);
    } finally {
      cache.clear();
    }
  });

  it('clear removes all entries and stops auto-cleanup', () => {
    const cache = new TtlCache<string>();
    cache.set('key', 'value');
    cache.startAutoCleanup();
    cache.clear();

    expect(cache.get('key')).toBeUndefined();
  });
});
