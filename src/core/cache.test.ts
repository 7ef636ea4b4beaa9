import { TtlCache } from './cache';

describe('TtlCache', () => {
  let clock: number;
  let cache: TtlCache;

  beforeEach(() => {
    clock = 1_000;
    cache = new TtlCache({ now: () => clock });
  });

  it('returns a payload immediately after put', () => {
    cache.put('k1', { id: 'ENSG1' }, 30_000);
    expect(cache.get('k1')).toEqual({ id: 'ENSG1' });
  });

  it('misses for a key that was never stored', () => {
    expect(cache.get('missing')).toBeUndefined();
  });

  it('still hits just before the TTL elapses', () => {
    cache.put('k1', [1, 2], 30_000);
    clock += 29_999;
    expect(cache.get('k1')).toEqual([1, 2]);
  });

  it('misses once the TTL has elapsed and drops the entry', () => {
    cache.put('k1', { id: 'ENSG1' }, 30_000);
    clock += 30_000;
    expect(cache.get('k1')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('overwrites an existing entry and resets its timestamp', () => {
    cache.put('k1', { v: 1 }, 10_000);
    clock += 8_000;
    cache.put('k1', { v: 2 }, 10_000);
    clock += 8_000;
    expect(cache.get('k1')).toEqual({ v: 2 });
    expect(cache.size).toBe(1);
  });

  it('does not share references with callers', () => {
    const payload = { id: 'ENSG1', tags: ['a'] };
    cache.put('k1', payload, 30_000);
    payload.tags.push('mutated');

    const first = cache.get('k1');
    expect(first).toEqual({ id: 'ENSG1', tags: ['a'] });

    if (first && !Array.isArray(first)) {
      first.id = 'changed';
    }
    expect(cache.get('k1')).toEqual({ id: 'ENSG1', tags: ['a'] });
  });

  it('clears all entries', () => {
    cache.put('a', {}, 1_000);
    cache.put('b', {}, 1_000);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });
});
