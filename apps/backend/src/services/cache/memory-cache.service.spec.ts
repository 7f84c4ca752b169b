import { z } from 'zod';
import { MemoryCacheService } from './memory-cache.service';
import { CancellationError } from '../../utils/errors';

const entrySchema = z.object({ value: z.number() });

describe('MemoryCacheService', () => {
  let now: number;
  let cache: MemoryCacheService;

  beforeEach(() => {
    now = 1_000_000;
    cache = new MemoryCacheService(2, () => now);
  });

  it('returns null for a missing key', async () => {
    expect(await cache.get('missing', entrySchema)).toEqual({ success: true, data: null });
  });

  it('returns a stored value until it expires', async () => {
    await cache.set('a', { value: 1 }, 60);

    now += 59_999;
    expect(await cache.get('a', entrySchema)).toEqual({ success: true, data: { value: 1 } });

    now += 1;
    expect(await cache.get('a', entrySchema)).toEqual({ success: true, data: null });
    expect(cache.size).toBe(0);
  });

  it('hands out copies rather than the stored object', async () => {
    const value = { value: 1 };
    await cache.set('a', value, 60);
    value.value = 2;

    expect(await cache.get('a', entrySchema)).toEqual({ success: true, data: { value: 1 } });
  });

  it('treats an entry of the wrong shape as a miss', async () => {
    await cache.set('a', { value: 'one' }, 60);

    expect(await cache.get('a', entrySchema)).toEqual({ success: true, data: null });
  });

  it('evicts the least recently used entry when full', async () => {
    await cache.set('a', { value: 1 }, 60);
    await cache.set('b', { value: 2 }, 60);
    await cache.get('a', entrySchema);
    await cache.set('c', { value: 3 }, 60);

    expect(await cache.get('b', entrySchema)).toEqual({ success: true, data: null });
    expect(await cache.get('a', entrySchema)).toEqual({ success: true, data: { value: 1 } });
    expect(await cache.get('c', entrySchema)).toEqual({ success: true, data: { value: 3 } });
  });

  it('does not touch the store once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await cache.set('a', { value: 1 }, 60, controller.signal);

    expect(result.success).toBe(false);
    expect(!result.success && result.error).toBeInstanceOf(CancellationError);
    expect(cache.size).toBe(0);
  });
});
