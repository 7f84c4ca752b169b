import { Logger } from '../../utils/logger';
import { CacheSchema } from './cache.interface';

const logger = new Logger('CacheEntry');

/**
 * Decode a stored JSON payload. Entries that are not valid JSON or no longer
 * match `schema` (e.g. written by an older release) count as misses.
 */
export function decodeEntry<T>(key: string, payload: string, schema: CacheSchema<T>): T | null {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (error) {
    logger.warn(`Discarding unreadable cache entry ${key}`, error);
    return null;
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    logger.warn(`Discarding cache entry ${key} with unexpected shape`, { issues: parsed.error.errors });
    return null;
  }

  return parsed.data;
}
