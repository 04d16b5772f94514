import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

const CacheFileSchema = z.record(z.object({ expiresAt: z.number(), value: z.string() }));

type CacheEntry = z.infer<typeof CacheFileSchema>[string];

export interface ResponseCacheOptions {
  ttlSeconds: number;
  /** Persist entries as JSON here; memory-only when omitted. */
  diskPath?: string;
  now?: () => number;
}

export interface ResponseCache {
  readonly size: number;
  get(key: string): string | undefined;
  set(key: string, value: string): void;
}

function loadEntries(path: string, now: number): Map<string, CacheEntry> {
  const entries = new Map<string, CacheEntry>();
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return entries;
    logger.warn('LLM cache: failed to read cache file', { path, error: errorMessage(err) });
    return entries;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    logger.warn('LLM cache: cache file is not JSON', { path, error: errorMessage(err) });
    return entries;
  }
  const parsed = CacheFileSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn('LLM cache: ignoring malformed cache file', { path });
    return entries;
  }
  for (const [key, entry] of Object.entries(parsed.data)) {
    if (entry.expiresAt > now) entries.set(key, entry);
  }
  return entries;
}

/** TTL cache for model replies. Expired entries are dropped on read. */
export function createResponseCache(options: ResponseCacheOptions): ResponseCache {
  const now = options.now ?? Date.now;
  const { diskPath, ttlSeconds } = options;
  const entries = diskPath ? loadEntries(diskPath, now()) : new Map<string, CacheEntry>();

  const persist = (): void => {
    if (!diskPath) return;
    try {
      mkdirSync(dirname(diskPath), { recursive: true });
      writeFileSync(diskPath, JSON.stringify(Object.fromEntries(entries)), 'utf8');
    } catch (err) {
      logger.warn('LLM cache: failed to write cache file', { path: diskPath, error: errorMessage(err) });
    }
  };

  return {
    get size() {
      return entries.size;
    },

    get(key) {
      const entry = entries.get(key);
      if (!entry) return undefined;
      if (entry.expiresAt <= now()) {
        entries.delete(key);
        persist();
        return undefined;
      }
      return entry.value;
    },

    set(key, value) {
      if (ttlSeconds <= 0) return;
      entries.set(key, { expiresAt: now() + ttlSeconds * 1000, value });
      persist();
    },
  };
}
