/**
 * Pexels photo search + download. Used only to seed an empty asset library.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { AssetError, abortReason, errorMessage } from '../errors.js';
import { isTimeoutError, withTimeout } from '../utils/abort.js';
import { logger } from '../utils/logger.js';

const BASE = 'https://api.pexels.com/v1';

const SearchResponseSchema = z.object({
  photos: z.array(z.object({
    id: z.number(),
    src: z.object({ large: z.string().optional(), original: z.string().optional() }).default({}),
  })).default([]),
});

export type PexelsPhoto = z.infer<typeof SearchResponseSchema>['photos'][number];

export interface PexelsClientOptions {
  apiKey: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

export interface PexelsClient {
  searchPhotos(query: string, perPage?: number, orientation?: string, signal?: AbortSignal): Promise<PexelsPhoto[]>;
  /** Resolves false (and logs) instead of throwing; one missing photo must not sink the batch. */
  downloadPhoto(url: string, destination: string, signal?: AbortSignal): Promise<boolean>;
}

export function createPexelsClient(options: PexelsClientOptions): PexelsClient {
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 30_000;
  const headers = {
    'Authorization': options.apiKey,
    'User-Agent': 'video-factory/0.1 (+https://www.pexels.com/api/)',
    'Accept': 'application/json',
  };

  return {
    async searchPhotos(query, perPage = 6, orientation = 'landscape', signal) {
      const params = new URLSearchParams({ query, per_page: String(perPage), orientation });
      logger.info('Pexels: searching photos', { query, perPage });
      let res: Response;
      try {
        res = await fetchImpl(`${BASE}/search?${params.toString()}`, {
          headers,
          signal: withTimeout(signal, timeoutMs),
        });
      } catch (err) {
        if (signal?.aborted) throw abortReason(signal);
        if (isTimeoutError(err)) {
          throw new AssetError('FetchFailed', `Pexels search timed out after ${timeoutMs}ms`, { cause: err });
        }
        throw new AssetError('FetchFailed', `Pexels search failed: ${errorMessage(err)}`, { cause: err });
      }
      if (!res.ok) throw new AssetError('FetchFailed', `Pexels search failed with HTTP ${res.status}`);
      const parsed = SearchResponseSchema.safeParse(await res.json());
      if (!parsed.success) throw new AssetError('FetchFailed', 'Pexels search returned an unexpected payload');
      return parsed.data.photos;
    },

    async downloadPhoto(url, destination, signal) {
      try {
        const res = await fetchImpl(url, { headers, signal: withTimeout(signal, timeoutMs * 2) });
        if (!res.ok) {
          logger.warn('Pexels: download failed', { url, status: res.status });
          return false;
        }
        await mkdir(dirname(destination), { recursive: true });
        await writeFile(destination, Buffer.from(await res.arrayBuffer()));
      } catch (err) {
        if (signal?.aborted) throw abortReason(signal);
        logger.warn('Pexels: download failed', { url, error: errorMessage(err) });
        return false;
      }
      logger.info('Pexels: downloaded', { destination });
      return true;
    },
  };
}
