/**
 * Asset resolver: maps script sections onto library images, seeding the library from
 * Pexels when it is empty and auto-fetch is on.
 */
import { join } from 'node:path';
import { AssetError } from '../errors.js';
import type { AssetItem, AssetResolver, ScriptSection } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import type { AssetLibrary } from './library.js';
import type { PexelsClient } from './pexels.js';

export interface AutoFetchOptions {
  client: PexelsClient;
  theme?: string;
  perPage: number;
}

export class LibraryAssetResolver implements AssetResolver {
  constructor(private readonly library: AssetLibrary, private readonly autoFetch?: AutoFetchOptions) {}

  async resolve(sections: readonly ScriptSection[], context: { topic: string; signal?: AbortSignal }): Promise<AssetItem[]> {
    if (sections.length === 0) throw new AssetError('NotFound', 'Script has no sections to align assets with');

    let images = await this.library.listImages();
    if (images.length === 0 && this.autoFetch) {
      await this.seedFromPexels(this.autoFetch, context.topic, context.signal);
      images = await this.library.listImages();
    }
    if (images.length === 0) {
      throw new AssetError('NotFound', `No images in ${this.library.assetsDir}`);
    }
    const items = alignAssets(sections, images);
    logger.info('Assets: aligned', { sections: sections.length, images: images.length, items: items.length });
    return items;
  }

  private async seedFromPexels(opts: AutoFetchOptions, topic: string, signal?: AbortSignal): Promise<void> {
    const query = opts.theme?.trim() || topic;
    const photos = await opts.client.searchPhotos(query, opts.perPage, 'landscape', signal);
    let n = 0;
    for (const photo of photos) {
      const url = photo.src.large ?? photo.src.original;
      if (!url) continue;
      n += 1;
      const filename = `pexels_${String(n).padStart(2, '0')}.jpg`;
      await opts.client.downloadPhoto(url, join(this.library.assetsDir, filename), signal);
    }
  }
}

/**
 * With at least as many images as sections, each section gets a contiguous group of images
 * sharing its weight; otherwise images repeat in order across sections.
 */
export function alignAssets(sections: readonly ScriptSection[], images: readonly string[]): AssetItem[] {
  const items: AssetItem[] = [];
  const k = sections.length;
  const n = images.length;
  sections.forEach((section, i) => {
    const sectionWeight = Math.max(1, section.text.length);
    const group = n >= k
      ? images.slice(Math.floor((i * n) / k), Math.floor(((i + 1) * n) / k))
      : [images[i % n] ?? ''];
    for (const path of group) {
      items.push({ index: items.length, path, sectionIndex: section.index, weight: sectionWeight / group.length });
    }
  });
  return items;
}
