/**
 * Local asset library: image directory plus the output and temp roots each run writes to.
 */
import { mkdir, readdir, rm } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { logger } from '../utils/logger.js';
import type { RunWorkspaceFactory } from '../pipeline/types.js';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);

export function slugify(value: string): string {
  const slug = value.normalize('NFKD').replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z0-9]+/g, '-').replace(/^-+|-+$/g, '').toLowerCase();
  return slug || 'channel';
}

export interface AssetLibraryDirs {
  assetsDir: string;
  outputDir: string;
  tempDir: string;
}

export interface AssetLibrary extends RunWorkspaceFactory, Readonly<AssetLibraryDirs> {
  ensureDirectories(): Promise<void>;
  /** Sorted image paths; an absent assets directory is an empty library. */
  listImages(): Promise<string[]>;
}

export function createAssetLibrary(dirs: AssetLibraryDirs): AssetLibrary {
  const assetsDir = resolve(dirs.assetsDir);
  const outputDir = resolve(dirs.outputDir);
  const tempDir = resolve(dirs.tempDir);

  async function ensureDirectories(): Promise<void> {
    for (const dir of [assetsDir, outputDir, tempDir]) {
      await mkdir(dir, { recursive: true });
    }
    logger.debug('Assets: directories ensured', { assetsDir });
  }

  return {
    assetsDir,
    outputDir,
    tempDir,
    ensureDirectories,

    async listImages() {
      let entries: string[];
      try {
        entries = await readdir(assetsDir);
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
        throw err;
      }
      const images = entries
        .filter((name) => IMAGE_EXTENSIONS.has(extname(name).toLowerCase()))
        .sort()
        .map((name) => join(assetsDir, name));
      logger.info(`Assets: found ${images.length} images`, { assetsDir });
      return images;
    },

    async create(runId, channel) {
      await ensureDirectories();
      const dir = join(tempDir, runId);
      await mkdir(dir, { recursive: true });
      return {
        dir,
        outputPath: join(outputDir, `${slugify(channel)}-${runId}.mp4`),
        tempPath: (name) => join(dir, name),
        dispose: () => rm(dir, { recursive: true, force: true }),
      };
    },
  };
}
