/**
 * Slideshow composer: still images timed against the narration, muxed by ffmpeg.
 *
 * Slides are fed through the concat demuxer (an ffconcat list written beside the audio),
 * scaled and padded to the target resolution, and encoded libx264/aac with `-shortest`.
 */
import { execFile } from 'node:child_process';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { VIDEO_RESOLUTIONS, type VideoResolution } from '../config.js';
import { RenderError, errorMessage, isAbortError } from '../errors.js';
import type { AssetItem, VideoComposer } from '../pipeline/types.js';
import type { AudioArtifact } from '../tts/types.js';
import { logger } from '../utils/logger.js';

// ── Process runner ─────────────────────────────────────────────────────────────

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** Resolves with the exit code; rejects only when the process could not run at all. */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: { signal?: AbortSignal },
) => Promise<ProcessResult>;

export const execFileRunner: ProcessRunner = (command, args, { signal }) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { signal, maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ code: 0, stdout, stderr });
      } else if (typeof error.code === 'number') {
        resolve({ code: error.code, stdout, stderr });
      } else {
        reject(error);
      }
    });
  });

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

// ── Helpers ────────────────────────────────────────────────────────────────────

/** Splits `totalSeconds` across slides by weight, in whole milliseconds. */
export function allocateDurations(weights: readonly number[], totalSeconds: number): number[] {
  const sum = weights.reduce((acc, w) => acc + w, 0);
  if (sum <= 0) return weights.map(() => Math.round((totalSeconds / weights.length) * 1000) / 1000);
  return weights.map((w) => Math.round(((totalSeconds * w) / sum) * 1000) / 1000);
}

const quote = (path: string) => `'${path.replace(/'/g, "'\\''")}'`;

export function buildConcatList(paths: readonly string[], durations: readonly number[]): string {
  const lines = ['ffconcat version 1.0'];
  paths.forEach((path, i) => {
    lines.push(`file ${quote(path)}`, `duration ${(durations[i] ?? 0).toFixed(3)}`);
  });
  // The demuxer ignores the last entry's duration unless the file is listed again.
  const last = paths[paths.length - 1];
  if (last !== undefined) lines.push(`file ${quote(last)}`);
  return lines.join('\n') + '\n';
}

const tail = (text: string, max = 600) => text.trim().slice(-max);

// ── Composer ───────────────────────────────────────────────────────────────────

export interface FfmpegComposerOptions {
  ffmpegPath: string;
  resolution: VideoResolution;
  fps: number;
  runner?: ProcessRunner;
}

export class FfmpegVideoComposer implements VideoComposer {
  private readonly runner: ProcessRunner;

  constructor(private readonly options: FfmpegComposerOptions) {
    this.runner = options.runner ?? execFileRunner;
  }

  async compose(
    audio: AudioArtifact,
    assets: readonly AssetItem[],
    context: { outputPath: string; signal?: AbortSignal },
  ): Promise<string> {
    if (assets.length === 0) throw new RenderError('InvalidInput', 'No images to render');
    if (!(audio.durationSeconds > 0)) {
      throw new RenderError('InvalidInput', `Narration has no duration (${audio.durationSeconds}s)`);
    }
    for (const path of [audio.path, ...assets.map((a) => a.path)]) {
      try {
        await access(path);
      } catch (err) {
        throw new RenderError('InvalidInput', `Input file is missing: ${path}`, { cause: err });
      }
    }

    const durations = allocateDurations(assets.map((a) => a.weight), audio.durationSeconds);
    const listPath = join(dirname(audio.path), 'slides.ffconcat');
    await writeFile(listPath, buildConcatList(assets.map((a) => a.path), durations), 'utf8');
    await mkdir(dirname(context.outputPath), { recursive: true });

    const args = this.buildArgs(listPath, audio.path, context.outputPath);
    logger.info('FFmpeg: rendering slideshow', {
      slides: assets.length, durationSeconds: audio.durationSeconds, resolution: this.options.resolution,
    });
    logger.debug('FFmpeg: args', { args });

    let result: ProcessResult;
    try {
      result = await this.runner(this.options.ffmpegPath, args, { signal: context.signal });
    } catch (err) {
      if (isAbortError(err)) throw err;
      if (hasCode(err, 'ENOENT')) {
        throw new RenderError('EncoderUnavailable', `ffmpeg not found at "${this.options.ffmpegPath}"`, { cause: err });
      }
      throw new RenderError('EncodingFailed', `ffmpeg could not start: ${errorMessage(err)}`, { cause: err });
    }
    if (result.code !== 0) {
      throw new RenderError('EncodingFailed', `ffmpeg exited with code ${result.code}: ${tail(result.stderr)}`);
    }

    logger.info('FFmpeg: render complete', { outputPath: context.outputPath });
    return context.outputPath;
  }

  buildArgs(listPath: string, audioPath: string, outputPath: string): string[] {
    const { width, height } = VIDEO_RESOLUTIONS[this.options.resolution];
    const filter = [
      `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
      `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
      'format=yuv420p',
    ].join(',');
    return [
      '-y', '-hide_banner', '-loglevel', 'error',
      '-f', 'concat', '-safe', '0', '-i', listPath,
      '-i', audioPath,
      '-vf', filter,
      '-r', String(this.options.fps),
      '-c:v', 'libx264', '-preset', 'medium',
      '-c:a', 'aac', '-b:a', '192k',
      '-shortest',
      outputPath,
    ];
  }
}
