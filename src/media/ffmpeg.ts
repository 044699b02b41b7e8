/**
 * FFmpeg operations — streaming encode of raw RGBA frames, duration probing
 * and output-size tuning.
 *
 * The encoder writes to `<output>.partial.mp4` and renames it only after
 * ffmpeg exits cleanly. On any failure the partial file is removed.
 */
import { execFileSync, spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { Writable } from 'stream';
import { env, formatBitrate, type EncoderPreset } from '../config.js';
import { logger } from '../utils/logger.js';
import { FatalError, errorMessage } from '../utils/errors.js';
import { findExecutable } from '../utils/exec.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface EncodeOptions {
  outputPath: string;
  width: number;
  height: number;
  fps: number;
  /** Video bitrate in bits per second */
  bitrate: number;
  preset: EncoderPreset;
  /** Exact output length; audio is looped or trimmed to it */
  durationSeconds: number;
  /** Existing music file, or undefined for a silent track */
  musicPath?: string;
  audioVolume: number;
}

export interface EncodeResult {
  outputPath: string;
  framesWritten: number;
}

export type VideoEncoder = (frames: AsyncIterable<Buffer>, options: EncodeOptions) => Promise<EncodeResult>;

const SILENT_AUDIO = 'anullsrc=channel_layout=stereo:sample_rate=44100';
const STDERR_TAIL_BYTES = 4_000;
const BYTES_PER_MB = 1024 * 1024;

// ── Helpers ────────────────────────────────────────────────────────────────────

function runFfprobe(args: string[], label: string): string {
  logger.debug(`FFprobe [${label}]`, { args: args.join(' ') });
  return execFileSync(env.FFPROBE_PATH, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
  }).trim();
}

export function partialPathFor(outputPath: string): string {
  return `${outputPath}.partial.mp4`;
}

/** Seconds as an ffmpeg duration argument, to the millisecond. */
function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

function ensureWritableDir(outputPath: string): void {
  const dir = path.dirname(outputPath);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (err) {
    throw new FatalError(`Output path unwritable: ${outputPath} (${errorMessage(err)})`, err);
  }
}

function removeIfPresent(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

/**
 * Resolves once the stream can take more data, or once writing is pointless.
 * Every listener is removed on resolve.
 */
function waitForDrain(stdin: Writable, child: ChildProcess): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      stdin.off('drain', done);
      stdin.off('close', done);
      child.off('close', done);
      child.off('error', done);
      resolve();
    };
    stdin.once('drain', done);
    stdin.once('close', done);
    child.once('close', done);
    child.once('error', done);
  });
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * ffmpeg arguments for encoding raw RGBA frames from stdin into `target`.
 * Input 0 is the video pipe; input 1 is the looped music or a silent source.
 */
export function buildEncodeArgs(options: EncodeOptions, target: string): string[] {
  const audioInput = options.musicPath
    ? ['-stream_loop', '-1', '-i', options.musicPath]
    : ['-f', 'lavfi', '-i', SILENT_AUDIO];
  const audioFilter = options.musicPath ? ['-af', `volume=${options.audioVolume}`] : [];

  return [
    '-y', '-hide_banner', '-loglevel', 'error',
    '-f', 'rawvideo', '-pix_fmt', 'rgba',
    '-s', `${options.width}x${options.height}`,
    '-r', String(options.fps),
    '-i', '-',
    ...audioInput,
    '-map', '0:v:0', '-map', '1:a:0',
    '-c:v', 'libx264', '-preset', options.preset,
    '-b:v', formatBitrate(options.bitrate),
    '-pix_fmt', 'yuv420p',
    ...audioFilter,
    '-c:a', 'aac', '-b:a', '128k',
    '-t', formatSeconds(options.durationSeconds),
    '-shortest',
    '-movflags', '+faststart',
    '-f', 'mp4',
    target,
  ];
}

/**
 * Stream frames into ffmpeg and produce the final MP4.
 * Throws FatalError when ffmpeg is missing, fails, or the output is unwritable.
 */
export async function encodeVideo(
  frames: AsyncIterable<Buffer>,
  options: EncodeOptions,
  ffmpegCommand: string = env.FFMPEG_PATH,
): Promise<EncodeResult> {
  const ffmpeg = findExecutable(ffmpegCommand);
  if (!ffmpeg) throw new FatalError(`ffmpeg not found (looked for "${ffmpegCommand}")`);

  ensureWritableDir(options.outputPath);
  const partial = partialPathFor(options.outputPath);
  removeIfPresent(partial);

  const args = buildEncodeArgs(options, partial);
  const frameBytes = options.width * options.height * 4;
  logger.info('FFmpeg: encoding', {
    outputPath: options.outputPath,
    size: `${options.width}x${options.height}`,
    fps: options.fps,
    bitrate: formatBitrate(options.bitrate),
    duration: options.durationSeconds,
    audio: options.musicPath ? 'music' : 'silent',
  });
  logger.debug('FFmpeg [encode]', { args: args.join(' ') });

  const child = spawn(ffmpeg, args, { stdio: ['pipe', 'ignore', 'pipe'] });
  let stderr = '';
  child.stderr.on('data', (chunk: Buffer) => {
    stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
  });

  let hasExited = false;
  const exited = new Promise<{ code: number | null; error?: Error }>((resolve) => {
    child.once('error', (error) => {
      hasExited = true;
      resolve({ code: null, error });
    });
    child.once('close', (code) => {
      hasExited = true;
      resolve({ code });
    });
  });

  // EPIPE surfaces here when ffmpeg dies mid-stream; the exit status carries the reason
  let stdinError: Error | undefined;
  child.stdin.on('error', (err) => {
    stdinError = err;
  });

  let framesWritten = 0;
  try {
    for await (const frame of frames) {
      if (frame.length !== frameBytes) {
        throw new Error(`frame ${framesWritten} is ${frame.length} bytes, expected ${frameBytes}`);
      }
      if (hasExited || stdinError) break;
      if (!child.stdin.write(frame)) await waitForDrain(child.stdin, child);
      framesWritten++;
    }
    child.stdin.end();

    const result = await exited;
    if (result.error) throw result.error;
    if (result.code !== 0) {
      throw new Error(`ffmpeg exited with code ${result.code}: ${stderr.trim() || 'no output'}`);
    }
    if (stdinError) throw stdinError;
    if (!fs.existsSync(partial)) throw new Error('ffmpeg reported success but wrote no file');

    fs.renameSync(partial, options.outputPath);
  } catch (err) {
    if (!hasExited) {
      child.stdin.destroy();
      child.kill('SIGKILL');
      await exited;
    }
    removeIfPresent(partial);
    if (err instanceof FatalError) throw err;
    throw new FatalError(`FFmpeg encode failed: ${errorMessage(err)}`, err);
  }

  logger.info('FFmpeg: encode complete', { outputPath: options.outputPath, framesWritten });
  return { outputPath: options.outputPath, framesWritten };
}

/** Container duration in seconds, or 0 when ffprobe is unavailable or fails. */
export function probeDuration(videoPath: string): number {
  try {
    const raw = runFfprobe(
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'csv=s=,:p=0', videoPath],
      'probeDuration',
    );
    return parseFloat(raw) || 0;
  } catch (err) {
    logger.warn('FFmpeg: could not probe duration', { videoPath, error: errorMessage(err) });
    return 0;
  }
}

export function bytesToMb(bytes: number): number {
  return bytes / BYTES_PER_MB;
}

/**
 * Bitrate that would move the output size to the middle of `target` (MB),
 * rounded to the nearest 100 kbit/s. Null when the size already fits or
 * there is nothing to scale from.
 */
export function suggestBitrate(
  currentBps: number,
  sizeBytes: number,
  target: { min: number; max: number },
): number | null {
  const actualMb = bytesToMb(sizeBytes);
  if (actualMb <= 0) return null;
  if (actualMb >= target.min && actualMb <= target.max) return null;

  const midpoint = (target.min + target.max) / 2;
  const suggested = Math.round((currentBps * midpoint) / actualMb / 100_000) * 100_000;
  return Math.max(100_000, suggested);
}
