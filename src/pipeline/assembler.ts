/**
 * Video assembly — feeds the concatenated slide frames to the encoder, then
 * checks the finished file against the configured size window.
 */
import * as fs from 'fs';
import { formatBitrate, type Config } from '../config.js';
import { logger } from '../utils/logger.js';
import {
  bytesToMb,
  encodeVideo,
  probeDuration,
  suggestBitrate,
  type EncodeOptions,
  type VideoEncoder,
} from '../media/ffmpeg.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AssembledVideo {
  outputPath: string;
  framesWritten: number;
  /** Probed container duration, or the planned duration when probing failed */
  durationSeconds: number;
  sizeBytes: number;
  suggestedBitrate?: number;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** The configured music file when it exists; a missing one falls back to silence. */
export function resolveMusic(config: Pick<Config, 'musicPath'>): string | undefined {
  if (!config.musicPath) return undefined;
  if (fs.existsSync(config.musicPath)) return config.musicPath;
  logger.warn('Assembler: music file not found — using a silent track', { musicPath: config.musicPath });
  return undefined;
}

export function encodeOptionsFor(config: Config, totalFrames: number): EncodeOptions {
  return {
    outputPath: config.outputPath,
    width: config.frame.width,
    height: config.frame.height,
    fps: config.fps,
    bitrate: config.targetBitrate,
    preset: config.encoderPreset,
    durationSeconds: totalFrames / config.fps,
    musicPath: resolveMusic(config),
    audioVolume: config.audioVolume,
  };
}

function checkSize(config: Config, sizeBytes: number): number | undefined {
  const target = config.targetSizeMb;
  if (!target) return undefined;

  const suggested = suggestBitrate(config.targetBitrate, sizeBytes, target);
  if (suggested === null) {
    logger.info('Assembler: output size within target', { sizeMb: Number(bytesToMb(sizeBytes).toFixed(2)), target });
    return undefined;
  }

  logger.warn('Assembler: output size outside target — adjust target_bitrate', {
    sizeMb: Number(bytesToMb(sizeBytes).toFixed(2)),
    target,
    currentBitrate: formatBitrate(config.targetBitrate),
    suggestedBitrate: formatBitrate(suggested),
  });
  return suggested;
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Encode `frames` (all slides, in order) into the configured output file.
 *
 * @param totalFrames  Sum of every slide's frame count; fixes the output length.
 */
export async function assembleVideo(
  frames: AsyncIterable<Buffer>,
  totalFrames: number,
  config: Config,
  encode: VideoEncoder = encodeVideo,
): Promise<AssembledVideo> {
  const options = encodeOptionsFor(config, totalFrames);
  const result = await encode(frames, options);

  const sizeBytes = fs.statSync(result.outputPath).size;
  const probed = probeDuration(result.outputPath);
  const durationSeconds = probed > 0 ? probed : options.durationSeconds;
  const suggestedBitrate = checkSize(config, sizeBytes);

  return {
    outputPath: result.outputPath,
    framesWritten: result.framesWritten,
    durationSeconds,
    sizeBytes,
    ...(suggestedBitrate !== undefined ? { suggestedBitrate } : {}),
  };
}
