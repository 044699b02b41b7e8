import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { runPipeline } from '../../src/pipeline/index.js';
import type { EncodeOptions, VideoEncoder } from '../../src/media/ffmpeg.js';
import type { RawRunConfig } from '../../src/config.js';
import { FatalError } from '../../src/utils/errors.js';
import {
  SHEET_HEADER,
  blockRenderer,
  tempDir,
  testConfig,
  writePng,
  writeTruncatedPng,
  writeWorkbook,
} from '../helpers.js';

const FRAME_BYTES = 96 * 64 * 4;

const RUN: Partial<RawRunConfig> = {
  output_path: 'out/promo.mp4',
  frame_width: 96,
  frame_height: 64,
  edge_padding_px: 4,
  safe_area_inset_px: 4,
  title_font_size_px: 10,
  body_font_size_px: 10,
  ribbon_font_size_px: 10,
  fps: 10,
  slide_duration_seconds: 1,
  blur_check: false,
};

/** Encoder stand-in: writes the concatenated raw frames to the output path. */
function fakeEncoder() {
  const calls: EncodeOptions[] = [];
  const encode = vi.fn<VideoEncoder>(async (frames, options) => {
    calls.push(options);
    const chunks: Buffer[] = [];
    for await (const frame of frames) chunks.push(frame);
    fs.mkdirSync(path.dirname(options.outputPath), { recursive: true });
    fs.writeFileSync(options.outputPath, Buffer.concat(chunks));
    return { outputPath: options.outputPath, framesWritten: chunks.length };
  });
  return { encode, calls };
}

describe('runPipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = tempDir();
    await writePng(path.join(dir, 'images', 'kettle.png'), 120, 90, '#ff0000');
    await writePng(path.join(dir, 'images', 'toaster.png'), 60, 80, '#00ff00');
    fs.writeFileSync(path.join(dir, 'images', 'broken.png'), 'not an image');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('renders every valid slide with fallback font, no background removal and silent audio', async () => {
    await writeWorkbook(path.join(dir, 'sheet.xlsx'), [
      SHEET_HEADER,
      ['kettle.png', 'Kettle', 'Fast boil', '', '', '20 x 15 cm', '1.7 L', ''],
      ['barcode_kettle.png', 'Barcode', '', '', '', '', '', ''],
      ['toaster.png', 'Toaster', 'Two slots', 'Crumb tray', '', '', '', ''],
    ]);
    const config = testConfig({
      ...RUN,
      font_title_path: 'fonts/Missing-Bold.ttf',
      font_body_path: 'fonts/Missing-Regular.ttf',
      music_path: 'audio/missing.mp3',
      remove_bg: true,
    }, dir);
    const { encode, calls } = fakeEncoder();

    const report = await runPipeline(config, { renderText: blockRenderer, encode });

    expect(report.slideCount).toBe(2);
    expect(report.frameCount).toBe(20);
    expect(report.durationSeconds).toBe(2);
    expect(report.sizeBytes).toBe(20 * FRAME_BYTES);
    expect(report.outputPath).toBe(path.join(dir, 'out', 'promo.mp4'));
    expect(report.suggestedBitrate).toBeUndefined();
    expect(report.warnings).toEqual([
      { rowNumber: 3, imageFilename: 'barcode_kettle.png', reason: 'filename matches excluded pattern "barcode"' },
    ]);

    expect(encode).toHaveBeenCalledTimes(1);
    expect(calls[0]).toMatchObject({ width: 96, height: 64, fps: 10, durationSeconds: 2 });
    expect(calls[0]?.musicPath).toBeUndefined();
  });

  it('drops rows whose image cannot be decoded', async () => {
    await writeWorkbook(path.join(dir, 'sheet.xlsx'), [
      SHEET_HEADER,
      ['broken.png', 'Broken', '', '', '', '', '', ''],
      ['toaster.png', 'Toaster', '', '', '', '', '', ''],
    ]);
    const { encode } = fakeEncoder();

    const report = await runPipeline(testConfig({ ...RUN, remove_bg: false }, dir), { renderText: blockRenderer, encode });

    expect(report.slideCount).toBe(1);
    expect(report.frameCount).toBe(10);
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatchObject({ rowNumber: 2, imageFilename: 'broken.png' });
    expect(report.warnings[0]?.reason).toMatch(/^image unreadable \(/);
  });

  it('drops a truncated image whose header still reads', async () => {
    await writeTruncatedPng(path.join(dir, 'images', 'trunc.png'));
    await writeWorkbook(path.join(dir, 'sheet.xlsx'), [
      SHEET_HEADER,
      ['trunc.png', 'Truncated', '', '', '', '', '', ''],
      ['kettle.png', 'Kettle', '', '', '', '', '', ''],
    ]);
    const { encode } = fakeEncoder();

    const report = await runPipeline(testConfig({ ...RUN, remove_bg: false }, dir), { renderText: blockRenderer, encode });

    expect(report.slideCount).toBe(1);
    expect(report.frameCount).toBe(10);
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatchObject({ rowNumber: 2, imageFilename: 'trunc.png' });
    expect(report.warnings[0]?.reason).toMatch(/^image unreadable \(/);
  });

  it('fills max_slides with later valid rows when an earlier image is unreadable', async () => {
    await writePng(path.join(dir, 'images', 'blender.png'), 50, 50, '#0000ff');
    await writeWorkbook(path.join(dir, 'sheet.xlsx'), [
      SHEET_HEADER,
      ['broken.png', 'Broken', '', '', '', '', '', ''],
      ['kettle.png', 'Kettle', '', '', '', '', '', ''],
      ['toaster.png', 'Toaster', '', '', '', '', '', ''],
      ['blender.png', 'Blender', '', '', '', '', '', ''],
    ]);
    const { encode } = fakeEncoder();

    const report = await runPipeline(
      testConfig({ ...RUN, remove_bg: false, max_slides: 3 }, dir),
      { renderText: blockRenderer, encode },
    );

    expect(report.slideCount).toBe(3);
    expect(report.frameCount).toBe(30);
    expect(report.warnings.map(w => w.imageFilename)).toEqual(['broken.png']);
  });

  it('fails before encoding when no slide survives filtering', async () => {
    await writeWorkbook(path.join(dir, 'sheet.xlsx'), [
      SHEET_HEADER,
      ['kettle.png', 'Kettle', '', '', '', '', '', 'yes'],
      ['qr_code.png', 'QR', '', '', '', '', '', ''],
    ]);
    const config = testConfig({ ...RUN, remove_bg: false }, dir);
    const { encode } = fakeEncoder();

    await expect(runPipeline(config, { renderText: blockRenderer, encode })).rejects.toThrow(FatalError);
    await expect(runPipeline(config, { renderText: blockRenderer, encode })).rejects.toThrow(/^No valid slides/);
    expect(encode).not.toHaveBeenCalled();
    expect(fs.existsSync(config.outputPath)).toBe(false);
  });

  it('suggests a bitrate when the output misses the size window', async () => {
    await writeWorkbook(path.join(dir, 'sheet.xlsx'), [
      SHEET_HEADER,
      ['kettle.png', 'Kettle', '', '', '', '', '', ''],
    ]);
    const { encode } = fakeEncoder();

    const report = await runPipeline(
      testConfig({ ...RUN, remove_bg: false, target_size_mb: { min: 9, max: 10 } }, dir),
      { renderText: blockRenderer, encode },
    );

    // 10 frames × 24576 bytes = 0.234375 MiB; 4M × 9.5 / 0.234375 = 162.13M
    expect(report.sizeBytes).toBe(10 * FRAME_BYTES);
    expect(report.suggestedBitrate).toBe(162_100_000);
  });
});
