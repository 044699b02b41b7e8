import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import ExcelJS from 'exceljs';
import sharp from 'sharp';
import { parseConfig, type Config, type RawRunConfig } from '../src/config.js';
import { hexToRgba, type Raster } from '../src/media/raster.js';
import type { TextRenderer } from '../src/media/text.js';
import type { SlideRecord } from '../src/pipeline/rows.js';

export function tempDir(prefix = 'slideshow-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(overrides: Partial<RawRunConfig> = {}, baseDir = '/tmp/slideshow-test'): Config {
  return parseConfig({ spreadsheet_path: 'sheet.xlsx', images_folder: 'images', ...overrides }, baseDir);
}

export function makeRecord(overrides: Partial<SlideRecord> = {}): SlideRecord {
  return {
    rowNumber: 2,
    imageFilename: 'kettle.png',
    imagePath: '/images/kettle.png',
    title: 'Electric Kettle',
    bullets: [],
    dimensionsText: '',
    capacityText: '',
    skip: false,
    ...overrides,
  };
}

export function solid(width: number, height: number, rgba: [number, number, number, number]): Raster {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = rgba[0];
    data[i + 1] = rgba[1];
    data[i + 2] = rgba[2];
    data[i + 3] = rgba[3];
  }
  return { data, width, height };
}

/**
 * Renders each text block as an opaque box in its colour: 10px per character
 * (capped at the wrap width) and as tall as the font size.
 */
export const blockRenderer: TextRenderer = async (block) => {
  if (!block.text.trim()) return null;
  const { r, g, b } = hexToRgba(block.color);
  const width = Math.max(1, Math.min(Math.floor(block.maxWidth), block.text.length * 10));
  return solid(width, block.font.sizePx, [r, g, b, 255]);
};

export async function writePng(filePath: string, width: number, height: number, color = '#ff0000'): Promise<string> {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await sharp({ create: { width, height, channels: 3, background: color } }).png().toFile(filePath);
  return filePath;
}

/** An uncompressed PNG cut off partway through its pixel data; the header still reads. */
export async function writeTruncatedPng(filePath: string, width = 200, height = 200): Promise<string> {
  const full = await sharp({ create: { width, height, channels: 3, background: '#336699' } })
    .png({ compressionLevel: 0 })
    .toBuffer();
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, full.subarray(0, Math.floor(full.length / 3)));
  return filePath;
}

export async function writeWorkbook(filePath: string, rows: Array<Array<string | number>>): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Products');
  for (const row of rows) sheet.addRow(row);
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

export const SHEET_HEADER = [
  'image_filename', 'title', 'bullet1', 'bullet2', 'bullet3', 'dimensions_text', 'capacity_text', 'skip',
];

/** Largest per-channel difference between two RGBA pixels. */
export function channelDiff(actual: readonly number[], expected: readonly number[]): number {
  return Math.max(...expected.map((v, i) => Math.abs((actual[i] ?? 0) - v)));
}
