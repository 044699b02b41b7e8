#!/usr/bin/env tsx
/**
 * End-to-end smoke test for the slideshow pipeline.
 * Renders a short two-slide video from generated images with the real ffmpeg,
 * so it needs no inputs of its own. rembg is not required.
 * Run: npm run smoke-test
 *
 * Exit codes:
 *   0 — all tests pass
 *   1 — one or more tests failed
 */
import { execFileSync } from 'child_process';
import { existsSync, mkdirSync, mkdtempSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';

// ── Import project modules ────────────────────────────────────────────────────
// These imports also validate that the TypeScript build is coherent
import { env, parseConfig, type Config } from '../src/config.js';
import { renderPangoText } from '../src/media/text.js';
import { resolveFont } from '../src/media/fonts.js';
import { probeDuration } from '../src/media/ffmpeg.js';
import { runPipeline, type RunReport } from '../src/pipeline/index.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Test runner ───────────────────────────────────────────────────────────────

let allPass = true;
let testNumber = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  testNumber++;
  const label = `Test ${testNumber.toString().padStart(2, ' ')}: ${name}`;
  process.stdout.write(`  ${label}… `);
  try {
    await fn();
    console.log(`${GREEN}PASS${RESET}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.log(`${RED}FAIL${RESET}`);
    console.error(`           ${YELLOW}${msg}${RESET}`);
    allPass = false;
  }
}

// ── Fixtures ──────────────────────────────────────────────────────────────────

const workDir = mkdtempSync(join(tmpdir(), 'slideshow-smoke-'));
const imagesDir = join(workDir, 'images');

async function writeFixtures(): Promise<void> {
  mkdirSync(imagesDir, { recursive: true });
  await sharp({ create: { width: 120, height: 90, channels: 3, background: '#3a7bd5' } })
    .png()
    .toFile(join(imagesDir, 'kettle.png'));
  await sharp({ create: { width: 800, height: 600, channels: 3, background: '#d53a7b' } })
    .jpeg()
    .toFile(join(imagesDir, 'toaster.jpg'));

  writeFileSync(join(workDir, 'products.csv'), [
    'image_filename,title,bullet1,bullet2,bullet3,dimensions_text,capacity_text,skip',
    'kettle.png,Electric Kettle,Boils in minutes,Auto shut off,,20 x 15 cm,1.7 L,',
    'toaster.jpg,Two Slice Toaster,Six browning levels,,,30 x 18 cm,,',
    'barcode_1.png,Barcode sheet,,,,,,',
  ].join('\n'));
}

function smokeConfig(): Config {
  return parseConfig({
    spreadsheet_path: 'products.csv',
    images_folder: 'images',
    output_path: 'out/smoke.mp4',
    frame_width: 640,
    frame_height: 320,
    fps: 10,
    slide_duration_seconds: 1.5,
    target_bitrate: '800k',
    encoder_preset: 'ultrafast',
    remove_bg: false,
  }, workDir);
}

// ── Run tests ─────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Promo Slideshow — Smoke Tests ===${RESET}\n`);

await test('FFmpeg installed and accessible', async () => {
  try {
    const output = execFileSync(env.FFMPEG_PATH, ['-version'], { encoding: 'utf-8', timeout: 10_000 });
    if (!output.toLowerCase().includes('ffmpeg version')) {
      throw new Error('Unexpected ffmpeg -version output');
    }
  } catch (err) {
    if (err instanceof Error && err.message.includes('ENOENT')) {
      throw new Error('ffmpeg not found — install with: sudo apt install ffmpeg (Linux) or brew install ffmpeg (macOS)');
    }
    if (err instanceof Error && err.message.includes('Unexpected')) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`ffmpeg -version failed: ${msg}`);
  }
});

await test('Text rendering with the built-in font', async () => {
  const raster = await renderPangoText({
    text: 'Smoke test ➤',
    font: resolveFont({ sizePx: 36 }, 'bold', 'smoke'),
    color: '#000000',
    maxWidth: 600,
  });
  if (!raster || raster.width === 0 || raster.height === 0) {
    throw new Error('Pango produced no pixels — is libvips built with text support?');
  }
});

let report: RunReport | undefined;

await test('Pipeline renders a two-slide video', async () => {
  await writeFixtures();
  report = await runPipeline(smokeConfig());
  if (report.slideCount !== 2) throw new Error(`expected 2 slides, got ${report.slideCount}`);
  if (report.frameCount !== 30) throw new Error(`expected 30 frames, got ${report.frameCount}`);
  if (report.warnings.length !== 1) {
    throw new Error(`expected the barcode row to be dropped, got ${JSON.stringify(report.warnings)}`);
  }
});

await test('Output file is a playable MP4 of the right length', async () => {
  if (!report) throw new Error('no report — previous test failed');
  if (!existsSync(report.outputPath)) throw new Error(`missing output ${report.outputPath}`);
  if (statSync(report.outputPath).size === 0) throw new Error('output file is empty');
  if (existsSync(`${report.outputPath}.partial.mp4`)) throw new Error('partial file left behind');

  const duration = probeDuration(report.outputPath);
  if (duration > 0 && Math.abs(duration - 3) > 0.25) {
    throw new Error(`expected ~3s of video, ffprobe says ${duration}s`);
  }
});

rmSync(workDir, { recursive: true, force: true });

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (allPass) {
  console.log(`${GREEN}${BOLD}All ${testNumber} smoke tests passed — ready to render.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- config.yaml${RESET}\n`);
} else {
  console.error(`${RED}${BOLD}One or more smoke tests failed — fix issues before rendering.${RESET}`);
  console.error(`${YELLOW}Re-run after fixing: npm run smoke-test${RESET}\n`);
  process.exit(1);
}
