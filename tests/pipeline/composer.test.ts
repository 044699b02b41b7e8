import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { composeSlide, flattenFrame, loadSlideAssets, type SlideAssets } from '../../src/pipeline/composer.js';
import { pixelAt, type Raster } from '../../src/media/raster.js';
import type { PreparedImage } from '../../src/media/images.js';
import type { RawRunConfig } from '../../src/config.js';
import { blockRenderer, channelDiff, makeRecord, solid, tempDir, testConfig, writePng } from '../helpers.js';

const WHITE = [255, 255, 255, 255];
const BLACK = [0, 0, 0, 255];
const RED = [255, 0, 0, 255];
const BULLET = [120, 24, 90, 255];

// 200x100 canvas: text panel 100 wide, product box {110, 10, 80, 80}
const SMALL: Partial<RawRunConfig> = {
  frame_width: 200,
  frame_height: 100,
  edge_padding_px: 10,
  safe_area_inset_px: 10,
  title_font_size_px: 10,
  body_font_size_px: 10,
  ribbon_font_size_px: 12,
  remove_bg: false,
};

function redProduct(): PreparedImage {
  return { ...solid(80, 80, [255, 0, 0, 255]), scale: 1, upscaled: false, backgroundRemoved: false };
}

function frameRaster(data: Buffer): Raster {
  return { data, width: 200, height: 100 };
}

describe('composeSlide', () => {
  const config = testConfig(SMALL);
  let assets: SlideAssets;

  beforeAll(async () => {
    assets = await loadSlideAssets(config);
  });

  it('places the title, the product and the plain background', async () => {
    const slide = await composeSlide(makeRecord({ title: 'Kettle' }), redProduct(), assets, config, blockRenderer);
    const frame = frameRaster(slide.resting);

    expect(slide.product).toMatchObject({ x: 110, y: 10 });
    expect(slide.textPanel.raster.width).toBe(100);
    expect(slide.resting.length).toBe(200 * 100 * 4);
    expect(pixelAt(frame, 15, 15)).toEqual(BLACK);
    expect(pixelAt(frame, 150, 50)).toEqual(RED);
    expect(pixelAt(frame, 105, 95)).toEqual(WHITE);
  });

  it('draws each bullet as an arrow in the bullet colour followed by its text', async () => {
    const slide = await composeSlide(
      makeRecord({ title: 'Kettle', bullets: ['Fast boil'] }),
      redProduct(),
      assets,
      config,
      blockRenderer,
    );
    const frame = frameRaster(slide.resting);

    // title occupies y 10..19, so the bullet row starts at 10 + 10 + 10
    expect(pixelAt(frame, 12, 35)).toEqual(BULLET);
    expect(pixelAt(frame, 30, 35)).toEqual(WHITE);
    expect(pixelAt(frame, 40, 35)).toEqual(BLACK);
    expect(slide.hasRibbon).toBe(false);
    expect(slide.overlay).toBeNull();
  });

  it('adds a translucent ribbon bottom-left when capacity or dimensions are set', async () => {
    const slide = await composeSlide(
      makeRecord({ title: 'Kettle', capacityText: '1 L' }),
      redProduct(),
      assets,
      config,
      blockRenderer,
    );
    const frame = frameRaster(slide.resting);

    // ribbon rect {10, 26, 56, 64}; 122/255 black over white
    expect(slide.hasRibbon).toBe(true);
    expect(channelDiff(pixelAt(frame, 12, 80), [133, 133, 133, 255])).toBeLessThanOrEqual(2);
    // text block 30x12 at (22, 52)
    expect(pixelAt(frame, 25, 55)).toEqual(WHITE);
    expect(pixelAt(frame, 8, 80)).toEqual(WHITE);
    expect(pixelAt(frame, 67, 80)).toEqual(WHITE);
  });

  it('leaves the ribbon out when dimension marking is off', async () => {
    const unmarked = testConfig({ ...SMALL, dimension_marking: false });
    const slide = await composeSlide(
      makeRecord({ capacityText: '1 L', dimensionsText: '20 x 15 cm' }),
      redProduct(),
      assets,
      unmarked,
      blockRenderer,
    );
    expect(slide.hasRibbon).toBe(false);
    expect(pixelAt(frameRaster(slide.resting), 12, 80)).toEqual(WHITE);
  });

  it('flattenFrame clips layers pushed off the canvas', async () => {
    const slide = await composeSlide(makeRecord({ title: 'Kettle' }), redProduct(), assets, config, blockRenderer);
    const frame = frameRaster(await flattenFrame(slide, -100, 90));

    expect(pixelAt(frame, 15, 15)).toEqual(WHITE);
    expect(pixelAt(frame, 150, 50)).toEqual(WHITE);
  });

  it('flattenFrame with no offsets reproduces the resting frame', async () => {
    const slide = await composeSlide(makeRecord({ title: 'Kettle' }), redProduct(), assets, config, blockRenderer);
    expect((await flattenFrame(slide, 0, 0)).equals(slide.resting)).toBe(true);
  });
});

describe('logo', () => {
  let dir: string;

  beforeAll(() => {
    dir = tempDir();
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('scales the logo into the top-right footprint', async () => {
    const logoPath = await writePng(path.join(dir, 'logo.png'), 400, 100, '#0000ff');
    const config = testConfig({ ...SMALL, logo_path: logoPath });
    const assets = await loadSlideAssets(config);

    // maxW = 0.18 × 200 = 36 → 36x9 at (200 - 36 - 28, 28)
    expect(assets.logo).toMatchObject({ x: 136, y: 28 });
    expect(assets.logo?.raster.width).toBe(36);
    expect(assets.logo?.raster.height).toBe(9);

    const slide = await composeSlide(makeRecord(), redProduct(), assets, config, blockRenderer);
    expect(slide.hasLogo).toBe(true);
    expect(channelDiff(pixelAt(frameRaster(slide.resting), 150, 30), [0, 0, 255, 255])).toBeLessThanOrEqual(2);
  });

  it('renders without a logo when the file is missing', async () => {
    const config = testConfig({ ...SMALL, logo_path: path.join(dir, 'missing.png') });
    const assets = await loadSlideAssets(config);
    expect(assets.logo).toBeNull();

    const slide = await composeSlide(makeRecord(), redProduct(), assets, config, blockRenderer);
    expect(slide.hasLogo).toBe(false);
  });

  it('renders without a logo when the file is not an image', async () => {
    const broken = path.join(dir, 'broken.png');
    fs.writeFileSync(broken, 'not a png');
    const assets = await loadSlideAssets(testConfig({ ...SMALL, logo_path: broken }));
    expect(assets.logo).toBeNull();
  });
});
