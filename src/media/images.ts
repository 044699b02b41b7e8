/**
 * Image Preparer — loads a product image and returns an RGBA raster at exactly
 * the right-column size.
 *
 * Order: auto-orient → blur screening (warn only) → optional background
 * removal → fit into the column box (Lanczos). Images smaller than the box are
 * upscaled; larger ones are only ever downscaled.
 */
import sharp from 'sharp';
import type { Config, ImageFit } from '../config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { removeBackground, type BackgroundRemover } from './background.js';
import { TRANSPARENT, type Raster, type Size } from './raster.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PreparedImage extends Raster {
  /** Scale applied to the source; > 1 means the image was upscaled */
  scale: number;
  upscaled: boolean;
  backgroundRemoved: boolean;
  /** Laplacian variance of the source, when blur screening ran */
  blurVariance?: number;
}

export interface FitResult {
  scale: number;
  upscaled: boolean;
  /** Size of the scaled source before cropping (cover) or letterboxing (contain) */
  scaledWidth: number;
  scaledHeight: number;
}

export type PrepareOptions = Pick<Config, 'imageFit' | 'removeBackground' | 'blurCheck' | 'blurVarianceThreshold'> & {
  remover: BackgroundRemover;
};

// ── Geometry ─────────────────────────────────────────────────────────────────

/**
 * Scale factor used to fit a `source` image into `box`.
 * cover: fills the box (cropping the overflow); contain: fits inside it.
 */
export function fitImage(source: Size, box: Size, mode: ImageFit): FitResult {
  const sx = box.width / source.width;
  const sy = box.height / source.height;
  const scale = mode === 'cover' ? Math.max(sx, sy) : Math.min(sx, sy);
  return {
    scale,
    upscaled: scale > 1,
    scaledWidth: Math.max(1, Math.round(source.width * scale)),
    scaledHeight: Math.max(1, Math.round(source.height * scale)),
  };
}

// ── Blur screening ───────────────────────────────────────────────────────────

/**
 * Variance of the 4-neighbour Laplacian over interior pixels. Reads the first
 * channel of each pixel. Low values mean a soft/blurry image.
 */
export function laplacianVariance(data: Uint8Array, width: number, height: number, channels = 1): number {
  if (width < 3 || height < 3) return 0;

  const at = (x: number, y: number) => data[(y * width + x) * channels] ?? 0;
  let sum = 0;
  let sumSq = 0;
  let n = 0;

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const lap = 4 * at(x, y) - at(x - 1, y) - at(x + 1, y) - at(x, y - 1) - at(x, y + 1);
      sum += lap;
      sumSq += lap * lap;
      n++;
    }
  }

  const mean = sum / n;
  return sumSq / n - mean * mean;
}

async function measureBlur(source: Buffer): Promise<number> {
  const { data, info } = await sharp(source)
    .removeAlpha()
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });
  return laplacianVariance(data, info.width, info.height, info.channels);
}

// ── Screening ────────────────────────────────────────────────────────────────

/**
 * Decode every pixel of an image. Resolves to a reason when the file cannot
 * be used, or null when it decodes cleanly. A header read alone misses
 * truncated files.
 */
export async function screenImage(imagePath: string): Promise<string | null> {
  try {
    const stats = await sharp(imagePath).stats();
    if (stats.channels.length === 0) return 'image unreadable (no channels)';
    return null;
  } catch (err) {
    return `image unreadable (${errorMessage(err)})`;
  }
}

// ── Public API ───────────────────────────────────────────────────────────────

export async function prepareImage(
  imagePath: string,
  box: Size,
  options: PrepareOptions,
): Promise<PreparedImage> {
  const label = imagePath;

  // Auto-orient once so every later step sees upright pixels
  const source = await sharp(imagePath).rotate().png().toBuffer();

  let blurVariance: number | undefined;
  if (options.blurCheck) {
    blurVariance = await measureBlur(source);
    if (blurVariance < options.blurVarianceThreshold) {
      logger.warn('Images: image looks blurry — keeping it, consider replacing', {
        image: label,
        variance: Number(blurVariance.toFixed(1)),
        threshold: options.blurVarianceThreshold,
      });
    }
  }

  let working = source;
  let backgroundRemoved = false;
  if (options.removeBackground && options.remover.available) {
    const matted = await removeBackground(source, options.remover, label);
    if (matted) {
      working = matted;
      backgroundRemoved = true;
    }
  }

  const meta = await sharp(working).metadata();
  if (!meta.width || !meta.height) {
    throw new Error(`Images: could not read dimensions of ${label}`);
  }

  const fit = fitImage({ width: meta.width, height: meta.height }, box, options.imageFit);

  const { data, info } = await sharp(working)
    .ensureAlpha()
    .resize(box.width, box.height, {
      fit: options.imageFit,
      position: 'centre',
      kernel: sharp.kernel.lanczos3,
      background: TRANSPARENT,
    })
    .raw()
    .toBuffer({ resolveWithObject: true });

  logger.debug('Images: prepared', {
    image: label,
    source: `${meta.width}x${meta.height}`,
    box: `${box.width}x${box.height}`,
    scale: Number(fit.scale.toFixed(3)),
    upscaled: fit.upscaled,
    backgroundRemoved,
  });

  return {
    data,
    width: info.width,
    height: info.height,
    scale: fit.scale,
    upscaled: fit.upscaled,
    backgroundRemoved,
    blurVariance,
  };
}
