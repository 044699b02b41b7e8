/**
 * Raw RGBA raster helpers shared by the preparer, composer and animator.
 */
import sharp, { type Sharp, type OverlayOptions } from 'sharp';

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Size {
  x: number;
  y: number;
}

/** A tightly packed 8-bit RGBA pixel buffer. */
export interface Raster {
  data: Buffer;
  width: number;
  height: number;
}

export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export const TRANSPARENT: Rgba = { r: 0, g: 0, b: 0, alpha: 0 };

/** "#RRGGBB" or "#RRGGBBAA" → sharp colour (alpha 0–1). */
export function hexToRgba(hex: string): Rgba {
  const h = hex.replace(/^#/, '');
  const channel = (i: number) => parseInt(h.slice(i, i + 2), 16);
  return {
    r: channel(0),
    g: channel(2),
    b: channel(4),
    alpha: h.length >= 8 ? channel(6) / 255 : 1,
  };
}

export async function toRaster(image: Sharp): Promise<Raster> {
  const { data, info } = await image.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== 4) {
    throw new Error(`Expected RGBA output, got ${info.channels} channels`);
  }
  return { data, width: info.width, height: info.height };
}

export function fromRaster(raster: Raster): Sharp {
  return sharp(raster.data, { raw: { width: raster.width, height: raster.height, channels: 4 } });
}

/** Composite entry for a raster placed at (left, top). */
export function rasterOverlay(raster: Raster, left: number, top: number): OverlayOptions {
  return {
    input: raster.data,
    raw: { width: raster.width, height: raster.height, channels: 4 },
    left: Math.round(left),
    top: Math.round(top),
  };
}

export function blankCanvas(width: number, height: number, background: Rgba = TRANSPARENT): Sharp {
  return sharp({ create: { width, height, channels: 4, background } });
}

export async function solidRaster(width: number, height: number, color: Rgba): Promise<Raster> {
  return toRaster(blankCanvas(width, height, color));
}

/** Read one pixel; handy for assertions and debugging. */
export function pixelAt(raster: Raster, x: number, y: number): [number, number, number, number] {
  const i = (y * raster.width + x) * 4;
  const d = raster.data;
  return [d[i] ?? 0, d[i + 1] ?? 0, d[i + 2] ?? 0, d[i + 3] ?? 0];
}

/** Copy a sub-rectangle out of a raster. The rectangle must lie inside it. */
export function cropRaster(raster: Raster, rect: Rect): Raster {
  const rowBytes = rect.width * 4;
  const out = Buffer.alloc(rowBytes * rect.height);
  for (let row = 0; row < rect.height; row++) {
    const start = ((rect.y + row) * raster.width + rect.x) * 4;
    raster.data.copy(out, row * rowBytes, start, start + rowBytes);
  }
  return { data: out, width: rect.width, height: rect.height };
}

/**
 * Composite entry for a layer at (left, top) on a canvas of `canvas` size,
 * clipped to the canvas. Returns null when nothing of the layer is visible.
 */
export function clippedOverlay(raster: Raster, left: number, top: number, canvas: Size): OverlayOptions | null {
  const x = Math.round(left);
  const y = Math.round(top);
  const x0 = Math.max(0, x);
  const y0 = Math.max(0, y);
  const x1 = Math.min(canvas.width, x + raster.width);
  const y1 = Math.min(canvas.height, y + raster.height);
  if (x1 <= x0 || y1 <= y0) return null;

  const fullyInside = x0 === x && y0 === y && x1 - x0 === raster.width && y1 - y0 === raster.height;
  const visible = fullyInside
    ? raster
    : cropRaster(raster, { x: x0 - x, y: y0 - y, width: x1 - x0, height: y1 - y0 });
  return rasterOverlay(visible, x0, y0);
}
