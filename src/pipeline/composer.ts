/**
 * Slide Composer — builds the layers of one slide.
 *
 * A slide is kept as separate rasters so the animator can move the text panel
 * and product independently while the stage and overlay stay put:
 *
 *   stage (background) → textPanel → product → overlay (ribbon + logo)
 */
import * as fs from 'fs';
import sharp, { type OverlayOptions } from 'sharp';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { resolveFont, type ResolvedFont } from '../media/fonts.js';
import { renderPangoText, type TextRenderer } from '../media/text.js';
import type { PreparedImage } from '../media/images.js';
import {
  blankCanvas,
  clippedOverlay,
  fromRaster,
  hexToRgba,
  solidRaster,
  toRaster,
  type Raster,
  type Rect,
  type Size,
} from '../media/raster.js';
import {
  ARROW_GLYPH,
  BULLET_GAP_PX,
  RIBBON_ALPHA,
  RIBBON_PADDING_PX,
  placeLogo,
  planSlideLayout,
  ribbonRect,
  type SlideLayout,
} from './layout.js';
import type { SlideRecord } from './rows.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Layer {
  raster: Raster;
  /** Resting position on the canvas */
  x: number;
  y: number;
}

/** Per-run assets shared by every slide. */
export interface SlideAssets {
  fonts: { title: ResolvedFont; body: ResolvedFont; ribbon: ResolvedFont };
  /** Logo already scaled to its placement, or null when there is no usable logo */
  logo: Layer | null;
}

export interface ComposedSlide {
  width: number;
  height: number;
  stage: Raster;
  textPanel: Layer;
  product: Layer;
  /** Static ribbon + logo layer; null when the slide has neither */
  overlay: Raster | null;
  /** The flattened frame with no entrance offset */
  resting: Buffer;
  layout: SlideLayout;
  hasRibbon: boolean;
  hasLogo: boolean;
}

// ── Assets ───────────────────────────────────────────────────────────────────

async function loadLogo(config: Config): Promise<Layer | null> {
  const logoPath = config.logo.path;
  if (!logoPath) return null;
  if (!fs.existsSync(logoPath)) {
    logger.info('Composer: logo not found — slides will have no logo', { path: logoPath });
    return null;
  }

  try {
    const meta = await sharp(logoPath).metadata();
    if (!meta.width || !meta.height) throw new Error('unknown dimensions');

    const rect = placeLogo(config.frame, { width: meta.width, height: meta.height }, config.logo);
    const raster = await toRaster(
      sharp(logoPath).resize(rect.width, rect.height, { fit: 'fill', kernel: sharp.kernel.lanczos3 }),
    );
    logger.debug('Composer: logo placed', { ...rect, native: `${meta.width}x${meta.height}` });
    return { raster, x: rect.x, y: rect.y };
  } catch (err) {
    logger.info('Composer: logo unreadable — slides will have no logo', { path: logoPath, error: errorMessage(err) });
    return null;
  }
}

/** Resolve fonts and load the logo once per run. */
export async function loadSlideAssets(config: Config): Promise<SlideAssets> {
  return {
    fonts: {
      title:  resolveFont(config.fonts.title, 'bold', 'title'),
      body:   resolveFont(config.fonts.body, 'normal', 'body'),
      ribbon: resolveFont(config.fonts.ribbon, 'normal', 'ribbon'),
    },
    logo: await loadLogo(config),
  };
}

// ── Layers ───────────────────────────────────────────────────────────────────

async function flatten(size: Size, layers: OverlayOptions[]): Promise<Raster> {
  return toRaster(blankCanvas(size.width, size.height).composite(layers));
}

function place(layers: OverlayOptions[], raster: Raster, x: number, y: number, canvas: Size): void {
  const entry = clippedOverlay(raster, x, y, canvas);
  if (entry) layers.push(entry);
}

async function buildTextPanel(
  layout: SlideLayout,
  assets: SlideAssets,
  config: Config,
  renderText: TextRenderer,
): Promise<Raster> {
  const panel: Size = { width: layout.textPanel.width, height: layout.textPanel.height };
  const area = layout.textArea;
  const spacing = config.lineSpacingPx;
  const layers: OverlayOptions[] = [];
  let y = area.y;

  const title = await renderText({
    text: layout.title,
    font: assets.fonts.title,
    color: config.colors.text,
    maxWidth: area.width,
  });
  if (title) {
    place(layers, title, area.x, y, panel);
    y += title.height + spacing;
  }

  for (const bullet of layout.bullets) {
    const arrow = await renderText({
      text: ARROW_GLYPH,
      font: assets.fonts.body,
      color: config.colors.bullet,
      maxWidth: area.width,
    });
    const arrowWidth = arrow ? arrow.width : 0;
    const textX = area.x + arrowWidth + BULLET_GAP_PX;
    const body = await renderText({
      text: bullet,
      font: assets.fonts.body,
      color: config.colors.text,
      maxWidth: Math.max(1, area.x + area.width - textX),
    });

    if (arrow) place(layers, arrow, area.x, y, panel);
    if (body) place(layers, body, textX, y, panel);
    y += Math.max(arrow?.height ?? 0, body?.height ?? 0) + spacing;
  }

  return flatten(panel, layers);
}

async function buildOverlay(
  layout: SlideLayout,
  assets: SlideAssets,
  config: Config,
  renderText: TextRenderer,
): Promise<{ overlay: Raster | null; hasRibbon: boolean }> {
  const canvas = layout.canvas;
  const inset = config.safeAreaInsetPx;
  const layers: OverlayOptions[] = [];
  let hasRibbon = false;

  if (layout.ribbonText) {
    const text = await renderText({
      text: layout.ribbonText,
      font: assets.fonts.ribbon,
      color: config.colors.ribbonText,
      maxWidth: Math.max(1, canvas.width - inset * 2 - RIBBON_PADDING_PX * 2),
    });
    const rect: Rect = ribbonRect(canvas, inset, text ?? { width: 0, height: 0 });
    const box = await solidRaster(rect.width, rect.height, { r: 0, g: 0, b: 0, alpha: RIBBON_ALPHA });
    place(layers, box, rect.x, rect.y, canvas);
    if (text) {
      place(layers, text, rect.x + RIBBON_PADDING_PX, rect.y + Math.round((rect.height - text.height) / 2), canvas);
    }
    hasRibbon = true;
  }

  if (assets.logo) {
    place(layers, assets.logo.raster, assets.logo.x, assets.logo.y, canvas);
  }

  if (layers.length === 0) return { overlay: null, hasRibbon };
  return { overlay: await flatten(canvas, layers), hasRibbon };
}

// ── Frames ───────────────────────────────────────────────────────────────────

/**
 * Composite a slide with the text panel shifted by `textDx` and the product
 * by `productDx` pixels. Layers pushed off the canvas are clipped.
 */
export async function flattenFrame(
  slide: Pick<ComposedSlide, 'width' | 'height' | 'stage' | 'textPanel' | 'product' | 'overlay'>,
  textDx: number,
  productDx: number,
): Promise<Buffer> {
  const canvas: Size = { width: slide.width, height: slide.height };
  const layers: OverlayOptions[] = [];
  place(layers, slide.textPanel.raster, slide.textPanel.x + textDx, slide.textPanel.y, canvas);
  place(layers, slide.product.raster, slide.product.x + productDx, slide.product.y, canvas);
  if (slide.overlay) place(layers, slide.overlay, 0, 0, canvas);

  const frame = await toRaster(fromRaster(slide.stage).composite(layers));
  return frame.data;
}

// ── Public API ───────────────────────────────────────────────────────────────

export async function composeSlide(
  record: SlideRecord,
  prepared: PreparedImage,
  assets: SlideAssets,
  config: Config,
  renderText: TextRenderer = renderPangoText,
): Promise<ComposedSlide> {
  const layout = planSlideLayout(record, config);
  const { width, height } = layout.canvas;

  const stage = await solidRaster(width, height, hexToRgba(config.colors.background));
  const textPanel: Layer = {
    raster: await buildTextPanel(layout, assets, config, renderText),
    x: layout.textPanel.x,
    y: layout.textPanel.y,
  };

  // The preparer returns exactly the box size; centre anyway in case it did not
  const box = layout.productBox;
  const product: Layer = {
    raster: prepared,
    x: box.x + Math.round((box.width - prepared.width) / 2),
    y: box.y + Math.round((box.height - prepared.height) / 2),
  };

  const { overlay, hasRibbon } = await buildOverlay(layout, assets, config, renderText);

  const parts = { width, height, stage, textPanel, product, overlay };
  const resting = await flattenFrame(parts, 0, 0);

  logger.debug('Composer: slide composed', {
    rowNumber: record.rowNumber,
    bullets: layout.bullets.length,
    ribbon: hasRibbon,
    logo: assets.logo !== null,
  });

  return { ...parts, resting, layout, hasRibbon, hasLogo: assets.logo !== null };
}
