/**
 * Slide layout geometry. Everything here is pure so the composition contract
 * can be checked without rasterising anything.
 *
 *   ┌────────────── W ──────────────┐
 *   │ title            │      [logo]│
 *   │ ➤ bullet         │  ┌───────┐ │
 *   │ ➤ bullet         │  │product│ │
 *   │ ➤ bullet         │  └───────┘ │
 *   │ [ribbon]         │            │
 *   └──────────────────┴────────────┘
 *      left panel         product box
 */
import type { Config, TitleCaseStyle } from '../config.js';
import type { Rect, Size } from '../media/raster.js';
import type { SlideRecord } from './rows.js';

export const ARROW_GLYPH = '➤';
export const RIBBON_SEPARATOR = ' • ';
export const RIBBON_PADDING_PX = 12;
export const RIBBON_MIN_HEIGHT_PX = 64;
export const RIBBON_WIDTH_FRACTION = 0.28;
/** 122/255 black */
export const RIBBON_ALPHA = 122 / 255;
/** Gap between the arrow glyph and the bullet text */
export const BULLET_GAP_PX = 18;

export interface SlideLayout {
  canvas: Size;
  /** Full-height left column that slides in from the left */
  textPanel: Rect;
  /** Padded region inside the panel where text is drawn, in panel coordinates */
  textArea: Rect;
  /** Right-column box the prepared image fills */
  productBox: Rect;
  title: string;
  bullets: string[];
  /** Ribbon text, or null when the slide has no ribbon */
  ribbonText: string | null;
}

// ── Text transforms ───────────────────────────────────────────────────────────

export function applyTitleCase(title: string, style: TitleCaseStyle): string {
  const s = title.trim();
  if (style === 'upper') return s.toUpperCase();
  if (style === 'sentence') return s.slice(0, 1).toUpperCase() + s.slice(1);
  return s;
}

/** Keep at most `maxWords` whitespace-separated words. */
export function clampWords(text: string, maxWords: number): string {
  return text.split(/\s+/).filter(Boolean).slice(0, maxWords).join(' ');
}

/**
 * Ribbon content: capacity then dimensions, blanks dropped.
 * Null when both are empty or dimension marking is off.
 */
export function ribbonText(
  record: Pick<SlideRecord, 'capacityText' | 'dimensionsText'>,
  dimensionMarking: boolean,
): string | null {
  if (!dimensionMarking) return null;
  const parts = [record.capacityText, record.dimensionsText].map(s => s.trim()).filter(Boolean);
  return parts.length > 0 ? parts.join(RIBBON_SEPARATOR) : null;
}

// ── Geometry ─────────────────────────────────────────────────────────────────

export function productBox(config: Pick<Config, 'frame' | 'leftPanelRatio' | 'safeAreaInsetPx'>): Rect {
  const { width: W, height: H } = config.frame;
  const panelWidth = Math.round(W * config.leftPanelRatio);
  const inset = config.safeAreaInsetPx;
  return {
    x: panelWidth + inset,
    y: inset,
    width: Math.max(1, W - panelWidth - inset * 2),
    height: Math.max(1, H - inset * 2),
  };
}

/**
 * Logo rectangle at its native aspect ratio. The logo is only ever scaled
 * down: to the configured footprint fractions, and so that it stays inside
 * the margin on every side.
 */
export function placeLogo(canvas: Size, logo: Size, options: Config['logo']): Rect {
  const margin = options.marginPx;
  const maxWidth = Math.min(canvas.width * options.maxWidthFraction, canvas.width - margin * 2);
  const maxHeight = Math.min(canvas.height * options.maxHeightFraction, canvas.height - margin * 2);
  const scale = Math.min(1, maxWidth / logo.width, maxHeight / logo.height);

  const width = Math.max(1, Math.floor(logo.width * scale));
  const height = Math.max(1, Math.floor(logo.height * scale));
  const x = options.position === 'top_right' ? canvas.width - width - margin : margin;
  return { x, y: margin, width, height };
}

/** Ribbon box sized to its rendered text, anchored bottom-left inside the safe inset. */
export function ribbonRect(canvas: Size, insetPx: number, text: Size): Rect {
  const maxWidth = Math.max(1, canvas.width - insetPx * 2);
  const width = Math.min(
    maxWidth,
    Math.max(Math.round(canvas.width * RIBBON_WIDTH_FRACTION), text.width + RIBBON_PADDING_PX * 2),
  );
  const height = Math.max(RIBBON_MIN_HEIGHT_PX, text.height + RIBBON_PADDING_PX * 2);
  return { x: insetPx, y: canvas.height - height - insetPx, width, height };
}

export function planSlideLayout(
  record: Pick<SlideRecord, 'title' | 'bullets' | 'capacityText' | 'dimensionsText'>,
  config: Config,
): SlideLayout {
  const { width: W, height: H } = config.frame;
  const panelWidth = Math.round(W * config.leftPanelRatio);
  const pad = config.edgePaddingPx;

  return {
    canvas: { width: W, height: H },
    textPanel: { x: 0, y: 0, width: panelWidth, height: H },
    textArea: {
      x: pad,
      y: pad,
      width: Math.max(1, panelWidth - pad * 2),
      height: Math.max(1, H - pad * 2),
    },
    productBox: productBox(config),
    title: applyTitleCase(record.title, config.titleCaseStyle),
    bullets: record.bullets
      .map(b => clampWords(b, config.maxWordsPerBullet))
      .filter(Boolean),
    ribbonText: ribbonText(record, config.dimensionMarking),
  };
}
