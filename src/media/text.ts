/**
 * Text rasterisation. The composer only depends on the TextRenderer type, so
 * tests and alternate back ends can swap the Pango implementation out.
 */
import sharp from 'sharp';
import { fontDescription, type ResolvedFont } from './fonts.js';
import { toRaster, type Raster } from './raster.js';

export interface TextBlock {
  text: string;
  font: ResolvedFont;
  /** "#RRGGBB" or "#RRGGBBAA" */
  color: string;
  /** Wrap width in pixels */
  maxWidth: number;
}

/** Rasterise a block of text; null for blank text. */
export type TextRenderer = (block: TextBlock) => Promise<Raster | null>;

const MARKUP_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeMarkup(s: string): string {
  return s.replace(/[&<>"']/g, ch => MARKUP_ESCAPES[ch] ?? ch);
}

/** Pango span attributes for a hex colour, splitting out the alpha byte. */
export function colorAttributes(hex: string): string {
  const h = hex.replace(/^#/, '');
  const rgb = `#${h.slice(0, 6)}`;
  if (h.length < 8) return `foreground="${rgb}"`;
  const alphaPercent = Math.round((parseInt(h.slice(6, 8), 16) / 255) * 100);
  return `foreground="${rgb}" fgalpha="${alphaPercent}%"`;
}

export function toMarkup(block: Pick<TextBlock, 'text' | 'color'>): string {
  return `<span ${colorAttributes(block.color)}>${escapeMarkup(block.text)}</span>`;
}

export const renderPangoText: TextRenderer = async (block) => {
  if (!block.text.trim()) return null;
  return toRaster(sharp({
    text: {
      text: toMarkup(block),
      font: fontDescription(block.font),
      fontfile: block.font.fontfile,
      width: Math.max(1, Math.floor(block.maxWidth)),
      wrap: 'word',
      rgba: true,
    },
  }));
};
