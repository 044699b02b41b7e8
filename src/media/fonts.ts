/**
 * Font resolution with fallback to the built-in Pango "sans" family.
 * A configured font that is missing or unreadable is never fatal.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { FontConfig } from '../config.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_FONT_FAMILY = 'sans';

export type FontWeight = 'normal' | 'bold';

export interface ResolvedFont {
  family: string;
  /** Font file to register with Pango; absent for the built-in family */
  fontfile?: string;
  sizePx: number;
  weight: FontWeight;
  /** True when the configured font could not be used */
  fallback: boolean;
}

export function isReadableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/** "fonts/Poppins-SemiBold.ttf" → "Poppins" */
export function familyFromFilename(filePath: string): string {
  const stem = path.basename(filePath, path.extname(filePath));
  return stem.split(/[-_]/)[0] || stem;
}

export function resolveFont(font: FontConfig, weight: FontWeight, role: string): ResolvedFont {
  if (font.path) {
    if (isReadableFile(font.path)) {
      return {
        family: font.family || familyFromFilename(font.path),
        fontfile: font.path,
        sizePx: font.sizePx,
        weight,
        fallback: false,
      };
    }
    logger.warn(`Fonts: ${role} font unreadable — using built-in ${DEFAULT_FONT_FAMILY}`, { path: font.path });
  }

  return {
    family: DEFAULT_FONT_FAMILY,
    sizePx: font.sizePx,
    weight,
    fallback: Boolean(font.path),
  };
}

/** Pango font description, e.g. "Poppins Bold 55px". */
export function fontDescription(font: ResolvedFont): string {
  return `${font.family}${font.weight === 'bold' ? ' Bold' : ''} ${font.sizePx}px`;
}
