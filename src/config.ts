import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError, errorMessage } from './utils/errors.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // External tools
  FFMPEG_PATH:   z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:  z.string().min(1).default('ffprobe'),
  REMBG_PATH:    z.string().min(1).default('rembg'),

  // Local storage
  TEMP_DIR:      z.string().default('/tmp/promo-slideshow'),

  // Logging
  LOG_LEVEL:     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:    z.enum(['text', 'json']).default('text'),
});

const parsedEnv = EnvSchema.safeParse(process.env);
if (!parsedEnv.success) {
  const invalid = parsedEnv.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Invalid environment variables: ${invalid}`);
}

export const env = parsedEnv.data;

// ── Domain Types ─────────────────────────────────────────────────────────────

export const TITLE_CASE_STYLES = ['standard', 'upper', 'sentence'] as const;
export type TitleCaseStyle = typeof TITLE_CASE_STYLES[number];

export const LOGO_POSITIONS = ['top_right', 'top_left'] as const;
export type LogoPosition = typeof LOGO_POSITIONS[number];

export const ENCODER_PRESETS = [
  'ultrafast', 'superfast', 'veryfast', 'faster', 'fast',
  'medium', 'slow', 'slower', 'veryslow',
] as const;
export type EncoderPreset = typeof ENCODER_PRESETS[number];

export const IMAGE_FITS = ['cover', 'contain'] as const;
export type ImageFit = typeof IMAGE_FITS[number];

export const DEFAULT_SKIP_PATTERNS = ['barcode', 'qr', 'code128'] as const;

// ── Bitrate ───────────────────────────────────────────────────────────────────

const BITRATE_PATTERN = /^(\d+(?:\.\d+)?)\s*([kKmM]?)$/;

/** Parse an ffmpeg-style bitrate ("4M", "3500k", "800000") into bits per second. */
export function parseBitrate(raw: string | number): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw <= 0) throw new Error(`Invalid bitrate: ${raw}`);
    return Math.round(raw);
  }
  const match = raw.trim().match(BITRATE_PATTERN);
  if (!match?.[1]) throw new Error(`Invalid bitrate: "${raw}"`);
  const value = parseFloat(match[1]);
  const unit = (match[2] ?? '').toLowerCase();
  const multiplier = unit === 'm' ? 1_000_000 : unit === 'k' ? 1_000 : 1;
  const bps = Math.round(value * multiplier);
  if (bps <= 0) throw new Error(`Invalid bitrate: "${raw}"`);
  return bps;
}

/** Format bits per second as an ffmpeg kilobit argument, e.g. 4000000 → "4000k". */
export function formatBitrate(bps: number): string {
  return `${Math.round(bps / 1_000)}k`;
}

// ── Run Config Schema ─────────────────────────────────────────────────────────

const HEX_COLOR = /^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

const hexColor = (fallback: string) =>
  z.string().regex(HEX_COLOR, 'must be a #RRGGBB or #RRGGBBAA colour').default(fallback);

const optionalPath = z.string().trim().default('').transform(v => v || undefined);

const ColumnsSchema = z.object({
  image:      z.string().min(1).default('image_filename'),
  title:      z.string().min(1).default('title'),
  bullets:    z.array(z.string().min(1)).min(1).max(3).default(['bullet1', 'bullet2', 'bullet3']),
  dimensions: z.string().min(1).default('dimensions_text'),
  capacity:   z.string().min(1).default('capacity_text'),
  skip:       z.string().min(1).default('skip'),
}).default({});

const ColorsSchema = z.object({
  background:  hexColor('#FFFFFF'),
  text:        hexColor('#000000'),
  bullet:      hexColor('#78185A'),
  ribbon_text: hexColor('#FFFFFF'),
}).default({});

const RunConfigSchema = z.object({
  // Inputs / outputs
  spreadsheet_path:          z.string().min(1),
  images_folder:             z.string().min(1),
  output_path:               z.string().min(1).default('outputs/final_video.mp4'),
  columns:                   ColumnsSchema,

  // Frame & encoding
  frame_width:               z.coerce.number().int().min(64).max(7680).default(1920),
  frame_height:              z.coerce.number().int().min(64).max(4320).default(960),
  fps:                       z.coerce.number().int().min(1).max(120).default(30),
  slide_duration_seconds:    z.coerce.number().min(0).max(60).default(5),
  max_slides:                z.coerce.number().int().min(1).default(5),
  target_bitrate:            z.union([z.string(), z.number()]).default('4M'),
  encoder_preset:            z.enum(ENCODER_PRESETS).default('medium'),
  target_size_mb:            z.object({
    min: z.coerce.number().positive(),
    max: z.coerce.number().positive(),
  }).refine(r => r.min <= r.max, 'min must not exceed max').optional(),

  // Typography
  font_title_path:           optionalPath,
  font_body_path:            optionalPath,
  font_title_family:         z.string().trim().optional(),
  font_body_family:          z.string().trim().optional(),
  title_font_size_px:        z.coerce.number().int().positive().default(55),
  body_font_size_px:         z.coerce.number().int().positive().default(50),
  ribbon_font_size_px:       z.coerce.number().int().positive().default(36),
  title_case_style:          z.enum(TITLE_CASE_STYLES).default('standard'),
  text_max_words_per_bullet: z.coerce.number().int().positive().default(4),
  text_line_spacing_px:      z.coerce.number().int().min(0).default(10),
  colors:                    ColorsSchema,

  // Layout
  left_panel_ratio:          z.coerce.number().gt(0).lt(1).default(0.5),
  edge_padding_px:           z.coerce.number().int().min(0).default(48),
  safe_area_inset_px:        z.coerce.number().int().min(0).default(48),

  // Logo
  logo_path:                 optionalPath,
  logo_position:             z.enum(LOGO_POSITIONS).default('top_right'),
  logo_margin_px:            z.coerce.number().int().min(0).default(28),
  logo_max_width_fraction:   z.coerce.number().gt(0).max(1).default(0.18),
  logo_max_height_fraction:  z.coerce.number().gt(0).max(1).default(0.25),

  // Ribbon
  dimension_marking:         z.boolean().default(true),

  // Image preparation
  image_fit:                 z.enum(IMAGE_FITS).default('cover'),
  remove_bg:                 z.boolean().default(true),
  blur_check:                z.boolean().default(true),
  blur_variance_threshold:   z.coerce.number().min(0).default(30),
  skip_patterns:             z.array(z.string().min(1)).default([...DEFAULT_SKIP_PATTERNS]),

  // Animation
  entrance_fraction:         z.coerce.number().min(0).max(1).default(0.12),

  // Audio
  music_path:                optionalPath,
  audio_volume:              z.coerce.number().min(0).max(4).default(0.9),
});

export type RawRunConfig = z.input<typeof RunConfigSchema>;

// ── AppConfig ─────────────────────────────────────────────────────────────────

export interface FontConfig {
  /** Font file; undefined means the built-in family */
  path?: string;
  /** Pango family name inside the font file */
  family?: string;
  sizePx: number;
}

export interface AppConfig {
  spreadsheetPath: string;
  imagesFolder: string;
  outputPath: string;
  columns: {
    image: string;
    title: string;
    bullets: string[];
    dimensions: string;
    capacity: string;
    skip: string;
  };
  frame: { width: number; height: number };
  fps: number;
  slideDurationSeconds: number;
  maxSlides: number;
  /** Target video bitrate in bits per second */
  targetBitrate: number;
  encoderPreset: EncoderPreset;
  targetSizeMb?: { min: number; max: number };
  fonts: { title: FontConfig; body: FontConfig; ribbon: FontConfig };
  titleCaseStyle: TitleCaseStyle;
  maxWordsPerBullet: number;
  lineSpacingPx: number;
  colors: { background: string; text: string; bullet: string; ribbonText: string };
  leftPanelRatio: number;
  edgePaddingPx: number;
  safeAreaInsetPx: number;
  logo: {
    path?: string;
    position: LogoPosition;
    marginPx: number;
    maxWidthFraction: number;
    maxHeightFraction: number;
  };
  dimensionMarking: boolean;
  imageFit: ImageFit;
  removeBackground: boolean;
  blurCheck: boolean;
  blurVarianceThreshold: number;
  skipPatterns: string[];
  entranceFraction: number;
  musicPath?: string;
  audioVolume: number;
}

export type Config = Readonly<AppConfig>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}

/**
 * Validate a raw (already YAML-parsed) configuration object and resolve every
 * relative path against `baseDir`. The returned object is deep-frozen.
 */
export function parseConfig(raw: unknown, baseDir: string): Config {
  const parsed = RunConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const c = parsed.data;

  let targetBitrate: number;
  try {
    targetBitrate = parseBitrate(c.target_bitrate);
  } catch (err) {
    throw new ConfigError(`Invalid configuration: target_bitrate: ${errorMessage(err)}`, err);
  }

  const resolve = (p: string) => path.resolve(baseDir, p);
  const resolveOptional = (p: string | undefined) => (p ? resolve(p) : undefined);

  const config: AppConfig = {
    spreadsheetPath: resolve(c.spreadsheet_path),
    imagesFolder:    resolve(c.images_folder),
    outputPath:      resolve(c.output_path),
    columns: { ...c.columns, bullets: [...c.columns.bullets] },
    frame: { width: c.frame_width, height: c.frame_height },
    fps: c.fps,
    slideDurationSeconds: c.slide_duration_seconds,
    maxSlides: c.max_slides,
    targetBitrate,
    encoderPreset: c.encoder_preset,
    targetSizeMb: c.target_size_mb,
    fonts: {
      title:  { path: resolveOptional(c.font_title_path), family: c.font_title_family, sizePx: c.title_font_size_px },
      body:   { path: resolveOptional(c.font_body_path),  family: c.font_body_family,  sizePx: c.body_font_size_px },
      ribbon: { path: resolveOptional(c.font_body_path),  family: c.font_body_family,  sizePx: c.ribbon_font_size_px },
    },
    titleCaseStyle: c.title_case_style,
    maxWordsPerBullet: c.text_max_words_per_bullet,
    lineSpacingPx: c.text_line_spacing_px,
    colors: {
      background: c.colors.background,
      text:       c.colors.text,
      bullet:     c.colors.bullet,
      ribbonText: c.colors.ribbon_text,
    },
    leftPanelRatio: c.left_panel_ratio,
    edgePaddingPx: c.edge_padding_px,
    safeAreaInsetPx: c.safe_area_inset_px,
    logo: {
      path:              resolveOptional(c.logo_path),
      position:          c.logo_position,
      marginPx:          c.logo_margin_px,
      maxWidthFraction:  c.logo_max_width_fraction,
      maxHeightFraction: c.logo_max_height_fraction,
    },
    dimensionMarking: c.dimension_marking,
    imageFit: c.image_fit,
    removeBackground: c.remove_bg,
    blurCheck: c.blur_check,
    blurVarianceThreshold: c.blur_variance_threshold,
    skipPatterns: c.skip_patterns.map(p => p.toLowerCase()),
    entranceFraction: c.entrance_fraction,
    musicPath: resolveOptional(c.music_path),
    audioVolume: c.audio_volume,
  };

  return deepFreeze(config);
}

/** Read, parse and validate a YAML run configuration file. */
export function loadConfig(configPath: string): Config {
  const absolute = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(absolute, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${absolute}`, err);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Configuration file ${absolute} is not valid YAML: ${errorMessage(err)}`, err);
  }

  return parseConfig(raw, path.dirname(absolute));
}
