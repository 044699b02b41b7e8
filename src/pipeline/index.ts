/**
 * Run orchestrator — Row Loader → Image Preparer → Slide Composer → Animator → Encoder.
 *
 * Slides are produced lazily: each slide's image is prepared and composed only
 * when the encoder asks for its first frame, and its buffers are dropped once
 * its last frame has been written.
 */
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { FatalError, type RowWarning } from '../utils/errors.js';
import { loadSlides, type SlideRecord } from './rows.js';
import { prepareImage, screenImage } from '../media/images.js';
import {
  NO_BACKGROUND_REMOVER,
  detectBackgroundRemover,
  type BackgroundRemover,
} from '../media/background.js';
import { renderPangoText, type TextRenderer } from '../media/text.js';
import { encodeVideo, type VideoEncoder } from '../media/ffmpeg.js';
import { composeSlide, loadSlideAssets, type SlideAssets } from './composer.js';
import { animateSlide, frameCount } from './animator.js';
import { productBox } from './layout.js';
import { assembleVideo } from './assembler.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RunReport {
  outputPath: string;
  slideCount: number;
  frameCount: number;
  durationSeconds: number;
  warnings: RowWarning[];
  sizeBytes: number;
  /** Set when the output fell outside `target_size_mb` */
  suggestedBitrate?: number;
}

/** Collaborators that tests (and alternate front ends) can replace. */
export interface PipelineDeps {
  renderText: TextRenderer;
  encode: VideoEncoder;
  detectRemover: () => BackgroundRemover;
}

const DEFAULT_DEPS: PipelineDeps = {
  renderText: renderPangoText,
  encode: encodeVideo,
  detectRemover: () => detectBackgroundRemover(),
};

// ── Helpers ───────────────────────────────────────────────────────────────────

async function* slideFrames(
  records: SlideRecord[],
  assets: SlideAssets,
  remover: BackgroundRemover,
  config: Config,
  renderText: TextRenderer,
): AsyncGenerator<Buffer> {
  const box = productBox(config);

  for (const [index, record] of records.entries()) {
    const log = logger.child({ slide: index + 1, rowNumber: record.rowNumber });
    log.info('Pipeline: rendering slide', { image: record.imageFilename });

    const prepared = await prepareImage(record.imagePath, box, {
      imageFit: config.imageFit,
      removeBackground: config.removeBackground,
      blurCheck: config.blurCheck,
      blurVarianceThreshold: config.blurVarianceThreshold,
      remover,
    });
    const composed = await composeSlide(record, prepared, assets, config, renderText);
    const animated = animateSlide(composed, config);

    yield* animated.frames();
    log.debug('Pipeline: slide frames written', { frames: animated.frameCount });
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function runPipeline(config: Config, deps: Partial<PipelineDeps> = {}): Promise<RunReport> {
  const { renderText, encode, detectRemover } = { ...DEFAULT_DEPS, ...deps };
  const startedAt = Date.now();

  // Images are fully decoded here, before a row counts toward max_slides
  const { records: slides, warnings } = await loadSlides(config, screenImage);
  if (slides.length === 0) {
    throw new FatalError(
      `No valid slides after filtering ${config.spreadsheetPath} (${warnings.length} row(s) dropped)`,
    );
  }

  const remover = config.removeBackground ? detectRemover() : NO_BACKGROUND_REMOVER;
  const assets = await loadSlideAssets(config);

  const perSlide = frameCount(config.slideDurationSeconds, config.fps);
  const totalFrames = perSlide * slides.length;
  logger.info('Pipeline: starting render', {
    slides: slides.length,
    framesPerSlide: perSlide,
    totalFrames,
    backgroundRemoval: remover.available,
    logo: assets.logo !== null,
  });

  const video = await assembleVideo(
    slideFrames(slides, assets, remover, config, renderText),
    totalFrames,
    config,
    encode,
  );

  const report: RunReport = {
    outputPath: video.outputPath,
    slideCount: slides.length,
    frameCount: video.framesWritten,
    durationSeconds: video.durationSeconds,
    warnings,
    sizeBytes: video.sizeBytes,
    ...(video.suggestedBitrate !== undefined ? { suggestedBitrate: video.suggestedBitrate } : {}),
  };

  logger.info('Pipeline: complete', {
    outputPath: report.outputPath,
    slides: report.slideCount,
    frames: report.frameCount,
    warnings: warnings.length,
    elapsedMs: Date.now() - startedAt,
  });
  return report;
}
