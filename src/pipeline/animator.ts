/**
 * Animator — entrance motion for one composed slide.
 *
 * During the entrance window the text panel slides in from off-canvas left
 * and the product from the right canvas edge, eased out-cubic, reaching their
 * resting positions exactly on the window's last frame. Every later frame is
 * the cached resting composite.
 */
import type { Config } from '../config.js';
import { flattenFrame, type ComposedSlide } from './composer.js';

export interface FrameTransform {
  /** Horizontal offset of the text panel (≤ 0) */
  textDx: number;
  /** Horizontal offset of the product (≥ 0) */
  productDx: number;
}

export interface MotionPlan {
  frameCount: number;
  entranceFrames: number;
  /** Text panel offset at frame 0 */
  textStart: number;
  /** Product offset at frame 0 */
  productStart: number;
}

export type AnimationOptions = Pick<Config, 'fps' | 'slideDurationSeconds' | 'entranceFraction'>;

const RESTING: FrameTransform = Object.freeze({ textDx: 0, productDx: 0 });

// ── Timing ───────────────────────────────────────────────────────────────────

/** round(duration × fps), never less than one frame. */
export function frameCount(durationSeconds: number, fps: number): number {
  return Math.max(1, Math.round(durationSeconds * fps));
}

export function entranceFrameCount(totalFrames: number, fraction: number): number {
  return Math.min(totalFrames, Math.round(totalFrames * fraction));
}

export function easeOutCubic(t: number): number {
  const clamped = Math.min(1, Math.max(0, t));
  return 1 - Math.pow(1 - clamped, 3);
}

// ── Motion ───────────────────────────────────────────────────────────────────

export function planMotion(
  slide: Pick<ComposedSlide, 'width' | 'textPanel' | 'product'>,
  options: AnimationOptions,
): MotionPlan {
  const total = frameCount(options.slideDurationSeconds, options.fps);
  const panelRight = slide.textPanel.x + slide.textPanel.raster.width;
  return {
    frameCount: total,
    entranceFrames: entranceFrameCount(total, options.entranceFraction),
    textStart: -panelRight,
    productStart: slide.width - slide.product.x,
  };
}

/**
 * Offsets for frame `index`. A window shorter than two frames has no room
 * for motion, so every frame rests.
 */
export function entranceOffsets(plan: MotionPlan, index: number): FrameTransform {
  const E = plan.entranceFrames;
  if (E < 2 || index >= E - 1) return RESTING;

  // Fractional offsets; the compositor snaps them to whole pixels
  const remaining = 1 - easeOutCubic(index / (E - 1));
  return {
    textDx: plan.textStart * remaining,
    productDx: plan.productStart * remaining,
  };
}

// ── Frame sequence ───────────────────────────────────────────────────────────

/**
 * A finite, restartable frame sequence. Nothing is materialised up front:
 * each call to `frames()` walks the plan from frame 0 again.
 */
export class AnimatedSlide implements AsyncIterable<Buffer> {
  readonly plan: MotionPlan;

  constructor(private readonly slide: ComposedSlide, options: AnimationOptions) {
    this.plan = planMotion(slide, options);
  }

  get frameCount(): number {
    return this.plan.frameCount;
  }

  transformAt(index: number): FrameTransform {
    return entranceOffsets(this.plan, index);
  }

  async frameAt(index: number): Promise<Buffer> {
    if (!Number.isInteger(index) || index < 0 || index >= this.plan.frameCount) {
      throw new RangeError(`Frame ${index} out of range 0..${this.plan.frameCount - 1}`);
    }
    const { textDx, productDx } = this.transformAt(index);
    if (textDx === 0 && productDx === 0) return this.slide.resting;
    return flattenFrame(this.slide, textDx, productDx);
  }

  async *frames(): AsyncGenerator<Buffer> {
    for (let i = 0; i < this.plan.frameCount; i++) {
      yield await this.frameAt(i);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<Buffer> {
    return this.frames();
  }
}

export function animateSlide(slide: ComposedSlide, options: AnimationOptions): AnimatedSlide {
  return new AnimatedSlide(slide, options);
}
