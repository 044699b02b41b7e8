/**
 * Background removal through the `rembg` command-line tool.
 *
 * rembg is optional. `detectBackgroundRemover()` reports whether it can be
 * used; callers branch on `available` instead of catching a missing binary.
 */
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import { findExecutable } from '../utils/exec.js';
import { logger } from '../utils/logger.js';

export interface BackgroundRemover {
  available: boolean;
  /** Resolved executable; only set when available */
  command?: string;
}

export const NO_BACKGROUND_REMOVER: BackgroundRemover = Object.freeze({ available: false });

// rembg downloads its model on first use, so the first image can be slow
const REMBG_TIMEOUT_MS = 180_000;

export function detectBackgroundRemover(command: string = env.REMBG_PATH): BackgroundRemover {
  const resolved = findExecutable(command);
  if (!resolved) {
    logger.info('Background: rembg not found — images will keep their backgrounds', { command });
    return NO_BACKGROUND_REMOVER;
  }
  logger.debug('Background: rembg available', { command: resolved });
  return { available: true, command: resolved };
}

function runRembg(command: string, inputPath: string, outputPath: string): void {
  try {
    execFileSync(command, ['i', inputPath, outputPath], {
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: REMBG_TIMEOUT_MS,
    });
  } catch (err) {
    const e = err as { stderr?: Buffer | string };
    throw new Error(`rembg failed: ${e.stderr ? String(e.stderr).trim() : String(err)}`);
  }
}

/**
 * Matte the foreground of `imageBuffer` (any format sharp can read).
 * Returns a PNG buffer with alpha, or null when removal was not possible;
 * the caller then keeps the original pixels.
 */
export async function removeBackground(
  imageBuffer: Buffer,
  remover: BackgroundRemover,
  label: string,
): Promise<Buffer | null> {
  if (!remover.available || !remover.command) return null;

  fs.mkdirSync(env.TEMP_DIR, { recursive: true });
  const workDir = fs.mkdtempSync(path.join(env.TEMP_DIR, 'rembg_'));
  const inputPath = path.join(workDir, 'input.png');
  const outputPath = path.join(workDir, 'output.png');

  try {
    fs.writeFileSync(inputPath, imageBuffer);
    runRembg(remover.command, inputPath, outputPath);
    if (!fs.existsSync(outputPath)) {
      logger.warn('Background: rembg produced no output — keeping original', { image: label });
      return null;
    }
    return fs.readFileSync(outputPath);
  } catch (err) {
    logger.warn('Background: removal failed — keeping original', { image: label, err });
    return null;
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true });
  }
}
