#!/usr/bin/env node
/**
 * Promo slideshow — entry point.
 *
 * Exit codes:
 *   0 — video written
 *   1 — fatal run error (unreadable spreadsheet, no valid slides, encoder failure)
 *   2 — invalid arguments or configuration
 */
import { loadConfig } from './config.js';
import { logger } from './utils/logger.js';
import { FatalError, errorMessage, exitCodeFor } from './utils/errors.js';
import { parseCliArgs, USAGE } from './cli.js';
import { runPipeline } from './pipeline/index.js';

// ── CLI entrypoint ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(command.configPath);
  logger.info('Slideshow: starting', { config: command.configPath, output: config.outputPath });

  const report = await runPipeline(config);
  logger.info('Slideshow: video written', {
    outputPath: report.outputPath,
    slides: report.slideCount,
    frames: report.frameCount,
    rowsSkipped: report.warnings.length,
    durationSeconds: Number(report.durationSeconds.toFixed(2)),
    sizeMb: Number((report.sizeBytes / (1024 * 1024)).toFixed(2)),
    ...(report.suggestedBitrate !== undefined ? { suggestedBitrate: report.suggestedBitrate } : {}),
  });
}

main().catch((err: unknown) => {
  if (err instanceof FatalError) {
    logger.error(`${err.name}: ${err.message}`);
  } else {
    logger.error(`Unexpected error: ${errorMessage(err)}`, { err });
  }
  process.exit(exitCodeFor(err));
});
