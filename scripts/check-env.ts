#!/usr/bin/env tsx
/**
 * Pre-flight check for a slideshow run.
 * Validates the run configuration and checks every input file and external tool it needs.
 * Run: npm run check-env -- [config.yaml]
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { accessSync, constants, existsSync, mkdirSync, readdirSync } from 'fs';
import { dirname } from 'path';
import { env, loadConfig, type Config } from '../src/config.js';
import { findExecutable } from '../src/utils/exec.js';
import { isReadableFile } from '../src/media/fonts.js';
import { errorMessage } from '../src/utils/errors.js';
import { DEFAULT_CONFIG_PATH } from '../src/cli.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string, detail = '') =>
  console.log(`  ${YELLOW}○${RESET} ${label}${detail ? `  ${detail}` : ''}`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkBinary(label: string, command: string, required: boolean, hint: string): void {
  const resolved = findExecutable(command);
  if (resolved) {
    pass(label, resolved);
  } else if (required) {
    fail(`${label} not found (${command})`, hint);
    anyRequiredFailed = true;
  } else {
    note(label, `(not found — optional) ${hint}`);
  }
}

function checkFile(label: string, filePath: string | undefined, required: boolean, fallback: string): void {
  if (!filePath) {
    note(label, `(not configured — ${fallback})`);
    return;
  }
  if (isReadableFile(filePath)) {
    pass(label, filePath);
  } else if (required) {
    fail(`${label} missing: ${filePath}`);
    anyRequiredFailed = true;
  } else {
    note(label, `(missing: ${filePath} — ${fallback})`);
  }
}

// ── Section: Configuration ────────────────────────────────────────────────────

const configPath = process.argv[2] ?? DEFAULT_CONFIG_PATH;

console.log(`\n${BOLD}=== Promo Slideshow — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Run configuration${RESET}`);

let config: Config | undefined;
try {
  config = loadConfig(configPath);
  pass('configuration valid', configPath);
} catch (err) {
  fail('configuration invalid', errorMessage(err));
  anyRequiredFailed = true;
}

// ── Section: Environment ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Environment${RESET}`);

function checkOptional(label: string, value: string | undefined, effective: string): void {
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

checkOptional('LOG_LEVEL',    process.env['LOG_LEVEL'],    env.LOG_LEVEL);
checkOptional('LOG_FORMAT',   process.env['LOG_FORMAT'],   env.LOG_FORMAT);
checkOptional('TEMP_DIR',     process.env['TEMP_DIR'],     env.TEMP_DIR);
checkOptional('FFMPEG_PATH',  process.env['FFMPEG_PATH'],  env.FFMPEG_PATH);
checkOptional('FFPROBE_PATH', process.env['FFPROBE_PATH'], env.FFPROBE_PATH);
checkOptional('REMBG_PATH',   process.env['REMBG_PATH'],   env.REMBG_PATH);

// ── Section: External tools ───────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] External tools${RESET}`);

checkBinary('ffmpeg',  env.FFMPEG_PATH,  true,  'install with: sudo apt install ffmpeg (Linux) or brew install ffmpeg (macOS)');
checkBinary('ffprobe', env.FFPROBE_PATH, false, 'ships with ffmpeg; used only to report the final duration');
if (config && !config.removeBackground) {
  note('rembg', '(remove_bg is off)');
} else {
  checkBinary('rembg', env.REMBG_PATH, false, 'pip install "rembg[cli]" — images keep their backgrounds without it');
}

// ── Section: Inputs ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Inputs and assets${RESET}`);

if (config) {
  checkFile('spreadsheet', config.spreadsheetPath, true, '');

  if (existsSync(config.imagesFolder)) {
    const images = readdirSync(config.imagesFolder).filter(f => /\.(png|jpe?g|webp|tiff?|gif|avif)$/i.test(f));
    if (images.length > 0) {
      pass('images folder', `${images.length} image(s) in ${config.imagesFolder}`);
    } else {
      fail('images folder has no images', config.imagesFolder);
      anyRequiredFailed = true;
    }
  } else {
    fail(`images folder missing: ${config.imagesFolder}`, `Create: mkdir -p "${config.imagesFolder}"`);
    anyRequiredFailed = true;
  }

  checkFile('title font', config.fonts.title.path, false, 'built-in sans');
  checkFile('body font',  config.fonts.body.path,  false, 'built-in sans');
  checkFile('logo',       config.logo.path,        false, 'slides will have no logo');
  checkFile('music',      config.musicPath,        false, 'silent audio track');

  const outputDir = dirname(config.outputPath);
  try {
    mkdirSync(outputDir, { recursive: true });
    accessSync(outputDir, constants.W_OK);
    pass('output directory writable', outputDir);
  } catch (err) {
    fail(`output directory not writable: ${outputDir}`, errorMessage(err));
    anyRequiredFailed = true;
  }
} else {
  note('inputs', '(skipped — configuration invalid above)');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- ${configPath}${RESET}\n`);
}
