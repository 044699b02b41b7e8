/**
 * Row Loader — turns the spreadsheet into an ordered list of SlideRecords.
 *
 * Rows are filtered in sheet order: `skip` flag, blank image filename,
 * excluded filename patterns (barcode / qr / code128 by default), filenames
 * outside the images folder, missing image files and, when a screen is
 * given, images that fail to decode. Only an unreadable spreadsheet is
 * fatal; everything else drops the row and records a RowWarning.
 */
import * as fs from 'fs';
import * as path from 'path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { FatalError, errorMessage, type RowWarning } from '../utils/errors.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SlideRecord {
  readonly rowNumber: number;
  readonly imageFilename: string;
  /** Absolute path of the image, verified to exist when the record was built */
  readonly imagePath: string;
  readonly title: string;
  readonly bullets: readonly string[];
  readonly dimensionsText: string;
  readonly capacityText: string;
  readonly skip: boolean;
}

/** One spreadsheet row keyed by lower-cased header name. */
export interface SheetRow {
  rowNumber: number;
  values: Record<string, string>;
}

export interface RowLoadResult {
  records: SlideRecord[];
  warnings: RowWarning[];
}

export type RowLoaderOptions = Pick<Config, 'columns' | 'skipPatterns' | 'maxSlides'>;

/** Checks that an image can be used; resolves to a reason when it cannot. */
export type ImageScreen = (imagePath: string) => Promise<string | null>;

const TRUTHY_SKIP = new Set(['1', 'true', 'yes', 'y']);
const MAX_BULLETS = 3;

// ── Helpers ───────────────────────────────────────────────────────────────────

export function isSkipValue(raw: string): boolean {
  return TRUTHY_SKIP.has(raw.trim().toLowerCase());
}

/** Returns the first exclusion pattern contained in the filename, if any. */
export function matchExclusionPattern(filename: string, patterns: readonly string[]): string | undefined {
  const lowered = filename.toLowerCase();
  return patterns.find(p => lowered.includes(p.toLowerCase()));
}

function cell(row: SheetRow, column: string): string {
  return (row.values[column.trim().toLowerCase()] ?? '').trim();
}

/** True for absolute filenames and ones that climb out with "..". */
export function escapesImagesFolder(filename: string): boolean {
  return path.isAbsolute(filename) || filename.split(/[\\/]/).includes('..');
}

/** Resolve an image filename inside the images folder; null when it is not a file there. */
export function imageResolver(imagesFolder: string): (filename: string) => string | null {
  const root = path.resolve(imagesFolder);
  return (filename) => {
    const candidate = path.resolve(root, filename);
    if (!candidate.startsWith(root + path.sep)) return null;
    try {
      return fs.statSync(candidate).isFile() ? candidate : null;
    } catch {
      return null;
    }
  };
}

// ── Normalisation ─────────────────────────────────────────────────────────────

/**
 * Apply the row policy to already-read rows. Pure apart from `resolveImage`
 * and `screen`. A row only counts toward `maxSlides` once its image has
 * passed the screen.
 */
export async function normalizeRows(
  rows: readonly SheetRow[],
  options: RowLoaderOptions,
  resolveImage: (filename: string) => string | null,
  screen?: ImageScreen,
): Promise<RowLoadResult> {
  const { columns, skipPatterns, maxSlides } = options;
  const records: SlideRecord[] = [];
  const warnings: RowWarning[] = [];

  const warn = (row: SheetRow, imageFilename: string, reason: string) => {
    warnings.push({ rowNumber: row.rowNumber, imageFilename, reason });
    logger.warn(`Rows: dropping row ${row.rowNumber} — ${reason}`, { imageFilename });
  };

  for (const row of rows) {
    if (records.length >= maxSlides) {
      logger.info('Rows: max_slides reached — ignoring remaining rows', { maxSlides, nextRow: row.rowNumber });
      break;
    }

    if (isSkipValue(cell(row, columns.skip))) {
      logger.debug('Rows: row marked skip', { rowNumber: row.rowNumber });
      continue;
    }

    const imageFilename = cell(row, columns.image);
    if (!imageFilename) {
      warn(row, '', `missing required field "${columns.image}"`);
      continue;
    }

    const excludedBy = matchExclusionPattern(imageFilename, skipPatterns);
    if (excludedBy) {
      warn(row, imageFilename, `filename matches excluded pattern "${excludedBy}"`);
      continue;
    }

    if (escapesImagesFolder(imageFilename)) {
      warn(row, imageFilename, 'image filename points outside the images folder');
      continue;
    }

    const imagePath = resolveImage(imageFilename);
    if (!imagePath) {
      warn(row, imageFilename, 'image file not found');
      continue;
    }

    const unusable = screen ? await screen(imagePath) : null;
    if (unusable) {
      warn(row, imageFilename, unusable);
      continue;
    }

    const bullets = columns.bullets
      .map(col => cell(row, col))
      .filter(b => b.length > 0)
      .slice(0, MAX_BULLETS);

    records.push(Object.freeze({
      rowNumber: row.rowNumber,
      imageFilename,
      imagePath,
      title: cell(row, columns.title),
      bullets: Object.freeze(bullets),
      dimensionsText: cell(row, columns.dimensions),
      capacityText: cell(row, columns.capacity),
      skip: false,
    }));
  }

  return { records, warnings };
}

// ── Spreadsheet reading ───────────────────────────────────────────────────────

function worksheetRows(sheet: Worksheet): { headers: Set<string>; rows: SheetRow[] } {
  const headers: string[] = [];
  const rows: SheetRow[] = [];

  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (headers.length === 0) {
      row.eachCell({ includeEmpty: true }, (c, col) => {
        headers[col] = c.text.trim().toLowerCase();
      });
      return;
    }
    const values: Record<string, string> = {};
    row.eachCell({ includeEmpty: false }, (c, col) => {
      const header = headers[col];
      if (header) values[header] = c.text;
    });
    rows.push({ rowNumber, values });
  });

  return { headers: new Set(headers.filter(Boolean)), rows };
}

/** Read the first worksheet of an .xlsx or .csv file into header-keyed rows. */
export async function readSheetRows(spreadsheetPath: string): Promise<{ headers: Set<string>; rows: SheetRow[] }> {
  if (!fs.existsSync(spreadsheetPath)) {
    throw new FatalError(`Spreadsheet not found: ${spreadsheetPath}`);
  }

  const workbook = new ExcelJS.Workbook();
  let sheet: Worksheet | undefined;
  try {
    if (path.extname(spreadsheetPath).toLowerCase() === '.csv') {
      sheet = await workbook.csv.readFile(spreadsheetPath);
    } else {
      await workbook.xlsx.readFile(spreadsheetPath);
      sheet = workbook.worksheets[0];
    }
  } catch (err) {
    throw new FatalError(`Spreadsheet unreadable: ${spreadsheetPath} (${errorMessage(err)})`, err);
  }

  if (!sheet) throw new FatalError(`Spreadsheet has no worksheets: ${spreadsheetPath}`);

  return worksheetRows(sheet);
}

/**
 * Load slide records from the configured spreadsheet and images folder.
 * `screen`, when given, drops rows whose image fails it before they take a slot.
 */
export async function loadSlides(config: Config, screen?: ImageScreen): Promise<RowLoadResult> {
  logger.info('Rows: reading spreadsheet', { path: config.spreadsheetPath });

  const { headers, rows } = await readSheetRows(config.spreadsheetPath);
  const imageColumn = config.columns.image.trim().toLowerCase();
  if (!headers.has(imageColumn)) {
    throw new FatalError(`Spreadsheet is missing the required "${config.columns.image}" column`);
  }

  const result = await normalizeRows(rows, config, imageResolver(config.imagesFolder), screen);
  logger.info('Rows: slides selected', {
    rowsRead: rows.length,
    slides: result.records.length,
    dropped: result.warnings.length,
  });
  return result;
}
