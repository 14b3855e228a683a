import { readFile } from 'fs/promises';
import path from 'path';
import { read, utils, WorkBook } from 'xlsx';
import { DatasetParseError, errorMessage } from './errors';
import { logger } from './logger';
import type { Column, Dataset, PreviewCell } from '../types/insights';

const log = logger.child({ module: 'DatasetParser' });

const DELIMITERS: Record<string, string> = {
  '.csv': ',',
  '.tsv': '\t',
};

const SPREADSHEET_EXTENSIONS: ReadonlySet<string> = new Set(['.xls', '.xlsx']);

/**
 * Splits delimited text into rows of raw cells. Handles quoted fields with
 * embedded delimiters, doubled quotes and line breaks, and CRLF endings.
 * Blank lines are skipped.
 */
export function parseDelimited(text: string, delimiter = ','): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const endRow = (): void => {
    row.push(field);
    field = '';
    if (!(row.length === 1 && row[0].trim() === '')) rows.push(row);
    row = [];
  };

  while (i < input.length) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field.length === 0) {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (input[i + 1] === '\n') i++;
      endRow();
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new DatasetParseError('Unterminated quoted field');
  }
  if (field.length > 0 || row.length > 0) endRow();

  return rows;
}

// Cell contents read as a missing value, matching the usual spreadsheet and
// dataframe null markers.
const MISSING_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

export function isMissingCell(raw: string): boolean {
  return MISSING_TOKENS.has(raw.trim());
}

function parseNumber(raw: string): number | null {
  if (isMissingCell(raw)) return null;
  const value = Number(raw.trim());
  return Number.isFinite(value) ? value : NaN;
}

/**
 * Builds typed columns from a header and raw rows. A column is numeric when
 * every present cell is a finite number; blank cells and null markers such as
 * `NA` or `null` are missing values.
 */
export function buildDataset(headers: readonly string[], rows: readonly (readonly string[])[]): Dataset {
  if (headers.length === 0) {
    throw new DatasetParseError('Dataset has no header row');
  }

  const names = headers.map((h, idx) => {
    const name = h.trim();
    return name === '' ? `column_${idx + 1}` : name;
  });

  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new DatasetParseError(`Duplicate column name: ${name}`);
    }
    seen.add(name);
  }

  const columns = names.map((name, idx): Column => {
    const raw = rows.map((r) => (idx < r.length ? r[idx] : ''));
    const numbers = raw.map(parseNumber);
    if (numbers.every((n) => n === null || !Number.isNaN(n))) {
      return { name, type: 'numeric', values: numbers };
    }
    return {
      name,
      type: 'text',
      values: raw.map((cell) => (isMissingCell(cell) ? null : cell)),
    };
  });

  return { rowCount: rows.length, columns };
}

export function parseDatasetText(text: string, delimiter = ','): Dataset {
  const [headers, ...rows] = parseDelimited(text, delimiter);
  if (!headers) {
    throw new DatasetParseError('Dataset is empty');
  }
  return buildDataset(headers, rows);
}

export function delimiterFor(filepath: string): string {
  const ext = path.extname(filepath).toLowerCase();
  const delimiter = DELIMITERS[ext];
  if (delimiter === undefined) {
    throw new DatasetParseError(`Unsupported file type: ${ext || '(none)'}`);
  }
  return delimiter;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Reads the first worksheet of an Excel workbook. Its first non-blank row is
 * the header; cells go through the same typing as delimited text.
 */
export function parseWorkbook(content: Buffer): Dataset {
  let workbook: WorkBook;
  try {
    workbook = read(content, { type: 'buffer' });
  } catch (error) {
    throw new DatasetParseError(`Failed to read workbook: ${errorMessage(error)}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new DatasetParseError('Workbook has no sheets');
  }

  const rows = utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
  const [headers, ...body] = rows.map((row) => row.map(cellText));
  if (!headers) {
    throw new DatasetParseError('Dataset is empty');
  }
  return buildDataset(headers, body);
}

export async function readDatasetFile(filepath: string): Promise<Dataset> {
  const isSpreadsheet = SPREADSHEET_EXTENSIONS.has(path.extname(filepath).toLowerCase());
  const delimiter = isSpreadsheet ? undefined : delimiterFor(filepath);
  let content: Buffer;
  try {
    content = await readFile(filepath);
  } catch (error) {
    throw new DatasetParseError(`Failed to read dataset: ${errorMessage(error)}`);
  }

  const dataset =
    delimiter === undefined ? parseWorkbook(content) : parseDatasetText(content.toString('utf8'), delimiter);
  log.info('Parsed dataset', {
    filepath,
    rows: dataset.rowCount,
    columns: dataset.columns.length,
  });
  return dataset;
}

/** Header row followed by at most `maxRows` data rows. */
export function buildPreview(dataset: Dataset, maxRows: number): PreviewCell[][] {
  const preview: PreviewCell[][] = [dataset.columns.map((c) => c.name)];
  const limit = Math.min(dataset.rowCount, Math.max(0, maxRows));
  for (let row = 0; row < limit; row++) {
    preview.push(dataset.columns.map((c) => c.values[row] ?? null));
  }
  return preview;
}
