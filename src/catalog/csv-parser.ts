/**
 * CSV Parser - Parse CSV/TSV/pipe-delimited catalog files into header-keyed rows
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab, pipe)
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Flexible column name mapping ("Vendor Name" -> name, "vendor_id" -> id)
 * - Quoted fields with embedded delimiters, newlines and escaped quotes ("")
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('csv-parser');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Delimiter = 'auto' | 'comma' | 'tab' | 'pipe';

export interface CsvRow {
  /** 1-based data row number, header excluded */
  rowNumber: number;
  values: Record<string, string>;
}

export interface CsvTable {
  /** Canonical column names, in file order; unknown columns keep their normalized name */
  columns: string[];
  rows: CsvRow[];
  delimiter: string;
}

export interface CsvParseOptions {
  delimiter?: Delimiter;
  /** Normalized header -> canonical column name */
  aliases?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

/**
 * Auto-detect delimiter by counting unquoted occurrences in the first lines.
 * Prefers comma > tab > pipe if scores are equal.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r?\n/).slice(0, 10).filter(Boolean);
  if (sampleLines.length === 0) return ',';

  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of [',', '\t', '|']) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    // Score: higher average count + bonus for the same count on every line
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const consistencyBonus = new Set(counts).size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// Record splitting
// ---------------------------------------------------------------------------

/**
 * Split CSV text into records of fields. Quoted fields may span lines.
 */
export function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endField = () => {
    fields.push(fieldStarted ? current : current.trim());
    current = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      inQuotes = true;
      fieldStarted = true;
      current = '';
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\n') {
      endField();
      records.push(fields);
      fields = [];
    } else if (!(fieldStarted && /\s/.test(ch))) {
      current += ch;
    }
  }

  if (current.length > 0 || fields.length > 0) {
    endField();
    records.push(fields);
  }

  return records.filter((record) => record.some((field) => field.length > 0));
}

// ---------------------------------------------------------------------------
// Column mapping
// ---------------------------------------------------------------------------

export function normalizeHeader(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9\s_]/g, '')
    .replace(/\s+/g, '_');
}

function mapColumns(headers: string[], aliases: Record<string, string>): string[] {
  const used = new Set<string>();
  return headers.map((raw) => {
    const normalized = normalizeHeader(raw);
    const canonical = aliases[normalized] ?? normalized;
    if (used.has(canonical)) {
      // Later duplicates keep their own name so they cannot shadow the first
      return `${normalized}__dup`;
    }
    used.add(canonical);
    return canonical;
  });
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

/**
 * Parse CSV text with a header row into rows keyed by canonical column name.
 */
export function parseCsv(csvData: string, options: CsvParseOptions = {}): CsvTable {
  const { delimiter: delimiterOption = 'auto', aliases = {} } = options;

  let data = csvData;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }
  data = data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const delimiter =
    delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const records = parseRecords(data, delimiter);
  if (records.length === 0) {
    return { columns: [], rows: [], delimiter };
  }

  const columns = mapColumns(records[0], aliases);
  const rows: CsvRow[] = records.slice(1).map((fields, index) => {
    const values: Record<string, string> = {};
    columns.forEach((column, columnIndex) => {
      values[column] = fields[columnIndex] ?? '';
    });
    return { rowNumber: index + 1, values };
  });

  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, columns: columns.length, rows: rows.length },
    'Parsed CSV',
  );

  return { columns, rows, delimiter };
}
