/**
 * Export Formats - CSV generation and formatting helpers
 *
 * Pure TypeScript, no external dependencies.
 */

export type CSVValue = string | number | boolean | null | undefined;

export interface CSVOptions {
  delimiter?: string;
  quoteChar?: string;
  includeHeader?: boolean;
}

// =============================================================================
// CSV GENERATION
// =============================================================================

/**
 * Generate a CSV string from headers and rows.
 */
export function generateCSV(
  headers: string[],
  rows: CSVValue[][],
  options: CSVOptions = {},
): string {
  const delimiter = options.delimiter ?? ',';
  const quoteChar = options.quoteChar ?? '"';
  const includeHeader = options.includeHeader ?? true;

  function escapeField(value: CSVValue): string {
    if (value === null || value === undefined) {
      return '';
    }

    const str = String(value);

    // Quote if contains delimiter, quote char, or newline
    if (
      str.includes(delimiter) ||
      str.includes(quoteChar) ||
      str.includes('\n') ||
      str.includes('\r')
    ) {
      const escaped = str.split(quoteChar).join(quoteChar + quoteChar);
      return `${quoteChar}${escaped}${quoteChar}`;
    }

    return str;
  }

  const lines: string[] = [];

  if (includeHeader) {
    lines.push(headers.map(escapeField).join(delimiter));
  }

  for (const row of rows) {
    lines.push(row.map(escapeField).join(delimiter));
  }

  return lines.join('\n');
}

// =============================================================================
// FORMATTING HELPERS
// =============================================================================

/**
 * "₹5,000.00". Grouping is always in thousands.
 */
export function formatCurrency(amount: number | null | undefined, symbol = '₹'): string {
  if (amount === null || amount === undefined || !Number.isFinite(amount)) {
    return `${symbol}0.00`;
  }
  const abs = Math.abs(amount);
  const formatted = abs.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return amount < 0 ? `-${symbol}${formatted}` : `${symbol}${formatted}`;
}

/**
 * Local calendar date: `iso` is YYYY-MM-DD, `compact` is YYYYMMDD.
 */
export function formatDate(date: Date | number | string, format: 'iso' | 'compact' = 'iso'): string {
  const d = date instanceof Date ? date : new Date(date);
  if (isNaN(d.getTime())) {
    return '';
  }

  const year = d.getFullYear();
  const month = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');

  return format === 'compact' ? `${year}${month}${day}` : `${year}-${month}-${day}`;
}

export function round2(n: number | null | undefined): number {
  if (n === null || n === undefined || !Number.isFinite(n)) return 0;
  return Math.round(n * 100) / 100;
}
