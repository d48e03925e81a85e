/**
 * Export Formats - CSV generation and number formatting helpers
 */

// =============================================================================
// CSV GENERATION
// =============================================================================

export type CSVValue = string | number | boolean | null | undefined;

export interface CSVOptions {
  delimiter?: string;
  quoteChar?: string;
  includeHeader?: boolean;
}

/**
 * Generate a CSV string from headers and rows.
 * Fields containing the delimiter, the quote char or a line break are quoted,
 * with embedded quotes doubled.
 */
export function generateCSV(
  headers: readonly string[],
  rows: ReadonlyArray<readonly CSVValue[]>,
  options: CSVOptions = {},
): string {
  const delimiter = options.delimiter ?? ',';
  const quoteChar = options.quoteChar ?? '"';
  const includeHeader = options.includeHeader ?? true;
  const quotePattern = new RegExp(quoteChar.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g');

  function escapeField(value: CSVValue): string {
    if (value === null || value === undefined) {
      return '';
    }

    const str = String(value);

    if (
      str.includes(delimiter) ||
      str.includes(quoteChar) ||
      str.includes('\n') ||
      str.includes('\r')
    ) {
      return `${quoteChar}${str.replace(quotePattern, quoteChar + quoteChar)}${quoteChar}`;
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
 * Round to a fixed number of decimals; non-finite input becomes 0.
 */
export function roundTo(n: number | null | undefined, digits: number): number {
  if (n === null || n === undefined || !Number.isFinite(n)) return 0;
  const factor = 10 ** digits;
  return Math.round(n * factor) / factor;
}

export function round2(n: number | null | undefined): number {
  return roundTo(n, 2);
}

/**
 * Format a USD amount. API costs are fractions of a cent, so callers
 * usually ask for 4 digits.
 */
export function formatCurrency(amount: number | null | undefined, digits: number = 2): string {
  if (amount === null || amount === undefined || !Number.isFinite(amount)) {
    return `$${(0).toFixed(digits)}`;
  }
  const abs = Math.abs(amount).toLocaleString('en-US', {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
  return amount < 0 ? `-$${abs}` : `$${abs}`;
}

/**
 * Format a 0..1 share as a percentage string, e.g. 0.4213 -> "42.13%".
 */
export function formatPercent(share: number | null | undefined, digits: number = 2): string {
  return `${roundTo((share ?? 0) * 100, digits).toFixed(digits)}%`;
}
