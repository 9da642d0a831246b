import { RawRecord, RawTable } from '../types/domain.types';

/**
 * Renders a cell as text. Codes such as pincodes and barcodes must never be coerced to numbers.
 */
export function toCellText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return '';
    }
    // Local calendar parts; workbook dates are built at local midnight
    const month = String(value.getMonth() + 1).padStart(2, '0');
    const day = String(value.getDate()).padStart(2, '0');
    return `${value.getFullYear()}-${month}-${day}`;
  }
  return String(value);
}

function uniqueHeaders(headerRow: unknown[]): string[] {
  const seen = new Map<string, number>();

  return headerRow.map((cell, index) => {
    const text = toCellText(cell);
    const header = text.trim() === '' ? `Unnamed: ${index}` : text;

    const occurrences = seen.get(header) ?? 0;
    seen.set(header, occurrences + 1);
    return occurrences === 0 ? header : `${header}.${occurrences}`;
  });
}

/**
 * Builds a table from a cell matrix whose first row is the header.
 * Short rows are padded with '', completely blank rows are skipped.
 */
export function buildRawTable(matrix: unknown[][]): RawTable {
  if (matrix.length === 0) {
    return { headers: [], rows: [] };
  }

  const headers = uniqueHeaders(matrix[0]);
  const rows: RawRecord[] = [];

  for (const cells of matrix.slice(1)) {
    const texts = headers.map((_, index) => toCellText(cells[index]));
    if (texts.every(text => text.trim() === '')) {
      continue;
    }

    const row: RawRecord = {};
    headers.forEach((header, index) => {
      row[header] = texts[index];
    });
    rows.push(row);
  }

  return { headers, rows };
}
