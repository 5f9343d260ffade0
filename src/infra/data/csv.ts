/**
 * CSV reading
 *
 * Handles quoted fields, escaped quotes and \n, \r\n or \r line endings.
 */

import { readFileSync } from 'node:fs';
import { getErrorMessage } from '../../shared/utils/index.js';

export class DataSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataSourceError';
  }
}

/** Parse a CSV string into rows of fields */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentField = '';
  let inQuotes = false;
  let i = 0;

  const endRow = (): void => {
    currentRow.push(currentField);
    currentField = '';
    rows.push(currentRow);
    currentRow = [];
  };

  while (i < content.length) {
    const char = content.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (content.charAt(i + 1) === '"') {
          currentField += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      currentField += char;
      i++;
      continue;
    }

    if (char === '"' && currentField.length === 0) {
      inQuotes = true;
      i++;
      continue;
    }

    if (char === ',') {
      currentRow.push(currentField);
      currentField = '';
      i++;
      continue;
    }

    if (char === '\r' || char === '\n') {
      endRow();
      i += char === '\r' && content.charAt(i + 1) === '\n' ? 2 : 1;
      continue;
    }

    currentField += char;
    i++;
  }

  if (currentField.length > 0 || currentRow.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Turn parsed CSV into header-keyed records.
 * Blank lines are skipped; headers are trimmed.
 * @throws DataSourceError when a required column is missing
 */
export function toRecords(
  rows: readonly string[][],
  requiredColumns: readonly string[],
  source: string,
): Record<string, string>[] {
  const [headerRow, ...dataRows] = rows;
  if (!headerRow) {
    throw new DataSourceError(`CSV has no header row: ${source}`);
  }

  const headers = headerRow.map((header) => header.trim());
  const missing = requiredColumns.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new DataSourceError(`CSV ${source} is missing column(s): ${missing.join(', ')}`);
  }

  return dataRows
    .filter((row) => row.some((field) => field.trim() !== ''))
    .map((row) => {
      const record: Record<string, string> = {};
      headers.forEach((header, col) => {
        record[header] = (row[col] ?? '').trim();
      });
      return record;
    });
}

/** Read a CSV file into header-keyed records */
export function readCsvRecords(filePath: string, requiredColumns: readonly string[]): Record<string, string>[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new DataSourceError(`Cannot read CSV ${filePath}: ${getErrorMessage(err)}`);
  }
  return toRecords(parseCsv(content), requiredColumns, filePath);
}
