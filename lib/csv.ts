// lib/csv.ts
import * as Papa from 'papaparse';

/**
 * Parse delimited text into a raw cell grid (no header handling). An empty
 * delimiter lets papaparse detect it, for extracts exported with `;`.
 */
export function parseCsvGrid(text: string, delimiter = ''): string[][] {
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    delimiter,
    dynamicTyping: false,
    skipEmptyLines: true,
  });
  return parsed.data;
}

/** Serialize rows with a fixed header and `\n` line endings. */
export function toCsv(fields: string[], rows: string[][]): string {
  return Papa.unparse({ fields, data: rows }, { newline: '\n' }) + '\n';
}
