import * as fs from 'fs';
import * as path from 'path';
import { parseCsvGrid, toCsv } from '../csv';
import { SchemaError } from '../errors';
import { MATRIX_PREFIX } from '../paths';
import type { CellValue, WideMatrix } from '../types/matrix';
import { atomicWrite, isMissingFile } from './fsStore';

export const TIMESTAMP_COLUMN = 'timestamp';

// String(n) is the shortest decimal that parses back to the same double.
export const formatNumber = (n: number) => String(n);

export function parseNumberCell(cell: string, where: string, file: string): CellValue {
  const text = cell.trim();
  if (text === '') return null;
  const n = Number(text);
  if (!Number.isFinite(n)) {
    throw new SchemaError(`Non-numeric value "${text}" at ${where}`, file);
  }
  return n;
}

export function serializeMatrix(matrix: WideMatrix): string {
  const rows = matrix.timestamps.map((ts, r) => [
    ts,
    ...matrix.values[r].map((v) => (v === null ? '' : formatNumber(v))),
  ]);
  return toCsv([TIMESTAMP_COLUMN, ...matrix.columns], rows);
}

export function deserializeMatrix(text: string, file = ''): WideMatrix {
  const [header, ...rows] = parseCsvGrid(text, ',');
  if (!header || header[0]?.trim() !== TIMESTAMP_COLUMN) {
    throw new SchemaError(`Matrix must start with a "${TIMESTAMP_COLUMN}" column`, file);
  }

  const columns = header.slice(1);
  const timestamps: string[] = [];
  const values: CellValue[][] = [];

  rows.forEach((cells, i) => {
    if (cells.length !== header.length) {
      throw new SchemaError(`Row ${i + 2} has ${cells.length} cells, expected ${header.length}`, file);
    }
    timestamps.push(cells[0]);
    values.push(cells.slice(1).map((cell, c) => parseNumberCell(cell, `row ${i + 2}, ${columns[c]}`, file)));
  });

  return { timestamps, columns, values };
}

export async function writeMatrixCsv(filePath: string, matrix: WideMatrix): Promise<string> {
  return atomicWrite(filePath, serializeMatrix(matrix));
}

export async function readMatrixCsv(filePath: string): Promise<WideMatrix> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return deserializeMatrix(text, filePath);
}

const COMBINED_NAME = new RegExp(`^${MATRIX_PREFIX}_(\\d{4})_(\\d{4})\\.csv$`);

/**
 * Locates the combined matrix a transform run left in `outDir`. With several,
 * the widest year span wins, then the latest end year. Null when there is none.
 */
export async function findCombinedMatrixFile(outDir: string): Promise<string | null> {
  let names: string[];
  try {
    names = await fs.promises.readdir(outDir);
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let best: { name: string; first: number; last: number } | null = null;
  for (const name of [...names].sort()) {
    const match = COMBINED_NAME.exec(name);
    if (!match) continue;
    const first = Number(match[1]);
    const last = Number(match[2]);
    if (
      !best ||
      last - first > best.last - best.first ||
      (last - first === best.last - best.first && last > best.last)
    ) {
      best = { name, first, last };
    }
  }
  return best ? path.join(outDir, best.name) : null;
}
