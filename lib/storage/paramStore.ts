import * as fs from 'fs';
import { parseCsvGrid, toCsv } from '../csv';
import { SchemaError } from '../errors';
import type { NormalizationParams } from '../types/matrix';
import { atomicWrite } from './fsStore';
import { formatNumber, parseNumberCell } from './matrixCsv';

export const PARAM_COLUMNS = ['entity_key', 'mean', 'std', 'degenerate'];

const optionalNumber = (n: number | null) => (n === null ? '' : formatNumber(n));

export function serializeParams(params: NormalizationParams[]): string {
  return toCsv(
    PARAM_COLUMNS,
    params.map((p) => [p.key, optionalNumber(p.mean), optionalNumber(p.std), String(p.degenerate)])
  );
}

export function deserializeParams(text: string, file = ''): NormalizationParams[] {
  const [header, ...rows] = parseCsvGrid(text, ',');
  if (!header || header.join(',') !== PARAM_COLUMNS.join(',')) {
    throw new SchemaError(`Parameter table must have columns ${PARAM_COLUMNS.join(', ')}`, file);
  }

  return rows.map((cells, i) => {
    const row = i + 2;
    const [key, meanCell, stdCell, flag] = cells;
    if (cells.length !== PARAM_COLUMNS.length || !key) {
      throw new SchemaError(`Malformed parameter row ${row}`, file);
    }
    if (flag !== 'true' && flag !== 'false') {
      throw new SchemaError(`Row ${row}: degenerate flag must be true or false, got "${flag}"`, file);
    }
    return {
      key,
      mean: parseNumberCell(meanCell, `row ${row}, mean`, file),
      std: parseNumberCell(stdCell, `row ${row}, std`, file),
      degenerate: flag === 'true',
    };
  });
}

export async function writeParamsCsv(filePath: string, params: NormalizationParams[]): Promise<string> {
  return atomicWrite(filePath, serializeParams(params));
}

export async function readParamsCsv(filePath: string): Promise<NormalizationParams[]> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return deserializeParams(text, filePath);
}
