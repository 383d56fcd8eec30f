import { IntegrityError } from '../errors';
import type { CellValue, WideMatrix } from '../types/matrix';
import { assertColumnsPreserved } from './reconstruct';

/**
 * Concatenates reconstructed yearly matrices in chronological order. The
 * column set is the union across years; a column missing from a year is
 * filled with missing cells for that year's rows.
 */
export function mergeYears(matrices: WideMatrix[]): WideMatrix {
  const parts = matrices
    .filter((m) => m.timestamps.length > 0)
    .sort((a, b) => a.timestamps[0].localeCompare(b.timestamps[0]));

  const columns = [...new Set(parts.flatMap((m) => m.columns))].sort();
  const timestamps: string[] = [];
  const values: CellValue[][] = [];

  for (const part of parts) {
    const position = new Map(part.columns.map((key, c) => [key, c] as const));
    const slots = columns.map((key) => position.get(key));

    part.timestamps.forEach((ts, r) => {
      const previous = timestamps[timestamps.length - 1];
      if (previous !== undefined && ts <= previous) {
        throw new IntegrityError(`Timestamps not strictly increasing at ${ts} (after ${previous})`);
      }
      timestamps.push(ts);
      values.push(slots.map((c) => (c === undefined ? null : part.values[r][c])));
    });

    assertColumnsPreserved(part.columns, columns, 'Merge');
  }

  return { timestamps, columns, values };
}
