import type { PipelineConfig } from '../config';
import { hourlyIndexForYear, yearOf } from '../calendar/service';
import { IntegrityError } from '../errors';
import type { CellValue, EntityKey, HourTimestamp, WideMatrix } from '../types/matrix';

export type FillReport = Record<EntityKey, number>;

export interface ReconstructedYear {
  year: number;
  matrix: WideMatrix;
  filled: FillReport;         // forward-filled cells per column
  observedRows: number;       // rows present before reindexing
}

/**
 * Partitions a sparse matrix by calendar year. Each part keeps only the
 * columns observed in that year.
 */
export function splitByYear(matrix: WideMatrix): Map<number, WideMatrix> {
  const rowsByYear = new Map<number, number[]>();
  matrix.timestamps.forEach((ts, r) => {
    const year = yearOf(ts);
    const rows = rowsByYear.get(year) ?? [];
    rows.push(r);
    rowsByYear.set(year, rows);
  });

  const parts = new Map<number, WideMatrix>();
  for (const year of [...rowsByYear.keys()].sort((a, b) => a - b)) {
    const rows = rowsByYear.get(year) ?? [];
    const cols = matrix.columns
      .map((_, c) => c)
      .filter((c) => rows.some((r) => matrix.values[r][c] !== null));
    parts.set(year, {
      timestamps: rows.map((r) => matrix.timestamps[r]),
      columns: cols.map((c) => matrix.columns[c]),
      values: rows.map((r) => cols.map((c) => matrix.values[r][c])),
    });
  }
  return parts;
}

/**
 * Aligns `matrix` onto `index`. Hours absent from the source become fully
 * missing rows; a source row outside the index is an IntegrityError since it
 * would be dropped.
 */
export function reindexToTimeline(matrix: WideMatrix, index: HourTimestamp[]): WideMatrix {
  const sourceRow = new Map<HourTimestamp, number>();
  matrix.timestamps.forEach((ts, r) => sourceRow.set(ts, r));

  const values = index.map((ts) => {
    const r = sourceRow.get(ts);
    if (r === undefined) return matrix.columns.map((): CellValue => null);
    sourceRow.delete(ts);
    return [...matrix.values[r]];
  });

  if (sourceRow.size > 0) {
    const [first] = sourceRow.keys();
    throw new IntegrityError(`${sourceRow.size} source row(s) fall outside the target timeline (first: ${first})`);
  }

  return { timestamps: [...index], columns: [...matrix.columns], values };
}

/**
 * Forward-fills missing runs of at most `maxHours` consecutive hours, per
 * column, from the last observed value. Runs before a column's first
 * observation stay missing, as do runs longer than the bound.
 */
export function shortGapFill(matrix: WideMatrix, maxHours: number): { matrix: WideMatrix; filled: FillReport } {
  const values = matrix.values.map((row) => [...row]);
  const filled: FillReport = {};
  const n = values.length;

  matrix.columns.forEach((key, c) => {
    filled[key] = 0;
    if (maxHours <= 0) return;

    let last: number | null = null;
    let runStart = -1;

    const closeRun = (end: number) => {
      const length = end - runStart;
      const fill = last;
      if (fill === null || length > maxHours) return;
      for (let r = runStart; r < end; r++) values[r][c] = fill;
      filled[key] += length;
    };

    for (let r = 0; r < n; r++) {
      const v = values[r][c];
      if (v === null) {
        if (runStart < 0) runStart = r;
        continue;
      }
      if (runStart >= 0) {
        closeRun(r);
        runStart = -1;
      }
      last = v;
    }
    if (runStart >= 0) closeRun(n);
  });

  return { matrix: { timestamps: [...matrix.timestamps], columns: [...matrix.columns], values }, filled };
}

export function assertColumnsPreserved(before: EntityKey[], after: EntityKey[], stage: string): void {
  const kept = new Set(after);
  const lost = before.filter((k) => !kept.has(k));
  if (lost.length > 0) {
    throw new IntegrityError(`${stage} dropped ${lost.length} column(s): ${lost.slice(0, 5).join(', ')}`);
  }
}

/**
 * Reindexes one year's observations onto the full hourly calendar of that
 * year and applies the short-gap policy.
 */
export function reconstructYear(matrix: WideMatrix, year: number, config: PipelineConfig): ReconstructedYear {
  const index = hourlyIndexForYear(year);
  const reindexed = reindexToTimeline(matrix, index);
  const { matrix: filledMatrix, filled } = shortGapFill(reindexed, config.gapFillMaxHours);

  if (filledMatrix.timestamps.length !== index.length) {
    throw new IntegrityError(`Year ${year} has ${filledMatrix.timestamps.length} rows, expected ${index.length}`);
  }
  assertColumnsPreserved(matrix.columns, filledMatrix.columns, `Reconstruction of ${year}`);

  return { year, matrix: filledMatrix, filled, observedRows: matrix.timestamps.length };
}
