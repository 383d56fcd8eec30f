// Leak-free z-score normalization: statistics come from the training window only
// and are applied unchanged to every row.
import { yearOf } from '../calendar/service';
import { IntegrityError, StatsError } from '../errors';
import type { CellValue, NormalizationParams, NormalizedMatrix, TrainingWindow, WideMatrix } from '../types/matrix';
import { columnStats, mean, populationStd } from './stats';

export function inWindow(timestamp: string, window: TrainingWindow): boolean {
  const year = yearOf(timestamp);
  return year >= window.startYear && year <= window.endYear;
}

/**
 * Flags the rows inside the training window. The window must lie within the
 * matrix's year span and select at least one row.
 */
export function trainingRowMask(matrix: WideMatrix, window: TrainingWindow): boolean[] {
  if (window.startYear > window.endYear) {
    throw new StatsError(`Training window ${window.startYear}-${window.endYear} is inverted`);
  }
  if (matrix.timestamps.length === 0) {
    throw new StatsError('Matrix has no rows');
  }

  const firstYear = yearOf(matrix.timestamps[0]);
  const lastYear = yearOf(matrix.timestamps[matrix.timestamps.length - 1]);
  if (window.startYear < firstYear || window.endYear > lastYear) {
    throw new StatsError(
      `Training window ${window.startYear}-${window.endYear} is outside the matrix span ${firstYear}-${lastYear}`
    );
  }

  const mask = matrix.timestamps.map((ts) => inWindow(ts, window));
  if (!mask.some(Boolean)) {
    throw new StatsError(`No rows in training window ${window.startYear}-${window.endYear}`);
  }
  return mask;
}

function presentValues(matrix: WideMatrix, c: number, rows: boolean[]): number[] {
  const out: number[] = [];
  matrix.values.forEach((row, r) => {
    const v = row[c];
    if (rows[r] && v !== null) out.push(v);
  });
  return out;
}

/**
 * One (mean, std) pair per column from training rows only. A column is
 * degenerate when its std is zero or undefined.
 */
export function computeNormalizationParams(matrix: WideMatrix, window: TrainingWindow): NormalizationParams[] {
  const mask = trainingRowMask(matrix, window);

  return matrix.columns.map((key, c) => {
    const stats = columnStats(presentValues(matrix, c, mask));
    return {
      key,
      mean: stats.mean,
      std: stats.std,
      degenerate: stats.std === null || stats.std === 0,
    };
  });
}

/**
 * Applies stored parameters to every row. Missing cells stay missing;
 * degenerate columns are 0 on every row.
 */
export function applyNormalization(matrix: WideMatrix, params: NormalizationParams[]): NormalizedMatrix {
  const byKey = new Map(params.map((p) => [p.key, p] as const));

  const transforms = matrix.columns.map((key): ((v: CellValue) => CellValue) => {
    const p = byKey.get(key);
    if (!p) {
      throw new IntegrityError(`No normalization parameters for column "${key}"`);
    }
    const { mean: mu, std: sd } = p;
    if (p.degenerate || mu === null || sd === null || sd === 0) {
      return () => 0;
    }
    return (v) => (v === null ? null : (v - mu) / sd);
  });

  return {
    timestamps: [...matrix.timestamps],
    columns: [...matrix.columns],
    values: matrix.values.map((row) => row.map((v, c) => transforms[c](v))),
  };
}

export interface DriftSummary {
  meanOfMeans: number;
  meanOfStds: number;
  columns: number;
}

export interface NormalizationSummary {
  allRows: DriftSummary | null;
  heldOut: DriftSummary | null;
}

function summarize(matrix: WideMatrix, rows: boolean[]): DriftSummary | null {
  const means: number[] = [];
  const stds: number[] = [];
  matrix.columns.forEach((_, c) => {
    const values = presentValues(matrix, c, rows);
    if (values.length === 0) return;
    means.push(mean(values));
    stds.push(populationStd(values));
  });
  if (means.length === 0) return null;
  return { meanOfMeans: mean(means), meanOfStds: mean(stds), columns: means.length };
}

/**
 * Average column mean and std of a normalized matrix, over all rows and over
 * the rows outside the training window. Held-out averages far from 0 and 1
 * indicate drift.
 */
export function summarizeNormalized(matrix: NormalizedMatrix, window: TrainingWindow): NormalizationSummary {
  const heldOutRows = matrix.timestamps.map((ts) => !inWindow(ts, window));
  return {
    allRows: summarize(matrix, matrix.timestamps.map(() => true)),
    heldOut: heldOutRows.some(Boolean) ? summarize(matrix, heldOutRows) : null,
  };
}
