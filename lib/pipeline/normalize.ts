import type { PipelineConfig } from '../config';
import type { StageLogger } from '../logging';
import {
  applyNormalization,
  computeNormalizationParams,
  summarizeNormalized,
  type NormalizationSummary,
} from '../normalization/normalizer';
import { normalizedMatrixFile, paramsFile } from '../paths';
import { readMatrixCsv, writeMatrixCsv } from '../storage/matrixCsv';
import { readParamsCsv, writeParamsCsv } from '../storage/paramStore';
import type { NormalizationParams, NormalizedMatrix } from '../types/matrix';

export interface NormalizePaths {
  inputFile: string;          // combined wide matrix
  outputDir: string;
  paramsFile?: string;        // reuse stored parameters instead of recomputing
}

export interface NormalizeResult {
  normalizedPath: string;
  paramsPath: string;
  params: NormalizationParams[];
  normalized: NormalizedMatrix;
  degenerateColumns: string[];
  summary: NormalizationSummary;
  reusedParams: boolean;
}

const fmt = (n: number) => n.toFixed(4);

/**
 * Combined matrix -> training-window parameters -> normalized matrix. When
 * `paths.paramsFile` is given the stored parameters are applied as-is.
 */
export async function runNormalize(
  config: PipelineConfig,
  paths: NormalizePaths,
  logger: StageLogger
): Promise<NormalizeResult> {
  const matrix = await readMatrixCsv(paths.inputFile);
  logger.info(`Loaded ${paths.inputFile} shape=(${matrix.timestamps.length}, ${matrix.columns.length})`);

  const { startYear, endYear } = config.trainingWindow;
  const reusedParams = paths.paramsFile !== undefined;
  const params = paths.paramsFile
    ? await readParamsCsv(paths.paramsFile)
    : computeNormalizationParams(matrix, config.trainingWindow);
  logger.info(
    reusedParams
      ? `Applying stored parameters from ${paths.paramsFile}`
      : `Computed parameters from training window ${startYear}-${endYear}`
  );

  const degenerateColumns = params.filter((p) => p.degenerate).map((p) => p.key);
  if (degenerateColumns.length > 0) {
    logger.warn(
      `${degenerateColumns.length} column(s) have zero or undefined std in ${startYear}-${endYear} and are set to 0`
    );
  }

  const normalized = applyNormalization(matrix, params);
  const normalizedPath = await writeMatrixCsv(normalizedMatrixFile(paths.outputDir, paths.inputFile), normalized);
  const paramsPath = paths.paramsFile ?? (await writeParamsCsv(paramsFile(paths.outputDir), params));

  logger.info('=== Normalization complete ===');
  logger.info(`Created: ${normalizedPath}`);
  logger.info(`Parameters: ${paramsPath}`);

  const summary = summarizeNormalized(normalized, config.trainingWindow);
  if (summary.allRows) {
    logger.info(`Avg of column means (all rows, normalized): ${fmt(summary.allRows.meanOfMeans)}`);
    logger.info(`Avg of column stds  (all rows, normalized): ${fmt(summary.allRows.meanOfStds)}`);
  }
  if (summary.heldOut) {
    logger.info(`Held-out avg mean across columns (z): ${fmt(summary.heldOut.meanOfMeans)}`);
    logger.info(`Held-out avg std  across columns (z): ${fmt(summary.heldOut.meanOfStds)}`);
  }

  return { normalizedPath, paramsPath, params, normalized, degenerateColumns, summary, reusedParams };
}
