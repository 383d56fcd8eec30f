import type { PipelineConfig } from '../config';
import { ConfigError, SchemaError } from '../errors';
import { conflictAuditEntries, discoverExtracts, ingestExtracts } from '../ingestion/pipeline';
import { pivotObservations } from '../ingestion/reshape';
import type { StageLogger } from '../logging';
import { auditFile, combinedMatrixFile, yearMatrixFile } from '../paths';
import { writeAudit } from '../storage/fsStore';
import { writeMatrixCsv } from '../storage/matrixCsv';
import { mergeYears } from '../timeline/merge';
import { reconstructYear, splitByYear, type ReconstructedYear } from '../timeline/reconstruct';
import type { WideMatrix } from '../types/matrix';

export interface TransformPaths {
  inputDir: string;
  outputDir: string;
}

export interface TransformResult {
  files: string[];
  skippedFiles: Array<{ file: string; reason: string }>;
  years: Array<{ year: number; path: string; rows: number; columns: number; filledCells: number }>;
  combined: { path: string; matrix: WideMatrix };
  auditPath: string;
  auditEntries: number;
}

/**
 * Extracts -> per-year hourly matrices -> combined multi-year matrix.
 */
export async function runTransform(
  config: PipelineConfig,
  paths: TransformPaths,
  logger: StageLogger
): Promise<TransformResult> {
  logger.info(`Folder: ${paths.inputDir}`);
  const files = await discoverExtracts(paths.inputDir);
  if (files.length === 0) {
    throw new ConfigError(`No extract files found in ${paths.inputDir}`);
  }
  logger.info(`Found ${files.length} extract file(s)`);

  const ingestion = await ingestExtracts(files, config, logger);
  if (ingestion.observations.length === 0) {
    throw new SchemaError(`No hourly observations found in ${files.length} extract(s)`);
  }
  logger.info(`Total long rows: ${ingestion.observations.length}`);

  // Extracts can overlap (re-issued months); resolve across files too
  const { matrix: sparse, conflicts } = pivotObservations(ingestion.observations, config.conflictPolicy);
  const audit = [...ingestion.audit, ...conflictAuditEntries('(across extracts)', conflicts, config.conflictPolicy)];
  if (conflicts.length > 0) {
    logger.warn(`${conflicts.length} observation(s) repeated across extracts, resolved by ${config.conflictPolicy}`);
  }

  const byYear = splitByYear(sparse);
  const wanted = config.years ? new Set(config.years) : null;
  const reconstructed: ReconstructedYear[] = [];
  const years: TransformResult['years'] = [];

  for (const [year, part] of byYear) {
    if (wanted && !wanted.has(year)) continue;
    logger.info(`=== YEAR ${year} ===`);

    const result = reconstructYear(part, year, config);
    const filledCells = Object.values(result.filled).reduce((sum, n) => sum + n, 0);
    const outPath = await writeMatrixCsv(yearMatrixFile(paths.outputDir, year), result.matrix);
    logger.info(
      `SAVED: ${outPath} shape=(${result.matrix.timestamps.length}, ${result.matrix.columns.length}) ` +
        `observed=${result.observedRows} filled=${filledCells}`
    );

    reconstructed.push(result);
    years.push({
      year,
      path: outPath,
      rows: result.matrix.timestamps.length,
      columns: result.matrix.columns.length,
      filledCells,
    });
  }

  for (const year of wanted ?? []) {
    if (!byYear.has(year)) logger.warn(`no rows for ${year}, skipping`);
  }
  if (reconstructed.length === 0) {
    throw new ConfigError('None of the requested years has data');
  }

  const combined = mergeYears(reconstructed.map((r) => r.matrix));
  const firstYear = reconstructed[0].year;
  const lastYear = reconstructed[reconstructed.length - 1].year;
  const combinedPath = await writeMatrixCsv(combinedMatrixFile(paths.outputDir, firstYear, lastYear), combined);
  logger.info(`SAVED combined: ${combinedPath} shape=(${combined.timestamps.length}, ${combined.columns.length})`);

  const auditPath = await writeAudit(auditFile(paths.outputDir), audit);
  if (audit.length > 0) {
    logger.warn(`${audit.length} audit entr${audit.length === 1 ? 'y' : 'ies'} written to ${auditPath}`);
  }

  return {
    files,
    skippedFiles: ingestion.skippedFiles,
    years,
    combined: { path: combinedPath, matrix: combined },
    auditPath,
    auditEntries: audit.length,
  };
}
