import * as fs from 'fs';
import * as path from 'path';
import type { PipelineConfig } from '../config';
import { ConflictError, KeyError, SchemaError } from '../errors';
import type { StageLogger } from '../logging';
import type { AuditEntry, ConflictRecord, HourlyObservation, RawRecord, WideMatrix } from '../types/matrix';
import { findHeaderRow, mapRawRecords, readExtractGrid } from './excel';
import { meltMatrix, pivotObservations, unpivotRecords } from './reshape';

const EXTRACT_PATTERN = /^Demanda_Comercial_Por_Comercializador_SEME.*\.xlsx$/i;
const FALLBACK_PATTERN = /\.(xlsx|xls|csv)$/i;

export interface ExtractResult {
  file: string;
  records: RawRecord[];
  observations: HourlyObservation[];  // one per (timestamp, key), conflicts already resolved
  matrix: WideMatrix;                 // restricted to the hours present in the extract
  conflicts: ConflictRecord[];
  skipped: AuditEntry[];
}

export interface IngestionSummary {
  extracts: ExtractResult[];
  observations: HourlyObservation[];
  audit: AuditEntry[];
  skippedFiles: Array<{ file: string; reason: string }>;
}

export function conflictAuditEntries(file: string, conflicts: ConflictRecord[], policy: string): AuditEntry[] {
  return conflicts.map((c) => ({
    file,
    row: null,
    kind: 'conflict_resolved' as const,
    reason: `${c.key} @ ${c.timestamp}: ${c.previous} and ${c.incoming} resolved to ${c.resolved} (${policy})`,
  }));
}

/**
 * Lists the yearly extracts in `dir`. Files following the market operator's
 * naming are preferred; otherwise every spreadsheet or CSV is taken.
 */
export async function discoverExtracts(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir);
  const named = entries.filter((f) => EXTRACT_PATTERN.test(f));
  const picked = named.length > 0 ? named : entries.filter((f) => FALLBACK_PATTERN.test(f));
  return picked.sort().map((f) => path.join(dir, f));
}

export async function ingestExtract(
  filePath: string,
  config: PipelineConfig,
  logger: StageLogger
): Promise<ExtractResult> {
  const file = path.basename(filePath);
  logger.info(`reading: ${file}`);

  const grid = await readExtractGrid(filePath);
  const layout = findHeaderRow(grid, config.headerLookaheadRows, file);
  const { records, skipped } = mapRawRecords(grid, layout, file);
  for (const entry of skipped) {
    logger.warn(`${file} ${entry.reason} (skipped)`);
  }

  const longRows = unpivotRecords(records, config.keySeparator);
  const { matrix, conflicts } = pivotObservations(longRows, config.conflictPolicy);
  if (conflicts.length > 0) {
    logger.warn(`${file}: ${conflicts.length} duplicate observation(s) resolved by ${config.conflictPolicy}`);
  }

  logger.info(
    `${file}: ${records.length} records, ${longRows.length} hourly values, ${matrix.columns.length} entities`
  );

  return {
    file,
    records,
    observations: meltMatrix(matrix),
    matrix,
    conflicts,
    skipped: [...skipped, ...conflictAuditEntries(file, conflicts, config.conflictPolicy)],
  };
}

/**
 * Ingests every extract. Schema, key and conflict failures skip only the file
 * they occur in; anything else aborts.
 */
export async function ingestExtracts(
  files: string[],
  config: PipelineConfig,
  logger: StageLogger
): Promise<IngestionSummary> {
  const extracts: ExtractResult[] = [];
  const audit: AuditEntry[] = [];
  const skippedFiles: IngestionSummary['skippedFiles'] = [];

  for (const filePath of files) {
    const file = path.basename(filePath);
    try {
      const result = await ingestExtract(filePath, config, logger);
      extracts.push(result);
      audit.push(...result.skipped);
    } catch (err) {
      if (!(err instanceof SchemaError || err instanceof KeyError || err instanceof ConflictError)) {
        throw err;
      }
      logger.error(`${file} skipped: ${err.message}`);
      skippedFiles.push({ file, reason: err.message });
      audit.push({ file, row: null, kind: 'file_skipped', reason: err.message });
    }
  }

  return {
    extracts,
    observations: extracts.flatMap((e) => e.observations),
    audit,
    skippedFiles,
  };
}
