export type EntityKey = string;          // "<PROVIDER><sep><MARKET>"
export type HourTimestamp = string;      // "YYYY-MM-DD HH:00:00", sorts lexicographically
export type CellValue = number | null;   // null = missing reading

export interface CalendarDate {
  year: number;
  month: number;           // 1..12
  day: number;             // 1..31
}

export interface RawRecord {
  date: CalendarDate;
  provider: string;        // trimmed, upper-cased
  market: string;          // trimmed, upper-cased
  hours: CellValue[];      // always 24 entries, index = hour of day
  sourceRow: number;       // 1-based row in the extract
}

export interface HourlyObservation {
  timestamp: HourTimestamp;
  key: EntityKey;
  value: number;
}

/**
 * Row-major hourly matrix. `values[r][c]` is the reading for `timestamps[r]`
 * and `columns[c]`.
 */
export interface WideMatrix {
  timestamps: HourTimestamp[];
  columns: EntityKey[];
  values: CellValue[][];
}

/** Same shape and ordering as the WideMatrix it was derived from. */
export type NormalizedMatrix = WideMatrix;

export interface TrainingWindow {
  startYear: number;       // inclusive
  endYear: number;         // inclusive
}

export interface NormalizationParams {
  key: EntityKey;
  mean: number | null;     // null when the column has no training observations
  std: number | null;      // sample std (n - 1); null when fewer than 2 observations
  degenerate: boolean;
}

export type AuditKind = 'record_skipped' | 'conflict_resolved' | 'file_skipped';

export interface AuditEntry {
  file: string;
  row: number | null;
  kind: AuditKind;
  reason: string;
}

export interface ConflictRecord {
  timestamp: HourTimestamp;
  key: EntityKey;
  previous: number;
  incoming: number;
  resolved: number;
}
