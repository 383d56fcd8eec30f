import type { ConflictPolicy } from '../config';
import { toHourTimestamp } from '../calendar/service';
import { ConflictError, KeyError } from '../errors';
import type {
  ConflictRecord,
  EntityKey,
  HourlyObservation,
  HourTimestamp,
  RawRecord,
  WideMatrix,
} from '../types/matrix';

export function deriveEntityKey(provider: string, market: string, separator: string): EntityKey {
  if (!separator) {
    throw new KeyError('Key separator must not be empty');
  }
  if (provider.includes(separator) || market.includes(separator)) {
    throw new KeyError(
      `Separator ${JSON.stringify(separator)} appears in provider "${provider}" or market "${market}"`
    );
  }
  return `${provider}${separator}${market}`;
}

/** One observation per present hour value; absent hours emit nothing. */
export function unpivotRecords(records: RawRecord[], separator: string): HourlyObservation[] {
  const observations: HourlyObservation[] = [];
  for (const record of records) {
    const key = deriveEntityKey(record.provider, record.market, separator);
    record.hours.forEach((value, hour) => {
      if (value !== null) {
        observations.push({ timestamp: toHourTimestamp(record.date, hour), key, value });
      }
    });
  }
  return observations;
}

function resolveConflict(policy: ConflictPolicy, previous: number, incoming: number): number {
  switch (policy) {
    case 'sum':
      return previous + incoming;
    case 'last-write-wins':
      return incoming;
    case 'error':
      throw new ConflictError(`Duplicate observation (${previous} vs ${incoming})`);
  }
}

/**
 * Long-to-wide pivot over a two-level map (timestamp -> key -> value). Rows
 * come out sorted by timestamp and columns by key. Duplicate (timestamp, key)
 * pairs are resolved with `policy` and reported.
 */
export function pivotObservations(
  observations: HourlyObservation[],
  policy: ConflictPolicy
): { matrix: WideMatrix; conflicts: ConflictRecord[] } {
  const byTimestamp = new Map<HourTimestamp, Map<EntityKey, number>>();
  const keys = new Set<EntityKey>();
  const conflicts: ConflictRecord[] = [];

  for (const { timestamp, key, value } of observations) {
    keys.add(key);
    let row = byTimestamp.get(timestamp);
    if (!row) {
      row = new Map();
      byTimestamp.set(timestamp, row);
    }

    const previous = row.get(key);
    if (previous === undefined) {
      row.set(key, value);
      continue;
    }

    let resolved: number;
    try {
      resolved = resolveConflict(policy, previous, value);
    } catch (err) {
      if (err instanceof ConflictError) {
        throw new ConflictError(`${key} @ ${timestamp}: ${err.message}`);
      }
      throw err;
    }
    row.set(key, resolved);
    conflicts.push({ timestamp, key, previous, incoming: value, resolved });
  }

  const columns = [...keys].sort();
  const timestamps = [...byTimestamp.keys()].sort();
  const values = timestamps.map((ts) => {
    const row = byTimestamp.get(ts) ?? new Map<EntityKey, number>();
    return columns.map((key) => row.get(key) ?? null);
  });

  return { matrix: { timestamps, columns, values }, conflicts };
}

/** Inverse of the pivot: every non-missing cell as an observation. */
export function meltMatrix(matrix: WideMatrix): HourlyObservation[] {
  const observations: HourlyObservation[] = [];
  matrix.timestamps.forEach((timestamp, r) => {
    matrix.columns.forEach((key, c) => {
      const value = matrix.values[r][c];
      if (value !== null) observations.push({ timestamp, key, value });
    });
  });
  return observations;
}
