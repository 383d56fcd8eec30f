import { ConfigError } from './errors';
import type { TrainingWindow } from './types/matrix';

export type ConflictPolicy = 'sum' | 'last-write-wins' | 'error';

const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['sum', 'last-write-wins', 'error'];

export interface PipelineConfig {
  readonly gapFillMaxHours: number;          // 0 disables short-gap filling
  readonly keySeparator: string;
  readonly headerLookaheadRows: number;
  readonly conflictPolicy: ConflictPolicy;
  readonly trainingWindow: Readonly<TrainingWindow>;
  readonly years: readonly number[] | null; // null = every year observed
}

export const DEFAULT_CONFIG: PipelineConfig = Object.freeze({
  gapFillMaxHours: 2,
  keySeparator: '|',
  headerLookaheadRows: 10,
  conflictPolicy: 'sum',
  trainingWindow: Object.freeze({ startYear: 2020, endYear: 2022 }),
  years: null,
});

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'trainingWindow'>> & {
  trainingWindow?: Partial<TrainingWindow>;
};

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return n;
}

export function parseConflictPolicy(raw: string): ConflictPolicy {
  const policy = CONFLICT_POLICIES.find((p) => p === raw.trim().toLowerCase());
  if (!policy) {
    throw new ConfigError(`Unknown conflict policy "${raw}" (expected ${CONFLICT_POLICIES.join(', ')})`);
  }
  return policy;
}

export function parseYearList(raw: string): number[] {
  const years = raw
    .split(/[,\s]+/)
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number);
  if (years.length === 0 || years.some((y) => !Number.isInteger(y))) {
    throw new ConfigError(`Invalid year list "${raw}"`);
  }
  return [...new Set(years)].sort((a, b) => a - b);
}

function validate(config: PipelineConfig): PipelineConfig {
  if (!Number.isInteger(config.gapFillMaxHours) || config.gapFillMaxHours < 0) {
    throw new ConfigError(`gapFillMaxHours must be a non-negative integer, got ${config.gapFillMaxHours}`);
  }
  if (!Number.isInteger(config.headerLookaheadRows) || config.headerLookaheadRows < 1) {
    throw new ConfigError(`headerLookaheadRows must be a positive integer, got ${config.headerLookaheadRows}`);
  }
  if (config.keySeparator.length === 0) {
    throw new ConfigError('keySeparator must not be empty');
  }
  const { startYear, endYear } = config.trainingWindow;
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear) || startYear > endYear) {
    throw new ConfigError(`Invalid training window ${startYear}-${endYear}`);
  }
  return config;
}

/**
 * Builds the run configuration from environment variables, then explicit
 * overrides (CLI flags). The result is frozen and passed to every stage.
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: PipelineConfigOverrides = {}
): PipelineConfig {
  const fromEnv: PipelineConfigOverrides = {
    gapFillMaxHours: readInt(env, 'GAP_FILL_MAX_HOURS'),
    headerLookaheadRows: readInt(env, 'HEADER_LOOKAHEAD_ROWS'),
    keySeparator: env.KEY_SEPARATOR || undefined,
    conflictPolicy: env.CONFLICT_POLICY ? parseConflictPolicy(env.CONFLICT_POLICY) : undefined,
    years: env.YEARS ? parseYearList(env.YEARS) : undefined,
    trainingWindow: {
      startYear: readInt(env, 'TRAIN_START_YEAR'),
      endYear: readInt(env, 'TRAIN_END_YEAR'),
    },
  };

  const pick = <K extends keyof PipelineConfigOverrides>(key: K) => overrides[key] ?? fromEnv[key];

  const config: PipelineConfig = {
    gapFillMaxHours: pick('gapFillMaxHours') ?? DEFAULT_CONFIG.gapFillMaxHours,
    keySeparator: pick('keySeparator') ?? DEFAULT_CONFIG.keySeparator,
    headerLookaheadRows: pick('headerLookaheadRows') ?? DEFAULT_CONFIG.headerLookaheadRows,
    conflictPolicy: pick('conflictPolicy') ?? DEFAULT_CONFIG.conflictPolicy,
    years: pick('years') ?? DEFAULT_CONFIG.years,
    trainingWindow: Object.freeze({
      startYear:
        overrides.trainingWindow?.startYear ??
        fromEnv.trainingWindow?.startYear ??
        DEFAULT_CONFIG.trainingWindow.startYear,
      endYear:
        overrides.trainingWindow?.endYear ??
        fromEnv.trainingWindow?.endYear ??
        DEFAULT_CONFIG.trainingWindow.endYear,
    }),
  };

  return Object.freeze(validate(config));
}
