export type PipelineErrorCode =
  | 'SCHEMA'
  | 'RECORD'
  | 'KEY'
  | 'CONFLICT'
  | 'INTEGRITY'
  | 'STATS'
  | 'CONFIG';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Extract has no recognizable header. Fatal for that file only. */
export class SchemaError extends PipelineError {
  constructor(message: string, readonly file?: string) {
    super('SCHEMA', file ? `${file}: ${message}` : message);
  }
}

/** A single row could not be read. The row is skipped and audited. */
export class RecordError extends PipelineError {
  constructor(message: string, readonly row: number) {
    super('RECORD', `row ${row}: ${message}`);
  }
}

/** Entity key would be ambiguous. Fatal for that file. */
export class KeyError extends PipelineError {
  constructor(message: string) {
    super('KEY', message);
  }
}

export class ConflictError extends PipelineError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

/** Structural invariant broken between stages. Aborts the run. */
export class IntegrityError extends PipelineError {
  constructor(message: string) {
    super('INTEGRITY', message);
  }
}

export class StatsError extends PipelineError {
  constructor(message: string) {
    super('STATS', message);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
