// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * Aborts the report being built for one object type. The runner records it as a
 * failure for that type and keeps building the others.
 */
export class ReportAbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportAbortError';
  }
}

/** A caller handed a type-specific routine a type it does not handle. */
export class ContractError extends ReportAbortError {
  constructor(
    message: string,
    public readonly received?: string,
  ) {
    super(message);
    this.name = 'ContractError';
  }
}

export class NestingCycleError extends ReportAbortError {
  constructor(
    message: string,
    public readonly cycles: ReadonlyArray<ReadonlyArray<{ id: number; name: string }>>,
  ) {
    super(message);
    this.name = 'NestingCycleError';
  }
}

export class RemovalFileError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'RemovalFileError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}
