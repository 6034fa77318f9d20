/**
 * Base class for every error the report engine raises.
 */
export class ReportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The report configuration is incomplete or malformed.
 * Recoverable: show `errors` to the user and let them fix the config.
 */
export class ConfigValidationError extends ReportError {
  constructor(readonly errors: readonly string[]) {
    super(`Invalid report configuration:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

export class UnknownTableError extends ReportError {
  constructor(
    readonly table: string,
    readonly validTables: readonly string[]
  ) {
    super(`Unknown table "${table}". Available tables: ${validTables.join(', ')}`);
  }
}

export class ColumnNotFoundError extends ReportError {
  constructor(
    readonly column: string,
    readonly table: string,
    readonly validColumns: readonly string[]
  ) {
    super(`Column "${column}" not found in table "${table}". Valid columns: ${validColumns.join(', ')}`);
  }
}

export class QueryBuildError extends ReportError { }

/**
 * The generated SQL failed the read-only safety gate. Execution must not proceed.
 * The message carries the reason only, never the rejected SQL.
 */
export class SafetyRejectionError extends ReportError {
  constructor(readonly reason: string) {
    super(`Query rejected: ${reason}`);
  }
}

export class ExecutionError extends ReportError { }

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
