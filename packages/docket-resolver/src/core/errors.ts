/**
 * Docket Resolver Error Types
 *
 * Structural failures (malformed location codes, missing source columns)
 * are thrown and abort the current resolution call. Data sparsity is never
 * an error: empty windows and unmatched causes resolve to empty collections.
 */

/**
 * Base class for every error the resolver raises on purpose.
 *
 * The CLI maps instances of this class to a domain exit code; anything else
 * is treated as unexpected.
 */
export class DocketResolverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocketResolverError';
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A location component could not be turned into its two-digit or
 * single-letter form.
 */
export class EncodingError extends DocketResolverError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = 'EncodingError';
  }
}

/**
 * A string did not match the `SSTTDRRDB` layout.
 */
export class DecodeError extends DocketResolverError {
  constructor(public readonly code: string) {
    super(`Malformed location code: ${JSON.stringify(code)}`);
    this.name = 'DecodeError';
  }
}

/**
 * A source table lacks one or more columns a resolver depends on.
 *
 * RECOVERY:
 * - Check the table name against the source database schema
 * - Column names are case sensitive
 */
export class MissingColumnError extends DocketResolverError {
  constructor(
    public readonly table: string,
    public readonly columns: readonly string[]
  ) {
    super(`Table ${table} is missing required column(s): ${columns.join(', ')}`);
    this.name = 'MissingColumnError';
  }
}

/**
 * A source row holds a value that cannot be coerced to its column type.
 */
export class RowValidationError extends DocketResolverError {
  constructor(
    public readonly table: string,
    public readonly rowIndex: number,
    public readonly issues: readonly string[]
  ) {
    super(`Table ${table}, row ${rowIndex}: ${issues.join('; ')}`);
    this.name = 'RowValidationError';
  }
}

/**
 * Configuration could not be read or holds an invalid value.
 */
export class ConfigError extends DocketResolverError {
  constructor(message: string, public readonly source?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised as a value, not thrown: a linked location code is a textual
 * substring of another plat code (or contains one), so a free-text match
 * would have returned more sections than the exact match does.
 */
export class AmbiguousMatchWarning {
  readonly name = 'AmbiguousMatchWarning';

  constructor(
    public readonly cause: string,
    public readonly code: string,
    public readonly overlapping: readonly string[]
  ) {}

  get message(): string {
    return (
      `Cause ${this.cause}: code ${this.code} overlaps textually with ` +
      `${this.overlapping.join(', ')}; exact match used`
    );
  }
}

export function isDocketResolverError(error: unknown): error is DocketResolverError {
  return error instanceof DocketResolverError;
}
