import type { SchemaIssue } from './ValidationResult.js';

/** Machine-readable error codes carried by every thrown `FixedLineError`. */
export type FixedLineErrorCode = 'CONFIG' | 'DUPLICATE_NAME' | 'SCHEMA' | 'FORMAT';

/** Base class of every error the layout engine throws. */
export class FixedLineError extends Error {
  readonly code: FixedLineErrorCode;

  constructor(code: FixedLineErrorCode, message: string) {
    super(message);
    this.name = 'FixedLineError';
    this.code = code;
  }
}

/** An option is missing, unknown, or fails its validator. */
export class ConfigError extends FixedLineError {
  /** Owner type whose options were rejected (e.g. `'Column'`). */
  readonly owner: string;
  /** Offending option key, when a single key is at fault. */
  readonly option?: string;

  constructor(owner: string, message: string, option?: string) {
    super('CONFIG', `${owner}: ${message}`);
    this.name = 'ConfigError';
    this.owner = owner;
    if (option !== undefined) this.option = option;
  }
}

/** A field or group name collides with one already declared in the same schema. */
export class DuplicateNameError extends FixedLineError {
  readonly schema: string;
  readonly field: string;

  constructor(schema: string, field: string, message: string) {
    super('DUPLICATE_NAME', message);
    this.name = 'DuplicateNameError';
    this.schema = schema;
    this.field = field;
  }
}

/**
 * Structural problem with a schema: an unresolvable reference, a malformed
 * declaration, a reference cycle, or re-entering `setup()`.
 *
 * Raised by `assertValid()` with every collected issue attached.
 */
export class SchemaError extends FixedLineError {
  readonly issues: readonly SchemaIssue[];

  constructor(message: string, issues: readonly SchemaIssue[] = []) {
    super('SCHEMA', message);
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

/** A value cannot be written into its column without losing characters. */
export class FormatError extends FixedLineError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, message: string) {
    super('FORMAT', message);
    this.name = 'FormatError';
    this.field = field;
    this.value = value;
  }
}
