/** Issue codes reported by `Schema.errors()`. */
export type SchemaIssueCode = 'UNRESOLVED_REFERENCE' | 'NOT_A_SCHEMA' | 'RECURSIVE_REFERENCE';

/** A single structural problem found while walking a schema tree. */
export interface SchemaIssue {
  /** Field identifier the issue belongs to. */
  readonly field: string;
  /** Name of the schema that declares the field. */
  readonly schema: string;
  /** Dotted path from the validated schema down to the field. */
  readonly path: string;
  /** Human-readable description. */
  readonly message: string;
  /** Machine-readable issue code. */
  readonly code: SchemaIssueCode;
  /** What the lookup found instead of a schema, if anything. */
  readonly found?: string;
}

/** Result of validating a schema tree. */
export interface SchemaValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly SchemaIssue[];
}

/** Create a passing validation result. */
export function validResult(): SchemaValidationResult {
  return { isValid: true, errors: [] };
}

/** Create a failing validation result with the given issues. */
export function invalidResult(errors: readonly SchemaIssue[]): SchemaValidationResult {
  return { isValid: false, errors };
}

/** Build the result matching a list of issues. */
export function toValidationResult(errors: readonly SchemaIssue[]): SchemaValidationResult {
  return errors.length === 0 ? validResult() : invalidResult(errors);
}

/** Render issues as one line each, for error messages. */
export function describeIssues(errors: readonly SchemaIssue[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join('\n');
}
