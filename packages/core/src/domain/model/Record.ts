/** A structured record as produced by `Schema.parse()` and consumed by `Schema.format()`. */
export interface FixedRecord {
  readonly [key: string]: unknown;
}

/** Whether a value can be read as a (sub-)record. Arrays are not records. */
export function isRecord(value: unknown): value is FixedRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
