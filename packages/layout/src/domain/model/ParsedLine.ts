import type { FixedRecord } from '@fixedline/core';

/** A line read through `Layout.parseLine()`. */
export interface ParsedLine {
  /** Name of the top-level schema that matched the line. */
  readonly schema: string;
  readonly record: FixedRecord;
}
