/**
 * Port for a single fixed-width value.
 *
 * Implementations must be total over any capture: `parse()` accepts text of
 * up to `length` codepoints (shorter when the line ends early) and `format()`
 * returns exactly `length` codepoints or throws.
 */
export interface FieldCodec {
  /** Field identifier the value is stored under. */
  readonly name: string;
  /** Width in codepoints. */
  readonly length: number;
  /** Free-form grouping label. */
  readonly group?: string | undefined;
  parse(capture: string): unknown;
  format(value: unknown): string;
}
