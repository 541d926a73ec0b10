import { FormatError } from './Errors.js';
import {
  OptionTable,
  defineOptions,
  isBoolean,
  isIdentifier,
  isNonEmptyString,
  isPositiveInteger,
  isSingleCharacter,
  oneOf,
  toName,
} from './Options.js';
import type { OptionDefinition } from './Options.js';
import { isAlignment } from './LayoutOptions.js';
import type { Alignment } from './LayoutOptions.js';
import type { FieldCodec } from '../ports/FieldCodec.js';
import { codepoints } from '../services/Codepoints.js';

/**
 * Built-in value coercions.
 *
 * `integer` text beyond `Number.MAX_SAFE_INTEGER` parses to a `bigint`.
 * `decimal` parses to a `number`, so the scale is not kept: `'015.50'` reads
 * as `15.5` and formats back as `'0015.5'`. Use `string` or a custom
 * `parser`/`formatter` pair where trailing zeros matter.
 */
export type ColumnType = 'string' | 'integer' | 'decimal';

export const COLUMN_TYPES: readonly ColumnType[] = ['string', 'integer', 'decimal'];

export const isColumnType = oneOf(COLUMN_TYPES);

/** Custom decoder. Receives the raw capture, padding included. */
export type ValueParser = (capture: string) => unknown;

/** Custom encoder. Its result is padded (or truncated) like any other value. */
export type ValueFormatter = (value: unknown) => string;

export interface ColumnOptionValues {
  name: string;
  length: number;
  align: Alignment;
  padding: string;
  truncate: boolean;
  type: ColumnType;
  blankAsNull: boolean;
  group?: string;
  parser?: ValueParser;
  formatter?: ValueFormatter;
}

/** Per-column settings accepted by `Schema.addColumn()`. */
export interface ColumnOptions {
  /** Side the value sticks to. Default: `'right'`, or the enclosing schema's `align`. */
  readonly align?: Alignment;
  /** Single padding character. Default: `' '`, or the enclosing schema's `padding`. */
  readonly padding?: string;
  /** Cut over-long values instead of throwing `FormatError`. Default: `false`. */
  readonly truncate?: boolean;
  /** Coercion applied by `parse()`. Default: `'string'`. */
  readonly type?: ColumnType;
  /** Parse blank strings as `null`. Default: `false`. */
  readonly blankAsNull?: boolean;
  /** Free-form grouping label. */
  readonly group?: string;
  readonly parser?: ValueParser;
  readonly formatter?: ValueFormatter;
}

/** Everything a `Column` is built from: its settings plus the identity `Schema.addColumn()` supplies. */
export interface ColumnSettings extends ColumnOptions {
  readonly name: string;
  readonly length: number;
}

function isValueParser(value: unknown): value is ValueParser {
  return typeof value === 'function';
}

function isValueFormatter(value: unknown): value is ValueFormatter {
  return typeof value === 'function';
}

export const columnOptions: OptionDefinition<ColumnOptionValues> = defineOptions<ColumnOptionValues>(
  'Column',
  {
    name: { transform: toName, validate: isIdentifier, inheritable: false },
    length: { validate: isPositiveInteger, inheritable: false },
    align: { validate: isAlignment, default: 'right' },
    padding: { validate: isSingleCharacter, default: ' ' },
    truncate: { validate: isBoolean, default: false },
    type: { validate: isColumnType, default: 'string', inheritable: false },
    blankAsNull: { validate: isBoolean, default: false, inheritable: false },
    group: { transform: toName, validate: isNonEmptyString, inheritable: false },
    parser: { validate: isValueParser, inheritable: false },
    formatter: { validate: isValueFormatter, inheritable: false },
  },
  {
    required: ['name', 'length'],
    readers: ['name', 'length', 'align', 'padding', 'truncate', 'type', 'blankAsNull', 'group'],
    writers: ['align', 'padding', 'truncate', 'blankAsNull'],
  },
);

/**
 * Default field codec: a padded, aligned text value of fixed width with
 * optional numeric coercion.
 *
 * Filler columns occupy width but never produce or consume a value.
 */
export class Column implements FieldCodec {
  readonly options: OptionTable<ColumnOptionValues>;
  readonly filler: boolean;

  constructor(options: ColumnSettings, filler = false) {
    this.options = new OptionTable(columnOptions, options);
    this.filler = filler;
  }

  /** A filler column: `padding` repeated `length` times, excluded from records. */
  static filler(name: string, length: number, padding?: string): Column {
    return new Column({ name, length, padding }, true);
  }

  get name(): string {
    return this.options.require('name');
  }

  get length(): number {
    return this.options.require('length');
  }

  get group(): string | undefined {
    return this.options.get('group');
  }

  get align(): Alignment {
    return this.options.require('align');
  }

  get padding(): string {
    return this.options.require('padding');
  }

  parse(capture: string): unknown {
    const parser = this.options.get('parser');
    if (parser) return parser(capture);

    const text = this.strip(capture);
    // A capture made only of zero padding is the number zero.
    const digits = text === '' && capture !== '' && this.padding === '0' ? '0' : text;

    switch (this.options.require('type')) {
      case 'integer':
        return coerceInteger(digits);
      case 'decimal':
        return coerceNumber(digits, /^[+-]?(\d+\.?\d*|\.\d+)$/);
      case 'string':
        return text === '' && this.options.get('blankAsNull') === true ? null : text;
    }
  }

  format(value: unknown): string {
    const length = this.length;
    const padding = this.padding;
    if (this.filler) return padding.repeat(length);

    const text = this.toText(value);
    const chars = codepoints(text);

    if (chars.length > length) {
      if (this.options.get('truncate') !== true) {
        throw new FormatError(
          this.name,
          value,
          `Value '${text}' is ${String(chars.length)} characters long; column '${this.name}' holds ${String(length)}`,
        );
      }
      return chars.slice(0, length).join('');
    }

    const fill = padding.repeat(length - chars.length);
    return this.align === 'left' ? text + fill : fill + text;
  }

  private toText(value: unknown): string {
    const formatter = this.options.get('formatter');
    if (formatter) return formatter(value);
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return value.toISOString();
    return String(value);
  }

  /** Remove padding from the side opposite the alignment. */
  private strip(capture: string): string {
    const chars = codepoints(capture);
    const padding = this.padding;

    if (this.align === 'right') {
      let start = 0;
      while (start < chars.length && chars[start] === padding) start++;
      return chars.slice(start).join('');
    }

    let end = chars.length;
    while (end > 0 && chars[end - 1] === padding) end--;
    return chars.slice(0, end).join('');
  }
}

/** Blank text reads as `null`; text that is not a number is kept as-is. */
function coerceNumber(text: string, pattern: RegExp): number | string | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  return pattern.test(trimmed) ? Number(trimmed) : text;
}

/** Like `coerceNumber`, but integers too large for a `number` stay exact as a `bigint`. */
function coerceInteger(text: string): number | bigint | string | null {
  const value = coerceNumber(text, /^[+-]?\d+$/);
  if (typeof value !== 'number' || Number.isSafeInteger(value)) return value;
  return BigInt(text.trim());
}
