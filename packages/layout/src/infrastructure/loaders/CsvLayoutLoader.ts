import Papa from 'papaparse';
import { SchemaError, isAlignment, isColumnType } from '@fixedline/core';
import type { ColumnOptions, InheritableOptions, Schema } from '@fixedline/core';
import { Layout } from '../../Layout.js';
import type { LayoutLoader, LoaderOptions } from '../../domain/ports/LayoutLoader.js';

export type CsvLayoutLoaderOptions = LoaderOptions;

type Row = Partial<Record<string, string>>;

type FieldRow =
  | { readonly kind: 'column'; readonly field: string; readonly length: number; readonly options: ColumnOptions }
  | { readonly kind: 'spacer'; readonly length: number; readonly padding?: string }
  | { readonly kind: 'reference'; readonly store: string; readonly target: string; readonly options: InheritableOptions };

const KINDS = ['column', 'spacer', 'filler', 'reference'] as const;

/**
 * Layout loader for CSV field tables using PapaParse.
 *
 * One row per field, with the header
 * `schema,field,kind,length,align,padding,type,group,target`. Schemas are
 * declared in the order they first appear; their fields in row order.
 *
 * @example
 * ```csv
 * schema,field,kind,length,align,padding,type,group,target
 * detail,id,,3,left,,,,
 * detail,,spacer,1,,,,,
 * detail,code,,4,,,,,
 * ```
 */
export class CsvLayoutLoader implements LayoutLoader {
  private readonly options: CsvLayoutLoaderOptions;

  constructor(options?: CsvLayoutLoaderOptions) {
    this.options = {
      delimiter: options?.delimiter,
      encoding: options?.encoding ?? 'utf-8',
    };
  }

  load(data: string | Buffer, layout: Layout = new Layout()): Layout {
    const content = typeof data === 'string' ? data : data.toString(this.options.encoding);

    const result = Papa.parse<Row>(content, {
      header: true,
      delimiter: this.options.delimiter || undefined,
      skipEmptyLines: true,
      dynamicTyping: false,
      transformHeader: (header) => header.trim().toLowerCase(),
    });

    const fatal = result.errors.find((error) => error.type !== 'FieldMismatch');
    if (fatal) {
      const where = typeof fatal.row === 'number' ? `Row ${String(fatal.row + 2)}: ` : '';
      throw new SchemaError(`${where}${fatal.message}`);
    }

    const schemas = new Map<string, FieldRow[]>();
    result.data.forEach((row, index) => {
      const line = index + 2;
      const name = cell(row, 'schema');
      if (name === undefined) throw rowError(line, 'missing schema name');

      const fields = schemas.get(name) ?? [];
      fields.push(readField(row, line));
      schemas.set(name, fields);
    });

    for (const [name, fields] of schemas) {
      layout.define(name, (schema) => {
        for (const field of fields) declare(schema, field);
      });
    }
    return layout;
  }
}

function declare(schema: Schema, field: FieldRow): void {
  switch (field.kind) {
    case 'column':
      schema.addColumn(field.field, field.length, field.options);
      break;
    case 'spacer':
      schema.addFiller(field.length, field.padding);
      break;
    case 'reference':
      schema.addReference({ ...field.options, name: field.store, schemaName: field.target });
      break;
  }
}

function readField(row: Row, line: number): FieldRow {
  const kind = cell(row, 'kind') ?? 'column';
  if (!KINDS.some((known) => known === kind)) {
    throw rowError(line, `unknown kind '${kind}' (expected ${KINDS.join(', ')})`);
  }

  const align = cell(row, 'align');
  if (align !== undefined && !isAlignment(align)) {
    throw rowError(line, `unknown align '${align}'`);
  }
  const padding = cell(row, 'padding') ?? row['padding'];
  const usablePadding = padding === '' ? undefined : padding;

  if (kind === 'reference') {
    const target = cell(row, 'target');
    if (target === undefined) throw rowError(line, 'reference needs a target schema');
    return {
      kind: 'reference',
      store: cell(row, 'field') ?? target,
      target,
      options: {
        ...(align !== undefined ? { align } : {}),
        ...(usablePadding !== undefined ? { padding: usablePadding } : {}),
      },
    };
  }

  const length = readLength(row, line);
  if (kind === 'spacer' || kind === 'filler') {
    return usablePadding === undefined ? { kind: 'spacer', length } : { kind: 'spacer', length, padding: usablePadding };
  }

  const field = cell(row, 'field');
  if (field === undefined) throw rowError(line, 'column needs a field name');
  const type = cell(row, 'type');
  if (type !== undefined && !isColumnType(type)) {
    throw rowError(line, `unknown type '${type}'`);
  }
  const group = cell(row, 'group');

  return {
    kind: 'column',
    field,
    length,
    options: {
      ...(align !== undefined ? { align } : {}),
      ...(usablePadding !== undefined ? { padding: usablePadding } : {}),
      ...(type !== undefined ? { type } : {}),
      ...(group !== undefined ? { group } : {}),
    },
  };
}

function readLength(row: Row, line: number): number {
  const raw = cell(row, 'length');
  if (raw === undefined) throw rowError(line, 'missing length');
  if (!/^\d+$/.test(raw) || Number(raw) === 0) {
    throw rowError(line, `length '${raw}' is not a positive integer`);
  }
  return Number(raw);
}

/** Trimmed cell value; blank cells read as absent. */
function cell(row: Row, key: string): string | undefined {
  const value = row[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function rowError(line: number, message: string): SchemaError {
  return new SchemaError(`Row ${String(line)}: ${message}`);
}
