import {
  DuplicateNameError,
  EventBus,
  OptionTable,
  Schema,
  SchemaError,
  catalogOptions,
  describeIssues,
  toName,
  toValidationResult,
} from '@fixedline/core';
import type {
  DomainEvent,
  EventPayload,
  EventType,
  FixedRecord,
  InheritableOptions,
  InheritableOptionValues,
  SchemaBuilder,
  SchemaCatalog,
  SchemaIssue,
  SchemaOptions,
  SchemaValidationResult,
} from '@fixedline/core';
import type { ParsedLine } from './domain/model/ParsedLine.js';

/** Configuration for a layout. */
export interface LayoutConfig {
  /** Options inherited by every top-level schema. */
  readonly options?: InheritableOptions;
  /** Bus that receives the events of every schema in the layout. Default: a new `EventBus`. */
  readonly events?: EventBus;
}

/**
 * Root catalog of a file layout: holds the top-level schemas, picks the one
 * a line belongs to, and parses or formats whole lines.
 *
 * References that find nothing on their way up a schema tree end here.
 *
 * @example
 * ```typescript
 * const layout = new Layout({ options: { padding: '0' } });
 * layout.define('header', (s) => {
 *   s.addColumn('kind', 1);
 *   s.addColumn('count', 5, { type: 'integer' });
 * }, { singular: true, trap: (line) => line.startsWith('H') });
 * layout.parseLine('H00042'); // { schema: 'header', record: { kind: 'H', count: 42 } }
 * ```
 */
export class Layout implements SchemaCatalog {
  readonly options: OptionTable<InheritableOptionValues>;
  readonly events: EventBus;
  private readonly registry = new Map<string, Schema>();

  constructor(config: LayoutConfig = {}) {
    this.options = new OptionTable(catalogOptions, config.options ?? {});
    this.events = config.events ?? new EventBus();
  }

  /** Declare a top-level schema. Names are unique within the layout. */
  define(name: string, build: SchemaBuilder, options: SchemaOptions = {}): Schema {
    const id = toName(name);
    if (typeof id === 'string' && this.registry.has(id)) {
      throw new DuplicateNameError('layout', id, `Layout already defines a schema named '${id}'`);
    }

    const schema = new Schema({ ...options, name, parent: this });
    schema.setup(build);
    this.registry.set(schema.name, schema);

    this.events.emit({
      type: 'schema:defined',
      schema: schema.name,
      fields: schema.fields,
      timestamp: Date.now(),
    });
    return schema;
  }

  schemas(name: string): readonly Schema[] {
    const schema = this.registry.get(name);
    return schema ? [schema] : [];
  }

  /** The top-level schema called `name`. */
  schema(name: string): Schema {
    const schema = this.registry.get(name);
    if (!schema) {
      const known = this.names();
      throw new SchemaError(
        `Layout has no schema named '${name}'${known.length > 0 ? ` (defined: ${known.join(', ')})` : ''}`,
      );
    }
    return schema;
  }

  /** Top-level schema names in declaration order. */
  names(): string[] {
    return [...this.registry.keys()];
  }

  /** Inheritable option of the layout. */
  option<K extends keyof InheritableOptionValues>(key: K): InheritableOptionValues[K] | undefined {
    return this.options.read(key);
  }

  /** First schema, in declaration order, whose `match()` accepts `line`. */
  identify(line: string): Schema | null {
    for (const schema of this.registry.values()) {
      if (schema.match(line)) return schema;
    }
    return null;
  }

  parseLine(line: string): ParsedLine {
    const schema = this.identify(line);
    if (!schema) {
      throw new SchemaError(`No schema of the layout matches line '${line}'`);
    }
    return { schema: schema.name, record: schema.parse(line) };
  }

  formatLine(name: string, record: FixedRecord = {}): string {
    return this.schema(name).format(record);
  }

  /** Issues of every top-level schema, in declaration order. */
  errors(): readonly SchemaIssue[] {
    return [...this.registry.values()].flatMap((schema) => schema.errors());
  }

  validate(): SchemaValidationResult {
    return toValidationResult(this.errors());
  }

  /** Resolve everything up front; throws a `SchemaError` listing every issue. */
  assertValid(): this {
    const issues = this.errors();
    if (issues.length > 0) {
      throw new SchemaError(
        `Layout has ${String(issues.length)} unresolved field(s):\n${describeIssues(issues)}`,
        issues,
      );
    }
    return this;
  }

  // --- Events ---

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.events.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.events.off(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.events.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.events.offAny(handler);
    return this;
  }
}
