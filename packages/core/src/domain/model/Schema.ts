import { Column } from './Column.js';
import type { ColumnOptions } from './Column.js';
import { ConfigError, DuplicateNameError, SchemaError } from './Errors.js';
import { SchemaReference } from './FieldEntry.js';
import type { FieldEntry, NestedSchemaEntry } from './FieldEntry.js';
import { inheritableSpecs } from './LayoutOptions.js';
import type { InheritableOptions, InheritableOptionValues } from './LayoutOptions.js';
import { OptionTable, defineOptions, isBoolean, isIdentifier, toName } from './Options.js';
import type { OptionDefinition, OptionSource } from './Options.js';
import { isRecord } from './Record.js';
import type { FixedRecord } from './Record.js';
import { describeIssues, toValidationResult } from './ValidationResult.js';
import type { SchemaIssue, SchemaIssueCode, SchemaValidationResult } from './ValidationResult.js';
import type { DomainEvent } from '../events/DomainEvents.js';
import type { SchemaCatalog } from '../ports/SchemaCatalog.js';
import { codepoints, sliceCodepoints, width } from '../services/Codepoints.js';
import { SchemaValidator } from '../services/SchemaValidator.js';

/** Extra gate applied by `match()` once the length check passes. */
export type LinePredicate = (line: string) => boolean;

/** Receives the schema under construction. */
export type SchemaBuilder = (schema: Schema) => void;

/** Anything a schema can hang from: another schema or the root catalog. */
export type SchemaParent = Schema | SchemaCatalog;

export interface SchemaOptionValues extends InheritableOptionValues {
  name: string;
  optional: boolean;
  singular: boolean;
  trap?: LinePredicate;
}

/** Options accepted when declaring a schema. */
export interface SchemaOptions extends InheritableOptions {
  readonly trap?: LinePredicate;
}

export interface SchemaConfig extends SchemaOptions {
  readonly name: string;
  readonly parent: SchemaParent;
}

/**
 * Declaration of a reference field. `name` is the store name, `schemaName`
 * the schema to bind; either one defaults to the other.
 */
export interface ReferenceDeclaration extends InheritableOptions {
  readonly name?: string;
  readonly schemaName?: string;
}

/** Outcome of `Schema.lookup()`. */
export type LookupResult =
  | { readonly ok: true; readonly target: Schema | Column }
  | {
      readonly ok: false;
      readonly code: Exclude<SchemaIssueCode, 'RECURSIVE_REFERENCE'>;
      readonly reason: string;
      readonly found?: string;
    };

/** One column of the flattened layout returned by `Schema.describe()`. */
export interface LayoutSegment {
  /** Dotted path of the column, through nested schemas and references. */
  readonly path: string;
  /** Zero-based codepoint offset within the line. */
  readonly start: number;
  readonly length: number;
  readonly kind: 'column' | 'filler';
  readonly group?: string;
}

interface CachedLength {
  readonly revision: number;
  readonly value: number;
  /** Width of each nested or referenced schema when `value` was computed. */
  readonly referenced: readonly (readonly [Schema, number])[];
}

/** Name prefixes kept for generated fields. */
export const RESERVED_PREFIXES: readonly string[] = ['spacer', 'repeat'];

function isLinePredicate(value: unknown): value is LinePredicate {
  return typeof value === 'function';
}

export const schemaOptions: OptionDefinition<SchemaOptionValues> = defineOptions<SchemaOptionValues>(
  'Schema',
  {
    ...inheritableSpecs,
    name: { transform: toName, validate: isIdentifier, inheritable: false },
    optional: { validate: isBoolean, default: false },
    singular: { validate: isBoolean, default: false },
    trap: { validate: isLinePredicate, inheritable: false },
  },
  {
    required: ['name'],
    readers: ['name', 'optional', 'singular', 'trap', 'align', 'padding', 'truncate'],
    writers: ['optional', 'singular', 'trap'],
  },
);

/**
 * Ordered, named collection of fields describing one fixed-width record.
 *
 * Fields are appended through `addColumn()`, `addSchema()`,
 * `addReference()` and `addFiller()`; declaration order is layout order.
 * References are bound lazily on first use by walking the parent chain, and
 * on binding the referencing context's options fill the gaps of the target
 * subtree.
 *
 * @example
 * ```typescript
 * const detail = new Schema({ name: 'detail', parent: layout }).setup((s) => {
 *   s.addColumn('id', 3);
 *   s.addFiller(1);
 *   s.addColumn('code', 4);
 * });
 * detail.parse('A1  DEAD'); // { id: 'A1 ', code: 'DEAD' }
 * ```
 */
export class Schema {
  readonly parent: SchemaParent;
  readonly options: OptionTable<SchemaOptionValues>;
  private readonly order: string[] = [];
  private readonly entries = new Map<string, FieldEntry>();
  private readonly groupMembers = new Map<string, string[]>();
  private spacerCount = 0;
  private inSetup = false;
  private revision = 0;
  private cachedLength: CachedLength | undefined;
  private measuring = false;

  constructor(config: SchemaConfig) {
    const { parent, ...options } = config;
    if (!parent) {
      throw new ConfigError('Schema', "missing required option 'parent'", 'parent');
    }
    this.parent = parent;
    this.options = new OptionTable(schemaOptions, options);

    const inherited: OptionSource | undefined = parent.options;
    if (inherited) this.options.merge(inherited);
  }

  get name(): string {
    return this.options.require('name');
  }

  get optional(): boolean {
    return this.options.get('optional') === true;
  }

  get singular(): boolean {
    return this.options.get('singular') === true;
  }

  /** The catalog at the top of the parent chain. */
  get root(): SchemaCatalog {
    return this.parent instanceof Schema ? this.parent.root : this.parent;
  }

  /** Field identifiers in layout order. */
  get fields(): readonly string[] {
    return [...this.order];
  }

  entry(id: string): FieldEntry | undefined {
    return this.entries.get(id);
  }

  /** Owned columns, fillers included, in layout order. */
  columns(): Column[] {
    const columns: Column[] = [];
    for (const entry of this.entries.values()) {
      if (entry.kind === 'column') columns.push(entry.column);
    }
    return columns;
  }

  /** Owned child schemas in layout order. */
  nestedSchemas(): Schema[] {
    const schemas: Schema[] = [];
    for (const entry of this.entries.values()) {
      if (entry.kind === 'schema') schemas.push(entry.schema);
    }
    return schemas;
  }

  references(): SchemaReference[] {
    const references: SchemaReference[] = [];
    for (const entry of this.entries.values()) {
      if (entry.kind === 'reference') references.push(entry);
    }
    return references;
  }

  /** Group label → names of the columns carrying it. */
  groups(): ReadonlyMap<string, readonly string[]> {
    return new Map([...this.groupMembers].map(([label, names]) => [label, [...names]] as const));
  }

  /** Read an exposed option. */
  option<K extends keyof SchemaOptionValues>(key: K): SchemaOptionValues[K] | undefined {
    return this.options.read(key);
  }

  /** Change an option exposed for writing (`optional`, `singular`, `trap`). */
  configure<K extends keyof SchemaOptionValues>(key: K, value: SchemaOptionValues[K]): this {
    this.options.write(key, value);
    return this;
  }

  /** Set the line predicate when given one; return the current predicate. */
  trap(predicate?: LinePredicate): LinePredicate | undefined {
    if (predicate !== undefined) this.options.set('trap', predicate);
    return this.options.get('trap');
  }

  /** Run `build` against this schema. Calling `setup()` again from inside `build` is an error. */
  setup(build: SchemaBuilder): this {
    if (this.inSetup) {
      throw new SchemaError(`Schema '${this.name}' is already in setup; recursion is forbidden`);
    }
    if (typeof build !== 'function') {
      throw new SchemaError(`Schema '${this.name}': setup requires a builder function`);
    }
    this.inSetup = true;
    try {
      build(this);
    } finally {
      this.inSetup = false;
    }
    return this;
  }

  // --- Declaration ---

  addColumn(name: string, length: number, options: ColumnOptions = {}): Column {
    const id = this.checkName(name);
    if (options.group !== undefined) this.checkGroup(options.group, id);

    const column = new Column({ ...options, name: id, length });
    column.options.merge(this.options);
    this.register({ kind: 'column', id, column });

    const group = column.group;
    if (group !== undefined) {
      const members = this.groupMembers.get(group) ?? [];
      members.push(id);
      this.groupMembers.set(group, members);
    }
    return column;
  }

  /** Append a filler named `spacer_<n>`, numbered per schema. */
  addFiller(length: number, padding?: string): Column {
    this.spacerCount += 1;
    const id = `spacer_${String(this.spacerCount)}`;
    const column = Column.filler(id, length, padding);
    column.options.merge(this.options);
    this.register({ kind: 'column', id, column });
    return column;
  }

  /** Append an owned child schema built immediately by `build`. */
  addSchema(name: string, build: SchemaBuilder, options: SchemaOptions = {}): Schema {
    const id = this.checkName(name);
    const conflict = this.references().find((reference) => reference.schemaName === id);
    if (conflict) {
      throw new DuplicateNameError(
        this.name,
        id,
        `Reference '${conflict.storeName}' in schema '${this.name}' already targets a schema named '${id}'`,
      );
    }

    const child = new Schema({ ...options, name: id, parent: this });
    child.setup(build);
    const entry: NestedSchemaEntry = { kind: 'schema', id, schema: child };
    this.register(entry);
    return child;
  }

  /**
   * Append a reference to a schema declared elsewhere.
   *
   * Accepted forms: `addReference('inner')`,
   * `addReference('payload', { schemaName: 'inner', optional: true })` and
   * `addReference({ name: 'payload', schemaName: 'inner' })`.
   */
  addReference(declaration: string | ReferenceDeclaration, options: ReferenceDeclaration = {}): SchemaReference {
    const malformed = (): SchemaError =>
      new SchemaError(
        `Schema '${this.name}': expected addReference(name, options?) or addReference({ name?, schemaName? })`,
      );

    let spec: ReferenceDeclaration;
    if (typeof declaration === 'string') {
      if (options.name !== undefined) throw malformed();
      spec = { ...options, name: declaration };
    } else if (isRecord(declaration)) {
      spec = declaration;
    } else {
      throw malformed();
    }

    const { name, schemaName, ...inherited } = spec;
    const storeName = name ?? schemaName;
    const targetName = schemaName ?? name;
    if (storeName === undefined || targetName === undefined) throw malformed();

    const target = toName(targetName);
    if (!isIdentifier(target)) {
      throw new SchemaError(`Schema '${this.name}': '${String(targetName)}' is not a valid schema name`);
    }
    const id = this.checkName(storeName);
    if (this.entries.get(target)?.kind === 'schema') {
      throw new DuplicateNameError(
        this.name,
        id,
        `Schema '${this.name}' already declares a nested schema named '${target}'; a reference cannot target it`,
      );
    }

    const reference = new SchemaReference(target, id, inherited);
    this.register(reference);
    return reference;
  }

  // --- Resolution ---

  /**
   * Find what `name` denotes from this schema's point of view: one of its own
   * fields, else whatever its parent (ultimately the root catalog) finds.
   * References met on the way are bound.
   */
  lookup(name: string): LookupResult {
    const entry = this.entries.get(name);
    return entry ? this.resolveEntry(entry) : this.lookupFromParent(name);
  }

  /** Resolve one of this schema's own fields without throwing. */
  resolveField(id: string): LookupResult {
    const entry = this.entries.get(id);
    if (!entry) {
      return { ok: false, code: 'UNRESOLVED_REFERENCE', reason: `Schema '${this.name}' has no field '${id}'` };
    }
    return this.resolveEntry(entry);
  }

  /**
   * Fill the gaps of this schema, its columns and everything below it with
   * `source`. References not yet bound keep the set until they are.
   *
   * @returns Options of this schema that changed.
   */
  inherit(source: OptionSource): string[] {
    const changed = this.options.merge(source);
    for (const entry of this.entries.values()) {
      switch (entry.kind) {
        case 'column':
          entry.column.options.merge(source);
          break;
        case 'schema':
          entry.schema.inherit(source);
          break;
        case 'reference':
          this.deliver(entry, source);
          break;
      }
    }
    return changed;
  }

  // --- Traversal ---

  /** Total width in codepoints. Throws `SchemaError` while a reference cannot be resolved. */
  get length(): number {
    if (this.measuring) {
      throw new SchemaError(`Schema '${this.name}' contains itself through a reference cycle`);
    }
    const cached = this.cachedLength;
    if (cached && cached.revision === this.revision && this.referencedUnchanged(cached)) return cached.value;

    this.measuring = true;
    try {
      let total = 0;
      const referenced: [Schema, number][] = [];
      for (const id of this.order) {
        const target = this.fieldTarget(id);
        const size = target.length;
        total += size;
        if (target instanceof Schema) referenced.push([target, size]);
      }
      this.cachedLength = { revision: this.revision, value: total, referenced };
      return total;
    } finally {
      this.measuring = false;
    }
  }

  /**
   * Parse one record starting at codepoint `start` of `line`. Fillers add no
   * key; characters missing at the end of the line read as empty.
   */
  parse(line: string, start = 0): FixedRecord {
    if (!Number.isInteger(start) || start < 0) {
      throw new SchemaError(`Schema '${this.name}': start offset must be a non-negative integer`);
    }
    this.measure();
    return this.parseAt(codepoints(line), start);
  }

  /** Format `record` into a line of exactly `length` codepoints. Absent keys are formatted as empty values. */
  format(record: FixedRecord = {}): string {
    this.measure();
    return this.formatRecord(record);
  }

  /** Whether `line` can hold this record: its right-trimmed width fits and the trap (if any) accepts it. */
  match(line: string | null | undefined): boolean {
    if (line === null || line === undefined) return false;
    if (width(line.trimEnd()) > this.length) return false;
    const trap = this.options.get('trap');
    return trap ? trap(line) : true;
  }

  /** Every column of the fully resolved layout with its absolute offset. */
  describe(): LayoutSegment[] {
    this.measure();
    const segments: LayoutSegment[] = [];
    this.describeAt('', 0, segments);
    return segments;
  }

  // --- Validation ---

  /** Every unresolvable field in this schema and the schemas it reaches. Never throws. */
  errors(): readonly SchemaIssue[] {
    return new SchemaValidator(this).collect();
  }

  validate(): SchemaValidationResult {
    return toValidationResult(this.errors());
  }

  get isValid(): boolean {
    return this.errors().length === 0;
  }

  /** Throw a `SchemaError` carrying every issue found by `errors()`. */
  assertValid(): this {
    const issues = this.errors();
    if (issues.length > 0) {
      throw new SchemaError(
        `Schema '${this.name}' has ${String(issues.length)} unresolved field(s):\n${describeIssues(issues)}`,
        issues,
      );
    }
    return this;
  }

  // --- Internals ---

  private checkName(name: unknown): string {
    const id = toName(name);
    if (!isIdentifier(id)) {
      throw new SchemaError(`Schema '${this.name}': '${String(name)}' is not a valid field name`);
    }
    if (RESERVED_PREFIXES.some((prefix) => id.startsWith(prefix))) {
      throw new ConfigError('Schema', `'${id}' is a reserved field name`, 'name');
    }
    if (this.entries.has(id)) {
      throw new DuplicateNameError(this.name, id, `Schema '${this.name}' already has a field named '${id}'`);
    }
    if (this.groupMembers.has(id)) {
      throw new DuplicateNameError(
        this.name,
        id,
        `Schema '${this.name}' already has a group named '${id}'; a group and a field cannot share a name`,
      );
    }
    return id;
  }

  private checkGroup(group: string, id: string): void {
    const label = group.trim();
    if (label === id || this.entries.has(label)) {
      throw new DuplicateNameError(
        this.name,
        id,
        `Schema '${this.name}' already has a field named '${label}'; a group and a field cannot share a name`,
      );
    }
  }

  /** Referenced schemas are not owned, so their widths are checked rather than tracked by revision. */
  private referencedUnchanged(cached: CachedLength): boolean {
    this.measuring = true;
    try {
      return cached.referenced.every(([target, size]) => target.length === size);
    } finally {
      this.measuring = false;
    }
  }

  private register(entry: FieldEntry): void {
    this.order.push(entry.id);
    this.entries.set(entry.id, entry);
    this.touch();
  }

  /** Invalidate the cached length here and in every owning ancestor. */
  private touch(): void {
    this.revision += 1;
    if (this.parent instanceof Schema) this.parent.touch();
  }

  private lookupFromParent(name: string): LookupResult {
    const parent = this.parent;
    if (parent instanceof Schema) return parent.lookup(name);

    const candidate = parent.schemas(name)[0];
    if (candidate) return { ok: true, target: candidate };
    return { ok: false, code: 'UNRESOLVED_REFERENCE', reason: `no schema named '${name}' is in scope` };
  }

  private resolveEntry(entry: FieldEntry): LookupResult {
    switch (entry.kind) {
      case 'column':
        return { ok: true, target: entry.column };
      case 'schema':
        return { ok: true, target: entry.schema };
      case 'reference':
        return this.resolveReference(entry);
    }
  }

  private resolveReference(reference: SchemaReference): LookupResult {
    const bound = reference.target;
    if (bound) return { ok: true, target: bound };

    const found = this.lookupFromParent(reference.schemaName);
    if (!found.ok) return this.failReference(reference, found.code, found.reason, found.found);

    const target = found.target;
    if (!(target instanceof Schema)) {
      return this.failReference(
        reference,
        'NOT_A_SCHEMA',
        `'${reference.schemaName}' names a column, not a schema`,
        `column '${target.name}'`,
      );
    }

    if (reference.bind(target)) {
      this.emit({
        type: 'reference:resolved',
        schema: this.name,
        field: reference.storeName,
        target: target.name,
        timestamp: Date.now(),
      });
      // The reference's own options outrank the referencing schema's, which
      // outrank whatever was queued from further up.
      for (const source of [reference.options, this.options, ...reference.takePending()]) {
        this.deliver(reference, source);
      }
    }
    return { ok: true, target };
  }

  private failReference(
    reference: SchemaReference,
    code: Exclude<SchemaIssueCode, 'RECURSIVE_REFERENCE'>,
    cause: string,
    found?: string,
  ): LookupResult {
    const reason = `Cannot resolve reference '${reference.storeName}' in schema '${this.name}': ${cause}`;
    reference.fail(reason);
    this.emit({
      type: 'reference:failed',
      schema: this.name,
      field: reference.storeName,
      schemaName: reference.schemaName,
      reason,
      timestamp: Date.now(),
    });
    return found === undefined ? { ok: false, code, reason } : { ok: false, code, reason, found };
  }

  private deliver(reference: SchemaReference, source: OptionSource): void {
    const delivery = reference.deliver(source);
    if (!delivery) return;
    this.emit({
      type: 'options:propagated',
      schema: this.name,
      field: reference.storeName,
      target: delivery.target.name,
      keys: delivery.changed,
      timestamp: Date.now(),
    });
  }

  private emit(event: DomainEvent): void {
    this.root.events?.emit(event);
  }

  private fieldTarget(id: string): Schema | Column {
    const result = this.resolveField(id);
    if (!result.ok) throw new SchemaError(result.reason);
    return result.target;
  }

  /** Resolve the whole closure up front so that traversal cannot half-succeed. */
  private measure(): number {
    return this.length;
  }

  private parseAt(chars: readonly string[], start: number): Record<string, unknown> {
    const data: Record<string, unknown> = {};
    let cursor = start;

    for (const id of this.order) {
      const target = this.fieldTarget(id);
      if (target instanceof Column) {
        if (!target.filler) {
          data[id] = target.parse(sliceCodepoints(chars, cursor, target.length));
        }
      } else {
        data[id] = target.parseAt(chars, cursor);
      }
      cursor += target.length;
    }

    return data;
  }

  private formatRecord(record: FixedRecord): string {
    return this.order
      .map((id) => {
        const target = this.fieldTarget(id);
        const value = record[id];
        if (target instanceof Column) return target.format(value);
        return target.formatRecord(isRecord(value) ? value : {});
      })
      .join('');
  }

  private describeAt(prefix: string, start: number, segments: LayoutSegment[]): number {
    let cursor = start;
    for (const id of this.order) {
      const target = this.fieldTarget(id);
      const path = prefix === '' ? id : `${prefix}.${id}`;
      if (target instanceof Column) {
        const group = target.group;
        segments.push({
          path,
          start: cursor,
          length: target.length,
          kind: target.filler ? 'filler' : 'column',
          ...(group !== undefined ? { group } : {}),
        });
        cursor += target.length;
      } else {
        cursor = target.describeAt(path, cursor, segments);
      }
    }
    return cursor;
  }
}
