import type { Column } from './Column.js';
import type { Schema } from './Schema.js';
import { OptionTable } from './Options.js';
import type { OptionSource } from './Options.js';
import { referenceOptions } from './LayoutOptions.js';
import type { InheritableOptions, InheritableOptionValues } from './LayoutOptions.js';

/** A column owned by the schema. */
export interface ColumnEntry {
  readonly kind: 'column';
  readonly id: string;
  readonly column: Column;
}

/** A child schema owned by the schema, built at declaration time. */
export interface NestedSchemaEntry {
  readonly kind: 'schema';
  readonly id: string;
  readonly schema: Schema;
}

/** Lazily bound state of a reference. */
export type ResolutionState =
  | { readonly status: 'unresolved' }
  | { readonly status: 'resolved'; readonly target: Schema }
  | { readonly status: 'failed'; readonly reason: string };

/** Outcome of handing an option set to a reference. */
export interface Delivery {
  readonly target: Schema;
  /** Options of the target schema itself that changed. */
  readonly changed: readonly string[];
}

/**
 * Named pointer to a schema declared elsewhere (a sibling, an ancestor's
 * child, or a top-level schema of the root catalog).
 *
 * Binding happens at most once. Option sets handed over before the binding
 * are queued and flushed by the owning schema once it resolves; each option
 * set reaches the target at most once.
 */
export class SchemaReference {
  readonly kind = 'reference' as const;
  /** Name of the schema to bind. */
  readonly schemaName: string;
  /** Key the parsed sub-record is stored under. */
  readonly storeName: string;
  /** Options applied to the target once bound. */
  readonly options: OptionTable<InheritableOptionValues>;
  private resolution: ResolutionState = { status: 'unresolved' };
  private pending: OptionSource[] = [];
  private readonly applied = new Set<OptionSource>();

  constructor(schemaName: string, storeName: string, options: InheritableOptions = {}) {
    this.schemaName = schemaName;
    this.storeName = storeName;
    this.options = new OptionTable(referenceOptions, options);
  }

  /** Field identifier within the declaring schema. */
  get id(): string {
    return this.storeName;
  }

  get state(): ResolutionState {
    return this.resolution;
  }

  /** Bound target, if any. */
  get target(): Schema | undefined {
    return this.resolution.status === 'resolved' ? this.resolution.target : undefined;
  }

  /**
   * Bind the reference. A second call is ignored so that every caller sees
   * the first target.
   *
   * @returns `true` when this call performed the binding.
   */
  bind(target: Schema): boolean {
    if (this.resolution.status === 'resolved') return false;
    this.resolution = { status: 'resolved', target };
    return true;
  }

  /** Record a failed lookup. The reference stays bindable. */
  fail(reason: string): void {
    if (this.resolution.status !== 'resolved') {
      this.resolution = { status: 'failed', reason };
    }
  }

  /**
   * Apply `source` to the bound target, or queue it until binding.
   *
   * @returns What was applied, or `null` when the set was queued or already applied.
   */
  deliver(source: OptionSource): Delivery | null {
    if (this.applied.has(source)) return null;

    const target = this.target;
    if (!target) {
      if (!this.pending.includes(source)) this.pending.push(source);
      return null;
    }

    this.applied.add(source);
    return { target, changed: target.inherit(source) };
  }

  /** Drain the option sets queued before binding. */
  takePending(): OptionSource[] {
    const queued = this.pending;
    this.pending = [];
    return queued;
  }
}

/** Tagged union over everything a schema field can be. */
export type FieldEntry = ColumnEntry | NestedSchemaEntry | SchemaReference;
