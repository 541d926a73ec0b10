import type { Schema } from '../model/Schema.js';
import type { OptionSource } from '../model/Options.js';
import type { EventSink } from './EventSink.js';

/**
 * Root context of top-level schemas.
 *
 * References that walk past the outermost schema end here: the first
 * candidate returned by `schemas(name)` is the one bound.
 */
export interface SchemaCatalog {
  /** Candidate schemas registered under `name`, in declaration order. */
  schemas(name: string): readonly Schema[];
  /** Options inherited by every top-level schema. */
  readonly options?: OptionSource;
  /** Where schemas below this catalog publish their events. */
  readonly events?: EventSink;
}
