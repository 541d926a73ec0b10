import { defineOptions, isBoolean, isSingleCharacter, oneOf } from './Options.js';
import type { OptionDefinition, OptionSpecs } from './Options.js';

/** Side a value is aligned to; padding fills the other side. */
export type Alignment = 'left' | 'right';

export const ALIGNMENTS: readonly Alignment[] = ['left', 'right'];

export const isAlignment = oneOf(ALIGNMENTS);

/**
 * Options that flow from a layout, schema or reference into the schemas and
 * columns below it. A value set deeper in the tree is never overridden.
 */
export interface InheritableOptionValues {
  /** The schema may be absent from a file. */
  optional?: boolean;
  /** The schema occurs at most once in a file. */
  singular?: boolean;
  /** Default alignment for columns that set none. */
  align?: Alignment;
  /** Default padding character for columns that set none. */
  padding?: string;
  /** Default truncation behavior for columns that set none. */
  truncate?: boolean;
}

/** Caller-facing shape of the inheritable options. */
export type InheritableOptions = Readonly<InheritableOptionValues>;

export const inheritableSpecs: OptionSpecs<InheritableOptionValues> = {
  optional: { validate: isBoolean },
  singular: { validate: isBoolean },
  align: { validate: isAlignment },
  padding: { validate: isSingleCharacter },
  truncate: { validate: isBoolean },
};

const INHERITABLE_KEYS: readonly (keyof InheritableOptionValues)[] = [
  'optional',
  'singular',
  'align',
  'padding',
  'truncate',
];

/** Options carried by a reference and applied to its target once resolved. */
export const referenceOptions: OptionDefinition<InheritableOptionValues> = defineOptions(
  'SchemaReference',
  inheritableSpecs,
  { readers: INHERITABLE_KEYS },
);

/** Options a root catalog hands to its top-level schemas. */
export const catalogOptions: OptionDefinition<InheritableOptionValues> = defineOptions('Layout', inheritableSpecs, {
  readers: INHERITABLE_KEYS,
});
