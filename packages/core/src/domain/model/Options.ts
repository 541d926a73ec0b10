import { ConfigError } from './Errors.js';

/** Where an option value came from. Explicit values always outrank inherited ones. */
export type OptionProvenance = 'default' | 'inherited' | 'explicit';

/** Declaration of a single recognized option. */
export interface OptionSpec<T> {
  /** Normalizes the raw value before validation (e.g. trimming a name). */
  readonly transform?: (value: unknown) => unknown;
  /** Guard every stored value must pass after `transform`. */
  readonly validate: (value: unknown) => value is T;
  /** Value used when none is given. Defaults never propagate to other tables. */
  readonly default?: T;
  /** When `false`, the option is never exchanged through `merge()`. Default: `true`. */
  readonly inheritable?: boolean;
}

/** One spec per option key of `O`. */
export type OptionSpecs<O> = { readonly [K in keyof O]-?: OptionSpec<Exclude<O[K], undefined>> };

/** Loosely typed constructor input: any subset of the recognized keys, values still to be validated. */
export type OptionInput<O> = { readonly [K in keyof O]?: unknown };

/** Frozen, per-owner-type option vocabulary. Built once with `defineOptions()` and shared by every instance. */
export interface OptionDefinition<O> {
  /** Owner type name used in error messages. */
  readonly owner: string;
  readonly specs: OptionSpecs<O>;
  /** Keys that must hold a value once construction completes. */
  readonly required: readonly (keyof O)[];
  /** Keys exposed through `read()`. */
  readonly readers: readonly (keyof O)[];
  /** Keys exposed through `write()`. */
  readonly writers: readonly (keyof O)[];
}

/** Anything that can offer inheritable option values to `OptionTable.merge()`. */
export interface OptionSource {
  inheritableEntries(): Iterable<readonly [string, unknown]>;
}

/**
 * Conflict policy for `OptionTable.merge()`.
 *
 * - `prefer: 'self'` keeps a receiver value that counts as present;
 *   `prefer: 'other'` always adopts the offered value.
 * - `missing: 'default'` counts a receiver value that only came from its
 *   default as missing; `missing: 'unset'` counts only keys with no value.
 */
export interface MergePolicy {
  readonly prefer: 'self' | 'other';
  readonly missing: 'default' | 'unset';
}

/** Fill gaps only: explicit and previously inherited values are kept. */
export const FILL_MISSING: MergePolicy = Object.freeze({ prefer: 'self', missing: 'default' });

/** Declare the option vocabulary of an owner type. */
export function defineOptions<O>(
  owner: string,
  specs: OptionSpecs<O>,
  access: {
    readonly required?: readonly (keyof O)[];
    readonly readers?: readonly (keyof O)[];
    readonly writers?: readonly (keyof O)[];
  } = {},
): OptionDefinition<O> {
  return Object.freeze({
    owner,
    specs: Object.freeze(specs),
    required: Object.freeze([...(access.required ?? [])]),
    readers: Object.freeze([...(access.readers ?? [])]),
    writers: Object.freeze([...(access.writers ?? [])]),
  });
}

/** Wrap a plain key/value set so it can be merged into option tables. `undefined` values are skipped. */
export function optionsFrom(values: Readonly<Record<string, unknown>>): OptionSource {
  return {
    *inheritableEntries() {
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) yield [key, value] as const;
      }
    },
  };
}

/**
 * Typed, validated option storage owned by every schema, column and reference.
 *
 * Every stored value has passed its spec's validator, every required key has
 * a value after construction, and each value remembers its provenance so
 * that inheritance never overrides a deeper explicit setting.
 */
export class OptionTable<O> implements OptionSource {
  private readonly values: Partial<O> = {};
  private readonly provenances = new Map<keyof O, OptionProvenance>();

  constructor(
    readonly definition: OptionDefinition<O>,
    input: OptionInput<O> = {},
  ) {
    for (const key of Object.keys(input)) {
      if (!this.isKey(key)) {
        throw new ConfigError(definition.owner, `unknown option '${key}'`, key);
      }
      const value = input[key];
      if (value !== undefined) this.assign(key, value, 'explicit');
    }

    for (const key of this.keys()) {
      const fallback = definition.specs[key].default;
      if (!this.provenances.has(key) && fallback !== undefined) {
        this.values[key] = fallback;
        this.provenances.set(key, 'default');
      }
    }

    for (const key of definition.required) {
      if (!this.provenances.has(key)) {
        throw new ConfigError(definition.owner, `missing required option '${String(key)}'`, String(key));
      }
    }
  }

  /** Current value, or `undefined` when the option has none. */
  get<K extends keyof O>(key: K): O[K] | undefined {
    return this.values[key];
  }

  /** Current value of an option that must be set (e.g. a required one). */
  require<K extends keyof O>(key: K): NonNullable<O[K]> {
    const value = this.get(key);
    if (value === undefined || value === null) {
      throw new ConfigError(this.definition.owner, `option '${String(key)}' has no value`, String(key));
    }
    return value;
  }

  has(key: keyof O): boolean {
    return this.provenances.has(key);
  }

  provenance(key: keyof O): OptionProvenance | undefined {
    return this.provenances.get(key);
  }

  /**
   * Store an explicit value. With `overwrite` off, an option that already
   * has a value (defaults included) is left untouched.
   *
   * @returns `true` when the value was stored.
   */
  set<K extends keyof O>(key: K, value: unknown, overwrite = true): boolean {
    if (!overwrite && this.has(key)) return false;
    this.assign(key, value, 'explicit');
    return true;
  }

  /** Read an option the owner exposes to callers. */
  read<K extends keyof O>(key: K): O[K] | undefined {
    if (!this.definition.readers.includes(key)) {
      throw new ConfigError(this.definition.owner, `option '${String(key)}' is not readable`, String(key));
    }
    return this.get(key);
  }

  /** Change an option the owner allows callers to change after construction. */
  write<K extends keyof O>(key: K, value: unknown): void {
    if (!this.definition.writers.includes(key)) {
      throw new ConfigError(this.definition.owner, `option '${String(key)}' is not writable`, String(key));
    }
    this.assign(key, value, 'explicit');
  }

  /**
   * Adopt inheritable values offered by `source` according to `policy`.
   * Keys this table does not define are ignored. Adopted values are marked
   * `inherited`.
   *
   * @returns The keys whose value changed.
   */
  merge(source: OptionSource, policy: MergePolicy = FILL_MISSING): string[] {
    const changed: string[] = [];

    for (const [key, value] of source.inheritableEntries()) {
      if (!this.isKey(key) || this.definition.specs[key].inheritable === false) continue;
      if (policy.prefer === 'self' && this.isPresent(key, policy.missing)) continue;

      const before = this.values[key];
      const hadValue = this.isPresent(key, 'default');
      this.assign(key, value, 'inherited');
      if (!hadValue || !Object.is(before, this.values[key])) changed.push(key);
    }

    return changed;
  }

  /** Non-default values of inheritable options. */
  *inheritableEntries(): Iterable<readonly [string, unknown]> {
    for (const key of this.keys()) {
      const provenance = this.provenances.get(key);
      if (provenance === undefined || provenance === 'default') continue;
      if (this.definition.specs[key].inheritable === false) continue;
      yield [key, this.values[key]] as const;
    }
  }

  /** Snapshot of every option that has a value. */
  toObject(): Partial<O> {
    return { ...this.values };
  }

  private isPresent(key: keyof O, missing: MergePolicy['missing']): boolean {
    const provenance = this.provenances.get(key);
    if (provenance === undefined) return false;
    return missing === 'unset' || provenance !== 'default';
  }

  private assign<K extends keyof O>(key: K, raw: unknown, provenance: OptionProvenance): void {
    const spec = this.definition.specs[key];
    const value = spec.transform ? spec.transform(raw) : raw;
    if (!spec.validate(value)) {
      throw new ConfigError(
        this.definition.owner,
        `invalid value ${describeValue(raw)} for option '${String(key)}'`,
        String(key),
      );
    }
    this.values[key] = value;
    this.provenances.set(key, provenance);
  }

  private keys(): Extract<keyof O, string>[] {
    return Object.keys(this.definition.specs).filter((key): key is Extract<keyof O, string> => this.isKey(key));
  }

  private isKey(key: string): key is Extract<keyof O, string> {
    return Object.prototype.hasOwnProperty.call(this.definition.specs, key);
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'function') return 'function';
  return String(value);
}

// --- Validators shared by the option vocabularies ---

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Trim strings; leave anything else for the validator to reject. */
export function toName(value: unknown): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

export function isIdentifier(value: unknown): value is string {
  return typeof value === 'string' && IDENTIFIER.test(value);
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/** Exactly one unicode codepoint. */
export function isSingleCharacter(value: unknown): value is string {
  return typeof value === 'string' && Array.from(value).length === 1;
}

export function oneOf<T extends string>(allowed: readonly T[]): (value: unknown) => value is T {
  return (value: unknown): value is T => typeof value === 'string' && allowed.some((item) => item === value);
}
