import { describe, it, expect } from 'vitest';
import {
  FILL_MISSING,
  OptionTable,
  defineOptions,
  isBoolean,
  isIdentifier,
  isNonEmptyString,
  isPositiveInteger,
  isSingleCharacter,
  oneOf,
  optionsFrom,
  toName,
} from '../../../src/domain/model/Options.js';
import { isAlignment } from '../../../src/domain/model/LayoutOptions.js';
import type { Alignment } from '../../../src/domain/model/LayoutOptions.js';
import { ConfigError } from '../../../src/domain/model/Errors.js';

interface SampleValues {
  name: string;
  size: number;
  align?: Alignment;
  flag: boolean;
  note?: string;
}

const sampleOptions = defineOptions<SampleValues>(
  'Sample',
  {
    name: { transform: toName, validate: isIdentifier, inheritable: false },
    size: { validate: isPositiveInteger, default: 1 },
    align: { validate: isAlignment },
    flag: { validate: isBoolean, default: false },
    note: { validate: isNonEmptyString },
  },
  { required: ['name'], readers: ['name', 'size', 'align'], writers: ['align'] },
);

describe('OptionTable', () => {
  describe('construction', () => {
    it('should apply transforms, defaults and provenance', () => {
      const table = new OptionTable(sampleOptions, { name: '  record ' });

      expect(table.get('name')).toBe('record');
      expect(table.get('size')).toBe(1);
      expect(table.provenance('name')).toBe('explicit');
      expect(table.provenance('size')).toBe('default');
      expect(table.has('align')).toBe(false);
      expect(table.toObject()).toEqual({ name: 'record', size: 1, flag: false });
    });

    it('should throw ConfigError when a required option is missing', () => {
      expect(() => new OptionTable(sampleOptions, {})).toThrow(ConfigError);
      expect(() => new OptionTable(sampleOptions, {})).toThrow("Sample: missing required option 'name'");
    });

    it('should reject unknown options', () => {
      const input = { name: 'record', colour: 'red' };

      expect(() => new OptionTable(sampleOptions, input)).toThrow("Sample: unknown option 'colour'");
    });

    it('should reject values that fail their validator after transform', () => {
      expect(() => new OptionTable(sampleOptions, { name: 'record', size: 0 })).toThrow(
        "Sample: invalid value 0 for option 'size'",
      );
      expect(() => new OptionTable(sampleOptions, { name: ' 1abc ' })).toThrow(
        "Sample: invalid value ' 1abc ' for option 'name'",
      );
    });

    it('should expose the offending key on the error', () => {
      try {
        new OptionTable(sampleOptions, { name: 'record', flag: 'yes' });
        expect.unreachable('construction should fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.owner).toBe('Sample');
          expect(error.option).toBe('flag');
          expect(error.code).toBe('CONFIG');
        }
      }
    });
  });

  describe('access', () => {
    it('should only read options declared as readers', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(table.read('size')).toBe(1);
      expect(() => table.read('flag')).toThrow("Sample: option 'flag' is not readable");
    });

    it('should only write options declared as writers', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      table.write('align', 'left');
      expect(table.get('align')).toBe('left');
      expect(table.provenance('align')).toBe('explicit');
      expect(() => table.write('size', 3)).toThrow("Sample: option 'size' is not writable");
    });

    it('should validate written values', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(() => table.write('align', 'center')).toThrow("Sample: invalid value 'center' for option 'align'");
    });

    it('should not overwrite an existing value when overwrite is off', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(table.set('size', 5, false)).toBe(false);
      expect(table.get('size')).toBe(1);
      expect(table.set('note', 'hello', false)).toBe(true);
      expect(table.get('note')).toBe('hello');
    });

    it('should throw from require() when the option has no value', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(table.require('name')).toBe('record');
      expect(() => table.require('align')).toThrow("Sample: option 'align' has no value");
    });
  });

  describe('merge', () => {
    it('should fill missing and default-only values and report the changed keys', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      const changed = table.merge(optionsFrom({ align: 'left', size: 4, name: 'other', unknown: 1 }));

      expect(changed).toEqual(['align', 'size']);
      expect(table.get('align')).toBe('left');
      expect(table.get('size')).toBe(4);
      expect(table.get('name')).toBe('record');
      expect(table.provenance('align')).toBe('inherited');
    });

    it('should keep explicit values under the default policy', () => {
      const table = new OptionTable(sampleOptions, { name: 'record', size: 2 });

      expect(table.merge(optionsFrom({ size: 9 }), FILL_MISSING)).toEqual([]);
      expect(table.get('size')).toBe(2);
    });

    it('should be idempotent', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });
      const source = optionsFrom({ align: 'right' });

      expect(table.merge(source)).toEqual(['align']);
      expect(table.merge(source)).toEqual([]);
      expect(table.toObject()).toEqual({ name: 'record', size: 1, flag: false, align: 'right' });
    });

    it('should adopt offered values when the policy prefers the other side', () => {
      const table = new OptionTable(sampleOptions, { name: 'record', size: 2 });

      const changed = table.merge(optionsFrom({ size: 9 }), { prefer: 'other', missing: 'unset' });

      expect(changed).toEqual(['size']);
      expect(table.get('size')).toBe(9);
      expect(table.provenance('size')).toBe('inherited');
    });

    it('should count defaults as present when the policy says unset', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(table.merge(optionsFrom({ size: 9 }), { prefer: 'self', missing: 'unset' })).toEqual([]);
      expect(table.get('size')).toBe(1);
    });

    it('should validate inherited values', () => {
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(() => table.merge(optionsFrom({ align: 'middle' }))).toThrow(ConfigError);
    });

    it('should accept another table as the source', () => {
      const source = new OptionTable(sampleOptions, { name: 'source', align: 'left', size: 3 });
      const table = new OptionTable(sampleOptions, { name: 'record' });

      expect(table.merge(source)).toEqual(['size', 'align']);
      expect(table.get('name')).toBe('record');
    });
  });

  describe('inheritableEntries', () => {
    it('should yield only non-default values of inheritable options', () => {
      const table = new OptionTable(sampleOptions, { name: 'record', align: 'left' });

      expect(Array.from(table.inheritableEntries())).toEqual([['align', 'left']]);
    });
  });
});

describe('option validators', () => {
  it('should count codepoints in isSingleCharacter', () => {
    expect(isSingleCharacter(' ')).toBe(true);
    expect(isSingleCharacter('é')).toBe(true);
    expect(isSingleCharacter('😀')).toBe(true);
    expect(isSingleCharacter('ab')).toBe(false);
    expect(isSingleCharacter('')).toBe(false);
  });

  it('should accept identifiers only', () => {
    expect(isIdentifier('payload_2')).toBe(true);
    expect(isIdentifier('_x')).toBe(true);
    expect(isIdentifier('2x')).toBe(false);
    expect(isIdentifier('a-b')).toBe(false);
  });

  it('should build guards for closed string sets', () => {
    const isSize = oneOf(['s', 'm', 'l']);

    expect(isSize('m')).toBe(true);
    expect(isSize('xl')).toBe(false);
    expect(isSize(1)).toBe(false);
  });

  it('should reject fractional and non-positive lengths', () => {
    expect(isPositiveInteger(3)).toBe(true);
    expect(isPositiveInteger(0)).toBe(false);
    expect(isPositiveInteger(1.5)).toBe(false);
    expect(isPositiveInteger('3')).toBe(false);
  });
});
