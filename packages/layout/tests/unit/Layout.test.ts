import { describe, it, expect, vi } from 'vitest';
import { ConfigError, DuplicateNameError, SchemaError } from '@fixedline/core';
import type { DomainEvent } from '@fixedline/core';
import { Layout } from '../../src/Layout.js';

function bankLayout(): Layout {
  const layout = new Layout({ options: { padding: '0' } });
  layout.define(
    'header',
    (s) => {
      s.addColumn('kind', 1);
      s.addColumn('count', 5, { type: 'integer' });
    },
    { singular: true, trap: (line) => line.startsWith('H') },
  );
  layout.define(
    'detail',
    (s) => {
      s.addColumn('kind', 1);
      s.addColumn('account', 4, { align: 'left', padding: ' ' });
      s.addReference('total', { schemaName: 'money' });
    },
    { trap: (line) => line.startsWith('D') },
  );
  layout.define('money', (s) => s.addColumn('amount', 6, { type: 'integer' }), { trap: () => false });
  return layout;
}

describe('Layout', () => {
  describe('catalog', () => {
    it('should list schemas in declaration order', () => {
      const layout = bankLayout();

      expect(layout.names()).toEqual(['header', 'detail', 'money']);
      expect(layout.schema('detail').fields).toEqual(['kind', 'account', 'total']);
      expect(layout.schemas('money')).toEqual([layout.schema('money')]);
      expect(layout.schemas('nothing')).toEqual([]);
    });

    it('should reject a second schema with the same name', () => {
      const layout = bankLayout();

      expect(() => layout.define('header', (s) => s.addColumn('x', 1))).toThrow(DuplicateNameError);
      expect(() => layout.define('header', (s) => s.addColumn('x', 1))).toThrow(
        "Layout already defines a schema named 'header'",
      );
    });

    it('should throw SchemaError for an unknown schema name', () => {
      expect(() => bankLayout().schema('trailer')).toThrow(
        "Layout has no schema named 'trailer' (defined: header, detail, money)",
      );
      expect(() => new Layout().schema('trailer')).toThrow("Layout has no schema named 'trailer'");
    });

    it('should hand its options down to every schema', () => {
      const layout = bankLayout();

      expect(layout.option('padding')).toBe('0');
      expect(layout.schema('money').option('padding')).toBe('0');
      expect(layout.schema('header').singular).toBe(true);
    });

    it('should validate its own options', () => {
      expect(() => new Layout({ options: { padding: 'ab' } })).toThrow(ConfigError);
      expect(() => new Layout({ options: { padding: 'ab' } })).toThrow(
        "Layout: invalid value 'ab' for option 'padding'",
      );
    });
  });

  describe('lines', () => {
    it('should identify the first schema that accepts a line', () => {
      const layout = bankLayout();

      expect(layout.identify('H00042')?.name).toBe('header');
      expect(layout.identify('DAB12000150')?.name).toBe('detail');
      expect(layout.identify('X')).toBeNull();
    });

    it('should parse a line with the schema it belongs to', () => {
      const layout = bankLayout();

      expect(layout.parseLine('H00042')).toEqual({ schema: 'header', record: { kind: 'H', count: 42 } });
      expect(layout.parseLine('DAB12000150')).toEqual({
        schema: 'detail',
        record: { kind: 'D', account: 'AB12', total: { amount: 150 } },
      });
    });

    it('should throw SchemaError when no schema matches', () => {
      expect(() => bankLayout().parseLine('X1')).toThrow(SchemaError);
      expect(() => bankLayout().parseLine('X1')).toThrow("No schema of the layout matches line 'X1'");
    });

    it('should format a record with a named schema', () => {
      const layout = bankLayout();

      expect(layout.formatLine('detail', { kind: 'D', account: 'AB', total: { amount: 7 } })).toBe('DAB  000007');
      expect(layout.formatLine('header')).toBe('000000');
    });
  });

  describe('validation', () => {
    it('should pass when every reference resolves', () => {
      const layout = bankLayout();

      expect(layout.validate()).toEqual({ isValid: true, errors: [] });
      expect(layout.assertValid()).toBe(layout);
    });

    it('should collect the issues of every schema', () => {
      const layout = new Layout();
      layout.define('a', (s) => s.addReference('nothing'));
      layout.define('b', (s) => s.addColumn('x', 1));

      expect(layout.errors()).toHaveLength(1);
      expect(() => layout.assertValid()).toThrow(
        "Layout has 1 unresolved field(s):\nnothing: Cannot resolve reference 'nothing' in schema 'a': no schema named 'nothing' is in scope",
      );
    });
  });

  describe('events', () => {
    it('should announce defined schemas', () => {
      const layout = new Layout();
      const handler = vi.fn();
      layout.on('schema:defined', handler);

      layout.define('rec', (s) => {
        s.addColumn('a', 1);
        s.addFiller(2);
      });

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(expect.objectContaining({ schema: 'rec', fields: ['a', 'spacer_1'] }));
    });

    it('should publish schema events on its bus', () => {
      const layout = bankLayout();
      const resolved = vi.fn();
      const any = vi.fn<(event: DomainEvent) => void>();
      layout.on('reference:resolved', resolved).onAny(any);

      layout.parseLine('DAB12000150');
      layout.parseLine('DCD34000007');

      expect(resolved).toHaveBeenCalledOnce();
      expect(resolved).toHaveBeenCalledWith(
        expect.objectContaining({ schema: 'detail', field: 'total', target: 'money' }),
      );
      expect(any.mock.calls.map(([event]) => event.type)).toEqual([
        'reference:resolved',
        'options:propagated',
        'options:propagated',
      ]);
    });

    it('should stop notifying removed handlers', () => {
      const layout = new Layout();
      const handler = vi.fn();
      const any = vi.fn();
      layout.on('schema:defined', handler).onAny(any);
      layout.off('schema:defined', handler).offAny(any);

      layout.define('rec', (s) => s.addColumn('a', 1));

      expect(handler).not.toHaveBeenCalled();
      expect(any).not.toHaveBeenCalled();
    });
  });
});
