import { describe, it, expect } from 'vitest';
import { SchemaValidator } from '../../../src/domain/services/SchemaValidator.js';
import { TestCatalog } from '../../helpers/TestCatalog.js';

describe('SchemaValidator', () => {
  it('should return no issues for a resolvable tree', () => {
    const catalog = new TestCatalog();
    catalog.define('inner', (s) => s.addColumn('a', 1));
    const outer = catalog.define('outer', (s) => {
      s.addColumn('kind', 1);
      s.addSchema('body', (body) => body.addReference('inner'));
    });

    expect(new SchemaValidator(outer).collect()).toEqual([]);
  });

  it('should report nested failures with dotted paths', () => {
    const outer = new TestCatalog().define('outer', (s) => {
      s.addSchema('body', (body) => {
        body.addColumn('a', 1);
        body.addReference('detail', { schemaName: 'missing' });
      });
    });

    expect(new SchemaValidator(outer).collect()).toEqual([
      {
        field: 'detail',
        schema: 'body',
        path: 'body.detail',
        message: "Cannot resolve reference 'detail' in schema 'body': no schema named 'missing' is in scope",
        code: 'UNRESOLVED_REFERENCE',
      },
    ]);
  });

  it('should follow bound references into their targets', () => {
    const catalog = new TestCatalog();
    catalog.define('inner', (s) => s.addReference('ghost'));
    const outer = catalog.define('outer', (s) => s.addReference('payload', { schemaName: 'inner' }));

    const issues = new SchemaValidator(outer).collect();

    expect(issues.map((issue) => [issue.path, issue.schema, issue.code])).toEqual([
      ['payload.ghost', 'inner', 'UNRESOLVED_REFERENCE'],
    ]);
  });

  it('should report a reference cycle once instead of following it', () => {
    const catalog = new TestCatalog();
    const a = catalog.define('a', (s) => s.addReference('b'));
    catalog.define('b', (s) => s.addReference('a'));

    expect(new SchemaValidator(a).collect()).toEqual([
      {
        field: 'a',
        schema: 'b',
        path: 'b.a',
        message: "Field 'a' of schema 'b' leads back to schema 'a'",
        code: 'RECURSIVE_REFERENCE',
        found: "schema 'a'",
      },
    ]);
  });

  it('should not flag a schema reached twice along different branches', () => {
    const catalog = new TestCatalog();
    catalog.define('address', (s) => s.addColumn('city', 8));
    const person = catalog.define('person', (s) => {
      s.addReference('home', { schemaName: 'address' });
      s.addReference('work', { schemaName: 'address' });
    });

    expect(new SchemaValidator(person).collect()).toEqual([]);
    expect(person.length).toBe(16);
  });
});
