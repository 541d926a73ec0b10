import { Column } from '../model/Column.js';
import type { Schema } from '../model/Schema.js';
import type { SchemaIssue } from '../model/ValidationResult.js';

/**
 * Domain service that walks a schema tree and reports every field that
 * cannot be resolved.
 *
 * Nested schemas and bound references are followed; a reference leading
 * back to a schema already on the current path is reported once instead of
 * being followed again.
 */
export class SchemaValidator {
  constructor(private readonly schema: Schema) {}

  /** Collect issues for the whole closure of the schema. */
  collect(): SchemaIssue[] {
    return this.walk(this.schema, '', new Set<Schema>());
  }

  private walk(schema: Schema, prefix: string, active: Set<Schema>): SchemaIssue[] {
    const issues: SchemaIssue[] = [];
    active.add(schema);

    for (const id of schema.fields) {
      const path = prefix === '' ? id : `${prefix}.${id}`;
      const result = schema.resolveField(id);

      if (!result.ok) {
        issues.push({
          field: id,
          schema: schema.name,
          path,
          message: result.reason,
          code: result.code,
          ...(result.found !== undefined ? { found: result.found } : {}),
        });
        continue;
      }

      const target = result.target;
      if (target instanceof Column) continue;

      if (active.has(target)) {
        issues.push({
          field: id,
          schema: schema.name,
          path,
          message: `Field '${id}' of schema '${schema.name}' leads back to schema '${target.name}'`,
          code: 'RECURSIVE_REFERENCE',
          found: `schema '${target.name}'`,
        });
        continue;
      }

      issues.push(...this.walk(target, path, active));
    }

    active.delete(schema);
    return issues;
  }
}
