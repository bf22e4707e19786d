/**
 * DDL Generator (bootstrap mode)
 *
 * Turns a SchemaModel into an ordered list of existence-guarded batches:
 * schemas, then tables with inline primary keys, then per-table uniques,
 * checks and indexes, then every foreign key across all tables. Output is
 * additive only and re-running it against a provisioned database changes
 * nothing.
 */

import { DbTable, SchemaModel } from '../models/schema-model';
import {
  formatAddCheck,
  formatAddForeignKey,
  formatAddUnique,
  formatCreateIndex,
  formatCreateTable,
  guardConstraint,
  quoteIdentifier,
} from '../lib/sql-dialect';

/**
 * Case-insensitive ordering with an ordinal tie-break, so names differing
 * only by case still sort deterministically.
 */
export function compareNames(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export class DdlGenerator {
  generate(model: SchemaModel): string[] {
    const batches: string[] = [];

    const schemas = [...model.schemas].sort((a, b) => compareNames(a.name, b.name));
    for (const schema of schemas) {
      batches.push(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schema.name)};`);
    }

    const tables = model
      .allTables()
      .sort((a, b) => compareNames(a.qualifiedName, b.qualifiedName));

    for (const table of tables) {
      batches.push(formatCreateTable(table.schema, table.name, table.columns, table.primaryKey, { ifNotExists: true }));
    }

    for (const table of tables) {
      batches.push(...this.generateTableObjects(table));
    }

    // Foreign keys last, so references to tables created later never fail
    for (const table of tables) {
      for (const fk of table.foreignKeys) {
        batches.push(guardConstraint(table.schema, fk.name, formatAddForeignKey({ schema: table.schema, table: table.name, ...fk })));
      }
    }

    return batches;
  }

  private generateTableObjects(table: DbTable): string[] {
    const batches: string[] = [];

    for (const unique of table.uniques) {
      batches.push(guardConstraint(table.schema, unique.name, formatAddUnique(table.schema, table.name, unique)));
    }

    for (const check of table.checks) {
      batches.push(
        guardConstraint(table.schema, check.name, formatAddCheck(table.schema, table.name, check.name, check.expression))
      );
    }

    for (const index of table.indexes) {
      batches.push(formatCreateIndex(table.schema, table.name, index, { ifNotExists: true }));
    }

    return batches;
  }
}
