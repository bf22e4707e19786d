/**
 * Migration SQL Generator (incremental mode)
 *
 * Translates an explicit operation list into SQL batches in input order.
 * Every foreign key, standalone or declared inside a createTable, is held
 * back and appended after the whole list so that it can reference tables
 * created later in the same run.
 */

import {
  AddForeignKeyOp,
  CreateTableOp,
  MigrationOperation,
  RoutineKind,
} from '../models/migration-operation';
import { getConfig } from '../lib/environment-config';
import { UnsupportedOperationError } from '../lib/error-handler';
import { splitBatches } from '../lib/script-splitter';
import {
  formatAddCheck,
  formatAddForeignKey,
  formatAddPrimaryKey,
  formatAddUnique,
  formatColumnDefinition,
  formatCreateIndex,
  formatCreateTable,
  formatDropConstraint,
  qualifiedName,
  quoteIdentifier,
} from '../lib/sql-dialect';

export interface MigrationSqlGeneratorOptions {
  /** Separator line for view, routine and trigger bodies. Defaults to BATCH_SEPARATOR. */
  batchSeparator?: string;
}

export class MigrationSqlGenerator {
  private readonly batchSeparator: string;

  constructor(options: MigrationSqlGeneratorOptions = {}) {
    this.batchSeparator = options.batchSeparator ?? getConfig().migration.batchSeparator;
  }

  generate(operations: readonly MigrationOperation[]): string[] {
    const batches: string[] = [];
    const deferredForeignKeys: AddForeignKeyOp[] = [];

    for (const operation of operations) {
      switch (operation.kind) {
        case 'sql':
          batches.push(operation.sql);
          break;

        case 'createTable':
          batches.push(...this.generateCreateTable(operation));
          deferredForeignKeys.push(...operation.foreignKeys);
          break;

        case 'dropTable':
          batches.push(`DROP TABLE ${qualifiedName(operation.schema, operation.name)};`);
          break;

        case 'addColumn':
          batches.push(`ALTER TABLE ${qualifiedName(operation.schema, operation.table)} ADD COLUMN ${formatColumnDefinition(operation)};`);
          break;

        case 'dropColumn':
          batches.push(`ALTER TABLE ${qualifiedName(operation.schema, operation.table)} DROP COLUMN ${quoteIdentifier(operation.name)};`);
          break;

        case 'addPrimaryKey':
          batches.push(formatAddPrimaryKey(operation.schema, operation.table, operation));
          break;

        case 'addUnique':
          batches.push(formatAddUnique(operation.schema, operation.table, operation));
          break;

        case 'addCheck':
          batches.push(formatAddCheck(operation.schema, operation.table, operation.name, operation.expression));
          break;

        case 'dropPrimaryKey':
        case 'dropUnique':
        case 'dropCheck':
        case 'dropForeignKey':
          batches.push(formatDropConstraint(operation.schema, operation.table, operation.name));
          break;

        case 'createIndex':
          batches.push(formatCreateIndex(operation.schema, operation.table, operation));
          break;

        case 'dropIndex':
          // PostgreSQL indexes live in the table's schema
          batches.push(`DROP INDEX ${qualifiedName(operation.schema, operation.name)};`);
          break;

        case 'addForeignKey':
          deferredForeignKeys.push(operation);
          break;

        case 'createOrAlterView':
        case 'createOrAlterRoutine':
        case 'createOrAlterTrigger':
          batches.push(...splitBatches(operation.definitionSql, this.batchSeparator));
          break;

        case 'dropView':
          batches.push(`DROP VIEW ${qualifiedName(operation.schema, operation.name)};`);
          break;

        case 'dropRoutine':
          batches.push(`DROP ${routineKeyword(operation.routineKind)} ${qualifiedName(operation.schema, operation.name)};`);
          break;

        case 'dropTrigger':
          batches.push(
            `DROP TRIGGER ${quoteIdentifier(operation.name)} ON ${qualifiedName(operation.schema, operation.table)};`
          );
          break;

        default: {
          const unhandled: never = operation;
          throw new UnsupportedOperationError(operationKindOf(unhandled));
        }
      }
    }

    for (const fk of deferredForeignKeys) {
      batches.push(formatAddForeignKey(fk));
    }

    return batches;
  }

  private generateCreateTable(operation: CreateTableOp): string[] {
    const batches = [formatCreateTable(operation.schema, operation.name, operation.columns, operation.primaryKey)];

    for (const unique of operation.uniques) {
      batches.push(formatAddUnique(unique.schema, unique.table, unique));
    }
    for (const check of operation.checks) {
      batches.push(formatAddCheck(check.schema, check.table, check.name, check.expression));
    }
    for (const index of operation.indexes) {
      batches.push(formatCreateIndex(index.schema, index.table, index));
    }

    return batches;
  }
}

function routineKeyword(kind: RoutineKind): string {
  switch (kind) {
    case RoutineKind.PROCEDURE:
      return 'PROCEDURE';
    case RoutineKind.SCALAR_FUNCTION:
    case RoutineKind.TABLE_FUNCTION:
      return 'FUNCTION';
  }
}

function operationKindOf(operation: unknown): string {
  if (typeof operation === 'object' && operation !== null && 'kind' in operation) {
    return String(operation.kind);
  }
  return typeof operation;
}
