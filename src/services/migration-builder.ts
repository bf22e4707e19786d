/**
 * Migration Builder
 *
 * Fluent authoring surface for migration operations. A migration's `up`
 * receives one builder and records its intents; the generator consumes the
 * resulting list once.
 */

import { ColumnType } from '../models/column-type';
import { IncrementalKeyAnnotation } from '../models/entity-description';
import {
  AddCheckOp,
  AddColumnOp,
  AddForeignKeyOp,
  AddPrimaryKeyOp,
  AddUniqueOp,
  CreateIndexOp,
  CreateTableOp,
  MigrationOperation,
  RoutineKind,
} from '../models/migration-operation';
import { DefaultValue, ReferentialAction } from '../models/schema-model';
import { ModelBuildError } from '../lib/error-handler';

export interface ColumnOptions {
  /** Defaults to true, or false for identity columns. */
  isNullable?: boolean;
  defaultValue?: DefaultValue;
  fixedLength?: number;
  identity?: IncrementalKeyAnnotation | true;
}

export interface ForeignKeyOptions {
  onDelete?: ReferentialAction;
  onUpdate?: ReferentialAction;
}

export interface IndexOptions {
  isUnique?: boolean;
}

function columnOp(schema: string, table: string, name: string, type: ColumnType, options: ColumnOptions): AddColumnOp {
  const identity = options.identity === true ? {} : options.identity;

  return {
    kind: 'addColumn',
    schema,
    table,
    name,
    type,
    isNullable: options.isNullable ?? identity === undefined,
    defaultValue: options.defaultValue,
    isIncrementalKey: identity !== undefined,
    sequenceName: identity?.sequenceName,
    startWith: identity?.startWith,
    incrementBy: identity?.incrementBy,
    fixedLength: options.fixedLength,
  };
}

function foreignKeyOp(
  schema: string,
  table: string,
  name: string,
  columns: readonly string[],
  refSchema: string,
  refTable: string,
  refColumns: readonly string[],
  options: ForeignKeyOptions
): AddForeignKeyOp {
  if (columns.length === 0 || columns.length !== refColumns.length) {
    throw new ModelBuildError(
      `Foreign key ${name} on ${schema}.${table} needs matching column lists (${columns.length} vs ${refColumns.length})`,
      { table: `${schema}.${table}`, foreignKey: name }
    );
  }

  return {
    kind: 'addForeignKey',
    schema,
    table,
    name,
    columns: [...columns],
    refSchema,
    refTable,
    refColumns: [...refColumns],
    onDelete: options.onDelete ?? ReferentialAction.NO_ACTION,
    onUpdate: options.onUpdate ?? ReferentialAction.NO_ACTION,
  };
}

/**
 * Collects the parts of a createTable operation.
 */
export class TableBuilder {
  private readonly columns: AddColumnOp[] = [];
  private primaryKeyOp?: AddPrimaryKeyOp;
  private readonly uniques: AddUniqueOp[] = [];
  private readonly checks: AddCheckOp[] = [];
  private readonly indexes: CreateIndexOp[] = [];
  private readonly foreignKeys: AddForeignKeyOp[] = [];

  constructor(private readonly schema: string, private readonly name: string) {}

  column(name: string, type: ColumnType, options: ColumnOptions = {}): this {
    if (this.columns.some(c => c.name.toLowerCase() === name.toLowerCase())) {
      throw new ModelBuildError(`Duplicate column '${name}' in ${this.schema}.${this.name}`, {
        table: `${this.schema}.${this.name}`,
        column: name,
      });
    }
    this.columns.push(columnOp(this.schema, this.name, name, type, options));
    return this;
  }

  primaryKey(name: string, columns: readonly string[]): this {
    if (this.primaryKeyOp) {
      throw new ModelBuildError(`Table ${this.schema}.${this.name} already has primary key '${this.primaryKeyOp.name}'`, {
        table: `${this.schema}.${this.name}`,
      });
    }
    this.primaryKeyOp = { kind: 'addPrimaryKey', schema: this.schema, table: this.name, name, columns: [...columns] };
    return this;
  }

  unique(name: string, columns: readonly string[]): this {
    this.uniques.push({ kind: 'addUnique', schema: this.schema, table: this.name, name, columns: [...columns] });
    return this;
  }

  check(name: string, expression: string): this {
    this.checks.push({ kind: 'addCheck', schema: this.schema, table: this.name, name, expression });
    return this;
  }

  index(name: string, columns: readonly string[], options: IndexOptions = {}): this {
    this.indexes.push({
      kind: 'createIndex',
      schema: this.schema,
      table: this.name,
      name,
      columns: [...columns],
      isUnique: options.isUnique ?? false,
    });
    return this;
  }

  foreignKey(
    name: string,
    columns: readonly string[],
    refSchema: string,
    refTable: string,
    refColumns: readonly string[],
    options: ForeignKeyOptions = {}
  ): this {
    this.foreignKeys.push(foreignKeyOp(this.schema, this.name, name, columns, refSchema, refTable, refColumns, options));
    return this;
  }

  build(): CreateTableOp {
    return {
      kind: 'createTable',
      schema: this.schema,
      name: this.name,
      columns: [...this.columns],
      primaryKey: this.primaryKeyOp,
      uniques: [...this.uniques],
      checks: [...this.checks],
      indexes: [...this.indexes],
      foreignKeys: [...this.foreignKeys],
    };
  }
}

export class MigrationBuilder {
  private readonly ops: MigrationOperation[] = [];

  /**
   * Operations recorded so far, in authoring order.
   */
  get operations(): readonly MigrationOperation[] {
    return Object.freeze([...this.ops]);
  }

  add(operation: MigrationOperation): this {
    this.ops.push(operation);
    return this;
  }

  sql(sql: string): this {
    return this.add({ kind: 'sql', sql });
  }

  createTable(schema: string, name: string, configure: (table: TableBuilder) => void): this {
    const table = new TableBuilder(schema, name);
    configure(table);
    return this.add(table.build());
  }

  dropTable(schema: string, name: string): this {
    return this.add({ kind: 'dropTable', schema, name });
  }

  addColumn(schema: string, table: string, name: string, type: ColumnType, options: ColumnOptions = {}): this {
    return this.add(columnOp(schema, table, name, type, options));
  }

  dropColumn(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropColumn', schema, table, name });
  }

  addPrimaryKey(schema: string, table: string, name: string, columns: readonly string[]): this {
    return this.add({ kind: 'addPrimaryKey', schema, table, name, columns: [...columns] });
  }

  dropPrimaryKey(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropPrimaryKey', schema, table, name });
  }

  addUnique(schema: string, table: string, name: string, columns: readonly string[]): this {
    return this.add({ kind: 'addUnique', schema, table, name, columns: [...columns] });
  }

  dropUnique(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropUnique', schema, table, name });
  }

  addCheck(schema: string, table: string, name: string, expression: string): this {
    return this.add({ kind: 'addCheck', schema, table, name, expression });
  }

  dropCheck(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropCheck', schema, table, name });
  }

  createIndex(schema: string, table: string, name: string, columns: readonly string[], options: IndexOptions = {}): this {
    return this.add({ kind: 'createIndex', schema, table, name, columns: [...columns], isUnique: options.isUnique ?? false });
  }

  dropIndex(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropIndex', schema, table, name });
  }

  addForeignKey(
    schema: string,
    table: string,
    name: string,
    columns: readonly string[],
    refSchema: string,
    refTable: string,
    refColumns: readonly string[],
    options: ForeignKeyOptions = {}
  ): this {
    return this.add(foreignKeyOp(schema, table, name, columns, refSchema, refTable, refColumns, options));
  }

  dropForeignKey(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropForeignKey', schema, table, name });
  }

  createOrAlterView(schema: string, name: string, definitionSql: string): this {
    return this.add({ kind: 'createOrAlterView', schema, name, definitionSql });
  }

  dropView(schema: string, name: string): this {
    return this.add({ kind: 'dropView', schema, name });
  }

  createOrAlterProcedure(schema: string, name: string, definitionSql: string): this {
    return this.add({ kind: 'createOrAlterRoutine', schema, name, routineKind: RoutineKind.PROCEDURE, definitionSql });
  }

  createOrAlterScalarFunction(schema: string, name: string, definitionSql: string): this {
    return this.add({ kind: 'createOrAlterRoutine', schema, name, routineKind: RoutineKind.SCALAR_FUNCTION, definitionSql });
  }

  createOrAlterTableFunction(schema: string, name: string, definitionSql: string): this {
    return this.add({ kind: 'createOrAlterRoutine', schema, name, routineKind: RoutineKind.TABLE_FUNCTION, definitionSql });
  }

  dropRoutine(schema: string, name: string, routineKind: RoutineKind): this {
    return this.add({ kind: 'dropRoutine', schema, name, routineKind });
  }

  createOrAlterTrigger(schema: string, name: string, definitionSql: string): this {
    return this.add({ kind: 'createOrAlterTrigger', schema, name, definitionSql });
  }

  dropTrigger(schema: string, table: string, name: string): this {
    return this.add({ kind: 'dropTrigger', schema, table, name });
  }
}
