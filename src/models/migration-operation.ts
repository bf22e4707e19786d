/**
 * Migration Operations
 *
 * Closed set of atomic schema-change intents. Operations are authored
 * explicitly (usually through MigrationBuilder) and consumed once by the
 * MigrationSqlGenerator.
 */

import { ColumnType } from './column-type';
import { DefaultValue, ReferentialAction } from './schema-model';

export enum RoutineKind {
  PROCEDURE = 'procedure',
  SCALAR_FUNCTION = 'scalar_function',
  TABLE_FUNCTION = 'table_function'
}

export interface SqlOp {
  readonly kind: 'sql';
  readonly sql: string;
}

export interface AddColumnOp {
  readonly kind: 'addColumn';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
  readonly type: ColumnType;
  readonly isNullable: boolean;
  readonly defaultValue?: DefaultValue;
  readonly isIncrementalKey?: boolean;
  readonly sequenceName?: string;
  readonly startWith?: number;
  readonly incrementBy?: number;
  readonly fixedLength?: number;
}

export interface DropColumnOp {
  readonly kind: 'dropColumn';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export interface AddPrimaryKeyOp {
  readonly kind: 'addPrimaryKey';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
  readonly columns: readonly string[];
}

export interface DropPrimaryKeyOp {
  readonly kind: 'dropPrimaryKey';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export interface AddUniqueOp {
  readonly kind: 'addUnique';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
  readonly columns: readonly string[];
}

export interface DropUniqueOp {
  readonly kind: 'dropUnique';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export interface AddCheckOp {
  readonly kind: 'addCheck';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
  readonly expression: string;
}

export interface DropCheckOp {
  readonly kind: 'dropCheck';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export interface CreateIndexOp {
  readonly kind: 'createIndex';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
  readonly columns: readonly string[];
  readonly isUnique: boolean;
}

export interface DropIndexOp {
  readonly kind: 'dropIndex';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export interface AddForeignKeyOp {
  readonly kind: 'addForeignKey';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
  readonly columns: readonly string[];
  readonly refSchema: string;
  readonly refTable: string;
  readonly refColumns: readonly string[];
  readonly onDelete: ReferentialAction;
  readonly onUpdate: ReferentialAction;
}

export interface DropForeignKeyOp {
  readonly kind: 'dropForeignKey';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export interface CreateTableOp {
  readonly kind: 'createTable';
  readonly schema: string;
  readonly name: string;
  readonly columns: readonly AddColumnOp[];
  readonly primaryKey?: AddPrimaryKeyOp;
  readonly uniques: readonly AddUniqueOp[];
  readonly checks: readonly AddCheckOp[];
  readonly indexes: readonly CreateIndexOp[];
  readonly foreignKeys: readonly AddForeignKeyOp[];
}

export interface DropTableOp {
  readonly kind: 'dropTable';
  readonly schema: string;
  readonly name: string;
}

export interface CreateOrAlterViewOp {
  readonly kind: 'createOrAlterView';
  readonly schema: string;
  readonly name: string;
  readonly definitionSql: string;
}

export interface DropViewOp {
  readonly kind: 'dropView';
  readonly schema: string;
  readonly name: string;
}

export interface CreateOrAlterRoutineOp {
  readonly kind: 'createOrAlterRoutine';
  readonly schema: string;
  readonly name: string;
  readonly routineKind: RoutineKind;
  readonly definitionSql: string;
}

export interface DropRoutineOp {
  readonly kind: 'dropRoutine';
  readonly schema: string;
  readonly name: string;
  readonly routineKind: RoutineKind;
}

export interface CreateOrAlterTriggerOp {
  readonly kind: 'createOrAlterTrigger';
  readonly schema: string;
  readonly name: string;
  readonly definitionSql: string;
}

/**
 * PostgreSQL triggers belong to a table, so the drop names it.
 */
export interface DropTriggerOp {
  readonly kind: 'dropTrigger';
  readonly schema: string;
  readonly table: string;
  readonly name: string;
}

export type MigrationOperation =
  | SqlOp
  | CreateTableOp
  | DropTableOp
  | AddColumnOp
  | DropColumnOp
  | AddPrimaryKeyOp
  | DropPrimaryKeyOp
  | AddUniqueOp
  | DropUniqueOp
  | AddCheckOp
  | DropCheckOp
  | CreateIndexOp
  | DropIndexOp
  | AddForeignKeyOp
  | DropForeignKeyOp
  | CreateOrAlterViewOp
  | DropViewOp
  | CreateOrAlterRoutineOp
  | DropRoutineOp
  | CreateOrAlterTriggerOp
  | DropTriggerOp;

