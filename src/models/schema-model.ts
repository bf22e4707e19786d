/**
 * Schema Model
 *
 * In-memory representation of schemas, tables, columns and constraints,
 * independent of any SQL dialect. Built once per extraction run by the
 * SchemaModelBuilder and consumed by the DDL generator.
 */

import { ColumnType } from './column-type';
import type { EntityDescription } from './entity-description';

export enum ReferentialAction {
  NO_ACTION = 'no_action',
  RESTRICT = 'restrict',
  CASCADE = 'cascade',
  SET_NULL = 'set_null',
  SET_DEFAULT = 'set_default'
}

/**
 * Column default. `{ sql }` is emitted verbatim (e.g. `now()`).
 */
export type DefaultValue = string | number | boolean | Date | { sql: string };

export interface DbColumn {
  name: string;
  sourceName: string;
  type: ColumnType;
  isNullable: boolean;
  isIncrementalKey: boolean;
  sequenceName?: string;
  startWith?: number;
  incrementBy?: number;
  maxLength?: number;
  fixedLength?: number;
  precision?: number;
  scale?: number;
  defaultValue?: DefaultValue;
}

export interface DbPrimaryKey {
  name: string;
  columns: string[];
}

export interface DbUnique {
  name: string;
  columns: string[];
}

export interface DbIndex {
  name: string;
  columns: string[];
  isUnique: boolean;
}

export interface DbCheck {
  name: string;
  expression: string;
}

export interface DbForeignKey {
  name: string;
  columns: string[];
  refSchema: string;
  refTable: string;
  refColumns: string[];
  onDelete: ReferentialAction;
  onUpdate: ReferentialAction;
}

function keyOf(name: string): string {
  return name.toLowerCase();
}

export class DbTable {
  readonly columns: DbColumn[] = [];
  readonly uniques: DbUnique[] = [];
  readonly checks: DbCheck[] = [];
  readonly indexes: DbIndex[] = [];
  readonly foreignKeys: DbForeignKey[] = [];
  private pk: DbPrimaryKey | null = null;

  constructor(
    readonly schema: string,
    readonly name: string,
    readonly source?: EntityDescription
  ) {}

  get primaryKey(): DbPrimaryKey | null {
    return this.pk;
  }

  get qualifiedName(): string {
    return `${this.schema}.${this.name}`;
  }

  findColumn(columnName: string): DbColumn | undefined {
    const key = keyOf(columnName);
    return this.columns.find(c => keyOf(c.name) === key);
  }

  addColumn(column: DbColumn): void {
    if (this.findColumn(column.name)) {
      throw new Error(`Duplicate column '${column.name}' in table ${this.qualifiedName}`);
    }
    this.columns.push(column);
  }

  setPrimaryKey(primaryKey: DbPrimaryKey): void {
    if (this.pk) {
      throw new Error(`Table ${this.qualifiedName} already has primary key '${this.pk.name}'`);
    }
    this.pk = primaryKey;
  }
}

export class DbSchema {
  private readonly tableMap = new Map<string, DbTable>();

  constructor(readonly name: string) {}

  get tables(): DbTable[] {
    return Array.from(this.tableMap.values());
  }

  getTable(tableName: string): DbTable | undefined {
    return this.tableMap.get(keyOf(tableName));
  }

  getOrAddTable(tableName: string, source?: EntityDescription): DbTable {
    const key = keyOf(tableName);
    let table = this.tableMap.get(key);
    if (!table) {
      table = new DbTable(this.name, tableName, source);
      this.tableMap.set(key, table);
    }
    return table;
  }
}

export class SchemaModel {
  private readonly schemaMap = new Map<string, DbSchema>();

  get schemas(): DbSchema[] {
    return Array.from(this.schemaMap.values());
  }

  getSchema(name: string): DbSchema | undefined {
    return this.schemaMap.get(keyOf(name));
  }

  getOrAddSchema(name: string): DbSchema {
    const key = keyOf(name);
    let schema = this.schemaMap.get(key);
    if (!schema) {
      schema = new DbSchema(name);
      this.schemaMap.set(key, schema);
    }
    return schema;
  }

  allTables(): DbTable[] {
    return this.schemas.flatMap(s => s.tables);
  }

  toString(): string {
    return `Schemas=${this.schemaMap.size}, Tables=${this.allTables().length}`;
  }
}
