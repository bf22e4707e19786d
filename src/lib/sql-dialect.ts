/**
 * PostgreSQL Dialect Helpers
 *
 * Identifier quoting, literal escaping, type mapping and column formatting
 * shared by the bootstrap DDL generator and the incremental migration
 * generator, so both emit identical column definitions.
 */

import { ColumnType, isIntegerType } from '../models/column-type';
import { DefaultValue, ReferentialAction } from '../models/schema-model';

/**
 * Column shape accepted by formatColumnDefinition. Both DbColumn and
 * AddColumnOp satisfy it.
 */
export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  isNullable: boolean;
  isIncrementalKey?: boolean;
  sequenceName?: string;
  startWith?: number;
  incrementBy?: number;
  maxLength?: number;
  fixedLength?: number;
  precision?: number;
  scale?: number;
  defaultValue?: DefaultValue;
}

/**
 * Quotes an identifier, doubling any embedded double quote.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Schema-qualified, quoted name.
 */
export function qualifiedName(schema: string, name: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(name)}`;
}

export function quoteIdentifierList(names: readonly string[]): string {
  return names.map(quoteIdentifier).join(', ');
}

/**
 * Escapes the body of a string literal by doubling single quotes.
 */
export function escapeLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

export function quoteLiteral(value: string): string {
  return `'${escapeLiteral(value)}'`;
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * Formats a date as `yyyy-MM-ddTHH:mm:ss.fffffff` in UTC. JavaScript dates
 * carry milliseconds, so the last four fraction digits are always zero.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}` +
    `T${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}` +
    `.${pad(date.getUTCMilliseconds(), 3)}0000`
  );
}

/**
 * Maps a logical column type to its PostgreSQL type. Column-level size and
 * precision (when present) take precedence over the ones on the type.
 */
export function mapColumnType(column: Pick<ColumnDefinition, 'type' | 'maxLength' | 'fixedLength' | 'precision' | 'scale'>): string {
  const type = column.type;

  switch (type.kind) {
    case 'int32':
      return 'integer';
    case 'int64':
      return 'bigint';
    case 'bool':
      return 'boolean';
    case 'dateTime':
      return 'timestamp';
    case 'dateTimeOffset':
      return 'timestamptz';
    case 'guid':
      return 'uuid';
    case 'decimal':
      return `numeric(${column.precision ?? type.precision},${column.scale ?? type.scale})`;
    case 'double':
      return 'double precision';
    case 'string': {
      if (column.fixedLength !== undefined) {
        return `char(${column.fixedLength})`;
      }
      const maxLength = column.maxLength ?? type.maxLength;
      return maxLength === undefined ? 'text' : `varchar(${maxLength})`;
    }
    case 'bytes':
      // bytea has no length modifier
      return 'bytea';
    case 'json':
      return 'jsonb';
  }
}

/**
 * Formats a value as a SQL literal for a DEFAULT clause.
 */
export function formatDefaultValue(value: DefaultValue): string {
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`Default value must be a finite number, got ${value}`);
    }
    return value.toString();
  }
  if (typeof value === 'string') {
    return quoteLiteral(value);
  }
  if (value instanceof Date) {
    return quoteLiteral(formatTimestamp(value));
  }
  return value.sql;
}

function formatIdentity(column: ColumnDefinition): string {
  if (!column.isIncrementalKey || !isIntegerType(column.type)) {
    return '';
  }

  const options: string[] = [];
  if (column.sequenceName) {
    options.push(`SEQUENCE NAME ${quoteIdentifier(column.sequenceName)}`);
  }
  if (column.startWith !== undefined) {
    options.push(`START WITH ${column.startWith}`);
  }
  if (column.incrementBy !== undefined) {
    options.push(`INCREMENT BY ${column.incrementBy}`);
  }

  const suffix = options.length > 0 ? ` (${options.join(' ')})` : '';
  return ` GENERATED BY DEFAULT AS IDENTITY${suffix}`;
}

/**
 * Builds `"col" type [identity] NULL|NOT NULL [DEFAULT ...]`.
 */
export function formatColumnDefinition(column: ColumnDefinition): string {
  const nullability = column.isNullable ? 'NULL' : 'NOT NULL';
  const defaultClause = column.defaultValue === undefined
    ? ''
    : ` DEFAULT ${formatDefaultValue(column.defaultValue)}`;

  return `${quoteIdentifier(column.name)} ${mapColumnType(column)}${formatIdentity(column)} ${nullability}${defaultClause}`;
}

/**
 * `ON DELETE|UPDATE <action>`, or an empty string for NO ACTION.
 */
export function formatReferentialAction(action: ReferentialAction, event: 'DELETE' | 'UPDATE'): string {
  switch (action) {
    case ReferentialAction.CASCADE:
      return `ON ${event} CASCADE`;
    case ReferentialAction.SET_NULL:
      return `ON ${event} SET NULL`;
    case ReferentialAction.SET_DEFAULT:
      return `ON ${event} SET DEFAULT`;
    case ReferentialAction.RESTRICT:
      return `ON ${event} RESTRICT`;
    case ReferentialAction.NO_ACTION:
      return '';
  }
}

export interface ForeignKeyDefinition {
  schema: string;
  table: string;
  name: string;
  columns: readonly string[];
  refSchema: string;
  refTable: string;
  refColumns: readonly string[];
  onDelete: ReferentialAction;
  onUpdate: ReferentialAction;
}

/**
 * `ALTER TABLE ... ADD CONSTRAINT ... FOREIGN KEY ... REFERENCES ...;`
 */
export function formatAddForeignKey(fk: ForeignKeyDefinition): string {
  const lines = [
    `ALTER TABLE ${qualifiedName(fk.schema, fk.table)}`,
    `ADD CONSTRAINT ${quoteIdentifier(fk.name)}`,
    `FOREIGN KEY (${quoteIdentifierList(fk.columns)})`,
    `REFERENCES ${qualifiedName(fk.refSchema, fk.refTable)} (${quoteIdentifierList(fk.refColumns)})`,
    formatReferentialAction(fk.onDelete, 'DELETE'),
    formatReferentialAction(fk.onUpdate, 'UPDATE'),
  ].filter(line => line.length > 0);

  return `${lines.join('\n')};`;
}

/**
 * Wraps a statement in a DO block that only runs it when no constraint
 * with the given name exists in the schema.
 */
export function guardConstraint(schema: string, constraintName: string, statement: string): string {
  return [
    'DO $migrator$',
    'BEGIN',
    '  IF NOT EXISTS (',
    '    SELECT 1 FROM pg_catalog.pg_constraint c',
    '    JOIN pg_catalog.pg_namespace n ON n.oid = c.connamespace',
    `    WHERE n.nspname = ${quoteLiteral(schema)} AND c.conname = ${quoteLiteral(constraintName)}`,
    '  ) THEN',
    ...statement.split('\n').map(line => `    ${line}`),
    '  END IF;',
    'END',
    '$migrator$;',
  ].join('\n');
}

export interface KeyDefinition {
  name: string;
  columns: readonly string[];
}

export interface IndexDefinition extends KeyDefinition {
  isUnique: boolean;
}

/**
 * `CREATE TABLE` with columns in declaration order and an inline primary key.
 */
export function formatCreateTable(
  schema: string,
  table: string,
  columns: readonly ColumnDefinition[],
  primaryKey: KeyDefinition | null | undefined,
  options: { ifNotExists?: boolean } = {}
): string {
  const lines = columns.map(column => `  ${formatColumnDefinition(column)}`);
  if (primaryKey) {
    lines.push(`  CONSTRAINT ${quoteIdentifier(primaryKey.name)} PRIMARY KEY (${quoteIdentifierList(primaryKey.columns)})`);
  }

  const guard = options.ifNotExists ? 'IF NOT EXISTS ' : '';
  return `CREATE TABLE ${guard}${qualifiedName(schema, table)} (\n${lines.join(',\n')}\n);`;
}

export function formatAddPrimaryKey(schema: string, table: string, key: KeyDefinition): string {
  return `ALTER TABLE ${qualifiedName(schema, table)} ADD CONSTRAINT ${quoteIdentifier(key.name)} PRIMARY KEY (${quoteIdentifierList(key.columns)});`;
}

export function formatAddUnique(schema: string, table: string, unique: KeyDefinition): string {
  return `ALTER TABLE ${qualifiedName(schema, table)} ADD CONSTRAINT ${quoteIdentifier(unique.name)} UNIQUE (${quoteIdentifierList(unique.columns)});`;
}

/**
 * The expression is emitted as given.
 */
export function formatAddCheck(schema: string, table: string, name: string, expression: string): string {
  return `ALTER TABLE ${qualifiedName(schema, table)} ADD CONSTRAINT ${quoteIdentifier(name)} CHECK (${expression});`;
}

export function formatDropConstraint(schema: string, table: string, name: string): string {
  return `ALTER TABLE ${qualifiedName(schema, table)} DROP CONSTRAINT ${quoteIdentifier(name)};`;
}

/**
 * Index names are schema-scoped in PostgreSQL; the index lands in the table's schema.
 */
export function formatCreateIndex(
  schema: string,
  table: string,
  index: IndexDefinition,
  options: { ifNotExists?: boolean } = {}
): string {
  const unique = index.isUnique ? 'UNIQUE ' : '';
  const guard = options.ifNotExists ? 'IF NOT EXISTS ' : '';
  return `CREATE ${unique}INDEX ${guard}${quoteIdentifier(index.name)} ON ${qualifiedName(schema, table)} (${quoteIdentifierList(index.columns)});`;
}
