/**
 * Logical Column Types
 *
 * Provider-independent column types. The SQL dialect decides the physical
 * type (for PostgreSQL: integer, varchar(n), jsonb, ...).
 */

export type ColumnType =
  | { kind: 'int32' }
  | { kind: 'int64' }
  | { kind: 'bool' }
  | { kind: 'dateTime' }
  | { kind: 'dateTimeOffset' }
  | { kind: 'guid' }
  | { kind: 'decimal'; precision: number; scale: number }
  | { kind: 'double' }
  | { kind: 'string'; maxLength?: number; unicode: boolean }
  | { kind: 'bytes'; maxLength?: number }
  | { kind: 'json' };

export const ColumnTypes = {
  int32: (): ColumnType => ({ kind: 'int32' }),
  int64: (): ColumnType => ({ kind: 'int64' }),
  bool: (): ColumnType => ({ kind: 'bool' }),
  dateTime: (): ColumnType => ({ kind: 'dateTime' }),
  dateTimeOffset: (): ColumnType => ({ kind: 'dateTimeOffset' }),
  guid: (): ColumnType => ({ kind: 'guid' }),
  decimal: (precision: number = 18, scale: number = 2): ColumnType => ({ kind: 'decimal', precision, scale }),
  double: (): ColumnType => ({ kind: 'double' }),
  string: (maxLength?: number, unicode: boolean = true): ColumnType =>
    maxLength === undefined ? { kind: 'string', unicode } : { kind: 'string', maxLength, unicode },
  bytes: (maxLength?: number): ColumnType =>
    maxLength === undefined ? { kind: 'bytes' } : { kind: 'bytes', maxLength },
  json: (): ColumnType => ({ kind: 'json' }),
};

export function isIntegerType(type: ColumnType): boolean {
  return type.kind === 'int32' || type.kind === 'int64';
}
