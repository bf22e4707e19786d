/**
 * Unit Tests: Type Mapper
 */

import { ColumnTypes } from '../../../src/models/column-type';
import { DefaultTypeMapper } from '../../../src/lib/type-mapper';

describe('DefaultTypeMapper', () => {
  const mapper = new DefaultTypeMapper();

  test('maps member types to logical column types', () => {
    expect(mapper.map({ name: 'Id', type: 'int' })).toEqual(ColumnTypes.int32());
    expect(mapper.map({ name: 'Total', type: 'long' })).toEqual(ColumnTypes.int64());
    expect(mapper.map({ name: 'At', type: 'dateOffset' })).toEqual(ColumnTypes.dateTimeOffset());
    expect(mapper.map({ name: 'Ratio', type: 'float' })).toEqual(ColumnTypes.double());
    expect(mapper.map({ name: 'Price', type: 'decimal' })).toEqual({ kind: 'decimal', precision: 18, scale: 2 });
    expect(mapper.map({ name: 'Name', type: 'string' })).toEqual({ kind: 'string', unicode: true });
  });

  test('maps json members to json regardless of member type', () => {
    expect(mapper.map({ name: 'Settings', type: 'string', json: true })).toEqual({ kind: 'json' });
  });
});
