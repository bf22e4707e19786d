/**
 * Member type → logical column type mapping used by the SchemaModelBuilder.
 */

import { ColumnType, ColumnTypes } from '../models/column-type';
import { MemberDescription } from '../models/entity-description';

export interface TypeMapper {
  map(member: MemberDescription): ColumnType;
}

export class DefaultTypeMapper implements TypeMapper {
  map(member: MemberDescription): ColumnType {
    if (member.json) {
      return ColumnTypes.json();
    }

    switch (member.type) {
      case 'int':
        return ColumnTypes.int32();
      case 'long':
        return ColumnTypes.int64();
      case 'bool':
        return ColumnTypes.bool();
      case 'date':
        return ColumnTypes.dateTime();
      case 'dateOffset':
        return ColumnTypes.dateTimeOffset();
      case 'uuid':
        return ColumnTypes.guid();
      case 'decimal':
        return ColumnTypes.decimal(18, 2);
      case 'double':
      case 'float':
        return ColumnTypes.double();
      case 'bytes':
        return ColumnTypes.bytes();
      case 'string':
        return ColumnTypes.string();
    }
  }
}
