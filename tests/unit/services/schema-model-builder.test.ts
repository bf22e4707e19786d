/**
 * Unit Tests: SchemaModelBuilder
 * Entity descriptions → schema model, including annotation validation
 */

import { ColumnTypes } from '../../../src/models/column-type';
import { defineEntity, EntityDescription } from '../../../src/models/entity-description';
import { ReferentialAction } from '../../../src/models/schema-model';
import { ModelBuildError } from '../../../src/lib/error-handler';
import { SchemaModelBuilder } from '../../../src/services/schema-model-builder';

const Customer = defineEntity({
  name: 'Customer',
  table: { name: 'Customers', schema: 'sales' },
  members: [
    { name: 'Id', type: 'int', primaryKey: {}, incrementalKey: { startWith: 1000 } },
    { name: 'Email', type: 'string', maxLength: 200, notNull: true, unique: [{ name: 'Email' }] },
    { name: 'Country', type: 'string', fixedLength: 2 },
    { name: 'Balance', type: 'decimal', precision: { precision: 12, scale: 2 }, defaultValue: 0 },
    { name: 'Cache', type: 'string', ignore: true },
  ],
});

const Order = defineEntity({
  name: 'Order',
  table: { name: 'Orders', schema: 'sales' },
  checks: [{ expression: '"Total" >= 0' }],
  members: [
    { name: 'Id', type: 'long', primaryKey: {} },
    {
      name: 'CustomerId',
      type: 'int',
      notNull: true,
      foreignKey: { entity: () => Customer, member: 'Id', onDelete: ReferentialAction.CASCADE },
      indexes: [{ name: 'IX_Orders_Customer_Placed', order: 0 }],
    },
    { name: 'PlacedAt', type: 'date', column: 'placed_at', indexes: [{ name: 'IX_Orders_Customer_Placed', order: 1 }] },
    { name: 'Total', type: 'decimal' },
    { name: 'Meta', type: 'string', json: true },
    { name: 'Status', type: 'string', maxLength: 20, checks: [{ expression: `"Status" IN ('open', 'closed')` }] },
  ],
});

const OrderLine = defineEntity({
  name: 'OrderLine',
  members: [
    { name: 'OrderId', type: 'long', primaryKey: { order: 1 } },
    { name: 'LineNo', type: 'int', primaryKey: { order: 0, name: 'PK_Lines' } },
  ],
});

function person(...members: EntityDescription['members']): EntityDescription {
  return { name: 'Person', members };
}

describe('SchemaModelBuilder', () => {
  let builder: SchemaModelBuilder;

  beforeEach(() => {
    builder = new SchemaModelBuilder({ defaultSchema: 'app' });
  });

  function buildError(entities: EntityDescription[]): ModelBuildError {
    try {
      builder.build(entities);
    } catch (error) {
      if (error instanceof ModelBuildError) {
        return error;
      }
      throw error;
    }
    throw new Error('Expected the build to fail');
  }

  describe('tables and columns', () => {
    test('maps entities to schema-qualified tables', () => {
      const model = builder.build([Customer, Order, OrderLine]);

      expect(model.schemas.map(s => s.name)).toEqual(['sales', 'app']);
      expect(model.allTables().map(t => t.qualifiedName)).toEqual(['sales.Customers', 'sales.Orders', 'app.OrderLine']);
      expect(model.getSchema('sales')?.getTable('Customers')?.source).toBe(Customer);
    });

    test('builds columns with types, sizes and nullability', () => {
      const customers = builder.build([Customer]).getSchema('sales')?.getTable('Customers');

      expect(customers?.columns.map(c => c.name)).toEqual(['Id', 'Email', 'Country', 'Balance']);
      expect(customers?.findColumn('Id')).toMatchObject({
        type: ColumnTypes.int32(),
        isNullable: false,
        isIncrementalKey: true,
        startWith: 1000,
      });
      expect(customers?.findColumn('Email')).toMatchObject({
        type: { kind: 'string', maxLength: 200, unicode: true },
        isNullable: false,
        maxLength: 200,
      });
      expect(customers?.findColumn('Country')).toMatchObject({
        type: { kind: 'string', unicode: true },
        isNullable: true,
        fixedLength: 2,
      });
      expect(customers?.findColumn('Balance')).toMatchObject({
        type: { kind: 'decimal', precision: 12, scale: 2 },
        precision: 12,
        scale: 2,
        defaultValue: 0,
      });
    });

    test('uses column overrides and json mapping', () => {
      const orders = builder.build([Customer, Order]).getSchema('sales')?.getTable('Orders');

      expect(orders?.columns.map(c => c.name)).toEqual(['Id', 'CustomerId', 'placed_at', 'Total', 'Meta', 'Status']);
      expect(orders?.findColumn('placed_at')?.sourceName).toBe('PlacedAt');
      expect(orders?.findColumn('Meta')?.type).toEqual({ kind: 'json' });
      expect(orders?.findColumn('Total')?.type).toEqual({ kind: 'decimal', precision: 18, scale: 2 });
    });

    test('accepts a custom type mapper', () => {
      const custom = new SchemaModelBuilder({ defaultSchema: 'app', typeMapper: { map: () => ColumnTypes.guid() } });

      const table = custom.build([OrderLine]).getSchema('app')?.getTable('OrderLine');

      expect(table?.columns.map(c => c.type)).toEqual([ColumnTypes.guid(), ColumnTypes.guid()]);
    });

    test('skips entities without a table annotation when required', () => {
      const strict = new SchemaModelBuilder({ defaultSchema: 'app', requireTableAnnotation: true });

      expect(strict.build([Customer, OrderLine]).allTables().map(t => t.name)).toEqual(['Customers']);
    });
  });

  describe('constraints', () => {
    test('orders composite primary key columns and keeps an explicit name', () => {
      const table = builder.build([OrderLine]).getSchema('app')?.getTable('OrderLine');

      expect(table?.primaryKey).toEqual({ name: 'PK_Lines', columns: ['LineNo', 'OrderId'] });
      expect(table?.columns.every(c => !c.isNullable)).toBe(true);
    });

    test('names default primary keys and unique groups', () => {
      const customers = builder.build([Customer]).getSchema('sales')?.getTable('Customers');

      expect(customers?.primaryKey).toEqual({ name: 'PK_Customers', columns: ['Id'] });
      expect(customers?.uniques).toEqual([{ name: 'UQ_Email', columns: ['Email'] }]);
    });

    test('groups unique members case-insensitively in order', () => {
      const model = builder.build([
        {
          name: 'Thing',
          members: [
            { name: 'A', type: 'int', unique: [{ name: 'Natural', order: 1 }] },
            { name: 'B', type: 'int', unique: [{ name: 'natural', order: 0 }] },
          ],
        },
      ]);

      expect(model.getSchema('app')?.getTable('Thing')?.uniques).toEqual([{ name: 'UQ_Natural', columns: ['B', 'A'] }]);
    });

    test('builds composite indexes', () => {
      const orders = builder.build([Customer, Order]).getSchema('sales')?.getTable('Orders');

      expect(orders?.indexes).toEqual([
        { name: 'IX_Orders_Customer_Placed', columns: ['CustomerId', 'placed_at'], isUnique: false },
      ]);
    });

    test('names entity checks by position and member checks by column', () => {
      const orders = builder.build([Customer, Order]).getSchema('sales')?.getTable('Orders');

      expect(orders?.checks).toEqual([
        { name: 'CK_Orders_1', expression: '"Total" >= 0' },
        { name: 'CK_Orders_Status', expression: `"Status" IN ('open', 'closed')` },
      ]);
    });

    test('resolves foreign keys against the referenced entity', () => {
      const orders = builder.build([Customer, Order]).getSchema('sales')?.getTable('Orders');

      expect(orders?.foreignKeys).toEqual([
        {
          name: 'FK_Orders_Customers_CustomerId',
          columns: ['CustomerId'],
          refSchema: 'sales',
          refTable: 'Customers',
          refColumns: ['Id'],
          onDelete: ReferentialAction.CASCADE,
          onUpdate: ReferentialAction.NO_ACTION,
        },
      ]);
    });
  });

  describe('validation', () => {
    test('rejects lengths on non-string members', () => {
      const error = buildError([person({ name: 'Age', type: 'int', maxLength: 3 })]);

      expect(error.message).toBe('maxLength/fixedLength only apply to string members. Person.Age is int.');
      expect(error.context).toEqual({ entity: 'Person', member: 'Age', memberType: 'int' });
    });

    test('rejects maxLength together with fixedLength', () => {
      expect(buildError([person({ name: 'Code', type: 'string', maxLength: 5, length: 5 })]).message).toBe(
        'Use either maxLength or fixedLength, not both: Person.Code.'
      );
    });

    test('rejects precision on non-decimal members', () => {
      expect(buildError([person({ name: 'Name', type: 'string', precision: { precision: 10, scale: 2 } })]).message).toBe(
        'precision only applies to decimal members. Person.Name is string.'
      );
    });

    test('rejects a scale larger than the precision', () => {
      expect(buildError([person({ name: 'Amount', type: 'decimal', precision: { precision: 4, scale: 6 } })]).message).toBe(
        'Invalid precision (4,6) on Person.Amount: precision must be positive and scale between 0 and precision.'
      );
    });

    test('rejects duplicate primary key orders', () => {
      const error = buildError([
        person({ name: 'A', type: 'int', primaryKey: { order: 0 } }, { name: 'B', type: 'int', primaryKey: {} }),
      ]);

      expect(error.message).toBe('Duplicate primary key order 0 in Person: A and B');
    });

    test('rejects conflicting primary key names', () => {
      const error = buildError([
        person(
          { name: 'A', type: 'int', primaryKey: { order: 0, name: 'PK_One' } },
          { name: 'B', type: 'int', primaryKey: { order: 1, name: 'PK_Two' } }
        ),
      ]);

      expect(error.message).toBe('Conflicting primary key names in Person: PK_One, PK_Two');
    });

    test('rejects a column mapped twice', () => {
      const error = buildError([person({ name: 'A', type: 'int', column: 'code' }, { name: 'Code', type: 'int' })]);

      expect(error.message).toBe("Column 'Code' is mapped twice in Person (member Code)");
    });

    test('rejects indexes mixing unique and non-unique members', () => {
      const error = buildError([
        person(
          { name: 'A', type: 'int', indexes: [{ name: 'IX_AB', isUnique: true }] },
          { name: 'B', type: 'int', indexes: [{ name: 'IX_AB', order: 1 }] }
        ),
      ]);

      expect(error.message).toBe('Index IX_AB on app.Person mixes unique and non-unique members (B)');
    });

    test('rejects foreign keys to missing members', () => {
      const Broken = defineEntity({
        name: 'Order',
        members: [{ name: 'CustomerId', type: 'int', foreignKey: { entity: Customer, member: 'Code' } }],
      });

      const error = buildError([Customer, Broken]);

      expect(error.message).toBe('ForeignKey reference member not found: Customer.Code (from Order.CustomerId)');
      expect(error.context).toEqual({
        entity: 'Order',
        member: 'CustomerId',
        referencedEntity: 'Customer',
        referencedMember: 'Code',
      });
    });

    test('rejects foreign keys to ignored members', () => {
      const Broken = defineEntity({
        name: 'Order',
        members: [{ name: 'CacheKey', type: 'string', foreignKey: { entity: Customer, member: 'Cache' } }],
      });

      expect(buildError([Customer, Broken]).message).toBe(
        'ForeignKey reference member not found: Customer.Cache (from Order.CacheKey)'
      );
    });

    test('rejects two entities mapped to the same table', () => {
      const Copy = defineEntity({ name: 'CustomerCopy', table: { name: 'customers', schema: 'SALES' }, members: [] });

      expect(buildError([Customer, Copy]).message).toBe('Entities Customer and CustomerCopy both map to table SALES.customers');
    });
  });
});
