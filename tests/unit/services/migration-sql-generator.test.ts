/**
 * Unit Tests: MigrationSqlGenerator
 * Operation → batch translation and deferred foreign keys
 */

import { ColumnTypes } from '../../../src/models/column-type';
import { MigrationOperation, RoutineKind } from '../../../src/models/migration-operation';
import { ReferentialAction } from '../../../src/models/schema-model';
import { UnsupportedOperationError } from '../../../src/lib/error-handler';
import { MigrationBuilder } from '../../../src/services/migration-builder';
import { MigrationSqlGenerator } from '../../../src/services/migration-sql-generator';

describe('MigrationSqlGenerator', () => {
  let builder: MigrationBuilder;
  let generator: MigrationSqlGenerator;

  beforeEach(() => {
    builder = new MigrationBuilder();
    generator = new MigrationSqlGenerator({ batchSeparator: 'GO' });
  });

  test('defers foreign keys until every table is created', () => {
    builder
      .createTable('sales', 'Orders', table =>
        table
          .column('Id', ColumnTypes.int32(), { identity: true })
          .column('CustomerId', ColumnTypes.int32(), { isNullable: false })
          .primaryKey('PK_Orders', ['Id'])
          .foreignKey('FK_Orders_Customers', ['CustomerId'], 'sales', 'Customers', ['Id'], {
            onDelete: ReferentialAction.CASCADE,
          })
      )
      .createTable('sales', 'Customers', table =>
        table
          .column('Id', ColumnTypes.int32(), { identity: { startWith: 10, incrementBy: 2 } })
          .column('Name', ColumnTypes.string(80))
          .unique('UQ_Customers_Name', ['Name'])
          .check('CK_Customers_Name', 'length("Name") > 0')
          .index('IX_Customers_Name', ['Name'])
          .primaryKey('PK_Customers', ['Id'])
      );

    expect(generator.generate(builder.operations)).toEqual([
      [
        'CREATE TABLE "sales"."Orders" (',
        '  "Id" integer GENERATED BY DEFAULT AS IDENTITY NOT NULL,',
        '  "CustomerId" integer NOT NULL,',
        '  CONSTRAINT "PK_Orders" PRIMARY KEY ("Id")',
        ');',
      ].join('\n'),
      [
        'CREATE TABLE "sales"."Customers" (',
        '  "Id" integer GENERATED BY DEFAULT AS IDENTITY (START WITH 10 INCREMENT BY 2) NOT NULL,',
        '  "Name" varchar(80) NULL,',
        '  CONSTRAINT "PK_Customers" PRIMARY KEY ("Id")',
        ');',
      ].join('\n'),
      'ALTER TABLE "sales"."Customers" ADD CONSTRAINT "UQ_Customers_Name" UNIQUE ("Name");',
      'ALTER TABLE "sales"."Customers" ADD CONSTRAINT "CK_Customers_Name" CHECK (length("Name") > 0);',
      'CREATE INDEX "IX_Customers_Name" ON "sales"."Customers" ("Name");',
      [
        'ALTER TABLE "sales"."Orders"',
        'ADD CONSTRAINT "FK_Orders_Customers"',
        'FOREIGN KEY ("CustomerId")',
        'REFERENCES "sales"."Customers" ("Id")',
        'ON DELETE CASCADE;',
      ].join('\n'),
    ]);
  });

  test('appends standalone foreign keys after later operations', () => {
    builder
      .addForeignKey('dbo', 'Orders', 'FK_Orders_Users', ['UserId'], 'dbo', 'Users', ['Id'])
      .dropColumn('dbo', 'Orders', 'Legacy');

    expect(generator.generate(builder.operations)).toEqual([
      'ALTER TABLE "dbo"."Orders" DROP COLUMN "Legacy";',
      'ALTER TABLE "dbo"."Orders"\nADD CONSTRAINT "FK_Orders_Users"\nFOREIGN KEY ("UserId")\nREFERENCES "dbo"."Users" ("Id");',
    ]);
  });

  test('translates each table and constraint operation in input order', () => {
    builder
      .sql('UPDATE "dbo"."Users" SET "Active" = TRUE;')
      .dropTable('dbo', 'Old')
      .addColumn('dbo', 'Users', 'Age', ColumnTypes.int32())
      .addColumn('dbo', 'Users', 'CreatedAt', ColumnTypes.dateTime(), { isNullable: false, defaultValue: { sql: 'now()' } })
      .dropColumn('dbo', 'Users', 'Age')
      .addPrimaryKey('dbo', 'Users', 'PK_Users', ['Id'])
      .dropPrimaryKey('dbo', 'Users', 'PK_Users')
      .addUnique('dbo', 'Users', 'UQ_Users_Email', ['Email'])
      .dropUnique('dbo', 'Users', 'UQ_Users_Email')
      .addCheck('dbo', 'Users', 'CK_Users_Age', '"Age" >= 0')
      .dropCheck('dbo', 'Users', 'CK_Users_Age')
      .createIndex('dbo', 'Users', 'IX_Users_Email', ['Email', 'Id'], { isUnique: true })
      .dropIndex('dbo', 'Users', 'IX_Users_Email')
      .dropForeignKey('dbo', 'Users', 'FK_Users_Teams');

    expect(generator.generate(builder.operations)).toEqual([
      'UPDATE "dbo"."Users" SET "Active" = TRUE;',
      'DROP TABLE "dbo"."Old";',
      'ALTER TABLE "dbo"."Users" ADD COLUMN "Age" integer NULL;',
      'ALTER TABLE "dbo"."Users" ADD COLUMN "CreatedAt" timestamp NOT NULL DEFAULT now();',
      'ALTER TABLE "dbo"."Users" DROP COLUMN "Age";',
      'ALTER TABLE "dbo"."Users" ADD CONSTRAINT "PK_Users" PRIMARY KEY ("Id");',
      'ALTER TABLE "dbo"."Users" DROP CONSTRAINT "PK_Users";',
      'ALTER TABLE "dbo"."Users" ADD CONSTRAINT "UQ_Users_Email" UNIQUE ("Email");',
      'ALTER TABLE "dbo"."Users" DROP CONSTRAINT "UQ_Users_Email";',
      'ALTER TABLE "dbo"."Users" ADD CONSTRAINT "CK_Users_Age" CHECK ("Age" >= 0);',
      'ALTER TABLE "dbo"."Users" DROP CONSTRAINT "CK_Users_Age";',
      'CREATE UNIQUE INDEX "IX_Users_Email" ON "dbo"."Users" ("Email", "Id");',
      'DROP INDEX "dbo"."IX_Users_Email";',
      'ALTER TABLE "dbo"."Users" DROP CONSTRAINT "FK_Users_Teams";',
    ]);
  });

  test('translates view, routine and trigger drops', () => {
    builder
      .dropView('dbo', 'ActiveUsers')
      .dropRoutine('dbo', 'Recalculate', RoutineKind.PROCEDURE)
      .dropRoutine('dbo', 'TotalFor', RoutineKind.SCALAR_FUNCTION)
      .dropRoutine('dbo', 'OrdersFor', RoutineKind.TABLE_FUNCTION)
      .dropTrigger('dbo', 'Users', 'TR_Users_Audit');

    expect(generator.generate(builder.operations)).toEqual([
      'DROP VIEW "dbo"."ActiveUsers";',
      'DROP PROCEDURE "dbo"."Recalculate";',
      'DROP FUNCTION "dbo"."TotalFor";',
      'DROP FUNCTION "dbo"."OrdersFor";',
      'DROP TRIGGER "TR_Users_Audit" ON "dbo"."Users";',
    ]);
  });

  test('splits view, routine and trigger definitions on separator lines', () => {
    builder
      .createOrAlterView('dbo', 'ActiveUsers', 'DROP VIEW IF EXISTS "dbo"."ActiveUsers";\nGO\nCREATE VIEW "dbo"."ActiveUsers" AS SELECT 1 AS one;')
      .createOrAlterProcedure('dbo', 'Recalculate', 'CREATE OR REPLACE PROCEDURE "dbo"."Recalculate"() LANGUAGE sql AS $$ SELECT 1 $$;')
      .createOrAlterTrigger('dbo', 'TR_Users_Audit', 'CREATE OR REPLACE FUNCTION f() RETURNS trigger AS $$ BEGIN RETURN NEW; END $$ LANGUAGE plpgsql;\ngo\nCREATE TRIGGER "TR_Users_Audit" AFTER INSERT ON "dbo"."Users" FOR EACH ROW EXECUTE FUNCTION f();');

    expect(generator.generate(builder.operations)).toEqual([
      'DROP VIEW IF EXISTS "dbo"."ActiveUsers";',
      'CREATE VIEW "dbo"."ActiveUsers" AS SELECT 1 AS one;',
      'CREATE OR REPLACE PROCEDURE "dbo"."Recalculate"() LANGUAGE sql AS $$ SELECT 1 $$;',
      'CREATE OR REPLACE FUNCTION f() RETURNS trigger AS $$ BEGIN RETURN NEW; END $$ LANGUAGE plpgsql;',
      'CREATE TRIGGER "TR_Users_Audit" AFTER INSERT ON "dbo"."Users" FOR EACH ROW EXECUTE FUNCTION f();',
    ]);
  });

  test('uses the configured separator', () => {
    const custom = new MigrationSqlGenerator({ batchSeparator: '@@' });
    builder.createOrAlterScalarFunction('dbo', 'One', 'SELECT 1\nGO\n@@\nSELECT 2');

    expect(custom.generate(builder.operations)).toEqual(['SELECT 1\nGO', 'SELECT 2']);
  });

  test('emits nothing for an empty operation list', () => {
    expect(generator.generate([])).toEqual([]);
  });

  test('rejects operations without a translation rule', () => {
    const operations: MigrationOperation[] = JSON.parse('[{ "kind": "renameTable", "schema": "dbo", "name": "Users" }]');

    expect(() => generator.generate(operations)).toThrow(UnsupportedOperationError);
    expect(() => generator.generate(operations)).toThrow('Operation not supported: renameTable');
  });
});
