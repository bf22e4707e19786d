/**
 * Unit Tests: MigrationHistoryRepository
 * Ledger table creation, reads and inserts
 */

import { MigrationHistoryRepository } from '../../../src/services/migration-history-repository';
import { MigrationSession } from '../../../src/services/migration-session';
import { FakeSqlClient, rows } from '../../helpers/fake-sql-client';

describe('MigrationHistoryRepository', () => {
  let client: FakeSqlClient;
  let repository: MigrationHistoryRepository;

  beforeEach(() => {
    client = new FakeSqlClient();
    repository = new MigrationHistoryRepository(new MigrationSession(client), { schema: 'public', table: '__schema_migrations_history' });
  });

  test('creates the schema and ledger table if missing', async () => {
    await repository.ensureCreated();

    expect(client.texts).toEqual([
      'CREATE SCHEMA IF NOT EXISTS "public";',
      [
        'CREATE TABLE IF NOT EXISTS "public"."__schema_migrations_history" (',
        '  "MigrationId" varchar(150) NOT NULL,',
        '  "Name" varchar(300) NOT NULL,',
        '  "ProductVersion" varchar(32) NOT NULL,',
        '  "AppliedAtUtc" timestamp(6) NOT NULL,',
        '  CONSTRAINT "PK___schema_migrations_history" PRIMARY KEY ("MigrationId")',
        ');',
      ].join('\n'),
    ]);
  });

  test('uses the configured schema and table', async () => {
    const custom = new MigrationHistoryRepository(new MigrationSession(client), { schema: 'ops', table: 'applied' });

    await custom.ensureCreated();

    expect(client.texts[0]).toBe('CREATE SCHEMA IF NOT EXISTS "ops";');
    expect(client.texts[1]).toContain('CONSTRAINT "PK_applied" PRIMARY KEY ("MigrationId")');
  });

  test('checks whether the ledger table exists', async () => {
    client.on('to_regclass', rows({ exists: false }));

    expect(await repository.exists()).toBe(false);
    expect(client.queries[0]).toEqual({
      text: 'SELECT to_regclass($1) IS NOT NULL',
      values: ['"public"."__schema_migrations_history"'],
    });
  });

  test('reads applied ids', async () => {
    client.on('SELECT "MigrationId" FROM', rows({ MigrationId: '001_Init' }, { MigrationId: '002_Users' }));

    const ids = await repository.getAppliedIds();

    expect(Array.from(ids)).toEqual(['001_Init', '002_Users']);
    expect(client.texts[0]).toBe('SELECT "MigrationId" FROM "public"."__schema_migrations_history" ORDER BY "MigrationId";');
  });

  test('inserts a ledger row with a UTC timestamp', async () => {
    await repository.insert('001_Init', 'Init', 'schema-migrator/1.0.0', new Date(Date.UTC(2025, 5, 1, 12, 0, 0, 250)));

    expect(client.queries).toEqual([
      {
        text: 'INSERT INTO "public"."__schema_migrations_history" ("MigrationId", "Name", "ProductVersion", "AppliedAtUtc") VALUES ($1, $2, $3, $4);',
        values: ['001_Init', 'Init', 'schema-migrator/1.0.0', '2025-06-01T12:00:00.2500000'],
      },
    ]);
  });

  test('lists ledger rows in id order', async () => {
    client.on(
      'to_char',
      rows({ MigrationId: '001_Init', Name: 'Init', ProductVersion: 'schema-migrator/1.0.0', AppliedAtUtc: '2025-06-01T12:00:00.250000' })
    );

    expect(await repository.list()).toEqual([
      { migrationId: '001_Init', name: 'Init', productVersion: 'schema-migrator/1.0.0', appliedAtUtc: '2025-06-01T12:00:00.250000' },
    ]);
    expect(client.texts[0]).toBe(
      [
        'SELECT "MigrationId", "Name", "ProductVersion",',
        `  to_char("AppliedAtUtc", 'YYYY-MM-DD"T"HH24:MI:SS.US') AS "AppliedAtUtc"`,
        'FROM "public"."__schema_migrations_history"',
        'ORDER BY "MigrationId";',
      ].join('\n')
    );
  });
});
