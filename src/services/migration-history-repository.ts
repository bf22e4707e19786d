/**
 * Migration History Repository
 *
 * Append-only ledger of applied migration ids, stored in one table of the
 * target database. There is no update or delete.
 */

import { MigrationHistoryEntry } from '../models/migration';
import { getConfig } from '../lib/environment-config';
import { formatTimestamp, qualifiedName, quoteIdentifier, quoteLiteral } from '../lib/sql-dialect';
import { MigrationSession } from './migration-session';

export interface MigrationHistoryOptions {
  schema?: string;
  table?: string;
}

export class MigrationHistoryRepository {
  readonly schema: string;
  readonly table: string;

  constructor(private readonly session: MigrationSession, options: MigrationHistoryOptions = {}) {
    const config = getConfig().migration;
    this.schema = options.schema ?? config.historySchema;
    this.table = options.table ?? config.historyTable;
  }

  private get qualifiedTable(): string {
    return qualifiedName(this.schema, this.table);
  }

  async ensureCreated(): Promise<void> {
    await this.session.execute(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(this.schema)};`);
    await this.session.execute(
      [
        `CREATE TABLE IF NOT EXISTS ${this.qualifiedTable} (`,
        '  "MigrationId" varchar(150) NOT NULL,',
        '  "Name" varchar(300) NOT NULL,',
        '  "ProductVersion" varchar(32) NOT NULL,',
        '  "AppliedAtUtc" timestamp(6) NOT NULL,',
        `  CONSTRAINT ${quoteIdentifier(`PK_${this.table}`)} PRIMARY KEY ("MigrationId")`,
        ');',
      ].join('\n')
    );
  }

  /**
   * Whether the ledger table exists. Read-only, used by dry runs and status.
   */
  async exists(): Promise<boolean> {
    const found = await this.session.queryScalar('SELECT to_regclass($1) IS NOT NULL', [this.qualifiedTable]);
    return found === true;
  }

  async getAppliedIds(): Promise<Set<string>> {
    const ids = await this.session.queryStrings(
      `SELECT "MigrationId" FROM ${this.qualifiedTable} ORDER BY "MigrationId";`
    );
    return new Set(ids);
  }

  async insert(migrationId: string, name: string, productVersion: string, appliedAtUtc: Date): Promise<void> {
    await this.session.execute(
      `INSERT INTO ${this.qualifiedTable} ("MigrationId", "Name", "ProductVersion", "AppliedAtUtc") VALUES ($1, $2, $3, $4);`,
      { values: [migrationId, name, productVersion, formatTimestamp(appliedAtUtc)] }
    );
  }

  async list(): Promise<MigrationHistoryEntry[]> {
    const result = await this.session.query(
      [
        'SELECT "MigrationId", "Name", "ProductVersion",',
        `  to_char("AppliedAtUtc", ${quoteLiteral('YYYY-MM-DD"T"HH24:MI:SS.US')}) AS "AppliedAtUtc"`,
        `FROM ${this.qualifiedTable}`,
        'ORDER BY "MigrationId";',
      ].join('\n')
    );

    return result.rows.map(row => ({
      migrationId: String(row.MigrationId),
      name: String(row.Name),
      productVersion: String(row.ProductVersion),
      appliedAtUtc: String(row.AppliedAtUtc),
    }));
  }
}
