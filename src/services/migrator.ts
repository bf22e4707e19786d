/**
 * Migrator
 *
 * Runs the migration protocol against one session:
 * lock → ensure ledger → pending = catalog − applied (ordered by id) →
 * per migration: BEGIN, every batch, ledger row, COMMIT → unlock.
 *
 * A failing migration is rolled back in full; migrations committed before it
 * stay applied. Nothing is retried.
 */

import { Migration, MigrationHistoryEntry } from '../models/migration';
import { SchemaModel } from '../models/schema-model';
import { getConfig } from '../lib/environment-config';
import {
  ConfigurationError,
  generateCorrelationId,
  getLogger,
  MigrationCancelledError,
  MigrationExecutionError,
  toError,
} from '../lib/error-handler';
import { DdlGenerator } from './ddl-generator';
import { MigrationBuilder } from './migration-builder';
import { MigrationHistoryOptions, MigrationHistoryRepository } from './migration-history-repository';
import { MigrationLock, MigrationLockProvider } from './migration-lock-provider';
import { MigrationSession } from './migration-session';
import { MigrationSqlGenerator } from './migration-sql-generator';

export interface MigratorOptions {
  scope?: string;
  productVersion?: string;
  commandTimeoutMs?: number;
  lockTimeoutMs?: number;
  batchSeparator?: string;
  history?: MigrationHistoryOptions;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Plan only: no lock, no DDL, no ledger writes. */
  dryRun?: boolean;
}

export interface PlannedMigration {
  id: string;
  name: string;
  batches: string[];
}

export interface MigrationRunResult {
  correlationId: string;
  dryRun: boolean;
  applied: string[];
  skipped: string[];
  plan: PlannedMigration[];
}

export interface BootstrapResult {
  correlationId: string;
  dryRun: boolean;
  batches: string[];
}

export interface MigrationStatus {
  applied: MigrationHistoryEntry[];
  pending: string[];
}

type ExecutionStage = 'batch' | 'history' | 'commit';

function compareIds(a: Migration, b: Migration): number {
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export class Migrator {
  private readonly scope: string;
  private readonly productVersion: string;
  private readonly commandTimeoutMs: number;
  private readonly history: MigrationHistoryRepository;
  private readonly lockProvider: MigrationLockProvider;
  private readonly sqlGenerator: MigrationSqlGenerator;
  private readonly ddlGenerator = new DdlGenerator();
  private logger = getLogger();

  constructor(private readonly session: MigrationSession, options: MigratorOptions = {}) {
    const config = getConfig().migration;

    this.scope = options.scope ?? config.lockScope;
    this.productVersion = options.productVersion ?? config.productVersion;
    this.commandTimeoutMs = options.commandTimeoutMs ?? config.commandTimeoutMs;
    this.history = new MigrationHistoryRepository(session, options.history);
    this.lockProvider = new MigrationLockProvider(session, options.lockTimeoutMs ?? config.lockTimeoutMs);
    this.sqlGenerator = new MigrationSqlGenerator({ batchSeparator: options.batchSeparator ?? config.batchSeparator });
  }

  /**
   * Applies every migration of the catalog that the ledger does not list yet.
   */
  async migrate(migrations: readonly Migration[], options: RunOptions = {}): Promise<MigrationRunResult> {
    const ordered = this.orderCatalog(migrations);
    const correlationId = generateCorrelationId();
    const dryRun = options.dryRun ?? false;
    const result: MigrationRunResult = { correlationId, dryRun, applied: [], skipped: [], plan: [] };

    this.logger.setCorrelationId(correlationId);
    this.logger.info('Migration run started', { scope: this.scope, catalogSize: ordered.length, dryRun });

    try {
      if (dryRun) {
        const appliedIds = (await this.history.exists()) ? await this.history.getAppliedIds() : new Set<string>();
        for (const migration of ordered) {
          if (appliedIds.has(migration.id)) {
            result.skipped.push(migration.id);
          } else {
            result.plan.push(this.plan(migration));
          }
        }
        return result;
      }

      await this.session.setCommandTimeout(this.commandTimeoutMs);
      await this.withLock(async () => {
        await this.history.ensureCreated();
        const appliedIds = await this.history.getAppliedIds();

        for (const migration of ordered) {
          if (appliedIds.has(migration.id)) {
            result.skipped.push(migration.id);
            continue;
          }

          const planned = this.plan(migration);
          result.plan.push(planned);
          await this.apply(migration, planned.batches, correlationId, options.signal);
          result.applied.push(migration.id);
        }
      });

      this.logger.info('Migration run completed', { applied: result.applied.length, skipped: result.skipped.length });
      return result;
    } finally {
      this.logger.clearContext();
    }
  }

  /**
   * Applies the bootstrap DDL of a schema model in one transaction, under the lock.
   */
  async bootstrap(model: SchemaModel, options: RunOptions = {}): Promise<BootstrapResult> {
    const correlationId = generateCorrelationId();
    const dryRun = options.dryRun ?? false;
    const batches = this.ddlGenerator.generate(model);

    if (dryRun) {
      return { correlationId, dryRun, batches };
    }

    this.logger.setCorrelationId(correlationId);
    try {
      await this.session.setCommandTimeout(this.commandTimeoutMs);
      await this.withLock(async () => {
        await this.session.beginTransaction();
        let batchIndex = -1;
        try {
          for (let i = 0; i < batches.length; i++) {
            batchIndex = i;
            await this.session.execute(batches[i], { signal: options.signal });
          }
          batchIndex = -1;
          await this.session.commit();
        } catch (error) {
          await this.session.rollback();
          if (error instanceof MigrationCancelledError) {
            throw error;
          }
          throw new MigrationExecutionError(
            'Bootstrap failed',
            toError(error),
            { batchIndex, batch: batchIndex >= 0 ? batches[batchIndex] : undefined, model: model.toString() },
            correlationId
          );
        }
      });

      this.logger.info('Bootstrap completed', { batches: batches.length });
      return { correlationId, dryRun, batches };
    } finally {
      this.logger.clearContext();
    }
  }

  /**
   * Ledger rows and the catalog ids not applied yet. Read-only.
   */
  async status(migrations: readonly Migration[]): Promise<MigrationStatus> {
    const ordered = this.orderCatalog(migrations);
    const applied = (await this.history.exists()) ? await this.history.list() : [];
    const appliedIds = new Set(applied.map(entry => entry.migrationId));

    return {
      applied,
      pending: ordered.filter(m => !appliedIds.has(m.id)).map(m => m.id),
    };
  }

  /**
   * Generates the batches of one migration without executing them.
   */
  plan(migration: Migration): PlannedMigration {
    const builder = new MigrationBuilder();
    migration.up(builder);
    return { id: migration.id, name: migration.name, batches: this.sqlGenerator.generate(builder.operations) };
  }

  private orderCatalog(migrations: readonly Migration[]): Migration[] {
    const seen = new Set<string>();
    for (const migration of migrations) {
      if (seen.has(migration.id)) {
        throw new ConfigurationError(`Duplicate migration id: ${migration.id}`, { migrationId: migration.id });
      }
      seen.add(migration.id);
    }
    return [...migrations].sort(compareIds);
  }

  private async withLock(work: () => Promise<void>): Promise<void> {
    const lock = await this.lockProvider.acquire(this.scope);
    try {
      await work();
    } finally {
      await this.releaseLock(lock);
    }
  }

  private async releaseLock(lock: MigrationLock): Promise<void> {
    try {
      await lock.release();
    } catch (error) {
      // The database releases it when the session ends
      this.logger.warn('Failed to release migration lock', { scope: lock.scope, error_message: toError(error).message });
      this.session.discardOnDispose(`migration lock '${lock.scope}' is still held`);
    }
  }

  private async apply(
    migration: Migration,
    batches: readonly string[],
    correlationId: string,
    signal?: AbortSignal
  ): Promise<void> {
    this.logger.setMigrationId(migration.id);
    this.logger.info('Applying migration', { name: migration.name, batches: batches.length });

    let stage: ExecutionStage = 'batch';
    let batchIndex = -1;

    await this.session.beginTransaction();
    try {
      for (let i = 0; i < batches.length; i++) {
        batchIndex = i;
        await this.session.execute(batches[i], { signal });
      }

      stage = 'history';
      await this.history.insert(migration.id, migration.name, this.productVersion, new Date());

      stage = 'commit';
      await this.session.commit();
    } catch (error) {
      await this.session.rollback();

      if (error instanceof MigrationCancelledError) {
        this.logger.warn('Migration cancelled and rolled back', { batchIndex });
        throw error;
      }

      const failure = new MigrationExecutionError(
        `Migration ${migration.id} failed`,
        toError(error),
        {
          migrationId: migration.id,
          migrationName: migration.name,
          stage,
          batchIndex: stage === 'batch' ? batchIndex : undefined,
          batch: stage === 'batch' ? batches[batchIndex] : undefined,
        },
        correlationId
      );
      this.logger.error('Migration failed and was rolled back', failure);
      throw failure;
    } finally {
      this.logger.setMigrationId(null);
    }
  }
}
