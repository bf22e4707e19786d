#!/usr/bin/env node
/**
 * Schema Migrator CLI
 *
 * Loads entity descriptions or migration catalogs from compiled modules and
 * runs the generators or the migrator against the configured database.
 */

import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { EntityDescription, isEntityDescription } from '../models/entity-description';
import { Migration, isMigration } from '../models/migration';
import { SchemaModel } from '../models/schema-model';
import { DatabaseConnectionManager, DatabaseEnsureStatus } from '../lib/database-connections';
import { getConfig, getConfigForLogging, validateConfig } from '../lib/environment-config';
import { ConfigurationError, getLogger, MigrationBaseError, toError } from '../lib/error-handler';
import { DdlGenerator } from '../services/ddl-generator';
import { MigrationBuilder } from '../services/migration-builder';
import { MigrationSession } from '../services/migration-session';
import { MigrationSqlGenerator } from '../services/migration-sql-generator';
import { Migrator } from '../services/migrator';
import { SchemaModelBuilder } from '../services/schema-model-builder';

interface ScriptOptions {
  separator?: string;
  schema?: string;
  requireTable?: boolean;
}

interface RunCommandOptions extends ScriptOptions {
  dryRun?: boolean;
}

/**
 * Collects the values of a loaded module's exports that satisfy the guard.
 * Exported arrays are flattened one level; the default export counts too.
 */
export function collectExports<T>(loaded: unknown, guard: (value: unknown) => value is T): T[] {
  if (typeof loaded !== 'object' || loaded === null) {
    return [];
  }

  const found: T[] = [];
  const seen = new Set<unknown>();
  const visit = (value: unknown): void => {
    if (guard(value) && !seen.has(value)) {
      seen.add(value);
      found.push(value);
    }
  };

  for (const value of Object.values(loaded)) {
    if (Array.isArray(value)) {
      value.forEach(visit);
    } else {
      visit(value);
    }
  }

  return found;
}

function loadModule(modulePath: string): unknown {
  const resolved = path.resolve(process.cwd(), modulePath);
  try {
    return require(resolved);
  } catch (error) {
    throw new ConfigurationError(`Cannot load module ${resolved}: ${toError(error).message}`, { modulePath: resolved });
  }
}

export function loadEntities(modulePath: string): EntityDescription[] {
  const entities = collectExports(loadModule(modulePath), isEntityDescription);
  if (entities.length === 0) {
    throw new ConfigurationError(`No entity descriptions exported by ${modulePath}`, { modulePath });
  }
  return entities;
}

export function loadMigrations(modulePath: string): Migration[] {
  const migrations = collectExports(loadModule(modulePath), isMigration);
  if (migrations.length === 0) {
    throw new ConfigurationError(`No migrations exported by ${modulePath}`, { modulePath });
  }
  return migrations;
}

/**
 * Joins batches into one script with a separator line after each batch.
 */
export function formatScript(batches: readonly string[], separator: string): string {
  return batches.map(batch => `${batch}\n${separator}\n`).join('\n');
}

export class SchemaMigratorCli {
  private program: Command;
  private logger = getLogger();
  private abortController = new AbortController();

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Cancels the run in progress; its transaction is rolled back.
   */
  abort(): void {
    this.abortController.abort();
  }

  private setupCommands(): void {
    const config = getConfig();

    this.program
      .name('schema-migrator')
      .description('Schema modeling and migration tool for PostgreSQL')
      .version(config.migration.productVersion);

    this.program
      .command('script')
      .description('Print the bootstrap DDL for the entities exported by a module')
      .argument('<entities>', 'Module exporting entity descriptions')
      .option('-s, --separator <keyword>', 'Batch separator line', config.migration.batchSeparator)
      .option('--schema <name>', 'Default schema', config.migration.defaultSchema)
      .option('--require-table', 'Only model entities with a table annotation')
      .action((entities: string, options: ScriptOptions) => {
        const batches = new DdlGenerator().generate(this.buildModel(entities, options));
        console.log(formatScript(batches, options.separator ?? config.migration.batchSeparator));
      });

    this.program
      .command('plan')
      .description('Print the SQL batches of every migration exported by a module')
      .argument('<migrations>', 'Module exporting migrations')
      .option('-s, --separator <keyword>', 'Batch separator line', config.migration.batchSeparator)
      .action((migrations: string, options: ScriptOptions) => {
        const separator = options.separator ?? config.migration.batchSeparator;
        const generator = new MigrationSqlGenerator({ batchSeparator: separator });

        const catalog = loadMigrations(migrations).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
        for (const migration of catalog) {
          const builder = new MigrationBuilder();
          migration.up(builder);
          console.log(chalk.blue(`-- ${migration.id} ${migration.name}`));
          console.log(formatScript(generator.generate(builder.operations), separator));
        }
      });

    this.program
      .command('bootstrap')
      .description('Create the schemas, tables and constraints of the exported entities')
      .argument('<entities>', 'Module exporting entity descriptions')
      .option('--schema <name>', 'Default schema', config.migration.defaultSchema)
      .option('--require-table', 'Only model entities with a table annotation')
      .option('--dry-run', 'Print the batches without executing them')
      .action(async (entities: string, options: RunCommandOptions) => {
        const model = this.buildModel(entities, options);
        await this.withSession(async session => {
          const result = await new Migrator(session).bootstrap(model, {
            dryRun: options.dryRun,
            signal: this.abortController.signal
          });

          if (result.dryRun) {
            console.log(chalk.yellow('DRY RUN: nothing was executed'));
            console.log(formatScript(result.batches, config.migration.batchSeparator));
          } else {
            console.log(chalk.green(`✅ Bootstrap applied ${result.batches.length} batches`));
          }
        });
      });

    this.program
      .command('migrate')
      .description('Apply every pending migration exported by a module')
      .argument('<migrations>', 'Module exporting migrations')
      .option('--dry-run', 'Plan pending migrations without executing them')
      .action(async (migrations: string, options: RunCommandOptions) => {
        const catalog = loadMigrations(migrations);
        await this.withSession(async session => {
          const result = await new Migrator(session).migrate(catalog, {
            dryRun: options.dryRun,
            signal: this.abortController.signal
          });

          if (result.dryRun) {
            console.log(chalk.yellow('DRY RUN: nothing was executed'));
            for (const planned of result.plan) {
              console.log(chalk.blue(`-- ${planned.id} ${planned.name}`));
              console.log(formatScript(planned.batches, config.migration.batchSeparator));
            }
          } else {
            for (const id of result.applied) {
              console.log(chalk.green(`  ✓ ${id}`));
            }
          }
          console.log(chalk.blue(`Applied: ${result.applied.length}, already applied: ${result.skipped.length}, planned: ${result.plan.length}`));
        });
      });

    this.program
      .command('status')
      .description('Show applied and pending migrations')
      .argument('<migrations>', 'Module exporting migrations')
      .action(async (migrations: string) => {
        const catalog = loadMigrations(migrations);
        await this.withSession(async session => {
          const status = await new Migrator(session).status(catalog);

          console.log(chalk.blue('📊 Applied migrations:'));
          for (const entry of status.applied) {
            console.log(chalk.green(`  ✓ ${entry.migrationId}  ${entry.name}  ${entry.appliedAtUtc}  (${entry.productVersion})`));
          }
          console.log(chalk.blue('📋 Pending migrations:'));
          for (const id of status.pending) {
            console.log(chalk.yellow(`  • ${id}`));
          }
        });
      });

    this.program
      .command('ensure-db')
      .description('Create the target database when it does not exist')
      .action(async () => {
        this.assertValidConfig();
        const manager = new DatabaseConnectionManager();
        const result = await manager.ensureDatabaseExists();

        switch (result.status) {
          case DatabaseEnsureStatus.ALREADY_EXISTS:
          case DatabaseEnsureStatus.CREATED:
            console.log(chalk.green(`✅ Database ${result.database}: ${result.status}`));
            break;
          case DatabaseEnsureStatus.SKIPPED_NO_MAINTENANCE_ACCESS:
          case DatabaseEnsureStatus.SKIPPED_NO_CREATE_PERMISSION:
            console.log(chalk.yellow(`⚠️  Database ${result.database}: ${result.status}${result.error ? ` (${result.error.message})` : ''}`));
            break;
          case DatabaseEnsureStatus.FAILED:
            throw result.error ?? new Error(`Could not ensure database ${result.database}`);
        }
      });
  }

  private buildModel(modulePath: string, options: ScriptOptions): SchemaModel {
    return new SchemaModelBuilder({
      defaultSchema: options.schema,
      requireTableAnnotation: options.requireTable ?? false
    }).build(loadEntities(modulePath));
  }

  private assertValidConfig(): void {
    const problems = validateConfig();
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
    }
  }

  private async withSession(work: (session: MigrationSession) => Promise<void>): Promise<void> {
    this.assertValidConfig();
    this.logger.debug('Connecting', getConfigForLogging());

    const manager = new DatabaseConnectionManager();
    let session: MigrationSession | null = null;
    try {
      session = await manager.openSession();
      await work(session);
    } finally {
      if (session) {
        await session.dispose();
      }
      await manager.close();
    }
  }

  async run(args: string[]): Promise<void> {
    await this.program.parseAsync(args);
  }
}

function reportFailure(error: unknown): void {
  const err = toError(error);
  console.error(chalk.red('❌ Failed:'), err.message);
  if (err instanceof MigrationBaseError) {
    console.error(chalk.red('Context:'), JSON.stringify(err.context, null, 2));
  }
}

// CLI entry point
if (require.main === module) {
  const cli = new SchemaMigratorCli();

  process.on('SIGINT', () => {
    console.log('\nCancelling, rolling back the current migration...');
    cli.abort();
  });

  cli.run(process.argv)
    .catch(error => {
      reportFailure(error);
      process.exit(1);
    });
}
