/**
 * Schema Migrator
 *
 * Public API: entity descriptions → schema model → bootstrap DDL, explicit
 * migration operations → incremental SQL, and the locked, transactional
 * migrator that applies them to PostgreSQL.
 */

export * from './models/column-type';
export * from './models/schema-model';
export * from './models/entity-description';
export * from './models/migration-operation';
export * from './models/migration';

export * from './lib/environment-config';
export * from './lib/error-handler';
export * from './lib/sql-dialect';
export * from './lib/script-splitter';
export * from './lib/type-mapper';
export * from './lib/database-connections';

export * from './services/schema-model-builder';
export * from './services/ddl-generator';
export * from './services/migration-builder';
export * from './services/migration-sql-generator';
export * from './services/migration-session';
export * from './services/migration-history-repository';
export * from './services/migration-lock-provider';
export * from './services/migrator';
