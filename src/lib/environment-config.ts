/**
 * Environment Configuration Management
 *
 * Centralizes environment variable handling for the schema migrator.
 * Provides type-safe access to configuration with validation and default values.
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  connectionTimeoutMillis?: number;
  idleTimeoutMillis?: number;
  max?: number; // Maximum pool size
}

/**
 * Migration-specific configuration
 */
export interface MigrationConfig {
  lockScope: string;
  lockTimeoutMs: number;
  commandTimeoutMs: number;
  productVersion: string;
  historySchema: string;
  historyTable: string;
  defaultSchema: string;
  batchSeparator: string;
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export type EnvironmentName = 'development' | 'staging' | 'production' | 'test';

/**
 * Complete application configuration
 */
export interface AppConfig {
  database: DatabaseConfig;
  migration: MigrationConfig;
  environment: EnvironmentName;
  logging: {
    level: LogLevelName;
    enableFileLogging: boolean;
    logDirectory: string;
    structured: boolean;
  };
}

const LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug'];
const ENVIRONMENTS: readonly EnvironmentName[] = ['development', 'staging', 'production', 'test'];

function parseLogLevel(value: string | undefined): LogLevelName {
  const normalized = (value || 'info').toLowerCase();
  const match = LOG_LEVELS.find(level => level === normalized);
  if (!match) {
    throw new Error(`Invalid log level: ${value}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}

function parseEnvironment(value: string | undefined): EnvironmentName {
  const normalized = value || 'development';
  const match = ENVIRONMENTS.find(env => env === normalized);
  if (!match) {
    throw new Error(`Invalid environment: ${value}. Must be one of: ${ENVIRONMENTS.join(', ')}`);
  }
  return match;
}

function parseInteger(name: string, fallback: string): number {
  const raw = process.env[name] || fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} must be an integer, got '${raw}'`);
  }
  return value;
}

/**
 * Reads environment variables and returns typed configuration
 */
function createConfig(): AppConfig {
  return {
    database: {
      connectionString: process.env.DATABASE_URL || undefined,
      host: process.env.DB_HOST || 'localhost',
      port: parseInteger('DB_PORT', '5432'),
      database: process.env.DB_NAME || 'postgres',
      user: process.env.DB_USER || 'postgres',
      password: process.env.DB_PASSWORD || '',
      ssl: process.env.DB_SSL === 'true',
      connectionTimeoutMillis: parseInteger('DB_CONNECTION_TIMEOUT', '30000'),
      idleTimeoutMillis: parseInteger('DB_IDLE_TIMEOUT', '10000'),
      max: parseInteger('DB_POOL_SIZE', '5'),
    },

    migration: {
      lockScope: process.env.MIGRATION_LOCK_SCOPE || 'schema-migrator',
      lockTimeoutMs: parseInteger('MIGRATION_LOCK_TIMEOUT_MS', '30000'),
      commandTimeoutMs: parseInteger('MIGRATION_COMMAND_TIMEOUT_MS', '120000'),
      productVersion: process.env.MIGRATION_PRODUCT_VERSION || 'schema-migrator/1.0.0',
      historySchema: process.env.MIGRATION_HISTORY_SCHEMA || 'public',
      historyTable: process.env.MIGRATION_HISTORY_TABLE || '__schema_migrations_history',
      defaultSchema: process.env.DEFAULT_SCHEMA || 'public',
      batchSeparator: process.env.BATCH_SEPARATOR || 'GO',
    },

    environment: parseEnvironment(process.env.NODE_ENV),

    logging: {
      level: parseLogLevel(process.env.LOG_LEVEL),
      enableFileLogging: process.env.ENABLE_FILE_LOGGING === 'true',
      logDirectory: process.env.LOG_DIRECTORY || './logs',
      structured: process.env.STRUCTURED_LOGS !== 'false',
    },
  };
}

// Export the configuration instance
let config: AppConfig | null = null;

/**
 * Gets the application configuration, creating it if it doesn't exist
 */
export function getConfig(): AppConfig {
  if (!config) {
    config = createConfig();
  }
  return config;
}

/**
 * Drops the cached configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  config = null;
}

/**
 * Validates the configuration and returns a description of each problem found
 */
export function validateConfig(cfg: AppConfig = getConfig()): string[] {
  const errors: string[] = [];

  if (cfg.database.port < 1 || cfg.database.port > 65535) {
    errors.push(`Invalid database port: ${cfg.database.port}`);
  }

  if (cfg.migration.lockTimeoutMs < 0) {
    errors.push(`Invalid lock timeout: ${cfg.migration.lockTimeoutMs}ms. Must be zero or positive.`);
  }

  if (cfg.migration.commandTimeoutMs < 0) {
    errors.push(`Invalid command timeout: ${cfg.migration.commandTimeoutMs}ms. Must be zero or positive.`);
  }

  if (!cfg.migration.lockScope.trim()) {
    errors.push('Migration lock scope must not be empty');
  }

  if (!cfg.migration.batchSeparator.trim()) {
    errors.push('Batch separator must not be empty');
  }

  if (cfg.migration.productVersion.length > 32) {
    errors.push(`Product version '${cfg.migration.productVersion}' exceeds 32 characters`);
  }

  return errors;
}

/**
 * Returns a safe configuration object for logging (with sensitive data masked)
 */
export function getConfigForLogging(): Record<string, unknown> {
  const cfg = getConfig();
  return {
    database: {
      ...cfg.database,
      connectionString: cfg.database.connectionString ? maskConnectionString(cfg.database.connectionString) : undefined,
      password: '***masked***',
    },
    migration: cfg.migration,
    environment: cfg.environment,
    logging: cfg.logging,
  };
}

/**
 * Replaces the password part of a postgres:// URL
 */
export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/(\/\/[^:/@]+:)[^@]*@/, '$1***@');
}

/**
 * Checks if we're running in a specific environment
 */
export function isEnvironment(env: EnvironmentName): boolean {
  return getConfig().environment === env;
}
