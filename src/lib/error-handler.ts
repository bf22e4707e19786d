/**
 * Error Handling and Logging Infrastructure
 *
 * Error classes for every failure the migrator can raise, each carrying the
 * context needed to locate the cause (entity/member, operation kind, lock
 * scope, failing batch), and the structured Logger used across the system.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { getConfig } from './environment-config';

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  DATABASE = 'database',
  VALIDATION = 'validation',
  CONCURRENCY = 'concurrency',
  SYSTEM = 'system',
  CONFIGURATION = 'configuration'
}

export enum RecoveryStrategy {
  FAIL_FAST = 'fail_fast',
  ROLLBACK = 'rollback',
  MANUAL_INTERVENTION = 'manual_intervention'
}

export type ErrorContext = Record<string, unknown>;

// ===== CUSTOM ERROR CLASSES =====

export class MigrationBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly recoveryStrategy: RecoveryStrategy;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly correlationId?: string;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.HIGH,
    recoveryStrategy: RecoveryStrategy = RecoveryStrategy.FAIL_FAST,
    context: ErrorContext = {},
    correlationId?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.recoveryStrategy = recoveryStrategy;
    this.context = context;
    this.timestamp = new Date();
    this.correlationId = correlationId;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to structured log format
   */
  toLogFormat(): LogEntry {
    return {
      timestamp: this.timestamp,
      level: this.severity === ErrorSeverity.LOW ? LogLevel.WARN : LogLevel.ERROR,
      message: this.message,
      error_code: this.errorCode,
      category: this.category,
      severity: this.severity,
      recovery_strategy: this.recoveryStrategy,
      context: this.context,
      stack_trace: this.stack,
      correlation_id: this.correlationId
    };
  }
}

export class ConfigurationError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CONFIG_ERROR', ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, RecoveryStrategy.FAIL_FAST, context);
  }
}

/**
 * Invalid or ambiguous entity annotations, raised while building the schema model.
 */
export class ModelBuildError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'MODEL_BUILD_ERROR', ErrorCategory.VALIDATION, ErrorSeverity.HIGH, RecoveryStrategy.FAIL_FAST, context);
  }
}

/**
 * An operation with no SQL translation rule.
 */
export class UnsupportedOperationError extends MigrationBaseError {
  constructor(operationKind: string, context: ErrorContext = {}) {
    super(
      `Operation not supported: ${operationKind}`,
      'UNSUPPORTED_OPERATION',
      ErrorCategory.SYSTEM,
      ErrorSeverity.CRITICAL,
      RecoveryStrategy.FAIL_FAST,
      { operationKind, ...context }
    );
  }
}

export class LockAcquisitionError extends MigrationBaseError {
  constructor(scope: string, resultCode: number, timeoutMs: number, cause?: Error) {
    super(
      `Could not acquire migration lock '${scope}' (code=${resultCode}, timeout=${timeoutMs}ms)` +
        (cause ? `: ${cause.message}` : ''),
      'LOCK_ACQUISITION_FAILED',
      ErrorCategory.CONCURRENCY,
      ErrorSeverity.HIGH,
      RecoveryStrategy.FAIL_FAST,
      { scope, resultCode, timeoutMs }
    );
  }
}

/**
 * A batch failed while applying a migration; the migration's transaction was rolled back.
 */
export class MigrationExecutionError extends MigrationBaseError {
  public readonly originalError: Error;

  constructor(message: string, originalError: Error, context: ErrorContext = {}, correlationId?: string) {
    super(
      `${message}: ${originalError.message}`,
      'MIGRATION_EXECUTION_FAILED',
      ErrorCategory.DATABASE,
      ErrorSeverity.HIGH,
      RecoveryStrategy.ROLLBACK,
      context,
      correlationId
    );
    this.originalError = originalError;
  }
}

export class SessionStateError extends MigrationBaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'SESSION_STATE_ERROR', ErrorCategory.SYSTEM, ErrorSeverity.HIGH, RecoveryStrategy.FAIL_FAST, context);
  }
}

export class MigrationCancelledError extends MigrationBaseError {
  constructor(context: ErrorContext = {}) {
    super('Migration run was cancelled', 'MIGRATION_CANCELLED', ErrorCategory.SYSTEM, ErrorSeverity.MEDIUM, RecoveryStrategy.ROLLBACK, context);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ===== LOGGING INFRASTRUCTURE =====

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: ErrorContext;
  error_code?: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  recovery_strategy?: RecoveryStrategy;
  stack_trace?: string;
  correlation_id?: string;
  migration_id?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  enableStructuredLogging: boolean;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private config: LoggerConfig;
  private correlationId: string | null = null;
  private migrationId: string | null = null;
  private currentLogFile: string | null = null;

  constructor(config?: Partial<LoggerConfig>) {
    const appConfig = getConfig();

    this.config = {
      level: parseLogLevel(appConfig.logging.level),
      enableConsole: appConfig.environment !== 'test',
      enableFile: appConfig.logging.enableFileLogging,
      logDirectory: appConfig.logging.logDirectory,
      enableStructuredLogging: appConfig.logging.structured,
      ...config
    };

    this.ensureLogDirectory();
    this.initializeLogFile();
  }

  /**
   * Set correlation ID for run tracing
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  /**
   * Set migration ID for migration-specific logging
   */
  setMigrationId(migrationId: string | null): void {
    this.migrationId = migrationId;
  }

  clearContext(): void {
    this.correlationId = null;
    this.migrationId = null;
  }

  debug(message: string, context?: ErrorContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: ErrorContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: ErrorContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: ErrorContext): void {
    const errorContext = error instanceof MigrationBaseError
      ? { ...context, ...error.context, error_code: error.errorCode }
      : { ...context, error_message: error?.message, stack_trace: error?.stack };

    this.log(LogLevel.ERROR, message, errorContext);
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, context?: ErrorContext): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.config.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context,
      correlation_id: this.correlationId || undefined,
      migration_id: this.migrationId || undefined
    };

    const formatted = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(level, formatted);
    }

    if (this.config.enableFile) {
      this.writeToFile(formatted);
    }
  }

  /**
   * Format log entry based on configuration
   */
  formatLogEntry(entry: LogEntry): string {
    if (this.config.enableStructuredLogging) {
      return JSON.stringify({
        ...entry,
        timestamp: entry.timestamp.toISOString()
      });
    }

    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const correlation = entry.correlation_id ? `[${entry.correlation_id}] ` : '';
    const migration = entry.migration_id ? `[${entry.migration_id}] ` : '';
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';

    return `${timestamp} ${level} ${correlation}${migration}${entry.message}${context}`;
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(message);
        break;
      case LogLevel.INFO:
        console.info(message);
        break;
      case LogLevel.WARN:
        console.warn(message);
        break;
      case LogLevel.ERROR:
        console.error(message);
        break;
    }
  }

  private writeToFile(message: string): void {
    if (!this.currentLogFile) {
      return;
    }

    try {
      fs.appendFileSync(this.currentLogFile, message + '\n');
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private ensureLogDirectory(): void {
    if (!this.config.enableFile) {
      return;
    }

    try {
      if (!fs.existsSync(this.config.logDirectory)) {
        fs.mkdirSync(this.config.logDirectory, { recursive: true });
      }
    } catch (error) {
      console.error('Failed to create log directory:', error);
      this.config.enableFile = false;
    }
  }

  private initializeLogFile(): void {
    if (!this.config.enableFile) {
      return;
    }

    const timestamp = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    this.currentLogFile = path.join(this.config.logDirectory, `schema-migrator-${timestamp}.log`);
  }
}

function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export function generateCorrelationId(): string {
  return uuidv4();
}

let sharedLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!sharedLogger) {
    sharedLogger = new Logger();
  }
  return sharedLogger;
}
