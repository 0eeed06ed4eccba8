/**
 * Error Handling and Logging Infrastructure
 *
 * Error taxonomy for the appointments ETL plus a structured logger that writes
 * to the console and, optionally, to a daily log file.
 */

import * as fs from 'fs';
import * as path from 'path';

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  DATABASE = 'database',
  EXTRACTION = 'extraction',
  SCHEMA = 'schema',
  DATA_INTEGRITY = 'data_integrity',
  CONFIGURATION = 'configuration'
}

// ===== CUSTOM ERROR CLASSES =====

export class EtlBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly correlationId?: string;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: Record<string, unknown> = {},
    options: { cause?: unknown; correlationId?: string } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();
    this.correlationId = options.correlationId;

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
      context: this.context,
      stack_trace: this.stack,
      cause: describeError(this.cause),
      correlation_id: this.correlationId
    };
  }
}

/**
 * Source read failed. Recovered by the ETL service as a no-data run.
 */
export class ExtractionError extends EtlBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'EXTRACTION_FAILED', ErrorCategory.EXTRACTION, ErrorSeverity.MEDIUM, context, { cause });
  }
}

/**
 * A source row is missing a value the destination schema requires.
 * Fails the run before the destination is touched.
 */
export class InvalidSourceRowError extends EtlBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'INVALID_SOURCE_ROW', ErrorCategory.DATA_INTEGRITY, ErrorSeverity.HIGH, context, { cause });
  }
}

export class SchemaRecreateError extends EtlBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'SCHEMA_RECREATE_FAILED', ErrorCategory.SCHEMA, ErrorSeverity.CRITICAL, context, { cause });
  }
}

/**
 * An INSERT ... RETURNING id (or an id lookup) produced no usable identifier.
 */
export class MissingIdentifierError extends EtlBaseError {
  constructor(entity: string, context: Record<string, unknown> = {}) {
    super(
      `Could not obtain the id of the inserted ${entity} row`,
      'MISSING_GENERATED_ID',
      ErrorCategory.DATA_INTEGRITY,
      ErrorSeverity.CRITICAL,
      { entity, ...context }
    );
  }
}

export class LoadFailedError extends EtlBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown, correlationId?: string) {
    super(message, 'LOAD_FAILED', ErrorCategory.DATABASE, ErrorSeverity.CRITICAL, context, { cause, correlationId });
  }
}

export class ConfigurationError extends EtlBaseError {
  constructor(message: string, errorCode: string = 'CONFIG_ERROR', context: Record<string, unknown> = {}) {
    super(message, errorCode, ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, context);
  }
}

/**
 * Flatten an unknown thrown value into something JSON-serialisable
 */
export function describeError(error: unknown): { name: string; message: string } | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'NonError', message: String(error) };
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
  context?: Record<string, unknown>;
  error_code?: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  stack_trace?: string;
  cause?: { name: string; message: string };
  correlation_id?: string;
  run_id?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  maxFileSize?: number; // in bytes
  maxFiles?: number;
  enableStructuredLogging: boolean;
}

/**
 * File logging is on unless ENABLE_FILE_LOGGING is exactly 'false'
 */
export function isFileLoggingEnabled(value: string | undefined): boolean {
  return value !== 'false';
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private config: LoggerConfig;
  private runId: string | null = null;
  private currentLogFile: string | null = null;
  private rotations = 0;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      level: parseLogLevel(process.env.LOG_LEVEL || 'info'),
      enableConsole: true,
      enableFile: isFileLoggingEnabled(process.env.ENABLE_FILE_LOGGING),
      logDirectory: process.env.LOG_DIRECTORY || './logs',
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 10,
      enableStructuredLogging: true,
      ...config
    };

    this.ensureLogDirectory();
    this.initializeLogFile();
  }

  /**
   * Tag every following entry with the ETL run id
   */
  setRunId(runId: string): void {
    this.runId = runId;
  }

  clearContext(): void {
    this.runId = null;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorContext = error instanceof EtlBaseError
      ? { ...context, ...error.context, error_details: error.toLogFormat() }
      : { ...context, error_message: describeError(error)?.message, stack_trace: error instanceof Error ? error.stack : undefined };

    this.log(LogLevel.ERROR, message, errorContext);
  }

  /**
   * Log an ETL error with its structured representation
   */
  logEtlError(error: EtlBaseError): void {
    const logEntry = error.toLogFormat();
    logEntry.run_id = this.runId || undefined;
    this.writeLogEntry(logEntry);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.writeLogEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      run_id: this.runId || undefined
    });
  }

  private writeLogEntry(entry: LogEntry): void {
    const formattedEntry = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(entry.level, formattedEntry);
    }

    if (this.config.enableFile) {
      this.writeToFile(formattedEntry);
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
    const run = entry.run_id ? `[${entry.run_id}] ` : '';
    const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';

    return `${timestamp} ${level} ${run}${entry.message}${context}`;
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
      this.checkLogRotation();
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
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

    const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    this.currentLogFile = path.join(this.config.logDirectory, `etl-${date}.log`);
  }

  private checkLogRotation(): void {
    if (!this.currentLogFile || !this.config.maxFileSize) {
      return;
    }

    const stats = fs.statSync(this.currentLogFile);
    if (stats.size > this.config.maxFileSize) {
      this.rotateLogFile(this.currentLogFile);
    }
  }

  private rotateLogFile(logFile: string): void {
    try {
      // several rotations can share a millisecond
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.rotations++;
      fs.renameSync(logFile, logFile.replace(/\.log$/, `-${timestamp}-${this.rotations}.log`));
      this.initializeLogFile();
      this.cleanupOldLogFiles();
    } catch (error) {
      console.error('Failed to rotate log file:', error);
    }
  }

  private cleanupOldLogFiles(): void {
    const maxFiles = this.config.maxFiles;
    if (!maxFiles) {
      return;
    }

    const files = fs.readdirSync(this.config.logDirectory)
      .filter(file => file.startsWith('etl-') && file.endsWith('.log'))
      .map(file => ({
        name: file,
        path: path.join(this.config.logDirectory, file),
        mtime: fs.statSync(path.join(this.config.logDirectory, file)).mtime
      }))
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

    for (const file of files.slice(maxFiles)) {
      try {
        fs.unlinkSync(file.path);
      } catch (error) {
        console.error(`Failed to delete old log file ${file.name}:`, error);
      }
    }
  }
}

export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

// ===== SINGLETON INSTANCE =====

let globalLogger: Logger | null = null;

/**
 * Get global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/**
 * Replace the global logger with one built from explicit configuration
 */
export function initializeLogging(loggerConfig?: Partial<LoggerConfig>): Logger {
  globalLogger = new Logger(loggerConfig);
  return globalLogger;
}
