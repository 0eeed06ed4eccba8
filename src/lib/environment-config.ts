/**
 * Environment Configuration Management
 *
 * Centralizes environment variable handling for the appointments ETL.
 * Provides type-safe access to configuration with validation and default values.
 */

import * as dotenv from 'dotenv';
import { ConfigurationError, isFileLoggingEnabled } from './error-handler';

// Load environment variables
dotenv.config();

/**
 * Source database (SQL Server) connection configuration
 */
export interface SourceDatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  encrypt: boolean;
  trustServerCertificate: boolean;
  requestTimeoutMillis: number;
}

/**
 * Destination database (PostgreSQL) connection configuration
 */
export interface DestinationDatabaseConfig {
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

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';
export type EnvironmentName = 'development' | 'staging' | 'production' | 'test';

/**
 * Complete application configuration
 */
export interface AppConfig {
  source: SourceDatabaseConfig;
  destination: DestinationDatabaseConfig;
  environment: EnvironmentName;
  logging: {
    level: LogLevelName;
    enableFileLogging: boolean;
    logDirectory: string;
  };
}

const VALID_LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug'];
const VALID_ENVIRONMENTS: readonly EnvironmentName[] = ['development', 'staging', 'production', 'test'];

function requireVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`, 'CONFIG_MISSING_VAR', {
      variable: name
    });
  }
  return value;
}

function parseInteger(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`Invalid integer for ${name}: ${raw}`, 'CONFIG_INVALID_NUMBER', {
      variable: name,
      value: raw
    });
  }
  return value;
}

function isLogLevel(value: string): value is LogLevelName {
  return VALID_LOG_LEVELS.some(level => level === value);
}

function isEnvironment(value: string): value is EnvironmentName {
  return VALID_ENVIRONMENTS.some(env => env === value);
}

/**
 * Validates required environment variables and returns typed configuration
 */
function createConfig(): AppConfig {
  const requiredVars = [
    'SOURCE_DB_HOST',
    'SOURCE_DB_NAME',
    'SOURCE_DB_USER',
    'SOURCE_DB_PASSWORD',
    'TARGET_DB_HOST',
    'TARGET_DB_NAME',
    'TARGET_DB_PASSWORD',
  ];

  const missingVars = requiredVars.filter(varName => !process.env[varName]);
  if (missingVars.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missingVars.join(', ')}. ` +
      'Please ensure all required variables are set in your .env file.',
      'CONFIG_MISSING_VAR',
      { variables: missingVars }
    );
  }

  const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid log level: ${logLevel}. Must be one of: ${VALID_LOG_LEVELS.join(', ')}`,
      'CONFIG_INVALID_LOG_LEVEL'
    );
  }

  const environment = process.env.NODE_ENV || 'development';
  if (!isEnvironment(environment)) {
    throw new ConfigurationError(
      `Invalid environment: ${environment}. Must be one of: ${VALID_ENVIRONMENTS.join(', ')}`,
      'CONFIG_INVALID_ENVIRONMENT'
    );
  }

  return {
    source: {
      host: requireVar('SOURCE_DB_HOST'),
      port: parseInteger('SOURCE_DB_PORT', 1433),
      database: requireVar('SOURCE_DB_NAME'),
      user: requireVar('SOURCE_DB_USER'),
      password: requireVar('SOURCE_DB_PASSWORD'),
      encrypt: process.env.SOURCE_DB_ENCRYPT !== 'false',
      trustServerCertificate: process.env.SOURCE_DB_TRUST_SERVER_CERTIFICATE !== 'false',
      requestTimeoutMillis: parseInteger('SOURCE_DB_REQUEST_TIMEOUT', 300000),
    },

    destination: {
      host: requireVar('TARGET_DB_HOST'),
      port: parseInteger('TARGET_DB_PORT', 5432),
      database: requireVar('TARGET_DB_NAME'),
      user: process.env.TARGET_DB_USER || 'postgres',
      password: requireVar('TARGET_DB_PASSWORD'),
      ssl: process.env.TARGET_DB_SSL === 'true',
      connectionTimeoutMillis: parseInteger('TARGET_DB_TIMEOUT', 30000),
      idleTimeoutMillis: parseInteger('TARGET_DB_IDLE_TIMEOUT', 10000),
      max: parseInteger('TARGET_DB_POOL_SIZE', 5),
    },

    environment,

    logging: {
      level: logLevel,
      enableFileLogging: isFileLoggingEnabled(process.env.ENABLE_FILE_LOGGING),
      logDirectory: process.env.LOG_DIRECTORY || './logs',
    },
  };
}

let config: AppConfig | null = null;

/**
 * Gets the application configuration, creating it if it doesn't exist
 */
export function getConfig(): AppConfig {
  if (!config) {
    config = createConfig();
    validateConfig(config);
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
 * Validates a configuration and throws descriptive errors for issues
 */
export function validateConfig(cfg: AppConfig): void {
  if (cfg.source.port < 1 || cfg.source.port > 65535) {
    throw new ConfigurationError(`Invalid source database port: ${cfg.source.port}`, 'CONFIG_INVALID_PORT');
  }

  if (cfg.destination.port < 1 || cfg.destination.port > 65535) {
    throw new ConfigurationError(`Invalid destination database port: ${cfg.destination.port}`, 'CONFIG_INVALID_PORT');
  }

  if (cfg.source.requestTimeoutMillis < 1000) {
    throw new ConfigurationError(
      `Invalid source request timeout: ${cfg.source.requestTimeoutMillis}ms. Must be at least 1000ms.`,
      'CONFIG_INVALID_TIMEOUT'
    );
  }
}

/**
 * Returns a safe configuration object for logging (with sensitive data masked)
 */
export function getConfigForLogging(): Record<string, unknown> {
  const cfg = getConfig();
  return {
    source: {
      ...cfg.source,
      password: '***masked***',
    },
    destination: {
      ...cfg.destination,
      password: '***masked***',
    },
    environment: cfg.environment,
    logging: cfg.logging,
  };
}

/**
 * Connection strings safe to print
 */
export const configUtils = {
  getMaskedConnectionString: (type: 'source' | 'destination') => {
    const cfg = getConfig();
    if (type === 'source') {
      return `mssql://${cfg.source.user}:***@${cfg.source.host}:${cfg.source.port}/${cfg.source.database}`;
    }
    return `postgresql://${cfg.destination.user}:***@${cfg.destination.host}:${cfg.destination.port}/${cfg.destination.database}`;
  },
};
