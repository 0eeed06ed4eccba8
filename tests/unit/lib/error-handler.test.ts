/**
 * Error taxonomy and logger tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ErrorCategory,
  ErrorSeverity,
  LoadFailedError,
  LogLevel,
  Logger,
  MissingIdentifierError,
  describeError,
  isFileLoggingEnabled,
  parseLogLevel
} from '../../../src/lib/error-handler';

describe('error classes', () => {
  test('should carry code, category, context and cause', () => {
    const cause = new Error('duplicate key');
    const error = new LoadFailedError('Load failed at record 3: duplicate key', { failed_record_index: 3 }, cause, 'run-7');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('LoadFailedError');
    expect(error.errorCode).toBe('LOAD_FAILED');
    expect(error.category).toBe(ErrorCategory.DATABASE);
    expect(error.severity).toBe(ErrorSeverity.CRITICAL);
    expect(error.context).toEqual({ failed_record_index: 3 });
    expect(error.cause).toBe(cause);
    expect(error.correlationId).toBe('run-7');
  });

  test('should name the entity whose id is missing', () => {
    const error = new MissingIdentifierError('appointment', { source_appointment_id: 12 });

    expect(error.message).toBe('Could not obtain the id of the inserted appointment row');
    expect(error.context).toEqual({ entity: 'appointment', source_appointment_id: 12 });
  });

  test('should produce a structured log entry', () => {
    const error = new LoadFailedError('Load failed', {}, new TypeError('bad value'), 'run-1');

    expect(error.toLogFormat()).toMatchObject({
      level: LogLevel.ERROR,
      message: 'Load failed',
      error_code: 'LOAD_FAILED',
      category: 'database',
      cause: { name: 'TypeError', message: 'bad value' },
      correlation_id: 'run-1'
    });
  });
});

describe('describeError', () => {
  test('should describe errors and other thrown values', () => {
    expect(describeError(new RangeError('out of range'))).toEqual({ name: 'RangeError', message: 'out of range' });
    expect(describeError('boom')).toEqual({ name: 'NonError', message: 'boom' });
    expect(describeError(undefined)).toBeUndefined();
  });
});

describe('parseLogLevel', () => {
  test('should map names case-insensitively and fall back to info', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('chatty')).toBe(LogLevel.INFO);
  });
});

describe('Logger', () => {
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should drop entries below the configured level', () => {
    const logger = new Logger({ level: LogLevel.WARN, enableFile: false });

    logger.info('not shown');
    logger.warn('shown');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  test('should tag structured entries with the run id until cleared', () => {
    const logger = new Logger({ level: LogLevel.INFO, enableFile: false, enableStructuredLogging: true });

    logger.setRunId('run-42');
    logger.info('Extracting', { records: 3 });
    logger.clearContext();
    logger.info('Done');

    const first = JSON.parse(String(infoSpy.mock.calls[0][0]));
    const second = JSON.parse(String(infoSpy.mock.calls[1][0]));
    expect(first).toMatchObject({ level: 'info', message: 'Extracting', context: { records: 3 }, run_id: 'run-42' });
    expect(second.run_id).toBeUndefined();
  });

  test('should format plain-text entries', () => {
    const logger = new Logger({ enableConsole: false, enableFile: false, enableStructuredLogging: false });

    const line = logger.formatLogEntry({
      timestamp: new Date('2024-03-01T09:30:00.000Z'),
      level: LogLevel.WARN,
      message: 'No data to process',
      context: { no_data_reason: 'empty' },
      run_id: 'run-1'
    });

    expect(line).toBe('2024-03-01T09:30:00.000Z WARN  [run-1] No data to process {"no_data_reason":"empty"}');
  });
});

describe('isFileLoggingEnabled', () => {
  test('should be on unless explicitly turned off', () => {
    expect(isFileLoggingEnabled(undefined)).toBe(true);
    expect(isFileLoggingEnabled('')).toBe(true);
    expect(isFileLoggingEnabled('true')).toBe(true);
    expect(isFileLoggingEnabled('false')).toBe(false);
  });
});

describe('Logger file output', () => {
  let logDirectory: string;

  beforeEach(() => {
    logDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'appointments-etl-logs-'));
  });

  afterEach(() => {
    fs.rmSync(logDirectory, { recursive: true, force: true });
  });

  function logFiles(directory: string): string[] {
    return fs.readdirSync(directory).sort();
  }

  test('should append structured entries to the daily log file', () => {
    const today = new Date().toISOString().split('T')[0];
    const logger = new Logger({ enableConsole: false, enableFile: true, logDirectory, enableStructuredLogging: true });

    logger.info('Extracting appointments from source');
    logger.warn('No data to process', { no_data_reason: 'empty' });

    expect(logFiles(logDirectory)).toEqual([`etl-${today}.log`]);
    const lines = fs.readFileSync(path.join(logDirectory, `etl-${today}.log`), 'utf8').trim().split('\n');
    expect(lines.map(line => JSON.parse(line))).toEqual([
      expect.objectContaining({ level: 'info', message: 'Extracting appointments from source' }),
      expect.objectContaining({ level: 'warn', message: 'No data to process', context: { no_data_reason: 'empty' } })
    ]);
  });

  test('should create a missing log directory', () => {
    const nested = path.join(logDirectory, 'nested', 'logs');

    const logger = new Logger({ enableConsole: false, enableFile: true, logDirectory: nested });
    logger.info('first entry');

    expect(fs.existsSync(nested)).toBe(true);
    expect(logFiles(nested)).toHaveLength(1);
  });

  test('should rotate files over the size limit and keep only the newest ones', () => {
    const logger = new Logger({
      enableConsole: false,
      enableFile: true,
      logDirectory,
      maxFileSize: 10,
      maxFiles: 2
    });

    for (let i = 1; i <= 5; i++) {
      logger.info(`entry ${i}`);
    }

    const files = logFiles(logDirectory);
    expect(files).toHaveLength(2);
    for (const file of files) {
      expect(file).toMatch(/^etl-\d{4}-\d{2}-\d{2}-.+-[1-5]\.log$/);
      expect(fs.readFileSync(path.join(logDirectory, file), 'utf8').trim().split('\n')).toHaveLength(1);
    }
  });

  test('should not write files when file logging is off', () => {
    const logger = new Logger({ enableConsole: false, enableFile: false, logDirectory });

    logger.info('console only');

    expect(logFiles(logDirectory)).toEqual([]);
  });
});
