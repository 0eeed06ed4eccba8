/**
 * Jest Test Setup
 * Keeps the suite self-contained: no .env, no log files, no real databases.
 */

import { initializeLogging, LogLevel } from '../src/lib/error-handler';

process.env.NODE_ENV = 'test';
process.env.ENABLE_FILE_LOGGING = 'false';

jest.setTimeout(30000);

beforeEach(() => {
  // Quiet global logger; tests that assert on log output build their own
  initializeLogging({ level: LogLevel.ERROR, enableConsole: false, enableFile: false });
});
