/**
 * Jest Setup File
 *
 * Runs before each test file (setupFilesAfterEnv in the root package.json).
 */

import { afterEach } from '@jest/globals';
import { resetLoggerCache } from '@btc-gateway/core';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.LOG_FORMAT = 'json';

afterEach(() => {
  resetLoggerCache();
});
