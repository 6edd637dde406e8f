/**
 * Global test setup file
 * Runs before all tests
 */

import { beforeAll } from 'vitest';

beforeAll(() => {
  // Keep builder and validator logs out of test output
  process.env['NODE_ENV'] = 'test';
  process.env['LOG_LEVEL'] = 'silent';
});
