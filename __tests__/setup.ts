/**
 * Jest setup file
 * This file is executed before each test file
 */

import { closeDatabase } from '../src/database/connection';

// Global test timeout
jest.setTimeout(30000);

// Each test file gets its own in-memory database; release it when done
afterAll(() => {
  closeDatabase();
});
