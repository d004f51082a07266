import { beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';

// Suites build their fixture trees and databases under .test-tmp/<suite>
const FIXTURE_ROOT = join(process.cwd(), '.test-tmp');

process.env.NODE_ENV = 'test';
// Module loggers read this whenever they log
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';

beforeAll(() => {
  mkdirSync(FIXTURE_ROOT, { recursive: true });
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP) return;
  try {
    rmSync(FIXTURE_ROOT, { recursive: true, force: true });
  } catch (error) {
    console.warn(`Could not remove ${FIXTURE_ROOT}:`, error);
  }
});
