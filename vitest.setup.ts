import { beforeAll, afterAll } from 'vitest';
import { existsSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';

// Setup test directories
const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';

beforeAll(() => {
  if (!existsSync(TEST_DIR)) {
    mkdirSync(TEST_DIR, { recursive: true });
  }
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP) {
    return;
  }
  if (existsSync(TEST_DIR)) {
    try {
      rmSync(TEST_DIR, { recursive: true, force: true });
    } catch (error) {
      // Parallel workers may race on the shared directory.
      console.warn(`Could not remove ${TEST_DIR}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
});

// Global test utilities
globalThis.TEST_DIR = TEST_DIR;

declare global {
  var TEST_DIR: string;
}
