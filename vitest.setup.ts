import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';

// Scratch root for the temporary directories tests sort
const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';

if (!existsSync(TEST_DIR)) {
  mkdirSync(TEST_DIR, { recursive: true });
}

globalThis.TEST_DIR = TEST_DIR;

declare global {
  var TEST_DIR: string;
}
