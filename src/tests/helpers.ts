// src/tests/helpers.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LogSink } from '../utils/logger';

export interface MockSink extends LogSink {
  info: jest.Mock<void, [string]>;
  warn: jest.Mock<void, [string]>;
  error: jest.Mock<void, [string, unknown?]>;
  debug: jest.Mock<void, [string]>;
}

export function createMockSink(): MockSink {
  return {
    info: jest.fn<void, [string]>(),
    warn: jest.fn<void, [string]>(),
    error: jest.fn<void, [string, unknown?]>(),
    debug: jest.fn<void, [string]>(),
  };
}

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8');
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write files given as relative path -> content under dir
 */
export function writeTree(dir: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(dir, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  }
}
