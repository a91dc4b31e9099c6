import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Logger } from '../src/interfaces';

type Level = 'info' | 'warn' | 'error' | 'debug';

/**
 * Logger that keeps every message so tests can assert on them.
 */
export class MemoryLogger implements Logger {
  readonly messages: { level: Level; message: string }[] = [];

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }

  debug(message: string): void {
    this.messages.push({ level: 'debug', message });
  }

  at(level: Level): string[] {
    return this.messages
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'dictcc-test-'));
}

export const fixture = (name: string): string => join(__dirname, 'fixtures', name);
