import pino from 'pino';
import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';

/**
 * One captured log line, as pino wrote it.
 */
export interface LogEntry {
  readonly level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  readonly component?: string;
  readonly msg?: string;
  readonly fields: Readonly<Record<string, unknown>>;
}

const LEVEL_NAMES: Readonly<Record<number, LogEntry['level']>> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

/**
 * Logger factory backed by real pino loggers writing into memory.
 *
 * Fakes over mocks: tests assert on what was logged, not on call shapes.
 */
export class FakeLoggerFactory implements ILoggerFactory {
  readonly entries: LogEntry[] = [];
  private readonly _root: Logger;

  constructor() {
    this._root = pino(
      { level: 'trace', base: null, timestamp: false },
      { write: (line: string) => this.capture(line) }
    );
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }

  // Test helpers

  getEntries(level?: LogEntry['level']): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }

  hasEntry(level: LogEntry['level'], msg: string): boolean {
    return this.entries.some((e) => e.level === level && e.msg === msg);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private capture(line: string): void {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null) return;

    const fields: Record<string, unknown> = { ...parsed };
    const level = typeof fields['level'] === 'number' ? LEVEL_NAMES[fields['level']] : undefined;
    if (level === undefined) return;

    this.entries.push({
      level,
      ...(typeof fields['component'] === 'string' ? { component: fields['component'] } : {}),
      ...(typeof fields['msg'] === 'string' ? { msg: fields['msg'] } : {}),
      fields,
    });
  }
}
