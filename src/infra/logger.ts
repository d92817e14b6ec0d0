import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_ORDER, value);

/**
 * Append-only NDJSON event log. One line per entry:
 * `{ "ts": ..., "level": ..., "event": ..., ...data }`.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly logFilePath: string,
    private readonly minLevel: LogLevel = 'info',
  ) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    // Entry fields win over same-named data keys.
    const line = JSON.stringify({ ...data, ts: new Date().toISOString(), level, event });
    // Appends are chained so lines keep call order.
    const write = this.queue.then(() => fs.appendFile(this.logFilePath, `${line}\n`, 'utf-8'));
    this.queue = write.catch(() => undefined);
    await write;
  }

  async flush(): Promise<void> {
    await this.queue;
  }
}
