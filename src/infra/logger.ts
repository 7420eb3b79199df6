import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogLine {
  ts: string;
  level: LogLevel;
  event: string;
  data: Record<string, unknown>;
}

/**
 * Append-only NDJSON event log. One line per call:
 * `{"ts":"…","level":"info","event":"loan.opened","data":{…}}`.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    const line: LogLine = { ts: isoNow(), level, event, data };
    const write = this.queue.then(() => fs.appendFile(this.logFilePath, `${JSON.stringify(line)}\n`));
    this.queue = write.catch(() => undefined);
    await write;
  }

  async flush(): Promise<void> {
    await this.queue;
  }
}
