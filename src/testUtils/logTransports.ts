import type { LogMeta, LogTransport } from '../logging/types.js';

// Emulates console transport
export class MockTransport implements LogTransport {
  public logs: LogMeta[] = [];
  public errors: LogMeta[] = [];

  log(message?: unknown): void {
    this.logs.push(toRecord(message));
  }

  error(message?: unknown): void {
    this.errors.push(toRecord(message));
  }

  /**
   * All records written to either destination, in order of level name
   */
  messages(level?: string): string[] {
    return [...this.logs, ...this.errors]
      .filter((record) => level === undefined || record.level === level)
      .map((record) => String(record.message));
  }
}

function toRecord(message: unknown): LogMeta {
  return message !== null && typeof message === 'object'
    ? { ...message }
    : { message };
}
