import type { ArrayLogTransformer, LogEntry, LogSink, LogType } from '../types';

/**
 * Keeps entries in memory; the default sink of test-optimized loggers
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private readonly transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    if (this.transformer) {
      const transformed = this.transformer(entry);

      if (transformed !== false) {
        this.logs.push(transformed);
        return;
      }
    }

    this.logs.push(entry);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * `type: message` lines, handy for toEqual assertions
   */
  public getFormattedLogs(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  public getMessages(type?: LogType): string[] {
    return this.logs
      .filter((log) => type === undefined || log.type === type)
      .map((log) => log.message);
  }

  public close(): void {
    this.closed = true;
  }
}
