import { format } from 'date-fns';
import type { LogEntry, LogSink } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  muted?: boolean;
  minLevel?: LogLevel;
}

/**
 * Writes to console.error / console.warn / console.info / console.log by type
 */
export class ConsoleSink implements LogSink {
  private readonly colors: boolean;
  private readonly timestamps: boolean;
  private readonly typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw is never filtered or decorated
    if (entry.type === 'raw') {
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    let line = '';

    if (this.timestamps) {
      line += `[${format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss')}] `;
    }

    if (this.typeLabels) {
      line += `[${entry.type.toUpperCase()}] `;
    }

    if (entry.serviceName) {
      line += `[${entry.serviceName}] `;
    }

    if (entry.entityName) {
      line += `[${entry.entityName}] `;
    }

    line += entry.message;

    const output = this.colors ? colorize(entry.type, line) : line;

    switch (entry.type) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'notice':
      case 'success':
      case 'debug':
        console.log(output);
        break;
    }
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public close(): void {
    this.closed = true;
  }
}
