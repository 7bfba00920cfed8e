/**
 * Log level enum for filtering logs by severity.
 * Lower numbers are more important.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2,
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3,
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'warn'
  | 'notice'
  | 'success'
  | 'info'
  | 'debug'
  | 'raw';

export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

export interface LogOptions {
  params?: Record<string, unknown>;
  tags?: string[];
}

/**
 * What every sink receives
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // e.g. 'processor-harness', a processor name, a service id
  entityName?: string; // e.g. a run id
  template: string; // "Run {{runID}} started"
  message: string; // "Run 01J... started"
  params?: Record<string, unknown>;
  error?: unknown; // Original error from errorObject() calls
  tags?: string[];
}

export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Receives a log entry and returns a transformed entry, or false to keep the original.
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export type SinkErrorHandler = (
  error: Error,
  context: 'write' | 'close',
  sink: LogSink,
) => void;

export interface LoggerOptions {
  sinks?: LogSink[];
  onSinkError?: SinkErrorHandler;
}

export interface LoggerEventMap {
  log: {
    logType: LogType;
    message: string;
    timestamp: number;
  };
  close: Record<string, never>;
}

/**
 * Internal options for handleLog, not part of the public API
 */
export interface HandleLogOptions extends LogOptions {
  serviceName?: string;
  entityName?: string;
  error?: unknown;
}

export type HandleLog = (
  type: LogType,
  template: string,
  options?: HandleLogOptions,
) => void;
