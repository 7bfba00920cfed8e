import { EventEmitterProtected } from '../event-emitter';
import { fillTemplate } from '../fill-template';
import { isPromise } from '../type-guards';
import { toError } from '../errors';
import type {
  HandleLogOptions,
  LogEntry,
  LogOptions,
  LogSink,
  LogType,
  LoggerEventMap,
  LoggerOptions,
  SinkErrorHandler,
  ArrayLogTransformer,
} from './types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { prepareErrorObjectLog } from './utils/error-object';
import { LoggerService } from './logger-service';

/**
 * Sink-based logger. Entries fan out to every sink; sink failures are
 * reported through `onSinkError` and never reach the caller.
 */
export class Logger extends EventEmitterProtected<LoggerEventMap> {
  private sinks: LogSink[];
  private readonly onSinkError?: SinkErrorHandler;
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    super();

    this.sinks = [...(options.sinks ?? [])];
    this.onSinkError = options.onSinkError;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error rendered as a key/value table, below an optional prefix line
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      error,
    });
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * @returns false when the sink was not attached
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);

    if (index === -1) {
      return false;
    }

    this.sinks.splice(index, 1);
    return true;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close every sink and detach them. Later log calls are ignored.
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.close) {
          try {
            await sink.close();
          } catch (error) {
            this.handleSinkError(toError(error), 'close', sink);
          }
        }
      }),
    );

    this.sinks = [];
    this.emit('close', {});
  }

  /**
   * A logger writing to an ArraySink (returned for inspection), plus an
   * optional console sink that is muted unless asked otherwise.
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    arrayLogTransformer?: ArrayLogTransformer;
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink({
      transformer: options?.arrayLogTransformer,
    });

    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];

    if (consoleSink) {
      sinks.push(consoleSink);
    }

    sinks.push(...(options?.sinks ?? []));

    return {
      logger: new Logger({ sinks }),
      arraySink,
      consoleSink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const timestamp = Date.now();
    const params = options?.params;
    const message = params ? fillTemplate(template, params) : template;
    const tags = options?.tags;

    const entry: LogEntry = {
      timestamp,
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      template,
      message,
      params,
      error: options?.error,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          void Promise.resolve(result).catch((error: unknown) => {
            this.handleSinkError(toError(error), 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(toError(error), 'write', sink);
      }
    }

    this.emit('log', { logType: type, message, timestamp });
  }

  private handleSinkError(
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
      } catch {
        // A throwing handler must not recurse back into the logger
        console.error(`Error in onSinkError handler: ${error.message}`);
      }

      return;
    }

    console.error(
      `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${error.message}`,
    );
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
