import type { HandleLog, LogOptions, LogType } from './types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * Logger scoped to a service name, and optionally an entity within it.
 *
 * ```typescript
 * const log = logger.service('processor-harness').entity(runID);
 * log.info('Triggering {{count}} times', { params: { count: 3 } });
 * ```
 */
export class LoggerService {
  private readonly handleLog: HandleLog;
  private readonly serviceName: string;
  private readonly entityName?: string;

  constructor(handleLog: HandleLog, serviceName: string, entityName?: string) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  public get name(): string {
    return this.serviceName;
  }

  /**
   * Narrow to a single entity (a run, a registration) within this service.
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  public raw(message: string, options?: LogOptions): void {
    this.log('raw', message, options);
  }

  private log(type: LogType, message: string, options?: LogOptions): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
    });
  }
}
