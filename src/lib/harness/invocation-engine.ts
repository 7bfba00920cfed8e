import {
  AggregateTriggerError,
  HarnessConfigurationError,
  HarnessStateError,
  TriggerFailureError,
  toError,
} from '../errors';
import { generateID } from '../id-helpers';
import {
  LifecycleInvoker,
  describeTarget,
} from '../lifecycle/lifecycle-invoker';
import type { LifecycleArgument, ProcessorPhase } from '../lifecycle/phases';
import type { LoggerService } from '../logger';
import type { MockProcessContext } from '../processor/mock-process-context';
import type { Processor, SessionFactory } from '../processor/types';
import { isPositiveInteger } from '../type-guards';
import type { HarnessEvents, RunSummary } from './events';
import type { TriggerFailureMode } from './options';
import { FixedWorkerPool } from './worker-pool';

export interface InvocationEngineOptions {
  processor: Processor;
  context: MockProcessContext;
  sessionFactory: SessionFactory;
  /** Harness logger; each run logs under `log.entity(runID)` */
  log: LoggerService;
  events: HarnessEvents;
  invoker?: LifecycleInvoker;
  threadCount?: number;
  triggerFailureMode?: TriggerFailureMode;
}

interface TriggerResult {
  /** 1-based, in submission order */
  iteration: number;
  error?: Error;
}

/**
 * Drives a processor through its scheduled → trigger × N → unscheduled →
 * stopped sequence on a worker pool of `threadCount` async workers.
 */
export class InvocationEngine {
  private readonly processor: Processor;
  private readonly context: MockProcessContext;
  private readonly sessionFactory: SessionFactory;
  private readonly log: LoggerService;
  private readonly events: HarnessEvents;
  private readonly invoker: LifecycleInvoker;
  private readonly triggerFailureMode: TriggerFailureMode;
  private threadCount = 1;
  private invocationCount = 0;
  private isRunning = false;

  /**
   * @throws {HarnessConfigurationError} When threadCount is rejected by setThreadCount()
   */
  constructor(options: InvocationEngineOptions) {
    this.processor = options.processor;
    this.context = options.context;
    this.sessionFactory = options.sessionFactory;
    this.log = options.log;
    this.events = options.events;
    this.invoker = options.invoker ?? new LifecycleInvoker({ logger: this.log });
    this.triggerFailureMode = options.triggerFailureMode ?? 'first';

    this.setThreadCount(options.threadCount ?? 1);
  }

  /**
   * Run the processor `iterations` times.
   *
   * Unscheduled fires once: as soon as the first trigger (in submission
   * order) is seen to succeed, or after all of them when none did. Stopped
   * fires only when asked and no trigger failed.
   *
   * @throws {HarnessConfigurationError} For a non-positive or fractional iteration count
   * @throws {HarnessStateError} While another run is in progress
   * @throws {TriggerFailureError} First failed trigger, in `first` mode
   * @throws {AggregateTriggerError} Every failed trigger, in `aggregate` mode
   * @throws {LifecycleInvocationError} When a lifecycle hook fails
   */
  public async run(
    iterations = 1,
    stopOnFinish = true,
    runInitPhase = true,
  ): Promise<RunSummary> {
    if (!isPositiveInteger(iterations)) {
      throw new HarnessConfigurationError(
        `Iterations must be a positive integer, got ${iterations}`,
        { iterations },
      );
    }

    if (this.isRunning) {
      throw new HarnessStateError(
        `Processor "${this.processor.getName()}" is already running`,
        { processorName: this.processor.getName() },
      );
    }

    this.isRunning = true;

    const runID = generateID('ulid');
    const log = this.log.entity(runID);
    const threadCount = this.threadCount;
    const startedAt = Date.now();

    this.events.runStarted(runID, iterations, threadCount);
    log.info('Running {{iterations}} iteration(s) on {{threadCount}} thread(s)', {
      params: { iterations, threadCount },
    });

    try {
      if (runInitPhase) {
        await this.invokePhase('scheduled', runID, this.context);
      }

      const failures = await this.triggerAll(iterations, threadCount, runID);
      this.escalate(failures, runID, log);

      if (stopOnFinish) {
        await this.invokePhase('stopped', runID);
      }

      const summary: RunSummary = {
        runID,
        iterations,
        threadCount,
        succeeded: iterations - failures.length,
        failed: failures.length,
        durationMS: Date.now() - startedAt,
      };

      log.success('Run finished in {{durationMS}}ms', {
        params: { durationMS: summary.durationMS },
      });
      this.events.runCompleted(summary);

      return summary;
    } catch (error) {
      const err = toError(error);
      this.events.runFailed(runID, err);
      throw err;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Fire the shutdown phase. Never called by run().
   */
  public async shutdown(): Promise<string[]> {
    return this.invokePhase('shutdown');
  }

  /**
   * @throws {HarnessConfigurationError} For a count below 1, or above 1 on a serial-only processor
   */
  public setThreadCount(count: number): void {
    if (!isPositiveInteger(count)) {
      throw new HarnessConfigurationError(
        `Thread count must be a positive integer, got ${count}`,
        { threadCount: count },
      );
    }

    if (count > 1 && this.processor.triggerSerially) {
      throw new HarnessConfigurationError(
        `Processor "${this.processor.getName()}" must be triggered serially; cannot use ${count} threads`,
        { threadCount: count, processorName: this.processor.getName() },
      );
    }

    this.threadCount = count;
    this.context.setMaxConcurrentTasks(count);
  }

  public getThreadCount(): number {
    return this.threadCount;
  }

  public getInvocationCount(): number {
    return this.invocationCount;
  }

  public isRunInProgress(): boolean {
    return this.isRunning;
  }

  /**
   * Invoke a processor phase, reporting it as an event and logging failures
   */
  public async invokePhase(
    phase: ProcessorPhase,
    runID?: string,
    ...args: LifecycleArgument[]
  ): Promise<string[]> {
    const targetName = describeTarget(this.processor);

    try {
      const methods = await this.invoker.invoke(phase, this.processor, ...args);
      this.events.lifecycleInvoked(phase, targetName, methods, runID);
      return methods;
    } catch (error) {
      const err = toError(error);
      const log = runID ? this.log.entity(runID) : this.log;
      log.errorObject(`Lifecycle phase "${phase}" failed`, err);
      throw err;
    }
  }

  private async triggerAll(
    iterations: number,
    threadCount: number,
    runID: string,
  ): Promise<TriggerFailureError[]> {
    const pool = new FixedWorkerPool(threadCount);
    const failures: TriggerFailureError[] = [];

    try {
      const pending = Array.from({ length: iterations }, (_, index) =>
        pool.submit(() => this.trigger(index + 1)),
      );

      pool.shutdown();

      let unscheduled = false;

      for (const next of pending) {
        const result = await next;

        if (result.error) {
          failures.push(
            new TriggerFailureError(
              {
                processorName: this.processor.getName(),
                runID,
                iteration: result.iteration,
              },
              result.error,
            ),
          );
          this.events.triggerFailed(runID, result.iteration, result.error);
        } else if (!unscheduled) {
          unscheduled = true;
          await this.invokePhase('unscheduled', runID);
        }
      }

      if (!unscheduled) {
        await this.invokePhase('unscheduled', runID);
      }

      return failures;
    } finally {
      pool.shutdown();
      await pool.awaitTermination();
    }
  }

  // Never rejects
  private async trigger(iteration: number): Promise<TriggerResult> {
    this.invocationCount++;

    try {
      await this.processor.onTrigger(this.context, this.sessionFactory);
      return { iteration };
    } catch (error) {
      return { iteration, error: toError(error) };
    }
  }

  private escalate(
    failures: TriggerFailureError[],
    runID: string,
    log: LoggerService,
  ): void {
    const first = failures[0];

    if (!first) {
      return;
    }

    if (this.triggerFailureMode === 'aggregate') {
      const aggregate = new AggregateTriggerError(
        { processorName: this.processor.getName(), runID },
        failures,
      );

      log.errorObject('Run failed', aggregate);
      throw aggregate;
    }

    log.errorObject('Run failed', first);

    for (const other of failures.slice(1)) {
      log.warn('Iteration {{iteration}} also failed: {{error}}', {
        params: {
          iteration: other.additionalInfo.iteration,
          error: other.cause,
        },
      });
    }

    throw first;
  }
}
