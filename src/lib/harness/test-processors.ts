import { z } from 'zod';
import { declareLifecycleHooks } from '../lifecycle/lifecycle-invoker';
import type { ProcessorPhase } from '../lifecycle/phases';
import { BaseProcessor } from '../processor/base-processor';
import type { ProcessContext, ProcessSession } from '../processor/types';
import { definePropertyDescriptor } from '../properties/property-descriptor';
import type { PropertyDescriptor } from '../properties/property-descriptor';
import type { MockValidationContext } from '../properties/property-context';
import { REL_FAILURE, REL_SUCCESS } from '../properties/relationship';
import type { Relationship } from '../properties/relationship';
import { invalidResult } from '../properties/validation';
import type { ValidationResult } from '../properties/validation';
import { isKeyValueLookupService } from '../services/test-services';
import { sleep } from '../sleep';

export const BATCH_SIZE = definePropertyDescriptor({
  name: 'batch-size',
  displayName: 'Batch Size',
  defaultValue: '100',
  schema: z.string().regex(/^[1-9]\d*$/, 'must be a positive integer'),
});

export interface RecordingProcessorOptions {
  name?: string;
  triggerSerially?: boolean;
  /** 1-based trigger calls that throw instead of transferring */
  failOnTrigger?: number[];
  /** Milliseconds a trigger call waits before doing its work */
  delayMS?: (call: number) => number;
}

/**
 * Moves everything it takes from the queue to `success` and records each
 * lifecycle hook and trigger in `events`.
 */
export class RecordingProcessor extends BaseProcessor {
  public readonly events: string[] = [];
  public readonly failOn = new Set<ProcessorPhase>();
  public scheduledContext?: ProcessContext;
  public triggerCalls = 0;
  public peakConcurrency = 0;
  private readonly failOnTrigger: Set<number>;
  private readonly delayMS?: (call: number) => number;
  private active = 0;

  constructor(options: RecordingProcessorOptions = {}) {
    super({
      name: options.name ?? 'recording-processor',
      triggerSerially: options.triggerSerially,
    });

    this.failOnTrigger = new Set(options.failOnTrigger ?? []);
    this.delayMS = options.delayMS;
  }

  public getRelationships(): readonly Relationship[] {
    return [REL_SUCCESS, REL_FAILURE];
  }

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return [BATCH_SIZE];
  }

  public onAdded(): void {
    this.record('added');
  }

  public onScheduled(context: ProcessContext): void {
    this.scheduledContext = context;
    this.record('scheduled');
  }

  public onUnscheduled(): void {
    this.record('unscheduled');
  }

  public async onStopped(): Promise<void> {
    await Promise.resolve();
    this.record('stopped');
  }

  public onShutdown(): void {
    this.record('shutdown');
  }

  protected async onTriggerSession(
    context: ProcessContext,
    session: ProcessSession,
  ): Promise<void> {
    const call = ++this.triggerCalls;

    this.events.push(`trigger:${call}`);
    this.active++;
    this.peakConcurrency = Math.max(this.peakConcurrency, this.active);

    try {
      const delay = this.delayMS?.(call) ?? 0;

      if (delay > 0) {
        await sleep(delay);
      }

      if (this.failOnTrigger.has(call)) {
        throw new Error(`trigger ${call} failed`);
      }

      const max = context.getProperty(BATCH_SIZE).asInteger() ?? 100;

      for (const flowFile of session.getBatch(max)) {
        session.transfer(flowFile, REL_SUCCESS);
      }

      this.events.push(`done:${call}`);
    } finally {
      this.active--;
    }
  }

  private record(phase: ProcessorPhase): void {
    if (this.failOn.has(phase)) {
      throw new Error(`${phase} hook failed`);
    }

    this.events.push(phase);
  }
}

declareLifecycleHooks(RecordingProcessor, {
  added: [{ method: 'onAdded' }],
  scheduled: [{ method: 'onScheduled', parameters: ['process-context'] }],
  unscheduled: [{ method: 'onUnscheduled' }],
  stopped: [{ method: 'onStopped' }],
  shutdown: [{ method: 'onShutdown' }],
});

export const LOOKUP_SERVICE = definePropertyDescriptor({
  name: 'lookup-service',
  displayName: 'Lookup Service',
  required: true,
});

export const KEY_ATTRIBUTE = 'lookup.key';
export const VALUE_ATTRIBUTE = 'lookup.value';

/**
 * Copies the lookup value for each flow file's `lookup.key` attribute into
 * `lookup.value`. Flow files without a match go to `failure`, penalized.
 */
export class LookupAttributeProcessor extends BaseProcessor {
  constructor() {
    super({ name: 'lookup-attribute' });
  }

  public getRelationships(): readonly Relationship[] {
    return [REL_SUCCESS, REL_FAILURE];
  }

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return [LOOKUP_SERVICE];
  }

  public customValidate(context: MockValidationContext): ValidationResult[] {
    const identifier = context.getProperty(LOOKUP_SERVICE).getValue();

    if (identifier !== undefined && !context.isControllerServiceEnabled(identifier)) {
      return [
        invalidResult(
          LOOKUP_SERVICE.displayName,
          identifier,
          `controller service "${identifier}" is not enabled`,
        ),
      ];
    }

    return [];
  }

  protected onTriggerSession(context: ProcessContext, session: ProcessSession): void {
    const identifier = context.getProperty(LOOKUP_SERVICE).getValue() ?? '';
    const service = context.getControllerService(identifier);

    if (!isKeyValueLookupService(service)) {
      throw new Error(`"${identifier}" is not a key/value lookup service`);
    }

    let flowFile = session.get();

    while (flowFile) {
      const key = flowFile.getAttribute(KEY_ATTRIBUTE);
      const value = key === undefined ? undefined : service.lookup(key);

      if (value === undefined) {
        session.transfer(session.penalize(flowFile), REL_FAILURE);
      } else {
        session.transfer(
          session.putAttribute(flowFile, VALUE_ATTRIBUTE, value),
          REL_SUCCESS,
        );
      }

      flowFile = session.get();
    }

    session.adjustCounter('lookups', 1);
  }
}

/**
 * Splits text content into one flow file per line, dropping the original.
 * Must run on a single thread.
 */
export class SplitLinesProcessor extends BaseProcessor {
  constructor() {
    super({ name: 'split-lines', triggerSerially: true });
  }

  public getRelationships(): readonly Relationship[] {
    return [REL_SUCCESS];
  }

  protected onTriggerSession(_context: ProcessContext, session: ProcessSession): void {
    const original = session.get();

    if (!original) {
      return;
    }

    const lines = session
      .read(original)
      .toString('utf8')
      .split('\n')
      .filter((line) => line.length > 0);

    lines.forEach((line, index) => {
      let child = session.create(original);
      child = session.write(child, line);
      child = session.putAttribute(child, 'fragment.index', String(index));
      session.getProvenanceReporter().route(child, REL_SUCCESS.name);
      session.transfer(child, REL_SUCCESS);
    });

    session.remove(original);
  }
}
