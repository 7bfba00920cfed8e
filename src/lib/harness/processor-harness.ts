import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import { EventEmitterProtected } from '../event-emitter';
import {
  HarnessAssertionError,
  LifecycleInvocationError,
  toError,
} from '../errors';
import { CoreAttributes, MockFlowFile } from '../flow/mock-flow-file';
import type { FlowFileContent } from '../flow/mock-flow-file';
import { MockSessionFactory } from '../flow/mock-session-factory';
import type { ProvenanceEvent } from '../flow/provenance';
import { SharedSessionState } from '../flow/shared-session-state';
import { LifecycleInvoker } from '../lifecycle/lifecycle-invoker';
import type { LoggerService } from '../logger';
import { MockProcessContext } from '../processor/mock-process-context';
import type { Processor } from '../processor/types';
import type { PropertyRef } from '../properties/property-descriptor';
import { relationshipName } from '../properties/relationship';
import type { RelationshipRef } from '../properties/relationship';
import { formatValidationResult, invalidResults } from '../properties/validation';
import type { ValidationResult } from '../properties/validation';
import { ServiceRegistry } from '../services/service-registry';
import type { ControllerService } from '../services/types';
import { HarnessEvents } from './events';
import type { HarnessEventMap, RunSummary } from './events';
import { InvocationEngine } from './invocation-engine';
import { resolveHarnessOptions } from './options';
import type { HarnessOptions, ResolvedHarnessOptions } from './options';

/**
 * Drives a single processor in memory: feed it flow files, run it, then
 * assert on where they went.
 *
 * @example
 * ```typescript
 * const harness = await ProcessorHarness.create(new SplitText());
 * harness.setProperty(LINE_COUNT, '1');
 * harness.enqueueContent('a\nb\n', { filename: 'a.txt' });
 *
 * await harness.run();
 *
 * harness.assertAllFlowFilesTransferred(REL_SPLITS, 2);
 * harness.assertQueueEmpty();
 * ```
 */
export class ProcessorHarness extends EventEmitterProtected<HarnessEventMap> {
  private readonly processor: Processor;
  private readonly options: ResolvedHarnessOptions;
  private readonly log: LoggerService;
  private readonly state: SharedSessionState;
  private readonly sessionFactory: MockSessionFactory;
  private readonly registry: ServiceRegistry;
  private readonly context: MockProcessContext;
  private readonly engine: InvocationEngine;
  private readonly events: HarnessEvents;

  private constructor(processor: Processor, options: ResolvedHarnessOptions) {
    const log = options.logger.service(options.name);

    super({
      onListenerError: (event, error) => {
        log.errorObject(`Listener for "${event}" failed`, toError(error));
      },
    });

    this.processor = processor;
    this.options = options;
    this.log = log;
    this.events = new HarnessEvents(
      <K extends keyof HarnessEventMap>(event: K, data: HarnessEventMap[K]) => {
        this.emit(event, data);
      },
    );

    this.state = new SharedSessionState();
    this.sessionFactory = new MockSessionFactory({
      state: this.state,
      owner: processor,
    });

    const invoker = new LifecycleInvoker({ logger: log });

    this.registry = new ServiceRegistry({
      logger: options.logger,
      log,
      invoker,
    });
    this.context = new MockProcessContext({
      processor,
      lookup: this.registry,
    });
    this.engine = new InvocationEngine({
      processor,
      context: this.context,
      sessionFactory: this.sessionFactory,
      log,
      events: this.events,
      invoker,
      threadCount: options.threadCount,
      triggerFailureMode: options.triggerFailureMode,
    });
  }

  /**
   * Build a harness, initialize the processor and fire its `added` hooks.
   *
   * @throws {HarnessConfigurationError} For invalid options
   * @throws {LifecycleInvocationError} When an `added` hook fails
   */
  public static async create(
    processor: Processor,
    options?: HarnessOptions,
  ): Promise<ProcessorHarness> {
    const harness = new ProcessorHarness(processor, resolveHarnessOptions(options));
    await harness.initialize();

    return harness;
  }

  // Running

  /**
   * @throws {HarnessAssertionError} When the processor is not valid (unless validateBeforeRun is off)
   */
  public async run(
    iterations = 1,
    stopOnFinish = true,
    runInitPhase = true,
  ): Promise<RunSummary> {
    if (this.options.validateBeforeRun) {
      this.context.assertValid();
    }

    return this.engine.run(iterations, stopOnFinish, runInitPhase);
  }

  public async shutdown(): Promise<void> {
    await this.engine.shutdown();
  }

  public getInvocationCount(): number {
    return this.engine.getInvocationCount();
  }

  // Enqueue

  public enqueue(...flowFiles: MockFlowFile[]): void {
    for (const flowFile of flowFiles) {
      this.state.queue.offer(flowFile);
    }
  }

  public enqueueContent(
    data: FlowFileContent,
    attributes: Record<string, string> = {},
  ): MockFlowFile {
    const flowFile = MockFlowFile.create(this.state.idGenerator.nextId(), {
      attributes,
      content: data,
    });

    this.state.queue.offer(flowFile);
    return flowFile;
  }

  public async enqueueStream(
    stream: Readable,
    attributes: Record<string, string> = {},
  ): Promise<MockFlowFile> {
    const content = await buffer(stream);
    return this.enqueueContent(content, attributes);
  }

  /**
   * `filename` defaults to the file's base name
   */
  public async enqueueFile(
    path: string,
    attributes: Record<string, string> = {},
  ): Promise<MockFlowFile> {
    const content = await readFile(path);

    return this.enqueueContent(content, {
      [CoreAttributes.FILENAME]: basename(path),
      ...attributes,
    });
  }

  // Assertions

  /**
   * Every committed transfer went to `relationship`; with `count`, exactly
   * that many did.
   */
  public assertAllFlowFilesTransferred(
    relationship: RelationshipRef,
    count?: number,
  ): void {
    const name = relationshipName(relationship);

    for (const [target, total] of this.getTransferCounts()) {
      if (target !== name && total > 0) {
        throw new HarnessAssertionError(
          `Expected all flow files to be transferred to "${name}" but ${total} went to "${target}"`,
          { expected: name, actual: target },
        );
      }
    }

    if (count !== undefined) {
      this.assertTransferCount(name, count);
    }
  }

  public assertTransferCount(relationship: RelationshipRef, count: number): void {
    const name = relationshipName(relationship);
    const actual = this.getTransferCount(name);

    if (actual !== count) {
      throw new HarnessAssertionError(
        `Expected ${count} flow files transferred to "${name}" but found ${actual}`,
        { expected: count, actual },
      );
    }
  }

  public assertQueueEmpty(): void {
    const { objectCount } = this.getQueueSize();

    if (objectCount > 0) {
      throw new HarnessAssertionError(
        `Expected the input queue to be empty but it holds ${objectCount} flow file(s)`,
        { expected: 0, actual: objectCount },
      );
    }
  }

  public assertQueueNotEmpty(): void {
    if (this.isQueueEmpty()) {
      throw new HarnessAssertionError(
        'Expected the input queue to hold flow files but it is empty',
        { actual: 0 },
      );
    }
  }

  public assertValid(): void {
    this.context.assertValid();
  }

  public assertNotValid(): void {
    this.context.assertNotValid();
  }

  public assertServiceValid(identifier: string): void {
    const invalid = invalidResults(this.registry.validate(identifier));

    if (invalid.length > 0) {
      throw new HarnessAssertionError(
        `Controller service "${identifier}" is not valid:\n${invalid
          .map((result) => `  ${formatValidationResult(result)}`)
          .join('\n')}`,
        { expected: 'valid', actual: invalid },
      );
    }
  }

  public assertServiceNotValid(identifier: string): void {
    if (invalidResults(this.registry.validate(identifier)).length === 0) {
      throw new HarnessAssertionError(
        `Expected controller service "${identifier}" to be invalid but it is valid`,
        { expected: 'invalid', actual: 'valid' },
      );
    }
  }

  public assertPenalizeCount(count: number): void {
    const actual = this.sessionFactory
      .getCreatedSessions()
      .reduce((total, session) => total + session.getPenalizedFlowFiles().length, 0);

    if (actual !== count) {
      throw new HarnessAssertionError(
        `Expected ${count} penalized flow files but found ${actual}`,
        { expected: count, actual },
      );
    }
  }

  // Queries

  /**
   * Committed transfers across every session, oldest entry first
   */
  public getFlowFilesForRelationship(relationship: RelationshipRef): MockFlowFile[] {
    return this.sessionFactory
      .getCreatedSessions()
      .flatMap((session) => session.getFlowFilesForRelationship(relationship))
      .sort((a, b) => a.entryDate - b.entryDate || a.id - b.id);
  }

  /**
   * 0 for relationships nothing was transferred to, known or not
   */
  public getTransferCount(relationship: RelationshipRef): number {
    return this.getTransferCounts().get(relationshipName(relationship)) ?? 0;
  }

  public isQueueEmpty(): boolean {
    return this.state.queue.isEmpty();
  }

  public getQueueSize(): { objectCount: number; byteCount: number } {
    return this.state.queue.size();
  }

  public getContentAsBuffer(flowFile: MockFlowFile): Buffer {
    return flowFile.getContent();
  }

  public getCounterValue(name: string): number | undefined {
    return this.state.getCounterValue(name);
  }

  public getRemovedCount(): number {
    return this.sessionFactory
      .getCreatedSessions()
      .reduce((total, session) => total + session.getRemovedCount(), 0);
  }

  public getProvenanceEvents(): readonly ProvenanceEvent[] {
    return this.state.getProvenanceEvents();
  }

  public clearProvenanceEvents(): void {
    this.state.clearProvenanceEvents();
  }

  /**
   * Forget committed transfers, removals and penalized items
   */
  public clearTransferState(): void {
    for (const session of this.sessionFactory.getCreatedSessions()) {
      session.clearTransferState();
    }
  }

  public getProcessor(): Processor {
    return this.processor;
  }

  public getProcessContext(): MockProcessContext {
    return this.context;
  }

  public getIdentifier(): string {
    return this.options.identifier;
  }

  // Processor configuration

  public setProperty(ref: PropertyRef, value: string): ValidationResult {
    return this.context.setProperty(ref, value);
  }

  public removeProperty(ref: PropertyRef): boolean {
    return this.context.removeProperty(ref);
  }

  public setAnnotationData(annotationData: string): void {
    this.context.setAnnotationData(annotationData);
  }

  /**
   * @throws {HarnessConfigurationError} Above 1 for a serial-only processor
   */
  public setThreadCount(count: number): void {
    this.engine.setThreadCount(count);
  }

  public getThreadCount(): number {
    return this.engine.getThreadCount();
  }

  public setRelationshipAvailable(relationship: RelationshipRef): void {
    this.context.setRelationshipAvailable(relationship);
  }

  public setRelationshipUnavailable(relationship: RelationshipRef): void {
    this.context.setRelationshipUnavailable(relationship);
  }

  // Controller services

  public async addControllerService(
    identifier: string,
    service: ControllerService,
    properties: Record<string, string> = {},
  ): Promise<void> {
    await this.registry.add(identifier, service, properties);
    this.events.serviceAdded(identifier);
  }

  public async enableControllerService(identifier: string): Promise<void> {
    await this.registry.enable(identifier);
    this.events.serviceEnabled(identifier);
  }

  /**
   * A failing `disabled` hook still leaves the service disabled, so
   * `service:disabled` is emitted before the failure is rethrown.
   */
  public async disableControllerService(identifier: string): Promise<void> {
    try {
      await this.registry.disable(identifier);
    } catch (error) {
      if (error instanceof LifecycleInvocationError) {
        this.events.serviceDisabled(identifier);
      }

      throw error;
    }

    this.events.serviceDisabled(identifier);
  }

  public async removeControllerService(identifier: string): Promise<void> {
    await this.registry.remove(identifier);
    this.events.serviceRemoved(identifier);
  }

  public isControllerServiceEnabled(identifier: string): boolean {
    return this.registry.isEnabled(identifier);
  }

  public setServiceProperty(
    identifier: string,
    ref: PropertyRef,
    value: string,
  ): ValidationResult {
    return this.registry.setProperty(identifier, ref, value);
  }

  public setServiceAnnotationData(identifier: string, annotationData: string): void {
    this.registry.setAnnotationData(identifier, annotationData);
  }

  /**
   * @throws {UnknownServiceError}
   */
  public getControllerService(identifier: string): ControllerService {
    return this.registry.getService(identifier);
  }

  private async initialize(): Promise<void> {
    this.processor.initialize({
      identifier: this.options.identifier,
      logger: this.options.logger.service(this.processor.getName()),
      lookup: this.registry,
    });

    await this.engine.invokePhase('added');

    this.log.debug('Harness ready for {{processor}}', {
      params: { processor: this.processor.getName() },
    });
  }

  private getTransferCounts(): Map<string, number> {
    const counts = new Map<string, number>();

    for (const session of this.sessionFactory.getCreatedSessions()) {
      for (const [name, list] of session.getCommittedTransfers()) {
        counts.set(name, (counts.get(name) ?? 0) + list.length);
      }
    }

    return counts;
  }
}

/**
 * Same as `ProcessorHarness.create`
 */
export async function createHarness(
  processor: Processor,
  options?: HarnessOptions,
): Promise<ProcessorHarness> {
  return ProcessorHarness.create(processor, options);
}
