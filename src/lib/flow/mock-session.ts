import { buffer } from 'node:stream/consumers';
import type { Readable } from 'node:stream';
import {
  FlowFileHandlingError,
  HarnessAssertionError,
  UnknownRelationshipError,
} from '../errors';
import { relationshipName } from '../properties/relationship';
import type { Relationship, RelationshipRef } from '../properties/relationship';
import { CoreAttributes, MockFlowFile, toBuffer } from './mock-flow-file';
import type { FlowFileContent } from './mock-flow-file';
import { ProvenanceReporter } from './provenance';
import type { SharedSessionState } from './shared-session-state';

/**
 * The parts of a processor a session needs
 */
export interface SessionOwner {
  getName(): string;
  getRelationships(): readonly Relationship[];
}

// Marks a transfer back onto the input queue
const SELF = Symbol('self');

type TransferTarget = string | typeof SELF;

/**
 * In-memory unit of work. Changes stay pending until `commit()` publishes
 * them to the session's committed state and the shared state; `rollback()`
 * discards them and requeues what was taken from the queue.
 */
export class MockSession {
  private readonly state: SharedSessionState;
  private readonly owner: SessionOwner;
  private readonly provenance: ProvenanceReporter;

  // Pending work
  private current = new Map<number, MockFlowFile>();
  private originals = new Map<number, MockFlowFile>();
  private transferTargets = new Map<number, TransferTarget>();
  private removals = new Set<number>();
  private counters = new Map<string, number>();

  // Committed results
  private committedTransfers = new Map<string, MockFlowFile[]>();
  private committedPenalized: MockFlowFile[] = [];
  private committedRemovedCount = 0;
  private commitCount = 0;
  private rollbackCount = 0;

  constructor(options: { state: SharedSessionState; owner: SessionOwner }) {
    this.state = options.state;
    this.owner = options.owner;
    this.provenance = new ProvenanceReporter(options.owner.getName());
  }

  /**
   * Next queued flow file, or undefined when the queue is empty
   */
  public get(): MockFlowFile | undefined {
    const flowFile = this.state.queue.poll();

    if (flowFile) {
      this.take(flowFile);
    }

    return flowFile;
  }

  public getBatch(max: number): MockFlowFile[] {
    const batch = this.state.queue.pollBatch(max);

    for (const flowFile of batch) {
      this.take(flowFile);
    }

    return batch;
  }

  /**
   * New empty flow file; with a parent, inherits its attributes (not its
   * uuid) and lineage start.
   */
  public create(parent?: MockFlowFile): MockFlowFile {
    if (parent) {
      this.requireCurrent(parent);
    }

    const flowFile = MockFlowFile.create(this.state.idGenerator.nextId(), {
      attributes: parent?.getAttributes(),
      lineageStartDate: parent?.lineageStartDate,
    });

    this.current.set(flowFile.id, flowFile);
    return flowFile;
  }

  /**
   * Copy with a new id and uuid; records a CLONE event
   */
  public clone(flowFile: MockFlowFile): MockFlowFile {
    this.requireCurrent(flowFile);

    const child = MockFlowFile.create(this.state.idGenerator.nextId(), {
      attributes: flowFile.getAttributes(),
      content: flowFile.getContent(),
      lineageStartDate: flowFile.lineageStartDate,
    });

    this.current.set(child.id, child);
    this.provenance.clone(flowFile, child);

    return child;
  }

  public importFrom(data: FlowFileContent, flowFile: MockFlowFile): MockFlowFile {
    return this.replace(flowFile, flowFile.with({ content: data }));
  }

  public async importStream(
    stream: Readable,
    flowFile: MockFlowFile,
  ): Promise<MockFlowFile> {
    this.requireCurrent(flowFile);
    const content = await buffer(stream);

    return this.importFrom(content, flowFile);
  }

  /**
   * Replace the content, or transform it
   */
  public write(
    flowFile: MockFlowFile,
    data: FlowFileContent | ((content: Buffer) => FlowFileContent),
  ): MockFlowFile {
    this.requireCurrent(flowFile);

    const content =
      typeof data === 'function' ? data(flowFile.getContent()) : data;

    return this.replace(flowFile, flowFile.with({ content }));
  }

  public read(flowFile: MockFlowFile): Buffer {
    this.requireCurrent(flowFile);
    return flowFile.getContent();
  }

  public putAttribute(
    flowFile: MockFlowFile,
    name: string,
    value: string,
  ): MockFlowFile {
    return this.putAllAttributes(flowFile, { [name]: value });
  }

  /**
   * `uuid` can't be changed this way
   */
  public putAllAttributes(
    flowFile: MockFlowFile,
    attributes: Record<string, string>,
  ): MockFlowFile {
    this.requireCurrent(flowFile);

    if (CoreAttributes.UUID in attributes) {
      throw new FlowFileHandlingError(
        `The ${CoreAttributes.UUID} attribute of flow file ${flowFile.id} cannot be changed`,
        { flowFileId: flowFile.id },
      );
    }

    return this.replace(
      flowFile,
      flowFile.with({
        attributes: { ...flowFile.getAttributes(), ...attributes },
      }),
    );
  }

  public removeAttribute(flowFile: MockFlowFile, name: string): MockFlowFile {
    this.requireCurrent(flowFile);

    if (name === CoreAttributes.UUID) {
      throw new FlowFileHandlingError(
        `The ${CoreAttributes.UUID} attribute of flow file ${flowFile.id} cannot be removed`,
        { flowFileId: flowFile.id },
      );
    }

    const attributes = flowFile.getAttributes();
    delete attributes[name];

    return this.replace(flowFile, flowFile.with({ attributes }));
  }

  /**
   * Route to a relationship, or back onto the input queue when none is given
   */
  public transfer(flowFile: MockFlowFile, relationship?: RelationshipRef): void {
    this.requireCurrent(flowFile);

    if (relationship === undefined) {
      this.transferTargets.set(flowFile.id, SELF);
      return;
    }

    const name = relationshipName(relationship);
    const known = this.owner
      .getRelationships()
      .some((candidate) => candidate.name === name);

    if (!known) {
      throw new UnknownRelationshipError({
        relationship: name,
        processorName: this.owner.getName(),
      });
    }

    this.transferTargets.set(flowFile.id, name);
  }

  /**
   * Drop the flow file; records a DROP event
   */
  public remove(flowFile: MockFlowFile): void {
    this.requireCurrent(flowFile);

    this.transferTargets.delete(flowFile.id);
    this.removals.add(flowFile.id);
    this.provenance.drop(flowFile);
  }

  public penalize(flowFile: MockFlowFile): MockFlowFile {
    this.requireCurrent(flowFile);
    return this.replace(flowFile, flowFile.with({ penalized: true }));
  }

  public adjustCounter(name: string, delta: number): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
  }

  public getProvenanceReporter(): ProvenanceReporter {
    return this.provenance;
  }

  /**
   * Publish pending work. Every flow file the session holds must have been
   * transferred or removed.
   */
  public commit(): void {
    const unaccounted = [...this.current.keys()].filter(
      (id) => !this.transferTargets.has(id) && !this.removals.has(id),
    );

    if (unaccounted.length > 0) {
      throw new FlowFileHandlingError(
        `Cannot commit session: flow files ${unaccounted.join(', ')} were neither transferred nor removed`,
        { unaccounted },
      );
    }

    for (const [id, target] of this.transferTargets) {
      const flowFile = this.latest(id);

      if (target === SELF) {
        this.state.queue.offer(flowFile);
      } else {
        const list = this.committedTransfers.get(target) ?? [];
        list.push(flowFile);
        this.committedTransfers.set(target, list);
      }

      if (flowFile.penalized) {
        this.committedPenalized.push(flowFile);
      }
    }

    this.committedRemovedCount += this.removals.size;

    for (const [name, delta] of this.counters) {
      this.state.adjustCounter(name, delta);
    }

    this.state.addProvenanceEvents(this.provenance.drain());
    this.commitCount++;
    this.resetPending();
  }

  /**
   * Discard pending work and requeue every flow file taken from the queue,
   * penalized when asked.
   */
  public rollback(penalize = false): void {
    for (const original of this.originals.values()) {
      this.state.queue.offer(penalize ? original.with({ penalized: true }) : original);
    }

    this.provenance.drain();
    this.rollbackCount++;
    this.resetPending();
  }

  // Queries over committed work

  public getFlowFilesForRelationship(relationship: RelationshipRef): MockFlowFile[] {
    return [...(this.committedTransfers.get(relationshipName(relationship)) ?? [])];
  }

  public getCommittedTransfers(): ReadonlyMap<string, readonly MockFlowFile[]> {
    return new Map(
      [...this.committedTransfers].map(([name, list]) => [name, [...list]]),
    );
  }

  public getRemovedCount(): number {
    return this.committedRemovedCount;
  }

  public getPenalizedFlowFiles(): MockFlowFile[] {
    return [...this.committedPenalized];
  }

  public getCommitCount(): number {
    return this.commitCount;
  }

  public getRollbackCount(): number {
    return this.rollbackCount;
  }

  /**
   * Every committed transfer went to `relationship`
   */
  public assertAllFlowFilesTransferred(
    relationship: RelationshipRef,
    count?: number,
  ): void {
    const name = relationshipName(relationship);

    for (const [target, list] of this.committedTransfers) {
      if (target !== name && list.length > 0) {
        throw new HarnessAssertionError(
          `Expected all flow files to be transferred to "${name}" but ${list.length} went to "${target}"`,
          { expected: name, actual: target },
        );
      }
    }

    const actual = this.committedTransfers.get(name)?.length ?? 0;

    if (count !== undefined && actual !== count) {
      throw new HarnessAssertionError(
        `Expected ${count} flow files transferred to "${name}" but found ${actual}`,
        { expected: count, actual },
      );
    }
  }

  public clearTransferState(): void {
    this.committedTransfers.clear();
    this.committedPenalized = [];
    this.committedRemovedCount = 0;
  }

  private take(flowFile: MockFlowFile): void {
    this.current.set(flowFile.id, flowFile);
    this.originals.set(flowFile.id, flowFile);
  }

  private latest(id: number): MockFlowFile {
    const flowFile = this.current.get(id);

    if (!flowFile) {
      throw new FlowFileHandlingError(`Flow file ${id} is not held by this session`, {
        flowFileId: id,
      });
    }

    return flowFile;
  }

  private requireCurrent(flowFile: MockFlowFile): void {
    const latest = this.latest(flowFile.id);

    if (latest !== flowFile) {
      throw new FlowFileHandlingError(
        `Flow file ${flowFile.id} is not the most recent version`,
        { flowFileId: flowFile.id },
      );
    }

    if (this.removals.has(flowFile.id)) {
      throw new FlowFileHandlingError(
        `Flow file ${flowFile.id} has already been removed`,
        { flowFileId: flowFile.id },
      );
    }
  }

  private replace(previous: MockFlowFile, next: MockFlowFile): MockFlowFile {
    this.requireCurrent(previous);
    this.current.set(next.id, next);
    return next;
  }

  private resetPending(): void {
    this.current = new Map();
    this.originals = new Map();
    this.transferTargets = new Map();
    this.removals = new Set();
    this.counters = new Map();
  }
}
