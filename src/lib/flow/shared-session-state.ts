import { FlowFileQueue } from './flow-file-queue';
import type { ProvenanceEvent } from './provenance';

/**
 * Monotonic flow file ids, shared by every session of a harness
 */
export class IdGenerator {
  private last = 0;

  public nextId(): number {
    this.last += 1;
    return this.last;
  }
}

/**
 * State every session of one harness commits into: the input queue,
 * counters and provenance events.
 */
export class SharedSessionState {
  public readonly queue: FlowFileQueue;
  public readonly idGenerator: IdGenerator;
  private readonly counters = new Map<string, number>();
  private provenanceEvents: ProvenanceEvent[] = [];

  constructor(
    options: { queue?: FlowFileQueue; idGenerator?: IdGenerator } = {},
  ) {
    this.queue = options.queue ?? new FlowFileQueue();
    this.idGenerator = options.idGenerator ?? new IdGenerator();
  }

  public adjustCounter(name: string, delta: number): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
  }

  /**
   * undefined when the counter was never adjusted
   */
  public getCounterValue(name: string): number | undefined {
    return this.counters.get(name);
  }

  public addProvenanceEvents(events: readonly ProvenanceEvent[]): void {
    this.provenanceEvents.push(...events);
  }

  public getProvenanceEvents(): readonly ProvenanceEvent[] {
    return [...this.provenanceEvents];
  }

  public clearProvenanceEvents(): void {
    this.provenanceEvents = [];
  }
}
