import { CoreAttributes } from './mock-flow-file';
import type { MockFlowFile } from './mock-flow-file';

export type ProvenanceEventType =
  | 'RECEIVE'
  | 'SEND'
  | 'FETCH'
  | 'CREATE'
  | 'CLONE'
  | 'ROUTE'
  | 'CONTENT_MODIFIED'
  | 'ATTRIBUTES_MODIFIED'
  | 'DROP';

export interface ProvenanceEvent {
  eventType: ProvenanceEventType;
  flowFileUuid: string;
  componentName: string;
  timestamp: number;
  transitUri?: string;
  relationship?: string;
  details?: string;
  parentUuids?: string[];
  childUuids?: string[];
}

function uuidOf(flowFile: MockFlowFile): string {
  return flowFile.getAttribute(CoreAttributes.UUID) ?? String(flowFile.id);
}

/**
 * Collects a session's provenance events until it commits (published) or
 * rolls back (discarded).
 */
export class ProvenanceReporter {
  private readonly componentName: string;
  private events: ProvenanceEvent[] = [];

  constructor(componentName: string) {
    this.componentName = componentName;
  }

  public receive(flowFile: MockFlowFile, transitUri: string, details?: string): void {
    this.record('RECEIVE', flowFile, { transitUri, details });
  }

  public send(flowFile: MockFlowFile, transitUri: string, details?: string): void {
    this.record('SEND', flowFile, { transitUri, details });
  }

  public fetch(flowFile: MockFlowFile, transitUri: string, details?: string): void {
    this.record('FETCH', flowFile, { transitUri, details });
  }

  public create(flowFile: MockFlowFile, details?: string): void {
    this.record('CREATE', flowFile, { details });
  }

  public clone(parent: MockFlowFile, child: MockFlowFile): void {
    this.record('CLONE', parent, {
      parentUuids: [uuidOf(parent)],
      childUuids: [uuidOf(child)],
    });
  }

  public route(flowFile: MockFlowFile, relationship: string, details?: string): void {
    this.record('ROUTE', flowFile, { relationship, details });
  }

  public modifyContent(flowFile: MockFlowFile, details?: string): void {
    this.record('CONTENT_MODIFIED', flowFile, { details });
  }

  public modifyAttributes(flowFile: MockFlowFile, details?: string): void {
    this.record('ATTRIBUTES_MODIFIED', flowFile, { details });
  }

  public drop(flowFile: MockFlowFile, details?: string): void {
    this.record('DROP', flowFile, { details });
  }

  public getEvents(): readonly ProvenanceEvent[] {
    return [...this.events];
  }

  /**
   * Hand over the pending events and start empty
   */
  public drain(): ProvenanceEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  private record(
    eventType: ProvenanceEventType,
    flowFile: MockFlowFile,
    extra: Partial<ProvenanceEvent>,
  ): void {
    this.events.push({
      ...extra,
      eventType,
      flowFileUuid: uuidOf(flowFile),
      componentName: this.componentName,
      timestamp: Date.now(),
    });
  }
}
