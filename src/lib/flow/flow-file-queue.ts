import type { MockFlowFile } from './mock-flow-file';

export interface QueueSize {
  objectCount: number;
  byteCount: number;
}

/**
 * FIFO queue feeding the processor
 */
export class FlowFileQueue {
  private items: MockFlowFile[] = [];

  public offer(flowFile: MockFlowFile): void {
    this.items.push(flowFile);
  }

  public poll(): MockFlowFile | undefined {
    return this.items.shift();
  }

  public pollBatch(max: number): MockFlowFile[] {
    return this.items.splice(0, Math.max(0, max));
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }

  public size(): QueueSize {
    return {
      objectCount: this.items.length,
      byteCount: this.items.reduce((total, item) => total + item.getSize(), 0),
    };
  }
}
