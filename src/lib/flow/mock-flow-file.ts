import { HarnessAssertionError } from '../errors';
import { generateID } from '../id-helpers';

export const CoreAttributes = {
  UUID: 'uuid',
  FILENAME: 'filename',
  PATH: 'path',
  MIME_TYPE: 'mime.type',
} as const;

export type FlowFileContent = Buffer | Uint8Array | string;

export function toBuffer(data: FlowFileContent): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
}

interface FlowFileState {
  id: number;
  attributes: Record<string, string>;
  content: Buffer;
  entryDate: number;
  lineageStartDate: number;
  penalized: boolean;
}

/**
 * Immutable flow file. Every change made through a session produces a new
 * version with the same `id`; only the latest version may be used again.
 */
export class MockFlowFile {
  public readonly id: number;
  public readonly entryDate: number;
  public readonly lineageStartDate: number;
  public readonly penalized: boolean;
  private readonly attributes: Readonly<Record<string, string>>;
  private readonly content: Buffer;

  private constructor(state: FlowFileState) {
    this.id = state.id;
    this.attributes = Object.freeze({ ...state.attributes });
    this.content = state.content;
    this.entryDate = state.entryDate;
    this.lineageStartDate = state.lineageStartDate;
    this.penalized = state.penalized;
  }

  /**
   * New flow file with the core attributes filled in: a fresh `uuid`,
   * `filename` of `<id>.mockFlowFile` and `path` of `./`, unless supplied.
   */
  public static create(
    id: number,
    options: {
      attributes?: Record<string, string>;
      content?: FlowFileContent;
      lineageStartDate?: number;
    } = {},
  ): MockFlowFile {
    const now = Date.now();

    return new MockFlowFile({
      id,
      attributes: {
        [CoreAttributes.FILENAME]: `${id}.mockFlowFile`,
        [CoreAttributes.PATH]: './',
        ...options.attributes,
        [CoreAttributes.UUID]: generateID('uuid4'),
      },
      content: options.content === undefined ? Buffer.alloc(0) : toBuffer(options.content),
      entryDate: now,
      lineageStartDate: options.lineageStartDate ?? now,
      penalized: false,
    });
  }

  /**
   * Next version of this flow file
   */
  public with(changes: {
    attributes?: Record<string, string>;
    content?: FlowFileContent;
    penalized?: boolean;
  }): MockFlowFile {
    return new MockFlowFile({
      id: this.id,
      attributes: changes.attributes ?? { ...this.attributes },
      content:
        changes.content === undefined ? this.content : toBuffer(changes.content),
      entryDate: this.entryDate,
      lineageStartDate: this.lineageStartDate,
      penalized: changes.penalized ?? this.penalized,
    });
  }

  public getAttribute(name: string): string | undefined {
    return this.attributes[name];
  }

  public getAttributes(): Record<string, string> {
    return { ...this.attributes };
  }

  public getSize(): number {
    return this.content.length;
  }

  public getContent(): Buffer {
    return Buffer.from(this.content);
  }

  public getContentAsString(encoding: BufferEncoding = 'utf8'): string {
    return this.content.toString(encoding);
  }

  public isContentEqual(expected: FlowFileContent): boolean {
    return this.content.equals(toBuffer(expected));
  }

  public isAttributeEqual(name: string, expected: string): boolean {
    return this.attributes[name] === expected;
  }

  public assertAttributeExists(name: string): void {
    if (!(name in this.attributes)) {
      throw new HarnessAssertionError(
        `Expected attribute "${name}" to exist on flow file ${this.id}`,
        { expected: name, actual: Object.keys(this.attributes) },
      );
    }
  }

  public assertAttributeNotExists(name: string): void {
    if (name in this.attributes) {
      throw new HarnessAssertionError(
        `Expected attribute "${name}" not to exist on flow file ${this.id}`,
        { expected: undefined, actual: this.attributes[name] },
      );
    }
  }

  public assertAttributeEquals(name: string, expected: string): void {
    const actual = this.attributes[name];

    if (actual !== expected) {
      throw new HarnessAssertionError(
        `Expected attribute "${name}" of flow file ${this.id} to be "${expected}" but was "${actual ?? '(missing)'}"`,
        { expected, actual },
      );
    }
  }

  public assertContentEquals(expected: FlowFileContent): void {
    if (!this.isContentEqual(expected)) {
      throw new HarnessAssertionError(
        `Content of flow file ${this.id} does not match`,
        {
          expected: toBuffer(expected).toString('utf8'),
          actual: this.content.toString('utf8'),
        },
      );
    }
  }

  public toString(): string {
    return `MockFlowFile[id=${this.id}, uuid=${this.attributes[CoreAttributes.UUID] ?? ''}, size=${this.getSize()}]`;
  }
}
