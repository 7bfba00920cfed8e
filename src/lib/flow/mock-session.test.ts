import { Readable } from 'node:stream';
import { beforeEach, describe, expect, test } from 'vitest';
import {
  FlowFileHandlingError,
  HarnessAssertionError,
  UnknownRelationshipError,
} from '../errors';
import { REL_FAILURE, REL_SUCCESS } from '../properties/relationship';
import { MockFlowFile } from './mock-flow-file';
import { MockSessionFactory } from './mock-session-factory';
import type { MockSession } from './mock-session';
import { SharedSessionState } from './shared-session-state';

const owner = {
  getName: () => 'test-processor',
  getRelationships: () => [REL_SUCCESS, REL_FAILURE],
};

describe('MockSession', () => {
  let state: SharedSessionState;
  let factory: MockSessionFactory;
  let session: MockSession;

  function enqueue(content: string, attributes?: Record<string, string>): MockFlowFile {
    const flowFile = MockFlowFile.create(state.idGenerator.nextId(), {
      content,
      attributes,
    });
    state.queue.offer(flowFile);
    return flowFile;
  }

  beforeEach(() => {
    state = new SharedSessionState();
    factory = new MockSessionFactory({ state, owner });
    session = factory.createSession();
  });

  test('get returns undefined on an empty queue', () => {
    expect(session.get()).toBeUndefined();
  });

  test('transfers become visible only on commit', () => {
    enqueue('a');
    const flowFile = session.get();

    expect(flowFile).toBeDefined();

    if (flowFile) {
      session.transfer(flowFile, REL_SUCCESS);
    }

    expect(session.getFlowFilesForRelationship('success')).toEqual([]);

    session.commit();

    expect(session.getFlowFilesForRelationship('success')).toHaveLength(1);
    expect(session.getCommitCount()).toBe(1);
    expect(state.queue.isEmpty()).toBe(true);
  });

  test('committed flow files are the latest versions', () => {
    enqueue('hello', { filename: 'a.txt' });
    const original = session.get();

    if (!original) {
      throw new Error('expected a flow file');
    }

    let flowFile = session.putAttribute(original, 'greeting', 'yes');
    flowFile = session.write(flowFile, (content) => content.toString().toUpperCase());
    session.transfer(flowFile, 'success');
    session.commit();

    const [committed] = session.getFlowFilesForRelationship(REL_SUCCESS);
    committed?.assertAttributeEquals('filename', 'a.txt');
    committed?.assertAttributeEquals('greeting', 'yes');
    committed?.assertContentEquals('HELLO');
  });

  test('using a stale version fails', () => {
    enqueue('x');
    const original = session.get();

    if (!original) {
      throw new Error('expected a flow file');
    }

    session.putAttribute(original, 'k', 'v');

    expect(() => session.transfer(original, REL_SUCCESS)).toThrow(
      'Flow file 1 is not the most recent version',
    );
  });

  test('flow files from elsewhere are rejected', () => {
    const stranger = MockFlowFile.create(99);

    expect(() => session.transfer(stranger, REL_SUCCESS)).toThrow(
      FlowFileHandlingError,
    );
  });

  test('transfer to an undeclared relationship fails', () => {
    enqueue('x');
    const flowFile = session.get();

    if (!flowFile) {
      throw new Error('expected a flow file');
    }

    expect(() => session.transfer(flowFile, 'retry')).toThrow(
      UnknownRelationshipError,
    );
    expect(() => session.transfer(flowFile, 'retry')).toThrow(
      'Relationship "retry" is not defined by processor "test-processor"',
    );
  });

  test('commit with unaccounted flow files fails and changes nothing', () => {
    enqueue('x');
    session.get();
    session.create();

    expect(() => session.commit()).toThrow(
      'Cannot commit session: flow files 1, 2 were neither transferred nor removed',
    );
    expect(session.getCommitCount()).toBe(0);
  });

  test('self transfer puts the flow file back on the queue at commit', () => {
    enqueue('x');
    const flowFile = session.get();

    if (!flowFile) {
      throw new Error('expected a flow file');
    }

    session.transfer(flowFile);
    expect(state.queue.isEmpty()).toBe(true);

    session.commit();
    expect(state.queue.size()).toEqual({ objectCount: 1, byteCount: 1 });
  });

  test('remove counts on commit and records a DROP event', () => {
    enqueue('x');
    const flowFile = session.get();

    if (!flowFile) {
      throw new Error('expected a flow file');
    }

    session.remove(flowFile);
    expect(session.getRemovedCount()).toBe(0);
    expect(state.getProvenanceEvents()).toEqual([]);

    session.commit();

    expect(session.getRemovedCount()).toBe(1);
    expect(state.getProvenanceEvents().map((event) => event.eventType)).toEqual([
      'DROP',
    ]);
  });

  test('clone gets a new id and uuid and records a CLONE event', () => {
    enqueue('payload');
    const parent = session.get();

    if (!parent) {
      throw new Error('expected a flow file');
    }

    const child = session.clone(parent);

    expect(child.id).toBe(2);
    expect(child.getAttribute('uuid')).not.toBe(parent.getAttribute('uuid'));
    expect(child.isContentEqual('payload')).toBe(true);

    session.transfer(parent, REL_SUCCESS);
    session.transfer(child, REL_FAILURE);
    session.commit();

    const [event] = state.getProvenanceEvents();
    expect(event?.eventType).toBe('CLONE');
    expect(event?.childUuids).toEqual([child.getAttribute('uuid')]);
  });

  test('create with a parent inherits attributes but not the uuid', () => {
    enqueue('x', { filename: 'parent.txt', 'custom.key': '1' });
    const parent = session.get();

    if (!parent) {
      throw new Error('expected a flow file');
    }

    const child = session.create(parent);

    expect(child.getAttribute('custom.key')).toBe('1');
    expect(child.getAttribute('filename')).toBe('parent.txt');
    expect(child.getAttribute('uuid')).not.toBe(parent.getAttribute('uuid'));
    expect(child.lineageStartDate).toBe(parent.lineageStartDate);
  });

  test('the uuid attribute cannot be changed or removed', () => {
    const flowFile = session.create();

    expect(() => session.putAttribute(flowFile, 'uuid', 'other')).toThrow(
      FlowFileHandlingError,
    );
    expect(() => session.removeAttribute(flowFile, 'uuid')).toThrow(
      FlowFileHandlingError,
    );
  });

  test('removeAttribute drops the attribute from the new version', () => {
    const flowFile = session.putAttribute(session.create(), 'k', 'v');

    const updated = session.removeAttribute(flowFile, 'k');

    updated.assertAttributeNotExists('k');
  });

  test('rollback requeues taken flow files and discards pending work', () => {
    enqueue('a');
    enqueue('b');
    const first = session.get();

    if (!first) {
      throw new Error('expected a flow file');
    }

    session.adjustCounter('seen', 1);
    session.getProvenanceReporter().route(first, 'success');
    session.transfer(first, REL_SUCCESS);
    session.create();

    session.rollback();

    expect(state.queue.size().objectCount).toBe(2);
    expect(state.getCounterValue('seen')).toBeUndefined();
    expect(state.getProvenanceEvents()).toEqual([]);
    expect(session.getFlowFilesForRelationship(REL_SUCCESS)).toEqual([]);
    expect(session.getRollbackCount()).toBe(1);
  });

  test('rollback with penalize marks requeued flow files', () => {
    enqueue('a');
    session.get();

    session.rollback(true);

    expect(state.queue.poll()?.penalized).toBe(true);
  });

  test('counters merge into shared state on commit', () => {
    session.adjustCounter('records', 2);
    session.adjustCounter('records', 3);
    session.commit();

    const other = factory.createSession();
    other.adjustCounter('records', -1);
    other.commit();

    expect(state.getCounterValue('records')).toBe(4);
  });

  test('penalized transfers are reported after commit', () => {
    enqueue('x');
    const flowFile = session.get();

    if (!flowFile) {
      throw new Error('expected a flow file');
    }

    const penalized = session.penalize(flowFile);
    session.transfer(penalized, REL_FAILURE);
    session.commit();

    expect(session.getPenalizedFlowFiles()).toEqual([penalized]);
  });

  test('getBatch takes up to max flow files', () => {
    enqueue('a');
    enqueue('b');
    enqueue('c');

    expect(session.getBatch(2).map((flowFile) => flowFile.id)).toEqual([1, 2]);
    expect(state.queue.size().objectCount).toBe(1);
  });

  test('importStream reads the whole stream as content', async () => {
    const flowFile = session.create();

    const updated = await session.importStream(
      Readable.from([Buffer.from('chunk-1,'), Buffer.from('chunk-2')]),
      flowFile,
    );

    expect(session.read(updated).toString()).toBe('chunk-1,chunk-2');
  });

  test('assertAllFlowFilesTransferred checks relationship and count', () => {
    enqueue('a');
    enqueue('b');

    for (const flowFile of session.getBatch(2)) {
      session.transfer(flowFile, REL_SUCCESS);
    }

    session.commit();

    expect(() => session.assertAllFlowFilesTransferred('success', 2)).not.toThrow();
    expect(() => session.assertAllFlowFilesTransferred('success', 3)).toThrow(
      'Expected 3 flow files transferred to "success" but found 2',
    );
    expect(() => session.assertAllFlowFilesTransferred('failure')).toThrow(
      HarnessAssertionError,
    );

    session.clearTransferState();
    expect(session.getFlowFilesForRelationship('success')).toEqual([]);
  });

  test('the factory remembers every session it created', () => {
    const second = factory.createSession();

    expect(factory.getCreatedSessions()).toEqual([session, second]);
  });
});
