import { describe, expect, test } from 'vitest';
import {
  HarnessConfigurationError,
  ServiceRegistrationError,
  ServiceStateError,
  TriggerFailureError,
} from '../errors';
import { Logger } from '../logger';
import { RecordingService } from '../services/test-services';
import { createHarness } from './processor-harness';
import type { HarnessEventMap } from './events';
import { RecordingProcessor, SplitLinesProcessor } from './test-processors';

describe('ProcessorHarness end to end', () => {
  test('a single thread triggers exactly n times', async () => {
    const processor = new RecordingProcessor();
    const harness = await createHarness(processor);

    await harness.run(5);

    expect(harness.getInvocationCount()).toBe(5);
    expect(processor.triggerCalls).toBe(5);
    expect(processor.peakConcurrency).toBe(1);
  });

  test('raising the thread count of a serial-only processor fails before any trigger', async () => {
    const processor = new SplitLinesProcessor();
    const harness = await createHarness(processor);
    harness.enqueueContent('a\nb');

    expect(() => harness.setThreadCount(2)).toThrow(HarnessConfigurationError);
    expect(harness.getInvocationCount()).toBe(0);
    harness.assertQueueNotEmpty();
  });

  test('controller service state machine', async () => {
    const harness = await createHarness(new RecordingProcessor());
    const service = new RecordingService();

    await harness.addControllerService('rec', service, { 'record-prefix': 'rx' });
    await harness.enableControllerService('rec');

    await expect(harness.removeControllerService('rec')).rejects.toThrow(
      ServiceStateError,
    );
    expect(() => harness.setServiceProperty('rec', 'mode', 'fast')).toThrow(
      ServiceStateError,
    );

    await harness.disableControllerService('rec');
    expect(harness.setServiceProperty('rec', 'mode', 'fast').valid).toBe(true);
    await harness.removeControllerService('rec');

    await harness.addControllerService('rec', new RecordingService());
    await expect(
      harness.addControllerService('rec', new RecordingService()),
    ).rejects.toThrow(ServiceRegistrationError);
  });

  test('every queued item reaches success in one run', async () => {
    const harness = await createHarness(new RecordingProcessor());

    for (let i = 0; i < 4; i++) {
      harness.enqueueContent(`item ${i}`);
    }

    await harness.run();

    harness.assertAllFlowFilesTransferred('success', 4);
    harness.assertQueueEmpty();
  });

  test('transfer counts are zero for relationships never seen', async () => {
    const harness = await createHarness(new RecordingProcessor());

    await harness.run();

    expect(harness.getTransferCount('retry')).toBe(0);
    harness.assertTransferCount('retry', 0);
  });

  test('one item, default run: each phase once and the item in success', async () => {
    const { logger } = Logger.createTestOptimizedLogger();
    const processor = new RecordingProcessor();
    const harness = await createHarness(processor, { logger });
    const phases: HarnessEventMap['lifecycle:invoked'][] = [];

    harness.on('lifecycle:invoked', (data) => {
      phases.push(data);
    });
    harness.enqueueContent('payload', { filename: 'a.txt' });

    await harness.run();

    expect(phases.map((p) => p.phase)).toEqual([
      'scheduled',
      'unscheduled',
      'stopped',
    ]);
    expect(processor.events).toEqual([
      'added',
      'scheduled',
      'trigger:1',
      'done:1',
      'unscheduled',
      'stopped',
    ]);

    const [flowFile] = harness.getFlowFilesForRelationship('success');
    expect(harness.getFlowFilesForRelationship('success')).toHaveLength(1);
    flowFile?.assertAttributeEquals('filename', 'a.txt');
    flowFile?.assertContentEquals('payload');
  });

  test('a failing only trigger fails the run with its cause', async () => {
    const harness = await createHarness(
      new RecordingProcessor({ failOnTrigger: [1] }),
    );
    const failures: HarnessEventMap['run:failed'][] = [];

    harness.on('run:failed', (data) => {
      failures.push(data);
    });

    const error = await harness.run(1).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TriggerFailureError);

    if (error instanceof TriggerFailureError) {
      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause instanceof Error && error.cause.message).toBe(
        'trigger 1 failed',
      );
    }

    expect(harness.getInvocationCount()).toBe(1);
    expect(failures.map((f) => f.error)).toEqual([error]);
  });
});
