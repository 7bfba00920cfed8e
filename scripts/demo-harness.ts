/**
 * Demo script for ProcessorHarness
 * Runs a small processor against a lookup service and prints what happened,
 * with the harness logging to the console.
 *
 * Run with: npm run demo
 */

import {
  BaseProcessor,
  ConsoleSink,
  LogLevel,
  Logger,
  REL_FAILURE,
  REL_SUCCESS,
  createHarness,
  declareLifecycleHooks,
  definePropertyDescriptor,
} from '../src/index';
import type {
  ProcessContext,
  ProcessSession,
  Relationship,
  PropertyDescriptor,
} from '../src/index';

const GREETING = definePropertyDescriptor({
  name: 'greeting',
  displayName: 'Greeting',
  defaultValue: 'Hello',
});

class GreetProcessor extends BaseProcessor {
  constructor() {
    super({ name: 'greet' });
  }

  public getRelationships(): readonly Relationship[] {
    return [REL_SUCCESS, REL_FAILURE];
  }

  public getPropertyDescriptors(): readonly PropertyDescriptor[] {
    return [GREETING];
  }

  public onScheduled(context: ProcessContext): void {
    this.logger.info('Scheduled with greeting {{greeting}}', {
      params: { greeting: context.getProperty(GREETING).getValue() },
    });
  }

  public onStopped(): void {
    this.logger.info('Stopped');
  }

  protected onTriggerSession(context: ProcessContext, session: ProcessSession): void {
    const flowFile = session.get();

    if (!flowFile) {
      return;
    }

    const name = flowFile.getContentAsString().trim();

    if (name.length === 0) {
      session.transfer(session.penalize(flowFile), REL_FAILURE);
      return;
    }

    const greeting = context.getProperty(GREETING).getValue() ?? 'Hello';
    session.transfer(session.write(flowFile, `${greeting}, ${name}!`), REL_SUCCESS);
  }
}

declareLifecycleHooks(GreetProcessor, {
  scheduled: [{ method: 'onScheduled', parameters: ['process-context'] }],
  stopped: [{ method: 'onStopped' }],
});

console.log('='.repeat(60));
console.log('ProcessorHarness Demo');
console.log('='.repeat(60));
console.log();

const logger = new Logger({
  sinks: [new ConsoleSink({ minLevel: LogLevel.DEBUG })],
});

const harness = await createHarness(new GreetProcessor(), {
  logger,
  threadCount: 2,
});

harness.on('run:completed', (summary) => {
  console.log(
    `Run ${summary.runID} finished: ${summary.succeeded} succeeded, ${summary.failed} failed in ${summary.durationMS}ms`,
  );
});

harness.setProperty(GREETING, 'Howdy');
harness.enqueueContent('Ada');
harness.enqueueContent('Grace');
harness.enqueueContent('   ');

console.log('Running 3 iterations on 2 threads');
console.log('-'.repeat(60));
await harness.run(3);
console.log();

console.log('Results:');

for (const flowFile of harness.getFlowFilesForRelationship(REL_SUCCESS)) {
  console.log(`  success: ${flowFile.getContentAsString()}`);
}

console.log(`  failure: ${harness.getTransferCount(REL_FAILURE)} flow file(s)`);
console.log(`  queue empty: ${harness.isQueueEmpty()}`);
console.log();

await harness.shutdown();
await logger.close();

console.log('='.repeat(60));
console.log('Demo complete!');
console.log('='.repeat(60));
