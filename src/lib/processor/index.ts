export type {
  ProcessContext,
  ProcessSession,
  Processor,
  ProcessorInitializationContext,
  SessionFactory,
} from './types';
export { MockProcessContext } from './mock-process-context';
export { BaseProcessor, type BaseProcessorOptions } from './base-processor';
