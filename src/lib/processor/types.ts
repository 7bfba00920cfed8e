import type { LoggerService } from '../logger';
import type { MockSession } from '../flow/mock-session';
import type { LifecycleArgument } from '../lifecycle/phases';
import type { PropertyDescriptor, PropertyRef } from '../properties/property-descriptor';
import type { MockValidationContext } from '../properties/property-context';
import type { PropertyValue } from '../properties/property-value';
import type { Relationship } from '../properties/relationship';
import type { ValidationResult } from '../properties/validation';
import type { ControllerService, ControllerServiceLookup } from '../services/types';

export interface ProcessorInitializationContext {
  identifier: string;
  /** Scoped to the processor name */
  logger: LoggerService;
  lookup: ControllerServiceLookup;
}

/**
 * What a processor may do with a session
 */
export type ProcessSession = Pick<
  MockSession,
  | 'get'
  | 'getBatch'
  | 'create'
  | 'clone'
  | 'importFrom'
  | 'importStream'
  | 'write'
  | 'read'
  | 'putAttribute'
  | 'putAllAttributes'
  | 'removeAttribute'
  | 'transfer'
  | 'remove'
  | 'penalize'
  | 'adjustCounter'
  | 'getProvenanceReporter'
  | 'commit'
  | 'rollback'
>;

export interface SessionFactory {
  createSession(): ProcessSession;
}

export interface ProcessContext extends LifecycleArgument {
  readonly kind: 'process-context';
  getProperty(ref: PropertyRef): PropertyValue;
  getProperties(): Map<string, string | undefined>;
  getAnnotationData(): string | undefined;
  getAvailableRelationships(): Relationship[];
  getMaxConcurrentTasks(): number;
  getControllerService(identifier: string): ControllerService | undefined;
  getControllerServiceLookup(): ControllerServiceLookup;
}

/**
 * Unit of stream-processing logic driven by the harness. Lifecycle hooks
 * (`added`, `scheduled`, `unscheduled`, `stopped`, `shutdown`) are declared
 * with `declareLifecycleHooks`.
 */
export interface Processor {
  /** Read once when the harness is created; forbids more than one concurrent trigger */
  readonly triggerSerially?: boolean;
  getName(): string;
  initialize(context: ProcessorInitializationContext): void;
  getRelationships(): readonly Relationship[];
  getPropertyDescriptors(): readonly PropertyDescriptor[];
  getPropertyDescriptor(name: string): PropertyDescriptor | undefined;
  customValidate?(context: MockValidationContext): ValidationResult[];
  onTrigger(
    context: ProcessContext,
    sessionFactory: SessionFactory,
  ): void | Promise<void>;
}
