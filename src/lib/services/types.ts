import type { LoggerService } from '../logger';
import type { PropertyDescriptor } from '../properties/property-descriptor';
import type { MockValidationContext } from '../properties/property-context';
import type { ValidationResult } from '../properties/validation';

export interface ControllerServiceInitializationContext {
  identifier: string;
  /** Scoped to the service identifier */
  logger: LoggerService;
  lookup: ControllerServiceLookup;
}

/**
 * Auxiliary component shared by processors (connection pools, lookups, ...).
 * Lifecycle hooks are declared with `declareLifecycleHooks` for the phases
 * `added`, `enabled`, `disabled` and `removed`.
 */
export interface ControllerService {
  initialize(context: ControllerServiceInitializationContext): void;
  getIdentifier(): string;
  getPropertyDescriptors(): readonly PropertyDescriptor[];
  getPropertyDescriptor(name: string): PropertyDescriptor | undefined;
  validate(context: MockValidationContext): ValidationResult[];
}

export interface ControllerServiceLookup {
  getControllerService(identifier: string): ControllerService | undefined;
  isControllerServiceEnabled(identifier: string): boolean;
  getControllerServiceIdentifiers(): string[];
}

export interface ServiceRegistration {
  readonly identifier: string;
  readonly service: ControllerService;
  properties: Map<string, string>;
  enabled: boolean;
  annotationData?: string;
}
