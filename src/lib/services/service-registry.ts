import {
  ServiceRegistrationError,
  ServiceStateError,
  UnknownPropertyError,
  UnknownServiceError,
  toError,
} from '../errors';
import type { ServiceOperation } from '../errors';
import { LifecycleInvoker } from '../lifecycle/lifecycle-invoker';
import type { Logger, LoggerService } from '../logger';
import {
  MockConfigurationContext,
  MockValidationContext,
} from '../properties/property-context';
import {
  propertyName,
  validatePropertyValue,
} from '../properties/property-descriptor';
import type { PropertyRef } from '../properties/property-descriptor';
import { unknownPropertyResult } from '../properties/configured-properties';
import type { ValidationResult } from '../properties/validation';
import type {
  ControllerService,
  ControllerServiceLookup,
  ServiceRegistration,
} from './types';

export interface ServiceRegistryOptions {
  /** Root logger; each service gets `logger.service(identifier)` */
  logger: Logger;
  /** Where the registry itself logs. Defaults to `logger.service('service-registry')` */
  log?: LoggerService;
  invoker?: LifecycleInvoker;
}

/**
 * Owns controller-service registrations and their state machine:
 *
 * ```text
 * add ──> disabled ──enable──> enabled
 *            ^  <──disable──────┘
 *            └──remove──> (gone)
 * ```
 *
 * Configuration (properties, annotation data) may only change while a
 * service is disabled. Lifecycle hooks run through the invoker; a failing
 * hook leaves the state as documented per operation. An identifier is
 * reserved for the whole of an `add`/`enable`/`disable`/`remove`, so an
 * overlapping operation on it is rejected rather than run twice.
 */
export class ServiceRegistry implements ControllerServiceLookup {
  private readonly registrations = new Map<string, ServiceRegistration>();
  private readonly transitions = new Map<string, ServiceOperation>();
  private readonly logger: Logger;
  private readonly log: LoggerService;
  private readonly invoker: LifecycleInvoker;

  constructor(options: ServiceRegistryOptions) {
    this.logger = options.logger;
    this.log = options.log ?? options.logger.service('service-registry');
    this.invoker = options.invoker ?? new LifecycleInvoker({ logger: this.log });
  }

  /**
   * Initialize the service, resolve its initial properties, fire `added`,
   * then store it disabled. Nothing is stored when any step fails.
   */
  public async add(
    identifier: string,
    service: ControllerService,
    properties: Record<string, string> = {},
  ): Promise<void> {
    if (this.registrations.has(identifier)) {
      throw new ServiceRegistrationError(
        `A controller service is already registered as "${identifier}"`,
        { identifier },
      );
    }

    if (this.transitions.has(identifier)) {
      throw new ServiceRegistrationError(
        `A controller service is already being added as "${identifier}"`,
        { identifier },
      );
    }

    this.transitions.set(identifier, 'add');

    try {
      await this.addReserved(identifier, service, properties);
    } finally {
      this.transitions.delete(identifier);
    }
  }

  /**
   * Fire `enabled` with a configuration context; the service stays disabled
   * when a hook fails.
   */
  public async enable(identifier: string): Promise<void> {
    const registration = this.beginTransition(identifier, 'enable');

    try {
      if (registration.enabled) {
        throw new ServiceStateError({
          identifier,
          operation: 'enable',
          enabled: true,
        });
      }

      await this.invoker.invoke(
        'enabled',
        registration.service,
        this.createConfigurationContext(registration),
      );

      registration.enabled = true;

      this.log.info('Enabled controller service {{identifier}}', {
        params: { identifier },
      });
    } finally {
      this.transitions.delete(identifier);
    }
  }

  /**
   * Fire `disabled`. The service ends up disabled even when a hook fails;
   * the failure is raised afterwards.
   */
  public async disable(identifier: string): Promise<void> {
    const registration = this.beginTransition(identifier, 'disable');

    try {
      if (!registration.enabled) {
        throw new ServiceStateError({
          identifier,
          operation: 'disable',
          enabled: false,
        });
      }

      try {
        await this.invoker.invoke('disabled', registration.service);
      } finally {
        registration.enabled = false;

        this.log.info('Disabled controller service {{identifier}}', {
          params: { identifier },
        });
      }
    } finally {
      this.transitions.delete(identifier);
    }
  }

  /**
   * Fire `removed` then forget the service. Must be disabled first; a
   * failing hook keeps the registration.
   */
  public async remove(identifier: string): Promise<void> {
    const registration = this.beginTransition(identifier, 'remove');

    try {
      if (registration.enabled) {
        throw new ServiceStateError({
          identifier,
          operation: 'remove',
          enabled: true,
        });
      }

      await this.invoker.invoke('removed', registration.service);

      this.registrations.delete(identifier);

      this.log.info('Removed controller service {{identifier}}', {
        params: { identifier },
      });
    } finally {
      this.transitions.delete(identifier);
    }
  }

  /**
   * Store a property value and return its validation result. Unknown
   * property names store nothing and return an invalid result.
   */
  public setProperty(
    identifier: string,
    ref: PropertyRef,
    value: string,
  ): ValidationResult {
    const registration = this.requireDisabled(identifier, 'setProperty');
    const descriptor =
      typeof ref === 'string'
        ? registration.service.getPropertyDescriptor(ref)
        : ref;

    if (!descriptor) {
      return unknownPropertyResult(propertyName(ref), identifier);
    }

    registration.properties.set(descriptor.name, value);

    return validatePropertyValue(descriptor, value);
  }

  /**
   * @returns Whether a value was configured
   */
  public removeProperty(identifier: string, ref: PropertyRef): boolean {
    const registration = this.requireDisabled(identifier, 'removeProperty');

    return registration.properties.delete(propertyName(ref));
  }

  public setAnnotationData(identifier: string, annotationData: string): void {
    const registration = this.requireDisabled(identifier, 'setAnnotationData');
    registration.annotationData = annotationData;
  }

  public has(identifier: string): boolean {
    return this.registrations.has(identifier);
  }

  public isEnabled(identifier: string): boolean {
    return this.require(identifier).enabled;
  }

  public getService(identifier: string): ControllerService {
    return this.require(identifier).service;
  }

  /**
   * Copy of the explicitly configured values
   */
  public getProperties(identifier: string): Map<string, string> {
    return new Map(this.require(identifier).properties);
  }

  /**
   * Configured value, else the descriptor default
   */
  public getProperty(identifier: string, ref: PropertyRef): string | undefined {
    const registration = this.require(identifier);
    const name = propertyName(ref);

    return (
      registration.properties.get(name) ??
      registration.service.getPropertyDescriptor(name)?.defaultValue
    );
  }

  public getAnnotationData(identifier: string): string | undefined {
    return this.require(identifier).annotationData;
  }

  public getIdentifiers(): string[] {
    return [...this.registrations.keys()];
  }

  public validate(identifier: string): ValidationResult[] {
    const registration = this.require(identifier);

    return registration.service.validate(
      new MockValidationContext({
        descriptors: registration.service.getPropertyDescriptors(),
        values: registration.properties,
        lookup: this,
      }),
    );
  }

  // ControllerServiceLookup, used by processors and services at run time

  public getControllerService(
    identifier: string,
  ): ControllerService | undefined {
    return this.registrations.get(identifier)?.service;
  }

  public isControllerServiceEnabled(identifier: string): boolean {
    return this.registrations.get(identifier)?.enabled ?? false;
  }

  public getControllerServiceIdentifiers(): string[] {
    return this.getIdentifiers();
  }

  private async addReserved(
    identifier: string,
    service: ControllerService,
    properties: Record<string, string>,
  ): Promise<void> {
    try {
      service.initialize({
        identifier,
        logger: this.logger.service(identifier),
        lookup: this,
      });
    } catch (error) {
      throw new ServiceRegistrationError(
        `Controller service "${identifier}" failed to initialize`,
        { identifier },
        toError(error),
      );
    }

    const resolved = new Map<string, string>();

    for (const [name, value] of Object.entries(properties)) {
      const descriptor = service.getPropertyDescriptor(name);

      if (!descriptor) {
        throw new UnknownPropertyError({
          propertyName: name,
          targetName: identifier,
        });
      }

      resolved.set(descriptor.name, value);
    }

    await this.invoker.invoke('added', service);

    this.registrations.set(identifier, {
      identifier,
      service,
      properties: resolved,
      enabled: false,
    });

    this.log.info('Added controller service {{identifier}}', {
      params: { identifier },
    });
  }

  private createConfigurationContext(
    registration: ServiceRegistration,
  ): MockConfigurationContext {
    return new MockConfigurationContext({
      identifier: registration.identifier,
      descriptors: registration.service.getPropertyDescriptors(),
      values: registration.properties,
      lookup: this,
    });
  }

  private require(identifier: string): ServiceRegistration {
    const registration = this.registrations.get(identifier);

    if (!registration) {
      throw new UnknownServiceError({ identifier });
    }

    return registration;
  }

  /**
   * Reserve a registered identifier for `operation`; the caller releases it
   */
  private beginTransition(
    identifier: string,
    operation: ServiceOperation,
  ): ServiceRegistration {
    const registration = this.require(identifier);

    this.rejectInProgress(registration, operation);
    this.transitions.set(identifier, operation);

    return registration;
  }

  private rejectInProgress(
    registration: ServiceRegistration,
    operation: ServiceOperation,
  ): void {
    const inProgress = this.transitions.get(registration.identifier);

    if (inProgress) {
      throw new ServiceStateError({
        identifier: registration.identifier,
        operation,
        enabled: registration.enabled,
        inProgress,
      });
    }
  }

  private requireDisabled(
    identifier: string,
    operation: ServiceOperation,
  ): ServiceRegistration {
    const registration = this.require(identifier);

    this.rejectInProgress(registration, operation);

    if (registration.enabled) {
      throw new ServiceStateError({ identifier, operation, enabled: true });
    }

    return registration;
  }
}
