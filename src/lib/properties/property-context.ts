import type { ControllerServiceLookup } from '../services/types';
import type { LifecycleArgument } from '../lifecycle/phases';
import { PropertyValue } from './property-value';
import { propertyName } from './property-descriptor';
import type { PropertyDescriptor, PropertyRef } from './property-descriptor';

/**
 * Read-only view over configured values, keyed by property name. Values not
 * configured fall back to the descriptor's default.
 */
export class PropertyContext {
  protected readonly descriptors: ReadonlyMap<string, PropertyDescriptor>;
  protected readonly values: ReadonlyMap<string, string>;

  constructor(
    descriptors: readonly PropertyDescriptor[],
    values: ReadonlyMap<string, string>,
  ) {
    this.descriptors = new Map(
      descriptors.map((descriptor) => [descriptor.name, descriptor]),
    );
    this.values = new Map(values);
  }

  public getProperty(ref: PropertyRef): PropertyValue {
    const name = propertyName(ref);
    const configured = this.values.get(name);

    if (configured !== undefined) {
      return new PropertyValue(configured);
    }

    const descriptor =
      typeof ref === 'string' ? this.descriptors.get(name) : ref;

    return new PropertyValue(descriptor?.defaultValue);
  }

  /**
   * Only what was explicitly configured, without defaults
   */
  public getConfiguredValues(): ReadonlyMap<string, string> {
    return this.values;
  }

  /**
   * Every known property with its effective value (configured or default)
   */
  public getProperties(): Map<string, string | undefined> {
    const properties = new Map<string, string | undefined>();

    for (const [name, descriptor] of this.descriptors) {
      properties.set(name, this.values.get(name) ?? descriptor.defaultValue);
    }

    for (const [name, value] of this.values) {
      if (!properties.has(name)) {
        properties.set(name, value);
      }
    }

    return properties;
  }
}

/**
 * Handed to `enabled` hooks of a controller service
 */
export class MockConfigurationContext
  extends PropertyContext
  implements LifecycleArgument
{
  public readonly kind = 'configuration-context';
  private readonly identifier: string;
  private readonly lookup: ControllerServiceLookup;

  constructor(options: {
    identifier: string;
    descriptors: readonly PropertyDescriptor[];
    values: ReadonlyMap<string, string>;
    lookup: ControllerServiceLookup;
  }) {
    super(options.descriptors, options.values);
    this.identifier = options.identifier;
    this.lookup = options.lookup;
  }

  public getIdentifier(): string {
    return this.identifier;
  }

  public getControllerServiceLookup(): ControllerServiceLookup {
    return this.lookup;
  }
}

/**
 * Handed to `validate` of services and `customValidate` of processors
 */
export class MockValidationContext extends PropertyContext {
  private readonly lookup: ControllerServiceLookup;

  constructor(options: {
    descriptors: readonly PropertyDescriptor[];
    values: ReadonlyMap<string, string>;
    lookup: ControllerServiceLookup;
  }) {
    super(options.descriptors, options.values);
    this.lookup = options.lookup;
  }

  public isControllerServiceEnabled(identifier: string): boolean {
    return this.lookup.isControllerServiceEnabled(identifier);
  }

  public getControllerServiceLookup(): ControllerServiceLookup {
    return this.lookup;
  }
}
