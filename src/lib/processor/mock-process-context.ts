import { HarnessAssertionError } from '../errors';
import { MockValidationContext } from '../properties/property-context';
import { PropertyValue } from '../properties/property-value';
import {
  propertyName,
  validatePropertyValue,
} from '../properties/property-descriptor';
import type { PropertyRef } from '../properties/property-descriptor';
import {
  unknownPropertyResult,
  validateConfiguredProperties,
} from '../properties/configured-properties';
import { relationshipName } from '../properties/relationship';
import type { Relationship, RelationshipRef } from '../properties/relationship';
import { formatValidationResult, invalidResults } from '../properties/validation';
import type { ValidationResult } from '../properties/validation';
import type {
  ControllerService,
  ControllerServiceLookup,
} from '../services/types';
import type { ProcessContext, Processor } from './types';

/**
 * Processor configuration as seen by the processor at run time, and as
 * edited by the harness between runs.
 */
export class MockProcessContext implements ProcessContext {
  public readonly kind = 'process-context';
  private readonly processor: Processor;
  private readonly lookup: ControllerServiceLookup;
  private readonly values = new Map<string, string>();
  private readonly unavailableRelationships = new Set<string>();
  private annotationData?: string;
  private maxConcurrentTasks = 1;

  constructor(options: { processor: Processor; lookup: ControllerServiceLookup }) {
    this.processor = options.processor;
    this.lookup = options.lookup;
  }

  /**
   * Store the value and return its validation result. Names the processor
   * doesn't support store nothing and come back invalid.
   */
  public setProperty(ref: PropertyRef, value: string): ValidationResult {
    const descriptor =
      typeof ref === 'string' ? this.processor.getPropertyDescriptor(ref) : ref;

    if (!descriptor) {
      return unknownPropertyResult(propertyName(ref), this.processor.getName());
    }

    this.values.set(descriptor.name, value);
    return validatePropertyValue(descriptor, value);
  }

  public removeProperty(ref: PropertyRef): boolean {
    return this.values.delete(propertyName(ref));
  }

  public getProperty(ref: PropertyRef): PropertyValue {
    const name = propertyName(ref);
    const configured = this.values.get(name);

    if (configured !== undefined) {
      return new PropertyValue(configured);
    }

    const descriptor =
      typeof ref === 'string' ? this.processor.getPropertyDescriptor(name) : ref;

    return new PropertyValue(descriptor?.defaultValue);
  }

  public getProperties(): Map<string, string | undefined> {
    return this.createValidationContext().getProperties();
  }

  public setAnnotationData(annotationData: string): void {
    this.annotationData = annotationData;
  }

  public getAnnotationData(): string | undefined {
    return this.annotationData;
  }

  public setRelationshipAvailable(ref: RelationshipRef): void {
    this.unavailableRelationships.delete(relationshipName(ref));
  }

  public setRelationshipUnavailable(ref: RelationshipRef): void {
    this.unavailableRelationships.add(relationshipName(ref));
  }

  public getAvailableRelationships(): Relationship[] {
    return this.processor
      .getRelationships()
      .filter((relationship) => !this.unavailableRelationships.has(relationship.name));
  }

  public setMaxConcurrentTasks(count: number): void {
    this.maxConcurrentTasks = count;
  }

  public getMaxConcurrentTasks(): number {
    return this.maxConcurrentTasks;
  }

  public getControllerService(identifier: string): ControllerService | undefined {
    return this.lookup.getControllerService(identifier);
  }

  public getControllerServiceLookup(): ControllerServiceLookup {
    return this.lookup;
  }

  public validate(): ValidationResult[] {
    const results = validateConfiguredProperties(
      this.processor.getPropertyDescriptors(),
      this.values,
      this.processor.getName(),
    );

    if (this.processor.customValidate) {
      results.push(...this.processor.customValidate(this.createValidationContext()));
    }

    return results;
  }

  public isValid(): boolean {
    return invalidResults(this.validate()).length === 0;
  }

  public assertValid(): void {
    const invalid = invalidResults(this.validate());

    if (invalid.length > 0) {
      throw new HarnessAssertionError(
        `Processor "${this.processor.getName()}" is not valid:\n${invalid
          .map((result) => `  ${formatValidationResult(result)}`)
          .join('\n')}`,
        { expected: 'valid', actual: invalid },
      );
    }
  }

  public assertNotValid(): void {
    if (this.isValid()) {
      throw new HarnessAssertionError(
        `Expected processor "${this.processor.getName()}" to be invalid but it is valid`,
        { expected: 'invalid', actual: 'valid' },
      );
    }
  }

  private createValidationContext(): MockValidationContext {
    return new MockValidationContext({
      descriptors: this.processor.getPropertyDescriptors(),
      values: this.values,
      lookup: this.lookup,
    });
  }
}
