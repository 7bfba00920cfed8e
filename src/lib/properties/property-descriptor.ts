import type { ZodTypeAny } from 'zod';
import { HarnessConfigurationError, InvalidNameError } from '../errors';
import { invalidResult, validResult } from './validation';
import type { ValidationResult } from './validation';

export interface AllowableValue {
  readonly value: string;
  readonly displayName?: string;
  readonly description?: string;
}

export interface PropertyDescriptor {
  readonly name: string;
  readonly displayName: string;
  readonly description?: string;
  readonly required: boolean;
  readonly defaultValue?: string;
  readonly allowableValues?: readonly AllowableValue[];
  readonly sensitive: boolean;
  /** Parsed against the raw string value, e.g. `z.coerce.number().int().min(1)` */
  readonly schema?: ZodTypeAny;
}

export interface PropertyDescriptorOptions {
  name: string;
  displayName?: string;
  description?: string;
  required?: boolean;
  defaultValue?: string;
  allowableValues?: ReadonlyArray<AllowableValue | string>;
  sensitive?: boolean;
  schema?: ZodTypeAny;
}

/** A descriptor or its name */
export type PropertyRef = PropertyDescriptor | string;

export function propertyName(ref: PropertyRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

const SENSITIVE_MASK = '********';

export function definePropertyDescriptor(
  options: PropertyDescriptorOptions,
): PropertyDescriptor {
  if (options.name.trim().length === 0) {
    throw new InvalidNameError({ name: options.name, kind: 'property' });
  }

  const allowableValues = options.allowableValues?.map((entry) =>
    typeof entry === 'string' ? { value: entry } : entry,
  );

  if (
    allowableValues &&
    options.defaultValue !== undefined &&
    !allowableValues.some((entry) => entry.value === options.defaultValue)
  ) {
    throw new HarnessConfigurationError(
      `Default value "${options.defaultValue}" of property "${options.name}" is not an allowable value`,
      { property: options.name },
    );
  }

  return Object.freeze({
    name: options.name,
    displayName: options.displayName ?? options.name,
    description: options.description,
    required: options.required ?? false,
    defaultValue: options.defaultValue,
    allowableValues,
    sensitive: options.sensitive ?? false,
    schema: options.schema,
  });
}

/**
 * Checks a configured value (falling back to the default) against the
 * descriptor: required, then allowable values, then the schema.
 * Sensitive inputs are masked in the result.
 */
export function validatePropertyValue(
  descriptor: PropertyDescriptor,
  value: string | undefined,
): ValidationResult {
  const subject = descriptor.displayName;
  const effective = value ?? descriptor.defaultValue;
  const input =
    effective !== undefined && descriptor.sensitive ? SENSITIVE_MASK : effective;

  if (effective === undefined) {
    return descriptor.required
      ? invalidResult(subject, undefined, `${subject} is required`)
      : validResult(subject);
  }

  if (
    descriptor.allowableValues &&
    !descriptor.allowableValues.some((entry) => entry.value === effective)
  ) {
    const allowed = descriptor.allowableValues
      .map((entry) => entry.value)
      .join(', ');

    return invalidResult(
      subject,
      input,
      `Given value not found in allowed set '${allowed}'`,
    );
  }

  if (descriptor.schema) {
    const parsed = descriptor.schema.safeParse(effective);

    if (!parsed.success) {
      return invalidResult(
        subject,
        input,
        parsed.error.issues.map((issue) => issue.message).join('; '),
      );
    }
  }

  return validResult(subject, input);
}
