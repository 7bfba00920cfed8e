import { validatePropertyValue } from './property-descriptor';
import type { PropertyDescriptor } from './property-descriptor';
import { invalidResult } from './validation';
import type { ValidationResult } from './validation';

/**
 * Validate every supported descriptor against the configured values, and
 * flag configured names no descriptor supports.
 */
export function validateConfiguredProperties(
  descriptors: readonly PropertyDescriptor[],
  values: ReadonlyMap<string, string>,
  targetName: string,
): ValidationResult[] {
  const results = descriptors.map((descriptor) =>
    validatePropertyValue(descriptor, values.get(descriptor.name)),
  );

  const supported = new Set(descriptors.map((descriptor) => descriptor.name));

  for (const name of values.keys()) {
    if (!supported.has(name)) {
      results.push(
        invalidResult(
          name,
          undefined,
          `"${name}" is not a supported property of ${targetName}`,
        ),
      );
    }
  }

  return results;
}

/**
 * Result returned when setting a property no descriptor knows about;
 * nothing is stored.
 */
export function unknownPropertyResult(
  name: string,
  targetName: string,
): ValidationResult {
  return invalidResult(
    'Invalid property',
    name,
    `${name} is not a known property of ${targetName}`,
  );
}
