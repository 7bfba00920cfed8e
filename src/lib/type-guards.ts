/**
 * Type guards shared across the harness.
 */

export function isFunction(
  value: unknown,
): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

/**
 * True for anything thenable: native promises and promise-likes alike
 */
export function isPromise(value: unknown): value is Promise<unknown> {
  if (value === null) {
    return false;
  }

  if (typeof value !== 'object' && typeof value !== 'function') {
    return false;
  }

  return typeof Reflect.get(value, 'then') === 'function';
}

/**
 * `typeof value === 'number'` minus NaN
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isPositiveInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value) && value >= 1;
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
