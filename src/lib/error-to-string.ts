import { KeyValueTextTable } from './text-table';
import { isPlainObject } from './type-guards';

export interface ErrorToStringOptions {
  /** Append the stack trace (default: true) */
  includeStack?: boolean;
}

function safeStringify(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
    case 'undefined':
      return String(value);
    case 'symbol':
      return value.toString();
    case 'function':
      return '[Function]';
    case 'object':
      if (value === null) {
        return 'null';
      }

      if (value instanceof Error) {
        return value.message;
      }

      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
  }
}

function hasContent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

function describeError(
  error: unknown,
  options: Required<ErrorToStringOptions>,
): KeyValueTextTable {
  const table = new KeyValueTextTable();

  if (error === null || typeof error !== 'object') {
    table.addRow('Value', safeStringify(error));
    return table;
  }

  const inlineFields: Array<[label: string, key: string]> = [
    ['Message', 'message'],
    ['Name', 'name'],
    ['Code', 'code'],
    ['Prefix', 'errPrefix'],
    ['Type', 'errType'],
    ['ErrCode', 'errCode'],
  ];

  for (const [label, key] of inlineFields) {
    const value: unknown = Reflect.get(error, key);

    if (hasContent(value)) {
      table.addRow(label, safeStringify(value));
    }
  }

  const additionalInfo: unknown = Reflect.get(error, 'additionalInfo');

  if (isPlainObject(additionalInfo)) {
    for (const [key, value] of Object.entries(additionalInfo)) {
      table.addRow(`AdditionalInfo.${key}`, safeStringify(value));
    }
  }

  const cause: unknown = Reflect.get(error, 'cause');

  if (hasContent(cause)) {
    table.addValueOnSeparateRow(
      'Cause',
      describeError(cause, options).toString(),
    );
  }

  const stack: unknown = Reflect.get(error, 'stack');

  if (options.includeStack && hasContent(stack)) {
    table.addValueOnSeparateRow('Stack', safeStringify(stack));
  }

  return table;
}

/**
 * Render an error (or anything thrown) as a key/value text table, following
 * the `cause` chain. Recognises the `errPrefix`/`errType`/`errCode`/
 * `additionalInfo` fields carried by harness errors.
 */
export function errorToString(
  error: unknown,
  options: ErrorToStringOptions = {},
): string {
  return describeError(error, {
    includeStack: options.includeStack ?? true,
  }).toString();
}
