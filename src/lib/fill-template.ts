const PLACEHOLDER_PATTERN = /{{\s*([\w.]+)\s*}}/g;

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (value instanceof Error) {
    return value.message;
  }

  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[Unserializable]';
    }
  }

  return String(value);
}

function lookup(params: Record<string, unknown>, path: string): unknown {
  let current: unknown = params;

  for (const part of path.split('.')) {
    if (current === null || typeof current !== 'object' || !(part in current)) {
      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

/**
 * Replace `{{name}}` and `{{nested.key}}` placeholders with values from
 * `params`. Missing values render as `fallback`.
 *
 * ```typescript
 * fillTemplate('Run {{runID}} finished', { runID: 'abc' }); // "Run abc finished"
 * ```
 */
export function fillTemplate(
  template: string,
  params: Record<string, unknown> = {},
  fallback = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER_PATTERN, (_match, path: string) => {
    const value = lookup(params, path);

    if (value === undefined || value === null) {
      return fallback;
    }

    return formatValue(value);
  });
}
