import { describe, expect, test } from 'vitest';
import { colorize } from './color';

describe('colorize', () => {
  test.each(['error', 'warn', 'notice', 'success', 'info', 'debug'] as const)(
    'keeps the %s text intact',
    (type) => {
      expect(colorize(type, 'Trigger finished')).toContain('Trigger finished');
    },
  );
});
