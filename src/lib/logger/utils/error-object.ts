import { errorToString } from '../../error-to-string';
import { DOUBLE_EOL } from '../../constants';

/**
 * Build the message for an errorObject() call: optional prefix line, then the error table
 */
export function prepareErrorObjectLog(prefix: string, error: unknown): string {
  const trimmed = prefix.trim();
  const prefixLine = trimmed.length > 0 ? trimmed + ':' + DOUBLE_EOL : '';

  return prefixLine + errorToString(error);
}
