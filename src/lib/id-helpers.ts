import { v4 as uuidV4, validate as uuidValidate, version as uuidVersion } from 'uuid';
import { ulid } from 'ulid';

/**
 * Identifier flavours used by the harness:
 *
 * - **`uuid4`**: random UUID, used for the `uuid` attribute of every flow file
 *   and for generated harness identifiers
 * - **`ulid`**: time-sortable, used for run IDs so log entries of consecutive
 *   runs sort in order
 */
export type IdentifierType = 'uuid4' | 'ulid';

export const IDENTIFIER_TYPES = ['uuid4', 'ulid'] as const;

const ULID_PATTERN = /^[0-7][0-9A-HJKMNP-TV-Z]{25}$/i;

function assertIdentifierType(type: unknown): asserts type is IdentifierType {
  if (!IDENTIFIER_TYPES.some((candidate) => candidate === type)) {
    throw new TypeError(
      `Invalid ID type given: "${String(type)}". Expected one of: ${IDENTIFIER_TYPES.join(', ')}`,
    );
  }
}

/**
 * Generate an identifier of the given type.
 *
 * @param seedTime - ULID only: timestamp in milliseconds to encode
 */
export function generateID(type: IdentifierType, seedTime?: number): string {
  assertIdentifierType(type);

  if (type === 'uuid4') {
    return uuidV4();
  }

  if (seedTime !== undefined) {
    if (!Number.isFinite(seedTime) || seedTime < 0) {
      throw new TypeError(
        `seedTime must be a non-negative finite number (milliseconds), got: ${seedTime}`,
      );
    }

    return ulid(seedTime);
  }

  return ulid();
}

export function validateID(type: IdentifierType, id: string): boolean {
  assertIdentifierType(type);

  if (type === 'uuid4') {
    return uuidValidate(id) && uuidVersion(id) === 4;
  }

  return ULID_PATTERN.test(id);
}
