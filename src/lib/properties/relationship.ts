import { InvalidNameError } from '../errors';

export interface Relationship {
  readonly name: string;
  readonly description?: string;
}

/** A relationship or its name */
export type RelationshipRef = Relationship | string;

export function createRelationship(
  name: string,
  description?: string,
): Relationship {
  if (name.trim().length === 0) {
    throw new InvalidNameError({ name, kind: 'relationship' });
  }

  return Object.freeze({ name, description });
}

export function relationshipName(ref: RelationshipRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

export const REL_SUCCESS = createRelationship(
  'success',
  'Flow files that were processed successfully',
);

export const REL_FAILURE = createRelationship(
  'failure',
  'Flow files that could not be processed',
);
