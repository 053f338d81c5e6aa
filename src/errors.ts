/**
 * Errors raised by the stack, its items and its containers.
 *
 * Routine misses (empty stack, no matching item) are not errors: those
 * operations return `undefined`.
 */

export abstract class TaggedStackError extends Error {
  override name = 'TaggedStackError';
}

/**
 * A required argument was missing or malformed. Always thrown before any state changes.
 */
export class InvalidArgumentError extends TaggedStackError {
  override name = 'InvalidArgumentError';
}

/**
 * A fail-fast cursor saw the container change underneath it.
 */
export class ConcurrentModificationError extends TaggedStackError {
  override name = 'ConcurrentModificationError';

  constructor(containerName: string) {
    super(`${containerName} was modified during traversal`);
  }
}

/**
 * Throw an InvalidArgumentError when value is null or undefined
 */
export function requirePresent<V>(value: V | null | undefined, argument: string): V {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`${argument} must not be ${value === null ? 'null' : 'undefined'}`);
  }
  return value;
}
