/**
 * Validation functions for tags
 */

import {InvalidArgumentError, requirePresent} from '../errors.js';
import {Tag} from './tag.js';

/**
 * Type guard for tags
 */
export function isTag(value: unknown): value is Tag {
  return value instanceof Tag;
}

/**
 * Validate a tag name
 *
 * @throws {InvalidArgumentError} If the name is not a non-blank string
 */
export function validateTagName(name: unknown): asserts name is string {
  if (typeof name !== 'string') {
    throw new InvalidArgumentError(`Tag name must be a string, got ${name === null ? 'null' : typeof name}`);
  }
  if (name.trim() === '') {
    throw new InvalidArgumentError('Tag name must not be blank');
  }
}

/**
 * Validate a collection of tags and copy it into a fresh Set
 *
 * @throws {InvalidArgumentError} If the collection is missing or holds anything but tags
 */
export function validateTags(tags: Iterable<unknown> | null | undefined): Set<Tag> {
  const present = requirePresent(tags, 'tags');
  const result = new Set<Tag>();
  let index = 0;
  for (const tag of present) {
    if (!isTag(tag)) {
      throw new InvalidArgumentError(`Tag at index ${index} is not a Tag`);
    }
    result.add(tag);
    index++;
  }
  return result;
}
