import {isDeepStrictEqual} from 'node:util';
import {InvalidArgumentError, requirePresent} from './errors.js';
import {Tag} from './tags/tag.js';
import {ReadonlyTagSet} from './tags/tagSet.js';

/**
 * Immutable value + tag set pair kept on a tagged stack
 *
 * Equality is structural: values deep-strict-equal and the same tags.
 * Items hold no reference to the stack they sit on, so an item popped from
 * one stack can be pushed onto another.
 */
export class StackItem<T> {
  readonly value: T;
  readonly tags: ReadonlyTagSet;

  /**
   * @param value Carried value, must not be null or undefined
   * @param tags Tags of the item, may be empty but must be present
   * @throws {InvalidArgumentError} If value or tags are missing, or tags holds a non-Tag
   */
  constructor(value: T, tags: Iterable<Tag>) {
    this.value = requirePresent(value, 'value');
    this.tags = tags instanceof ReadonlyTagSet ? tags : new ReadonlyTagSet(requirePresent(tags, 'tags'));
    Object.freeze(this);
  }

  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof StackItem)) {
      return false;
    }
    return this.tags.equals(other.tags) && isDeepStrictEqual(this.value, other.value);
  }

  /**
   * 32-bit hash of the value; tags are left out, which keeps it consistent with equals
   */
  hash(): number {
    return fnv1a(canonicalise(this.value));
  }

  toString(): string {
    return `StackItem(${renderValue(this.value)};${this.tags})`;
  }
}

/**
 * Create an item from a value and tags given as arguments
 */
export function itemOf<V>(value: V, ...tags: Tag[]): StackItem<V> {
  return new StackItem(value, tags);
}

/**
 * Create an item from a value and the union of several tag collections
 */
export function itemOfAll<V>(value: V, ...tagCollections: Iterable<Tag>[]): StackItem<V> {
  const union = new Set<Tag>();
  tagCollections.forEach((collection, index) => {
    if (collection === null || collection === undefined) {
      throw new InvalidArgumentError(`Tag collection at index ${index} must be present`);
    }
    for (const tag of collection) {
      union.add(tag);
    }
  });
  return new StackItem(value, union);
}

/**
 * Render a value to a string that deep-equal values share
 *
 * Object keys are sorted, Map and Set entries too. A reference back to an
 * object still being rendered becomes `[Circular]`; shared but acyclic
 * sub-objects are rendered in full at every place they occur.
 */
function canonicalise(value: unknown, ancestors = new WeakSet<object>()): string {
  if (typeof value === 'string') {
    return `string:${JSON.stringify(value)}`;
  }
  if (typeof value === 'function') {
    return `function:${value.name}`;
  }
  if (value === null || typeof value !== 'object') {
    return `${typeof value}:${String(value)}`;
  }
  if (ancestors.has(value)) {
    return '[Circular]';
  }
  ancestors.add(value);
  try {
    if (value instanceof Date) {
      return `date:${value.getTime()}`;
    }
    if (value instanceof RegExp) {
      return `regexp:${String(value)}`;
    }
    if (Array.isArray(value)) {
      return `[${value.map((element) => canonicalise(element, ancestors)).join(',')}]`;
    }
    if (value instanceof Map) {
      const entries = Array.from(value, ([key, entry]) => `${canonicalise(key, ancestors)}=>${canonicalise(entry, ancestors)}`);
      return `map{${entries.sort().join(',')}}`;
    }
    if (value instanceof Set) {
      const members = Array.from(value, (member) => canonicalise(member, ancestors));
      return `set{${members.sort().join(',')}}`;
    }
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalise(Reflect.get(value, key), ancestors)}`);
    return `{${fields.join(',')}}`;
  } finally {
    ancestors.delete(value);
  }
}

// FNV-1a over UTF-16 code units
function fnv1a(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h | 0;
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
