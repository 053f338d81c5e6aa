import {Tag} from './tag.js';
import {validateTags} from './validators.js';

/**
 * Read-only view of an item's tags
 *
 * Owns a private copy of the tags it was built from, and exposes no mutators,
 * so neither the caller's collection nor a cast can change an item after
 * construction.
 */
export class ReadonlyTagSet implements ReadonlySet<Tag> {
  readonly #tags: Set<Tag>;

  constructor(tags: Iterable<Tag>) {
    this.#tags = validateTags(tags);
    Object.freeze(this);
  }

  get size(): number {
    return this.#tags.size;
  }

  has(tag: Tag): boolean {
    return this.#tags.has(tag);
  }

  forEach(callback: (value: Tag, key: Tag, set: ReadonlySet<Tag>) => void, thisArg?: unknown): void {
    for (const tag of this.#tags) {
      callback.call(thisArg, tag, tag, this);
    }
  }

  entries() {
    return this.#tags.entries();
  }

  keys() {
    return this.#tags.keys();
  }

  values() {
    return this.#tags.values();
  }

  [Symbol.iterator]() {
    return this.#tags.values();
  }

  /**
   * Same members, regardless of insertion order
   */
  equals(other: ReadonlySet<Tag>): boolean {
    if (other === this) {
      return true;
    }
    if (other.size !== this.#tags.size) {
      return false;
    }
    for (const tag of this.#tags) {
      if (!other.has(tag)) {
        return false;
      }
    }
    return true;
  }

  toArray(): Tag[] {
    return Array.from(this.#tags);
  }

  toString(): string {
    return `[${this.toArray().map(String).join(', ')}]`;
  }
}
