/**
 * Tag - opaque classification label attached to stack items
 *
 * Tags carry no payload. Two tags are equal only when they are the same
 * instance, which is what lets them live in plain Sets.
 */

import {validateTagName} from './validators.js';

/**
 * Internal registry of interned tags, keyed by name
 *
 * Entries are weak: a tag nobody holds any more is collected and its name
 * dropped, so a later Tag.of for that name creates a fresh instance.
 */
const tagRegistry = new Map<string, WeakRef<Tag>>();

const collectedTags = new FinalizationRegistry<string>((name) => {
  // the name may have been interned again since
  if (tagRegistry.get(name)?.deref() === undefined) {
    tagRegistry.delete(name);
  }
});

export class Tag {
  private constructor(
    readonly name: string,
    readonly interned: boolean,
  ) {
    Object.freeze(this);
  }

  /**
   * Get the shared tag for a name
   *
   * @example
   * ```typescript
   * Tag.of('scope:request') === Tag.of('scope:request'); // true
   * ```
   */
  static of(name: string): Tag {
    validateTagName(name);
    let tag = tagRegistry.get(name)?.deref();
    if (!tag) {
      tag = new Tag(name, true);
      tagRegistry.set(name, new WeakRef(tag));
      collectedTags.register(tag, name);
    }
    return tag;
  }

  /**
   * Create a tag that is equal to no other tag, whatever its name
   */
  static unique(description = 'unique'): Tag {
    validateTagName(description);
    return new Tag(description, false);
  }

  toString(): string {
    return this.interned ? this.name : `${this.name}#unique`;
  }
}

/**
 * Number of interned tags still alive (for debugging)
 *
 * Also drops entries whose tag was collected before its finalizer ran.
 */
export function getInternedTagCount(): number {
  for (const [name, ref] of tagRegistry) {
    if (ref.deref() === undefined) {
      tagRegistry.delete(name);
    }
  }
  return tagRegistry.size;
}
