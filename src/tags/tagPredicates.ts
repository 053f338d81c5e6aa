/**
 * TagPredicates - combinators for filtering stack items by their tags
 *
 * Each predicate receives the whole tag set of an item, so conditions over
 * several tags compose with and/or/not.
 *
 * @example
 * ```typescript
 * const scoped = TagPredicates.and(
 *   TagPredicates.has(Tag.of('scope:request')),
 *   TagPredicates.not(TagPredicates.has(Tag.of('hidden'))),
 * );
 * for (const item of stack.stream(scoped)) { ... }
 * ```
 */

import sift from 'sift';
import {InvalidArgumentError} from '../errors.js';
import type {StackItem} from '../stackItem.js';
import type {Tag} from './tag.js';

/**
 * Predicate over the complete tag set of one item
 */
export type TagSetPredicate = (tags: ReadonlySet<Tag>) => boolean;

/**
 * Predicate over one stack item
 */
export type ItemPredicate<T> = (item: StackItem<T>) => boolean;

/**
 * Document shape that query filters are evaluated against
 */
export interface TagDocument {
  tags: string[];
}

/**
 * sift filter over a TagDocument, e.g. `{tags: {$all: ['a', 'b']}}`
 */
export type TagQuery = Record<string, unknown>;

function requirePredicates(predicates: TagSetPredicate[]): void {
  predicates.forEach((predicate, index) => {
    if (typeof predicate !== 'function') {
      throw new InvalidArgumentError(`Predicate at index ${index} is not a function`);
    }
  });
}

export class TagPredicates {
  /**
   * Matches every tag set
   */
  static any(): TagSetPredicate {
    return () => true;
  }

  /**
   * Matches tag sets with no tags at all
   */
  static untagged(): TagSetPredicate {
    return (tags) => tags.size === 0;
  }

  static has(tag: Tag): TagSetPredicate {
    return (tags) => tags.has(tag);
  }

  static allOf(...required: Tag[]): TagSetPredicate {
    return (tags) => required.every((tag) => tags.has(tag));
  }

  static anyOf(...candidates: Tag[]): TagSetPredicate {
    return (tags) => candidates.some((tag) => tags.has(tag));
  }

  static noneOf(...excluded: Tag[]): TagSetPredicate {
    return (tags) => !excluded.some((tag) => tags.has(tag));
  }

  /**
   * Matches tag sets holding these tags and nothing else
   */
  static exactly(...expected: Tag[]): TagSetPredicate {
    const wanted = new Set(expected);
    return (tags) => tags.size === wanted.size && Array.from(wanted).every((tag) => tags.has(tag));
  }

  static not(predicate: TagSetPredicate): TagSetPredicate {
    requirePredicates([predicate]);
    return (tags) => !predicate(tags);
  }

  static and(...predicates: TagSetPredicate[]): TagSetPredicate {
    requirePredicates(predicates);
    return (tags) => predicates.every((predicate) => predicate(tags));
  }

  static or(...predicates: TagSetPredicate[]): TagSetPredicate {
    requirePredicates(predicates);
    return (tags) => predicates.some((predicate) => predicate(tags));
  }

  /**
   * Build a predicate from a sift (MongoDB-style) filter over tag names
   *
   * @example
   * ```typescript
   * TagPredicates.query({tags: {$all: ['scope:request', 'layer:user']}});
   * TagPredicates.query({tags: {$nin: ['internal']}});
   * ```
   */
  static query(filter: TagQuery): TagSetPredicate {
    if (filter === null || typeof filter !== 'object') {
      throw new InvalidArgumentError('Query filter must be an object');
    }
    const test = sift(filter);
    return (tags) => {
      const document: TagDocument = {tags: Array.from(tags, (tag) => tag.name)};
      return test(document);
    };
  }

  /**
   * Lift a tag-set predicate to a predicate over stack items
   */
  static onItems<T>(predicate: TagSetPredicate): ItemPredicate<T> {
    requirePredicates([predicate]);
    return (item) => predicate(item.tags);
  }
}
