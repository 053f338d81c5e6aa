/**
 * Tags and tag-set predicates
 *
 * @example
 * ```typescript
 * import {Tag, TagPredicates} from './tags/index.js';
 *
 * const request = Tag.of('scope:request');
 * const visible = TagPredicates.and(
 *   TagPredicates.has(request),
 *   TagPredicates.noneOf(Tag.of('hidden')),
 * );
 * ```
 */

export {Tag, getInternedTagCount} from './tag.js';
export {ReadonlyTagSet} from './tagSet.js';
export {TagPredicates} from './tagPredicates.js';
export type {TagSetPredicate, ItemPredicate, TagDocument, TagQuery} from './tagPredicates.js';
export {isTag, validateTagName, validateTags} from './validators.js';
