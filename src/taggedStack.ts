import {AbstractTaggedStack, normaliseOptions, type StackOptions} from './abstractTaggedStack.js';
import {ArrayDeque} from './deque/arrayDeque.js';
import type {StackDeque} from './deque/stackDeque.js';
import type {StackItem} from './stackItem.js';

/**
 * Tagged stack for single-threaded use
 *
 * Backed by an ArrayDeque unless another container is supplied. There is no
 * internal synchronisation: tasks that interleave on one instance must
 * coordinate among themselves, and a lazy traversal that outlives a
 * modification throws ConcurrentModificationError.
 *
 * @example
 * ```typescript
 * const scopes = new TaggedStack<string>('scopes');
 * scopes.push('en', Tag.of('locale'));
 * scopes.push('fr', Tag.of('locale'), Tag.of('request'));
 * scopes.peek(TagPredicates.onItems(TagPredicates.has(Tag.of('locale'))))?.value; // 'fr'
 * ```
 */
export class TaggedStack<T> extends AbstractTaggedStack<T> {
  constructor(nameOrOptions?: string | StackOptions, deque: StackDeque<StackItem<T>> = new ArrayDeque<StackItem<T>>()) {
    super(deque, normaliseOptions(nameOrOptions));
  }
}
