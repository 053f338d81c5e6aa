import {AbstractTaggedStack, normaliseOptions, type StackOptions} from './abstractTaggedStack.js';
import {ConcurrentLinkedDeque} from './deque/concurrentLinkedDeque.js';
import type {StackItem} from './stackItem.js';

/**
 * Tagged stack that concurrently running tasks can share without a lock
 *
 * Built on ConcurrentLinkedDeque. push, pop, peek and pop(predicate) each
 * complete atomically. removeAll also runs as one uninterrupted pass.
 * stream, findAll and iteration are weakly consistent: when their consumer
 * awaits between steps, items pushed or removed meanwhile may or may not be
 * observed, but a removed item is never yielded after its removal and no
 * item is yielded twice.
 *
 * Nothing blocks and nothing times out; a miss returns undefined at once.
 */
export class ConcurrentTaggedStack<T> extends AbstractTaggedStack<T> {
  /**
   * @param nameOrOptions Stack name or options; a random UUID names the stack when none is given
   */
  constructor(nameOrOptions?: string | StackOptions) {
    super(new ConcurrentLinkedDeque<StackItem<T>>(), normaliseOptions(nameOrOptions));
  }
}
