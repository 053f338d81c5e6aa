import {randomUUID} from 'node:crypto';
import {resolveConfig, type StackConfig} from './config.js';
import type {StackDeque} from './deque/stackDeque.js';
import {InvalidArgumentError, requirePresent} from './errors.js';
import {StackItem} from './stackItem.js';
import type {Tag} from './tags/tag.js';
import {TagPredicates, type ItemPredicate, type TagSetPredicate} from './tags/tagPredicates.js';

/**
 * Options accepted by every tagged stack
 */
export type StackOptions = Partial<StackConfig> & {
  /** Stack name; a random one is generated when omitted */
  name?: string;
};

function requireFunction(predicate: unknown, argument: string): void {
  if (typeof predicate !== 'function') {
    throw new InvalidArgumentError(`${argument} must be a function`);
  }
}

/**
 * Accept either a bare name or an options object
 */
export function normaliseOptions(nameOrOptions?: string | StackOptions): StackOptions {
  if (nameOrOptions === undefined) {
    return {};
  }
  return typeof nameOrOptions === 'string' ? {name: nameOrOptions} : requirePresent(nameOrOptions, 'options');
}

/**
 * LIFO stack of tagged items, written once against the StackDeque capabilities
 *
 * The head of the deque is the top of the stack. Every search walks from the
 * top toward the bottom and singular operations stop at the first match, so
 * the most recently pushed matching item always wins. Removing a match below
 * the top splices it out and leaves every other item where it was.
 *
 * Lazy traversals (stream, findAll, iteration) inherit the consistency of the
 * underlying deque's cursors.
 */
export abstract class AbstractTaggedStack<T> implements Iterable<StackItem<T>> {
  readonly name: string;
  protected readonly config: StackConfig;
  protected readonly deque: StackDeque<StackItem<T>>;

  protected constructor(deque: StackDeque<StackItem<T>>, options: StackOptions = {}) {
    this.deque = requirePresent(deque, 'deque');
    this.config = resolveConfig(new.target.name, options);

    if (options.name === undefined) {
      this.name = `${this.config.namePrefix}${randomUUID()}`;
    } else if (typeof options.name !== 'string' || options.name.trim() === '') {
      throw new InvalidArgumentError('Stack name must be a non-blank string');
    } else {
      this.name = options.name;
    }
  }

  /**
   * Wrap a value with tags and push it on top
   *
   * @throws {InvalidArgumentError} If value is null or undefined
   */
  push(value: T, ...tags: Tag[]): this {
    return this.pushItem(new StackItem(value, tags));
  }

  /**
   * Push an existing item on top, e.g. one popped from another stack
   */
  pushItem(item: StackItem<T>): this {
    if (!(item instanceof StackItem)) {
      throw new InvalidArgumentError('item must be a StackItem');
    }
    this.deque.addFirst(item);
    this.log(`push ${item}`);
    return this;
  }

  /**
   * Remove and return the top item, or the topmost item matching predicate
   *
   * @returns undefined when the stack is empty or nothing matches
   */
  pop(predicate?: ItemPredicate<T>): StackItem<T> | undefined {
    if (predicate === undefined) {
      const item = this.deque.pollFirst();
      if (item) {
        this.log(`pop ${item}`);
      }
      return item;
    }

    requireFunction(predicate, 'predicate');
    const cursor = this.deque.cursor();
    for (let item = cursor.advance(); item !== undefined; item = cursor.advance()) {
      // a false remove() means another task took this one first; keep looking below it
      if (predicate(item) && cursor.remove()) {
        this.log(`pop(predicate) ${item}`);
        return item;
      }
    }
    return undefined;
  }

  /**
   * Return the top item, or the topmost item matching predicate, without removing it
   */
  peek(predicate?: ItemPredicate<T>): StackItem<T> | undefined {
    if (predicate === undefined) {
      return this.deque.peekFirst();
    }
    return this.findFirst(predicate);
  }

  findFirst(predicate: ItemPredicate<T>): StackItem<T> | undefined {
    requireFunction(predicate, 'predicate');
    const cursor = this.deque.cursor();
    for (let item = cursor.advance(); item !== undefined; item = cursor.advance()) {
      if (predicate(item)) {
        return item;
      }
    }
    return undefined;
  }

  /**
   * Lazily yield every item matching predicate, top to bottom
   *
   * The returned iterator is single-use; call again to scan the current state.
   */
  findAll(predicate: ItemPredicate<T>): IterableIterator<StackItem<T>> {
    requireFunction(predicate, 'predicate');
    return this.scan(predicate);
  }

  /**
   * Remove every item matching predicate in a single top-to-bottom pass
   *
   * @returns The removed items, top to bottom
   */
  removeAll(predicate: ItemPredicate<T>): StackItem<T>[] {
    requireFunction(predicate, 'predicate');
    const removed: StackItem<T>[] = [];
    const cursor = this.deque.cursor();
    for (let item = cursor.advance(); item !== undefined; item = cursor.advance()) {
      if (predicate(item) && cursor.remove()) {
        removed.push(item);
      }
    }
    if (removed.length > 0) {
      this.log(`removeAll removed ${removed.length} item(s)`);
    }
    return removed;
  }

  /**
   * Lazily yield every item whose tag set satisfies predicate, top to bottom
   *
   * @param predicate Receives the complete tag set; defaults to matching everything
   */
  stream(predicate: TagSetPredicate = TagPredicates.any()): IterableIterator<StackItem<T>> {
    requireFunction(predicate, 'predicate');
    return this.scan((item) => predicate(item.tags));
  }

  size(): number {
    return this.deque.size();
  }

  isEmpty(): boolean {
    return this.deque.size() === 0;
  }

  clear(): void {
    this.deque.clear();
    this.log('clear');
  }

  [Symbol.iterator](): Iterator<StackItem<T>> {
    return this.stream();
  }

  toString(): string {
    return `${this.constructor.name}(${this.name}, size=${this.size()})`;
  }

  protected log(message: string): void {
    if (this.config.debug) {
      console.debug(`[${this.constructor.name} ${this.name}] ${message}`);
    }
  }

  private *scan(predicate: ItemPredicate<T>): Generator<StackItem<T>, void, undefined> {
    const cursor = this.deque.cursor();
    for (let item = cursor.advance(); item !== undefined; item = cursor.advance()) {
      if (predicate(item)) {
        yield item;
      }
    }
  }
}
