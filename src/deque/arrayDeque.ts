import {ConcurrentModificationError} from '../errors.js';
import type {DequeCursor, StackDeque} from './stackDeque.js';

/**
 * Array-backed deque for single-threaded use
 *
 * The head lives at the end of the array so addFirst/pollFirst are O(1).
 * Cursors are fail-fast: modifying the deque other than through the cursor
 * itself makes the cursor throw on its next step. Callers sharing one
 * instance between interleaving tasks must coordinate access themselves.
 */
export class ArrayDeque<E> implements StackDeque<E> {
  readonly kind = 'ArrayDeque';

  private elements: E[] = [];
  // bumped on every structural change, checked by cursors
  private modCount = 0;

  addFirst(element: E): void {
    this.elements.push(element);
    this.modCount++;
  }

  pollFirst(): E | undefined {
    if (this.elements.length === 0) {
      return undefined;
    }
    this.modCount++;
    return this.elements.pop();
  }

  peekFirst(): E | undefined {
    return this.elements[this.elements.length - 1];
  }

  size(): number {
    return this.elements.length;
  }

  clear(): void {
    this.elements = [];
    this.modCount++;
  }

  cursor(): DequeCursor<E> {
    // index of the element last returned, counted from the array start
    let index = this.elements.length;
    let expectedModCount = this.modCount;
    let canRemove = false;

    const checkForComodification = () => {
      if (this.modCount !== expectedModCount) {
        throw new ConcurrentModificationError(this.kind);
      }
    };

    return {
      advance: () => {
        checkForComodification();
        if (index === 0) {
          canRemove = false;
          return undefined;
        }
        index--;
        canRemove = true;
        return this.elements[index];
      },
      remove: () => {
        checkForComodification();
        if (!canRemove) {
          throw new Error('remove() must follow a successful advance()');
        }
        this.elements.splice(index, 1);
        canRemove = false;
        expectedModCount = ++this.modCount;
        return true;
      },
    };
  }
}
