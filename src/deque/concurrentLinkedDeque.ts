import type {DequeCursor, StackDeque} from './stackDeque.js';

interface Node<E> {
  item: E | null;
  prev: Node<E> | null;
  next: Node<E> | null;
  removed: boolean;
}

/**
 * Non-blocking linked deque that any number of interleaving tasks may share
 *
 * Every single-element operation runs to completion without yielding, so
 * it is atomic with respect to every other operation; no lock is involved.
 *
 * Cursors are weakly consistent. A cursor suspended between steps (for
 * example inside a generator consumed across `await` points) keeps working
 * while other tasks add and remove elements: it never returns an element
 * after that element was removed, never returns one twice, and may or may
 * not see elements added after it started. An unlinked node keeps its
 * forward pointer so that a cursor parked on it can still move on.
 */
export class ConcurrentLinkedDeque<E> implements StackDeque<E> {
  readonly kind = 'ConcurrentLinkedDeque';

  // sentinel; head.next is the first element
  private readonly head: Node<E> = {item: null, prev: null, next: null, removed: false};
  private count = 0;

  addFirst(element: E): void {
    const first = this.head.next;
    const node: Node<E> = {item: element, prev: this.head, next: first, removed: false};
    if (first) {
      first.prev = node;
    }
    this.head.next = node;
    this.count++;
  }

  pollFirst(): E | undefined {
    const first = this.head.next;
    if (!first) {
      return undefined;
    }
    const item = first.item;
    this.unlink(first);
    return item ?? undefined;
  }

  peekFirst(): E | undefined {
    return this.head.next?.item ?? undefined;
  }

  size(): number {
    return this.count;
  }

  clear(): void {
    let node = this.head.next;
    while (node) {
      const next = node.next;
      this.unlink(node);
      node = next;
    }
  }

  cursor(): DequeCursor<E> {
    let current: Node<E> = this.head;
    let lastReturned: Node<E> | null = null;

    return {
      advance: () => {
        let next = current.next;
        while (next && next.removed) {
          next = next.next;
        }
        if (!next) {
          lastReturned = null;
          return undefined;
        }
        current = next;
        lastReturned = next;
        return next.item ?? undefined;
      },
      remove: () => {
        if (!lastReturned) {
          throw new Error('remove() must follow a successful advance()');
        }
        const node = lastReturned;
        lastReturned = null;
        if (node.removed) {
          return false;
        }
        this.unlink(node);
        return true;
      },
    };
  }

  /**
   * Splice a live node out of the list. Its next pointer is left in place for parked cursors.
   */
  private unlink(node: Node<E>): void {
    const {prev, next} = node;
    if (prev) {
      prev.next = next;
    }
    if (next) {
      next.prev = prev;
    }
    node.removed = true;
    node.item = null;
    node.prev = null;
    this.count--;
  }
}
