/**
 * Container capabilities the tagged stack engine is written against.
 *
 * The head of the deque is the top of the stack.
 */
export interface StackDeque<E> {
  /** Human-readable container name, used in error messages */
  readonly kind: string;

  addFirst(element: E): void;

  /** Remove and return the head, or undefined when empty */
  pollFirst(): E | undefined;

  /** Return the head without removing it, or undefined when empty */
  peekFirst(): E | undefined;

  size(): number;

  clear(): void;

  /** Start a head-to-tail traversal */
  cursor(): DequeCursor<E>;
}

export interface DequeCursor<E> {
  /** Move to the next element toward the tail; undefined once exhausted */
  advance(): E | undefined;

  /**
   * Unlink the element last returned by advance
   *
   * @returns false if someone else removed it first
   */
  remove(): boolean;
}
