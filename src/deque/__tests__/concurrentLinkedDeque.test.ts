import {ConcurrentLinkedDeque} from '../concurrentLinkedDeque.js';

describe('ConcurrentLinkedDeque', () => {
  let deque: ConcurrentLinkedDeque<string>;

  beforeEach(() => {
    deque = new ConcurrentLinkedDeque<string>();
    ['a', 'b', 'c', 'd'].forEach((element) => deque.addFirst(element));
  });

  describe('Single element operations', () => {
    it('should behave as a LIFO at the head', () => {
      expect(deque.size()).toBe(4);
      expect(deque.peekFirst()).toBe('d');
      expect(deque.pollFirst()).toBe('d');
      expect(deque.pollFirst()).toBe('c');
      expect(deque.size()).toBe(2);
    });

    it('should return undefined when empty', () => {
      deque.clear();
      expect(deque.size()).toBe(0);
      expect(deque.pollFirst()).toBeUndefined();
      expect(deque.peekFirst()).toBeUndefined();
    });
  });

  describe('Cursor', () => {
    it('should traverse head to tail', () => {
      const cursor = deque.cursor();
      expect([cursor.advance(), cursor.advance(), cursor.advance(), cursor.advance(), cursor.advance()]).toEqual([
        'd', 'c', 'b', 'a', undefined,
      ]);
    });

    it('should splice out the current element', () => {
      const cursor = deque.cursor();
      cursor.advance();
      expect(cursor.advance()).toBe('c');
      expect(cursor.remove()).toBe(true);
      expect(cursor.advance()).toBe('b');
      expect(deque.size()).toBe(3);

      const check = deque.cursor();
      expect([check.advance(), check.advance(), check.advance(), check.advance()]).toEqual(['d', 'b', 'a', undefined]);
    });

    it('should report a lost race when the element is already gone', () => {
      const first = deque.cursor();
      const second = deque.cursor();
      first.advance();
      second.advance();
      expect(first.remove()).toBe(true);
      expect(second.remove()).toBe(false);
      expect(deque.size()).toBe(3);
    });

    it('should refuse remove() without a preceding advance()', () => {
      expect(() => deque.cursor().remove()).toThrow('remove() must follow a successful advance()');
    });
  });

  describe('Weakly consistent traversal', () => {
    it('should keep going when the element it rests on is removed', () => {
      const cursor = deque.cursor();
      expect(cursor.advance()).toBe('d');
      expect(cursor.advance()).toBe('c');

      // another party pops 'd' and removes 'c' and 'b' while the cursor is parked on 'c'
      deque.pollFirst();
      const remover = deque.cursor();
      remover.advance();
      remover.remove();
      remover.advance();
      remover.remove();

      expect(cursor.advance()).toBe('a');
      expect(cursor.advance()).toBeUndefined();
    });

    it('should not see elements pushed above it', () => {
      const cursor = deque.cursor();
      expect(cursor.advance()).toBe('d');
      deque.addFirst('e');
      expect(cursor.advance()).toBe('c');
      expect(cursor.advance()).toBe('b');
      expect(cursor.advance()).toBe('a');
      expect(cursor.advance()).toBeUndefined();
    });

    it('should never return an element removed ahead of it', () => {
      const cursor = deque.cursor();
      expect(cursor.advance()).toBe('d');

      const remover = deque.cursor();
      remover.advance();
      expect(remover.advance()).toBe('c');
      remover.remove();

      expect(cursor.advance()).toBe('b');
    });

    it('should finish after the deque is cleared beneath it', () => {
      const cursor = deque.cursor();
      cursor.advance();
      deque.clear();
      expect(cursor.advance()).toBeUndefined();
      expect(cursor.advance()).toBeUndefined();
    });

    it('should not remove an element a clear already took', () => {
      const cursor = deque.cursor();
      cursor.advance();
      deque.clear();
      expect(cursor.remove()).toBe(false);
      expect(deque.size()).toBe(0);
    });
  });
});
