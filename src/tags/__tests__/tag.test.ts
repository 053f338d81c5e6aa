import {Tag, getInternedTagCount} from '../tag.js';
import {ReadonlyTagSet} from '../tagSet.js';
import {InvalidArgumentError} from '../../errors.js';

// WeakRef stand-in whose targets can be dropped on demand
class ForgetfulWeakRef<T extends object> {
  static forget = false;
  readonly [Symbol.toStringTag] = 'WeakRef';

  constructor(private readonly target: T) {}

  deref(): T | undefined {
    return ForgetfulWeakRef.forget ? undefined : this.target;
  }
}

describe('Tag', () => {
  describe('Interned tags', () => {
    it('should return the same instance for the same name', () => {
      expect(Tag.of('scope:request')).toBe(Tag.of('scope:request'));
    });

    it('should return different instances for different names', () => {
      expect(Tag.of('scope:request')).not.toBe(Tag.of('scope:session'));
    });

    it('should expose the name', () => {
      const tag = Tag.of('layer:user');
      expect(tag.name).toBe('layer:user');
      expect(tag.interned).toBe(true);
      expect(String(tag)).toBe('layer:user');
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(Tag.of('frozen'))).toBe(true);
    });

    it('should reject blank names', () => {
      expect(() => Tag.of('')).toThrow(InvalidArgumentError);
      expect(() => Tag.of('   ')).toThrow('Tag name must not be blank');
    });
  });

  describe('Intern registry', () => {
    afterEach(() => {
      ForgetfulWeakRef.forget = false;
      vi.unstubAllGlobals();
    });

    it('should count each interned name once', () => {
      const before = getInternedTagCount();
      const tag = Tag.of('counted-once');
      Tag.of('counted-once');
      expect(getInternedTagCount()).toBe(before + 1);
      expect(Tag.of('counted-once')).toBe(tag);
    });

    it('should not count unique tags', () => {
      const before = getInternedTagCount();
      Tag.unique('not-interned');
      expect(getInternedTagCount()).toBe(before);
    });

    it('should drop a name once its tag has been collected', () => {
      vi.stubGlobal('WeakRef', ForgetfulWeakRef);
      const before = getInternedTagCount();
      const first = Tag.of('collected-a');
      expect(getInternedTagCount()).toBe(before + 1);

      ForgetfulWeakRef.forget = true;
      expect(getInternedTagCount()).toBe(before);

      ForgetfulWeakRef.forget = false;
      const second = Tag.of('collected-a');
      expect(second).not.toBe(first);
      expect(second.name).toBe('collected-a');
      expect(Tag.of('collected-a')).toBe(second);
      expect(getInternedTagCount()).toBe(before + 1);
    });
  });

  describe('Unique tags', () => {
    it('should never equal another tag with the same name', () => {
      const first = Tag.unique('marker');
      const second = Tag.unique('marker');
      expect(first).not.toBe(second);
      expect(first).not.toBe(Tag.of('marker'));
      expect(first.interned).toBe(false);
      expect(String(first)).toBe('marker#unique');
    });

    it('should use a default description', () => {
      expect(Tag.unique().name).toBe('unique');
    });
  });
});

describe('ReadonlyTagSet', () => {
  const red = Tag.of('red');
  const green = Tag.of('green');
  const blue = Tag.of('blue');

  it('should copy its source so later changes do not leak in', () => {
    const source = new Set([red, green]);
    const view = new ReadonlyTagSet(source);
    source.add(blue);
    expect(view.size).toBe(2);
    expect(view.has(blue)).toBe(false);
  });

  it('should expose no mutators', () => {
    const view = new ReadonlyTagSet([red]);
    expect('add' in view).toBe(false);
    expect('delete' in view).toBe(false);
    expect('clear' in view).toBe(false);
    expect(Object.isFrozen(view)).toBe(true);
  });

  it('should compare by members regardless of order', () => {
    const a = new ReadonlyTagSet([red, green]);
    const b = new ReadonlyTagSet([green, red]);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new Set([red, green]))).toBe(true);
    expect(a.equals(new ReadonlyTagSet([red]))).toBe(false);
    expect(a.equals(new ReadonlyTagSet([red, blue]))).toBe(false);
  });

  it('should collapse duplicate tags', () => {
    const view = new ReadonlyTagSet([red, red, green]);
    expect(view.size).toBe(2);
    expect(view.toArray()).toEqual([red, green]);
  });

  it('should iterate like a Set', () => {
    const view = new ReadonlyTagSet([red, green]);
    expect([...view]).toEqual([red, green]);
    expect([...view.keys()]).toEqual([red, green]);
    expect([...view.values()]).toEqual([red, green]);
    expect([...view.entries()]).toEqual([[red, red], [green, green]]);

    const seen: Tag[] = [];
    view.forEach((tag) => seen.push(tag));
    expect(seen).toEqual([red, green]);
  });

  it('should render tag names', () => {
    expect(String(new ReadonlyTagSet([red, green]))).toBe('[red, green]');
    expect(String(new ReadonlyTagSet([]))).toBe('[]');
  });

  it('should reject anything that is not a tag', () => {
    expect(() => new ReadonlyTagSet(['red'] as unknown as Tag[])).toThrow('Tag at index 0 is not a Tag');
  });
});
