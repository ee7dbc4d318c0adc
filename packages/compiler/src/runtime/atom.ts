/**
 * Atom - a mutable reference updated by compare-and-set
 */

export class Atom<T> {
  private current: T;

  constructor(initial: T) {
    this.current = initial;
  }

  deref(): T {
    return this.current;
  }

  reset(value: T): T {
    this.current = value;
    return value;
  }

  /**
   * Replace the value only if it is still `expected` (by identity)
   */
  compareAndSet(expected: T, value: T): boolean {
    if (!Object.is(this.current, expected)) {
      return false;
    }
    this.current = value;
    return true;
  }

  /**
   * Apply `fn` to the current value until the result lands without the
   * value having changed underneath. `fn` may run more than once.
   */
  swap(fn: (value: T) => T): T {
    for (;;) {
      const before = this.current;
      const after = fn(before);
      if (this.compareAndSet(before, after)) {
        return after;
      }
    }
  }
}
