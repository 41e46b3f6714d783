import type {List} from "./list.js";

/**
 * Bidirectional index cursor over a List.
 *
 * The iterator does not own its list and re-reads the list length on every step. Removing elements
 * while a cursor is past the new length invalidates it, `previous()` then throws like an out of
 * range `get()`. Boundaries are no-ops returning `null`, the cursor never wraps.
 */
export class ListIterator<T> {
  private list: List<T> | null;
  private index: number;

  /**
   * Iterator positioned before the first element of `list`
   */
  constructor(list: List<T> | null) {
    this.list = list;
    this.index = 0;
  }

  /**
   * Index returned by the next call to `next()`
   */
  get cursor(): number {
    return this.index;
  }

  next(): T | null {
    if (this.list === null || this.index >= this.list.length) {
      return null;
    }
    return this.list.get(this.index++);
  }

  previous(): T | null {
    if (this.list === null || this.index === 0) {
      return null;
    }
    return this.list.get(--this.index);
  }

  /**
   * Independent iterator on the same list at the same cursor
   */
  clone(): ListIterator<T> {
    const clone = new ListIterator(this.list);
    clone.index = this.index;
    return clone;
  }

  /**
   * Detach from the list, which is left untouched
   */
  destroy(): void {
    this.list = null;
  }
}
