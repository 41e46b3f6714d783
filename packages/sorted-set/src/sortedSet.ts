import {naturalCompare} from "./naturalCompare.js";
import {Comparator, Destructor} from "./types.js";

/**
 * An ordered set that keeps a single element per equivalence class of its comparator.
 *
 * Elements are held in an array kept sorted by `comparator`, lookups are binary searches.
 * If a destructor is registered the set owns the destruction of its elements, see `destroy()`.
 */
export class SortedSet<T> implements Iterable<T> {
  private readonly items: T[] = [];
  private destructor: Destructor<T> | null;

  constructor(
    private readonly comparator: Comparator<T> = naturalCompare,
    destructor: Destructor<T> | null = null
  ) {
    this.destructor = destructor;
  }

  /**
   * O(N log N) Build a set from `values` with a single sort. Of the elements comparing equal, the first
   * in iteration order is kept, as with successive `insert()` calls.
   */
  static from<T>(
    values: Iterable<T>,
    comparator: Comparator<T> = naturalCompare,
    destructor: Destructor<T> | null = null
  ): SortedSet<T> {
    const set = new SortedSet<T>(comparator, destructor);
    // Boxed, Array.prototype.sort moves undefined to the end without consulting the comparator.
    // The sort is stable so the first of each run of equal elements is the first inserted.
    const sorted = Array.from(values, (value) => ({value})).sort((a, b) => comparator(a.value, b.value));
    for (const {value} of sorted) {
      const last = set.items.length - 1;
      if (last < 0 || comparator(set.items[last], value) !== 0) {
        set.items.push(value);
      }
    }
    return set;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * O(N) Insert `value` unless an element comparing equal is already present, which is then kept.
   * Returns true if `value` was inserted. The search is O(log N), shifting later elements is O(N):
   * building a set from many values is cheaper through `SortedSet.from()`.
   */
  insert(value: T): boolean {
    const {index, found} = this.lowerBound(value);
    if (found) {
      return false;
    }
    this.items.splice(index, 0, value);
    return true;
  }

  /**
   * O(log N) Return the stored element comparing equal to `value`, if any
   */
  search(value: T): T | undefined {
    const {index, found} = this.lowerBound(value);
    return found ? this.items[index] : undefined;
  }

  has(value: T): boolean {
    return this.lowerBound(value).found;
  }

  /**
   * O(N) Remove the element comparing equal to `value`. The destructor is not invoked.
   */
  delete(value: T): boolean {
    const {index, found} = this.lowerBound(value);
    if (!found) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  first(): T | undefined {
    return this.items[0];
  }

  last(): T | undefined {
    return this.items[this.items.length - 1];
  }

  getDestructor(): Destructor<T> | null {
    return this.destructor;
  }

  setDestructor(destructor: Destructor<T> | null): void {
    this.destructor = destructor;
  }

  toArray(): T[] {
    return this.items.slice();
  }

  *[Symbol.iterator](): Iterator<T> {
    yield* this.items;
  }

  /**
   * Invoke the destructor, if any, on every element in order then empty the set.
   * `null` elements hold nothing to release and are skipped.
   */
  destroy(): void {
    const destructor = this.destructor;
    if (destructor) {
      for (const item of this.items) {
        if (item !== null) {
          destructor(item);
        }
      }
    }
    this.items.length = 0;
  }

  /**
   * First index whose element does not sort before `value`
   */
  private lowerBound(value: T): {index: number; found: boolean} {
    let low = 0;
    let high = this.items.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.comparator(this.items[mid], value) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    const found = low < this.items.length && this.comparator(this.items[low], value) === 0;
    return {index: low, found};
  }
}
