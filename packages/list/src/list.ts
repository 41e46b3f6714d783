import {Logger, intDiv} from "@seqkit/utils";
import {Comparator, Destructor, SortedSet} from "@seqkit/sorted-set";
import {ListError, ListErrorCode} from "./errors.js";
import {ListIterator} from "./iterator.js";
import {ListOptions, RandomIntFn, defaultListOptions, getDefaultListLogger} from "./options.js";

// The minimum amount to expand the storage backing a list by when it is reallocated
const MINIMUM_ARRAY_EXPAND_SIZE = 5;

/**
 * Anything able to answer membership, e.g. a SortedSet or a native Set
 */
export type MembershipSet<T> = {
  has(value: T): boolean;
};

// The empty marker references nothing, it is not a member even of a set holding null
function isMember<T>(set: MembershipSet<T>, value: T): boolean {
  return value !== null && set.has(value);
}

/**
 * List<T> is a resizable sequence of element references backed by a fixed-capacity array.
 *
 * Storage grows by reallocation when an append would exceed capacity, doubling plus a small constant,
 * so N appends cost amortized O(1) each.
 *
 * The list does not own the values it references unless a destructor is registered, in which case
 * `destroy()` invokes it once per non-null element. A list must be destroyed explicitly by its owner,
 * any operation other than `length` after `destroy()` throws.
 *
 * Index preconditions are contract violations, reported by throwing `ListError`.
 */
export class List<T> implements Iterable<T> {
  /** `capacity` slots, only `[0, length)` are ever read */
  private storage: T[];
  private _length: number;
  private destructor: Destructor<T> | null;
  private destroyed = false;
  private readonly logger: Logger;
  private readonly random: RandomIntFn;

  private constructor(length: number, storage: T[], opts: ListOptions<T> = {}) {
    this._length = length;
    this.storage = storage;
    this.destructor = opts.destructor ?? null;
    this.logger = opts.logger ?? getDefaultListLogger();
    this.random = opts.random ?? defaultListOptions.random;
  }

  /**
   * O(1) Create a new empty list with capacity 0.
   */
  static empty<T>(opts?: ListOptions<T>): List<T> {
    return new List<T>(0, [], opts);
  }

  /**
   * O(N) Create a list of `length` null slots, with capacity equal to length.
   */
  static withLength<T>(length: number, opts?: ListOptions<T | null>): List<T | null> {
    if (!Number.isInteger(length)) {
      throw new ListError({code: ListErrorCode.INVALID_LENGTH, length});
    }
    if (length < 0) {
      throw new ListError({code: ListErrorCode.NEGATIVE_LENGTH, length});
    }
    return new List<T | null>(length, new Array<T | null>(length).fill(null), opts);
  }

  /**
   * O(N) Create a list from an iterable of values, in the same order
   */
  static from<T>(values: Iterable<T>, opts?: ListOptions<T>): List<T> {
    const list = List.empty<T>(opts);
    for (const value of values) {
      list.append(value);
    }
    return list;
  }

  static of<T>(...values: T[]): List<T> {
    return List.from(values);
  }

  /**
   * O(sum of lengths) Concatenate, in order, every list of `lists` into a new list without destructor.
   * Absent lists count as empty.
   */
  static join<T>(lists: Iterable<List<T> | null | undefined>, opts?: ListOptions<T>): List<T> {
    const joined = List.empty<T>(opts);
    for (const list of lists) {
      if (list) {
        joined.appendAll(list);
      }
    }
    return joined;
  }

  get length(): number {
    return this._length;
  }

  get capacity(): number {
    return this.storage.length;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get(index: number): T {
    this.assertLive("get");
    this.assertIndex(index);
    return this.storage[index];
  }

  /**
   * Overwrite the reference at `index`. The previous reference is dropped without invoking the destructor.
   */
  set(index: number, value: T): void {
    this.assertLive("set");
    this.assertIndex(index);
    this.storage[index] = value;
  }

  /**
   * Amortized O(1) Add a value at the end of the list
   */
  append(value: T): void {
    this.assertLive("append");
    if (this._length >= this.storage.length) {
      this.grow();
    }
    this.storage[this._length++] = value;
  }

  /**
   * Append every element of `source` in order. `source` must be a different list.
   */
  appendAll(source: List<T>): void {
    this.assertLive("appendAll");
    if (source === this) {
      throw new ListError({code: ListErrorCode.SELF_APPEND});
    }
    for (let i = 0; i < source.length; i++) {
      this.append(source.get(i));
    }
  }

  getDestructor(): Destructor<T> | null {
    return this.destructor;
  }

  setDestructor(destructor: Destructor<T> | null): void {
    this.assertLive("setDestructor");
    this.destructor = destructor;
  }

  /**
   * O(length - index) Remove and return the element at `index`, shifting later elements down.
   * The destructor is not invoked, the caller takes the returned reference.
   */
  remove(index: number): T {
    this.assertLive("remove");
    this.assertIndex(index);
    const value = this.storage[index];
    for (let i = index + 1; i < this._length; i++) {
      this.storage[i - 1] = this.storage[i];
    }
    this._length--;
    // Release the stale reference in the now unused slot
    delete this.storage[this._length];
    return value;
  }

  removeFirst(): T {
    return this.remove(0);
  }

  /**
   * Remove and return the last element. Throws on an empty list, there is no sentinel return.
   */
  pop(): T {
    this.assertNotEmpty("pop");
    return this.remove(this._length - 1);
  }

  /**
   * Remove the first element that is `===` to `value`, returns false if there was none
   */
  removeItem(value: T): boolean {
    const index = this.indexOf(value);
    if (index === -1) {
      return false;
    }
    this.remove(index);
    return true;
  }

  /**
   * Return the last element without removing it
   */
  peek(): T {
    this.assertNotEmpty("peek");
    return this.storage[this._length - 1];
  }

  /**
   * O(N) Lowest index holding a reference `===` to `value`, -1 if none
   */
  indexOf(value: T): number {
    this.assertLive("indexOf");
    for (let i = 0; i < this._length; i++) {
      if (this.storage[i] === value) {
        return i;
      }
    }
    return -1;
  }

  contains(value: T): boolean {
    return this.indexOf(value) !== -1;
  }

  /**
   * O(N) Shallow copy: the copy references the same values, with `destructor` attached to it
   */
  copy(destructor: Destructor<T> | null = null): List<T> {
    this.assertLive("copy");
    const copy = List.empty<T>({...this.derivedOptions(), destructor});
    copy.appendAll(this);
    return copy;
  }

  reverse(): void {
    this.assertLive("reverse");
    const length = this._length;
    for (let i = 0; i < intDiv(length, 2); i++) {
      const value = this.storage[length - 1 - i];
      this.storage[length - 1 - i] = this.storage[i];
      this.storage[i] = value;
    }
  }

  /**
   * In place sort. Stability is not part of the contract.
   */
  sort(comparator: Comparator<T>): void {
    this.assertLive("sort");
    // Boxed, Array.prototype.sort moves undefined to the end without consulting the comparator
    const boxed = this.storage.slice(0, this._length).map((value) => ({value}));
    boxed.sort((a, b) => comparator(a.value, b.value));
    for (let i = 0; i < boxed.length; i++) {
      this.storage[i] = boxed[i].value;
    }
  }

  /**
   * In place shuffle: every element `i` is swapped with an element drawn from the whole list.
   *
   * Drawing `j` from `[0, length)` rather than `[i, length)` does not give a uniform permutation.
   * This is the established behavior of the container and is kept as is.
   */
  shuffle(): void {
    this.assertLive("shuffle");
    for (let i = 0; i < this._length; i++) {
      const j = this.random(0, this._length);
      const value = this.storage[i];
      this.storage[i] = this.storage[j];
      this.storage[j] = value;
    }
  }

  /**
   * O(N log N) New SortedSet without destructor holding every element. Elements comparing equal collapse
   * into the one at the lowest index.
   */
  toSortedSet(comparator?: Comparator<T>): SortedSet<T> {
    this.assertLive("toSortedSet");
    return SortedSet.from(this.storage.slice(0, this._length), comparator);
  }

  /**
   * New list, without destructor, of the elements satisfying `predicate` in original order
   */
  filter(predicate: (value: T) => boolean): List<T> {
    this.assertLive("filter");
    const filtered = List.empty<T>(this.derivedOptions());
    for (let i = 0; i < this._length; i++) {
      const value = this.storage[i];
      if (predicate(value)) {
        filtered.append(value);
      }
    }
    return filtered;
  }

  /**
   * New list of the elements present in `set`, in original order. `null` elements are never included.
   */
  filterToInclude(set: MembershipSet<T>): List<T> {
    return this.filter((value) => isMember(set, value));
  }

  /**
   * New list of the elements absent from `set`, in original order. `null` elements are always kept.
   */
  filterToExclude(set: MembershipSet<T>): List<T> {
    return this.filter((value) => !isMember(set, value));
  }

  /**
   * Move all elements into a SortedSet with the default ordering and destroy this list.
   *
   * The destructor moves to the set, so elements are destroyed once, when the set is.
   */
  convertToSortedSet(): SortedSet<T> {
    const set = this.toSortedSet();
    set.setDestructor(this.destructor);
    this.destructor = null;
    this.logger.debug("List converted to sorted set", {length: this._length, size: set.size});
    this.destroy();
    return set;
  }

  iterator(): ListIterator<T> {
    this.assertLive("iterator");
    return new ListIterator(this);
  }

  toArray(): T[] {
    this.assertLive("toArray");
    return this.storage.slice(0, this._length);
  }

  /**
   * Reads length on every step, elements appended while iterating are visited
   */
  *[Symbol.iterator](): Iterator<T> {
    this.assertLive("iterate");
    for (let i = 0; i < this._length; i++) {
      yield this.storage[i];
    }
  }

  /**
   * Invoke the destructor, if any, on each non-null element in index order, then release storage.
   */
  destroy(): void {
    this.assertLive("destroy");
    const length = this._length;
    const destructor = this.destructor;
    if (destructor) {
      for (let i = 0; i < length; i++) {
        const value = this.storage[i];
        if (value !== null) {
          destructor(value);
        }
      }
    }
    this.storage = [];
    this._length = 0;
    this.destructor = null;
    this.destroyed = true;
    this.logger.debug("List destroyed", {length, destructed: destructor !== null});
  }

  private grow(): void {
    const from = this.storage.length;
    const to = Math.max(from * 2 + MINIMUM_ARRAY_EXPAND_SIZE, from + 1);
    const storage = new Array<T>(to);
    for (let i = 0; i < this._length; i++) {
      storage[i] = this.storage[i];
    }
    this.storage = storage;
    this.logger.debug("List storage grown", {from, to});
  }

  private derivedOptions(): ListOptions<T> {
    return {logger: this.logger, random: this.random};
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._length) {
      throw new ListError({code: ListErrorCode.INDEX_OUT_OF_RANGE, index, length: this._length});
    }
  }

  private assertNotEmpty(operation: string): void {
    this.assertLive(operation);
    if (this._length === 0) {
      throw new ListError({code: ListErrorCode.EMPTY, operation});
    }
  }

  private assertLive(operation: string): void {
    if (this.destroyed) {
      throw new ListError({code: ListErrorCode.DESTROYED, operation});
    }
  }
}

/**
 * Length of `list`, 0 if the list is absent
 */
export function listLength<T>(list: List<T> | null | undefined): number {
  return list ? list.length : 0;
}

/**
 * Destroy `list`, no-op if the list is absent
 */
export function destroyList<T>(list: List<T> | null | undefined): void {
  if (list) {
    list.destroy();
  }
}
