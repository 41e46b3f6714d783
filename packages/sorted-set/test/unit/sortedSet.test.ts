import fc from "fast-check";
import {describe, it, expect, vi} from "vitest";
import {SortedSet} from "../../src/index.js";

const numberCompare = (a: number, b: number): number => a - b;

describe("SortedSet", () => {
  it("keeps elements ordered by comparator", () => {
    const set = new SortedSet(numberCompare);
    for (const value of [5, 1, 4, 2, 3]) set.insert(value);
    expect(set.toArray()).toEqual([1, 2, 3, 4, 5]);
    expect(set.size).toBe(5);
    expect(set.first()).toBe(1);
    expect(set.last()).toBe(5);
  });

  it("collapses duplicates and keeps the first inserted element", () => {
    type Entry = {key: number; name: string};
    const set = new SortedSet<Entry>((a, b) => a.key - b.key);
    const first = {key: 1, name: "first"};
    const second = {key: 1, name: "second"};
    expect(set.insert(first)).toBe(true);
    expect(set.insert(second)).toBe(false);
    expect(set.size).toBe(1);
    expect(set.search({key: 1, name: "probe"})).toBe(first);
  });

  it("from sorts once and keeps the first of equal elements", () => {
    type Entry = {key: number; name: string};
    const first = {key: 1, name: "first"};
    const second = {key: 1, name: "second"};
    const zero = {key: 0, name: "zero"};
    const set = SortedSet.from<Entry>([first, second, zero], (a, b) => a.key - b.key);
    expect(set.toArray()).toEqual([zero, first]);
    expect(set.search({key: 1, name: "other"})).toBe(first);
    expect(set.getDestructor()).toBeNull();
  });

  it("from hands undefined to the comparator", () => {
    const set = SortedSet.from<number | undefined>([2, undefined, 1, undefined]);
    expect(set.toArray()).toEqual([undefined, 1, 2]);
    expect(set.has(undefined)).toBe(true);
  });

  it("from keeps the destructor", () => {
    const destructor = vi.fn();
    const set = SortedSet.from([3, 1], numberCompare, destructor);
    set.destroy();
    expect(destructor.mock.calls).toEqual([[1], [3]]);
  });

  it("search and has", () => {
    const set = new SortedSet(numberCompare);
    set.insert(10);
    set.insert(20);
    expect(set.search(20)).toBe(20);
    expect(set.search(15)).toBeUndefined();
    expect(set.has(10)).toBe(true);
    expect(set.has(30)).toBe(false);
  });

  it("delete", () => {
    const set = new SortedSet(numberCompare);
    set.insert(1);
    set.insert(2);
    expect(set.delete(1)).toBe(true);
    expect(set.delete(1)).toBe(false);
    expect(set.toArray()).toEqual([2]);
  });

  it("empty set", () => {
    const set = new SortedSet(numberCompare);
    expect(set.size).toBe(0);
    expect(set.first()).toBeUndefined();
    expect(set.last()).toBeUndefined();
    expect(Array.from(set)).toEqual([]);
  });

  it("is iterable in order", () => {
    const set = new SortedSet<string>();
    set.insert("b");
    set.insert("a");
    set.insert("c");
    expect([...set]).toEqual(["a", "b", "c"]);
  });

  it("destroy invokes the destructor on every element in order", () => {
    const destroyed: number[] = [];
    const set = new SortedSet(numberCompare, (value) => destroyed.push(value));
    set.insert(3);
    set.insert(1);
    set.insert(2);
    set.destroy();
    expect(destroyed).toEqual([1, 2, 3]);
    expect(set.size).toBe(0);
  });

  it("destroy skips null elements", () => {
    const destructor = vi.fn();
    const set = new SortedSet<{id: number} | null>(undefined, destructor);
    const element = {id: 1};
    set.insert(null);
    set.insert(element);
    set.destroy();
    expect(destructor).toHaveBeenCalledTimes(1);
    expect(destructor).toHaveBeenCalledWith(element);
  });

  it("destroy without destructor only empties", () => {
    const set = new SortedSet(numberCompare);
    set.insert(1);
    set.destroy();
    expect(set.size).toBe(0);
  });

  it("setDestructor replaces the destructor", () => {
    const first = vi.fn();
    const second = vi.fn();
    const set = new SortedSet(numberCompare, first);
    set.setDestructor(second);
    expect(set.getDestructor()).toBe(second);
    set.insert(1);
    set.destroy();
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(1);
  });

  it("matches a sorted unique array", () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), (data) => {
        const set = new SortedSet(numberCompare);
        for (const value of data) set.insert(value);
        const expected = Array.from(new Set(data)).sort(numberCompare);
        expect(set.toArray()).toEqual(expected);
      })
    );
  });

  it("from matches successive inserts", () => {
    fc.assert(
      fc.property(fc.array(fc.integer({min: -20, max: 20})), (data) => {
        const inserted = new SortedSet(numberCompare);
        for (const value of data) inserted.insert(value);
        expect(SortedSet.from(data, numberCompare).toArray()).toEqual(inserted.toArray());
      })
    );
  });
});
