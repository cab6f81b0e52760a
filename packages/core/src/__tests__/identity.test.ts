import { describe, expect, test } from "vitest";

import {
  FormatError,
  PathValue,
  UnhashableError,
  contentKey,
  createFrozenSet,
  createSet,
  documentsEqual,
  hashKey,
  identityHash,
  isHashCarrying,
} from "../index";
import { Sketch, Widget, createWidgetRegistry } from "./fixtures";

describe("identityHash", () => {
  test("is a stable non-negative 48-bit integer", () => {
    const hash = identityHash({ name: "PP-0084", link: null });

    expect(Number.isSafeInteger(hash)).toBe(true);
    expect(hash).toBeGreaterThanOrEqual(0);
    expect(hash).toBeLessThan(2 ** 48);
    expect(identityHash({ link: null, name: "PP-0084" })).toBe(hash);
  });

  test("separates values of different kinds", () => {
    expect(identityHash("1")).not.toBe(identityHash(1));
    expect(identityHash(new PathValue("/a"))).not.toBe(identityHash("/a"));
    expect(identityHash(createSet([1]))).not.toBe(identityHash(createFrozenSet([1])));
  });
});

describe("documentsEqual", () => {
  test("ignores mapping key order and set member order", () => {
    expect(documentsEqual({ a: 1, b: [1, 2] }, { b: [1, 2], a: 1 })).toBe(true);
    expect(documentsEqual(createSet([1, 2, 3]), createSet([3, 1, 2]))).toBe(true);
  });

  test("keeps array order significant", () => {
    expect(documentsEqual([1, 2], [2, 1])).toBe(false);
  });
});

describe("contentKey", () => {
  test("renders sets with sorted members", () => {
    expect(contentKey(createFrozenSet(["b", "a"]))).toBe('F{"a","b"}');
    expect(contentKey(new PathValue("/x"))).toBe('P("/x")');
  });

  test("needs a resolver for domain objects", () => {
    const registry = createWidgetRegistry();

    expect(() => contentKey(new Widget(1))).toThrow(FormatError);
    expect(contentKey(new Widget(1), registry.resolve)).toBe('O<"Widget">{"n":1}');
  });
});

describe("hashKey", () => {
  test("accepts primitives, paths, frozensets and hash-carrying mappings", () => {
    expect(hashKey("a")).toBe('"a"');
    expect(hashKey(new PathValue("/p"))).toBe('P("/p")');
    expect(hashKey(createFrozenSet([2, 1]))).toBe("F{1,2}");
    expect(hashKey({ _hash: 3, a: 1 })).toBe('H{"_hash":3,"a":1}');
  });

  test.each([
    ["array", [1]],
    ["mapping", { a: 1 }],
    ["set", createSet([1])],
  ])("rejects a mutable %s", (_kind, value) => {
    expect(() => hashKey(value)).toThrow(UnhashableError);
  });

  test("uses the descriptor hash of domain objects", () => {
    const registry = createWidgetRegistry();

    expect(hashKey(new Widget(5), registry.resolve)).toBe(
      `O<"Widget">#${identityHash(5)}`
    );
    expect(() => hashKey(new Widget(5))).toThrow(UnhashableError);
    expect(() => hashKey(new Sketch("draft"), registry.resolve)).toThrow(UnhashableError);
  });

  test("only treats numeric _hash fields as identity", () => {
    expect(isHashCarrying({ _hash: 1 })).toBe(true);
    expect(isHashCarrying({ _hash: "1" })).toBe(false);
    expect(isHashCarrying([1])).toBe(false);
  });
});

describe("DocSet", () => {
  test("deduplicates structurally equal members", () => {
    const nested = createSet([createFrozenSet([1, 2]), createFrozenSet([2, 1])]);
    const carrying = createSet([
      { _hash: 1, a: 1 },
      { _hash: 1, a: 1 },
    ]);

    expect(nested.size).toBe(1);
    expect(carrying.size).toBe(1);
  });

  test("supports membership updates on mutable sets", () => {
    const set = createSet<string>(["a"]);

    set.add("b").add("a");
    expect(set.size).toBe(2);
    expect(set.has("b")).toBe(true);
    expect(set.delete("a")).toBe(true);
    expect(set.delete("a")).toBe(false);
    expect([...set]).toEqual(["b"]);
  });

  test("keeps the membership rule when mapped", () => {
    const mapped = createSet([1, 2, 3]).map((n) => n % 2);

    expect(mapped.kind).toBe("set");
    expect(mapped.size).toBe(2);
    expect(() => mapped.add([1])).toThrow(UnhashableError);
  });

  test("rejects mutation of frozensets", () => {
    const set = createFrozenSet(["a"]);

    expect(() => set.add("b")).toThrow("Cannot modify a frozenset");
    expect(() => set.delete("a")).toThrow(FormatError);
    expect(set.size).toBe(1);
  });

  test("rejects unhashable members", () => {
    expect(() => createSet([[1]])).toThrow(UnhashableError);
    expect(() => createSet<unknown>([]).add({ a: 1 })).toThrow(UnhashableError);
  });

  test("deduplicates domain objects by identity hash", () => {
    const registry = createWidgetRegistry();
    const set = createSet([new Widget(1), new Widget(1), new Widget(2)], registry.resolve);

    expect(set.size).toBe(2);
    expect(set.has(new Widget(2))).toBe(true);
  });
});
