import { FormatError } from "./errors";

export type SetKind = "set" | "frozenset";

/**
 * Maps a member to the key deciding membership; throws for unhashable members.
 */
export type MemberKey = (value: unknown) => string;

/**
 * Unordered collection of documents with value-based membership.
 *
 * Members are deduplicated by the key their `MemberKey` computes, so two
 * structurally equal hashable values occupy a single slot. The first value
 * inserted under a key is the one kept. A `frozenset` rejects mutation.
 */
export class DocSet<T> implements Iterable<T> {
  public readonly kind: SetKind;
  private readonly members: Map<string, T>;
  private readonly keyOf: MemberKey;

  constructor(kind: SetKind, values: Iterable<T>, keyOf: MemberKey) {
    this.kind = kind;
    this.members = new Map();
    this.keyOf = keyOf;

    for (const value of values) {
      const key = keyOf(value);
      if (!this.members.has(key)) {
        this.members.set(key, value);
      }
    }

    if (kind === "frozenset") {
      Object.freeze(this);
    }
  }

  get size(): number {
    return this.members.size;
  }

  get frozen(): boolean {
    return this.kind === "frozenset";
  }

  has(value: T): boolean {
    return this.members.has(this.keyOf(value));
  }

  add(value: T): this {
    this.assertMutable();
    const key = this.keyOf(value);
    if (!this.members.has(key)) {
      this.members.set(key, value);
    }
    return this;
  }

  delete(value: T): boolean {
    this.assertMutable();
    return this.members.delete(this.keyOf(value));
  }

  values(): IterableIterator<T> {
    return this.members.values();
  }

  /**
   * Membership keys of the current members, in insertion order.
   */
  memberKeys(): IterableIterator<string> {
    return this.members.keys();
  }

  /**
   * Builds a set of the same kind from the mapped members.
   */
  map<U>(fn: (value: T) => U, keyOf: MemberKey = this.keyOf): DocSet<U> {
    return new DocSet(this.kind, [...this.members.values()].map(fn), keyOf);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.members.values();
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new FormatError("Cannot modify a frozenset", "FROZEN_SET");
    }
  }
}
