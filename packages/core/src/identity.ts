import { createHash } from "crypto";

import { TYPE_TAG, isComplexSerializable } from "./complexType";
import { HASH_KEY } from "./constants";
import { DocSet, type MemberKey, type SetKind } from "./docSet";
import {
  UnhashableError,
  UnregisteredTypeError,
  UnsupportedValueError,
} from "./errors";
import { PathValue } from "./pathValue";
import type { TypeDescriptor } from "./types/registry";
import {
  describeKind,
  isJsonPrimitive,
  isPlainMapping,
  isSequence,
  mappingKeys,
  type UnknownMapping,
} from "./values";

/**
 * Looks up the descriptor of a domain tag; `TypeRegistry.resolve` fits.
 */
export type TypeResolver = (tag: string) => TypeDescriptor | undefined;

const compareKeys = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

const keyLabel = (key: string | symbol): string =>
  typeof key === "string" ? JSON.stringify(key) : `@${key.description ?? ""}`;

/**
 * Mappings whose `_hash` field is a number stay hashable at every stage.
 */
export const isHashCarrying = (value: unknown): value is UnknownMapping =>
  isPlainMapping(value) && typeof value[HASH_KEY] === "number";

const contentKeyOf = (value: unknown, resolve?: TypeResolver): string => {
  if (isJsonPrimitive(value)) {
    return JSON.stringify(value);
  }

  if (isSequence(value)) {
    return `[${value.map((item) => contentKeyOf(item, resolve)).join(",")}]`;
  }

  if (value instanceof DocSet) {
    const members = [...value]
      .map((member) => contentKeyOf(member, resolve))
      .sort(compareKeys);
    return `${value.frozen ? "F" : "S"}{${members.join(",")}}`;
  }

  if (value instanceof PathValue) {
    return `P(${JSON.stringify(value.path)})`;
  }

  if (isComplexSerializable(value)) {
    const tag = value[TYPE_TAG];
    const descriptor = resolve?.(tag);
    if (!descriptor) {
      throw new UnregisteredTypeError(tag);
    }
    return `O<${JSON.stringify(tag)}>${contentKeyOf(descriptor.encode(value), resolve)}`;
  }

  if (isPlainMapping(value)) {
    const entries = mappingKeys(value)
      .map((key) => `${keyLabel(key)}:${contentKeyOf(value[key], resolve)}`)
      .sort(compareKeys);
    return `{${entries.join(",")}}`;
  }

  throw new UnsupportedValueError("any", describeKind(value));
};

/**
 * Canonical text of a value at any stage. Mapping keys and set members are
 * sorted, so structurally equal values always produce the same key.
 */
export const contentKey = (value: unknown, resolve?: TypeResolver): string =>
  contentKeyOf(value, resolve);

/**
 * Stable 48-bit identity hash derived from the SHA-256 of `contentKey`.
 */
export const identityHash = (value: unknown, resolve?: TypeResolver): number =>
  createHash("sha256")
    .update(contentKeyOf(value, resolve))
    .digest()
    .readUIntBE(0, 6);

export const documentsEqual = (
  left: unknown,
  right: unknown,
  resolve?: TypeResolver
): boolean => contentKeyOf(left, resolve) === contentKeyOf(right, resolve);

/**
 * Membership key of a set member; throws `UnhashableError` for arrays,
 * mutable sets, plain mappings and domain objects without an identity hash.
 */
export const hashKey = (value: unknown, resolve?: TypeResolver): string => {
  if (isJsonPrimitive(value) || value instanceof PathValue) {
    return contentKeyOf(value);
  }

  if (value instanceof DocSet) {
    if (!value.frozen) {
      throw new UnhashableError("set");
    }
    return `F{${[...value.memberKeys()].sort(compareKeys).join(",")}}`;
  }

  if (isComplexSerializable(value)) {
    const tag = value[TYPE_TAG];
    const descriptor = resolve?.(tag);
    if (!descriptor?.hash) {
      throw new UnhashableError("domain object", { tag });
    }
    return `O<${JSON.stringify(tag)}>#${descriptor.hash(value)}`;
  }

  if (isHashCarrying(value)) {
    return `H${contentKeyOf(value, resolve)}`;
  }

  if (isSequence(value) || isPlainMapping(value)) {
    throw new UnhashableError(describeKind(value));
  }

  throw new UnsupportedValueError("any", describeKind(value));
};

export const memberKeyFor =
  (resolve?: TypeResolver): MemberKey =>
  (value) =>
    hashKey(value, resolve);

const defaultMemberKey = memberKeyFor();

export const createSet = <T>(
  values: Iterable<T> = [],
  resolve?: TypeResolver
): DocSet<T> =>
  new DocSet("set", values, resolve ? memberKeyFor(resolve) : defaultMemberKey);

export const createFrozenSet = <T>(
  values: Iterable<T> = [],
  resolve?: TypeResolver
): DocSet<T> =>
  new DocSet(
    "frozenset",
    values,
    resolve ? memberKeyFor(resolve) : defaultMemberKey
  );

export const createDocSet = <T>(
  kind: SetKind,
  values: Iterable<T> = [],
  resolve?: TypeResolver
): DocSet<T> =>
  kind === "set" ? createSet(values, resolve) : createFrozenSet(values, resolve);
