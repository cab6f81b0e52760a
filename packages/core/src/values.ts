import { TYPE_KEY } from "./constants";
import { isComplexSerializable } from "./complexType";
import { DocSet } from "./docSet";
import { PathValue } from "./pathValue";
import type { JsonPrimitive } from "./types/document";

/**
 * Runtime guard checking if a value is a JSON primitive.
 */
export const isJsonPrimitive = (value: unknown): value is JsonPrimitive =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean";

export const isSequence = (value: unknown): value is ReadonlyArray<unknown> =>
  Array.isArray(value);

export type UnknownMapping = { readonly [key: string | symbol]: unknown };

/**
 * Plain mappings are object literals or null-prototype objects; class
 * instances never qualify.
 */
export const isPlainMapping = (value: unknown): value is UnknownMapping => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Own string and symbol keys, strings first in insertion order.
 */
export const mappingKeys = (value: object): ReadonlyArray<string | symbol> => [
  ...Object.keys(value),
  ...Object.getOwnPropertySymbols(value),
];

/**
 * Reads the `_type` tag of a mapping when it is a string.
 */
export const tagOf = (value: UnknownMapping): string | undefined => {
  const tag = value[TYPE_KEY];
  return typeof tag === "string" ? tag : undefined;
};

/**
 * Short label used in error messages.
 */
export const describeKind = (value: unknown): string => {
  if (value === null) {
    return "null";
  }

  if (Array.isArray(value)) {
    return "array";
  }

  if (value instanceof DocSet) {
    return value.kind;
  }

  if (value instanceof PathValue) {
    return "path";
  }

  if (isComplexSerializable(value)) {
    return "domain object";
  }

  if (typeof value === "object") {
    return isPlainMapping(value) ? "mapping" : value.constructor.name;
  }

  return typeof value;
};
