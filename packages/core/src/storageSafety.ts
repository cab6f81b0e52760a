import { DOT_SUBSTITUTE } from "./constants";
import { StorageSafetyError } from "./errors";
import type { StorageValue } from "./types/document";
import { describeKind, isJsonPrimitive, isPlainMapping, isSequence } from "./values";

const childPath = (path: string, key: string | number): string =>
  typeof key === "number"
    ? `${path}[${key}]`
    : `${path}.${key.replaceAll(".", DOT_SUBSTITUTE)}`;

const checkValue = (value: unknown, path: string): void => {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new StorageSafetyError(path, `non-finite number ${value}`);
    }
    return;
  }

  if (isSequence(value)) {
    value.forEach((item, index) => checkValue(item, childPath(path, index)));
    return;
  }

  if (!isPlainMapping(value)) {
    throw new StorageSafetyError(path, `value of kind "${describeKind(value)}"`);
  }

  const symbols = Object.getOwnPropertySymbols(value);
  if (symbols.length > 0) {
    throw new StorageSafetyError(path, `symbol key ${String(symbols[0])}`);
  }

  for (const key of Object.keys(value)) {
    if (key.includes(".")) {
      throw new StorageSafetyError(path, `key "${key}" contains a dot`);
    }
    checkValue(value[key], childPath(path, key));
  }
};

/**
 * Proves a value can cross the storage boundary: JSON kinds only, plain
 * mappings, finite numbers and no dotted or symbol keys.
 */
export function assertStorageSafe(value: unknown): asserts value is StorageValue {
  checkValue(value, "$");
}

export const isStorageSafe = (value: unknown): value is StorageValue => {
  try {
    assertStorageSafe(value);
    return true;
  } catch (error) {
    if (error instanceof StorageSafetyError) {
      return false;
    }
    throw error;
  }
};

/**
 * Parses JSON text read from a storage backend into a checked document.
 */
export const parseStorageDocument = (text: string): StorageValue => {
  const parsed: unknown = JSON.parse(text);
  assertStorageSafe(parsed);
  return parsed;
};

/**
 * Deeply freezes a storage document, returning a frozen copy.
 */
export const freezeDocument = (value: StorageValue): StorageValue => {
  if (isJsonPrimitive(value)) {
    return value;
  }

  if (isSequence(value)) {
    const frozenItems = value.map((item) => freezeDocument(item));
    return Object.freeze(frozenItems);
  }

  const frozenEntries = Object.entries(value).map(
    ([key, item]) => [key, freezeDocument(item)] as const
  );
  return Object.freeze(Object.fromEntries(frozenEntries));
};
