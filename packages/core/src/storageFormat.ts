import { DOT_SUBSTITUTE, HASH_KEY, VALUE_KEY } from "./constants";
import { UnsupportedValueError } from "./errors";
import { createDocSet } from "./identity";
import {
  assertPathPayload,
  assertSetPayload,
  isPathMapping,
  setKindOf,
} from "./tagged";
import type { StorageValue, WorkingValue } from "./types/document";
import { describeKind, isJsonPrimitive, isPlainMapping, isSequence } from "./values";

/**
 * Restores the literal dots escaped by `workingToStorage`.
 */
export const restoreKey = (key: string): string =>
  key.replaceAll(DOT_SUBSTITUTE, ".");

/**
 * Storage -> Working: tagged set mappings become native sets and every
 * mapping key, at any depth, gets its dots back.
 */
export const storageToWorking = (value: StorageValue): WorkingValue => {
  if (isJsonPrimitive(value)) {
    return value;
  }

  if (isSequence(value)) {
    return value.map(storageToWorking);
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("storage", describeKind(value));
  }

  const kind = setKindOf(value);
  if (kind) {
    const payload = value[VALUE_KEY];
    assertSetPayload(payload, kind);
    return createDocSet(kind, payload.map(storageToWorking));
  }

  return Object.fromEntries(
    Object.keys(value).map((key) => {
      if (key.includes(".")) {
        throw new UnsupportedValueError(
          "storage",
          "mapping key",
          `"${key}" contains a dot`
        );
      }
      return [restoreKey(key), storageToWorking(value[key])] as const;
    })
  );
};

/**
 * Renders a storage document as plain JSON for export: sets become arrays,
 * paths become their string and `_hash` bookkeeping is dropped.
 */
export const toJsonMapping = (value: StorageValue): StorageValue => {
  if (isJsonPrimitive(value)) {
    return value;
  }

  if (isSequence(value)) {
    return value.map(toJsonMapping);
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("storage", describeKind(value));
  }

  const kind = setKindOf(value);
  if (kind) {
    const payload = value[VALUE_KEY];
    assertSetPayload(payload, kind);
    return payload.map(toJsonMapping);
  }

  if (isPathMapping(value)) {
    const payload = value[VALUE_KEY];
    assertPathPayload(payload);
    return payload;
  }

  return Object.fromEntries(
    Object.keys(value)
      .filter((key) => key !== HASH_KEY)
      .map((key) => [restoreKey(key), toJsonMapping(value[key])] as const)
  );
};
