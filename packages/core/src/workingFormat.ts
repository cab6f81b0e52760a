import { DOT_SUBSTITUTE, TYPE_KEY, VALUE_KEY } from "./constants";
import { DocSet } from "./docSet";
import { UnsupportedValueError } from "./errors";
import { PathValue } from "./pathValue";
import { assertPathPayload, isPathMapping } from "./tagged";
import type {
  RawValue,
  StorageMapping,
  StorageValue,
  WorkingMapping,
  WorkingValue,
} from "./types/document";
import {
  describeKind,
  isJsonPrimitive,
  isPlainMapping,
  isSequence,
  mappingKeys,
} from "./values";

/**
 * Storage form of a mapping key. Symbol keys (diff markers) become
 * `__label__` and do not turn back into symbols on load.
 */
export const storageKey = (key: string | symbol): string =>
  typeof key === "symbol"
    ? `__${(key.description ?? "").replaceAll(".", DOT_SUBSTITUTE)}__`
    : key.replaceAll(".", DOT_SUBSTITUTE);

/**
 * Escapes every key of a mapping, refusing keys that would not come back
 * unchanged or would land on the same storage key.
 */
const toStorageMapping = (value: WorkingMapping): StorageMapping => {
  const entries: Array<readonly [string, StorageValue]> = [];
  const seen = new Set<string>();

  for (const key of mappingKeys(value)) {
    if (typeof key === "string" && key.includes(DOT_SUBSTITUTE)) {
      throw new UnsupportedValueError(
        "working",
        "mapping key",
        `"${key}" contains the reserved character ${DOT_SUBSTITUTE}`
      );
    }

    const stored = storageKey(key);
    if (seen.has(stored)) {
      throw new UnsupportedValueError(
        "working",
        "mapping key",
        `more than one key maps to "${stored}"`
      );
    }
    seen.add(stored);
    entries.push([stored, workingToStorage(value[key])]);
  }

  return Object.fromEntries(entries);
};

/**
 * Working -> Storage: native sets become tagged mappings and dotted keys
 * are escaped.
 */
export const workingToStorage = (value: WorkingValue): StorageValue => {
  if (isJsonPrimitive(value)) {
    return value;
  }

  if (isSequence(value)) {
    return value.map(workingToStorage);
  }

  if (value instanceof DocSet) {
    return {
      [TYPE_KEY]: value.kind,
      [VALUE_KEY]: [...value].map(workingToStorage),
    };
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("working", describeKind(value));
  }

  return toStorageMapping(value);
};

/**
 * Working -> Raw: tagged path mappings become `PathValue`s.
 */
export const workingToRaw = (value: WorkingValue): RawValue => {
  if (isJsonPrimitive(value)) {
    return value;
  }

  if (isSequence(value)) {
    return value.map(workingToRaw);
  }

  if (value instanceof DocSet) {
    return value.map(workingToRaw);
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("working", describeKind(value));
  }

  if (isPathMapping(value)) {
    const payload = value[VALUE_KEY];
    assertPathPayload(payload);
    return new PathValue(payload);
  }

  return Object.fromEntries(
    mappingKeys(value).map((key) => [key, workingToRaw(value[key])] as const)
  );
};
