import type { Logger } from "pino";

import { HASH_KEY, PATH_TAG, RESERVED_TAGS, TYPE_KEY, VALUE_KEY } from "./constants";
import { DocSet } from "./docSet";
import { DecodeError, FormatError, UnsupportedValueError } from "./errors";
import { identityHash, memberKeyFor } from "./identity";
import { PathValue } from "./pathValue";
import type {
  ObjMapping,
  ObjValue,
  RawValue,
  WorkingValue,
} from "./types/document";
import type { TypeDescriptor, TypeRegistry } from "./types/registry";
import {
  describeKind,
  isJsonPrimitive,
  isPlainMapping,
  isSequence,
  mappingKeys,
  tagOf,
} from "./values";

/**
 * Dependencies of the conversions that touch domain objects.
 */
export type ObjectStageContext = Readonly<{
  registry: TypeRegistry;
  logger: Logger;
}>;

/**
 * Raw -> Working: paths become tagged mappings that carry their identity
 * hash, so a path inside a set keeps a stable membership key.
 */
export const rawToWorking = (value: RawValue): WorkingValue => {
  if (isJsonPrimitive(value)) {
    return value;
  }

  if (isSequence(value)) {
    return value.map(rawToWorking);
  }

  if (value instanceof DocSet) {
    return value.map(rawToWorking);
  }

  if (value instanceof PathValue) {
    return {
      [TYPE_KEY]: PATH_TAG,
      [VALUE_KEY]: value.path,
      [HASH_KEY]: identityHash(value),
    };
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("raw", describeKind(value));
  }

  return Object.fromEntries(
    mappingKeys(value).map((key) => [key, rawToWorking(value[key])] as const)
  );
};

const decodeFields = (
  tag: string,
  descriptor: TypeDescriptor,
  fields: ObjMapping
): ObjValue => {
  try {
    return descriptor.decode(fields);
  } catch (error) {
    if (error instanceof FormatError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new DecodeError(tag, detail, error);
  }
};

const walkToObject = (value: RawValue, context: ObjectStageContext): ObjValue => {
  if (isJsonPrimitive(value) || value instanceof PathValue) {
    return value;
  }

  if (isSequence(value)) {
    return value.map((item) => walkToObject(item, context));
  }

  if (value instanceof DocSet) {
    return value.map(
      (member) => walkToObject(member, context),
      memberKeyFor(context.registry.resolve)
    );
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("raw", describeKind(value));
  }

  const entries = mappingKeys(value).map(
    (key) => [key, walkToObject(value[key], context)] as const
  );
  const tag = tagOf(value);
  const descriptor = tag === undefined ? undefined : context.registry.resolve(tag);

  if (tag === undefined || descriptor === undefined) {
    if (tag !== undefined && !RESERVED_TAGS.has(tag)) {
      context.logger.debug({ tag }, "unresolved type tag left as mapping");
    }
    return Object.fromEntries(entries);
  }

  const fields = Object.fromEntries(
    entries.filter(([key]) => key !== TYPE_KEY && key !== HASH_KEY)
  );
  return decodeFields(tag, descriptor, fields);
};

/**
 * Raw -> Object: mappings tagged with a registered type are decoded into
 * live instances, innermost first. Unknown tags stay plain mappings.
 */
export const rawToObject = (value: RawValue, context: ObjectStageContext): ObjValue =>
  walkToObject(value, context);
