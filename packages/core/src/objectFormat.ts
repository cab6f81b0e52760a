import { HASH_KEY, TYPE_KEY } from "./constants";
import { TYPE_TAG, isComplexSerializable, type ComplexSerializable } from "./complexType";
import { DocSet } from "./docSet";
import { UnhashableError, UnregisteredTypeError, UnsupportedValueError } from "./errors";
import { PathValue } from "./pathValue";
import type { ObjectStageContext } from "./rawFormat";
import type { ObjMapping, ObjValue, RawMapping, RawValue } from "./types/document";
import type { TypeDescriptor } from "./types/registry";
import {
  describeKind,
  isJsonPrimitive,
  isPlainMapping,
  isSequence,
  mappingKeys,
} from "./values";

/**
 * Best-effort identity hash; an unhashable instance simply gets no `_hash`.
 */
const hashOf = (
  descriptor: TypeDescriptor,
  value: ComplexSerializable,
  context: ObjectStageContext
): number | undefined => {
  if (!descriptor.hash) {
    return undefined;
  }

  try {
    return descriptor.hash(value);
  } catch (error) {
    if (error instanceof UnhashableError) {
      context.logger.debug({ tag: value[TYPE_TAG] }, "instance not hashable, _hash omitted");
      return undefined;
    }
    throw error;
  }
};

const encodeInstance = (
  value: ComplexSerializable,
  context: ObjectStageContext
): RawMapping => {
  const tag = value[TYPE_TAG];
  const descriptor = context.registry.resolve(tag);

  if (!descriptor) {
    throw new UnregisteredTypeError(tag);
  }

  const fields = walkMapping(descriptor.encode(value), context);
  const hash = hashOf(descriptor, value, context);
  return hash === undefined
    ? { [TYPE_KEY]: tag, ...fields }
    : { [TYPE_KEY]: tag, [HASH_KEY]: hash, ...fields };
};

const walkToRaw = (value: ObjValue, context: ObjectStageContext): RawValue => {
  if (isJsonPrimitive(value) || value instanceof PathValue) {
    return value;
  }

  if (isSequence(value)) {
    return value.map((item) => walkToRaw(item, context));
  }

  if (value instanceof DocSet) {
    return value.map((member) => walkToRaw(member, context));
  }

  if (isComplexSerializable(value)) {
    return encodeInstance(value, context);
  }

  if (!isPlainMapping(value)) {
    throw new UnsupportedValueError("object", describeKind(value));
  }

  return walkMapping(value, context);
};

const walkMapping = (value: ObjMapping, context: ObjectStageContext): RawMapping =>
  Object.fromEntries(
    mappingKeys(value).map((key) => [key, walkToRaw(value[key], context)] as const)
  );

/**
 * Object -> Raw: live instances are replaced by mappings built from their
 * descriptor's `encode`, tagged with `_type` and, when hashable, `_hash`.
 */
export const objectToRaw = (value: ObjValue, context: ObjectStageContext): RawValue =>
  walkToRaw(value, context);
