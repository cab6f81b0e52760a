import { z, type ZodError } from "zod";

import { FROZENSET_TAG, PATH_TAG, SET_TAG } from "./constants";
import type { SetKind } from "./docSet";
import { MalformedTagError } from "./errors";
import { tagOf, type UnknownMapping } from "./values";

const setPayloadSchema = z.array(z.unknown(), {
  required_error: "missing _value",
  invalid_type_error: "_value must be an array",
});

const pathPayloadSchema = z.string({
  required_error: "missing _value",
  invalid_type_error: "_value must be a string",
});

const describeIssues = (error: ZodError): string =>
  error.issues.map((issue) => issue.message).join("; ");

/**
 * Kind of a tagged set mapping, or undefined for any other mapping.
 */
export const setKindOf = (mapping: UnknownMapping): SetKind | undefined => {
  const tag = tagOf(mapping);
  return tag === SET_TAG || tag === FROZENSET_TAG ? tag : undefined;
};

export const isPathMapping = (mapping: UnknownMapping): boolean =>
  tagOf(mapping) === PATH_TAG;

/**
 * Checks the `_value` of a tagged set mapping.
 */
export function assertSetPayload<T>(
  payload: T | undefined,
  kind: SetKind
): asserts payload is Extract<T, ReadonlyArray<unknown>> {
  const result = setPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedTagError(kind, describeIssues(result.error), result.error);
  }
}

/**
 * Checks the `_value` of a tagged path mapping.
 */
export function assertPathPayload<T>(
  payload: T | undefined
): asserts payload is Extract<T, string> {
  const result = pathPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new MalformedTagError(PATH_TAG, describeIssues(result.error), result.error);
  }
}
