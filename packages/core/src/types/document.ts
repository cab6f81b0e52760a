import type { ComplexSerializable } from "../complexType";
import type { DocSet } from "../docSet";
import type { PathValue } from "../pathValue";

export type JsonPrimitive = string | number | boolean | null;

/**
 * Database-safe tree: JSON kinds only, no dotted keys.
 */
export type StorageMapping = { readonly [key: string]: StorageValue };

export type StorageArray = ReadonlyArray<StorageValue>;

export type StorageValue = JsonPrimitive | StorageArray | StorageMapping;

/**
 * Application tree: native sets and dotted or symbol keys allowed.
 */
export type WorkingMapping = { readonly [key: string | symbol]: WorkingValue };

export type WorkingValue =
  | JsonPrimitive
  | ReadonlyArray<WorkingValue>
  | WorkingMapping
  | DocSet<WorkingValue>;

/**
 * Working tree with filesystem paths materialized.
 */
export type RawMapping = { readonly [key: string | symbol]: RawValue };

export type RawValue =
  | JsonPrimitive
  | ReadonlyArray<RawValue>
  | RawMapping
  | DocSet<RawValue>
  | PathValue;

/**
 * Raw tree with registered tagged mappings resolved into domain instances.
 */
export type ObjMapping = { readonly [key: string | symbol]: ObjValue };

export type ObjValue =
  | JsonPrimitive
  | ReadonlyArray<ObjValue>
  | ObjMapping
  | DocSet<ObjValue>
  | PathValue
  | ComplexSerializable;
