import type { Logger } from "pino";

import type { ObjValue, RawValue, StorageValue, WorkingValue } from "./document";
import type { TypeRegistry } from "./registry";

export type FormatPipelineOptions = Readonly<{
  registry?: TypeRegistry;
  logger?: Logger;
}>;

/**
 * Every conversion of the Storage <-> Working <-> Raw <-> Object chain.
 */
export type FormatPipeline = Readonly<{
  registry: TypeRegistry;
  load(document: StorageValue): WorkingValue;
  store(value: WorkingValue): StorageValue;
  toRaw(value: WorkingValue): RawValue;
  toWorking(value: RawValue): WorkingValue;
  toObject(value: RawValue): ObjValue;
  fromObject(value: ObjValue): RawValue;
  /**
   * Storage -> Object in one call.
   */
  materialize(document: StorageValue): ObjValue;
  /**
   * Object -> Storage in one call.
   */
  dematerialize(value: ObjValue): StorageValue;
  toJsonMapping(document: StorageValue): StorageValue;
}>;
