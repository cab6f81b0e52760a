import type { ComplexSerializable } from "../complexType";
import type { ObjMapping } from "./document";

/**
 * Registry side of the complex-serializable contract.
 *
 * `encode` returns the instance's fields as an object-stage mapping (nested
 * sets, paths and domain objects allowed). `decode` receives those fields
 * with the reserved keys already stripped and nested values already
 * resolved. `hash` is optional; it throws `UnhashableError` when a given
 * instance has no identity hash.
 */
export interface TypeDescriptor<T extends ComplexSerializable = ComplexSerializable> {
  encode(value: T): ObjMapping;
  decode(fields: ObjMapping): T;
  hash?(value: T): number;
}

export type TypeDefinition = Readonly<{
  tag: string;
  descriptor: TypeDescriptor;
}>;

/**
 * Read-only tag lookup shared by the object-stage conversions.
 */
export type TypeRegistry = Readonly<{
  resolve(tag: string): TypeDescriptor | undefined;
  has(tag: string): boolean;
  tags(): ReadonlyArray<string>;
}>;

export type RegistryBuilder = Readonly<{
  register(tag: string, descriptor: TypeDescriptor): RegistryBuilder;
  build(): TypeRegistry;
}>;
