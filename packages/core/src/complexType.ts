/**
 * Property under which a domain instance exposes its registered type tag.
 */
export const TYPE_TAG: unique symbol = Symbol.for("docformat.type-tag");

/**
 * Instance side of the complex-serializable contract: every live domain
 * object names the tag its descriptor is registered under.
 */
export interface ComplexSerializable {
  readonly [TYPE_TAG]: string;
}

export const isComplexSerializable = (
  value: unknown
): value is ComplexSerializable =>
  typeof value === "object" &&
  value !== null &&
  TYPE_TAG in value &&
  typeof value[TYPE_TAG] === "string";
