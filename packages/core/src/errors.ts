export type FormatErrorCode =
  | "UNHASHABLE"
  | "MALFORMED_TAG"
  | "UNSUPPORTED_VALUE"
  | "DECODE_FAILED"
  | "REGISTRY_CONFLICT"
  | "REGISTRY_SEALED"
  | "UNREGISTERED_TYPE"
  | "STORAGE_UNSAFE"
  | "FROZEN_SET"
  | "INVALID_CONFIG";

export type FormatErrorOptions = Readonly<{
  context?: Record<string, unknown>;
  cause?: unknown;
}>;

/**
 * Base class for every failure raised by the format layer.
 */
export class FormatError extends Error {
  public readonly code: FormatErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: FormatErrorCode,
    options: FormatErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = options.context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A value without an identity hash was used where one is required.
 */
export class UnhashableError extends FormatError {
  constructor(kind: string, context?: Record<string, unknown>) {
    super(`Unhashable value of kind "${kind}"`, "UNHASHABLE", {
      context: { kind, ...context },
    });
  }
}

/**
 * A tagged mapping is missing its payload or carries one of the wrong shape.
 */
export class MalformedTagError extends FormatError {
  constructor(tag: string, detail: string, cause?: unknown) {
    super(`Malformed "${tag}" mapping: ${detail}`, "MALFORMED_TAG", {
      context: { tag },
      cause,
    });
  }
}

export class UnsupportedValueError extends FormatError {
  constructor(stage: string, kind: string, detail?: string) {
    super(
      `Value of kind "${kind}" is not allowed at the ${stage} stage` +
        (detail === undefined ? "" : `: ${detail}`),
      "UNSUPPORTED_VALUE",
      { context: { stage, kind } }
    );
  }
}

/**
 * A registered descriptor could not rebuild an instance from its fields.
 */
export class DecodeError extends FormatError {
  constructor(tag: string, detail: string, cause?: unknown) {
    super(`Cannot decode "${tag}": ${detail}`, "DECODE_FAILED", {
      context: { tag },
      cause,
    });
  }
}

export class RegistryConflictError extends FormatError {
  constructor(tag: string, detail: string) {
    super(`Cannot register "${tag}": ${detail}`, "REGISTRY_CONFLICT", {
      context: { tag },
    });
  }
}

export class UnregisteredTypeError extends FormatError {
  constructor(tag: string) {
    super(`No descriptor registered for "${tag}"`, "UNREGISTERED_TYPE", {
      context: { tag },
    });
  }
}

/**
 * A document about to cross the storage boundary violates the storage rules.
 */
export class StorageSafetyError extends FormatError {
  constructor(path: string, detail: string) {
    super(`Unsafe storage document at ${path}: ${detail}`, "STORAGE_UNSAFE", {
      context: { path },
    });
  }
}

export class ConfigurationError extends FormatError {
  constructor(detail: string, cause?: unknown) {
    super(`Invalid configuration: ${detail}`, "INVALID_CONFIG", { cause });
  }
}
