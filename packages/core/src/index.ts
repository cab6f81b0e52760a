export {
  DOT_SUBSTITUTE,
  FROZENSET_TAG,
  HASH_KEY,
  PATH_TAG,
  RESERVED_TAGS,
  SET_TAG,
  TYPE_KEY,
  VALUE_KEY,
} from "./constants";
export { TYPE_TAG, isComplexSerializable } from "./complexType";
export type { ComplexSerializable } from "./complexType";
export { loadConfig, loadLoggingConfig } from "./config";
export type { Environment, FormatConfig, LogLevel } from "./config";
export { DocSet } from "./docSet";
export type { MemberKey, SetKind } from "./docSet";
export { createDocumentStore } from "./documentStore";
export {
  ConfigurationError,
  DecodeError,
  FormatError,
  MalformedTagError,
  RegistryConflictError,
  StorageSafetyError,
  UnhashableError,
  UnregisteredTypeError,
  UnsupportedValueError,
} from "./errors";
export type { FormatErrorCode } from "./errors";
export { load, store } from "./format";
export {
  contentKey,
  createDocSet,
  createFrozenSet,
  createSet,
  documentsEqual,
  hashKey,
  identityHash,
  isHashCarrying,
  memberKeyFor,
} from "./identity";
export type { TypeResolver } from "./identity";
export { componentLogger, createLogger, logger } from "./logger";
export type { Logger } from "./logger";
export { objectToRaw } from "./objectFormat";
export { PathValue } from "./pathValue";
export { createFormatPipeline } from "./pipeline";
export { rawToObject, rawToWorking } from "./rawFormat";
export type { ObjectStageContext } from "./rawFormat";
export { createRegistryBuilder, createTypeRegistry, emptyRegistry } from "./registry";
export {
  assertStorageSafe,
  freezeDocument,
  isStorageSafe,
  parseStorageDocument,
} from "./storageSafety";
export { restoreKey, storageToWorking, toJsonMapping } from "./storageFormat";
export { storageKey, workingToRaw, workingToStorage } from "./workingFormat";
export { isJsonPrimitive, isPlainMapping } from "./values";
export type { UnknownMapping } from "./values";
export type {
  DocumentKey,
  ReadDocument,
  RemoveDocument,
  StorageAdapter,
  StoredDocument,
  WriteDocument,
} from "./types/adapter";
export type {
  JsonPrimitive,
  ObjMapping,
  ObjValue,
  RawMapping,
  RawValue,
  StorageArray,
  StorageMapping,
  StorageValue,
  WorkingMapping,
  WorkingValue,
} from "./types/document";
export type { FormatPipeline, FormatPipelineOptions } from "./types/pipeline";
export type {
  RegistryBuilder,
  TypeDefinition,
  TypeDescriptor,
  TypeRegistry,
} from "./types/registry";
export type { CreateDocumentStoreOptions, DocumentStore } from "./types/store";
