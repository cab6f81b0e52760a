import type { Logger } from "pino";

import type { DocumentKey, StorageAdapter } from "./adapter";
import type { ObjValue, StorageValue, WorkingValue } from "./document";
import type { TypeRegistry } from "./registry";

/**
 * Options required to create a document store.
 */
export type CreateDocumentStoreOptions = Readonly<{
  adapter: StorageAdapter;
  registry?: TypeRegistry;
  logger?: Logger;
}>;

/**
 * Persistence surface that never lets an unconverted value reach the adapter.
 */
export type DocumentStore = Readonly<{
  put(key: DocumentKey, value: WorkingValue): Promise<StorageValue>;
  get(key: DocumentKey): Promise<WorkingValue | undefined>;
  putObject(key: DocumentKey, value: ObjValue): Promise<StorageValue>;
  getObject(key: DocumentKey): Promise<ObjValue | undefined>;
  /**
   * Plain JSON rendering of the stored document, for export.
   */
  getJson(key: DocumentKey): Promise<StorageValue | undefined>;
  remove(key: DocumentKey): Promise<boolean>;
}>;
