import type { StorageValue } from "./document";

/**
 * Identifier of a document within a storage backend.
 */
export type DocumentKey = string;

/**
 * Storage-stage document together with the key it is filed under.
 */
export type StoredDocument = Readonly<{
  key: DocumentKey;
  document: StorageValue;
}>;

/**
 * Reads a stored document by key, returning undefined when absent.
 */
export type ReadDocument = (key: DocumentKey) => Promise<StoredDocument | undefined>;

/**
 * Persists a document record, replacing any previous one under its key.
 */
export type WriteDocument = (record: StoredDocument) => Promise<void>;

/**
 * Deletes a document, resolving to whether one existed.
 */
export type RemoveDocument = (key: DocumentKey) => Promise<boolean>;

/**
 * Storage boundary: accepts and returns Storage-stage documents only.
 */
export type StorageAdapter = Readonly<{
  read: ReadDocument;
  write: WriteDocument;
  remove: RemoveDocument;
}>;
