import {
  assertStorageSafe,
  freezeDocument,
  type DocumentKey,
  type StorageAdapter,
  type StoredDocument,
} from "@docformat/core";

export type MemoryAdapterOptions = Readonly<{
  seed?: Iterable<StoredDocument>;
}>;

/**
 * Checks and deeply freezes a record so callers never share mutable state
 * with the store.
 */
const freezeRecord = (record: StoredDocument): StoredDocument => {
  assertStorageSafe(record.document);
  return Object.freeze({
    key: record.key,
    document: freezeDocument(record.document),
  });
};

const seedStore = (
  map: Map<DocumentKey, StoredDocument>,
  options?: MemoryAdapterOptions
): void => {
  if (!options?.seed) {
    return;
  }

  for (const record of options.seed) {
    map.set(record.key, freezeRecord(record));
  }
};

export const createMemoryAdapter = (
  options?: MemoryAdapterOptions
): StorageAdapter => {
  const store = new Map<DocumentKey, StoredDocument>();
  seedStore(store, options);

  const read: StorageAdapter["read"] = async (key) => store.get(key);

  const write: StorageAdapter["write"] = async (record) => {
    store.set(record.key, freezeRecord(record));
  };

  const remove: StorageAdapter["remove"] = async (key) => store.delete(key);

  return Object.freeze({
    read,
    write,
    remove,
  });
};
