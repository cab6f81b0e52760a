import { ClassicLevel } from "classic-level";

import {
  parseStorageDocument,
  type DocumentKey,
  type ReadDocument,
  type RemoveDocument,
  type StorageAdapter,
  type WriteDocument,
} from "@docformat/core";

/**
 * Configuration options for connecting to a LevelDB database.
 */
export type LevelAdapterOptions = Readonly<{
  location: string;
  createIfMissing?: boolean;
  compression?: boolean;
}>;

export type LevelAdapter = StorageAdapter & {
  close(): Promise<void>;
  clear(): Promise<void>;
};

/**
 * Guards for LevelDB "not found" errors to map to undefined reads.
 */
const isNotFoundError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === "LEVEL_NOT_FOUND";

/**
 * Creates a LevelDB-backed storage adapter holding documents as JSON text.
 */
export const createLevelAdapter = async ({
  location,
  createIfMissing = true,
  compression = true,
}: LevelAdapterOptions): Promise<LevelAdapter> => {
  const db = new ClassicLevel<DocumentKey, string>(location, {
    keyEncoding: "utf8",
    valueEncoding: "utf8",
    createIfMissing,
    compression,
  });

  await db.open();

  const readText = async (key: DocumentKey): Promise<string | undefined> => {
    try {
      const text: string | undefined = await db.get(key);
      return text;
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  };

  /**
   * Fetches a document by key and checks it against the storage rules.
   */
  const read: ReadDocument = async (key) => {
    const text = await readText(key);
    return text === undefined
      ? undefined
      : { key, document: parseStorageDocument(text) };
  };

  const write: WriteDocument = async (record) => {
    await db.put(record.key, JSON.stringify(record.document));
  };

  const remove: RemoveDocument = async (key) => {
    const existing = await readText(key);
    if (existing === undefined) {
      return false;
    }
    await db.del(key);
    return true;
  };

  /**
   * Closes the underlying LevelDB database.
   */
  const close = async () => {
    await db.close();
  };

  /**
   * Clears all key/value pairs from the database.
   */
  const clear = async () => {
    await db.clear();
  };

  return Object.freeze({
    read,
    write,
    remove,
    close,
    clear,
  });
};
