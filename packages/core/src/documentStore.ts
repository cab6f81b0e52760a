import { componentLogger } from "./logger";
import { createFormatPipeline } from "./pipeline";
import { assertStorageSafe } from "./storageSafety";
import type { DocumentKey } from "./types/adapter";
import type { StorageValue } from "./types/document";
import type { CreateDocumentStoreOptions, DocumentStore } from "./types/store";

/**
 * Creates a store that runs `store` before every write and `load` after
 * every read, with the object stages available through the registry.
 */
export const createDocumentStore = ({
  adapter,
  registry,
  logger = componentLogger("document-store"),
}: CreateDocumentStoreOptions): DocumentStore => {
  const pipeline = createFormatPipeline({ registry, logger });

  /**
   * Checks the converted document and hands it to the adapter.
   */
  const writeDocument = async (
    key: DocumentKey,
    document: StorageValue
  ): Promise<StorageValue> => {
    assertStorageSafe(document);
    await adapter.write({ key, document });
    logger.debug({ key }, "document written");
    return document;
  };

  const readDocument = async (
    key: DocumentKey
  ): Promise<StorageValue | undefined> => {
    const record = await adapter.read(key);
    if (!record) {
      logger.debug({ key }, "document not found");
      return undefined;
    }
    return record.document;
  };

  const put: DocumentStore["put"] = async (key, value) =>
    writeDocument(key, pipeline.store(value));

  const putObject: DocumentStore["putObject"] = async (key, value) =>
    writeDocument(key, pipeline.dematerialize(value));

  const get: DocumentStore["get"] = async (key) => {
    const document = await readDocument(key);
    return document === undefined ? undefined : pipeline.load(document);
  };

  const getObject: DocumentStore["getObject"] = async (key) => {
    const document = await readDocument(key);
    return document === undefined ? undefined : pipeline.materialize(document);
  };

  const getJson: DocumentStore["getJson"] = async (key) => {
    const document = await readDocument(key);
    return document === undefined ? undefined : pipeline.toJsonMapping(document);
  };

  const remove: DocumentStore["remove"] = async (key) => {
    const removed = await adapter.remove(key);
    logger.debug({ key, removed }, "document removed");
    return removed;
  };

  return Object.freeze({
    put,
    get,
    putObject,
    getObject,
    getJson,
    remove,
  });
};
