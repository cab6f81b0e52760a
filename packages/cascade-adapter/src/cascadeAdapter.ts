import type {
  DocumentKey,
  ReadDocument,
  RemoveDocument,
  StorageAdapter,
  StoredDocument,
  WriteDocument,
} from "@docformat/core";

/**
 * Options for composing multiple adapters into a cascading hierarchy.
 */
export type CascadeAdapterOptions = Readonly<{
  adapters: ReadonlyArray<StorageAdapter>;
}>;

export type CascadeAdapter = StorageAdapter;

/**
 * Validates that at least one adapter is provided and normalizes the array.
 */
const ensureAdapters = (
  adapters: ReadonlyArray<StorageAdapter>
): readonly StorageAdapter[] => {
  if (adapters.length === 0) {
    throw new Error("createCascadeAdapter: expected at least one adapter");
  }
  return Array.from(adapters);
};

/**
 * Creates an adapter over layers ordered fastest first. Reads fall through
 * the layers and copy a hit into every faster layer; writes and removals
 * reach all of them.
 */
export const createCascadeAdapter = ({
  adapters,
}: CascadeAdapterOptions): CascadeAdapter => {
  const layers = ensureAdapters(adapters);

  const read: ReadDocument = async (key: DocumentKey) => {
    for (let index = 0; index < layers.length; index += 1) {
      const record = await layers[index].read(key);
      if (record) {
        await hydrate(layers.slice(0, index), record);
        return record;
      }
    }

    return undefined;
  };

  const hydrate = async (
    faster: ReadonlyArray<StorageAdapter>,
    record: StoredDocument
  ): Promise<void> => {
    await Promise.all(faster.map((layer) => layer.write(record)));
  };

  const write: WriteDocument = async (record) => {
    await Promise.all(layers.map((layer) => layer.write(record)));
  };

  /**
   * Removes the key everywhere; true when any layer held it.
   */
  const remove: RemoveDocument = async (key) => {
    const results = await Promise.all(layers.map((layer) => layer.remove(key)));
    return results.some(Boolean);
  };

  return Object.freeze({
    read,
    write,
    remove,
  });
};
