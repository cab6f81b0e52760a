import { createClient } from "@redis/client";

import {
  componentLogger,
  loadConfig,
  parseStorageDocument,
  type DocumentKey,
  type Logger,
  type ReadDocument,
  type RemoveDocument,
  type StorageAdapter,
  type WriteDocument,
} from "@docformat/core";

/**
 * The string commands the adapter issues.
 */
export type RedisDocumentClient = Readonly<{
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}>;

/**
 * Configuration values required to build a Redis-backed adapter.
 */
export type RedisAdapterOptions = Readonly<{
  client: RedisDocumentClient;
  prefix?: string;
  logger?: Logger;
}>;

export type ConnectRedisAdapterOptions = Readonly<{
  url?: string;
  prefix?: string;
  logger?: Logger;
}>;

export type RedisAdapter = StorageAdapter & {
  close(): Promise<void>;
};

/**
 * Builds the Redis key for a given document key and prefix.
 */
const toKey = (key: DocumentKey, prefix: string): string => `${prefix}${key}`;

/**
 * Constructs a Redis-backed storage adapter using an existing client.
 * Documents are stored as JSON text and checked again when read back.
 */
export const createRedisAdapter = async ({
  client,
  prefix = loadConfig().keyPrefix,
  logger = componentLogger("redis-adapter"),
}: RedisAdapterOptions): Promise<RedisAdapter> => {
  const read: ReadDocument = async (key) => {
    const text = await client.get(toKey(key, prefix));
    if (text === null) {
      return undefined;
    }

    return { key, document: parseStorageDocument(text) };
  };

  const write: WriteDocument = async (record) => {
    await client.set(toKey(record.key, prefix), JSON.stringify(record.document));
    logger.trace({ key: record.key }, "document stored in redis");
  };

  const remove: RemoveDocument = async (key) =>
    (await client.del(toKey(key, prefix))) > 0;

  const close = async () => {
    // no-op: lifecycle managed externally
  };

  return Object.freeze({
    read,
    write,
    remove,
    close,
  });
};

/**
 * Opens a dedicated connection (`DOCFORMAT_REDIS_URL` when no url is given)
 * and closes it together with the adapter. A failed connect releases the
 * client before rejecting.
 */
export const connectRedisAdapter = async ({
  url,
  prefix,
  logger = componentLogger("redis-adapter"),
}: ConnectRedisAdapterOptions = {}): Promise<RedisAdapter> => {
  const client = createClient({ url: url ?? loadConfig().redisUrl });
  client.on("error", (error: unknown) => {
    logger.error({ err: error }, "redis client error");
  });
  try {
    await client.connect();
  } catch (error) {
    if (client.isOpen) {
      await client.disconnect();
    }
    throw error;
  }

  const adapter = await createRedisAdapter({
    client: {
      get: async (key) => {
        const reply = await client.get(key);
        return reply === null || typeof reply === "string" ? reply : String(reply);
      },
      set: (key, value) => client.set(key, value),
      del: (key) => client.del(key),
    },
    prefix,
    logger,
  });

  return Object.freeze({
    ...adapter,
    close: async () => {
      await client.quit();
    },
  });
};
