import { describe, expect, test } from "vitest";
import { StorageSafetyError, type StoredDocument } from "@docformat/core";

import { createMemoryAdapter } from "../memoryAdapter";

const sampleRecord = (key: string, seed = 0): StoredDocument => ({
  key,
  document: { seed, items: [seed, seed + 1], nested: { flag: true } },
});

describe("createMemoryAdapter", () => {
  test("reads back stored documents", async () => {
    const adapter = createMemoryAdapter();
    const original = sampleRecord("cert-1");

    await adapter.write(original);
    const retrieved = await adapter.read("cert-1");

    expect(retrieved).toEqual(original);
    expect(retrieved).not.toBe(original);
  });

  test("exposes frozen documents", async () => {
    const adapter = createMemoryAdapter();
    await adapter.write(sampleRecord("frozen", 10));

    const retrieved = await adapter.read("frozen");
    if (!retrieved) {
      throw new Error("missing");
    }

    expect(Object.isFrozen(retrieved)).toBe(true);
    expect(Object.isFrozen(retrieved.document)).toBe(true);
    expect(retrieved.document).toEqual({
      seed: 10,
      items: [10, 11],
      nested: { flag: true },
    });
  });

  test("seeds initial documents", async () => {
    const seeded = sampleRecord("seed", 3);
    const adapter = createMemoryAdapter({ seed: [seeded] });

    const result = await adapter.read("seed");
    expect(result).toEqual(seeded);
  });

  test("removes documents and reports whether one existed", async () => {
    const adapter = createMemoryAdapter({ seed: [sampleRecord("gone")] });

    expect(await adapter.remove("gone")).toBe(true);
    expect(await adapter.remove("gone")).toBe(false);
    expect(await adapter.read("gone")).toBeUndefined();
  });

  test("rejects documents with dotted keys", async () => {
    const adapter = createMemoryAdapter();

    await expect(
      adapter.write({ key: "bad", document: { "a.b": 1 } })
    ).rejects.toBeInstanceOf(StorageSafetyError);
  });
});
