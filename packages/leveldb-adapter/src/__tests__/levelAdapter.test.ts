import { describe, expect, test } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import type { StoredDocument } from "@docformat/core";
import { createLevelAdapter } from "../levelAdapter";

const tempDir = async () => mkdtemp(join(tmpdir(), "docformat-leveldb-adapter-"));

const sampleRecord = (key: string, seed = 0): StoredDocument => ({
  key,
  document: {
    seed,
    profiles: { _type: "frozenset", _value: [`pp-${seed}`] },
  },
});

const withAdapter = async (
  location: string,
  fn: (adapter: Awaited<ReturnType<typeof createLevelAdapter>>) => Promise<void>
) => {
  const adapter = await createLevelAdapter({ location });
  try {
    await fn(adapter);
  } finally {
    await adapter.close();
  }
};

describe("createLevelAdapter", () => {
  test("writes and reads documents", async () => {
    const dir = await tempDir();
    try {
      await withAdapter(dir, async (adapter) => {
        const record = sampleRecord("root");
        await adapter.write(record);
        const loaded = await adapter.read("root");

        expect(loaded).toEqual(record);
        expect(loaded).not.toBe(record);
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("returns undefined for a missing key", async () => {
    const dir = await tempDir();
    try {
      await withAdapter(dir, async (adapter) => {
        const result = await adapter.read("missing");
        expect(result).toBeUndefined();
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("removes documents", async () => {
    const dir = await tempDir();
    try {
      await withAdapter(dir, async (adapter) => {
        await adapter.write(sampleRecord("gone"));

        expect(await adapter.remove("gone")).toBe(true);
        expect(await adapter.remove("gone")).toBe(false);
        expect(await adapter.read("gone")).toBeUndefined();
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("persists data across instances", async () => {
    const dir = await tempDir();
    try {
      await withAdapter(dir, async (adapter) => {
        await adapter.write(sampleRecord("persist", 5));
      });

      await withAdapter(dir, async (adapter) => {
        const loaded = await adapter.read("persist");
        expect(loaded?.document).toEqual({
          seed: 5,
          profiles: { _type: "frozenset", _value: ["pp-5"] },
        });
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
