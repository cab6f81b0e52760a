import { describe, expect, test } from "vitest";
import {
  DecodeError,
  DocSet,
  createFormatPipeline,
  createSet,
  identityHash,
  isPlainMapping,
} from "@docformat/core";

import {
  MaintenanceReport,
  ProtectionProfile,
  createCertificateRegistry,
} from "../index";

const pipeline = createFormatPipeline({ registry: createCertificateRegistry() });

const profile = ProtectionProfile.create({
  name: " Smart  card PP ",
  link: "https://example.org:443/pp.pdf",
  ids: ["PP-0084", "PP-0084", "PP-0035"],
});

describe("ProtectionProfile", () => {
  test("normalizes its fields on creation", () => {
    expect(profile.name).toBe("Smart card PP");
    expect(profile.link).toBe("https://example.org/pp.pdf");
    expect(profile.ids?.size).toBe(2);
    expect(profile.ids?.frozen).toBe(true);
    expect(Object.isFrozen(profile)).toBe(true);
  });

  test("stores an empty id collection as null", () => {
    expect(ProtectionProfile.create({ name: "PP", ids: [] }).ids).toBeNull();
  });

  test("compares by name and link only", () => {
    const other = ProtectionProfile.create({
      name: "Smart card PP",
      link: "https://example.org/pp.pdf",
    });

    expect(profile.equals(other)).toBe(true);
    expect(createSet([profile, other], pipeline.registry.resolve).size).toBe(1);
  });

  test("round-trips through storage", () => {
    const stored = pipeline.dematerialize(profile);

    expect(stored).toEqual({
      _type: "ProtectionProfile",
      _hash: identityHash(["Smart card PP", "https://example.org/pp.pdf"]),
      pp_name: "Smart card PP",
      pp_link: "https://example.org/pp.pdf",
      pp_ids: { _type: "frozenset", _value: ["PP-0084", "PP-0035"] },
    });

    const restored = pipeline.materialize(stored);
    if (!(restored instanceof ProtectionProfile)) {
      throw new Error("expected a profile");
    }
    expect(restored.equals(profile)).toBe(true);
    expect(restored.ids?.has("PP-0035")).toBe(true);
  });

  test("accepts plain id arrays and missing optional fields", () => {
    const restored = pipeline.materialize({
      _type: "ProtectionProfile",
      pp_name: "PP",
      pp_ids: ["A"],
    });

    if (!(restored instanceof ProtectionProfile)) {
      throw new Error("expected a profile");
    }
    expect(restored.link).toBeNull();
    expect(restored.ids).toBeInstanceOf(DocSet);
    expect(restored.ids?.has("A")).toBe(true);
  });

  test("rejects malformed fields", () => {
    expect(() =>
      pipeline.materialize({ _type: "ProtectionProfile", pp_name: 5 })
    ).toThrow(DecodeError);
    expect(() =>
      pipeline.materialize({
        _type: "ProtectionProfile",
        pp_name: "PP",
        pp_ids: { _type: "frozenset", _value: [1] },
      })
    ).toThrow('Cannot decode "ProtectionProfile": pp_ids must hold strings');
  });
});

describe("MaintenanceReport", () => {
  const report = MaintenanceReport.create({
    date: new Date(2022, 2, 14),
    title: "Maintenance  Report\n1",
    reportLink: "https://example.org/mr 1.pdf",
  });

  test("normalizes its fields on creation", () => {
    expect(report.date).toBe("2022-03-14");
    expect(report.title).toBe("Maintenance Report 1");
    expect(report.reportLink).toBe("https://example.org/mr%201.pdf");
    expect(report.stLink).toBeNull();
  });

  test("keeps distinct reports apart inside sets", () => {
    const stored = pipeline.dematerialize({
      updates: createSet(
        [report, MaintenanceReport.create({ date: "2022-03-15" }), report],
        pipeline.registry.resolve
      ),
    });
    const restored = pipeline.materialize(stored);
    if (!isPlainMapping(restored) || !(restored.updates instanceof DocSet)) {
      throw new Error("expected a mapping holding a set");
    }

    expect(restored.updates.size).toBe(2);
    expect(restored.updates.has(report)).toBe(true);
  });

  test("wraps invalid dates in a decode error", () => {
    expect(() =>
      pipeline.materialize({ _type: "MaintenanceReport", maintenance_date: "soon" })
    ).toThrow(DecodeError);
  });
});

describe("createCertificateRegistry", () => {
  test("registers every certificate type", () => {
    expect(createCertificateRegistry().tags()).toEqual([
      "ProtectionProfile",
      "MaintenanceReport",
    ]);
  });
});
