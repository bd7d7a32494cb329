/**
 * Unit tests for PackageIndex
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempPackRoot, removeDir } from "@packdepot/testkit";
import { EntryExistsError, EntryNotFoundError, IndexCorruptError, StaleIndexError } from "./errors.js";
import { encodePidx } from "./format/pidx.js";
import { PackageIndex, PDSC_INDEX_NOT_FOUND } from "./pack-index.js";
import type { IndexEntry } from "./types.js";

const HOUR = 60 * 60 * 1000;

function entry(vendor: string, name: string, version: string, url = "https://packs.example.com/"): IndexEntry {
  return { vendor, name, version, url };
}

function keys(entries: IndexEntry[]): string[] {
  return entries.map((e) => `${e.vendor}.${e.name}.${e.version}`).sort();
}

describe("PackageIndex", () => {
  let root: string;
  let fileName: string;
  let index: PackageIndex;

  beforeEach(async () => {
    root = await createTempPackRoot();
    fileName = join(root, ".Local", "local_repository.pidx");
    index = new PackageIndex(fileName, { web: false });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe("read", () => {
    it("should create and write an empty index when the file is missing", async () => {
      await index.read();

      expect(await index.empty()).toBe(true);
      expect(index.schemaVersion).toBe("1.1.0");
      expect(index.vendor).toBe("local_repository");
      expect(index.timestamp).toBeDefined();

      const text = await readFile(fileName, "utf-8");
      expect(text).toContain('schemaVersion="1.1.0"');
      expect(text).toContain("<vendor>local_repository</vendor>");
    });

    it("should refuse a corrupt file and leave it untouched", async () => {
      await index.read();
      await writeFile(fileName, "<index><pindex>", "utf-8");

      await expect(index.read()).rejects.toThrow(IndexCorruptError);
      expect(await readFile(fileName, "utf-8")).toBe("<index><pindex>");
    });

    it("should refuse a well-formed document with the wrong shape", async () => {
      await index.read();
      await writeFile(fileName, '<index><pindex><pdsc vendor="A"/></pindex></index>', "utf-8");

      await expect(index.read()).rejects.toThrow(IndexCorruptError);
    });
  });

  describe("round-trip", () => {
    it("should reproduce the same entries after write and a fresh read", async () => {
      await index.read();
      const deprecated: IndexEntry = {
        ...entry("Vendor", "Old", "0.9.0"),
        deprecated: "2025-01-01",
        replacement: "Vendor.New",
      };
      await index.addPdsc(entry("Vendor", "Pack", "1.0.0"));
      await index.addPdsc(entry("Vendor", "Pack", "2.0.0+meta"));
      await index.addPdsc(entry("Other", "Pack", "1.0.0", "file://localhost/tmp/other/"));
      await index.addPdsc(deprecated);
      await index.write();
      await index.write();

      const reloaded = new PackageIndex(fileName, { web: false });
      await reloaded.read();

      const original = await index.listPdscTags();
      const restored = await reloaded.listPdscTags();
      expect(restored).toHaveLength(4);
      expect(new Set(restored.map((e) => JSON.stringify(e)))).toEqual(
        new Set(original.map((e) => JSON.stringify(e)))
      );
      expect(restored.find((e) => e.name === "Old")).toEqual(deprecated);
    });
  });

  describe("addPdsc", () => {
    beforeEach(async () => {
      await index.read();
    });

    it("should reject a duplicate exact key and leave the index unchanged", async () => {
      await index.addPdsc(entry("Vendor", "Pack", "1.0.0"));

      await expect(index.addPdsc(entry("Vendor", "Pack", "1.0.0"))).rejects.toThrow(EntryExistsError);
      await expect(
        index.addPdsc(entry("Vendor", "Pack", "1.0.0", "https://mirror.example.com/"))
      ).rejects.toThrow(EntryExistsError);

      expect(keys(await index.listPdscTags())).toEqual(["Vendor.Pack.1.0.0"]);
    });

    it("should let several versions of one family coexist", async () => {
      await index.addPdsc(entry("Vendor", "Pack", "1.0.0"));
      await index.addPdsc(entry("Vendor", "Pack", "2.0.0"));

      const family = await index.findPdscTags({ vendor: "Vendor", name: "Pack" });
      expect(keys(family)).toEqual(["Vendor.Pack.1.0.0", "Vendor.Pack.2.0.0"]);
    });

    it("should serialize concurrent adds of the same key", async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => index.addPdsc(entry("Vendor", "Pack", "1.0.0")))
      );

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(await index.listPdscTags()).toHaveLength(1);
    });

    it("should keep every concurrent add of distinct keys", async () => {
      await Promise.all(
        Array.from({ length: 20 }, (_, i) => index.addPdsc(entry("Vendor", "Pack", `1.0.${i}`)))
      );

      expect(await index.listPdscTags()).toHaveLength(20);
    });
  });

  describe("hasPdsc and findPdscTags", () => {
    beforeEach(async () => {
      await index.read();
      await index.addPdsc(entry("Vendor", "Pack", "1.2.3+meta"));
    });

    it("should compare URLs when one is given", async () => {
      const query = { vendor: "Vendor", name: "Pack", version: "1.2.3+meta" };
      expect(await index.hasPdsc(query)).toBe(0);
      expect(await index.hasPdsc({ ...query, url: "https://packs.example.com/" })).toBe(0);
      expect(await index.hasPdsc({ ...query, url: "https://elsewhere.example.com/" })).toBe(
        PDSC_INDEX_NOT_FOUND
      );
    });

    it("should find a stored version carrying build metadata", async () => {
      const found = await index.findPdscTags({ vendor: "Vendor", name: "Pack", version: "1.2.3" });
      expect(found.map((e) => e.version)).toEqual(["1.2.3+meta"]);
    });

    it("should look families up case-insensitively", async () => {
      const found = await index.findPdscTags({ vendor: "VENDOR", name: "pack" });
      expect(found).toHaveLength(1);
    });

    it("should return copies", async () => {
      const [found] = await index.findPdscTags({ vendor: "Vendor", name: "Pack" });
      if (!found) throw new Error("expected an entry");
      found.url = "mutated";

      const [again] = await index.findPdscTags({ vendor: "Vendor", name: "Pack" });
      expect(again?.url).toBe("https://packs.example.com/");
    });
  });

  describe("removePdsc", () => {
    beforeEach(async () => {
      await index.read();
      await index.addPdsc(entry("Vendor", "Pack", "1.0.0"));
      await index.addPdsc(entry("Vendor", "Pack", "2.0.0"));
      await index.addPdsc(entry("Other", "Pack", "1.0.0"));
    });

    it("should remove every version when no version is given", async () => {
      const removed = await index.removePdsc({ vendor: "Vendor", name: "Pack" });

      expect(keys(removed)).toEqual(["Vendor.Pack.1.0.0", "Vendor.Pack.2.0.0"]);
      expect(keys(await index.listPdscTags())).toEqual(["Other.Pack.1.0.0"]);
      expect(await index.hasPdsc({ vendor: "Vendor", name: "Pack", version: "1.0.0" })).toBe(
        PDSC_INDEX_NOT_FOUND
      );
      expect(await index.hasPdsc({ vendor: "Vendor", name: "Pack", version: "2.0.0" })).toBe(
        PDSC_INDEX_NOT_FOUND
      );
    });

    it("should remove only the requested version", async () => {
      await index.removePdsc({ vendor: "Vendor", name: "Pack", version: "2.0.0" });

      expect(keys(await index.listPdscTags())).toEqual(["Other.Pack.1.0.0", "Vendor.Pack.1.0.0"]);
      const [family] = (await index.describeFamilies()).filter((f) => f.family === "vendor.pack");
      expect(family).toEqual({ family: "vendor.pack", canonical: "Vendor.Pack.1.0.0", members: ["Vendor.Pack.1.0.0"] });
    });

    it("should fail for an absent version or family", async () => {
      await expect(index.removePdsc({ vendor: "Vendor", name: "Pack", version: "3.0.0" })).rejects.toThrow(
        EntryNotFoundError
      );
      await expect(index.removePdsc({ vendor: "Nobody", name: "Pack" })).rejects.toThrow(EntryNotFoundError);
    });

    it("should report empty once the last entry is gone", async () => {
      await index.removePdsc({ vendor: "Vendor", name: "Pack" });
      await index.removePdsc({ vendor: "Other", name: "Pack" });

      expect(await index.empty()).toBe(true);
      expect(await index.describeFamilies()).toEqual([]);
    });
  });

  describe("replacePdscVersion", () => {
    beforeEach(async () => {
      await index.read();
    });

    it("should move the family to the new version", async () => {
      await index.addPdsc(entry("Vendor", "Pack", "1.0.0"));

      await index.replacePdscVersion(entry("Vendor", "Pack", "2.0.0", "https://new.example.com/"));

      expect(await index.hasPdsc({ vendor: "Vendor", name: "Pack", version: "1.0.0" })).toBe(
        PDSC_INDEX_NOT_FOUND
      );
      expect(await index.hasPdsc({ vendor: "Vendor", name: "Pack", version: "2.0.0" })).toBe(0);
      const family = await index.findPdscTags({ vendor: "Vendor", name: "Pack" });
      expect(family).toEqual([entry("Vendor", "Pack", "2.0.0", "https://new.example.com/")]);
    });

    it("should fail for an unknown family", async () => {
      await expect(index.replacePdscVersion(entry("Vendor", "Pack", "2.0.0"))).rejects.toThrow(
        EntryNotFoundError
      );
    });
  });

  it("should keep families consistent across mixed operations", async () => {
    await index.read();
    await index.addPdsc(entry("A", "One", "1.0.0"));
    await index.addPdsc(entry("A", "One", "1.1.0"));
    await index.addPdsc(entry("B", "Two", "1.0.0"));
    await index.replacePdscVersion(entry("A", "One", "2.0.0"));
    await index.removePdsc({ vendor: "A", name: "One", version: "1.0.0" });
    await index.addPdsc(entry("a", "one", "3.0.0"));
    await index.removePdsc({ vendor: "B", name: "Two" });

    const families = await index.describeFamilies();
    const listed = await index.listPdscTags();

    for (const family of families) {
      expect(family.members).toContain(family.canonical);
      for (const member of family.members) {
        expect(listed.some((e) => `${e.vendor}.${e.name}.${e.version}` === member)).toBe(true);
      }
    }
    for (const e of listed) {
      const owner = families.find((f) => f.family === `${e.vendor}.${e.name}`.toLowerCase());
      expect(owner?.members).toContain(`${e.vendor}.${e.name}.${e.version}`);
    }
    expect(keys(listed)).toEqual(["A.One.2.0.0", "a.one.3.0.0"]);
  });

  describe("checkTime", () => {
    async function writeWithTimestamp(timestamp: string | undefined): Promise<void> {
      await writeFile(
        fileName,
        encodePidx({
          schemaVersion: "1.1.0",
          vendor: "local_repository",
          url: "",
          timestamp,
          entries: [entry("Vendor", "Pack", "1.0.0")],
        }),
        "utf-8"
      );
    }

    beforeEach(async () => {
      await index.read();
    });

    it("should report an index written 48 hours ago as stale", async () => {
      const written = new Date(Date.now() - 48 * HOUR).toISOString();
      await writeWithTimestamp(written);

      const error = await index.checkTime().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(StaleIndexError);
      expect(error).toMatchObject({ timestamp: written });
      expect(await index.isStale()).toBe(true);
    });

    it("should accept an index written an hour ago", async () => {
      await writeWithTimestamp(new Date(Date.now() - HOUR).toISOString());

      await expect(index.checkTime()).resolves.toBeUndefined();
      expect(await index.isStale()).toBe(false);
    });

    it("should report a missing timestamp as stale", async () => {
      await writeWithTimestamp(undefined);
      await expect(index.checkTime()).rejects.toThrow(StaleIndexError);
    });

    it("should not touch the in-memory entries", async () => {
      await writeWithTimestamp(new Date(Date.now() - HOUR).toISOString());
      await index.checkTime();

      expect(await index.empty()).toBe(true);
    });
  });
});
