import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { buildPackArchive, buildRawZip, createTempPackRoot, removeDir, writeFixture } from "@packdepot/testkit";
import { ZipExtractor } from "./archive.js";
import { CancelledError, ExtractionFailedError } from "./errors.js";

describe("ZipExtractor", () => {
  let root: string;
  let dest: string;
  const extractor = new ZipExtractor();

  beforeEach(async () => {
    root = await createTempPackRoot();
    dest = join(root, "ARM", "CMSIS", "5.9.0");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  async function writeArchive(bytes: Uint8Array): Promise<string> {
    return writeFixture(join(root, "archive.pack"), bytes);
  }

  it("should list and read entries", async () => {
    const archive = await writeArchive(
      buildPackArchive({
        descriptor: { vendor: "ARM", name: "CMSIS", releases: ["5.9.0"] },
        files: { "Include/core.h": "#define CORE 1\n" },
      })
    );

    expect(await extractor.list(archive)).toEqual(["ARM.CMSIS.pdsc", "Include/core.h"]);
    expect(await extractor.readEntry(archive, "Include/core.h")).toBe("#define CORE 1\n");
    expect(await extractor.readEntry(archive, "missing.txt")).toBeUndefined();
  });

  it("should extract every file below the destination", async () => {
    const archive = await writeArchive(buildRawZip({ "a.txt": "a", "docs/b.txt": "b" }));

    const written = await extractor.extract(archive, dest);

    expect(written).toEqual([join(dest, "a.txt"), join(dest, "docs", "b.txt")]);
    expect(await readFile(join(dest, "docs", "b.txt"), "utf-8")).toBe("b");
  });

  it("should strip a leading folder", async () => {
    const archive = await writeArchive(
      buildRawZip({ "ARM.CMSIS.5.9.0/ARM.CMSIS.pdsc": "<package/>", "ARM.CMSIS.5.9.0/src/x.c": "x" })
    );

    await extractor.extract(archive, dest, { stripPrefix: "ARM.CMSIS.5.9.0" });

    expect((await readdir(dest)).sort()).toEqual(["ARM.CMSIS.pdsc", "src"]);
  });

  it.each([["../evil.txt"], ["docs/../../evil.txt"], ["/etc/evil.txt"], ["C:/evil.txt"]])(
    "should refuse the entry %j and write nothing",
    async (name) => {
      const archive = await writeArchive(buildRawZip({ "good.txt": "ok", [name]: "evil" }));

      await expect(extractor.extract(archive, dest)).rejects.toThrow(ExtractionFailedError);
      expect(await readdir(root)).toEqual(["archive.pack"]);
    }
  );

  it("should refuse entries over the size cap", async () => {
    const archive = await writeArchive(buildRawZip({ "big.bin": "0123456789" }));

    await expect(new ZipExtractor({ maxEntryBytes: 5 }).extract(archive, dest)).rejects.toThrow(
      'entry "big.bin" exceeds 5 bytes'
    );
  });

  it("should report a file that is not a zip", async () => {
    const archive = await writeFixture(join(root, "broken.pack"), "definitely not a zip");

    await expect(extractor.extract(archive, dest)).rejects.toThrow("not a valid zip archive");
  });

  it("should stop when cancelled", async () => {
    const archive = await writeArchive(buildRawZip({ "a.txt": "a" }));
    const controller = new AbortController();
    controller.abort();

    await expect(extractor.extract(archive, dest, { signal: controller.signal })).rejects.toThrow(CancelledError);
    expect(await readdir(root)).toEqual(["archive.pack"]);
  });
});
