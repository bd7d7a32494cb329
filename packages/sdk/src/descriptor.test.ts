import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { buildDescriptorXml, createTempPackRoot, removeDir, writeFixture } from "@packdepot/testkit";
import { parseDescriptor, readDescriptor } from "./descriptor.js";
import { DescriptorError } from "./errors.js";

describe("parseDescriptor", () => {
  const xml = buildDescriptorXml({
    vendor: "ARM",
    name: "CMSIS",
    url: "https://packs.example.com/arm",
    license: "LICENSE.txt",
    releases: ["5.9.0", "5.8.0+b2", "5.7.0"],
    requirements: [
      ["ARM", "Core", "1.0.0"],
      ["ARM", "DSP", "1.2.0:2.0.0"],
      ["Other", "Util", ""],
    ],
  });

  it("should read the header fields", () => {
    const descriptor = parseDescriptor(xml, "ARM.CMSIS.pdsc");

    expect(descriptor.vendor).toBe("ARM");
    expect(descriptor.name).toBe("CMSIS");
    expect(descriptor.url).toBe("https://packs.example.com/arm");
    expect(descriptor.license).toBe("LICENSE.txt");
  });

  it("should list releases newest first", () => {
    const descriptor = parseDescriptor(xml, "ARM.CMSIS.pdsc");

    expect(descriptor.latestVersion()).toBe("5.9.0");
    expect(descriptor.allReleases()).toEqual(["5.9.0", "5.8.0+b2", "5.7.0"]);
  });

  it("should find releases ignoring metadata and leading zeros", () => {
    const descriptor = parseDescriptor(xml, "ARM.CMSIS.pdsc");

    expect(descriptor.findRelease("5.8.0")?.version).toBe("5.8.0+b2");
    expect(descriptor.findRelease("05.07.00")?.version).toBe("5.7.0");
    expect(descriptor.findRelease("")?.version).toBe("5.9.0");
    expect(descriptor.findRelease("1.0.0")).toBeUndefined();
  });

  it("should normalize dependency ranges", () => {
    const descriptor = parseDescriptor(xml, "ARM.CMSIS.pdsc");

    expect(descriptor.dependencies()).toEqual([
      ["Core", "ARM", "1.0.0:_"],
      ["DSP", "ARM", "1.2.0:2.0.0"],
      ["Util", "Other", "latest"],
    ]);
  });

  it("should build archive URLs and index entries", () => {
    const descriptor = parseDescriptor(xml, "ARM.CMSIS.pdsc");

    expect(descriptor.packUrl()).toBe("https://packs.example.com/arm/ARM.CMSIS.5.9.0.pack");
    expect(descriptor.packUrl("5.8.0+b2")).toBe("https://packs.example.com/arm/ARM.CMSIS.5.8.0.pack");
    expect(descriptor.toEntry()).toEqual({
      vendor: "ARM",
      name: "CMSIS",
      version: "5.9.0",
      url: "https://packs.example.com/arm",
    });
    expect(descriptor.toEntry("file://localhost/dev/").url).toBe("file://localhost/dev/");
  });

  it("should accept a descriptor without releases or requirements", () => {
    const descriptor = parseDescriptor(
      "<package><vendor>V</vendor><name>N</name><releases/></package>",
      "V.N.pdsc"
    );

    expect(descriptor.latestVersion()).toBe("");
    expect(descriptor.releases).toEqual([]);
    expect(descriptor.dependencies()).toEqual([]);
  });

  it("should read release dates in either spelling", () => {
    const descriptor = parseDescriptor(
      `<package><vendor>V</vendor><name>N</name><releases>
        <release version="2.0.0" date="2026-02-01">two</release>
        <release version="1.0.0" Date="2025-01-01">one</release>
      </releases></package>`,
      "V.N.pdsc"
    );

    expect(descriptor.releases).toEqual([
      { version: "2.0.0", date: "2026-02-01" },
      { version: "1.0.0", date: "2025-01-01" },
    ]);
  });

  it("should reject malformed XML", () => {
    expect(() => parseDescriptor("<package><vendor>V</package>", "bad.pdsc")).toThrow(DescriptorError);
  });

  it("should reject a descriptor without a name", () => {
    expect(() => parseDescriptor("<package><vendor>V</vendor></package>", "bad.pdsc")).toThrow(
      /Invalid pack descriptor bad\.pdsc: package\.name/
    );
  });
});

describe("readDescriptor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempPackRoot();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should read a descriptor from disk", async () => {
    const file = await writeFixture(
      join(dir, "V.N.pdsc"),
      buildDescriptorXml({ vendor: "V", name: "N", releases: ["1.0.0"] })
    );

    const descriptor = await readDescriptor(file);
    expect(descriptor.toEntry()).toEqual({ vendor: "V", name: "N", version: "1.0.0", url: "" });
  });
});
