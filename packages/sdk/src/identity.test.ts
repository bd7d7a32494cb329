import { describe, it, expect } from "vitest";
import { BadIdentifierError } from "./errors.js";
import {
  isRemoteLocation,
  locationToPath,
  packFileName,
  parsePackageIdentity,
  pdscFileName,
  selectVersion,
  versionedPdscFileName,
} from "./identity.js";
import { VersionModifier } from "./types.js";

describe("parsePackageIdentity", () => {
  describe("file names and URLs", () => {
    it("should parse a pack file relative to the working directory", () => {
      const identity = parsePackageIdentity("Vendor.Pack.1.2.3.pack", { cwd: "/work/packs" });

      expect(identity).toEqual({
        vendor: "Vendor",
        name: "Pack",
        version: "1.2.3",
        extension: "pack",
        location: "file://localhost/work/packs/",
        isPackId: false,
        versionModifier: VersionModifier.Exact,
      });
    });

    it("should resolve relative directories", () => {
      const identity = parsePackageIdentity("./sub/ARM.CMSIS.5.9.0.pack", { cwd: "/work" });
      expect(identity.location).toBe("file://localhost/work/sub/");
    });

    it("should keep absolute directories and the zip extension", () => {
      const identity = parsePackageIdentity("/opt/packs/ARM.CMSIS.5.9.0.zip");
      expect(identity.location).toBe("file://localhost/opt/packs/");
      expect(identity.extension).toBe("zip");
    });

    it("should parse a descriptor file without a version", () => {
      const identity = parsePackageIdentity("/dev/src/ARM.CMSIS.pdsc");
      expect(identity.extension).toBe("pdsc");
      expect(identity.version).toBe("");
      expect(identity.versionModifier).toBe(VersionModifier.Any);
    });

    it("should strip credentials, query and fragment from URLs", () => {
      const identity = parsePackageIdentity(
        "https://user:pw@example.com/packs/ARM.CMSIS.5.9.0.pack?token=x#frag"
      );
      expect(identity.location).toBe("https://example.com/packs/");
      expect(identity.vendor).toBe("ARM");
      expect(identity.version).toBe("5.9.0");
      expect(identity.isPackId).toBe(false);
    });

    it("should reject a path that is not a pack file", () => {
      expect(() => parsePackageIdentity("/some/dir/NotAPack.txt")).toThrow(BadIdentifierError);
    });
  });

  describe("pack IDs", () => {
    it("should give the same result for dotted and legacy exact forms", () => {
      const dotted = parsePackageIdentity("TheVendor.ThePack.1.2.3");
      const legacy = parsePackageIdentity("TheVendor::ThePack@1.2.3");

      for (const identity of [dotted, legacy]) {
        expect(identity.vendor).toBe("TheVendor");
        expect(identity.name).toBe("ThePack");
        expect(identity.version).toBe("1.2.3");
        expect(identity.versionModifier).toBe(VersionModifier.Exact);
        expect(identity.isPackId).toBe(true);
      }
    });

    it("should map legacy operators to modifiers", () => {
      expect(parsePackageIdentity("V::P").versionModifier).toBe(VersionModifier.Any);
      expect(parsePackageIdentity("V::P@latest").versionModifier).toBe(VersionModifier.Latest);
      expect(parsePackageIdentity("V::P@^1.0.0").versionModifier).toBe(VersionModifier.CompatibleMajor);
      expect(parsePackageIdentity("V::P@~1.2.0").versionModifier).toBe(VersionModifier.CompatiblePatch);
      expect(parsePackageIdentity("V::P@>=1.0.0").versionModifier).toBe(VersionModifier.GreaterOrEqual);
      expect(parsePackageIdentity("V::P>=1.0.0").versionModifier).toBe(VersionModifier.GreaterOrEqual);
    });

    it("should parse dotted ranges", () => {
      const bounded = parsePackageIdentity("ARM.CMSIS.5.0.0:6.0.0");
      expect(bounded.version).toBe("5.0.0:6.0.0");
      expect(bounded.versionModifier).toBe(VersionModifier.Range);

      const unbounded = parsePackageIdentity("ARM.CMSIS.5.0.0:_");
      expect(unbounded.version).toBe("5.0.0:_");
      expect(unbounded.versionModifier).toBe(VersionModifier.Range);
    });

    it("should drop a .latest suffix", () => {
      const identity = parsePackageIdentity("ARM.CMSIS.latest");
      expect(identity.name).toBe("CMSIS");
      expect(identity.version).toBe("");
      expect(identity.versionModifier).toBe(VersionModifier.Any);
    });

    it("should be idempotent and frozen", () => {
      const first = parsePackageIdentity("ARM::CMSIS@^5.0.0");
      const second = parsePackageIdentity("ARM::CMSIS@^5.0.0");
      expect(first).toEqual(second);
      expect(Object.isFrozen(first)).toBe(true);
    });

    it.each([
      ["ARM"],
      ["AR M.Pack"],
      ["ARM::CMSIS@1.2"],
      ["ARM.CMSIS.1.2.3:bad"],
      ["ARM::CMSIS@^latest"],
      [""],
    ])("should reject %j", (reference) => {
      expect(() => parsePackageIdentity(reference)).toThrow(BadIdentifierError);
    });
  });
});

describe("location helpers", () => {
  it("should classify remote locations", () => {
    expect(isRemoteLocation("https://example.com/")).toBe(true);
    expect(isRemoteLocation("HTTP://example.com/")).toBe(true);
    expect(isRemoteLocation("file://localhost/tmp/")).toBe(false);
  });

  it("should convert file locations back to paths", () => {
    expect(locationToPath("file://localhost/work/packs/")).toBe("/work/packs/");
    expect(locationToPath("file://localhost/C:/packs/")).toBe("C:/packs/");
    expect(locationToPath("/plain/path")).toBe("/plain/path");
  });

  it("should build file names without build metadata", () => {
    const identity = { vendor: "ARM", name: "CMSIS", version: "5.9.0+b12" };
    expect(packFileName(identity)).toBe("ARM.CMSIS.5.9.0.pack");
    expect(pdscFileName(identity)).toBe("ARM.CMSIS.pdsc");
    expect(versionedPdscFileName(identity)).toBe("ARM.CMSIS.5.9.0.pdsc");
  });

  it("should keep the zip extension in archive file names", () => {
    expect(packFileName({ vendor: "ARM", name: "CMSIS", version: "5.9.0", extension: "zip" })).toBe(
      "ARM.CMSIS.5.9.0.zip"
    );
  });
});

describe("selectVersion", () => {
  const candidates = ["1.0.0", "1.2.0", "1.5.3", "2.0.0", "2.1.0+b7"];
  const pick = (versionModifier: VersionModifier, version: string) =>
    selectVersion({ versionModifier, version }, candidates);

  it("should match exact versions tolerating build metadata", () => {
    expect(pick(VersionModifier.Exact, "1.2.0")).toBe("1.2.0");
    expect(pick(VersionModifier.Exact, "2.1.0")).toBe("2.1.0+b7");
    expect(pick(VersionModifier.Exact, "9.9.9")).toBeUndefined();
  });

  it("should pick the greatest version for latest and any", () => {
    expect(pick(VersionModifier.Latest, "latest")).toBe("2.1.0+b7");
    expect(pick(VersionModifier.Any, "")).toBe("2.1.0+b7");
  });

  it("should honour compatibility modifiers", () => {
    expect(pick(VersionModifier.GreaterOrEqual, "1.3.0")).toBe("2.1.0+b7");
    expect(pick(VersionModifier.CompatibleMajor, "1.1.0")).toBe("1.5.3");
    expect(pick(VersionModifier.CompatiblePatch, "1.2.0")).toBe("1.2.0");
    expect(pick(VersionModifier.CompatibleMajor, "3.0.0")).toBeUndefined();
  });

  it("should pick the greatest version inside a range", () => {
    expect(pick(VersionModifier.Range, "1.0.0:1.4.0")).toBe("1.2.0");
  });
});
