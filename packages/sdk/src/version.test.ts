import { describe, it, expect } from "vitest";
import {
  compareRange,
  compareVersions,
  formatRequirement,
  formatVersionRange,
  hasMeta,
  isValidVersion,
  major,
  majorMinor,
  sortVersionsDescending,
  stripLeadingZeros,
  stripMeta,
} from "./version.js";

describe("version ordering", () => {
  describe("stripLeadingZeros", () => {
    it("should strip zeros from every numeric component", () => {
      expect(stripLeadingZeros("01.002.3")).toBe("1.2.3");
      expect(stripLeadingZeros("0.2.3")).toBe("0.2.3");
      expect(stripLeadingZeros("00.00.01")).toBe("0.0.1");
    });
  });

  describe("compareVersions", () => {
    it("should treat leading zeros as insignificant", () => {
      expect(compareVersions("01.2.3", "1.2.3")).toBe(0);
      expect(compareVersions("1.02.03", "1.2.3")).toBe(0);
    });

    it("should order by semantic precedence", () => {
      expect(compareVersions("1.2.3", "1.2.4")).toBe(-1);
      expect(compareVersions("0.2.3", "0.2.4")).toBe(-1);
      expect(compareVersions("00.2.3", "0.02.4")).toBe(-1);
      expect(compareVersions("2.0.0", "1.9.9")).toBe(1);
      expect(compareVersions("1.0.0-rc1", "1.0.0")).toBe(-1);
    });

    it("should ignore build metadata", () => {
      expect(compareVersions("1.2.3+build7", "1.2.3")).toBe(0);
    });

    it("should compare ranges by their lower bound", () => {
      expect(compareVersions("1.2.3:2.0.0", "1.2.3")).toBe(0);
    });

    it("should order invalid versions first", () => {
      expect(compareVersions("garbage", "0.0.1")).toBe(-1);
      expect(compareVersions("0.0.1", "garbage")).toBe(1);
      expect(compareVersions("garbage", "other")).toBe(0);
    });
  });

  describe("compareRange", () => {
    it("should accept versions inside an inclusive range", () => {
      expect(compareRange("1.2.3", "1.2.0:1.2.4")).toBe(0);
      expect(compareRange("1.2.0", "1.2.0:1.2.4")).toBe(0);
      expect(compareRange("1.2.4", "1.2.0:1.2.4")).toBe(0);
    });

    it("should report which side a version misses on", () => {
      expect(compareRange("1.2.3", "1.2.4")).toBe(-1);
      expect(compareRange("1.3.0", "1.2.0:1.2.4")).toBe(1);
      expect(compareRange("1.1.9", "1.2.0:1.2.4")).toBe(-1);
    });

    it("should treat _ as an unbounded upper limit", () => {
      expect(compareRange("1.2.3", "1.2.3:_")).toBe(0);
      expect(compareRange("99.0.0", "1.2.3:_")).toBe(0);
    });

    it("should handle empty and upper-only ranges", () => {
      expect(compareRange("5.0.0", "")).toBe(0);
      expect(compareRange("1.0.0", ":2.0.0")).toBe(0);
      expect(compareRange("3.0.0", ":2.0.0")).toBe(1);
    });

    it("should strip metadata before comparing", () => {
      expect(compareRange("1.2.4+meta", "1.2.0:1.2.4")).toBe(0);
    });
  });

  it("should project major and major.minor", () => {
    expect(major("01.02.03")).toBe("1");
    expect(majorMinor("01.02.03")).toBe("1.2");
    expect(major("nope")).toBe("");
  });

  it("should detect and strip build metadata", () => {
    expect(hasMeta("1.2.3+abc")).toBe(true);
    expect(hasMeta("1.2.3")).toBe(false);
    expect(stripMeta("1.2.3+abc")).toBe("1.2.3");
    expect(stripMeta("1.2.3")).toBe("1.2.3");
  });

  it("should validate the pack version grammar", () => {
    expect(isValidVersion("1.2.3")).toBe(true);
    expect(isValidVersion("01.02.03")).toBe(true);
    expect(isValidVersion("1.2.3-rc.1+build.5")).toBe(true);
    expect(isValidVersion("1.2")).toBe(false);
    expect(isValidVersion("v1.2.3")).toBe(false);
  });

  it("should sort newest first", () => {
    expect(sortVersionsDescending(["1.0.0", "2.0.0", "1.10.0", "01.2.0"])).toEqual([
      "2.0.0",
      "1.10.0",
      "01.2.0",
      "1.0.0",
    ]);
  });

  describe("display helpers", () => {
    it("should render unbounded ranges as >=", () => {
      expect(formatVersionRange("5.6.0:_")).toBe(">=5.6.0");
      expect(formatVersionRange("1.0.0:2.0.0")).toBe("1.0.0:2.0.0");
    });

    it("should render requirement tuples as pack IDs", () => {
      expect(formatRequirement(["CMSIS", "ARM", "5.6.0:_"])).toBe("ARM::CMSIS@>=5.6.0");
      expect(formatRequirement(["CMSIS", "ARM", "5.6.0:5.6.0"])).toBe("ARM::CMSIS@5.6.0");
      expect(formatRequirement(["CMSIS", "ARM", "5.6.0:5.9.0"])).toBe("ARM::CMSIS@5.6.0:5.9.0");
      expect(formatRequirement(["CMSIS", "ARM", "latest"])).toBe("ARM::CMSIS@latest");
    });
  });
});
