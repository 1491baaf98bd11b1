import { describe, expect, it } from "vitest";

import { PatchNamingExhaustedError } from "../core/errors.js";

import { PatchNameAllocator, stripSeriesNumber, withNumericSuffix } from "./naming.js";

describe("stripSeriesNumber", () => {
  it("drops the numeric prefix format-patch adds", () => {
    expect(stripSeriesNumber("0003-Fix-bug.patch")).toBe("Fix-bug.patch");
    expect(stripSeriesNumber("Fix-bug.patch")).toBe("Fix-bug.patch");
  });

  it("handles prefixes wider than four digits", () => {
    expect(stripSeriesNumber("10000-Subject.patch")).toBe("Subject.patch");
  });

  it("strips only the leading series number", () => {
    expect(stripSeriesNumber("0001-2024-release-notes.patch")).toBe("2024-release-notes.patch");
  });
});

describe("withNumericSuffix", () => {
  it("inserts the suffix before the extension", () => {
    expect(withNumericSuffix("Fix-bug.patch", 2)).toBe("Fix-bug-2.patch");
    expect(withNumericSuffix("README", 1)).toBe("README-1");
  });
});

describe("PatchNameAllocator", () => {
  it("hands out the preferred name first, then numbered variants", () => {
    const allocator = new PatchNameAllocator(3);

    expect(allocator.allocate("Same.patch")).toBe("Same.patch");
    expect(allocator.allocate("Same.patch")).toBe("Same-1.patch");
    expect(allocator.allocate("Same.patch")).toBe("Same-2.patch");
    expect(allocator.allocate("Other.patch")).toBe("Other.patch");
  });

  it("skips suffixes already claimed by another commit", () => {
    const allocator = new PatchNameAllocator(3);

    allocator.allocate("Same-1.patch");
    allocator.allocate("Same.patch");

    expect(allocator.allocate("Same.patch")).toBe("Same-2.patch");
  });

  it("gives up after the retry limit", () => {
    const allocator = new PatchNameAllocator(1);
    allocator.allocate("Same.patch");
    allocator.allocate("Same.patch");

    expect(() => allocator.allocate("Same.patch")).toThrow(PatchNamingExhaustedError);
  });
});
