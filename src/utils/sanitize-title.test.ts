import { describe, it, expect } from "vitest";
import {
  sanitizeTitle,
  FALLBACK_TITLE,
  MAX_TITLE_BYTES,
  MAX_TITLE_LENGTH,
} from "./sanitize-title";

describe("sanitizeTitle", () => {
  it("turns spaces into underscores and keeps hyphens", () => {
    expect(sanitizeTitle("Barrel - Part 1")).toBe("Barrel_-_Part_1");
  });

  it("replaces unsafe characters with a single separator", () => {
    expect(sanitizeTitle("Don't Panic!")).toBe("Don_t_Panic");
    expect(sanitizeTitle("Tar/Tar: The Sequel")).toBe("Tar_Tar_The_Sequel");
  });

  it("collapses repeated separators", () => {
    expect(sanitizeTitle("a   b__c")).toBe("a_b_c");
    expect(sanitizeTitle("up---down")).toBe("up-down");
  });

  it("trims leading and trailing separators", () => {
    expect(sanitizeTitle("  (Sketch)  ")).toBe("Sketch");
    expect(sanitizeTitle("--edge--")).toBe("edge");
  });

  it("keeps non-ASCII letters", () => {
    expect(sanitizeTitle("Café Crème")).toBe("Café_Crème");
  });

  it("returns the same token for composed and decomposed input", () => {
    expect(sanitizeTitle("Cafe\u0301")).toBe(sanitizeTitle("Caf\u00e9"));
    expect(sanitizeTitle("Cafe\u0301")).toBe("Caf\u00e9");
  });

  it("falls back for empty or fully unsafe titles", () => {
    expect(sanitizeTitle("")).toBe(FALLBACK_TITLE);
    expect(sanitizeTitle("?!*/\\")).toBe(FALLBACK_TITLE);
    expect(sanitizeTitle(" _ - _ ")).toBe(FALLBACK_TITLE);
  });

  it("caps the length without leaving a trailing separator", () => {
    const title = `${"a".repeat(MAX_TITLE_LENGTH - 1)} tail`;
    const token = sanitizeTitle(title);
    expect(token).toBe("a".repeat(MAX_TITLE_LENGTH - 1));
  });

  it("caps multi-byte titles by their UTF-8 length", () => {
    // 3 bytes per character: 66 fit in 200 bytes
    const token = sanitizeTitle("漫".repeat(120));
    expect(token).toBe("漫".repeat(66));
    expect(Buffer.byteLength(token, "utf8")).toBeLessThanOrEqual(MAX_TITLE_BYTES);
  });

  it("never splits an astral-plane character", () => {
    // 4 bytes per character: 50 fit in 200 bytes
    expect(sanitizeTitle("\u{1D49C}".repeat(120))).toBe("\u{1D49C}".repeat(50));
  });

  it("is deterministic", () => {
    const title = "Time: Part 2 (of many)";
    expect(sanitizeTitle(title)).toBe(sanitizeTitle(title));
    expect(sanitizeTitle(title)).toBe("Time_Part_2_of_many");
  });
});
