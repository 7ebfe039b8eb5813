import { describe, expect, it } from "vitest";
import { isSpace, replaceAll, trim, trimEnd, trimStart } from "./text.js";

describe("trim", () => {
  it("should strip C locale whitespace from both ends", () => {
    expect(trim(" \t\v\f key = value \r\n")).toBe("key = value");
  });

  it("should keep non-breaking spaces", () => {
    expect(trim(" \u00a0value\u00a0 ")).toBe("\u00a0value\u00a0");
  });

  it("should return an empty string for whitespace-only input", () => {
    expect(trim(" \t \r")).toBe("");
  });

  it("should trim one side only with trimStart and trimEnd", () => {
    expect(trimStart("  a  ")).toBe("a  ");
    expect(trimEnd("  a  ")).toBe("  a");
  });
});

describe("isSpace", () => {
  it("should accept the six C locale whitespace characters", () => {
    for (const ch of [" ", "\t", "\n", "\v", "\f", "\r"]) {
      expect(isSpace(ch)).toBe(true);
    }
  });

  it("should reject other characters", () => {
    expect(isSpace("a")).toBe(false);
    expect(isSpace("\u00a0")).toBe(false);
    expect(isSpace("")).toBe(false);
  });
});

describe("replaceAll", () => {
  it("should replace every occurrence", () => {
    expect(replaceAll("${a:b}${a:b}", "${a:b}", "x")).toEqual({ text: "xx", changed: true });
  });

  it("should report no change when the pattern is absent", () => {
    expect(replaceAll("plain", "${a}", "1")).toEqual({ text: "plain", changed: false });
  });

  it("should not rescan inserted text", () => {
    expect(replaceAll("aa", "a", "aa")).toEqual({ text: "aaaa", changed: true });
  });

  it("should match anywhere in the text", () => {
    expect(replaceAll("x${a:b}y", "${a:b}", "1")).toEqual({ text: "x1y", changed: true });
  });

  it("should count replacing a pattern with itself as a change", () => {
    expect(replaceAll("${s:k}", "${s:k}", "${s:k}")).toEqual({ text: "${s:k}", changed: true });
  });

  it("should ignore an empty pattern", () => {
    expect(replaceAll("abc", "", "x")).toEqual({ text: "abc", changed: false });
  });
});
