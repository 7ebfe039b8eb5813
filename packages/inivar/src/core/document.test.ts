import { describe, expect, it } from "vitest";
import { applyDefaults, clearDocument, createDocument, ensureSection, toRecord } from "./document.js";

describe("applyDefaults", () => {
  it("should add missing keys to every section without overwriting", () => {
    const document = createDocument();
    ensureSection(document, "a").set("x", "keep");
    ensureSection(document, "b").set("y", "2");

    applyDefaults(document, { x: "1" });

    expect(toRecord(document)).toEqual({ a: { x: "keep" }, b: { y: "2", x: "1" } });
  });

  it("should accept a Map", () => {
    const document = createDocument();
    ensureSection(document, "a");

    applyDefaults(document, new Map([["owner", "ops"]]));

    expect(document.sections.get("a")?.get("owner")).toBe("ops");
  });

  it("should not create sections", () => {
    const document = createDocument();

    applyDefaults(document, { x: "1" });

    expect(document.sections.size).toBe(0);
  });
});

describe("ensureSection", () => {
  it("should return the existing section", () => {
    const document = createDocument();
    const first = ensureSection(document, "s");

    expect(ensureSection(document, "s")).toBe(first);
    expect(document.sections.size).toBe(1);
  });
});

describe("clearDocument", () => {
  it("should drop sections and errors", () => {
    const document = createDocument();
    ensureSection(document, "s").set("k", "v");
    document.errors.push("bad");

    clearDocument(document);

    expect(document.sections.size).toBe(0);
    expect(document.errors).toEqual([]);
  });
});
