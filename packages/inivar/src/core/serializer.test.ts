import { EOL } from "node:os";
import { describe, expect, it } from "vitest";
import { createLogger } from "../logging/logger.js";
import { createDocument, ensureSection, type IniDocument, toRecord } from "./document.js";
import { parseInto } from "./parser.js";
import { serialize } from "./serializer.js";

const logger = createLogger({ type: "hidden" });

function parse(text: string): IniDocument {
  const document = createDocument();
  parseInto(document, text, { logger });
  return document;
}

describe("serialize", () => {
  it("should write sections and pairs in insertion order", () => {
    const document = parse("[zeta]\nb=2\na=1\n[alpha]\nk=v\n");

    expect(serialize(document, { eol: "\n" })).toBe("[zeta]\nb=2\na=1\n\n[alpha]\nk=v\n\n");
  });

  it("should write the empty section with an empty header", () => {
    const document = parse("top=1\n");

    expect(serialize(document, { eol: "\n" })).toBe("[]\ntop=1\n\n");
  });

  it("should use the platform line ending by default", () => {
    const document = createDocument();
    ensureSection(document, "s").set("k", "v");

    expect(serialize(document)).toBe(`[s]${EOL}k=v${EOL}${EOL}`);
  });

  it("should write an empty document as an empty string", () => {
    expect(serialize(createDocument())).toBe("");
  });

  it("should not escape values", () => {
    const document = createDocument();
    ensureSection(document, "s").set("k", "a=b");

    expect(serialize(document, { eol: "\n" })).toBe("[s]\nk=a=b\n\n");
  });

  it("should reproduce the same content when parsed again", () => {
    const source = [
      "; settings",
      "root = /srv",
      "[server]",
      "  host = example.test",
      "port=8080",
      "[]",
      "extra=yes",
      "[client]",
      "retries = 3",
      "bad line",
    ].join("\n");
    const first = parse(source);

    const second = parse(serialize(first, { eol: "\r\n" }));

    expect(toRecord(second)).toEqual(toRecord(first));
    expect([...second.sections.keys()]).toEqual([...first.sections.keys()]);
    expect(second.errors).toEqual([]);
  });
});
