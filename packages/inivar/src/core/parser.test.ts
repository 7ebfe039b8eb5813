import { describe, expect, it } from "vitest";
import { createLogger } from "../logging/logger.js";
import { visualBasicCommentClassifier } from "./comments.js";
import { createDocument, type IniDocument, toRecord } from "./document.js";
import { type ParseOptions, parseInto } from "./parser.js";

const logger = createLogger({ type: "hidden" });

function parse(text: string, options: ParseOptions = {}): IniDocument {
  const document = createDocument();
  parseInto(document, text, { logger, ...options });
  return document;
}

describe("parseInto", () => {
  describe("key/value lines", () => {
    it("should trim around the key and the value", () => {
      const document = parse("[server]\n  host  =   example.test  \n");

      expect(document.sections.get("server")?.get("host")).toBe("example.test");
      expect(document.errors).toEqual([]);
    });

    it("should split on the first equals sign only", () => {
      const document = parse("[db]\nurl = a=b=c\n");

      expect(document.sections.get("db")?.get("url")).toBe("a=b=c");
    });

    it("should accept an empty value", () => {
      const document = parse("[s]\nkey=\n");

      expect(document.sections.get("s")?.get("key")).toBe("");
    });

    it("should put pairs before any header in the empty section", () => {
      const document = parse("top=1\n[named]\ninner=2\n");

      expect(toRecord(document)).toEqual({ "": { top: "1" }, named: { inner: "2" } });
    });

    it("should strip carriage returns from CRLF input", () => {
      const document = parse("[s]\r\na=1\r\nb=2\r\n");

      expect(toRecord(document)).toEqual({ s: { a: "1", b: "2" } });
    });

    it("should accept pre-split lines", () => {
      const document = createDocument();
      parseInto(document, ["[s]", "a=1"], { logger });

      expect(toRecord(document)).toEqual({ s: { a: "1" } });
    });
  });

  describe("duplicate keys", () => {
    it("should keep the first value and log the duplicate line", () => {
      const document = parse("[s]\nkey=first\n  key = second  \n");

      expect(document.sections.get("s")?.get("key")).toBe("first");
      expect(document.errors).toEqual(["key = second"]);
    });

    it("should treat keys differing only by surrounding whitespace as duplicates", () => {
      const document = parse("[s]\nkey=1\nkey   =2\n");

      expect(document.errors).toEqual(["key   =2"]);
    });

    it("should allow the same key in different sections", () => {
      const document = parse("[a]\nkey=1\n[b]\nkey=2\n");

      expect(toRecord(document)).toEqual({ a: { key: "1" }, b: { key: "2" } });
      expect(document.errors).toEqual([]);
    });
  });

  describe("section headers", () => {
    it("should create a section for a header without keys", () => {
      const document = parse("[empty]\n");

      expect(toRecord(document)).toEqual({ empty: {} });
    });

    it("should merge a reopened section", () => {
      const document = parse("[a]\nx=1\n[b]\ny=2\n[a]\nz=3\nx=4\n");

      expect(toRecord(document)).toEqual({ a: { x: "1", z: "3" }, b: { y: "2" } });
      expect([...document.sections.keys()]).toEqual(["a", "b"]);
      expect(document.errors).toEqual(["x=4"]);
    });

    it("should reject an unterminated header and stay in the current section", () => {
      const document = parse("[a]\n[broken\nkey=1\n");

      expect(document.errors).toEqual(["[broken"]);
      expect(toRecord(document)).toEqual({ a: { key: "1" } });
    });

    it("should map [] to the same section as pairs before any header", () => {
      const document = parse("a=1\n[x]\nb=2\n[]\nc=3\n");

      expect(toRecord(document)).toEqual({ "": { a: "1", c: "3" }, x: { b: "2" } });
    });

    it("should keep inner whitespace of a section name", () => {
      const document = parse("[ spaced name ]\nk=v\n");

      expect(document.sections.get(" spaced name ")?.get("k")).toBe("v");
    });
  });

  describe("malformed lines", () => {
    it("should reject lines without an equals sign", () => {
      const document = parse("[s]\njust some text\n");

      expect(document.errors).toEqual(["just some text"]);
      expect(toRecord(document)).toEqual({ s: {} });
    });

    it("should reject lines starting with an equals sign", () => {
      const document = parse("[s]\n  =value\n");

      expect(document.errors).toEqual(["=value"]);
    });

    it("should collect every error in input order", () => {
      const document = parse("bad one\n[s\n[t]\nk=1\nk=2\n=x\n");

      expect(document.errors).toEqual(["bad one", "[s", "k=2", "=x"]);
      expect(toRecord(document)).toEqual({ t: { k: "1" } });
    });
  });

  describe("comments and blank lines", () => {
    it("should skip semicolon comments and blank lines", () => {
      const document = parse("; header comment\n\n   \n[s]\n   ; indented\nk=v\n");

      expect(toRecord(document)).toEqual({ s: { k: "v" } });
      expect(document.errors).toEqual([]);
    });

    it("should reject hash lines under the default classifier", () => {
      const document = parse("# not a comment\n");

      expect(document.errors).toEqual(["# not a comment"]);
    });

    it("should use a custom classifier", () => {
      const document = parse("' vb comment\n; ini comment\n[s]\nk=v\n", {
        isComment: visualBasicCommentClassifier,
      });

      expect(document.errors).toEqual([]);
      expect(toRecord(document)).toEqual({ s: { k: "v" } });
    });

    it("should not treat a marker after the first character as a comment", () => {
      const document = parse("[s]\nk=v ; trailing\n");

      expect(document.sections.get("s")?.get("k")).toBe("v ; trailing");
    });
  });
});
