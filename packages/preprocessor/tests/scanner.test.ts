import { describe, it, expect } from "vitest";
import { toByteString } from "@strid/core";
import { Scanner, isSpace, isAlnum } from "../src/scanner.js";
import { OutputBuffer } from "../src/output-buffer.js";

function createScanner(text: string, marker = "SID") {
  const out = new OutputBuffer();
  const scanner = new Scanner(text, out, marker);
  return { scanner, written: () => toByteString(out.toBytes()) };
}

describe("scanner", () => {
  describe("step", () => {
    it("should report copied, then end", () => {
      const { scanner, written } = createScanner("  ab+");

      expect(scanner.step()).toBe("copied");
      expect(scanner.cursor).toEqual({ read: 2, write: 2 });
      expect(scanner.step()).toBe("copied");
      expect(scanner.cursor).toEqual({ read: 4, write: 4 });
      expect(scanner.step()).toBe("copied");
      expect(scanner.step()).toBe("end");
      expect(written()).toBe("  ab+");
    });

    it("should report end on empty input", () => {
      const { scanner } = createScanner("");
      expect(scanner.step()).toBe("end");
    });
  });

  describe("next", () => {
    it("should copy input without a marker verbatim", () => {
      const source = "int x = 1;\r\n\tfoo(/* c */ \"str\");\v\f";
      const { scanner, written } = createScanner(source);
      expect(scanner.next()).toBe("end");
      expect(written()).toBe(source);
    });

    it("should stop right after the marker token", () => {
      const { scanner, written } = createScanner('foo(SID( "x" ))');
      expect(scanner.next()).toBe("invocation");
      expect(scanner.position).toBe(8);
      expect(scanner.invocationStart).toBe(4);
      expect(written()).toBe("foo(");
    });

    it("should not match a marker that prefixes a longer identifier", () => {
      const source = 'SIDLONGNAME( "x" )';
      const { scanner, written } = createScanner(source);
      expect(scanner.next()).toBe("end");
      expect(written()).toBe(source);
    });

    it("should not match a marker at the end of a longer identifier", () => {
      const source = 'xSID("a") 2SID("b")';
      const { scanner, written } = createScanner(source);
      expect(scanner.next()).toBe("end");
      expect(written()).toBe(source);
    });

    it("should treat underscore as a word boundary", () => {
      const { scanner, written } = createScanner('MY_SID("x")');
      expect(scanner.next()).toBe("invocation");
      expect(scanner.position).toBe(7);
      expect(written()).toBe("MY_");
    });

    it("should require the opening parenthesis right after the marker", () => {
      const source = 'SID ("x")';
      const { scanner, written } = createScanner(source);
      expect(scanner.next()).toBe("end");
      expect(written()).toBe(source);
    });

    it("should match case-sensitively", () => {
      const source = 'sid("x") Sid("y")';
      const { scanner } = createScanner(source);
      expect(scanner.next()).toBe("end");
    });

    it("should keep a marker prefix cut off by the end of input", () => {
      const { scanner, written } = createScanner("a SI");
      expect(scanner.next()).toBe("end");
      expect(written()).toBe("a SI");
    });

    it("should match a configured marker", () => {
      const { scanner, written } = createScanner('SID("a") HASH("b")', "HASH");
      expect(scanner.next()).toBe("invocation");
      expect(scanner.invocationStart).toBe(9);
      expect(written()).toBe('SID("a") ');
    });

    it("should treat NUL and high bytes as ordinary content", () => {
      const source = "a\u0000bÿ SID(";
      const { scanner, written } = createScanner(source);
      expect(scanner.next()).toBe("invocation");
      expect(written()).toBe("a\u0000bÿ ");
    });
  });

  it("should reject markers that are not alphanumeric", () => {
    const out = new OutputBuffer();
    expect(() => new Scanner("", out, "S_ID")).toThrow(/Invalid marker/);
    expect(() => new Scanner("", out, "")).toThrow(/Invalid marker/);
  });

  describe("character classes", () => {
    it("should follow the C locale", () => {
      expect([" ", "\t", "\n", "\v", "\f", "\r"].every((c) => isSpace(c.charCodeAt(0)))).toBe(true);
      expect(isSpace(0)).toBe(false);
      expect(isSpace(0xa0)).toBe(false);
      expect(isAlnum("a".charCodeAt(0))).toBe(true);
      expect(isAlnum("Z".charCodeAt(0))).toBe(true);
      expect(isAlnum("7".charCodeAt(0))).toBe(true);
      expect(isAlnum("_".charCodeAt(0))).toBe(false);
      expect(isAlnum(0xe9)).toBe(false);
    });
  });
});
