import { describe, it, expect } from "vitest";
import { djb2, toByteString } from "@strid/core";
import { Scanner } from "../src/scanner.js";
import { OutputBuffer } from "../src/output-buffer.js";
import { rewriteInvocation, formatReplacement } from "../src/rewriter.js";

function rewriteFirst(text: string) {
  const out = new OutputBuffer();
  const scanner = new Scanner(text, out, "SID");
  expect(scanner.next()).toBe("invocation");
  const outcome = rewriteInvocation(scanner, { hash: djb2, marker: "SID", fileName: "test.c" });
  return { outcome, scanner, written: () => toByteString(out.toBytes()) };
}

describe("rewriter", () => {
  it("should replace an invocation with its hash", () => {
    const { outcome, scanner, written } = rewriteFirst('SID( "hello" ) + 1');

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.state).toBe("Done");
    expect(outcome.invocation).toEqual({
      start: 0,
      end: 14,
      literal: "hello",
      hash: 0x0f923099,
      replacement: '0x0f923099 /* "hello" */',
    });
    expect(outcome.edit).toEqual({ start: 0, end: 14, text: '0x0f923099 /* "hello" */' });
    expect(scanner.position).toBe(14);
    expect(written()).toBe('0x0f923099 /* "hello" */');
  });

  it("should hash escape sequences verbatim", () => {
    const { outcome } = rewriteFirst('SID("a\\"b")');

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.invocation.literal).toBe('a\\"b');
    expect(outcome.invocation.literal).toHaveLength(4);
    expect(outcome.invocation.hash).toBe(0x7c93cc66);
  });

  it("should accept whitespace and newlines inside the invocation", () => {
    const { outcome, written } = rewriteFirst('SID(\n\t"x"\r\n)');

    expect(outcome.ok).toBe(true);
    expect(written()).toBe('0x0002b61d /* "x" */');
  });

  it("should fail in ExpectQuote when the argument is not a string", () => {
    const { outcome } = rewriteFirst("SID( 42 )");

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.state).toBe("Failed");
    expect(outcome.failedIn).toBe("ExpectQuote");
    expect(outcome.error.kind).toBe("InvalidInvocation");
    expect(outcome.error.path).toBe("test.c");
  });

  it("should fail in InLiteral when the string is never closed", () => {
    const { outcome } = rewriteFirst('SID("abc');

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failedIn).toBe("InLiteral");
    expect(outcome.error.kind).toBe("UnterminatedLiteral");
    expect(outcome.error.snippet).toBe("abc");
  });

  it("should treat a trailing backslash as an open literal", () => {
    const { outcome } = rewriteFirst('SID("abc\\');

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("UnterminatedLiteral");
  });

  it("should treat an escaped closing quote as an open literal", () => {
    const { outcome } = rewriteFirst('SID("abc\\")');

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("UnterminatedLiteral");
  });

  it("should fail in ExpectCloseDelim when `)` is missing", () => {
    const { outcome } = rewriteFirst('SID( "x" ');

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failedIn).toBe("ExpectCloseDelim");
    expect(outcome.error.kind).toBe("MissingClosingDelimiter");
    expect(outcome.error.snippet).toBe("x");
    expect(outcome.error.offset).toBe(0);
  });

  it("should reject a second argument", () => {
    const { outcome } = rewriteFirst('SID("a", 1)');

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe("MissingClosingDelimiter");
  });

  describe("formatReplacement", () => {
    it("should zero-pad to 8 lowercase hex digits", () => {
      expect(formatReplacement(0x1505, "")).toBe('0x00001505 /* "" */');
      expect(formatReplacement(0xdeadbeef, "k")).toBe('0xdeadbeef /* "k" */');
    });
  });
});
