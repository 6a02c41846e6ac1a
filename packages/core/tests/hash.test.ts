import { describe, it, expect } from "vitest";
import {
  djb2,
  fnv1a,
  formatHash,
  getHashFunction,
  hashString,
  isHashAlgorithm,
  sid,
} from "../src/hash.js";

const ascii = (text: string) => Uint8Array.from(text, (c) => c.charCodeAt(0));

describe("hash", () => {
  describe("djb2", () => {
    it("should match known values", () => {
      expect(djb2(ascii(""))).toBe(5381);
      expect(djb2(ascii("hello"))).toBe(0x0f923099);
      expect(djb2(ascii("player.jump"))).toBe(0x32d5555c);
    });

    it("should treat bytes as unsigned", () => {
      expect(djb2(Uint8Array.from([0x63, 0x61, 0x66, 0xc3, 0xa9]))).toBe(0x0f35767b);
    });

    it("should be deterministic", () => {
      const bytes = ascii("enemy");
      expect(djb2(bytes)).toBe(djb2(ascii("enemy")));
      expect(djb2(bytes)).toBe(0x0f60b8e3);
    });
  });

  describe("fnv1a", () => {
    it("should match known values", () => {
      expect(fnv1a(ascii(""))).toBe(0x811c9dc5);
      expect(fnv1a(ascii("hello"))).toBe(0x4f9f2cab);
    });
  });

  describe("hashString", () => {
    it("should hash the UTF-8 encoding", () => {
      expect(hashString("café")).toBe(0x0f35767b);
      expect(hashString("hello", fnv1a)).toBe(0x4f9f2cab);
    });

    it("should agree with sid", () => {
      expect(sid("world")).toBe(0x10a7356d);
      expect(sid("world")).toBe(hashString("world"));
    });
  });

  describe("formatHash", () => {
    it("should render 8 zero-padded lowercase digits", () => {
      expect(formatHash(0x2b61d)).toBe("0x0002b61d");
      expect(formatHash(0xdeadbeef)).toBe("0xdeadbeef");
      expect(formatHash(0)).toBe("0x00000000");
    });

    it("should wrap negative numbers to unsigned", () => {
      expect(formatHash(-1)).toBe("0xffffffff");
    });
  });

  describe("lookup", () => {
    it("should find built-in algorithms by name", () => {
      expect(getHashFunction("djb2")).toBe(djb2);
      expect(getHashFunction("fnv1a")).toBe(fnv1a);
      expect(getHashFunction("md5")).toBeUndefined();
      expect(getHashFunction("toString")).toBeUndefined();
      expect(isHashAlgorithm("fnv1a")).toBe(true);
    });
  });
});
