import { describe, expect, it } from "vitest";
import { InvalidHashError } from "../../src/errors.js";
import { HASH_HEX_LENGTH, Hash } from "../../src/hash/index.js";

const VERTEX_27_HEX = "4d159113222bfeb85fbe717cc2393ee8a6a85b7ce5ac1791c4eade5e3dd6de41";

describe("Hash", () => {
  describe("compute", () => {
    it("hashes the encoded form of a vertex id", () => {
      const content = new Uint8Array([27, 0, 0, 0, 0, 0, 0, 0]);
      expect(Hash.compute(content).toHex()).toBe(VERTEX_27_HEX);
    });

    it("is deterministic", () => {
      const content = new Uint8Array([1, 2, 3]);
      expect(Hash.compute(content).equals(Hash.compute(content))).toBe(true);
    });

    it("distinguishes different content", () => {
      const a = Hash.compute(new Uint8Array([1]));
      const b = Hash.compute(new Uint8Array([2]));
      expect(a.equals(b)).toBe(false);
    });
  });

  describe("toHex", () => {
    it("produces 64 lowercase hex characters", () => {
      const hex = Hash.compute(new Uint8Array([])).toHex();
      expect(hex).toHaveLength(HASH_HEX_LENGTH);
      expect(hex).toMatch(/^[0-9a-f]{64}$/);
    });

    it("matches toString", () => {
      const hash = Hash.compute(new Uint8Array([5]));
      expect(String(hash)).toBe(hash.toHex());
    });
  });

  describe("fromHex", () => {
    it("parses the hex form", () => {
      const hash = Hash.fromHex(VERTEX_27_HEX);
      expect(hash.toHex()).toBe(VERTEX_27_HEX);
      expect(hash.equals(Hash.compute(new Uint8Array([27, 0, 0, 0, 0, 0, 0, 0])))).toBe(true);
    });

    it("accepts upper-case digits and prints lower case", () => {
      expect(Hash.fromHex(VERTEX_27_HEX.toUpperCase()).toHex()).toBe(VERTEX_27_HEX);
    });

    it("rejects short input", () => {
      expect(() => Hash.fromHex("abcd")).toThrow(InvalidHashError);
    });

    it("rejects non-hex characters", () => {
      expect(() => Hash.fromHex("z".repeat(64))).toThrow(InvalidHashError);
    });
  });

  describe("fromBytes", () => {
    it("requires 32 bytes", () => {
      expect(() => Hash.fromBytes(new Uint8Array(31))).toThrow("Expected 32 bytes, got 31");
    });

    it("copies the input", () => {
      const bytes = new Uint8Array(32);
      const hash = Hash.fromBytes(bytes);
      bytes[0] = 0xff;
      expect(hash.toHex()).toBe("0".repeat(64));
    });
  });

  describe("bytes", () => {
    it("returns a copy of the digest", () => {
      const hash = Hash.fromHex("0".repeat(64));
      hash.bytes[0] = 0xff;
      expect(hash.bytes[0]).toBe(0);
    });
  });

  describe("compare", () => {
    it("orders bytewise", () => {
      const low = Hash.fromHex(`00${"f".repeat(62)}`);
      const high = Hash.fromHex(`01${"0".repeat(62)}`);
      expect(Hash.compare(low, high)).toBeLessThan(0);
      expect(Hash.compare(high, low)).toBeGreaterThan(0);
      expect(Hash.compare(low, Hash.fromHex(low.toHex()))).toBe(0);
    });
  });
});
