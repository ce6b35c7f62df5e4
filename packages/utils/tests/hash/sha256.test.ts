import { describe, expect, it } from "vitest";
import { SHA256_LENGTH, sha256 } from "../../src/hash/sha256/index.js";
import { bytesToHex } from "../../src/hash/utils/index.js";

describe("sha256", () => {
  it("hashes empty data", () => {
    const result = sha256(new Uint8Array([]));
    expect(result).toBeInstanceOf(Uint8Array);
    expect(result.length).toBe(SHA256_LENGTH);
    expect(bytesToHex(result)).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("hashes 'abc'", () => {
    const data = new TextEncoder().encode("abc");
    expect(bytesToHex(sha256(data))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("is deterministic", () => {
    const data = new Uint8Array([27, 0, 0, 0, 0, 0, 0, 0]);
    expect(bytesToHex(sha256(data))).toBe(bytesToHex(sha256(data)));
  });

  it("hashes only the viewed slice of a larger buffer", () => {
    const backing = new Uint8Array([0xff, 0x61, 0x62, 0x63, 0xff]);
    const view = backing.subarray(1, 4);
    expect(bytesToHex(sha256(view))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});
