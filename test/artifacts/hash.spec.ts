import { describe, it, expect } from "vitest";
import { canonicalJSON, sha256JSON, sha256Text, shortHash } from "../../src/core/artifacts/hash";

describe("hashing", () => {
  it("sorts object keys at every level", () => {
    expect(canonicalJSON({ b: 1, a: { d: [2, { z: 0, y: 1 }], c: null } })).toBe('{"a":{"c":null,"d":[2,{"y":1,"z":0}]},"b":1}');
  });

  it("writes bigints as suffixed strings", () => {
    expect(canonicalJSON({ n: 5n })).toBe('{"n":"5n"}');
  });

  it("hashes equal shapes equally regardless of key order", () => {
    expect(sha256JSON({ x: 1, y: 2 })).toBe(sha256JSON({ y: 2, x: 1 }));
    expect(sha256JSON({ x: 1 })).not.toBe(sha256JSON({ x: 2 }));
  });

  it("produces hex digests and prefixes", () => {
    const digest = sha256Text("abc");
    expect(digest).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    expect(shortHash(digest)).toBe("ba7816bf8f01");
    expect(shortHash(digest, 4)).toBe("ba78");
  });
});
