/**
 * @module __tests__/webcrypto-signer.test
 * @description Tests for the WebCrypto ECDSA P-256 signer and crypto utilities.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { sha256 } from "@noble/hashes/sha256";
import { KeyDirectory, WebCryptoSigner } from "../src/backends/webcrypto-signer.js";
import {
  compressPublicKey,
  decompressPublicKey,
  fromHex,
  merkleRoot,
  normalizeSignature,
  requireSubtle,
  sha256Hex,
  toHex,
} from "../src/backends/crypto-utils.js";
import { toHexDigest, toNodeId } from "../src/types/branded.js";

const alpha = toNodeId("alpha");
const bravo = toNodeId("bravo");
const data = new TextEncoder().encode("move to phase line blue");

describe("WebCryptoSigner", () => {
  let directory: KeyDirectory;
  let signer: WebCryptoSigner;

  beforeEach(async () => {
    directory = new KeyDirectory();
    signer = await WebCryptoSigner.generate(alpha, directory);
  });

  it("publishes a compressed public key on generation", () => {
    const key = directory.getPublicKey(alpha);
    expect(directory.has(alpha)).toBe(true);
    expect(key?.length).toBe(33);
    expect([0x02, 0x03]).toContain(key?.[0]);
  });

  it("produces 64-byte signatures that verify", async () => {
    const sig = await signer.sign(data);
    expect(sig.length).toBe(64);
    expect(await signer.verify(alpha, data, sig)).toBe(true);
  });

  it("lets another node's signer verify through the shared directory", async () => {
    const other = await WebCryptoSigner.generate(bravo, directory);
    const sig = await signer.sign(data);

    expect(await other.verify(alpha, data, sig)).toBe(true);
    expect(await other.verify(bravo, data, sig)).toBe(false);
  });

  it("rejects tampered data", async () => {
    const sig = await signer.sign(data);
    const tampered = new Uint8Array(data);
    tampered[0] = tampered[0]! ^ 0x01;

    expect(await signer.verify(alpha, tampered, sig)).toBe(false);
  });

  it("returns false for unknown signers and malformed signatures", async () => {
    const sig = await signer.sign(data);
    expect(await signer.verify(toNodeId("unknown"), data, sig)).toBe(false);
    expect(await signer.verify(alpha, data, sig.slice(0, 63))).toBe(false);
  });
});

describe("crypto-utils", () => {
  it("compresses and decompresses P-256 public keys", async () => {
    const subtle = requireSubtle();
    const pair = await subtle.generateKey({ name: "ECDSA", namedCurve: "P-256" }, true, [
      "sign",
      "verify",
    ]);
    const raw = new Uint8Array(await subtle.exportKey("raw", pair.publicKey));

    const compressed = compressPublicKey(raw);

    expect(compressed.length).toBe(33);
    expect(decompressPublicKey(compressed)).toEqual(raw);
  });

  it("rejects keys of the wrong shape", () => {
    expect(() => compressPublicKey(new Uint8Array(64))).toThrow("Expected 65-byte");
  });

  it("converts DER signatures to raw r || s", () => {
    const r = new Uint8Array(33);
    r[1] = 0x80; // high bit set, so DER adds a leading zero
    r[32] = 0x01;
    const s = new Uint8Array(31).fill(0x22);
    const der = new Uint8Array([0x30, 2 + 33 + 2 + 31, 0x02, 33, ...r, 0x02, 31, ...s]);

    const raw = normalizeSignature(der);

    expect(raw.length).toBe(64);
    expect(raw[0]).toBe(0x80);
    expect(raw[31]).toBe(0x01);
    expect(raw[32]).toBe(0x00);
    expect(Array.from(raw.slice(33))).toEqual(Array.from(s));
  });

  it("passes raw 64-byte signatures through", () => {
    const raw = new Uint8Array(64).fill(7);
    expect(normalizeSignature(raw)).toBe(raw);
  });

  it("round-trips hex", () => {
    expect(toHex(new Uint8Array([0, 15, 255]))).toBe("000fff");
    expect(Array.from(fromHex("000fff"))).toEqual([0, 15, 255]);
  });

  describe("merkleRoot", () => {
    const leafA = sha256Hex(new TextEncoder().encode("a"));
    const leafB = sha256Hex(new TextEncoder().encode("b"));
    const leafC = sha256Hex(new TextEncoder().encode("c"));

    function parent(left: string, right: string): string {
      const joined = new Uint8Array(64);
      joined.set(fromHex(left));
      joined.set(fromHex(right), 32);
      return toHex(sha256(joined));
    }

    it("hashes the empty string for no leaves", () => {
      expect(merkleRoot([])).toBe(
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
      );
    });

    it("returns a single leaf unchanged", () => {
      expect(merkleRoot([leafA])).toBe(leafA);
    });

    it("moves the last node up unhashed on odd levels", () => {
      const left = parent(leafA, leafB);
      expect(merkleRoot([leafA, leafB, leafC])).toBe(toHexDigest(parent(left, leafC)));
    });

    it("changes the root when the last leaf is repeated", () => {
      const three = merkleRoot([leafA, leafB, leafC]);
      const four = merkleRoot([leafA, leafB, leafC, leafC]);
      expect(four).toBe(parent(parent(leafA, leafB), parent(leafC, leafC)));
      expect(four).not.toBe(three);
    });
  });
});
