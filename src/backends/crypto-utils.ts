/**
 * @module backends/crypto-utils
 * @description Shared cryptographic utilities.
 *
 * Provides:
 * - P-256 key import/export with SEC1 compressed encoding
 * - ECDSA signature normalization
 * - SHA-256 hashing and Merkle roots (synchronous, via @noble/hashes)
 * - Hex encoding
 *
 * All functions are pure and stateless. No CryptoKey objects leak outside
 * the signer backend.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import type {
  CompressedPublicKey,
  HexDigest,
  Signature,
} from "../types/branded.js";

// ─── Globals ───────────────────────────────────────────────────────

const subtle =
  typeof globalThis.crypto?.subtle !== "undefined"
    ? globalThis.crypto.subtle
    : undefined;

export function requireSubtle(): SubtleCrypto {
  if (!subtle) {
    throw new Error(
      "WebCrypto SubtleCrypto not available in this environment"
    );
  }
  return subtle;
}

/**
 * Strip branded type wrapper for WebCrypto BufferSource compatibility.
 * TypeScript 5.x DOM types expect `Uint8Array<ArrayBuffer>` but branded
 * types produce `Uint8Array<ArrayBufferLike>`. This creates a clean copy.
 */
export function buf(data: Uint8Array): ArrayBuffer {
  // Slice creates a new ArrayBuffer (not SharedArrayBuffer), safe for WebCrypto
  return new Uint8Array(data).buffer as ArrayBuffer;
}

// ─── Hex ───────────────────────────────────────────────────────────

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/**
 * @throws {Error} on odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

// ─── Hashing ───────────────────────────────────────────────────────

/**
 * SHA-256 as a 64-character lowercase hex digest.
 */
export function sha256Hex(data: Uint8Array): HexDigest {
  return bytesToHex(sha256(data)) as HexDigest;
}

/**
 * Merkle root over hex leaf digests.
 *
 * - no leaves: SHA-256 of the empty string
 * - one leaf: the leaf itself
 * - odd level: the last node moves up unhashed
 *
 * Interior nodes hash the concatenation of the two child digests' bytes.
 * Repeating the last leaf changes the root.
 */
export function merkleRoot(leaves: readonly HexDigest[]): HexDigest {
  if (leaves.length === 0) {
    return sha256Hex(new Uint8Array(0));
  }

  let level = leaves.map((leaf) => hexToBytes(leaf));
  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i]!;
      const right = level[i + 1];
      if (!right) {
        next.push(left);
        continue;
      }
      const joined = new Uint8Array(left.length + right.length);
      joined.set(left, 0);
      joined.set(right, left.length);
      next.push(sha256(joined));
    }
    level = next;
  }

  return bytesToHex(level[0]!) as HexDigest;
}

// ─── P-256 Point Compression ───────────────────────────────────────

/**
 * Compress a 65-byte uncompressed P-256 public key to 33-byte SEC1 format.
 *
 * Uncompressed: 0x04 || x (32 bytes) || y (32 bytes)
 * Compressed:   (0x02 | parity(y)) || x (32 bytes)
 */
export function compressPublicKey(
  uncompressed: Uint8Array
): CompressedPublicKey {
  if (uncompressed.length !== 65 || uncompressed[0] !== 0x04) {
    throw new Error(
      `Expected 65-byte uncompressed key (0x04 prefix), got ${uncompressed.length} bytes`
    );
  }

  const x = uncompressed.slice(1, 33);
  const y = uncompressed.slice(33, 65);
  const prefix = (y[31]! & 1) === 0 ? 0x02 : 0x03;

  const compressed = new Uint8Array(33);
  compressed[0] = prefix;
  compressed.set(x, 1);

  return compressed as CompressedPublicKey;
}

/**
 * Decompress a 33-byte SEC1 compressed P-256 public key to 65-byte uncompressed.
 *
 * Uses the curve equation y² = x³ - 3x + b (mod p) to recover y.
 */
export function decompressPublicKey(
  compressed: CompressedPublicKey
): Uint8Array {
  if (compressed.length !== 33) {
    throw new Error(
      `Expected 33-byte compressed key, got ${compressed.length} bytes`
    );
  }

  const prefix = compressed[0]!;
  if (prefix !== 0x02 && prefix !== 0x03) {
    throw new Error(`Invalid compression prefix: 0x${prefix.toString(16)}`);
  }

  const p = BigInt(
    "0xffffffff00000001000000000000000000000000ffffffffffffffffffffffff"
  );
  const b = BigInt(
    "0x5ac635d8aa3a93e7b3ebbd55769886bc651d06b0cc53b0f63bce3c3e27d2604b"
  );

  const xBytes = compressed.slice(1, 33);
  const x = BigInt("0x" + bytesToHex(xBytes));

  const x3 = modPow(x, BigInt(3), p);
  const threeX = (BigInt(3) * x) % p;
  let y2 = (x3 - threeX + b) % p;
  if (y2 < BigInt(0)) y2 += p;

  // p ≡ 3 mod 4, so sqrt = y2^((p+1)/4)
  let y = modPow(y2, (p + BigInt(1)) / BigInt(4), p);

  const wantOdd = prefix === 0x03;
  const isOdd = (y & BigInt(1)) === BigInt(1);
  if (wantOdd !== isOdd) {
    y = p - y;
  }

  const uncompressed = new Uint8Array(65);
  uncompressed[0] = 0x04;
  uncompressed.set(xBytes, 1);
  uncompressed.set(hexToBytes(y.toString(16).padStart(64, "0")), 33);

  return uncompressed;
}

/** Modular exponentiation: base^exp mod mod */
function modPow(base: bigint, exp: bigint, mod: bigint): bigint {
  let result = BigInt(1);
  base = ((base % mod) + mod) % mod;
  while (exp > BigInt(0)) {
    if ((exp & BigInt(1)) === BigInt(1)) {
      result = (result * base) % mod;
    }
    exp >>= BigInt(1);
    base = (base * base) % mod;
  }
  return result;
}

// ─── Key Import/Export ─────────────────────────────────────────────

/**
 * Import a 33-byte compressed P-256 public key for ECDSA verification.
 */
export async function importVerifyKey(
  compressed: CompressedPublicKey
): Promise<CryptoKey> {
  const s = requireSubtle();
  return s.importKey(
    "raw",
    buf(decompressPublicKey(compressed)),
    { name: "ECDSA", namedCurve: "P-256" },
    true,
    ["verify"]
  );
}

/**
 * Export a CryptoKey to 33-byte SEC1 compressed format.
 */
export async function exportCompressedPublicKey(
  key: CryptoKey
): Promise<CompressedPublicKey> {
  const s = requireSubtle();
  const raw = await s.exportKey("raw", key);
  return compressPublicKey(new Uint8Array(raw));
}

// ─── ECDSA Signature Conversion ────────────────────────────────────

/**
 * Normalize an ECDSA signature to raw 64-byte (r || s).
 *
 * WebCrypto P-256 signatures are already IEEE P1363 (fixed 64 bytes);
 * DER input from other signers is converted.
 */
export function normalizeSignature(sig: Uint8Array): Signature {
  if (sig.length === 64) {
    return sig as Signature;
  }

  // DER: SEQUENCE { INTEGER r, INTEGER s }
  if (sig[0] !== 0x30) {
    throw new Error("Unknown signature format");
  }

  let offset = 2;
  if (sig[1]! > 0x80) offset += sig[1]! - 0x80;

  if (sig[offset] !== 0x02) throw new Error("Expected INTEGER tag for r");
  offset++;
  const rLen = sig[offset++]!;
  const rRaw = sig.slice(offset, offset + rLen);
  offset += rLen;

  if (sig[offset] !== 0x02) throw new Error("Expected INTEGER tag for s");
  offset++;
  const sLen = sig[offset++]!;
  const sRaw = sig.slice(offset, offset + sLen);

  const result = new Uint8Array(64);
  result.set(fitTo32(rRaw), 0);
  result.set(fitTo32(sRaw), 32);

  return result as Signature;
}

function fitTo32(bytes: Uint8Array): Uint8Array {
  const trimmed = bytes.length > 32 ? bytes.slice(bytes.length - 32) : bytes;
  const out = new Uint8Array(32);
  out.set(trimmed, 32 - trimmed.length);
  return out;
}

/**
 * Generate `length` random bytes.
 */
export function randomBytes(length: number): Uint8Array {
  return globalThis.crypto.getRandomValues(new Uint8Array(length));
}
