/**
 * @module types/branded
 * @description Branded types for compile-time safety across the TacNet core.
 *
 * Branded types prevent accidental misuse of raw primitives (strings, numbers,
 * Uint8Arrays) as protocol-level identifiers. A message id can never be passed
 * where a NodeId is expected, and a raw hex string can never be treated as a
 * block hash without going through the hashing helpers.
 *
 * @example
 * ```ts
 * const raw = "alpha-1";
 * // Type error: string is not assignable to NodeId
 * const id: NodeId = raw;
 * // Correct:
 * const id: NodeId = toNodeId(raw);
 * ```
 */

/** Unique symbol for branding. Not exported: internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Identity Brands ────────────────────────────────────────────────

/**
 * Identifier of a field node (or of the coordinating authority).
 * Lexicographic order on NodeIds is the system-wide tie-break.
 */
export type NodeId = Brand<string, "NodeId">;

/**
 * Globally unique message identifier (32 lowercase hex characters).
 */
export type MessageId = Brand<string, "MessageId">;

// ─── Ledger Brands ──────────────────────────────────────────────────

/**
 * A 64-character lowercase hex SHA-256 digest.
 */
export type HexDigest = Brand<string, "HexDigest">;

/**
 * Opaque signature bytes produced by an ISigner.
 */
export type Signature = Brand<Uint8Array, "Signature">;

/**
 * 33-byte SEC1 compressed P-256 public key.
 */
export type CompressedPublicKey = Brand<Uint8Array, "CompressedPublicKey">;

// ─── Clock Brands ───────────────────────────────────────────────────

/**
 * A scalar Lamport timestamp.
 */
export type LamportTime = Brand<number, "LamportTime">;

/**
 * Wall-clock milliseconds since the Unix epoch.
 * Used for event records, liveness and queue deadlines only,
 * never for ordering.
 */
export type UnixMillis = Brand<number, "UnixMillis">;

// ─── Constructors ───────────────────────────────────────────────────

/**
 * Brand a raw string as a NodeId. Rejects the empty string.
 */
export function toNodeId(raw: string): NodeId {
  if (raw.length === 0) {
    throw new TypeError("NodeId must be a non-empty string");
  }
  return raw as NodeId;
}

/**
 * Compare two NodeIds for the deterministic tie-break (lower id first).
 */
export function compareNodeIds(a: NodeId, b: NodeId): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

const HEX_32 = /^[0-9a-f]{32}$/;
const HEX_64 = /^[0-9a-f]{64}$/;

/**
 * Brand a 32-character lowercase hex string as a MessageId.
 */
export function toMessageId(raw: string): MessageId {
  if (!HEX_32.test(raw)) {
    throw new TypeError(`Invalid MessageId: ${raw}`);
  }
  return raw as MessageId;
}

/**
 * Brand a 64-character lowercase hex string as a HexDigest.
 */
export function toHexDigest(raw: string): HexDigest {
  if (!HEX_64.test(raw)) {
    throw new TypeError(`Invalid hex digest: ${raw}`);
  }
  return raw as HexDigest;
}

export function toSignature(bytes: Uint8Array): Signature {
  return bytes as Signature;
}

/**
 * Brand a non-negative safe integer as a LamportTime.
 */
export function toLamport(value: number): LamportTime {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new TypeError(`Invalid Lamport time: ${value}`);
  }
  return value as LamportTime;
}

export function toUnixMillis(value: number): UnixMillis {
  return value as UnixMillis;
}
