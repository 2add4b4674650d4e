/**
 * @module codec/canonical
 * @description Deterministic byte encodings that get hashed or signed.
 *
 * Every structure is encoded as a MessagePack array in a fixed field order,
 * so two nodes always produce the same bytes for the same values. Vector
 * clock entries are sorted by node id.
 */

import { encode } from "@msgpack/msgpack";
import { merkleRoot, sha256Hex, toHex } from "../backends/crypto-utils.js";
import type {
  HexDigest,
  LamportTime,
  NodeId,
  Signature,
} from "../types/branded.js";
import type { VectorClock } from "../types/clock.js";
import type { BlockPayload } from "../types/ledger.js";
import type { MeshMessage } from "../types/message.js";

/** Domain tag prefixed to every seal before signing. */
export const SEAL_DOMAIN = "tacnet-seal-v1";

/**
 * Vector clock entries in node-id order.
 */
export function sortedVectorEntries(
  vector: VectorClock
): Array<[string, number]> {
  return Object.entries(vector).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Digest of the immutable part of a message. `ttl`, `route` and
 * `signature` are excluded; relays rewrite the first two.
 */
export function messageDigest(
  message: Omit<MeshMessage, "ttl" | "route" | "signature">
): HexDigest {
  return sha256Hex(
    encode([
      message.id,
      message.sender,
      message.destination,
      message.type,
      message.payload,
      message.lamport,
      sortedVectorEntries(message.vector),
      message.createdAt,
    ])
  );
}

/**
 * Digest of a message as a ledger stores it: the immutable digest plus
 * the hop fields and signature this copy arrived with.
 */
export function recordDigest(message: MeshMessage): HexDigest {
  return sha256Hex(
    encode([messageDigest(message), message.ttl, [...message.route], message.signature])
  );
}

/**
 * Merkle root over the stored form of a block's messages. Covers every
 * byte of the payload.
 */
export function payloadHash(payload: BlockPayload): HexDigest {
  return merkleRoot(payload.messages.map((m) => recordDigest(m)));
}

/**
 * Merkle root over the immutable digests of a block's messages. This is
 * what a seal signs, so every copy of a message shares one seal whatever
 * route it took.
 */
export function contentHash(payload: BlockPayload): HexDigest {
  return merkleRoot(payload.messages.map((m) => messageDigest(m)));
}

/**
 * The bytes a creator signs for a block, over its content hash.
 * Independent of the block's position, so a re-linked block keeps a
 * valid signature.
 */
export function sealBytes(
  hash: HexDigest,
  creator: NodeId,
  lamport: LamportTime
): Uint8Array {
  return encode([SEAL_DOMAIN, hash, creator, lamport]);
}

/**
 * Hash of a block header: index, prevHash, payloadHash, creator,
 * lamport and hex signature.
 */
export function blockHash(header: {
  readonly index: number;
  readonly prevHash: HexDigest;
  readonly payloadHash: HexDigest;
  readonly creator: NodeId;
  readonly lamport: LamportTime;
  readonly signature: Signature;
}): HexDigest {
  return sha256Hex(
    encode([
      header.index,
      header.prevHash,
      header.payloadHash,
      header.creator,
      header.lamport,
      toHex(header.signature),
    ])
  );
}
