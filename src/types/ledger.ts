/**
 * @module types/ledger
 * @description Hash-chained ledger block model, validation results and
 * the audit export format.
 */

import type {
  HexDigest,
  LamportTime,
  NodeId,
  Signature,
  UnixMillis,
} from "./branded.js";
import type { MeshMessage } from "./message.js";

/**
 * Sentinel previous-hash for the genesis block.
 */
export const GENESIS_PREV_HASH = "0".repeat(64) as HexDigest;

/**
 * The message set carried by one block.
 */
export interface BlockPayload {
  readonly messages: readonly MeshMessage[];
}

/**
 * An appended ledger block. Frozen on creation.
 */
export interface LedgerBlock {
  readonly index: number;
  readonly prevHash: HexDigest;
  /** Merkle root over the digests of `payload.messages`. */
  readonly payloadHash: HexDigest;
  readonly creator: NodeId;
  readonly lamport: LamportTime;
  readonly signature: Signature;
  readonly payload: BlockPayload;
  /** SHA-256 over index, prevHash, payloadHash, creator, lamport, signature. */
  readonly hash: HexDigest;
}

/**
 * The seal a creator signs for a block. Position independent, so a block
 * can be re-linked at a new index without being re-signed.
 */
export interface BlockSeal {
  readonly lamport: LamportTime;
  readonly signature: Signature;
}

export type ValidationFailure =
  | "BAD_GENESIS"
  | "BAD_INDEX"
  | "BROKEN_LINK"
  | "DUPLICATE_MESSAGE"
  | "PAYLOAD_HASH_MISMATCH"
  | "BLOCK_HASH_MISMATCH";

/**
 * Result of a full chain validation. Stops at the first failure.
 */
export type ValidationResult =
  | { readonly valid: true; readonly checked: number }
  | {
      readonly valid: false;
      readonly checked: number;
      readonly failedIndex: number;
      readonly reason: ValidationFailure;
    };

/**
 * Result of comparing two chains.
 */
export type ForkResult =
  | { readonly forked: false; readonly commonLength: number }
  | { readonly forked: true; readonly forkIndex: number };

/**
 * A block displaced by adoption of a canonical chain.
 * Kept as audit evidence; never erased.
 */
export interface SupersededBlock {
  readonly block: LedgerBlock;
  readonly supersededAt: UnixMillis;
  readonly reason: "superseded-by-total-order";
}

/**
 * One block in the audit export format.
 */
export interface LedgerExportRecord {
  readonly index: number;
  readonly prevHash: string;
  readonly payloadHash: string;
  readonly creator: string;
  readonly timestamp: number;
  readonly signature: string;
  readonly hash: string;
  readonly messageIds: readonly string[];
}

/**
 * Result of checking every block and message signature in a chain.
 */
export type SignatureCheckResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly failedIndex: number };
