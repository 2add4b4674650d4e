/**
 * @module types/sync
 * @description Reconciliation results and conflict records.
 */

import type { HexDigest, NodeId, UnixMillis } from "./branded.js";
import type { LedgerBlock } from "./ledger.js";

export type ConflictRule = "superseded-by-total-order";

/**
 * A block that lost its sequence index during a merge.
 */
export interface SyncConflict {
  /** The index the superseded block claimed. */
  readonly sequenceIndex: number;
  readonly superseded: LedgerBlock;
  /** The block that is canonical at that index, if the merged chain reaches it. */
  readonly canonical: LedgerBlock | null;
  /** Which participant's pre-merge chain held the superseded block. */
  readonly side: "LOCAL" | "REMOTE";
  readonly rule: ConflictRule;
}

/**
 * Pure merge output: the canonical chain and what it displaced.
 */
export interface MergeResult {
  readonly canonical: readonly LedgerBlock[];
  /** Lowest disagreeing index, or null when one chain prefixed the other. */
  readonly forkIndex: number | null;
  readonly conflicts: readonly SyncConflict[];
  /** True when the local chain already equals the canonical chain. */
  readonly localUnchanged: boolean;
  /** True when the remote chain already equals the canonical chain. */
  readonly remoteUnchanged: boolean;
}

/**
 * The canonical chain offered to a participant for adoption.
 */
export interface CanonicalOffer {
  readonly chain: readonly LedgerBlock[];
  /** Length of the prefix `chain` shares with the participant's chain. */
  readonly forkIndex: number;
  /** Tail hash of the participant's chain the merge was computed against. */
  readonly baseTail: HexDigest;
}

/**
 * Report of a completed reconciliation.
 */
export interface ReconciliationReport {
  readonly peerId: NodeId;
  readonly forkIndex: number | null;
  readonly canonicalLength: number;
  readonly conflicts: readonly SyncConflict[];
  readonly completedAt: UnixMillis;
}
