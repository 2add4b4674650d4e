/**
 * @module interfaces/ledger
 * @description ILedger: the append-only, hash-linked block chain of one node.
 *
 * The ledger owns all hashing and linking. Nothing else in the core computes
 * a block hash.
 */

import type { HexDigest, LamportTime, MessageId, NodeId } from "../types/branded.js";
import type {
  BlockPayload,
  BlockSeal,
  ForkResult,
  LedgerBlock,
  LedgerExportRecord,
  SupersededBlock,
  ValidationResult,
} from "../types/ledger.js";
import type { MeshMessage } from "../types/message.js";

/**
 * Hash-chain violation. Fatal to the affected chain segment; never
 * silently repaired.
 */
export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INDEX_CONFLICT"
      | "FOREIGN_CREATOR"
      | "INVALID_CHAIN"
      | "BAD_SIGNATURE"
      | "PREFIX_MISMATCH"
      | "TAIL_CONFLICT"
      | "DUPLICATE_MESSAGE",
    /** Offending block index, when one can be named. */
    public readonly index: number | null = null
  ) {
    super(message);
    this.name = "IntegrityError";
  }
}

/**
 * Options for a single append.
 */
export interface AppendOptions {
  /**
   * Fail with INDEX_CONFLICT unless the block lands at exactly this index.
   */
  readonly expectedIndex?: number;
  /**
   * The creator's seal for a block recorded on its behalf (a received
   * message). When omitted the ledger stamps and signs as its owner.
   */
  readonly seal?: BlockSeal;
}

/**
 * Options for adopting a chain offered by a counterpart.
 */
export interface AdoptOptions {
  /**
   * Tail hash of the chain the offer was merged against. When set, fail
   * with TAIL_CONFLICT unless it is still the tail, and with
   * PREFIX_MISMATCH unless `forkIndex` is exactly the shared prefix.
   */
  readonly expectedTail?: HexDigest;
}

/**
 * @interface ILedger
 */
export interface ILedger {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Appends a block at the tail. Serialized: concurrent calls
   * never produce two blocks at one index, and a message id is recorded
   * at most once, in the chain and within the block.
   * @throws {IntegrityError} code=INDEX_CONFLICT, FOREIGN_CREATOR,
   * DUPLICATE_MESSAGE.
   */
  append(
    payload: BlockPayload,
    creator: NodeId,
    options?: AppendOptions
  ): Promise<LedgerBlock>;

  /**
   * @command
   * @description Replaces the chain with a canonical chain produced by
   * reconciliation. Displaced blocks are retained as superseded.
   * @throws {IntegrityError} code=INVALID_CHAIN, PREFIX_MISMATCH,
   * TAIL_CONFLICT.
   */
  adopt(
    canonical: readonly LedgerBlock[],
    forkIndex: number,
    options?: AdoptOptions
  ): Promise<readonly SupersededBlock[]>;

  // ─── Queries ────────────────────────────────────────────────────

  /** @query Full validation of a chain (defaults to this ledger's own). */
  validate(chain?: readonly LedgerBlock[]): ValidationResult;

  /** @query Lowest index at which two chains disagree. */
  diff(a: readonly LedgerBlock[], b: readonly LedgerBlock[]): ForkResult;

  /** @query Audit export of the current chain. */
  export(): readonly LedgerExportRecord[];

  /** @query Whether any block in the current chain carries the message. */
  hasMessage(id: MessageId): boolean;

  /** @query Messages of blocks stamped at or after a Lamport time. */
  since(lamport: LamportTime): readonly MeshMessage[];

  readonly blocks: readonly LedgerBlock[];
  readonly superseded: readonly SupersededBlock[];
  readonly length: number;
}
