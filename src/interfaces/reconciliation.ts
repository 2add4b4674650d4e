/**
 * @module interfaces/reconciliation
 * @description Reconciliation counterpart and its failure modes.
 *
 * A reconciliation peer is whatever holds the other chain: another node
 * reached over the transport, or the coordinating authority. The
 * reconciler only ever pulls a chain and pushes a canonical offer.
 */

import type { NodeId } from "../types/branded.js";
import type { LedgerBlock } from "../types/ledger.js";
import type { CanonicalOffer } from "../types/sync.js";

/**
 * The two chains share no common ancestor (different or corrupted genesis).
 * Never auto-merged; needs an operator.
 */
export class DivergentLedgerError extends Error {
  readonly code = "NO_COMMON_ANCESTOR" as const;

  constructor(
    public readonly peerId: NodeId,
    message = `Ledger of ${peerId} shares no common ancestor`
  ) {
    super(message);
    this.name = "DivergentLedgerError";
  }
}

/**
 * The counterpart vanished, the caller cancelled mid-sync, or the
 * counterpart's chain kept moving under every offer (CONFLICT).
 * Nothing was published or adopted; retried on the next contact.
 */
export class ReconciliationAbortedError extends Error {
  constructor(
    public readonly peerId: NodeId,
    public readonly code: "CANCELLED" | "DISCONNECTED" | "TIMEOUT" | "CONFLICT",
    message = `Reconciliation with ${peerId} aborted (${code})`
  ) {
    super(message);
    this.name = "ReconciliationAbortedError";
  }
}

/**
 * @interface IReconciliationPeer
 */
export interface IReconciliationPeer {
  readonly peerId: NodeId;

  /**
   * @description Pulls the counterpart's full current chain.
   * @throws {ReconciliationAbortedError} on disconnect, timeout or abort.
   */
  fetchChain(signal?: AbortSignal): Promise<readonly LedgerBlock[]>;

  /**
   * @description Offers the canonical chain. Resolves once the counterpart
   * has validated and adopted it.
   * @throws {IntegrityError} code=TAIL_CONFLICT if its chain moved since
   * the fetch; other codes, or {DivergentLedgerError}, if it refused.
   * @throws {ReconciliationAbortedError} on disconnect, timeout or abort.
   */
  pushCanonical(offer: CanonicalOffer, signal?: AbortSignal): Promise<void>;
}
