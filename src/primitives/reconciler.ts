/**
 * @module primitives/reconciler
 * @description Merges two divergent ledgers into one canonical chain.
 *
 * 1. Pull the counterpart's chain and find the fork.
 * 2. Keep the common prefix.
 * 3. Order every distinct block past the fork by (lamport, creator).
 * 4. Re-link them; each original block that lost its index is a conflict.
 * 5. Push the canonical chain to the counterpart, then adopt it locally.
 *
 * The push is the commit point: once the counterpart has adopted, the
 * local side adopts too, even if the caller aborted meanwhile. A push the
 * counterpart refuses because its chain moved is retried from step 1.
 *
 * Chains without a common ancestor are never merged.
 */

import { TacNetEmitter } from "./base-emitter.js";
import { ClockService } from "./clock-service.js";
import type { Ledger } from "./ledger.js";
import { diffChains, relinkChain, sealKey, sharedPrefixLength } from "./ledger.js";
import { IntegrityError } from "../interfaces/ledger.js";
import type { IReconciliationPeer } from "../interfaces/reconciliation.js";
import {
  DivergentLedgerError,
  ReconciliationAbortedError,
} from "../interfaces/reconciliation.js";
import { TransportError } from "../interfaces/transport.js";
import { toLamport, toUnixMillis } from "../types/branded.js";
import type { LamportTime, NodeId, UnixMillis } from "../types/branded.js";
import type { LedgerBlock } from "../types/ledger.js";
import type {
  CanonicalOffer,
  MergeResult,
  ReconciliationReport,
  SyncConflict,
} from "../types/sync.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

// ─── Pure Merge ────────────────────────────────────────────────────

/**
 * Canonical block order: Lamport, then creator id, then payload hash.
 * The payload hash only separates two blocks one creator sealed with the
 * same Lamport time, which a correct node never does.
 */
export function compareBlocks(a: LedgerBlock, b: LedgerBlock): number {
  return (
    ClockService.compareEvents(
      { lamport: a.lamport, nodeId: a.creator },
      { lamport: b.lamport, nodeId: b.creator }
    ) || (a.payloadHash < b.payloadHash ? -1 : a.payloadHash > b.payloadHash ? 1 : 0)
  );
}

function hops(block: LedgerBlock): number {
  return block.payload.messages.reduce((sum, m) => sum + m.route.length, 0);
}

/**
 * Which of two copies of one sealed block a merge keeps: the one recorded
 * nearest its sender (fewest route hops), then the lower payload hash.
 */
export function compareCopies(a: LedgerBlock, b: LedgerBlock): number {
  return (
    hops(a) - hops(b) ||
    (a.payloadHash < b.payloadHash ? -1 : a.payloadHash > b.payloadHash ? 1 : 0)
  );
}

/**
 * Merge two chains that share a genesis block. Copies of one sealed block
 * collapse to the copy compareCopies() prefers.
 *
 * @throws {DivergentLedgerError} if they disagree at index 0.
 */
export function mergeChains(
  local: readonly LedgerBlock[],
  remote: readonly LedgerBlock[],
  peerId: NodeId
): MergeResult {
  const fork = diffChains(local, remote);

  if (!fork.forked) {
    const canonical = local.length >= remote.length ? local : remote;
    return {
      canonical,
      forkIndex: null,
      conflicts: [],
      localUnchanged: local.length === canonical.length,
      remoteUnchanged: remote.length === canonical.length,
    };
  }

  if (fork.forkIndex === 0) {
    throw new DivergentLedgerError(peerId);
  }

  const f = fork.forkIndex;
  const distinct = new Map<string, LedgerBlock>();
  for (const block of [...local.slice(f), ...remote.slice(f)]) {
    const key = sealKey(block);
    const kept = distinct.get(key);
    if (!kept || compareCopies(block, kept) < 0) distinct.set(key, block);
  }

  const ordered = [...distinct.values()].sort(compareBlocks);
  const canonical = relinkChain(local.slice(0, f), ordered);

  const conflicts: SyncConflict[] = [
    ...displaced(local, f, canonical, "LOCAL"),
    ...displaced(remote, f, canonical, "REMOTE"),
  ];

  return {
    canonical,
    forkIndex: f,
    conflicts,
    localUnchanged: sameChain(local, canonical),
    remoteUnchanged: sameChain(remote, canonical),
  };
}

function displaced(
  chain: readonly LedgerBlock[],
  from: number,
  canonical: readonly LedgerBlock[],
  side: SyncConflict["side"]
): SyncConflict[] {
  return chain
    .slice(from)
    .filter((block) => canonical[block.index]?.hash !== block.hash)
    .map((block) => ({
      sequenceIndex: block.index,
      superseded: block,
      canonical: canonical[block.index] ?? null,
      side,
      rule: "superseded-by-total-order" as const,
    }));
}

function sameChain(a: readonly LedgerBlock[], b: readonly LedgerBlock[]): boolean {
  return a.length === b.length && a[a.length - 1]?.hash === b[b.length - 1]?.hash;
}

// ─── Reconciler ────────────────────────────────────────────────────

export interface ReconcilerOptions {
  readonly logger?: Logger;
  readonly now?: () => UnixMillis;
  /** Exchanges per run when the counterpart's chain keeps moving. Default 4. */
  readonly maxAttempts?: number;
}

export interface ReconcileOptions {
  readonly signal?: AbortSignal;
}

/**
 * Reconciler: runs the merge protocol between one ledger and any
 * counterpart. At most one run per counterpart; a second call while one
 * is in flight joins it.
 *
 * @example
 * ```ts
 * const reconciler = new Reconciler(ledger, clock);
 * const report = await reconciler.reconcile(peerSession);
 * console.log(report.conflicts.length);
 * ```
 */
export class Reconciler extends TacNetEmitter {
  private readonly inFlight = new Map<NodeId, Promise<ReconciliationReport>>();
  private readonly logger: Logger;
  private readonly now: () => UnixMillis;
  private readonly maxAttempts: number;

  constructor(
    private readonly ledger: Ledger,
    private readonly clock: ClockService,
    options: ReconcilerOptions = {}
  ) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => toUnixMillis(Date.now()));
    this.maxAttempts = options.maxAttempts ?? 4;
  }

  reconcile(
    peer: IReconciliationPeer,
    options: ReconcileOptions = {}
  ): Promise<ReconciliationReport> {
    const running = this.inFlight.get(peer.peerId);
    if (running) return running;

    const run = this.run(peer, options.signal).finally(() => {
      this.inFlight.delete(peer.peerId);
    });
    this.inFlight.set(peer.peerId, run);
    return run;
  }

  isReconciling(peerId: NodeId): boolean {
    return this.inFlight.has(peerId);
  }

  /**
   * Validate and adopt a canonical chain offered by a counterpart that ran
   * the merge. The offer must have been merged against this ledger's
   * current tail and name the fork point this ledger sees.
   *
   * @throws {DivergentLedgerError} if the offer starts from another genesis.
   * @throws {IntegrityError} code=TAIL_CONFLICT if this ledger moved since
   * the counterpart fetched it; PREFIX_MISMATCH for a wrong fork index;
   * INVALID_CHAIN or BAD_SIGNATURE for a bad chain.
   */
  async accept(peerId: NodeId, offer: CanonicalOffer): Promise<void> {
    const { chain, forkIndex, baseTail } = offer;
    if (chain[0]?.hash !== this.ledger.genesis.hash) {
      throw new DivergentLedgerError(peerId);
    }
    this.ledger.assertValid(chain);

    const tail = this.ledger.tail;
    if (tail.hash !== baseTail) {
      throw new IntegrityError(
        `Offer from ${peerId} was merged against ${baseTail}, tail is ${tail.hash}`,
        "TAIL_CONFLICT",
        tail.index
      );
    }
    const shared = sharedPrefixLength(this.ledger.blocks, chain);
    if (shared !== forkIndex) {
      throw new IntegrityError(
        `Offer from ${peerId} claims fork index ${forkIndex}, shared prefix is ${shared}`,
        "PREFIX_MISMATCH",
        Math.min(shared, forkIndex)
      );
    }

    await this.assertSigned(chain, shared);
    // Rechecked under the ledger lock.
    await this.ledger.adopt(chain, forkIndex, { expectedTail: baseTail });
    this.witnessChain(chain);
  }

  // ─── Internal ───────────────────────────────────────────────────

  private async run(
    peer: IReconciliationPeer,
    signal: AbortSignal | undefined
  ): Promise<ReconciliationReport> {
    try {
      const report = await this.exchange(peer, signal);
      this.emit({
        type: "RECONCILIATION_COMPLETED",
        nodeId: this.ledger.owner,
        report,
        timestamp: report.completedAt,
      });
      return report;
    } catch (err) {
      const error = normalizeFailure(peer.peerId, err);
      this.logger.warn("reconciliation failed", {
        peer: peer.peerId,
        error: `${error.name}: ${error.message}`,
      });
      this.emit({
        type: "RECONCILIATION_FAILED",
        nodeId: this.ledger.owner,
        peerId: peer.peerId,
        reason:
          error instanceof DivergentLedgerError
            ? "DIVERGENT"
            : error instanceof IntegrityError
              ? "INTEGRITY"
              : "ABORTED",
        error,
        timestamp: this.now(),
      });
      throw error;
    }
  }

  private async exchange(
    peer: IReconciliationPeer,
    signal: AbortSignal | undefined
  ): Promise<ReconciliationReport> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.exchangeOnce(peer, signal);
      } catch (err) {
        if (!isTailConflict(err) || attempt >= this.maxAttempts) throw err;
        this.logger.debug("counterpart chain moved, merging again", {
          peer: peer.peerId,
          attempt,
        });
      }
    }
  }

  private async exchangeOnce(
    peer: IReconciliationPeer,
    signal: AbortSignal | undefined
  ): Promise<ReconciliationReport> {
    checkAborted(peer.peerId, signal);
    const remote = await peer.fetchChain(signal);
    checkAborted(peer.peerId, signal);

    const local = this.ledger.blocks;
    this.ledger.assertValid(local);

    const remoteCheck = this.ledger.validate(remote);
    if (!remoteCheck.valid) {
      if (remoteCheck.failedIndex === 0) {
        throw new DivergentLedgerError(peer.peerId);
      }
      throw new IntegrityError(
        `Chain from ${peer.peerId} invalid at block ${remoteCheck.failedIndex}: ${remoteCheck.reason}`,
        "INVALID_CHAIN",
        remoteCheck.failedIndex
      );
    }

    const merge = mergeChains(local, remote, peer.peerId);
    await this.assertSigned(remote, sharedPrefixLength(local, remote));

    this.logger.debug("merged chains", {
      peer: peer.peerId,
      forkIndex: merge.forkIndex,
      length: merge.canonical.length,
      conflicts: merge.conflicts.length,
    });

    if (!merge.remoteUnchanged) {
      checkAborted(peer.peerId, signal);
      await peer.pushCanonical(
        {
          chain: merge.canonical,
          forkIndex: sharedPrefixLength(remote, merge.canonical),
          baseTail: remote[remote.length - 1]?.hash ?? this.ledger.genesis.hash,
        },
        signal
      );
    } else {
      checkAborted(peer.peerId, signal);
    }

    // The counterpart holds the canonical chain now; abort no longer applies.
    if (!merge.localUnchanged) {
      await this.ledger.adopt(
        merge.canonical,
        sharedPrefixLength(local, merge.canonical)
      );
      this.witnessChain(merge.canonical);
    }

    return {
      peerId: peer.peerId,
      forkIndex: merge.forkIndex,
      canonicalLength: merge.canonical.length,
      conflicts: merge.conflicts,
      completedAt: this.now(),
    };
  }

  private async assertSigned(
    chain: readonly LedgerBlock[],
    fromIndex: number
  ): Promise<void> {
    const result = await this.ledger.verifySignatures(chain, fromIndex);
    if (!result.valid) {
      throw new IntegrityError(
        `Bad signature in block ${result.failedIndex}`,
        "BAD_SIGNATURE",
        result.failedIndex
      );
    }
  }

  private witnessChain(chain: readonly LedgerBlock[]): void {
    this.clock.witness(
      chain.reduce<LamportTime>(
        (max, block) => (block.lamport > max ? block.lamport : max),
        toLamport(0)
      )
    );
  }
}

function checkAborted(peerId: NodeId, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ReconciliationAbortedError(peerId, "CANCELLED");
  }
}

function isTailConflict(err: unknown): err is IntegrityError {
  return err instanceof IntegrityError && err.code === "TAIL_CONFLICT";
}

function normalizeFailure(peerId: NodeId, err: unknown): Error {
  if (isTailConflict(err)) {
    return new ReconciliationAbortedError(peerId, "CONFLICT", err.message);
  }
  if (
    err instanceof DivergentLedgerError ||
    err instanceof IntegrityError ||
    err instanceof ReconciliationAbortedError
  ) {
    return err;
  }
  if (err instanceof TransportError) {
    return new ReconciliationAbortedError(peerId, "DISCONNECTED", err.message);
  }
  return err instanceof Error ? err : new Error(String(err));
}
