/**
 * @module primitives/peer-sync
 * @description Request/response sync sessions between directly linked nodes.
 *
 * Carries the reconciliation protocol over the transport:
 *
 * ```
 * initiator                         responder
 *   SYNC_REQUEST  ─────────────────►
 *                 ◄───────────────── SYNC_RESPONSE (full chain)
 *   SYNC_PUSH     ─────────────────►  validate + adopt
 *                 ◄───────────────── SYNC_ACK
 * ```
 *
 * Pending requests fail with ReconciliationAbortedError when the link
 * drops, the caller aborts, or no reply arrives in time.
 */

import { encodeFrame } from "../codec/index.js";
import type { Frame, FrameKind, SyncRejection } from "../codec/index.js";
import { IntegrityError } from "../interfaces/ledger.js";
import type { IReconciliationPeer } from "../interfaces/reconciliation.js";
import {
  DivergentLedgerError,
  ReconciliationAbortedError,
} from "../interfaces/reconciliation.js";
import type { ITransport } from "../interfaces/transport.js";
import type { NodeId } from "../types/branded.js";
import type { LedgerBlock } from "../types/ledger.js";
import type { CanonicalOffer } from "../types/sync.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export type SyncFrame = Extract<
  Frame,
  { kind: "SYNC_REQUEST" | "SYNC_RESPONSE" | "SYNC_PUSH" | "SYNC_ACK" }
>;

/**
 * What the responder side needs from the local node.
 */
export interface SyncHandler {
  /** The current local chain. */
  getChain(): readonly LedgerBlock[];
  /** Validate and adopt a canonical chain offered by `peerId`. */
  accept(peerId: NodeId, offer: CanonicalOffer): Promise<void>;
}

export interface PeerSyncOptions {
  /** Reply deadline per request, in ms. Default 15000. */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

interface PendingRequest {
  readonly peerId: NodeId;
  readonly expects: FrameKind;
  readonly resolve: (frame: SyncFrame) => void;
  readonly reject: (error: Error) => void;
  readonly dispose: () => void;
}

export function isSyncFrame(frame: Frame): frame is SyncFrame {
  return (
    frame.kind === "SYNC_REQUEST" ||
    frame.kind === "SYNC_RESPONSE" ||
    frame.kind === "SYNC_PUSH" ||
    frame.kind === "SYNC_ACK"
  );
}

export class PeerSync {
  private readonly pending = new Map<number, PendingRequest>();
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private nextRequestId = 1;

  constructor(
    private readonly transport: ITransport,
    private readonly handler: SyncHandler,
    options: PeerSyncOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * A reconciliation counterpart backed by sync frames to `peerId`.
   */
  session(peerId: NodeId): IReconciliationPeer {
    return {
      peerId,
      fetchChain: async (signal) => {
        const reply = await this.request(
          peerId,
          (requestId) => ({ kind: "SYNC_REQUEST", requestId }),
          "SYNC_RESPONSE",
          signal
        );
        if (reply.kind !== "SYNC_RESPONSE") {
          throw new ReconciliationAbortedError(peerId, "DISCONNECTED", `Unexpected ${reply.kind}`);
        }
        return reply.chain;
      },
      pushCanonical: async (offer: CanonicalOffer, signal) => {
        const reply = await this.request(
          peerId,
          (requestId) => ({ kind: "SYNC_PUSH", requestId, offer }),
          "SYNC_ACK",
          signal
        );
        if (reply.kind !== "SYNC_ACK") {
          throw new ReconciliationAbortedError(peerId, "DISCONNECTED", `Unexpected ${reply.kind}`);
        }
        if (reply.accepted) return;

        const reason = reply.reason ?? "canonical chain refused";
        if (reply.rejection === "DIVERGENT") {
          throw new DivergentLedgerError(peerId, reason);
        }
        throw new IntegrityError(
          `${peerId} refused canonical chain: ${reason}`,
          reply.rejection === "CONFLICT" ? "TAIL_CONFLICT" : "INVALID_CHAIN"
        );
      },
    };
  }

  /**
   * Handle an inbound sync frame from a direct peer.
   */
  async handleFrame(frame: SyncFrame, fromPeer: NodeId): Promise<void> {
    switch (frame.kind) {
      case "SYNC_REQUEST":
        await this.reply(fromPeer, {
          kind: "SYNC_RESPONSE",
          requestId: frame.requestId,
          chain: this.handler.getChain(),
        });
        return;

      case "SYNC_PUSH":
        await this.reply(fromPeer, await this.acceptOffer(frame, fromPeer));
        return;

      case "SYNC_RESPONSE":
      case "SYNC_ACK": {
        const request = this.pending.get(frame.requestId);
        if (!request || request.peerId !== fromPeer || request.expects !== frame.kind) {
          this.logger.debug("unmatched sync reply", {
            peer: fromPeer,
            kind: frame.kind,
            requestId: frame.requestId,
          });
          return;
        }
        this.settle(frame.requestId, frame);
        return;
      }
    }
  }

  /**
   * Fail every request pending on `peerId`. Called when its link drops.
   */
  linkDown(peerId: NodeId): void {
    for (const [requestId, request] of [...this.pending]) {
      if (request.peerId === peerId) {
        this.settle(requestId, new ReconciliationAbortedError(peerId, "DISCONNECTED"));
      }
    }
  }

  /**
   * Fail every pending request.
   */
  close(): void {
    for (const [requestId, request] of [...this.pending]) {
      this.settle(requestId, new ReconciliationAbortedError(request.peerId, "CANCELLED"));
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private request(
    peerId: NodeId,
    build: (requestId: number) => SyncFrame,
    expects: FrameKind,
    signal: AbortSignal | undefined
  ): Promise<SyncFrame> {
    if (signal?.aborted) {
      return Promise.reject(new ReconciliationAbortedError(peerId, "CANCELLED"));
    }

    const requestId = this.nextRequestId++;
    return new Promise<SyncFrame>((resolve, reject) => {
      const onAbort = (): void =>
        this.settle(requestId, new ReconciliationAbortedError(peerId, "CANCELLED"));
      const timer = setTimeout(
        () => this.settle(requestId, new ReconciliationAbortedError(peerId, "TIMEOUT")),
        this.timeoutMs
      );
      signal?.addEventListener("abort", onAbort, { once: true });

      this.pending.set(requestId, {
        peerId,
        expects,
        resolve,
        reject,
        dispose: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      });

      this.transport.transmit(peerId, encodeFrame(build(requestId))).catch((err: unknown) => {
        this.settle(
          requestId,
          new ReconciliationAbortedError(
            peerId,
            "DISCONNECTED",
            err instanceof Error ? err.message : String(err)
          )
        );
      });
    });
  }

  private settle(requestId: number, outcome: SyncFrame | Error): void {
    const request = this.pending.get(requestId);
    if (!request) return;

    this.pending.delete(requestId);
    request.dispose();
    if (outcome instanceof Error) {
      request.reject(outcome);
    } else {
      request.resolve(outcome);
    }
  }

  private async acceptOffer(
    frame: Extract<SyncFrame, { kind: "SYNC_PUSH" }>,
    fromPeer: NodeId
  ): Promise<SyncFrame> {
    try {
      await this.handler.accept(fromPeer, frame.offer);
      return {
        kind: "SYNC_ACK",
        requestId: frame.requestId,
        accepted: true,
        rejection: null,
        reason: null,
      };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn("refused canonical chain", {
        peer: fromPeer,
        error: `${error.name}: ${error.message}`,
      });
      return {
        kind: "SYNC_ACK",
        requestId: frame.requestId,
        accepted: false,
        rejection: rejectionOf(error),
        reason: error.message,
      };
    }
  }

  private async reply(peerId: NodeId, frame: SyncFrame): Promise<void> {
    try {
      await this.transport.transmit(peerId, encodeFrame(frame));
    } catch (err) {
      // The requester times out or sees the link drop.
      this.logger.warn("sync reply not sent", {
        peer: peerId,
        kind: frame.kind,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function rejectionOf(error: Error): SyncRejection {
  if (error instanceof DivergentLedgerError) return "DIVERGENT";
  if (error instanceof IntegrityError && error.code === "TAIL_CONFLICT") return "CONFLICT";
  return "INTEGRITY";
}
