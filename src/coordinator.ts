/**
 * @module coordinator
 * @description The coordinating authority: master ledger, relay and heartbeat.
 *
 * While nodes are CENTRALIZED they hand their traffic to the coordinator,
 * which records it in the master ledger and fans it out to every other
 * attached node. Its heartbeat is how nodes know the authority is alive.
 * A node returning from offline operation reconciles with the coordinator
 * before it trusts the authority path again.
 *
 * Each attached node talks to the coordinator through its own
 * AuthorityLink, whose `setOnline(false)` models that node losing the
 * authority without anyone else noticing.
 */

import { TacNetEmitter } from "./primitives/base-emitter.js";
import { ClockService } from "./primitives/clock-service.js";
import { Ledger } from "./primitives/ledger.js";
import { Reconciler } from "./primitives/reconciler.js";
import type {
  AuthorityHeartbeatCallback,
  AuthorityMessageCallback,
  IAuthority,
} from "./interfaces/authority.js";
import { IntegrityError } from "./interfaces/ledger.js";
import { ReconciliationAbortedError } from "./interfaces/reconciliation.js";
import type { ISigner } from "./interfaces/signer.js";
import { PeerUnreachableError } from "./interfaces/transport.js";
import { messageDigest, sealBytes } from "./codec/canonical.js";
import { toUnixMillis } from "./types/branded.js";
import type { NodeId, UnixMillis } from "./types/branded.js";
import type { LedgerBlock } from "./types/ledger.js";
import type { MeshMessage } from "./types/message.js";
import type { CanonicalOffer } from "./types/sync.js";
import { silentLogger } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";

export interface CoordinatorOptions {
  readonly signer: ISigner;
  readonly networkId?: string;
  readonly logger?: Logger;
  readonly now?: () => UnixMillis;
}

/**
 * Coordinator: the authority every CENTRALIZED node relays through.
 *
 * @example
 * ```ts
 * const coordinator = new Coordinator({ signer: hqSigner });
 * const link = coordinator.createLink(toNodeId("alpha"));
 * const node = new TacNode({ nodeId, transport, signer, authority: link });
 * coordinator.heartbeat();
 * ```
 */
export class Coordinator extends TacNetEmitter {
  readonly authorityId: NodeId;
  readonly clock: ClockService;
  readonly ledger: Ledger;
  readonly reconciler: Reconciler;

  private readonly links = new Map<NodeId, AuthorityLink>();
  private readonly signer: ISigner;
  private readonly logger: Logger;
  private readonly now: () => UnixMillis;

  constructor(options: CoordinatorOptions) {
    super();
    this.signer = options.signer;
    this.authorityId = options.signer.nodeId;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => toUnixMillis(Date.now()));

    this.clock = new ClockService(this.authorityId);
    this.ledger = new Ledger({
      owner: this.authorityId,
      signer: this.signer,
      clock: this.clock,
      networkId: options.networkId,
      now: this.now,
      logger: this.logger.child("ledger"),
    });
    this.reconciler = new Reconciler(this.ledger, this.clock, {
      logger: this.logger.child("reconciler"),
      now: this.now,
    });

    this.relay(this.ledger, "LEDGER_APPENDED");
    this.relay(this.ledger, "LEDGER_ADOPTED");
  }

  /**
   * Attach a node. Returns the node's end of the link.
   */
  createLink(nodeId: NodeId): AuthorityLink {
    const existing = this.links.get(nodeId);
    if (existing) return existing;

    const link = new AuthorityLink(this, nodeId);
    this.links.set(nodeId, link);
    return link;
  }

  getLink(nodeId: NodeId): AuthorityLink | null {
    return this.links.get(nodeId) ?? null;
  }

  /**
   * Send a heartbeat to every online link.
   * @returns Number of links reached.
   */
  heartbeat(at: UnixMillis = this.now()): number {
    let reached = 0;
    for (const link of this.links.values()) {
      if (link.isOnline()) {
        link.deliverHeartbeat(at);
        reached++;
      }
    }
    return reached;
  }

  /**
   * Record a message from `from` in the master ledger and fan it out.
   *
   * @throws {IntegrityError} code=BAD_SIGNATURE if the sender's signature
   * does not verify.
   */
  async accept(from: NodeId, message: MeshMessage): Promise<void> {
    const authentic = await this.signer.verify(
      message.sender,
      sealBytes(messageDigest(message), message.sender, message.lamport),
      message.signature
    );
    if (!authentic) {
      throw new IntegrityError(
        `Message ${message.id} from ${from} failed verification`,
        "BAD_SIGNATURE"
      );
    }

    if (this.ledger.hasMessage(message.id)) return;

    this.clock.observe(message.vector, message.lamport);
    try {
      await this.ledger.append({ messages: [message] }, message.sender, {
        seal: { lamport: message.lamport, signature: message.signature },
      });
    } catch (err) {
      if (err instanceof IntegrityError && err.code === "DUPLICATE_MESSAGE") return;
      throw err;
    }

    const targets = [...this.links.values()].filter(
      (link) => link.nodeId !== from && link.isOnline()
    );
    const results = await Promise.allSettled(
      targets.map((link) => link.deliverMessage(message))
    );
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.logger.warn("relay delivery failed", {
          node: targets[i]?.nodeId,
          messageId: message.id,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
  }
}

/**
 * One node's link to the coordinator.
 */
export class AuthorityLink implements IAuthority {
  readonly authorityId: NodeId;
  readonly peerId: NodeId;

  private online = true;
  private readonly messageListeners = new Set<AuthorityMessageCallback>();
  private readonly heartbeatListeners = new Set<AuthorityHeartbeatCallback>();

  constructor(
    private readonly coordinator: Coordinator,
    readonly nodeId: NodeId
  ) {
    this.authorityId = coordinator.authorityId;
    this.peerId = coordinator.authorityId;
  }

  // ─── IAuthority ─────────────────────────────────────────────────

  async relay(message: MeshMessage): Promise<void> {
    if (!this.online) {
      throw new PeerUnreachableError(this.authorityId);
    }
    await this.coordinator.accept(this.nodeId, message);
  }

  async fetchChain(signal?: AbortSignal): Promise<readonly LedgerBlock[]> {
    this.checkReachable(signal);
    return this.coordinator.ledger.blocks;
  }

  async pushCanonical(offer: CanonicalOffer, signal?: AbortSignal): Promise<void> {
    this.checkReachable(signal);
    await this.coordinator.reconciler.accept(this.nodeId, offer);
  }

  onMessage(callback: AuthorityMessageCallback): () => void {
    this.messageListeners.add(callback);
    return () => {
      this.messageListeners.delete(callback);
    };
  }

  onHeartbeat(callback: AuthorityHeartbeatCallback): () => void {
    this.heartbeatListeners.add(callback);
    return () => {
      this.heartbeatListeners.delete(callback);
    };
  }

  isOnline(): boolean {
    return this.online;
  }

  // ─── Control ────────────────────────────────────────────────────

  setOnline(online: boolean): void {
    this.online = online;
  }

  /** @internal */
  async deliverMessage(message: MeshMessage): Promise<void> {
    for (const listener of [...this.messageListeners]) {
      await listener(message);
    }
  }

  /** @internal */
  deliverHeartbeat(at: UnixMillis): void {
    for (const listener of [...this.heartbeatListeners]) {
      listener(at);
    }
  }

  private checkReachable(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new ReconciliationAbortedError(this.authorityId, "CANCELLED");
    }
    if (!this.online) {
      throw new ReconciliationAbortedError(this.authorityId, "DISCONNECTED");
    }
  }
}
