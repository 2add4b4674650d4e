/**
 * @module primitives/mesh-router
 * @description Controlled flooding over directly linked peers.
 *
 * A message is sent to every live peer not already on its route, with TTL
 * one lower. Receivers append themselves to the route, hand the message to
 * the local processor and re-flood while TTL remains. A bounded dedup set
 * stops a message id from being processed or forwarded twice.
 *
 * The router owns the node's peer table: liveness, link quality and
 * failure counts are tracked here and nowhere else.
 */

import { TacNetEmitter } from "./base-emitter.js";
import type { ITransport } from "../interfaces/transport.js";
import { encodeFrame } from "../codec/index.js";
import { toUnixMillis } from "../types/branded.js";
import type { MessageId, NodeId, UnixMillis } from "../types/branded.js";
import type { MeshMessage } from "../types/message.js";
import type { PeerLink } from "../types/network.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export interface MeshRouterOptions {
  /** TTL given to locally originated messages. Default 3. */
  readonly initialTtl?: number;
  /** Silence after which a peer is dropped, in ms. Default 90000. */
  readonly peerTimeoutMs?: number;
  /** How long a seen message id is remembered, in ms. Default 600000. */
  readonly dedupRetentionMs?: number;
  /** Dedup set size cap; oldest ids are evicted first. Default 10000. */
  readonly dedupMaxEntries?: number;
  readonly logger?: Logger;
  readonly now?: () => UnixMillis;
}

/**
 * Local handling of a received message. Resolve false to reject it:
 * a rejected message is neither forwarded nor remembered as seen.
 */
export type MessageProcessor = (
  message: MeshMessage,
  fromPeer: NodeId
) => Promise<boolean>;

export interface FloodResult {
  readonly sentTo: readonly NodeId[];
  readonly failed: readonly NodeId[];
}

export type ReceiveOutcome =
  | { readonly status: "DUPLICATE" }
  | { readonly status: "REJECTED" }
  | { readonly status: "ACCEPTED"; readonly forwarded: FloodResult };

const NO_FLOOD: FloodResult = { sentTo: [], failed: [] };

/** Quality gained per frame heard from a peer. */
const QUALITY_GAIN = 0.1;
/** Quality multiplier per failed send. */
const QUALITY_DECAY = 0.5;

/**
 * MeshRouter: TTL-bounded flooding and peer liveness for one node.
 *
 * @example
 * ```ts
 * const router = new MeshRouter(nodeId, transport, { initialTtl: 3 });
 * router.setProcessor(async (message) => verifyAndRecord(message));
 * router.observePeer(peerId);
 * await router.broadcast(message); // { sentTo: [peerId], failed: [] }
 * ```
 */
export class MeshRouter extends TacNetEmitter {
  private readonly peers = new Map<NodeId, PeerLink>();
  private readonly seen = new Map<MessageId, UnixMillis>();
  private readonly config: Required<Omit<MeshRouterOptions, "logger" | "now">>;
  private readonly logger: Logger;
  private readonly now: () => UnixMillis;
  private processor: MessageProcessor = async () => true;

  constructor(
    readonly localId: NodeId,
    private readonly transport: ITransport,
    options: MeshRouterOptions = {}
  ) {
    super();
    this.config = {
      initialTtl: options.initialTtl ?? 3,
      peerTimeoutMs: options.peerTimeoutMs ?? 90_000,
      dedupRetentionMs: options.dedupRetentionMs ?? 600_000,
      dedupMaxEntries: options.dedupMaxEntries ?? 10_000,
    };
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => toUnixMillis(Date.now()));
  }

  get initialTtl(): number {
    return this.config.initialTtl;
  }

  setProcessor(processor: MessageProcessor): void {
    this.processor = processor;
  }

  // ─── Flooding ───────────────────────────────────────────────────

  /**
   * Send `message` to every live peer not on its route, TTL decremented.
   * A message with no TTL left is not sent. Per-peer failures are
   * collected, never thrown.
   */
  async broadcast(message: MeshMessage): Promise<FloodResult> {
    this.markSeen(message.id);

    if (message.ttl <= 0) return NO_FLOOD;

    const onRoute = new Set(message.route);
    const targets = [...this.peers.keys()].filter((peer) => !onRoute.has(peer));
    if (targets.length === 0) return NO_FLOOD;

    const frame = encodeFrame({
      kind: "MESSAGE",
      message: { ...message, ttl: message.ttl - 1 },
    });

    const results = await Promise.allSettled(
      targets.map((peer) => this.transport.transmit(peer, frame))
    );

    const sentTo: NodeId[] = [];
    const failed: NodeId[] = [];
    results.forEach((result, i) => {
      const peer = targets[i]!;
      if (result.status === "fulfilled") {
        sentTo.push(peer);
      } else {
        failed.push(peer);
        this.recordFailure(peer);
        this.logger.debug("send failed", {
          peer,
          messageId: message.id,
          error: describe(result.reason),
        });
      }
    });

    return { sentTo, failed };
  }

  /**
   * Handle a message that arrived from a direct peer.
   * Duplicates are dropped silently.
   */
  async receive(message: MeshMessage, fromPeer: NodeId): Promise<ReceiveOutcome> {
    this.observePeer(fromPeer);

    if (this.hasSeen(message.id)) {
      return { status: "DUPLICATE" };
    }

    if (message.route[0] !== message.sender || message.route.includes(this.localId)) {
      this.emit({
        type: "MESSAGE_REJECTED",
        nodeId: this.localId,
        messageId: message.id,
        fromPeer,
        reason: "MALFORMED_ROUTE",
        timestamp: this.now(),
      });
      return { status: "REJECTED" };
    }

    // Claimed before processing so a concurrent copy is a duplicate.
    this.markSeen(message.id);
    const routed: MeshMessage = {
      ...message,
      route: [...message.route, this.localId],
    };

    let accepted: boolean;
    try {
      accepted = await this.processor(routed, fromPeer);
    } catch (err) {
      this.seen.delete(message.id);
      throw err;
    }
    if (!accepted) {
      this.seen.delete(message.id);
      return { status: "REJECTED" };
    }

    const forwarded = routed.ttl > 0 ? await this.broadcast(routed) : NO_FLOOD;
    return { status: "ACCEPTED", forwarded };
  }

  /**
   * Announce presence to every directly linked peer.
   */
  async sendBeacons(): Promise<FloodResult> {
    const targets = this.transport.getLinkedPeers();
    if (targets.length === 0) return NO_FLOOD;

    const frame = encodeFrame({
      kind: "BEACON",
      nodeId: this.localId,
      sentAt: this.now(),
    });
    const results = await Promise.allSettled(
      targets.map((peer) => this.transport.transmit(peer, frame))
    );

    const sentTo: NodeId[] = [];
    const failed: NodeId[] = [];
    results.forEach((result, i) => {
      const peer = targets[i]!;
      if (result.status === "fulfilled") {
        sentTo.push(peer);
      } else {
        failed.push(peer);
        this.recordFailure(peer);
      }
    });
    return { sentTo, failed };
  }

  // ─── Peer Table ─────────────────────────────────────────────────

  /**
   * Record traffic from a peer. Returns true on first or regained contact.
   */
  observePeer(peerId: NodeId, at: UnixMillis = this.now()): boolean {
    if (peerId === this.localId) return false;

    const link = this.peers.get(peerId);
    if (link) {
      this.peers.set(peerId, {
        ...link,
        lastSeen: at,
        quality: Math.min(1, link.quality + QUALITY_GAIN),
        consecutiveFailures: 0,
      });
      return false;
    }

    this.peers.set(peerId, {
      peerId,
      firstSeen: at,
      lastSeen: at,
      quality: 1,
      consecutiveFailures: 0,
    });
    this.emit({
      type: "PEER_DISCOVERED",
      nodeId: this.localId,
      peerId,
      timestamp: at,
    });
    return true;
  }

  /**
   * Remove a peer. Returns false if it was not in the table.
   */
  dropPeer(peerId: NodeId, reason: "TIMEOUT" | "LINK_DOWN" = "LINK_DOWN"): boolean {
    const link = this.peers.get(peerId);
    if (!link) return false;

    this.peers.delete(peerId);
    this.emit({
      type: "PEER_LOST",
      nodeId: this.localId,
      peerId,
      lastSeen: link.lastSeen,
      reason,
      timestamp: this.now(),
    });
    return true;
  }

  /**
   * Drop every peer silent for longer than the peer timeout.
   */
  sweep(now: UnixMillis = this.now()): readonly NodeId[] {
    const stale = [...this.peers.values()]
      .filter((link) => now - link.lastSeen > this.config.peerTimeoutMs)
      .map((link) => link.peerId);
    for (const peerId of stale) {
      this.dropPeer(peerId, "TIMEOUT");
    }
    this.pruneSeen(now);
    return stale;
  }

  getPeers(): readonly PeerLink[] {
    return [...this.peers.values()];
  }

  getPeer(peerId: NodeId): PeerLink | null {
    return this.peers.get(peerId) ?? null;
  }

  get peerCount(): number {
    return this.peers.size;
  }

  // ─── Dedup ──────────────────────────────────────────────────────

  markSeen(id: MessageId, at: UnixMillis = this.now()): void {
    if (!this.seen.has(id)) {
      this.seen.set(id, at);
    }
    this.pruneSeen(at);
  }

  hasSeen(id: MessageId): boolean {
    return this.seen.has(id);
  }

  get seenCount(): number {
    return this.seen.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private recordFailure(peerId: NodeId): void {
    const link = this.peers.get(peerId);
    if (!link) return;
    this.peers.set(peerId, {
      ...link,
      quality: link.quality * QUALITY_DECAY,
      consecutiveFailures: link.consecutiveFailures + 1,
    });
  }

  private pruneSeen(now: UnixMillis): void {
    // Map iteration is insertion order: oldest first.
    for (const [id, at] of this.seen) {
      if (
        this.seen.size > this.config.dedupMaxEntries ||
        now - at > this.config.dedupRetentionMs
      ) {
        this.seen.delete(id);
      } else {
        break;
      }
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
