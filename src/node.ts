/**
 * @module node
 * @description TacNode: the per-node agent that wires all primitives together.
 *
 * A TacNode manages:
 * - Network state (CENTRALIZED / P2P_FALLBACK / DEGRADED / ISOLATED)
 * - Submission: stamp, sign, record, deliver or queue
 * - Inbound traffic: verify, merge clocks, record, re-flood
 * - The outbox of messages waiting for a route
 * - Reconciliation with peers on link-up and with the authority on return
 *
 * Everything observable is emitted as a typed event.
 *
 * @example
 * ```ts
 * const node = new TacNode({ nodeId, transport, signer, authority: link });
 * node.on("MESSAGE_RECEIVED", (e) => render(e.message));
 * node.start();
 *
 * await node.submit({ type: "ALERT", payload: "contact north ridge" });
 * ```
 */

import { TacNetEmitter } from "./primitives/base-emitter.js";
import { ClockService } from "./primitives/clock-service.js";
import { Ledger } from "./primitives/ledger.js";
import { MeshRouter } from "./primitives/mesh-router.js";
import { Outbox } from "./primitives/outbox.js";
import { nextNetworkState, usesAuthority } from "./primitives/network-state.js";
import { Reconciler } from "./primitives/reconciler.js";
import { PeerSync, isSyncFrame } from "./primitives/peer-sync.js";
import type { IAuthority } from "./interfaces/authority.js";
import { IntegrityError } from "./interfaces/ledger.js";
import { MessageExpiredError } from "./interfaces/outbox.js";
import type { ISigner } from "./interfaces/signer.js";
import type { ITransport } from "./interfaces/transport.js";
import { CodecError, decodeFrame } from "./codec/index.js";
import type { Frame } from "./codec/index.js";
import { messageDigest, sealBytes } from "./codec/canonical.js";
import { randomBytes, toHex } from "./backends/crypto-utils.js";
import { resolveTuning } from "./config.js";
import type { NodeTuning, NodeTuningInput } from "./config.js";
import { compareNodeIds, toMessageId, toUnixMillis } from "./types/branded.js";
import type { MessageId, NodeId, UnixMillis } from "./types/branded.js";
import type { MeshMessage, SubmitRequest } from "./types/message.js";
import type { NetworkState, NodeStatus } from "./types/network.js";
import type { LinkChange } from "./types/transport.js";
import { createLogger } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";

// ─── Configuration ────────────────────────────────────────────────

export interface TacNodeConfig extends NodeTuningInput {
  readonly nodeId: NodeId;
  readonly transport: ITransport;
  readonly signer: ISigner;
  /** Link to the coordinating authority. Omit for a peer-only node. */
  readonly authority?: IAuthority | null;
  /** Seeds the ledger's genesis block. Default "tacnet". */
  readonly networkId?: string;
  /** Run heartbeat, beacon and drain timers after start(). Default true. */
  readonly timers?: boolean;
  readonly logger?: Logger;
  readonly now?: () => UnixMillis;
}

export interface DrainResult {
  readonly delivered: number;
  readonly requeued: number;
  readonly expired: number;
}

interface DeliveryAttempt {
  readonly delivered: boolean;
  readonly peers: readonly NodeId[];
  readonly viaAuthority: boolean;
}

// ─── Agent ─────────────────────────────────────────────────────────

export class TacNode extends TacNetEmitter {
  readonly nodeId: NodeId;
  readonly clock: ClockService;
  readonly ledger: Ledger;
  readonly router: MeshRouter;
  readonly outbox: Outbox;
  readonly reconciler: Reconciler;

  private readonly transport: ITransport;
  private readonly signer: ISigner;
  private readonly authority: IAuthority | null;
  private readonly tuning: NodeTuning;
  private readonly timersEnabled: boolean;
  private readonly logger: Logger;
  private readonly now: () => UnixMillis;
  private readonly peerSync: PeerSync;

  private state: NetworkState = "CENTRALIZED";
  private resyncing = false;
  private resynced = false;
  private lastHeartbeat: UnixMillis | null;
  private previousPeerCount = 0;
  private started = false;
  private syncAbort = new AbortController();
  private draining: Promise<DrainResult> | null = null;
  private readonly recording = new Set<MessageId>();
  private readonly background = new Set<Promise<void>>();
  private timers: Array<ReturnType<typeof setInterval>> = [];
  private heartbeatDeadline: ReturnType<typeof setTimeout> | null = null;
  private unsubscribers: Array<() => void> = [];

  constructor(config: TacNodeConfig) {
    super();
    this.tuning = resolveTuning(config);
    this.nodeId = config.nodeId;
    this.transport = config.transport;
    this.signer = config.signer;
    this.authority = config.authority ?? null;
    this.timersEnabled = config.timers ?? true;
    this.logger = config.logger ?? createLogger(`node:${config.nodeId}`);
    this.now = config.now ?? (() => toUnixMillis(Date.now()));
    this.lastHeartbeat = this.authority ? this.now() : null;

    this.clock = new ClockService(this.nodeId);
    this.ledger = new Ledger({
      owner: this.nodeId,
      signer: this.signer,
      clock: this.clock,
      networkId: config.networkId,
      now: this.now,
      logger: this.logger.child("ledger"),
    });
    this.router = new MeshRouter(this.nodeId, this.transport, {
      initialTtl: this.tuning.initialTtl,
      peerTimeoutMs: this.tuning.peerTimeoutMs,
      dedupRetentionMs: this.tuning.dedupRetentionMs,
      dedupMaxEntries: this.tuning.dedupMaxEntries,
      logger: this.logger.child("router"),
      now: this.now,
    });
    this.outbox = new Outbox({
      retryBaseMs: this.tuning.retryBaseMs,
      retryMaxMs: this.tuning.retryMaxMs,
      entryTtlMs: this.tuning.queueEntryTtlMs,
      maxAttempts: this.tuning.maxDeliveryAttempts,
    });
    this.reconciler = new Reconciler(this.ledger, this.clock, {
      logger: this.logger.child("reconciler"),
      now: this.now,
    });
    this.peerSync = new PeerSync(
      this.transport,
      {
        getChain: () => this.ledger.blocks,
        accept: (peerId, offer) => this.reconciler.accept(peerId, offer),
      },
      { timeoutMs: this.tuning.syncTimeoutMs, logger: this.logger.child("sync") }
    );

    this.router.setProcessor((message, fromPeer) => this.processInbound(message, fromPeer));

    this.relay(this.ledger, "LEDGER_APPENDED");
    this.relay(this.ledger, "LEDGER_ADOPTED");
    this.relay(this.router, "PEER_DISCOVERED");
    this.relay(this.router, "PEER_LOST");
    this.relay(this.router, "MESSAGE_REJECTED");
    this.relay(this.reconciler, "RECONCILIATION_COMPLETED");
    this.relay(this.reconciler, "RECONCILIATION_FAILED");

    this.router.on("PEER_DISCOVERED", () => this.evaluateState());
    this.router.on("PEER_LOST", (event) => {
      this.peerSync.linkDown(event.peerId);
      this.evaluateState();
    });
    // Adopted blocks may carry messages this router never saw.
    this.ledger.on("LEDGER_ADOPTED", () => {
      for (const block of this.ledger.blocks) {
        for (const message of block.payload.messages) {
          this.router.markSeen(message.id);
        }
      }
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * Attach to the transport and authority and start the timers.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.syncAbort = new AbortController();

    this.unsubscribers.push(
      this.transport.onReceive((data, fromPeer) => this.handleFrame(data, fromPeer)),
      this.transport.onLinkChange((change) => this.handleLinkChange(change))
    );

    if (this.authority) {
      const authority = this.authority;
      this.unsubscribers.push(
        authority.onMessage((message) => this.handleAuthorityMessage(message)),
        authority.onHeartbeat((at) => {
          this.runInBackground("authority heartbeat", () =>
            this.recordAuthorityHeartbeat(at)
          );
        })
      );
    }

    for (const peer of this.transport.getLinkedPeers()) {
      this.router.observePeer(peer);
    }
    this.evaluateState();

    if (this.timersEnabled) {
      this.timers.push(
        setInterval(() => this.checkHeartbeat(), this.tuning.heartbeatIntervalMs),
        setInterval(() => {
          this.sweepPeers();
          this.runInBackground("beacon", () => this.router.sendBeacons());
        }, this.tuning.beaconIntervalMs),
        setInterval(() => {
          this.runInBackground("outbox drain", () => this.drainOutbox());
        }, this.tuning.drainIntervalMs)
      );
      this.armHeartbeatDeadline();
    }

    this.logger.info("started", { state: this.state, peers: this.router.peerCount });
  }

  /**
   * Stop timers, detach listeners and abort in-flight syncs.
   * The transport stays open; its owner closes it.
   */
  stop(): void {
    if (!this.started) return;
    this.started = false;

    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    if (this.heartbeatDeadline) clearTimeout(this.heartbeatDeadline);
    this.heartbeatDeadline = null;
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];

    this.syncAbort.abort();
    this.peerSync.close();
    this.logger.info("stopped");
  }

  /**
   * Resolve once every background task (syncs, resyncs, drains) has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }

  // ─── Submission ─────────────────────────────────────────────────

  /**
   * Stamp, sign and record a message, then deliver it or queue it.
   * Outcome is reported as MESSAGE_DELIVERED or MESSAGE_QUEUED.
   */
  async submit(request: SubmitRequest): Promise<MessageId> {
    const stamp = this.clock.stamp();
    const unsigned = {
      id: toMessageId(toHex(randomBytes(16))),
      sender: this.nodeId,
      destination: request.destination ?? null,
      type: request.type,
      payload:
        typeof request.payload === "string"
          ? new TextEncoder().encode(request.payload)
          : new Uint8Array(request.payload),
      lamport: stamp.lamport,
      vector: stamp.vector,
      createdAt: this.now(),
    };
    const signature = await this.signer.sign(
      sealBytes(messageDigest(unsigned), this.nodeId, stamp.lamport)
    );
    const message: MeshMessage = Object.freeze({
      ...unsigned,
      ttl: this.router.initialTtl,
      route: Object.freeze([this.nodeId]),
      signature,
    });

    await this.ledger.append({ messages: [message] }, this.nodeId, {
      seal: { lamport: message.lamport, signature },
    });

    const attempt = await this.attemptDelivery(message);
    const now = this.now();
    if (attempt.delivered) {
      this.emitDelivered(message, attempt, 1);
    } else {
      const entry = this.outbox.enqueue(message, now);
      this.emit({
        type: "MESSAGE_QUEUED",
        messageId: message.id,
        attempts: entry.attempts,
        nextAttemptAt: entry.nextAttemptAt,
        expiresAt: entry.expiresAt,
        timestamp: now,
      });
    }

    return message.id;
  }

  /**
   * Retry every due outbox entry and drop expired ones.
   * Concurrent calls share one pass.
   */
  drainOutbox(now: UnixMillis = this.now()): Promise<DrainResult> {
    if (!this.draining) {
      this.draining = this.drain(now).finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  // ─── Authority ──────────────────────────────────────────────────

  /**
   * Note an authority heartbeat. An offline node that hears the authority
   * reconciles with it before returning to CENTRALIZED.
   */
  async recordAuthorityHeartbeat(at: UnixMillis = this.now()): Promise<void> {
    if (!this.authority) return;
    this.lastHeartbeat = at;
    this.armHeartbeatDeadline();

    if (this.state === "CENTRALIZED" || this.resyncing) {
      this.evaluateState();
      return;
    }
    await this.resync(this.authority);
  }

  /**
   * Re-evaluate the network state, including heartbeat expiry.
   */
  checkHeartbeat(): NetworkState {
    this.evaluateState();
    return this.state;
  }

  /**
   * Drop peers silent past the timeout.
   */
  sweepPeers(now: UnixMillis = this.now()): readonly NodeId[] {
    return this.router.sweep(now);
  }

  // ─── Queries ────────────────────────────────────────────────────

  getState(): NetworkState {
    return this.state;
  }

  isResyncing(): boolean {
    return this.resyncing;
  }

  getStatus(): NodeStatus {
    const stamp = this.clock.snapshot();
    return {
      nodeId: this.nodeId,
      state: this.state,
      resyncing: this.resyncing,
      lamport: stamp.lamport,
      vector: stamp.vector,
      peers: this.router.getPeers(),
      ledgerLength: this.ledger.length,
      queuedMessages: this.outbox.size,
      supersededBlocks: this.ledger.superseded.length,
      lastAuthorityHeartbeat: this.lastHeartbeat,
    };
  }

  // ─── Internal: delivery ─────────────────────────────────────────

  private async attemptDelivery(message: MeshMessage): Promise<DeliveryAttempt> {
    let viaAuthority = false;
    if (this.authority && usesAuthority(this.state, this.resyncing) && this.authority.isOnline()) {
      try {
        await this.authority.relay(message);
        viaAuthority = true;
      } catch (err) {
        this.logger.debug("authority relay failed", {
          messageId: message.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const flood = await this.router.broadcast(message);
    return {
      delivered: viaAuthority || flood.sentTo.length > 0,
      peers: flood.sentTo,
      viaAuthority,
    };
  }

  private async drain(now: UnixMillis): Promise<DrainResult> {
    let expired = this.expireEntries(now);

    let delivered = 0;
    let requeued = 0;
    for (const entry of this.outbox.due(now)) {
      const attempt = await this.attemptDelivery(entry.message);
      if (attempt.delivered) {
        this.outbox.remove(entry.message.id);
        this.emitDelivered(entry.message, attempt, entry.attempts + 1);
        delivered++;
        continue;
      }

      const next = this.outbox.reschedule(entry.message.id, now);
      if (next && !this.outbox.isExhausted(next)) {
        this.emit({
          type: "MESSAGE_QUEUED",
          messageId: next.message.id,
          attempts: next.attempts,
          nextAttemptAt: next.nextAttemptAt,
          expiresAt: next.expiresAt,
          timestamp: now,
        });
        requeued++;
      }
    }

    expired += this.expireEntries(now);

    if (delivered + requeued + expired > 0) {
      this.logger.debug("outbox drained", { delivered, requeued, expired });
    }
    return { delivered, requeued, expired };
  }

  private expireEntries(now: UnixMillis): number {
    const expired = this.outbox.expire(now);
    for (const entry of expired) {
      this.emit({
        type: "MESSAGE_EXPIRED",
        messageId: entry.message.id,
        attempts: entry.attempts,
        error: new MessageExpiredError(
          entry.message.id,
          entry.attempts,
          entry.expiresAt <= now ? "QUEUE_DEADLINE" : "ATTEMPTS_EXHAUSTED"
        ),
        timestamp: now,
      });
    }
    return expired.length;
  }

  private emitDelivered(message: MeshMessage, attempt: DeliveryAttempt, attempts: number): void {
    this.emit({
      type: "MESSAGE_DELIVERED",
      messageId: message.id,
      peers: attempt.peers,
      viaAuthority: attempt.viaAuthority,
      attempts,
      timestamp: this.now(),
    });
  }

  // ─── Internal: inbound ──────────────────────────────────────────

  private async handleFrame(data: Uint8Array, fromPeer: NodeId): Promise<void> {
    let frame: Frame;
    try {
      frame = decodeFrame(data);
    } catch (err) {
      if (!(err instanceof CodecError)) throw err;
      this.logger.debug("dropped undecodable frame", { peer: fromPeer, code: err.code });
      this.emit({
        type: "MESSAGE_REJECTED",
        nodeId: this.nodeId,
        messageId: null,
        fromPeer,
        reason: "DECODE_FAILED",
        timestamp: this.now(),
      });
      return;
    }

    this.router.observePeer(fromPeer);

    if (frame.kind === "MESSAGE") {
      await this.router.receive(frame.message, fromPeer);
    } else if (isSyncFrame(frame)) {
      await this.peerSync.handleFrame(frame, fromPeer);
    }
  }

  /**
   * Router processor: verify and record a flooded message.
   */
  private async processInbound(message: MeshMessage, fromPeer: NodeId): Promise<boolean> {
    if (!(await this.verifyMessage(message))) {
      this.emit({
        type: "MESSAGE_REJECTED",
        nodeId: this.nodeId,
        messageId: message.id,
        fromPeer,
        reason: "BAD_SIGNATURE",
        timestamp: this.now(),
      });
      return false;
    }
    await this.record(message, fromPeer);
    return true;
  }

  private async handleAuthorityMessage(message: MeshMessage): Promise<void> {
    if (!this.authority || message.sender === this.nodeId) return;
    if (this.router.hasSeen(message.id)) return;
    this.router.markSeen(message.id);

    if (!(await this.verifyMessage(message))) {
      this.emit({
        type: "MESSAGE_REJECTED",
        nodeId: this.nodeId,
        messageId: message.id,
        fromPeer: this.authority.authorityId,
        reason: "BAD_SIGNATURE",
        timestamp: this.now(),
      });
      return;
    }
    await this.record(message, this.authority.authorityId);
  }

  private verifyMessage(message: MeshMessage): Promise<boolean> {
    return this.signer.verify(
      message.sender,
      sealBytes(messageDigest(message), message.sender, message.lamport),
      message.signature
    );
  }

  private async record(message: MeshMessage, fromPeer: NodeId): Promise<void> {
    this.clock.observe(message.vector, message.lamport);

    if (!this.ledger.hasMessage(message.id) && !this.recording.has(message.id)) {
      this.recording.add(message.id);
      try {
        await this.ledger.append({ messages: [message] }, message.sender, {
          seal: { lamport: message.lamport, signature: message.signature },
        });
      } catch (err) {
        // An adopted chain got there first.
        if (!(err instanceof IntegrityError && err.code === "DUPLICATE_MESSAGE")) throw err;
      } finally {
        this.recording.delete(message.id);
      }
    }

    if (message.destination === null || message.destination === this.nodeId) {
      this.emit({
        type: "MESSAGE_RECEIVED",
        nodeId: this.nodeId,
        message,
        fromPeer,
        timestamp: this.now(),
      });
    }
  }

  // ─── Internal: links and state ──────────────────────────────────

  private async handleLinkChange(change: LinkChange): Promise<void> {
    if (!change.up) {
      this.router.dropPeer(change.peerId, "LINK_DOWN");
      return;
    }

    this.router.observePeer(change.peerId, change.at);
    await this.drainOutbox();

    // One side initiates: the lower node id.
    if (compareNodeIds(this.nodeId, change.peerId) < 0) {
      await this.track(this.syncWithPeer(change.peerId));
    }
  }

  private async syncWithPeer(peerId: NodeId): Promise<void> {
    try {
      await this.reconciler.reconcile(this.peerSync.session(peerId), {
        signal: this.syncAbort.signal,
      });
    } catch (err) {
      // Already surfaced as RECONCILIATION_FAILED; retried on next link-up.
      this.logger.info("peer sync did not complete", {
        peer: peerId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async resync(authority: IAuthority): Promise<void> {
    this.resyncing = true;
    this.emit({
      type: "RESYNC_STARTED",
      nodeId: this.nodeId,
      authorityId: authority.authorityId,
      timestamp: this.now(),
    });

    try {
      await this.reconciler.reconcile(authority, { signal: this.syncAbort.signal });
      this.resynced = true;
      this.evaluateState();
    } catch (err) {
      this.logger.warn("resync with authority failed", {
        authority: authority.authorityId,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      this.resynced = false;
      this.resyncing = false;
    }

    if (this.state === "CENTRALIZED") {
      await this.drainOutbox();
    }
  }

  private authorityReachable(now: UnixMillis): boolean {
    if (!this.authority || !this.authority.isOnline() || this.lastHeartbeat === null) {
      return false;
    }
    return now - this.lastHeartbeat < this.heartbeatWindow();
  }

  private heartbeatWindow(): number {
    return this.tuning.heartbeatIntervalMs * this.tuning.missedHeartbeatThreshold;
  }

  /**
   * Re-evaluate the moment the heartbeat window closes, between the
   * periodic checks.
   */
  private armHeartbeatDeadline(): void {
    if (this.heartbeatDeadline) clearTimeout(this.heartbeatDeadline);
    this.heartbeatDeadline = null;
    if (!this.started || !this.timersEnabled || this.lastHeartbeat === null) return;

    const delay = Math.max(0, this.lastHeartbeat + this.heartbeatWindow() - this.now());
    this.heartbeatDeadline = setTimeout(() => {
      this.heartbeatDeadline = null;
      this.checkHeartbeat();
    }, delay);
  }

  private evaluateState(): void {
    const now = this.now();
    const peerCount = this.router.peerCount;
    const next = nextNetworkState(this.state, {
      authorityReachable: this.authorityReachable(now),
      resynced: this.resynced,
      peerCount,
      previousPeerCount: this.previousPeerCount,
      minPeers: this.tuning.minPeers,
    });
    this.previousPeerCount = peerCount;

    if (next === this.state) return;

    const previousState = this.state;
    this.state = next;
    this.logger.info("network state changed", { from: previousState, to: next, peers: peerCount });
    this.emit({
      type: "NETWORK_STATE_CHANGED",
      nodeId: this.nodeId,
      previousState,
      currentState: next,
      timestamp: now,
    });
  }

  // ─── Internal: background work ──────────────────────────────────

  private track(task: Promise<void>): Promise<void> {
    this.background.add(task);
    return task.finally(() => {
      this.background.delete(task);
    });
  }

  private runInBackground(label: string, work: () => Promise<unknown>): void {
    const task = work().then(
      () => undefined,
      (err: unknown) => {
        this.logger.error(`${label} failed`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    );
    void this.track(task);
  }
}
