/**
 * @module transports/in-memory
 * @description In-process simulated radio network.
 *
 * Every node gets an endpoint implementing ITransport. Links are explicit
 * and symmetric: `connect(a, b)` brings a link up at both ends and
 * `disconnect(a, b)` takes it down. Frames cross only live links, always
 * asynchronously, and are dropped if the link goes down in flight.
 *
 * `settle()` waits until every frame and link change in flight (including
 * anything they triggered) has been handled, which makes multi-node
 * scenarios deterministic in tests.
 */

import type { ITransport } from "../interfaces/transport.js";
import {
  PeerUnreachableError,
  TransportError,
} from "../interfaces/transport.js";
import { compareNodeIds, toUnixMillis } from "../types/branded.js";
import type { NodeId, UnixMillis } from "../types/branded.js";
import type {
  LinkChange,
  LinkChangeCallback,
  TransportReceiveCallback,
} from "../types/transport.js";

export interface InMemoryNetworkOptions {
  /** Largest frame accepted, in bytes. Default 1 MiB. */
  readonly mtu?: number;
  readonly now?: () => UnixMillis;
}

/**
 * InMemoryNetwork: a set of endpoints and the links between them.
 *
 * @example
 * ```ts
 * const net = new InMemoryNetwork();
 * const a = net.createTransport(toNodeId("alpha"));
 * const b = net.createTransport(toNodeId("bravo"));
 * net.connect(a.localId, b.localId);
 * await a.transmit(b.localId, frame);
 * await net.settle();
 * ```
 */
export class InMemoryNetwork {
  private readonly endpoints = new Map<NodeId, InMemoryTransport>();
  private readonly links = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private failures: unknown[] = [];
  private delivered = 0;
  private dropped = 0;
  readonly mtu: number;
  private readonly now: () => UnixMillis;

  constructor(options: InMemoryNetworkOptions = {}) {
    this.mtu = options.mtu ?? 1024 * 1024;
    this.now = options.now ?? (() => toUnixMillis(Date.now()));
  }

  // ─── Topology ───────────────────────────────────────────────────

  createTransport(nodeId: NodeId): InMemoryTransport {
    if (this.endpoints.has(nodeId)) {
      throw new TransportError(`Endpoint ${nodeId} already exists`, "MEDIUM_UNAVAILABLE");
    }
    const transport = new InMemoryTransport(nodeId, this);
    this.endpoints.set(nodeId, transport);
    return transport;
  }

  /**
   * Bring up the link between `a` and `b`. No-op if already up.
   */
  connect(a: NodeId, b: NodeId): void {
    if (a === b) return;
    const key = linkKey(a, b);
    if (this.links.has(key)) return;
    if (!this.endpoints.has(a) || !this.endpoints.has(b)) {
      throw new TransportError(`Cannot link ${a} and ${b}: unknown endpoint`, "MEDIUM_UNAVAILABLE");
    }

    this.links.add(key);
    const at = this.now();
    this.notify(a, { peerId: b, up: true, at });
    this.notify(b, { peerId: a, up: true, at });
  }

  /**
   * Take down the link between `a` and `b`. No-op if already down.
   */
  disconnect(a: NodeId, b: NodeId): void {
    const key = linkKey(a, b);
    if (!this.links.delete(key)) return;

    const at = this.now();
    this.notify(a, { peerId: b, up: false, at });
    this.notify(b, { peerId: a, up: false, at });
  }

  /**
   * Cut every link between the two groups.
   */
  partition(groupA: readonly NodeId[], groupB: readonly NodeId[]): void {
    for (const a of groupA) {
      for (const b of groupB) {
        this.disconnect(a, b);
      }
    }
  }

  /**
   * Take down every link of `nodeId`.
   */
  isolate(nodeId: NodeId): void {
    for (const peer of this.linkedPeers(nodeId)) {
      this.disconnect(nodeId, peer);
    }
  }

  isLinked(a: NodeId, b: NodeId): boolean {
    return this.links.has(linkKey(a, b));
  }

  linkedPeers(nodeId: NodeId): NodeId[] {
    return [...this.endpoints.keys()]
      .filter((peer) => peer !== nodeId && this.isLinked(nodeId, peer))
      .sort(compareNodeIds);
  }

  // ─── Delivery ───────────────────────────────────────────────────

  /**
   * Wait until nothing is in flight.
   *
   * @throws {AggregateError} if any receive or link handler failed since
   * the last call.
   */
  async settle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
    if (this.failures.length > 0) {
      const errors = this.failures;
      this.failures = [];
      throw new AggregateError(errors, `${errors.length} handler(s) failed during delivery`);
    }
  }

  get stats(): { readonly delivered: number; readonly dropped: number; readonly inflight: number } {
    return { delivered: this.delivered, dropped: this.dropped, inflight: this.inflight.size };
  }

  /** @internal Called by endpoints. */
  send(from: NodeId, to: NodeId, data: Uint8Array): void {
    if (!this.isLinked(from, to)) {
      throw new PeerUnreachableError(to);
    }
    const copy = new Uint8Array(data);
    this.track(async () => {
      const target = this.endpoints.get(to);
      if (!target || !this.isLinked(from, to)) {
        this.dropped++;
        return;
      }
      this.delivered++;
      await target.dispatch(copy, from);
    });
  }

  /** @internal Called by endpoints on close. */
  detach(nodeId: NodeId): void {
    this.isolate(nodeId);
    this.endpoints.delete(nodeId);
  }

  private notify(nodeId: NodeId, change: LinkChange): void {
    const endpoint = this.endpoints.get(nodeId);
    if (!endpoint) return;
    this.track(() => endpoint.notifyLink(change));
  }

  private track(task: () => Promise<void>): void {
    const run = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        this.failures.push(err);
      })
      .finally(() => {
        this.inflight.delete(run);
      });
    this.inflight.add(run);
  }
}

/**
 * One node's endpoint on an InMemoryNetwork.
 */
export class InMemoryTransport implements ITransport {
  private readonly receiveListeners = new Set<TransportReceiveCallback>();
  private readonly linkListeners = new Set<LinkChangeCallback>();
  private closed = false;

  constructor(
    readonly localId: NodeId,
    private readonly network: InMemoryNetwork
  ) {}

  // ─── Commands ───────────────────────────────────────────────────

  async transmit(peerId: NodeId, data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new TransportError("Transport closed", "CLOSED");
    }
    if (data.length > this.network.mtu) {
      throw new TransportError(
        `Frame of ${data.length} bytes exceeds MTU ${this.network.mtu}`,
        "MTU_EXCEEDED"
      );
    }
    this.network.send(this.localId, peerId, data);
  }

  onReceive(callback: TransportReceiveCallback): () => void {
    this.receiveListeners.add(callback);
    return () => {
      this.receiveListeners.delete(callback);
    };
  }

  onLinkChange(callback: LinkChangeCallback): () => void {
    this.linkListeners.add(callback);
    return () => {
      this.linkListeners.delete(callback);
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.network.detach(this.localId);
  }

  // ─── Queries ────────────────────────────────────────────────────

  getLinkedPeers(): readonly NodeId[] {
    return this.closed ? [] : this.network.linkedPeers(this.localId);
  }

  getMTU(): number {
    return this.network.mtu;
  }

  // ─── Internal ───────────────────────────────────────────────────

  /** @internal */
  async dispatch(data: Uint8Array, fromPeer: NodeId): Promise<void> {
    for (const listener of [...this.receiveListeners]) {
      await listener(data, fromPeer);
    }
  }

  /** @internal */
  async notifyLink(change: LinkChange): Promise<void> {
    for (const listener of [...this.linkListeners]) {
      await listener(change);
    }
  }
}

function linkKey(a: NodeId, b: NodeId): string {
  return compareNodeIds(a, b) < 0 ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}
