/**
 * @module transports/broadcast-channel
 * @description ITransport over the BroadcastChannel API.
 *
 * Every endpoint on the same channel name hears every post, so links are
 * formed by a presence handshake: an endpoint announces itself on open,
 * answers the first announcement it hears from each peer, and says goodbye
 * on close. Frames carry sender and recipient ids; endpoints ignore frames
 * addressed to someone else.
 *
 * Works between browser tabs of one origin and between endpoints in one
 * Node.js process (BroadcastChannel is global in Node.js 18+).
 */

import { z } from "zod";
import type { ITransport } from "../interfaces/transport.js";
import {
  PeerUnreachableError,
  TransportError,
} from "../interfaces/transport.js";
import { compareNodeIds, toNodeId, toUnixMillis } from "../types/branded.js";
import type { NodeId, UnixMillis } from "../types/branded.js";
import type {
  LinkChange,
  LinkChangeCallback,
  TransportReceiveCallback,
} from "../types/transport.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

const envelopeSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("hello"),
    from: z.string().min(1),
    to: z.string().min(1).nullable(),
  }),
  z.object({ kind: z.literal("bye"), from: z.string().min(1) }),
  z.object({
    kind: z.literal("frame"),
    from: z.string().min(1),
    to: z.string().min(1),
    data: z.instanceof(Uint8Array),
  }),
]);

type Envelope = z.infer<typeof envelopeSchema>;

export interface BroadcastChannelTransportOptions {
  /** Default "tacnet-mesh". */
  readonly channelName?: string;
  /** Default 65535. */
  readonly mtu?: number;
  readonly logger?: Logger;
  readonly now?: () => UnixMillis;
}

/**
 * BroadcastChannelTransport: zero-infrastructure links between endpoints
 * sharing a channel name.
 *
 * @example
 * ```ts
 * const transport = new BroadcastChannelTransport(toNodeId("alpha"));
 * transport.onLinkChange((change) => console.log(change.peerId, change.up));
 * transport.open();
 * ```
 */
export class BroadcastChannelTransport implements ITransport {
  private channel: BroadcastChannel | null = null;
  private readonly channelName: string;
  private readonly mtu: number;
  private readonly logger: Logger;
  private readonly now: () => UnixMillis;
  private readonly peers = new Set<NodeId>();
  private readonly receiveListeners = new Set<TransportReceiveCallback>();
  private readonly linkListeners = new Set<LinkChangeCallback>();

  constructor(
    readonly localId: NodeId,
    options: BroadcastChannelTransportOptions = {}
  ) {
    this.channelName = options.channelName ?? "tacnet-mesh";
    this.mtu = options.mtu ?? 65535;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => toUnixMillis(Date.now()));
  }

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Join the channel and announce presence.
   */
  open(): void {
    if (this.channel) return;

    if (typeof BroadcastChannel === "undefined") {
      throw new TransportError(
        "BroadcastChannel is not available in this environment",
        "MEDIUM_UNAVAILABLE"
      );
    }

    this.channel = new BroadcastChannel(this.channelName);
    this.channel.onmessage = (event: MessageEvent) => {
      this.handleEnvelope(event.data);
    };
    this.post({ kind: "hello", from: this.localId, to: null });
  }

  async transmit(peerId: NodeId, data: Uint8Array): Promise<void> {
    if (!this.channel) {
      throw new TransportError("Transport not open", "CLOSED");
    }
    if (data.length > this.mtu) {
      throw new TransportError(
        `Frame of ${data.length} bytes exceeds MTU ${this.mtu}`,
        "MTU_EXCEEDED"
      );
    }
    if (!this.peers.has(peerId)) {
      throw new PeerUnreachableError(peerId);
    }
    this.post({ kind: "frame", from: this.localId, to: peerId, data });
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

  /**
   * Say goodbye and leave the channel.
   */
  close(): void {
    if (!this.channel) return;

    this.post({ kind: "bye", from: this.localId });
    this.channel.close();
    this.channel = null;

    for (const peer of [...this.peers]) {
      this.linkDown(peer);
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  getLinkedPeers(): readonly NodeId[] {
    return [...this.peers].sort(compareNodeIds);
  }

  getMTU(): number {
    return this.mtu;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private post(envelope: Envelope): void {
    this.channel?.postMessage(envelope);
  }

  private handleEnvelope(raw: unknown): void {
    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug("ignored malformed envelope", {
        issue: parsed.error.issues[0]?.message,
      });
      return;
    }

    const envelope = parsed.data;
    const from = toNodeId(envelope.from);
    if (from === this.localId) return;

    switch (envelope.kind) {
      case "hello":
        if (envelope.to !== null && envelope.to !== this.localId) return;
        if (!this.peers.has(from)) {
          this.peers.add(from);
          // Answer an open announcement so the newcomer learns of us.
          if (envelope.to === null) {
            this.post({ kind: "hello", from: this.localId, to: from });
          }
          this.notify({ peerId: from, up: true, at: this.now() });
        }
        return;

      case "bye":
        this.linkDown(from);
        return;

      case "frame":
        if (envelope.to !== this.localId || !this.peers.has(from)) return;
        for (const listener of [...this.receiveListeners]) {
          this.settle(listener(new Uint8Array(envelope.data), from));
        }
        return;
    }
  }

  private linkDown(peerId: NodeId): void {
    if (!this.peers.delete(peerId)) return;
    this.notify({ peerId, up: false, at: this.now() });
  }

  private notify(change: LinkChange): void {
    for (const listener of [...this.linkListeners]) {
      this.settle(listener(change));
    }
  }

  private settle(result: void | Promise<void>): void {
    if (result instanceof Promise) {
      result.catch((err: unknown) => {
        this.logger.error("transport handler failed", {
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }
  }
}
