/**
 * @module interfaces/transport
 * @description ITransport: abstraction of the node-to-node link layer.
 *
 * A transport moves opaque frames between directly linked nodes and reports
 * link up/down. It never routes: anything beyond one hop is the mesh
 * router's flooding. Implementations must deliver asynchronously so a slow
 * peer never blocks the sender's handling of other peers.
 */

import type { NodeId } from "../types/branded.js";
import type {
  LinkChangeCallback,
  TransportReceiveCallback,
} from "../types/transport.js";

/**
 * Errors that may be thrown by ITransport operations.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "MEDIUM_UNAVAILABLE"
      | "MTU_EXCEEDED"
      | "PEER_UNREACHABLE"
      | "CLOSED"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * Transient failure to reach one peer. Drives retry/backoff; never
 * escalated unless the message's queue deadline passes.
 */
export class PeerUnreachableError extends TransportError {
  constructor(
    public readonly peerId: NodeId,
    message = `Peer ${peerId} is unreachable`
  ) {
    super(message, "PEER_UNREACHABLE");
    this.name = "PeerUnreachableError";
  }
}

/**
 * @interface ITransport
 * @description Point-to-point frame delivery between directly linked nodes.
 */
export interface ITransport {
  /** The node this transport endpoint belongs to. */
  readonly localId: NodeId;

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Sends one frame to a directly linked peer.
   * Resolves once the frame is handed to the medium, not when it is handled.
   *
   * @throws {PeerUnreachableError} if the peer is not currently linked.
   * @throws {TransportError} code=MTU_EXCEEDED if the frame is too large.
   * @throws {TransportError} code=CLOSED after close().
   */
  transmit(peerId: NodeId, data: Uint8Array): Promise<void>;

  /**
   * @command
   * @description Registers a callback for complete inbound frames.
   * @returns Unsubscribe function.
   */
  onReceive(callback: TransportReceiveCallback): () => void;

  /**
   * @command
   * @description Registers a callback for link up/down changes.
   * @returns Unsubscribe function.
   */
  onLinkChange(callback: LinkChangeCallback): () => void;

  /**
   * @command
   * @description Releases the medium. Further transmits throw CLOSED.
   */
  close(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Peers the medium currently reports as directly linked.
   */
  getLinkedPeers(): readonly NodeId[];

  /**
   * @query
   * @description Maximum frame size in bytes.
   */
  getMTU(): number;
}
