/**
 * @module types/transport
 * @description Transport abstraction for node-to-node links.
 *
 * The core is transport-agnostic: a persistent socket, a datagram radio
 * link and the in-process simulated channel all implement ITransport.
 * Frames are addressed to a single directly reachable peer; multi-hop
 * delivery is the router's job, not the transport's.
 */

import type { NodeId, UnixMillis } from "./branded.js";

/**
 * Change in direct reachability of a peer.
 */
export interface LinkChange {
  readonly peerId: NodeId;
  readonly up: boolean;
  readonly at: UnixMillis;
}

/**
 * Callback for receiving a complete frame from a directly linked peer.
 * May return a promise; transports await it before counting the frame
 * as handled.
 */
export type TransportReceiveCallback = (
  data: Uint8Array,
  fromPeer: NodeId
) => void | Promise<void>;

/**
 * Callback for link up/down notifications. Like receive callbacks, a
 * returned promise is awaited before the change counts as handled.
 */
export type LinkChangeCallback = (change: LinkChange) => void | Promise<void>;
