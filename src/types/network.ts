/**
 * @module types/network
 * @description Network-state machine and peer adjacency types.
 *
 * | State        | Authority   | Peers                      |
 * |--------------|-------------|----------------------------|
 * | CENTRALIZED  | reachable   | any                        |
 * | P2P_FALLBACK | unreachable | at least one               |
 * | DEGRADED     | unreachable | fewer than the minimum     |
 * | ISOLATED     | unreachable | none                       |
 */

import type { LamportTime, NodeId, UnixMillis } from "./branded.js";
import type { VectorClock } from "./clock.js";

export type NetworkState =
  | "CENTRALIZED"
  | "P2P_FALLBACK"
  | "DEGRADED"
  | "ISOLATED";

/**
 * Inputs evaluated on every state-machine step.
 */
export interface NetworkInputs {
  readonly authorityReachable: boolean;
  /** True once a reconciliation with the authority has completed. */
  readonly resynced: boolean;
  readonly peerCount: number;
  readonly previousPeerCount: number;
  readonly minPeers: number;
}

/**
 * One node's directed observation "I can currently reach this peer".
 */
export interface PeerLink {
  readonly peerId: NodeId;
  readonly firstSeen: UnixMillis;
  readonly lastSeen: UnixMillis;
  /** Link quality in [0, 1]; lowered by failed sends, raised by traffic. */
  readonly quality: number;
  readonly consecutiveFailures: number;
}

/**
 * Read-only summary of a node for dashboards.
 */
export interface NodeStatus {
  readonly nodeId: NodeId;
  readonly state: NetworkState;
  readonly resyncing: boolean;
  readonly lamport: LamportTime;
  readonly vector: VectorClock;
  readonly peers: readonly PeerLink[];
  readonly ledgerLength: number;
  readonly queuedMessages: number;
  readonly supersededBlocks: number;
  readonly lastAuthorityHeartbeat: UnixMillis | null;
}
