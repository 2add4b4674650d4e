/**
 * @module types/events
 * @description Event catalog for the TacNet reactive system.
 *
 * Every component reports through typed, timestamped, read-only event
 * records. UI and monitoring collaborators subscribe to these; they never
 * reach into node internals.
 */

import type { MessageId, NodeId, UnixMillis } from "./branded.js";
import type { LedgerBlock } from "./ledger.js";
import type { MeshMessage } from "./message.js";
import type { NetworkState } from "./network.js";
import type { ReconciliationReport } from "./sync.js";

// ─── Network State Events ───────────────────────────────────────────

/** Emitted on every top-level state transition. */
export interface NetworkStateChangedEvent {
  readonly type: "NETWORK_STATE_CHANGED";
  readonly nodeId: NodeId;
  readonly previousState: NetworkState;
  readonly currentState: NetworkState;
  readonly timestamp: UnixMillis;
}

/** Emitted when the authority is heard again while offline. */
export interface ResyncStartedEvent {
  readonly type: "RESYNC_STARTED";
  readonly nodeId: NodeId;
  readonly authorityId: NodeId;
  readonly timestamp: UnixMillis;
}

// ─── Peer Events ────────────────────────────────────────────────────

/** Emitted on first contact with a peer, or regained contact after loss. */
export interface PeerDiscoveredEvent {
  readonly type: "PEER_DISCOVERED";
  readonly nodeId: NodeId;
  readonly peerId: NodeId;
  readonly timestamp: UnixMillis;
}

/** Emitted when a peer goes silent past the timeout or its link drops. */
export interface PeerLostEvent {
  readonly type: "PEER_LOST";
  readonly nodeId: NodeId;
  readonly peerId: NodeId;
  readonly lastSeen: UnixMillis;
  readonly reason: "TIMEOUT" | "LINK_DOWN";
  readonly timestamp: UnixMillis;
}

// ─── Outbound Message Events ────────────────────────────────────────

/** Emitted when a submitted message could not be sent and was queued. */
export interface MessageQueuedEvent {
  readonly type: "MESSAGE_QUEUED";
  readonly messageId: MessageId;
  readonly attempts: number;
  readonly nextAttemptAt: UnixMillis;
  readonly expiresAt: UnixMillis;
  readonly timestamp: UnixMillis;
}

/** Emitted when a message was handed to at least one peer or the authority. */
export interface MessageDeliveredEvent {
  readonly type: "MESSAGE_DELIVERED";
  readonly messageId: MessageId;
  readonly peers: readonly NodeId[];
  readonly viaAuthority: boolean;
  readonly attempts: number;
  readonly timestamp: UnixMillis;
}

/** Emitted when a queued message passed its deadline undelivered. */
export interface MessageExpiredEvent {
  readonly type: "MESSAGE_EXPIRED";
  readonly messageId: MessageId;
  readonly attempts: number;
  readonly error: Error;
  readonly timestamp: UnixMillis;
}

// ─── Inbound Message Events ─────────────────────────────────────────

/** Emitted when a message addressed to this node (or broadcast) arrives. */
export interface MessageReceivedEvent {
  readonly type: "MESSAGE_RECEIVED";
  readonly nodeId: NodeId;
  readonly message: MeshMessage;
  readonly fromPeer: NodeId;
  readonly timestamp: UnixMillis;
}

/** Emitted when an inbound frame or message fails decoding or verification. */
export interface MessageRejectedEvent {
  readonly type: "MESSAGE_REJECTED";
  readonly nodeId: NodeId;
  readonly messageId: MessageId | null;
  readonly fromPeer: NodeId;
  readonly reason: "DECODE_FAILED" | "BAD_SIGNATURE" | "MALFORMED_ROUTE";
  readonly timestamp: UnixMillis;
}

// ─── Ledger Events ──────────────────────────────────────────────────

/** Emitted after every successful append. */
export interface LedgerAppendedEvent {
  readonly type: "LEDGER_APPENDED";
  readonly owner: NodeId;
  readonly block: LedgerBlock;
  readonly timestamp: UnixMillis;
}

/** Emitted when a canonical chain replaces the local chain. */
export interface LedgerAdoptedEvent {
  readonly type: "LEDGER_ADOPTED";
  readonly owner: NodeId;
  readonly forkIndex: number;
  readonly length: number;
  readonly superseded: number;
  readonly timestamp: UnixMillis;
}

// ─── Reconciliation Events ──────────────────────────────────────────

/** Emitted with the conflict report of a completed reconciliation. */
export interface ReconciliationCompletedEvent {
  readonly type: "RECONCILIATION_COMPLETED";
  readonly nodeId: NodeId;
  readonly report: ReconciliationReport;
  readonly timestamp: UnixMillis;
}

/**
 * Emitted when a reconciliation fails. DIVERGENT and INTEGRITY need an
 * operator; ABORTED is retried on the next contact.
 */
export interface ReconciliationFailedEvent {
  readonly type: "RECONCILIATION_FAILED";
  readonly nodeId: NodeId;
  readonly peerId: NodeId;
  readonly reason: "DIVERGENT" | "INTEGRITY" | "ABORTED";
  readonly error: Error;
  readonly timestamp: UnixMillis;
}

// ─── Event Map ──────────────────────────────────────────────────────

/**
 * Maps event type strings to their payload interfaces.
 * Used by the typed emitter for compile-time safety.
 */
export interface TacNetEventMap {
  NETWORK_STATE_CHANGED: NetworkStateChangedEvent;
  RESYNC_STARTED: ResyncStartedEvent;
  PEER_DISCOVERED: PeerDiscoveredEvent;
  PEER_LOST: PeerLostEvent;
  MESSAGE_QUEUED: MessageQueuedEvent;
  MESSAGE_DELIVERED: MessageDeliveredEvent;
  MESSAGE_EXPIRED: MessageExpiredEvent;
  MESSAGE_RECEIVED: MessageReceivedEvent;
  MESSAGE_REJECTED: MessageRejectedEvent;
  LEDGER_APPENDED: LedgerAppendedEvent;
  LEDGER_ADOPTED: LedgerAdoptedEvent;
  RECONCILIATION_COMPLETED: ReconciliationCompletedEvent;
  RECONCILIATION_FAILED: ReconciliationFailedEvent;
}

/** All valid event type strings. */
export type TacNetEventType = keyof TacNetEventMap;

/** Union of all event payloads. */
export type TacNetEvent = TacNetEventMap[TacNetEventType];
