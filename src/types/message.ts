/**
 * @module types/message
 * @description Application message model and its routing metadata.
 *
 * | Type    | Priority | Typical use                       |
 * |---------|----------|-----------------------------------|
 * | ALERT   | 0        | Contact reports, emergencies      |
 * | COMMAND | 1        | Orders from the chain of command  |
 * | STATUS  | 2        | Position and readiness reports    |
 * | CHAT    | 3        | Free-form traffic                 |
 */

import type {
  LamportTime,
  MessageId,
  NodeId,
  Signature,
  UnixMillis,
} from "./branded.js";
import type { VectorClock } from "./clock.js";

// ─── Message Type ───────────────────────────────────────────────────

export const MESSAGE_TYPES = ["ALERT", "COMMAND", "STATUS", "CHAT"] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/**
 * Queue priority rank per message type (lower drains first).
 */
export function messagePriority(type: MessageType): number {
  switch (type) {
    case "ALERT":
      return 0;
    case "COMMAND":
      return 1;
    case "STATUS":
      return 2;
    case "CHAT":
      return 3;
  }
}

// ─── Message ────────────────────────────────────────────────────────

/**
 * A message as it travels through the mesh.
 *
 * Everything except `ttl` and `route` is fixed at creation and covered by
 * the sender's signature. Relays rewrite `ttl` and `route` on a copy; the
 * original object is never mutated.
 */
export interface MeshMessage {
  readonly id: MessageId;
  readonly sender: NodeId;
  /** Target node, or null for a broadcast. */
  readonly destination: NodeId | null;
  readonly type: MessageType;
  readonly payload: Uint8Array;
  readonly lamport: LamportTime;
  readonly vector: VectorClock;
  /** Hops remaining. */
  readonly ttl: number;
  /** Node ids traversed so far, starting with the sender. */
  readonly route: readonly NodeId[];
  /** Wall-clock creation time, for audit display only. */
  readonly createdAt: UnixMillis;
  readonly signature: Signature;
}

/**
 * A request submitted by the application layer.
 */
export interface SubmitRequest {
  readonly type: MessageType;
  readonly payload: Uint8Array | string;
  /** Omit (or pass null) to broadcast. */
  readonly destination?: NodeId | null;
}

/**
 * Final or intermediate outcome of a submitted message.
 */
export type DeliveryOutcome = "DELIVERED" | "QUEUED" | "EXPIRED";
