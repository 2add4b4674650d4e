/**
 * @module types/clock
 * @description Logical clock types: Lamport scalars and per-node vector clocks.
 */

import type { LamportTime, NodeId } from "./branded.js";

/**
 * Per-node counter map. Holds entries only for nodes the owner has observed.
 */
export type VectorClock = Readonly<Record<string, number>>;

/**
 * Snapshot produced by stamping a local event.
 */
export interface ClockStamp {
  readonly lamport: LamportTime;
  readonly vector: VectorClock;
}

/**
 * Causal relation between two vector clocks.
 * EQUAL and CONCURRENT are distinct: concurrent events saw neither
 * each other nor a common successor.
 */
export type CausalRelation = "BEFORE" | "AFTER" | "EQUAL" | "CONCURRENT";

/**
 * An event position in the system-wide total order.
 */
export interface OrderedEvent {
  readonly lamport: LamportTime;
  readonly nodeId: NodeId;
}
