/**
 * @module primitives/clock-service
 * @description Lamport and vector clocks for one node.
 *
 * The Lamport scalar drives the system-wide total order (lamport, node id).
 * The vector clock is carried alongside as causal context only; it is
 * never consulted for ordering.
 */

import { compareNodeIds, toLamport } from "../types/branded.js";
import type { LamportTime, NodeId } from "../types/branded.js";
import type {
  CausalRelation,
  ClockStamp,
  OrderedEvent,
  VectorClock,
} from "../types/clock.js";

/**
 * ClockService: logical time owned by a single node.
 *
 * @example
 * ```ts
 * const clock = new ClockService(toNodeId("alpha"));
 * clock.stamp();                      // { lamport: 1, vector: { alpha: 1 } }
 * clock.observe({ bravo: 4 }, 4);     // lamport 5, vector { alpha: 1, bravo: 4 }
 * ```
 */
export class ClockService {
  private lamport = 0;
  private vector: Record<string, number> = {};

  constructor(readonly nodeId: NodeId) {}

  /**
   * Local event: tick both clocks and return a snapshot.
   */
  stamp(): ClockStamp {
    this.lamport += 1;
    this.vector = {
      ...this.vector,
      [this.nodeId]: (this.vector[this.nodeId] ?? 0) + 1,
    };
    return this.snapshot();
  }

  /**
   * Receive event: merge an incoming stamp into local state.
   */
  observe(incomingVector: VectorClock, incomingLamport: LamportTime): ClockStamp {
    const merged = ClockService.merge(
      this.vector,
      toLamport(this.lamport),
      incomingVector,
      incomingLamport
    );
    this.lamport = merged.lamport;
    this.vector = { ...merged.vector };
    return this.snapshot();
  }

  /**
   * Raise the Lamport counter to at least `lamport` without an event.
   * Used after adopting a chain whose blocks carry later timestamps.
   */
  witness(lamport: LamportTime): void {
    if (lamport > this.lamport) {
      this.lamport = lamport;
    }
  }

  snapshot(): ClockStamp {
    return {
      lamport: toLamport(this.lamport),
      vector: Object.freeze({ ...this.vector }),
    };
  }

  get current(): LamportTime {
    return toLamport(this.lamport);
  }

  // ─── Pure Functions ─────────────────────────────────────────────

  /**
   * lamport' = max(local, incoming) + 1; vector'[k] = max over both inputs.
   */
  static merge(
    localVector: VectorClock,
    localLamport: LamportTime,
    incomingVector: VectorClock,
    incomingLamport: LamportTime
  ): ClockStamp {
    const vector: Record<string, number> = { ...localVector };
    for (const [node, count] of Object.entries(incomingVector)) {
      vector[node] = Math.max(vector[node] ?? 0, count);
    }
    return {
      lamport: toLamport(Math.max(localLamport, incomingLamport) + 1),
      vector: Object.freeze(vector),
    };
  }

  /**
   * Total order: Lamport ascending, then node id ascending.
   */
  static compareEvents(a: OrderedEvent, b: OrderedEvent): number {
    if (a.lamport !== b.lamport) {
      return a.lamport - b.lamport;
    }
    return compareNodeIds(a.nodeId, b.nodeId);
  }

  /**
   * Causal relation of `a` to `b`. Missing entries count as zero.
   */
  static compareVectors(a: VectorClock, b: VectorClock): CausalRelation {
    let aAhead = false;
    let bAhead = false;

    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) {
      const av = a[key] ?? 0;
      const bv = b[key] ?? 0;
      if (av > bv) aAhead = true;
      if (bv > av) bAhead = true;
    }

    if (aAhead && bAhead) return "CONCURRENT";
    if (aAhead) return "AFTER";
    if (bAhead) return "BEFORE";
    return "EQUAL";
  }
}
