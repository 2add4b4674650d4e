/**
 * @module forwarder
 * @description Wires node events to an audit trail and/or an operator dashboard.
 *
 * Without the forwarder, every consumer writes this:
 *   node.on("LEDGER_APPENDED", e => audit.record("LEDGER_APPENDED", e));
 *   node.on("RECONCILIATION_FAILED", e => audit.record("RECONCILIATION_FAILED", e));
 *   // ... one line per event
 *
 * With the forwarder:
 *   const handle = wire(node, { audit, dashboard });
 *
 * Both collaborators are optional and only described structurally, so this
 * module does not depend on any particular audit store or UI.
 */

import type { ITacNetEmitter } from "./interfaces/event-emitter.js";
import type { NodeId } from "./types/branded.js";
import type { TacNetEvent, TacNetEventType } from "./types/events.js";
import type { MeshMessage } from "./types/message.js";
import type { NetworkState } from "./types/network.js";

// ─── Types ──────────────────────────────────────────────────────────

/**
 * Minimal audit trail: receives every forwarded event verbatim.
 */
export interface AuditLike {
  record(eventType: TacNetEventType, event: TacNetEvent): unknown;
}

/**
 * Minimal operator dashboard.
 */
export interface DashboardLike {
  stateChanged(nodeId: NodeId, current: NetworkState, previous: NetworkState): void;
  peerCountChanged(nodeId: NodeId, delta: 1 | -1): void;
  /** An ALERT addressed to (or broadcast to) the node. */
  alert(message: MeshMessage): void;
  /** A reconciliation that needs an operator. */
  operatorAttention(nodeId: NodeId, peerId: NodeId, reason: string): void;
}

/**
 * Events forwarded to the audit trail.
 */
export const AUDIT_EVENTS = [
  "NETWORK_STATE_CHANGED",
  "RESYNC_STARTED",
  "PEER_DISCOVERED",
  "PEER_LOST",
  "MESSAGE_DELIVERED",
  "MESSAGE_EXPIRED",
  "MESSAGE_REJECTED",
  "LEDGER_APPENDED",
  "LEDGER_ADOPTED",
  "RECONCILIATION_COMPLETED",
  "RECONCILIATION_FAILED",
] as const satisfies readonly TacNetEventType[];

export interface ForwarderConfig {
  /** Audit trail, or false to skip */
  audit?: AuditLike | false;
  /** Dashboard, or false to skip */
  dashboard?: DashboardLike | false;
  /** Forward ALERT messages to the dashboard. Default true. */
  surfaceAlerts?: boolean;
}

/**
 * Active forwarding: used for cleanup.
 */
export interface ForwarderHandle {
  /** Number of subscriptions held on the source */
  readonly subscriptions: number;
  /** Tear down all forwarding */
  teardown(): void;
  readonly audit: AuditLike | null;
  readonly dashboard: DashboardLike | null;
}

// ─── Forwarder ──────────────────────────────────────────────────────

/**
 * Wire a node (or any TacNet emitter) to an audit trail and/or dashboard.
 *
 * @example
 * ```ts
 * const node = new TacNode({ ... });
 * const handle = wire(node, { audit: auditStore, dashboard: hud });
 *
 * // node events → audit.record()
 * // NETWORK_STATE_CHANGED → dashboard.stateChanged()
 * // ALERT messages → dashboard.alert()
 *
 * handle.teardown();
 * ```
 */
export function wire(source: ITacNetEmitter, config: ForwarderConfig = {}): ForwarderHandle {
  const audit = config.audit === false ? null : config.audit ?? null;
  const dashboard = config.dashboard === false ? null : config.dashboard ?? null;
  const surfaceAlerts = config.surfaceAlerts !== false;

  const unsubscribers: Array<() => void> = [];

  // ── Audit forwarding ────────────────────────────────────────────

  if (audit) {
    for (const eventType of AUDIT_EVENTS) {
      unsubscribers.push(
        source.on(eventType, (event) => {
          audit.record(eventType, event);
        })
      );
    }
  }

  // ── Dashboard forwarding ────────────────────────────────────────

  if (dashboard) {
    unsubscribers.push(
      source.on("NETWORK_STATE_CHANGED", (e) => {
        dashboard.stateChanged(e.nodeId, e.currentState, e.previousState);
      }),
      source.on("PEER_DISCOVERED", (e) => {
        dashboard.peerCountChanged(e.nodeId, 1);
      }),
      source.on("PEER_LOST", (e) => {
        dashboard.peerCountChanged(e.nodeId, -1);
      }),
      source.on("RECONCILIATION_FAILED", (e) => {
        // ABORTED retries by itself.
        if (e.reason !== "ABORTED") {
          dashboard.operatorAttention(e.nodeId, e.peerId, e.reason);
        }
      })
    );

    if (surfaceAlerts) {
      unsubscribers.push(
        source.on("MESSAGE_RECEIVED", (e) => {
          if (e.message.type === "ALERT") {
            dashboard.alert(e.message);
          }
        })
      );
    }
  }

  // ── Handle ──────────────────────────────────────────────────────

  return {
    subscriptions: unsubscribers.length,
    audit,
    dashboard,
    teardown() {
      for (const unsubscribe of unsubscribers.splice(0)) {
        unsubscribe();
      }
    },
  };
}
