/**
 * @module tacnet-mesh
 * @description TacNet mesh core: authenticated, causally ordered messaging
 * and a tamper-evident ledger for field nodes that keep working when the
 * coordinating authority is out of reach.
 *
 * Exports the node agent, its primitives (clocks, ledger, router, outbox,
 * reconciliation), their interfaces, all type definitions, the event
 * system, the wire codec, the WebCrypto signer, the in-memory and
 * BroadcastChannel transports, and the coordinator.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Network Codec ──────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Crypto Backends ────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Configuration & Logging ────────────────────────────────────────
export { resolveTuning, nodeTuningSchema, ConfigError } from "./config.js";
export type { NodeTuning, NodeTuningInput } from "./config.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LogLevel, LogEntry, LogSink, LogContext } from "./utils/logger.js";

// ─── Orchestrators ──────────────────────────────────────────────────
export { TacNode } from "./node.js";
export type { TacNodeConfig, DrainResult } from "./node.js";
export { Coordinator, AuthorityLink } from "./coordinator.js";
export type { CoordinatorOptions } from "./coordinator.js";

// ─── Forwarder (optional: wires node events → audit + dashboard) ────
export { wire, AUDIT_EVENTS } from "./forwarder.js";
export type {
  AuditLike,
  DashboardLike,
  ForwarderConfig,
  ForwarderHandle,
} from "./forwarder.js";
