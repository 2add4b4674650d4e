/**
 * @module interfaces
 * @description Public interface exports for the TacNet core.
 */

export * from "./event-emitter.js";
export * from "./transport.js";
export * from "./signer.js";
export * from "./ledger.js";
export * from "./outbox.js";
export * from "./reconciliation.js";
export * from "./authority.js";
