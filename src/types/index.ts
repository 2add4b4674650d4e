/**
 * @module types
 * @description Public type exports for the TacNet core.
 */

export * from "./branded.js";
export * from "./clock.js";
export * from "./message.js";
export * from "./ledger.js";
export * from "./network.js";
export * from "./sync.js";
export * from "./transport.js";
export * from "./events.js";
