/**
 * @module primitives
 * @description Core building blocks of a TacNet node: clocks, ledger,
 * router, outbox, state machine and reconciliation.
 */

export { TacNetEmitter } from "./base-emitter.js";
export { SerialLock } from "./serial-lock.js";
export { ClockService } from "./clock-service.js";
export {
  Ledger,
  DEFAULT_NETWORK_ID,
  genesisBlock,
  linkBlock,
  relinkChain,
  diffChains,
  sharedPrefixLength,
  sealKey,
} from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";
export { MeshRouter } from "./mesh-router.js";
export type {
  MeshRouterOptions,
  MessageProcessor,
  FloodResult,
  ReceiveOutcome,
} from "./mesh-router.js";
export { Outbox, backoffDelay } from "./outbox.js";
export type { OutboxOptions } from "./outbox.js";
export { nextNetworkState, usesAuthority } from "./network-state.js";
export { Reconciler, compareBlocks, mergeChains } from "./reconciler.js";
export type { ReconcilerOptions, ReconcileOptions } from "./reconciler.js";
export { PeerSync, isSyncFrame } from "./peer-sync.js";
export type { SyncFrame, SyncHandler, PeerSyncOptions } from "./peer-sync.js";
