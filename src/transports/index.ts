/**
 * @module transports
 * @description Transport implementations for the TacNet core.
 */

export { InMemoryNetwork, InMemoryTransport } from "./in-memory.js";
export type { InMemoryNetworkOptions } from "./in-memory.js";
export { BroadcastChannelTransport } from "./broadcast-channel.js";
export type { BroadcastChannelTransportOptions } from "./broadcast-channel.js";
