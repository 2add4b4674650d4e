/**
 * @module primitives/network-state
 * @description Pure transition function of the per-node network-state machine.
 *
 * ```
 *            authority lost, peers >= 1
 * CENTRALIZED ─────────────────────────► P2P_FALLBACK ◄──┐
 *     ▲                                     │    ▲       │ peers back
 *     │ resynced with authority             │    │       │ to minimum
 *     │                                     ▼    │       │
 *     └──────────────── ISOLATED ◄──── DEGRADED ─┘───────┘
 *                     (no peers)   (peers < minimum)
 * ```
 */

import type { NetworkInputs, NetworkState } from "../types/network.js";

/**
 * Next state given the current state and one observation of the world.
 *
 * - authority reachable: CENTRALIZED, but an offline node returns only
 *   once it has resynced; until then it stays where it is
 * - no authority and no peers: ISOLATED
 * - no authority, peers >= minPeers: P2P_FALLBACK
 * - no authority, 0 < peers < minPeers: DEGRADED, except a node leaving
 *   CENTRALIZED falls back first and a P2P_FALLBACK node degrades only
 *   when its peer count actually dropped
 */
export function nextNetworkState(
  current: NetworkState,
  inputs: NetworkInputs
): NetworkState {
  if (inputs.authorityReachable) {
    if (current === "CENTRALIZED" || inputs.resynced) {
      return "CENTRALIZED";
    }
    return current;
  }

  if (inputs.peerCount === 0) {
    return "ISOLATED";
  }

  if (inputs.peerCount >= inputs.minPeers) {
    return "P2P_FALLBACK";
  }

  switch (current) {
    case "CENTRALIZED":
      return "P2P_FALLBACK";
    case "P2P_FALLBACK":
      return inputs.peerCount < inputs.previousPeerCount
        ? "DEGRADED"
        : "P2P_FALLBACK";
    case "ISOLATED":
    case "DEGRADED":
      return "DEGRADED";
  }
}

/**
 * Whether traffic may use the authority path in this state.
 */
export function usesAuthority(state: NetworkState, resyncing: boolean): boolean {
  return state === "CENTRALIZED" && !resyncing;
}
