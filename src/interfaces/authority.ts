/**
 * @module interfaces/authority
 * @description IAuthority: a node's link to the coordinating authority.
 *
 * While CENTRALIZED a node relays traffic through the authority and hears
 * its heartbeats. The authority is also a reconciliation peer: a node that
 * hears it again after running offline must reconcile before it trusts
 * the authority path again.
 */

import type { NodeId, UnixMillis } from "../types/branded.js";
import type { MeshMessage } from "../types/message.js";
import type { IReconciliationPeer } from "./reconciliation.js";

export type AuthorityMessageCallback = (message: MeshMessage) => void | Promise<void>;
export type AuthorityHeartbeatCallback = (at: UnixMillis) => void;

/**
 * @interface IAuthority
 */
export interface IAuthority extends IReconciliationPeer {
  readonly authorityId: NodeId;

  /**
   * @description Hands a message to the authority for relay to every other
   * attached node.
   * @throws {PeerUnreachableError} when the authority link is down.
   */
  relay(message: MeshMessage): Promise<void>;

  /** Messages relayed by the authority from other nodes. */
  onMessage(callback: AuthorityMessageCallback): () => void;

  /** Authority heartbeats. */
  onHeartbeat(callback: AuthorityHeartbeatCallback): () => void;

  /** @query Whether the link currently carries traffic. */
  isOnline(): boolean;
}
