/**
 * @module interfaces/signer
 * @description ISigner: the opaque signing capability.
 *
 * The core never implements cryptographic primitives. It asks a signer to
 * sign bytes as the local node and to verify bytes claimed by another node.
 * How keys are generated, stored or distributed is the signer's business.
 */

import type { NodeId, Signature } from "../types/branded.js";

/**
 * Errors that may be thrown by ISigner operations.
 */
export class SignerError extends Error {
  constructor(
    message: string,
    public readonly code: "NOT_PROVISIONED" | "UNKNOWN_SIGNER" | "SIGNING_FAILED"
  ) {
    super(message);
    this.name = "SignerError";
  }
}

/**
 * @interface ISigner
 */
export interface ISigner {
  /** The node whose key this signer signs with. */
  readonly nodeId: NodeId;

  /**
   * @description Signs `data` as `nodeId`.
   * @throws {SignerError} code=NOT_PROVISIONED if no key is available.
   */
  sign(data: Uint8Array): Promise<Signature>;

  /**
   * @description Verifies that `signature` over `data` was made by `signer`.
   * Returns false (never throws) for unknown signers or bad signatures.
   */
  verify(signer: NodeId, data: Uint8Array, signature: Uint8Array): Promise<boolean>;
}
