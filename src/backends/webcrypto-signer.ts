/**
 * @module backends/webcrypto-signer
 * @description WebCrypto implementation of ISigner.
 *
 * Uses SubtleCrypto ECDSA P-256 with SHA-256. Private keys are generated
 * non-extractable; public keys are published to a shared KeyDirectory in
 * SEC1 compressed form so any node can verify any other.
 */

import type { ISigner } from "../interfaces/signer.js";
import { SignerError } from "../interfaces/signer.js";
import type {
  CompressedPublicKey,
  NodeId,
  Signature,
} from "../types/branded.js";
import {
  buf,
  exportCompressedPublicKey,
  importVerifyKey,
  normalizeSignature,
  requireSubtle,
} from "./crypto-utils.js";

const ECDSA_PARAMS = { name: "ECDSA", hash: "SHA-256" } as const;

/**
 * Registry of node public keys. How keys reach it (provisioning, a roster
 * pushed by the authority) is outside the core.
 */
export class KeyDirectory {
  private readonly keys = new Map<NodeId, CompressedPublicKey>();
  private readonly imported = new Map<NodeId, Promise<CryptoKey>>();

  register(nodeId: NodeId, publicKey: CompressedPublicKey): void {
    const existing = this.keys.get(nodeId);
    if (existing && !sameBytes(existing, publicKey)) {
      this.imported.delete(nodeId);
    }
    this.keys.set(nodeId, publicKey);
  }

  has(nodeId: NodeId): boolean {
    return this.keys.has(nodeId);
  }

  getPublicKey(nodeId: NodeId): CompressedPublicKey | null {
    return this.keys.get(nodeId) ?? null;
  }

  /**
   * Imported verification key for a node, or null if unknown.
   */
  async getVerifyKey(nodeId: NodeId): Promise<CryptoKey | null> {
    const publicKey = this.keys.get(nodeId);
    if (!publicKey) return null;

    let pending = this.imported.get(nodeId);
    if (!pending) {
      pending = importVerifyKey(publicKey);
      this.imported.set(nodeId, pending);
    }
    return pending;
  }
}

/**
 * WebCryptoSigner: software-backed ECDSA P-256 signer for one node.
 *
 * @example
 * ```ts
 * const directory = new KeyDirectory();
 * const signer = await WebCryptoSigner.generate(toNodeId("alpha"), directory);
 *
 * const data = new TextEncoder().encode("hello");
 * const sig = await signer.sign(data);
 * await signer.verify(signer.nodeId, data, sig); // true
 * ```
 */
export class WebCryptoSigner implements ISigner {
  private constructor(
    readonly nodeId: NodeId,
    private readonly signingKey: CryptoKey,
    private readonly directory: KeyDirectory
  ) {}

  /**
   * Generate a fresh keypair for `nodeId` and publish its public key.
   */
  static async generate(
    nodeId: NodeId,
    directory: KeyDirectory
  ): Promise<WebCryptoSigner> {
    const subtle = requireSubtle();
    const pair = await subtle.generateKey(
      { name: "ECDSA", namedCurve: "P-256" },
      false, // non-extractable private key
      ["sign", "verify"]
    );

    directory.register(nodeId, await exportCompressedPublicKey(pair.publicKey));
    return new WebCryptoSigner(nodeId, pair.privateKey, directory);
  }

  async sign(data: Uint8Array): Promise<Signature> {
    let raw: ArrayBuffer;
    try {
      raw = await requireSubtle().sign(ECDSA_PARAMS, this.signingKey, buf(data));
    } catch (err) {
      throw new SignerError(
        `Signing failed for ${this.nodeId}: ${err instanceof Error ? err.message : String(err)}`,
        "SIGNING_FAILED"
      );
    }
    return normalizeSignature(new Uint8Array(raw));
  }

  async verify(
    signer: NodeId,
    data: Uint8Array,
    signature: Uint8Array
  ): Promise<boolean> {
    if (signature.length !== 64) return false;

    const key = await this.directory.getVerifyKey(signer);
    if (!key) return false;

    return requireSubtle().verify(ECDSA_PARAMS, key, buf(signature), buf(data));
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
