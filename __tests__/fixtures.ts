/**
 * @module __tests__/fixtures
 * @description Shared test doubles: a deterministic signer and a message builder.
 */

import { sha256 } from "@noble/hashes/sha256";
import { messageDigest, sealBytes } from "../src/codec/canonical.js";
import type { ISigner } from "../src/interfaces/signer.js";
import {
  toLamport,
  toMessageId,
  toNodeId,
  toSignature,
  toUnixMillis,
} from "../src/types/branded.js";
import type { NodeId, Signature, UnixMillis } from "../src/types/branded.js";
import type { VectorClock } from "../src/types/clock.js";
import type { MeshMessage, MessageType } from "../src/types/message.js";

// ─── Mock Signer ────────────────────────────────────────────────────

function fakeSignature(nodeId: NodeId, data: Uint8Array): Signature {
  const id = new TextEncoder().encode(nodeId);
  const keyed = new Uint8Array(id.length + data.length);
  keyed.set(id);
  keyed.set(data, id.length);

  const sig = new Uint8Array(64);
  sig.set(sha256(keyed));
  sig.set(sha256(data), 32);
  return toSignature(sig);
}

/**
 * Deterministic signer: every node id is known, and a signature is only
 * valid for the id and bytes it was made over.
 */
export class MockSigner implements ISigner {
  readonly nodeId: NodeId;

  constructor(nodeId: string) {
    this.nodeId = toNodeId(nodeId);
  }

  async sign(data: Uint8Array): Promise<Signature> {
    return fakeSignature(this.nodeId, data);
  }

  async verify(signer: NodeId, data: Uint8Array, signature: Uint8Array): Promise<boolean> {
    const expected = fakeSignature(signer, data);
    return (
      signature.length === expected.length &&
      expected.every((byte, i) => signature[i] === byte)
    );
  }
}

// ─── Messages ───────────────────────────────────────────────────────

let nextId = 1;

export function messageId(n: number = nextId++): ReturnType<typeof toMessageId> {
  return toMessageId(n.toString(16).padStart(32, "0"));
}

export interface MessageOptions {
  readonly lamport: number;
  readonly id?: number;
  readonly type?: MessageType;
  readonly payload?: string;
  readonly destination?: string | null;
  readonly vector?: VectorClock;
  readonly ttl?: number;
  readonly createdAt?: number;
}

/**
 * A message signed the way a node signs its own submissions.
 */
export async function signedMessage(
  signer: ISigner,
  options: MessageOptions
): Promise<MeshMessage> {
  const lamport = toLamport(options.lamport);
  const unsigned = {
    id: messageId(options.id),
    sender: signer.nodeId,
    destination:
      options.destination === undefined || options.destination === null
        ? null
        : toNodeId(options.destination),
    type: options.type ?? "CHAT",
    payload: new TextEncoder().encode(options.payload ?? "test payload"),
    lamport,
    vector: options.vector ?? { [signer.nodeId]: options.lamport },
    createdAt: toUnixMillis(options.createdAt ?? 1_000),
  };
  const signature = await signer.sign(
    sealBytes(messageDigest(unsigned), signer.nodeId, lamport)
  );
  return {
    ...unsigned,
    ttl: options.ttl ?? 3,
    route: [signer.nodeId],
    signature,
  };
}

// ─── Time ───────────────────────────────────────────────────────────

/**
 * A manually advanced clock.
 */
export class ManualClock {
  constructor(public t = 1_000_000) {}

  readonly now = (): UnixMillis => toUnixMillis(this.t);

  advance(ms: number): UnixMillis {
    this.t += ms;
    return this.now();
  }
}
