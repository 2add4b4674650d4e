/**
 * @module codec
 * @description Network Codec: binary framing for mesh transmission.
 *
 * Frame layout:
 * - frame type: 1 byte
 * - body: MessagePack
 * - CRC-24 over type + body: 3 bytes, big-endian
 *
 * Frame types:
 * - 0x01: MESSAGE        a mesh message being flooded
 * - 0x02: BEACON         presence announcement
 * - 0x03: SYNC_REQUEST   ask a peer for its full chain
 * - 0x04: SYNC_RESPONSE  the requested chain
 * - 0x05: SYNC_PUSH      a canonical chain offered for adoption
 * - 0x06: SYNC_ACK       adoption result
 *
 * Every decoded body is validated with zod before it reaches the core.
 */

import { decode, encode } from "@msgpack/msgpack";
import { z } from "zod";
import {
  toHexDigest,
  toLamport,
  toMessageId,
  toNodeId,
  toSignature,
  toUnixMillis,
} from "../types/branded.js";
import type { NodeId, UnixMillis } from "../types/branded.js";
import type { LedgerBlock } from "../types/ledger.js";
import { MESSAGE_TYPES } from "../types/message.js";
import type { MeshMessage } from "../types/message.js";
import type { CanonicalOffer } from "../types/sync.js";

export {
  messageDigest,
  recordDigest,
  payloadHash,
  contentHash,
  sealBytes,
  blockHash,
} from "./canonical.js";

// ─── Frame Type Constants ───────────────────────────────────────────

export const FRAME_TYPE_MESSAGE = 0x01;
export const FRAME_TYPE_BEACON = 0x02;
export const FRAME_TYPE_SYNC_REQUEST = 0x03;
export const FRAME_TYPE_SYNC_RESPONSE = 0x04;
export const FRAME_TYPE_SYNC_PUSH = 0x05;
export const FRAME_TYPE_SYNC_ACK = 0x06;

/** Type byte + CRC-24. */
const FRAME_OVERHEAD = 4;

// ─── Errors ─────────────────────────────────────────────────────────

export class CodecError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "TRUNCATED"
      | "CRC_MISMATCH"
      | "UNKNOWN_FRAME"
      | "MALFORMED_BODY"
      | "INVALID_BODY"
  ) {
    super(message);
    this.name = "CodecError";
  }
}

// ─── Frames ─────────────────────────────────────────────────────────

/** Why a counterpart refused an offer. CONFLICT: its chain moved meanwhile. */
export type SyncRejection = "DIVERGENT" | "INTEGRITY" | "CONFLICT";

export type Frame =
  | { readonly kind: "MESSAGE"; readonly message: MeshMessage }
  | { readonly kind: "BEACON"; readonly nodeId: NodeId; readonly sentAt: UnixMillis }
  | { readonly kind: "SYNC_REQUEST"; readonly requestId: number }
  | {
      readonly kind: "SYNC_RESPONSE";
      readonly requestId: number;
      readonly chain: readonly LedgerBlock[];
    }
  | {
      readonly kind: "SYNC_PUSH";
      readonly requestId: number;
      readonly offer: CanonicalOffer;
    }
  | {
      readonly kind: "SYNC_ACK";
      readonly requestId: number;
      readonly accepted: boolean;
      readonly rejection: SyncRejection | null;
      readonly reason: string | null;
    };

export type FrameKind = Frame["kind"];

const FRAME_TYPES: Record<FrameKind, number> = {
  MESSAGE: FRAME_TYPE_MESSAGE,
  BEACON: FRAME_TYPE_BEACON,
  SYNC_REQUEST: FRAME_TYPE_SYNC_REQUEST,
  SYNC_RESPONSE: FRAME_TYPE_SYNC_RESPONSE,
  SYNC_PUSH: FRAME_TYPE_SYNC_PUSH,
  SYNC_ACK: FRAME_TYPE_SYNC_ACK,
};

// ─── Body Schemas ───────────────────────────────────────────────────

const nodeIdSchema = z.string().min(1).transform((s) => toNodeId(s));
const hexDigestSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/)
  .transform((s) => toHexDigest(s));
const bytesSchema = z.instanceof(Uint8Array).transform((b) => new Uint8Array(b));
const lamportSchema = z.number().int().nonnegative().transform((n) => toLamport(n));
const millisSchema = z.number().int().nonnegative().transform((n) => toUnixMillis(n));
const requestIdSchema = z.number().int().nonnegative();

export const messageSchema = z.object({
  id: z
    .string()
    .regex(/^[0-9a-f]{32}$/)
    .transform((s) => toMessageId(s)),
  sender: nodeIdSchema,
  destination: nodeIdSchema.nullable(),
  type: z.enum(MESSAGE_TYPES),
  payload: bytesSchema,
  lamport: lamportSchema,
  vector: z.record(z.number().int().nonnegative()),
  ttl: z.number().int().nonnegative(),
  route: z.array(nodeIdSchema).min(1),
  createdAt: millisSchema,
  signature: bytesSchema.transform((b) => toSignature(b)),
});

export const blockSchema = z.object({
  index: z.number().int().nonnegative(),
  prevHash: hexDigestSchema,
  payloadHash: hexDigestSchema,
  creator: nodeIdSchema,
  lamport: lamportSchema,
  signature: bytesSchema.transform((b) => toSignature(b)),
  payload: z.object({ messages: z.array(messageSchema) }),
  hash: hexDigestSchema,
});

const bodySchemas = {
  MESSAGE: z.object({ message: messageSchema }),
  BEACON: z.object({ nodeId: nodeIdSchema, sentAt: millisSchema }),
  SYNC_REQUEST: z.object({ requestId: requestIdSchema }),
  SYNC_RESPONSE: z.object({
    requestId: requestIdSchema,
    chain: z.array(blockSchema),
  }),
  SYNC_PUSH: z.object({
    requestId: requestIdSchema,
    offer: z.object({
      chain: z.array(blockSchema),
      forkIndex: z.number().int().nonnegative(),
      baseTail: hexDigestSchema,
    }),
  }),
  SYNC_ACK: z.object({
    requestId: requestIdSchema,
    accepted: z.boolean(),
    rejection: z.enum(["DIVERGENT", "INTEGRITY", "CONFLICT"]).nullable(),
    reason: z.string().nullable(),
  }),
} as const;

// ─── Encode / Decode ────────────────────────────────────────────────

/**
 * Serialize a frame to wire format.
 */
export function encodeFrame(frame: Frame): Uint8Array {
  const { kind, ...body } = frame;
  const packed = encode(body);

  const out = new Uint8Array(1 + packed.length + 3);
  out[0] = FRAME_TYPES[kind];
  out.set(packed, 1);

  const crc = crc24(out.subarray(0, 1 + packed.length));
  out[out.length - 3] = (crc >>> 16) & 0xff;
  out[out.length - 2] = (crc >>> 8) & 0xff;
  out[out.length - 1] = crc & 0xff;

  return out;
}

/**
 * Parse and validate a wire frame.
 *
 * @throws {CodecError} on truncation, CRC mismatch, unknown type, or a
 * body that fails MessagePack decoding or schema validation.
 */
export function decodeFrame(data: Uint8Array): Frame {
  if (data.length <= FRAME_OVERHEAD) {
    throw new CodecError(
      `Frame must exceed ${FRAME_OVERHEAD} bytes, got ${data.length}`,
      "TRUNCATED"
    );
  }

  const end = data.length - 3;
  const expected =
    (data[end]! << 16) | (data[end + 1]! << 8) | data[end + 2]!;
  if (crc24(data.subarray(0, end)) !== expected) {
    throw new CodecError("Frame CRC-24 mismatch", "CRC_MISMATCH");
  }

  const kind = frameKindOf(data[0]!);

  let raw: unknown;
  try {
    raw = decode(data.subarray(1, end));
  } catch (err) {
    throw new CodecError(
      `Malformed ${kind} body: ${err instanceof Error ? err.message : String(err)}`,
      "MALFORMED_BODY"
    );
  }

  return parseBody(kind, raw);
}

function frameKindOf(typeByte: number): FrameKind {
  switch (typeByte) {
    case FRAME_TYPE_MESSAGE:
      return "MESSAGE";
    case FRAME_TYPE_BEACON:
      return "BEACON";
    case FRAME_TYPE_SYNC_REQUEST:
      return "SYNC_REQUEST";
    case FRAME_TYPE_SYNC_RESPONSE:
      return "SYNC_RESPONSE";
    case FRAME_TYPE_SYNC_PUSH:
      return "SYNC_PUSH";
    case FRAME_TYPE_SYNC_ACK:
      return "SYNC_ACK";
    default:
      throw new CodecError(
        `Unknown frame type: 0x${typeByte.toString(16).padStart(2, "0")}`,
        "UNKNOWN_FRAME"
      );
  }
}

function parseBody(kind: FrameKind, raw: unknown): Frame {
  switch (kind) {
    case "MESSAGE":
      return { kind, ...validate(kind, bodySchemas.MESSAGE, raw) };
    case "BEACON":
      return { kind, ...validate(kind, bodySchemas.BEACON, raw) };
    case "SYNC_REQUEST":
      return { kind, ...validate(kind, bodySchemas.SYNC_REQUEST, raw) };
    case "SYNC_RESPONSE":
      return { kind, ...validate(kind, bodySchemas.SYNC_RESPONSE, raw) };
    case "SYNC_PUSH":
      return { kind, ...validate(kind, bodySchemas.SYNC_PUSH, raw) };
    case "SYNC_ACK":
      return { kind, ...validate(kind, bodySchemas.SYNC_ACK, raw) };
  }
}

function validate<S extends z.ZodTypeAny>(
  kind: FrameKind,
  schema: S,
  raw: unknown
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new CodecError(
      `Invalid ${kind} body${where}: ${issue?.message ?? "schema mismatch"}`,
      "INVALID_BODY"
    );
  }
  return result.data;
}

// ─── Utility: CRC-24 ───────────────────────────────────────────────

/**
 * Calculate CRC-24 (error detection on lossy links).
 * Polynomial: 0x864CFB (same as OpenPGP).
 */
export function crc24(data: Uint8Array): number {
  let crc = 0xb704ce;
  for (let i = 0; i < data.length; i++) {
    crc ^= data[i]! << 16;
    for (let j = 0; j < 8; j++) {
      crc <<= 1;
      if (crc & 0x1000000) {
        crc ^= 0x864cfb;
      }
    }
  }
  return crc & 0xffffff;
}
