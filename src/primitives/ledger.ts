/**
 * @module primitives/ledger
 * @description Append-only, hash-linked ledger owned by one node.
 *
 * Each block links to its predecessor by hash. Blocks are frozen once
 * appended; the only way the chain changes other than at the tail is
 * adoption of a canonical chain produced by reconciliation, and every
 * block displaced that way is kept as superseded.
 */

import { TacNetEmitter } from "./base-emitter.js";
import { SerialLock } from "./serial-lock.js";
import type { ClockService } from "./clock-service.js";
import type { AdoptOptions, AppendOptions, ILedger } from "../interfaces/ledger.js";
import { IntegrityError } from "../interfaces/ledger.js";
import type { ISigner } from "../interfaces/signer.js";
import {
  blockHash,
  contentHash,
  messageDigest,
  payloadHash,
  sealBytes,
} from "../codec/canonical.js";
import { toHex } from "../backends/crypto-utils.js";
import { toLamport, toNodeId, toSignature, toUnixMillis } from "../types/branded.js";
import type {
  HexDigest,
  LamportTime,
  MessageId,
  NodeId,
  Signature,
  UnixMillis,
} from "../types/branded.js";
import type { TacNetEventMap, TacNetEventType } from "../types/events.js";
import { GENESIS_PREV_HASH } from "../types/ledger.js";
import type {
  BlockPayload,
  ForkResult,
  LedgerBlock,
  LedgerExportRecord,
  SignatureCheckResult,
  SupersededBlock,
  ValidationFailure,
  ValidationResult,
} from "../types/ledger.js";
import type { MeshMessage } from "../types/message.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

/** Network id used when none is configured. */
export const DEFAULT_NETWORK_ID = "tacnet";

export interface LedgerOptions {
  /** Node that owns this copy of the ledger. */
  readonly owner: NodeId;
  readonly signer: ISigner;
  readonly clock: ClockService;
  /** Seeds the genesis block. Ledgers of different networks never merge. */
  readonly networkId?: string;
  readonly now?: () => UnixMillis;
  readonly logger?: Logger;
}

// ─── Block Construction ────────────────────────────────────────────

/**
 * Build a frozen block at `index` after `prevHash`.
 */
export function linkBlock(
  index: number,
  prevHash: HexDigest,
  sealed: {
    readonly payloadHash: HexDigest;
    readonly creator: NodeId;
    readonly lamport: LamportTime;
    readonly signature: Signature;
    readonly payload: BlockPayload;
  }
): LedgerBlock {
  const header = {
    index,
    prevHash,
    payloadHash: sealed.payloadHash,
    creator: sealed.creator,
    lamport: sealed.lamport,
    signature: sealed.signature,
  };
  return Object.freeze({
    ...header,
    payload: Object.freeze({
      messages: Object.freeze([...sealed.payload.messages]),
    }),
    hash: blockHash(header),
  });
}

/**
 * Re-link `blocks` in order onto the end of `base`, keeping each block's seal.
 */
export function relinkChain(
  base: readonly LedgerBlock[],
  blocks: readonly LedgerBlock[]
): LedgerBlock[] {
  const chain = [...base];
  for (const block of blocks) {
    const prev = chain[chain.length - 1];
    const prevHash = prev ? prev.hash : GENESIS_PREV_HASH;
    chain.push(
      prev && block.index === chain.length && block.prevHash === prevHash
        ? block
        : linkBlock(chain.length, prevHash, block)
    );
  }
  return chain;
}

/**
 * The deterministic first block of every ledger in a network.
 */
export function genesisBlock(networkId: string = DEFAULT_NETWORK_ID): LedgerBlock {
  const payload: BlockPayload = { messages: [] };
  return linkBlock(0, GENESIS_PREV_HASH, {
    payloadHash: payloadHash(payload),
    creator: toNodeId(networkId),
    lamport: toLamport(0),
    signature: toSignature(new Uint8Array(0)),
    payload,
  });
}

/**
 * Lowest index at which two chains disagree, or the shared length when one
 * is a prefix of the other.
 */
export function diffChains(
  a: readonly LedgerBlock[],
  b: readonly LedgerBlock[]
): ForkResult {
  const common = Math.min(a.length, b.length);
  for (let i = 0; i < common; i++) {
    if (a[i]!.hash !== b[i]!.hash) {
      return { forked: true, forkIndex: i };
    }
  }
  return { forked: false, commonLength: common };
}

/**
 * Length of the prefix two chains share.
 */
export function sharedPrefixLength(
  a: readonly LedgerBlock[],
  b: readonly LedgerBlock[]
): number {
  const result = diffChains(a, b);
  return result.forked ? result.forkIndex : result.commonLength;
}

/**
 * Position-independent identity of a block: who sealed which messages,
 * when. Copies of one message recorded by different nodes share it.
 */
export function sealKey(block: LedgerBlock): string {
  return `${block.creator}\u0000${block.lamport}\u0000${contentHash(block.payload)}`;
}

/**
 * First message id that appears twice in `messages`, if any.
 */
function repeatedId(messages: readonly MeshMessage[]): MessageId | null {
  const ids = new Set<MessageId>();
  for (const message of messages) {
    if (ids.has(message.id)) return message.id;
    ids.add(message.id);
  }
  return null;
}

// ─── Ledger ────────────────────────────────────────────────────────

/**
 * Ledger: one node's hash-chained record.
 *
 * @example
 * ```ts
 * const ledger = new Ledger({ owner, signer, clock });
 * const block = await ledger.append({ messages: [msg] }, msg.sender, {
 *   seal: { lamport: msg.lamport, signature: msg.signature },
 * });
 * ledger.validate(); // { valid: true, checked: 2 }
 * ```
 */
export class Ledger extends TacNetEmitter implements ILedger {
  readonly owner: NodeId;
  readonly genesis: LedgerBlock;

  private chain: readonly LedgerBlock[];
  private messageIds = new Set<MessageId>();
  private readonly displaced: SupersededBlock[] = [];
  private readonly lock = new SerialLock();
  private readonly signer: ISigner;
  private readonly clock: ClockService;
  private readonly now: () => UnixMillis;
  private readonly logger: Logger;

  constructor(options: LedgerOptions) {
    super();
    this.owner = options.owner;
    this.signer = options.signer;
    this.clock = options.clock;
    this.now = options.now ?? (() => toUnixMillis(Date.now()));
    this.logger = options.logger ?? silentLogger;
    this.genesis = genesisBlock(options.networkId);
    this.chain = [this.genesis];
  }

  // ─── Commands ───────────────────────────────────────────────────

  append(
    payload: BlockPayload,
    creator: NodeId,
    options: AppendOptions = {}
  ): Promise<LedgerBlock> {
    return this.lock.run(async () => {
      const index = this.chain.length;
      if (options.expectedIndex !== undefined && options.expectedIndex !== index) {
        throw new IntegrityError(
          `Append expected index ${options.expectedIndex}, next index is ${index}`,
          "INDEX_CONFLICT",
          options.expectedIndex
        );
      }

      const recorded = payload.messages.find((m) => this.messageIds.has(m.id));
      if (recorded) {
        throw new IntegrityError(
          `Message ${recorded.id} is already recorded`,
          "DUPLICATE_MESSAGE",
          index
        );
      }
      const repeated = repeatedId(payload.messages);
      if (repeated) {
        throw new IntegrityError(
          `Message ${repeated} appears twice in one block`,
          "DUPLICATE_MESSAGE",
          index
        );
      }

      const hash = payloadHash(payload);
      let lamport: LamportTime;
      let signature: Signature;

      if (options.seal) {
        ({ lamport, signature } = options.seal);
      } else if (creator === this.signer.nodeId) {
        lamport = this.clock.stamp().lamport;
        signature = await this.signer.sign(
          sealBytes(contentHash(payload), creator, lamport)
        );
      } else {
        throw new IntegrityError(
          `Cannot seal a block on behalf of ${creator}`,
          "FOREIGN_CREATOR",
          index
        );
      }

      const block = linkBlock(index, this.tailBlock().hash, {
        payloadHash: hash,
        creator,
        lamport,
        signature,
        payload,
      });

      this.chain = [...this.chain, block];
      this.indexMessages(block);

      this.publish({
        type: "LEDGER_APPENDED",
        owner: this.owner,
        block,
        timestamp: this.now(),
      });

      return block;
    });
  }

  adopt(
    canonical: readonly LedgerBlock[],
    forkIndex: number,
    options: AdoptOptions = {}
  ): Promise<readonly SupersededBlock[]> {
    return this.lock.run(async () => {
      this.assertValid(canonical);

      if (options.expectedTail !== undefined) {
        const tail = this.tailBlock();
        if (tail.hash !== options.expectedTail) {
          throw new IntegrityError(
            `Ledger moved past ${options.expectedTail} to ${tail.hash}`,
            "TAIL_CONFLICT",
            tail.index
          );
        }
        const shared = sharedPrefixLength(this.chain, canonical);
        if (shared !== forkIndex) {
          throw new IntegrityError(
            `Fork index ${forkIndex} does not match the shared prefix ${shared}`,
            "PREFIX_MISMATCH",
            Math.min(shared, forkIndex)
          );
        }
      }

      if (canonical[0]?.hash !== this.genesis.hash) {
        throw new IntegrityError(
          "Canonical chain starts from a different genesis",
          "PREFIX_MISMATCH",
          0
        );
      }
      if (forkIndex > this.chain.length || forkIndex > canonical.length) {
        throw new IntegrityError(
          `Fork index ${forkIndex} is past the end of a chain`,
          "PREFIX_MISMATCH",
          forkIndex
        );
      }
      for (let i = 0; i < forkIndex; i++) {
        if (this.chain[i]?.hash !== canonical[i]?.hash) {
          throw new IntegrityError(
            `Canonical chain disagrees with the local prefix at ${i}`,
            "PREFIX_MISMATCH",
            i
          );
        }
      }

      // Local blocks appended after the merge snapshot ride on top.
      const included = new Set(canonical.map(sealKey));
      const extras = this.chain
        .slice(forkIndex)
        .filter((block) => !included.has(sealKey(block)));
      const next = relinkChain(canonical, extras);

      const supersededAt = this.now();
      const superseded: SupersededBlock[] = [];
      for (const block of this.chain.slice(forkIndex)) {
        if (next[block.index]?.hash !== block.hash) {
          superseded.push(
            Object.freeze({
              block,
              supersededAt,
              reason: "superseded-by-total-order" as const,
            })
          );
        }
      }

      this.chain = next;
      this.displaced.push(...superseded);
      this.messageIds = new Set();
      for (const block of next) {
        this.indexMessages(block);
      }

      this.publish({
        type: "LEDGER_ADOPTED",
        owner: this.owner,
        forkIndex,
        length: next.length,
        superseded: superseded.length,
        timestamp: supersededAt,
      });

      return superseded;
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  validate(chain: readonly LedgerBlock[] = this.chain): ValidationResult {
    const first = chain[0];
    if (!first || first.index !== 0 || first.prevHash !== GENESIS_PREV_HASH) {
      return { valid: false, checked: 0, failedIndex: 0, reason: "BAD_GENESIS" };
    }

    for (let i = 0; i < chain.length; i++) {
      const block = chain[i]!;
      const fail = (reason: ValidationFailure) =>
        ({ valid: false, checked: i, failedIndex: i, reason }) as const;

      if (block.index !== i) return fail("BAD_INDEX");
      if (i > 0 && block.prevHash !== chain[i - 1]!.hash) return fail("BROKEN_LINK");
      if (repeatedId(block.payload.messages)) return fail("DUPLICATE_MESSAGE");
      if (payloadHash(block.payload) !== block.payloadHash) {
        return fail("PAYLOAD_HASH_MISMATCH");
      }
      if (blockHash(block) !== block.hash) return fail("BLOCK_HASH_MISMATCH");
    }

    return { valid: true, checked: chain.length };
  }

  /**
   * @throws {IntegrityError} code=INVALID_CHAIN carrying the failed index.
   */
  assertValid(chain: readonly LedgerBlock[] = this.chain): void {
    const result = this.validate(chain);
    if (!result.valid) {
      throw new IntegrityError(
        `Chain invalid at block ${result.failedIndex}: ${result.reason}`,
        "INVALID_CHAIN",
        result.failedIndex
      );
    }
  }

  diff(a: readonly LedgerBlock[], b: readonly LedgerBlock[]): ForkResult {
    return diffChains(a, b);
  }

  /**
   * Check every block seal and every message signature from `fromIndex`.
   * The genesis block carries no signature and is skipped.
   */
  async verifySignatures(
    chain: readonly LedgerBlock[] = this.chain,
    fromIndex = 1
  ): Promise<SignatureCheckResult> {
    for (let i = Math.max(1, fromIndex); i < chain.length; i++) {
      const block = chain[i]!;
      const content = contentHash(block.payload);
      const sealOk = await this.signer.verify(
        block.creator,
        sealBytes(content, block.creator, block.lamport),
        block.signature
      );
      if (!sealOk) return { valid: false, failedIndex: i };

      for (const message of block.payload.messages) {
        const digest = messageDigest(message);
        if (
          digest === content &&
          message.sender === block.creator &&
          toHex(message.signature) === toHex(block.signature)
        ) {
          continue; // the block seal is the message signature
        }
        const messageOk = await this.signer.verify(
          message.sender,
          sealBytes(digest, message.sender, message.lamport),
          message.signature
        );
        if (!messageOk) return { valid: false, failedIndex: i };
      }
    }
    return { valid: true };
  }

  export(): readonly LedgerExportRecord[] {
    return this.chain.map((block) => ({
      index: block.index,
      prevHash: block.prevHash,
      payloadHash: block.payloadHash,
      creator: block.creator,
      timestamp: block.lamport,
      signature: toHex(block.signature),
      hash: block.hash,
      messageIds: block.payload.messages.map((m) => m.id),
    }));
  }

  hasMessage(id: MessageId): boolean {
    return this.messageIds.has(id);
  }

  /**
   * Messages of every block stamped at or after `lamport`, in chain order.
   */
  since(lamport: LamportTime): readonly MeshMessage[] {
    return this.chain
      .slice(1)
      .filter((block) => block.lamport >= lamport)
      .flatMap((block) => block.payload.messages);
  }

  get blocks(): readonly LedgerBlock[] {
    return this.chain;
  }

  get tail(): LedgerBlock {
    return this.tailBlock();
  }

  get superseded(): readonly SupersededBlock[] {
    return [...this.displaced];
  }

  get length(): number {
    return this.chain.length;
  }

  /** Appends and adoptions queued or in progress. */
  get pendingWrites(): number {
    return this.lock.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  /**
   * Emit after a committed write. A throwing listener cannot undo the
   * write, so its error is logged rather than returned to the writer.
   */
  private publish<T extends TacNetEventType>(event: TacNetEventMap[T]): void {
    try {
      this.emit<T>(event);
    } catch (err) {
      this.logger.error("ledger listener failed", {
        event: event.type,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private tailBlock(): LedgerBlock {
    return this.chain[this.chain.length - 1] ?? this.genesis;
  }

  private indexMessages(block: LedgerBlock): void {
    for (const message of block.payload.messages) {
      this.messageIds.add(message.id);
    }
  }
}
