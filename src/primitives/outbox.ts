/**
 * @module primitives/outbox
 * @description Priority store-and-forward queue with exponential backoff.
 *
 * Entries drain ALERT > COMMAND > STATUS > CHAT, FIFO within a type.
 * Each failed attempt doubles the wait up to a ceiling; an entry past its
 * deadline or out of attempts is dropped.
 */

import type { IOutbox, OutboxEntry } from "../interfaces/outbox.js";
import { toUnixMillis } from "../types/branded.js";
import type { MessageId, UnixMillis } from "../types/branded.js";
import { messagePriority } from "../types/message.js";
import type { MeshMessage } from "../types/message.js";

export interface OutboxOptions {
  /** First retry delay in ms. Default 1000. */
  readonly retryBaseMs?: number;
  /** Retry delay ceiling in ms. Default 60000. */
  readonly retryMaxMs?: number;
  /** Lifetime of an entry in ms. Default 600000. */
  readonly entryTtlMs?: number;
  /** Delivery attempts per entry, the first one included. Default 5. */
  readonly maxAttempts?: number;
}

const DEFAULTS: Required<OutboxOptions> = {
  retryBaseMs: 1_000,
  retryMaxMs: 60_000,
  entryTtlMs: 600_000,
  maxAttempts: 5,
};

/**
 * Delay before the next attempt after `attempts` failures.
 */
export function backoffDelay(
  attempts: number,
  baseMs: number,
  maxMs: number
): number {
  if (attempts <= 0) return 0;
  return Math.min(baseMs * 2 ** (attempts - 1), maxMs);
}

export class Outbox implements IOutbox {
  private readonly entries = new Map<MessageId, OutboxEntry>();
  private readonly config: Required<OutboxOptions>;
  private seq = 0;

  constructor(options: OutboxOptions = {}) {
    this.config = { ...DEFAULTS, ...options };
  }

  /**
   * Queue a message that just failed its first attempt.
   * Re-enqueueing a queued id returns the existing entry.
   */
  enqueue(message: MeshMessage, now: UnixMillis): OutboxEntry {
    const existing = this.entries.get(message.id);
    if (existing) return existing;

    const entry: OutboxEntry = {
      message,
      priority: messagePriority(message.type),
      seq: this.seq++,
      enqueuedAt: now,
      expiresAt: toUnixMillis(now + this.config.entryTtlMs),
      attempts: 1,
      nextAttemptAt: this.nextAttempt(now, 1),
    };
    this.entries.set(message.id, entry);
    return entry;
  }

  due(now: UnixMillis): readonly OutboxEntry[] {
    return [...this.entries.values()]
      .filter((e) => e.nextAttemptAt <= now && e.expiresAt > now && !this.isExhausted(e))
      .sort(compareEntries);
  }

  reschedule(id: MessageId, now: UnixMillis): OutboxEntry | null {
    const entry = this.entries.get(id);
    if (!entry) return null;

    const attempts = entry.attempts + 1;
    const next: OutboxEntry = {
      ...entry,
      attempts,
      nextAttemptAt: this.nextAttempt(now, attempts),
    };
    this.entries.set(id, next);
    return next;
  }

  remove(id: MessageId): OutboxEntry | null {
    const entry = this.entries.get(id);
    if (!entry) return null;
    this.entries.delete(id);
    return entry;
  }

  expire(now: UnixMillis): readonly OutboxEntry[] {
    const expired = [...this.entries.values()]
      .filter((e) => e.expiresAt <= now || this.isExhausted(e))
      .sort(compareEntries);
    for (const entry of expired) {
      this.entries.delete(entry.message.id);
    }
    return expired;
  }

  isExhausted(entry: OutboxEntry): boolean {
    return entry.attempts >= this.config.maxAttempts;
  }

  /** All entries in drain order. */
  list(): readonly OutboxEntry[] {
    return [...this.entries.values()].sort(compareEntries);
  }

  get size(): number {
    return this.entries.size;
  }

  private nextAttempt(now: UnixMillis, attempts: number): UnixMillis {
    return toUnixMillis(
      now + backoffDelay(attempts, this.config.retryBaseMs, this.config.retryMaxMs)
    );
  }
}

function compareEntries(a: OutboxEntry, b: OutboxEntry): number {
  return a.priority - b.priority || a.seq - b.seq;
}
