/**
 * @module interfaces/outbox
 * @description Store-and-forward queue for messages that found no route.
 */

import type { MessageId, UnixMillis } from "../types/branded.js";
import type { MeshMessage } from "../types/message.js";

/**
 * A queued message was dropped without reaching anyone: it passed its
 * deadline (QUEUE_DEADLINE) or used up its delivery attempts
 * (ATTEMPTS_EXHAUSTED).
 */
export class MessageExpiredError extends Error {
  constructor(
    public readonly messageId: MessageId,
    public readonly attempts: number,
    public readonly code: "QUEUE_DEADLINE" | "ATTEMPTS_EXHAUSTED" = "QUEUE_DEADLINE",
    message = `Message ${messageId} expired after ${attempts} attempt(s)`
  ) {
    super(message);
    this.name = "MessageExpiredError";
  }
}

/**
 * One queued message and its retry schedule.
 */
export interface OutboxEntry {
  readonly message: MeshMessage;
  /** Rank from messagePriority(); lower drains first. */
  readonly priority: number;
  /** Enqueue sequence; FIFO tie-break within a priority. */
  readonly seq: number;
  readonly enqueuedAt: UnixMillis;
  readonly expiresAt: UnixMillis;
  readonly attempts: number;
  readonly nextAttemptAt: UnixMillis;
}

/**
 * @interface IOutbox
 */
export interface IOutbox {
  /** @command Queue a message after its first failed attempt. */
  enqueue(message: MeshMessage, now: UnixMillis): OutboxEntry;

  /** @query Entries whose next attempt is due, highest priority first. */
  due(now: UnixMillis): readonly OutboxEntry[];

  /** @command Record another failed attempt and push the next one back. */
  reschedule(id: MessageId, now: UnixMillis): OutboxEntry | null;

  /** @command Drop a delivered entry. */
  remove(id: MessageId): OutboxEntry | null;

  /**
   * @command Drop every entry past its deadline or out of attempts and
   * return them.
   */
  expire(now: UnixMillis): readonly OutboxEntry[];

  /** @query Whether an entry has used every delivery attempt. */
  isExhausted(entry: OutboxEntry): boolean;

  readonly size: number;
}
