/**
 * @module __tests__/outbox.test
 * @description Tests for the priority outbox and its backoff schedule.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Outbox, backoffDelay } from "../src/primitives/outbox.js";
import { toUnixMillis } from "../src/types/branded.js";
import type { MessageType } from "../src/types/message.js";
import { MockSigner, signedMessage } from "./fixtures.js";

const signer = new MockSigner("alpha");
const t0 = toUnixMillis(10_000);

function at(ms: number) {
  return toUnixMillis(t0 + ms);
}

function message(type: MessageType, id: number) {
  return signedMessage(signer, { lamport: id, id, type });
}

describe("backoffDelay", () => {
  it("doubles from the base up to the cap", () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8].map((n) => backoffDelay(n, 1_000, 60_000))).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000, 32_000, 60_000, 60_000,
    ]);
  });

  it("is zero before any attempt", () => {
    expect(backoffDelay(0, 1_000, 60_000)).toBe(0);
  });
});

describe("Outbox", () => {
  let outbox: Outbox;

  beforeEach(() => {
    outbox = new Outbox({ retryBaseMs: 1_000, retryMaxMs: 4_000, entryTtlMs: 30_000 });
  });

  it("schedules the first retry one base delay out", async () => {
    const entry = outbox.enqueue(await message("CHAT", 1), t0);

    expect(entry.attempts).toBe(1);
    expect(entry.nextAttemptAt).toBe(at(1_000));
    expect(entry.expiresAt).toBe(at(30_000));
    expect(outbox.due(at(999))).toEqual([]);
    expect(outbox.due(at(1_000))).toEqual([entry]);
  });

  it("returns the existing entry when an id is queued twice", async () => {
    const m = await message("CHAT", 1);
    const first = outbox.enqueue(m, t0);
    const second = outbox.enqueue(m, at(500));

    expect(second).toBe(first);
    expect(outbox.size).toBe(1);
  });

  it("drains by priority, FIFO within a priority", async () => {
    outbox.enqueue(await message("CHAT", 1), t0);
    outbox.enqueue(await message("STATUS", 2), t0);
    outbox.enqueue(await message("ALERT", 3), t0);
    outbox.enqueue(await message("CHAT", 4), t0);
    outbox.enqueue(await message("COMMAND", 5), t0);
    outbox.enqueue(await message("ALERT", 6), t0);

    expect(outbox.due(at(1_000)).map((e) => e.message.lamport)).toEqual([3, 6, 5, 2, 1, 4]);
    expect(outbox.list().map((e) => e.message.type)).toEqual([
      "ALERT",
      "ALERT",
      "COMMAND",
      "STATUS",
      "CHAT",
      "CHAT",
    ]);
  });

  it("backs off exponentially up to the cap", async () => {
    const m = await message("STATUS", 1);
    outbox.enqueue(m, t0);

    expect(outbox.reschedule(m.id, at(1_000))?.nextAttemptAt).toBe(at(3_000));
    expect(outbox.reschedule(m.id, at(3_000))?.nextAttemptAt).toBe(at(7_000));
    const capped = outbox.reschedule(m.id, at(7_000));
    expect(capped?.attempts).toBe(4);
    expect(capped?.nextAttemptAt).toBe(at(11_000));
  });

  it("returns null when rescheduling or removing an unknown id", async () => {
    const m = await message("CHAT", 1);
    expect(outbox.reschedule(m.id, t0)).toBeNull();
    expect(outbox.remove(m.id)).toBeNull();
  });

  it("removes delivered entries", async () => {
    const m = await message("CHAT", 1);
    const entry = outbox.enqueue(m, t0);

    expect(outbox.remove(m.id)).toBe(entry);
    expect(outbox.size).toBe(0);
  });

  it("expires entries at their deadline and never offers them as due", async () => {
    const old = await message("ALERT", 1);
    outbox.enqueue(old, t0);
    const fresh = await message("CHAT", 2);
    outbox.enqueue(fresh, at(10_000));

    expect(outbox.due(at(30_000)).map((e) => e.message.id)).toEqual([fresh.id]);

    const expired = outbox.expire(at(30_000));
    expect(expired.map((e) => e.message.id)).toEqual([old.id]);
    expect(outbox.size).toBe(1);
    expect(outbox.expire(at(30_000))).toEqual([]);
  });

  it("stops offering an entry once its attempts run out", async () => {
    const capped = new Outbox({
      retryBaseMs: 1_000,
      retryMaxMs: 4_000,
      entryTtlMs: 30_000,
      maxAttempts: 2,
    });
    const m = await message("CHAT", 1);
    const first = capped.enqueue(m, t0);
    expect(capped.isExhausted(first)).toBe(false);

    const last = capped.reschedule(m.id, at(1_000));

    expect(last?.attempts).toBe(2);
    expect(last && capped.isExhausted(last)).toBe(true);
    expect(capped.due(at(5_000))).toEqual([]);
    expect(capped.expire(at(5_000)).map((e) => e.attempts)).toEqual([2]);
    expect(capped.size).toBe(0);
  });
});
