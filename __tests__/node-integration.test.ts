/**
 * @module __tests__/node-integration.test
 * @description Multi-node scenarios over the in-process network.
 *
 * Timers are off and time is manual: every step is driven by the test
 * and awaited with settle(). The heartbeat deadline case runs fake timers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { TacNode } from "../src/node.js";
import type { TacNodeConfig } from "../src/node.js";
import { Coordinator } from "../src/coordinator.js";
import { InMemoryNetwork } from "../src/transports/in-memory.js";
import { encodeFrame } from "../src/codec/index.js";
import { MessageExpiredError } from "../src/interfaces/outbox.js";
import { toNodeId, toSignature } from "../src/types/branded.js";
import type { Ledger } from "../src/primitives/ledger.js";
import { sealKey } from "../src/primitives/ledger.js";
import type { TacNetEventMap, TacNetEventType } from "../src/types/events.js";
import { silentLogger } from "../src/utils/logger.js";
import { ManualClock, MockSigner, signedMessage } from "./fixtures.js";

// ─── Harness ───────────────────────────────────────────────────────

let time: ManualClock;
let net: InMemoryNetwork;
let nodes: TacNode[];

function spawn(name: string, config: Partial<TacNodeConfig> = {}): TacNode {
  const nodeId = toNodeId(name);
  const node = new TacNode({
    nodeId,
    transport: net.createTransport(nodeId),
    signer: new MockSigner(name),
    timers: false,
    minPeers: 1,
    logger: silentLogger,
    now: time.now,
    ...config,
  });
  node.start();
  nodes.push(node);
  return node;
}

function collect<T extends TacNetEventType>(node: TacNode, type: T): Array<TacNetEventMap[T]> {
  const events: Array<TacNetEventMap[T]> = [];
  node.on(type, (event) => {
    events.push(event);
  });
  return events;
}

async function settle(): Promise<void> {
  do {
    await net.settle();
    await Promise.all(nodes.map((node) => node.whenIdle()));
  } while (net.stats.inflight > 0);
}

function link(a: TacNode, b: TacNode): void {
  net.connect(a.nodeId, b.nodeId);
}

function hashes(holder: { readonly ledger: Ledger }): string[] {
  return holder.ledger.blocks.map((block) => block.hash);
}

beforeEach(() => {
  time = new ManualClock();
  net = new InMemoryNetwork({ now: time.now });
  nodes = [];
});

afterEach(async () => {
  for (const node of nodes) node.stop();
  await net.settle();
});

// ─── Mesh flooding ──────────────────────────────────────────────────

describe("mesh flooding", () => {
  it("carries a message down a line, one hop at a time", async () => {
    const alpha = spawn("alpha");
    const bravo = spawn("bravo");
    const charlie = spawn("charlie");
    link(alpha, bravo);
    link(bravo, charlie);
    await settle();

    const delivered = collect(alpha, "MESSAGE_DELIVERED");
    const atBravo = collect(bravo, "MESSAGE_RECEIVED");
    const atCharlie = collect(charlie, "MESSAGE_RECEIVED");

    const id = await alpha.submit({ type: "STATUS", payload: "holding at phase line" });
    await settle();

    expect(alpha.getState()).toBe("P2P_FALLBACK");
    expect(delivered).toHaveLength(1);
    expect(delivered[0]).toMatchObject({
      messageId: id,
      peers: ["bravo"],
      viaAuthority: false,
      attempts: 1,
    });

    expect(atBravo.map((e) => [e.message.route, e.message.ttl, e.fromPeer])).toEqual([
      [["alpha", "bravo"], 2, "alpha"],
    ]);
    expect(atCharlie.map((e) => [e.message.route, e.message.ttl, e.fromPeer])).toEqual([
      [["alpha", "bravo", "charlie"], 1, "bravo"],
    ]);
    expect(new TextDecoder().decode(atCharlie[0]?.message.payload)).toBe(
      "holding at phase line"
    );

    const routes = [alpha, bravo, charlie].map(
      (node) => node.ledger.tail.payload.messages[0]?.route
    );
    expect(routes).toEqual([["alpha"], ["alpha", "bravo"], ["alpha", "bravo", "charlie"]]);
    expect(sealKey(bravo.ledger.tail)).toBe(sealKey(alpha.ledger.tail));
    expect(sealKey(charlie.ledger.tail)).toBe(sealKey(alpha.ledger.tail));
  });

  it("delivers addressed messages only to their destination", async () => {
    const alpha = spawn("alpha");
    const bravo = spawn("bravo");
    const charlie = spawn("charlie");
    link(alpha, bravo);
    link(bravo, charlie);
    await settle();
    const atBravo = collect(bravo, "MESSAGE_RECEIVED");
    const atCharlie = collect(charlie, "MESSAGE_RECEIVED");

    await alpha.submit({ type: "COMMAND", payload: "move", destination: charlie.nodeId });
    await settle();

    expect(atBravo).toEqual([]);
    expect(atCharlie).toHaveLength(1);
    // Relays still record what they carry.
    expect(bravo.ledger.length).toBe(2);
  });

  it("records a message once when copies arrive over two paths", async () => {
    const alpha = spawn("alpha");
    const bravo = spawn("bravo");
    const charlie = spawn("charlie");
    link(alpha, bravo);
    link(alpha, charlie);
    link(bravo, charlie);
    await settle();
    const appended = collect(charlie, "LEDGER_APPENDED");
    const received = collect(charlie, "MESSAGE_RECEIVED");

    await alpha.submit({ type: "CHAT", payload: "radio check" });
    await settle();

    expect(appended).toHaveLength(1);
    expect(received).toHaveLength(1);
    expect(charlie.ledger.length).toBe(2);
    expect(bravo.ledger.length).toBe(2);
  });

  it("stops flooding when the TTL runs out", async () => {
    const alpha = spawn("alpha", { initialTtl: 2 });
    const bravo = spawn("bravo");
    const charlie = spawn("charlie");
    const delta = spawn("delta");
    link(alpha, bravo);
    link(bravo, charlie);
    link(charlie, delta);
    await settle();

    await alpha.submit({ type: "CHAT", payload: "short range" });
    await settle();

    expect(bravo.ledger.length).toBe(2);
    expect(charlie.ledger.length).toBe(2);
    expect(delta.ledger.length).toBe(1);
  });

  it("rejects messages that fail verification", async () => {
    const bravo = spawn("bravo");
    const adversary = toNodeId("adversary");
    const raw = net.createTransport(adversary);
    net.connect(adversary, bravo.nodeId);
    await settle();
    const rejected = collect(bravo, "MESSAGE_REJECTED");

    const genuine = await signedMessage(new MockSigner("alpha"), { lamport: 1 });
    const forged = { ...genuine, signature: toSignature(new Uint8Array(64)) };
    await raw.transmit(bravo.nodeId, encodeFrame({ kind: "MESSAGE", message: forged }));
    await settle();
    await raw.transmit(bravo.nodeId, new Uint8Array([1, 2, 3]));
    await settle();

    expect(rejected.map((e) => [e.reason, e.messageId, e.fromPeer])).toEqual([
      ["BAD_SIGNATURE", genuine.id, "adversary"],
      ["DECODE_FAILED", null, "adversary"],
    ]);
    expect(bravo.ledger.length).toBe(1);
  });
});

// ─── Store and forward ──────────────────────────────────────────────

describe("store and forward", () => {
  it("queues without a route and drains on link-up", async () => {
    const alpha = spawn("alpha");
    const bravo = spawn("bravo");
    await settle();
    const queued = collect(alpha, "MESSAGE_QUEUED");
    const delivered = collect(alpha, "MESSAGE_DELIVERED");
    const atBravo = collect(bravo, "MESSAGE_RECEIVED");

    const id = await alpha.submit({ type: "ALERT", payload: "contact east" });

    expect(alpha.getState()).toBe("ISOLATED");
    expect(queued).toEqual([
      {
        type: "MESSAGE_QUEUED",
        messageId: id,
        attempts: 1,
        nextAttemptAt: 1_001_000,
        expiresAt: 1_600_000,
        timestamp: 1_000_000,
      },
    ]);
    expect(alpha.outbox.size).toBe(1);

    time.advance(1_000);
    link(alpha, bravo);
    await settle();

    expect(alpha.outbox.size).toBe(0);
    expect(delivered).toHaveLength(1);
    expect(delivered[0]).toMatchObject({ messageId: id, peers: ["bravo"], attempts: 2 });
    expect(atBravo.map((e) => e.message.type)).toEqual(["ALERT"]);
    expect(hashes(bravo)).toEqual(hashes(alpha));
  });

  it("expires what cannot be delivered in time", async () => {
    const alpha = spawn("alpha", { queueEntryTtlMs: 5_000 });
    await settle();
    const expired = collect(alpha, "MESSAGE_EXPIRED");

    const id = await alpha.submit({ type: "CHAT", payload: "nobody home" });
    time.advance(5_000);
    const result = await alpha.drainOutbox();

    expect(result).toEqual({ delivered: 0, requeued: 0, expired: 1 });
    expect(expired.map((e) => [e.messageId, e.attempts, e.error.name])).toEqual([
      [id, 1, "MessageExpiredError"],
    ]);
  });

  it("drops a message once its delivery attempts run out", async () => {
    const alpha = spawn("alpha", { maxDeliveryAttempts: 2 });
    await settle();
    const queued = collect(alpha, "MESSAGE_QUEUED");
    const expired = collect(alpha, "MESSAGE_EXPIRED");

    const id = await alpha.submit({ type: "CHAT", payload: "nobody home" });
    time.advance(1_000);
    const result = await alpha.drainOutbox();

    expect(result).toEqual({ delivered: 0, requeued: 0, expired: 1 });
    expect(queued.map((e) => e.attempts)).toEqual([1]);
    expect(expired.map((e) => [e.messageId, e.attempts])).toEqual([[id, 2]]);
    expect(expired[0]?.error).toBeInstanceOf(MessageExpiredError);
    expect(expired[0]?.error).toMatchObject({ code: "ATTEMPTS_EXHAUSTED" });
    expect(alpha.outbox.size).toBe(0);
  });
});

// ─── Partitions ─────────────────────────────────────────────────────

describe("partition and reconnect", () => {
  it("converges to bit-identical chains in total order", async () => {
    const alpha = spawn("alpha");
    const bravo = spawn("bravo");
    link(alpha, bravo);
    await settle();

    net.disconnect(alpha.nodeId, bravo.nodeId);
    await settle();
    await alpha.submit({ type: "CHAT", payload: "alpha one" });
    await alpha.submit({ type: "CHAT", payload: "alpha two" });
    await bravo.submit({ type: "CHAT", payload: "bravo one" });
    const completed = collect(alpha, "RECONCILIATION_COMPLETED");

    time.advance(1_000);
    link(alpha, bravo);
    await settle();

    expect(hashes(bravo)).toEqual(hashes(alpha));
    expect(alpha.ledger.blocks.map((b) => `${b.creator}@${b.lamport}`)).toEqual([
      "tacnet@0",
      "alpha@1",
      "bravo@1",
      "alpha@2",
    ]);
    expect(alpha.ledger.validate()).toEqual({ valid: true, checked: 4 });
    expect(completed).toHaveLength(1);
    expect(completed[0]?.report.forkIndex).toBe(1);
  });

  it("orders equal Lamport times by node id, not by arrival", async () => {
    const bravo = spawn("bravo");
    const charlie = spawn("charlie");
    await settle();

    await charlie.submit({ type: "STATUS", payload: "charlie first" });
    time.advance(500);
    await bravo.submit({ type: "STATUS", payload: "bravo second" });

    time.advance(500);
    link(bravo, charlie);
    await settle();

    const order = (node: TacNode) =>
      node.ledger.blocks.map((b) => new TextDecoder().decode(b.payload.messages[0]?.payload));
    expect(order(bravo)).toEqual(["", "bravo second", "charlie first"]);
    expect(order(charlie)).toEqual(order(bravo));
    expect(hashes(charlie)).toEqual(hashes(bravo));
  });
});

// ─── Authority ──────────────────────────────────────────────────────

describe("authority fallback and resync", () => {
  let coordinator: Coordinator;

  function attached(name: string): TacNode {
    return spawn(name, {
      authority: coordinator.createLink(toNodeId(name)),
      heartbeatIntervalMs: 1_000,
      missedHeartbeatThreshold: 2,
    });
  }

  beforeEach(() => {
    coordinator = new Coordinator({ signer: new MockSigner("hq"), now: time.now });
  });

  it("relays through the authority while centralized", async () => {
    const alpha = attached("alpha");
    const bravo = attached("bravo");
    await settle();
    const delivered = collect(alpha, "MESSAGE_DELIVERED");
    const atBravo = collect(bravo, "MESSAGE_RECEIVED");

    await alpha.submit({ type: "COMMAND", payload: "report" });
    await settle();

    expect(alpha.getState()).toBe("CENTRALIZED");
    expect(delivered[0]).toMatchObject({ viaAuthority: true, peers: [] });
    expect(atBravo.map((e) => e.fromPeer)).toEqual(["hq"]);
    expect(coordinator.ledger.length).toBe(2);
    expect(hashes(bravo)).toEqual(hashes(coordinator));
  });

  it("falls back to the mesh, then resyncs before returning", async () => {
    const alpha = attached("alpha");
    const bravo = attached("bravo");
    link(alpha, bravo);
    await settle();
    const states = collect(alpha, "NETWORK_STATE_CHANGED");
    const resyncs = collect(alpha, "RESYNC_STARTED");

    time.advance(2_000);
    expect(alpha.checkHeartbeat()).toBe("P2P_FALLBACK");
    expect(bravo.checkHeartbeat()).toBe("P2P_FALLBACK");

    const delivered = collect(alpha, "MESSAGE_DELIVERED");
    await alpha.submit({ type: "ALERT", payload: "authority silent" });
    await settle();

    expect(delivered[0]).toMatchObject({ viaAuthority: false, peers: ["bravo"] });
    expect(bravo.ledger.length).toBe(2);
    expect(coordinator.ledger.length).toBe(1);

    expect(coordinator.heartbeat()).toBe(2);
    await settle();

    expect(alpha.getState()).toBe("CENTRALIZED");
    expect(bravo.getState()).toBe("CENTRALIZED");
    expect(alpha.isResyncing()).toBe(false);
    expect(resyncs.map((e) => e.authorityId)).toEqual(["hq"]);
    expect(states.map((e) => [e.previousState, e.currentState])).toEqual([
      ["CENTRALIZED", "P2P_FALLBACK"],
      ["P2P_FALLBACK", "CENTRALIZED"],
    ]);
    expect(hashes(coordinator)).toEqual(hashes(alpha));
    expect(hashes(bravo)).toEqual(hashes(alpha));
  });

  it("leaves CENTRALIZED when the heartbeat window closes, not at the next check", async () => {
    vi.useFakeTimers();
    try {
      const alpha = spawn("alpha", {
        authority: coordinator.createLink(toNodeId("alpha")),
        heartbeatIntervalMs: 10_000,
        missedHeartbeatThreshold: 2,
        timers: true,
      });
      const states = collect(alpha, "NETWORK_STATE_CHANGED");

      time.advance(5_000);
      vi.advanceTimersByTime(5_000);
      await alpha.recordAuthorityHeartbeat(time.now());

      time.advance(19_999);
      vi.advanceTimersByTime(19_999);
      expect(alpha.getState()).toBe("CENTRALIZED");

      time.advance(1);
      vi.advanceTimersByTime(1);
      expect(alpha.getState()).toBe("ISOLATED");
      expect(states.map((e) => [e.previousState, e.currentState])).toEqual([
        ["CENTRALIZED", "ISOLATED"],
      ]);
      alpha.stop();
    } finally {
      vi.useRealTimers();
    }
  });

  it("goes isolated without peers and reports its status", async () => {
    const alpha = attached("alpha");
    await settle();

    time.advance(2_000);

    expect(alpha.checkHeartbeat()).toBe("ISOLATED");
    expect(alpha.getStatus()).toMatchObject({
      nodeId: "alpha",
      state: "ISOLATED",
      resyncing: false,
      peers: [],
      ledgerLength: 1,
      queuedMessages: 0,
      lastAuthorityHeartbeat: 1_000_000,
    });
  });
});
