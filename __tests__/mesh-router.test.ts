/**
 * @module __tests__/mesh-router.test
 * @description Tests for TTL flooding, dedup and the peer table.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MeshRouter } from "../src/primitives/mesh-router.js";
import { PeerUnreachableError } from "../src/interfaces/transport.js";
import type { ITransport } from "../src/interfaces/transport.js";
import { decodeFrame } from "../src/codec/index.js";
import { toNodeId } from "../src/types/branded.js";
import type { NodeId } from "../src/types/branded.js";
import type { MeshMessage } from "../src/types/message.js";
import type {
  MessageRejectedEvent,
  PeerDiscoveredEvent,
  PeerLostEvent,
} from "../src/types/events.js";
import { ManualClock, MockSigner, signedMessage } from "./fixtures.js";

// ─── Stub Transport ─────────────────────────────────────────────────

class StubTransport implements ITransport {
  readonly sent: Array<{ peerId: NodeId; data: Uint8Array }> = [];
  readonly unreachable = new Set<NodeId>();
  linked: NodeId[] = [];

  constructor(readonly localId: NodeId) {}

  async transmit(peerId: NodeId, data: Uint8Array): Promise<void> {
    if (this.unreachable.has(peerId)) throw new PeerUnreachableError(peerId);
    this.sent.push({ peerId, data });
  }

  onReceive(): () => void {
    return () => {};
  }

  onLinkChange(): () => void {
    return () => {};
  }

  close(): void {}

  getLinkedPeers(): readonly NodeId[] {
    return this.linked;
  }

  getMTU(): number {
    return 65_536;
  }

  sentMessages(): Array<{ peerId: NodeId; message: MeshMessage }> {
    return this.sent.map(({ peerId, data }) => {
      const frame = decodeFrame(data);
      if (frame.kind !== "MESSAGE") throw new Error(`unexpected ${frame.kind}`);
      return { peerId, message: frame.message };
    });
  }
}

const alpha = toNodeId("alpha");
const bravo = toNodeId("bravo");
const charlie = toNodeId("charlie");
const delta = toNodeId("delta");

describe("MeshRouter", () => {
  let time: ManualClock;
  let transport: StubTransport;
  let router: MeshRouter;

  beforeEach(() => {
    time = new ManualClock();
    transport = new StubTransport(bravo);
    router = new MeshRouter(bravo, transport, {
      initialTtl: 3,
      peerTimeoutMs: 5_000,
      dedupRetentionMs: 60_000,
      dedupMaxEntries: 3,
      now: time.now,
    });
  });

  describe("broadcast", () => {
    it("sends to every live peer off the route with TTL decremented", async () => {
      router.observePeer(alpha);
      router.observePeer(charlie);
      router.observePeer(delta);
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1, ttl: 3 });

      const result = await router.broadcast(message);

      expect(result).toEqual({ sentTo: ["charlie", "delta"], failed: [] });
      const sent = transport.sentMessages();
      expect(sent.map((s) => s.message.ttl)).toEqual([2, 2]);
      expect(sent[0]!.message.route).toEqual(["alpha"]);
      expect(router.hasSeen(message.id)).toBe(true);
    });

    it("sends nothing when no TTL is left", async () => {
      router.observePeer(charlie);
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1, ttl: 0 });

      expect(await router.broadcast(message)).toEqual({ sentTo: [], failed: [] });
      expect(transport.sent).toHaveLength(0);
    });

    it("collects failures and lowers link quality", async () => {
      router.observePeer(charlie);
      router.observePeer(delta);
      transport.unreachable.add(delta);
      const message = await signedMessage(new MockSigner("bravo"), { lamport: 1 });

      const result = await router.broadcast(message);

      expect(result).toEqual({ sentTo: ["charlie"], failed: ["delta"] });
      expect(router.getPeer(delta)).toMatchObject({ quality: 0.5, consecutiveFailures: 1 });
    });
  });

  describe("receive", () => {
    it("appends itself to the route, processes and re-floods", async () => {
      router.observePeer(charlie);
      const processed: MeshMessage[] = [];
      router.setProcessor(async (m) => {
        processed.push(m);
        return true;
      });
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1, ttl: 2 });

      const outcome = await router.receive(message, alpha);

      expect(outcome).toEqual({
        status: "ACCEPTED",
        forwarded: { sentTo: ["charlie"], failed: [] },
      });
      expect(processed[0]!.route).toEqual(["alpha", "bravo"]);
      const [forwarded] = transport.sentMessages();
      expect(forwarded!.message.ttl).toBe(1);
      expect(forwarded!.message.route).toEqual(["alpha", "bravo"]);
    });

    it("records but never re-floods a message arriving with TTL 0", async () => {
      router.observePeer(charlie);
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1, ttl: 0 });

      const outcome = await router.receive(message, alpha);

      expect(outcome).toEqual({ status: "ACCEPTED", forwarded: { sentTo: [], failed: [] } });
      expect(transport.sent).toHaveLength(0);
    });

    it("drops duplicates without processing them again", async () => {
      router.observePeer(charlie);
      let calls = 0;
      router.setProcessor(async () => {
        calls++;
        return true;
      });
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1 });

      await router.receive(message, alpha);
      const again = await router.receive({ ...message, route: [alpha, delta] }, delta);

      expect(again).toEqual({ status: "DUPLICATE" });
      expect(calls).toBe(1);
      expect(transport.sent).toHaveLength(1);
    });

    it("treats concurrent copies as duplicates", async () => {
      let calls = 0;
      router.setProcessor(async () => {
        calls++;
        return true;
      });
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1 });

      const outcomes = await Promise.all([
        router.receive(message, alpha),
        router.receive(message, charlie),
      ]);

      expect(outcomes.map((o) => o.status)).toEqual(["ACCEPTED", "DUPLICATE"]);
      expect(calls).toBe(1);
    });

    it("forgets a rejected message so a valid copy can still pass", async () => {
      let accept = false;
      router.setProcessor(async () => accept);
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1 });

      expect(await router.receive(message, alpha)).toEqual({ status: "REJECTED" });
      expect(router.hasSeen(message.id)).toBe(false);

      accept = true;
      expect((await router.receive(message, alpha)).status).toBe("ACCEPTED");
    });

    it("rejects a route that does not start at the sender or already holds this node", async () => {
      const rejected: MessageRejectedEvent[] = [];
      router.on("MESSAGE_REJECTED", (e) => rejected.push(e));
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1 });

      expect(await router.receive({ ...message, route: [charlie] }, charlie)).toEqual({
        status: "REJECTED",
      });
      expect(await router.receive({ ...message, route: [alpha, bravo] }, charlie)).toEqual({
        status: "REJECTED",
      });
      expect(rejected.map((e) => e.reason)).toEqual(["MALFORMED_ROUTE", "MALFORMED_ROUTE"]);
      expect(rejected[0]).toMatchObject({ nodeId: "bravo", messageId: message.id, fromPeer: "charlie" });
    });
  });

  describe("dedup bounds", () => {
    it("evicts the oldest ids beyond the entry cap", async () => {
      const signer = new MockSigner("alpha");
      const messages = await Promise.all(
        [1, 2, 3, 4].map((n) => signedMessage(signer, { lamport: n, id: 900 + n }))
      );

      for (const m of messages) router.markSeen(m.id);

      expect(router.seenCount).toBe(3);
      expect(router.hasSeen(messages[0]!.id)).toBe(false);
      expect(router.hasSeen(messages[3]!.id)).toBe(true);
    });

    it("forgets ids past the retention window", async () => {
      const message = await signedMessage(new MockSigner("alpha"), { lamport: 1 });
      router.markSeen(message.id);

      time.advance(60_001);
      router.sweep();

      expect(router.hasSeen(message.id)).toBe(false);
    });
  });

  describe("peer table", () => {
    it("announces first contact and regained contact", () => {
      const discovered: PeerDiscoveredEvent[] = [];
      router.on("PEER_DISCOVERED", (e) => discovered.push(e));

      expect(router.observePeer(alpha)).toBe(true);
      expect(router.observePeer(alpha)).toBe(false);
      router.dropPeer(alpha);
      expect(router.observePeer(alpha)).toBe(true);

      expect(discovered).toHaveLength(2);
      expect(router.observePeer(bravo)).toBe(false);
    });

    it("sweeps peers silent past the timeout", () => {
      const lost: PeerLostEvent[] = [];
      router.on("PEER_LOST", (e) => lost.push(e));
      router.observePeer(alpha);
      time.advance(3_000);
      router.observePeer(charlie);
      time.advance(2_500);

      expect(router.sweep()).toEqual(["alpha"]);
      expect(router.peerCount).toBe(1);
      expect(lost[0]).toMatchObject({ peerId: "alpha", reason: "TIMEOUT", lastSeen: 1_000_000 });
    });

    it("raises quality as a peer is heard, capped at 1", async () => {
      router.observePeer(delta);
      transport.unreachable.add(delta);
      await router.broadcast(await signedMessage(new MockSigner("bravo"), { lamport: 1 }));
      router.observePeer(delta);

      expect(router.getPeer(delta)?.quality).toBeCloseTo(0.6);
      expect(router.getPeer(delta)?.consecutiveFailures).toBe(0);
    });
  });

  describe("sendBeacons", () => {
    it("sends a beacon frame to every linked peer", async () => {
      transport.linked = [alpha, charlie];

      const result = await router.sendBeacons();

      expect(result.sentTo).toEqual(["alpha", "charlie"]);
      const frame = decodeFrame(transport.sent[0]!.data);
      expect(frame).toEqual({ kind: "BEACON", nodeId: "bravo", sentAt: 1_000_000 });
    });
  });
});
