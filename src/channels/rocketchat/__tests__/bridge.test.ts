import { afterEach, describe, expect, it, vi } from "vitest";
import { testConfig } from "../../../__fixtures__/config.js";
import { alice, general, messageEvent, seededWire, type FakeWire } from "../../../__fixtures__/wire.js";
import type { CanonicalMessage } from "../../../core/types.js";
import { AuthError, NetworkError, RequestRejectedError, SessionExpiredError } from "../../../utils/errors.js";
import type { PresenceStatus } from "../../types.js";
import { RocketChatBridge } from "../bridge.js";

const instant = async () => {};

let bridge: RocketChatBridge | null = null;

afterEach(async () => {
  await bridge?.disconnect();
  bridge = null;
});

function bridgeFor(wire: FakeWire, overrides: Parameters<typeof testConfig>[0] = {}): RocketChatBridge {
  bridge = new RocketChatBridge(testConfig(overrides), { wire, sleep: instant });
  return bridge;
}

async function receiveOne(target: RocketChatBridge, wire: FakeWire, init: Parameters<typeof messageEvent>[0]): Promise<CanonicalMessage> {
  const received: CanonicalMessage[] = [];
  target.onMessage(async (message) => {
    received.push(message);
  });
  wire.lastStream?.push(messageEvent(init));
  await vi.waitFor(() => expect(received).toHaveLength(1));
  const [message] = received;
  if (!message) throw new Error("no message received");
  return message;
}

describe("RocketChatBridge", () => {
  it("connects and delivers inbound messages to handlers", async () => {
    const wire = seededWire();
    const target = bridgeFor(wire);

    await target.connect();
    const message = await receiveOne(target, wire, {
      id: "m1",
      roomId: general.roomId,
      userId: alice.userId,
      username: "alice",
      name: "Alice Liddell",
      text: "hello bot",
    });

    expect(target.state).toBe("live");
    expect(message.id).toBe("m1");
    expect(message.sender).toEqual(alice);
    expect(message.room).toEqual(general);
    expect(message.body).toBe("hello bot");
    expect(message.timestamp).toEqual(new Date(1_700_000_000_000));
    expect(wire.fetchUserCalls).toBe(0);
  });

  it("replies inside the thread of the message", async () => {
    const wire = seededWire();
    const target = bridgeFor(wire);
    await target.connect();
    const message = await receiveOne(target, wire, {
      id: "m2",
      roomId: general.roomId,
      userId: alice.userId,
      username: "alice",
      name: "Alice Liddell",
      text: "status?",
      threadId: "t-1",
    });

    const ticket = target.reply(message, "all green");

    expect(await ticket.delivered).toEqual({ status: "sent", messageIds: ["msg-1"] });
    expect(wire.sent).toEqual([{ token: "token-1", request: { rid: general.roomId, msg: "all green", tmid: "t-1" } }]);
  });

  it("opens a direct room for a username with a leading @", async () => {
    const wire = seededWire();
    wire.directRooms.set("alice", "r-dm-alice");
    const target = bridgeFor(wire);
    await target.connect();

    const ticket = target.sendDirect("@alice", { body: "hi" });

    expect(await ticket.delivered).toEqual({ status: "sent", messageIds: ["msg-1"] });
    expect(wire.sent[0]?.request).toEqual({ rid: "r-dm-alice", msg: "hi" });
  });

  it("reports rejected sends to failure listeners", async () => {
    const wire = seededWire();
    wire.sendOutcomes.push(new RequestRejectedError("chat.sendMessage rejected: error-action-not-allowed", 400));
    const target = bridgeFor(wire);
    const failures: string[] = [];
    target.onDeliveryFailure((_send, failure) => failures.push(failure.message));
    await target.connect();

    const result = await target.send(general.roomId, "nope").delivered;

    expect(result.status).toBe("failed");
    expect(failures).toEqual(["Message rejected: chat.sendMessage rejected: error-action-not-allowed"]);
  });

  it("matches admins by username regardless of case and @", () => {
    const target = bridgeFor(seededWire(), { admins: ["@Alice"] });

    expect(target.isAdmin(alice)).toBe(true);
    expect(target.isAdmin(" @ALICE")).toBe(true);
    expect(target.isAdmin("bob")).toBe(false);
  });

  it("caches resolved users", async () => {
    const wire = seededWire();
    const target = bridgeFor(wire);
    await target.connect();

    expect(await target.displayName(alice.userId)).toBe("Alice Liddell");
    expect(await target.resolveUser(alice.userId)).toEqual(alice);
    expect(wire.fetchUserCalls).toBe(1);
  });

  it("refuses lookups before the first session", async () => {
    const target = bridgeFor(seededWire());

    await expect(target.resolveRoom(general.roomId)).rejects.toThrow(new NetworkError("Not connected to Rocket.Chat"));
  });

  it("reconnects when a lookup finds the token expired", async () => {
    const wire = seededWire();
    wire.fetchUserFailures.push(new SessionExpiredError("users.info: You must be logged in to do this."));
    const target = bridgeFor(wire);
    const presence: PresenceStatus[] = [];
    target.onPresence((status) => presence.push(status));
    await target.connect();

    await expect(target.resolveUser(alice.userId)).rejects.toBeInstanceOf(SessionExpiredError);

    await vi.waitFor(() => {
      expect(wire.authCalls).toBe(2);
      expect(target.isLive()).toBe(true);
    });
    expect(wire.streams[0]?.closed).toBe(true);
    expect(presence).toEqual(["online", "offline", "online"]);
    expect(await target.resolveUser(alice.userId)).toEqual(alice);
  });

  it("goes offline and logs out on disconnect", async () => {
    const wire = seededWire();
    const target = bridgeFor(wire);
    const presence: PresenceStatus[] = [];
    target.onPresence((status) => presence.push(status));
    await target.connect();

    await target.disconnect();
    bridge = null;

    expect(presence).toEqual(["online", "offline"]);
    expect(target.state).toBe("shutting-down");
    expect(wire.logoutCalls).toBe(1);
    expect(target.self).toBeNull();
  });

  it("runs the heartbeat hook while live", async () => {
    const wire = seededWire();
    const target = bridgeFor(wire, { heartbeat: { enabled: true, intervalSec: 1 } });
    const beat = vi.fn(async () => {});
    target.onHeartbeat(beat);

    await target.connect();

    expect(target.heartbeatRunning).toBe(true);
    await vi.waitFor(() => expect(beat).toHaveBeenCalled(), { timeout: 3_000 });
  });

  it("stops the heartbeat when the first connection fails", async () => {
    const wire = seededWire();
    wire.authFailures.push(new AuthError("Login rejected: Unauthorized"));
    const target = bridgeFor(wire, {
      heartbeat: { enabled: true, intervalSec: 1 },
      reconnect: { enabled: false, initialDelayMs: 1_000, maxDelayMs: 8_000 },
    });
    target.onHeartbeat(async () => {});

    await expect(target.connect()).rejects.toThrow("Bridge is not connected");

    expect(target.heartbeatRunning).toBe(false);
  });
});
