import { MESSAGE_STREAM, type EventStream, type WireCapabilities, type WireClient } from "../channels/rocketchat/wire-client.js";
import type {
  Credentials,
  RawEvent,
  RemoteIdentity,
  RemoteRoom,
  Session,
  WireSendRequest,
  WireSendResult,
} from "../core/types.js";
import { NetworkError } from "../utils/errors.js";

/** Event stream the test feeds by hand */
export class FakeStream implements EventStream {
  private readonly buffer: RawEvent[] = [];
  private wake: (() => void) | null = null;
  private failure: Error | null = null;
  closed = false;

  push(...events: RawEvent[]): void {
    this.buffer.push(...events);
    this.notify();
  }

  /** Ends iteration, with an error when given one */
  end(failure?: Error): void {
    this.failure = failure ?? null;
    this.closed = true;
    this.notify();
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawEvent> {
    while (true) {
      const next = this.buffer.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.closed) {
        if (this.failure) throw this.failure;
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

type Outcome<T> = T | Error;

/**
 * In-memory server. Failures are scripted per call: each queued Error is thrown by
 * the next matching call, after which calls succeed again.
 */
export class FakeWire implements WireClient {
  capabilities: WireCapabilities = { resumableStream: false };

  readonly users = new Map<string, RemoteIdentity>();
  readonly rooms = new Map<string, RemoteRoom>();
  readonly directRooms = new Map<string, string>();
  readonly history = new Map<string, RawEvent[]>();

  readonly authFailures: Error[] = [];
  readonly streamFailures: Error[] = [];
  readonly sendOutcomes: Array<Outcome<null>> = [];
  readonly fetchUserFailures: Error[] = [];

  readonly streams: FakeStream[] = [];
  readonly sent: Array<{ token: string; request: WireSendRequest }> = [];
  readonly historyRequests: Array<{ roomId: string; since: Date }> = [];

  authCalls = 0;
  fetchUserCalls = 0;
  fetchRoomCalls = 0;
  logoutCalls = 0;

  /** Holds logins open until the promise settles */
  authGate: Promise<void> | null = null;
  /** Lets a test hold fetches open to observe concurrent lookups */
  fetchGate: Promise<void> | null = null;
  /** Holds sends to a room until the promise settles */
  readonly sendGates = new Map<string, Promise<void>>();

  self: RemoteIdentity = { userId: "bot-id", username: "bot", displayName: "Bot" };

  get lastStream(): FakeStream | undefined {
    return this.streams[this.streams.length - 1];
  }

  async authenticate(_credentials: Credentials): Promise<Session> {
    this.authCalls++;
    if (this.authGate) await this.authGate;
    const failure = this.authFailures.shift();
    if (failure) throw failure;
    const session: Session = {
      authToken: `token-${this.authCalls}`,
      userId: this.self.userId,
      username: this.self.username,
      serverUri: "http://chat.test",
      streamUrl: "ws://chat.test/websocket",
      state: "authenticating",
      establishedAt: this.authCalls,
    };
    return Object.freeze(session);
  }

  async openStream(_session: Session): Promise<EventStream> {
    const failure = this.streamFailures.shift();
    if (failure) throw failure;
    const stream = new FakeStream();
    this.streams.push(stream);
    return stream;
  }

  async fetchUser(_session: Session, userId: string): Promise<RemoteIdentity> {
    this.fetchUserCalls++;
    if (this.fetchGate) await this.fetchGate;
    const failure = this.fetchUserFailures.shift();
    if (failure) throw failure;
    const user = this.users.get(userId);
    if (!user) throw new NetworkError(`unknown user ${userId}`);
    return user;
  }

  async fetchRoom(_session: Session, roomId: string): Promise<RemoteRoom> {
    this.fetchRoomCalls++;
    if (this.fetchGate) await this.fetchGate;
    const room = this.rooms.get(roomId);
    if (!room) throw new NetworkError(`unknown room ${roomId}`);
    return room;
  }

  async sendMessage(session: Session, request: WireSendRequest): Promise<WireSendResult> {
    const gate = this.sendGates.get(request.rid);
    if (gate) await gate;
    const outcome = this.sendOutcomes.shift();
    if (outcome instanceof Error) throw outcome;
    this.sent.push({ token: session.authToken, request });
    return { messageId: `msg-${this.sent.length}`, roomId: request.rid };
  }

  async openDirectRoom(_session: Session, username: string): Promise<string> {
    const roomId = this.directRooms.get(username);
    if (!roomId) throw new NetworkError(`no such user ${username}`);
    return roomId;
  }

  async fetchRoomHistory(_session: Session, roomId: string, since: Date): Promise<RawEvent[]> {
    this.historyRequests.push({ roomId, since });
    return this.history.get(roomId) ?? [];
  }

  async logout(_session: Session): Promise<void> {
    this.logoutCalls++;
  }
}

export interface MessageEventInit {
  id: string;
  roomId: string;
  userId: string;
  username?: string;
  name?: string;
  text: string;
  /** Milliseconds since the epoch */
  ts?: number;
  threadId?: string;
  /** Further payload fields, e.g. those of a re-broadcast update */
  extra?: Record<string, unknown>;
}

/** A stream-room-messages event as Rocket.Chat sends it */
export function messageEvent(init: MessageEventInit): RawEvent {
  const payload: Record<string, unknown> = {
    _id: init.id,
    rid: init.roomId,
    msg: init.text,
    ts: { $date: init.ts ?? 1_700_000_000_000 },
    u: { _id: init.userId, username: init.username, name: init.name },
  };
  if (init.threadId) payload.tmid = init.threadId;
  Object.assign(payload, init.extra);
  return { collection: MESSAGE_STREAM, eventName: init.roomId, payload, receivedAt: init.ts ?? 1_700_000_000_000 };
}

export const alice: RemoteIdentity = { userId: "u-alice", username: "alice", displayName: "Alice Liddell" };
export const bob: RemoteIdentity = { userId: "u-bob", username: "bob", displayName: "Bob" };
export const general: RemoteRoom = { roomId: "r-general", type: "channel", name: "general" };
export const random: RemoteRoom = { roomId: "r-random", type: "channel", name: "random" };

/** A FakeWire that knows alice, bob, #general and #random */
export function seededWire(): FakeWire {
  const wire = new FakeWire();
  for (const user of [alice, bob]) wire.users.set(user.userId, user);
  for (const room of [general, random]) wire.rooms.set(room.roomId, room);
  return wire;
}
