import type { AxiosAdapter } from "axios";
import type {
  Credentials,
  RawEvent,
  RemoteIdentity,
  RemoteRoom,
  RoomType,
  Session,
  WireSendRequest,
  WireSendResult,
} from "../../core/types.js";
import { SessionExpiredError, StreamError } from "../../utils/errors.js";
import { createChildLogger } from "../../utils/logger.js";
import { DdpCallError, DdpConnection, type SocketFactory } from "./ddp.js";
import { RestClient, type RequestSpec, type RestAuth, type WireRoom, type WireUser } from "./rest-client.js";

const log = createChildLogger("rocketchat-wire");

/** Live inbound event source. Iteration ends when the connection drops. */
export interface EventStream extends AsyncIterable<RawEvent> {
  close(): void;
}

export interface WireCapabilities {
  /** Missed room history can be fetched after a reconnect */
  resumableStream: boolean;
}

/**
 * Everything the bridge needs from the server. Every call takes the session by value;
 * a rejected token surfaces as SessionExpiredError.
 */
export interface WireClient {
  readonly capabilities: WireCapabilities;
  authenticate(credentials: Credentials): Promise<Session>;
  openStream(session: Session): Promise<EventStream>;
  fetchUser(session: Session, userId: string): Promise<RemoteIdentity>;
  fetchRoom(session: Session, roomId: string): Promise<RemoteRoom>;
  sendMessage(session: Session, request: WireSendRequest): Promise<WireSendResult>;
  openDirectRoom(session: Session, username: string): Promise<string>;
  /** Messages posted after `since`, oldest first */
  fetchRoomHistory(session: Session, roomId: string, since: Date): Promise<RawEvent[]>;
  logout(session: Session): Promise<void>;
}

export interface RocketChatWireOptions {
  serverUri: string;
  streamUrl: string;
  requestTimeoutMs: number;
  pingIntervalMs: number;
  resumable: boolean;
  httpAdapter?: AxiosAdapter;
  socketFactory?: SocketFactory;
}

export const MESSAGE_STREAM = "stream-room-messages";
export const NOTIFY_LOGGED_STREAM = "stream-notify-logged";
export const USER_NAME_CHANGED = "Users:NameChanged";

/** Rocket.Chat over REST (/api/v1) plus the DDP real-time API. */
export class RocketChatWireClient implements WireClient {
  readonly capabilities: WireCapabilities;
  private readonly rest: RestClient;

  constructor(private readonly options: RocketChatWireOptions) {
    this.rest = new RestClient({
      baseUrl: options.serverUri,
      timeoutMs: options.requestTimeoutMs,
      adapter: options.httpAdapter,
    });
    this.capabilities = { resumableStream: options.resumable };
  }

  async authenticate(credentials: Credentials): Promise<Session> {
    if (credentials.kind === "token") {
      const me = await this.rest.me({ authToken: credentials.authToken, userId: credentials.userId });
      return this.newSession(credentials.authToken, me._id, me.username);
    }

    const login = await this.rest.login(credentials.username, credentials.password);
    return this.newSession(login.authToken, login.userId, login.username);
  }

  async openStream(session: Session): Promise<EventStream> {
    const connection = await DdpConnection.open(session.streamUrl, {
      socketFactory: this.options.socketFactory,
      pingIntervalMs: this.options.pingIntervalMs,
      timeoutMs: this.options.requestTimeoutMs,
    });

    try {
      await connection.call("login", [{ resume: session.authToken }]);
    } catch (err) {
      connection.close();
      if (err instanceof DdpCallError && err.errorCode === 403) {
        throw new StreamError(`Stream login rejected: ${err.message}`, new SessionExpiredError(err.message, err));
      }
      throw err instanceof StreamError ? err : new StreamError("Stream login failed", err);
    }

    try {
      await connection.subscribe(MESSAGE_STREAM, ["__my_messages__", false]);
    } catch (err) {
      connection.close();
      throw err instanceof StreamError ? err : new StreamError("Message subscription failed", err);
    }

    try {
      await connection.subscribe(NOTIFY_LOGGED_STREAM, [USER_NAME_CHANGED, false]);
    } catch (err) {
      // Not fatal: cached names just stay stale until restart
      log.warn({ err }, "User rename notifications unavailable");
    }

    log.info({ streamUrl: session.streamUrl }, "Real-time stream subscribed");
    return connection;
  }

  async fetchUser(session: Session, userId: string): Promise<RemoteIdentity> {
    const user = await this.rest.userInfo(auth(session), userId);
    return toIdentity(user);
  }

  async fetchRoom(session: Session, roomId: string): Promise<RemoteRoom> {
    const room = await this.rest.roomInfo(auth(session), roomId);
    return toRoom(room);
  }

  sendMessage(session: Session, request: WireSendRequest): Promise<WireSendResult> {
    return this.rest.sendMessage(auth(session), request);
  }

  openDirectRoom(session: Session, username: string): Promise<string> {
    return this.rest.createDirectRoom(auth(session), username);
  }

  async fetchRoomHistory(session: Session, roomId: string, since: Date): Promise<RawEvent[]> {
    const messages = await this.rest.syncMessages(auth(session), roomId, since);
    const receivedAt = Date.now();
    return messages.map((payload) => ({ collection: MESSAGE_STREAM, eventName: roomId, payload, receivedAt }));
  }

  async logout(session: Session): Promise<void> {
    await this.rest.logout(auth(session));
  }

  /** Generic REST primitive for calls without a typed wrapper */
  request<T>(session: Session, spec: RequestSpec): Promise<T> {
    return this.rest.request<T>(spec, auth(session));
  }

  private newSession(authToken: string, userId: string, username: string): Session {
    const session: Session = {
      authToken,
      userId,
      username,
      serverUri: this.options.serverUri,
      streamUrl: this.options.streamUrl,
      state: "authenticating",
      establishedAt: Date.now(),
    };
    return Object.freeze(session);
  }
}

function auth(session: Session): RestAuth {
  return { authToken: session.authToken, userId: session.userId };
}

export function toIdentity(user: WireUser): RemoteIdentity {
  return {
    userId: user._id,
    username: user.username,
    displayName: user.name || user.username,
  };
}

const ROOM_TYPES: Record<string, RoomType> = {
  d: "direct",
  c: "channel",
  p: "group",
};

export function toRoom(room: WireRoom): RemoteRoom {
  const type = ROOM_TYPES[room.t ?? "c"] ?? "group";
  const name = room.fname || room.name || (room.usernames && room.usernames.join(", ")) || room._id;
  return { roomId: room._id, type, name };
}
