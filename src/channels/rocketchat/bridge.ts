import type { BridgeConfig } from "../../config.js";
import type { Sleeper } from "../../core/backoff.js";
import { Heartbeat, type HeartbeatFn } from "../../core/heartbeat.js";
import { IdentityMapper } from "../../core/identity-mapper.js";
import {
  OutboundDispatcher,
  type DeliveryFailureListener,
  type DeliveryTicket,
} from "../../core/outbound-dispatcher.js";
import { SessionSupervisor, type StateListener } from "../../core/supervisor.js";
import type {
  CanonicalMessage,
  ConnectionState,
  OutboundContent,
  RemoteIdentity,
  RemoteRoom,
  Session,
} from "../../core/types.js";
import { NetworkError, SessionExpiredError } from "../../utils/errors.js";
import { createChildLogger } from "../../utils/logger.js";
import type { ChatBackend, MessageHandler, PresenceListener, PresenceStatus, SendContent } from "../types.js";
import { EventTranslator } from "./translator.js";
import { RocketChatWireClient, type WireClient } from "./wire-client.js";

const log = createChildLogger("rocketchat-bridge");

export interface BridgeDependencies {
  /** Defaults to the REST + DDP client built from the config */
  wire?: WireClient;
  sleep?: Sleeper;
}

/** Rocket.Chat behind the ChatBackend contract. */
export class RocketChatBridge implements ChatBackend {
  readonly type = "rocketchat";

  private readonly wire: WireClient;
  private readonly identities: IdentityMapper;
  private readonly translator: EventTranslator;
  private readonly supervisor: SessionSupervisor;
  private readonly dispatcher: OutboundDispatcher;
  private readonly admins: Set<string>;
  private handlers: MessageHandler[] = [];
  private presenceListeners: PresenceListener[] = [];
  private presence: PresenceStatus = "offline";
  private heartbeat: Heartbeat | null = null;

  constructor(
    private readonly config: BridgeConfig,
    deps: BridgeDependencies = {},
  ) {
    this.wire =
      deps.wire ??
      new RocketChatWireClient({
        serverUri: config.serverUri,
        streamUrl: config.streamUrl,
        requestTimeoutMs: config.outbound.requestTimeoutMs,
        pingIntervalMs: config.stream.pingIntervalMs,
        resumable: config.stream.resumable,
      });

    this.identities = new IdentityMapper({
      fetchUser: (userId) => this.withSession((session) => this.wire.fetchUser(session, userId)),
      fetchRoom: (roomId) => this.withSession((session) => this.wire.fetchRoom(session, roomId)),
    });
    this.translator = new EventTranslator(this.identities, {
      maxMessageLength: config.outbound.maxMessageLength,
    });
    this.supervisor = new SessionSupervisor(this.wire, this.translator, {
      credentials: config.credentials,
      reconnect: config.reconnect,
      sleep: deps.sleep,
    });
    this.dispatcher = new OutboundDispatcher(this.wire, this.translator, this.supervisor, {
      maxAttempts: config.outbound.maxAttempts,
      retryDelayMs: config.outbound.retryDelayMs,
      minIntervalMs: config.outbound.minIntervalMs,
      maxQueueSize: config.outbound.maxQueueSize,
      sleep: deps.sleep,
    });
    this.admins = new Set(config.admins.map(normalizeUsername));

    this.supervisor.onMessage((message) => this.dispatchInbound(message));
    this.supervisor.onStateChange((state) => this.updatePresence(state));
  }

  /** Starts the connection loop and resolves once the bridge is live. */
  async connect(): Promise<void> {
    this.supervisor.start();
    if (this.heartbeat && !this.heartbeat.running) {
      this.heartbeat.start();
    }
    let session: Session;
    try {
      session = await this.supervisor.waitForLive();
    } catch (err) {
      this.heartbeat?.stop();
      throw err;
    }
    log.info({ serverUri: session.serverUri, username: session.username }, "Rocket.Chat bridge connected");
  }

  /** Reports unsent messages as failed, then closes the stream and logs out. */
  async disconnect(): Promise<void> {
    this.heartbeat?.stop();
    await this.dispatcher.close();
    await this.supervisor.stop();
    log.info("Rocket.Chat bridge disconnected");
  }

  onMessage(handler: MessageHandler): void {
    this.handlers.push(handler);
  }

  send(roomId: string, content: SendContent): DeliveryTicket {
    return this.dispatcher.enqueue({ roomId, ...toContent(content) });
  }

  sendDirect(username: string, content: SendContent): DeliveryTicket {
    return this.dispatcher.enqueue({ username: username.trim().replace(/^@/, ""), ...toContent(content) });
  }

  reply(message: CanonicalMessage, content: SendContent): DeliveryTicket {
    const body = toContent(content);
    return this.dispatcher.enqueue({
      roomId: message.room.roomId,
      ...body,
      threadId: body.threadId ?? message.threadId,
    });
  }

  resolveUser(userId: string): Promise<RemoteIdentity> {
    return this.identities.resolveUser(userId);
  }

  resolveRoom(roomId: string): Promise<RemoteRoom> {
    return this.identities.resolveRoom(roomId);
  }

  async displayName(userId: string): Promise<string> {
    const identity = await this.identities.resolveUser(userId);
    return identity.displayName;
  }

  /** Whether the user is listed in BOT_ADMINS (matched by username, with or without "@"). */
  isAdmin(identity: RemoteIdentity | string): boolean {
    const username = typeof identity === "string" ? identity : identity.username;
    return this.admins.has(normalizeUsername(username));
  }

  /** Registers the hook run every `heartbeat.intervalSec` while live; needs HEARTBEAT_ENABLED. */
  onHeartbeat(fn: HeartbeatFn): void {
    if (!this.config.heartbeat.enabled) {
      log.warn("Heartbeat hook ignored, HEARTBEAT_ENABLED is off");
      return;
    }
    const wasRunning = this.heartbeat?.running ?? false;
    this.heartbeat?.stop();
    this.heartbeat = new Heartbeat(fn, this.config.heartbeat.intervalSec, () => this.isLive());
    if (wasRunning) this.heartbeat.start();
  }

  onStateChange(listener: StateListener): void {
    this.supervisor.onStateChange(listener);
  }

  onPresence(listener: PresenceListener): void {
    this.presenceListeners.push(listener);
  }

  onDeliveryFailure(listener: DeliveryFailureListener): void {
    this.dispatcher.onDeliveryFailure(listener);
  }

  get state(): ConnectionState {
    return this.supervisor.currentState;
  }

  get heartbeatRunning(): boolean {
    return this.heartbeat?.running ?? false;
  }

  isLive(): boolean {
    return this.supervisor.currentState === "live";
  }

  /** The bot's own identity, once logged in */
  get self(): RemoteIdentity | null {
    const session = this.supervisor.current();
    if (!session) return null;
    return this.identities.peekUser(session.userId) ?? {
      userId: session.userId,
      username: session.username,
      displayName: session.username,
    };
  }

  private async dispatchInbound(message: CanonicalMessage): Promise<void> {
    for (const handler of this.handlers) {
      try {
        await handler(message);
      } catch (err) {
        log.error({ err, messageId: message.id }, "Message handler failed");
      }
    }
  }

  /** Identity lookups run against the live session; an expired token is reported to the supervisor. */
  private async withSession<T>(call: (session: Session) => Promise<T>): Promise<T> {
    const session = this.supervisor.current();
    if (!session) {
      throw new NetworkError("Not connected to Rocket.Chat");
    }
    try {
      return await call(session);
    } catch (err) {
      if (err instanceof SessionExpiredError) {
        this.supervisor.reportSessionExpired(session);
      }
      throw err;
    }
  }

  private updatePresence(state: ConnectionState): void {
    const next: PresenceStatus = state === "live" ? "online" : "offline";
    if (next === this.presence) return;
    this.presence = next;
    log.info({ presence: next }, next === "online" ? "Bot is online" : "Bot is offline");
    for (const listener of this.presenceListeners) {
      try {
        listener(next);
      } catch (err) {
        log.error({ err }, "Presence listener failed");
      }
    }
  }
}

function toContent(content: SendContent): OutboundContent {
  return typeof content === "string" ? { body: content } : content;
}

function normalizeUsername(username: string): string {
  return username.trim().replace(/^@/, "").toLowerCase();
}
