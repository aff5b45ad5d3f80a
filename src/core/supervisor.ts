import type { EventTranslator, InboundResult } from "../channels/rocketchat/translator.js";
import type { EventStream, WireClient } from "../channels/rocketchat/wire-client.js";
import { AuthError, BridgeError, SessionExpiredError, describeError } from "../utils/errors.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { backoffDelay, sleep as defaultSleep, type Sleeper } from "./backoff.js";
import { StreamCursor } from "./cursor.js";
import { RecentIds } from "./recent-ids.js";
import type { CanonicalMessage, ConnectionState, Credentials, RawEvent, Session } from "./types.js";

export type InboundHandler = (message: CanonicalMessage) => Promise<void>;
export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;

export interface SupervisorOptions {
  credentials: Credentials;
  reconnect: {
    enabled: boolean;
    initialDelayMs: number;
    maxDelayMs: number;
  };
  sleep?: Sleeper;
  /** How long a delivered message id is remembered for duplicate suppression */
  dedupWindowMs?: number;
  logger?: Logger;
}

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ["authenticating"],
  authenticating: ["subscribing", "reconnecting", "disconnected"],
  subscribing: ["live", "reconnecting", "disconnected"],
  live: ["reconnecting", "disconnected"],
  reconnecting: ["authenticating"],
  "shutting-down": [],
};

/** Messages of one room may be stamped slightly out of broadcast order */
const REORDER_TOLERANCE_MS = 2_000;

interface LiveWaiter {
  resolve: (session: Session) => void;
  reject: (err: Error) => void;
}

/**
 * Owns the one Session of the process and the connect → subscribe → live → reconnect loop.
 *
 * Inbound events are handled one at a time: translated, checked against recently
 * delivered ids, then handed to the inbound handler, which is awaited before the
 * next event is pulled. Other components never hold the Session; they read a
 * snapshot through `current()` or `waitForLive()`.
 */
export class SessionSupervisor {
  private readonly log: Logger;
  private readonly sleep: Sleeper;
  private readonly recent: RecentIds;
  readonly cursor = new StreamCursor();

  private state: ConnectionState = "disconnected";
  private session: Session | null = null;
  private stream: EventStream | null = null;
  private attempt = 0;
  private expired = false;
  private lastError: unknown = null;
  private carryOver: RawEvent[] = [];
  private handler: InboundHandler | null = null;
  private readonly listeners: StateListener[] = [];
  private waiters: LiveWaiter[] = [];
  private abort = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly wire: WireClient,
    private readonly translator: EventTranslator,
    private readonly options: SupervisorOptions,
  ) {
    this.log = options.logger ?? createChildLogger("supervisor");
    this.sleep = options.sleep ?? defaultSleep;
    this.recent = new RecentIds(options.dedupWindowMs);
  }

  onMessage(handler: InboundHandler): void {
    this.handler = handler;
  }

  onStateChange(listener: StateListener): void {
    this.listeners.push(listener);
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  /** Snapshot of the current session, or null before the first login. */
  current(): Session | null {
    return this.session;
  }

  /** Starts the lifecycle loop. Calling it while the loop runs is a no-op. */
  start(): void {
    if (this.loop || this.state === "shutting-down") return;
    this.loop = this.run()
      .catch((err: unknown) => {
        this.lastError = err;
        this.log.error({ err }, "Supervisor loop crashed");
        this.rejectWaiters(this.notRunningError());
      })
      .finally(() => {
        this.loop = null;
      });
  }

  /**
   * Resolves with the session once the supervisor is live. Rejects when the
   * supervisor stops or gives up, or when the signal aborts.
   */
  waitForLive(signal?: AbortSignal): Promise<Session> {
    if (this.state === "live" && this.session && !this.expired) {
      return Promise.resolve(this.session);
    }
    if (this.state === "shutting-down") {
      return Promise.reject(shutdownError());
    }
    if (!this.loop) {
      return Promise.reject(this.notRunningError());
    }
    if (signal?.aborted) {
      return Promise.reject(new BridgeError("Wait for live session aborted", "ABORTED"));
    }

    return new Promise<Session>((resolve, reject) => {
      const waiter: LiveWaiter = {
        resolve: (session) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(session);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new BridgeError("Wait for live session aborted", "ABORTED"));
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Any component that got SessionExpired from the server reports it here with the
   * session it used. Reports about an older session are ignored.
   */
  reportSessionExpired(session: Session): void {
    const current = this.session;
    if (!current || current.authToken !== session.authToken || current.establishedAt !== session.establishedAt) {
      return;
    }
    if (this.expired || this.state !== "live") return;

    this.expired = true;
    this.log.warn({ userId: session.userId }, "Session expired, re-authenticating");
    this.stream?.close();
  }

  /**
   * Interrupts any pending stream read or backoff wait, closes the stream, logs out
   * best-effort and ends in `shutting-down`.
   */
  async stop(): Promise<void> {
    if (this.state === "shutting-down") return;

    this.abort.abort();
    this.stream?.close();
    this.transition("shutting-down");
    this.rejectWaiters(shutdownError());

    if (this.loop) {
      await this.loop;
    }

    const session = this.session;
    this.session = null;
    if (session) {
      try {
        await this.wire.logout(session);
        this.log.debug({ userId: session.userId }, "Logged out");
      } catch (err) {
        this.log.debug({ reason: describeError(err) }, "Logout failed during shutdown");
      }
    }
    this.log.info("Supervisor stopped");
  }

  private async run(): Promise<void> {
    const signal = this.abort.signal;
    this.transition("authenticating");

    while (!signal.aborted) {
      await this.connectOnce(signal);
      if (signal.aborted) break;

      if (!this.options.reconnect.enabled) {
        this.transition("disconnected");
        this.rejectWaiters(this.notRunningError());
        this.log.warn("Connection lost and reconnect is disabled; staying disconnected");
        return;
      }

      this.transition("reconnecting");
      const delay = backoffDelay(this.attempt, this.options.reconnect);
      this.attempt++;
      this.log.info({ attempt: this.attempt, delayMs: delay }, "Reconnecting after backoff");
      await this.sleep(delay, signal);
      if (signal.aborted) break;
      this.transition("authenticating");
    }
  }

  /** One pass from authentication to the end of the live stream. Never throws. */
  private async connectOnce(signal: AbortSignal): Promise<void> {
    let session: Session;
    try {
      session = await this.wire.authenticate(this.options.credentials);
    } catch (err) {
      this.noteFailure("authenticate", err);
      return;
    }
    if (signal.aborted) {
      await this.discard(session);
      return;
    }

    this.session = session;
    this.expired = false;
    this.translator.setSelf(session.userId);
    this.transition("subscribing");

    let stream: EventStream;
    try {
      stream = await this.wire.openStream(this.requireSession());
    } catch (err) {
      this.noteFailure("subscribe", err);
      return;
    }
    if (signal.aborted) {
      stream.close();
      return;
    }

    this.stream = stream;
    this.attempt = 0;
    this.lastError = null;
    this.transition("live");
    this.log.info({ userId: session.userId, username: session.username }, "Bridge is live");
    this.resolveWaiters();

    try {
      await this.consume(stream, signal);
    } finally {
      stream.close();
      this.stream = null;
    }
  }

  private async consume(stream: EventStream, signal: AbortSignal): Promise<void> {
    try {
      await this.replay();
      for await (const event of stream) {
        if (signal.aborted) return;
        await this.process(event);
      }
      if (!signal.aborted && !this.expired) {
        this.log.warn("Event stream ended");
      }
    } catch (err) {
      if (signal.aborted) return;
      if (err instanceof SessionExpiredError) {
        this.expired = true;
        this.log.warn({ reason: err.message }, "Session expired while handling an event");
        return;
      }
      this.noteFailure("stream", err);
    }
  }

  /** Events held back by a session expiry, then missed room history when the server supports it. */
  private async replay(): Promise<void> {
    const held = this.carryOver;
    this.carryOver = [];
    for (const [index, event] of held.entries()) {
      try {
        await this.process(event);
      } catch (err) {
        // Keep the rest for the next session
        this.carryOver.push(...held.slice(index + 1));
        throw err;
      }
    }

    if (!this.wire.capabilities.resumableStream) return;

    const session = this.requireSession();
    for (const { roomId, since } of this.cursor.positions()) {
      let events: RawEvent[];
      try {
        events = await this.wire.fetchRoomHistory(session, roomId, since);
      } catch (err) {
        if (err instanceof SessionExpiredError) throw err;
        this.log.warn({ roomId, reason: describeError(err) }, "Could not replay room history, messages may be missing");
        continue;
      }
      if (events.length > 0) {
        this.log.info({ roomId, count: events.length }, "Replaying missed messages");
      }
      for (const event of events) {
        await this.process(event);
      }
    }
  }

  /** Logs out a session that stop() overtook before it was ever used. */
  private async discard(session: Session): Promise<void> {
    try {
      await this.wire.logout(session);
      this.log.debug({ userId: session.userId }, "Logged out session obtained during shutdown");
    } catch (err) {
      this.log.debug({ reason: describeError(err) }, "Logout failed during shutdown");
    }
  }

  private async process(event: RawEvent): Promise<void> {
    let result: InboundResult;
    try {
      result = await this.translator.translateInbound(event);
    } catch (err) {
      if (err instanceof SessionExpiredError) {
        this.carryOver.push(event);
      }
      throw err;
    }

    if (result.kind === "ignored") {
      this.log.trace({ collection: event.collection, reason: result.reason }, "Event ignored");
      return;
    }

    const message = result.message;
    if (this.recent.has(message.id)) {
      this.log.debug({ messageId: message.id }, "Duplicate message suppressed");
      return;
    }
    const position = this.cursor.position(message.room.roomId);
    if (position && message.timestamp.getTime() < position.getTime() - REORDER_TOLERANCE_MS) {
      this.log.debug(
        { messageId: message.id, roomId: message.room.roomId, timestamp: message.timestamp.toISOString() },
        "Message older than the room position suppressed",
      );
      return;
    }
    this.recent.add(message.id);

    if (this.handler) {
      try {
        await this.handler(message);
      } catch (err) {
        this.log.error({ err, messageId: message.id, roomId: message.room.roomId }, "Inbound handler failed");
      }
    }
    this.cursor.advance(message.room.roomId, message.timestamp);
  }

  private noteFailure(phase: "authenticate" | "subscribe" | "stream", err: unknown): void {
    this.lastError = err;
    const level = this.attempt < 3 ? "info" : this.attempt < 6 ? "warn" : "error";

    if (err instanceof AuthError) {
      // Retried like any other failure, but persistent rejection needs an operator
      this.log[level === "info" ? "warn" : level](
        { attempt: this.attempt, reason: err.message },
        "Server rejected the bot credentials",
      );
      return;
    }
    this.log[level]({ attempt: this.attempt, phase, reason: describeError(err) }, "Connection attempt failed");
  }

  private transition(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next || previous === "shutting-down") return;
    if (next !== "shutting-down" && !TRANSITIONS[previous].includes(next)) {
      throw new BridgeError(`Illegal state transition ${previous} -> ${next}`, "ILLEGAL_TRANSITION");
    }

    this.state = next;
    if (this.session) {
      const replaced: Session = { ...this.session, state: next };
      this.session = Object.freeze(replaced);
    }
    this.log.debug({ from: previous, to: next }, "State changed");

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        this.log.error({ err }, "State listener failed");
      }
    }
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new BridgeError("No session", "NO_SESSION");
    }
    return this.session;
  }

  private resolveWaiters(): void {
    const session = this.requireSession();
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.resolve(session);
  }

  private rejectWaiters(err: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(err);
  }

  private notRunningError(): Error {
    const reason = this.lastError === null ? "not started" : describeError(this.lastError);
    return new BridgeError(`Bridge is not connected (${reason})`, "NOT_CONNECTED", this.lastError);
  }
}

function shutdownError(): BridgeError {
  return new BridgeError("Bridge is shutting down", "SHUTTING_DOWN");
}
