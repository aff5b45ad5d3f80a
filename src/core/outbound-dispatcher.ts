import type { EventTranslator } from "../channels/rocketchat/translator.js";
import type { WireClient } from "../channels/rocketchat/wire-client.js";
import { DeliveryFailure, NetworkError, SessionExpiredError, describeError } from "../utils/errors.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { sleep as defaultSleep, type Sleeper } from "./backoff.js";
import { KeyedQueue } from "./keyed-queue.js";
import type { CanonicalMessage, OutboundMessage, PendingSend, Session } from "./types.js";

export type DeliveryResult =
  | { status: "sent"; messageIds: string[] }
  | { status: "failed"; error: DeliveryFailure };

export interface DeliveryTicket {
  id: string;
  /** Settles once: every chunk acknowledged, or a permanent failure. Never rejects. */
  delivered: Promise<DeliveryResult>;
}

export type DeliveryFailureListener = (send: PendingSend, failure: DeliveryFailure) => void;

/** What the dispatcher needs from the session owner */
export interface SessionSource {
  waitForLive(signal?: AbortSignal): Promise<Session>;
  reportSessionExpired(session: Session): void;
}

export interface DispatcherOptions {
  maxAttempts: number;
  retryDelayMs: number;
  minIntervalMs: number;
  maxQueueSize: number;
  sleep?: Sleeper;
  now?: () => number;
  logger?: Logger;
}

interface Entry {
  send: PendingSend;
  /** Resolved direct-message room for username targets */
  roomId?: string;
  settled: boolean;
  resolve: (result: DeliveryResult) => void;
}

/**
 * Sends bot messages in the background.
 *
 * Sends to one target go out in enqueue order; different targets do not wait for
 * each other. Transient failures retry with linear backoff. An expired session
 * does not count as an attempt: the send waits until the supervisor is live again.
 */
export class OutboundDispatcher {
  private readonly log: Logger;
  private readonly sleep: Sleeper;
  private readonly now: () => number;
  private readonly queue = new KeyedQueue();
  private readonly pending = new Map<string, Entry>();
  private readonly failureListeners: DeliveryFailureListener[] = [];
  private readonly abort = new AbortController();
  private nextSlotAt = 0;
  private sequence = 0;
  private closed = false;

  constructor(
    private readonly wire: WireClient,
    private readonly translator: EventTranslator,
    private readonly sessions: SessionSource,
    private readonly options: DispatcherOptions,
  ) {
    this.log = options.logger ?? createChildLogger("outbound");
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  onDeliveryFailure(listener: DeliveryFailureListener): void {
    this.failureListeners.push(listener);
  }

  /** Sends waiting or in flight */
  get size(): number {
    return this.pending.size;
  }

  enqueue(message: OutboundMessage | CanonicalMessage): DeliveryTicket {
    const send: PendingSend = {
      id: `send-${++this.sequence}`,
      message,
      attempts: 0,
      enqueuedAt: this.now(),
      chunksSent: 0,
      messageIds: [],
    };

    let resolve: (result: DeliveryResult) => void = () => {};
    const delivered = new Promise<DeliveryResult>((r) => {
      resolve = r;
    });
    const entry: Entry = { send, settled: false, resolve };

    if (this.closed) {
      this.fail(entry, new DeliveryFailure("Dispatcher is closed", 0));
    } else if (this.pending.size >= this.options.maxQueueSize) {
      this.fail(entry, new DeliveryFailure(`Outbound queue full (${this.options.maxQueueSize} pending)`, 0));
    } else {
      this.pending.set(send.id, entry);
      this.queue.push(targetKey(message), () => this.deliver(entry));
      this.log.debug({ sendId: send.id, target: targetKey(message) }, "Send queued");
    }

    return { id: send.id, delivered };
  }

  /** Fails everything still queued, then waits for in-flight sends to wind down. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.abort.abort();

    const abandoned = [...this.pending.values()];
    for (const entry of abandoned) {
      this.fail(entry, new DeliveryFailure("Bridge shut down before the message was sent", entry.send.attempts));
    }
    if (abandoned.length > 0) {
      this.log.warn({ count: abandoned.length }, "Outbound sends reported failed at shutdown");
    }
    await this.queue.idle();
  }

  private async deliver(entry: Entry): Promise<void> {
    const { send } = entry;
    const signal = this.abort.signal;

    try {
      while (!entry.settled) {
        if (this.closed) {
          throw new DeliveryFailure("Bridge shut down before the message was sent", send.attempts);
        }
        const session = await this.sessions.waitForLive(signal);

        try {
          await this.transmit(session, entry);
          this.succeed(entry);
          return;
        } catch (err) {
          if (err instanceof SessionExpiredError) {
            this.log.info({ sendId: send.id }, "Session expired during send, waiting for reconnect");
            this.sessions.reportSessionExpired(session);
            continue;
          }
          if (!(err instanceof NetworkError)) {
            throw new DeliveryFailure(`Message rejected: ${describeError(err)}`, send.attempts + 1, err);
          }

          send.attempts++;
          if (send.attempts >= this.options.maxAttempts) {
            throw new DeliveryFailure(
              `Giving up after ${send.attempts} attempts: ${describeError(err)}`,
              send.attempts,
              err,
            );
          }
          const delay = this.options.retryDelayMs * send.attempts;
          this.log.warn({ sendId: send.id, attempt: send.attempts, delayMs: delay, reason: err.message }, "Send failed, retrying");
          await this.sleep(delay, signal);
        }
      }
    } catch (err) {
      const failure =
        err instanceof DeliveryFailure ? err : new DeliveryFailure(`Send failed: ${describeError(err)}`, send.attempts, err);
      this.fail(entry, failure);
    }
  }

  /** Sends the chunks not yet acknowledged, so a retry never repeats one. */
  private async transmit(session: Session, entry: Entry): Promise<void> {
    const { send } = entry;
    const roomId = entry.roomId ?? (await this.resolveRoom(session, send.message));
    entry.roomId = roomId;

    const requests = this.translator.translateOutbound(send.message, roomId);
    for (let index = send.chunksSent; index < requests.length; index++) {
      await this.throttle();
      const result = await this.wire.sendMessage(session, requests[index]);
      send.chunksSent++;
      send.messageIds.push(result.messageId);
    }
  }

  private async resolveRoom(session: Session, message: OutboundMessage | CanonicalMessage): Promise<string> {
    if ("room" in message) return message.room.roomId;
    if ("roomId" in message) return message.roomId;
    const roomId = await this.wire.openDirectRoom(session, message.username);
    this.log.debug({ username: message.username, roomId }, "Direct room opened");
    return roomId;
  }

  /** Reserves the next transmission slot, spaced minIntervalMs apart across all targets. */
  private async throttle(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.options.minIntervalMs;
    if (slot > now) {
      await this.sleep(slot - now, this.abort.signal);
    }
  }

  private succeed(entry: Entry): void {
    if (entry.settled) return;
    entry.settled = true;
    this.pending.delete(entry.send.id);
    this.log.debug({ sendId: entry.send.id, chunks: entry.send.chunksSent }, "Message delivered");
    entry.resolve({ status: "sent", messageIds: [...entry.send.messageIds] });
  }

  private fail(entry: Entry, failure: DeliveryFailure): void {
    if (entry.settled) return;
    entry.settled = true;
    this.pending.delete(entry.send.id);
    this.log.error({ sendId: entry.send.id, attempts: failure.attempts, reason: failure.message }, "Message delivery failed");
    entry.resolve({ status: "failed", error: failure });

    for (const listener of this.failureListeners) {
      try {
        listener(entry.send, failure);
      } catch (err) {
        this.log.error({ err }, "Delivery failure listener threw");
      }
    }
  }
}

function targetKey(message: OutboundMessage | CanonicalMessage): string {
  if ("room" in message) return message.room.roomId;
  if ("roomId" in message) return message.roomId;
  return `@${message.username}`;
}
