import WebSocket from "ws";
import { z } from "zod";
import type { RawEvent } from "../../core/types.js";
import { StreamError } from "../../utils/errors.js";
import { createChildLogger } from "../../utils/logger.js";

const log = createChildLogger("rocketchat-ddp");

/** The slice of a WebSocket the DDP connection needs */
export interface DdpSocket {
  send(data: string): void;
  close(): void;
  onOpen(listener: () => void): void;
  onMessage(listener: (data: string) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  onError(listener: (err: Error) => void): void;
}

export type SocketFactory = (url: string) => DdpSocket;

export const openWebSocket: SocketFactory = (url) => {
  const ws = new WebSocket(url);
  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
    onOpen: (listener) => {
      ws.on("open", listener);
    },
    onMessage: (listener) => {
      ws.on("message", (data: WebSocket.RawData) => listener(data.toString()));
    },
    onClose: (listener) => {
      ws.on("close", (code: number, reason: Buffer) => listener(code, reason.toString()));
    },
    onError: (listener) => {
      ws.on("error", listener);
    },
  };
};

export interface DdpOptions {
  socketFactory?: SocketFactory;
  /** Client ping period; 0 disables keep-alive checking */
  pingIntervalMs: number;
  /** Budget for the connect handshake and each method/subscription round trip */
  timeoutMs: number;
}

const frameSchema = z
  .object({
    msg: z.string(),
    id: z.string().optional(),
  })
  .passthrough();

const errorSchema = z
  .object({
    error: z.union([z.string(), z.number()]).optional(),
    reason: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

const resultFrameSchema = z.object({
  id: z.string(),
  result: z.unknown().optional(),
  error: errorSchema.optional(),
});

const readyFrameSchema = z.object({ subs: z.array(z.string()) });

const nosubFrameSchema = z.object({ id: z.string(), error: errorSchema.optional() });

const collectionFrameSchema = z.object({
  collection: z.string(),
  fields: z
    .object({
      eventName: z.string().optional(),
      args: z.array(z.unknown()).optional(),
    })
    .passthrough()
    .optional(),
});

/** Error object returned by a DDP method or subscription */
export class DdpCallError extends StreamError {
  constructor(
    message: string,
    public readonly errorCode: string | number | undefined,
  ) {
    super(message);
    this.name = "DdpCallError";
  }
}

interface PendingCall {
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * A Meteor DDP connection (protocol version 1) carrying Rocket.Chat's real-time streams.
 *
 * Consumed as an async iterable of RawEvent, one per entry of a collection frame's
 * `args`. Iteration ends when the connection closes; it throws if the connection
 * failed (keep-alive timeout, subscription revoked).
 */
export class DdpConnection implements AsyncIterable<RawEvent> {
  private readonly socket: DdpSocket;
  private readonly pending = new Map<string, PendingCall>();
  private readonly buffer: RawEvent[] = [];
  private readonly subscriptions = new Set<string>();
  private wake: (() => void) | null = null;
  private nextId = 1;
  private closed = false;
  private failure: StreamError | null = null;
  private lastHeard = Date.now();
  private keepAlive: NodeJS.Timeout | null = null;
  private handshake: { resolve: () => void; reject: (err: Error) => void } | null = null;

  private constructor(
    private readonly url: string,
    private readonly options: DdpOptions,
  ) {
    const factory = options.socketFactory ?? openWebSocket;
    this.socket = factory(url);
  }

  /** Opens the socket and completes the DDP connect handshake. */
  static async open(url: string, options: DdpOptions): Promise<DdpConnection> {
    const connection = new DdpConnection(url, options);
    await connection.connect();
    return connection;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Invoke a server method and wait for its result. */
  call(method: string, params: unknown[]): Promise<unknown> {
    const id = this.allocateId();
    return this.roundTrip(id, { msg: "method", method, params, id }, `method ${method}`);
  }

  /** Subscribe to a publication and wait until the server reports it ready. */
  async subscribe(name: string, params: unknown[]): Promise<void> {
    const id = this.allocateId();
    await this.roundTrip(id, { msg: "sub", id, name, params }, `subscription ${name}`);
    this.subscriptions.add(id);
  }

  close(): void {
    if (this.closed) return;
    this.finish(null);
    this.socket.close();
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

  private connect(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.handshake = null;
        reject(new StreamError(`DDP handshake with ${this.url} timed out`));
        this.close();
      }, this.options.timeoutMs);

      this.handshake = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };

      this.socket.onOpen(() => {
        this.send({ msg: "connect", version: "1", support: ["1"] });
      });
      this.socket.onMessage((data) => this.handleFrame(data));
      this.socket.onClose((code, reason) => {
        log.debug({ code, reason }, "DDP socket closed");
        this.finish(this.closed ? null : new StreamError(`Stream closed by server (code ${code}${reason ? `: ${reason}` : ""})`));
      });
      this.socket.onError((err) => {
        log.warn({ err }, "DDP socket error");
        this.finish(new StreamError(`Stream transport error: ${err.message}`, err));
      });
    });
  }

  private handleFrame(data: string): void {
    this.lastHeard = Date.now();

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      log.warn({ err }, "Ignoring non-JSON DDP frame");
      return;
    }

    const frame = frameSchema.safeParse(json);
    if (!frame.success) {
      // The server greets with {server_id: "0"} before speaking DDP
      return;
    }

    switch (frame.data.msg) {
      case "connected":
        this.onConnected();
        break;
      case "failed":
        this.handshake?.reject(new StreamError("Server refused DDP protocol version 1"));
        this.handshake = null;
        this.close();
        break;
      case "ping":
        this.send(frame.data.id ? { msg: "pong", id: frame.data.id } : { msg: "pong" });
        break;
      case "pong":
        break;
      case "result":
        this.onResult(json);
        break;
      case "ready":
        this.onReady(json);
        break;
      case "nosub":
        this.onNosub(json);
        break;
      case "added":
      case "changed":
        this.onCollection(json);
        break;
      case "error":
        log.warn({ frame: json }, "DDP protocol error reported by server");
        break;
      default:
        log.trace({ msg: frame.data.msg }, "Unhandled DDP frame");
    }
  }

  private onConnected(): void {
    this.handshake?.resolve();
    this.handshake = null;
    this.startKeepAlive();
    log.debug({ url: this.url }, "DDP connected");
  }

  private onResult(json: unknown): void {
    const frame = resultFrameSchema.safeParse(json);
    if (!frame.success) return;
    const call = this.takePending(frame.data.id);
    if (!call) return;
    if (frame.data.error) {
      call.reject(toCallError(frame.data.error));
    } else {
      call.resolve(frame.data.result);
    }
  }

  private onReady(json: unknown): void {
    const frame = readyFrameSchema.safeParse(json);
    if (!frame.success) return;
    for (const id of frame.data.subs) {
      this.takePending(id)?.resolve(undefined);
    }
  }

  private onNosub(json: unknown): void {
    const frame = nosubFrameSchema.safeParse(json);
    if (!frame.success) return;
    const error = frame.data.error ? toCallError(frame.data.error) : new DdpCallError("Subscription stopped", undefined);

    const call = this.takePending(frame.data.id);
    if (call) {
      call.reject(error);
      return;
    }
    if (this.subscriptions.delete(frame.data.id)) {
      log.warn({ subscription: frame.data.id }, "Server revoked a live subscription");
      this.finish(error);
      this.socket.close();
    }
  }

  private onCollection(json: unknown): void {
    const frame = collectionFrameSchema.safeParse(json);
    if (!frame.success) return;
    const eventName = frame.data.fields?.eventName ?? "";
    const receivedAt = Date.now();
    for (const payload of frame.data.fields?.args ?? []) {
      this.buffer.push({ collection: frame.data.collection, eventName, payload, receivedAt });
    }
    this.notify();
  }

  private roundTrip(id: string, frame: Record<string, unknown>, what: string): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(this.failure ?? new StreamError(`Cannot start ${what}: stream closed`));
    }
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new StreamError(`${what} timed out`));
      }, this.options.timeoutMs);
      this.pending.set(id, { resolve, reject, timer });
      this.send(frame);
    });
  }

  private takePending(id: string): PendingCall | undefined {
    const call = this.pending.get(id);
    if (!call) return undefined;
    clearTimeout(call.timer);
    this.pending.delete(id);
    return call;
  }

  private startKeepAlive(): void {
    const interval = this.options.pingIntervalMs;
    if (interval <= 0) return;
    this.lastHeard = Date.now();
    this.keepAlive = setInterval(() => {
      if (Date.now() - this.lastHeard > interval * 2) {
        log.warn({ silentMs: Date.now() - this.lastHeard }, "DDP keep-alive timed out");
        this.finish(new StreamError("Keep-alive timed out"));
        this.socket.close();
        return;
      }
      this.send({ msg: "ping", id: this.allocateId() });
    }, interval);
    this.keepAlive.unref();
  }

  /** Marks the connection closed, fails outstanding calls and wakes the reader. */
  private finish(failure: StreamError | null): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = failure;

    if (this.keepAlive) {
      clearInterval(this.keepAlive);
      this.keepAlive = null;
    }

    const reason = failure ?? new StreamError("Stream closed");
    this.handshake?.reject(reason);
    this.handshake = null;
    for (const [id, call] of this.pending) {
      clearTimeout(call.timer);
      call.reject(reason);
      this.pending.delete(id);
    }
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private send(frame: Record<string, unknown>): void {
    if (this.closed) return;
    this.socket.send(JSON.stringify(frame));
  }

  private allocateId(): string {
    return String(this.nextId++);
  }
}

function toCallError(error: z.infer<typeof errorSchema>): DdpCallError {
  const message = error.reason ?? error.message ?? (error.error !== undefined ? String(error.error) : "unknown error");
  return new DdpCallError(message, error.error);
}
