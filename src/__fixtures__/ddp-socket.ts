import { z } from "zod";
import type { DdpSocket, SocketFactory } from "../channels/rocketchat/ddp.js";

const frameSchema = z
  .object({
    msg: z.string(),
    id: z.string().optional(),
    method: z.string().optional(),
    name: z.string().optional(),
    params: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type SentFrame = z.infer<typeof frameSchema>;

/**
 * Socket double for DdpConnection. Records what the client sends and lets the test
 * play the server side.
 */
export class ScriptedSocket implements DdpSocket {
  readonly sent: SentFrame[] = [];
  closed = false;
  /** Called for every frame the client sends; use it to answer like a server */
  respond: ((frame: SentFrame, socket: ScriptedSocket) => void) | null = null;

  private openListener: (() => void) | null = null;
  private messageListener: ((data: string) => void) | null = null;
  private closeListener: ((code: number, reason: string) => void) | null = null;
  private errorListener: ((err: Error) => void) | null = null;

  send(data: string): void {
    const frame = frameSchema.parse(JSON.parse(data));
    this.sent.push(frame);
    this.respond?.(frame, this);
  }

  close(): void {
    this.closed = true;
  }

  onOpen(listener: () => void): void {
    this.openListener = listener;
  }

  onMessage(listener: (data: string) => void): void {
    this.messageListener = listener;
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.closeListener = listener;
  }

  onError(listener: (err: Error) => void): void {
    this.errorListener = listener;
  }

  open(): void {
    this.openListener?.();
  }

  /** Deliver a server frame to the client */
  receive(frame: Record<string, unknown>): void {
    this.messageListener?.(JSON.stringify(frame));
  }

  receiveRaw(data: string): void {
    this.messageListener?.(data);
  }

  serverClose(code: number, reason = ""): void {
    this.closeListener?.(code, reason);
  }

  fail(err: Error): void {
    this.errorListener?.(err);
  }
}

/**
 * A server that accepts the handshake, the resume login and every subscription.
 * Overrides answer specific methods or subscriptions differently.
 */
export function cooperativeServer(
  overrides: {
    login?: (frame: SentFrame, socket: ScriptedSocket) => void;
    subscription?: (frame: SentFrame, socket: ScriptedSocket) => void;
  } = {},
): (frame: SentFrame, socket: ScriptedSocket) => void {
  return (frame, socket) => {
    switch (frame.msg) {
      case "connect":
        socket.receive({ msg: "connected", session: "sess-1" });
        break;
      case "method":
        if (frame.method === "login" && overrides.login) {
          overrides.login(frame, socket);
        } else {
          socket.receive({ msg: "result", id: frame.id, result: { id: "bot-id", token: "test-token" } });
        }
        break;
      case "sub":
        if (overrides.subscription) {
          overrides.subscription(frame, socket);
        } else {
          socket.receive({ msg: "ready", subs: [frame.id] });
        }
        break;
    }
  };
}

/** Factory that hands out the given socket and opens it on the next tick */
export function factoryFor(socket: ScriptedSocket, urls: string[] = []): SocketFactory {
  return (url) => {
    urls.push(url);
    queueMicrotask(() => socket.open());
    return socket;
  };
}
