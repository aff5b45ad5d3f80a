import { z } from "zod";
import type { IdentityMapper } from "../../core/identity-mapper.js";
import type {
  CanonicalMessage,
  MessageAttachment,
  OutboundMessage,
  RawEvent,
  WireAttachment,
  WireSendRequest,
} from "../../core/types.js";
import { SessionExpiredError, TranslationError, describeError } from "../../utils/errors.js";
import { createChildLogger, type Logger } from "../../utils/logger.js";
import { MESSAGE_STREAM, NOTIFY_LOGGED_STREAM, USER_NAME_CHANGED } from "./wire-client.js";

export type InboundResult =
  | { kind: "message"; message: CanonicalMessage }
  | { kind: "ignored"; reason: string };

export interface TranslatorOptions {
  /** Server-side limit for one message body; longer bodies are split */
  maxMessageLength: number;
  logger?: Logger;
}

/** Dates arrive as EJSON ({$date}) on the stream and as ISO strings over REST */
const timestampSchema = z.union([
  z.object({ $date: z.number() }).transform((value) => new Date(value.$date)),
  z.string().transform((value) => new Date(value)),
  z.number().transform((value) => new Date(value)),
]);

const wireMessageSchema = z
  .object({
    _id: z.string(),
    rid: z.string().min(1).optional(),
    msg: z.string().default(""),
    ts: timestampSchema.optional(),
    u: z
      .object({
        _id: z.string().min(1),
        username: z.string().optional(),
        name: z.string().optional(),
      })
      .passthrough()
      .optional(),
    tmid: z.string().optional(),
    t: z.string().optional(),
    editedAt: z.unknown().optional(),
    _updatedAt: timestampSchema.optional(),
    reactions: z.unknown().optional(),
    pinned: z.boolean().optional(),
    tcount: z.number().optional(),
    tlm: z.unknown().optional(),
  })
  .passthrough();

type WireMessage = z.infer<typeof wireMessageSchema>;

/** A first broadcast is written in one go; a later _updatedAt means the document changed since */
const UPDATE_SLACK_MS = 2_000;

/**
 * Rocket.Chat re-broadcasts a stored message whenever its document changes
 * (reactions, pins, thread counters on the parent).
 */
function isRebroadcast(wire: WireMessage): boolean {
  if (wire.reactions !== undefined || wire.pinned === true) return true;
  if (wire.tcount !== undefined || wire.tlm !== undefined) return true;
  if (wire._updatedAt && wire.ts) {
    return wire._updatedAt.getTime() - wire.ts.getTime() > UPDATE_SLACK_MS;
  }
  return false;
}

const renamedUserSchema = z.object({ _id: z.string() }).passthrough();

function ignored(reason: string): InboundResult {
  return { kind: "ignored", reason };
}

/**
 * Maps Rocket.Chat wire payloads to CanonicalMessage and back.
 *
 * Inbound translation never throws for a bad event: anything it cannot turn into a
 * fully resolved message comes back as `ignored`. The one exception is
 * SessionExpiredError, which the supervisor uses to retry the event after reconnecting.
 */
export class EventTranslator {
  private readonly log: Logger;
  private selfUserId: string | null = null;

  constructor(
    private readonly identities: IdentityMapper,
    private readonly options: TranslatorOptions,
  ) {
    this.log = options.logger ?? createChildLogger("rocketchat-translator");
  }

  /** The logged-in bot user; its own messages are never delivered upward. */
  setSelf(userId: string): void {
    this.selfUserId = userId;
  }

  async translateInbound(event: RawEvent): Promise<InboundResult> {
    if (event.collection === NOTIFY_LOGGED_STREAM && event.eventName === USER_NAME_CHANGED) {
      return this.handleRename(event);
    }
    if (event.collection !== MESSAGE_STREAM) {
      // Presence (user-status), typing indicators and other notify streams
      return ignored(`${event.collection}/${event.eventName}`);
    }

    const parsed = wireMessageSchema.safeParse(event.payload);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues.length, eventName: event.eventName }, "Malformed message event dropped");
      return ignored("malformed");
    }
    const wire = parsed.data;

    if (wire.t) return ignored(`system message ${wire.t}`);
    if (wire.editedAt !== undefined) return ignored("edit");
    if (isRebroadcast(wire)) return ignored("update");

    if (!wire.rid || !wire.u) {
      this.log.warn(
        { messageId: wire._id, hasRoom: Boolean(wire.rid), hasSender: Boolean(wire.u) },
        "Message event without room or sender dropped",
      );
      return ignored("incomplete");
    }
    if (wire.u._id === this.selfUserId) return ignored("own message");

    let message: CanonicalMessage;
    try {
      const [sender, room] = await Promise.all([
        this.identities.resolveUser(wire.u._id, {
          userId: wire.u._id,
          username: wire.u.username,
          displayName: wire.u.name,
        }),
        this.identities.resolveRoom(wire.rid),
      ]);
      message = {
        id: wire._id,
        sender,
        room,
        body: wire.msg,
        timestamp: wire.ts && !Number.isNaN(wire.ts.getTime()) ? wire.ts : new Date(event.receivedAt),
        threadId: wire.tmid,
        raw: event.payload,
      };
    } catch (err) {
      if (err instanceof SessionExpiredError) throw err;
      this.log.warn(
        { messageId: wire._id, roomId: wire.rid, userId: wire.u._id, reason: describeError(err) },
        "Unresolvable sender or room, message dropped",
      );
      return ignored("unresolvable");
    }

    this.log.debug(
      { messageId: message.id, roomId: message.room.roomId, userId: message.sender.userId, text: message.body.slice(0, 50) },
      "Incoming message",
    );
    return { kind: "message", message };
  }

  /**
   * One send request per chunk, in display order. The body is passed through
   * unchanged; chunks concatenate back to it exactly.
   */
  translateOutbound(message: OutboundMessage | CanonicalMessage, roomId?: string): WireSendRequest[] {
    const rid = roomId ?? targetRoom(message);
    if (!rid) {
      throw new TranslationError("Outbound message has no target room");
    }
    const attachments = "attachments" in message && message.attachments ? message.attachments.map(toWireAttachment) : undefined;
    if (message.body.length === 0 && !attachments) {
      throw new TranslationError("Outbound message is empty");
    }

    const chunks = splitBody(message.body, this.options.maxMessageLength);
    return chunks.map((msg, index) => {
      const request: WireSendRequest = { rid, msg };
      if (message.threadId) request.tmid = message.threadId;
      if (index === 0 && attachments) request.attachments = attachments;
      return request;
    });
  }

  private handleRename(event: RawEvent): InboundResult {
    const parsed = renamedUserSchema.safeParse(event.payload);
    if (!parsed.success) {
      this.log.warn({ eventName: event.eventName }, "Malformed user update event dropped");
      return ignored("malformed");
    }
    this.identities.invalidateUser(parsed.data._id);
    return ignored("user updated");
  }
}

function targetRoom(message: OutboundMessage | CanonicalMessage): string | undefined {
  if ("room" in message) return message.room.roomId;
  if ("roomId" in message) return message.roomId;
  return undefined;
}

export function toWireAttachment(attachment: MessageAttachment): WireAttachment {
  const wire: WireAttachment = {};
  if (attachment.title) wire.title = attachment.title;
  if (attachment.titleLink) wire.title_link = attachment.titleLink;
  if (attachment.text) wire.text = attachment.text;
  if (attachment.color) wire.color = attachment.color;
  if (attachment.imageUrl) wire.image_url = attachment.imageUrl;
  if (attachment.thumbUrl) wire.thumb_url = attachment.thumbUrl;
  if (attachment.fields && attachment.fields.length > 0) {
    wire.fields = attachment.fields.map((field) =>
      field.short === undefined ? { title: field.title, value: field.value } : { ...field },
    );
  }
  return wire;
}

/**
 * Split text into pieces of at most `max` UTF-16 units. Cuts after the last newline
 * in the second half of the window, else after the last space, else at the limit,
 * never between the halves of a surrogate pair.
 */
export function splitBody(body: string, max: number): string[] {
  if (body.length <= max) return [body];

  const chunks: string[] = [];
  let rest = body;
  while (rest.length > max) {
    const window = rest.slice(0, max);
    let cut = window.lastIndexOf("\n") + 1;
    if (cut < max / 2) cut = window.lastIndexOf(" ") + 1;
    if (cut < max / 2) cut = max;
    if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) cut -= 1;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
