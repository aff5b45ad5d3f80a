/** Core domain types shared by the bridge components */

export type ConnectionState =
  | "disconnected"
  | "authenticating"
  | "subscribing"
  | "live"
  | "reconnecting"
  | "shutting-down";

/**
 * Authenticated context for every call to the server.
 * Frozen: the supervisor replaces it on each state change instead of mutating it,
 * so a reader never sees a new token paired with a stale URI.
 */
export interface Session {
  readonly authToken: string;
  readonly userId: string;
  readonly username: string;
  /** REST base, e.g. https://chat.example.org */
  readonly serverUri: string;
  /** DDP endpoint, e.g. wss://chat.example.org/websocket */
  readonly streamUrl: string;
  readonly state: ConnectionState;
  readonly establishedAt: number;
}

export type Credentials =
  | { kind: "password"; username: string; password: string }
  | { kind: "token"; userId: string; authToken: string };

export interface RemoteIdentity {
  readonly userId: string;
  readonly username: string;
  readonly displayName: string;
}

export type RoomType = "direct" | "channel" | "group";

export interface RemoteRoom {
  readonly roomId: string;
  readonly type: RoomType;
  readonly name: string;
}

export interface CanonicalMessage {
  id: string;
  sender: RemoteIdentity;
  room: RemoteRoom;
  body: string;
  timestamp: Date;
  /** Parent message id when the message was posted in a thread */
  threadId?: string;
  /** Original wire payload, untouched */
  raw: unknown;
}

export interface AttachmentField {
  title: string;
  value: string;
  short?: boolean;
}

/** Structured card rendered by the server under the message body */
export interface MessageAttachment {
  title?: string;
  titleLink?: string;
  text?: string;
  color?: string;
  imageUrl?: string;
  thumbUrl?: string;
  fields?: AttachmentField[];
}

export interface OutboundContent {
  body: string;
  threadId?: string;
  attachments?: MessageAttachment[];
}

export type OutboundTarget = { roomId: string } | { username: string };

export type OutboundMessage = OutboundTarget & OutboundContent;

/** One event of the real-time stream, before translation */
export interface RawEvent {
  collection: string;
  eventName: string;
  payload: unknown;
  receivedAt: number;
}

/** Body of a chat.sendMessage request */
export interface WireSendRequest {
  rid: string;
  msg: string;
  tmid?: string;
  attachments?: WireAttachment[];
}

export interface WireAttachment {
  title?: string;
  title_link?: string;
  text?: string;
  color?: string;
  image_url?: string;
  thumb_url?: string;
  fields?: Array<{ title: string; value: string; short?: boolean }>;
}

export interface WireSendResult {
  messageId: string;
  roomId: string;
}

export interface PendingSend {
  readonly id: string;
  readonly message: OutboundMessage | CanonicalMessage;
  /** Transient failures so far */
  attempts: number;
  readonly enqueuedAt: number;
  /** Chunks already acknowledged by the server */
  chunksSent: number;
  readonly messageIds: string[];
}
