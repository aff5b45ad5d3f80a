import type { DeliveryFailureListener, DeliveryTicket } from "../core/outbound-dispatcher.js";
import type { StateListener } from "../core/supervisor.js";
import type { CanonicalMessage, OutboundContent, RemoteIdentity, RemoteRoom } from "../core/types.js";

export type MessageHandler = (message: CanonicalMessage) => Promise<void>;

export type PresenceStatus = "online" | "offline";
export type PresenceListener = (status: PresenceStatus) => void;

/** Plain text, or text with thread and attachments */
export type SendContent = string | OutboundContent;

/**
 * What bot logic sees of a chat server. Inbound messages arrive one at a time through
 * the handler; sends return a ticket at once and are delivered in the background.
 */
export interface ChatBackend {
  readonly type: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  onMessage(handler: MessageHandler): void;

  send(roomId: string, content: SendContent): DeliveryTicket;
  sendDirect(username: string, content: SendContent): DeliveryTicket;
  /** Answers in the message's room, inside its thread when it has one. */
  reply(message: CanonicalMessage, content: SendContent): DeliveryTicket;

  resolveUser(userId: string): Promise<RemoteIdentity>;
  resolveRoom(roomId: string): Promise<RemoteRoom>;

  onStateChange(listener: StateListener): void;
  onPresence(listener: PresenceListener): void;
  onDeliveryFailure(listener: DeliveryFailureListener): void;
}
