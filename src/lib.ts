export { loadConfig, deriveEndpoints, type BridgeConfig, type LogLevel } from "./config.js";
export { RocketChatBridge, type BridgeDependencies } from "./channels/rocketchat/bridge.js";
export type {
  ChatBackend,
  MessageHandler,
  PresenceListener,
  PresenceStatus,
  SendContent,
} from "./channels/types.js";
export {
  RocketChatWireClient,
  type EventStream,
  type WireCapabilities,
  type WireClient,
} from "./channels/rocketchat/wire-client.js";
export { EventTranslator, splitBody, type InboundResult } from "./channels/rocketchat/translator.js";
export { IdentityMapper } from "./core/identity-mapper.js";
export { SessionSupervisor, type InboundHandler, type StateListener } from "./core/supervisor.js";
export {
  OutboundDispatcher,
  type DeliveryFailureListener,
  type DeliveryResult,
  type DeliveryTicket,
} from "./core/outbound-dispatcher.js";
export { Heartbeat, type HeartbeatFn } from "./core/heartbeat.js";
export { Server } from "./server.js";
export type * from "./core/types.js";
export * from "./utils/errors.js";
export { logger, createChildLogger, setLogLevel } from "./utils/logger.js";
