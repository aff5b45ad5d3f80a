import type { BridgeConfig } from "./config.js";
import { RocketChatBridge, type BridgeDependencies } from "./channels/rocketchat/bridge.js";
import { createChildLogger, setLogLevel } from "./utils/logger.js";

const log = createChildLogger("server");

/**
 * Runs one bridge until stopped. Inbound messages are logged; bot logic attaches
 * through `bridge.onMessage`.
 */
export class Server {
  readonly bridge: RocketChatBridge;
  private running = false;

  constructor(
    private readonly config: BridgeConfig,
    deps: BridgeDependencies = {},
  ) {
    setLogLevel(config.logLevel);
    this.bridge = new RocketChatBridge(config, deps);

    this.bridge.onMessage(async (message) => {
      log.info(
        { room: message.room.name, from: message.sender.username, text: message.body.slice(0, 80) },
        "Message received",
      );
    });
    this.bridge.onDeliveryFailure((send, failure) => {
      log.warn({ sendId: send.id, attempts: failure.attempts, reason: failure.message }, "Reply could not be delivered");
    });
    this.bridge.onPresence((status) => {
      log.info({ status }, "Presence changed");
    });
  }

  async start(): Promise<void> {
    if (this.running) return;

    log.info({ serverUri: this.config.serverUri }, "Starting Rocket.Chat bridge...");
    this.running = true;
    try {
      await this.bridge.connect();
    } catch (err) {
      this.running = false;
      throw err;
    }
    log.info({ admins: this.config.admins.length }, "Rocket.Chat bridge is running");
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.bridge.disconnect();
    log.info("Server stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Stops cleanly on SIGINT/SIGTERM, then exits. */
  installSignalHandlers(): void {
    const shutdown = async () => {
      log.info("Shutting down...");
      try {
        await this.stop();
        process.exit(0);
      } catch (err) {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      }
    };
    process.once("SIGINT", () => void shutdown());
    process.once("SIGTERM", () => void shutdown());
  }
}
