import type { BridgeConfig } from "../config.js";

/** A password-login config with instant retries and no send spacing */
export function testConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    serverUri: "http://chat.test",
    streamUrl: "ws://chat.test/websocket",
    credentials: { kind: "password", username: "bot", password: "test-secret" },
    admins: [],
    reconnect: { enabled: true, initialDelayMs: 1_000, maxDelayMs: 8_000 },
    stream: { resumable: false, pingIntervalMs: 0 },
    outbound: {
      maxAttempts: 3,
      retryDelayMs: 500,
      minIntervalMs: 0,
      maxQueueSize: 100,
      maxMessageLength: 5_000,
      requestTimeoutMs: 1_000,
    },
    heartbeat: { enabled: false, intervalSec: 10 },
    logLevel: "silent",
    ...overrides,
  };
}
