#!/usr/bin/env node

import { RocketChatWireClient } from "./channels/rocketchat/wire-client.js";
import { loadConfig } from "./config.js";
import { Server } from "./server.js";
import { ConfigError, describeError } from "./utils/errors.js";

const command = process.argv[2];

try {
  switch (command) {
    case "serve":
      await runServe();
      break;
    case "check":
      await runCheck();
      break;
    default:
      printUsage();
      break;
  }
} catch (err) {
  console.error(err instanceof ConfigError ? `Configuration error: ${err.message}` : `Fatal: ${describeError(err)}`);
  process.exit(1);
}

async function runServe(): Promise<void> {
  const config = loadConfig(process.argv[3]);
  const server = new Server(config);
  server.installSignalHandlers();
  await server.start();
}

/** Logs in once, prints who the bot is and logs out again. */
async function runCheck(): Promise<void> {
  const config = loadConfig(process.argv[3]);
  const wire = new RocketChatWireClient({
    serverUri: config.serverUri,
    streamUrl: config.streamUrl,
    requestTimeoutMs: config.outbound.requestTimeoutMs,
    pingIntervalMs: config.stream.pingIntervalMs,
    resumable: config.stream.resumable,
  });

  const session = await wire.authenticate(config.credentials);
  const me = await wire.fetchUser(session, session.userId);
  console.log("rc-bridge check");
  console.log("---");
  console.log(`Server:       ${session.serverUri}`);
  console.log(`Stream:       ${session.streamUrl}`);
  console.log(`Bot user:     @${me.username} (${me.displayName}, id ${me.userId})`);
  console.log(`Admins:       ${config.admins.join(", ") || "(none)"}`);
  console.log(`Reconnect:    ${config.reconnect.enabled ? "enabled" : "disabled"}`);
  await wire.logout(session);
}

function printUsage(): void {
  console.log(`
rc-bridge: Rocket.Chat bot bridge

Usage:
  rc-bridge serve [config.json]   Connect and keep the bridge running
  rc-bridge check [config.json]   Log in once and print the bot identity

Environment:
  See .env.example for the ROCKETCHAT_* settings.
`);
}
