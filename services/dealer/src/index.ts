// @fairdraw/dealer - Commit-reveal card dealing service
import { createServer } from "node:http";
import {
  ConfigError,
  ENV_VARS,
  VERSION,
  getAppConfig,
  validateAppConfigEnv,
  type AppConfig,
} from "@fairdraw/shared";
import { createApp } from "./app.js";
import { TableChannels, createWsServer } from "./ws/index.js";

const missing = validateAppConfigEnv();
if (missing.length > 0) {
  console.error(`Missing required environment variables: ${missing.join(", ")}. Refusing to start.`);
  process.exit(1);
}

const JWT_SECRET = process.env[ENV_VARS.JWT_SECRET] ?? "";
if (JWT_SECRET.length < 32) {
  console.error("JWT_SECRET must be at least 32 characters");
  process.exit(1);
}

function loadConfig(): AppConfig {
  try {
    return getAppConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfig();

const channels = new TableChannels();

const { app, registry } = createApp({
  jwtSecret: JWT_SECRET,
  authority: config.authority,
  deckSize: config.deckSize,
  defaultTableId: config.defaultTableId,
  corsAllowedOrigins: config.corsAllowedOrigins,
  observers: [channels],
});

const server = createServer(app);
const wss = createWsServer({
  httpServer: server,
  hasTable: (tableId) => registry.has(tableId),
  channels,
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down...`);
  wss.close();
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

server.listen(config.port, () => {
  console.log(`Dealer service v${VERSION} listening on port ${config.port}`);
  console.log(`  Environment: ${config.env}`);
  console.log(`  Authority: ${config.authority}`);
  console.log(`  Deck size: ${config.deckSize}`);
  console.log(`  Default table: ${config.defaultTableId}`);
});
