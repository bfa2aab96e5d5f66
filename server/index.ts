import { config as loadDotenv } from "dotenv";
import { neon } from "@neondatabase/serverless";
import { drizzle } from "drizzle-orm/neon-http";
import { createApp } from "./app";
import { BotFrameworkConnector } from "./bot/connector";
import { MessageHandler } from "./bot/messageHandler";
import { loadConfig, type AppConfig } from "./config/env";
import { GenieClient } from "./genie/client";
import { ConversationOrchestrator } from "./genie/orchestrator";
import { DbSessionStore } from "./session/dbSessionStore";
import { MemSessionStore, type ISessionStore } from "./session/store";
import { TurnSerializer } from "./session/turnSerializer";
import { getErrorMessage } from "./utils/errorHandler";
import { configureLogger, logError, logInfo } from "./utils/logger";

loadDotenv();

function createSessionStore(config: AppConfig): ISessionStore {
  if (config.DATABASE_URL) {
    logInfo("[Startup] Using Postgres session store");
    return new DbSessionStore(drizzle(neon(config.DATABASE_URL)));
  }
  logInfo("[Startup] Using in-memory session store", {
    maxSessions: config.SESSION_MAX_ENTRIES ?? "unbounded",
    ttlMinutes: config.SESSION_TTL_MINUTES ?? "none",
  });
  return new MemSessionStore({
    maxSessions: config.SESSION_MAX_ENTRIES,
    ttlMs: config.SESSION_TTL_MINUTES === undefined ? undefined : config.SESSION_TTL_MINUTES * 60 * 1000,
  });
}

function main() {
  const config = loadConfig();
  configureLogger({ level: config.LOG_LEVEL, dir: config.LOG_DIR });

  logInfo("[Startup] Environment variables validated successfully");
  logInfo(`[Startup] Genie host: ${config.DATABRICKS_HOST}`);
  logInfo(`[Startup] Genie space: ${config.DATABRICKS_SPACE_ID}`);

  const genie = new GenieClient({
    host: config.DATABRICKS_HOST,
    token: config.DATABRICKS_TOKEN,
    waitTimeoutMs: config.GENIE_WAIT_TIMEOUT_MS,
  });

  const handler = new MessageHandler({
    resolver: new ConversationOrchestrator(genie, config.DATABRICKS_SPACE_ID),
    sessions: createSessionStore(config),
    serializer: config.SERIALIZE_USER_TURNS ? new TurnSerializer() : undefined,
  });

  const app = createApp({ processor: new BotFrameworkConnector(config, handler) });

  const server = app.listen(config.PORT, config.HOST, () => {
    logInfo(`[Startup] Listening on http://${config.HOST}:${config.PORT}/api/messages`);
  });

  const shutdown = () => {
    logInfo("[Startup] Shutting down...");
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (error) {
  logError(`[Startup] Error running app: ${getErrorMessage(error)}`, {
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
}
