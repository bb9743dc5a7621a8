import { validateEnv } from "@shared/env";
import { createServer } from "http";

import { createApp } from "./app";
import { db } from "./db";
import { setServerReady } from "./health";
import { createJournal } from "./journal";
import { createDrizzleStore } from "./journal/drizzleStore";
import { logger } from "./logger";

const env = validateEnv(process.env);

// Mark server as not ready during initialization
setServerReady(false);

const journal = createJournal(createDrizzleStore(db), { defaultTz: env.LOCAL_TZ });
const app = createApp(journal);
const server = createServer(app);

server.keepAliveTimeout = 75000;
server.headersTimeout = 80000;

try {
  await journal.store.ping();
  logger.info("Database reachable");
} catch (err) {
  // Keep serving; /api/readyz reports the outage until the database answers
  logger.error({ err }, "Database not reachable at startup");
}

setServerReady(true);

server.listen(env.PORT, "0.0.0.0", () => {
  logger.info(
    { port: env.PORT, environment: env.NODE_ENV, logLevel: env.LOG_LEVEL },
    `Server running on http://0.0.0.0:${env.PORT}`,
  );
});

// Global process error handlers for crash visibility
process.on("uncaughtException", (error) => {
  logger.fatal({ err: error }, "Uncaught exception");
  if (env.NODE_ENV === "production") {
    // Mark unhealthy and let the process manager restart us
    setServerReady(false);
  } else {
    process.exit(1);
  }
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  if (env.NODE_ENV === "production") {
    setServerReady(false);
  } else {
    process.exit(1);
  }
});

// Graceful shutdown handlers
for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    logger.info(`${signal} received, closing server`);
    setServerReady(false); // Signal readiness probe to stop routing traffic
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
  });
}
