import compression from "compression";
import express, { type Express } from "express";

import { setupSecurity } from "./config/security";
import { createReadiness, liveness } from "./health";
import type { Journal } from "./journal";
import { createHttpLogger } from "./logger";
import { errorHandler, notFound } from "./middleware/error";
import { createAnalysesRouter } from "./routes/analyses";
import { createNotesRouter } from "./routes/notes";
import { createAccountsRouter, createSetupsRouter } from "./routes/references";
import { createTradesRouter } from "./routes/trades";

export function createApp(journal: Journal): Express {
  const app = express();

  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createHttpLogger());
  setupSecurity(app);

  // Health and readiness probes
  app.get("/api/livez", liveness);
  app.get("/api/readyz", createReadiness(() => journal.store.ping()));

  app.use("/api/trades", createTradesRouter(journal.trades));
  app.use("/api/analyses", createAnalysesRouter(journal.analyses));
  app.use("/api/accounts", createAccountsRouter(journal.references));
  app.use("/api/setups", createSetupsRouter(journal.references));
  app.use("/api/notes", createNotesRouter(journal.notes));

  // Error middleware - must be last
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
