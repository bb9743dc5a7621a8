#!/usr/bin/env tsx

import { validateEnv } from "@shared/env";
import { db } from "@server/db";
import { createJournal } from "@server/journal";
import { createDrizzleStore } from "@server/journal/drizzleStore";
import { seedJournal } from "@server/journal/seed";
import { logger } from "@server/logger";

const env = validateEnv(process.env);
const count = Number.parseInt(process.argv[2] ?? "10", 10);

if (!Number.isInteger(count) || count < 0) {
  logger.error({ arg: process.argv[2] }, "Usage: seed-journal [count]");
  process.exit(1);
}

const journal = createJournal(createDrizzleStore(db), { defaultTz: env.LOCAL_TZ });

try {
  const summary = await seedJournal(journal, { count });
  logger.info({ trades: summary.tradeIds.length, byState: summary.byState }, "Seeded demo trades");
} catch (err) {
  logger.error({ err }, "Seeding failed");
  process.exitCode = 1;
}
