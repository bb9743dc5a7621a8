import { accountPayloadSchema, chartRowsSchema, setupPayloadSchema, toFieldIssues } from "@shared/schemas";
import type { Account, Setup, SetupDetail } from "@shared/types/journal";

import { logger } from "../logger";

import { NotFoundError, persist, ValidationError } from "./errors";
import { chartKind, reconcileChildren, type ReconcileSummary } from "./reconciler";
import type { JournalStore } from "./repositories";

export type ReferenceService = ReturnType<typeof createReferenceService>;

export function createReferenceService(store: JournalStore) {
  const log = logger.child({ module: "references" });

  async function createAccount(payload: unknown): Promise<Account> {
    const parsed = accountPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error));
    }
    const input = parsed.data;
    const account = await persist(() =>
      store.references.insertAccount({
        name: input.name,
        broker: input.broker ?? null,
        currency: input.currency?.toUpperCase() ?? "USD",
        startingBalance: input.startingBalance ?? null,
        isProp: input.isProp ?? false,
      })
    );
    log.info({ accountId: account.id }, "Account created");
    return account;
  }

  async function listAccounts(): Promise<Account[]> {
    return persist(() => store.references.listAccounts());
  }

  async function createSetup(payload: unknown): Promise<Setup> {
    const parsed = setupPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error));
    }
    const { name, description } = parsed.data;

    const existing = await persist(() => store.references.findSetupByName(name));
    if (existing) {
      throw ValidationError.single("name", `Setup '${name}' already exists`);
    }

    const setup = await persist(() => store.references.insertSetup({ name, description: description ?? null }));
    log.info({ setupId: setup.id }, "Setup created");
    return setup;
  }

  async function listSetups(): Promise<Setup[]> {
    return persist(() => store.references.listSetups());
  }

  async function getSetup(id: number): Promise<SetupDetail | null> {
    const setup = await persist(() => store.references.findSetupById(id));
    if (!setup) return null;

    const charts = await persist(() => store.setupCharts.listAttached(id));
    return { ...setup, charts };
  }

  /** Replaces the example charts of a setup. */
  async function replaceSetupCharts(setupId: number, rows: unknown): Promise<ReconcileSummary> {
    const parsed = chartRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error, "charts"));
    }
    if (!(await persist(() => store.references.setupExists(setupId)))) {
      throw new NotFoundError("Setup", setupId);
    }
    return persist(() => reconcileChildren(store.setupCharts, setupId, parsed.data, chartKind));
  }

  return { createAccount, listAccounts, createSetup, listSetups, getSetup, replaceSetupCharts };
}
