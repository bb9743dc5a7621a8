import type { Request, Response } from "express";

import { logger } from "./logger";

let serverReady = true;

export function setServerReady(ready: boolean) {
  serverReady = ready;
}

export function liveness(_req: Request, res: Response) {
  res.status(200).json({ ok: true, status: "live" });
}

export interface ReadinessReport {
  status: number;
  body: { ok: boolean; status: "starting" | "ready" | "database_unavailable" };
}

/** Ready once startup finished and the database answers. */
export async function checkReadiness(ping: () => Promise<void>): Promise<ReadinessReport> {
  if (!serverReady) {
    return { status: 503, body: { ok: false, status: "starting" } };
  }
  try {
    await ping();
    return { status: 200, body: { ok: true, status: "ready" } };
  } catch (err) {
    logger.warn({ err }, "Readiness check failed: database unreachable");
    return { status: 503, body: { ok: false, status: "database_unavailable" } };
  }
}

export function createReadiness(ping: () => Promise<void>) {
  return async (_req: Request, res: Response) => {
    const report = await checkReadiness(ping);
    res.status(report.status).json(report.body);
  };
}
