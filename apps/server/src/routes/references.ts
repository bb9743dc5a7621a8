import { Router } from "express";
import type { NextFunction, Request, Response } from "express";

import type { ReferenceService } from "../journal/referenceService";

import { IdParamSchema } from "./params";

export function createAccountsRouter(references: ReferenceService): Router {
  const router: Router = Router();

  router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, accounts: await references.listAccounts() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json({ ok: true, account: await references.createAccount(req.body) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createSetupsRouter(references: ReferenceService): Router {
  const router: Router = Router();

  router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, setups: await references.listSetups() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(201).json({ ok: true, setup: await references.createSetup(req.body) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      const setup = await references.getSetup(id);
      if (!setup) {
        return res.status(404).json({
          ok: false,
          error: { code: "NOT_FOUND", message: `Setup ${id} not found` },
        });
      }
      res.json({ ok: true, setup });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id/charts", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, summary: await references.replaceSetupCharts(id, req.body) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
