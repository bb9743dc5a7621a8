import { Router } from "express";
import type { NextFunction, Request, Response } from "express";

import type { TradeService } from "../journal/tradeService";

import { IdParamSchema } from "./params";

export function createTradesRouter(trades: TradeService): Router {
  const router: Router = Router();

  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, trades: await trades.listTrades(req.query) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/metrics", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, ...(await trades.metrics(req.query)) });
    } catch (error) {
      next(error);
    }
  });

  // Body is a full submission ({ trade, notes?, charts? })
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const saved = await trades.createTradeWithChildren(req.body);
      res.status(201).json({ ok: true, ...saved });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      const trade = await trades.getTradeDetail(id);
      if (!trade) {
        return res.status(404).json({
          ok: false,
          error: { code: "NOT_FOUND", message: `Trade ${id} not found` },
        });
      }
      res.json({ ok: true, trade });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id/statuses", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, ...(await trades.statuses(id)) });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, ...(await trades.saveTrade(id, req.body)) });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      await trades.deleteTrade(id);
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id/notes", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, summary: await trades.replaceTradeNotes(id, req.body) });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id/charts", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, summary: await trades.replaceTradeCharts(id, req.body) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
