import { Router } from "express";
import type { NextFunction, Request, Response } from "express";

import type { AnalysisService } from "../journal/analysisService";

import { IdParamSchema, SectionParamSchema } from "./params";

export function createAnalysesRouter(analyses: AnalysisService): Router {
  const router: Router = Router();

  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ ok: true, analyses: await analyses.listAnalyses(req.query) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = await analyses.createAnalysis(req.body);
      res.status(201).json({ ok: true, id });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      const analysis = await analyses.getAnalysis(id);
      if (!analysis) {
        return res.status(404).json({
          ok: false,
          error: { code: "NOT_FOUND", message: `Analysis ${id} not found` },
        });
      }
      res.json({ ok: true, analysis });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, analysis: await analyses.updateAnalysis(id, req.body) });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      await analyses.deleteAnalysis(id);
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id/notes/:section", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, section } = SectionParamSchema.parse(req.params);
      res.json({ ok: true, summary: await analyses.replaceAnalysisNotes(id, section, req.body) });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id/charts/:section", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, section } = SectionParamSchema.parse(req.params);
      res.json({ ok: true, summary: await analyses.replaceAnalysisCharts(id, section, req.body) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
