import { Router } from "express";
import type { NextFunction, Request, Response } from "express";

import type { NoteService } from "../journal/noteService";

import { IdParamSchema } from "./params";

export function createNotesRouter(notes: NoteService): Router {
  const router: Router = Router();

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      const note = await notes.getNote(id);
      if (!note) {
        return res.status(404).json({
          ok: false,
          error: { code: "NOT_FOUND", message: `Note ${id} not found` },
        });
      }
      res.json({ ok: true, note });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:id/charts", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      res.json({ ok: true, summary: await notes.replaceNoteCharts(id, req.body) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
