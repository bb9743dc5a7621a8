import type { Request, Response, NextFunction } from "express";
import { toFieldIssues, type FieldIssue } from "@shared/schemas";
import { ZodError } from "zod";

import { ChildSyncError, JournalError, ValidationError } from "../journal/errors";
import { logger } from "../logger";

export interface ErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

interface ChildSyncDetails {
  ownerCommitted: true;
  ownerId: number;
  collection: string;
}

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

/** Maps anything thrown by a handler to a status and an error envelope body. */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ChildSyncError) {
    const details: ChildSyncDetails = {
      ownerCommitted: err.ownerCommitted,
      ownerId: err.ownerId,
      collection: err.collection,
    };
    return { status: err.status, body: { code: err.code, message: err.message, details } };
  }
  if (err instanceof ValidationError) {
    return { status: err.status, body: { code: err.code, message: err.message, details: err.issues } };
  }
  if (err instanceof JournalError) {
    return { status: err.status, body: { code: err.code, message: err.message } };
  }
  if (err instanceof ZodError) {
    const issues: FieldIssue[] = toFieldIssues(err);
    return {
      status: 400,
      body: { code: "VALIDATION_ERROR", message: "Invalid request", details: issues },
    };
  }
  // Malformed JSON bodies come from express.json() with a status attached
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return { status: 400, body: { code: "INVALID_JSON", message: err.message } };
  }
  return {
    status: 500,
    body: { code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : "Unexpected server error" },
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const { status, body } = toErrorResponse(err);
  const context = { status, code: body.code, path: req.path, method: req.method };

  if (status >= 500) {
    logger.error({ ...context, err }, "API error");
  } else {
    logger.warn({ ...context, message: body.message }, "API request rejected");
  }

  res.status(status).json({ ok: false, error: body });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
