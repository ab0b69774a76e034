import type { NextFunction, Request, Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import type { WorkflowError } from "../plugin/createWorkflow.js";

export class HttpError extends Error {
  constructor(public status: number, public code: string) {
    super(code);
    this.name = "HttpError";
  }
}

export const statusForError: Record<WorkflowError, number> = {
  not_found: 404,
  forbidden: 403,
  not_pending: 409,
  invalid_transition: 409
};

export function errorHandler(log: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ ok: false, error: "invalid_request", issues: err.issues });
      return;
    }
    if (err instanceof HttpError) {
      res.status(err.status).json({ ok: false, error: err.code });
      return;
    }
    log.error({ err, method: req.method, path: req.path }, "api: unhandled");
    res.status(500).json({ ok: false, error: "internal" });
  };
}
