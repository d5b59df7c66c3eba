// src/middleware/error.ts
import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { ApiError } from "../errors";
import { logger } from "../logger";

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    return res.status(422).json({ error: "validation_failed", errors: collectErrors(err) });
  }

  if (err instanceof ApiError) {
    if (err.status >= 500) logger.error({ err }, err.message);
    return res.status(err.status).json(err.expose ? { error: err.code, message: err.message } : { error: err.code });
  }

  // body-parser and friends tag their errors with a 4xx status
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return res.status(status).json({ error: "bad_request" });
  }

  logger.error({ err }, "unhandled error");
  res.status(500).json({ error: "internal_error" });
}

/** One message per offending field, first issue wins. */
export function collectErrors(err: ZodError): string[] {
  const seen = new Map<string, string>();
  for (const issue of err.issues) {
    const field = issue.path.join(".");
    if (!seen.has(field)) seen.set(field, issue.message);
  }
  return [...seen.values()];
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}
