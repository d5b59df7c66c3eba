// src/db/etag.ts
import crypto from "crypto";
import { Request, Response } from "express";

export function computeEtag(body: unknown): string {
  const str = typeof body === "string" ? body : JSON.stringify(body);
  return `W/"${crypto.createHash("sha256").update(str).digest("base64")}"`;
}

/** Sets ETag; answers 304 and returns true when If-None-Match already has it. */
export function maybeNotModified(req: Request, res: Response, body: unknown): boolean {
  const etag = computeEtag(body);
  const inm = req.headers["if-none-match"];
  if (inm && inm === etag) {
    res.status(304).end();
    return true;
  }
  res.setHeader("ETag", etag);
  return false;
}
