// src/auth/session.ts
import { CookieOptions, Request, Response } from "express";
import { SessionConfig } from "../config";

/**
 * Where the current session token lives between requests.
 * The auth core only ever sees an opaque string through this interface.
 */
export interface SessionTransport {
  getOpaqueIdentity(req: Request): string | undefined;
  setOpaqueIdentity(res: Response, identity: string): void;
  clearOpaqueIdentity(res: Response): void;
}

/**
 * Signed, httpOnly cookie transport.
 * Requires cookie-parser mounted with `session.key` (see src/app.ts);
 * a cookie whose signature does not match reads as absent.
 */
export function cookieSessionTransport(session: SessionConfig): SessionTransport {
  const base: CookieOptions = {
    httpOnly: true,
    sameSite: "lax",
    secure: session.secure,
    path: "/"
  };

  return {
    getOpaqueIdentity(req) {
      const value: unknown = req.signedCookies?.[session.name];
      return typeof value === "string" && value.length > 0 ? value : undefined;
    },
    setOpaqueIdentity(res, identity) {
      res.cookie(session.name, identity, {
        ...base,
        signed: true,
        maxAge: session.timeoutMinutes * 60_000
      });
    },
    clearOpaqueIdentity(res) {
      res.clearCookie(session.name, base);
    }
  };
}
