// src/auth/gate.ts
import { Request, RequestHandler } from "express";
import { logger } from "../logger";
import { DecodingFailure } from "../errors";
import { RouteId } from "../routes/paths";
import { SessionTransport } from "./session";
import { TokenCodec } from "./token";

export type GateState = "authenticated" | "unauthenticated";

export interface AuthGateOptions {
  codec: Pick<TokenCodec, "decode">;
  transport: Pick<SessionTransport, "getOpaqueIdentity">;
  /** Routes forwarded even without a valid session. Exact paths only. */
  exempt: readonly RouteId[];
}

/**
 * Request gate: forwards when the session token decodes or the route is
 * exempt, otherwise answers 401 without calling anything downstream.
 * Never reveals why a token was refused.
 */
export function authGate({ codec, transport, exempt }: AuthGateOptions): RequestHandler {
  const exemptKeys = new Set(exempt.map((r) => routeKey(r.method, r.path)));

  const isExempt = (req: Request) =>
    exemptKeys.has(routeKey(req.method, req.path)) ||
    (req.method === "HEAD" && exemptKeys.has(routeKey("GET", req.path)));

  const resolveState = async (identity: string): Promise<GateState> => {
    try {
      await codec.decode(identity);
      return "authenticated";
    } catch (e) {
      if (!(e instanceof DecodingFailure)) throw e;
      if (identity) logger.debug({ reason: e.reason }, "session token refused");
      return "unauthenticated";
    }
  };

  return async (req, res, next) => {
    try {
      const state = await resolveState(transport.getOpaqueIdentity(req) ?? "");
      if (state === "authenticated" || isExempt(req)) return next();
      res.status(401).json({ error: "unauthorized" });
    } catch (e) { next(e); }
  };
}

export function routeKey(method: string, path: string): string {
  const trimmed = path.length > 1 ? path.replace(/\/+$/, "") : path;
  return `${method.toUpperCase()} ${trimmed || "/"}`;
}
