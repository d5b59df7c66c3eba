// src/auth/identity.ts
import { Request, RequestHandler, Response } from "express";
import { AuthUser } from "../types/claims";
import { DecodingFailure, Unauthorized } from "../errors";
import { SessionTransport } from "./session";
import { TokenCodec } from "./token";

export type IdentityExtractor = (req: Request) => Promise<AuthUser>;

/**
 * Resolve the request's session token into an AuthUser.
 * Rejects with Unauthorized when the identity is absent, invalid or expired.
 */
export function createIdentityExtractor(
  codec: Pick<TokenCodec, "decode">,
  transport: Pick<SessionTransport, "getOpaqueIdentity">
): IdentityExtractor {
  return async (req) => {
    const identity = transport.getOpaqueIdentity(req);
    if (!identity) throw new Unauthorized();

    try {
      const claims = await codec.decode(identity);
      return { id: claims.user_id, email: claims.email };
    } catch (e) {
      if (e instanceof DecodingFailure) throw new Unauthorized();
      throw e;
    }
  };
}

export type AuthedHandler = (req: Request, res: Response, user: AuthUser) => Promise<void>;

/**
 * Route handler wrapper that hands the handler a typed AuthUser.
 *
 * ```ts
 * r.get("/api/v1/auth/me", withAuthUser(identity, async (_req, res, user) => {
 *   res.json(user);
 * }));
 * ```
 */
export function withAuthUser(extract: IdentityExtractor, handler: AuthedHandler): RequestHandler {
  return async (req, res, next) => {
    try {
      const user = await extract(req);
      await handler(req, res, user);
    } catch (e) { next(e); }
  };
}
