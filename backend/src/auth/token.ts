// src/auth/token.ts
import { createSecretKey, KeyObject } from "crypto";
import { SignJWT, jwtVerify, errors } from "jose";
import { z } from "zod";
import { Claims, Token } from "../types/claims";
import { DecodingFailure, DecodingFailureReason, EncodingFailure } from "../errors";

const ALG = "HS256";

const ClaimsSchema = z.object({
  user_id: z.string().uuid(),
  email: z.string().min(1),
  expires_at: z.number().int()
});

// what decode() accepts from a verified token
const TokenPayload = z.object({
  user_id: z.string().uuid(),
  email: z.string().min(1),
  exp: z.number().int()
});

export interface TokenCodecOptions {
  signingKey: string;
  lifetimeHours: number;
  /** Defaults to wall time. */
  clock?: () => Date;
}

/**
 * Creates and verifies signed, time-bounded session tokens.
 * Stateless: the only inputs are the token, the signing key and the clock.
 */
export class TokenCodec {
  private readonly signingKey: string;
  private readonly lifetimeSeconds: number;
  private readonly clock: () => Date;

  constructor(options: TokenCodecOptions) {
    this.signingKey = options.signingKey;
    this.lifetimeSeconds = options.lifetimeHours * 3600;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Claims for a user that has just authenticated. */
  claimsFor(userId: string, email: string): Claims {
    return {
      user_id: userId,
      email,
      expires_at: epochSeconds(this.clock()) + this.lifetimeSeconds
    };
  }

  async create(claims: Claims): Promise<Token> {
    const parsed = ClaimsSchema.safeParse(claims);
    if (!parsed.success) {
      throw new EncodingFailure(`malformed claims (${parsed.error.issues.map((i) => i.path.join(".")).join(", ")})`);
    }
    if (this.signingKey.length === 0) throw new EncodingFailure("signing key is empty");

    const { user_id, email, expires_at } = parsed.data;
    try {
      return await new SignJWT({ user_id, email })
        .setProtectedHeader({ alg: ALG, typ: "JWT" })
        .setExpirationTime(expires_at)
        .sign(this.key());
    } catch (e) {
      throw new EncodingFailure(e instanceof Error ? e.message : String(e));
    }
  }

  /**
   * Verify signature and expiry (no leeway) and return the Claims.
   * Every failure is a DecodingFailure; `reason` is for logs only.
   */
  async decode(token: Token): Promise<Claims> {
    if (!token) throw new DecodingFailure("empty");
    if (this.signingKey.length === 0) throw new DecodingFailure("signature", "signing key is empty");

    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.key(), {
        algorithms: [ALG],
        currentDate: this.clock(),
        clockTolerance: 0
      }));
    } catch (e) {
      throw new DecodingFailure(failureReason(e), e instanceof Error ? e.message : String(e));
    }

    const parsed = TokenPayload.safeParse(payload);
    if (!parsed.success) throw new DecodingFailure("malformed", "payload is missing required claims");

    return {
      user_id: parsed.data.user_id,
      email: parsed.data.email,
      expires_at: parsed.data.exp
    };
  }

  private key(): KeyObject {
    return createSecretKey(Buffer.from(this.signingKey, "utf8"));
  }
}

function failureReason(e: unknown): DecodingFailureReason {
  if (e instanceof errors.JWTExpired) return "expired";
  if (e instanceof errors.JWSSignatureVerificationFailed) return "signature";
  return "malformed";
}

function epochSeconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}
