// src/types/claims.ts

/**
 * Claims signed into every session token.
 * Never persisted; they only exist inside a token.
 */
export interface Claims {
  readonly user_id: string;    // users.id (UUID)
  readonly email: string;
  readonly expires_at: number; // expiry (Unix seconds), issued_at + configured lifetime
}

/** Compact JWS serialization of Claims. */
export type Token = string;

/**
 * Authenticated user handed to route handlers.
 * Built per request from decoded Claims (see src/auth/identity.ts).
 */
export interface AuthUser {
  readonly id: string;
  readonly email: string;
}
