// src/auth/password.ts
import crypto from "crypto";
import { isUtf8 } from "buffer";
import * as argon2 from "argon2";
import { HashingConfig } from "../config";
import { ConfigurationError } from "../errors";

/** Argon2 refuses salts shorter than this. */
export const MIN_RECORD_SALT_BYTES = 8;

/**
 * Combine a per-record salt with the server-wide secret salt.
 *
 * Walks `recordSalt` byte by byte, adding the secret's byte at the same
 * position (cycling over the secret when it is shorter), mod 128. The result
 * has exactly as many bytes as `recordSalt`.
 *
 * SECURITY REVIEW: changing the mask invalidates every stored digest.
 * See DESIGN.md.
 */
export function maskSalt(recordSalt: string, secretSalt: string): Buffer {
  const record = Buffer.from(recordSalt, "utf8");
  const secret = Buffer.from(secretSalt, "utf8");
  if (record.length === 0) throw new ConfigurationError("record salt is empty");
  if (secret.length === 0) throw new ConfigurationError("secret salt is empty");

  const out = Buffer.alloc(record.length);
  for (let i = 0; i < record.length; i++) {
    out[i] = (record[i] + secret[i % secret.length]) % 128;
  }
  if (!isUtf8(out)) throw new ConfigurationError("masked salt is not valid text");
  return out;
}

/**
 * Deterministic Argon2i password digests bound to a per-record salt and
 * the server secret. Same inputs, same digest, on every call.
 */
export class PasswordHasher {
  constructor(private readonly cfg: HashingConfig) {
    if (cfg.secretSalt.length === 0) throw new ConfigurationError("secret salt is empty");
  }

  /** Lowercase hex Argon2i digest, `2 * hashLength` characters. */
  async hash(password: string, recordSalt: string): Promise<string> {
    const salt = maskSalt(recordSalt, this.cfg.secretSalt);
    if (salt.length < MIN_RECORD_SALT_BYTES) {
      throw new ConfigurationError(`record salt must be at least ${MIN_RECORD_SALT_BYTES} bytes`);
    }

    const raw = await argon2.hash(password, {
      type: argon2.argon2i,
      salt,
      raw: true,
      timeCost: this.cfg.timeCost,
      memoryCost: this.cfg.memoryCost,
      parallelism: this.cfg.parallelism,
      hashLength: this.cfg.hashLength
    });
    return raw.toString("hex");
  }

  /** Recompute and compare as opaque bytes, in constant time. */
  async verify(password: string, recordSalt: string, digest: string): Promise<boolean> {
    const expected = Buffer.from(await this.hash(password, recordSalt), "utf8");
    const actual = Buffer.from(digest, "utf8");
    return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
  }

  /** Fresh per-record salt for a new user (32 hex chars). */
  generateSalt(): string {
    return crypto.randomBytes(16).toString("hex");
  }

  /**
   * Startup validation: hashing must work and be repeatable under the
   * loaded configuration. Throws ConfigurationError otherwise.
   */
  async selfCheck(): Promise<void> {
    const probeSalt = "startup-probe-salt";
    let first: string;
    let second: string;
    try {
      first = await this.hash("startup-probe", probeSalt);
      second = await this.hash("startup-probe", probeSalt);
    } catch (e) {
      if (e instanceof ConfigurationError) throw e;
      throw new ConfigurationError(`argon2 rejected the hashing parameters: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (first !== second) throw new ConfigurationError("password digests are not deterministic");
    if (first.length !== this.cfg.hashLength * 2) throw new ConfigurationError("unexpected digest length");
  }
}
