// src/server.ts
import "dotenv/config";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { logger } from "./logger";
import { createPool, createQuery } from "./db";
import { PgUserRepository } from "./db/users";
import { PasswordHasher } from "./auth/password";
import { TokenCodec } from "./auth/token";

async function main(): Promise<void> {
  const cfg = loadConfig(process.env);

  // bad secrets/salt fail here, not on the first login
  const hasher = new PasswordHasher(cfg.auth.hashing);
  await hasher.selfCheck();

  const codec = new TokenCodec({ signingKey: cfg.auth.signingKey, lifetimeHours: cfg.auth.tokenLifetimeHours });
  const pool = createPool(cfg.pg);
  const app = createApp({ config: cfg, users: new PgUserRepository(createQuery(pool)), codec, hasher });

  app.listen(cfg.port, () => logger.info({ port: cfg.port, env: cfg.env }, "API up"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});
