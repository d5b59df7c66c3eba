// src/seed.ts
import "dotenv/config";
import { loadConfig } from "./config";
import { ConfigurationError } from "./errors";
import { logger } from "./logger";
import { createPool, createQuery } from "./db";
import { PgUserRepository } from "./db/users";
import { SeedEnv, seedAdmin } from "./db/seed";
import { PasswordHasher } from "./auth/password";

async function main(): Promise<void> {
  const cfg = loadConfig(process.env);
  const parsed = SeedEnv.safeParse(process.env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }

  const hasher = new PasswordHasher(cfg.auth.hashing);
  await hasher.selfCheck();

  const pool = createPool(cfg.pg);
  try {
    const users = new PgUserRepository(createQuery(pool));
    const { id, created } = await seedAdmin(users, hasher, {
      email: parsed.data.SEED_ADMIN_EMAIL,
      password: parsed.data.SEED_ADMIN_PASSWORD
    });
    logger.info({ user_id: id, email: parsed.data.SEED_ADMIN_EMAIL }, created ? "admin created" : "admin already present");
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "seed failed");
  process.exit(1);
});
