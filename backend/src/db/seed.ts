// src/db/seed.ts
import { z } from "zod";
import { PasswordHasher } from "../auth/password";
import { UserRepository } from "./users";

/** Fixed id of the bootstrap account; it is its own creator. */
export const ADMIN_ID = "00000000-0000-0000-0000-000000000000";

export const SeedEnv = z.object({
  SEED_ADMIN_EMAIL: z.string().email().default("admin@admin.com"),
  SEED_ADMIN_PASSWORD: z.string().min(6)
});

export interface SeedAdmin {
  email: string;
  password: string;
}

/**
 * Create the bootstrap admin unless a user with that email exists.
 * The digest needs the server secret, so the row cannot ship in the DDL.
 */
export async function seedAdmin(
  users: UserRepository,
  hasher: PasswordHasher,
  { email, password }: SeedAdmin
): Promise<{ id: string; created: boolean }> {
  const existing = await users.findLoginByEmail(email);
  if (existing) return { id: existing.id, created: false };

  const salt = hasher.generateSalt();
  const user = await users.create({
    id: ADMIN_ID,
    first_name: "admin",
    last_name: "user",
    email,
    password: await hasher.hash(password, salt),
    salt,
    created_by: ADMIN_ID,
    updated_by: ADMIN_ID
  });
  return { id: user.id, created: true };
}
