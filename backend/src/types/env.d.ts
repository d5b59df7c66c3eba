// src/types/env.d.ts
// Everything is optional here; src/config.ts validates presence and shape.

declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: "development" | "test" | "production";
    PORT?: string;

    // Database (separate server)
    DATABASE_URL?: string;
    PGSSL?: "true" | "false";

    // Session token signing
    JWT_KEY?: string;
    JWT_EXPIRATION?: string; // hours

    // Password digests
    AUTH_SALT?: string;
    ARGON2_TIME_COST?: string;
    ARGON2_MEMORY_COST?: string; // KiB
    ARGON2_PARALLELISM?: string;

    // Session cookie
    SESSION_KEY?: string;
    SESSION_NAME?: string;
    SESSION_TIMEOUT?: string; // minutes
    SESSION_SECURE?: "true" | "false";

    CORS_ORIGIN?: string;

    // Logging
    LOG_LEVEL?: string;

    // Build metadata
    GIT_SHA?: string;
    npm_package_version?: string;

    // Seeding (npm run seed)
    SEED_ADMIN_EMAIL?: string;
    SEED_ADMIN_PASSWORD?: string;
  }
}
