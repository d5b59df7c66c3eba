// src/app.ts
import express from "express";
import helmet from "helmet";
import cors from "cors";
import cookieParser from "cookie-parser";
import pinoHttp from "pino-http";
import { AppConfig } from "./config";
import { logger } from "./logger";
import { UserRepository } from "./db/users";
import { TokenCodec } from "./auth/token";
import { PasswordHasher } from "./auth/password";
import { SessionTransport, cookieSessionTransport } from "./auth/session";
import { createIdentityExtractor } from "./auth/identity";
import { authGate } from "./auth/gate";
import { errorHandler } from "./middleware/error";
import { PUBLIC_ROUTES } from "./routes/paths";

// ---- Routes ----
import healthRoutes from "./routes/health";
import authRoutes from "./routes/auth";
import userRoutes from "./routes/users";

export interface AppDeps {
  config: AppConfig;
  users: UserRepository;
  codec: TokenCodec;
  hasher: PasswordHasher;
  /** Defaults to the signed session cookie. */
  transport?: SessionTransport;
}

export function createApp({ config, users, codec, hasher, transport = cookieSessionTransport(config.session) }: AppDeps) {
  const app = express();
  const identity = createIdentityExtractor(codec, transport);

  // --- Core middleware ---
  app.use(helmet());
  app.use(cors({ origin: config.cors.origin, credentials: true }));
  app.use(express.json({ limit: "1mb" }));
  app.use(cookieParser(config.session.key));
  app.use(pinoHttp({ logger }));

  // --- Auth gate for everything but PUBLIC_ROUTES ---
  app.use(authGate({ codec, transport, exempt: PUBLIC_ROUTES }));

  // --- Routes ---
  app.use(healthRoutes(config.version)); // /health
  app.use(authRoutes({ users, hasher, codec, transport, identity })); // /api/v1/auth/...
  app.use(userRoutes({ users, hasher, identity }));                   // /api/v1/user...

  app.use((_req, res) => res.status(404).json({ error: "not_found" }));

  // --- Global error handler (last) ---
  app.use(errorHandler);

  return app;
}
