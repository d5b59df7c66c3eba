// src/logger.ts
import pino from "pino";
import { LogLevel } from "./config";

/**
 * Level from LOG_LEVEL, falling back when it is unset or unknown so the
 * logger can still report the ConfigurationError that loadConfig raises.
 */
export function levelFrom(env: NodeJS.ProcessEnv): LogLevel {
  const parsed = LogLevel.safeParse(env.LOG_LEVEL);
  if (parsed.success) return parsed.data;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger = pino({
  level: levelFrom(process.env),
  // session tokens travel in cookies; keep them out of request logs
  redact: ["req.headers.cookie", 'res.headers["set-cookie"]']
});
