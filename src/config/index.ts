/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from "zod";
import "dotenv/config";

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(3030),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Security
  CORS_ORIGINS: z
    .string()
    .default("http://localhost:5173")
    .transform((s) => s.split(",").map((o) => o.trim())),

  // Rooms
  ROOM_TARGET_PREFIX: z.string().min(1).default("room:"),
  MAX_ROOMS: z.coerce.number().int().positive().default(1000),
  MAX_PEERS_PER_ROOM: z.coerce.number().int().positive().default(50),
  JOIN_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),

  // Engine lifecycle
  ENGINE_START_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ENGINE_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  EMPTY_ROOM_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000), // 0 disables
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === "development";
