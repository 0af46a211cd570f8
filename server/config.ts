import path from "node:path";
import { z } from "zod";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

const EnvSchema = z.object({
  HABIT_TRACKER_PASSWORD: z.string().optional(),
  HABIT_TRACKER_SESSION_SECRET: z.string().optional(),
  HABITS_FILE: z.string().min(1).default("habits.csv"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  CORS_ORIGINS: z.string().optional(),
});

export type AppConfig = {
  password: string;
  sessionSecret: string;
  habitsFile: string;
  port: number;
  sessionTtlSeconds: number;
  allowedOrigins: string[];
};

/**
 * Reads the environment (after dotenv has run). Throws when the password is
 * missing so startup fails closed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment: ${fields}`);
  }

  const e = parsed.data;
  const password = e.HABIT_TRACKER_PASSWORD ?? "";
  if (!password.trim()) {
    throw new Error("Password environment variable (HABIT_TRACKER_PASSWORD) not set.");
  }

  const origins = e.CORS_ORIGINS
    ? e.CORS_ORIGINS.split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    : DEFAULT_ORIGINS;

  return {
    password,
    sessionSecret: e.HABIT_TRACKER_SESSION_SECRET?.trim() || password,
    habitsFile: path.resolve(e.HABITS_FILE),
    port: e.PORT,
    sessionTtlSeconds: e.SESSION_TTL_SECONDS,
    allowedOrigins: origins,
  };
}
