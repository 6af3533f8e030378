// src/config/env.ts
/** Environment loader: reads .env, validates with Zod, exports typed config and CORS origins array. */
import "dotenv/config";
import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const UNIT_SECONDS = { s: 1, m: 60, h: 3600, d: 86_400 } as const;

/** "15m" / "30d" / "3600" -> seconds */
const duration = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((v) => /^\d+[smhd]?$/.test(v.trim()), "Expected a duration like 900, 15m or 30d")
    .transform((v) => {
      const m = /^(\d+)([smhd]?)$/.exec(v.trim());
      if (!m) return 0;
      const unit = m[2] === "m" || m[2] === "h" || m[2] === "d" ? m[2] : "s";
      return Number(m[1]) * UNIT_SECONDS[unit];
    });

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),

  // Data layer
  MONGO_URI: z.string().default("mongodb://localhost:27017/circle_dev"),
  MONGO_TRANSACTIONS: booleanFlag("false"), // needs a replica set
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_NAMESPACE: z.string().default("circle:dev"),

  // Auth
  JWT_SECRET: z
    .string()
    .min(16, "JWT_SECRET must be at least 16 chars")
    .default("dev_only_change_me"),
  JWT_REFRESH_SECRET: z
    .string()
    .min(16, "JWT_REFRESH_SECRET must be at least 16 chars")
    .default("dev_only_change_me_refresh"),
  JWT_ACCESS_TTL: duration("15m"),
  JWT_REFRESH_TTL: duration("30d"),
  JWT_ISS: z.string().default("circle-api"),
  JWT_AUD: z.string().default("circle-clients"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

  // Relationship rules
  CONTACT_KEY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(1000),
  FRIENDSHIP_DIRECTION_POLICY: z.enum(["either", "matching"]).default("either"),

  // HTTP
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // Pretty-print Zod issues then exit

  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;


// parsed CORS allowlist as array
export const corsOrigins = env.CORS_ORIGINS.split(",")
  .map((s) => s.trim())
  .filter(Boolean);
