import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(6688),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DECAY_RATE: z.coerce.number().gt(0).lt(1).default(0.05),
  COOLDOWN_SECONDS: z.coerce.number().min(0).default(3600),
  EXCITATION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  FEEDBACK_STEP: z.coerce.number().gt(0).max(1).default(0.08),
  WEIGHT_CLAMP: z.coerce.number().min(0).default(0.35),
  COOLDOWN_DAMPING: z.coerce.number().min(0).max(1).default(0.5),
  SIGMOID_SLOPE: z.coerce.number().gt(0).default(3),
  SIGMOID_MIDPOINT: z.coerce.number().default(0.35),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().min(10).default(300),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(15000),
  SOURCES_CONFIG_PATH: z.string().default("config/sources.json"),
  STATE_PATH: z.string().default("data/excitation-state.json"),
  USE_REDIS: booleanFlag,
  REDIS_URL: z.string().default(""),
  REDIS_PREFIX: z.string().default("listing-watch"),
  RECENT_NOTIFICATIONS_LIMIT: z.coerce.number().int().min(1).default(200),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
  CORS_ORIGIN: z.string().default("*"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
