import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  GAMMA_BASE_URL: z.string().default("https://gamma-api.polymarket.com"),
  GAMMA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GAMMA_RETRIES: z.coerce.number().int().nonnegative().default(0),
  GAMMA_RETRY_DELAY_MS: z.coerce.number().int().positive().default(250),
  // Markets not refreshed within this window fail analysis as stale.
  MARKET_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(86_400),
  SNIPPET_MAX_LENGTH: z.coerce.number().int().min(4).default(200),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses a raw environment map; exported separately so tests can check defaults without touching process.env.
 */
export const parseEnv = (raw: NodeJS.ProcessEnv): AppEnv => envSchema.parse(raw);

export const env: AppEnv = parseEnv(process.env);
