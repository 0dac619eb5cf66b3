import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  APP_SYMBOLS: z.string().default("AAPL,MSFT"),
  FMP_BASE_URL: z.string().url().default("https://financialmodelingprep.com"),
  FMP_API_KEY: z.string().default(""),
  FMP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FMP_RETRIES: z.coerce.number().int().nonnegative().default(0),
  FMP_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Tickers used when the CLI is run without `--ticker`.
 */
export const appSymbols = (): string[] =>
  env.APP_SYMBOLS.split(",")
    .map((item) => item.trim().toUpperCase())
    .filter(Boolean);
