import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: optionalNonEmptyString,
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  FETCH_RETRIES: z.coerce.number().int().positive().max(10).default(3),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(300),
  HOTLINE_CITY_ID: z.coerce.number().int().positive().default(187),
  LOG_LEVEL: z.string().min(1).default("info")
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return EnvSchema.parse(env);
}
