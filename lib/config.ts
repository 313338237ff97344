import { z } from "zod";
import {
  DEFAULT_METEOBLUE_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_OPENCAGE_BASE_URL,
  DEFAULT_OPENROUTER_BASE_URL,
} from "./constants";
import { ConfigError } from "./errors";

export type AppConfig = Readonly<{
  model: string;
  openRouter: Readonly<{ apiKey: string; baseUrl: string }>;
  openCage: Readonly<{ apiKey: string; baseUrl: string }>;
  meteoblue: Readonly<{ apiKey: string; baseUrl: string }>;
}>;

const REQUIRED_KEYS = ["OPENROUTER_API_KEY", "OPENCAGE_API_KEY", "METEOBLUE_API_KEY"] as const;

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalUrl = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().url().default(fallback));

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().trim().min(1),
  OPENCAGE_API_KEY: z.string().trim().min(1),
  METEOBLUE_API_KEY: z.string().trim().min(1),
  FORECAST_CHAT_MODEL: z.preprocess(blankToUndefined, z.string().trim().min(1).default(DEFAULT_MODEL)),
  OPENROUTER_BASE_URL: optionalUrl(DEFAULT_OPENROUTER_BASE_URL),
  OPENCAGE_BASE_URL: optionalUrl(DEFAULT_OPENCAGE_BASE_URL),
  METEOBLUE_BASE_URL: optionalUrl(DEFAULT_METEOBLUE_BASE_URL),
});

function stripTrailingSlash(url: string) {
  return url.replace(/\/+$/, "");
}

/**
 * Reads credentials and endpoints once at start-up. Every missing key is
 * reported together so the user can fix the `.env` file in one pass.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: { model?: string } = {},
): AppConfig {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]?.trim());
  if (missing.length) {
    throw new ConfigError(
      `Missing required environment variable${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}. Add ${
        missing.length > 1 ? "them" : "it"
      } to .env and try again.`,
      missing,
    );
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(`Invalid environment configuration: ${fields.join(", ")}`, []);
  }
  const values = parsed.data;

  return Object.freeze({
    model: overrides.model?.trim() || values.FORECAST_CHAT_MODEL,
    openRouter: Object.freeze({
      apiKey: values.OPENROUTER_API_KEY,
      baseUrl: stripTrailingSlash(values.OPENROUTER_BASE_URL),
    }),
    openCage: Object.freeze({
      apiKey: values.OPENCAGE_API_KEY,
      baseUrl: stripTrailingSlash(values.OPENCAGE_BASE_URL),
    }),
    meteoblue: Object.freeze({
      apiKey: values.METEOBLUE_API_KEY,
      baseUrl: stripTrailingSlash(values.METEOBLUE_BASE_URL),
    }),
  });
}
