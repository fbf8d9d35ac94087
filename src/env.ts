import { config as loadEnvFile } from "dotenv";
import { z } from "zod";

const preLoadedKeys = new Set(Object.keys(process.env));

loadEnvFile({ path: ".env", quiet: true });
const localResult = loadEnvFile({ path: ".env.local", quiet: true });

if (localResult.parsed) {
  for (const [key, value] of Object.entries(localResult.parsed)) {
    if (preLoadedKeys.has(key)) {
      continue;
    }
    process.env[key] = value;
  }
}

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim() === "") {
    return undefined;
  }
  return value;
};

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());
const optionalUrl = () => z.preprocess(emptyToUndefined, z.string().url().optional());
const optionalBoolean = () =>
  z.preprocess((value) => {
    const normalized = emptyToUndefined(value);
    if (normalized === undefined) return undefined;
    if (typeof normalized === "boolean") return normalized;
    if (typeof normalized === "string") {
      if (normalized.toLowerCase() === "true") return true;
      if (normalized.toLowerCase() === "false") return false;
    }
    return normalized;
  }, z.boolean().optional());

function numberWithDefault(key: string, fallback: number, check: (value: number) => boolean) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return fallback;
      }

      const parsed = Number(value);
      if (Number.isNaN(parsed) || !check(parsed)) {
        throw new Error(`${key} is out of range: ${value}`);
      }
      return parsed;
    });
}

const positive = (value: number) => value > 0;
const positiveInt = (value: number) => Number.isInteger(value) && value > 0;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: optionalString(),
  PORT: numberWithDefault("PORT", 3000, positiveInt),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  OPENAI_API_KEY: optionalString(),
  OPENAI_API_BASE: optionalUrl(),
  OPENAI_MODEL: optionalString(),
  AZURE_OPENAI_ENDPOINT: optionalUrl(),
  AZURE_OPENAI_API_KEY: optionalString(),
  AZURE_OPENAI_API_VERSION: optionalString(),
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString(),
  GENERATION_TEMPERATURE: numberWithDefault("GENERATION_TEMPERATURE", 0.5, (value) => value >= 0 && value <= 2),
  GENERATION_MAX_OUTPUT_TOKENS: numberWithDefault("GENERATION_MAX_OUTPUT_TOKENS", 9000, positiveInt),
  GENERATION_TIMEOUT_MS: numberWithDefault("GENERATION_TIMEOUT_MS", 60_000, positive),
  GENERATION_MAX_RETRIES: numberWithDefault("GENERATION_MAX_RETRIES", 2, (value) => Number.isInteger(value) && value >= 0),
  SESSION_IDLE_TTL_MINUTES: numberWithDefault("SESSION_IDLE_TTL_MINUTES", 240, positive),
  SESSION_COOKIE_SECURE: optionalBoolean()
});

export type AppEnv = z.infer<typeof envSchema>;

export const env = loadEnv(process.env);

// Range checks throw from inside transforms, so safeParse can still raise.
function parseEnv(source: NodeJS.ProcessEnv) {
  try {
    return envSchema.safeParse(source);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
}

export function loadEnv(source: NodeJS.ProcessEnv): AppEnv {
  const parsed = parseEnv(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
  }

  return {
    ...parsed.data,
    OPENAI_MODEL: parsed.data.OPENAI_MODEL ?? "gpt-4o-mini",
    AZURE_OPENAI_API_VERSION: parsed.data.AZURE_OPENAI_API_VERSION ?? "2025-03-01-preview",
    HOST: parsed.data.HOST?.trim() || undefined
  };
}
