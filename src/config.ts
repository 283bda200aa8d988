import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./synthesis/errors";

export const ProviderSchema = z.enum(["openai", "groq", "cerebras", "anthropic", "gemini"]);
export type Provider = z.infer<typeof ProviderSchema>;

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flagFromEnv = (fallback: boolean) =>
  z
    .enum(["0", "1", "true", "false"])
    .default(fallback ? "1" : "0")
    .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  FALLBACK_PROVIDER: ProviderSchema.default("groq"),
  FALLBACK_MODEL: z.string().trim().min(1).optional(),
  FALLBACK_BASE_URL: z.string().trim().url().optional(),
  FALLBACK_MAX_ATTEMPTS: intFromEnv(3, 1, 10),
  FALLBACK_TIMEOUT_MS: intFromEnv(30_000, 100, 600_000),
  FALLBACK_TRANSPORT_RETRIES: intFromEnv(2, 0, 10),
  FALLBACK_BACKOFF_MS: intFromEnv(250, 0, 60_000),
  FALLBACK_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  FALLBACK_MAX_TOKENS: intFromEnv(2000, 1, 32_000),
  FALLBACK_STRUCTURED_OUTPUT: flagFromEnv(true),
  FALLBACK_INCLUDE_SOURCE: flagFromEnv(true),
});

export type EngineConfig = {
  provider: Provider;
  model: string | undefined;
  baseURL: string | undefined;
  apiKey: string | undefined;
  maxAttempts: number;
  timeoutMs: number;
  transportRetries: number;
  backoffMs: number;
  temperature: number;
  maxTokens: number;
  structuredOutput: boolean;
  includeSource: boolean;
};

type Env = Record<string, string | undefined>;

// The first name is canonical; later names are accepted aliases.
const API_KEY_VARIABLES: Record<Provider, string[]> = {
  openai: ["OPENAI_API_KEY"],
  groq: ["GROQ_API_KEY", "GROQ_API"],
  cerebras: ["CEREBRAS_API_KEY", "CEREBRAS_API"],
  anthropic: ["ANTHROPIC_API_KEY"],
  gemini: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
};

export function apiKeyVariables(provider: Provider): readonly string[] {
  return API_KEY_VARIABLES[provider];
}

function pickApiKey(env: Env, provider: Provider): string | undefined {
  for (const name of API_KEY_VARIABLES[provider]) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

function blankToUndefined(env: Env): Env {
  const out: Env = {};
  for (const [k, v] of Object.entries(env)) {
    out[k] = typeof v === "string" && v.trim() === "" ? undefined : v;
  }
  return out;
}

/**
 * Read engine settings from the environment. With no explicit `env`, a
 * `.env` file in the working directory is loaded into `process.env` first.
 */
export function loadEngineConfig(env?: Env): EngineConfig {
  if (!env) dotenv.config();
  const source = blankToUndefined(env ?? process.env);

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = typeof issue?.path[0] === "string" ? issue.path[0] : undefined;
    throw new ConfigError(`Invalid fallback configuration: ${variable ?? "env"}: ${issue?.message ?? "unknown error"}`, {
      ...(variable === undefined ? {} : { variable }),
    });
  }

  const e = parsed.data;
  return {
    provider: e.FALLBACK_PROVIDER,
    model: e.FALLBACK_MODEL,
    baseURL: e.FALLBACK_BASE_URL,
    apiKey: pickApiKey(source, e.FALLBACK_PROVIDER),
    maxAttempts: e.FALLBACK_MAX_ATTEMPTS,
    timeoutMs: e.FALLBACK_TIMEOUT_MS,
    transportRetries: e.FALLBACK_TRANSPORT_RETRIES,
    backoffMs: e.FALLBACK_BACKOFF_MS,
    temperature: e.FALLBACK_TEMPERATURE,
    maxTokens: e.FALLBACK_MAX_TOKENS,
    structuredOutput: e.FALLBACK_STRUCTURED_OUTPUT,
    includeSource: e.FALLBACK_INCLUDE_SOURCE,
  };
}
