import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  OPENAI_MODEL: z.preprocess(emptyToUndefined, z.string().default("gpt-3.5-turbo")),
  LLM_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30000)
  ),
  ENABLE_CACHING: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .default("true")
      .transform((value) => value.toLowerCase() === "true")
  ),
  PORT: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(0).max(65535).default(5000)
  ),
  APP_ENV: z.preprocess(
    (value) => (typeof value === "string" ? emptyToUndefined(value.toLowerCase()) : value),
    z.enum(["development", "production", "test"]).default("production")
  ),
});

export type AppEnvironment = "development" | "production" | "test";

export type AppConfig = {
  openaiApiKey: string | null;
  openaiModel: string;
  llmTimeoutMs: number;
  cachingEnabled: boolean;
  port: number;
  appEnv: AppEnvironment;
};

/**
 * Read configuration once from the environment. Entry points load .env via
 * "dotenv/config" before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiModel: parsed.OPENAI_MODEL,
    llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
    cachingEnabled: parsed.ENABLE_CACHING,
    port: parsed.PORT,
    appEnv: parsed.APP_ENV,
  };
}
