import { z } from "zod";
import { DEFAULT_MODEL, ModelSchema, type Model } from "../schemas/index.js";
import { GROQ_BASE_URL } from "../../providers/groq-llm.js";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  GROQ_API_KEY: optionalString,
  GROQ_BASE_URL: z.string().url().default(GROQ_BASE_URL),
  LLM_PROVIDER: z.enum(["groq", "mock"]).optional(),
  DEFAULT_MODEL: ModelSchema.default(DEFAULT_MODEL),
  CHUNK_SIZE: z.coerce.number().int().min(1000).default(12_000),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3100),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface AppConfig {
  groqApiKey: string | undefined;
  groqBaseUrl: string;
  provider: "groq" | "mock" | undefined;
  defaultModel: Model;
  chunkSize: number;
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
}

/**
 * Read and validate configuration from the environment.
 * Throws one error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    groqApiKey: vars.GROQ_API_KEY,
    groqBaseUrl: vars.GROQ_BASE_URL,
    provider: vars.LLM_PROVIDER,
    defaultModel: vars.DEFAULT_MODEL,
    chunkSize: vars.CHUNK_SIZE,
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
  };
}
