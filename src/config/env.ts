import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Text-generation capability (steps fail individually if the key is missing)
  LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  LLM_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  // Session storage
  STORE_BACKEND: z.enum(["file", "postgres"]).default("file"),
  STORE_DIR: z.string().default("context_memory"),
  DATABASE_URL: z.string().default(""),

  // Orchestration
  MAX_ROUNDS: z.coerce.number().int().positive().default(3),
  PLANNER: z.enum(["llm", "fallback"]).default("llm"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}

export const env = loadEnv();
