import "dotenv/config";
import { z } from "zod";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGINS: z.string().default("*"),
  TAVILY_API_KEY: z
    .string({ required_error: "TAVILY_API_KEY is required" })
    .trim()
    .min(1, "TAVILY_API_KEY is required"),
  TAVILY_BASE_URL: z.string().url().default("https://api.tavily.com"),
  TAVILY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TAVILY_MAX_RESULTS: z.coerce.number().int().positive().default(5),
  GEMINI_API_KEY: z
    .string({ required_error: "GEMINI_API_KEY is required" })
    .trim()
    .min(1, "GEMINI_API_KEY is required"),
  GEMINI_BASE_URL: z
    .string()
    .url()
    .default("https://generativelanguage.googleapis.com"),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  // 0 disables the timer; generation calls are unbounded by default
  GEMINI_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  RESEARCH_MAX_TURNS: z.coerce.number().int().min(1).default(8),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validates process configuration once at startup so missing credentials never surface mid-stream.
 */
export const loadEnv = (
  source: Record<string, string | undefined> = process.env,
): AppEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
};

/**
 * Splits the CORS allow-list; a lone "*" keeps every origin allowed.
 */
export const corsOrigins = (appEnv: AppEnv): string | string[] => {
  const origins = appEnv.CORS_ORIGINS.split(",")
    .map((item) => item.trim())
    .filter(Boolean);

  if (origins.length === 0 || origins.includes("*")) {
    return "*";
  }

  return origins;
};
