import { z } from "zod";
import { PipelineError } from "@/lib/errors";

export interface AppConfig {
  geminiApiKey: string;
  googleMapsApiKey: string;
  geminiModel: string;
  requestTimeoutMs: number;
  aiMaxRetries: number;
}

export type ConfigStatus = { ok: true; config: AppConfig } | { ok: false; problems: string[] };

const envSchema = z.object({
  GEMINI_API_KEY: z
    .string({ required_error: "GEMINI_API_KEY is not configured." })
    .trim()
    .min(1, "GEMINI_API_KEY is not configured."),
  GOOGLE_MAPS_API_KEY: z
    .string({ required_error: "GOOGLE_MAPS_API_KEY is not configured." })
    .trim()
    .min(1, "GOOGLE_MAPS_API_KEY is not configured."),
  GEMINI_MODEL: z.string().trim().min(1, "GEMINI_MODEL must not be empty.").default("gemini-2.5-flash"),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int("REQUEST_TIMEOUT_MS must be a whole number of milliseconds.")
    .positive("REQUEST_TIMEOUT_MS must be positive.")
    .default(15000),
  AI_MAX_RETRIES: z.coerce
    .number()
    .int("AI_MAX_RETRIES must be 0 or 1.")
    .min(0, "AI_MAX_RETRIES must be 0 or 1.")
    .max(1, "AI_MAX_RETRIES must be 0 or 1.")
    .default(1)
});

type Env = Record<string, string | undefined>;

export function getConfigStatus(env: Env = process.env): ConfigStatus {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      problems: parsed.error.issues.map((issue) => issue.message)
    };
  }

  return {
    ok: true,
    config: {
      geminiApiKey: parsed.data.GEMINI_API_KEY,
      googleMapsApiKey: parsed.data.GOOGLE_MAPS_API_KEY,
      geminiModel: parsed.data.GEMINI_MODEL,
      requestTimeoutMs: parsed.data.REQUEST_TIMEOUT_MS,
      aiMaxRetries: parsed.data.AI_MAX_RETRIES
    }
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const status = getConfigStatus(env);
  if (!status.ok) {
    throw new PipelineError("ConfigurationMissing", "Application configuration is incomplete.", status.problems.join(" "));
  }

  return status.config;
}
