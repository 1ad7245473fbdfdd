/**
 * Environment configuration, validated once at startup.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ValidationError } from "../utils/errorHandler";
import type { LogLevel } from "../utils/logger";

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DATABASE_URL: optionalString,
  GROQ_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  WAHA_URL: z.string().url().default("http://localhost:3001"),
  WAHA_API_KEY: optionalString,
  WAHA_SESSION: z.string().min(1).default("default"),
  ACADEMIC_CHANNELS: z.string().default(""),
  SCHEDULE_PATH: z.string().min(1).default("data/schedule.json"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = {
  port: number;
  nodeEnv: "development" | "production" | "test";
  databaseUrl?: string;
  groqApiKey?: string;
  geminiApiKey?: string;
  waha: {
    url: string;
    apiKey?: string;
    session: string;
  };
  academicChannels: string[];
  schedulePath: string;
  logLevel: LogLevel;
  llmTimeoutMs: number;
};

export function parseChannelList(raw: string): string[] {
  return raw
    .split(",")
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(`Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    databaseUrl: e.DATABASE_URL,
    groqApiKey: e.GROQ_API_KEY,
    geminiApiKey: e.GEMINI_API_KEY,
    waha: {
      url: e.WAHA_URL.replace(/\/+$/, ""),
      apiKey: e.WAHA_API_KEY,
      session: e.WAHA_SESSION,
    },
    academicChannels: parseChannelList(e.ACADEMIC_CHANNELS),
    schedulePath: e.SCHEDULE_PATH,
    logLevel: e.LOG_LEVEL,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
  };
}
