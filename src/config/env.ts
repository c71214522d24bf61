import dotenv from 'dotenv';
import { z } from 'zod';

import type { LogLevel } from './logger';

dotenv.config();

const DEFAULT_LLM_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_LLM_MODEL = 'mistralai/mistral-small-3.2-24b-instruct:free';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  OPENAI_API_KEY: z.string().trim().optional(),
  LLM_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
  LLM_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  LLM_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  LLM_BACKOFF_FACTOR: z.coerce.number().min(1).default(7),
  DATA_DIR: z.string().min(1).default('.data'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type LlmConfig = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
};

export type AppConfig = {
  port: number;
  dataDir: string;
  maxUploadBytes: number;
  logLevel: LogLevel;
  llm: LlmConfig;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  // Blank values count as unset so an empty line in .env falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => typeof value === 'string' && value.trim() !== ''),
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration. ${details}`);
  }

  const parsed = result.data;

  return {
    port: parsed.PORT,
    dataDir: parsed.DATA_DIR,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    logLevel: parsed.LOG_LEVEL,
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
      maxAttempts: parsed.LLM_MAX_ATTEMPTS,
      initialDelayMs: parsed.LLM_INITIAL_DELAY_MS,
      backoffFactor: parsed.LLM_BACKOFF_FACTOR,
    },
  };
};
