import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenv.config();

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Empty strings in .env mean "unset"
const optionalString = z.preprocess(v => (v === '' ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(25),
  AUDIT_BALANCE_TOLERANCE: z.coerce.number().nonnegative().default(1),
  AUDIT_MAX_RANGE_CELLS: z.coerce.number().int().positive().default(50_000),
  AUDIT_BALANCE_SHEET: optionalString,
  NARRATIVE_PROVIDER: z.enum(['none', 'gemini', 'ollama']).default('none'),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-2.5-pro'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('qwen3:32b')
});

export type AppConfig = {
  port: number;
  logLevel: LogLevel;
  maxUploadBytes: number;
  audit: {
    balanceTolerance: number;
    maxRangeCells: number;
    balanceSheet?: string;
  };
  narrative: {
    provider: 'none' | 'gemini' | 'ollama';
    geminiApiKey?: string;
    geminiModel: string;
    ollamaBaseUrl: string;
    ollamaModel: string;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    maxUploadBytes: Math.round(e.MAX_UPLOAD_MB * 1024 * 1024),
    audit: {
      balanceTolerance: e.AUDIT_BALANCE_TOLERANCE,
      maxRangeCells: e.AUDIT_MAX_RANGE_CELLS,
      balanceSheet: e.AUDIT_BALANCE_SHEET
    },
    narrative: {
      provider: e.NARRATIVE_PROVIDER,
      geminiApiKey: e.GEMINI_API_KEY,
      geminiModel: e.GEMINI_MODEL,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      ollamaModel: e.OLLAMA_MODEL
    }
  };
}
