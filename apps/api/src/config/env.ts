import 'dotenv/config';
import { z } from 'zod';

const AI_PROVIDERS = ['ollama', 'openai', 'claude'] as const;

export type AiProvider = (typeof AI_PROVIDERS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().default('*'),

  AI_PROVIDER: z
    .preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(AI_PROVIDERS))
    .default('ollama'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: z.string().optional(),
  CLAUDE_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_CHAT_MODEL: z.string().default('llama3.1:8b'),

  BATCH_SIZE: z.coerce.number().int().positive().default(1000),
  ORACLE_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  ORACLE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  ORACLE_MAX_TOKENS: z.coerce.number().int().positive().default(500),

  GPS_DATA_PATH: z.string().default('data/geo_locations_astana_hackathon.csv'),
  TAXI_DATA_PATH: z.string().default('data/Taxi_Set.csv'),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  ai: {
    provider: AiProvider;
    openAiApiKey?: string;
    openAiModel: string;
    anthropicApiKey?: string;
    claudeModel: string;
    ollamaBaseUrl: string;
    ollamaChatModel: string;
  };
  oracle: {
    /** Total attempts per record, first call included. */
    maxAttempts: number;
    /** 0 disables the timeout. */
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
  };
  batchSize: number;
  gpsDataPath: string;
  taxiDataPath: string;
}

/** Parse configuration from the environment; throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    ai: {
      provider: e.AI_PROVIDER,
      openAiApiKey: e.OPENAI_API_KEY || undefined,
      openAiModel: e.OPENAI_MODEL,
      anthropicApiKey: e.ANTHROPIC_API_KEY || undefined,
      claudeModel: e.CLAUDE_MODEL,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      ollamaChatModel: e.OLLAMA_CHAT_MODEL,
    },
    oracle: {
      maxAttempts: e.ORACLE_MAX_RETRIES,
      timeoutMs: e.ORACLE_TIMEOUT_MS,
      temperature: e.ORACLE_TEMPERATURE,
      maxTokens: e.ORACLE_MAX_TOKENS,
    },
    batchSize: e.BATCH_SIZE,
    gpsDataPath: e.GPS_DATA_PATH,
    taxiDataPath: e.TAXI_DATA_PATH,
  };
}
