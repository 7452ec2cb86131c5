import { z } from 'zod';

const configSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'openrouter', 'mock']).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  BASE_URL: z.string().url().optional(),
  MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ALPACA_API_KEY_ID: z.string().default(''),
  ALPACA_API_SECRET_KEY: z.string().default(''),
  ALPACA_PAPER_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  ALPACA_DATA_BASE_URL: z.string().url().default('https://data.alpaca.markets'),
  BROKER_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.string().default('info'),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings from a half-filled .env count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  if (cfg.LLM_PROVIDER !== 'mock' && !cfg.OPENAI_API_KEY) {
    throw new Error(`Invalid configuration: OPENAI_API_KEY is required for provider ${cfg.LLM_PROVIDER}`);
  }
  return cfg;
}
