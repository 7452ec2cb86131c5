import pino from 'pino';
import type { AppConfig } from './config';
import { createMockCompletionClient } from './llm/mock';
import { createOpenAICompletionClient } from './llm/openai';
import type { CompletionClient } from './llm/types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export function loadCompletionClient(cfg: AppConfig): CompletionClient {
  const provider = cfg.LLM_PROVIDER;
  if (provider === 'mock' || !cfg.OPENAI_API_KEY) {
    if (provider !== 'mock') logger.warn({ provider }, 'missing API key; using mock completion client');
    return createMockCompletionClient('mock');
  }
  logger.info({ provider, model: cfg.MODEL, baseURL: cfg.BASE_URL }, 'completion client ready');
  return createOpenAICompletionClient({
    id: `${provider}:${cfg.MODEL}`,
    apiKey: cfg.OPENAI_API_KEY,
    model: cfg.MODEL,
    baseURL: cfg.BASE_URL,
    openRouter: provider === 'openrouter',
    temperature: cfg.LLM_TEMPERATURE,
    timeoutMs: cfg.LLM_TIMEOUT_MS,
  });
}
