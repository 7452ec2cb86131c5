#!/usr/bin/env node
import 'dotenv/config';
import pino from 'pino';
import { createSession } from './app';
import { loadConfig } from './config';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.debug({ provider: cfg.LLM_PROVIDER, model: cfg.MODEL }, 'trade-desk starting');
  const session = createSession(cfg);
  await session.start();
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
