import 'dotenv/config';
import pino from 'pino';
import { createSession } from '../app';
import { loadConfig } from '../config';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const utterance = process.argv.slice(2).join(' ').trim();
  if (!utterance) {
    logger.warn('usage: npm run turn -- "<request>"');
    return;
  }
  const session = createSession(loadConfig());
  try {
    const steps = await session.runTurn(utterance);
    if (steps.some((s) => s.outcome.result === 'failed')) process.exitCode = 2;
  } finally {
    await session.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'oneTurn failed');
  process.exit(1);
});
