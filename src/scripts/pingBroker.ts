import 'dotenv/config';
import pino from 'pino';
import { loadConfig } from '../config';
import { createAlpacaGateway } from '../exchanges/alpaca';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const cfg = loadConfig({ ...process.env, LLM_PROVIDER: 'mock' });
  if (!cfg.ALPACA_API_KEY_ID || !cfg.ALPACA_API_SECRET_KEY) {
    logger.warn('No broker keys in env; create a paper key in the dashboard and set .env');
    return;
  }
  const broker = createAlpacaGateway(cfg);
  const account = await broker.connect();
  const quote = await broker.marketData({ symbol: 'AAPL', secType: 'STK', exchange: 'SMART', currency: 'USD' });
  await broker.disconnect();
  logger.info({ account: account.accountNumber, status: account.status, last: quote.last }, 'broker reachable');
}

main().catch((err) => {
  logger.error({ err }, 'broker ping failed');
  process.exit(1);
});
