import type { AppConfig } from './config';
import { createAlpacaGateway } from './exchanges/alpaca';
import { loadCompletionClient } from './modelLoader';
import { Session } from './session';
import { createBrokerCapabilities } from './tools/broker';
import { createToolRegistry } from './tools/registry';

export function createSession(cfg: AppConfig): Session {
  return new Session({
    registry: createToolRegistry(createBrokerCapabilities()),
    llm: loadCompletionClient(cfg),
    broker: createAlpacaGateway(cfg),
  });
}
