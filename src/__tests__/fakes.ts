/**
 * In-process stand-ins shared by the test suites.
 */

import type { BrokerGateway, PlacedOrder } from '../exchanges/types';
import type { CompletionClient } from '../llm/types';
import type { Outcome } from '../plan/types';
import type { Capability, SessionContext } from '../tools/types';

export interface FakeBroker extends BrokerGateway {
  connect: jest.Mock;
  disconnect: jest.Mock;
  qualifyContract: jest.Mock;
  marketData: jest.Mock;
  placeLimitOrder: jest.Mock;
  positions: jest.Mock;
  accountValues: jest.Mock;
}

export function createFakeBroker(initiallyConnected = false): FakeBroker {
  let connected = initiallyConnected;
  const order: PlacedOrder = {
    orderId: 'order-1',
    details: {
      status: 'accepted',
      symbol: 'AAPL',
      action: 'BUY',
      orderType: 'LIMIT',
      totalQuantity: 10,
      lmtPrice: 150,
      tif: 'DAY',
    },
  };
  return {
    endpoint: 'https://broker.test',
    isConnected: () => connected,
    connect: jest.fn(async () => {
      connected = true;
      return { id: 'acct-id', accountNumber: 'PA0001', status: 'ACTIVE' };
    }),
    disconnect: jest.fn(async () => {
      connected = false;
    }),
    qualifyContract: jest.fn(async (q: { symbol: string }) => ({
      conId: 'asset-1',
      symbol: q.symbol,
      secType: 'STK',
      exchange: 'SMART',
      primaryExchange: 'NASDAQ',
      currency: 'USD',
      tradable: true,
    })),
    marketData: jest.fn(async (q: { symbol: string }) => ({
      symbol: q.symbol,
      bid: 189.5,
      ask: 189.7,
      last: 189.6,
      volume: 1000,
    })),
    placeLimitOrder: jest.fn(async () => order),
    positions: jest.fn(async () => [{ symbol: 'AAPL', quantity: 10, avgCost: 150 }]),
    accountValues: jest.fn(async () => [{ key: 'cash', value: '1000', currency: 'USD' }]),
  };
}

export function createSessionContext(broker: BrokerGateway = createFakeBroker()): SessionContext {
  return { connected: broker.isConnected(), broker };
}

export function fakeCapability(
  name: string,
  run: (args: Record<string, unknown>) => Promise<Outcome> = async () => ({ result: 'success', message: `${name} ok` }),
  parameters: Capability['parameters'] = [],
): Capability {
  return {
    name,
    description: `${name} test tool`,
    parameters,
    execute: (args) => run(args),
  };
}

/** Completion client that replays canned responses, one per call. */
export function scriptedCompletion(...responses: Array<string | Error>): CompletionClient & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    id: 'scripted',
    prompts,
    async complete(systemPrompt, _utterance, options = {}) {
      prompts.push(systemPrompt);
      const next = responses.shift();
      if (next === undefined) throw new Error('no scripted response left');
      if (next instanceof Error) throw next;
      options.onFragment?.(next);
      return next;
    },
  };
}
