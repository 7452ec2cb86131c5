import type { ContractQuery, OrderAction } from '../exchanges/types';
import { errorMessage } from '../errors';
import type { Outcome } from '../plan/types';
import type { BoundArguments, Capability, ParameterSpec, SessionContext } from './types';

export const NOT_CONNECTED_MESSAGE = "Not connected to the broker. Use 'connect' first.";

const SUPPORTED_SEC_TYPES = new Set(['STK']);
const SUPPORTED_CURRENCIES = new Set(['USD']);

const CONTRACT_PARAMS: ParameterSpec[] = [
  { name: 'secType', type: 'str', default: 'STK' },
  { name: 'exchange', type: 'str', default: 'SMART' },
  { name: 'currency', type: 'str', default: 'USD' },
];

function success(message: unknown): Outcome {
  return { result: 'success', message };
}

function failed(message: unknown): Outcome {
  return { result: 'failed', message };
}

function readString(args: BoundArguments, name: string): string {
  const value = args[name];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  throw new Error(`parameter '${name}' must be a string`);
}

function readNumber(args: BoundArguments, name: string): number {
  const value = args[name];
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new Error(`parameter '${name}' must be a number`);
  }
  return n;
}

function isOrderAction(value: string): value is OrderAction {
  return value === 'BUY' || value === 'SELL';
}

function readContract(args: BoundArguments): ContractQuery {
  return {
    symbol: readString(args, 'symbol').toUpperCase(),
    secType: readString(args, 'secType').toUpperCase(),
    exchange: readString(args, 'exchange').toUpperCase(),
    currency: readString(args, 'currency').toUpperCase(),
  };
}

function unsupportedContract(contract: ContractQuery): Outcome | null {
  if (!contract.symbol) return failed('Symbol must not be empty');
  if (!SUPPORTED_SEC_TYPES.has(contract.secType)) return failed(`Unsupported security type: ${contract.secType}`);
  if (!SUPPORTED_CURRENCIES.has(contract.currency)) return failed(`Unsupported currency: ${contract.currency}`);
  return null;
}

/**
 * Wraps a capability body that needs a live session: a disconnected
 * session yields a failed outcome and broker errors become failed
 * outcomes carrying the error text.
 */
function requiresSession(
  run: (args: BoundArguments, session: SessionContext) => Promise<Outcome>,
): Capability['execute'] {
  return async (args, session) => {
    if (!session.broker.isConnected()) return failed(NOT_CONNECTED_MESSAGE);
    try {
      return await run(args, session);
    } catch (err) {
      return failed(errorMessage(err));
    }
  };
}

const connect: Capability = {
  name: 'connect',
  description: `Connect to the broker using the credentials from the environment.
    Opens the trading session every other tool depends on.`,
  parameters: [],
  async execute(_args, { broker }) {
    try {
      const account = await broker.connect();
      return success(`Connected to broker at ${broker.endpoint} as account ${account.accountNumber}`);
    } catch (err) {
      return failed(`Failed to connect: ${errorMessage(err)}`);
    }
  },
};

const disconnect: Capability = {
  name: 'disconnect',
  description: 'Disconnect from the broker and end the trading session.',
  parameters: [],
  async execute(_args, { broker }) {
    if (!broker.isConnected()) return failed('No active connection to disconnect');
    await broker.disconnect();
    return success('Disconnected from broker');
  },
};

const qualifyContracts: Capability = {
  name: 'qualifyContracts',
  description: `Qualify a contract by filling in missing fields.
    symbol is the ticker (e.g. "AAPL"); secType defaults to "STK" (stock);
    exchange defaults to "SMART" (smart routing); currency defaults to "USD".`,
  parameters: [{ name: 'symbol', type: 'str' }, ...CONTRACT_PARAMS],
  execute: requiresSession(async (args, { broker }) => {
    const query = readContract(args);
    const rejected = unsupportedContract(query);
    if (rejected) return rejected;
    const contract = await broker.qualifyContract(query);
    if (!contract) return failed('Contract qualification failed');
    return success({ contract });
  }),
};

const reqMktData: Capability = {
  name: 'reqMktData',
  description: `Request market data for a contract. Returns bid, ask, last price and volume.
    secType defaults to "STK", exchange to "SMART", currency to "USD".`,
  parameters: [{ name: 'symbol', type: 'str' }, ...CONTRACT_PARAMS],
  execute: requiresSession(async (args, { broker }) => {
    const query = readContract(args);
    const rejected = unsupportedContract(query);
    if (rejected) return rejected;
    const quote = await broker.marketData(query);
    return success(quote);
  }),
};

const placeOrder: Capability = {
  name: 'placeOrder',
  description: `Place a limit order for a contract.
    action is "BUY" or "SELL"; quantity is the number of shares;
    limitPrice is the limit price. Returns the order id and details.`,
  parameters: [
    { name: 'symbol', type: 'str' },
    { name: 'action', type: 'str' },
    { name: 'quantity', type: 'float' },
    { name: 'limitPrice', type: 'float' },
    ...CONTRACT_PARAMS,
  ],
  execute: requiresSession(async (args, { broker }) => {
    const contract = readContract(args);
    const rejected = unsupportedContract(contract);
    if (rejected) return rejected;
    const action = readString(args, 'action').toUpperCase();
    if (!isOrderAction(action)) return failed(`Invalid order action: ${action}`);
    const quantity = readNumber(args, 'quantity');
    const limitPrice = readNumber(args, 'limitPrice');
    if (quantity <= 0) return failed('Quantity must be positive');
    if (limitPrice <= 0) return failed('Limit price must be positive');
    const order = await broker.placeLimitOrder({ contract, action, quantity, limitPrice });
    return success(order);
  }),
};

const positions: Capability = {
  name: 'positions',
  description: 'Retrieve current positions (symbol, quantity, average cost). An empty account uses the default account.',
  parameters: [{ name: 'account', type: 'str', default: '' }],
  execute: requiresSession(async (args, { broker }) => {
    const rows = await broker.positions(readString(args, 'account'));
    return success(rows);
  }),
};

const accountValues: Capability = {
  name: 'accountValues',
  description: 'Retrieve account values (key, value, currency). An empty account uses the default account.',
  parameters: [{ name: 'account', type: 'str', default: '' }],
  execute: requiresSession(async (args, { broker }) => {
    const rows = await broker.accountValues(readString(args, 'account'));
    return success(rows);
  }),
};

export function createBrokerCapabilities(): Capability[] {
  return [connect, disconnect, qualifyContracts, reqMktData, placeOrder, positions, accountValues];
}
