import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { AppConfig } from '../config';
import type {
  AccountValueRow,
  BrokerAccount,
  BrokerGateway,
  ContractQuery,
  LimitOrderRequest,
  PlacedOrder,
  PositionRow,
  QualifiedContract,
  Quote,
} from './types';

export interface AlpacaAccount {
  id: string;
  account_number: string;
  status: string;
  currency?: string;
  cash?: string;
  buying_power?: string;
  equity?: string;
  portfolio_value?: string;
  long_market_value?: string;
  short_market_value?: string;
  initial_margin?: string;
  maintenance_margin?: string;
  last_equity?: string;
  daytrading_buying_power?: string;
}

interface AlpacaAsset {
  id: string;
  symbol: string;
  name?: string;
  exchange: string;
  class: string;
  tradable: boolean;
}

interface AlpacaSnapshot {
  latestTrade?: { p?: number };
  latestQuote?: { bp?: number; ap?: number };
  dailyBar?: { v?: number };
}

export interface AlpacaPosition {
  symbol: string;
  qty: string; // string number from API
  avg_entry_price?: string;
  side?: 'long' | 'short';
}

export interface PlaceOrderRequest {
  symbol: string;
  side: 'buy' | 'sell';
  type: 'limit';
  time_in_force: 'day' | 'gtc';
  qty: string;
  limit_price: string;
}

export interface PlaceOrderResponse {
  id: string;
  client_order_id?: string;
  status: string;
  symbol: string;
  side: 'buy' | 'sell';
  type: string;
  qty?: string;
  limit_price?: string;
  time_in_force: string;
  submitted_at?: string;
}

// account values reported by accountValues, in this order
const ACCOUNT_VALUE_KEYS = [
  'cash',
  'buying_power',
  'daytrading_buying_power',
  'equity',
  'last_equity',
  'portfolio_value',
  'long_market_value',
  'short_market_value',
  'initial_margin',
  'maintenance_margin',
] as const;

export interface AlpacaClients {
  trading: AxiosInstance;
  data: AxiosInstance;
}

export function createAlpacaClients(cfg: AppConfig): AlpacaClients {
  const headers = {
    'APCA-API-KEY-ID': cfg.ALPACA_API_KEY_ID,
    'APCA-API-SECRET-KEY': cfg.ALPACA_API_SECRET_KEY,
  };
  return {
    trading: axios.create({ baseURL: cfg.ALPACA_PAPER_BASE_URL, headers, timeout: cfg.BROKER_TIMEOUT_MS }),
    data: axios.create({ baseURL: cfg.ALPACA_DATA_BASE_URL, headers, timeout: cfg.BROKER_TIMEOUT_MS }),
  };
}

function toNumber(value: unknown): number | null {
  const n = Number(value);
  return value === undefined || value === null || !Number.isFinite(n) ? null : n;
}

function describeHttpError(err: unknown): Error {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const body: unknown = err.response?.data;
    const detail =
      typeof body === 'object' && body !== null && 'message' in body ? String(body.message) : err.message;
    return new Error(status ? `HTTP ${status}: ${detail}` : detail);
  }
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * BrokerGateway backed by the Alpaca trading and market data REST APIs.
 * "Connecting" validates the credentials against the account endpoint and
 * holds the account for the rest of the session.
 */
export function createAlpacaGateway(cfg: AppConfig, clients: AlpacaClients = createAlpacaClients(cfg)): BrokerGateway {
  let account: AlpacaAccount | null = null;

  async function request<T>(run: () => Promise<{ data: T }>): Promise<T> {
    try {
      const res = await run();
      return res.data;
    } catch (err) {
      throw describeHttpError(err);
    }
  }

  function requireAccount(requested: string): AlpacaAccount {
    if (!account) throw new Error('Not connected');
    if (requested && requested !== account.account_number && requested !== account.id) {
      throw new Error(`Unknown account: ${requested}`);
    }
    return account;
  }

  return {
    endpoint: cfg.ALPACA_PAPER_BASE_URL,

    async connect(): Promise<BrokerAccount> {
      const acct = await request(() => clients.trading.get<AlpacaAccount>('/v2/account'));
      if (acct.status !== 'ACTIVE') {
        throw new Error(`account ${acct.account_number} is ${acct.status}`);
      }
      account = acct;
      return { id: acct.id, accountNumber: acct.account_number, status: acct.status };
    },

    async disconnect(): Promise<void> {
      account = null;
    },

    isConnected(): boolean {
      return account !== null;
    },

    async qualifyContract(query: ContractQuery): Promise<QualifiedContract | null> {
      requireAccount('');
      let asset: AlpacaAsset;
      try {
        const res = await clients.trading.get<AlpacaAsset>(`/v2/assets/${encodeURIComponent(query.symbol)}`);
        asset = res.data;
      } catch (err) {
        if (axios.isAxiosError(err) && err.response?.status === 404) return null;
        throw describeHttpError(err);
      }
      if (asset.class !== 'us_equity') return null;
      return {
        conId: asset.id,
        symbol: asset.symbol,
        secType: query.secType,
        exchange: query.exchange,
        primaryExchange: asset.exchange,
        currency: query.currency,
        name: asset.name,
        tradable: asset.tradable,
      };
    },

    async marketData(query: ContractQuery): Promise<Quote> {
      requireAccount('');
      const snap = await request(() =>
        clients.data.get<AlpacaSnapshot>(`/v2/stocks/${encodeURIComponent(query.symbol)}/snapshot`),
      );
      return {
        symbol: query.symbol,
        bid: toNumber(snap.latestQuote?.bp),
        ask: toNumber(snap.latestQuote?.ap),
        last: toNumber(snap.latestTrade?.p),
        volume: toNumber(snap.dailyBar?.v),
      };
    },

    async placeLimitOrder(req: LimitOrderRequest): Promise<PlacedOrder> {
      requireAccount('');
      const body: PlaceOrderRequest = {
        symbol: req.contract.symbol,
        side: req.action === 'BUY' ? 'buy' : 'sell',
        type: 'limit',
        time_in_force: 'day',
        qty: String(req.quantity),
        limit_price: req.limitPrice.toFixed(2),
      };
      const order = await request(() => clients.trading.post<PlaceOrderResponse>('/v2/orders', body));
      return {
        orderId: order.id,
        details: {
          clientOrderId: order.client_order_id,
          status: order.status,
          symbol: order.symbol,
          action: order.side === 'buy' ? 'BUY' : 'SELL',
          orderType: order.type.toUpperCase(),
          totalQuantity: toNumber(order.qty) ?? req.quantity,
          lmtPrice: toNumber(order.limit_price) ?? req.limitPrice,
          tif: order.time_in_force.toUpperCase(),
          submittedAt: order.submitted_at,
        },
      };
    },

    async positions(acct: string): Promise<PositionRow[]> {
      requireAccount(acct);
      const rows = await request(() => clients.trading.get<AlpacaPosition[]>('/v2/positions'));
      return rows.map((p) => {
        const qty = Math.abs(Number(p.qty));
        return {
          symbol: p.symbol,
          quantity: p.side === 'short' ? -qty : qty,
          avgCost: Number(p.avg_entry_price ?? 0),
        };
      });
    },

    async accountValues(acct: string): Promise<AccountValueRow[]> {
      requireAccount(acct);
      const fresh = await request(() => clients.trading.get<AlpacaAccount>('/v2/account'));
      account = fresh;
      const currency = fresh.currency ?? 'USD';
      const rows: AccountValueRow[] = [];
      for (const key of ACCOUNT_VALUE_KEYS) {
        const value = fresh[key];
        if (value !== undefined) rows.push({ key, value, currency });
      }
      return rows;
    },
  };
}
