export type OrderAction = 'BUY' | 'SELL';

export interface ContractQuery {
  symbol: string;
  secType: string;
  exchange: string;
  currency: string;
}

export interface QualifiedContract {
  conId: string;
  symbol: string;
  secType: string;
  exchange: string;
  primaryExchange: string;
  currency: string;
  name?: string;
  tradable: boolean;
}

export interface Quote {
  symbol: string;
  bid: number | null;
  ask: number | null;
  last: number | null;
  volume: number | null;
}

export interface LimitOrderRequest {
  contract: ContractQuery;
  action: OrderAction;
  quantity: number;
  limitPrice: number;
}

export interface PlacedOrder {
  orderId: string;
  details: {
    clientOrderId?: string;
    status: string;
    symbol: string;
    action: OrderAction;
    orderType: string;
    totalQuantity: number;
    lmtPrice: number;
    tif: string;
    submittedAt?: string;
  };
}

export interface PositionRow {
  symbol: string;
  quantity: number;
  avgCost: number;
}

export interface AccountValueRow {
  key: string;
  value: string;
  currency: string;
}

export interface BrokerAccount {
  id: string;
  accountNumber: string;
  status: string;
}

/**
 * Stateful broker session. `connect` must succeed before any other call;
 * implementations throw on transport or API errors.
 */
export interface BrokerGateway {
  readonly endpoint: string;
  connect(): Promise<BrokerAccount>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  qualifyContract(query: ContractQuery): Promise<QualifiedContract | null>;
  marketData(query: ContractQuery): Promise<Quote>;
  placeLimitOrder(request: LimitOrderRequest): Promise<PlacedOrder>;
  positions(account: string): Promise<PositionRow[]>;
  accountValues(account: string): Promise<AccountValueRow[]>;
}
