import type { BrokerGateway } from '../exchanges/types';
import type { LiteralValue, Outcome } from '../plan/types';

export type ParameterType = 'str' | 'float';

export interface ParameterSpec {
  name: string;
  type: ParameterType;
  default?: string | number;
}

/** Arguments after binding: every declared parameter is present. */
export type BoundArguments = Record<string, LiteralValue>;

export interface SessionContext {
  connected: boolean;
  broker: BrokerGateway;
}

export interface Capability {
  name: string;
  description: string;
  parameters: ReadonlyArray<ParameterSpec>;
  execute(args: BoundArguments, session: SessionContext): Promise<Outcome>;
}

export interface ToolRegistry {
  register(capability: Capability): void;
  get(name: string): Capability | undefined;
  has(name: string): boolean;
  list(): Capability[];
}
