export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

export type LiteralObject = { [key: string]: LiteralValue };

export interface Action {
  name: string;
  parameters: LiteralObject;
}

export interface ActionPlan {
  actions: Action[];
}

export type OutcomeResult = 'success' | 'failed';

export interface Outcome {
  result: OutcomeResult;
  message: unknown;
}

export interface StepResult {
  action: Action;
  outcome: Outcome;
}
