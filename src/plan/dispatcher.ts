import pino from 'pino';
import { errorMessage } from '../errors';
import { bindArguments } from '../tools/schema';
import type { SessionContext, ToolRegistry } from '../tools/types';
import type { Action, ActionPlan, Outcome, StepResult } from './types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export interface DispatchHooks {
  onStep?: (step: StepResult) => void;
}

async function executeAction(action: Action, registry: ToolRegistry, session: SessionContext): Promise<Outcome> {
  const capability = registry.get(action.name);
  if (!capability) {
    return { result: 'failed', message: `Unknown tool: ${action.name}` };
  }
  try {
    logger.info({ tool: action.name, params: action.parameters }, `Activate tool: ${action.name}, with arguments: ${JSON.stringify(action.parameters)}`);
    const args = bindArguments(capability, action.parameters);
    return await capability.execute(args, session);
  } catch (err) {
    return { result: 'failed', message: `Error executing ${action.name}: ${errorMessage(err)}` };
  }
}

/**
 * Runs the plan strictly in order; a failed step never stops the ones
 * after it. Only successful `connect`/`disconnect` steps move
 * `session.connected`.
 */
export async function runPlan(
  plan: ActionPlan,
  registry: ToolRegistry,
  session: SessionContext,
  hooks: DispatchHooks = {},
): Promise<StepResult[]> {
  const steps: StepResult[] = [];
  for (const action of plan.actions) {
    const outcome = await executeAction(action, registry, session);
    if (outcome.result === 'success') {
      if (action.name === 'connect') session.connected = true;
      else if (action.name === 'disconnect') session.connected = false;
    }
    const step = { action, outcome };
    steps.push(step);
    hooks.onStep?.(step);
  }
  return steps;
}
