import { MalformedPlanError } from '../errors';
import { isLiteralObject, ownValue, parseLiteral } from './literal';
import type { Action, ActionPlan } from './types';

export function parseActionPlan(text: string): ActionPlan {
  const root = parseLiteral(text);
  if (!isLiteralObject(root)) {
    throw new MalformedPlanError('Response is not an object');
  }
  const list = ownValue(root, 'actions');
  if (!Array.isArray(list)) {
    throw new MalformedPlanError("Response has no 'actions' list");
  }
  const actions: Action[] = list.map((item, index) => {
    if (!isLiteralObject(item)) {
      throw new MalformedPlanError(`Action ${index} is not an object`);
    }
    const name = ownValue(item, 'name');
    const parameters = ownValue(item, 'parameters');
    if (typeof name !== 'string' || name.length === 0) {
      throw new MalformedPlanError(`Action ${index} has no 'name'`);
    }
    if (parameters === undefined || parameters === null) {
      return { name, parameters: {} };
    }
    if (!isLiteralObject(parameters)) {
      throw new MalformedPlanError(`Action ${index} ('${name}') has non-object 'parameters'`);
    }
    return { name, parameters };
  });
  return { actions };
}
