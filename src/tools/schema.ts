import type { LiteralObject } from '../plan/types';
import type { BoundArguments, Capability, ParameterSpec, ToolRegistry } from './types';

function describeParameter(param: ParameterSpec): string {
  const fallback = param.default === undefined ? '' : `, default '${String(param.default)}'`;
  return `${param.name} (${param.type}${fallback})`;
}

/**
 * One-line schema of a capability for the system prompt, e.g.
 * `positions: Parameters: account (str, default ''). Retrieve current positions.`
 */
export function describeCapability(capability: Capability): string {
  const params = capability.parameters.map(describeParameter);
  const description = capability.description.split(/\s+/).filter(Boolean).join(' ') || 'No description available.';
  return `${capability.name}: Parameters: ${params.length ? params.join(', ') : 'No parameters'}. ${description}`;
}

export function describeRegistry(registry: ToolRegistry): string[] {
  return registry.list().map(describeCapability);
}

/**
 * Resolves action parameters against the declared list the way named
 * arguments bind: defaults fill gaps, unknown names and missing required
 * values throw.
 */
export function bindArguments(capability: Capability, params: LiteralObject): BoundArguments {
  const declared = new Set(capability.parameters.map((p) => p.name));
  for (const key of Object.keys(params)) {
    if (!declared.has(key)) throw new Error(`unexpected parameter '${key}'`);
  }
  const bound: BoundArguments = {};
  for (const param of capability.parameters) {
    const value = Object.prototype.hasOwnProperty.call(params, param.name) ? params[param.name] : param.default;
    if (value === undefined) throw new Error(`missing required parameter '${param.name}'`);
    bound[param.name] = value;
  }
  return bound;
}
