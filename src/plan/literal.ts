import { jsonrepair } from 'jsonrepair';
import { errorMessage, MalformedPlanError } from '../errors';
import type { LiteralObject, LiteralValue } from './types';

/**
 * Reader for the object literals language models tend to emit.
 *
 * jsonrepair turns single-quoted strings, bare keys, trailing commas and
 * the keywords `True`, `False` and `None` into strict JSON, which is then
 * parsed as data. The input is never evaluated.
 */

const FENCE_RE = /^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/;

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const m = FENCE_RE.exec(trimmed);
  return m ? m[1].trim() : trimmed;
}

// JSON.parse and Object.fromEntries both define keys as own properties,
// so a `__proto__` key stays plain data.
function toLiteral(value: unknown): LiteralValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new MalformedPlanError(`Unsupported number: ${value}`);
    return value;
  }
  if (Array.isArray(value)) return value.map(toLiteral);
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toLiteral(item)]));
  }
  throw new MalformedPlanError(`Unsupported value of type ${typeof value}`);
}

export function parseLiteral(text: string): LiteralValue {
  const src = stripCodeFence(text);
  if (!src) throw new MalformedPlanError('Response is empty');
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonrepair(src));
  } catch (err) {
    throw new MalformedPlanError(`Unreadable response: ${errorMessage(err)}`);
  }
  return toLiteral(parsed);
}

export function isLiteralObject(value: LiteralValue | undefined): value is LiteralObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Own-property lookup; inherited members never count as keys. */
export function ownValue(obj: LiteralObject, key: string): LiteralValue | undefined {
  return Object.prototype.hasOwnProperty.call(obj, key) ? obj[key] : undefined;
}
