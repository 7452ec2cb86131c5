import { STATUS_NOT_CONNECTED } from './prompt';
import type { CompletionClient } from './types';

const TICKER_RE = /^[A-Z]{1,5}$/;
// capitalised words that are not tickers
const STOP_WORDS = new Set(['I', 'A', 'AN', 'THE', 'OF', 'IS', 'MY', 'ME', 'BUY', 'SELL', 'USD']);

function call(name: string, parameters: Record<string, string> = {}): string {
  const params = Object.entries(parameters)
    .map(([k, v]) => `'${k}': '${v}'`)
    .join(', ');
  return `{'name': '${name}', 'parameters': {${params}}}`;
}

function pickTicker(utterance: string): string | undefined {
  for (const word of utterance.split(/[^A-Za-z]+/)) {
    if (TICKER_RE.test(word) && !STOP_WORDS.has(word)) return word;
  }
  return undefined;
}

/**
 * Offline completion client with fixed keyword rules; lets the session
 * run end to end without model credentials.
 */
export function createMockCompletionClient(id: string): CompletionClient {
  return {
    id,
    async complete(systemPrompt, utterance, options = {}) {
      const notConnected = systemPrompt.includes(`currently ${STATUS_NOT_CONNECTED}`);
      const lower = utterance.toLowerCase();
      const calls: string[] = [];

      if (lower.includes('disconnect')) {
        calls.push(call('disconnect'));
      } else {
        if (lower.includes('position')) {
          calls.push(call('positions'));
        } else if (lower.includes('account') || lower.includes('balance')) {
          calls.push(call('accountValues'));
        } else {
          const symbol = pickTicker(utterance);
          if (symbol) calls.push(call('reqMktData', { symbol }));
        }
        if (notConnected && (calls.length > 0 || lower.includes('connect'))) calls.unshift(call('connect'));
      }

      const text = `{'actions': [${calls.join(', ')}]}`;
      options.onFragment?.(text);
      return text;
    },
  };
}
