import OpenAI from 'openai';
import pino from 'pino';
import { CompletionError, EmptyResponseError } from '../errors';
import type { CompletionClient, CompletionOptions } from './types';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export type StreamChat = (
  body: OpenAI.Chat.ChatCompletionCreateParamsStreaming,
  options: { signal?: AbortSignal; timeout?: number },
) => Promise<AsyncIterable<OpenAI.Chat.ChatCompletionChunk>>;

export interface OpenAICompletionOptions {
  id: string;
  apiKey: string;
  model: string;
  baseURL?: string;
  openRouter?: boolean;
  temperature?: number;
  timeoutMs?: number;
  /** Replaces the SDK call; used by tests to feed canned chunks. */
  streamChat?: StreamChat;
}

function createStreamChat(opts: OpenAICompletionOptions): StreamChat {
  const client = new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL ?? (opts.openRouter ? OPENROUTER_BASE_URL : undefined),
    defaultHeaders: opts.openRouter
      ? {
          'HTTP-Referer': process.env.OPENROUTER_REFERRER ?? 'https://localhost/trade-desk-cli',
          'X-Title': process.env.OPENROUTER_APP_TITLE ?? 'trade-desk-cli',
        }
      : undefined,
  });
  return (body, options) => client.chat.completions.create(body, options);
}

export function createOpenAICompletionClient(opts: OpenAICompletionOptions): CompletionClient {
  const streamChat = opts.streamChat ?? createStreamChat(opts);

  return {
    id: opts.id,
    async complete(systemPrompt: string, utterance: string, options: CompletionOptions = {}): Promise<string> {
      const fragments: string[] = [];
      let finishReason: string | null = null;
      try {
        const stream = await streamChat(
          {
            model: opts.model,
            messages: [
              { role: 'system', content: systemPrompt },
              { role: 'user', content: utterance },
            ],
            temperature: opts.temperature ?? 0.7,
            stream: true,
          },
          { signal: options.signal, timeout: opts.timeoutMs },
        );
        for await (const chunk of stream) {
          finishReason = chunk.choices[0]?.finish_reason ?? finishReason;
          const fragment = chunk.choices[0]?.delta?.content ?? '';
          if (!fragment) continue;
          fragments.push(fragment);
          options.onFragment?.(fragment);
        }
      } catch (err) {
        if (err instanceof OpenAI.APIError) {
          logger.error({ status: err.status, model: opts.model }, 'completion request failed');
          throw new CompletionError(err.message || 'completion request failed', err.status);
        }
        throw err;
      }

      // a plan cut off at the token limit would still repair into valid data
      if (finishReason === 'length') {
        throw new CompletionError('Response truncated at the token limit');
      }
      const text = fragments.join('').trim();
      if (!text) throw new EmptyResponseError();
      return text;
    },
  };
}
