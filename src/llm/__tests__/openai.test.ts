import OpenAI from 'openai';
import { CompletionError, EmptyResponseError } from '../../errors';
import { createOpenAICompletionClient, type StreamChat } from '../openai';

function chunk(
  content: string | null,
  finishReason: OpenAI.Chat.ChatCompletionChunk.Choice['finish_reason'] = null,
): OpenAI.Chat.ChatCompletionChunk {
  return {
    id: 'chunk',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, delta: { content }, finish_reason: finishReason }],
  };
}

function streamOf(...contents: Array<string | null>): StreamChat {
  return jest.fn(async () => {
    async function* gen(): AsyncGenerator<OpenAI.Chat.ChatCompletionChunk> {
      for (const c of contents) yield chunk(c);
    }
    return gen();
  });
}

function client(streamChat: StreamChat, timeoutMs?: number) {
  return createOpenAICompletionClient({
    id: 'test',
    apiKey: 'test-key',
    model: 'test-model',
    timeoutMs,
    streamChat,
  });
}

describe('OpenAI completion client', () => {
  it('concatenates fragments in arrival order and echoes each one', async () => {
    const echoed: string[] = [];
    const llm = client(streamOf("{'actions': [", null, "{'name': 'connect', 'parameters': {}}]}"));

    const text = await llm.complete('system', 'connect me', { onFragment: (f) => echoed.push(f) });

    expect(text).toBe("{'actions': [{'name': 'connect', 'parameters': {}}]}");
    expect(echoed).toEqual(["{'actions': [", "{'name': 'connect', 'parameters': {}}]}"]);
  });

  it('does not rewrite boolean tokens', async () => {
    const llm = client(streamOf("{'actions': [{'name': 'x', 'parameters': {'note': 'true', 'flag': false}}]}"));

    expect(await llm.complete('system', 'x')).toBe(
      "{'actions': [{'name': 'x', 'parameters': {'note': 'true', 'flag': false}}]}",
    );
  });

  it('trims surrounding whitespace', async () => {
    const llm = client(streamOf('\n  ', '{}', '  \n'));

    expect(await llm.complete('system', 'x')).toBe('{}');
  });

  it('fails with EmptyResponseError on a blank stream', async () => {
    const llm = client(streamOf('  ', '\n'));

    await expect(llm.complete('system', 'x')).rejects.toBeInstanceOf(EmptyResponseError);
  });

  it('sends the prompt, utterance, temperature and cancellation options', async () => {
    const streamChat = streamOf('{}');
    const controller = new AbortController();
    const llm = client(streamChat, 30_000);

    await llm.complete('the system prompt', 'price of AAPL', { signal: controller.signal });

    expect(streamChat).toHaveBeenCalledWith(
      {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'the system prompt' },
          { role: 'user', content: 'price of AAPL' },
        ],
        temperature: 0.7,
        stream: true,
      },
      { signal: controller.signal, timeout: 30_000 },
    );
  });

  it('wraps API errors in CompletionError', async () => {
    const streamChat: StreamChat = jest.fn(async () => {
      throw new OpenAI.APIError(429, undefined, 'Rate limit reached', undefined);
    });
    const llm = client(streamChat);

    const err = await llm.complete('system', 'x').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err).toMatchObject({ status: 429, message: '429 Rate limit reached' });
  });

  it('rejects a response cut off at the token limit', async () => {
    const streamChat: StreamChat = jest.fn(async () => {
      async function* gen(): AsyncGenerator<OpenAI.Chat.ChatCompletionChunk> {
        yield chunk("{'actions': [{'name': 'placeOrder', 'parameters': {'symbol': 'AA");
        yield chunk(null, 'length');
      }
      return gen();
    });

    await expect(client(streamChat).complete('system', 'x')).rejects.toThrow(
      new CompletionError('Response truncated at the token limit'),
    );
  });

  it('accepts a stream that finishes normally', async () => {
    const streamChat: StreamChat = jest.fn(async () => {
      async function* gen(): AsyncGenerator<OpenAI.Chat.ChatCompletionChunk> {
        yield chunk("{'actions': []}");
        yield chunk(null, 'stop');
      }
      return gen();
    });

    expect(await client(streamChat).complete('system', 'x')).toBe("{'actions': []}");
  });

  it('passes other errors through', async () => {
    const streamChat: StreamChat = jest.fn(async () => {
      throw new TypeError('boom');
    });

    await expect(client(streamChat).complete('system', 'x')).rejects.toThrow('boom');
  });
});
