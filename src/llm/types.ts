export type LLMProvider = 'openai' | 'openrouter' | 'mock';

export interface CompletionOptions {
  /** Called with each streamed fragment in arrival order. */
  onFragment?: (fragment: string) => void;
  signal?: AbortSignal;
}

export interface CompletionClient {
  id: string;
  complete(systemPrompt: string, utterance: string, options?: CompletionOptions): Promise<string>;
}
