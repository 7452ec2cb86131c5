export class EmptyResponseError extends Error {
  constructor(message = 'Empty response from streaming LLM') {
    super(message);
    this.name = 'EmptyResponseError';
  }
}

export class MalformedPlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPlanError';
  }
}

export class CompletionError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
