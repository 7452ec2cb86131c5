import readline from 'node:readline';
import pino, { type Logger } from 'pino';
import { errorMessage } from './errors';
import type { BrokerGateway } from './exchanges/types';
import { buildSystemPrompt } from './llm/prompt';
import type { CompletionClient } from './llm/types';
import { runPlan } from './plan/dispatcher';
import { parseActionPlan } from './plan/parser';
import type { StepResult } from './plan/types';
import { describeRegistry } from './tools/schema';
import type { SessionContext, ToolRegistry } from './tools/types';

export const GREETING = "Financial Assistant: How can I help you today? (type 'exit' to quit)";
export const NO_ACTIONS_MESSAGE = 'Assistant: No actions returned by the LLM.';

export interface SessionOptions {
  registry: ToolRegistry;
  llm: CompletionClient;
  broker: BrokerGateway;
  /** Operator console; defaults to stdout. */
  write?: (text: string) => void;
  logger?: Logger;
}

export function isExitCommand(line: string): boolean {
  return line.trim().toLowerCase() === 'exit';
}

export function formatStep({ action, outcome }: StepResult): string {
  return `Tool Result (${action.name}): ${JSON.stringify(outcome)}`;
}

export class Session {
  private readonly logger: Logger;
  private readonly registry: ToolRegistry;
  private readonly llm: CompletionClient;
  private readonly write: (text: string) => void;
  readonly context: SessionContext;

  constructor(opts: SessionOptions) {
    this.registry = opts.registry;
    this.llm = opts.llm;
    this.write = opts.write ?? ((text) => process.stdout.write(text));
    this.logger = opts.logger ?? pino({ level: process.env.LOG_LEVEL ?? 'info' });
    this.context = { connected: false, broker: opts.broker };
  }

  private print(line: string): void {
    this.write(`${line}\n`);
  }

  /**
   * One request/response cycle. Errors are reported to the operator and
   * swallowed so the next turn can run.
   */
  async runTurn(utterance: string, signal?: AbortSignal): Promise<StepResult[]> {
    let streamed = false;
    try {
      const prompt = buildSystemPrompt(this.context.connected, describeRegistry(this.registry));
      const text = await this.llm.complete(prompt, utterance, {
        signal,
        onFragment: (fragment) => {
          streamed = true;
          this.write(fragment);
        },
      });
      if (streamed) {
        this.print('');
        streamed = false;
      }
      const plan = parseActionPlan(text);
      if (plan.actions.length === 0) {
        this.print(NO_ACTIONS_MESSAGE);
        return [];
      }
      return await runPlan(plan, this.registry, this.context, {
        onStep: (step) => this.print(formatStep(step)),
      });
    } catch (err) {
      if (streamed) this.print('');
      this.logger.debug({ err, llm: this.llm.id }, 'turn failed');
      this.print(`Error processing response: ${errorMessage(err)}`);
      return [];
    }
  }

  async start(input: NodeJS.ReadableStream = process.stdin): Promise<void> {
    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    this.print(GREETING);
    this.write('> ');
    try {
      for await (const line of rl) {
        if (isExitCommand(line)) break;
        if (line.trim()) await this.runTurn(line);
        this.write('> ');
      }
    } finally {
      rl.close();
    }
    await this.close();
  }

  async close(): Promise<void> {
    if (!this.context.broker.isConnected()) return;
    await this.context.broker.disconnect();
    this.context.connected = false;
    this.logger.info('broker session closed');
  }
}
