import { minimatch } from "minimatch";
import type {
  Agent,
  Message,
  StepExecutionOptions,
  StepResult,
} from "../core/types";

export type StepHandler = (
  inputs: Record<string, unknown>,
  options: StepExecutionOptions,
) => StepResult | Promise<StepResult>;

export type MessageHandler = (message: Message) => void | Promise<void>;

export interface HandlerAgentOptions {
  /** Keyed by step name or glob, e.g. `assess_*`; first match wins. */
  handlers: Record<string, StepHandler>;
  onMessage?: MessageHandler;
}

/**
 * Agent backed by plain functions. Capabilities are the handler keys, so
 * `canHandleStep` and alternate-agent lookup follow the same globs.
 */
export class HandlerAgent implements Agent {
  private readonly handlers: ReadonlyArray<[string, StepHandler]>;
  private readonly onMessage: MessageHandler | undefined;
  private readonly inbox: Message[] = [];

  constructor(options: HandlerAgentOptions) {
    this.handlers = Object.entries(options.handlers);
    this.onMessage = options.onMessage;
  }

  async executeStep(
    stepName: string,
    inputs: Record<string, unknown>,
    options: StepExecutionOptions = {},
  ): Promise<StepResult> {
    const handler = this.handlerFor(stepName);
    if (!handler) {
      return { status: "error", error: `No handler for step ${stepName}` };
    }
    return handler(inputs, options);
  }

  async receiveMessage(message: Message): Promise<void> {
    this.inbox.push(message);
    await this.onMessage?.(message);
  }

  canHandleStep(stepName: string): boolean {
    return this.handlerFor(stepName) !== undefined;
  }

  getCapabilities(): ReadonlySet<string> {
    return new Set(this.handlers.map(([pattern]) => pattern));
  }

  /** Messages delivered so far, oldest first. */
  getInbox(): readonly Message[] {
    return this.inbox;
  }

  private handlerFor(stepName: string): StepHandler | undefined {
    return this.handlers.find(
      ([pattern]) => pattern === stepName || minimatch(stepName, pattern),
    )?.[1];
  }
}
