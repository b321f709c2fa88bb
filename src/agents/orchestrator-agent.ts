import type { Message } from "../core/types";
import { HandlerAgent, type HandlerAgentOptions } from "./handler-agent";

export type EscalationHandler = (message: Message) => void | Promise<void>;

export interface OrchestratorAgentOptions extends Partial<HandlerAgentOptions> {
  /** Invoked for every `error` message, i.e. each escalated step failure. */
  onEscalation?: EscalationHandler;
}

/**
 * Supervisor agent. It owns the decision steps it has handlers for and
 * collects escalations so an operator or policy can answer them with
 * `resume`.
 */
export class OrchestratorAgent extends HandlerAgent {
  private readonly escalations: Message[] = [];
  private readonly acknowledged = new Set<string>();
  private readonly onEscalation: EscalationHandler | undefined;

  constructor(options: OrchestratorAgentOptions = {}) {
    super({
      handlers: options.handlers ?? {},
      ...(options.onMessage ? { onMessage: options.onMessage } : {}),
    });
    this.onEscalation = options.onEscalation;
  }

  override async receiveMessage(message: Message): Promise<void> {
    if (message.type === "error") {
      this.escalations.push(message);
      await this.onEscalation?.(message);
    }
    await super.receiveMessage(message);
  }

  getEscalations(): readonly Message[] {
    return this.escalations;
  }

  /** Escalations not yet marked with `acknowledge`. */
  pendingEscalations(): Message[] {
    return this.escalations.filter(
      (message) => !this.acknowledged.has(message.id),
    );
  }

  acknowledge(messageId: string): boolean {
    const known = this.escalations.some((message) => message.id === messageId);
    if (known) {
      this.acknowledged.add(messageId);
    }
    return known;
  }
}
