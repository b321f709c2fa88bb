import { AsyncResource } from "node:async_hooks";
import { nanoid } from "nanoid";
import type { AuditLogger } from "../audit/audit-logger";
import type { ModuleLogger } from "../logging/logger";
import type { AgentRegistry } from "./agent-registry";
import { CommunicationError, describeError } from "./errors";
import {
  type AgentId,
  type Message,
  type MessageId,
  type MessageType,
  MESSAGE_TYPES,
  type Priority,
  type SessionId,
  asAgentId,
  asMessageId,
} from "./types";

export interface SendMessageInput {
  sender: string;
  recipient: string;
  type: string;
  content: Record<string, unknown>;
  sessionId?: SessionId;
  inResponseTo?: MessageId;
  priority?: Priority;
  /** Reuse an id when redelivering; the recipient drops ids it has seen. */
  id?: string;
}

export interface DeadLetter {
  message: Message;
  reason: string;
  failed_at: string;
}

export interface MessageBusOptions {
  allowedTypes?: readonly MessageType[];
  /** Sender id stamped on system notifications. */
  systemSender?: string;
  /** Every send and dead letter is recorded here when set. */
  audit?: AuditLogger;
  now?: () => Date;
}

/**
 * Point-to-point delivery between registered agents. Each recipient has
 * a single consumer: deliveries to one agent run one at a time, in send
 * order, while `send` hands the id back without waiting for them.
 * Deliveries run in the async context the bus was created in, not the
 * sender's, so a recipient never inherits a lock the sender held.
 */
export class MessageBus {
  private readonly queues = new Map<AgentId, Promise<void>>();
  private readonly seen = new Map<AgentId, Set<MessageId>>();
  private readonly deadLetters: DeadLetter[] = [];
  private readonly deliveryScope = new AsyncResource("MessageDelivery");
  private readonly allowedTypes: ReadonlySet<string>;
  private readonly systemSender: AgentId;
  private readonly audit: AuditLogger | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly logger: ModuleLogger,
    options: MessageBusOptions = {},
  ) {
    this.allowedTypes = new Set(options.allowedTypes ?? MESSAGE_TYPES);
    this.systemSender = asAgentId(
      options.systemSender ?? "collaboration_manager",
    );
    this.audit = options.audit;
    this.now = options.now ?? (() => new Date());
  }

  send(input: SendMessageInput): Message {
    if (!this.registry.has(input.sender)) {
      throw new CommunicationError(`Unknown sender: ${input.sender}`);
    }
    return this.post(asAgentId(input.sender), input);
  }

  /** Engine-originated message; only the recipient must be registered. */
  notify(input: Omit<SendMessageInput, "sender">): Message {
    return this.post(this.systemSender, input);
  }

  /** Resolves once every queued delivery has been handed to its recipient. */
  async drain(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.values()]);
    }
  }

  getDeadLetters(): readonly DeadLetter[] {
    return this.deadLetters;
  }

  private post(
    sender: AgentId,
    input: Omit<SendMessageInput, "sender">,
  ): Message {
    if (!this.registry.has(input.recipient)) {
      throw new CommunicationError(`Unknown recipient: ${input.recipient}`);
    }
    const type = MESSAGE_TYPES.find(
      (candidate) =>
        candidate === input.type && this.allowedTypes.has(candidate),
    );
    if (!type) {
      throw new CommunicationError(`Unsupported message type: ${input.type}`);
    }

    const message: Message = {
      id: asMessageId(input.id ?? nanoid()),
      sender,
      recipient: asAgentId(input.recipient),
      timestamp: this.now().toISOString(),
      type,
      content: input.content,
      priority: input.priority ?? "medium",
      ...(input.sessionId ? { session_id: input.sessionId } : {}),
      ...(input.inResponseTo ? { in_response_to: input.inResponseTo } : {}),
    };

    this.audit?.logAgentAction(message.sender, "message_sent", {
      ...(message.session_id ? { resourceId: message.session_id } : {}),
      details: {
        message_id: message.id,
        recipient: message.recipient,
        type: message.type,
        priority: message.priority,
        content: message.content,
        ...(message.in_response_to
          ? { in_response_to: message.in_response_to }
          : {}),
      },
    });
    this.deliveryScope.runInAsyncScope(() => this.enqueue(message));
    this.logger.debug(
      "message_sent",
      {
        id: message.id,
        from: message.sender,
        to: message.recipient,
        type: message.type,
        session: message.session_id,
      },
      `${message.type} ${message.sender} -> ${message.recipient}`,
    );
    return message;
  }

  private enqueue(message: Message): void {
    const recipient = message.recipient;
    const previous = this.queues.get(recipient) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => this.dispatch(message))
      .catch((error: unknown) => {
        this.logger.error(
          "message_dispatch_failed",
          { id: message.id, to: recipient },
          `Dispatch of ${message.id} failed: ${describeError(error).message}`,
        );
      })
      .then(() => {
        if (this.queues.get(recipient) === next) {
          this.queues.delete(recipient);
        }
      });
    this.queues.set(recipient, next);
  }

  private async dispatch(message: Message): Promise<void> {
    const seen = this.seen.get(message.recipient) ?? new Set<MessageId>();
    this.seen.set(message.recipient, seen);
    if (seen.has(message.id)) {
      this.logger.debug(
        "message_duplicate",
        { id: message.id, to: message.recipient },
        `Dropped duplicate message ${message.id}`,
      );
      return;
    }
    seen.add(message.id);

    const agent = this.registry.get(message.recipient);
    if (!agent) {
      this.deadLetter(message, "recipient unregistered before delivery");
      return;
    }

    try {
      await agent.receiveMessage(message);
    } catch (error) {
      this.deadLetter(message, describeError(error).message);
    }
  }

  private deadLetter(message: Message, reason: string): void {
    this.deadLetters.push({
      message,
      reason,
      failed_at: this.now().toISOString(),
    });
    this.audit?.logAgentAction(message.recipient, "message_dead_lettered", {
      ...(message.session_id ? { resourceId: message.session_id } : {}),
      success: false,
      details: { message_id: message.id, sender: message.sender, reason },
    });
    this.logger.error(
      "message_delivery_failed",
      { id: message.id, to: message.recipient, type: message.type },
      `Delivery of ${message.id} to ${message.recipient} failed: ${reason}`,
    );
  }
}
