import { describe, expect, it } from "vitest";
import { HandlerAgent } from "../src/agents/handler-agent";
import { AgentRegistry } from "../src/core/agent-registry";
import { CommunicationError } from "../src/core/errors";
import { KeyedMutex } from "../src/core/keyed-lock";
import { MessageBus } from "../src/core/message-bus";
import { asSessionId, type Message } from "../src/core/types";
import { createRecordingLogger, fixedClock } from "./helpers";

const setup = (options: { allowedTypes?: ("request" | "response")[] } = {}) => {
  const registry = new AgentRegistry();
  const logger = createRecordingLogger();
  const clock = fixedClock();
  const bus = new MessageBus(registry, logger, {
    now: clock.now,
    ...(options.allowedTypes ? { allowedTypes: options.allowedTypes } : {}),
  });
  const intake = new HandlerAgent({ handlers: {} });
  const underwriter = new HandlerAgent({ handlers: {} });
  registry.register("intake", intake);
  registry.register("underwriter", underwriter);
  return { registry, logger, bus, intake, underwriter };
};

describe("MessageBus", () => {
  it("delivers messages with defaults filled in", async () => {
    const { bus, underwriter } = setup();

    const sent = bus.send({
      sender: "intake",
      recipient: "underwriter",
      type: "request",
      content: { application: "app-1" },
      sessionId: asSessionId("session-1"),
      id: "m-1",
    });
    await bus.drain();

    expect(sent).toEqual({
      id: "m-1",
      sender: "intake",
      recipient: "underwriter",
      timestamp: "2026-03-02T10:00:00.000Z",
      type: "request",
      content: { application: "app-1" },
      priority: "medium",
      session_id: "session-1",
    });
    expect(underwriter.getInbox()).toEqual([sent]);
  });

  it("delivers to one recipient in send order", async () => {
    const registry = new AgentRegistry();
    const bus = new MessageBus(registry, createRecordingLogger());
    const received: string[] = [];
    registry.register("intake", new HandlerAgent({ handlers: {} }));
    registry.register(
      "slow",
      new HandlerAgent({
        handlers: {},
        onMessage: async (message) => {
          if (message.content.order === 1) {
            await new Promise((resolve) => setTimeout(resolve, 20));
          }
          received.push(String(message.content.order));
        },
      }),
    );

    bus.send({ sender: "intake", recipient: "slow", type: "notification", content: { order: 1 } });
    bus.send({ sender: "intake", recipient: "slow", type: "notification", content: { order: 2 } });
    bus.send({ sender: "intake", recipient: "slow", type: "notification", content: { order: 3 } });
    await bus.drain();

    expect(received).toEqual(["1", "2", "3"]);
  });

  it("drops a redelivered message id", async () => {
    const { bus, underwriter, logger } = setup();
    const input = {
      sender: "intake",
      recipient: "underwriter",
      type: "notification",
      content: {},
      id: "dup-1",
    };

    bus.send(input);
    bus.send(input);
    await bus.drain();

    expect(underwriter.getInbox()).toHaveLength(1);
    expect(logger.events("debug")).toContain("message_duplicate");
  });

  it("rejects unknown senders, recipients and message types", () => {
    const { bus } = setup({ allowedTypes: ["request", "response"] });

    expect(() =>
      bus.send({ sender: "ghost", recipient: "underwriter", type: "request", content: {} }),
    ).toThrow(new CommunicationError("Unknown sender: ghost"));
    expect(() =>
      bus.send({ sender: "intake", recipient: "ghost", type: "request", content: {} }),
    ).toThrow(new CommunicationError("Unknown recipient: ghost"));
    expect(() =>
      bus.send({ sender: "intake", recipient: "underwriter", type: "gossip", content: {} }),
    ).toThrow(new CommunicationError("Unsupported message type: gossip"));
    expect(() =>
      bus.send({ sender: "intake", recipient: "underwriter", type: "decision", content: {} }),
    ).toThrow(new CommunicationError("Unsupported message type: decision"));
  });

  it("sends system notifications from the manager id", async () => {
    const { bus, intake } = setup();

    const message = bus.notify({
      recipient: "intake",
      type: "error",
      content: { step: "assess_risk" },
      priority: "high",
    });
    await bus.drain();

    expect(message.sender).toBe("collaboration_manager");
    expect(message.priority).toBe("high");
    expect(intake.getInbox().map((m: Message) => m.id)).toEqual([message.id]);
  });

  it("dead-letters a delivery the recipient rejects", async () => {
    const { bus, registry, logger } = setup();
    registry.register(
      "broken",
      new HandlerAgent({
        handlers: {},
        onMessage: () => {
          throw new Error("inbox full");
        },
      }),
    );

    const message = bus.send({
      sender: "intake",
      recipient: "broken",
      type: "request",
      content: {},
      id: "m-9",
    });
    await bus.drain();

    expect(bus.getDeadLetters()).toEqual([
      {
        message,
        reason: "inbox full",
        failed_at: "2026-03-02T10:00:00.000Z",
      },
    ]);
    expect(logger.events("error")).toEqual(["message_delivery_failed"]);
  });

  it("dead-letters when the recipient is unregistered before delivery", async () => {
    const { bus, registry } = setup();

    bus.send({ sender: "intake", recipient: "underwriter", type: "request", content: {} });
    registry.unregister("underwriter");
    await bus.drain();

    expect(bus.getDeadLetters().map((letter) => letter.reason)).toEqual([
      "recipient unregistered before delivery",
    ]);
  });

  it("delivers outside the sender's async context", async () => {
    const { bus, registry } = setup();
    const mutex = new KeyedMutex();
    const heldDuringDelivery: boolean[] = [];
    registry.register(
      "auditor",
      new HandlerAgent({
        handlers: {},
        onMessage: () => {
          heldDuringDelivery.push(mutex.isHeld("session-1"));
        },
      }),
    );

    await mutex.runExclusive("session-1", async () => {
      bus.send({ sender: "intake", recipient: "auditor", type: "notification", content: {} });
      await bus.drain();
    });

    expect(heldDuringDelivery).toEqual([false]);
  });
});
