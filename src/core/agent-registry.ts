import {
  DuplicateAgentError,
  UnregisteredAgentError,
  ValidationError,
} from "./errors";
import type { Agent, AgentId } from "./types";
import { asAgentId, isSafeId } from "./types";

export class AgentRegistry {
  private readonly agents = new Map<AgentId, Agent>();

  register(agentId: string, agent: Agent): AgentId {
    if (!isSafeId(agentId)) {
      throw new ValidationError(
        `Agent id may only use letters, digits and _.:-: ${JSON.stringify(agentId)}`,
      );
    }
    const id = asAgentId(agentId);
    if (this.agents.has(id)) {
      throw new DuplicateAgentError(agentId);
    }
    this.agents.set(id, agent);
    return id;
  }

  unregister(agentId: string): boolean {
    return this.agents.delete(asAgentId(agentId));
  }

  has(agentId: string): boolean {
    return this.agents.has(asAgentId(agentId));
  }

  get(agentId: string): Agent | undefined {
    return this.agents.get(asAgentId(agentId));
  }

  require(agentId: string): Agent {
    const agent = this.get(agentId);
    if (!agent) {
      throw new UnregisteredAgentError(agentId);
    }
    return agent;
  }

  list(): AgentId[] {
    return [...this.agents.keys()];
  }

  /** Registered agents other than `exclude` that accept the step, in registration order. */
  findAlternates(stepName: string, exclude: string): AgentId[] {
    return [...this.agents.entries()]
      .filter(([id, agent]) => id !== exclude && agent.canHandleStep(stepName))
      .map(([id]) => id);
  }
}
