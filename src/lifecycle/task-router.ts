import type { MessageBus } from "../core/message-bus";
import type {
  ApplicationRecord,
  ApplicationState,
  MessageId,
} from "../core/types";
import type { ModuleLogger } from "../logging/logger";

export interface TaskRoute {
  agent: string;
  taskType: string;
}

export type TaskRoutes = Partial<Record<ApplicationState, TaskRoute>>;

export const DEFAULT_TASK_ROUTES: TaskRoutes = {
  document_collection: {
    agent: "document_agent",
    taskType: "document_collection",
  },
  document_validation: {
    agent: "document_agent",
    taskType: "document_validation",
  },
  document_analysis: { agent: "document_agent", taskType: "document_analysis" },
  underwriting: { agent: "underwriting_agent", taskType: "underwriting" },
  compliance_check: {
    agent: "compliance_agent",
    taskType: "compliance_check",
  },
  decision_pending: { agent: "orchestrator", taskType: "decision" },
};

/** Hands the work for a freshly entered state to the agent that owns it. */
export class TaskRouter {
  private readonly routes: TaskRoutes;

  constructor(
    private readonly bus: MessageBus,
    private readonly logger: ModuleLogger,
    routes: TaskRoutes = {},
  ) {
    this.routes = { ...DEFAULT_TASK_ROUTES, ...routes };
  }

  routeFor(state: ApplicationState): TaskRoute | undefined {
    return this.routes[state];
  }

  route(application: ApplicationRecord): MessageId | undefined {
    const route = this.routes[application.state];
    if (!route) {
      return undefined;
    }

    const message = this.bus.notify({
      recipient: route.agent,
      type: "notification",
      content: {
        task_type: route.taskType,
        application_id: application.application_id,
        state: application.state,
      },
    });
    this.logger.info(
      "task_routed",
      {
        application: application.application_id,
        agent: route.agent,
        task: route.taskType,
      },
      `Routed ${route.taskType} for ${application.application_id} to ${route.agent}`,
    );
    return message.id;
  }
}
