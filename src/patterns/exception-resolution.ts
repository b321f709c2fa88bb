import { definePattern, onError, step } from "../core/pattern-definition";

// Document exceptions wait for the applicant's upload; other kinds go
// straight to reassessment.
export default definePattern({
  name: "exception_resolution",
  description: "Classify an exception, gather what is missing, reassess",
  agents: ["orchestrator", "document_agent", "underwriting_agent"],
  initiator: "orchestrator",
  steps: [
    step({
      name: "classify_exception",
      agent: "orchestrator",
      required: true,
      inputs: ["application_id", "exception"],
      outputs: ["exception_type", "exception_severity"],
    }),
    step({
      name: "request_documents",
      agent: "document_agent",
      required: false,
      condition: "exception_type == 'document'",
      inputs: ["application_id", "exception"],
      outputs: ["requested_documents"],
    }),
    step({
      name: "receive_documents",
      agent: "document_agent",
      required: false,
      condition: "exception_type == 'document'",
      eventTriggered: true,
      triggerEvent: "documents_uploaded",
      inputs: ["application_id", "documents"],
      outputs: ["document_status"],
    }),
    step({
      name: "reassess_application",
      agent: "underwriting_agent",
      required: true,
      inputs: ["application_id", "exception_type", "document_status"],
      outputs: ["risk_assessment", "loan_terms"],
    }),
    step({
      name: "resolve_exception",
      agent: "orchestrator",
      required: true,
      inputs: ["application_id", "risk_assessment"],
      outputs: ["resolution"],
    }),
  ],
  errorHandling: {
    classify_exception: onError({
      onError: "retry",
      maxRetries: 1,
      fallback: "manual_intervention",
    }),
    request_documents: onError({ fallback: "skip_step" }),
    reassess_application: onError({ onError: "notify_human" }),
  },
});
