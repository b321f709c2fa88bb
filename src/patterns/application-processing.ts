import { definePattern, onError, step } from "../core/pattern-definition";

export default definePattern({
  name: "application_processing",
  description:
    "Documents, risk, compliance and a confirmed decision for one application",
  agents: [
    "orchestrator",
    "document_agent",
    "underwriting_agent",
    "compliance_agent",
  ],
  initiator: "orchestrator",
  steps: [
    step({
      name: "collect_documents",
      agent: "document_agent",
      required: true,
      inputs: ["application_id", "documents"],
      outputs: ["document_status", "missing_documents"],
    }),
    step({
      name: "analyze_documents",
      agent: "document_agent",
      required: true,
      inputs: ["application_id", "documents"],
      outputs: ["document_analysis"],
      timeoutSeconds: 120,
    }),
    step({
      name: "assess_risk",
      agent: "underwriting_agent",
      required: true,
      inputs: ["application_id", "document_analysis", "loan_details"],
      outputs: ["risk_assessment", "loan_terms"],
    }),
    step({
      name: "check_compliance",
      agent: "compliance_agent",
      required: true,
      inputs: ["application_id", "loan_terms", "risk_assessment"],
      outputs: ["compliance_results", "compliance_issues"],
    }),
    step({
      name: "final_decision",
      agent: "orchestrator",
      required: true,
      inputs: [
        "application_id",
        "risk_assessment",
        "loan_terms",
        "compliance_results",
      ],
      outputs: ["decision", "decision_reason"],
      requiresConfirmation: true,
    }),
  ],
  errorHandling: {
    collect_documents: onError({
      onError: "retry",
      maxRetries: 2,
      fallback: "manual_intervention",
    }),
    analyze_documents: onError({ onError: "notify_orchestrator" }),
    assess_risk: onError({
      onError: "retry",
      maxRetries: 1,
      fallback: "conservative_assessment",
    }),
    check_compliance: onError({
      onError: "retry",
      maxRetries: 1,
      fallback: "conservative_assessment",
    }),
    final_decision: onError({ onError: "notify_human" }),
  },
});
