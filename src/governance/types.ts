export type RiskTier = "LOW" | "MEDIUM" | "HIGH";

export type RiskSignal = "irreversible_impact" | "policy_conflict" | "budget_breach" | "heuristic";

export type PipelineStage = "PLAN" | "GATHER" | "PRODUCE" | "REVIEW" | "RECONCILE" | "COMPLIANCE";

export type TaskStatus = "PENDING" | "RUNNING" | "REVIEW" | "ESCALATED" | "DONE" | "REJECTED";

export type TaskOutcome = "PENDING" | "APPROVED" | "ESCALATED" | "REJECTED" | "DONE";

export type PolicyRuleKind = "value" | "invariant" | "heuristic" | "tradeoff";

export type PolicyRuleOrigin = "seed" | "promotion";

export type PolicyRuleMatch = {
  /** Single words match a token; phrases match when every word is present. */
  keywords: string[];
  signal: RiskSignal;
  tier?: RiskTier;
  /** `block` turns a policy conflict into a submission rejection. */
  effect?: "escalate" | "block";
};

export type PolicyRule = {
  id: string;
  kind: PolicyRuleKind;
  text: string;
  version: number;
  createdAt: string;
  origin: PolicyRuleOrigin;
  approvedBy?: string;
  proposalId?: string;
  match?: PolicyRuleMatch;
};

export type ProvenanceInput = {
  id?: string;
  source: string;
  timestamp: string;
  confidence: number;
  contentRef?: string;
};

export type ProvenanceRecord = {
  id: string;
  source: string;
  timestamp: string;
  confidence: number;
  contentRef: string;
  taskId?: string;
  appendedAt: string;
};

export type TaskBudget = {
  maxSteps: number;
  maxToolCalls: number;
  maxActiveMs: number;
  stepsUsed: number;
  toolCallsUsed: number;
  activeMs: number;
};

export type TaskSpec = {
  goal: string;
  deliverables: string[];
  successCriteria: string[];
  constraints: string[];
  estimatedSteps: number;
  estimatedToolCalls: number;
  falsifiable: boolean;
};

export type OutputClaim = {
  text: string;
  provenanceRefs: string[];
};

export type TaskOutput = {
  content: string;
  claims: OutputClaim[];
  attempt: number;
};

export type ReviewFinding = {
  code: "EMPTY_OUTPUT" | "MISSING_DELIVERABLES" | "UNSUPPORTED_CLAIM";
  message: string;
  blocking: boolean;
};

export type ReviewVerdict = {
  passed: boolean;
  findings: ReviewFinding[];
  requiredChanges: string[];
  unsupportedClaims: string[];
  dominance: SourceDominance;
  warnings: string[];
};

export type SourceDominance = {
  dominant: boolean;
  source?: string;
  share: number;
  recordCount: number;
};

export type ReconcileDecision = "ACCEPT" | "RETRY" | "ESCALATE";

export type Reconciliation = {
  decision: ReconcileDecision;
  reason: string;
};

export type ComplianceVerdict = "APPROVE" | "HOLD" | "REJECT";

export type ComplianceResult = {
  verdict: ComplianceVerdict;
  reasons: string[];
  flaggedKeywords: string[];
};

export type TaskWorkspace = {
  spec?: TaskSpec;
  provenanceIds: string[];
  output?: TaskOutput;
  review?: ReviewVerdict;
  reconciliation?: Reconciliation;
  compliance?: ComplianceResult;
};

export type RiskAssessment = {
  tier: RiskTier;
  signals: RiskSignal[];
  primarySignal?: RiskSignal;
  policyRefs: string[];
  matchedKeywords: string[];
  blocking: boolean;
  rationale: string;
};

export type EscalationReason =
  | "approval_gate"
  | "compliance_hold"
  | "retry_exhausted"
  | "authority_violation"
  | "stage_failure"
  | "policy_conflict";

export type TaskEscalation = {
  reason: EscalationReason;
  gate: PipelineStage;
  resumeStage: PipelineStage;
  rationale: string;
  policyRefs: string[];
  auditEntryId: string;
  at: string;
};

export type TaskApproval = {
  gate: PipelineStage;
  approver: string;
  at: string;
};

export type TaskTransition = {
  from: TaskStatus;
  to: TaskStatus;
  stage: PipelineStage | null;
  at: string;
  reason: string;
};

export type TaskRecord = {
  id: string;
  goal: string;
  riskTier: RiskTier;
  risk: RiskAssessment;
  stage: PipelineStage | null;
  status: TaskStatus;
  outcome: TaskOutcome;
  budget: TaskBudget;
  retries: number;
  stageFailures: number;
  workspace: TaskWorkspace;
  approvals: TaskApproval[];
  escalation?: TaskEscalation;
  singleSourceOverride?: { reason: string };
  cancellation?: { reason: string; requestedAt: string };
  rationale?: string;
  notes: string[];
  transitions: TaskTransition[];
  createdAt: string;
  updatedAt: string;
};

export type AuditActor = "governor" | "pipeline" | "promotion" | "human" | `stage:${PipelineStage}`;

export type AuditEntry = {
  id: string;
  seq: number;
  taskId: string;
  stage: PipelineStage | "SUBMIT" | "GOVERNOR" | "PROMOTION";
  decision: string;
  rationale: string;
  policyRefs: string[];
  timestamp: string;
  actor: AuditActor;
  evidence?: Record<string, unknown>;
};

export type EpisodeReason =
  | "completed"
  | "rejected_by_human"
  | "compliance_reject"
  | "budget_exceeded"
  | "cancelled"
  | EscalationReason;

export type EpisodicEntry = {
  id: string;
  taskId: string;
  goal: string;
  riskTier: RiskTier;
  outcome: TaskOutcome;
  reason: EpisodeReason;
  primarySignal?: RiskSignal;
  policyRefs: string[];
  retries: number;
  provenanceCount: number;
  stepsUsed: number;
  durationMs: number;
  timestamp: string;
};

export type ProposalStatus = "PENDING" | "APPROVED" | "REJECTED" | "PRUNED" | "EXPIRED";

export type ProposedRule = {
  kind: PolicyRuleKind;
  text: string;
  match?: PolicyRuleMatch;
};

export type PromotionProposal = {
  id: string;
  patternKey: string;
  rule: ProposedRule;
  evidence: {
    taskIds: string[];
    occurrences: number;
  };
  rationale: string;
  impactAnalysis: string;
  rollbackPlan: string;
  status: ProposalStatus;
  createdAt: string;
  updatedAt: string;
  disposition?: {
    by?: string;
    reason?: string;
    ruleId?: string;
    at: string;
  };
};

export type ApprovalToken = {
  proposalId: string;
  approver: string;
  issuedAt: string;
};
