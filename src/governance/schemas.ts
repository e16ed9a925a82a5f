import { z } from "zod";
import type {
  AuditEntry,
  EpisodicEntry,
  PolicyRule,
  PromotionProposal,
  ProvenanceRecord,
  TaskRecord,
} from "./types.js";

// Persisted records are re-validated on read; every schema is pinned to its type so
// the two cannot drift apart.

export const RiskTierSchema = z.enum(["LOW", "MEDIUM", "HIGH"]);
export const RiskSignalSchema = z.enum([
  "irreversible_impact",
  "policy_conflict",
  "budget_breach",
  "heuristic",
]);
export const PipelineStageSchema = z.enum([
  "PLAN",
  "GATHER",
  "PRODUCE",
  "REVIEW",
  "RECONCILE",
  "COMPLIANCE",
]);
export const TaskStatusSchema = z.enum([
  "PENDING",
  "RUNNING",
  "REVIEW",
  "ESCALATED",
  "DONE",
  "REJECTED",
]);
export const TaskOutcomeSchema = z.enum(["PENDING", "APPROVED", "ESCALATED", "REJECTED", "DONE"]);
export const PolicyRuleKindSchema = z.enum(["value", "invariant", "heuristic", "tradeoff"]);

const IsoTimestampSchema = z.string().datetime({ offset: true });

export const PolicyRuleMatchSchema = z.object({
  keywords: z.array(z.string().trim().min(1)).min(1),
  signal: RiskSignalSchema,
  tier: RiskTierSchema.optional(),
  effect: z.enum(["escalate", "block"]).optional(),
});

export const PolicyRuleSchema: z.ZodType<PolicyRule, z.ZodTypeDef, unknown> = z.object({
  id: z.string().trim().min(1),
  kind: PolicyRuleKindSchema,
  text: z.string().min(1),
  version: z.number().int().min(1),
  createdAt: IsoTimestampSchema,
  origin: z.enum(["seed", "promotion"]),
  approvedBy: z.string().optional(),
  proposalId: z.string().optional(),
  match: PolicyRuleMatchSchema.optional(),
});

export const SeedPolicySchema = z.object({
  version: z.number().int().min(1),
  rules: z
    .array(
      z.object({
        id: z.string().trim().min(1),
        kind: PolicyRuleKindSchema,
        text: z.string().min(1),
        match: PolicyRuleMatchSchema.optional(),
      }),
    )
    .min(1),
});

export type SeedPolicy = z.infer<typeof SeedPolicySchema>;

/** Submitted provenance: the three governed fields are mandatory. */
export const ProvenanceInputSchema = z.object({
  id: z.string().trim().min(1).optional(),
  source: z
    .string({ invalid_type_error: "must be a string", required_error: "is required" })
    .trim()
    .min(1, "must be a non-empty string"),
  timestamp: z
    .string({ invalid_type_error: "must be a string", required_error: "is required" })
    .trim()
    .min(1, "is required")
    .refine((value) => Number.isFinite(Date.parse(value)), "must be a valid timestamp"),
  confidence: z
    .number({ invalid_type_error: "must be a number", required_error: "is required" })
    .min(0, "must be within [0, 1]")
    .max(1, "must be within [0, 1]"),
  contentRef: z.string().trim().min(1).optional(),
});

export const ProvenanceRecordSchema: z.ZodType<ProvenanceRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  timestamp: z.string().min(1),
  confidence: z.number().min(0).max(1),
  contentRef: z.string().min(1),
  taskId: z.string().optional(),
  appendedAt: IsoTimestampSchema,
});

const AuditStageSchema = z.union([
  PipelineStageSchema,
  z.enum(["SUBMIT", "GOVERNOR", "PROMOTION"]),
]);

const AuditActorSchema = z.union([
  z.enum(["governor", "pipeline", "promotion", "human"]),
  z.custom<`stage:${z.infer<typeof PipelineStageSchema>}`>(
    (value) =>
      typeof value === "string" &&
      value.startsWith("stage:") &&
      PipelineStageSchema.safeParse(value.slice("stage:".length)).success,
  ),
]);

export const AuditEntrySchema: z.ZodType<AuditEntry, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  seq: z.number().int().min(1),
  taskId: z.string().min(1),
  stage: AuditStageSchema,
  decision: z.string().min(1),
  rationale: z.string(),
  policyRefs: z.array(z.string()),
  timestamp: IsoTimestampSchema,
  actor: AuditActorSchema,
  evidence: z.record(z.unknown()).optional(),
});

const EscalationReasonSchema = z.enum([
  "approval_gate",
  "compliance_hold",
  "retry_exhausted",
  "authority_violation",
  "stage_failure",
  "policy_conflict",
]);

export const EpisodicEntrySchema: z.ZodType<EpisodicEntry, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  taskId: z.string().min(1),
  goal: z.string(),
  riskTier: RiskTierSchema,
  outcome: TaskOutcomeSchema,
  reason: z.union([
    z.enum(["completed", "rejected_by_human", "compliance_reject", "budget_exceeded", "cancelled"]),
    EscalationReasonSchema,
  ]),
  primarySignal: RiskSignalSchema.optional(),
  policyRefs: z.array(z.string()),
  retries: z.number().int().min(0),
  provenanceCount: z.number().int().min(0),
  stepsUsed: z.number().int().min(0),
  durationMs: z.number().min(0),
  timestamp: IsoTimestampSchema,
});

const ProposedRuleSchema = z.object({
  kind: PolicyRuleKindSchema,
  text: z.string().min(1),
  match: PolicyRuleMatchSchema.optional(),
});

export const PromotionProposalSchema: z.ZodType<PromotionProposal, z.ZodTypeDef, unknown> =
  z.object({
    id: z.string().min(1),
    patternKey: z.string().min(1),
    rule: ProposedRuleSchema,
    evidence: z.object({
      taskIds: z.array(z.string()),
      occurrences: z.number().int().min(0),
    }),
    rationale: z.string(),
    impactAnalysis: z.string(),
    rollbackPlan: z.string(),
    status: z.enum(["PENDING", "APPROVED", "REJECTED", "PRUNED", "EXPIRED"]),
    createdAt: IsoTimestampSchema,
    updatedAt: IsoTimestampSchema,
    disposition: z
      .object({
        by: z.string().optional(),
        reason: z.string().optional(),
        ruleId: z.string().optional(),
        at: IsoTimestampSchema,
      })
      .optional(),
  });

const TaskSpecSchema = z.object({
  goal: z.string(),
  deliverables: z.array(z.string()),
  successCriteria: z.array(z.string()),
  constraints: z.array(z.string()),
  estimatedSteps: z.number().int(),
  estimatedToolCalls: z.number().int(),
  falsifiable: z.boolean(),
});

const SourceDominanceSchema = z.object({
  dominant: z.boolean(),
  source: z.string().optional(),
  share: z.number(),
  recordCount: z.number().int(),
});

export const TaskRecordSchema: z.ZodType<TaskRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  goal: z.string(),
  riskTier: RiskTierSchema,
  risk: z.object({
    tier: RiskTierSchema,
    signals: z.array(RiskSignalSchema),
    primarySignal: RiskSignalSchema.optional(),
    policyRefs: z.array(z.string()),
    matchedKeywords: z.array(z.string()),
    blocking: z.boolean(),
    rationale: z.string(),
  }),
  stage: PipelineStageSchema.nullable(),
  status: TaskStatusSchema,
  outcome: TaskOutcomeSchema,
  budget: z.object({
    maxSteps: z.number().int(),
    maxToolCalls: z.number().int(),
    maxActiveMs: z.number(),
    stepsUsed: z.number().int(),
    toolCallsUsed: z.number().int(),
    activeMs: z.number(),
  }),
  retries: z.number().int().min(0),
  stageFailures: z.number().int().min(0),
  workspace: z.object({
    spec: TaskSpecSchema.optional(),
    provenanceIds: z.array(z.string()),
    output: z
      .object({
        content: z.string(),
        claims: z.array(z.object({ text: z.string(), provenanceRefs: z.array(z.string()) })),
        attempt: z.number().int(),
      })
      .optional(),
    review: z
      .object({
        passed: z.boolean(),
        findings: z.array(
          z.object({
            code: z.enum(["EMPTY_OUTPUT", "MISSING_DELIVERABLES", "UNSUPPORTED_CLAIM"]),
            message: z.string(),
            blocking: z.boolean(),
          }),
        ),
        requiredChanges: z.array(z.string()),
        unsupportedClaims: z.array(z.string()),
        dominance: SourceDominanceSchema,
        warnings: z.array(z.string()),
      })
      .optional(),
    reconciliation: z
      .object({ decision: z.enum(["ACCEPT", "RETRY", "ESCALATE"]), reason: z.string() })
      .optional(),
    compliance: z
      .object({
        verdict: z.enum(["APPROVE", "HOLD", "REJECT"]),
        reasons: z.array(z.string()),
        flaggedKeywords: z.array(z.string()),
      })
      .optional(),
  }),
  approvals: z.array(
    z.object({ gate: PipelineStageSchema, approver: z.string(), at: IsoTimestampSchema }),
  ),
  escalation: z
    .object({
      reason: EscalationReasonSchema,
      gate: PipelineStageSchema,
      resumeStage: PipelineStageSchema,
      rationale: z.string(),
      policyRefs: z.array(z.string()),
      auditEntryId: z.string(),
      at: IsoTimestampSchema,
    })
    .optional(),
  singleSourceOverride: z.object({ reason: z.string() }).optional(),
  cancellation: z.object({ reason: z.string(), requestedAt: IsoTimestampSchema }).optional(),
  rationale: z.string().optional(),
  notes: z.array(z.string()),
  transitions: z.array(
    z.object({
      from: TaskStatusSchema,
      to: TaskStatusSchema,
      stage: PipelineStageSchema.nullable(),
      at: IsoTimestampSchema,
      reason: z.string(),
    }),
  ),
  createdAt: IsoTimestampSchema,
  updatedAt: IsoTimestampSchema,
});
