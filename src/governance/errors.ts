export type GovernanceErrorCode =
  | "INVALID_SUBMISSION"
  | "INSUFFICIENT_PROVENANCE"
  | "MALFORMED_PROVENANCE"
  | "AUTHORITY_VIOLATION"
  | "UNSUPPORTED_CLAIM"
  | "BUDGET_EXCEEDED"
  | "APPROVAL_REQUIRED"
  | "POLICY_CONFLICT"
  | "INVALID_TRANSITION"
  | "TASK_NOT_FOUND"
  | "PROPOSAL_NOT_FOUND"
  | "STAGE_FAILURE"
  | "CONFIG_INVALID";

/**
 * Base class for every failure the core raises. `code` is stable and is what the
 * audit log records; `details` carries the structured context of the failure.
 */
export class GovernanceError extends Error {
  readonly code: GovernanceErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: GovernanceErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidSubmissionError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_SUBMISSION", message, details);
  }
}

export class InsufficientProvenanceError extends GovernanceError {
  readonly distinctSources: number;
  readonly requiredSources: number;

  constructor(params: { distinctSources: number; requiredSources: number }) {
    super(
      "INSUFFICIENT_PROVENANCE",
      `at least ${params.requiredSources} distinct provenance sources are required (got ${params.distinctSources})`,
      params,
    );
    this.distinctSources = params.distinctSources;
    this.requiredSources = params.requiredSources;
  }
}

export type ProvenanceIssue = {
  index: number;
  field: string;
  message: string;
};

export class MalformedProvenanceError extends GovernanceError {
  readonly issues: ProvenanceIssue[];

  constructor(issues: ProvenanceIssue[]) {
    const first = issues[0];
    super(
      "MALFORMED_PROVENANCE",
      first
        ? `malformed provenance at #${first.index}: ${first.field} ${first.message}`
        : "malformed provenance",
      { issues },
    );
    this.issues = issues;
  }
}

export class AuthorityViolationError extends GovernanceError {
  readonly stage: string;
  readonly fields: string[];

  constructor(params: { stage: string; fields: string[] }) {
    super(
      "AUTHORITY_VIOLATION",
      `stage ${params.stage} wrote outside its capability set: ${params.fields.join(", ")}`,
      params,
    );
    this.stage = params.stage;
    this.fields = params.fields;
  }
}

export class UnsupportedClaimError extends GovernanceError {
  readonly claims: string[];

  constructor(claims: string[]) {
    super(
      "UNSUPPORTED_CLAIM",
      `${claims.length} claim(s) do not resolve to any provenance record`,
      { claims },
    );
    this.claims = claims;
  }
}

export type BudgetKind = "steps" | "toolCalls" | "activeMs";

export class BudgetExceededError extends GovernanceError {
  readonly budget: BudgetKind;
  readonly used: number;
  readonly limit: number;

  constructor(params: { budget: BudgetKind; used: number; limit: number }) {
    super(
      "BUDGET_EXCEEDED",
      `${params.budget} budget exceeded (${params.used}/${params.limit})`,
      params,
    );
    this.budget = params.budget;
    this.used = params.used;
    this.limit = params.limit;
  }
}

export class ApprovalRequiredError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("APPROVAL_REQUIRED", message, details);
  }
}

export class PolicyConflictError extends GovernanceError {
  readonly ruleIds: string[];

  constructor(params: { ruleIds: string[]; reason: string }) {
    super("POLICY_CONFLICT", params.reason, params);
    this.ruleIds = params.ruleIds;
  }
}

export class InvalidTransitionError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_TRANSITION", message, details);
  }
}

export class TaskNotFoundError extends GovernanceError {
  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `task not found: ${taskId}`, { taskId });
  }
}

export class ProposalNotFoundError extends GovernanceError {
  constructor(proposalId: string) {
    super("PROPOSAL_NOT_FOUND", `proposal not found: ${proposalId}`, { proposalId });
  }
}

/** A collaborator or stage body threw; the governor decides retry or escalation. */
export class StageFailureError extends GovernanceError {
  readonly stage: string;

  constructor(params: { stage: string; cause: unknown }) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super("STAGE_FAILURE", `stage ${params.stage} failed: ${reason}`, {
      stage: params.stage,
      reason,
    });
    this.stage = params.stage;
    this.cause = params.cause;
  }
}

export type ConfigIssue = {
  path: (string | number)[];
  message: string;
};

export class ConfigError extends GovernanceError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super("CONFIG_INVALID", message, { issues });
    this.issues = issues;
  }

  format() {
    const lines = [this.message];
    for (const issue of this.issues) {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${at}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function isGovernanceError(value: unknown): value is GovernanceError {
  return value instanceof GovernanceError;
}

export function describeError(error: unknown) {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
