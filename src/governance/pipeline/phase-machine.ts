import { InvalidTransitionError } from "../errors.js";
import type {
  EscalationReason,
  PipelineStage,
  RiskTier,
  TaskRecord,
  TaskStatus,
} from "../types.js";

export const PIPELINE_STAGE_ORDER: PipelineStage[] = [
  "PLAN",
  "GATHER",
  "PRODUCE",
  "REVIEW",
  "RECONCILE",
  "COMPLIANCE",
];

const NEXT_STAGE_BY_CURRENT: Record<PipelineStage, PipelineStage | null> = {
  PLAN: "GATHER",
  GATHER: "PRODUCE",
  PRODUCE: "REVIEW",
  REVIEW: "RECONCILE",
  RECONCILE: "COMPLIANCE",
  COMPLIANCE: null,
};

const STATUS_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  PENDING: ["RUNNING", "REJECTED"],
  RUNNING: ["REVIEW", "ESCALATED", "DONE", "REJECTED"],
  REVIEW: ["RUNNING", "ESCALATED", "DONE", "REJECTED"],
  ESCALATED: ["RUNNING", "REJECTED"],
  DONE: [],
  REJECTED: [],
};

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["DONE", "REJECTED"]);

const MAX_TRANSITIONS = 200;

export function isTerminalStatus(status: TaskStatus) {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Stages advance one step at a time. The only backward edge is Reconcile sending
 * work back to Produce; re-entering the same stage covers governor retries and
 * resumption after an escalation.
 */
export function isValidStageTransition(from: PipelineStage | null, to: PipelineStage) {
  if (from === null) {
    return to === "PLAN";
  }
  if (from === to) {
    return true;
  }
  if (from === "RECONCILE" && to === "PRODUCE") {
    return true;
  }
  return NEXT_STAGE_BY_CURRENT[from] === to;
}

export function transitionTaskStage(task: TaskRecord, to: PipelineStage, nowMs = Date.now()) {
  const from = task.stage;
  if (!isValidStageTransition(from, to)) {
    throw new InvalidTransitionError(`invalid stage transition: ${from ?? "none"} -> ${to}`, {
      taskId: task.id,
      from,
      to,
    });
  }
  task.stage = to;
  task.updatedAt = new Date(nowMs).toISOString();
  return { changed: from !== to, from, to };
}

export function isValidStatusTransition(from: TaskStatus, to: TaskStatus) {
  return from === to || STATUS_TRANSITIONS[from].includes(to);
}

export function transitionTaskStatus(
  task: TaskRecord,
  to: TaskStatus,
  reason: string,
  nowMs = Date.now(),
) {
  const from = task.status;
  if (!isValidStatusTransition(from, to)) {
    throw new InvalidTransitionError(`invalid task status transition: ${from} -> ${to}`, {
      taskId: task.id,
      from,
      to,
    });
  }
  if (from === to) {
    return { changed: false, from, to };
  }
  const at = new Date(nowMs).toISOString();
  task.status = to;
  task.updatedAt = at;
  task.transitions = [...task.transitions, { from, to, stage: task.stage, at, reason }].slice(
    -MAX_TRANSITIONS,
  );
  return { changed: true, from, to };
}

export type RouteDecision =
  | { kind: "stage"; stage: PipelineStage }
  | {
      kind: "escalate";
      reason: EscalationReason;
      gate: PipelineStage;
      resumeStage: PipelineStage;
      rationale: string;
    }
  | { kind: "complete"; rationale: string }
  | { kind: "reject"; rationale: string }
  | { kind: "suspended" }
  | { kind: "terminal" };

export function hasGateApproval(task: TaskRecord, gate: PipelineStage) {
  return task.approvals.some((approval) => approval.gate === gate);
}

/** Tiers that stop for a human before Produce runs. */
export function requiresProduceGate(tier: RiskTier) {
  return tier === "HIGH";
}

/**
 * Next step for a task whose `stage` field names the last stage that ran. The
 * decision is a pure function of tier, stage and the verdicts in the workspace.
 */
export function routeTask(task: TaskRecord, params: { retryLimit: number }): RouteDecision {
  if (isTerminalStatus(task.status)) {
    return { kind: "terminal" };
  }
  if (task.status === "ESCALATED") {
    return { kind: "suspended" };
  }
  const stage = task.stage;
  if (stage === null) {
    return { kind: "stage", stage: "PLAN" };
  }
  switch (stage) {
    case "PLAN":
      return { kind: "stage", stage: "GATHER" };
    case "GATHER":
      if (requiresProduceGate(task.riskTier) && !hasGateApproval(task, "PRODUCE")) {
        return {
          kind: "escalate",
          reason: "approval_gate",
          gate: "PRODUCE",
          resumeStage: "PRODUCE",
          rationale: `${task.riskTier} risk requires human approval before Produce: ${task.risk.rationale}`,
        };
      }
      return { kind: "stage", stage: "PRODUCE" };
    case "PRODUCE":
      return { kind: "stage", stage: "REVIEW" };
    case "REVIEW":
      return { kind: "stage", stage: "RECONCILE" };
    case "RECONCILE": {
      const reconciliation = task.workspace.reconciliation;
      if (!reconciliation) {
        return { kind: "stage", stage: "RECONCILE" };
      }
      if (reconciliation.decision === "ACCEPT") {
        return { kind: "stage", stage: "COMPLIANCE" };
      }
      if (reconciliation.decision === "RETRY" && task.retries < params.retryLimit) {
        return { kind: "stage", stage: "PRODUCE" };
      }
      return {
        kind: "escalate",
        reason: "retry_exhausted",
        gate: "RECONCILE",
        resumeStage: "PRODUCE",
        rationale: `retry limit ${params.retryLimit} reached: ${reconciliation.reason}`,
      };
    }
    case "COMPLIANCE": {
      const compliance = task.workspace.compliance;
      if (!compliance) {
        return { kind: "stage", stage: "COMPLIANCE" };
      }
      if (compliance.verdict === "APPROVE") {
        return { kind: "complete", rationale: compliance.reasons.join("; ") };
      }
      if (compliance.verdict === "HOLD") {
        return {
          kind: "escalate",
          reason: "compliance_hold",
          gate: "COMPLIANCE",
          resumeStage: "COMPLIANCE",
          rationale: `compliance hold: ${compliance.reasons.join("; ")}`,
        };
      }
      return { kind: "reject", rationale: `compliance reject: ${compliance.reasons.join("; ")}` };
    }
  }
}
