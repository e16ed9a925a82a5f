import crypto from "node:crypto";
import type { GovernanceConfig } from "../config/config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { AuditAppendInput, AuditLog } from "./audit/log.js";
import { appendEpisode, buildEpisodeFromTask } from "./episodic/store.js";
import {
  ApprovalRequiredError,
  AuthorityViolationError,
  BudgetExceededError,
  GovernanceError,
  InsufficientProvenanceError,
  InvalidSubmissionError,
  InvalidTransitionError,
  MalformedProvenanceError,
  PolicyConflictError,
  StageFailureError,
  TaskNotFoundError,
  describeError,
} from "./errors.js";
import { TaskLane } from "./lane.js";
import { applyWorkspacePatch } from "./pipeline/capabilities.js";
import type { ContentProducer, SourceGatherer } from "./pipeline/collaborators.js";
import {
  isTerminalStatus,
  routeTask,
  transitionTaskStage,
  transitionTaskStatus,
  type RouteDecision,
} from "./pipeline/phase-machine.js";
import { executeStage } from "./pipeline/runner.js";
import { DEFAULT_STAGE_HANDLERS } from "./pipeline/stages/index.js";
import type { StageHandlers } from "./pipeline/types.js";
import { assessRisk, type RiskContext } from "./policy/risk.js";
import type { PolicySnapshot } from "./policy/store.js";
import { countDistinctSources, validateProvenanceBatch } from "./provenance/ledger.js";
import type { ProvenanceLedger } from "./provenance/ledger.js";
import { TaskRecordSchema } from "./schemas.js";
import {
  loadTaskRecord,
  releaseTaskReservation,
  reserveTaskId,
  saveTaskRecord,
  type GovernancePaths,
} from "./store.js";
import type {
  AuditEntry,
  EpisodeReason,
  EscalationReason,
  PipelineStage,
  RiskAssessment,
  TaskRecord,
} from "./types.js";

const log = createSubsystemLogger("governor");

const DEFAULT_STATUS_AUDIT_LIMIT = 5;

export type SubmitOptions = {
  /** Admits fewer distinct sources than the configured minimum; always audited. */
  allowSingleSource?: boolean;
  overrideReason?: string;
  context?: RiskContext;
};

export type EscalationDecision = "approve" | "reject";

export type TaskStatusView = {
  taskId: string;
  stage: TaskRecord["stage"];
  riskTier: TaskRecord["riskTier"];
  status: TaskRecord["status"];
  outcome: TaskRecord["outcome"];
  rationale?: string;
  escalation?: TaskRecord["escalation"];
  latestAuditEntries: AuditEntry[];
};

export type GovernorDeps = {
  config: Readonly<GovernanceConfig>;
  paths: GovernancePaths;
  audit: AuditLog;
  ledger: ProvenanceLedger;
  getPolicy: () => PolicySnapshot;
  producer: ContentProducer;
  gatherer: SourceGatherer;
  handlers?: Partial<StageHandlers>;
  now?: () => number;
};

export type Governor = ReturnType<typeof createGovernor>;

const ESCALATION_POLICY_REFS: Record<EscalationReason, string[]> = {
  approval_gate: ["inv-human-escalation", "val-irreversible-impact"],
  compliance_hold: ["inv-compliance-gate", "inv-human-escalation"],
  retry_exhausted: ["inv-retry-limit", "inv-human-escalation"],
  authority_violation: ["inv-stage-authority", "inv-human-escalation"],
  stage_failure: ["inv-human-escalation"],
  policy_conflict: ["inv-human-escalation"],
};

function isApprover(config: Readonly<GovernanceConfig>, approver: string) {
  const identity = approver.trim();
  if (!identity) {
    return false;
  }
  return config.approvers.length === 0 || config.approvers.includes(identity);
}

/**
 * Admission, risk assignment, routing and escalation for tasks. The governor owns a
 * task between stages; stages only return patches that the governor applies after
 * the capability check.
 */
export function createGovernor(deps: GovernorDeps) {
  const now = deps.now ?? Date.now;
  const handlers: StageHandlers = { ...DEFAULT_STAGE_HANDLERS, ...deps.handlers };
  const lane = new TaskLane(deps.config.maxConcurrentTasks);
  const inflight = new Map<string, TaskRecord>();
  const settled = new Map<string, Promise<TaskRecord>>();
  const taskLocks = new Map<string, Promise<unknown>>();

  function withTaskLock<T>(taskId: string, run: () => Promise<T>): Promise<T> {
    const prev = taskLocks.get(taskId) ?? Promise.resolve();
    const next = prev.catch(() => undefined).then(run);
    const done = next.then(
      () => undefined,
      () => undefined,
    );
    taskLocks.set(taskId, done);
    void done.then(() => {
      if (taskLocks.get(taskId) === done) {
        taskLocks.delete(taskId);
      }
    });
    return next;
  }

  function isoNow() {
    return new Date(now()).toISOString();
  }

  async function audit(input: AuditAppendInput) {
    return deps.audit.append({ ...input, timestamp: input.timestamp ?? isoNow() });
  }

  async function persist(task: TaskRecord) {
    task.updatedAt = isoNow();
    await saveTaskRecord(deps.paths, task);
  }

  async function recordEpisode(task: TaskRecord, reason: EpisodeReason, policyRefs: string[]) {
    await appendEpisode(
      deps.paths,
      buildEpisodeFromTask({ task, reason, policyRefs, nowMs: now() }),
    );
  }

  function assess(goal: string, context?: RiskContext): RiskAssessment {
    return assessRisk({
      goal,
      context,
      policy: deps.getPolicy(),
      budgets: deps.config.budgets,
      precedence: deps.config.riskPrecedence,
    });
  }

  async function rejectSubmission(
    error: GovernanceError,
    policyRefs: string[],
    goal: string,
  ): Promise<never> {
    await audit({
      taskId: `submission:${crypto.randomUUID()}`,
      stage: "SUBMIT",
      decision: "REJECTED",
      rationale: `${error.name}: ${error.message}`,
      policyRefs,
      actor: "governor",
      evidence: { code: error.code, goal, ...error.details },
    });
    log.info("submission rejected", { code: error.code, reason: error.message });
    throw error;
  }

  async function submit(
    goal: string,
    provenance: readonly unknown[],
    options: SubmitOptions = {},
  ): Promise<TaskRecord> {
    const trimmedGoal = typeof goal === "string" ? goal.trim() : "";
    if (!trimmedGoal) {
      return rejectSubmission(new InvalidSubmissionError("goal must be a non-empty string"), [], "");
    }

    const validated = validateProvenanceBatch(provenance);
    if (!validated.ok) {
      return rejectSubmission(
        new MalformedProvenanceError(validated.issues),
        ["inv-provenance-fields"],
        trimmedGoal,
      );
    }
    const distinctSources = countDistinctSources(validated.records);
    const required = deps.config.minDistinctSources;
    const overrideUsed = distinctSources < required && options.allowSingleSource === true;
    if (distinctSources === 0 || (distinctSources < required && !overrideUsed)) {
      return rejectSubmission(
        new InsufficientProvenanceError({ distinctSources, requiredSources: required }),
        ["inv-provenance-min-sources"],
        trimmedGoal,
      );
    }

    const risk = assess(trimmedGoal, options.context);
    if (risk.blocking) {
      return rejectSubmission(
        new PolicyConflictError({
          ruleIds: risk.policyRefs,
          reason: `goal conflicts with policy: ${risk.rationale}`,
        }),
        risk.policyRefs,
        trimmedGoal,
      );
    }

    const nowMs = now();
    const taskId = await reserveTaskId(deps.paths, nowMs);
    let provenanceIds: string[];
    try {
      const appended = await deps.ledger.appendBatch([...validated.records], { taskId });
      provenanceIds = [...new Set(appended.map((record) => record.id))];
      const recorded = countDistinctSources(appended);
      if (recorded === 0 || (recorded < required && !overrideUsed)) {
        throw new InsufficientProvenanceError({
          distinctSources: recorded,
          requiredSources: required,
        });
      }
    } catch (error) {
      await releaseTaskReservation(deps.paths, taskId);
      if (error instanceof InsufficientProvenanceError) {
        return rejectSubmission(error, ["inv-provenance-min-sources"], trimmedGoal);
      }
      if (error instanceof GovernanceError) {
        return rejectSubmission(error, ["inv-provenance-fields"], trimmedGoal);
      }
      throw error;
    }

    const createdAt = new Date(nowMs).toISOString();
    const overrideReason = options.overrideReason?.trim() || "single-source override requested";
    const task: TaskRecord = {
      id: taskId,
      goal: trimmedGoal,
      riskTier: risk.tier,
      risk,
      stage: null,
      status: "PENDING",
      outcome: "PENDING",
      budget: {
        maxSteps: deps.config.budgets.maxSteps,
        maxToolCalls: deps.config.budgets.maxToolCalls,
        maxActiveMs: deps.config.budgets.maxActiveMs,
        stepsUsed: 0,
        toolCallsUsed: 0,
        activeMs: 0,
      },
      retries: 0,
      stageFailures: 0,
      workspace: { provenanceIds },
      approvals: [],
      ...(overrideUsed ? { singleSourceOverride: { reason: overrideReason } } : {}),
      notes: [],
      transitions: [],
      createdAt,
      updatedAt: createdAt,
    };
    await saveTaskRecord(deps.paths, task);
    await audit({
      taskId,
      stage: "SUBMIT",
      decision: overrideUsed ? "ACCEPTED_WITH_OVERRIDE" : "ACCEPTED",
      rationale: overrideUsed
        ? `admitted at ${risk.tier} with ${distinctSources} source(s) under override: ${overrideReason}; ${risk.rationale}`
        : `admitted at ${risk.tier} with ${distinctSources} sources; ${risk.rationale}`,
      policyRefs: ["inv-provenance-min-sources", "inv-provenance-fields", ...risk.policyRefs],
      actor: "governor",
      evidence: {
        distinctSources,
        provenanceIds,
        signals: risk.signals,
        ...(overrideUsed ? { singleSourceOverride: overrideReason } : {}),
      },
    });
    log.info("task admitted", { taskId, tier: risk.tier, sources: distinctSources });

    const admitted = structuredClone(task);
    schedule(task);
    return admitted;
  }

  function schedule(task: TaskRecord, startStage?: PipelineStage) {
    inflight.set(task.id, task);
    const run = lane
      .run(() => drive(task, startStage))
      .finally(() => {
        if (inflight.get(task.id) === task) {
          inflight.delete(task.id);
        }
      });
    settled.set(task.id, run);
    void run.then(
      () => forgetRun(task.id, run),
      (error: unknown) => {
        forgetRun(task.id, run);
        log.error("task run failed", { taskId: task.id, error: describeError(error) });
      },
    );
  }

  function forgetRun(taskId: string, run: Promise<TaskRecord>) {
    if (settled.get(taskId) === run) {
      settled.delete(taskId);
    }
  }

  function checkBudget(task: TaskRecord, beforeStage: boolean) {
    const budget = task.budget;
    if (beforeStage && budget.stepsUsed >= budget.maxSteps) {
      return new BudgetExceededError({
        budget: "steps",
        used: budget.stepsUsed + 1,
        limit: budget.maxSteps,
      });
    }
    if (budget.toolCallsUsed > budget.maxToolCalls) {
      return new BudgetExceededError({
        budget: "toolCalls",
        used: budget.toolCallsUsed,
        limit: budget.maxToolCalls,
      });
    }
    if (budget.activeMs > budget.maxActiveMs) {
      return new BudgetExceededError({
        budget: "activeMs",
        used: budget.activeMs,
        limit: budget.maxActiveMs,
      });
    }
    return null;
  }

  async function finalize(
    task: TaskRecord,
    params: {
      status: "DONE" | "REJECTED";
      reason: EpisodeReason;
      rationale: string;
      policyRefs: string[];
      actor?: AuditAppendInput["actor"];
      evidence?: Record<string, unknown>;
    },
  ) {
    const entry = await audit({
      taskId: task.id,
      stage: "GOVERNOR",
      decision: params.status,
      rationale: params.rationale,
      policyRefs: params.policyRefs,
      actor: params.actor ?? "governor",
      ...(params.evidence ? { evidence: params.evidence } : {}),
    });
    transitionTaskStatus(task, params.status, params.reason, now());
    task.outcome = params.status;
    task.rationale = entry.rationale;
    delete task.escalation;
    await persist(task);
    await recordEpisode(task, params.reason, entry.policyRefs);
    log.info("task finished", { taskId: task.id, status: params.status, reason: params.reason });
    return task;
  }

  async function escalate(
    task: TaskRecord,
    params: {
      reason: EscalationReason;
      gate: PipelineStage;
      resumeStage: PipelineStage;
      rationale: string;
      evidence?: Record<string, unknown>;
    },
  ) {
    const entry = await audit({
      taskId: task.id,
      stage: task.stage ?? "GOVERNOR",
      decision: "ESCALATED",
      rationale: params.rationale,
      policyRefs: ESCALATION_POLICY_REFS[params.reason],
      actor: "governor",
      evidence: { reason: params.reason, gate: params.gate, ...params.evidence },
    });
    transitionTaskStatus(task, "ESCALATED", params.reason, now());
    task.outcome = "ESCALATED";
    task.rationale = entry.rationale;
    task.escalation = {
      reason: params.reason,
      gate: params.gate,
      resumeStage: params.resumeStage,
      rationale: entry.rationale,
      policyRefs: entry.policyRefs,
      auditEntryId: entry.id,
      at: entry.timestamp,
    };
    await persist(task);
    await recordEpisode(task, params.reason, entry.policyRefs);
    log.info("task escalated", { taskId: task.id, reason: params.reason, gate: params.gate });
    return task;
  }

  async function runStage(task: TaskRecord, stage: PipelineStage): Promise<"continue" | "stop"> {
    if (stage === "REVIEW" && task.riskTier === "MEDIUM") {
      transitionTaskStatus(task, "REVIEW", "medium risk output under review", now());
    } else if (stage === "PRODUCE" && task.status === "REVIEW") {
      transitionTaskStatus(task, "RUNNING", "returned to produce", now());
    }
    transitionTaskStage(task, stage, now());
    task.budget.stepsUsed += 1;

    try {
      const execution = await executeStage({
        stage,
        task,
        handlers,
        policy: deps.getPolicy(),
        ledger: deps.ledger,
        config: deps.config,
        producer: deps.producer,
        gatherer: deps.gatherer,
        nowMs: now,
      });
      const { result } = execution;
      task.workspace = applyWorkspacePatch(task.workspace, result.patch);
      task.budget.toolCallsUsed += Math.max(0, Math.floor(result.toolCalls));
      task.budget.activeMs += execution.durationMs;
      if (result.notes && result.notes.length > 0) {
        task.notes = [...task.notes, ...result.notes.map((note) => `${stage}: ${note}`)];
      }
      task.stageFailures = 0;
      await audit({
        taskId: task.id,
        stage,
        decision: result.decision,
        rationale: result.rationale,
        policyRefs: result.policyRefs,
        actor: `stage:${stage}`,
        evidence: {
          ...result.evidence,
          toolCalls: result.toolCalls,
          ...(result.notes && result.notes.length > 0 ? { notes: result.notes } : {}),
        },
      });
      await persist(task);
      return "continue";
    } catch (error) {
      if (error instanceof AuthorityViolationError) {
        await escalate(task, {
          reason: "authority_violation",
          gate: stage,
          resumeStage: stage,
          rationale: `${error.name}: ${error.message}`,
          evidence: { fields: error.fields },
        });
        return "stop";
      }
      if (error instanceof StageFailureError) {
        if (task.stageFailures < deps.config.stageFailureRetries) {
          task.stageFailures += 1;
          await audit({
            taskId: task.id,
            stage,
            decision: "STAGE_RETRY",
            rationale: `${error.message}; retry ${task.stageFailures}/${deps.config.stageFailureRetries}`,
            policyRefs: [],
            actor: "governor",
          });
          await persist(task);
          return runStage(task, stage);
        }
        await escalate(task, {
          reason: "stage_failure",
          gate: stage,
          resumeStage: stage,
          rationale: `${error.name}: ${error.message}`,
        });
        return "stop";
      }
      throw error;
    }
  }

  async function drive(task: TaskRecord, startStage?: PipelineStage): Promise<TaskRecord> {
    try {
      if (task.status === "PENDING") {
        transitionTaskStatus(task, "RUNNING", "admitted", now());
        await persist(task);
      }
      let decision: RouteDecision = startStage
        ? { kind: "stage", stage: startStage }
        : routeTask(task, { retryLimit: deps.config.retryLimit });
      let resumed = startStage !== undefined;

      for (;;) {
        if (isTerminalStatus(task.status) || task.status === "ESCALATED") {
          return task;
        }
        if (task.cancellation) {
          return await finalize(task, {
            status: "REJECTED",
            reason: "cancelled",
            rationale: `cancelled: ${task.cancellation.reason}`,
            policyRefs: ["val-refusal-valid"],
            actor: "human",
          });
        }
        const breach = checkBudget(task, decision.kind === "stage");
        if (breach) {
          return await finalize(task, {
            status: "REJECTED",
            reason: "budget_exceeded",
            rationale: `${breach.name}: ${breach.message}`,
            policyRefs: ["inv-budget"],
            evidence: { budget: breach.budget, used: breach.used, limit: breach.limit },
          });
        }

        switch (decision.kind) {
          case "stage": {
            if (
              !resumed &&
              decision.stage === "PRODUCE" &&
              task.stage === "RECONCILE" &&
              task.workspace.reconciliation?.decision === "RETRY"
            ) {
              task.retries += 1;
            }
            resumed = false;
            const next = await runStage(task, decision.stage);
            if (next === "stop") {
              return task;
            }
            decision = routeTask(task, { retryLimit: deps.config.retryLimit });
            break;
          }
          case "escalate":
            return await escalate(task, decision);
          case "complete":
            return await finalize(task, {
              status: "DONE",
              reason: "completed",
              rationale: `completed: ${decision.rationale}`,
              policyRefs: ["inv-compliance-gate"],
            });
          case "reject":
            return await finalize(task, {
              status: "REJECTED",
              reason: "compliance_reject",
              rationale: decision.rationale,
              policyRefs: ["inv-compliance-gate", "val-refusal-valid"],
            });
          case "suspended":
          case "terminal":
            return task;
        }
      }
    } catch (error) {
      if (isTerminalStatus(task.status) || task.status === "ESCALATED") {
        throw error;
      }
      log.error("unexpected failure while running task", {
        taskId: task.id,
        error: describeError(error),
      });
      const stage = task.stage ?? "PLAN";
      return escalate(task, {
        reason: "stage_failure",
        gate: stage,
        resumeStage: stage,
        rationale: `unexpected failure: ${describeError(error)}`,
      });
    }
  }

  async function loadTask(taskId: string) {
    const live = inflight.get(taskId);
    if (live) {
      return live;
    }
    const stored = await loadTaskRecord(deps.paths, taskId, TaskRecordSchema);
    if (!stored) {
      throw new TaskNotFoundError(taskId);
    }
    return stored;
  }

  async function getTask(taskId: string) {
    return structuredClone(await loadTask(taskId));
  }

  async function getStatus(
    taskId: string,
    params: { auditLimit?: number } = {},
  ): Promise<TaskStatusView> {
    const task = await getTask(taskId);
    const latestAuditEntries = await deps.audit.read({
      taskId,
      limit: params.auditLimit ?? DEFAULT_STATUS_AUDIT_LIMIT,
    });
    return {
      taskId: task.id,
      stage: task.stage,
      riskTier: task.riskTier,
      status: task.status,
      outcome: task.outcome,
      ...(task.rationale ? { rationale: task.rationale } : {}),
      ...(task.escalation ? { escalation: task.escalation } : {}),
      latestAuditEntries,
    };
  }

  async function resolveEscalation(
    taskId: string,
    decision: EscalationDecision,
    approver: string,
  ): Promise<TaskRecord> {
    return withTaskLock(taskId, async () => {
      const live = inflight.get(taskId);
      if (live) {
        if (live.status !== "ESCALATED") {
          throw new InvalidTransitionError(`task ${taskId} is running and has no open escalation`);
        }
        // The run that escalated may still be writing its episode; let it finish.
        await settled.get(taskId)?.catch(() => undefined);
      }
      const task = await loadTask(taskId);
      const escalation = task.escalation;
      if (task.status !== "ESCALATED" || !escalation) {
        throw new InvalidTransitionError(`task ${taskId} is not escalated (status ${task.status})`, {
          taskId,
          status: task.status,
        });
      }
      if (!isApprover(deps.config, approver)) {
        await audit({
          taskId,
          stage: "GOVERNOR",
          decision: "APPROVAL_DENIED",
          rationale: `approver "${approver}" is not authorized to resolve escalations`,
          policyRefs: ["inv-human-escalation"],
          actor: "governor",
        });
        throw new ApprovalRequiredError(`a recognized human approver is required to resolve ${taskId}`, {
          taskId,
          approver,
        });
      }
      const identity = approver.trim();

      if (decision === "reject") {
        return structuredClone(
          await finalize(task, {
            status: "REJECTED",
            reason: "rejected_by_human",
            rationale: `rejected by ${identity} at ${escalation.gate}: ${escalation.rationale}`,
            policyRefs: ["inv-human-escalation", "val-refusal-valid"],
            actor: "human",
            evidence: { approver: identity, escalationAuditId: escalation.auditEntryId },
          }),
        );
      }

      await audit({
        taskId,
        stage: "GOVERNOR",
        decision: "ESCALATION_APPROVED",
        rationale: `approved by ${identity} at ${escalation.gate}; resuming at ${escalation.resumeStage}`,
        policyRefs: ["inv-human-escalation"],
        actor: "human",
        evidence: { approver: identity, escalationAuditId: escalation.auditEntryId },
      });
      task.approvals = [...task.approvals, { gate: escalation.gate, approver: identity, at: isoNow() }];
      if (escalation.reason === "retry_exhausted") {
        task.retries = 0;
      }
      if (escalation.reason === "stage_failure") {
        task.stageFailures = 0;
      }
      transitionTaskStatus(task, "RUNNING", `approved by ${identity}`, now());
      task.outcome = "APPROVED";
      task.rationale = `approved by ${identity}`;
      delete task.escalation;
      await persist(task);
      const resumed = structuredClone(task);
      schedule(task, escalation.resumeStage);
      return resumed;
    });
  }

  async function cancel(taskId: string, reason: string): Promise<TaskRecord> {
    const trimmed = reason.trim();
    if (!trimmed) {
      throw new InvalidSubmissionError("cancellation requires a reason");
    }
    const live = inflight.get(taskId);
    if (live) {
      if (live.status !== "PENDING" && live.status !== "RUNNING" && live.status !== "REVIEW") {
        throw new InvalidTransitionError(`task ${taskId} cannot be cancelled in status ${live.status}`);
      }
      if (!live.cancellation) {
        live.cancellation = { reason: trimmed, requestedAt: isoNow() };
        await audit({
          taskId,
          stage: "GOVERNOR",
          decision: "CANCEL_REQUESTED",
          rationale: trimmed,
          policyRefs: [],
          actor: "human",
        });
      }
      return structuredClone(live);
    }
    return withTaskLock(taskId, async () => {
      const task = await loadTask(taskId);
      if (task.status !== "PENDING" && task.status !== "RUNNING" && task.status !== "REVIEW") {
        throw new InvalidTransitionError(`task ${taskId} cannot be cancelled in status ${task.status}`);
      }
      // Not running in this process: nothing holds the task, so finish it here.
      task.cancellation = { reason: trimmed, requestedAt: isoNow() };
      return structuredClone(
        await finalize(task, {
          status: "REJECTED",
          reason: "cancelled",
          rationale: `cancelled: ${trimmed}`,
          policyRefs: ["val-refusal-valid"],
          actor: "human",
        }),
      );
    });
  }

  async function whenSettled(taskId: string): Promise<TaskRecord> {
    const run = settled.get(taskId);
    if (!run) {
      return getTask(taskId);
    }
    await run;
    // A resolution may have scheduled a newer run while we waited.
    const latest = settled.get(taskId);
    if (latest && latest !== run) {
      return whenSettled(taskId);
    }
    return getTask(taskId);
  }

  return {
    submit,
    assessRisk: assess,
    route: (task: TaskRecord) => routeTask(task, { retryLimit: deps.config.retryLimit }),
    getTask,
    getStatus,
    resolveEscalation,
    cancel,
    whenSettled,
    lane,
    /** Runs, task locks and in-memory tasks still held by this governor. */
    tracked: () => ({ runs: settled.size, locks: taskLocks.size, inflight: inflight.size }),
  };
}
