import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createGovernanceConfig, type GovernanceConfig } from "../../config/config.js";
import { AuthorityViolationError, StageFailureError } from "../errors.js";
import { buildPolicySnapshot } from "../policy/store.js";
import { createProvenanceLedger, type ProvenanceLedger } from "../provenance/ledger.js";
import { resolveGovernancePaths } from "../store.js";
import type { TaskRecord } from "../types.js";
import { applyWorkspacePatch, enforceStageCapabilities } from "./capabilities.js";
import { createExtractiveProducer, createSubmittedSourcesGatherer } from "./collaborators.js";
import { executeStage } from "./runner.js";
import { DEFAULT_STAGE_HANDLERS } from "./stages/index.js";
import type { StageHandlers } from "./types.js";

function buildTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: "task_20260301_120000_abcdef01",
    goal: "Summarize the quarterly notes",
    riskTier: "LOW",
    risk: {
      tier: "LOW",
      signals: ["heuristic"],
      primarySignal: "heuristic",
      policyRefs: [],
      matchedKeywords: [],
      blocking: false,
      rationale: "tier LOW; no heuristic match, default LOW",
    },
    stage: "PLAN",
    status: "RUNNING",
    outcome: "PENDING",
    budget: {
      maxSteps: 12,
      maxToolCalls: 5,
      maxActiveMs: 600_000,
      stepsUsed: 1,
      toolCallsUsed: 0,
      activeMs: 0,
    },
    retries: 0,
    stageFailures: 0,
    workspace: { provenanceIds: [] },
    approvals: [],
    notes: [],
    transitions: [],
    createdAt: "2026-03-01T12:00:00.000Z",
    updatedAt: "2026-03-01T12:00:00.000Z",
    ...overrides,
  };
}

describe("stage capabilities", () => {
  it("names every field written outside the stage's set", () => {
    let thrown: unknown;
    try {
      enforceStageCapabilities({
        stage: "REVIEW",
        patch: { review: undefined, output: { content: "x", claims: [], attempt: 1 } },
        current: { provenanceIds: [] },
      });
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(AuthorityViolationError);
    expect(thrown instanceof AuthorityViolationError ? thrown.fields : []).toEqual(["output"]);
  });

  it("lets gather extend provenance ids but not rewrite them", () => {
    expect(() =>
      enforceStageCapabilities({
        stage: "GATHER",
        patch: { provenanceIds: ["a", "b", "c"] },
        current: { provenanceIds: ["a", "b"] },
      }),
    ).not.toThrow();
    expect(() =>
      enforceStageCapabilities({
        stage: "GATHER",
        patch: { provenanceIds: ["b"] },
        current: { provenanceIds: ["a", "b"] },
      }),
    ).toThrow(AuthorityViolationError);
  });

  it("keeps provenance ids when a patch omits them", () => {
    expect(
      applyWorkspacePatch(
        { provenanceIds: ["a"] },
        { reconciliation: { decision: "ACCEPT", reason: "review passed" } },
      ),
    ).toEqual({
      provenanceIds: ["a"],
      reconciliation: { decision: "ACCEPT", reason: "review passed" },
    });
  });
});

describe("executeStage", () => {
  let tmpDir = "";
  let ledger: ProvenanceLedger;
  let config: Readonly<GovernanceConfig>;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "governor-runner-"));
    ledger = createProvenanceLedger(resolveGovernancePaths(tmpDir));
    config = createGovernanceConfig({ stateDir: tmpDir });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function run(stage: "PLAN" | "REVIEW", task: TaskRecord, handlers: StageHandlers) {
    return executeStage({
      stage,
      task,
      handlers,
      policy: buildPolicySnapshot([]),
      ledger,
      config,
      producer: createExtractiveProducer(),
      gatherer: createSubmittedSourcesGatherer(),
      nowMs: () => 1_000,
    });
  }

  it("runs the plan stage without touching the task", async () => {
    const task = buildTask({ stage: "PLAN" });
    const before = structuredClone(task);
    const execution = await run("PLAN", task, DEFAULT_STAGE_HANDLERS);
    expect(execution.result.decision).toBe("spec_written");
    expect(execution.result.patch.spec?.deliverables).toEqual([
      "Summary of findings with citations",
    ]);
    expect(execution.durationMs).toBe(0);
    expect(task).toEqual(before);
  });

  it("rejects a non-gather stage appending provenance", async () => {
    const handlers: StageHandlers = {
      ...DEFAULT_STAGE_HANDLERS,
      REVIEW: async (ctx) => {
        await ctx.ledger.appendBatch([
          { source: "notes", timestamp: "2026-03-01T00:00:00.000Z", confidence: 0.5 },
        ]);
        return { patch: {}, decision: "PASS", rationale: "", policyRefs: [], toolCalls: 0 };
      },
    };
    await expect(run("REVIEW", buildTask({ stage: "REVIEW" }), handlers)).rejects.toBeInstanceOf(
      AuthorityViolationError,
    );
    expect(await ledger.list()).toEqual([]);
  });

  it("rejects a non-produce stage calling the producer", async () => {
    const handlers: StageHandlers = {
      ...DEFAULT_STAGE_HANDLERS,
      PLAN: async (ctx) => {
        await ctx.producer.produce({
          taskId: ctx.task.id,
          goal: ctx.task.goal,
          spec: undefined,
          records: [],
          attempt: 1,
          feedback: [],
        });
        return { patch: {}, decision: "spec_written", rationale: "", policyRefs: [], toolCalls: 0 };
      },
    };
    await expect(run("PLAN", buildTask(), handlers)).rejects.toThrow(
      "stage PLAN wrote outside its capability set: content producer",
    );
  });

  it("rejects a non-gather stage calling the gatherer", async () => {
    const gather = vi.fn(async () => ({ records: [], toolCalls: 1 }));
    const handlers: StageHandlers = {
      ...DEFAULT_STAGE_HANDLERS,
      PLAN: async (ctx) => {
        await ctx.gatherer.gather({
          taskId: ctx.task.id,
          goal: ctx.task.goal,
          spec: undefined,
          existing: [],
        });
        return { patch: {}, decision: "spec_written", rationale: "", policyRefs: [], toolCalls: 0 };
      },
    };
    const execution = executeStage({
      stage: "PLAN",
      task: buildTask(),
      handlers,
      policy: buildPolicySnapshot([]),
      ledger,
      config,
      producer: createExtractiveProducer(),
      gatherer: { gather },
    });
    await expect(execution).rejects.toBeInstanceOf(AuthorityViolationError);
    await expect(execution).rejects.toThrow(
      "stage PLAN wrote outside its capability set: source gatherer",
    );
    expect(gather).not.toHaveBeenCalled();
  });

  it("wraps other stage errors as stage failures", async () => {
    const gather = vi.fn(async () => {
      throw new Error("search backend unavailable");
    });
    const execution = executeStage({
      stage: "GATHER",
      task: buildTask({ stage: "GATHER" }),
      handlers: DEFAULT_STAGE_HANDLERS,
      policy: buildPolicySnapshot([]),
      ledger,
      config,
      producer: createExtractiveProducer(),
      gatherer: { gather },
    });
    await expect(execution).rejects.toBeInstanceOf(StageFailureError);
    await expect(execution).rejects.toThrow("stage GATHER failed: search backend unavailable");
    expect(gather).toHaveBeenCalledTimes(1);
  });
});
