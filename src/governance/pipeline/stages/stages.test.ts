import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createGovernanceConfig } from "../../../config/config.js";
import { ensurePolicySeeded, type PolicySnapshot } from "../../policy/store.js";
import { createProvenanceLedger, type ProvenanceLedger } from "../../provenance/ledger.js";
import { resolveGovernancePaths } from "../../store.js";
import type { PipelineStage, TaskRecord } from "../../types.js";
import { createExtractiveProducer, createSubmittedSourcesGatherer } from "../collaborators.js";
import type { StageContext } from "../types.js";
import { complianceStage } from "./compliance.js";
import { draftTaskSpec } from "./plan.js";
import { reconcileStage } from "./reconcile.js";
import { reviewStage } from "./review.js";

function buildTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: "task_20260301_120000_abcdef01",
    goal: "Summarize the quarterly notes",
    riskTier: "MEDIUM",
    risk: {
      tier: "MEDIUM",
      signals: ["heuristic"],
      primarySignal: "heuristic",
      policyRefs: [],
      matchedKeywords: [],
      blocking: false,
      rationale: "tier MEDIUM",
    },
    stage: null,
    status: "RUNNING",
    outcome: "PENDING",
    budget: {
      maxSteps: 12,
      maxToolCalls: 5,
      maxActiveMs: 600_000,
      stepsUsed: 0,
      toolCallsUsed: 0,
      activeMs: 0,
    },
    retries: 0,
    stageFailures: 0,
    workspace: { provenanceIds: ["p-1", "p-2"] },
    approvals: [],
    notes: [],
    transitions: [],
    createdAt: "2026-03-01T12:00:00.000Z",
    updatedAt: "2026-03-01T12:00:00.000Z",
    ...overrides,
  };
}

describe("pipeline stages", () => {
  let tmpDir = "";
  let ledger: ProvenanceLedger;
  let policy: PolicySnapshot;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "governor-stages-"));
    const paths = resolveGovernancePaths(tmpDir);
    ledger = createProvenanceLedger(paths);
    policy = await ensurePolicySeeded({ paths });
    await ledger.appendBatch([
      {
        id: "p-1",
        source: "archive",
        timestamp: "2026-02-01T00:00:00.000Z",
        confidence: 0.9,
        contentRef: "notes/q1",
      },
      {
        id: "p-2",
        source: "survey",
        timestamp: "2026-02-02T00:00:00.000Z",
        confidence: 0.7,
        contentRef: "notes/q2",
      },
    ]);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function context(stage: PipelineStage, task: TaskRecord): StageContext {
    return {
      stage,
      task,
      policy,
      ledger,
      config: createGovernanceConfig({ stateDir: tmpDir }),
      producer: createExtractiveProducer(),
      gatherer: createSubmittedSourcesGatherer(),
      nowMs: Date.parse("2026-03-01T12:00:00.000Z"),
    };
  }

  describe("plan", () => {
    it("derives deliverables and estimates from the goal", () => {
      const spec = draftTaskSpec({
        goal: "Research and analyze churn drivers",
        sourceCount: 2,
        maxSteps: 12,
        maxToolCalls: 5,
        minDistinctSources: 2,
        singleSource: false,
      });
      expect(spec.deliverables).toEqual([
        "Summary of findings with citations",
        "Analysis with supporting evidence",
      ]);
      expect(spec.estimatedSteps).toBe(7);
      expect(spec.estimatedToolCalls).toBe(2);
      expect(spec.constraints).toEqual([
        "Maximum 12 execution steps",
        "Maximum 5 tool calls",
        "At least 2 distinct sources",
      ]);
      expect(spec.falsifiable).toBe(true);
    });
  });

  describe("review", () => {
    it("fails unsupported claims and flags a dominant source", async () => {
      const task = buildTask({
        workspace: {
          provenanceIds: ["p-1", "p-2"],
          spec: draftTaskSpec({
            goal: "Summarize the quarterly notes",
            sourceCount: 2,
            maxSteps: 12,
            maxToolCalls: 5,
            minDistinctSources: 2,
            singleSource: false,
          }),
          output: {
            content: "Quarterly summary",
            claims: [
              { text: "revenue grew", provenanceRefs: ["p-1"] },
              { text: "churn fell", provenanceRefs: ["missing-record"] },
            ],
            attempt: 1,
          },
        },
      });
      const result = await reviewStage(context("REVIEW", task));
      expect(result.decision).toBe("FAIL");
      expect(result.rationale).toBe("1 claim(s) do not resolve to any provenance record");
      expect(result.patch.review?.unsupportedClaims).toEqual(["churn fell"]);
      expect(result.patch.review?.requiredChanges).toEqual([
        "cite a ledger record for: churn fell",
      ]);
      expect(result.patch.review?.warnings).toEqual([
        "SourceDominanceWarning: source archive supplies 100.0% of records, above 50.0%",
      ]);
      expect(result.evidence?.error).toBe("UnsupportedClaimError");
      expect(result.policyRefs).toEqual(["inv-claims-supported", "heur-source-dominance"]);
    });

    it("treats rubric findings as advisory for low-risk tasks", async () => {
      const task = buildTask({
        riskTier: "LOW",
        workspace: {
          provenanceIds: ["p-1", "p-2"],
          output: {
            content: "Quarterly summary",
            claims: [
              { text: "revenue grew", provenanceRefs: ["p-1"] },
              { text: "churn fell", provenanceRefs: ["notes/q2"] },
            ],
            attempt: 1,
          },
        },
      });
      const result = await reviewStage(context("REVIEW", task));
      expect(result.decision).toBe("PASS");
      expect(result.rationale).toBe("passed with advisory findings: spec lists no deliverables");
      expect(result.notes).toEqual(["post-hoc review: spec lists no deliverables"]);
      expect(result.patch.review?.dominance).toEqual({
        dominant: false,
        source: "archive",
        share: 0.5,
        recordCount: 2,
      });
    });
  });

  describe("reconcile", () => {
    const failedReview = {
      passed: false,
      findings: [{ code: "EMPTY_OUTPUT" as const, message: "output is empty", blocking: true }],
      requiredChanges: ["output is empty"],
      unsupportedClaims: [],
      dominance: { dominant: false, share: 0, recordCount: 0 },
      warnings: [],
    };

    it("retries while under the limit", async () => {
      const task = buildTask({ workspace: { provenanceIds: [], review: failedReview } });
      const result = await reconcileStage(context("RECONCILE", task));
      expect(result.patch.reconciliation).toEqual({
        decision: "RETRY",
        reason: "retry 1/2: output is empty",
      });
    });

    it("escalates once retries are spent", async () => {
      const task = buildTask({ retries: 2, workspace: { provenanceIds: [], review: failedReview } });
      const result = await reconcileStage(context("RECONCILE", task));
      expect(result.patch.reconciliation).toEqual({
        decision: "ESCALATE",
        reason: "output is empty",
      });
    });
  });

  describe("compliance", () => {
    function withOutput(content: string, overrides: Partial<TaskRecord> = {}) {
      return buildTask({
        ...overrides,
        workspace: { provenanceIds: [], output: { content, claims: [], attempt: 1 } },
      });
    }

    it("approves output without outbound markers", async () => {
      const result = await complianceStage(context("COMPLIANCE", withOutput("Quarterly summary")));
      expect(result.patch.compliance).toEqual({
        verdict: "APPROVE",
        reasons: ["all compliance checks passed"],
        flaggedKeywords: [],
      });
    });

    it("holds flagged output until a compliance approval exists", async () => {
      const held = await complianceStage(
        context("COMPLIANCE", withOutput("Draft ready to send to the bank")),
      );
      expect(held.patch.compliance).toEqual({
        verdict: "HOLD",
        reasons: ["outbound action flagged (bank, send)"],
        flaggedKeywords: ["bank", "send"],
      });
      expect(held.policyRefs).toEqual(["inv-compliance-gate", "val-irreversible-impact"]);

      const approved = await complianceStage(
        context(
          "COMPLIANCE",
          withOutput("Draft ready to send to the bank", {
            approvals: [{ gate: "COMPLIANCE", approver: "reviewer", at: "2026-03-01T12:10:00.000Z" }],
          }),
        ),
      );
      expect(approved.patch.compliance?.verdict).toBe("APPROVE");
      expect(approved.rationale).toBe("held action approved by reviewer");
    });

    it("rejects output matching a blocking rule", async () => {
      const result = await complianceStage(
        context("COMPLIANCE", withOutput("Next step: modify policy files")),
      );
      expect(result.patch.compliance?.verdict).toBe("REJECT");
      expect(result.patch.compliance?.reasons[0]?.startsWith("blocked by inv-policy-immutable: ")).toBe(
        true,
      );
    });

    it("rejects when there is nothing to release", async () => {
      const result = await complianceStage(context("COMPLIANCE", buildTask()));
      expect(result.patch.compliance).toEqual({
        verdict: "REJECT",
        reasons: ["no output to release"],
        flaggedKeywords: [],
      });
    });
  });
});
