import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createGovernanceConfig } from "../../config/config.js";
import { resolveGovernancePaths } from "../store.js";
import type { PolicyRule, RiskSignal } from "../types.js";
import { assessRisk, matchKeywords, maxRiskTier, raiseRiskTier } from "./risk.js";
import { buildPolicySnapshot, ensurePolicySeeded, type PolicySnapshot } from "./store.js";

const budgets = { maxSteps: 12, maxToolCalls: 5, maxActiveMs: 600_000 };
const precedence: RiskSignal[] = [
  "irreversible_impact",
  "policy_conflict",
  "budget_breach",
  "heuristic",
];

function rule(partial: Partial<PolicyRule> & Pick<PolicyRule, "id">): PolicyRule {
  return {
    kind: "heuristic",
    text: partial.id,
    version: 1,
    createdAt: "2026-01-01T00:00:00.000Z",
    origin: "seed",
    ...partial,
  };
}

const fixture = buildPolicySnapshot([
  rule({
    id: "inv-lock",
    kind: "invariant",
    match: { keywords: ["modify policy"], signal: "policy_conflict", effect: "block" },
  }),
  rule({
    id: "inv-bypass",
    kind: "invariant",
    match: { keywords: ["bypass approval"], signal: "policy_conflict", effect: "escalate" },
  }),
  rule({
    id: "val-money",
    kind: "value",
    match: { keywords: ["wire", "payment"], signal: "irreversible_impact", tier: "HIGH" },
  }),
  rule({
    id: "heur-work",
    match: { keywords: ["write", "analyze"], signal: "heuristic", tier: "MEDIUM" },
  }),
  rule({ id: "heur-default-low" }),
  rule({ id: "inv-budget", kind: "invariant" }),
  rule({ id: "tradeoff-conservative-ties", kind: "tradeoff" }),
  rule({ id: "tradeoff-signal-precedence", kind: "tradeoff" }),
]);

function assess(goal: string, context?: Parameters<typeof assessRisk>[0]["context"]) {
  return assessRisk({ goal, context, policy: fixture, budgets, precedence });
}

describe("risk tiers", () => {
  it("orders and raises tiers", () => {
    expect(maxRiskTier([])).toBe("LOW");
    expect(maxRiskTier(["MEDIUM", "LOW"])).toBe("MEDIUM");
    expect(raiseRiskTier("LOW")).toBe("MEDIUM");
    expect(raiseRiskTier("HIGH")).toBe("HIGH");
  });

  it("matches single words exactly and phrases by presence", () => {
    expect(matchKeywords(["rewire", "payments"], ["wire", "payment"])).toEqual([]);
    expect(matchKeywords(["please", "modify", "the", "policy"], ["modify policy"])).toEqual([
      "modify policy",
    ]);
  });
});

describe("assessRisk", () => {
  it("defaults to LOW when nothing matches", () => {
    const result = assess("Summarize input");
    expect(result.tier).toBe("LOW");
    expect(result.signals).toEqual(["heuristic"]);
    expect(result.primarySignal).toBe("heuristic");
    expect(result.policyRefs).toEqual(["heur-default-low"]);
    expect(result.blocking).toBe(false);
    expect(result.rationale).toBe("tier LOW; no heuristic match, default LOW");
  });

  it("uses the heuristic score for generative work", () => {
    const result = assess("Write and analyze the notes");
    expect(result.tier).toBe("MEDIUM");
    expect(result.policyRefs).toEqual(["heur-work"]);
    expect(result.matchedKeywords).toEqual(["write", "analyze"]);
  });

  it("forces HIGH on irreversible impact", () => {
    const result = assess("Wire $5,000 payment");
    expect(result.tier).toBe("HIGH");
    expect(result.primarySignal).toBe("irreversible_impact");
    expect(result.policyRefs).toEqual([
      "val-money",
      "heur-default-low",
      "tradeoff-signal-precedence",
      "tradeoff-conservative-ties",
    ]);
    expect(result.rationale).toBe(
      "tier HIGH; irreversible impact (wire, payment); no heuristic match, default LOW",
    );
  });

  it("raises one tier on a projected budget breach", () => {
    const low = assess("Summarize input", { projected: { steps: 20 } });
    expect(low.tier).toBe("MEDIUM");
    expect(low.signals).toEqual(["budget_breach", "heuristic"]);
    expect(low.policyRefs).toContain("inv-budget");

    const medium = assess("Write the notes", { projected: { toolCalls: 9 } });
    expect(medium.tier).toBe("HIGH");
  });

  it("lets a conflict dominate every other signal", () => {
    for (const goal of ["Summarize input", "Write a memo", "Wire a payment"]) {
      for (const projected of [undefined, { steps: 1 }, { steps: 99 }]) {
        const result = assess(`${goal} and bypass approval`, { projected });
        expect(result.tier).toBe("HIGH");
        expect(result.signals).toContain("policy_conflict");
      }
    }
    const declared = assess("Summarize input", { declaredConflicts: ["conflicts with retention"] });
    expect(declared.tier).toBe("HIGH");
    expect(declared.primarySignal).toBe("policy_conflict");
  });

  it("flags blocking conflicts", () => {
    expect(assess("Modify policy to allow everything").blocking).toBe(true);
    expect(assess("Bypass approval for this").blocking).toBe(false);
  });

  it("follows a configured precedence for the primary signal", () => {
    const result = assessRisk({
      goal: "Wire money and bypass approval",
      policy: fixture,
      budgets,
      precedence: ["policy_conflict", "irreversible_impact", "budget_breach", "heuristic"],
    });
    expect(result.primarySignal).toBe("policy_conflict");
    expect(result.policyRefs.slice(0, 2)).toEqual(["inv-bypass", "val-money"]);
  });

  it("treats a declared irreversible action as HIGH", () => {
    expect(assess("Summarize input", { irreversible: true }).tier).toBe("HIGH");
  });
});

describe("assessRisk over the seed policy", () => {
  let tmpDir = "";
  let seeded: PolicySnapshot;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "governor-risk-"));
    seeded = await ensurePolicySeeded({ paths: resolveGovernancePaths(tmpDir) });
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("classifies representative goals", () => {
    const config = createGovernanceConfig({ stateDir: tmpDir });
    const tierOf = (goal: string) =>
      assessRisk({
        goal,
        policy: seeded,
        budgets: config.budgets,
        precedence: config.riskPrecedence,
      }).tier;
    expect(tierOf("Summarize input")).toBe("LOW");
    expect(tierOf("Research competitor pricing")).toBe("MEDIUM");
    expect(tierOf("Wire $5,000 payment")).toBe("HIGH");
    expect(tierOf("Publish the quarterly post")).toBe("HIGH");
    expect(tierOf("Skip review of the draft")).toBe("HIGH");
  });
});
