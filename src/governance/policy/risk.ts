import type { TaskBudgetLimits } from "../../config/config.js";
import { tokenize, uniqueStrings } from "../../utils.js";
import type { PolicyRule, RiskAssessment, RiskSignal, RiskTier } from "../types.js";
import { resolvePolicyRefs, type PolicySnapshot } from "./store.js";

export const DEFAULT_LOW_RULE_ID = "heur-default-low";
export const CONSERVATIVE_TIES_RULE_ID = "tradeoff-conservative-ties";
export const SIGNAL_PRECEDENCE_RULE_ID = "tradeoff-signal-precedence";
export const BUDGET_RULE_ID = "inv-budget";

const TIER_ORDER: RiskTier[] = ["LOW", "MEDIUM", "HIGH"];

export type RiskContext = {
  /** Expected resource use; any value over the task budget is a budget breach. */
  projected?: {
    steps?: number;
    toolCalls?: number;
    activeMs?: number;
  };
  /** Conflicts a submitter already knows about (free-text descriptions). */
  declaredConflicts?: string[];
  /** Marks the goal as irreversible even when no keyword says so. */
  irreversible?: boolean;
  /** Extra text scanned alongside the goal, e.g. a draft of the outbound message. */
  text?: string;
};

export type RuleHit = {
  rule: PolicyRule;
  keywords: string[];
};

export function compareRiskTier(a: RiskTier, b: RiskTier) {
  return TIER_ORDER.indexOf(a) - TIER_ORDER.indexOf(b);
}

export function maxRiskTier(tiers: RiskTier[]): RiskTier {
  return tiers.reduce<RiskTier>((acc, tier) => (compareRiskTier(tier, acc) > 0 ? tier : acc), "LOW");
}

export function raiseRiskTier(tier: RiskTier): RiskTier {
  return TIER_ORDER[Math.min(TIER_ORDER.length - 1, TIER_ORDER.indexOf(tier) + 1)] ?? "HIGH";
}

/**
 * A single-word keyword matches a token exactly; a phrase matches when every one of
 * its words appears somewhere in the text.
 */
export function matchKeywords(tokens: readonly string[], keywords: readonly string[]) {
  const present = new Set(tokens);
  return keywords.filter((keyword) => {
    const words = tokenize(keyword);
    return words.length > 0 && words.every((word) => present.has(word));
  });
}

export function findRuleHits(snapshot: PolicySnapshot, text: string): RuleHit[] {
  const tokens = tokenize(text);
  const hits: RuleHit[] = [];
  for (const rule of snapshot.rules) {
    if (!rule.match) {
      continue;
    }
    const keywords = matchKeywords(tokens, rule.match.keywords);
    if (keywords.length > 0) {
      hits.push({ rule, keywords });
    }
  }
  return hits;
}

function findBudgetBreaches(context: RiskContext | undefined, budgets: TaskBudgetLimits) {
  const projected = context?.projected;
  if (!projected) {
    return [];
  }
  const breaches: string[] = [];
  if (typeof projected.steps === "number" && projected.steps > budgets.maxSteps) {
    breaches.push(`steps ${projected.steps}/${budgets.maxSteps}`);
  }
  if (typeof projected.toolCalls === "number" && projected.toolCalls > budgets.maxToolCalls) {
    breaches.push(`tool calls ${projected.toolCalls}/${budgets.maxToolCalls}`);
  }
  if (typeof projected.activeMs === "number" && projected.activeMs > budgets.maxActiveMs) {
    breaches.push(`active time ${projected.activeMs}ms/${budgets.maxActiveMs}ms`);
  }
  return breaches;
}

/**
 * Deterministic tier assignment over the policy snapshot.
 *
 * The heuristic score is the highest tier among matching heuristic rules (LOW when
 * none match). A projected budget breach lifts that one tier. Irreversible impact
 * and policy conflicts each force their rule tier, HIGH unless the rule says
 * otherwise for irreversible impact; conflicts are always HIGH. The final tier is
 * the highest candidate, so ties land on the conservative side. `precedence` only
 * orders signals for reporting and picks the primary one.
 */
export function assessRisk(params: {
  goal: string;
  context?: RiskContext;
  policy: PolicySnapshot;
  budgets: TaskBudgetLimits;
  precedence: readonly RiskSignal[];
}): RiskAssessment {
  const text = [params.goal, params.context?.text ?? ""].join(" ");
  const hits = findRuleHits(params.policy, text);
  const bySignal = (signal: RiskSignal) => hits.filter((hit) => hit.rule.match?.signal === signal);

  const irreversibleHits = bySignal("irreversible_impact");
  const conflictHits = bySignal("policy_conflict");
  const heuristicHits = bySignal("heuristic");
  const declaredConflicts = uniqueStrings(params.context?.declaredConflicts ?? []);
  const budgetBreaches = findBudgetBreaches(params.context, params.budgets);

  const fired = new Set<RiskSignal>(["heuristic"]);
  if (irreversibleHits.length > 0 || params.context?.irreversible === true) {
    fired.add("irreversible_impact");
  }
  if (conflictHits.length > 0 || declaredConflicts.length > 0) {
    fired.add("policy_conflict");
  }
  if (budgetBreaches.length > 0) {
    fired.add("budget_breach");
  }

  const heuristicTier = maxRiskTier(heuristicHits.map((hit) => hit.rule.match?.tier ?? "LOW"));
  const candidates: RiskTier[] = [
    fired.has("budget_breach") ? raiseRiskTier(heuristicTier) : heuristicTier,
  ];
  if (fired.has("irreversible_impact")) {
    candidates.push(
      irreversibleHits.length > 0
        ? maxRiskTier(irreversibleHits.map((hit) => hit.rule.match?.tier ?? "HIGH"))
        : "HIGH",
    );
  }
  if (fired.has("policy_conflict")) {
    candidates.push("HIGH");
  }
  const tier = maxRiskTier(candidates);

  const signals = params.precedence.filter((signal) => fired.has(signal));
  const primarySignal = signals[0];

  const refIds: string[] = [];
  for (const signal of signals) {
    for (const hit of bySignal(signal)) {
      refIds.push(hit.rule.id);
    }
  }
  if (heuristicHits.length === 0) {
    refIds.push(DEFAULT_LOW_RULE_ID);
  }
  if (budgetBreaches.length > 0) {
    refIds.push(BUDGET_RULE_ID);
  }
  if (signals.length > 1) {
    refIds.push(SIGNAL_PRECEDENCE_RULE_ID);
  }
  if (new Set(candidates).size > 1) {
    refIds.push(CONSERVATIVE_TIES_RULE_ID);
  }

  const matchedKeywords = uniqueStrings(hits.flatMap((hit) => hit.keywords));
  const blocking = conflictHits.some((hit) => hit.rule.match?.effect === "block");
  const details: string[] = [];
  if (irreversibleHits.length > 0 || fired.has("irreversible_impact")) {
    const words = uniqueStrings(irreversibleHits.flatMap((hit) => hit.keywords));
    details.push(
      words.length > 0 ? `irreversible impact (${words.join(", ")})` : "declared irreversible",
    );
  }
  if (fired.has("policy_conflict")) {
    const words = uniqueStrings([
      ...conflictHits.flatMap((hit) => hit.keywords),
      ...declaredConflicts,
    ]);
    details.push(`policy conflict (${words.join(", ")})`);
  }
  if (budgetBreaches.length > 0) {
    details.push(`projected budget breach (${budgetBreaches.join("; ")})`);
  }
  details.push(
    heuristicHits.length > 0
      ? `heuristic ${heuristicTier} (${uniqueStrings(heuristicHits.flatMap((hit) => hit.keywords)).join(", ")})`
      : "no heuristic match, default LOW",
  );

  return {
    tier,
    signals,
    ...(primarySignal ? { primarySignal } : {}),
    policyRefs: resolvePolicyRefs(params.policy, refIds),
    matchedKeywords,
    blocking,
    rationale: `tier ${tier}; ${details.join("; ")}`,
  };
}
