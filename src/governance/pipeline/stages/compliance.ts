import { findRuleHits } from "../../policy/risk.js";
import type { ComplianceResult } from "../../types.js";
import type { StageHandler } from "../types.js";

/**
 * Releases output only when no outbound-risk marker is present, or a human has
 * approved the held action. A blocking policy rule in the output rejects outright.
 */
export const complianceStage: StageHandler = async (ctx) => {
  const output = ctx.task.workspace.output;
  const policyRefs = ["inv-compliance-gate"];
  let result: ComplianceResult;

  if (!output || !output.content.trim()) {
    result = { verdict: "REJECT", reasons: ["no output to release"], flaggedKeywords: [] };
  } else {
    const hits = findRuleHits(ctx.policy, `${ctx.task.goal}\n${output.content}`).filter(
      (hit) =>
        hit.rule.match?.signal === "irreversible_impact" ||
        hit.rule.match?.signal === "policy_conflict",
    );
    const flaggedKeywords = [...new Set(hits.flatMap((hit) => hit.keywords))];
    policyRefs.push(...hits.map((hit) => hit.rule.id));
    const blocker = hits.find((hit) => hit.rule.match?.effect === "block");
    const approval = ctx.task.approvals.find((entry) => entry.gate === "COMPLIANCE");
    if (blocker) {
      result = {
        verdict: "REJECT",
        reasons: [`blocked by ${blocker.rule.id}: ${blocker.rule.text}`],
        flaggedKeywords,
      };
    } else if (hits.length > 0 || ctx.task.risk.signals.includes("irreversible_impact")) {
      result = approval
        ? {
            verdict: "APPROVE",
            reasons: [`held action approved by ${approval.approver}`],
            flaggedKeywords,
          }
        : {
            verdict: "HOLD",
            reasons: [
              flaggedKeywords.length > 0
                ? `outbound action flagged (${flaggedKeywords.join(", ")})`
                : "task is marked irreversible",
            ],
            flaggedKeywords,
          };
      if (approval) {
        policyRefs.push("inv-human-escalation");
      }
    } else {
      result = { verdict: "APPROVE", reasons: ["all compliance checks passed"], flaggedKeywords };
    }
  }

  return {
    patch: { compliance: result },
    decision: result.verdict,
    rationale: result.reasons.join("; "),
    policyRefs,
    toolCalls: 0,
    evidence: { flaggedKeywords: result.flaggedKeywords },
  };
};
