import type { Reconciliation } from "../../types.js";
import type { StageHandler } from "../types.js";

export const reconcileStage: StageHandler = async (ctx) => {
  const review = ctx.task.workspace.review;
  const limit = ctx.config.retryLimit;
  let reconciliation: Reconciliation;
  if (review?.passed) {
    reconciliation = { decision: "ACCEPT", reason: "review passed" };
  } else {
    const failure = review
      ? review.findings
          .filter((finding) => finding.blocking)
          .map((finding) => finding.message)
          .join("; ")
      : "no review verdict";
    reconciliation =
      ctx.task.retries < limit
        ? {
            decision: "RETRY",
            reason: `retry ${ctx.task.retries + 1}/${limit}: ${failure}`,
          }
        : { decision: "ESCALATE", reason: failure };
  }
  return {
    patch: { reconciliation },
    decision: reconciliation.decision,
    rationale: reconciliation.reason,
    policyRefs: ["inv-retry-limit"],
    toolCalls: 0,
    evidence: { retries: ctx.task.retries, retryLimit: limit },
  };
};
