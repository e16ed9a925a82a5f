import type { ApprovalToken, PromotionProposal } from "../types.js";

export const MIN_PROPOSAL_EVIDENCE = 2;

export function validatePromotionProposal(
  proposal: PromotionProposal,
): { ok: true } | { ok: false; error: string } {
  if (!proposal.id.trim()) {
    return { ok: false, error: "proposal id is required" };
  }
  if (!proposal.patternKey.trim()) {
    return { ok: false, error: "proposal pattern key is required" };
  }
  if (!proposal.rule.text.trim()) {
    return { ok: false, error: "proposal rule text is required" };
  }
  const evidence = new Set(proposal.evidence.taskIds.map((id) => id.trim()).filter(Boolean));
  if (evidence.size < MIN_PROPOSAL_EVIDENCE) {
    return {
      ok: false,
      error: `proposal needs at least ${MIN_PROPOSAL_EVIDENCE} evidence tasks (got ${evidence.size})`,
    };
  }
  if (!proposal.rationale.trim()) {
    return { ok: false, error: "proposal rationale is required" };
  }
  if (!proposal.impactAnalysis.trim()) {
    return { ok: false, error: "proposal impact analysis is required" };
  }
  if (!proposal.rollbackPlan.trim()) {
    return { ok: false, error: "rollback plan is required" };
  }
  return { ok: true };
}

export function validateApprovalToken(
  proposal: Pick<PromotionProposal, "id">,
  token: ApprovalToken | undefined,
): { ok: true } | { ok: false; error: string } {
  if (!token) {
    return { ok: false, error: "approval token is required" };
  }
  if (token.proposalId !== proposal.id) {
    return { ok: false, error: `approval token is for ${token.proposalId}, not ${proposal.id}` };
  }
  if (!token.approver.trim()) {
    return { ok: false, error: "approval token has no approver" };
  }
  if (!Number.isFinite(Date.parse(token.issuedAt))) {
    return { ok: false, error: "approval token has no valid issue time" };
  }
  return { ok: true };
}
