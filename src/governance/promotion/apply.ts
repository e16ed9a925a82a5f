import { ApprovalRequiredError, InvalidSubmissionError, InvalidTransitionError } from "../errors.js";
import { appendPolicyRule } from "../policy/store.js";
import type { GovernancePaths } from "../store.js";
import type { ApprovalToken, PolicyRule, PromotionProposal } from "../types.js";
import { validateApprovalToken, validatePromotionProposal } from "./contract.js";
import { promotedRuleId } from "./scan.js";

export function issueApprovalToken(params: {
  proposalId: string;
  approver: string;
  approvers: readonly string[];
  nowMs?: number;
}): ApprovalToken {
  const approver = params.approver.trim();
  if (!approver) {
    throw new ApprovalRequiredError("an approver identity is required", {
      proposalId: params.proposalId,
    });
  }
  if (params.approvers.length > 0 && !params.approvers.includes(approver)) {
    throw new ApprovalRequiredError(`${approver} may not approve policy changes`, {
      proposalId: params.proposalId,
      approver,
    });
  }
  return {
    proposalId: params.proposalId,
    approver,
    issuedAt: new Date(params.nowMs ?? Date.now()).toISOString(),
  };
}

/**
 * The only write path from the promotion pipeline into the policy store. The rule is
 * stored under `rule-<proposalId>` with the proposal's drafted text, verbatim.
 */
export async function applyPromotion(params: {
  paths: GovernancePaths;
  proposal: PromotionProposal;
  token: ApprovalToken | undefined;
  nowMs?: number;
}): Promise<PolicyRule> {
  const { proposal } = params;
  const tokenCheck = validateApprovalToken(proposal, params.token);
  if (!tokenCheck.ok || !params.token) {
    throw new ApprovalRequiredError(
      tokenCheck.ok ? "approval token is required" : tokenCheck.error,
      { proposalId: proposal.id },
    );
  }
  if (proposal.status !== "PENDING") {
    throw new InvalidTransitionError(
      `proposal ${proposal.id} is ${proposal.status} and cannot be applied`,
      { proposalId: proposal.id, status: proposal.status },
    );
  }
  const contract = validatePromotionProposal(proposal);
  if (!contract.ok) {
    throw new InvalidSubmissionError(`proposal ${proposal.id} is invalid: ${contract.error}`, {
      proposalId: proposal.id,
    });
  }
  return appendPolicyRule({
    paths: params.paths,
    rule: {
      id: promotedRuleId(proposal.id),
      kind: proposal.rule.kind,
      text: proposal.rule.text,
      ...(proposal.rule.match ? { match: proposal.rule.match } : {}),
    },
    approvedBy: params.token.approver,
    proposalId: proposal.id,
    nowMs: params.nowMs,
  });
}
