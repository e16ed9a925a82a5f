import type { GovernanceConfig } from "../../config/config.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import type { AuditLog } from "../audit/log.js";
import { readEpisodes } from "../episodic/store.js";
import {
  InvalidSubmissionError,
  InvalidTransitionError,
  ProposalNotFoundError,
} from "../errors.js";
import type { GovernancePaths } from "../store.js";
import type { PolicyRule, PromotionProposal, ProposalStatus } from "../types.js";
import { applyPromotion, issueApprovalToken } from "./apply.js";
import { validatePromotionProposal } from "./contract.js";
import {
  appendProposalEvent,
  enqueueProposals,
  isProposalExpired,
  listQueuedProposals,
} from "./queue.js";
import { scanEpisodes } from "./scan.js";

const log = createSubsystemLogger("promotion");

export type PromotionPipeline = ReturnType<typeof createPromotionPipeline>;

function proposalAuditId(proposalId: string) {
  return `proposal:${proposalId}`;
}

function requirePending(proposals: readonly PromotionProposal[], proposalId: string) {
  const proposal = proposals.find((entry) => entry.id === proposalId);
  if (!proposal) {
    return new ProposalNotFoundError(proposalId);
  }
  if (proposal.status !== "PENDING") {
    return new InvalidTransitionError(`proposal ${proposalId} is already ${proposal.status}`, {
      proposalId,
      status: proposal.status,
    });
  }
  return null;
}

/**
 * Scans episodic memory for repeated outcomes and keeps a queue of rule proposals.
 * Nothing reaches the policy store without a human approval token.
 */
export function createPromotionPipeline(deps: {
  config: Readonly<GovernanceConfig>;
  paths: GovernancePaths;
  audit: AuditLog;
  refreshPolicy: () => Promise<unknown>;
  now?: () => number;
}) {
  const now = deps.now ?? Date.now;
  let chain: Promise<unknown> = Promise.resolve();

  function serialized<T>(run: () => Promise<T>): Promise<T> {
    const next = chain.catch(() => undefined).then(run);
    chain = next;
    return next;
  }

  async function getProposal(proposalId: string) {
    const proposal = (await listQueuedProposals(deps.paths)).find(
      (entry) => entry.id === proposalId,
    );
    if (!proposal) {
      throw new ProposalNotFoundError(proposalId);
    }
    return proposal;
  }

  // Callers hold the serialized chain.
  async function expireStale(nowMs: number): Promise<PromotionProposal[]> {
    const stale = (await listQueuedProposals(deps.paths, { status: "PENDING" })).filter(
      (proposal) => isProposalExpired(proposal, deps.config.proposalTtlDays, nowMs),
    );
    const expired: PromotionProposal[] = [];
    for (const proposal of stale) {
      const at = new Date(nowMs).toISOString();
      const reason = `pending longer than ${deps.config.proposalTtlDays} days`;
      const next = await appendProposalEvent({
        paths: deps.paths,
        event: { type: "expired", at, proposalId: proposal.id, reason },
        check: (current) => requirePending(current, proposal.id),
      });
      await deps.audit.append({
        taskId: proposalAuditId(proposal.id),
        stage: "PROMOTION",
        decision: "EXPIRED",
        rationale: reason,
        policyRefs: ["inv-promotion-approval"],
        actor: "promotion",
        timestamp: at,
      });
      const updated = next.find((entry) => entry.id === proposal.id);
      if (updated) {
        expired.push(updated);
      }
    }
    if (expired.length > 0) {
      log.info("expired proposals", { count: expired.length });
    }
    return expired;
  }

  async function expire(): Promise<PromotionProposal[]> {
    return serialized(() => expireStale(now()));
  }

  async function list(params: { status?: ProposalStatus } = {}) {
    await expire();
    return listQueuedProposals(deps.paths, params);
  }

  async function scan(): Promise<PromotionProposal[]> {
    await expire();
    return serialized(async () => {
      const nowMs = now();
      const known = new Set(
        (await listQueuedProposals(deps.paths)).map((proposal) => proposal.patternKey),
      );
      const drafted = scanEpisodes({
        episodes: await readEpisodes(deps.paths),
        minOccurrences: deps.config.minPatternOccurrences,
        knownPatternKeys: known,
        nowMs,
      }).filter((proposal) => {
        const verdict = validatePromotionProposal(proposal);
        if (!verdict.ok) {
          log.warn("dropped invalid proposal", { proposalId: proposal.id, error: verdict.error });
        }
        return verdict.ok;
      });
      const added = await enqueueProposals({ paths: deps.paths, proposals: drafted, nowMs });
      for (const proposal of added) {
        await deps.audit.append({
          taskId: proposalAuditId(proposal.id),
          stage: "PROMOTION",
          decision: "PROPOSED",
          rationale: proposal.rationale,
          policyRefs: ["inv-promotion-approval"],
          actor: "promotion",
          evidence: { patternKey: proposal.patternKey, taskIds: proposal.evidence.taskIds },
          timestamp: new Date(nowMs).toISOString(),
        });
      }
      return added;
    });
  }

  async function approve(proposalId: string, approver: string): Promise<PolicyRule> {
    return serialized(async () => {
      const nowMs = now();
      await expireStale(nowMs);
      const proposal = await getProposal(proposalId);
      const token = issueApprovalToken({
        proposalId,
        approver,
        approvers: deps.config.approvers,
        nowMs,
      });
      const rule = await applyPromotion({ paths: deps.paths, proposal, token, nowMs });
      await appendProposalEvent({
        paths: deps.paths,
        event: {
          type: "approved",
          at: new Date(nowMs).toISOString(),
          proposalId,
          by: token.approver,
          ruleId: rule.id,
        },
      });
      await deps.refreshPolicy();
      await deps.audit.append({
        taskId: proposalAuditId(proposalId),
        stage: "PROMOTION",
        decision: "APPROVED",
        rationale: `approved by ${token.approver}; added ${rule.id} v${rule.version}`,
        policyRefs: ["inv-promotion-approval", rule.id],
        actor: "human",
        evidence: { ruleId: rule.id, version: rule.version },
        timestamp: new Date(nowMs).toISOString(),
      });
      log.info("proposal applied", { proposalId, ruleId: rule.id });
      return rule;
    });
  }

  async function dispose(
    type: "rejected" | "pruned",
    proposalId: string,
    reason: string,
    by?: string,
  ): Promise<PromotionProposal> {
    const trimmed = reason.trim();
    if (!trimmed) {
      throw new InvalidSubmissionError(
        `${type === "pruned" ? "pruning" : "rejecting"} a proposal requires a reason`,
        { proposalId },
      );
    }
    return serialized(async () => {
      const nowMs = now();
      await expireStale(nowMs);
      const at = new Date(nowMs).toISOString();
      const byApprover = by?.trim();
      const next = await appendProposalEvent({
        paths: deps.paths,
        event:
          type === "rejected"
            ? { type, at, proposalId, reason: trimmed, ...(byApprover ? { by: byApprover } : {}) }
            : { type, at, proposalId, reason: trimmed },
        check: (current) => requirePending(current, proposalId),
      });
      await deps.audit.append({
        taskId: proposalAuditId(proposalId),
        stage: "PROMOTION",
        decision: type === "rejected" ? "REJECTED" : "PRUNED",
        rationale: trimmed,
        policyRefs: ["inv-promotion-approval"],
        actor: "human",
        timestamp: at,
      });
      const updated = next.find((entry) => entry.id === proposalId);
      if (!updated) {
        throw new ProposalNotFoundError(proposalId);
      }
      return updated;
    });
  }

  return {
    list,
    get: getProposal,
    scan,
    expire,
    approve,
    reject: (proposalId: string, reason: string, by?: string) =>
      dispose("rejected", proposalId, reason, by),
    prune: (proposalId: string, reason: string) => dispose("pruned", proposalId, reason),
  };
}
