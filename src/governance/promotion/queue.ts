import { z } from "zod";
import { PromotionProposalSchema } from "../schemas.js";
import {
  appendJsonLine,
  readJsonLines,
  withSerializedWrite,
  type GovernancePaths,
} from "../store.js";
import type { PromotionProposal, ProposalStatus } from "../types.js";

export type ProposalQueueEvent =
  | { type: "added"; at: string; proposal: PromotionProposal }
  | { type: "pruned"; at: string; proposalId: string; reason: string }
  | { type: "expired"; at: string; proposalId: string; reason: string }
  | { type: "rejected"; at: string; proposalId: string; by?: string; reason: string }
  | { type: "approved"; at: string; proposalId: string; by: string; ruleId: string };

const ProposalQueueEventSchema: z.ZodType<ProposalQueueEvent, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("added"), at: z.string(), proposal: PromotionProposalSchema }),
    z.object({
      type: z.literal("pruned"),
      at: z.string(),
      proposalId: z.string(),
      reason: z.string(),
    }),
    z.object({
      type: z.literal("expired"),
      at: z.string(),
      proposalId: z.string(),
      reason: z.string(),
    }),
    z.object({
      type: z.literal("rejected"),
      at: z.string(),
      proposalId: z.string(),
      by: z.string().optional(),
      reason: z.string(),
    }),
    z.object({
      type: z.literal("approved"),
      at: z.string(),
      proposalId: z.string(),
      by: z.string(),
      ruleId: z.string(),
    }),
  ]);

const STATUS_BY_EVENT: Record<Exclude<ProposalQueueEvent["type"], "added">, ProposalStatus> = {
  pruned: "PRUNED",
  expired: "EXPIRED",
  rejected: "REJECTED",
  approved: "APPROVED",
};

/**
 * Replays queue events into the current proposal set, in insertion order. Events for
 * unknown or already-settled proposals are ignored.
 */
export function foldProposalEvents(events: readonly ProposalQueueEvent[]) {
  const byId = new Map<string, PromotionProposal>();
  for (const event of events) {
    if (event.type === "added") {
      if (!byId.has(event.proposal.id)) {
        byId.set(event.proposal.id, event.proposal);
      }
      continue;
    }
    const current = byId.get(event.proposalId);
    if (!current || current.status !== "PENDING") {
      continue;
    }
    const by = event.type === "approved" || event.type === "rejected" ? event.by : undefined;
    byId.set(event.proposalId, {
      ...current,
      status: STATUS_BY_EVENT[event.type],
      updatedAt: event.at,
      disposition: {
        ...(by ? { by } : {}),
        ...(event.type === "approved" ? { ruleId: event.ruleId } : { reason: event.reason }),
        at: event.at,
      },
    });
  }
  return [...byId.values()];
}

export async function readProposalEvents(paths: GovernancePaths) {
  return readJsonLines(paths.proposals, ProposalQueueEventSchema);
}

export async function listQueuedProposals(
  paths: GovernancePaths,
  params: { status?: ProposalStatus } = {},
) {
  const proposals = foldProposalEvents(await readProposalEvents(paths));
  return params.status
    ? proposals.filter((proposal) => proposal.status === params.status)
    : proposals;
}

/**
 * Appends an event after checking it against the folded state under the file's write
 * chain. `check` returns the error to raise, or null to proceed.
 */
export async function appendProposalEvent(params: {
  paths: GovernancePaths;
  event: ProposalQueueEvent;
  check?: (current: PromotionProposal[]) => Error | null;
}): Promise<PromotionProposal[]> {
  return withSerializedWrite(params.paths.proposals, async () => {
    const events = await readProposalEvents(params.paths);
    const error = params.check?.(foldProposalEvents(events));
    if (error) {
      throw error;
    }
    await appendJsonLine(params.paths.proposals, params.event);
    return foldProposalEvents([...events, params.event]);
  });
}

/** Adds proposals whose id is not already queued, in any status. */
export async function enqueueProposals(params: {
  paths: GovernancePaths;
  proposals: readonly PromotionProposal[];
  nowMs?: number;
}): Promise<PromotionProposal[]> {
  const at = new Date(params.nowMs ?? Date.now()).toISOString();
  return withSerializedWrite(params.paths.proposals, async () => {
    const known = new Set(
      foldProposalEvents(await readProposalEvents(params.paths)).map((proposal) => proposal.id),
    );
    const added: PromotionProposal[] = [];
    for (const proposal of params.proposals) {
      if (known.has(proposal.id)) {
        continue;
      }
      const event: ProposalQueueEvent = { type: "added", at, proposal };
      await appendJsonLine(params.paths.proposals, event);
      known.add(proposal.id);
      added.push(proposal);
    }
    return added;
  });
}

export function isProposalExpired(proposal: PromotionProposal, ttlDays: number, nowMs: number) {
  return (
    proposal.status === "PENDING" &&
    nowMs - Date.parse(proposal.createdAt) > ttlDays * 24 * 60 * 60 * 1000
  );
}
