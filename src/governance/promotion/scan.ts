import crypto from "node:crypto";
import type { EpisodeReason, EpisodicEntry, PromotionProposal } from "../types.js";

const PATTERN_PHRASES: Record<Exclude<EpisodeReason, "completed" | "cancelled">, string> = {
  approval_gate: "wait for approval before Produce",
  compliance_hold: "are held at the Compliance gate",
  retry_exhausted: "exhaust their Reconcile retries",
  authority_violation: "trip stage authority checks",
  stage_failure: "fail inside a stage",
  policy_conflict: "conflict with policy",
  rejected_by_human: "are rejected by a human reviewer",
  compliance_reject: "are rejected at the Compliance gate",
  budget_exceeded: "run past their budget",
};

type PatternReason = keyof typeof PATTERN_PHRASES;

function isPatternReason(reason: EpisodeReason): reason is PatternReason {
  return reason !== "completed" && reason !== "cancelled";
}

export function patternKeyForEpisode(episode: EpisodicEntry) {
  return `${episode.reason}:${episode.riskTier}:${episode.primarySignal ?? "none"}`;
}

export function proposalIdForPattern(patternKey: string) {
  return crypto.createHash("sha1").update(`proposal:${patternKey}`).digest("hex").slice(0, 16);
}

export function promotedRuleId(proposalId: string) {
  return `rule-${proposalId}`;
}

type PatternGroup = {
  key: string;
  reason: PatternReason;
  tier: EpisodicEntry["riskTier"];
  signal: string;
  taskIds: string[];
  occurrences: number;
  lastSeenAt: number;
};

function draftProposal(group: PatternGroup, createdAt: string): PromotionProposal {
  const id = proposalIdForPattern(group.key);
  const ruleId = promotedRuleId(id);
  const phrase = PATTERN_PHRASES[group.reason];
  return {
    id,
    patternKey: group.key,
    rule: {
      kind: "heuristic",
      text: `Route ${group.tier} risk tasks with primary signal ${group.signal} to human review at admission; they repeatedly ${phrase}.`,
    },
    evidence: {
      taskIds: group.taskIds,
      occurrences: group.occurrences,
    },
    rationale: `${group.taskIds.length} tasks share pattern ${group.key}: ${group.taskIds.join(", ")}`,
    impactAnalysis: `adds heuristic ${ruleId}; existing rules are unchanged; affects future ${group.tier} risk tasks whose primary signal is ${group.signal}`,
    rollbackPlan: `append a new version of ${ruleId} withdrawing it; earlier policy revisions stay in the log`,
    status: "PENDING",
    createdAt,
    updatedAt: createdAt,
  };
}

/**
 * Groups non-routine episodes by outcome pattern and drafts one proposal per pattern
 * seen across at least `minOccurrences` distinct tasks. Pure: nothing is written.
 */
export function scanEpisodes(params: {
  episodes: readonly EpisodicEntry[];
  minOccurrences?: number;
  knownPatternKeys?: ReadonlySet<string>;
  nowMs?: number;
}): PromotionProposal[] {
  const minOccurrences = Math.max(2, Math.floor(params.minOccurrences ?? 2));
  const groups = new Map<string, PatternGroup>();
  for (const episode of params.episodes) {
    if (!isPatternReason(episode.reason)) {
      continue;
    }
    const key = patternKeyForEpisode(episode);
    if (params.knownPatternKeys?.has(key)) {
      continue;
    }
    const ts = Date.parse(episode.timestamp);
    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, {
        key,
        reason: episode.reason,
        tier: episode.riskTier,
        signal: episode.primarySignal ?? "none",
        taskIds: [episode.taskId],
        occurrences: 1,
        lastSeenAt: ts,
      });
      continue;
    }
    existing.occurrences += 1;
    existing.lastSeenAt = Math.max(existing.lastSeenAt, ts);
    if (!existing.taskIds.includes(episode.taskId)) {
      existing.taskIds.push(episode.taskId);
    }
  }

  const createdAt = new Date(params.nowMs ?? Date.now()).toISOString();
  return [...groups.values()]
    .filter((group) => group.taskIds.length >= minOccurrences)
    .toSorted(
      (a, b) =>
        b.occurrences - a.occurrences || b.lastSeenAt - a.lastSeenAt || a.key.localeCompare(b.key),
    )
    .map((group) => draftProposal(group, createdAt));
}
