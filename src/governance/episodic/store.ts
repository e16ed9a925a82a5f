import crypto from "node:crypto";
import { EpisodicEntrySchema } from "../schemas.js";
import {
  appendJsonLine,
  readJsonLines,
  withSerializedWrite,
  type GovernancePaths,
} from "../store.js";
import type { EpisodeReason, EpisodicEntry, TaskRecord } from "../types.js";

export async function appendEpisode(
  paths: GovernancePaths,
  input: Omit<EpisodicEntry, "id" | "timestamp"> & { timestamp?: string },
) {
  const entry: EpisodicEntry = {
    ...input,
    id: crypto.randomUUID(),
    timestamp: input.timestamp ?? new Date().toISOString(),
  };
  await withSerializedWrite(paths.episodic, () => appendJsonLine(paths.episodic, entry));
  return entry;
}

export async function readEpisodes(
  paths: GovernancePaths,
  params: { since?: number; limit?: number } = {},
) {
  const entries = await readJsonLines(paths.episodic, EpisodicEntrySchema);
  const filtered =
    typeof params.since === "number"
      ? entries.filter((entry) => Date.parse(entry.timestamp) >= (params.since ?? 0))
      : entries;
  if (typeof params.limit === "number" && Number.isFinite(params.limit) && params.limit >= 0) {
    return params.limit === 0 ? [] : filtered.slice(-Math.floor(params.limit));
  }
  return filtered;
}

export function buildEpisodeFromTask(params: {
  task: TaskRecord;
  reason: EpisodeReason;
  policyRefs: string[];
  nowMs: number;
}): Omit<EpisodicEntry, "id" | "timestamp"> & { timestamp: string } {
  const { task } = params;
  return {
    taskId: task.id,
    goal: task.goal,
    riskTier: task.riskTier,
    outcome: task.outcome,
    reason: params.reason,
    ...(task.risk.primarySignal ? { primarySignal: task.risk.primarySignal } : {}),
    policyRefs: params.policyRefs,
    retries: task.retries,
    provenanceCount: task.workspace.provenanceIds.length,
    stepsUsed: task.budget.stepsUsed,
    durationMs: Math.max(0, params.nowMs - Date.parse(task.createdAt)),
    timestamp: new Date(params.nowMs).toISOString(),
  };
}
