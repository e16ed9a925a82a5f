import type { StageHandler } from "../types.js";

export const gatherStage: StageHandler = async (ctx) => {
  const existingIds = ctx.task.workspace.provenanceIds;
  const all = await ctx.ledger.list();
  const existing = all.filter((record) => existingIds.includes(record.id));
  const response = await ctx.gatherer.gather({
    taskId: ctx.task.id,
    goal: ctx.task.goal,
    spec: ctx.task.workspace.spec,
    existing,
  });
  const appended = response.records.length > 0 ? await ctx.ledger.appendBatch(response.records) : [];
  const added = appended.map((record) => record.id).filter((id) => !existingIds.includes(id));
  const toolCalls =
    typeof response.toolCalls === "number" && Number.isFinite(response.toolCalls)
      ? Math.max(0, Math.floor(response.toolCalls))
      : response.records.length > 0
        ? 1
        : 0;
  return {
    patch: { provenanceIds: [...existingIds, ...added] },
    decision: added.length > 0 ? "sources_appended" : "no_new_sources",
    rationale:
      added.length > 0
        ? `appended ${added.length} record(s); ${existingIds.length + added.length} in total`
        : `using ${existingIds.length} submitted record(s)`,
    policyRefs: ["inv-provenance-fields"],
    toolCalls,
    evidence: { added },
  };
};
