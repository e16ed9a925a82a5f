import type { StageHandler } from "../types.js";

export const produceStage: StageHandler = async (ctx) => {
  const ids = ctx.task.workspace.provenanceIds;
  const records = (await ctx.ledger.list()).filter((record) => ids.includes(record.id));
  const attempt = (ctx.task.workspace.output?.attempt ?? 0) + 1;
  const response = await ctx.producer.produce({
    taskId: ctx.task.id,
    goal: ctx.task.goal,
    spec: ctx.task.workspace.spec,
    records,
    attempt,
    feedback: ctx.task.workspace.review?.requiredChanges ?? [],
  });
  return {
    patch: {
      output: {
        content: response.content,
        claims: response.claims.map((claim) => ({
          text: claim.text,
          provenanceRefs: [...claim.provenanceRefs],
        })),
        attempt,
      },
    },
    decision: "output_produced",
    rationale: `attempt ${attempt}: ${response.claims.length} claim(s) over ${records.length} record(s)`,
    policyRefs: ["inv-claims-supported"],
    toolCalls: 1,
    evidence: { attempt, claims: response.claims.length },
  };
};
