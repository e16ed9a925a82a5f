import { tokenize } from "../../../utils.js";
import { countDistinctSources } from "../../provenance/ledger.js";
import type { TaskSpec } from "../../types.js";
import type { StageHandler } from "../types.js";

const VAGUE_TERMS = ["good", "better", "nice", "appropriate", "reasonable", "adequate", "some"];

const DELIVERABLE_RULES: { prefixes: string[]; deliverable: string }[] = [
  { prefixes: ["summar", "research"], deliverable: "Summary of findings with citations" },
  { prefixes: ["create", "generat"], deliverable: "Generated artifact matching the goal" },
  { prefixes: ["code", "script"], deliverable: "Working code with usage notes" },
  { prefixes: ["analy"], deliverable: "Analysis with supporting evidence" },
];

function hasPrefix(tokens: string[], prefixes: string[]) {
  return tokens.some((token) => prefixes.some((prefix) => token.startsWith(prefix)));
}

export function draftTaskSpec(params: {
  goal: string;
  sourceCount: number;
  maxSteps: number;
  maxToolCalls: number;
  minDistinctSources: number;
  singleSource: boolean;
}): TaskSpec {
  const tokens = tokenize(params.goal);
  const deliverables = DELIVERABLE_RULES.filter((rule) => hasPrefix(tokens, rule.prefixes)).map(
    (rule) => rule.deliverable,
  );
  if (deliverables.length === 0) {
    deliverables.push("Structured response to the goal");
  }

  const successCriteria = [
    "Every claim cites at least one provenance record",
    ...deliverables.map((deliverable) => `Delivers: ${deliverable}`),
  ];
  const constraints = [
    `Maximum ${params.maxSteps} execution steps`,
    `Maximum ${params.maxToolCalls} tool calls`,
    params.singleSource
      ? "Single-source override in effect"
      : `At least ${params.minDistinctSources} distinct sources`,
  ];

  let estimatedSteps = 3;
  if (hasPrefix(tokens, ["research"])) {
    estimatedSteps += 2;
  }
  if (hasPrefix(tokens, ["code", "script"])) {
    estimatedSteps += 2;
  }
  if (deliverables.length > 1) {
    estimatedSteps += deliverables.length;
  }

  let estimatedToolCalls = params.sourceCount;
  if (hasPrefix(tokens, ["comprehensive", "detailed"])) {
    estimatedToolCalls += 2;
  }

  const criteriaTokens = new Set(successCriteria.flatMap((criterion) => tokenize(criterion)));
  return {
    goal: params.goal,
    deliverables,
    successCriteria,
    constraints,
    estimatedSteps: Math.min(estimatedSteps, params.maxSteps),
    estimatedToolCalls: Math.min(estimatedToolCalls, params.maxToolCalls),
    falsifiable: !VAGUE_TERMS.some((term) => criteriaTokens.has(term)),
  };
}

export const planStage: StageHandler = async (ctx) => {
  const records = await ctx.ledger.list();
  const own = records.filter((record) => ctx.task.workspace.provenanceIds.includes(record.id));
  const spec = draftTaskSpec({
    goal: ctx.task.goal,
    sourceCount: countDistinctSources(own),
    maxSteps: ctx.task.budget.maxSteps,
    maxToolCalls: ctx.task.budget.maxToolCalls,
    minDistinctSources: ctx.config.minDistinctSources,
    singleSource: ctx.task.singleSourceOverride !== undefined,
  });
  return {
    patch: { spec },
    decision: "spec_written",
    rationale: `${spec.deliverables.length} deliverable(s), estimated ${spec.estimatedSteps} steps and ${spec.estimatedToolCalls} tool calls`,
    policyRefs: ["inv-budget", "inv-provenance-min-sources"],
    toolCalls: 0,
    evidence: { deliverables: spec.deliverables, falsifiable: spec.falsifiable },
    ...(spec.falsifiable ? {} : { notes: ["success criteria contain vague terms"] }),
  };
};
