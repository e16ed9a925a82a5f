import { AuthorityViolationError } from "../errors.js";
import type { PipelineStage, TaskWorkspace } from "../types.js";
import type { WorkspacePatch } from "./types.js";

type WorkspaceField = keyof TaskWorkspace;

export type StageCapability = {
  writes: WorkspaceField[];
  appendsProvenance: boolean;
  callsProducer: boolean;
  callsGatherer: boolean;
};

export const STAGE_CAPABILITIES: Record<PipelineStage, StageCapability> = {
  PLAN: { writes: ["spec"], appendsProvenance: false, callsProducer: false, callsGatherer: false },
  GATHER: {
    writes: ["provenanceIds"],
    appendsProvenance: true,
    callsProducer: false,
    callsGatherer: true,
  },
  PRODUCE: {
    writes: ["output"],
    appendsProvenance: false,
    callsProducer: true,
    callsGatherer: false,
  },
  REVIEW: {
    writes: ["review"],
    appendsProvenance: false,
    callsProducer: false,
    callsGatherer: false,
  },
  RECONCILE: {
    writes: ["reconciliation"],
    appendsProvenance: false,
    callsProducer: false,
    callsGatherer: false,
  },
  COMPLIANCE: {
    writes: ["compliance"],
    appendsProvenance: false,
    callsProducer: false,
    callsGatherer: false,
  },
};

function isWorkspaceField(value: string): value is WorkspaceField {
  return (
    value === "spec" ||
    value === "provenanceIds" ||
    value === "output" ||
    value === "review" ||
    value === "reconciliation" ||
    value === "compliance"
  );
}

/**
 * Throws `AuthorityViolationError` naming every field a stage wrote outside its
 * capability set. Gather may only extend `provenanceIds`, never drop or reorder.
 */
export function enforceStageCapabilities(params: {
  stage: PipelineStage;
  patch: WorkspacePatch;
  current: TaskWorkspace;
}) {
  const allowed = STAGE_CAPABILITIES[params.stage].writes;
  const violations = Object.keys(params.patch).filter(
    (key) => !isWorkspaceField(key) || !allowed.includes(key),
  );
  const nextIds = params.patch.provenanceIds;
  if (nextIds && allowed.includes("provenanceIds")) {
    const prefixKept = params.current.provenanceIds.every((id, index) => nextIds[index] === id);
    if (!prefixKept) {
      violations.push("provenanceIds (rewrite)");
    }
  }
  if (violations.length > 0) {
    throw new AuthorityViolationError({ stage: params.stage, fields: violations });
  }
}

export function applyWorkspacePatch(workspace: TaskWorkspace, patch: WorkspacePatch): TaskWorkspace {
  return { ...workspace, ...patch, provenanceIds: patch.provenanceIds ?? workspace.provenanceIds };
}
