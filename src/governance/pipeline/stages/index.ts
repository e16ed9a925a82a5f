import type { StageHandlers } from "../types.js";
import { complianceStage } from "./compliance.js";
import { gatherStage } from "./gather.js";
import { planStage } from "./plan.js";
import { produceStage } from "./produce.js";
import { reconcileStage } from "./reconcile.js";
import { reviewStage } from "./review.js";

export const DEFAULT_STAGE_HANDLERS: StageHandlers = {
  PLAN: planStage,
  GATHER: gatherStage,
  PRODUCE: produceStage,
  REVIEW: reviewStage,
  RECONCILE: reconcileStage,
  COMPLIANCE: complianceStage,
};
