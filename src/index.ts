export {
  CONFIG_FILENAME,
  DEFAULT_RISK_PRECEDENCE,
  GovernanceConfigSchema,
  createGovernanceConfig,
  loadGovernanceConfig,
  type GovernanceConfig,
  type GovernanceConfigOverrides,
} from "./config/config.js";
export { createSubsystemLogger, resetLogLevel, setLogLevel, type LogLevel } from "./logging/subsystem.js";
export { openGovernanceCore, type GovernanceCore, type GovernanceCoreOptions } from "./governance/core.js";
export {
  createGovernor,
  type EscalationDecision,
  type Governor,
  type SubmitOptions,
  type TaskStatusView,
} from "./governance/governor.js";
export * from "./governance/errors.js";
export type * from "./governance/types.js";
export {
  createExtractiveProducer,
  createSubmittedSourcesGatherer,
  type ContentProducer,
  type GatherRequest,
  type GatherResponse,
  type ProduceRequest,
  type ProduceResponse,
  type SourceGatherer,
} from "./governance/pipeline/collaborators.js";
export type { StageContext, StageHandler, StageHandlers, StageResult } from "./governance/pipeline/types.js";
export { PIPELINE_STAGE_ORDER, routeTask } from "./governance/pipeline/phase-machine.js";
export { assessRisk, type RiskContext } from "./governance/policy/risk.js";
export { evaluateSourceDominance } from "./governance/provenance/dominance.js";
export { scanEpisodes } from "./governance/promotion/scan.js";
export { validatePromotionProposal } from "./governance/promotion/contract.js";
export { TaskLane } from "./governance/lane.js";
