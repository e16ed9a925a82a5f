import type { GovernanceConfig } from "../../config/config.js";
import { AuthorityViolationError, GovernanceError, StageFailureError } from "../errors.js";
import type { PolicySnapshot } from "../policy/store.js";
import type { ProvenanceLedger } from "../provenance/ledger.js";
import type { PipelineStage, TaskRecord } from "../types.js";
import { STAGE_CAPABILITIES, enforceStageCapabilities } from "./capabilities.js";
import type { ContentProducer, SourceGatherer } from "./collaborators.js";
import type { StageContext, StageHandlers, StageLedger, StageResult } from "./types.js";

export type StageExecution = {
  stage: PipelineStage;
  result: StageResult;
  durationMs: number;
};

function scopedLedger(params: {
  stage: PipelineStage;
  ledger: ProvenanceLedger;
  taskId: string;
}): StageLedger {
  const { stage, ledger, taskId } = params;
  return {
    resolve: ledger.resolve,
    get: ledger.get,
    list: ledger.list,
    appendBatch: async (records) => {
      if (!STAGE_CAPABILITIES[stage].appendsProvenance) {
        throw new AuthorityViolationError({ stage, fields: ["provenance ledger"] });
      }
      return ledger.appendBatch(records, { taskId });
    },
  };
}

function scopedProducer(stage: PipelineStage, producer: ContentProducer): ContentProducer {
  return {
    produce: async (request) => {
      if (!STAGE_CAPABILITIES[stage].callsProducer) {
        throw new AuthorityViolationError({ stage, fields: ["content producer"] });
      }
      return producer.produce(request);
    },
  };
}

function scopedGatherer(stage: PipelineStage, gatherer: SourceGatherer): SourceGatherer {
  return {
    gather: async (request) => {
      if (!STAGE_CAPABILITIES[stage].callsGatherer) {
        throw new AuthorityViolationError({ stage, fields: ["source gatherer"] });
      }
      return gatherer.gather(request);
    },
  };
}

/**
 * Runs one stage against a copy of the task and checks the result against the
 * stage's capability contract. Capability breaches surface as
 * `AuthorityViolationError`; anything else the stage throws becomes a
 * `StageFailureError` for the governor to dispose of. The task is not modified.
 */
export async function executeStage(params: {
  stage: PipelineStage;
  task: TaskRecord;
  handlers: StageHandlers;
  policy: PolicySnapshot;
  ledger: ProvenanceLedger;
  config: Readonly<GovernanceConfig>;
  producer: ContentProducer;
  gatherer: SourceGatherer;
  nowMs?: () => number;
}): Promise<StageExecution> {
  const now = params.nowMs ?? Date.now;
  const startedAt = now();
  const ctx: StageContext = {
    stage: params.stage,
    task: structuredClone(params.task),
    policy: params.policy,
    ledger: scopedLedger({ stage: params.stage, ledger: params.ledger, taskId: params.task.id }),
    config: params.config,
    producer: scopedProducer(params.stage, params.producer),
    gatherer: scopedGatherer(params.stage, params.gatherer),
    nowMs: startedAt,
  };

  let result: StageResult;
  try {
    result = await params.handlers[params.stage](ctx);
  } catch (error) {
    if (error instanceof AuthorityViolationError) {
      throw error;
    }
    if (error instanceof GovernanceError && error.code === "STAGE_FAILURE") {
      throw error;
    }
    throw new StageFailureError({ stage: params.stage, cause: error });
  }

  enforceStageCapabilities({
    stage: params.stage,
    patch: result.patch,
    current: params.task.workspace,
  });
  return {
    stage: params.stage,
    result,
    durationMs: Math.max(0, now() - startedAt),
  };
}
