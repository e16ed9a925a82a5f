import {
  loadGovernanceConfig,
  type GovernanceConfig,
  type GovernanceConfigOverrides,
} from "../config/config.js";
import { createSubsystemLogger, setLogLevel } from "../logging/subsystem.js";
import { createAuditLog, type AuditQuery } from "./audit/log.js";
import { readEpisodes } from "./episodic/store.js";
import { createGovernor, type EscalationDecision, type SubmitOptions } from "./governor.js";
import {
  createExtractiveProducer,
  createSubmittedSourcesGatherer,
  type ContentProducer,
  type SourceGatherer,
} from "./pipeline/collaborators.js";
import type { StageHandlers } from "./pipeline/types.js";
import { ensurePolicySeeded, loadPolicySnapshot, type PolicySnapshot } from "./policy/store.js";
import { createPromotionPipeline } from "./promotion/pipeline.js";
import { createProvenanceLedger } from "./provenance/ledger.js";
import { listTaskIds, resolveGovernancePaths } from "./store.js";
import type { ProposalStatus } from "./types.js";

const log = createSubsystemLogger("core");

export type GovernanceCoreOptions = {
  stateDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: GovernanceConfigOverrides;
  producer?: ContentProducer;
  gatherer?: SourceGatherer;
  /** Replaces individual stage bodies; capability checks still apply. */
  handlers?: Partial<StageHandlers>;
  now?: () => number;
};

export type GovernanceCore = Awaited<ReturnType<typeof openGovernanceCore>>;

/**
 * Opens a state directory: resolves configuration, seeds the policy store on first
 * use and wires the governor, ledger, audit log and promotion queue together.
 */
export async function openGovernanceCore(options: GovernanceCoreOptions = {}) {
  const config: Readonly<GovernanceConfig> = await loadGovernanceConfig({
    env: options.env,
    stateDir: options.stateDir,
    overrides: options.overrides,
  });
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  const now = options.now ?? Date.now;
  const paths = resolveGovernancePaths(config.stateDir);

  let policy: PolicySnapshot = await ensurePolicySeeded({
    paths,
    seedPath: config.seedPolicyPath,
    nowMs: now(),
  });
  const getPolicy = () => policy;
  const refreshPolicy = async () => {
    policy = await loadPolicySnapshot(paths);
    return policy;
  };

  const audit = createAuditLog({ paths, getPolicy });
  const ledger = createProvenanceLedger(paths);
  const governor = createGovernor({
    config,
    paths,
    audit,
    ledger,
    getPolicy,
    producer: options.producer ?? createExtractiveProducer(),
    gatherer: options.gatherer ?? createSubmittedSourcesGatherer(),
    handlers: options.handlers,
    now,
  });
  const promotion = createPromotionPipeline({ config, paths, audit, refreshPolicy, now });

  log.info("governance core opened", {
    stateDir: config.stateDir,
    rules: policy.rules.length,
    maxConcurrentTasks: config.maxConcurrentTasks,
  });

  return {
    config,
    paths,
    submit: (goal: string, provenance: readonly unknown[], submitOptions?: SubmitOptions) =>
      governor.submit(goal, provenance, submitOptions),
    assessRisk: governor.assessRisk,
    getTask: governor.getTask,
    getStatus: (taskId: string) => governor.getStatus(taskId),
    listTasks: () => listTaskIds(paths),
    resolveEscalation: (taskId: string, decision: EscalationDecision, approver: string) =>
      governor.resolveEscalation(taskId, decision, approver),
    cancel: governor.cancel,
    whenSettled: governor.whenSettled,
    provenance: {
      list: ledger.list,
      resolve: ledger.resolve,
      get: ledger.get,
    },
    listProposals: (params?: { status?: ProposalStatus }) => promotion.list(params),
    scanProposals: () => promotion.scan(),
    approve: promotion.approve,
    reject: promotion.reject,
    prune: promotion.prune,
    exportAudit: (query?: AuditQuery) => audit.read(query),
    listEpisodes: (params?: { since?: number; limit?: number }) => readEpisodes(paths, params),
    listPolicy: () => getPolicy().rules,
    refreshPolicy,
  };
}
