import type { GovernanceConfig } from "../../config/config.js";
import type { PolicySnapshot } from "../policy/store.js";
import type { ProvenanceReader } from "../provenance/ledger.js";
import type {
  PipelineStage,
  ProvenanceInput,
  ProvenanceRecord,
  TaskRecord,
  TaskWorkspace,
} from "../types.js";
import type { ContentProducer, SourceGatherer } from "./collaborators.js";

export type WorkspacePatch = Partial<TaskWorkspace>;

/** Ledger view handed to a stage; only Gather may append. */
export type StageLedger = ProvenanceReader & {
  appendBatch: (records: ProvenanceInput[]) => Promise<ProvenanceRecord[]>;
};

export type StageContext = {
  stage: PipelineStage;
  /** A copy; stages describe changes through `patch`, never by mutation. */
  task: Readonly<TaskRecord>;
  policy: PolicySnapshot;
  ledger: StageLedger;
  config: Readonly<GovernanceConfig>;
  producer: ContentProducer;
  gatherer: SourceGatherer;
  nowMs: number;
};

export type StageResult = {
  patch: WorkspacePatch;
  decision: string;
  rationale: string;
  policyRefs: string[];
  toolCalls: number;
  evidence?: Record<string, unknown>;
  /** Advisory findings recorded on the task without affecting routing. */
  notes?: string[];
};

export type StageHandler = (ctx: StageContext) => Promise<StageResult>;

export type StageHandlers = Record<PipelineStage, StageHandler>;
