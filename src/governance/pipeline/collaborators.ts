import type { OutputClaim, ProvenanceInput, ProvenanceRecord, TaskSpec } from "../types.js";

export type ProduceRequest = {
  taskId: string;
  goal: string;
  spec: TaskSpec | undefined;
  records: ProvenanceRecord[];
  attempt: number;
  /** Required changes from the previous Review, empty on the first attempt. */
  feedback: string[];
};

export type ProduceResponse = {
  content: string;
  claims: OutputClaim[];
};

/** Text generation lives outside the core; the Produce stage calls this. */
export type ContentProducer = {
  produce: (request: ProduceRequest) => Promise<ProduceResponse>;
};

export type GatherRequest = {
  taskId: string;
  goal: string;
  spec: TaskSpec | undefined;
  existing: ProvenanceRecord[];
};

export type GatherResponse = {
  records: ProvenanceInput[];
  toolCalls?: number;
};

/** Research and retrieval live outside the core; the Gather stage calls this. */
export type SourceGatherer = {
  gather: (request: GatherRequest) => Promise<GatherResponse>;
};

/**
 * Deterministic producer that restates the goal and cites every record it was
 * given, one claim per record.
 */
export function createExtractiveProducer(): ContentProducer {
  return {
    produce: async (request) => {
      const lines = request.records.map(
        (record) =>
          `- ${record.contentRef} [${record.source}, confidence ${record.confidence.toFixed(2)}]`,
      );
      return {
        content: [request.goal, "", `Based on ${request.records.length} record(s):`, ...lines].join(
          "\n",
        ),
        claims: request.records.map((record) => ({
          text: `${record.contentRef} as reported by ${record.source}`,
          provenanceRefs: [record.id],
        })),
      };
    },
  };
}

/** Gathers nothing; tasks rely on the provenance supplied at submission. */
export function createSubmittedSourcesGatherer(): SourceGatherer {
  return {
    gather: async () => ({ records: [], toolCalls: 0 }),
  };
}
