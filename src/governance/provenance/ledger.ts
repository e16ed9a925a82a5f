import crypto from "node:crypto";
import { MalformedProvenanceError, type ProvenanceIssue } from "../errors.js";
import { normalizeSourceKey } from "./dominance.js";
import { ProvenanceInputSchema, ProvenanceRecordSchema } from "../schemas.js";
import {
  appendJsonLine,
  readJsonLines,
  withSerializedWrite,
  type GovernancePaths,
} from "../store.js";
import type { ProvenanceRecord } from "../types.js";

export type NormalizedProvenance = {
  id?: string;
  source: string;
  timestamp: string;
  confidence: number;
  contentRef: string;
};

export type ProvenanceReader = {
  resolve: (contentRef: string) => Promise<ProvenanceRecord[]>;
  get: (id: string) => Promise<ProvenanceRecord | undefined>;
  list: (params?: { taskId?: string }) => Promise<ProvenanceRecord[]>;
};

export type ProvenanceLedger = ProvenanceReader & {
  append: (record: unknown, params?: { taskId?: string }) => Promise<string>;
  appendBatch: (records: unknown[], params?: { taskId?: string }) => Promise<ProvenanceRecord[]>;
};

function sameContent(a: NormalizedProvenance, b: NormalizedProvenance) {
  return (
    a.source === b.source &&
    a.timestamp === b.timestamp &&
    a.confidence === b.confidence &&
    a.contentRef === b.contentRef
  );
}

/**
 * Validates a batch and reports every malformed field, not just the first. The
 * timestamp is normalized to ISO-8601 and `contentRef` defaults to the source. An id
 * may repeat within a batch only with identical content.
 */
export function validateProvenanceBatch(
  inputs: readonly unknown[],
): { ok: true; records: NormalizedProvenance[] } | { ok: false; issues: ProvenanceIssue[] } {
  const records: NormalizedProvenance[] = [];
  const issues: ProvenanceIssue[] = [];
  const byId = new Map<string, NormalizedProvenance>();
  inputs.forEach((input, index) => {
    const parsed = ProvenanceInputSchema.safeParse(input);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push({
          index,
          field: issue.path.length > 0 ? issue.path.map(String).join(".") : "record",
          message: issue.message,
        });
      }
      return;
    }
    const value = parsed.data;
    const record: NormalizedProvenance = {
      ...(value.id ? { id: value.id } : {}),
      source: value.source,
      timestamp: new Date(Date.parse(value.timestamp)).toISOString(),
      confidence: value.confidence,
      contentRef: value.contentRef ?? value.source,
    };
    const earlier = record.id ? byId.get(record.id) : undefined;
    if (earlier && !sameContent(earlier, record)) {
      issues.push({
        index,
        field: "id",
        message: `${record.id} repeats an earlier record with different content`,
      });
      return;
    }
    if (record.id) {
      byId.set(record.id, record);
    }
    records.push(record);
  });
  return issues.length > 0 ? { ok: false, issues } : { ok: true, records };
}

export function countDistinctSources(records: readonly Pick<NormalizedProvenance, "source">[]) {
  return new Set(records.map((record) => normalizeSourceKey(record.source))).size;
}

export async function readProvenanceLog(paths: GovernancePaths) {
  return readJsonLines(paths.provenance, ProvenanceRecordSchema);
}

export function resolveContentRef(records: readonly ProvenanceRecord[], contentRef: string) {
  const ref = contentRef.trim();
  if (!ref) {
    return [];
  }
  return records.filter((record) => record.id === ref || record.contentRef === ref);
}

/**
 * Appends validated records. A caller-supplied id that is already in the ledger is
 * accepted only when it carries identical content; records are never rewritten.
 */
export async function appendProvenanceRecords(params: {
  paths: GovernancePaths;
  records: unknown[];
  taskId?: string;
  nowMs?: number;
}): Promise<ProvenanceRecord[]> {
  const validated = validateProvenanceBatch(params.records);
  if (!validated.ok) {
    throw new MalformedProvenanceError(validated.issues);
  }
  const appendedAt = new Date(params.nowMs ?? Date.now()).toISOString();
  return withSerializedWrite(params.paths.provenance, async () => {
    const existing = new Map(
      (await readProvenanceLog(params.paths)).map((record) => [record.id, record]),
    );
    const out: ProvenanceRecord[] = [];
    const conflicts: ProvenanceIssue[] = [];
    validated.records.forEach((input, index) => {
      const prior = input.id ? existing.get(input.id) : undefined;
      if (prior && !sameContent(prior, input)) {
        conflicts.push({ index, field: "id", message: `${prior.id} is already recorded` });
      }
    });
    if (conflicts.length > 0) {
      throw new MalformedProvenanceError(conflicts);
    }
    for (const input of validated.records) {
      const prior = input.id ? existing.get(input.id) : undefined;
      if (prior) {
        out.push(prior);
        continue;
      }
      const record: ProvenanceRecord = {
        id: input.id ?? `prov_${crypto.randomUUID()}`,
        source: input.source,
        timestamp: input.timestamp,
        confidence: input.confidence,
        contentRef: input.contentRef,
        ...(params.taskId ? { taskId: params.taskId } : {}),
        appendedAt,
      };
      await appendJsonLine(params.paths.provenance, record);
      existing.set(record.id, record);
      out.push(record);
    }
    return out;
  });
}

export function createProvenanceLedger(paths: GovernancePaths): ProvenanceLedger {
  return {
    append: async (record, params) => {
      const [appended] = await appendProvenanceRecords({
        paths,
        records: [record],
        taskId: params?.taskId,
      });
      if (!appended) {
        throw new MalformedProvenanceError([
          { index: 0, field: "record", message: "was not recorded" },
        ]);
      }
      return appended.id;
    },
    appendBatch: async (records, params) =>
      appendProvenanceRecords({ paths, records, taskId: params?.taskId }),
    resolve: async (contentRef) => resolveContentRef(await readProvenanceLog(paths), contentRef),
    get: async (id) => (await readProvenanceLog(paths)).find((record) => record.id === id),
    list: async (params) => {
      const records = await readProvenanceLog(paths);
      return params?.taskId
        ? records.filter((record) => record.taskId === params.taskId)
        : records;
    },
  };
}
