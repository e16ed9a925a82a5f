import crypto from "node:crypto";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import type { PolicySnapshot } from "../policy/store.js";
import { resolvePolicyRefs } from "../policy/store.js";
import { AuditEntrySchema } from "../schemas.js";
import {
  appendJsonLine,
  readJsonLines,
  withSerializedWrite,
  type GovernancePaths,
} from "../store.js";
import type { AuditEntry } from "../types.js";

const log = createSubsystemLogger("audit");

export type AuditAppendInput = Omit<AuditEntry, "id" | "seq" | "timestamp"> & {
  timestamp?: string;
};

export type AuditQuery = {
  taskId?: string;
  since?: string | number;
  until?: string | number;
  limit?: number;
};

export type AuditLog = {
  append: (input: AuditAppendInput) => Promise<AuditEntry>;
  read: (query?: AuditQuery) => Promise<AuditEntry[]>;
};

function toMs(value: string | number | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const ms = typeof value === "number" ? value : Date.parse(value);
  return Number.isFinite(ms) ? ms : undefined;
}

/** Entries in append order; `limit` keeps the most recent matches. */
export function filterAuditEntries(entries: readonly AuditEntry[], query: AuditQuery = {}) {
  const since = toMs(query.since);
  const until = toMs(query.until);
  const matched = entries.filter((entry) => {
    if (query.taskId && entry.taskId !== query.taskId) {
      return false;
    }
    const ts = Date.parse(entry.timestamp);
    if (since !== undefined && ts < since) {
      return false;
    }
    if (until !== undefined && ts > until) {
      return false;
    }
    return true;
  });
  if (typeof query.limit === "number" && Number.isFinite(query.limit) && query.limit >= 0) {
    return query.limit === 0 ? [] : matched.slice(-Math.floor(query.limit));
  }
  return matched;
}

export async function readAuditLog(paths: GovernancePaths, query?: AuditQuery) {
  const entries = await readJsonLines(paths.audit, AuditEntrySchema);
  return filterAuditEntries(
    entries.toSorted((a, b) => a.seq - b.seq),
    query,
  );
}

/**
 * Append-only decision log. Appends are serialized on the log file and numbered with
 * a gap-free sequence, so entries for one task keep their causal order. Policy refs
 * are checked against the current snapshot; unknown ids are dropped and logged.
 */
export function createAuditLog(params: {
  paths: GovernancePaths;
  getPolicy: () => PolicySnapshot;
}): AuditLog {
  let lastSeq: number | null = null;

  return {
    append: (input) =>
      withSerializedWrite(params.paths.audit, async () => {
        if (lastSeq === null) {
          const existing = await readJsonLines(params.paths.audit, AuditEntrySchema);
          lastSeq = existing.reduce((max, entry) => Math.max(max, entry.seq), 0);
        }
        const policyRefs = resolvePolicyRefs(params.getPolicy(), input.policyRefs);
        if (policyRefs.length !== new Set(input.policyRefs).size) {
          log.warn("dropped unknown policy refs", {
            taskId: input.taskId,
            refs: input.policyRefs.filter((ref) => !policyRefs.includes(ref)),
          });
        }
        const entry: AuditEntry = {
          ...input,
          id: crypto.randomUUID(),
          seq: lastSeq + 1,
          timestamp: input.timestamp ?? new Date().toISOString(),
          policyRefs,
        };
        await appendJsonLine(params.paths.audit, entry);
        lastSeq = entry.seq;
        log.debug("audit", {
          taskId: entry.taskId,
          stage: entry.stage,
          decision: entry.decision,
        });
        return entry;
      }),
    read: (query) => readAuditLog(params.paths, query),
  };
}
