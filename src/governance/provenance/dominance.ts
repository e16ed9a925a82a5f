import { clampNumber } from "../../utils.js";
import type { ProvenanceRecord, SourceDominance } from "../types.js";

export type SourceDominanceResult = SourceDominance & {
  reason: string;
};

/** Sources compare trimmed and case-insensitive, here and at admission. */
export function normalizeSourceKey(source: string) {
  return source.trim().toLowerCase();
}

/**
 * Flags an output whose backing records come mostly from one source. The share is
 * measured per record, so three records from one source out of four total is 0.75.
 * A share equal to the threshold is not dominant.
 */
export function evaluateSourceDominance(params: {
  records: Pick<ProvenanceRecord, "id" | "source">[];
  threshold: number;
}): SourceDominanceResult {
  const threshold = clampNumber(params.threshold, 0, 1);
  const unique = new Map<string, string>();
  for (const record of params.records) {
    unique.set(record.id, record.source);
  }
  const recordCount = unique.size;
  if (recordCount === 0) {
    return {
      dominant: false,
      share: 0,
      recordCount,
      reason: "no records back the output",
    };
  }

  const counts = new Map<string, { source: string; count: number }>();
  for (const source of unique.values()) {
    const key = normalizeSourceKey(source);
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { source, count: 1 });
    }
  }
  const [topKey, top] = [...counts.entries()].toSorted(
    (a, b) => b[1].count - a[1].count || a[0].localeCompare(b[0]),
  )[0] ?? ["", { source: "", count: 0 }];
  const topSource = topKey ? top.source : "";
  const topCount = top.count;
  const share = topCount / recordCount;

  if (share > threshold) {
    return {
      dominant: true,
      source: topSource,
      share,
      recordCount,
      reason: `source ${topSource} supplies ${(share * 100).toFixed(1)}% of records, above ${(threshold * 100).toFixed(1)}%`,
    };
  }
  return {
    dominant: false,
    source: topSource,
    share,
    recordCount,
    reason: "source mix within threshold",
  };
}
