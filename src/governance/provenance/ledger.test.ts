import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MalformedProvenanceError } from "../errors.js";
import { resolveGovernancePaths, type GovernancePaths } from "../store.js";
import { evaluateSourceDominance } from "./dominance.js";
import {
  countDistinctSources,
  createProvenanceLedger,
  readProvenanceLog,
  validateProvenanceBatch,
} from "./ledger.js";

describe("provenance validation", () => {
  it("normalizes valid records", () => {
    const result = validateProvenanceBatch([
      { source: "report-a", timestamp: "2026-03-01T10:00:00+02:00", confidence: 0.6 },
    ]);
    expect(result).toEqual({
      ok: true,
      records: [
        {
          source: "report-a",
          timestamp: "2026-03-01T08:00:00.000Z",
          confidence: 0.6,
          contentRef: "report-a",
        },
      ],
    });
  });

  it("reports every malformed field with its index", () => {
    const result = validateProvenanceBatch([
      { source: "ok", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 },
      { source: "  ", timestamp: "yesterday", confidence: 1.5 },
      { source: "missing-confidence", timestamp: "2026-03-01T00:00:00Z" },
    ]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toEqual([
        { index: 1, field: "source", message: "must be a non-empty string" },
        { index: 1, field: "timestamp", message: "must be a valid timestamp" },
        { index: 1, field: "confidence", message: "must be within [0, 1]" },
        { index: 2, field: "confidence", message: "is required" },
      ]);
    }
  });

  it("rejects an id repeated with different content", () => {
    const result = validateProvenanceBatch([
      { id: "p1", source: "alpha", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 },
      { id: "p1", source: "beta", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 },
    ]);
    expect(result).toEqual({
      ok: false,
      issues: [
        { index: 1, field: "id", message: "p1 repeats an earlier record with different content" },
      ],
    });
  });

  it("accepts an id repeated with identical content", () => {
    const record = { id: "p1", source: "alpha", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 };
    const result = validateProvenanceBatch([record, { ...record }]);
    expect(result.ok).toBe(true);
    expect(result.ok ? result.records : []).toHaveLength(2);
  });

  it("counts distinct sources case-insensitively", () => {
    expect(countDistinctSources([{ source: "A" }, { source: "a " }, { source: "b" }])).toBe(2);
  });
});

describe("provenance ledger", () => {
  let tmpDir = "";
  let paths: GovernancePaths;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "governor-provenance-"));
    paths = resolveGovernancePaths(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("appends and resolves by id or content ref", async () => {
    const ledger = createProvenanceLedger(paths);
    const id = await ledger.append(
      {
        id: "rec-1",
        source: "report-a",
        timestamp: "2026-03-01T00:00:00Z",
        confidence: 0.8,
        contentRef: "doc://a",
      },
      { taskId: "task-1" },
    );
    expect(id).toBe("rec-1");
    expect((await ledger.resolve("rec-1")).map((record) => record.id)).toEqual(["rec-1"]);
    expect((await ledger.resolve("doc://a")).map((record) => record.id)).toEqual(["rec-1"]);
    expect(await ledger.resolve("doc://missing")).toEqual([]);
    expect(await ledger.list({ taskId: "task-1" })).toHaveLength(1);
    expect(await ledger.list({ taskId: "task-2" })).toHaveLength(0);
  });

  it("rejects malformed records without writing anything", async () => {
    const ledger = createProvenanceLedger(paths);
    await expect(
      ledger.appendBatch([
        { source: "a", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 },
        { source: "b", timestamp: "2026-03-01T00:00:00Z", confidence: -0.1 },
      ]),
    ).rejects.toBeInstanceOf(MalformedProvenanceError);
    expect(await readProvenanceLog(paths)).toEqual([]);
  });

  it("keeps records write-once", async () => {
    const ledger = createProvenanceLedger(paths);
    const record = {
      id: "rec-1",
      source: "a",
      timestamp: "2026-03-01T00:00:00.000Z",
      confidence: 0.5,
    };
    await ledger.append(record);
    await ledger.append(record);
    expect(await readProvenanceLog(paths)).toHaveLength(1);
    await expect(ledger.append({ ...record, confidence: 0.9 })).rejects.toThrow(
      "malformed provenance at #0: id rec-1 is already recorded",
    );
  });

  it("assigns ids when none are supplied", async () => {
    const ledger = createProvenanceLedger(paths);
    const records = await ledger.appendBatch([
      { source: "a", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 },
      { source: "b", timestamp: "2026-03-01T00:00:00Z", confidence: 0.5 },
    ]);
    expect(records).toHaveLength(2);
    expect(records[0]?.id).toMatch(/^prov_[0-9a-f-]{36}$/);
    expect(new Set(records.map((record) => record.id)).size).toBe(2);
  });
});

describe("source dominance", () => {
  it("is not dominant at exactly the threshold", () => {
    const result = evaluateSourceDominance({
      records: [
        { id: "1", source: "a" },
        { id: "2", source: "b" },
      ],
      threshold: 0.5,
    });
    expect(result.dominant).toBe(false);
    expect(result.share).toBe(0.5);
  });

  it("flags a majority source", () => {
    const result = evaluateSourceDominance({
      records: [
        { id: "1", source: "a" },
        { id: "2", source: "a" },
        { id: "3", source: "a" },
        { id: "4", source: "b" },
      ],
      threshold: 0.5,
    });
    expect(result).toEqual({
      dominant: true,
      source: "a",
      share: 0.75,
      recordCount: 4,
      reason: "source a supplies 75.0% of records, above 50.0%",
    });
  });

  it("counts repeated citations of one record once", () => {
    const result = evaluateSourceDominance({
      records: [
        { id: "1", source: "a" },
        { id: "1", source: "a" },
        { id: "2", source: "b" },
      ],
      threshold: 0.5,
    });
    expect(result.recordCount).toBe(2);
    expect(result.dominant).toBe(false);
  });

  it("groups sources the same way admission does", () => {
    const result = evaluateSourceDominance({
      records: [
        { id: "1", source: "Reuters" },
        { id: "2", source: "reuters " },
        { id: "3", source: "wire" },
      ],
      threshold: 0.5,
    });
    expect(result.dominant).toBe(true);
    expect(result.source).toBe("Reuters");
    expect(result.share).toBe(2 / 3);
  });

  it("handles an empty record set", () => {
    expect(evaluateSourceDominance({ records: [], threshold: 0.5 }).dominant).toBe(false);
  });
});
