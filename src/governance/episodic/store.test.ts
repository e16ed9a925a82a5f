import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveGovernancePaths, type GovernancePaths } from "../store.js";
import { appendEpisode, readEpisodes } from "./store.js";

describe("episodic history", () => {
  let tmpDir = "";
  let paths: GovernancePaths;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "governor-episodic-"));
    paths = resolveGovernancePaths(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("appends and reads episodes in order", async () => {
    for (const [index, timestamp] of [
      "2026-01-01T00:00:00.000Z",
      "2026-01-02T00:00:00.000Z",
      "2026-01-03T00:00:00.000Z",
    ].entries()) {
      await appendEpisode(paths, {
        taskId: `task-${index}`,
        goal: "Summarize input",
        riskTier: "LOW",
        outcome: "DONE",
        reason: "completed",
        primarySignal: "heuristic",
        policyRefs: [],
        retries: 0,
        provenanceCount: 2,
        stepsUsed: 6,
        durationMs: 10,
        timestamp,
      });
    }
    expect((await readEpisodes(paths)).map((entry) => entry.taskId)).toEqual([
      "task-0",
      "task-1",
      "task-2",
    ]);
    const recent = await readEpisodes(paths, { since: Date.parse("2026-01-02T00:00:00.000Z") });
    expect(recent.map((entry) => entry.taskId)).toEqual(["task-1", "task-2"]);
    expect((await readEpisodes(paths, { limit: 1 }))[0]?.taskId).toBe("task-2");
    expect(await readEpisodes(paths, { limit: 0 })).toEqual([]);
  });

  it("skips corrupt lines", async () => {
    await fs.mkdir(tmpDir, { recursive: true });
    await fs.writeFile(paths.episodic, "{not json\n", "utf-8");
    await appendEpisode(paths, {
      taskId: "task-x",
      goal: "g",
      riskTier: "HIGH",
      outcome: "ESCALATED",
      reason: "approval_gate",
      policyRefs: [],
      retries: 0,
      provenanceCount: 3,
      stepsUsed: 2,
      durationMs: 1,
    });
    expect((await readEpisodes(paths)).map((entry) => entry.taskId)).toEqual(["task-x"]);
  });
});
