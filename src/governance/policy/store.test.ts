import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveGovernancePaths, type GovernancePaths } from "../store.js";
import {
  appendPolicyRule,
  buildPolicySnapshot,
  ensurePolicySeeded,
  loadPolicySnapshot,
  readPolicyLog,
  resolvePolicyRefs,
} from "./store.js";

describe("policy store", () => {
  let tmpDir = "";
  let paths: GovernancePaths;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "governor-policy-"));
    paths = resolveGovernancePaths(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("seeds an empty store once", async () => {
    const first = await ensurePolicySeeded({ paths });
    expect(first.rules.length).toBeGreaterThan(10);
    expect(first.byId.get("val-irreversible-impact")?.origin).toBe("seed");
    expect(first.byId.get("val-irreversible-impact")?.version).toBe(1);

    const second = await ensurePolicySeeded({ paths });
    expect(second.revision).toBe(first.revision);
    expect(await readPolicyLog(paths)).toHaveLength(first.revision);
  });

  it("seeds from a custom file", async () => {
    const seedPath = path.join(tmpDir, "seed.json");
    await fs.writeFile(
      seedPath,
      JSON.stringify({
        version: 1,
        rules: [{ id: "inv-only", kind: "invariant", text: "Only rule." }],
      }),
      "utf-8",
    );
    const snapshot = await ensurePolicySeeded({ paths, seedPath });
    expect(snapshot.rules.map((entry) => entry.id)).toEqual(["inv-only"]);
  });

  it("rejects an invalid seed file", async () => {
    const seedPath = path.join(tmpDir, "seed.json");
    await fs.writeFile(seedPath, JSON.stringify({ version: 1, rules: [] }), "utf-8");
    await expect(ensurePolicySeeded({ paths, seedPath })).rejects.toThrow(/seed policy is invalid/);
  });

  it("adds versions without rewriting earlier entries", async () => {
    await ensurePolicySeeded({ paths });
    const before = await fs.readFile(paths.policy, "utf-8");

    const v1 = await appendPolicyRule({
      paths,
      rule: { id: "heur-promoted", kind: "heuristic", text: "First text." },
      approvedBy: "reviewer",
      proposalId: "p-1",
    });
    const v2 = await appendPolicyRule({
      paths,
      rule: { id: "heur-promoted", kind: "heuristic", text: "Second text." },
      approvedBy: "reviewer",
      proposalId: "p-2",
    });
    expect(v1.version).toBe(1);
    expect(v2.version).toBe(2);
    expect(v2.origin).toBe("promotion");

    const after = await fs.readFile(paths.policy, "utf-8");
    expect(after.startsWith(before)).toBe(true);

    const snapshot = await loadPolicySnapshot(paths);
    expect(snapshot.byId.get("heur-promoted")?.text).toBe("Second text.");
    expect(snapshot.revision).toBe(before.trim().split("\n").length + 2);
  });

  it("serializes concurrent appends", async () => {
    await Promise.all(
      Array.from({ length: 8 }, (_, index) =>
        appendPolicyRule({
          paths,
          rule: { id: "heur-race", kind: "heuristic", text: `text ${index}` },
          approvedBy: "reviewer",
          proposalId: `p-${index}`,
        }),
      ),
    );
    const versions = (await readPolicyLog(paths)).map((entry) => entry.version);
    expect(versions).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it("drops unknown ids when resolving refs", () => {
    const snapshot = buildPolicySnapshot([
      {
        id: "inv-a",
        kind: "invariant",
        text: "A.",
        version: 1,
        createdAt: "2026-01-01T00:00:00.000Z",
        origin: "seed",
      },
    ]);
    expect(resolvePolicyRefs(snapshot, ["inv-a", "missing", "inv-a"])).toEqual(["inv-a"]);
  });
});
