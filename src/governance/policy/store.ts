import fs from "node:fs/promises";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { PolicyRuleSchema, SeedPolicySchema } from "../schemas.js";
import {
  appendJsonLine,
  readJsonLines,
  withSerializedWrite,
  type GovernancePaths,
} from "../store.js";
import type { PolicyRule, PolicyRuleKind, PolicyRuleMatch } from "../types.js";

export const DEFAULT_SEED_POLICY_URL = new URL("../../../policy/seed-policy.json", import.meta.url);

const log = createSubsystemLogger("policy");

export type PolicySnapshot = {
  /** Count of log entries the snapshot was built from. */
  revision: number;
  rules: PolicyRule[];
  byId: ReadonlyMap<string, PolicyRule>;
};

export function buildPolicySnapshot(entries: PolicyRule[]): PolicySnapshot {
  const byId = new Map<string, PolicyRule>();
  for (const entry of entries) {
    const current = byId.get(entry.id);
    if (!current || entry.version > current.version) {
      byId.set(entry.id, entry);
    }
  }
  return {
    revision: entries.length,
    rules: [...byId.values()].toSorted((a, b) => a.id.localeCompare(b.id)),
    byId,
  };
}

/** Keeps only ids present in the snapshot, preserving order and dropping repeats. */
export function resolvePolicyRefs(snapshot: PolicySnapshot, ruleIds: Iterable<string>) {
  const out: string[] = [];
  for (const id of ruleIds) {
    if (snapshot.byId.has(id) && !out.includes(id)) {
      out.push(id);
    }
  }
  return out;
}

export async function readPolicyLog(paths: GovernancePaths) {
  return readJsonLines(paths.policy, PolicyRuleSchema);
}

export async function loadPolicySnapshot(paths: GovernancePaths) {
  return buildPolicySnapshot(await readPolicyLog(paths));
}

async function readSeedPolicy(seedPath: string | URL) {
  const raw = await fs.readFile(seedPath, "utf-8");
  const parsed = SeedPolicySchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(
      `seed policy is invalid${first ? ` at ${first.path.join(".")}: ${first.message}` : ""}`,
    );
  }
  return parsed.data;
}

/**
 * Loads the seed rule set into an empty policy log. A log that already holds entries
 * is left untouched, so seeding runs once per state directory.
 */
export async function ensurePolicySeeded(params: {
  paths: GovernancePaths;
  seedPath?: string | URL;
  nowMs?: number;
}): Promise<PolicySnapshot> {
  const nowMs = params.nowMs ?? Date.now();
  await withSerializedWrite(params.paths.policy, async () => {
    const existing = await readPolicyLog(params.paths);
    if (existing.length > 0) {
      return;
    }
    const seed = await readSeedPolicy(params.seedPath ?? DEFAULT_SEED_POLICY_URL);
    const createdAt = new Date(nowMs).toISOString();
    for (const rule of seed.rules) {
      const entry: PolicyRule = {
        id: rule.id,
        kind: rule.kind,
        text: rule.text,
        version: 1,
        createdAt,
        origin: "seed",
        ...(rule.match ? { match: rule.match } : {}),
      };
      await appendJsonLine(params.paths.policy, entry);
    }
    log.info("seeded policy store", { rules: seed.rules.length });
  });
  return loadPolicySnapshot(params.paths);
}

/**
 * Appends a new rule, or a new version of an existing id. Callers outside the
 * promotion pipeline have no approval to pass and must not call this.
 */
export async function appendPolicyRule(params: {
  paths: GovernancePaths;
  rule: {
    id: string;
    kind: PolicyRuleKind;
    text: string;
    match?: PolicyRuleMatch;
  };
  approvedBy: string;
  proposalId: string;
  nowMs?: number;
}): Promise<PolicyRule> {
  const nowMs = params.nowMs ?? Date.now();
  return withSerializedWrite(params.paths.policy, async () => {
    const snapshot = buildPolicySnapshot(await readPolicyLog(params.paths));
    const prior = snapshot.byId.get(params.rule.id);
    const entry: PolicyRule = {
      id: params.rule.id,
      kind: params.rule.kind,
      text: params.rule.text,
      version: (prior?.version ?? 0) + 1,
      createdAt: new Date(nowMs).toISOString(),
      origin: "promotion",
      approvedBy: params.approvedBy,
      proposalId: params.proposalId,
      ...(params.rule.match ? { match: params.rule.match } : {}),
    };
    await appendJsonLine(params.paths.policy, entry);
    return entry;
  });
}
