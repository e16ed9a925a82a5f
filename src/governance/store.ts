import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { TaskRecord } from "./types.js";

export const POLICY_FILENAME = "policy.jsonl";
export const PROVENANCE_FILENAME = "provenance.jsonl";
export const AUDIT_FILENAME = "audit.jsonl";
export const EPISODIC_FILENAME = "episodic.jsonl";
export const PROPOSALS_FILENAME = "proposals.jsonl";
const TASKS_DIRNAME = "tasks";
const TASK_BACKUP_SUFFIX = ".backup.json";

const log = createSubsystemLogger("store");
const writesByPath = new Map<string, Promise<void>>();

export type GovernancePaths = {
  stateDir: string;
  policy: string;
  provenance: string;
  audit: string;
  episodic: string;
  proposals: string;
  tasksDir: string;
};

export function resolveGovernancePaths(stateDir: string): GovernancePaths {
  return {
    stateDir,
    policy: path.join(stateDir, POLICY_FILENAME),
    provenance: path.join(stateDir, PROVENANCE_FILENAME),
    audit: path.join(stateDir, AUDIT_FILENAME),
    episodic: path.join(stateDir, EPISODIC_FILENAME),
    proposals: path.join(stateDir, PROPOSALS_FILENAME),
    tasksDir: path.join(stateDir, TASKS_DIRNAME),
  };
}

/**
 * Chains writers per resolved path so appends never interleave mid-record. A failed
 * write rejects its own caller only; the chain continues for the next writer.
 */
export function withSerializedWrite<T>(filePath: string, run: () => Promise<T>): Promise<T> {
  const resolved = path.resolve(filePath);
  const prev = writesByPath.get(resolved) ?? Promise.resolve();
  const next = prev.catch(() => undefined).then(run);
  const settled = next.then(
    () => undefined,
    () => undefined,
  );
  writesByPath.set(resolved, settled);
  void settled.then(() => {
    if (writesByPath.get(resolved) === settled) {
      writesByPath.delete(resolved);
    }
  });
  return next;
}

export async function appendJsonLine(filePath: string, value: unknown) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${JSON.stringify(value)}\n`, "utf-8");
}

async function readFileIfExists(filePath: string) {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "";
    }
    throw error;
  }
}

/** Reads a JSONL log in file order, skipping lines that fail to parse or validate. */
export async function readJsonLines<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T[]> {
  const raw = await readFileIfExists(filePath);
  if (!raw.trim()) {
    return [];
  }
  const out: T[] = [];
  let skipped = 0;
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    let value: unknown;
    try {
      value = JSON.parse(trimmed);
    } catch {
      skipped += 1;
      continue;
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      skipped += 1;
      continue;
    }
    out.push(parsed.data);
  }
  if (skipped > 0) {
    log.warn("skipped unreadable log lines", { file: path.basename(filePath), skipped });
  }
  return out;
}

export function resolveTaskPath(paths: GovernancePaths, taskId: string) {
  return path.join(paths.tasksDir, `${taskId}.json`);
}

function resolveTaskBackupPath(paths: GovernancePaths, taskId: string) {
  return path.join(paths.tasksDir, `${taskId}${TASK_BACKUP_SUFFIX}`);
}

function formatTaskTimestamp(nowMs: number) {
  const iso = new Date(nowMs).toISOString();
  return `${iso.slice(0, 10).replaceAll("-", "")}_${iso.slice(11, 19).replaceAll(":", "")}`;
}

export function createTaskId(nowMs = Date.now()) {
  return `task_${formatTaskTimestamp(nowMs)}_${crypto.randomBytes(4).toString("hex")}`;
}

async function tryCreateExclusive(filePath: string, payload: string) {
  try {
    const handle = await fs.open(filePath, "wx");
    try {
      await handle.writeFile(payload, "utf-8");
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      return false;
    }
    throw error;
  }
}

/**
 * Atomically claims a fresh task id by creating its snapshot file exclusively. The
 * file holds a placeholder until the first `saveTaskRecord`.
 */
export async function reserveTaskId(paths: GovernancePaths, nowMs = Date.now()) {
  await fs.mkdir(paths.tasksDir, { recursive: true });
  for (let attempt = 0; attempt < 8; attempt += 1) {
    const id = createTaskId(nowMs);
    const created = await tryCreateExclusive(
      resolveTaskPath(paths, id),
      JSON.stringify({ id, reservedAt: new Date(nowMs).toISOString() }),
    );
    if (created) {
      return id;
    }
  }
  throw new Error("unable to reserve a unique task id");
}

export async function releaseTaskReservation(paths: GovernancePaths, taskId: string) {
  await fs.rm(resolveTaskPath(paths, taskId), { force: true });
}

export async function saveTaskRecord(paths: GovernancePaths, task: TaskRecord) {
  const taskPath = resolveTaskPath(paths, task.id);
  const backupPath = resolveTaskBackupPath(paths, task.id);
  const payload = JSON.stringify(task, null, 2);
  await withSerializedWrite(taskPath, async () => {
    await fs.mkdir(path.dirname(taskPath), { recursive: true });
    const tmp = `${taskPath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
    await fs.writeFile(tmp, payload, "utf-8");
    await fs.rename(tmp, taskPath);
    await fs.writeFile(backupPath, payload, "utf-8");
  });
}

function tryParseTask(raw: string, schema: z.ZodType<TaskRecord, z.ZodTypeDef, unknown>) {
  if (!raw.trim()) {
    return null;
  }
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Falls back to the backup snapshot when the primary is missing or corrupt. */
export async function loadTaskRecord(
  paths: GovernancePaths,
  taskId: string,
  schema: z.ZodType<TaskRecord, z.ZodTypeDef, unknown>,
) {
  if (!/^[A-Za-z0-9_-]+$/.test(taskId)) {
    return null;
  }
  const primary = tryParseTask(await readFileIfExists(resolveTaskPath(paths, taskId)), schema);
  if (primary) {
    return primary;
  }
  return tryParseTask(await readFileIfExists(resolveTaskBackupPath(paths, taskId)), schema);
}

export async function listTaskIds(paths: GovernancePaths) {
  let entries: string[];
  try {
    entries = await fs.readdir(paths.tasksDir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
  return entries
    .filter((name) => name.endsWith(".json") && !name.endsWith(TASK_BACKUP_SUFFIX))
    .map((name) => name.slice(0, -".json".length))
    .toSorted();
}
