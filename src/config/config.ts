import fs from "node:fs/promises";
import path from "node:path";
import { z, type ZodIssue } from "zod";
import { ConfigError, type ConfigIssue } from "../governance/errors.js";
import { RiskSignalSchema } from "../governance/schemas.js";
import { resolveStateDir, resolveUserPath } from "../utils.js";

export const CONFIG_FILENAME = "governor.config.json";

export const DEFAULT_RISK_PRECEDENCE = [
  "irreversible_impact",
  "policy_conflict",
  "budget_breach",
  "heuristic",
] as const;

export const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug", "trace"]);

export const TaskBudgetLimitsSchema = z.object({
  maxSteps: z.number().int().min(1).max(1000).default(12),
  maxToolCalls: z.number().int().min(0).max(1000).default(5),
  maxActiveMs: z
    .number()
    .int()
    .min(1)
    .default(10 * 60_000),
});

export const GovernanceConfigSchema = z.object({
  stateDir: z.string().min(1),
  /** Tasks that may run their stages at the same time. */
  maxConcurrentTasks: z.number().int().min(1).max(64).default(4),
  /** Produce attempts Reconcile may request before escalating. */
  retryLimit: z.number().int().min(0).max(10).default(2),
  minDistinctSources: z.number().int().min(1).max(20).default(2),
  dominanceThreshold: z.number().gt(0).max(1).default(0.5),
  stageFailureRetries: z.number().int().min(0).max(5).default(0),
  budgets: TaskBudgetLimitsSchema.default({}),
  riskPrecedence: z
    .array(RiskSignalSchema)
    .length(DEFAULT_RISK_PRECEDENCE.length)
    .refine((signals) => new Set(signals).size === signals.length, {
      message: "risk precedence must list every signal exactly once",
    })
    .default([...DEFAULT_RISK_PRECEDENCE]),
  proposalTtlDays: z.number().int().min(1).max(365).default(30),
  minPatternOccurrences: z.number().int().min(2).max(100).default(2),
  /** Empty means any non-empty approver identity is accepted. */
  approvers: z.array(z.string().trim().min(1)).default([]),
  logLevel: LogLevelSchema.optional(),
  seedPolicyPath: z.string().min(1).optional(),
});

export type GovernanceConfig = z.infer<typeof GovernanceConfigSchema>;
export type TaskBudgetLimits = z.infer<typeof TaskBudgetLimitsSchema>;

export type GovernanceConfigOverrides = Omit<Partial<GovernanceConfig>, "budgets"> & {
  budgets?: Partial<TaskBudgetLimits>;
};

const FileConfigSchema = GovernanceConfigSchema.omit({ stateDir: true })
  .extend({ budgets: TaskBudgetLimitsSchema.partial().optional() })
  .partial()
  .strict();

function formatZodIssues(issues: ZodIssue[]): ConfigIssue[] {
  return issues.map((issue) => ({
    path: issue.path.filter(
      (segment): segment is string | number =>
        typeof segment === "string" || typeof segment === "number",
    ),
    message: issue.message,
  }));
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Reflect.ownKeys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function readEnvInt(env: NodeJS.ProcessEnv, key: string) {
  const raw = env[key]?.trim();
  return raw ? Number(raw) : undefined;
}

export function readConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GovernanceConfigOverrides {
  const out: GovernanceConfigOverrides = {};
  const maxConcurrentTasks = readEnvInt(env, "GOVERNOR_MAX_CONCURRENT_TASKS");
  if (maxConcurrentTasks !== undefined) {
    out.maxConcurrentTasks = maxConcurrentTasks;
  }
  const retryLimit = readEnvInt(env, "GOVERNOR_RETRY_LIMIT");
  if (retryLimit !== undefined) {
    out.retryLimit = retryLimit;
  }
  const budgets: Partial<TaskBudgetLimits> = {};
  const maxSteps = readEnvInt(env, "GOVERNOR_MAX_STEPS");
  if (maxSteps !== undefined) {
    budgets.maxSteps = maxSteps;
  }
  const maxToolCalls = readEnvInt(env, "GOVERNOR_MAX_TOOL_CALLS");
  if (maxToolCalls !== undefined) {
    budgets.maxToolCalls = maxToolCalls;
  }
  if (Object.keys(budgets).length > 0) {
    out.budgets = budgets;
  }
  const precedence = env.GOVERNOR_RISK_PRECEDENCE?.trim();
  if (precedence) {
    const parsed = z.array(RiskSignalSchema).safeParse(
      precedence
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
    );
    if (!parsed.success) {
      throw new ConfigError(
        "GOVERNOR_RISK_PRECEDENCE is invalid",
        formatZodIssues(parsed.error.issues),
      );
    }
    out.riskPrecedence = parsed.data;
  }
  const logLevel = LogLevelSchema.safeParse(env.GOVERNOR_LOG_LEVEL?.trim().toLowerCase());
  if (logLevel.success) {
    out.logLevel = logLevel.data;
  }
  return out;
}

function mergeOverrides(layers: GovernanceConfigOverrides[]): GovernanceConfigOverrides {
  let merged: GovernanceConfigOverrides = {};
  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      budgets: { ...merged.budgets, ...layer.budgets },
    };
  }
  return merged;
}

/** Validates a fully merged configuration; throws `ConfigError` with every issue. */
export function createGovernanceConfig(
  input: GovernanceConfigOverrides & { stateDir?: string } = {},
): Readonly<GovernanceConfig> {
  const result = GovernanceConfigSchema.safeParse({
    ...input,
    stateDir: input.stateDir ? resolveUserPath(input.stateDir) : resolveStateDir(),
  });
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(
      `invalid governance configuration: ${issues.length} validation error(s)`,
      issues,
    );
  }
  return deepFreeze(result.data);
}

async function readConfigFile(filePath: string): Promise<GovernanceConfigOverrides> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const parsed = FileConfigSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new ConfigError(
      `config file ${filePath} is invalid`,
      formatZodIssues(parsed.error.issues),
    );
  }
  return parsed.data;
}

/**
 * Layers, lowest first: schema defaults, `<stateDir>/governor.config.json`,
 * `GOVERNOR_*` environment variables, then explicit overrides.
 */
export async function loadGovernanceConfig(
  params: {
    env?: NodeJS.ProcessEnv;
    stateDir?: string;
    overrides?: GovernanceConfigOverrides;
  } = {},
): Promise<Readonly<GovernanceConfig>> {
  const env = params.env ?? process.env;
  const stateDir = params.stateDir ? resolveUserPath(params.stateDir) : resolveStateDir(env);
  const fromFile = await readConfigFile(path.join(stateDir, CONFIG_FILENAME));
  const merged = mergeOverrides([fromFile, readConfigFromEnv(env), params.overrides ?? {}]);
  return createGovernanceConfig({ ...merged, stateDir });
}
