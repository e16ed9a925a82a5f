import os from "node:os";
import path from "node:path";

export const DEFAULT_STATE_DIRNAME = ".governor";

export function resolveUserPath(input: string) {
  const trimmed = input.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/** State lives under `GOVERNOR_STATE_DIR` when set, otherwise `~/.governor`. */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env) {
  const override = env.GOVERNOR_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override);
  }
  return path.join(os.homedir(), DEFAULT_STATE_DIRNAME);
}

export function clampNumber(value: number, min: number, max: number) {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.max(min, Math.min(max, value));
}

export function uniqueStrings(values: Iterable<string>) {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    out.push(trimmed);
  }
  return out;
}

/** Lowercase word tokens; `$` and digits are kept so amounts stay matchable. */
export function tokenize(text: string) {
  return text.toLowerCase().match(/[a-z0-9$]+/g) ?? [];
}
