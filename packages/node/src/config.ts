import { join } from "node:path";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export const ENV_DEV = "RAILKIT_DEV" as const;
export const ENV_STATE_FILE = "RAILKIT_STATE_FILE" as const;
export const DEFAULT_STATE_FILE_NAME = ".railkit-state.json";
export const DEFAULT_COLUMNS = 80;

export type NodeHostConfig = Readonly<{
  devMode: boolean;
  /** Absolute or cwd-relative path of the saved-state file. */
  stateFile: string;
}>;

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envFlag(env: EnvMap, key: string): boolean {
  const raw = envText(env, key)?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function readNodeHostConfig(
  env: EnvMap = process.env,
  cwd: string = process.cwd(),
): NodeHostConfig {
  return Object.freeze({
    devMode: envFlag(env, ENV_DEV),
    stateFile: envText(env, ENV_STATE_FILE) ?? join(cwd, DEFAULT_STATE_FILE_NAME),
  });
}

/** Terminal width, or 80 when the stream is not a TTY or reports nothing usable. */
export function resolveColumns(stream: Readonly<{ columns?: number }>): number {
  const { columns } = stream;
  if (typeof columns !== "number" || !Number.isInteger(columns) || columns <= 0) {
    return DEFAULT_COLUMNS;
  }
  return columns;
}
