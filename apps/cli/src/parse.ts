/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";
import { ConfigError } from "@rubric/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

/** Arguments that are not `--` flags, in order. */
export function positionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith("--"));
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  return n;
}

export function floatArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isFinite(n)) throw new ConfigError({ message: `--${key} must be a number, got "${val}"` });
  return n;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Pick `kv[key]` when it is one of `allowed`. */
export function choiceArg<T extends string>(
  kv: Record<string, string>,
  key: string,
  allowed: readonly T[],
): T | undefined {
  const val = kv[key];
  if (val === undefined) return undefined;
  const hit = allowed.find((a) => a === val);
  if (hit === undefined) {
    throw new ConfigError({ message: `--${key} must be one of ${allowed.join(", ")}, got "${val}"` });
  }
  return hit;
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const raw = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError({ message: `${configPath}: config file must hold a JSON object` });
  }
  const config: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed)) {
    config[k] = typeof v === "object" && v !== null ? JSON.stringify(v) : String(v);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
