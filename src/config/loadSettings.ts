/**
 * Settings loader. Layers, later wins: defaults → settings.yml → WHOOPS_* env → overrides.
 * Problems are warnings: the offending value is dropped and the earlier layer's value stays.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { parse } from "yaml";
import { ALL_RULES, DEFAULT_SETTINGS } from "./settings.js";
import type { Settings } from "./settings.js";
import { errorMessage } from "../core/errors.js";
import { createLogger } from "../log/logger.js";

const log = createLogger("config");

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
type SettingsDraft = Mutable<Settings>;

const LIST_KEYS = ["excludeRules", "slowCommands", "excludedSearchPathPrefixes"] as const;
const COUNT_KEYS = ["numCloseMatches", "waitCommand", "waitSlowCommand"] as const;
const FLAG_KEYS = ["requireConfirmation", "debug"] as const;
const ALLOWED_KEYS = new Set<string>([
  "rules",
  "priority",
  "env",
  ...LIST_KEYS,
  ...COUNT_KEYS,
  ...FLAG_KEYS,
]);

export interface LoadSettingsOptions {
  /** Explicit settings file; wins over WHOOPS_CONFIG and the XDG location. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Settings>;
}

export interface LoadedSettings {
  settings: Settings;
  /** Path of the settings file that was read, if any. */
  source?: string;
  warnings: string[];
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME?.trim();
  const base = xdg ? xdg : join(homedir(), ".config");
  return join(base, "whoops", "settings.yml");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function applyFile(draft: SettingsDraft, path: string, warnings: string[]): boolean {
  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    warnings.push(`${path}: cannot read settings (${errorMessage(err)}); using defaults`);
    return false;
  }
  if (raw === null || raw === undefined) return true;
  if (!isRecord(raw)) {
    warnings.push(`${path}: root must be a mapping; using defaults`);
    return false;
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) warnings.push(`${path}: unknown key "${key}" ignored`);
  }

  const rules = raw.rules;
  if (rules !== undefined) {
    if (rules === ALL_RULES) draft.rules = [ALL_RULES];
    else if (isStringList(rules)) draft.rules = [...rules];
    else warnings.push(`${path}: rules must be "ALL" or a list of rule names`);
  }

  for (const key of LIST_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isStringList(value)) draft[key] = [...value];
    else warnings.push(`${path}: ${key} must be a list of strings`);
  }

  for (const key of COUNT_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isCount(value)) draft[key] = value;
    else warnings.push(`${path}: ${key} must be a non-negative integer`);
  }

  for (const key of FLAG_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "boolean") draft[key] = value;
    else warnings.push(`${path}: ${key} must be true or false`);
  }

  const priority = raw.priority;
  if (priority !== undefined) {
    if (isRecord(priority)) {
      const merged: Record<string, number> = { ...draft.priority };
      for (const [rule, value] of Object.entries(priority)) {
        if (typeof value === "number" && Number.isInteger(value)) merged[rule] = value;
        else warnings.push(`${path}: priority.${rule} must be an integer`);
      }
      draft.priority = merged;
    } else {
      warnings.push(`${path}: priority must be a mapping of rule name to integer`);
    }
  }

  const env = raw.env;
  if (env !== undefined) {
    if (isRecord(env)) {
      const merged: Record<string, string> = { ...draft.env };
      for (const [name, value] of Object.entries(env)) {
        if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
          merged[name] = String(value);
        } else {
          warnings.push(`${path}: env.${name} must be a scalar`);
        }
      }
      draft.env = merged;
    } else {
      warnings.push(`${path}: env must be a mapping`);
    }
  }

  return true;
}

function colonList(value: string): string[] {
  return value
    .split(":")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

function parseFlag(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return undefined;
  }
}

function parseCount(value: string): number | undefined {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

const ENV_LISTS: ReadonlyArray<[string, (typeof LIST_KEYS)[number]]> = [
  ["WHOOPS_EXCLUDE_RULES", "excludeRules"],
  ["WHOOPS_SLOW_COMMANDS", "slowCommands"],
  ["WHOOPS_EXCLUDED_SEARCH_PATH_PREFIXES", "excludedSearchPathPrefixes"],
];
const ENV_COUNTS: ReadonlyArray<[string, (typeof COUNT_KEYS)[number]]> = [
  ["WHOOPS_NUM_CLOSE_MATCHES", "numCloseMatches"],
  ["WHOOPS_WAIT_COMMAND", "waitCommand"],
  ["WHOOPS_WAIT_SLOW_COMMAND", "waitSlowCommand"],
];
const ENV_FLAGS: ReadonlyArray<[string, (typeof FLAG_KEYS)[number]]> = [
  ["WHOOPS_REQUIRE_CONFIRMATION", "requireConfirmation"],
  ["WHOOPS_DEBUG", "debug"],
];

function applyEnv(draft: SettingsDraft, env: NodeJS.ProcessEnv, warnings: string[]): void {
  const rules = env.WHOOPS_RULES;
  if (rules !== undefined) draft.rules = colonList(rules);

  for (const [name, key] of ENV_LISTS) {
    const value = env[name];
    if (value !== undefined) draft[key] = colonList(value);
  }

  for (const [name, key] of ENV_COUNTS) {
    const value = env[name];
    if (value === undefined) continue;
    const parsed = parseCount(value);
    if (parsed !== undefined) draft[key] = parsed;
    else warnings.push(`${name}: "${value}" is not a non-negative integer`);
  }

  for (const [name, key] of ENV_FLAGS) {
    const value = env[name];
    if (value === undefined) continue;
    const parsed = parseFlag(value);
    if (parsed !== undefined) draft[key] = parsed;
    else warnings.push(`${name}: "${value}" is not a boolean`);
  }

  const priority = env.WHOOPS_PRIORITY;
  if (priority !== undefined) {
    const merged: Record<string, number> = { ...draft.priority };
    for (const pair of colonList(priority)) {
      const eq = pair.indexOf("=");
      const rule = eq > 0 ? pair.slice(0, eq).trim() : "";
      const value = eq > 0 ? pair.slice(eq + 1).trim() : "";
      if (rule !== "" && /^-?\d+$/.test(value)) merged[rule] = Number(value);
      else warnings.push(`WHOOPS_PRIORITY: "${pair}" is not rule=number`);
    }
    draft.priority = merged;
  }
}

export function loadSettings(options: LoadSettingsOptions = {}): LoadedSettings {
  const env = options.env ?? process.env;
  const warnings: string[] = [];
  const draft: SettingsDraft = { ...DEFAULT_SETTINGS };

  const explicitPath = options.configPath ?? env.WHOOPS_CONFIG;
  const path = explicitPath ?? defaultConfigPath(env);
  let source: string | undefined;
  if (existsSync(path)) {
    if (applyFile(draft, path, warnings)) source = path;
  } else if (explicitPath !== undefined) {
    warnings.push(`${path}: settings file not found; using defaults`);
  } else {
    log.debug(`no settings file at ${path}`);
  }

  applyEnv(draft, env, warnings);

  const overrides = options.overrides ?? {};
  const settings: Settings = Object.freeze({
    ...draft,
    ...overrides,
    priority: { ...draft.priority, ...overrides.priority },
  });

  for (const warning of warnings) log.warn(warning);
  return { settings, source, warnings };
}
