import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import { ConfigFileError } from "./errors.js";

export interface Config {
  model: string;
  url: string;
  // Explicit API key; wins over the environment when non-empty
  apiKey?: string;
  // Environment variable consulted when apiKey is unset
  envVar: string;
  maxCompletionTokens?: number;
  // Upper bound on the joined diff; unset means no limit
  maxDiffChars?: number;
  timeoutMs: number;
  // Extra request headers (e.g. OpenAI-Organization)
  headers: Record<string, string>;
  ignoredFiles: string[];
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export type ConfigOverrides = DeepPartial<Config>;

export const DEFAULT_ENV_VAR = "OPENAI_API_KEY";
export const DEFAULT_URL = "https://api.openai.com/v1/chat/completions";

const builtinDefaults: Config = {
  model: "gpt-5-mini",
  url: DEFAULT_URL,
  envVar: DEFAULT_ENV_VAR,
  timeoutMs: 60_000,
  headers: {},
  ignoredFiles: [],
};

let defaults: Config = builtinDefaults;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function mergeRecords(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] =
      isPlainObject(current) && isPlainObject(value)
        ? mergeRecords(current, value)
        : value;
  }
  return out;
}

/**
 * Deep-merges `override` onto `base` without touching either.
 * Nested plain objects merge key by key; arrays and scalars are replaced;
 * `undefined` leaves the base value in place.
 */
export function mergeConfig(base: Config, override: ConfigOverrides = {}): Config {
  const merged = mergeRecords({ ...base }, { ...override });
  return {
    ...base,
    ...pickConfig(merged),
  };
}

// Re-types a merged record field by field so the result is a Config again.
function pickConfig(record: Record<string, unknown>): Partial<Config> {
  const out: Partial<Config> = {};
  if (typeof record.model === "string") out.model = record.model;
  if (typeof record.url === "string") out.url = record.url;
  if (typeof record.apiKey === "string") out.apiKey = record.apiKey;
  if (typeof record.envVar === "string") out.envVar = record.envVar;
  if (typeof record.maxCompletionTokens === "number")
    out.maxCompletionTokens = record.maxCompletionTokens;
  if (typeof record.maxDiffChars === "number") out.maxDiffChars = record.maxDiffChars;
  if (typeof record.timeoutMs === "number") out.timeoutMs = record.timeoutMs;
  if (isPlainObject(record.headers)) out.headers = stringRecord(record.headers);
  if (Array.isArray(record.ignoredFiles))
    out.ignoredFiles = record.ignoredFiles.filter(
      (p): p is string => typeof p === "string"
    );
  return out;
}

function stringRecord(record: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

/** Process-wide defaults that every `generate` call starts from. */
export function getDefaults(): Config {
  return mergeConfig(defaults);
}

// Last writer wins when called more than once.
export function setDefaults(overrides: ConfigOverrides): Config {
  defaults = mergeConfig(defaults, overrides);
  return getDefaults();
}

export function resetDefaults(): void {
  defaults = builtinDefaults;
}

export interface CliOptions {
  model?: string;
  url?: string;
  apiKeyEnv?: string;
  maxTokens?: string;
  maxDiffChars?: string;
  timeout?: string;
}

async function readJsonObject(path: string): Promise<Record<string, unknown>> {
  const content = await readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigFileError(path, "not valid JSON", { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigFileError(path, "expected a JSON object");
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigFileError("command line", `${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

const NUMERIC_KEYS = ["maxCompletionTokens", "maxDiffChars", "timeoutMs"] as const;

// File sources get the same positive-integer rule as the matching flags.
function fileConfig(record: Record<string, unknown>, source: string): Partial<Config> {
  for (const key of NUMERIC_KEYS) {
    const value = record[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      throw new ConfigFileError(
        source,
        `${key} must be a positive integer, got ${JSON.stringify(value)}`
      );
    }
  }
  return pickConfig(record);
}

/**
 * Builds the CLI's configuration.
 * Merge order: defaults < .commitlinerc < package.json#commitline < env vars < CLI options
 */
export async function loadConfig(
  cliOptions: CliOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let config = getDefaults();

  const rcPath = join(cwd, ".commitlinerc");
  if (existsSync(rcPath)) {
    config = mergeConfig(config, fileConfig(await readJsonObject(rcPath), rcPath));
  }

  const pkgPath = join(cwd, "package.json");
  if (existsSync(pkgPath)) {
    const section = (await readJsonObject(pkgPath)).commitline;
    if (section !== undefined) {
      if (!isPlainObject(section)) {
        throw new ConfigFileError(pkgPath, `"commitline" must be an object`);
      }
      config = mergeConfig(config, fileConfig(section, pkgPath));
    }
  }

  const ignorePath = join(cwd, ".commitlineignore");
  if (existsSync(ignorePath)) {
    const content = await readFile(ignorePath, "utf-8");
    const patterns = content
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l && !l.startsWith("#"));
    config = mergeConfig(config, {
      ignoredFiles: [...config.ignoredFiles, ...patterns],
    });
  }

  config = mergeConfig(config, {
    model: env.COMMITLINE_MODEL || undefined,
    url: env.COMMITLINE_URL || undefined,
  });

  return mergeConfig(config, {
    model: cliOptions.model,
    url: cliOptions.url,
    envVar: cliOptions.apiKeyEnv,
    maxCompletionTokens: parsePositiveInt(cliOptions.maxTokens, "--max-tokens"),
    maxDiffChars: parsePositiveInt(cliOptions.maxDiffChars, "--max-diff-chars"),
    timeoutMs: parsePositiveInt(cliOptions.timeout, "--timeout"),
  });
}
