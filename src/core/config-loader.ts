import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ShardlineConfigSchema, type ShardlineConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { isRecord } from "./utils.js";

export const DEFAULT_CONFIG_FILE = "shardline.yaml";

export type LoadConfigOptions = {
  // Explicit --config path; a missing explicit file is an error.
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  config: ShardlineConfig;
  // null when running on defaults
  sourcePath: string | null;
  baseDir: string;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ENV OVERRIDES
// =============================================================================

type Override = {
  variable: string;
  path: string[];
  kind: "int" | "bool" | "string";
};

const ENV_OVERRIDES: Override[] = [
  { variable: "UNIT_SHARDS", path: ["phases", "unit", "shards"], kind: "int" },
  { variable: "UI_SHARDS", path: ["phases", "ui", "shards"], kind: "int" },
  { variable: "INTEGRATION_SHARDS", path: ["phases", "integration", "shards"], kind: "int" },
  { variable: "E2E_SHARDS", path: ["phases", "e2e", "shards"], kind: "int" },
  { variable: "UNIT_WITHIN_SHARDS", path: ["phases", "unit", "within_shards"], kind: "int" },
  {
    variable: "INTEGRATION_WITHIN_SHARDS",
    path: ["phases", "integration", "within_shards"],
    kind: "int",
  },
  { variable: "E2E_WITHIN_SHARDS", path: ["phases", "e2e", "within_shards"], kind: "int" },
  { variable: "TEST_MAX_PROCS", path: ["max_procs"], kind: "int" },
  { variable: "TEST_KEEP_GOING", path: ["keep_going"], kind: "bool" },
  { variable: "TEST_LOG_KEEP", path: ["log_keep"], kind: "int" },
  { variable: "TEST_TAGS", path: ["tags_override"], kind: "string" },
  { variable: "PHASES_OVERLAP", path: ["phases_overlap"], kind: "bool" },
  {
    variable: "SKIP_FILESTORE_INTEGRATION",
    path: ["phases", "integration", "skip_filestore"],
    kind: "bool",
  },
  { variable: "SKIP_FILESTORE_E2E", path: ["phases", "e2e", "skip_filestore"], kind: "bool" },
  { variable: "DB_CONN_PER_SHARD", path: ["database", "conn_per_shard"], kind: "int" },
  { variable: "DB_CONN_RESERVE", path: ["database", "conn_reserve"], kind: "int" },
  { variable: "REUSE_TEMPLATE", path: ["template", "reuse"], kind: "bool" },
  { variable: "TEMPLATE_TTL_SEC", path: ["template", "ttl_seconds"], kind: "int" },
  { variable: "EVENTS_STDOUT", path: ["events_stdout"], kind: "bool" },
  { variable: "DB_NAME", path: ["database", "name"], kind: "string" },
  { variable: "DATABASE_URL", path: ["database", "url"], kind: "string" },
];

export const ENV_OVERRIDE_VARIABLES: readonly string[] = ENV_OVERRIDES.map(
  (override) => override.variable,
);

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function parseOverride(override: Override, raw: string): string | number | boolean {
  const value = raw.trim();
  if (override.kind === "string") return value;

  if (override.kind === "bool") {
    const lowered = value.toLowerCase();
    if (TRUE_VALUES.has(lowered)) return true;
    if (FALSE_VALUES.has(lowered)) return false;
    throw new ConfigError(`${override.variable} must be a boolean (got "${raw}").`);
  }

  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${override.variable} must be a non-negative integer (got "${raw}").`);
  }
  return Number.parseInt(value, 10);
}

export function applyEnvOverrides(
  doc: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  let result = doc;
  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (raw === undefined || raw.trim() === "") continue;
    result = setPath(result, override.path, parseOverride(override, raw));
  }
  return result;
}

function setPath(
  target: Record<string, unknown>,
  keys: string[],
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = keys;
  if (head === undefined) return target;
  if (rest.length === 0) return { ...target, [head]: value };

  const child = target[head];
  return { ...target, [head]: setPath(isRecord(child) ? child : {}, rest, value) };
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Create ${DEFAULT_CONFIG_FILE} or drop --config to run on defaults.`;
const INVALID_CONFIG_HINT = "Fix the config file (or the environment override) and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!isRecord(error)) return null;

  const mark = error.mark;
  if (!isRecord(mark)) return null;

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(source: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Config at ${source} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;

  const explicit = options.configPath !== undefined;
  const absolutePath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);
  const exists = fs.existsSync(absolutePath);
  if (explicit && !exists) {
    throw createMissingConfigError(absolutePath);
  }

  const source = exists ? absolutePath : "<defaults>";
  const baseDir = exists ? path.dirname(absolutePath) : cwd;

  try {
    const doc = exists ? readConfigDocument(absolutePath, env) : {};
    const withOverrides = applyEnvOverrides(doc, env);

    const parsed = ShardlineConfigSchema.safeParse(withOverrides);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid config at ${source}:\n${details}`, parsed.error);
    }

    return {
      config: resolveConfigPaths(parsed.data, baseDir),
      sourcePath: exists ? absolutePath : null,
      baseDir,
    };
  } catch (error) {
    if (error instanceof ConfigError) {
      throw createInvalidConfigError(source, error);
    }
    throw error;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function readConfigDocument(absolutePath: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, error);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    const location = resolveYamlErrorLocation(error);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(
      `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
      error,
    );
  }

  // An empty file is a valid "all defaults" config.
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    throw new ConfigError(`Config at ${absolutePath} must be a mapping.`);
  }

  const expanded = expandEnv(doc, { file: absolutePath, trail: [], env });
  return isRecord(expanded) ? expanded : {};
}

// Relative paths are relative to the config file, not the shell's cwd.
function resolveConfigPaths(config: ShardlineConfig, baseDir: string): ShardlineConfig {
  return {
    ...config,
    scopes_dir: path.resolve(baseDir, config.scopes_dir),
    log_root: path.resolve(baseDir, config.log_root),
    filestore: { ...config.filestore, root: path.resolve(baseDir, config.filestore.root) },
  };
}
