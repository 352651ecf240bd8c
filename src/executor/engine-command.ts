/*
Purpose: build the engine invocation for one shard.
Assumptions: the engine takes --test-tags style flags; the launcher forwards env pairs
through `env_flag` (e.g. `docker compose run -e KEY=value`).
Usage: buildEngineCommand({ work, config, tags }) -> { command, args, env, display }.
*/

import type { EngineConfig } from "../core/config.js";
import { PHASE_PROFILES, type Phase } from "../core/phases.js";
import type { ShardWork } from "../planner/shard-planner.js";

// =============================================================================
// TAGS
// =============================================================================

export function buildTagExpression(work: ShardWork, override?: string): string {
  const profile = PHASE_PROFILES[work.phase];
  const exclusions = profile.excludeTags.map((tag) => `-${tag}`);

  const trimmed = override?.trim() ?? "";
  if (trimmed) {
    const parts = trimmed.split(",").map((part) => part.trim()).filter(Boolean);
    const withBase = parts.includes(profile.tag) ? parts : [profile.tag, ...parts];
    return withBase.join(",");
  }

  if (work.kind === "sub_units" && work.subUnits.length > 0) {
    const parts = work.subUnits.map((unit) => `${profile.tag}/${unit.scopeId}:${unit.subUnitId}`);
    return [...parts, ...exclusions].join(",");
  }

  if (work.kind === "scopes" && work.scopes.length === 1) {
    return [`${profile.tag}/${work.scopes[0]}`, ...exclusions].join(",");
  }

  return [profile.tag, ...exclusions].join(",");
}

// =============================================================================
// COMMAND
// =============================================================================

export type EngineCommandInput = {
  work: ShardWork;
  engine: EngineConfig;
  tags: string;
  // --workers for browser phases
  browserWorkers: number;
  // template phases update installed scopes instead of installing them
  update: boolean;
};

export type EngineCommand = {
  command: string;
  args: string[];
  // Passed to the child process itself; forwarded pairs are already in `args`.
  env: Record<string, string>;
  display: string;
};

export function buildEngineArgs(input: EngineCommandInput): string[] {
  const { work, engine } = input;
  const profile = PHASE_PROFILES[work.phase];
  const env = { ...engine.env, ...work.env };

  const forwarded: string[] = [];
  if (engine.env_flag !== null) {
    for (const [key, value] of Object.entries(env)) {
      forwarded.push(engine.env_flag, `${key}=${value}`);
    }
  }

  const args = [
    ...engine.launcher,
    ...forwarded,
    ...engine.entrypoint,
    "-d",
    work.dbName,
  ];
  if (profile.browser) args.push("--load=web");
  args.push(
    input.update ? "-u" : "-i",
    work.scopes.join(","),
    "--test-tags",
    input.tags,
    "--test-enable",
    "--stop-after-init",
    "--max-cron-threads=0",
    `--workers=${profile.browser ? input.browserWorkers : 0}`,
    `--db-filter=^${work.dbName}$`,
    "--log-level=test",
    "--without-demo=all",
  );
  if (work.phase === "e2e") args.push("--dev=assets");
  args.push(...engine.extra_args);
  return args;
}

export function buildEngineCommand(input: EngineCommandInput): EngineCommand {
  const argv = buildEngineArgs(input);
  const [command, ...args] = argv;
  if (command === undefined) {
    throw new Error("engine launcher and entrypoint are both empty");
  }
  return {
    command,
    args,
    env: { ...input.engine.env, ...input.work.env },
    display: redactCommand(argv, input.engine.env_flag).join(" "),
  };
}

export function usesTemplate(phase: Phase): boolean {
  return PHASE_PROFILES[phase].usesTemplate;
}

// =============================================================================
// REDACTION
// =============================================================================

const SECRET_KEY = /(PASSWORD|TOKEN|KEY|SECRET)$/i;

export function redactEnvPair(pair: string): string {
  const eq = pair.indexOf("=");
  if (eq <= 0) return pair;
  const key = pair.slice(0, eq);
  return SECRET_KEY.test(key) ? `${key}=***` : pair;
}

export function redactCommand(argv: string[], envFlag: string | null = "-e"): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const part = argv[i] ?? "";
    const next = argv[i + 1];
    if (envFlag !== null && part === envFlag && next !== undefined) {
      out.push(part, redactEnvPair(next));
      i += 1;
      continue;
    }
    out.push(part);
  }
  return out;
}
