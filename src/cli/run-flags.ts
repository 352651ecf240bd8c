import { InvalidArgumentError } from "commander";
import { z } from "zod";

import { withPhaseSettings, type ShardlineConfig } from "../core/config.js";
import { PHASES, type Phase } from "../core/phases.js";
import { parseList, uniqueInOrder } from "../core/utils.js";

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

// Repeatable, comma-separated.
export function collectList(value: string, previous: string[] = []): string[] {
  return uniqueInOrder([...previous, ...parseList(value)]);
}

// =============================================================================
// FLAGS
// =============================================================================

export type PhaseFlags = {
  shards?: number;
  withinShards?: number;
  scopes?: string[];
  exclude?: string[];
  skipFilestore?: boolean;
};

export type RunFlags = {
  json?: boolean;
  scopes?: string[];
  exclude?: string[];
  overlap?: boolean;
  keepGoing?: boolean;
  maxProcs?: number;
  phases: Partial<Record<Phase, PhaseFlags>>;
};

const count = z.number().int().min(0).optional();
const list = z.array(z.string()).optional();
const flag = z.boolean().optional();

// Commander's camelCased option bag for `run`.
const RunOptionsSchema = z.object({
  json: flag,
  scopes: list,
  exclude: list,
  overlap: flag,
  keepGoing: flag,
  maxProcs: count,
  unitShards: count,
  uiShards: count,
  integrationShards: count,
  e2eShards: count,
  unitWithinShards: count,
  integrationWithinShards: count,
  e2eWithinShards: count,
  unitScopes: list,
  uiScopes: list,
  integrationScopes: list,
  e2eScopes: list,
  unitExclude: list,
  uiExclude: list,
  integrationExclude: list,
  e2eExclude: list,
  skipFilestoreIntegration: flag,
  skipFilestoreE2e: flag,
});

// Commander's option bag for `phase <name>`.
const PhaseOptionsSchema = z.object({
  json: flag,
  scopes: list,
  exclude: list,
  keepGoing: flag,
  maxProcs: count,
  shards: count,
  withinShards: count,
  skipFilestore: flag,
});

export function parseRunOptions(raw: unknown): RunFlags {
  const opts = RunOptionsSchema.parse(raw);
  return {
    json: opts.json,
    scopes: opts.scopes,
    exclude: opts.exclude,
    overlap: opts.overlap,
    keepGoing: opts.keepGoing,
    maxProcs: opts.maxProcs,
    phases: {
      unit: { shards: opts.unitShards, withinShards: opts.unitWithinShards, scopes: opts.unitScopes, exclude: opts.unitExclude },
      ui: { shards: opts.uiShards, scopes: opts.uiScopes, exclude: opts.uiExclude },
      integration: {
        shards: opts.integrationShards,
        withinShards: opts.integrationWithinShards,
        scopes: opts.integrationScopes,
        exclude: opts.integrationExclude,
        skipFilestore: opts.skipFilestoreIntegration,
      },
      e2e: {
        shards: opts.e2eShards,
        withinShards: opts.e2eWithinShards,
        scopes: opts.e2eScopes,
        exclude: opts.e2eExclude,
        skipFilestore: opts.skipFilestoreE2e,
      },
    },
  };
}

// `phase <name>` filters apply to that phase only.
export function parsePhaseOptions(phase: Phase, raw: unknown): RunFlags {
  const opts = PhaseOptionsSchema.parse(raw);
  return {
    json: opts.json,
    keepGoing: opts.keepGoing,
    maxProcs: opts.maxProcs,
    phases: {
      [phase]: {
        shards: opts.shards,
        withinShards: opts.withinShards,
        scopes: opts.scopes,
        exclude: opts.exclude,
        skipFilestore: opts.skipFilestore,
      },
    },
  };
}

// =============================================================================
// APPLY
// =============================================================================

// Flags win over file and environment. Scope lists replace includes and extend excludes.
export function applyRunFlags(config: ShardlineConfig, flags: RunFlags): ShardlineConfig {
  let next: ShardlineConfig = {
    ...config,
    include: flags.scopes ?? config.include,
    exclude: uniqueInOrder([...config.exclude, ...(flags.exclude ?? [])]),
    phases_overlap: flags.overlap ?? config.phases_overlap,
    keep_going: flags.keepGoing ?? config.keep_going,
    max_procs: flags.maxProcs ?? config.max_procs,
  };

  for (const phase of PHASES) {
    const phaseFlags = flags.phases[phase];
    if (!phaseFlags) continue;

    const current = next.phases[phase];
    next = withPhaseSettings(next, phase, {
      shards: phaseFlags.shards ?? current.shards,
      within_shards: phaseFlags.withinShards ?? current.within_shards,
      include: phaseFlags.scopes ?? current.include,
      exclude: uniqueInOrder([...current.exclude, ...(phaseFlags.exclude ?? [])]),
      skip_filestore: phaseFlags.skipFilestore === true ? true : current.skip_filestore,
    });
  }

  return next;
}
