import { z } from "zod";

import type { Phase } from "./phases.js";

const PhaseSettingsSchema = z.object({
  // 0 = auto (derived from available parallelism)
  shards: z.number().int().min(0).default(0),
  // >0 splits scopes by class; falls back to method slices when too few classes exist
  within_shards: z.number().int().min(0).default(0),
  timeout_seconds: z.number().int().positive().optional(),
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  skip_filestore: z.boolean().default(false),
  workers: z.number().int().min(0).default(0),
});

const PhasesSchema = z.object({
  unit: PhaseSettingsSchema.default({}),
  ui: PhaseSettingsSchema.default({}),
  integration: PhaseSettingsSchema.default({}),
  e2e: PhaseSettingsSchema.default({}),
});

const DatabaseSchema = z.object({
  url: z.string().min(1).default("postgres://postgres@localhost:5432/postgres"),
  name: z.string().min(1).default("app"),
  conn_per_shard: z.number().int().positive().default(4),
  conn_reserve: z.number().int().min(0).default(10),
  // Prepended to pg_dump/pg_restore, e.g. ["docker", "compose", "exec", "-T", "db"]
  tools_prefix: z.array(z.string()).default([]),
});

const TemplateSchema = z.object({
  reuse: z.boolean().default(false),
  // 0 = never expires
  ttl_seconds: z.number().int().min(0).default(0),
});

const FilestoreSchema = z.object({
  enabled: z.boolean().default(true),
  root: z.string().min(1).default("/volumes/data/filestore"),
});

const EngineSchema = z.object({
  launcher: z.array(z.string()).default(["docker", "compose", "run", "--rm"]),
  entrypoint: z.array(z.string()).default(["test-engine"]),
  // Flag used to forward environment pairs through the launcher; null passes env only to the process.
  env_flag: z.string().nullable().default("-e"),
  env: z.record(z.string()).default({}),
  extra_args: z.array(z.string()).default([]),
  stall_threshold_seconds: z.number().positive().default(60),
});

const WeightsSchema = z.object({
  seconds_per_bucket: z.number().positive().default(5),
  history_policy: z.enum(["running_average", "decay"]).default("running_average"),
  decay_alpha: z.number().gt(0).max(1).default(0.3),
});

export const ShardlineConfigSchema = z.object({
  scopes_dir: z.string().min(1).default("addons"),
  scope_marker: z.string().min(1).default("__manifest__.py"),
  ignore_scope_patterns: z.array(z.string()).default(["*backup*", "*_bak*", "*~*"]),
  log_root: z.string().min(1).default("tmp/test-logs"),

  keep_going: z.boolean().default(true),
  log_keep: z.number().int().positive().default(12),
  phases_overlap: z.boolean().default(false),
  // 0 = min(8, shard count)
  max_procs: z.number().int().min(0).default(0),
  events_stdout: z.boolean().default(false),
  tags_override: z.string().optional(),

  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),

  phases: PhasesSchema.default({}),
  database: DatabaseSchema.default({}),
  template: TemplateSchema.default({}),
  filestore: FilestoreSchema.default({}),
  engine: EngineSchema.default({}),
  weights: WeightsSchema.default({}),
});

export type ShardlineConfig = z.infer<typeof ShardlineConfigSchema>;
export type PhaseSettings = z.infer<typeof PhaseSettingsSchema>;
export type WeightPolicyConfig = z.infer<typeof WeightsSchema>;
export type EngineConfig = z.infer<typeof EngineSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseSchema>;

export function defaultConfig(): ShardlineConfig {
  return ShardlineConfigSchema.parse({});
}

export function phaseSettings(config: ShardlineConfig, phase: Phase): PhaseSettings {
  return config.phases[phase];
}

export function withPhaseSettings(
  config: ShardlineConfig,
  phase: Phase,
  patch: Partial<PhaseSettings>,
): ShardlineConfig {
  return {
    ...config,
    phases: { ...config.phases, [phase]: { ...config.phases[phase], ...patch } },
  };
}
