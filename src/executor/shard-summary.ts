import { z } from "zod";

import { PHASES } from "../core/phases.js";

export const SUMMARY_SCHEMA_VERSION = "1.0";

export const TestCountersSchema = z.object({
  tests_run: z.number().int().nonnegative().default(0),
  failures: z.number().int().nonnegative().default(0),
  errors: z.number().int().nonnegative().default(0),
  skips: z.number().int().nonnegative().default(0),
});

export const ShardSummarySchema = z.object({
  schema_version: z.string(),
  timestamp: z.string(),
  command: z.string(),
  phase: z.enum(PHASES),
  kind: z.enum(["scopes", "sub_units", "method_slice"]),
  shard_label: z.string(),
  database: z.string(),
  scopes: z.array(z.string()),
  test_tags: z.string(),
  timeout: z.number(),
  start_time: z.string(),
  end_time: z.string(),
  elapsed_seconds: z.number().nonnegative(),
  counters: TestCountersSchema,
  return_code: z.number().int(),
  success: z.boolean(),
  log_file: z.string(),
  summary_file: z.string(),
  error: z.string().optional(),
  timed_out: z.boolean().optional(),
  repetitive_pattern: z.string().optional(),
});

export type ShardSummary = z.infer<typeof ShardSummarySchema>;
