import { Argument, Command, Option } from "commander";
import { z } from "zod";

import type { AppContext } from "../app/context.js";
import { PHASES, isPhase } from "../core/phases.js";

import { cleanCommand } from "./clean.js";
import { loadConfigForCli, type CliContextOptions, type CreateContext } from "./config.js";
import { planCommand } from "./plan.js";
import { runCommand } from "./run.js";
import { collectList, parseCount, parsePhaseOptions, parseRunOptions } from "./run-flags.js";
import { statusCommand } from "./status.js";
import { validateCommand } from "./validate.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildCliDeps = {
  createContext?: CreateContext;
};

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  debug: z.boolean().optional(),
});

const JsonOptionSchema = z.object({ json: z.boolean().optional() });

const PlanOptionsSchema = JsonOptionSchema.extend({ phase: z.enum(PHASES).optional() });

const ValidateOptionsSchema = JsonOptionSchema.extend({
  session: z.string().optional(),
  strict: z.boolean().optional(),
});

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(deps: BuildCliDeps = {}): Command {
  const createContext = deps.createContext ?? loadConfigForCli;
  const program = new Command();

  // Every command gets a fresh context, disposed once it returns; its result is the exit code.
  const withContext = async (
    options: Omit<CliContextOptions, "configPath">,
    fn: (ctx: AppContext) => Promise<number>,
  ): Promise<void> => {
    const global = GlobalOptionsSchema.parse(program.opts());
    const ctx = createContext({ ...options, configPath: global.config });
    try {
      process.exitCode = await fn(ctx);
    } finally {
      await ctx.dispose();
    }
  };

  program
    .name("shardline")
    .description("Sharded test-suite orchestrator (PostgreSQL clones per shard, weighted LPT planning)")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to ./shardline.yaml when present)")
    .option("--debug", "Show error codes, causes and stacks");

  const run = program
    .command("run")
    .description("Run every phase as one session")
    .option("--json", "Print the session summary as JSON");
  for (const phase of PHASES) {
    run.option(`--${phase}-shards <n>`, `Shard count for ${phase} (0 = auto)`, parseCount);
  }
  for (const phase of ["unit", "integration", "e2e"] as const) {
    run.option(
      `--${phase}-within-shards <n>`,
      `Split ${phase} scopes by test class into this many shards`,
      parseCount,
    );
  }
  addScopeOptions(run);
  for (const phase of PHASES) {
    run
      .option(`--${phase}-scopes <list>`, `Only these scopes for ${phase}`, collectList)
      .option(`--${phase}-exclude <list>`, `Skip these scopes for ${phase}`, collectList);
  }
  run
    .option("--overlap", "Run unit with ui, and integration with e2e, concurrently")
    .option("--skip-filestore-integration", "Do not snapshot the filestore for integration shards")
    .option("--skip-filestore-e2e", "Do not snapshot the filestore for e2e shards")
    .action(async (opts: unknown) => {
      const flags = parseRunOptions(opts);
      await withContext({ json: flags.json }, (ctx) => runCommand(ctx, { flags }));
    });

  const phaseCommand = program
    .command("phase")
    .description("Run a single phase in its own session")
    .addArgument(new Argument("<name>", "Phase to run").choices(PHASES))
    .option("--json", "Print the session summary as JSON")
    .option("--shards <n>", "Shard count (0 = auto)", parseCount)
    .option("--within-shards <n>", "Split scopes by test class into this many shards", parseCount)
    .option("--skip-filestore", "Do not snapshot the filestore");
  addScopeOptions(phaseCommand);
  phaseCommand.action(async (name: string, opts: unknown) => {
    if (!isPhase(name)) return;
    const flags = parsePhaseOptions(name, opts);
    await withContext({ json: flags.json }, (ctx) =>
      runCommand(ctx, { flags, phases: [name] }),
    );
  });

  program
    .command("plan")
    .description("Show discovery, weights, guardrail cap and shard plan without running")
    .addOption(new Option("--phase <name>", "Only this phase").choices(PHASES))
    .option("--json", "Print the plan as JSON")
    .action(async (opts: unknown) => {
      const parsed = PlanOptionsSchema.parse(opts);
      const phases = parsed.phase ? [parsed.phase] : [...PHASES];
      await withContext({ json: parsed.json }, async (ctx) => {
        await planCommand(ctx, { phases, json: parsed.json });
        return 0;
      });
    });

  program
    .command("status")
    .description("Bottom line of the latest session")
    .option("--json", "Print pointers and summary as JSON")
    .action(async (opts: unknown) => {
      const parsed = JsonOptionSchema.parse(opts);
      await withContext({ json: parsed.json }, (ctx) => statusCommand(ctx, parsed));
    });

  program
    .command("validate")
    .description("Compare executed tests and scopes against the sources")
    .option("--session <dir>", "Session directory or name (default: latest)")
    .option("--strict", "Exit non-zero on missing tests or scopes")
    .option("--json", "Print the report as JSON")
    .action(async (opts: unknown) => {
      const parsed = ValidateOptionsSchema.parse(opts);
      await withContext({ json: parsed.json }, (ctx) => validateCommand(ctx, parsed));
    });

  program
    .command("clean")
    .description("Drop leftover test databases and filestores")
    .action(async () => {
      await withContext({}, (ctx) => cleanCommand(ctx));
    });

  return program;
}

// Global and per-phase filters shared by `run` and `phase`.
function addScopeOptions(command: Command): void {
  command
    .option("--scopes <list>", "Only these scopes (comma-separated, repeatable, globs allowed)", collectList)
    .option("--exclude <list>", "Skip these scopes", collectList)
    .option("--keep-going", "Continue with later phases after a failure")
    .option("--no-keep-going", "Stop after the first failing phase")
    .option("--max-procs <n>", "Parallel shards per phase (0 = auto)", parseCount);
}
