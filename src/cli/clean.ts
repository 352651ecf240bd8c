import type { AppContext } from "../app/context.js";
import { createEnvironmentManager } from "../app/orchestrator/services.js";

export type CleanCommandOptions = {
  print?: (line: string) => void;
};

// Drops leftover test databases and filestores of the configured source database.
// A reusable template that is still fresh is kept.
export async function cleanCommand(ctx: AppContext, options: CleanCommandOptions = {}): Promise<number> {
  const print = options.print ?? ((line: string) => console.log(line));
  const environment = createEnvironmentManager(ctx.config, ctx.ports);
  const report = await environment.cleanupSession(ctx.config.database.name, {
    warn: ctx.ports.output.warn,
  });

  for (const name of report.databases) print(`dropped database ${name}`);
  for (const name of report.filestores) print(`removed filestore ${name}`);
  for (const name of report.spared) print(`kept reusable template ${name}`);
  if (report.databases.length + report.filestores.length === 0) {
    print("Nothing to clean.");
  }
  return 0;
}
