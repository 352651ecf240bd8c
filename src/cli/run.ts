import type { AppContext } from "../app/context.js";
import { SessionOrchestrator } from "../app/orchestrator/session-orchestrator.js";
import type { Phase } from "../core/phases.js";

import { applyRunFlags, type RunFlags } from "./run-flags.js";

export type RunCommandOptions = {
  flags: RunFlags;
  // Omitted: every phase.
  phases?: Phase[];
  sessionId?: string;
  print?: (line: string) => void;
};

// Returns the session's exit status.
export async function runCommand(ctx: AppContext, options: RunCommandOptions): Promise<number> {
  const config = applyRunFlags(ctx.config, options.flags);
  const print = options.print ?? ((line: string) => console.log(line));

  const orchestrator = new SessionOrchestrator({
    config,
    ports: ctx.ports,
    sessionId: options.sessionId,
  });
  const result = await orchestrator.run({ phases: options.phases });

  if (options.flags.json) {
    const payload = result.summary ?? {
      session: result.sessionId,
      success: false,
      return_code: result.returnCode,
    };
    print(JSON.stringify(payload, null, 2));
  } else if (result.sessionDir) {
    print(`Logs: ${result.sessionDir}`);
  }

  return result.returnCode;
}
