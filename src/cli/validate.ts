import path from "node:path";

import fse from "fs-extra";

import type { AppContext } from "../app/context.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { discoveryOptionsFor } from "../planner/discovery.js";
import {
  formatValidationReport,
  validateSession,
  validationExitCode,
} from "../reporting/coverage.js";

export type ValidateCommandOptions = {
  // Session directory, or a session name under log_root. Defaults to the latest session.
  session?: string;
  strict?: boolean;
  json?: boolean;
  print?: (line: string) => void;
};

export async function validateCommand(
  ctx: AppContext,
  options: ValidateCommandOptions = {},
): Promise<number> {
  const print = options.print ?? ((line: string) => console.log(line));
  const sessionDir = await resolveSessionDir(ctx, options.session);

  const report = await validateSession(sessionDir, discoveryOptionsFor(ctx.config));
  if (!report) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Session summary missing",
      message: `No readable summary.json in ${sessionDir}.`,
      hint: "The session may still be running or may have crashed before finishing.",
      next: "shardline status",
    });
  }

  if (options.json) {
    print(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatValidationReport(report)) print(line);
  }
  return validationExitCode(report, options.strict ?? false);
}

export async function resolveSessionDir(ctx: AppContext, requested?: string): Promise<string> {
  if (requested !== undefined) {
    const underRoot = path.join(ctx.config.log_root, requested);
    if (!requested.includes(path.sep) && (await fse.pathExists(underRoot))) {
      return underRoot;
    }
    return path.resolve(requested);
  }

  const latest = await ctx.ports.pointers.readLatest();
  if (!latest) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.session,
      title: "No session to validate",
      message: `No finished session under ${ctx.config.log_root}.`,
      hint: "Pass --session <dir> or run a session first.",
      next: "shardline run",
    });
  }
  return latest.session_dir;
}
