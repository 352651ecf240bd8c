import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import { compareStrings } from "../core/utils.js";

export const SESSION_DIR_PREFIX = "test-";

export type PruneOptions = {
  keep: number;
  // Never removed, even when it sorts among the oldest.
  protect?: string;
  warn?: (message: string) => void;
};

// Session ids sort chronologically, so the newest `keep` directories by name survive.
export async function pruneSessions(logRoot: string, options: PruneOptions): Promise<string[]> {
  if (!(await fse.pathExists(logRoot))) return [];

  const warn = options.warn ?? ((message: string) => console.warn(message));
  const keep = Math.max(1, options.keep);
  const entries = await fse.readdir(logRoot, { withFileTypes: true });
  const sessions = entries
    .filter((entry) => entry.isDirectory() && entry.name.startsWith(SESSION_DIR_PREFIX))
    .map((entry) => entry.name)
    .sort(compareStrings);

  if (sessions.length <= keep) return [];

  const removed: string[] = [];
  for (const name of sessions.slice(0, sessions.length - keep)) {
    if (name === options.protect) continue;
    try {
      await fse.remove(path.join(logRoot, name));
      removed.push(name);
    } catch (error) {
      warn(`Warning: failed to prune session ${name}: ${formatErrorMessage(error)}`);
    }
  }
  return removed;
}
