import path from "node:path";

import fse from "fs-extra";

import { FilestoreError } from "../core/errors.js";
import { filestorePath } from "../core/paths.js";

import type { CommandRunner } from "./command-runner.js";

export const SNAPSHOT_MARKER = ".snapshot_complete";

export type SnapshotMethod = "hardlink" | "rsync" | "copy";

export type SnapshotResult =
  | { created: true; method: SnapshotMethod; path: string }
  | { created: false; reason: "source_missing" | "already_complete"; path: string };

// Per-database attachment directories under one root. Snapshots land in
// "<target>.tmp" first and are renamed into place once the marker is written.
export class FilestoreManager {
  private readonly inflight = new Map<string, Promise<SnapshotResult>>();

  constructor(
    public readonly root: string,
    private readonly runner: CommandRunner,
  ) {}

  pathFor(dbName: string): string {
    return filestorePath(this.root, dbName);
  }

  async isComplete(dbName: string): Promise<boolean> {
    return fse.pathExists(path.join(this.pathFor(dbName), SNAPSHOT_MARKER));
  }

  // Concurrent callers for the same target share one copy.
  snapshot(sourceDb: string, targetDb: string): Promise<SnapshotResult> {
    const existing = this.inflight.get(targetDb);
    if (existing) return existing;

    const pending = this.createSnapshot(sourceDb, targetDb).finally(() => {
      this.inflight.delete(targetDb);
    });
    this.inflight.set(targetDb, pending);
    return pending;
  }

  async remove(dbName: string): Promise<void> {
    await fse.remove(this.pathFor(dbName));
    await fse.remove(`${this.pathFor(dbName)}.tmp`);
  }

  // Removes every "<rootName>_test_*" entry; symlinks are unlinked, not followed.
  async cleanup(rootName: string): Promise<string[]> {
    if (!(await fse.pathExists(this.root))) return [];

    const prefix = `${rootName}_test_`;
    const entries = (await fse.readdir(this.root)).filter((name) => name.startsWith(prefix)).sort();
    for (const entry of entries) {
      await fse.remove(path.join(this.root, entry));
    }
    return entries;
  }

  private async createSnapshot(sourceDb: string, targetDb: string): Promise<SnapshotResult> {
    const source = this.pathFor(sourceDb);
    const target = this.pathFor(targetDb);
    const temp = `${target}.tmp`;

    if (await this.isComplete(targetDb)) {
      return { created: false, reason: "already_complete", path: target };
    }
    if (!(await isDirectory(source))) {
      return { created: false, reason: "source_missing", path: target };
    }

    await fse.remove(temp);
    await fse.remove(target);

    const method = await this.copyTree(source, temp);
    await fse.writeFile(path.join(temp, SNAPSHOT_MARKER), "");
    await fse.move(temp, target, { overwrite: true });

    return { created: true, method, path: target };
  }

  private async copyTree(source: string, temp: string): Promise<SnapshotMethod> {
    const hardlink = await this.runner.run({ command: "cp", args: ["-al", source, temp] });
    if (hardlink.exitCode === 0) return "hardlink";

    await fse.remove(temp);
    const rsync = await this.runner.run({
      command: "rsync",
      args: ["-a", "--delete", `${source}/`, `${temp}/`],
    });
    if (rsync.exitCode === 0) return "rsync";

    await fse.remove(temp);
    try {
      await fse.copy(source, temp, { preserveTimestamps: true });
      return "copy";
    } catch (error) {
      await fse.remove(temp);
      throw new FilestoreError(`Filestore snapshot of ${source} failed`, "environment", error);
    }
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fse.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
