/*
Purpose: isolated database (and filestore) instances per shard.
Assumptions: the source database is read-only for the duration of a session;
only this manager and the guardrail talk to the server as admin.
Usage: ensureTemplate(sessionId) once per session, cloneForShard(...) per shard,
cleanupSession(root) before and after every session.
*/

import { DatabaseError } from "../core/errors.js";
import { handleFailure, settle, type NonFatalReporter } from "../core/failure-policy.js";
import { attempt } from "../core/result.js";
import type { DatabaseAdmin } from "../database/postgres.js";
import { likePrefix } from "../database/postgres.js";
import { isTemplateFresh, type TemplateRecordStore } from "../state/template-record.js";

import { withPrefix, type CommandRunner } from "./command-runner.js";
import type { FilestoreManager, SnapshotResult } from "./filestore.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnvironmentSettings = {
  sourceDb: string;
  databaseUrl: string;
  toolsPrefix: string[];
  reuseTemplate: boolean;
  templateTtlSeconds: number;
  filestoreEnabled: boolean;
};

export type EnvironmentInstance = {
  dbName: string;
  template: string | null;
  filestorePath?: string;
};

export type CloneOptions = {
  withFilestore: boolean;
};

export type CleanupReport = {
  databases: string[];
  filestores: string[];
  spared: string[];
};

export type EnvironmentDeps = {
  admin: DatabaseAdmin;
  runner: CommandRunner;
  filestore: FilestoreManager;
  templates: TemplateRecordStore;
  settings: EnvironmentSettings;
  now?: () => Date;
  warn?: (message: string) => void;
};

// =============================================================================
// NAMES
// =============================================================================

export function templateNameFor(sourceDb: string, sessionId: string): string {
  const suffix = sessionId.replace(/^test-/, "") || "template";
  return `${sourceDb}_test_template_${suffix}`;
}

export function cleanupPatterns(rootName: string): string[] {
  return [likePrefix(`${rootName}_test_`), likePrefix(`${rootName}_ut_`)];
}

// Same URL, different database.
export function databaseUrlFor(baseUrl: string, dbName: string): string {
  try {
    const url = new URL(baseUrl);
    url.pathname = `/${encodeURIComponent(dbName)}`;
    return url.toString();
  } catch {
    return dbName;
  }
}

// =============================================================================
// MANAGER
// =============================================================================

export class EnvironmentManager {
  private readonly admin: DatabaseAdmin;
  private readonly runner: CommandRunner;
  private readonly filestore: FilestoreManager;
  private readonly templates: TemplateRecordStore;
  private readonly settings: EnvironmentSettings;
  private readonly now: () => Date;
  private readonly warn: (message: string) => void;

  private templateSession: string | null = null;
  private templatePromise: Promise<string> | null = null;

  constructor(deps: EnvironmentDeps) {
    this.admin = deps.admin;
    this.runner = deps.runner;
    this.filestore = deps.filestore;
    this.templates = deps.templates;
    this.settings = deps.settings;
    this.now = deps.now ?? (() => new Date());
    this.warn = deps.warn ?? ((message) => console.warn(message));
  }

  get sourceDb(): string {
    return this.settings.sourceDb;
  }

  // Memoized per session: concurrent callers await the same creation.
  ensureTemplate(sessionId: string): Promise<string> {
    if (this.templatePromise && this.templateSession === sessionId) {
      return this.templatePromise;
    }

    this.templateSession = sessionId;
    const pending = this.resolveTemplate(sessionId);
    this.templatePromise = pending;
    // A failed creation may be retried by a later caller.
    void pending.catch(() => {
      if (this.templatePromise === pending) this.templatePromise = null;
    });
    return pending;
  }

  async cloneForShard(
    template: string | null,
    dbName: string,
    options: CloneOptions,
  ): Promise<EnvironmentInstance> {
    await this.dropDatabase(dbName);

    if (template === null) {
      if (this.settings.filestoreEnabled) await this.filestore.remove(dbName);
      await this.admin.createDatabase(dbName);
      return { dbName, template: null };
    }

    await this.admin.createDatabase(dbName, template);
    if (!options.withFilestore || !this.settings.filestoreEnabled) {
      return { dbName, template };
    }

    const snapshot = await this.snapshotFilestore(dbName);
    return snapshot.created || snapshot.reason === "already_complete"
      ? { dbName, template, filestorePath: snapshot.path }
      : { dbName, template };
  }

  snapshotFilestore(dbName: string): Promise<SnapshotResult> {
    return this.filestore.snapshot(this.settings.sourceDb, dbName);
  }

  // Never throws; every failure is reported and the sweep continues.
  async cleanupSession(rootName: string, reporter: NonFatalReporter = {}): Promise<CleanupReport> {
    const report: CleanupReport = { databases: [], filestores: [], spared: [] };
    const spare = settle(
      await attempt("cleanup", "Reading the template record failed", () =>
        this.reusableTemplateName(),
      ),
      null,
      reporter,
      { step: "template_record" },
    );

    const listed = await attempt("cleanup", "Listing test databases failed", () =>
      this.admin.listDatabases(cleanupPatterns(rootName)),
    );
    if (!listed.ok) {
      handleFailure(listed.error, reporter, { step: "list_databases" });
    }

    for (const name of listed.ok ? listed.value : []) {
      if (name === spare) {
        report.spared.push(name);
        continue;
      }
      const dropped = await attempt("cleanup", `Dropping ${name} failed`, () =>
        this.dropDatabase(name),
      );
      if (dropped.ok) {
        report.databases.push(name);
      } else {
        handleFailure(dropped.error, reporter, { step: "drop_database", database: name });
      }
    }

    if (this.settings.filestoreEnabled) {
      const removed = await attempt("cleanup", "Removing test filestores failed", () =>
        this.filestore.cleanup(rootName),
      );
      if (removed.ok) {
        report.filestores = removed.value;
      } else {
        handleFailure(removed.error, reporter, { step: "remove_filestores" });
      }
    }

    return report;
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private async resolveTemplate(sessionId: string): Promise<string> {
    const reusable = await this.reusableTemplateName();
    if (reusable !== null) return reusable;

    const name = templateNameFor(this.settings.sourceDb, sessionId);
    await this.dropDatabase(name);
    await this.admin.createDatabase(name);
    await this.restoreInto(name);

    if (this.settings.reuseTemplate) {
      await this.templates.write({ name, created: Math.floor(this.now().getTime() / 1000) });
    }
    return name;
  }

  private async reusableTemplateName(): Promise<string | null> {
    if (!this.settings.reuseTemplate) return null;

    const record = await this.templates.read();
    if (!record) return null;

    const nowSeconds = Math.floor(this.now().getTime() / 1000);
    if (!isTemplateFresh(record, nowSeconds, this.settings.templateTtlSeconds)) return null;

    return (await this.admin.databaseExists(record.name)) ? record.name : null;
  }

  private async restoreInto(target: string): Promise<void> {
    const prefix = this.settings.toolsPrefix;
    const dump = withPrefix(prefix, "pg_dump", [
      "-Fc",
      `--dbname=${databaseUrlFor(this.settings.databaseUrl, this.settings.sourceDb)}`,
    ]);
    const restore = withPrefix(prefix, "pg_restore", [
      "--no-owner",
      `--dbname=${databaseUrlFor(this.settings.databaseUrl, target)}`,
    ]);

    const result = await this.runner.pipe(dump, restore);
    if (result.source.exitCode !== 0) {
      throw new DatabaseError(
        `Dumping ${this.settings.sourceDb} failed (exit ${result.source.exitCode})` +
          tailDetail(result.source.stderr),
        "environment",
      );
    }
    // pg_restore exits 1 when it skipped objects it could not restore; the clone is still usable.
    if (result.sink.exitCode !== 0) {
      this.warn(
        `Warning: pg_restore into ${target} exited ${result.sink.exitCode}` +
          tailDetail(result.sink.stderr),
      );
    }
  }

  private async dropDatabase(name: string): Promise<void> {
    await this.admin.terminateConnections(name);
    await this.admin.dropDatabase(name);
  }
}

function tailDetail(stderr: string): string {
  const detail = stderr.trim().split("\n").slice(-3).join(" ");
  return detail ? `: ${detail}` : "";
}
