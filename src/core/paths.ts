import path from "node:path";

import type { Phase } from "./phases.js";

// =============================================================================
// LOG ROOT
// =============================================================================

export function weightsPath(logRoot: string): string {
  return path.join(logRoot, "weights.json");
}

export function templateRecordPath(logRoot: string): string {
  return path.join(logRoot, "template.json");
}

export function currentPointerPath(logRoot: string): string {
  return path.join(logRoot, "current.json");
}

export function latestPointerPath(logRoot: string): string {
  return path.join(logRoot, "latest.json");
}

export function latestLinkPath(logRoot: string): string {
  return path.join(logRoot, "latest");
}

export function sessionDir(logRoot: string, sessionId: string): string {
  return path.join(logRoot, sessionId);
}

// =============================================================================
// SESSION
// =============================================================================

export function phaseDir(sessionDirPath: string, phase: Phase): string {
  return path.join(sessionDirPath, phase);
}

export function sessionEventsPath(sessionDirPath: string): string {
  return path.join(sessionDirPath, "events.ndjson");
}

export function sessionSummaryPath(sessionDirPath: string): string {
  return path.join(sessionDirPath, "summary.json");
}

export function weightsAppliedMarkerPath(sessionDirPath: string): string {
  return path.join(sessionDirPath, ".weights_applied");
}

export type ShardArtifactPaths = {
  log: string;
  summary: string;
  junit: string;
};

export function shardArtifactPaths(
  sessionDirPath: string,
  phase: Phase,
  baseName: string,
): ShardArtifactPaths {
  const dir = phaseDir(sessionDirPath, phase);
  return {
    log: path.join(dir, `${baseName}.log`),
    summary: path.join(dir, `${baseName}.summary.json`),
    junit: path.join(dir, `${baseName}.junit.xml`),
  };
}

// =============================================================================
// FILESTORE
// =============================================================================

export function filestorePath(filestoreRoot: string, dbName: string): string {
  return path.join(filestoreRoot, dbName);
}
