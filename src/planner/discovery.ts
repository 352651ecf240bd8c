import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import { minimatch } from "minimatch";

import {
  PHASE_PROFILES,
  countPatternMatches,
  toRegExp,
  type Phase,
  type PhaseProfile,
} from "../core/phases.js";
import type { ShardlineConfig } from "../core/config.js";
import { compareStrings } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type SubUnit = {
  scopeId: string;
  subUnitId: string;
  weight: number;
};

export type Scope = {
  id: string;
  phase: Phase;
  root: string;
  // Relative to `root`, sorted.
  testFiles: string[];
  subUnits?: SubUnit[];
};

export type DiscoveryOptions = {
  scopesDir: string;
  marker: string;
  ignorePatterns: string[];
  include?: string[];
  exclude?: string[];
};

// Global filters only; per-phase include/exclude are applied by the planner.
export function discoveryOptionsFor(config: ShardlineConfig): DiscoveryOptions {
  return {
    scopesDir: config.scopes_dir,
    marker: config.scope_marker,
    ignorePatterns: config.ignore_scope_patterns,
    include: config.include,
    exclude: config.exclude,
  };
}

// =============================================================================
// FILTERS
// =============================================================================

// Entries are exact scope ids or minimatch globs.
export function matchesAny(scopeId: string, patterns: string[]): boolean {
  return patterns.some((pattern) => pattern === scopeId || minimatch(scopeId, pattern));
}

export function filterScopeIds(ids: string[], include: string[], exclude: string[]): string[] {
  return ids.filter((id) => {
    if (include.length > 0 && !matchesAny(id, include)) return false;
    return !matchesAny(id, exclude);
  });
}

// =============================================================================
// DISCOVERY
// =============================================================================

export async function listScopeIds(options: DiscoveryOptions): Promise<string[]> {
  if (!(await fse.pathExists(options.scopesDir))) return [];

  const markers = await fg(`*/${options.marker}`, {
    cwd: options.scopesDir,
    onlyFiles: true,
    dot: false,
  });

  const ids = markers
    .map((marker) => marker.split("/")[0])
    .filter((id): id is string => typeof id === "string" && id.length > 0)
    .filter((id) => !matchesAny(id, options.ignorePatterns));

  const unique = [...new Set(ids)].sort(compareStrings);
  return filterScopeIds(unique, options.include ?? [], options.exclude ?? []);
}

export async function findPhaseTestFiles(root: string, profile: PhaseProfile): Promise<string[]> {
  const files = await fg(profile.testGlobs, {
    cwd: root,
    onlyFiles: true,
    ignore: ["**/node_modules/**", "**/__pycache__/**"],
  });
  return files.sort(compareStrings);
}

// Scopes with phase test files; when no scope has any, every scope runs so the
// engine's own tag filtering still gets a chance.
export async function discoverPhaseScopes(phase: Phase, options: DiscoveryOptions): Promise<Scope[]> {
  const profile = PHASE_PROFILES[phase];
  const ids = await listScopeIds(options);

  const scopes = await Promise.all(
    ids.map(async (id): Promise<Scope> => {
      const root = path.join(options.scopesDir, id);
      return { id, phase, root, testFiles: await findPhaseTestFiles(root, profile) };
    }),
  );

  const withTests = scopes.filter((scope) => scope.testFiles.length > 0);
  return withTests.length > 0 ? withTests : scopes;
}

// =============================================================================
// SUB-UNITS
// =============================================================================

type ClassSpan = {
  name: string;
  start: number;
};

// Weight of a class = test definitions between its header and the next top-level class.
export function subUnitsInSource(scopeId: string, source: string, profile: PhaseProfile): SubUnit[] {
  if (!profile.subUnitPattern) return [];

  const spans: ClassSpan[] = [];
  for (const match of source.matchAll(toRegExp(profile.subUnitPattern))) {
    const name = match[1];
    if (name !== undefined && match.index !== undefined) {
      spans.push({ name, start: match.index });
    }
  }

  return spans.map((span, index) => {
    const end = spans[index + 1]?.start ?? source.length;
    const body = source.slice(span.start, end);
    return {
      scopeId,
      subUnitId: span.name,
      weight: Math.max(1, countPatternMatches(body, profile.testPattern)),
    };
  });
}

export async function discoverSubUnits(scope: Scope): Promise<SubUnit[]> {
  const profile = PHASE_PROFILES[scope.phase];
  const byName = new Map<string, SubUnit>();

  for (const file of scope.testFiles) {
    let source: string;
    try {
      source = await fse.readFile(path.join(scope.root, file), "utf8");
    } catch {
      continue;
    }

    for (const unit of subUnitsInSource(scope.id, source, profile)) {
      const existing = byName.get(unit.subUnitId);
      byName.set(
        unit.subUnitId,
        existing ? { ...existing, weight: existing.weight + unit.weight } : unit,
      );
    }
  }

  return [...byName.values()].sort((a, b) => compareStrings(a.subUnitId, b.subUnitId));
}
