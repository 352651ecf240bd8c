/*
Static facts about each test phase.
Patterns are stored as sources so every caller builds its own RegExp (no shared lastIndex).
*/

export const PHASES = ["unit", "ui", "integration", "e2e"] as const;
export type Phase = (typeof PHASES)[number];

// Overlapped mode runs each group concurrently, groups in order.
export const PHASE_GROUPS: readonly (readonly Phase[])[] = [
  ["unit", "ui"],
  ["integration", "e2e"],
];

export type PatternSource = {
  source: string;
  flags: string;
};

export type PhaseProfile = {
  phase: Phase;
  tag: string;
  excludeTags: string[];
  testGlobs: string[];
  testPattern: PatternSource;
  subUnitPattern: PatternSource | null;
  autoShards: number;
  timeoutSeconds: number;
  usesTemplate: boolean;
  browser: boolean;
};

const PY_TEST: PatternSource = { source: "^\\s*def\\s+test_", flags: "m" };
const JS_TEST: PatternSource = { source: "\\btest\\s*\\(", flags: "" };
const PY_CLASS: PatternSource = { source: "^class\\s+([A-Za-z_][A-Za-z0-9_]*)\\s*[(:]", flags: "m" };

export const PHASE_PROFILES: Record<Phase, PhaseProfile> = {
  unit: {
    phase: "unit",
    tag: "unit_test",
    excludeTags: [],
    testGlobs: ["**/tests/unit/**/*.py"],
    testPattern: PY_TEST,
    subUnitPattern: PY_CLASS,
    autoShards: 4,
    timeoutSeconds: 600,
    usesTemplate: false,
    browser: false,
  },
  ui: {
    phase: "ui",
    tag: "ui_test",
    excludeTags: [],
    testGlobs: ["static/tests/**/*.test.js"],
    testPattern: JS_TEST,
    subUnitPattern: null,
    autoShards: 2,
    timeoutSeconds: 1200,
    usesTemplate: false,
    browser: true,
  },
  integration: {
    phase: "integration",
    tag: "integration_test",
    excludeTags: [],
    testGlobs: ["**/tests/integration/**/*.py"],
    testPattern: PY_TEST,
    subUnitPattern: PY_CLASS,
    autoShards: 2,
    timeoutSeconds: 900,
    usesTemplate: true,
    browser: false,
  },
  e2e: {
    phase: "e2e",
    tag: "e2e_test",
    excludeTags: ["ui_test"],
    testGlobs: ["**/tests/e2e/**/*.py"],
    testPattern: PY_TEST,
    subUnitPattern: PY_CLASS,
    autoShards: 2,
    timeoutSeconds: 1800,
    usesTemplate: true,
    browser: true,
  },
};

export function isPhase(value: string): value is Phase {
  return PHASES.some((phase) => phase === value);
}

export function toRegExp(pattern: PatternSource, global = true): RegExp {
  const flags = global && !pattern.flags.includes("g") ? `${pattern.flags}g` : pattern.flags;
  return new RegExp(pattern.source, flags);
}

export function countPatternMatches(text: string, pattern: PatternSource): number {
  return text.match(toRegExp(pattern))?.length ?? 0;
}
