// =============================================================================
// COUNTERS
// =============================================================================

export type TestCounters = {
  tests_run: number;
  failures: number;
  errors: number;
  skips: number;
};

export function emptyCounters(): TestCounters {
  return { tests_run: 0, failures: 0, errors: 0, skips: 0 };
}

export function addCounters(a: TestCounters, b: TestCounters): TestCounters {
  return {
    tests_run: a.tests_run + b.tests_run,
    failures: a.failures + b.failures,
    errors: a.errors + b.errors,
    skips: a.skips + b.skips,
  };
}

const RAN_TESTS = /Ran (\d+) tests?/;
const SKIPPED = /skipped=(\d+)/;

// Returns true when the line moved any counter.
export function applyLine(counters: TestCounters, line: string): boolean {
  let changed = false;

  const ran = RAN_TESTS.exec(line);
  if (ran?.[1] !== undefined) {
    const value = Number.parseInt(ran[1], 10);
    if (value !== counters.tests_run) changed = true;
    counters.tests_run = value;
  }
  if (line.startsWith("FAIL:")) {
    counters.failures += 1;
    changed = true;
  }
  if (line.startsWith("ERROR:")) {
    counters.errors += 1;
    changed = true;
  }
  const skipped = SKIPPED.exec(line);
  if (skipped?.[1] !== undefined) {
    counters.skips += Number.parseInt(skipped[1], 10);
    changed = true;
  }

  return changed;
}

// =============================================================================
// REPETITION
// =============================================================================

export const WINDOW_SIZE = 20;
export const MIN_OCCURRENCES = 5;
export const MIN_RATIO = 0.7;
const MIN_PATTERN_LENGTH = 20;

export function normalizeLine(line: string): string {
  return line
    .replace(/\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d{3}/g, "[TIMESTAMP]")
    .replace(/\b\d{1,3}(?:\.\d{1,3}){3}\b/g, "[IP]")
    .replace(/\d+\.\d+(?:-\d+)?/g, "[VERSION]")
    .replace(/\b\d+\b/g, "[NUM]")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

export function detectRepetition(window: string[]): string | null {
  if (window.length < MIN_OCCURRENCES) return null;

  const normalized = window.map(normalizeLine);
  const counts = new Map<string, number>();
  for (const pattern of normalized) {
    if (pattern.length <= MIN_PATTERN_LENGTH) continue;
    counts.set(pattern, (counts.get(pattern) ?? 0) + 1);
  }

  let top: string | null = null;
  let topCount = 0;
  for (const [pattern, count] of counts) {
    if (count > topCount) {
      top = pattern;
      topCount = count;
    }
  }
  if (top === null) return null;

  const ratio = topCount / normalized.length;
  if (topCount < MIN_OCCURRENCES || ratio <= MIN_RATIO) return null;

  const index = normalized.indexOf(top);
  const raw = window[index] ?? "";
  const sample = raw.length > 100 ? `${raw.slice(0, 100)}...` : raw;
  return `Repetitive pattern detected (${topCount} times, ${(ratio * 100).toFixed(1)}%): ${sample}`;
}

// =============================================================================
// MONITOR
// =============================================================================

export type OutputMonitorOptions = {
  stallThresholdMs: number;
  now?: () => number;
};

// Tracks counters line by line; once counters have not moved for longer than the
// stall threshold, the recent window is checked for a dominating repeated line.
export class OutputMonitor {
  readonly counters: TestCounters = emptyCounters();
  repetitivePattern: string | null = null;

  private readonly window: string[] = [];
  private readonly now: () => number;
  private lastProgress: number;

  constructor(private readonly options: OutputMonitorOptions) {
    this.now = options.now ?? (() => Date.now());
    this.lastProgress = this.now();
  }

  push(line: string): void {
    const at = this.now();
    if (applyLine(this.counters, line)) {
      this.lastProgress = at;
    }

    this.window.push(line);
    if (this.window.length > WINDOW_SIZE) this.window.shift();

    if (at - this.lastProgress > this.options.stallThresholdMs) {
      const detected = detectRepetition(this.window);
      if (detected !== null) this.repetitivePattern = detected;
    }
  }
}
