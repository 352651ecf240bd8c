import { sha1Hex } from "../core/utils.js";

export type FailureType = "fail" | "error" | "ui_fail";

export type FailureEntry = {
  type: FailureType;
  test: string | null;
  message: string;
  traceback?: string;
  fingerprint: string;
};

export function fingerprintOf(text: string): string {
  return sha1Hex(text, 16);
}

function withFingerprint(entry: Omit<FailureEntry, "fingerprint">): FailureEntry {
  const basis = entry.traceback ?? `${entry.test ?? ""}\n${entry.message}`;
  return { ...entry, fingerprint: fingerprintOf(basis) };
}

const TRACEBACK_START = "Traceback (most recent call last):";
const UI_FAILURE = /\[HOOT\] Test "(.+?)" failed:/;
const LOG_TIMESTAMP = /^\d{4}-\d{2}-\d{2} /;

type PendingHeader = {
  type: "fail" | "error";
  test: string;
};

type UiBlock = {
  test: string;
  lines: string[];
};

// Line-oriented scan of an engine log: unittest headers and tracebacks, plus
// browser-suite failure blocks. A traceback ends at the first blank line.
export function parseFailures(text: string): FailureEntry[] {
  const entries: FailureEntry[] = [];
  const uiEntries: FailureEntry[] = [];

  let header: PendingHeader | null = null;
  let traceback: string[] | null = null;
  let ui: UiBlock | null = null;

  const flushHeader = (): void => {
    if (header) {
      entries.push(withFingerprint({ type: header.type, test: header.test, message: "" }));
      header = null;
    }
  };

  const flushTraceback = (): void => {
    if (!traceback) return;
    const body = traceback.join("\n");
    const message = [...traceback].reverse().find((line) => line.length > 0) ?? "";
    entries.push(
      withFingerprint({
        type: header?.type ?? "error",
        test: header?.test ?? null,
        message: traceback.length > 1 ? message : "",
        traceback: body,
      }),
    );
    header = null;
    traceback = null;
  };

  const flushUi = (): void => {
    if (!ui) return;
    uiEntries.push(
      withFingerprint({ type: "ui_fail", test: ui.test, message: ui.lines.join("\n").trim() }),
    );
    ui = null;
  };

  for (const raw of text.split("\n")) {
    const line = raw.trim();

    if (line.startsWith(TRACEBACK_START)) {
      flushTraceback();
      traceback = [line];
      continue;
    }
    if (traceback) {
      if (line === "") {
        flushTraceback();
      } else {
        traceback.push(line);
      }
      continue;
    }

    const uiMatch = UI_FAILURE.exec(line);
    if (uiMatch?.[1] !== undefined) {
      flushUi();
      ui = { test: uiMatch[1], lines: [line] };
      continue;
    }
    if (ui) {
      if (LOG_TIMESTAMP.test(line)) {
        flushUi();
      } else {
        ui.lines.push(line);
      }
    }

    const lowered = line.toLowerCase();
    if (lowered.startsWith("fail:") || lowered.startsWith("error:")) {
      const [head = "", ...rest] = line.split(/\s+/);
      const test = rest.join(" ");
      if (!test.toLowerCase().includes("test")) continue;
      flushHeader();
      header = { type: head.toLowerCase().startsWith("fail") ? "fail" : "error", test };
    }
  }

  flushTraceback();
  flushHeader();
  flushUi();

  return [...entries, ...uiEntries];
}

// Merges entries by fingerprint, keeping the first occurrence.
export function dedupeFailures(entries: Iterable<FailureEntry>): FailureEntry[] {
  const seen = new Map<string, FailureEntry>();
  for (const entry of entries) {
    if (!seen.has(entry.fingerprint)) seen.set(entry.fingerprint, entry);
  }
  return [...seen.values()];
}
