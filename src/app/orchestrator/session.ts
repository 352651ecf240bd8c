import fse from "fs-extra";

import { JsonlLogger, logSessionEvent, type EventSink, type JsonObject } from "../../core/logger.js";
import { sessionDir, sessionEventsPath } from "../../core/paths.js";
import type { Phase } from "../../core/phases.js";
import type { PhaseOutcome } from "../../reporting/session-summary.js";
import type { SessionPointer } from "../../state/session-pointers.js";

// =============================================================================
// SESSION
// =============================================================================

export type SessionInit = {
  id: string;
  logRoot: string;
  startedAt: Date;
  echoEvents: boolean;
};

// One run of the orchestrator: its directory, event stream and phase outcomes.
export class Session {
  readonly id: string;
  readonly dir: string;
  readonly startedAt: Date;
  readonly events: EventSink;
  readonly outcomes = new Map<Phase, PhaseOutcome>();

  constructor(init: SessionInit, events?: EventSink) {
    this.id = init.id;
    this.dir = sessionDir(init.logRoot, init.id);
    this.startedAt = init.startedAt;
    fse.ensureDirSync(this.dir);
    this.events =
      events ??
      new JsonlLogger(sessionEventsPath(this.dir), { session: init.id }, { echo: init.echoEvents });
  }

  emit(event: string, fields: JsonObject = {}): void {
    logSessionEvent(this.events, event, fields);
  }

  record(outcome: PhaseOutcome): void {
    this.outcomes.set(outcome.phase, outcome);
  }

  pointer(extra: Partial<SessionPointer> = {}): SessionPointer {
    return {
      session_id: this.id,
      session_dir: this.dir,
      started_at: this.startedAt.toISOString(),
      ...extra,
    };
  }
}
