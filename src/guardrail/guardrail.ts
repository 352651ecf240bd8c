import { logSessionEvent, type EventSink } from "../core/logger.js";
import { handleFailure } from "../core/failure-policy.js";
import { attempt } from "../core/result.js";
import type { CapacityProbe, CapacitySample } from "../database/postgres.js";

export type GuardrailSettings = {
  connPerShard: number;
  reserve: number;
};

export type GuardrailReporter = {
  events?: EventSink;
  info?: (message: string) => void;
  warn?: (message: string) => void;
};

export function allowedByCapacity(sample: CapacitySample, settings: GuardrailSettings): number {
  const perShard = Math.max(1, Math.floor(settings.connPerShard));
  const free = sample.maxConnections - sample.activeConnections - settings.reserve;
  return Math.max(1, Math.floor(free / perShard));
}

export function capByCapacity(
  requested: number,
  sample: CapacitySample,
  settings: GuardrailSettings,
): number {
  return Math.max(1, Math.min(Math.floor(requested), allowedByCapacity(sample, settings)));
}

// Samples the server on every call; a failed probe leaves the request untouched.
export class ResourceGuardrail {
  constructor(
    private readonly probe: CapacityProbe,
    private readonly settings: GuardrailSettings,
    private readonly reporter: GuardrailReporter = {},
  ) {}

  async capShardCount(requested: number, label = "shards"): Promise<number> {
    const sampled = await attempt("admission", "Database capacity probe failed", () =>
      this.probe.sampleCapacity(),
    );

    if (!sampled.ok) {
      handleFailure(sampled.error, this.reporter, { requested, label });
      return requested;
    }

    const sample = sampled.value;
    const allowed = capByCapacity(requested, sample, this.settings);
    if (allowed < requested) {
      const info = this.reporter.info ?? ((message: string) => console.log(message));
      info(
        `Reducing ${label} from ${requested} to ${allowed} (db max=${sample.maxConnections}, ` +
          `active=${sample.activeConnections}, reserve=${this.settings.reserve}, ` +
          `per_shard=${this.settings.connPerShard})`,
      );
      if (this.reporter.events) {
        logSessionEvent(this.reporter.events, "guardrail_capped", {
          label,
          requested,
          allowed,
          max_connections: sample.maxConnections,
          active_connections: sample.activeConnections,
          reserve: this.settings.reserve,
          per_shard: this.settings.connPerShard,
        });
      }
    }

    return allowed;
  }
}
