import type { ShardlineConfig } from "../../core/config.js";
import type { EventSink } from "../../core/logger.js";
import { EnvironmentManager } from "../../environment/environment-manager.js";
import { FilestoreManager } from "../../environment/filestore.js";
import { ResourceGuardrail } from "../../guardrail/guardrail.js";

import type { OrchestratorPorts } from "./ports.js";

export function createEnvironmentManager(
  config: ShardlineConfig,
  ports: OrchestratorPorts,
): EnvironmentManager {
  return new EnvironmentManager({
    admin: ports.admin,
    runner: ports.runner,
    filestore: new FilestoreManager(config.filestore.root, ports.runner),
    templates: ports.templates,
    settings: {
      sourceDb: config.database.name,
      databaseUrl: config.database.url,
      toolsPrefix: config.database.tools_prefix,
      reuseTemplate: config.template.reuse,
      templateTtlSeconds: config.template.ttl_seconds,
      filestoreEnabled: config.filestore.enabled,
    },
    now: () => ports.clock.now(),
    warn: ports.output.warn,
  });
}

export function createGuardrail(
  config: ShardlineConfig,
  ports: OrchestratorPorts,
  events?: EventSink,
): ResourceGuardrail {
  return new ResourceGuardrail(
    ports.admin,
    { connPerShard: config.database.conn_per_shard, reserve: config.database.conn_reserve },
    { events, info: ports.output.info, warn: ports.output.warn },
  );
}
