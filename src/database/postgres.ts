/**
 * PostgreSQL admin access for the guardrail and the environment manager.
 * Only capacity sampling and database lifecycle statements live here; test
 * data is never read or written through this connection.
 */

import pg from "pg";

import type { DatabaseConfig } from "../core/config.js";

const { Pool } = pg;

// =============================================================================
// PORTS
// =============================================================================

export type CapacitySample = {
  maxConnections: number;
  activeConnections: number;
};

export interface CapacityProbe {
  sampleCapacity(): Promise<CapacitySample>;
}

export interface DatabaseAdmin extends CapacityProbe {
  databaseExists(name: string): Promise<boolean>;
  // Names matching any of the LIKE patterns, sorted.
  listDatabases(likePatterns: string[]): Promise<string[]>;
  terminateConnections(name: string): Promise<void>;
  dropDatabase(name: string): Promise<void>;
  createDatabase(name: string, template?: string | null): Promise<void>;
  close(): Promise<void>;
}

// =============================================================================
// SQL HELPERS
// =============================================================================

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// Escapes LIKE wildcards so "app_test_%" only matches the literal prefix.
export function likePrefix(prefix: string): string {
  return `${prefix.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

function toCount(value: unknown): number {
  const parsed = typeof value === "number" ? value : Number.parseInt(String(value), 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

// =============================================================================
// POSTGRES
// =============================================================================

export class PgDatabaseAdmin implements DatabaseAdmin {
  private pool: pg.Pool | null = null;

  constructor(private readonly config: Pick<DatabaseConfig, "url">) {}

  async sampleCapacity(): Promise<CapacitySample> {
    const max = await this.query<{ max_connections: string }>("SHOW max_connections");
    const active = await this.query<{ count: string }>(
      "SELECT count(*)::text AS count FROM pg_stat_activity",
    );
    return {
      maxConnections: toCount(max.rows[0]?.max_connections),
      activeConnections: toCount(active.rows[0]?.count),
    };
  }

  async databaseExists(name: string): Promise<boolean> {
    const result = await this.query("SELECT 1 FROM pg_database WHERE datname = $1", [name]);
    return (result.rowCount ?? 0) > 0;
  }

  async listDatabases(likePatterns: string[]): Promise<string[]> {
    if (likePatterns.length === 0) return [];
    const clauses = likePatterns.map((_, index) => `datname LIKE $${index + 1}`).join(" OR ");
    const result = await this.query<{ datname: string }>(
      `SELECT datname FROM pg_database WHERE ${clauses} ORDER BY datname`,
      likePatterns,
    );
    return result.rows.map((row) => row.datname);
  }

  async terminateConnections(name: string): Promise<void> {
    await this.query(
      "SELECT pg_terminate_backend(pid) FROM pg_stat_activity WHERE datname = $1 AND pid <> pg_backend_pid()",
      [name],
    );
  }

  async dropDatabase(name: string): Promise<void> {
    await this.query(`DROP DATABASE IF EXISTS ${quoteIdentifier(name)}`);
  }

  async createDatabase(name: string, template?: string | null): Promise<void> {
    const suffix = template ? ` TEMPLATE ${quoteIdentifier(template)}` : "";
    await this.query(`CREATE DATABASE ${quoteIdentifier(name)}${suffix}`);
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    await pool.end();
  }

  private async query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<pg.QueryResult<R>> {
    return this.getPool().query<R>(text, params);
  }

  private getPool(): pg.Pool {
    if (!this.pool) {
      // Admin statements are serial; two connections cover a concurrent probe.
      this.pool = new Pool({ connectionString: this.config.url, max: 2 });
      this.pool.on("error", (error) => {
        console.warn(`Warning: database admin connection error: ${error.message}`);
      });
    }
    return this.pool;
  }
}
