import { readFileSync } from "node:fs";
import pg from "pg";
import type { Pool, PoolConfig } from "pg";
import type { Entry } from "../entries/types.ts";
import type { EntrySink } from "./types.ts";

export type PgPool = Pick<Pool, "query" | "end">;

export const POOL_MIN = 1;
export const POOL_MAX = 4;
export const CONNECT_TIMEOUT_MS = 5000;
export const QUERY_TIMEOUT_MS = 10_000;

export function poolConfig(connectionString: string): PoolConfig {
  return {
    connectionString,
    min: POOL_MIN,
    max: POOL_MAX,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
    query_timeout: QUERY_TIMEOUT_MS,
  };
}

export function loadSchemaSql(): string {
  return readFileSync(new URL("../../sql/schema.sql", import.meta.url), "utf8");
}

const COLUMNS = [
  "row_hash",
  "entry_timestamp",
  "method",
  "path",
  "query",
  "request_headers",
  "request_body",
  "response_status",
  "response_headers",
  "response_body",
  "duration_ms",
  "auth_header",
  "client_ip",
  "user_agent",
  "windows_username",
  "file_extension",
  "operation_type",
  "git_branch",
  "project",
  "editor",
  "platform",
  "event_time",
  "absolute_filepath",
  "event_type",
  "language",
] as const;

const CASTS: Partial<Record<(typeof COLUMNS)[number], string>> = {
  entry_timestamp: "timestamptz",
  query: "jsonb",
  request_headers: "jsonb",
  response_headers: "jsonb",
  event_time: "timestamptz",
};

const INSERT_SQL = `INSERT INTO codetime_entries (${COLUMNS.join(", ")})
VALUES (${COLUMNS.map((c, i) => (CASTS[c] ? `$${i + 1}::${CASTS[c]}` : `$${i + 1}`)).join(", ")})
ON CONFLICT (row_hash) DO NOTHING`;

export function entryRow(entry: Entry): Array<string | number | null> {
  return [
    entry.row_hash,
    entry.timestamp,
    entry.method,
    entry.path,
    JSON.stringify(entry.query),
    JSON.stringify(entry.request_headers),
    entry.request_body,
    entry.response_status,
    JSON.stringify(entry.response_headers),
    entry.response_body,
    entry.duration_ms,
    entry.auth_header,
    entry.client_ip,
    entry.user_agent,
    entry.windows_username,
    entry.file_extension,
    entry.operation_type,
    entry.git_branch,
    entry.project,
    entry.editor,
    entry.platform,
    entry.event_time,
    entry.absolute_filepath,
    entry.event_type,
    entry.language,
  ];
}

export class PgEntrySink implements EntrySink {
  readonly name = "postgres";
  private schemaReady?: Promise<void>;

  constructor(private readonly pool: PgPool, private readonly schemaSql: string = loadSchemaSql()) {}

  static fromUrl(connectionString: string): PgEntrySink {
    const pool = new pg.Pool(poolConfig(connectionString));
    // Idle clients can fail between requests; without a listener that crashes the process.
    pool.on("error", (err) => {
      // eslint-disable-next-line no-console
      console.error(`codetime-proxy: postgres pool error: ${err.message}`);
    });
    return new PgEntrySink(pool);
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.pool.query(this.schemaSql).then(
        () => undefined,
        (err: unknown) => {
          this.schemaReady = undefined;
          throw err;
        }
      );
    }
    return this.schemaReady;
  }

  // A row_hash already stored makes this a no-op.
  async write(entry: Entry): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(INSERT_SQL, entryRow(entry));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
