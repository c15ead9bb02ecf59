import { Pool } from "pg";
import { RecordKind } from "../types";

export type StoredRecords = Record<string, unknown>;

export interface DocumentStore {
  isAvailable(): Promise<boolean>;
  readRecords(kind: RecordKind, url: string): Promise<StoredRecords | null>;
  writeRecords(kind: RecordKind, url: string, records: StoredRecords): Promise<void>;
}

const TABLES: Record<RecordKind, string> = {
  offers: "offer_documents",
  comments: "comment_documents"
};

function asStoredRecords(input: unknown): StoredRecords {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return {};
  }
  return Object.fromEntries(Object.entries(input));
}

export class Database implements DocumentStore {
  private readonly pool: Pool | null;

  constructor(databaseUrl: string | undefined) {
    this.pool = databaseUrl ? new Pool({ connectionString: databaseUrl }) : null;
  }

  isEnabled(): boolean {
    return this.pool !== null;
  }

  async healthcheck(): Promise<boolean> {
    if (!this.pool) {
      return false;
    }
    try {
      await this.pool.query("select 1");
      return true;
    } catch {
      return false;
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.healthcheck();
  }

  async ensureSchema(): Promise<void> {
    if (!this.pool) {
      return;
    }
    for (const table of Object.values(TABLES)) {
      await this.pool.query(
        `
        create table if not exists ${table} (
          url text primary key,
          records jsonb not null default '{}'::jsonb,
          updated_at timestamptz not null default now()
        )
        `
      );
    }
  }

  async readRecords(kind: RecordKind, url: string): Promise<StoredRecords | null> {
    if (!this.pool) {
      return null;
    }
    const { rows } = await this.pool.query<{ records: unknown }>(
      `select records from ${TABLES[kind]} where url = $1 limit 1`,
      [url]
    );
    const row = rows[0];
    return row ? asStoredRecords(row.records) : null;
  }

  async writeRecords(kind: RecordKind, url: string, records: StoredRecords): Promise<void> {
    if (!this.pool) {
      return;
    }
    await this.pool.query(
      `
      insert into ${TABLES[kind]} (url, records, updated_at)
      values ($1, $2::jsonb, now())
      on conflict (url) do update set
        records = excluded.records,
        updated_at = now()
      `,
      [url, JSON.stringify(records)]
    );
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }
}
