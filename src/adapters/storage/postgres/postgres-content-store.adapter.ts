// =============================================================================
// PostgreSQL Content Store — Implements ContentStorePort
// =============================================================================
//
// Table: stored_content (token TEXT PK, text TEXT, created_at TIMESTAMPTZ)
//
// Usage:
//   const store = new PostgresContentStore({ connectionString: '...' })
//   await store.initialize() // creates table if not exists
//
// =============================================================================

import { randomUUID } from "node:crypto";
import pg from "pg";
import type { Pool } from "pg";
import type { ContentStorePort } from "../../../ports/content-store.port.js";
import { NotFoundError, StorageError, errorMessage } from "../../../errors.js";
import { fail, ok, type Result } from "../../../result.js";
import type { StoredContent } from "../../../types.js";

export interface PostgresContentStoreOptions {
  /** PostgreSQL connection string */
  connectionString: string;
  /** Table name (default: 'stored_content') */
  tableName?: string;
  /** Schema name (default: 'public') */
  schema?: string;
  /** Pool size (default: 10) */
  poolSize?: number;
  /** Clock used for created_at (default: wall clock) */
  now?: () => Date;
}

type ContentRow = {
  token: string;
  text: string;
  created_at: Date | string;
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(kind: string, value: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new StorageError(`Invalid ${kind} name: "${value}"`);
  }
  return value;
}

function toStoredContent(row: ContentRow): StoredContent {
  return {
    token: row.token,
    text: row.text,
    createdAt: row.created_at instanceof Date ? row.created_at : new Date(row.created_at),
  };
}

export class PostgresContentStore implements ContentStorePort {
  private pool: Pool | null = null;
  private readonly tableName: string;
  private readonly table: string;
  private readonly options: PostgresContentStoreOptions;
  private readonly now: () => Date;

  constructor(options: PostgresContentStoreOptions) {
    this.options = options;
    this.tableName = assertIdentifier("table", options.tableName ?? "stored_content");
    const schema = assertIdentifier("schema", options.schema ?? "public");
    this.table = `${schema}.${this.tableName}`;
    this.now = options.now ?? (() => new Date());
  }

  /** Initialize the adapter — creates table and index if not exists */
  async initialize(): Promise<void> {
    const pool = new pg.Pool({
      connectionString: this.options.connectionString,
      max: this.options.poolSize ?? 10,
    });

    try {
      await pool.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          token TEXT PRIMARY KEY,
          text TEXT NOT NULL,
          created_at TIMESTAMPTZ NOT NULL
        )
      `);
      await pool.query(`
        CREATE INDEX IF NOT EXISTS idx_${this.tableName}_created_at
        ON ${this.table} (created_at)
      `);
    } catch (err) {
      await pool.end();
      throw new StorageError(`Failed to initialize ${this.table}: ${errorMessage(err)}`, err);
    }
    this.pool = pool;
  }

  private requirePool(): Pool {
    if (!this.pool) throw new StorageError("Content store is not initialized");
    return this.pool;
  }

  async insert(text: string): Promise<Result<string, StorageError>> {
    const token = randomUUID();
    try {
      await this.requirePool().query(
        `INSERT INTO ${this.table} (token, text, created_at) VALUES ($1, $2, $3)`,
        [token, text, this.now()],
      );
      return ok(token);
    } catch (err) {
      return fail(toStorageError("insert", err));
    }
  }

  async get(token: string): Promise<Result<StoredContent, NotFoundError | StorageError>> {
    try {
      const result = await this.requirePool().query<ContentRow>(
        `SELECT token, text, created_at FROM ${this.table} WHERE token = $1`,
        [token],
      );
      const row = result.rows[0];
      if (!row) return fail(new NotFoundError(token));
      return ok(toStoredContent(row));
    } catch (err) {
      return fail(toStorageError("get", err));
    }
  }

  async purgeOlderThan(cutoff: Date): Promise<Result<number, StorageError>> {
    try {
      const result = await this.requirePool().query(
        `DELETE FROM ${this.table} WHERE created_at < $1`,
        [cutoff],
      );
      return ok(result.rowCount ?? 0);
    } catch (err) {
      return fail(toStorageError("purge", err));
    }
  }

  /** Close the pool */
  async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (pool) await pool.end();
  }
}

function toStorageError(operation: string, err: unknown): StorageError {
  if (err instanceof StorageError) return err;
  return new StorageError(`Content store ${operation} failed: ${errorMessage(err)}`, err);
}
