/**
 * Database access using Knex.js against PostgreSQL.
 *
 * Every caller gets its own short-lived session: a Knex instance with a
 * single-connection pool that is destroyed when the caller is done. There is
 * no process-wide pool and no reuse across requests.
 */

import { knex, type Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import { z } from 'zod';
import type { QueryParams, Row } from '../types/models.js';
import { bindNamedParams } from './bindings.js';

/**
 * Column metadata as reported by the catalog.
 */
export interface CatalogColumn {
  name: string;
  dataType: string;
  maxLength: number | null;
  numericPrecision: number | null;
  numericScale: number | null;
  nullable: boolean;
}

/**
 * Rows and column order returned by a statement.
 */
export interface StatementResult {
  rows: Row[];
  columnNames: string[];
}

/**
 * One open connection to the database.
 */
export interface DatabaseSession {
  /** User tables in the public schema, in catalog order. */
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<CatalogColumn[]>;
  execute(sql: string, params?: QueryParams): Promise<StatementResult>;
  close(): Promise<void>;
}

export type SessionFactory = (connectionString: string) => DatabaseSession;

/**
 * Column fields read from knex-schema-inspector.
 */
export interface InspectedColumn {
  name: string;
  data_type: string;
  max_length: number | null;
  numeric_precision: number | null;
  numeric_scale: number | null;
  is_nullable: boolean;
}

/**
 * The part of knex-schema-inspector a session reads the catalog through.
 */
export interface CatalogInspector {
  tables(): Promise<string[]>;
  columnInfo(table: string): Promise<InspectedColumn[]>;
}

/**
 * A pooled pg connection. Statements go to it directly so the text reaches
 * the server unchanged.
 */
export interface PgConnection {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

const PgResultSchema = z.object({
  rows: z.array(z.record(z.unknown())).default([]),
  fields: z.array(z.object({ name: z.string() })).optional(),
});

/**
 * Rows and column order from a pg result. The simple query protocol answers
 * a multi-statement string with one result per statement, which is refused.
 */
export function readPgResult(result: unknown): StatementResult {
  if (Array.isArray(result)) {
    throw new Error(
      `Expected a single statement, but the query returned ${result.length} result sets`
    );
  }

  const { rows, fields } = PgResultSchema.parse(result);
  const columnNames = fields ? fields.map((field) => field.name) : Object.keys(rows[0] ?? {});
  return { rows, columnNames };
}

/**
 * Knex-backed session. Knex connects lazily, so constructing one does no I/O.
 */
export class KnexSession implements DatabaseSession {
  private readonly db: Knex;
  private readonly inspector: CatalogInspector;

  constructor(db: Knex, inspector: CatalogInspector = SchemaInspector(db)) {
    this.db = db;
    this.inspector = inspector;
  }

  async listTables(): Promise<string[]> {
    return this.inspector.tables();
  }

  async listColumns(table: string): Promise<CatalogColumn[]> {
    const columns = await this.inspector.columnInfo(table);

    return columns.map((col) => ({
      name: col.name,
      dataType: col.data_type,
      maxLength: col.max_length,
      numericPrecision: col.numeric_precision,
      numericScale: col.numeric_scale,
      nullable: col.is_nullable,
    }));
  }

  /**
   * Run one statement on the session's connection. Values in `params` are
   * bound to `:name` placeholders as `$n`; they are never spliced into the
   * SQL text. Knex's own `raw` is bypassed because it rewrites every `?`.
   */
  async execute(sql: string, params?: QueryParams): Promise<StatementResult> {
    const { text, values } = bindNamedParams(sql, params);
    const connection: PgConnection = await this.db.client.acquireConnection();

    try {
      const result = await connection.query(text, values);
      return readPgResult(result);
    } finally {
      await this.db.client.releaseConnection(connection);
    }
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}

export const openKnexSession: SessionFactory = (connectionString) =>
  new KnexSession(
    knex({
      client: 'pg',
      connection: connectionString,
      pool: { min: 0, max: 1 },
    })
  );

/**
 * Open a session, hand it to `fn`, and close it on every exit path.
 */
export async function withSession<T>(
  openSession: SessionFactory,
  connectionString: string,
  fn: (session: DatabaseSession) => Promise<T>
): Promise<T> {
  const session = openSession(connectionString);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
