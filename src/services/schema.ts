/**
 * Schema introspection for prompt grounding.
 *
 * `fetch()` never throws: when the database is not configured or cannot be
 * read, the built-in description of the `cars` table is returned as a
 * `fallback` outcome so the pipeline always has some schema context.
 */

import {
  column,
  table,
  type ColumnDescriptor,
  type SchemaDescriptor,
  type TableDescriptor,
} from '../types/models.js';
import {
  errorMessage,
  fellBack,
  succeeded,
  type Recoverable,
} from '../types/utils.js';
import type { Logger } from '../utils/logger.js';
import {
  openKnexSession,
  withSession,
  type CatalogColumn,
  type DatabaseSession,
  type SessionFactory,
} from './database.js';

/**
 * Table described by the fallback schema, and queried by the fallback SQL.
 */
export const FALLBACK_TABLE = 'cars';

/**
 * Fixed schema used whenever the live catalog is unavailable. Each call
 * builds a new descriptor, so no request sees another's copy.
 */
export function fallbackSchema(): SchemaDescriptor {
  return new Map([
    [
      FALLBACK_TABLE,
      table([
        column('id', 'integer', false),
        column('model', 'varchar(50)', false),
        column('mpg', 'numeric(5,1)', true),
        column('cyl', 'integer', true),
        column('disp', 'numeric(6,1)', true),
        column('hp', 'integer', true),
        column('drat', 'numeric(4,2)', true),
        column('wt', 'numeric(5,3)', true),
        column('qsec', 'numeric(5,2)', true),
        column('vs', 'integer', true),
        column('am', 'integer', true),
        column('gear', 'integer', true),
        column('carb', 'integer', true),
      ]),
    ],
  ]);
}

const CHARACTER_TYPES: Record<string, string> = {
  'character varying': 'varchar',
  varchar: 'varchar',
  character: 'char',
  char: 'char',
  bpchar: 'char',
};

/**
 * Render a catalog column type the way a DDL statement would spell it.
 */
export function typeLabel(col: CatalogColumn): string {
  const dataType = col.dataType.toLowerCase();

  const charType = CHARACTER_TYPES[dataType];
  if (charType && col.maxLength !== null) {
    return `${charType}(${col.maxLength})`;
  }

  if ((dataType === 'numeric' || dataType === 'decimal') && col.numericPrecision !== null) {
    return `numeric(${col.numericPrecision},${col.numericScale ?? 0})`;
  }

  return col.dataType;
}

export interface SchemaProviderOptions {
  databaseUrl?: string;
  logger: Logger;
  openSession?: SessionFactory;
}

/**
 * Reads table and column descriptions from the database catalog.
 */
export class SchemaProvider {
  private readonly databaseUrl?: string;
  private readonly logger: Logger;
  private readonly openSession: SessionFactory;

  constructor(options: SchemaProviderOptions) {
    this.databaseUrl = options.databaseUrl;
    this.logger = options.logger;
    this.openSession = options.openSession ?? openKnexSession;
  }

  async fetch(): Promise<Recoverable<SchemaDescriptor>> {
    if (!this.databaseUrl) {
      this.logger.warn('DATABASE_URL not set, using built-in schema');
      return fellBack(fallbackSchema(), 'DATABASE_URL not set');
    }

    try {
      const schema = await withSession(this.openSession, this.databaseUrl, (session) =>
        this.readCatalog(session)
      );
      this.logger.debug(`Read schema for ${schema.size} tables`);
      return succeeded(schema);
    } catch (error) {
      const reason = `Error fetching database schema: ${errorMessage(error)}`;
      this.logger.warn(`${reason}; using built-in schema`);
      return fellBack(fallbackSchema(), reason);
    }
  }

  /**
   * Tables and columns are read one after another on the single connection,
   * keeping catalog order.
   */
  private async readCatalog(session: DatabaseSession): Promise<SchemaDescriptor> {
    const schema = new Map<string, TableDescriptor>();

    for (const tableName of await session.listTables()) {
      const columns: ColumnDescriptor[] = (await session.listColumns(tableName)).map((col) =>
        column(col.name, typeLabel(col), col.nullable)
      );
      schema.set(tableName, table(columns));
    }

    return schema;
  }
}
