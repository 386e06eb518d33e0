import pino from 'pino';
import { vi } from 'vitest';
import type { LLMConfig } from '../src/config.js';
import type { Services } from '../src/server.js';
import type { CatalogColumn, DatabaseSession } from '../src/services/database.js';
import { QueryExecutor } from '../src/services/executor.js';
import { ResultFormatter } from '../src/services/formatter.js';
import {
  TranslationClient,
  type TextGenerationRequest,
  type TextGenerationResponse,
} from '../src/services/llm.js';
import { SchemaProvider } from '../src/services/schema.js';
import { Translator } from '../src/services/translator.js';
import type { QueryParams, Row } from '../src/types/models.js';

export const testLogger = pino({ level: 'silent' });

export const testLLMConfig: LLMConfig = {
  provider: 'openai',
  model: 'gpt-4',
  apiKey: 'test-secret',
};

export function catalogColumn(
  name: string,
  dataType: string,
  extra: Partial<Omit<CatalogColumn, 'name' | 'dataType'>> = {}
): CatalogColumn {
  return {
    name,
    dataType,
    maxLength: null,
    numericPrecision: null,
    numericScale: null,
    nullable: true,
    ...extra,
  };
}

export interface FakeSessionOptions {
  tables?: Record<string, CatalogColumn[]>;
  rows?: Row[];
  columnNames?: string[];
  error?: unknown;
}

/**
 * In-memory DatabaseSession. `error`, when set, is thrown by every query.
 */
export class FakeSession implements DatabaseSession {
  readonly executed: Array<{ sql: string; params?: QueryParams }> = [];
  closed = false;

  constructor(private readonly options: FakeSessionOptions = {}) {}

  async listTables(): Promise<string[]> {
    if (this.options.error !== undefined) {
      throw this.options.error;
    }
    return Object.keys(this.options.tables ?? {});
  }

  async listColumns(table: string): Promise<CatalogColumn[]> {
    if (this.options.error !== undefined) {
      throw this.options.error;
    }
    return this.options.tables?.[table] ?? [];
  }

  async execute(sql: string, params?: QueryParams) {
    this.executed.push({ sql, params });
    if (this.options.error !== undefined) {
      throw this.options.error;
    }
    const rows = this.options.rows ?? [];
    return { rows, columnNames: this.options.columnNames ?? Object.keys(rows[0] ?? {}) };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function sessionFactory(session: DatabaseSession) {
  return vi.fn((_connectionString: string) => session);
}

/**
 * Stand-in for the model call that always answers with `text`.
 */
export function fakeGenerator(text: string) {
  return vi.fn(
    async (_request: TextGenerationRequest): Promise<TextGenerationResponse> => ({
      text,
      usage: { inputTokens: 120, outputTokens: 30 },
    })
  );
}

/**
 * Error carrying a driver code, the way pg reports SQLSTATE and socket failures.
 */
export function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

export interface TestServicesOptions {
  databaseUrl?: string;
  session?: FakeSession;
  response?: string;
  /** Leave the model API key unset. */
  withoutApiKey?: boolean;
}

/**
 * Real services wired to an in-memory database and a canned model response.
 */
export function buildTestServices(options: TestServicesOptions = {}): Services {
  const openSession = sessionFactory(options.session ?? new FakeSession());
  const llm: LLMConfig =
    options.withoutApiKey ? { provider: 'openai', model: 'gpt-4' } : testLLMConfig;
  const client = new TranslationClient({
    llm,
    logger: testLogger,
    generate: fakeGenerator(options.response ?? 'SQL: SELECT 1;\nEXPLANATION: One.\nCONFIDENCE: 0.9'),
  });
  const schemaProvider = new SchemaProvider({
    databaseUrl: options.databaseUrl,
    logger: testLogger,
    openSession,
  });

  return {
    translator: new Translator({ schemaProvider, client, logger: testLogger }),
    executor: new QueryExecutor({ databaseUrl: options.databaseUrl, logger: testLogger, openSession }),
    formatter: new ResultFormatter(testLogger),
  };
}
