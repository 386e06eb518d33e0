/**
 * SQL execution against PostgreSQL.
 *
 * The statement text is run as given. Caller-supplied values only ever
 * travel through `params` as named bindings.
 */

import type {
  ExecutionRequest,
  ExecutionResult,
  QueryError,
  QueryErrorKind,
} from '../types/models.js';
import { errorMessage, failed, succeeded, type Fallible } from '../types/utils.js';
import type { Logger } from '../utils/logger.js';
import { openKnexSession, withSession, type SessionFactory } from './database.js';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  // admin_shutdown, crash_shutdown, cannot_connect_now
  '57P01',
  '57P02',
  '57P03',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a driver error to a QueryError using its SQLSTATE or socket code.
 */
export function classifyQueryError(error: unknown): QueryError {
  const code = errorCode(error);
  const message = errorMessage(error);

  let kind: QueryErrorKind = 'Other';
  if (code !== undefined) {
    if (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08')) {
      kind = 'ConnectionError';
    } else if (code.startsWith('42')) {
      // syntax_error_or_access_rule_violation: bad syntax, unknown table or column
      kind = 'SyntaxError';
    } else if (code.startsWith('23')) {
      kind = 'ConstraintViolation';
    }
  }

  return { kind, message };
}

export interface QueryExecutorOptions {
  databaseUrl?: string;
  logger: Logger;
  openSession?: SessionFactory;
}

/**
 * Runs one statement per call on its own connection.
 */
export class QueryExecutor {
  private readonly databaseUrl?: string;
  private readonly logger: Logger;
  private readonly openSession: SessionFactory;

  constructor(options: QueryExecutorOptions) {
    this.databaseUrl = options.databaseUrl;
    this.logger = options.logger;
    this.openSession = options.openSession ?? openKnexSession;
  }

  async execute(request: ExecutionRequest): Promise<Fallible<ExecutionResult, QueryError>> {
    if (!this.databaseUrl) {
      return failed({ kind: 'ConnectionError', message: 'Database connection not configured' });
    }

    this.logger.debug(`Executing query: ${request.sqlQuery}`);

    try {
      const result = await withSession(this.openSession, this.databaseUrl, async (session) => {
        const startTime = Date.now();
        const { rows, columnNames } = await session.execute(request.sqlQuery, request.params);
        return {
          rows,
          columnNames,
          rowCount: rows.length,
          executionTimeMs: Date.now() - startTime,
        };
      });

      this.logger.info(`Query returned ${result.rowCount} rows in ${result.executionTimeMs}ms`);
      return succeeded(result);
    } catch (error) {
      const queryError = classifyQueryError(error);
      this.logger.error(`Database query error (${queryError.kind}): ${queryError.message}`);
      return failed(queryError);
    }
  }
}
