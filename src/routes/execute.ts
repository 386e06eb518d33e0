/**
 * SQL execution endpoint.
 */

import type { FastifyInstance } from 'fastify';
import { ExecuteQueryRequestSchema, type ExecuteQueryResponse } from '../types/models.js';
import { QueryExecutionError } from '../types/errors.js';
import type { QueryExecutor } from '../services/executor.js';

export interface ExecuteRoutesOptions {
  executor: QueryExecutor;
}

export async function executeRoutes(fastify: FastifyInstance, opts: ExecuteRoutesOptions) {
  // POST /execute-query - Run a statement and return its rows
  fastify.post(
    '/execute-query',
    {
      schema: {
        description: 'Execute a SQL statement with optional named parameters',
        body: {
          type: 'object',
          properties: {
            query: { type: 'string', minLength: 1 },
            params: { type: 'object', additionalProperties: true },
          },
          required: ['query'],
        },
      },
    },
    async (request): Promise<ExecuteQueryResponse> => {
      const body = ExecuteQueryRequestSchema.parse(request.body);
      const outcome = await opts.executor.execute({ sqlQuery: body.query, params: body.params });

      if (outcome.status === 'failed') {
        throw new QueryExecutionError(outcome.error);
      }

      const result = outcome.value;
      return {
        results: result.rows,
        metadata: {
          row_count: result.rowCount,
          column_names: result.columnNames,
          query_execution_time_ms: result.executionTimeMs,
        },
      };
    }
  );
}
