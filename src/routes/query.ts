/**
 * Query endpoints for natural language to SQL translation.
 */

import type { FastifyInstance } from 'fastify';
import { ProcessQueryRequestSchema, type ProcessQueryResponse } from '../types/models.js';
import type { Translator } from '../services/translator.js';

export interface QueryRoutesOptions {
  translator: Translator;
}

export async function queryRoutes(fastify: FastifyInstance, opts: QueryRoutesOptions) {
  // POST /process-query - Translate a question without running it
  fastify.post(
    '/process-query',
    {
      schema: {
        description: 'Translate a natural language question into SQL',
        body: {
          type: 'object',
          properties: {
            query: { type: 'string', minLength: 1 },
            model: { type: 'string', minLength: 1 },
          },
          required: ['query'],
        },
      },
    },
    async (request): Promise<ProcessQueryResponse> => {
      const body = ProcessQueryRequestSchema.parse(request.body);
      const result = await opts.translator.process({ question: body.query, modelName: body.model });

      return {
        sql_query: result.sqlQuery,
        explanation: result.explanation,
        confidence: result.confidence,
        fallback: {
          schema: result.schemaFallback,
          sql: result.sqlFallback,
        },
      };
    }
  );
}
