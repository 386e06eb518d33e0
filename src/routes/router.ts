/**
 * Combined translate-then-execute endpoint.
 */

import type { FastifyInstance } from 'fastify';
import {
  TranslateAndExecuteRequestSchema,
  type TranslateAndExecuteResponse,
} from '../types/models.js';
import { QueryExecutionError } from '../types/errors.js';
import type { QueryExecutor } from '../services/executor.js';
import type { Translator } from '../services/translator.js';

export interface RouterRoutesOptions {
  translator: Translator;
  executor: QueryExecutor;
}

export async function routerRoutes(fastify: FastifyInstance, opts: RouterRoutesOptions) {
  // POST /translate-and-execute - Translate a question, then run the SQL
  fastify.post(
    '/translate-and-execute',
    {
      schema: {
        description: 'Translate a natural language question and execute the resulting SQL',
        body: {
          type: 'object',
          properties: {
            natural_query: { type: 'string', minLength: 1 },
            model: { type: 'string', minLength: 1 },
          },
          required: ['natural_query'],
        },
      },
    },
    async (request): Promise<TranslateAndExecuteResponse> => {
      const body = TranslateAndExecuteRequestSchema.parse(request.body);
      const startTime = Date.now();

      const translated = await opts.translator.process({
        question: body.natural_query,
        modelName: body.model,
      });
      const llmTime = Date.now() - startTime;

      const executionStart = Date.now();
      const outcome = await opts.executor.execute({ sqlQuery: translated.sqlQuery });
      const executionTime = Date.now() - executionStart;

      if (outcome.status === 'failed') {
        throw new QueryExecutionError(outcome.error);
      }

      return {
        natural_query: body.natural_query,
        sql_query: translated.sqlQuery,
        explanation: translated.explanation,
        results: outcome.value.rows,
        metadata: {
          confidence: translated.confidence,
          execution_time_ms: executionTime,
          llm_processing_time_ms: llmTime,
          total_time_ms: Date.now() - startTime,
        },
      };
    }
  );
}
