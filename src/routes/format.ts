/**
 * Result formatting endpoint.
 */

import type { FastifyInstance } from 'fastify';
import { FormatRequestSchema, type FormatResponse } from '../types/models.js';
import type { ResultFormatter } from '../services/formatter.js';

export interface FormatRoutesOptions {
  formatter: ResultFormatter;
}

export async function formatRoutes(fastify: FastifyInstance, opts: FormatRoutesOptions) {
  // POST /format - Render rows as html, csv or json with an optional chart
  fastify.post(
    '/format',
    {
      schema: {
        description: 'Render result rows as html, csv or json',
        body: {
          type: 'object',
          properties: {
            data: { type: 'array', items: { type: 'object' } },
            format: { type: 'string' },
            visualization_type: { type: 'string' },
            title: { type: 'string' },
            description: { type: 'string' },
          },
          required: ['data'],
        },
      },
    },
    async (request): Promise<FormatResponse> => {
      const body = FormatRequestSchema.parse(request.body);
      const result = opts.formatter.format(body.data, {
        format: body.format,
        visualizationType: body.visualization_type,
        title: body.title,
        description: body.description,
      });

      return {
        formatted_data: result.formattedData,
        visualization: result.visualization,
        content_type: result.contentType,
      };
    }
  );
}
