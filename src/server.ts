/**
 * Fastify application builders for the four Lucidata services.
 */

import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import type { Config } from './config.js';
import { executeRoutes } from './routes/execute.js';
import { formatRoutes } from './routes/format.js';
import { queryRoutes } from './routes/query.js';
import { routerRoutes } from './routes/router.js';
import { utilityRoutes } from './routes/utility.js';
import { QueryExecutor } from './services/executor.js';
import { ResultFormatter } from './services/formatter.js';
import { TranslationClient } from './services/llm.js';
import { SchemaProvider } from './services/schema.js';
import { Translator } from './services/translator.js';
import {
  FormattingError,
  ProviderError,
  QueryExecutionError,
} from './types/errors.js';
import type { ErrorResponse } from './types/models.js';
import type { Logger } from './utils/logger.js';

export const SERVICE_NAMES = ['llm-engine', 'formatter', 'query-runner', 'query-router'] as const;
export type ServiceName = (typeof SERVICE_NAMES)[number];

export function isServiceName(value: string): value is ServiceName {
  return SERVICE_NAMES.some((name) => name === value);
}

const SERVICE_TITLES: Record<ServiceName, string> = {
  'llm-engine': 'LLM Query Engine',
  formatter: 'Response Formatter Service',
  'query-runner': 'Query Runner Service',
  'query-router': 'Query Router Service',
};

export function servicePort(config: Config, service: ServiceName): number {
  switch (service) {
    case 'llm-engine':
      return config.ports.llmEngine;
    case 'formatter':
      return config.ports.formatter;
    case 'query-runner':
      return config.ports.queryRunner;
    case 'query-router':
      return config.ports.queryRouter;
  }
}

/**
 * Stateless collaborators shared by the route handlers.
 */
export interface Services {
  translator: Translator;
  executor: QueryExecutor;
  formatter: ResultFormatter;
}

export function createServices(config: Config, logger: Logger): Services {
  const schemaProvider = new SchemaProvider({ databaseUrl: config.databaseUrl, logger });
  const client = new TranslationClient({ llm: config.llm, logger });

  return {
    translator: new Translator({ schemaProvider, client, logger }),
    executor: new QueryExecutor({ databaseUrl: config.databaseUrl, logger }),
    formatter: new ResultFormatter(logger),
  };
}

function numericStatus(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Map a thrown error to an HTTP status and body.
 */
export function toErrorResponse(error: unknown): { statusCode: number; body: ErrorResponse } {
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { statusCode: 400, body: { error: 'ValidationError', message } };
  }

  if (error instanceof QueryExecutionError) {
    return { statusCode: error.statusCode, body: { error: error.kind, message: error.message } };
  }

  if (error instanceof ProviderError || error instanceof FormattingError) {
    return { statusCode: 500, body: { error: error.name, message: error.message } };
  }

  if (error instanceof Error) {
    // Fastify's own request errors: schema validation, bad JSON, wrong media type
    if ('validation' in error) {
      return { statusCode: 400, body: { error: 'ValidationError', message: error.message } };
    }
    const status = numericStatus(error);
    if (status !== undefined && status >= 400 && status < 500) {
      return { statusCode: status, body: { error: error.name, message: error.message } };
    }
    return {
      statusCode: 500,
      body: { error: 'InternalServerError', message: error.message || 'An unexpected error occurred' },
    };
  }

  return {
    statusCode: 500,
    body: { error: 'InternalServerError', message: 'An unexpected error occurred' },
  };
}

export interface BuildServerOptions {
  logger: Logger;
  services: Services;
}

/**
 * Create and configure the Fastify app for one service.
 */
export async function buildServer(
  service: ServiceName,
  options: BuildServerOptions
): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = options.logger;
  const fastify = Fastify({ loggerInstance });
  const { services } = options;

  await fastify.register(cors, {
    origin: '*',
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: SERVICE_TITLES[service],
        description: 'Lucidata - query PostgreSQL with natural language',
        version: '0.1.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  fastify.setErrorHandler((error, request, reply) => {
    const { statusCode, body } = toErrorResponse(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, `${body.error}: ${body.message}`);
    }
    return reply.status(statusCode).send(body);
  });

  await fastify.register(utilityRoutes, { title: SERVICE_TITLES[service] });

  switch (service) {
    case 'llm-engine':
      await fastify.register(queryRoutes, { translator: services.translator });
      break;
    case 'formatter':
      await fastify.register(formatRoutes, { formatter: services.formatter });
      break;
    case 'query-runner':
      await fastify.register(executeRoutes, { executor: services.executor });
      break;
    case 'query-router':
      await fastify.register(routerRoutes, {
        translator: services.translator,
        executor: services.executor,
      });
      break;
  }

  return fastify;
}

/**
 * Build and start the named services, each on its configured port.
 * Already-started services are closed again if a later one fails to start.
 */
export async function startServices(
  names: readonly ServiceName[],
  config: Config,
  logger: Logger
): Promise<FastifyInstance[]> {
  const services = createServices(config, logger);
  const apps: FastifyInstance[] = [];

  try {
    for (const name of names) {
      const app = await buildServer(name, { logger, services });
      apps.push(app);

      const port = servicePort(config, name);
      await app.listen({ port, host: config.host });
      logger.info(`${SERVICE_TITLES[name]} running at http://${config.host}:${port} (docs at /docs)`);
    }
  } catch (error) {
    await Promise.allSettled(apps.map((app) => app.close()));
    throw error;
  }

  return apps;
}

/**
 * Close every app on SIGINT or SIGTERM, then exit.
 */
export function closeOnSignals(apps: FastifyInstance[], logger: Logger): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    Promise.all(apps.map((app) => app.close())).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
