#!/usr/bin/env node
/**
 * lucidata CLI
 * Ask questions of a PostgreSQL database from the terminal, or start the services.
 */

import 'dotenv/config';
import { cac } from 'cac';
import chalk from 'chalk';
import { loadConfig, type Config } from './config.js';
import {
  SERVICE_NAMES,
  closeOnSignals,
  createServices,
  isServiceName,
  startServices,
} from './server.js';
import { SchemaProvider } from './services/schema.js';
import { formatSchemaForPrompt } from './services/prompt.js';
import type { ProcessedQuery } from './types/models.js';
import { errorMessage } from './types/utils.js';
import { createLogger, type Logger } from './utils/logger.js';
import * as logger from './cli/logger.js';

const cli = cac('lucidata');

cli.version('0.1.0');
cli.help();

/**
 * Configuration and process logger for one command.
 */
function bootstrap(): { config: Config; log: Logger } {
  const config = loadConfig();
  return { config, log: createLogger(config) };
}

/**
 * lucidata serve [service]
 * Start every service, or just the one named
 */
cli
  .command('serve [service]', `Start the services (${SERVICE_NAMES.join(', ')})`)
  .action(async (service?: string) => {
    if (service !== undefined && !isServiceName(service)) {
      logger.error(`Unknown service "${service}"`, `Choose one of: ${SERVICE_NAMES.join(', ')}`);
      process.exit(1);
    }

    try {
      const { config, log } = bootstrap();
      const apps = await startServices(service ? [service] : SERVICE_NAMES, config, log);
      closeOnSignals(apps, log);
    } catch (error) {
      logger.error('Failed to start services', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * lucidata ask <question>
 * Translate a question to SQL, optionally running it
 */
cli
  .command('ask <question>', 'Translate a natural language question into SQL')
  .option('-m, --model <model>', 'Model to use instead of LLM_MODEL')
  .option('-r, --run', 'Execute the generated SQL and print the rows')
  .action(async (question: string, options: { model?: string; run?: boolean }) => {
    try {
      const { config, log } = bootstrap();
      const { translator, executor } = createServices(config, log);

      const spin = logger.spinner('Translating question...');
      let translated: ProcessedQuery;
      try {
        translated = await translator.process({ question, modelName: options.model });
        spin.succeed('Translated');
      } catch (error) {
        spin.fail('Translation failed');
        throw error;
      }

      logger.section('Generated SQL');
      logger.code(translated.sqlQuery, 'sql');
      if (translated.explanation) {
        logger.info(translated.explanation);
      }
      logger.info(`Confidence: ${translated.confidence.toFixed(2)}`);
      if (translated.schemaFallback) {
        logger.warn('Database schema unavailable; the built-in schema was used');
      }
      if (translated.sqlFallback) {
        logger.warn('No SQL found in the model response; showing the fallback query');
      }

      if (!options.run) {
        return;
      }

      const outcome = await executor.execute({ sqlQuery: translated.sqlQuery });
      if (outcome.status === 'failed') {
        logger.error(`Query failed (${outcome.error.kind})`, outcome.error.message);
        process.exit(1);
      }

      const result = outcome.value;
      logger.section('Results');
      logger.rows(result.columnNames, result.rows);
      logger.success(`${result.rowCount} rows in ${result.executionTimeMs}ms`);
    } catch (error) {
      logger.error('Query failed', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * lucidata schema
 * Show the schema the model is given
 */
cli
  .command('schema', 'Print the database schema as sent to the model')
  .action(async () => {
    try {
      const { config, log } = bootstrap();
      const outcome = await new SchemaProvider({ databaseUrl: config.databaseUrl, logger: log }).fetch();

      logger.section('Schema');
      console.log(formatSchemaForPrompt(outcome.value));
      logger.newline();

      if (outcome.status === 'fallback') {
        logger.warn(`Built-in schema in use: ${chalk.dim(outcome.reason)}`);
      } else {
        logger.success(`${outcome.value.size} tables read from the database`);
      }
    } catch (error) {
      logger.error('Could not read the schema', errorMessage(error));
      process.exit(1);
    }
  });

// Parse CLI arguments
cli.parse(process.argv, { run: false });
await cli.runMatchedCommand();
