/**
 * Lucidata server - main entry point.
 *
 * Starts all four services in one process.
 */

import 'dotenv/config';
import { loadConfig, type Config } from './config.js';
import { SERVICE_NAMES, closeOnSignals, startServices } from './server.js';
import { errorMessage } from './types/utils.js';
import { createLogger } from './utils/logger.js';

/**
 * Start the servers.
 */
const start = async () => {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }

  const logger = createLogger(config);
  logger.info('Starting Lucidata services...');

  try {
    const apps = await startServices(SERVICE_NAMES, config, logger);
    closeOnSignals(apps, logger);
  } catch (err) {
    logger.error({ err }, 'Failed to start services');
    process.exit(1);
  }
};

await start();
