/**
 * Authz service entry point
 */

import { loadConfig, printConfigSummary, SERVICE_NAME } from './config.js';
import { startService } from './service.js';
import { configureLogger, logger } from './common/logger.js';
import { getErrorMessage } from './common/errors.js';
import { onShutdown, setupGracefulShutdown } from './common/lifecycle.js';

async function main() {
  try {
    const config = loadConfig();
    configureLogger({
      level: config.logLevel,
      format: config.logFormat,
      service: SERVICE_NAME,
    });
    printConfigSummary(config);

    const service = await startService(config);
    onShutdown(() => service.stop());
    setupGracefulShutdown();
  } catch (error) {
    logger.error('Failed to start authz service', { error: getErrorMessage(error) });
    process.exit(1);
  }
}

void main();
